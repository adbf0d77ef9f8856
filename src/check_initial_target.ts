import { isConstantExpr } from "./check_constant";
import {
    type ContextualMessages,
    formatAllocatableTarget,
    formatCoarrayTarget,
    formatMissingSaveAttr,
    formatMissingTargetAttr,
} from "./diagnostics";
import {
    type ArrayConstructor,
    type BinaryExpr,
    type BozLiteral,
    type CoarrayRef,
    type Component,
    type ConstantExpr,
    type DescriptorInquiry,
    type Expression,
    type FunctionRef,
    type NullPointer,
    type Parentheses,
    type RelationalExpr,
    type StaticDataObject,
    type StructureConstructor,
    type Subscript,
    type Substring,
    Triplet,
    type TypeParamInquiry,
    type UnaryExpr,
} from "./expr";
import { Attr, isAllocatable, isSaved, type Symbol } from "./symbols";
import { AllTraverse } from "./traverse";

/**
 * Decides whether an expression may initialize a data pointer
 * (`p => target` in a declaration): it must designate a named object with
 * static storage, through constant subscripts only.
 *
 * The shape of the designator decides the result. Attribute problems of
 * the object itself are reported through `messages` and leave the result
 * true.
 */
class IsInitialDataTargetHelper extends AllTraverse {
    readonly #messages: ContextualMessages;

    constructor(messages: ContextualMessages) {
        super();
        this.#messages = messages;
    }

    visitBozLiteral(_node: BozLiteral): boolean {
        return false;
    }

    visitNullPointer(_node: NullPointer): boolean {
        return true;
    }

    visitConstant(_node: ConstantExpr): boolean {
        return false;
    }

    visitSymbol(symbol: Symbol): boolean {
        const ultimate = symbol.ultimate;
        if (isAllocatable(ultimate)) {
            this.#messages.say(formatAllocatableTarget(ultimate.name));
        }
        if (ultimate.corank > 0) {
            this.#messages.say(formatCoarrayTarget(ultimate.name));
        }
        if (!ultimate.has(Attr.Target)) {
            this.#messages.say(formatMissingTargetAttr(ultimate.name));
        }
        if (!isSaved(ultimate)) {
            this.#messages.say(formatMissingSaveAttr(ultimate.name));
        }
        return true;
    }

    visitStaticDataObject(_node: StaticDataObject): boolean {
        return false;
    }

    visitTypeParamInquiry(_node: TypeParamInquiry): boolean {
        return false;
    }

    visitTriplet(node: Triplet): boolean {
        return (
            isOptionalConstantExpr(node.lower) &&
            isOptionalConstantExpr(node.upper) &&
            isOptionalConstantExpr(node.stride)
        );
    }

    visitSubscript(node: Subscript): boolean {
        const value = node.value;
        if (value instanceof Triplet) {
            return this.visitTriplet(value);
        }
        return value.rank === 0 && isConstantExpr(value);
    }

    /**
     * TARGET and SAVE belong to the parent object, so only the base is
     * checked; an ALLOCATABLE component is still no static address.
     */
    visitComponent(node: Component): boolean {
        if (isAllocatable(node.component)) {
            this.#messages.say(formatAllocatableTarget(node.component.name));
        }
        return this.visit(node.base);
    }

    visitCoarrayRef(_node: CoarrayRef): boolean {
        return false;
    }

    visitSubstring(node: Substring): boolean {
        return (
            isOptionalConstantExpr(node.lower) &&
            isOptionalConstantExpr(node.upper) &&
            this.visit(node.parent)
        );
    }

    visitDescriptorInquiry(_node: DescriptorInquiry): boolean {
        return false;
    }

    visitArrayConstructor(_node: ArrayConstructor): boolean {
        return false;
    }

    visitStructureConstructor(_node: StructureConstructor): boolean {
        return false;
    }

    visitFunctionRef(_node: FunctionRef): boolean {
        return false;
    }

    visitUnary(_node: UnaryExpr): boolean {
        return false;
    }

    visitBinary(_node: BinaryExpr): boolean {
        return false;
    }

    visitParentheses(node: Parentheses): boolean {
        return this.visit(node.operand);
    }

    visitRelational(_node: RelationalExpr): boolean {
        return false;
    }
}

/** An omitted bound or stride is a constant default. */
function isOptionalConstantExpr(expr: Expression | undefined): boolean {
    return expr === undefined || isConstantExpr(expr);
}

export function isInitialDataTarget(
    expr: Expression,
    messages: ContextualMessages,
): boolean {
    return new IsInitialDataTargetHelper(messages).visit(expr);
}
