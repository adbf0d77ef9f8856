import {
    type ArrayConstructor,
    type ArrayRef,
    type BinaryExpr,
    type BozLiteral,
    type CoarrayRef,
    type ComplexPart,
    type Component,
    type ConstantExpr,
    type DescriptorInquiry,
    type ExprVisitor,
    type FunctionRef,
    type ImpliedDo,
    type Node,
    type NullPointer,
    type ParamValue,
    type Parentheses,
    type ProcedureDesignator,
    type RelationalExpr,
    type StaticDataObject,
    type StructureConstructor,
    type Subscript,
    type Substring,
    type SymbolRef,
    type Triplet,
    type TypeParamInquiry,
    type UnaryExpr,
} from "./expr";
import { Symbol } from "./symbols";

export type Visitable = Node | Symbol | undefined;

/**
 * Structural fold over the expression tree.
 *
 * Every `visit*` method defaults to visiting the node's children in source
 * order and folding their results with `combine`, starting from
 * `defaultResult`. Leaves and absent children yield `defaultResult`.
 * A pass overrides only the node kinds it treats specially; an override
 * may visit any children itself through `visit` and `visitAll`.
 *
 * Folding stops early once `isDecided` holds for the accumulated result.
 */
export abstract class Traverse<R> implements ExprVisitor<R> {
    protected readonly defaultResult: R;

    constructor(defaultResult: R) {
        this.defaultResult = defaultResult;
    }

    protected abstract combine(acc: R, next: R): R;

    protected abstract isDecided(result: R): boolean;

    visit(item: Visitable): R {
        if (item === undefined) {
            return this.defaultResult;
        }
        if (item instanceof Symbol) {
            return this.visitSymbol(item);
        }
        return item.accept(this);
    }

    visitAll(items: Iterable<Visitable>): R {
        let result = this.defaultResult;
        for (const item of items) {
            result = this.combine(result, this.visit(item));
            if (this.isDecided(result)) {
                break;
            }
        }
        return result;
    }

    visitSymbol(_symbol: Symbol): R {
        return this.defaultResult;
    }

    visitSymbolRef(node: SymbolRef): R {
        return this.visitSymbol(node.symbol);
    }

    visitConstant(_node: ConstantExpr): R {
        return this.defaultResult;
    }

    visitBozLiteral(_node: BozLiteral): R {
        return this.defaultResult;
    }

    visitNullPointer(_node: NullPointer): R {
        return this.defaultResult;
    }

    visitStaticDataObject(_node: StaticDataObject): R {
        return this.defaultResult;
    }

    visitProcedureDesignator(node: ProcedureDesignator): R {
        return this.visit(node.symbol);
    }

    visitFunctionRef(node: FunctionRef): R {
        return this.visitAll([node.proc, ...node.args]);
    }

    visitUnary(node: UnaryExpr): R {
        return this.visit(node.operand);
    }

    visitBinary(node: BinaryExpr): R {
        return this.visitAll([node.left, node.right]);
    }

    visitParentheses(node: Parentheses): R {
        return this.visit(node.operand);
    }

    visitRelational(node: RelationalExpr): R {
        return this.visitAll([node.left, node.right]);
    }

    visitArrayRef(node: ArrayRef): R {
        return this.visitAll([node.base, ...node.subscripts]);
    }

    visitCoarrayRef(node: CoarrayRef): R {
        return this.visitAll([
            node.base,
            ...node.subscripts,
            ...node.cosubscripts,
            node.stat,
            node.team,
        ]);
    }

    visitComponent(node: Component): R {
        return this.visitAll([node.base, node.component]);
    }

    visitSubstring(node: Substring): R {
        return this.visitAll([node.parent, node.lower, node.upper]);
    }

    visitComplexPart(node: ComplexPart): R {
        return this.visit(node.complex);
    }

    visitArrayConstructor(node: ArrayConstructor): R {
        return this.visitAll(node.values);
    }

    visitImpliedDo(node: ImpliedDo): R {
        return this.visitAll([node.lower, node.upper, node.stride, ...node.values]);
    }

    visitStructureConstructor(node: StructureConstructor): R {
        return this.visitAll([
            ...node.typeSpec.parameters.values(),
            ...node.values.values(),
        ]);
    }

    visitTypeParamInquiry(node: TypeParamInquiry): R {
        return this.visit(node.base);
    }

    visitDescriptorInquiry(node: DescriptorInquiry): R {
        return this.visit(node.base);
    }

    visitSubscript(node: Subscript): R {
        return this.visit(node.value);
    }

    visitTriplet(node: Triplet): R {
        return this.visitAll([node.lower, node.upper, node.stride]);
    }

    visitParamValue(node: ParamValue): R {
        return this.visit(node.expr);
    }
}

/**
 * Conjunction: true unless some visited part says otherwise.
 */
export abstract class AllTraverse extends Traverse<boolean> {
    constructor() {
        super(true);
    }

    protected combine(acc: boolean, next: boolean): boolean {
        return acc && next;
    }

    protected isDecided(result: boolean): boolean {
        return !result;
    }
}

/**
 * First answer wins: `undefined` until some visited part yields a value.
 */
export abstract class AnyTraverse<R> extends Traverse<R | undefined> {
    constructor() {
        super(undefined);
    }

    protected combine(acc: R | undefined, next: R | undefined): R | undefined {
        return acc === undefined ? next : acc;
    }

    protected isDecided(result: R | undefined): boolean {
        return result !== undefined;
    }
}
