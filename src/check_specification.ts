import { isConstantExpr } from "./check_constant";
import {
    type ContextualMessages,
    formatInvalidSpecificationExpr,
} from "./diagnostics";
import type {
    CoarrayRef,
    Component,
    DescriptorInquiry,
    Expression,
    FunctionRef,
    ProcedureDesignator,
} from "./expr";
import {
    Attr,
    isNamedConstant,
    isPureProcedure,
    type Scope,
    ScopeKind,
    type Symbol,
} from "./symbols";
import { AnyTraverse } from "./traverse";

/**
 * Finds the first reason an expression may not appear in a specification
 * expression (array bounds, type parameter values) of `scope`.
 */
class CheckSpecificationExprHelper extends AnyTraverse<string> {
    readonly #scope: Scope;

    constructor(scope: Scope) {
        super();
        this.#scope = scope;
    }

    visitProcedureDesignator(_node: ProcedureDesignator): string | undefined {
        return "dummy procedure argument";
    }

    visitCoarrayRef(_node: CoarrayRef): string | undefined {
        return "coindexed reference";
    }

    visitSymbol(symbol: Symbol): string | undefined {
        if (isNamedConstant(symbol)) {
            return undefined;
        }
        if (symbol.isDummy()) {
            if (symbol.has(Attr.Optional)) {
                return `reference to OPTIONAL dummy argument '${symbol.name}'`;
            }
            if (symbol.has(Attr.IntentOut)) {
                return `reference to INTENT(OUT) dummy argument '${symbol.name}'`;
            }
            return symbol.details.kind === "object"
                ? undefined
                : "dummy procedure argument";
        }
        if (
            symbol.details.kind === "use" ||
            symbol.details.kind === "hostAssoc" ||
            symbol.owner.kind === ScopeKind.Module
        ) {
            return undefined;
        }
        // TODO: decide EQUIVALENCE with data in COMMON, and whether blank
        // COMMON members qualify; any COMMON member is accepted for now.
        if (symbol.details.kind === "object" && symbol.details.commonBlock !== undefined) {
            return undefined;
        }
        if (this.#scope.hasAncestor(symbol.owner)) {
            return undefined;
        }
        return `reference to local entity '${symbol.name}'`;
    }

    visitComponent(node: Component): string | undefined {
        return this.visit(node.base);
    }

    visitDescriptorInquiry(_node: DescriptorInquiry): string | undefined {
        // SIZE(), LBOUND() and the like reach here only after folding has
        // rewritten the valid uses into descriptor inquiries.
        return undefined;
    }

    visitFunctionRef(node: FunctionRef): string | undefined {
        const symbol = node.proc.symbol;
        if (symbol) {
            if (!isPureProcedure(symbol)) {
                return `reference to impure function '${symbol.name}'`;
            }
        } else if (node.proc.intrinsic?.name === "present") {
            return undefined;
        } else if (isConstantExpr(node)) {
            return undefined;
        }
        return this.visitAll(node.args);
    }
}

/**
 * The reason `expr` is not a valid specification expression in `scope`,
 * or `undefined` when it is valid.
 */
export function specificationExprProblem(
    expr: Expression,
    scope: Scope,
): string | undefined {
    return new CheckSpecificationExprHelper(scope).visit(expr);
}

/**
 * Report through `messages` when `expr` is not a valid specification
 * expression in `scope`. An absent expression is valid.
 */
export function checkSpecificationExpr(
    expr: Expression | undefined,
    messages: ContextualMessages,
    scope: Scope,
): void {
    if (expr === undefined) {
        return;
    }
    const why = specificationExprProblem(expr, scope);
    if (why !== undefined) {
        messages.say(formatInvalidSpecificationExpr(why));
    }
}
