import type {
    BinaryExpr,
    CoarrayRef,
    Expression,
    FunctionRef,
    ParamValue,
    TypeParamInquiry,
} from "./expr";
import { getScalarConstantValue, isZero } from "./fold";
import {
    isImpliedDoIndex,
    isKindTypeParameter,
    isNamedConstant,
    type Symbol,
} from "./symbols";
import { AllTraverse } from "./traverse";

/**
 * Decides whether an expression is a constant expression: one built only
 * from values known at compile time. It need not be foldable yet; a
 * reference to a kind type parameter of a type being defined qualifies.
 */
class IsConstantExprHelper extends AllTraverse {
    visitTypeParamInquiry(node: TypeParamInquiry): boolean {
        return isKindTypeParameter(node.parameter);
    }

    visitSymbol(symbol: Symbol): boolean {
        return isNamedConstant(symbol) || isImpliedDoIndex(symbol);
    }

    visitCoarrayRef(_node: CoarrayRef): boolean {
        return false;
    }

    visitParamValue(node: ParamValue): boolean {
        return node.isExplicit() && this.visit(node.expr);
    }

    visitFunctionRef(node: FunctionRef): boolean {
        // TODO: accept the other inquiry intrinsics (len, lbound, ...) once
        // their arguments can be checked for constant type parameters.
        return node.proc.intrinsic?.name === "kind";
    }

    visitBinary(node: BinaryExpr): boolean {
        if (node.isIntegerDivision()) {
            const divisor = getScalarConstantValue(node.right);
            if (divisor === undefined || isZero(divisor)) {
                return false;
            }
        }
        return super.visitBinary(node);
    }
}

export function isConstantExpr(expr: Expression): boolean {
    return new IsConstantExprHelper().visit(expr);
}
