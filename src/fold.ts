import {
    ConstantExpr,
    Parentheses,
    TypeCategory,
    type ConstantValue,
    type Expression,
} from "./expr";

/**
 * The value of `expr` when it is already a scalar constant, looking
 * through parentheses. Nothing is evaluated here; an expression that
 * folding has not yet reduced to a literal yields `undefined`.
 */
export function getScalarConstantValue(
    expr: Expression,
): ConstantValue | undefined {
    if (expr instanceof Parentheses) {
        return getScalarConstantValue(expr.operand);
    }
    if (expr instanceof ConstantExpr) {
        return expr.scalarValue();
    }
    return undefined;
}

export function getScalarIntegerConstant(
    expr: Expression,
): bigint | undefined {
    const inner = expr instanceof Parentheses ? unwrapParentheses(expr) : expr;
    if (!(inner instanceof ConstantExpr) || inner.category !== TypeCategory.Integer) {
        return undefined;
    }
    const value = inner.scalarValue();
    if (typeof value === "bigint") {
        return value;
    }
    if (typeof value === "number" && Number.isInteger(value)) {
        return BigInt(value);
    }
    return undefined;
}

export function isZero(value: ConstantValue): boolean {
    return value === 0 || value === 0n;
}

function unwrapParentheses(expr: Expression): Expression {
    let inner = expr;
    while (inner instanceof Parentheses) {
        inner = inner.operand;
    }
    return inner;
}
