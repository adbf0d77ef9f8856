import { FunctionResultAttr } from "./characteristics";
import type { Symbol } from "./symbols";

export enum TypeCategory {
    Integer = 0,
    Real = 1,
    Complex = 2,
    Character = 3,
    Logical = 4,
    Derived = 5,
}

export enum UnaryOp {
    Negate = 0,
    Not = 1,
    Convert = 2,
}

export enum BinaryOp {
    Add = 0,
    Subtract = 1,
    Multiply = 2,
    Divide = 3,
    Power = 4,
    Concat = 5,
    And = 6,
    Or = 7,
    Eqv = 8,
    Neqv = 9,
}

export enum RelationalOp {
    Lt = 0,
    Le = 1,
    Eq = 2,
    Ne = 3,
    Ge = 4,
    Gt = 5,
}

export type ConstantValue = number | bigint | string | boolean;

/**
 * Implemented by every pass over the expression tree. Each node kind has
 * exactly one method, so a new kind fails to compile until every pass
 * decides how to treat it.
 */
export interface ExprVisitor<R> {
    visitSymbolRef(node: SymbolRef): R;
    visitConstant(node: ConstantExpr): R;
    visitBozLiteral(node: BozLiteral): R;
    visitNullPointer(node: NullPointer): R;
    visitStaticDataObject(node: StaticDataObject): R;
    visitProcedureDesignator(node: ProcedureDesignator): R;
    visitFunctionRef(node: FunctionRef): R;
    visitUnary(node: UnaryExpr): R;
    visitBinary(node: BinaryExpr): R;
    visitParentheses(node: Parentheses): R;
    visitRelational(node: RelationalExpr): R;
    visitArrayRef(node: ArrayRef): R;
    visitCoarrayRef(node: CoarrayRef): R;
    visitComponent(node: Component): R;
    visitSubstring(node: Substring): R;
    visitComplexPart(node: ComplexPart): R;
    visitArrayConstructor(node: ArrayConstructor): R;
    visitImpliedDo(node: ImpliedDo): R;
    visitStructureConstructor(node: StructureConstructor): R;
    visitTypeParamInquiry(node: TypeParamInquiry): R;
    visitDescriptorInquiry(node: DescriptorInquiry): R;
    visitSubscript(node: Subscript): R;
    visitTriplet(node: Triplet): R;
    visitParamValue(node: ParamValue): R;
}

export abstract class Node {
    abstract accept<R>(visitor: ExprVisitor<R>): R;
}

export abstract class Expression extends Node {
    abstract get rank(): number;

    get corank(): number {
        return 0;
    }
}

// ============================================================================
// Leaves
// ============================================================================

export class SymbolRef extends Expression {
    readonly symbol: Symbol;

    constructor(symbol: Symbol) {
        super();
        this.symbol = symbol;
    }

    get rank(): number {
        return this.symbol.rank;
    }

    get corank(): number {
        return this.symbol.corank;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitSymbolRef(this);
    }
}

/**
 * A typed literal, scalar when `shape` is empty. Array constants hold their
 * elements in array element order.
 */
export class ConstantExpr extends Expression {
    readonly category: TypeCategory;
    readonly values: readonly ConstantValue[];
    readonly shape: readonly number[];

    constructor(
        category: TypeCategory,
        values: readonly ConstantValue[],
        shape: readonly number[] = [],
    ) {
        super();
        this.category = category;
        this.values = values;
        this.shape = shape;
    }

    get rank(): number {
        return this.shape.length;
    }

    scalarValue(): ConstantValue | undefined {
        return this.shape.length === 0 ? this.values[0] : undefined;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitConstant(this);
    }
}

export class BozLiteral extends Expression {
    readonly value: bigint;

    constructor(value: bigint) {
        super();
        this.value = value;
    }

    get rank(): number {
        return 0;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitBozLiteral(this);
    }
}

export class NullPointer extends Expression {
    get rank(): number {
        return 0;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitNullPointer(this);
    }
}

/**
 * Anonymous static storage, e.g. the data behind a character literal that
 * is being substringed.
 */
export class StaticDataObject extends Expression {
    readonly name: string;
    readonly data: string;

    constructor(name: string, data: string) {
        super();
        this.name = name;
        this.data = data;
    }

    get rank(): number {
        return 0;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitStaticDataObject(this);
    }
}

// ============================================================================
// Procedures
// ============================================================================

export type SpecificIntrinsic = { name: string };

/**
 * Names a procedure: either a user symbol or a specific intrinsic.
 * On its own (not as the callee of a FunctionRef) it is a procedure
 * passed as an actual argument.
 */
export class ProcedureDesignator extends Expression {
    readonly symbol?: Symbol;
    readonly intrinsic?: SpecificIntrinsic;

    private constructor(symbol?: Symbol, intrinsic?: SpecificIntrinsic) {
        super();
        this.symbol = symbol;
        this.intrinsic = intrinsic;
    }

    static ofSymbol(symbol: Symbol): ProcedureDesignator {
        return new ProcedureDesignator(symbol, undefined);
    }

    static ofIntrinsic(name: string): ProcedureDesignator {
        return new ProcedureDesignator(undefined, { name });
    }

    get name(): string {
        return this.symbol?.name ?? this.intrinsic?.name ?? "";
    }

    get rank(): number {
        return 0;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitProcedureDesignator(this);
    }
}

export class FunctionRef extends Expression {
    readonly proc: ProcedureDesignator;
    /** `undefined` marks an omitted optional argument. */
    readonly args: readonly (Expression | undefined)[];
    readonly resultRank: number;

    constructor(
        proc: ProcedureDesignator,
        args: readonly (Expression | undefined)[],
        resultRank = 0,
    ) {
        super();
        this.proc = proc;
        this.args = args;
        this.resultRank = resultRank;
    }

    get rank(): number {
        return this.resultRank;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitFunctionRef(this);
    }
}

// ============================================================================
// Operations
// ============================================================================

export class UnaryExpr extends Expression {
    readonly op: UnaryOp;
    readonly category: TypeCategory;
    readonly operand: Expression;

    constructor(op: UnaryOp, category: TypeCategory, operand: Expression) {
        super();
        this.op = op;
        this.category = category;
        this.operand = operand;
    }

    get rank(): number {
        return this.operand.rank;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitUnary(this);
    }
}

export class BinaryExpr extends Expression {
    readonly op: BinaryOp;
    readonly category: TypeCategory;
    readonly left: Expression;
    readonly right: Expression;

    constructor(
        op: BinaryOp,
        category: TypeCategory,
        left: Expression,
        right: Expression,
    ) {
        super();
        this.op = op;
        this.category = category;
        this.left = left;
        this.right = right;
    }

    get rank(): number {
        return Math.max(this.left.rank, this.right.rank);
    }

    isIntegerDivision(): boolean {
        return (
            this.op === BinaryOp.Divide &&
            this.category === TypeCategory.Integer
        );
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitBinary(this);
    }
}

export class Parentheses extends Expression {
    readonly operand: Expression;

    constructor(operand: Expression) {
        super();
        this.operand = operand;
    }

    get rank(): number {
        return this.operand.rank;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitParentheses(this);
    }
}

export class RelationalExpr extends Expression {
    readonly op: RelationalOp;
    readonly left: Expression;
    readonly right: Expression;

    constructor(op: RelationalOp, left: Expression, right: Expression) {
        super();
        this.op = op;
        this.left = left;
        this.right = right;
    }

    get rank(): number {
        return Math.max(this.left.rank, this.right.rank);
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitRelational(this);
    }
}

// ============================================================================
// Designators
// ============================================================================

/**
 * `lower:upper:stride`; any part may be omitted.
 */
export class Triplet extends Node {
    readonly lower?: Expression;
    readonly upper?: Expression;
    readonly stride?: Expression;

    constructor(lower?: Expression, upper?: Expression, stride?: Expression) {
        super();
        this.lower = lower;
        this.upper = upper;
        this.stride = stride;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitTriplet(this);
    }
}

/**
 * One subscript of an array or coarray reference: a triplet, or an
 * expression (a vector subscript when the expression has rank > 0).
 */
export class Subscript extends Node {
    readonly value: Expression | Triplet;

    constructor(value: Expression | Triplet) {
        super();
        this.value = value;
    }

    get rank(): number {
        return this.value instanceof Triplet ? 1 : this.value.rank;
    }

    get triplet(): Triplet | undefined {
        return this.value instanceof Triplet ? this.value : undefined;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitSubscript(this);
    }
}

function subscriptRank(subscripts: readonly Subscript[]): number {
    return subscripts.reduce((rank, s) => rank + s.rank, 0);
}

export class Component extends Expression {
    readonly base: Expression;
    readonly component: Symbol;

    constructor(base: Expression, component: Symbol) {
        super();
        this.base = base;
        this.component = component;
    }

    get rank(): number {
        return this.base.rank > 0 ? this.base.rank : this.component.rank;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitComponent(this);
    }
}

export class ArrayRef extends Expression {
    readonly base: SymbolRef | Component;
    readonly subscripts: readonly Subscript[];

    constructor(base: SymbolRef | Component, subscripts: readonly Subscript[]) {
        super();
        this.base = base;
        this.subscripts = subscripts;
    }

    get lastSymbol(): Symbol {
        return this.base instanceof SymbolRef
            ? this.base.symbol
            : this.base.component;
    }

    get rank(): number {
        const base = this.base instanceof Component ? this.base.base.rank : 0;
        return base > 0 ? base : subscriptRank(this.subscripts);
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitArrayRef(this);
    }
}

export class CoarrayRef extends Expression {
    readonly base: Symbol;
    readonly subscripts: readonly Subscript[];
    readonly cosubscripts: readonly Expression[];
    readonly stat?: Expression;
    readonly team?: Expression;

    constructor(
        base: Symbol,
        subscripts: readonly Subscript[],
        cosubscripts: readonly Expression[],
        stat?: Expression,
        team?: Expression,
    ) {
        super();
        this.base = base;
        this.subscripts = subscripts;
        this.cosubscripts = cosubscripts;
        this.stat = stat;
        this.team = team;
    }

    get rank(): number {
        return this.subscripts.length > 0
            ? subscriptRank(this.subscripts)
            : this.base.rank;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitCoarrayRef(this);
    }
}

export class Substring extends Expression {
    readonly parent: Expression;
    readonly lower?: Expression;
    readonly upper?: Expression;

    constructor(parent: Expression, lower?: Expression, upper?: Expression) {
        super();
        this.parent = parent;
        this.lower = lower;
        this.upper = upper;
    }

    get rank(): number {
        return this.parent.rank;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitSubstring(this);
    }
}

export class ComplexPart extends Expression {
    readonly complex: Expression;
    readonly part: "re" | "im";

    constructor(complex: Expression, part: "re" | "im") {
        super();
        this.complex = complex;
        this.part = part;
    }

    get rank(): number {
        return this.complex.rank;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitComplexPart(this);
    }
}

// ============================================================================
// Constructors and inquiries
// ============================================================================

/**
 * `(values, index = lower, upper, stride)` inside an array constructor.
 * The index variable is owned by an implied-DO scope.
 */
export class ImpliedDo extends Node {
    readonly index: Symbol;
    readonly lower: Expression;
    readonly upper: Expression;
    readonly stride?: Expression;
    readonly values: readonly (Expression | ImpliedDo)[];

    constructor(
        index: Symbol,
        lower: Expression,
        upper: Expression,
        values: readonly (Expression | ImpliedDo)[],
        stride?: Expression,
    ) {
        super();
        this.index = index;
        this.lower = lower;
        this.upper = upper;
        this.values = values;
        this.stride = stride;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitImpliedDo(this);
    }
}

export class ArrayConstructor extends Expression {
    readonly category: TypeCategory;
    readonly values: readonly (Expression | ImpliedDo)[];

    constructor(
        category: TypeCategory,
        values: readonly (Expression | ImpliedDo)[],
    ) {
        super();
        this.category = category;
        this.values = values;
    }

    get rank(): number {
        return 1;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitArrayConstructor(this);
    }
}

/**
 * A type parameter value: an expression, `*` (assumed) or `:` (deferred).
 */
export class ParamValue extends Node {
    readonly category: "explicit" | "assumed" | "deferred";
    readonly expr?: Expression;

    private constructor(
        category: "explicit" | "assumed" | "deferred",
        expr?: Expression,
    ) {
        super();
        this.category = category;
        this.expr = expr;
    }

    static explicit(expr: Expression): ParamValue {
        return new ParamValue("explicit", expr);
    }

    static assumed(): ParamValue {
        return new ParamValue("assumed");
    }

    static deferred(): ParamValue {
        return new ParamValue("deferred");
    }

    isExplicit(): boolean {
        return this.category === "explicit";
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitParamValue(this);
    }
}

export type DerivedTypeSpec = {
    name: string;
    parameters: ReadonlyMap<string, ParamValue>;
};

export class StructureConstructor extends Expression {
    readonly typeSpec: DerivedTypeSpec;
    readonly values: ReadonlyMap<Symbol, Expression>;

    constructor(typeSpec: DerivedTypeSpec, values: ReadonlyMap<Symbol, Expression>) {
        super();
        this.typeSpec = typeSpec;
        this.values = values;
    }

    get rank(): number {
        return 0;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitStructureConstructor(this);
    }
}

/**
 * `x%k` for a type parameter `k`, or a bare `k` inside the type's
 * definition when there is no base.
 */
export class TypeParamInquiry extends Expression {
    readonly base?: SymbolRef | Component;
    readonly parameter: Symbol;

    constructor(parameter: Symbol, base?: SymbolRef | Component) {
        super();
        this.parameter = parameter;
        this.base = base;
    }

    get rank(): number {
        return 0;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitTypeParamInquiry(this);
    }
}

export type DescriptorField = "lowerBound" | "extent" | "stride" | "rank" | "len";

/**
 * A read of an array descriptor field, produced when folding rewrites
 * SIZE, LBOUND, UBOUND, LEN and similar inquiries.
 */
export class DescriptorInquiry extends Expression {
    readonly base: SymbolRef | Component;
    readonly field: DescriptorField;
    readonly dimension: number;

    constructor(base: SymbolRef | Component, field: DescriptorField, dimension = 0) {
        super();
        this.base = base;
        this.field = field;
        this.dimension = dimension;
    }

    get rank(): number {
        return 0;
    }

    accept<R>(visitor: ExprVisitor<R>): R {
        return visitor.visitDescriptorInquiry(this);
    }
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Designators are variables, and so are references to functions whose
 * result is a data pointer. A substring is a variable only when its parent
 * is; a substring of a literal is not.
 */
export function isVariable(expr: Expression): boolean {
    if (
        expr instanceof SymbolRef ||
        expr instanceof ArrayRef ||
        expr instanceof CoarrayRef ||
        expr instanceof Component ||
        expr instanceof ComplexPart
    ) {
        return true;
    }
    if (expr instanceof Substring) {
        return isVariable(expr.parent);
    }
    if (expr instanceof FunctionRef && expr.proc.symbol) {
        const details = expr.proc.symbol.ultimate.details;
        const result =
            details.kind === "procedure"
                ? details.characteristics?.functionResult
                : undefined;
        return (
            result !== undefined &&
            !result.isProcedurePointer &&
            result.attrs.has(FunctionResultAttr.Pointer)
        );
    }
    return false;
}
