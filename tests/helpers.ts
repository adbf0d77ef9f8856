import * as fs from "node:fs";
import {
    type FunctionResultAttr,
    makeFunctionResult,
} from "../src/characteristics";
import {
    ContextualMessages,
    createCollector,
    type DiagnosticCollector,
} from "../src/diagnostics";
import {
    ArrayRef,
    BinaryExpr,
    BinaryOp,
    Component,
    ConstantExpr,
    type Expression,
    FunctionRef,
    ProcedureDesignator,
    Subscript,
    SymbolRef,
    Triplet,
    TypeCategory,
} from "../src/expr";
import {
    type Attr,
    declareSymbol,
    type Scope,
    type ShapeKind,
    type Symbol,
} from "../src/symbols";

const FIXTURES_DIR = new URL("./fixtures/", import.meta.url);

export function readFixture(name: string): string {
    return fs.readFileSync(new URL(name, FIXTURES_DIR), "utf8");
}

// ============================================================================
// Symbols
// ============================================================================

export type ObjectOptions = {
    rank?: number;
    corank?: number;
    shape?: ShapeKind;
    dummy?: boolean;
    common?: string;
    init?: Expression;
    attrs?: Attr[];
};

export function object(scope: Scope, name: string, opts: ObjectOptions = {}): Symbol {
    return declareSymbol(
        scope,
        name,
        {
            kind: "object",
            rank: opts.rank ?? 0,
            corank: opts.corank ?? 0,
            shape: opts.shape ?? "explicit",
            isDummy: opts.dummy ?? false,
            commonBlock: opts.common,
            init: opts.init,
        },
        opts.attrs ?? [],
    );
}

export type ProcedureOptions = {
    dummy?: boolean;
    attrs?: Attr[];
    result?: { attrs?: FunctionResultAttr[]; procedurePointer?: boolean };
};

export function procedure(scope: Scope, name: string, opts: ProcedureOptions = {}): Symbol {
    const result = opts.result;
    return declareSymbol(
        scope,
        name,
        {
            kind: "procedure",
            isDummy: opts.dummy ?? false,
            characteristics: {
                functionResult: result
                    ? makeFunctionResult(result.attrs, result.procedurePointer)
                    : undefined,
            },
        },
        opts.attrs ?? [],
    );
}

// ============================================================================
// Expressions
// ============================================================================

export function ref(symbol: Symbol): SymbolRef {
    return new SymbolRef(symbol);
}

export function int(value: number): ConstantExpr {
    return new ConstantExpr(TypeCategory.Integer, [value]);
}

export function real(value: number): ConstantExpr {
    return new ConstantExpr(TypeCategory.Real, [value]);
}

export function binary(op: BinaryOp, left: Expression, right: Expression): BinaryExpr {
    return new BinaryExpr(op, TypeCategory.Integer, left, right);
}

export function add(left: Expression, right: Expression): BinaryExpr {
    return binary(BinaryOp.Add, left, right);
}

export function idiv(left: Expression, right: Expression): BinaryExpr {
    return binary(BinaryOp.Divide, left, right);
}

/** A scalar or vector subscript. */
export function at(value: Expression): Subscript {
    return new Subscript(value);
}

/** A bare `:`. */
export function all(): Subscript {
    return new Subscript(new Triplet());
}

export function range(lower?: Expression, upper?: Expression, stride?: Expression): Subscript {
    return new Subscript(new Triplet(lower, upper, stride));
}

export function element(symbol: Symbol, ...subscripts: Subscript[]): ArrayRef {
    return new ArrayRef(ref(symbol), subscripts);
}

export function component(base: Expression, symbol: Symbol): Component {
    return new Component(base, symbol);
}

export function call(proc: Symbol | string, ...args: (Expression | undefined)[]): FunctionRef {
    const designator =
        typeof proc === "string"
            ? ProcedureDesignator.ofIntrinsic(proc)
            : ProcedureDesignator.ofSymbol(proc);
    return new FunctionRef(designator, args);
}

// ============================================================================
// Diagnostics
// ============================================================================

export function sink(): { collector: DiagnosticCollector; messages: ContextualMessages } {
    const collector = createCollector();
    return { collector, messages: new ContextualMessages(collector) };
}

export function messagesOf(collector: DiagnosticCollector): string[] {
    return collector.getDiagnostics().map((d) => d.message);
}
