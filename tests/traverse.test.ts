import { describe, test, expect } from "vitest";
import {
    ArrayConstructor,
    FunctionRef,
    ImpliedDo,
    ParamValue,
    Parentheses,
    ProcedureDesignator,
    StructureConstructor,
    TypeCategory,
    type Expression,
} from "../src/expr";
import { makeGlobalScope, ScopeKind, type Symbol } from "../src/symbols";
import { AllTraverse, AnyTraverse } from "../src/traverse";
import { add, all, element, int, object, range, ref } from "./helpers";

/** Records every symbol it reaches, in visiting order. */
class SymbolCollector extends AllTraverse {
    readonly seen: string[] = [];

    visitSymbol(symbol: Symbol): boolean {
        this.seen.push(symbol.name);
        return true;
    }
}

/** False at the first symbol named in `stopAt`. */
class StopAt extends AllTraverse {
    readonly seen: string[] = [];
    readonly stopAt: string;

    constructor(stopAt: string) {
        super();
        this.stopAt = stopAt;
    }

    visitSymbol(symbol: Symbol): boolean {
        this.seen.push(symbol.name);
        return symbol.name !== this.stopAt;
    }
}

/** The name of the first symbol with rank > 0. */
class FirstArray extends AnyTraverse<string> {
    visited = 0;

    visitSymbol(symbol: Symbol): string | undefined {
        this.visited++;
        return symbol.rank > 0 ? symbol.name : undefined;
    }
}

function setup() {
    const global = makeGlobalScope();
    const sub = global.makeChild(ScopeKind.Subprogram, "s");
    return {
        sub,
        a: object(sub, "a"),
        b: object(sub, "b"),
        c: object(sub, "c"),
        v: object(sub, "v", { rank: 1 }),
        w: object(sub, "w", { rank: 2 }),
    };
}

describe("AllTraverse", () => {
    test("leaves yield true", () => {
        expect(new SymbolCollector().visit(int(1))).toBe(true);
    });

    test("absent children yield true", () => {
        expect(new SymbolCollector().visit(undefined)).toBe(true);
    });

    test("visits children in source order", () => {
        const { a, b, c } = setup();
        const walker = new SymbolCollector();
        walker.visit(add(ref(a), new Parentheses(add(ref(b), ref(c)))));
        expect(walker.seen).toEqual(["a", "b", "c"]);
    });

    test("visits array base before subscripts", () => {
        const { a, b, v } = setup();
        const walker = new SymbolCollector();
        walker.visit(element(v, range(ref(a), ref(b))));
        expect(walker.seen).toEqual(["v", "a", "b"]);
    });

    test("stops at the first false", () => {
        const { a, b, c } = setup();
        const walker = new StopAt("b");
        expect(walker.visit(add(add(ref(a), ref(b)), ref(c)))).toBe(false);
        expect(walker.seen).toEqual(["a", "b"]);
    });

    test("reaches implied-DO bounds and values", () => {
        const global = makeGlobalScope();
        const dos = global.makeChild(ScopeKind.ImpliedDos, "");
        const i = object(dos, "i");
        const n = object(global, "n");
        const walker = new SymbolCollector();
        walker.visit(
            new ArrayConstructor(TypeCategory.Integer, [
                new ImpliedDo(i, int(1), ref(n), [ref(i)]),
            ]),
        );
        expect(walker.seen).toEqual(["n", "i"]);
    });

    test("reaches structure constructor parameters before component values", () => {
        const { a, b, c } = setup();
        const walker = new SymbolCollector();
        walker.visit(
            new StructureConstructor(
                { name: "t", parameters: new Map([["k", ParamValue.explicit(ref(a))]]) },
                new Map([[c, ref(b)]]),
            ),
        );
        expect(walker.seen).toEqual(["a", "b"]);
    });

    test("reaches the callee symbol before the arguments", () => {
        const { a, sub } = setup();
        const f = object(sub, "f");
        const walker = new SymbolCollector();
        walker.visit(new FunctionRef(ProcedureDesignator.ofSymbol(f), [ref(a), undefined]));
        expect(walker.seen).toEqual(["f", "a"]);
    });
});

describe("AnyTraverse", () => {
    test("yields undefined when nothing decides", () => {
        const { a, b } = setup();
        expect(new FirstArray().visit(add(ref(a), ref(b)))).toBeUndefined();
    });

    test("first defined result wins and stops the walk", () => {
        const { a, v, w } = setup();
        const walker = new FirstArray();
        const expr: Expression = add(add(ref(a), ref(v)), ref(w));
        expect(walker.visit(expr)).toBe("v");
        expect(walker.visited).toBe(2);
    });

    test("visitAll folds a list", () => {
        const { a, w } = setup();
        expect(new FirstArray().visitAll([ref(a), undefined, ref(w)])).toBe("w");
    });

    test("repeated runs give the same answer", () => {
        const { a, v } = setup();
        const expr = element(v, all(), range(ref(a)));
        const first = new FirstArray().visit(expr);
        expect(new FirstArray().visit(expr)).toBe(first);
        expect(first).toBe("v");
    });
});
