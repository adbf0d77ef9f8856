import { describe, test, expect } from "vitest";
import {
    ArrayConstructor,
    BinaryOp,
    BozLiteral,
    CoarrayRef,
    ComplexPart,
    ConstantExpr,
    DescriptorInquiry,
    ImpliedDo,
    NullPointer,
    ParamValue,
    Parentheses,
    ProcedureDesignator,
    RelationalExpr,
    RelationalOp,
    StaticDataObject,
    StructureConstructor,
    Substring,
    TypeCategory,
    TypeParamInquiry,
    UnaryExpr,
    UnaryOp,
} from "../src/expr";
import { formatExpr } from "../src/expr_printer";
import { declareSymbol, makeGlobalScope, ScopeKind } from "../src/symbols";
import {
    add,
    all,
    at,
    binary,
    call,
    component,
    element,
    idiv,
    int,
    object,
    range,
    ref,
} from "./helpers";

function setup() {
    const global = makeGlobalScope();
    const sub = global.makeChild(ScopeKind.Subprogram, "s");
    const type = global.makeChild(ScopeKind.DerivedType, "t");
    const dos = sub.makeChild(ScopeKind.ImpliedDos, "");
    return {
        a: object(sub, "a", { rank: 2 }),
        n: object(sub, "n"),
        x: object(sub, "x"),
        st: object(sub, "st"),
        i: object(dos, "i"),
        b: object(type, "b"),
        c1: object(type, "c1"),
        c2: object(type, "c2"),
        kp: declareSymbol(type, "kp", { kind: "typeParam", attr: "kind" }),
    };
}

describe("designators", () => {
    test("array sections", () => {
        const { a, n } = setup();
        expect(formatExpr(element(a, range(int(1), ref(n)), all()))).toBe("a(1:n, :)");
        expect(formatExpr(element(a, range(int(1), int(9), int(2)), range(undefined, ref(n))))).toBe(
            "a(1:9:2, :n)",
        );
    });

    test("components, substrings and complex parts", () => {
        const { x, b } = setup();
        expect(formatExpr(component(ref(x), b))).toBe("x%b");
        expect(formatExpr(new Substring(ref(x), int(1), int(3)))).toBe("x(1:3)");
        expect(formatExpr(new Substring(ref(x), undefined, int(3)))).toBe("x(:3)");
        expect(formatExpr(new ComplexPart(ref(x), "re"))).toBe("x%re");
    });

    test("coarray references", () => {
        const { a, st } = setup();
        expect(formatExpr(new CoarrayRef(a, [], [int(2)]))).toBe("a[2]");
        expect(formatExpr(new CoarrayRef(a, [at(int(1)), all()], [int(2)], ref(st)))).toBe(
            "a(1, :)[2, stat=st]",
        );
    });

    test("inquiries", () => {
        const { a, x, kp } = setup();
        expect(formatExpr(new DescriptorInquiry(ref(a), "extent"))).toBe("size(a, dim=1)");
        expect(formatExpr(new DescriptorInquiry(ref(a), "lowerBound", 1))).toBe("lbound(a, dim=2)");
        expect(formatExpr(new DescriptorInquiry(ref(x), "len"))).toBe("len(x)");
        expect(formatExpr(new TypeParamInquiry(kp, ref(x)))).toBe("x%kp");
        expect(formatExpr(new TypeParamInquiry(kp))).toBe("kp");
    });
});

describe("values", () => {
    test("literals", () => {
        expect(formatExpr(int(42))).toBe("42");
        expect(formatExpr(new ConstantExpr(TypeCategory.Character, ["it's"]))).toBe("'it''s'");
        expect(formatExpr(new ConstantExpr(TypeCategory.Logical, [true]))).toBe(".true.");
        expect(formatExpr(new BozLiteral(255n))).toBe("z'ff'");
        expect(formatExpr(new NullPointer())).toBe("null()");
        expect(formatExpr(new StaticDataObject("s", "ab"))).toBe("'ab'");
    });

    test("array constants", () => {
        expect(formatExpr(new ConstantExpr(TypeCategory.Integer, [1, 2, 3], [3]))).toBe("[1, 2, 3]");
        expect(formatExpr(new ConstantExpr(TypeCategory.Integer, [1, 2, 3, 4], [2, 2]))).toBe(
            "reshape([1, 2, 3, 4], [2, 2])",
        );
    });

    test("array constructors with implied-DO", () => {
        const { i, n } = setup();
        const ctor = new ArrayConstructor(TypeCategory.Integer, [
            int(0),
            new ImpliedDo(i, int(1), ref(n), [ref(i)]),
        ]);
        expect(formatExpr(ctor)).toBe("[0, (i, i = 1, n)]");
    });

    test("structure constructors", () => {
        const { c1, c2 } = setup();
        const params = new Map([["k", ParamValue.explicit(int(4))]]);
        const values = new Map([
            [c1, int(1)],
            [c2, int(2)],
        ]);
        expect(formatExpr(new StructureConstructor({ name: "t", parameters: params }, values))).toBe(
            "t(k=4)(1, 2)",
        );
        const assumed = new Map([["n", ParamValue.assumed()]]);
        expect(formatExpr(new StructureConstructor({ name: "t", parameters: assumed }, new Map()))).toBe(
            "t(n=*)()",
        );
    });

    test("calls and procedure designators", () => {
        const { x } = setup();
        expect(formatExpr(call("kind", ref(x)))).toBe("kind(x)");
        expect(formatExpr(ProcedureDesignator.ofIntrinsic("sin"))).toBe("sin");
    });
});

describe("operations", () => {
    test("nested operations are parenthesized", () => {
        const { n } = setup();
        expect(formatExpr(add(int(1), idiv(ref(n), int(2))))).toBe("1 + (n / 2)");
        expect(formatExpr(binary(BinaryOp.Power, ref(n), int(2)))).toBe("n ** 2");
    });

    test("negative literal operands are parenthesized", () => {
        const { n } = setup();
        expect(formatExpr(add(ref(n), int(-1)))).toBe("n + (-1)");
    });

    test("explicit parentheses are kept once", () => {
        const { n } = setup();
        const expr = binary(BinaryOp.Multiply, new Parentheses(add(ref(n), int(1))), int(2));
        expect(formatExpr(expr)).toBe("(n + 1) * 2");
    });

    test("unary operators", () => {
        const { n } = setup();
        expect(formatExpr(new UnaryExpr(UnaryOp.Negate, TypeCategory.Integer, ref(n)))).toBe("-n");
        expect(formatExpr(new UnaryExpr(UnaryOp.Negate, TypeCategory.Integer, add(ref(n), int(1))))).toBe(
            "-(n + 1)",
        );
        expect(formatExpr(new UnaryExpr(UnaryOp.Convert, TypeCategory.Real, ref(n)))).toBe("real(n)");
    });

    test("relational operators", () => {
        const { n } = setup();
        expect(formatExpr(new RelationalExpr(RelationalOp.Le, ref(n), int(3)))).toBe("n <= 3");
        expect(formatExpr(new RelationalExpr(RelationalOp.Ne, add(ref(n), int(1)), int(0)))).toBe(
            "(n + 1) /= 0",
        );
    });
});
