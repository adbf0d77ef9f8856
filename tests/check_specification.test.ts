import { describe, test, expect } from "vitest";
import {
    checkSpecificationExpr,
    specificationExprProblem,
} from "../src/check_specification";
import { Level } from "../src/diagnostics";
import {
    CoarrayRef,
    DescriptorInquiry,
    ProcedureDesignator,
} from "../src/expr";
import { Attr, declareSymbol, makeGlobalScope, ScopeKind } from "../src/symbols";
import {
    add,
    call,
    component,
    element,
    at,
    int,
    messagesOf,
    object,
    procedure,
    ref,
    sink,
} from "./helpers";

function setup() {
    const global = makeGlobalScope();
    const mod = global.makeChild(ScopeKind.Module, "m");
    const host = global.makeChild(ScopeKind.Subprogram, "host");
    const inner = host.makeChild(ScopeKind.Subprogram, "inner");
    const sibling = global.makeChild(ScopeKind.Subprogram, "sibling");
    const type = mod.makeChild(ScopeKind.DerivedType, "t");
    return {
        global,
        mod,
        host,
        inner,
        sibling,
        type,
        k: object(inner, "k", { attrs: [Attr.Parameter] }),
        n: object(inner, "n", { dummy: true, attrs: [Attr.IntentIn] }),
        opt: object(inner, "opt", { dummy: true, attrs: [Attr.Optional] }),
        out: object(inner, "out", { dummy: true, attrs: [Attr.IntentOut] }),
        dproc: procedure(inner, "dproc", { dummy: true }),
        local: object(sibling, "local"),
        hostVar: object(host, "hv"),
        modVar: object(mod, "mv"),
        pureFn: procedure(mod, "pf", { attrs: [Attr.Pure] }),
        elementalFn: procedure(mod, "ef", { attrs: [Attr.Elemental] }),
        impureFn: procedure(mod, "imp"),
    };
}

describe("specificationExprProblem", () => {
    test("named constants are legal in any scope", () => {
        const { k, inner, sibling, global } = setup();
        expect(specificationExprProblem(ref(k), inner)).toBeUndefined();
        expect(specificationExprProblem(ref(k), sibling)).toBeUndefined();
        expect(specificationExprProblem(ref(k), global)).toBeUndefined();
    });

    test("an ordinary data dummy is legal", () => {
        const { n, inner } = setup();
        expect(specificationExprProblem(add(ref(n), int(1)), inner)).toBeUndefined();
    });

    test("an OPTIONAL dummy is illegal", () => {
        const { opt, inner } = setup();
        expect(specificationExprProblem(ref(opt), inner)).toBe(
            "reference to OPTIONAL dummy argument 'opt'",
        );
    });

    test("an INTENT(OUT) dummy is illegal", () => {
        const { out, inner } = setup();
        expect(specificationExprProblem(ref(out), inner)).toBe(
            "reference to INTENT(OUT) dummy argument 'out'",
        );
    });

    test("a dummy procedure is illegal", () => {
        const { dproc, inner } = setup();
        expect(specificationExprProblem(ref(dproc), inner)).toBe("dummy procedure argument");
        expect(specificationExprProblem(ProcedureDesignator.ofSymbol(dproc), inner)).toBe(
            "dummy procedure argument",
        );
    });

    test("a local of a sibling scope is illegal", () => {
        const { local, inner } = setup();
        expect(specificationExprProblem(ref(local), inner)).toBe("reference to local entity 'local'");
    });

    test("a local of the checking scope itself is illegal", () => {
        const { inner } = setup();
        const own = object(inner, "own");
        expect(specificationExprProblem(ref(own), inner)).toBe("reference to local entity 'own'");
    });

    test("variables of an ancestor scope are legal", () => {
        const { hostVar, inner, host } = setup();
        expect(specificationExprProblem(ref(hostVar), inner)).toBeUndefined();
        expect(specificationExprProblem(ref(hostVar), host)).toBe("reference to local entity 'hv'");
    });

    test("module, use- and host-associated entities are legal", () => {
        const { modVar, local, hostVar, inner, sibling } = setup();
        const used = declareSymbol(inner, "u", { kind: "use", symbol: local });
        const hosted = declareSymbol(sibling, "h", { kind: "hostAssoc", symbol: hostVar });
        expect(specificationExprProblem(ref(modVar), inner)).toBeUndefined();
        expect(specificationExprProblem(ref(used), inner)).toBeUndefined();
        expect(specificationExprProblem(ref(hosted), sibling)).toBeUndefined();
    });

    test("COMMON block members are legal", () => {
        const { sibling, inner } = setup();
        const c = object(sibling, "c", { common: "blk" });
        expect(specificationExprProblem(ref(c), inner)).toBeUndefined();
    });

    test("a coindexed reference is illegal", () => {
        const { modVar, inner } = setup();
        expect(specificationExprProblem(new CoarrayRef(modVar, [], [int(2)]), inner)).toBe(
            "coindexed reference",
        );
    });

    test("only the base of a component is checked", () => {
        const { n, local, type, inner } = setup();
        const field = object(type, "f");
        expect(specificationExprProblem(component(ref(n), field), inner)).toBeUndefined();
        expect(specificationExprProblem(component(ref(local), field), inner)).toBe(
            "reference to local entity 'local'",
        );
    });

    test("descriptor inquiries are legal", () => {
        const { local, inner } = setup();
        expect(specificationExprProblem(new DescriptorInquiry(ref(local), "extent"), inner)).toBeUndefined();
    });

    test("the first problem wins", () => {
        const { opt, out, inner } = setup();
        expect(specificationExprProblem(add(ref(out), ref(opt)), inner)).toBe(
            "reference to INTENT(OUT) dummy argument 'out'",
        );
    });

    test("array subscripts are checked", () => {
        const { n, local, host, inner } = setup();
        const arr = object(host, "arr", { rank: 1 });
        expect(specificationExprProblem(element(arr, at(ref(n))), inner)).toBeUndefined();
        expect(specificationExprProblem(element(arr, at(ref(local))), inner)).toBe(
            "reference to local entity 'local'",
        );
    });
});

describe("function references", () => {
    test("a pure function with legal arguments is legal", () => {
        const { pureFn, elementalFn, n, inner } = setup();
        expect(specificationExprProblem(call(pureFn, ref(n), int(3)), inner)).toBeUndefined();
        expect(specificationExprProblem(call(elementalFn, ref(n)), inner)).toBeUndefined();
    });

    test("a pure function passes on an argument's problem", () => {
        const { pureFn, n, opt, inner } = setup();
        expect(specificationExprProblem(call(pureFn, ref(n), ref(opt)), inner)).toBe(
            "reference to OPTIONAL dummy argument 'opt'",
        );
    });

    test("an impure function is illegal", () => {
        const { impureFn, n, inner } = setup();
        expect(specificationExprProblem(call(impureFn, ref(n)), inner)).toBe(
            "reference to impure function 'imp'",
        );
    });

    test("IMPURE ELEMENTAL is impure", () => {
        const { mod, inner } = setup();
        const f = procedure(mod, "ie", { attrs: [Attr.Elemental, Attr.Impure] });
        expect(specificationExprProblem(call(f), inner)).toBe("reference to impure function 'ie'");
    });

    test("present() is legal without looking at its argument", () => {
        const { opt, inner } = setup();
        expect(specificationExprProblem(call("present", ref(opt)), inner)).toBeUndefined();
    });

    test("a constant intrinsic call is legal without looking at its arguments", () => {
        const { k, inner } = setup();
        expect(specificationExprProblem(call("kind", ref(k)), inner)).toBeUndefined();
    });

    test("other intrinsic calls check their arguments", () => {
        const { n, local, inner } = setup();
        expect(specificationExprProblem(call("max", ref(n), int(1)), inner)).toBeUndefined();
        expect(specificationExprProblem(call("max", ref(n), ref(local)), inner)).toBe(
            "reference to local entity 'local'",
        );
    });

    test("omitted optional arguments are skipped", () => {
        const { n, inner } = setup();
        expect(specificationExprProblem(call("max", ref(n), undefined), inner)).toBeUndefined();
    });
});

describe("checkSpecificationExpr", () => {
    test("reports the problem as an error diagnostic", () => {
        const { local, inner } = setup();
        const { collector, messages } = sink();
        checkSpecificationExpr(ref(local), messages, inner);
        expect(messagesOf(collector)).toEqual([
            "Invalid specification expression: reference to local entity 'local'",
        ]);
        expect(collector.getDiagnostics()[0]?.level).toBe(Level.Error);
        expect(collector.getDiagnostics()[0]?.code).toBe("C1010");
    });

    test("says nothing for a valid expression", () => {
        const { n, inner } = setup();
        const { collector, messages } = sink();
        checkSpecificationExpr(ref(n), messages, inner);
        expect(collector.getDiagnostics()).toEqual([]);
    });

    test("an absent expression is valid", () => {
        const { inner } = setup();
        const { collector, messages } = sink();
        checkSpecificationExpr(undefined, messages, inner);
        expect(collector.hasErrors()).toBe(false);
    });
});
