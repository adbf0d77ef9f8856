import type { Expression } from "./expr";
import type { ProcedureCharacteristics } from "./characteristics";

// ============================================================================
// Attributes
// ============================================================================

export enum Attr {
    Pointer = 0,
    Target = 1,
    Allocatable = 2,
    Contiguous = 3,
    Optional = 4,
    IntentIn = 5,
    IntentOut = 6,
    IntentInOut = 7,
    Save = 8,
    Parameter = 9,
    Pure = 10,
    Elemental = 11,
    Impure = 12,
}

// ============================================================================
// Scopes
// ============================================================================

export const ScopeKind = {
    Global: 0,
    Module: 1,
    MainProgram: 2,
    Subprogram: 3,
    BlockConstruct: 4,
    DerivedType: 5,
    ImpliedDos: 6,
} as const satisfies Record<string, number>;

export type ScopeKindValue = (typeof ScopeKind)[keyof typeof ScopeKind];

/**
 * A node of the scope tree. Only the global scope has no parent.
 */
export class Scope {
    readonly kind: ScopeKindValue;
    readonly name: string;
    readonly parent: Scope | null;
    readonly symbols: Map<string, Symbol>;

    constructor(kind: ScopeKindValue, name: string, parent: Scope | null) {
        this.kind = kind;
        this.name = name;
        this.parent = parent;
        this.symbols = new Map();
    }

    isGlobal(): boolean {
        return this.parent === null;
    }

    /**
     * True when `other` is a proper ancestor of this scope.
     */
    hasAncestor(other: Scope): boolean {
        for (let s = this.parent; s !== null; s = s.parent) {
            if (s === other) {
                return true;
            }
        }
        return false;
    }

    makeChild(kind: ScopeKindValue, name: string): Scope {
        return new Scope(kind, name, this);
    }
}

export function makeGlobalScope(): Scope {
    return new Scope(ScopeKind.Global, "", null);
}

// ============================================================================
// Symbol details
// ============================================================================

export type ShapeKind =
    | "explicit"
    | "assumedShape"
    | "deferredShape"
    | "assumedSize"
    | "assumedRank";

export type ObjectEntityDetails = {
    kind: "object";
    rank: number;
    corank: number;
    shape: ShapeKind;
    isDummy: boolean;
    commonBlock?: string;
    init?: Expression;
};

export type ProcEntityDetails = {
    kind: "procedure";
    isDummy: boolean;
    characteristics?: ProcedureCharacteristics;
};

export type UseDetails = { kind: "use"; symbol: Symbol };
export type HostAssocDetails = { kind: "hostAssoc"; symbol: Symbol };

export type TypeParamDetails = {
    kind: "typeParam";
    attr: "kind" | "len";
};

export type DerivedTypeDetails = { kind: "derivedType" };

export type Details =
    | ObjectEntityDetails
    | ProcEntityDetails
    | UseDetails
    | HostAssocDetails
    | TypeParamDetails
    | DerivedTypeDetails;

/**
 * A named entity owned by a scope. Use- and host-associated symbols are
 * aliases; `ultimate` follows the chain to the original declaration.
 */
export class Symbol {
    readonly name: string;
    readonly owner: Scope;
    readonly details: Details;
    readonly attrs: ReadonlySet<Attr>;

    constructor(
        name: string,
        owner: Scope,
        details: Details,
        attrs: Iterable<Attr> = [],
    ) {
        this.name = name;
        this.owner = owner;
        this.details = details;
        this.attrs = new Set(attrs);
    }

    get ultimate(): Symbol {
        const details = this.details;
        if (details.kind === "use" || details.kind === "hostAssoc") {
            return details.symbol.ultimate;
        }
        return this;
    }

    get rank(): number {
        const details = this.ultimate.details;
        return details.kind === "object" ? details.rank : 0;
    }

    get corank(): number {
        const details = this.ultimate.details;
        return details.kind === "object" ? details.corank : 0;
    }

    has(attr: Attr): boolean {
        return this.attrs.has(attr);
    }

    isDummy(): boolean {
        return (
            (this.details.kind === "object" ||
                this.details.kind === "procedure") &&
            this.details.isDummy
        );
    }

    objectDetails(): ObjectEntityDetails | undefined {
        return this.details.kind === "object" ? this.details : undefined;
    }
}

/**
 * Declare a symbol and register it in its owning scope.
 */
export function declareSymbol(
    scope: Scope,
    name: string,
    details: Details,
    attrs: Iterable<Attr> = [],
): Symbol {
    const symbol = new Symbol(name, scope, details, attrs);
    scope.symbols.set(name, symbol);
    return symbol;
}

// ============================================================================
// Symbol predicates
// ============================================================================

export function isNamedConstant(symbol: Symbol): boolean {
    const ultimate = symbol.ultimate;
    return ultimate.details.kind === "object" && ultimate.has(Attr.Parameter);
}

export function isImpliedDoIndex(symbol: Symbol): boolean {
    return symbol.owner.kind === ScopeKind.ImpliedDos;
}

export function isKindTypeParameter(symbol: Symbol): boolean {
    const details = symbol.ultimate.details;
    return details.kind === "typeParam" && details.attr === "kind";
}

export function isPointer(symbol: Symbol): boolean {
    return symbol.ultimate.has(Attr.Pointer);
}

export function isAllocatable(symbol: Symbol): boolean {
    return symbol.ultimate.has(Attr.Allocatable);
}

/**
 * Explicit SAVE, or implied by the declaration: named constants, module and
 * main-program variables, and initialized variables all persist.
 */
export function isSaved(symbol: Symbol): boolean {
    const ultimate = symbol.ultimate;
    if (ultimate.has(Attr.Save) || ultimate.has(Attr.Parameter)) {
        return true;
    }
    const details = ultimate.objectDetails();
    if (!details || details.isDummy) {
        return false;
    }
    return (
        details.init !== undefined ||
        ultimate.owner.kind === ScopeKind.Module ||
        ultimate.owner.kind === ScopeKind.MainProgram
    );
}

export function isPureProcedure(symbol: Symbol): boolean {
    const ultimate = symbol.ultimate;
    if (ultimate.details.kind !== "procedure" || ultimate.has(Attr.Impure)) {
        return false;
    }
    return ultimate.has(Attr.Pure) || ultimate.has(Attr.Elemental);
}
