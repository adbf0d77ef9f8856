import type { ProcedureDesignator } from "./expr";

export enum FunctionResultAttr {
    Allocatable = 0,
    Pointer = 1,
    Contiguous = 2,
}

export type FunctionResult = {
    attrs: ReadonlySet<FunctionResultAttr>;
    isProcedurePointer: boolean;
};

export type ProcedureCharacteristics = {
    functionResult?: FunctionResult;
};

/**
 * Lookup of intrinsic procedures by their specific name.
 */
export interface IntrinsicProcTable {
    characterize(name: string): ProcedureCharacteristics | undefined;
}

export class MapIntrinsicTable implements IntrinsicProcTable {
    readonly #entries: Map<string, ProcedureCharacteristics>;

    constructor(entries: Iterable<[string, ProcedureCharacteristics]> = []) {
        this.#entries = new Map(entries);
    }

    characterize(name: string): ProcedureCharacteristics | undefined {
        return this.#entries.get(name);
    }

    define(name: string, characteristics: ProcedureCharacteristics): void {
        this.#entries.set(name, characteristics);
    }

    get size(): number {
        return this.#entries.size;
    }
}

export function makeFunctionResult(
    attrs: Iterable<FunctionResultAttr> = [],
    isProcedurePointer = false,
): FunctionResult {
    return { attrs: new Set(attrs), isProcedurePointer };
}

/**
 * Characteristics of the procedure a designator names, when known.
 * User procedures carry theirs on the symbol; intrinsics are looked up.
 */
export function characterizeProcedure(
    proc: ProcedureDesignator,
    table: IntrinsicProcTable,
): ProcedureCharacteristics | undefined {
    if (proc.symbol) {
        const details = proc.symbol.ultimate.details;
        return details.kind === "procedure" ? details.characteristics : undefined;
    }
    if (proc.intrinsic) {
        return table.characterize(proc.intrinsic.name);
    }
    return undefined;
}

export function isContiguousPointerResult(result: FunctionResult): boolean {
    return (
        !result.isProcedurePointer &&
        result.attrs.has(FunctionResultAttr.Pointer) &&
        result.attrs.has(FunctionResultAttr.Contiguous)
    );
}
