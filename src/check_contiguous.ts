import {
    characterizeProcedure,
    type IntrinsicProcTable,
    isContiguousPointerResult,
} from "./characteristics";
import {
    type ArrayRef,
    type CoarrayRef,
    type ComplexPart,
    type Component,
    type Expression,
    type FunctionRef,
    isVariable,
    type Subscript,
    type Substring,
    type Triplet,
} from "./expr";
import { getScalarIntegerConstant } from "./fold";
import { Attr, isPointer, type Symbol } from "./symbols";
import { AnyTraverse } from "./traverse";

/**
 * Simple contiguity of a variable. `undefined` means the traversal found
 * no rule that applies, which callers treat as not contiguous.
 */
class IsSimplyContiguousHelper extends AnyTraverse<boolean> {
    readonly #table: IntrinsicProcTable;

    constructor(table: IntrinsicProcTable) {
        super();
        this.#table = table;
    }

    visitSymbol(symbol: Symbol): boolean {
        const ultimate = symbol.ultimate;
        if (ultimate.has(Attr.Contiguous) || ultimate.rank === 0) {
            return true;
        }
        if (isPointer(ultimate)) {
            return false;
        }
        const details = ultimate.objectDetails();
        if (details) {
            // ALLOCATABLEs are deferred shape, and always allocated whole.
            return details.shape !== "assumedShape" && details.shape !== "assumedRank";
        }
        return false;
    }

    visitArrayRef(node: ArrayRef): boolean {
        if (!this.visitSymbol(node.lastSymbol)) {
            return false;
        }
        const rank = checkSubscripts(node.subscripts);
        if (rank === undefined) {
            return false;
        }
        // a(:)%b(1,1) is not contiguous; a(1)%b(:,:) is
        return rank > 0 || node.rank === 0;
    }

    visitCoarrayRef(node: CoarrayRef): boolean {
        return checkSubscripts(node.subscripts) !== undefined;
    }

    visitComponent(node: Component): boolean {
        return node.base.rank === 0 && this.visitSymbol(node.component);
    }

    visitComplexPart(_node: ComplexPart): boolean {
        return false;
    }

    visitSubstring(_node: Substring): boolean {
        return false;
    }

    visitFunctionRef(node: FunctionRef): boolean {
        const result = characterizeProcedure(node.proc, this.#table)?.functionResult;
        return result !== undefined && isContiguousPointerResult(result);
    }
}

export function isStrideOne(triplet: Triplet): boolean {
    return (
        triplet.stride === undefined ||
        getScalarIntegerConstant(triplet.stride) === 1n
    );
}

/**
 * The rank of an array section whose subscripts allow it to be simply
 * contiguous, or `undefined` when they do not.
 *
 * Scanning from the last subscript to the first: every triplet needs unit
 * stride; only the last triplet may have bounds, the ones before it must be
 * a bare `:`; and once a triplet has been seen, no element subscript may
 * precede it. Vector subscripts never qualify. So `a(:, :, 1)` and
 * `a(:, 2:5)` pass while `a(1, :)` and `a(2:5, :)` do not.
 */
export function checkSubscripts(
    subscripts: readonly Subscript[],
): number | undefined {
    let anyTriplet = false;
    let rank = 0;
    for (let j = subscripts.length - 1; j >= 0; j--) {
        const subscript = subscripts[j];
        const triplet = subscript.triplet;
        if (triplet) {
            if (!isStrideOne(triplet)) {
                return undefined;
            }
            if (anyTriplet) {
                if (triplet.lower !== undefined || triplet.upper !== undefined) {
                    return undefined;
                }
            } else {
                anyTriplet = true;
            }
            rank++;
        } else if (anyTriplet || subscript.rank > 0) {
            return undefined;
        }
    }
    return rank;
}

/**
 * Tri-state simple contiguity of a variable, `undefined` when unknown.
 * Non-variables are always contiguous.
 */
export function isSimplyContiguousTristate(
    expr: Expression,
    table: IntrinsicProcTable,
): boolean | undefined {
    if (!isVariable(expr)) {
        return true;
    }
    return new IsSimplyContiguousHelper(table).visit(expr);
}

export function isSimplyContiguous(
    expr: Expression,
    table: IntrinsicProcTable,
): boolean {
    return isSimplyContiguousTristate(expr, table) === true;
}
