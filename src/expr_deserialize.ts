import {
    FunctionResultAttr,
    MapIntrinsicTable,
    type ProcedureCharacteristics,
    makeFunctionResult,
} from "./characteristics";
import {
    err,
    makeSourceLocation,
    makeSourceSpan,
    ok,
    type Result,
    type SourceSpan,
} from "./diagnostics";
import {
    ArrayConstructor,
    ArrayRef,
    BinaryExpr,
    BinaryOp,
    BozLiteral,
    CoarrayRef,
    Component,
    ComplexPart,
    ConstantExpr,
    type ConstantValue,
    DescriptorInquiry,
    type DescriptorField,
    type Expression,
    FunctionRef,
    ImpliedDo,
    NullPointer,
    ParamValue,
    Parentheses,
    ProcedureDesignator,
    RelationalExpr,
    RelationalOp,
    StaticDataObject,
    StructureConstructor,
    Subscript,
    Substring,
    SymbolRef,
    Triplet,
    TypeCategory,
    TypeParamInquiry,
    UnaryExpr,
    UnaryOp,
} from "./expr";
import {
    Attr,
    declareSymbol,
    type Details,
    makeGlobalScope,
    Scope,
    ScopeKind,
    type ScopeKindValue,
    type ShapeKind,
    type Symbol,
} from "./symbols";

/**
 * Reads a JSON fixture describing a scope tree, its symbols and a list of
 * expressions to check. Scopes and symbols are referenced by id; every
 * reference must point at an entry that appears earlier in the document.
 */

export const DeserializeErrorKind = {
    InvalidJson: 0,
    MissingField: 1,
    InvalidValue: 2,
    UnknownReference: 3,
    DuplicateId: 4,
} as const satisfies Record<string, number>;

export type DeserializeErrorKindValue =
    (typeof DeserializeErrorKind)[keyof typeof DeserializeErrorKind];

export type DeserializeError = {
    kind: DeserializeErrorKindValue;
    message: string;
    /** JSON path of the offending value, e.g. `$.checks[2].expr.left`. */
    path: string;
};

export type FixtureCheck = {
    name: string;
    scope: Scope;
    expr: Expression;
    at?: SourceSpan;
};

export type Fixture = {
    global: Scope;
    scopes: Map<string, Scope>;
    symbols: Map<string, Symbol>;
    intrinsics: MapIntrinsicTable;
    checks: FixtureCheck[];
};

type Json = Record<string, unknown>;
type Read<T> = Result<T, DeserializeError>;

// ============================================================================
// Name tables
// ============================================================================

const SCOPE_KINDS: Record<string, ScopeKindValue> = {
    module: ScopeKind.Module,
    program: ScopeKind.MainProgram,
    subprogram: ScopeKind.Subprogram,
    block: ScopeKind.BlockConstruct,
    derivedType: ScopeKind.DerivedType,
    impliedDos: ScopeKind.ImpliedDos,
};

const ATTRS: Record<string, Attr> = {
    pointer: Attr.Pointer,
    target: Attr.Target,
    allocatable: Attr.Allocatable,
    contiguous: Attr.Contiguous,
    optional: Attr.Optional,
    intentIn: Attr.IntentIn,
    intentOut: Attr.IntentOut,
    intentInOut: Attr.IntentInOut,
    save: Attr.Save,
    parameter: Attr.Parameter,
    pure: Attr.Pure,
    elemental: Attr.Elemental,
    impure: Attr.Impure,
};

const RESULT_ATTRS: Record<string, FunctionResultAttr> = {
    allocatable: FunctionResultAttr.Allocatable,
    pointer: FunctionResultAttr.Pointer,
    contiguous: FunctionResultAttr.Contiguous,
};

const SHAPES: readonly ShapeKind[] = [
    "explicit",
    "assumedShape",
    "deferredShape",
    "assumedSize",
    "assumedRank",
];

const TYPES: Record<string, TypeCategory> = {
    integer: TypeCategory.Integer,
    real: TypeCategory.Real,
    complex: TypeCategory.Complex,
    character: TypeCategory.Character,
    logical: TypeCategory.Logical,
    derived: TypeCategory.Derived,
};

const UNARY_OPS: Record<string, UnaryOp> = {
    negate: UnaryOp.Negate,
    not: UnaryOp.Not,
    convert: UnaryOp.Convert,
};

const BINARY_OPS: Record<string, BinaryOp> = {
    add: BinaryOp.Add,
    subtract: BinaryOp.Subtract,
    multiply: BinaryOp.Multiply,
    divide: BinaryOp.Divide,
    power: BinaryOp.Power,
    concat: BinaryOp.Concat,
    and: BinaryOp.And,
    or: BinaryOp.Or,
    eqv: BinaryOp.Eqv,
    neqv: BinaryOp.Neqv,
};

const RELATIONAL_OPS: Record<string, RelationalOp> = {
    lt: RelationalOp.Lt,
    le: RelationalOp.Le,
    eq: RelationalOp.Eq,
    ne: RelationalOp.Ne,
    ge: RelationalOp.Ge,
    gt: RelationalOp.Gt,
};

const DESCRIPTOR_FIELDS: readonly DescriptorField[] = [
    "lowerBound",
    "extent",
    "stride",
    "rank",
    "len",
];

// ============================================================================
// Primitive readers
// ============================================================================

function isRecord(value: unknown): value is Json {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function missing(path: string, key: string): Read<never> {
    return err({
        kind: DeserializeErrorKind.MissingField,
        message: `missing field '${key}'`,
        path,
    });
}

function invalid(path: string, message: string): Read<never> {
    return err({ kind: DeserializeErrorKind.InvalidValue, message, path });
}

function readRecord(value: unknown, path: string): Read<Json> {
    return isRecord(value) ? ok(value) : invalid(path, "expected an object");
}

function readArray(obj: Json, key: string, path: string): Read<unknown[]> {
    const value = obj[key];
    if (value === undefined) {
        return ok([]);
    }
    return Array.isArray(value)
        ? ok(value)
        : invalid(`${path}.${key}`, "expected an array");
}

function readString(obj: Json, key: string, path: string): Read<string> {
    const value = obj[key];
    if (value === undefined) {
        return missing(path, key);
    }
    return typeof value === "string"
        ? ok(value)
        : invalid(`${path}.${key}`, "expected a string");
}

function readInteger(
    obj: Json,
    key: string,
    path: string,
    fallback: number,
): Read<number> {
    const value = obj[key];
    if (value === undefined) {
        return ok(fallback);
    }
    return typeof value === "number" && Number.isInteger(value) && value >= 0
        ? ok(value)
        : invalid(`${path}.${key}`, "expected a non-negative integer");
}

function readBoolean(obj: Json, key: string, path: string): Read<boolean> {
    const value = obj[key];
    if (value === undefined) {
        return ok(false);
    }
    return typeof value === "boolean"
        ? ok(value)
        : invalid(`${path}.${key}`, "expected a boolean");
}

function readEnum<T>(
    obj: Json,
    key: string,
    path: string,
    table: Record<string, T>,
): Read<T> {
    const name = readString(obj, key, path);
    if (!name.ok) {
        return name;
    }
    return Object.hasOwn(table, name.value)
        ? ok(table[name.value])
        : invalid(`${path}.${key}`, `unknown ${key} '${name.value}'`);
}

function readListOf<T>(
    items: readonly unknown[],
    path: string,
    readItem: (item: unknown, path: string) => Read<T>,
): Read<T[]> {
    const out: T[] = [];
    for (const [index, item] of items.entries()) {
        const result = readItem(item, `${path}[${index}]`);
        if (!result.ok) {
            return result;
        }
        out.push(result.value);
    }
    return ok(out);
}

function readConstantValue(value: unknown, path: string): Read<ConstantValue> {
    if (
        typeof value === "number" ||
        typeof value === "string" ||
        typeof value === "boolean"
    ) {
        return ok(value);
    }
    return invalid(path, "expected a number, string or boolean");
}

// ============================================================================
// Fixture Deserializer
// ============================================================================

class FixtureDeserializer {
    readonly global: Scope;
    readonly scopes: Map<string, Scope>;
    readonly symbols: Map<string, Symbol>;
    readonly file?: string;

    constructor(file?: string) {
        this.global = makeGlobalScope();
        this.scopes = new Map([["global", this.global]]);
        this.symbols = new Map();
        this.file = file;
    }

    deserialize(doc: unknown): Read<Fixture> {
        const root = readRecord(doc, "$");
        if (!root.ok) {
            return root;
        }
        const steps: [string, (item: unknown, path: string) => Read<unknown>][] = [
            ["scopes", (item, path) => this.readScope(item, path)],
            ["symbols", (item, path) => this.readSymbol(item, path)],
        ];
        for (const [key, readItem] of steps) {
            const items = readArray(root.value, key, "$");
            if (!items.ok) {
                return items;
            }
            const result = readListOf(items.value, `$.${key}`, readItem);
            if (!result.ok) {
                return result;
            }
        }
        const intrinsics = this.readIntrinsics(root.value.intrinsics, "$.intrinsics");
        if (!intrinsics.ok) {
            return intrinsics;
        }
        const checkItems = readArray(root.value, "checks", "$");
        if (!checkItems.ok) {
            return checkItems;
        }
        const checks = readListOf(checkItems.value, "$.checks", (item, path) =>
            this.readCheck(item, path),
        );
        if (!checks.ok) {
            return checks;
        }
        return ok({
            global: this.global,
            scopes: this.scopes,
            symbols: this.symbols,
            intrinsics: intrinsics.value,
            checks: checks.value,
        });
    }

    // ========================================================================
    // Scopes and symbols
    // ========================================================================

    scopeRef(id: string, path: string): Read<Scope> {
        const scope = this.scopes.get(id);
        return scope
            ? ok(scope)
            : err({
                  kind: DeserializeErrorKind.UnknownReference,
                  message: `unknown scope '${id}'`,
                  path,
              });
    }

    symbolRef(id: string, path: string): Read<Symbol> {
        const symbol = this.symbols.get(id);
        return symbol
            ? ok(symbol)
            : err({
                  kind: DeserializeErrorKind.UnknownReference,
                  message: `unknown symbol '${id}'`,
                  path,
              });
    }

    readScope(item: unknown, path: string): Read<Scope> {
        const obj = readRecord(item, path);
        if (!obj.ok) {
            return obj;
        }
        const id = readString(obj.value, "id", path);
        if (!id.ok) {
            return id;
        }
        if (this.scopes.has(id.value)) {
            return err({
                kind: DeserializeErrorKind.DuplicateId,
                message: `duplicate scope id '${id.value}'`,
                path: `${path}.id`,
            });
        }
        const kind = readEnum(obj.value, "kind", path, SCOPE_KINDS);
        if (!kind.ok) {
            return kind;
        }
        const parentId = obj.value.parent ?? "global";
        if (typeof parentId !== "string") {
            return invalid(`${path}.parent`, "expected a string");
        }
        const parent = this.scopeRef(parentId, `${path}.parent`);
        if (!parent.ok) {
            return parent;
        }
        const scope = parent.value.makeChild(kind.value, id.value);
        this.scopes.set(id.value, scope);
        return ok(scope);
    }

    readSymbol(item: unknown, path: string): Read<Symbol> {
        const obj = readRecord(item, path);
        if (!obj.ok) {
            return obj;
        }
        const name = readString(obj.value, "name", path);
        if (!name.ok) {
            return name;
        }
        const idValue = obj.value.id ?? name.value;
        if (typeof idValue !== "string") {
            return invalid(`${path}.id`, "expected a string");
        }
        if (this.symbols.has(idValue)) {
            return err({
                kind: DeserializeErrorKind.DuplicateId,
                message: `duplicate symbol id '${idValue}'`,
                path,
            });
        }
        const scopeId = readString(obj.value, "scope", path);
        if (!scopeId.ok) {
            return scopeId;
        }
        const scope = this.scopeRef(scopeId.value, `${path}.scope`);
        if (!scope.ok) {
            return scope;
        }
        const attrNames = readArray(obj.value, "attrs", path);
        if (!attrNames.ok) {
            return attrNames;
        }
        const attrs = readListOf(attrNames.value, `${path}.attrs`, (a, p) =>
            typeof a === "string" && Object.hasOwn(ATTRS, a)
                ? ok(ATTRS[a])
                : invalid(p, `unknown attribute '${String(a)}'`),
        );
        if (!attrs.ok) {
            return attrs;
        }
        const detailsPath = `${path}.details`;
        const detailsObj = readRecord(obj.value.details, detailsPath);
        if (!detailsObj.ok) {
            return detailsObj;
        }
        const details = this.readDetails(detailsObj.value, detailsPath);
        if (!details.ok) {
            return details;
        }
        const symbol = declareSymbol(scope.value, name.value, details.value, attrs.value);
        this.symbols.set(idValue, symbol);
        return ok(symbol);
    }

    readDetails(obj: Json, path: string): Read<Details> {
        const kind = readString(obj, "kind", path);
        if (!kind.ok) {
            return kind;
        }
        switch (kind.value) {
            case "object":
                return this.readObjectDetails(obj, path);
            case "procedure": {
                const isDummy = readBoolean(obj, "dummy", path);
                if (!isDummy.ok) {
                    return isDummy;
                }
                const characteristics = this.readCharacteristics(obj, path);
                if (!characteristics.ok) {
                    return characteristics;
                }
                const details: Details = {
                    kind: "procedure",
                    isDummy: isDummy.value,
                    characteristics: characteristics.value,
                };
                return ok(details);
            }
            case "use":
            case "hostAssoc": {
                const targetId = readString(obj, "symbol", path);
                if (!targetId.ok) {
                    return targetId;
                }
                const target = this.symbolRef(targetId.value, `${path}.symbol`);
                if (!target.ok) {
                    return target;
                }
                const details: Details =
                    kind.value === "use"
                        ? { kind: "use", symbol: target.value }
                        : { kind: "hostAssoc", symbol: target.value };
                return ok(details);
            }
            case "typeParam": {
                const attr = obj.attr;
                if (attr !== "kind" && attr !== "len") {
                    return invalid(`${path}.attr`, "expected 'kind' or 'len'");
                }
                const details: Details = { kind: "typeParam", attr };
                return ok(details);
            }
            case "derivedType": {
                const details: Details = { kind: "derivedType" };
                return ok(details);
            }
            default:
                return invalid(`${path}.kind`, `unknown symbol kind '${kind.value}'`);
        }
    }

    readObjectDetails(obj: Json, path: string): Read<Details> {
        const rank = readInteger(obj, "rank", path, 0);
        if (!rank.ok) {
            return rank;
        }
        const corank = readInteger(obj, "corank", path, 0);
        if (!corank.ok) {
            return corank;
        }
        const shapeName = obj.shape ?? "explicit";
        const shape = SHAPES.find((s) => s === shapeName);
        if (shape === undefined) {
            return invalid(`${path}.shape`, `unknown shape '${String(shapeName)}'`);
        }
        const isDummy = readBoolean(obj, "dummy", path);
        if (!isDummy.ok) {
            return isDummy;
        }
        const common = obj.common;
        if (common !== undefined && typeof common !== "string") {
            return invalid(`${path}.common`, "expected a string");
        }
        let init: Expression | undefined;
        if (obj.init !== undefined) {
            const expr = this.readExpr(obj.init, `${path}.init`);
            if (!expr.ok) {
                return expr;
            }
            init = expr.value;
        }
        const details: Details = {
            kind: "object",
            rank: rank.value,
            corank: corank.value,
            shape,
            isDummy: isDummy.value,
            commonBlock: common,
            init,
        };
        return ok(details);
    }

    readCharacteristics(obj: Json, path: string): Read<ProcedureCharacteristics> {
        if (obj.result === undefined) {
            return ok({});
        }
        const resultPath = `${path}.result`;
        const result = readRecord(obj.result, resultPath);
        if (!result.ok) {
            return result;
        }
        const attrNames = readArray(result.value, "attrs", resultPath);
        if (!attrNames.ok) {
            return attrNames;
        }
        const resultAttrs = readListOf(attrNames.value, `${resultPath}.attrs`, (a, p) =>
            typeof a === "string" && Object.hasOwn(RESULT_ATTRS, a)
                ? ok(RESULT_ATTRS[a])
                : invalid(p, `unknown result attribute '${String(a)}'`),
        );
        if (!resultAttrs.ok) {
            return resultAttrs;
        }
        const procPointer = readBoolean(result.value, "procedurePointer", resultPath);
        if (!procPointer.ok) {
            return procPointer;
        }
        return ok({
            functionResult: makeFunctionResult(resultAttrs.value, procPointer.value),
        });
    }

    readIntrinsics(value: unknown, path: string): Read<MapIntrinsicTable> {
        const table = new MapIntrinsicTable();
        if (value === undefined) {
            return ok(table);
        }
        const obj = readRecord(value, path);
        if (!obj.ok) {
            return obj;
        }
        for (const [name, entry] of Object.entries(obj.value)) {
            const entryPath = `${path}.${name}`;
            const entryObj = readRecord(entry, entryPath);
            if (!entryObj.ok) {
                return entryObj;
            }
            const characteristics = this.readCharacteristics(entryObj.value, entryPath);
            if (!characteristics.ok) {
                return characteristics;
            }
            table.define(name, characteristics.value);
        }
        return ok(table);
    }

    readCheck(item: unknown, path: string): Read<FixtureCheck> {
        const obj = readRecord(item, path);
        if (!obj.ok) {
            return obj;
        }
        const name = readString(obj.value, "name", path);
        if (!name.ok) {
            return name;
        }
        const scopeId = obj.value.scope ?? "global";
        if (typeof scopeId !== "string") {
            return invalid(`${path}.scope`, "expected a string");
        }
        const scope = this.scopeRef(scopeId, `${path}.scope`);
        if (!scope.ok) {
            return scope;
        }
        const expr = this.readExpr(obj.value.expr, `${path}.expr`);
        if (!expr.ok) {
            return expr;
        }
        const check: FixtureCheck = { name: name.value, scope: scope.value, expr: expr.value };
        if (obj.value.at !== undefined) {
            const at = this.readLocation(obj.value.at, `${path}.at`);
            if (!at.ok) {
                return at;
            }
            check.at = at.value;
        }
        return ok(check);
    }

    readLocation(value: unknown, path: string): Read<SourceSpan> {
        const obj = readRecord(value, path);
        if (!obj.ok) {
            return obj;
        }
        const line = readInteger(obj.value, "line", path, 1);
        if (!line.ok) {
            return line;
        }
        const column = readInteger(obj.value, "column", path, 1);
        if (!column.ok) {
            return column;
        }
        const start = makeSourceLocation(line.value, column.value, this.file);
        return ok(makeSourceSpan(start, start));
    }

    // ========================================================================
    // Expressions
    // ========================================================================

    readOptionalExpr(obj: Json, key: string, path: string): Read<Expression | undefined> {
        const value = obj[key];
        if (value === undefined || value === null) {
            return ok(undefined);
        }
        return this.readExpr(value, `${path}.${key}`);
    }

    readExprList(obj: Json, key: string, path: string): Read<Expression[]> {
        const items = readArray(obj, key, path);
        if (!items.ok) {
            return items;
        }
        return readListOf(items.value, `${path}.${key}`, (item, p) => this.readExpr(item, p));
    }

    readSubscripts(obj: Json, path: string): Read<Subscript[]> {
        const items = readArray(obj, "subscripts", path);
        if (!items.ok) {
            return items;
        }
        return readListOf(items.value, `${path}.subscripts`, (item, p) =>
            this.readSubscript(item, p),
        );
    }

    readSubscript(item: unknown, path: string): Read<Subscript> {
        if (isRecord(item) && item.triplet !== undefined) {
            const parts = item.triplet;
            if (!Array.isArray(parts) || parts.length > 3) {
                return invalid(`${path}.triplet`, "expected up to three bounds");
            }
            const bounds = readListOf<Expression | undefined>(parts, `${path}.triplet`, (part, p) =>
                part === null ? ok(undefined) : this.readExpr(part, p),
            );
            if (!bounds.ok) {
                return bounds;
            }
            const [lower, upper, stride] = bounds.value;
            return ok(new Subscript(new Triplet(lower, upper, stride)));
        }
        const expr = this.readExpr(item, path);
        return expr.ok ? ok(new Subscript(expr.value)) : expr;
    }

    readProcedure(obj: Json, path: string): Read<ProcedureDesignator> {
        if (typeof obj.intrinsic === "string") {
            return ok(ProcedureDesignator.ofIntrinsic(obj.intrinsic));
        }
        const id = readString(obj, "symbol", path);
        if (!id.ok) {
            return id;
        }
        const symbol = this.symbolRef(id.value, `${path}.symbol`);
        return symbol.ok ? ok(ProcedureDesignator.ofSymbol(symbol.value)) : symbol;
    }

    readNamedEntity(value: unknown, path: string): Read<SymbolRef | Component> {
        const expr = this.readExpr(value, path);
        if (!expr.ok) {
            return expr;
        }
        return expr.value instanceof SymbolRef || expr.value instanceof Component
            ? ok(expr.value)
            : invalid(path, "expected a symbol or component reference");
    }

    readArrayValues(obj: Json, path: string): Read<(Expression | ImpliedDo)[]> {
        const items = readArray(obj, "values", path);
        if (!items.ok) {
            return items;
        }
        return readListOf<Expression | ImpliedDo>(items.value, `${path}.values`, (item, p) =>
            isRecord(item) && item.impliedDo !== undefined
                ? this.readImpliedDo(item.impliedDo, `${p}.impliedDo`)
                : this.readExpr(item, p),
        );
    }

    readImpliedDo(value: unknown, path: string): Read<ImpliedDo> {
        const obj = readRecord(value, path);
        if (!obj.ok) {
            return obj;
        }
        const indexId = readString(obj.value, "index", path);
        if (!indexId.ok) {
            return indexId;
        }
        const index = this.symbolRef(indexId.value, `${path}.index`);
        if (!index.ok) {
            return index;
        }
        const lower = this.readExpr(obj.value.lower, `${path}.lower`);
        if (!lower.ok) {
            return lower;
        }
        const upper = this.readExpr(obj.value.upper, `${path}.upper`);
        if (!upper.ok) {
            return upper;
        }
        const stride = this.readOptionalExpr(obj.value, "stride", path);
        if (!stride.ok) {
            return stride;
        }
        const values = this.readArrayValues(obj.value, path);
        if (!values.ok) {
            return values;
        }
        return ok(new ImpliedDo(index.value, lower.value, upper.value, values.value, stride.value));
    }

    readParamValue(value: unknown, path: string): Read<ParamValue> {
        if (value === "assumed") {
            return ok(ParamValue.assumed());
        }
        if (value === "deferred") {
            return ok(ParamValue.deferred());
        }
        const expr = this.readExpr(value, path);
        return expr.ok ? ok(ParamValue.explicit(expr.value)) : expr;
    }

    readStructureConstructor(obj: Json, path: string): Read<StructureConstructor> {
        const name = readString(obj, "type", path);
        if (!name.ok) {
            return name;
        }
        const parameters = new Map<string, ParamValue>();
        const params = obj.parameters ?? {};
        if (!isRecord(params)) {
            return invalid(`${path}.parameters`, "expected an object");
        }
        for (const [key, value] of Object.entries(params)) {
            const param = this.readParamValue(value, `${path}.parameters.${key}`);
            if (!param.ok) {
                return param;
            }
            parameters.set(key, param.value);
        }
        const values = new Map<Symbol, Expression>();
        const components = obj.components ?? {};
        if (!isRecord(components)) {
            return invalid(`${path}.components`, "expected an object");
        }
        for (const [id, value] of Object.entries(components)) {
            const componentPath = `${path}.components.${id}`;
            const component = this.symbolRef(id, componentPath);
            if (!component.ok) {
                return component;
            }
            const expr = this.readExpr(value, componentPath);
            if (!expr.ok) {
                return expr;
            }
            values.set(component.value, expr.value);
        }
        return ok(new StructureConstructor({ name: name.value, parameters }, values));
    }

    readConstant(obj: Json, path: string): Read<ConstantExpr> {
        const type = readEnum(obj, "type", path, TYPES);
        if (!type.ok) {
            return type;
        }
        if (obj.values === undefined) {
            const value = readConstantValue(obj.value, `${path}.value`);
            return value.ok ? ok(new ConstantExpr(type.value, [value.value])) : value;
        }
        const items = readArray(obj, "values", path);
        if (!items.ok) {
            return items;
        }
        const values = readListOf(items.value, `${path}.values`, readConstantValue);
        if (!values.ok) {
            return values;
        }
        const shapeItems = readArray(obj, "shape", path);
        if (!shapeItems.ok) {
            return shapeItems;
        }
        const shape = readListOf(shapeItems.value, `${path}.shape`, (extent, p) =>
            typeof extent === "number" && Number.isInteger(extent) && extent >= 0
                ? ok(extent)
                : invalid(p, "expected a non-negative integer"),
        );
        if (!shape.ok) {
            return shape;
        }
        const dims = shape.value.length > 0 ? shape.value : [values.value.length];
        const size = dims.reduce((n, extent) => n * extent, 1);
        if (size !== values.value.length) {
            return invalid(`${path}.values`, `expected ${size} values for shape [${dims.join(", ")}]`);
        }
        return ok(new ConstantExpr(type.value, values.value, dims));
    }

    readExpr(value: unknown, path: string): Read<Expression> {
        const obj = readRecord(value, path);
        if (!obj.ok) {
            return obj;
        }
        const node = readString(obj.value, "node", path);
        if (!node.ok) {
            return node;
        }
        const o = obj.value;
        switch (node.value) {
            case "symbol": {
                const id = readString(o, "symbol", path);
                if (!id.ok) {
                    return id;
                }
                const symbol = this.symbolRef(id.value, `${path}.symbol`);
                return symbol.ok ? ok(new SymbolRef(symbol.value)) : symbol;
            }
            case "constant":
                return this.readConstant(o, path);
            case "boz": {
                const digits = readString(o, "value", path);
                if (!digits.ok) {
                    return digits;
                }
                return /^[0-9a-f]+$/i.test(digits.value)
                    ? ok(new BozLiteral(BigInt(`0x${digits.value}`)))
                    : invalid(`${path}.value`, "expected hexadecimal digits");
            }
            case "null":
                return ok(new NullPointer());
            case "staticData": {
                const name = readString(o, "name", path);
                if (!name.ok) {
                    return name;
                }
                const data = readString(o, "data", path);
                return data.ok ? ok(new StaticDataObject(name.value, data.value)) : data;
            }
            case "procedure":
                return this.readProcedure(o, path);
            case "call": {
                const procPath = `${path}.proc`;
                const procObj = readRecord(o.proc, procPath);
                if (!procObj.ok) {
                    return procObj;
                }
                const proc = this.readProcedure(procObj.value, procPath);
                if (!proc.ok) {
                    return proc;
                }
                const argItems = readArray(o, "args", path);
                if (!argItems.ok) {
                    return argItems;
                }
                const args = readListOf<Expression | undefined>(argItems.value, `${path}.args`, (item, p) =>
                    item === null ? ok(undefined) : this.readExpr(item, p),
                );
                if (!args.ok) {
                    return args;
                }
                const rank = readInteger(o, "rank", path, 0);
                return rank.ok ? ok(new FunctionRef(proc.value, args.value, rank.value)) : rank;
            }
            case "unary": {
                const op = readEnum(o, "op", path, UNARY_OPS);
                if (!op.ok) {
                    return op;
                }
                const type = readEnum(o, "type", path, TYPES);
                if (!type.ok) {
                    return type;
                }
                const operand = this.readExpr(o.operand, `${path}.operand`);
                return operand.ok ? ok(new UnaryExpr(op.value, type.value, operand.value)) : operand;
            }
            case "binary": {
                const op = readEnum(o, "op", path, BINARY_OPS);
                if (!op.ok) {
                    return op;
                }
                const type = readEnum(o, "type", path, TYPES);
                if (!type.ok) {
                    return type;
                }
                const left = this.readExpr(o.left, `${path}.left`);
                if (!left.ok) {
                    return left;
                }
                const right = this.readExpr(o.right, `${path}.right`);
                if (!right.ok) {
                    return right;
                }
                return ok(new BinaryExpr(op.value, type.value, left.value, right.value));
            }
            case "parens": {
                const operand = this.readExpr(o.operand, `${path}.operand`);
                return operand.ok ? ok(new Parentheses(operand.value)) : operand;
            }
            case "relational": {
                const op = readEnum(o, "op", path, RELATIONAL_OPS);
                if (!op.ok) {
                    return op;
                }
                const left = this.readExpr(o.left, `${path}.left`);
                if (!left.ok) {
                    return left;
                }
                const right = this.readExpr(o.right, `${path}.right`);
                if (!right.ok) {
                    return right;
                }
                return ok(new RelationalExpr(op.value, left.value, right.value));
            }
            case "arrayRef": {
                const base = this.readNamedEntity(o.base, `${path}.base`);
                if (!base.ok) {
                    return base;
                }
                const subscripts = this.readSubscripts(o, path);
                return subscripts.ok ? ok(new ArrayRef(base.value, subscripts.value)) : subscripts;
            }
            case "coarrayRef": {
                const id = readString(o, "symbol", path);
                if (!id.ok) {
                    return id;
                }
                const base = this.symbolRef(id.value, `${path}.symbol`);
                if (!base.ok) {
                    return base;
                }
                const subscripts = this.readSubscripts(o, path);
                if (!subscripts.ok) {
                    return subscripts;
                }
                const cosubscripts = this.readExprList(o, "cosubscripts", path);
                if (!cosubscripts.ok) {
                    return cosubscripts;
                }
                const stat = this.readOptionalExpr(o, "stat", path);
                if (!stat.ok) {
                    return stat;
                }
                const team = this.readOptionalExpr(o, "team", path);
                if (!team.ok) {
                    return team;
                }
                return ok(
                    new CoarrayRef(base.value, subscripts.value, cosubscripts.value, stat.value, team.value),
                );
            }
            case "component": {
                const base = this.readExpr(o.base, `${path}.base`);
                if (!base.ok) {
                    return base;
                }
                const id = readString(o, "component", path);
                if (!id.ok) {
                    return id;
                }
                const component = this.symbolRef(id.value, `${path}.component`);
                return component.ok ? ok(new Component(base.value, component.value)) : component;
            }
            case "substring": {
                const parent = this.readExpr(o.parent, `${path}.parent`);
                if (!parent.ok) {
                    return parent;
                }
                const lower = this.readOptionalExpr(o, "lower", path);
                if (!lower.ok) {
                    return lower;
                }
                const upper = this.readOptionalExpr(o, "upper", path);
                if (!upper.ok) {
                    return upper;
                }
                return ok(new Substring(parent.value, lower.value, upper.value));
            }
            case "complexPart": {
                const complex = this.readExpr(o.complex, `${path}.complex`);
                if (!complex.ok) {
                    return complex;
                }
                const part = o.part;
                return part === "re" || part === "im"
                    ? ok(new ComplexPart(complex.value, part))
                    : invalid(`${path}.part`, "expected 're' or 'im'");
            }
            case "arrayConstructor": {
                const type = readEnum(o, "type", path, TYPES);
                if (!type.ok) {
                    return type;
                }
                const values = this.readArrayValues(o, path);
                return values.ok ? ok(new ArrayConstructor(type.value, values.value)) : values;
            }
            case "structureConstructor":
                return this.readStructureConstructor(o, path);
            case "typeParamInquiry": {
                const id = readString(o, "parameter", path);
                if (!id.ok) {
                    return id;
                }
                const parameter = this.symbolRef(id.value, `${path}.parameter`);
                if (!parameter.ok) {
                    return parameter;
                }
                if (o.base === undefined) {
                    return ok(new TypeParamInquiry(parameter.value));
                }
                const base = this.readNamedEntity(o.base, `${path}.base`);
                return base.ok ? ok(new TypeParamInquiry(parameter.value, base.value)) : base;
            }
            case "descriptorInquiry": {
                const base = this.readNamedEntity(o.base, `${path}.base`);
                if (!base.ok) {
                    return base;
                }
                const field = DESCRIPTOR_FIELDS.find((f) => f === o.field);
                if (field === undefined) {
                    return invalid(`${path}.field`, `unknown descriptor field '${String(o.field)}'`);
                }
                const dimension = readInteger(o, "dimension", path, 0);
                return dimension.ok
                    ? ok(new DescriptorInquiry(base.value, field, dimension.value))
                    : dimension;
            }
            default:
                return invalid(`${path}.node`, `unknown node kind '${node.value}'`);
        }
    }
}

/**
 * Parse and build a fixture from JSON text.
 */
export function deserializeFixture(text: string, file?: string): Read<Fixture> {
    let doc: unknown;
    try {
        doc = JSON.parse(text);
    } catch (e) {
        return err({
            kind: DeserializeErrorKind.InvalidJson,
            message: e instanceof Error ? e.message : String(e),
            path: "$",
        });
    }
    return new FixtureDeserializer(file).deserialize(doc);
}
