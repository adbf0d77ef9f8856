import {
    type ArrayConstructor,
    type ArrayRef,
    type BinaryExpr,
    BinaryOp,
    type BozLiteral,
    type CoarrayRef,
    type ComplexPart,
    type Component,
    type ConstantExpr,
    type ConstantValue,
    type DescriptorInquiry,
    type ExprVisitor,
    type FunctionRef,
    type ImpliedDo,
    type Node,
    type NullPointer,
    type ParamValue,
    type Parentheses,
    type ProcedureDesignator,
    type RelationalExpr,
    RelationalOp,
    type StaticDataObject,
    type StructureConstructor,
    type Subscript,
    type Substring,
    type SymbolRef,
    type Triplet,
    type TypeParamInquiry,
    TypeCategory,
    type UnaryExpr,
    UnaryOp,
} from "./expr";

// ============================================================================
// Helpers
// ============================================================================

const BINARY_OPS: Record<BinaryOp, string> = {
    [BinaryOp.Add]: "+",
    [BinaryOp.Subtract]: "-",
    [BinaryOp.Multiply]: "*",
    [BinaryOp.Divide]: "/",
    [BinaryOp.Power]: "**",
    [BinaryOp.Concat]: "//",
    [BinaryOp.And]: ".and.",
    [BinaryOp.Or]: ".or.",
    [BinaryOp.Eqv]: ".eqv.",
    [BinaryOp.Neqv]: ".neqv.",
};

const RELATIONAL_OPS: Record<RelationalOp, string> = {
    [RelationalOp.Lt]: "<",
    [RelationalOp.Le]: "<=",
    [RelationalOp.Eq]: "==",
    [RelationalOp.Ne]: "/=",
    [RelationalOp.Ge]: ">=",
    [RelationalOp.Gt]: ">",
};

const DESCRIPTOR_INTRINSICS = {
    lowerBound: "lbound",
    extent: "size",
    stride: "stride",
    rank: "rank",
    len: "len",
} as const;

function formatValue(category: TypeCategory, value: ConstantValue): string {
    if (category === TypeCategory.Character && typeof value === "string") {
        return `'${value.replaceAll("'", "''")}'`;
    }
    if (category === TypeCategory.Logical) {
        return value ? ".true." : ".false.";
    }
    return String(value);
}

function joinList(items: readonly string[]): string {
    return items.join(", ");
}

/**
 * True for the nodes that need parentheses when printed as an operand:
 * binary, relational and prefix operations, and negative literals.
 */
const OPERATION_PROBE: ExprVisitor<boolean> = {
    visitSymbolRef: () => false,
    visitConstant: (n) => n.shape.length === 0 && isNegative(n.values[0]),
    visitBozLiteral: () => false,
    visitNullPointer: () => false,
    visitStaticDataObject: () => false,
    visitProcedureDesignator: () => false,
    visitFunctionRef: () => false,
    visitUnary: (n) => n.op !== UnaryOp.Convert,
    visitBinary: () => true,
    visitParentheses: () => false,
    visitRelational: () => true,
    visitArrayRef: () => false,
    visitCoarrayRef: () => false,
    visitComponent: () => false,
    visitSubstring: () => false,
    visitComplexPart: () => false,
    visitArrayConstructor: () => false,
    visitImpliedDo: () => false,
    visitStructureConstructor: () => false,
    visitTypeParamInquiry: () => false,
    visitDescriptorInquiry: () => false,
    visitSubscript: () => false,
    visitTriplet: () => false,
    visitParamValue: () => false,
};

function isOperation(node: Node): boolean {
    return node.accept(OPERATION_PROBE);
}

function isNegative(value: ConstantValue | undefined): boolean {
    return (typeof value === "number" || typeof value === "bigint") && value < 0;
}

// ============================================================================
// Printer
// ============================================================================

/**
 * Prints expressions in source form. Operator precedence is not
 * reconstructed: operands that are themselves operations are
 * parenthesized unless the tree already holds a Parentheses node.
 */
class ExprPrinter implements ExprVisitor<string> {
    print(node: Node | undefined): string {
        return node === undefined ? "" : node.accept(this);
    }

    operand(node: Node): string {
        const text = this.print(node);
        return isOperation(node) ? `(${text})` : text;
    }

    visitSymbolRef(node: SymbolRef): string {
        return node.symbol.name;
    }

    visitConstant(node: ConstantExpr): string {
        const items = node.values.map((v) => formatValue(node.category, v));
        if (node.shape.length === 0) {
            return items[0] ?? "";
        }
        const array = `[${joinList(items)}]`;
        return node.shape.length === 1
            ? array
            : `reshape(${array}, [${joinList(node.shape.map(String))}])`;
    }

    visitBozLiteral(node: BozLiteral): string {
        return `z'${node.value.toString(16)}'`;
    }

    visitNullPointer(_node: NullPointer): string {
        return "null()";
    }

    visitStaticDataObject(node: StaticDataObject): string {
        return `'${node.data.replaceAll("'", "''")}'`;
    }

    visitProcedureDesignator(node: ProcedureDesignator): string {
        return node.name;
    }

    visitFunctionRef(node: FunctionRef): string {
        const args = node.args.map((a) => this.print(a));
        return `${node.proc.name}(${joinList(args)})`;
    }

    visitUnary(node: UnaryExpr): string {
        const operand = this.operand(node.operand);
        switch (node.op) {
            case UnaryOp.Negate:
                return `-${operand}`;
            case UnaryOp.Not:
                return `.not. ${operand}`;
            case UnaryOp.Convert:
                return `${TypeCategory[node.category].toLowerCase()}(${this.print(node.operand)})`;
        }
    }

    visitBinary(node: BinaryExpr): string {
        return `${this.operand(node.left)} ${BINARY_OPS[node.op]} ${this.operand(node.right)}`;
    }

    visitParentheses(node: Parentheses): string {
        return `(${this.print(node.operand)})`;
    }

    visitRelational(node: RelationalExpr): string {
        return `${this.operand(node.left)} ${RELATIONAL_OPS[node.op]} ${this.operand(node.right)}`;
    }

    visitArrayRef(node: ArrayRef): string {
        const subscripts = node.subscripts.map((s) => this.print(s));
        return `${this.print(node.base)}(${joinList(subscripts)})`;
    }

    visitCoarrayRef(node: CoarrayRef): string {
        let text = node.base.name;
        if (node.subscripts.length > 0) {
            text += `(${joinList(node.subscripts.map((s) => this.print(s)))})`;
        }
        const cosubscripts = node.cosubscripts.map((c) => this.print(c));
        if (node.stat) {
            cosubscripts.push(`stat=${this.print(node.stat)}`);
        }
        if (node.team) {
            cosubscripts.push(`team=${this.print(node.team)}`);
        }
        return `${text}[${joinList(cosubscripts)}]`;
    }

    visitComponent(node: Component): string {
        return `${this.print(node.base)}%${node.component.name}`;
    }

    visitSubstring(node: Substring): string {
        return `${this.print(node.parent)}(${this.print(node.lower)}:${this.print(node.upper)})`;
    }

    visitComplexPart(node: ComplexPart): string {
        return `${this.print(node.complex)}%${node.part}`;
    }

    visitArrayConstructor(node: ArrayConstructor): string {
        return `[${joinList(node.values.map((v) => this.print(v)))}]`;
    }

    visitImpliedDo(node: ImpliedDo): string {
        const control = [this.print(node.lower), this.print(node.upper)];
        if (node.stride) {
            control.push(this.print(node.stride));
        }
        const values = node.values.map((v) => this.print(v));
        return `(${joinList(values)}, ${node.index.name} = ${joinList(control)})`;
    }

    visitStructureConstructor(node: StructureConstructor): string {
        const { name, parameters } = node.typeSpec;
        let text = name;
        if (parameters.size > 0) {
            const params = [...parameters].map(([k, v]) => `${k}=${this.print(v)}`);
            text += `(${joinList(params)})`;
        }
        const values = [...node.values.values()].map((v) => this.print(v));
        return `${text}(${joinList(values)})`;
    }

    visitTypeParamInquiry(node: TypeParamInquiry): string {
        return node.base
            ? `${this.print(node.base)}%${node.parameter.name}`
            : node.parameter.name;
    }

    visitDescriptorInquiry(node: DescriptorInquiry): string {
        const fn = DESCRIPTOR_INTRINSICS[node.field];
        const base = this.print(node.base);
        if (node.field === "rank" || node.field === "len") {
            return `${fn}(${base})`;
        }
        return `${fn}(${base}, dim=${node.dimension + 1})`;
    }

    visitSubscript(node: Subscript): string {
        return this.print(node.value);
    }

    visitTriplet(node: Triplet): string {
        let text = `${this.print(node.lower)}:${this.print(node.upper)}`;
        if (node.stride) {
            text += `:${this.print(node.stride)}`;
        }
        return text;
    }

    visitParamValue(node: ParamValue): string {
        switch (node.category) {
            case "explicit":
                return this.print(node.expr);
            case "assumed":
                return "*";
            case "deferred":
                return ":";
        }
    }
}

const printer = new ExprPrinter();

export function formatExpr(node: Node): string {
    return printer.print(node);
}
