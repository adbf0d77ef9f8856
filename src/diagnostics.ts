// ============================================================================
// Diagnostics and Error Reporting
// ============================================================================

// ============================================================================
// Source Location
// ============================================================================

/**
 * Represents a position in source code
 */
export type SourceLocation = {
    file?: string;
    line: number;
    column: number;
};

/**
 * Represents a range in source code
 */
export type SourceSpan = {
    start: SourceLocation;
    end: SourceLocation;
};

/**
 * Create a source location
 * @param line - 1-based line number
 * @param column - 1-based column number
 */
function makeSourceLocation(
    line: number,
    column: number,
    file?: string,
): SourceLocation {
    return { line, column, file };
}

function makeSourceSpan(
    start: SourceLocation,
    end: SourceLocation,
): SourceSpan {
    return { start, end };
}

// ============================================================================
// Diagnostic Structure
// ============================================================================

/**
 * Diagnostic severity level
 */
enum Level {
    Error,
    Warning,
    Note,
    Help,
}

type Diagnostic = {
    level: Level;
    message: string;
    span?: SourceSpan;
    code?: string;
    hint?: string;
};

function makeDiagnostic(
    level: Level,
    message: string,
    span?: SourceSpan,
): Diagnostic {
    return span ? { level, message, span } : { level, message };
}

function error(message: string, span?: SourceSpan): Diagnostic {
    return makeDiagnostic(Level.Error, message, span);
}

function warning(message: string, span?: SourceSpan): Diagnostic {
    return makeDiagnostic(Level.Warning, message, span);
}

function withCode(diag: Diagnostic, code: string): Diagnostic {
    return { ...diag, code };
}

function withHint(diag: Diagnostic, hint: string): Diagnostic {
    return { ...diag, hint };
}

// ============================================================================
// Error Collection
// ============================================================================

/**
 * Append-only, ordered sink for diagnostics. Owned by the caller and
 * drained after a check completes.
 */
class DiagnosticCollector {
    diagnostics: Diagnostic[];
    #hasErrors: boolean;
    constructor() {
        this.diagnostics = [];
        this.#hasErrors = false;
    }
    add(diag: Diagnostic) {
        this.diagnostics.push(diag);
        if (diag.level === Level.Error) {
            this.#hasErrors = true;
        }
    }
    addError(message: string, span?: SourceSpan) {
        this.add(error(message, span));
    }
    addWarning(message: string, span?: SourceSpan) {
        this.add(warning(message, span));
    }

    hasErrors(): boolean {
        return this.#hasErrors;
    }
    getDiagnostics(): Diagnostic[] {
        return [...this.diagnostics];
    }
    getErrors(): Diagnostic[] {
        return this.diagnostics.filter((d) => d.level === Level.Error);
    }
    clear() {
        this.diagnostics = [];
        this.#hasErrors = false;
    }
    countByLevel(level: Level): number {
        return this.diagnostics.filter((d) => d.level === level).length;
    }
    merge(other: DiagnosticCollector) {
        for (const diag of other.diagnostics) {
            this.add(diag);
        }
    }
}

function createCollector(): DiagnosticCollector {
    return new DiagnosticCollector();
}

/**
 * A collector bound to the source location currently being checked.
 * Everything said through it is attributed to that location.
 */
class ContextualMessages {
    readonly collector: DiagnosticCollector;
    readonly at?: SourceSpan;
    constructor(collector: DiagnosticCollector, at?: SourceSpan) {
        this.collector = collector;
        this.at = at;
    }
    say(diag: Diagnostic) {
        this.collector.add(this.at && !diag.span ? { ...diag, span: this.at } : diag);
    }
    withLocation(at: SourceSpan): ContextualMessages {
        return new ContextualMessages(this.collector, at);
    }
}

// ============================================================================
// Result Type
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

function ok$1<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

function err$1<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Unwrap a result, throwing if it's an error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
    if (result.ok) {
        return result.value;
    }
    const { error: failure } = result;
    if (failure instanceof Error) {
        throw failure;
    }
    if (failure && typeof failure === "object" && "message" in failure) {
        throw new Error(String(failure.message));
    }
    throw new Error(String(failure));
}

// ============================================================================
// Diagnostic Renderer
// ============================================================================

const LEVEL_NAMES: Record<Level, string> = {
    [Level.Error]: "error",
    [Level.Warning]: "warning",
    [Level.Note]: "note",
    [Level.Help]: "help",
};

const LEVEL_COLORS: Record<Level, string> = {
    [Level.Error]: "\x1b[31m", // Red
    [Level.Warning]: "\x1b[33m", // Yellow
    [Level.Note]: "\x1b[36m", // Cyan
    [Level.Help]: "\x1b[32m", // Green
};

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";

/**
 * Render a diagnostic to a string
 */
function renderDiagnostic(
    diag: Diagnostic,
    options: { color?: boolean } = { color: true },
): string {
    const color = options.color ?? true;
    const lines = [];

    const levelName = LEVEL_NAMES[diag.level];
    const levelColor = color ? LEVEL_COLORS[diag.level] : "";
    const reset = color ? RESET : "";
    const bold = color ? BOLD : "";

    let header = `${levelColor}${bold}${levelName}${reset}`;
    if (diag.code) {
        header += `${bold}[${diag.code}]${reset}`;
    }
    header += `: ${diag.message}`;
    lines.push(header);

    if (diag.span) {
        const loc = diag.span.start;
        let locStr = "  --> ";
        if (loc.file) {
            locStr += `${loc.file}:`;
        }
        locStr += `${loc.line}:${loc.column}`;
        lines.push(locStr);
    }
    if (diag.hint) {
        const helpColor = color ? LEVEL_COLORS[Level.Help] : "";
        lines.push(`  ${helpColor}hint${reset}: ${diag.hint}`);
    }
    return lines.join("\n");
}

function renderDiagnostics(
    collector: DiagnosticCollector,
    options: { color?: boolean } = {},
): string {
    return collector
        .getDiagnostics()
        .map((d) => renderDiagnostic(d, options))
        .join("\n");
}

// ============================================================================
// Error Formatting
// ============================================================================

/** Pointer initialization target constraint. */
const INITIAL_TARGET_CODE = "C765";
/** Specification expression constraint. */
const SPECIFICATION_EXPR_CODE = "C1010";

function formatAllocatableTarget(name: string): Diagnostic {
    return withCode(
        error(`An initial data target may not be a reference to an ALLOCATABLE '${name}'`),
        INITIAL_TARGET_CODE,
    );
}

function formatCoarrayTarget(name: string): Diagnostic {
    return withCode(
        error(`An initial data target may not be a reference to a coarray '${name}'`),
        INITIAL_TARGET_CODE,
    );
}

function formatMissingTargetAttr(name: string): Diagnostic {
    const diag = error(
        `An initial data target may not be a reference to an object '${name}' that lacks the TARGET attribute`,
    );
    return withHint(withCode(diag, INITIAL_TARGET_CODE), `add TARGET to the declaration of '${name}'`);
}

function formatMissingSaveAttr(name: string): Diagnostic {
    const diag = error(
        `An initial data target may not be a reference to an object '${name}' that lacks the SAVE attribute`,
    );
    return withHint(withCode(diag, INITIAL_TARGET_CODE), `add SAVE to the declaration of '${name}'`);
}

function formatInvalidSpecificationExpr(reason: string): Diagnostic {
    return withCode(
        error(`Invalid specification expression: ${reason}`),
        SPECIFICATION_EXPR_CODE,
    );
}

export {
    // Source Location
    makeSourceLocation,
    makeSourceSpan,
    // Diagnostic Structure
    Level,
    type Diagnostic,
    makeDiagnostic,
    error,
    warning,
    withCode,
    withHint,
    // Diagnostic Collector
    DiagnosticCollector,
    createCollector,
    ContextualMessages,
    // Result Type
    ok$1 as ok,
    err$1 as err,
    // Diagnostic Renderer
    renderDiagnostic,
    renderDiagnostics,
    LEVEL_NAMES,
    // Error Formatting
    INITIAL_TARGET_CODE,
    SPECIFICATION_EXPR_CODE,
    formatAllocatableTarget,
    formatCoarrayTarget,
    formatMissingTargetAttr,
    formatMissingSaveAttr,
    formatInvalidSpecificationExpr,
};
