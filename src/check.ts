import { isConstantExpr } from "./check_constant";
import { isSimplyContiguousTristate } from "./check_contiguous";
import { isInitialDataTarget } from "./check_initial_target";
import { checkSpecificationExpr } from "./check_specification";
import {
    ContextualMessages,
    createCollector,
    type Diagnostic,
    Level,
    renderDiagnostic,
} from "./diagnostics";
import type { Fixture, FixtureCheck } from "./expr_deserialize";
import { formatExpr } from "./expr_printer";
import type { IntrinsicProcTable } from "./characteristics";

export const CHECK_NAMES = [
    "constant",
    "initial-target",
    "specification",
    "contiguous",
] as const;

export type CheckName = (typeof CHECK_NAMES)[number];

export function isCheckName(name: string): name is CheckName {
    return CHECK_NAMES.some((n) => n === name);
}

export type CheckOptions = {
    /** Run a single predicate instead of all four. */
    only?: CheckName;
};

/**
 * Outcome of the predicates run on one expression. A field is absent when
 * its predicate was not selected.
 */
export type ExprReport = {
    name: string;
    text: string;
    constant?: boolean;
    initialTarget?: { result: boolean; diagnostics: Diagnostic[] };
    specification?: { diagnostics: Diagnostic[] };
    contiguous?: boolean | undefined;
};

function selected(options: CheckOptions, name: CheckName): boolean {
    return options.only === undefined || options.only === name;
}

export function runCheck(
    check: FixtureCheck,
    intrinsics: IntrinsicProcTable,
    options: CheckOptions = {},
): ExprReport {
    const report: ExprReport = { name: check.name, text: formatExpr(check.expr) };
    if (selected(options, "constant")) {
        report.constant = isConstantExpr(check.expr);
    }
    if (selected(options, "initial-target")) {
        const collector = createCollector();
        const result = isInitialDataTarget(
            check.expr,
            new ContextualMessages(collector, check.at),
        );
        report.initialTarget = { result, diagnostics: collector.getDiagnostics() };
    }
    if (selected(options, "specification")) {
        const collector = createCollector();
        checkSpecificationExpr(
            check.expr,
            new ContextualMessages(collector, check.at),
            check.scope,
        );
        report.specification = { diagnostics: collector.getDiagnostics() };
    }
    if (selected(options, "contiguous")) {
        report.contiguous = isSimplyContiguousTristate(check.expr, intrinsics);
    }
    return report;
}

export function runChecks(fixture: Fixture, options: CheckOptions = {}): ExprReport[] {
    return fixture.checks.map((check) => runCheck(check, fixture.intrinsics, options));
}

export function reportDiagnostics(report: ExprReport): Diagnostic[] {
    return [
        ...(report.initialTarget?.diagnostics ?? []),
        ...(report.specification?.diagnostics ?? []),
    ];
}

export function hasErrors(reports: readonly ExprReport[]): boolean {
    return reports.some((r) =>
        reportDiagnostics(r).some((d) => d.level === Level.Error),
    );
}

// ============================================================================
// Report Formatting
// ============================================================================

function formatTristate(value: boolean | undefined): string {
    return value === undefined ? "unknown" : value ? "yes" : "no";
}

/**
 * One block per expression:
 *
 *     p0: a(1:2)
 *       constant: no
 *       initial data target: yes
 *       specification expression: yes
 *       simply contiguous: yes
 *
 * followed by the rendered diagnostics of that expression.
 */
export function formatReport(
    report: ExprReport,
    options: { color?: boolean } = {},
): string {
    const lines = [`${report.name}: ${report.text}`];
    if (report.constant !== undefined) {
        lines.push(`  constant: ${formatTristate(report.constant)}`);
    }
    if (report.initialTarget) {
        lines.push(`  initial data target: ${formatTristate(report.initialTarget.result)}`);
    }
    if (report.specification) {
        const valid = report.specification.diagnostics.length === 0;
        lines.push(`  specification expression: ${formatTristate(valid)}`);
    }
    if ("contiguous" in report) {
        lines.push(`  simply contiguous: ${formatTristate(report.contiguous)}`);
    }
    for (const diag of reportDiagnostics(report)) {
        lines.push(renderDiagnostic(diag, { color: options.color ?? false }));
    }
    return lines.join("\n");
}

export function formatReports(
    reports: readonly ExprReport[],
    options: { color?: boolean } = {},
): string {
    return reports.map((r) => formatReport(r, options)).join("\n\n");
}
