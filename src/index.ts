export * from "./symbols";
export * from "./expr";
export * from "./characteristics";
export * from "./traverse";
export { getScalarConstantValue, getScalarIntegerConstant } from "./fold";
export { isConstantExpr } from "./check_constant";
export { isInitialDataTarget } from "./check_initial_target";
export { checkSpecificationExpr, specificationExprProblem } from "./check_specification";
export {
    checkSubscripts,
    isSimplyContiguous,
    isSimplyContiguousTristate,
    isStrideOne,
} from "./check_contiguous";
export { formatExpr } from "./expr_printer";
export {
    deserializeFixture,
    DeserializeErrorKind,
    type DeserializeError,
    type DeserializeErrorKindValue,
    type Fixture,
    type FixtureCheck,
} from "./expr_deserialize";
export {
    CHECK_NAMES,
    type CheckName,
    type CheckOptions,
    type ExprReport,
    formatReport,
    formatReports,
    hasErrors,
    isCheckName,
    reportDiagnostics,
    runCheck,
    runChecks,
} from "./check";
export {
    ContextualMessages,
    createCollector,
    type Diagnostic,
    DiagnosticCollector,
    err,
    Level,
    makeSourceLocation,
    makeSourceSpan,
    ok,
    renderDiagnostic,
    renderDiagnostics,
    type Result,
    type SourceLocation,
    type SourceSpan,
    unwrap,
} from "./diagnostics";
