export * from './core/types';
export { AnalysisCancelledError, ConfigError, SnapshotError } from './core/errors';
export { assertNever, childrenOf, descendants, descendantsAndSelf, isFullySynthesized, withoutSynthesized } from './core/traversal';
export { Compilation, SemanticModel } from './core/semantic-model';
export { CompilationSnapshot, loadCompilation, parseCompilationSnapshot } from './core/snapshot';
export { WellKnownTypeNames } from './core/well-known-types';
export { DEFAULT_BUILD_FLAGS, WellKnownDiagnosticTags, defineRuleDescriptor } from './core/descriptors';
export { createDiagnostic, formatLocation, formatMessage } from './core/diagnostics';
export { AnalyzerRule, EngineOptions, EngineResult, OperationContext, RuleEngine, RuleEvaluator } from './core/engine';
export { CompilationAnalyzer, CompilationReport } from './core/analyzer';
export { ConfigManager, ConfigTemplate } from './core/config';
export { DiagnosticReporter, ReportFormat } from './core/reporter';
export * from './rules';
