export * as ast from "./ast.js";
export { VerificationCache } from "./cache.js";
export type { CacheSettings } from "./cache.js";
export { buildCallGraph, CallGraph } from "./callgraph.js";
export type { CallSite, DirectedGraph, ResolvedTarget } from "./callgraph.js";
export { ConfigurationError, resolveOptions, timeoutFor, UnknownExternalPolicy, VerifierOptions } from "./config.js";
export type { VerifierOptionsInput } from "./config.js";
export * as construct from "./construct.js";
export {
	ContractDisprovenErr,
	Diagnostic,
	displayCounterexample,
	EffectViolationErr,
	InternalCompilerError,
	PreconditionUnsatisfiableErr,
	UnknownExternalEffectErr,
} from "./diagnostics.js";
export type { CallChainLink, CounterexampleValue, DiagnosticKind, EffectOrigin, Severity } from "./diagnostics.js";
export { ALL_EFFECTS, describeEffect, EFFECT_CODES, EffectSet, isEffectCode } from "./effects.js";
export type { EffectCode } from "./effects.js";
export {
	builtinManifest,
	JsonManifestResolver,
	LayeredResolver,
	loadManifestFile,
	ManifestDocument,
	parseManifest,
} from "./manifest.js";
export type { ManifestLoad, ManifestResolver, Resolution } from "./manifest.js";
export { consoleLogger, displaySummary, runVerificationPass, silentLogger } from "./pipeline.js";
export type { Logger, PassContext, VerificationReport, VerificationSummary } from "./pipeline.js";
export { enumeratePaths } from "./paths.js";
export type { ExecutionPath, PathEnumeration } from "./paths.js";
export { classify, describeOutcome } from "./policy.js";
export type { ContractDecision } from "./policy.js";
export { propagateEffects } from "./propagate.js";
export type { EffectPassResult } from "./propagate.js";
export { decompose, independentGroups } from "./scc.js";
export type { Decomposition } from "./scc.js";
export { defaultConcurrency, WorkPool } from "./scheduler.js";
export type { JobOutcome } from "./scheduler.js";
export { NO_TRACE, renderText, TraceRecorder } from "./trace.js";
export type { Trace, Tracer } from "./trace.js";
export { ContractTranslator, translateContract } from "./translate.js";
export type { Translation } from "./translate.js";
export { verifyFunctionContracts } from "./verify.js";
export type { ContractCheckOptions, FunctionVerification, PreconditionCheck, VerificationOutcome } from "./verify.js";
