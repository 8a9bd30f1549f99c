import * as ast from "./ast.js";
import { VerificationCache } from "./cache.js";
import { buildCallGraph } from "./callgraph.js";
import { VerifierOptions, resolveOptions, timeoutFor } from "./config.js";
import { Diagnostic, PreconditionUnsatisfiableErr } from "./diagnostics.js";
import { EffectSet } from "./effects.js";
import { ManifestResolver, builtinManifest } from "./manifest.js";
import { ContractDecision, classify } from "./policy.js";
import { propagateEffects } from "./propagate.js";
import { WorkPool, defaultConcurrency } from "./scheduler.js";
import { NO_TRACE, Tracer } from "./trace.js";
import { FunctionVerification, PreconditionCheck, VerificationOutcome, verifyFunctionContracts } from "./verify.js";

/// `Logger` receives verbose output one line at a time.
export type Logger = (line: string) => void;

export const silentLogger: Logger = () => { };

export const consoleLogger: Logger = line => {
	console.log(line);
};

export interface VerificationSummary {
	functions: number,
	proven: number,
	disproven: number,
	unproven: number,
	unsupported: number,

	/// Runtime checks which may be omitted.
	elided: number,

	effectViolations: number,
	unknownExternals: number,
}

export interface VerificationReport {
	/// The computed effects of each function, or `null` when effects are not
	/// enforced.
	effects: Map<ast.FunctionID, EffectSet> | null,

	/// The outcome of each postcondition, by contract id.
	contracts: Map<ast.ContractID, VerificationOutcome>,

	decisions: Map<ast.ContractID, ContractDecision>,
	preconditions: Map<ast.FunctionID, PreconditionCheck>,

	/// Every diagnostic, grouped by function in input order. Within a function,
	/// effect diagnostics come before contract diagnostics.
	diagnostics: Diagnostic[],

	summary: VerificationSummary,

	/// Whether the pass was cancelled before every job started.
	cancelled: boolean,
}

export interface PassContext {
	/// Resolves external calls; the built-in catalog when absent.
	resolver?: ManifestResolver,
	signal?: AbortSignal,
	logger?: Logger,
	tracer?: Tracer,

	/// Results kept from earlier passes.
	cache?: VerificationCache,
}

export function displaySummary(summary: VerificationSummary): string {
	return "verified " + summary.functions + " functions: "
		+ summary.proven + " proven, "
		+ summary.disproven + " disproven, "
		+ summary.unproven + " unproven, "
		+ summary.unsupported + " unsupported; "
		+ summary.elided + " checks elided, "
		+ summary.effectViolations + " effect violations, "
		+ summary.unknownExternals + " unknown externals";
}

function cancelledVerification(fn: ast.FunctionDefinition): FunctionVerification {
	const postconditions = new Map<ast.ContractID, VerificationOutcome>();
	for (const contract of fn.postconditions) {
		postconditions.set(contract.id, { tag: "unproven", reason: "cancelled" });
	}
	return { functionID: fn.id, postconditions, preconditions: "unchecked" };
}

function verifyWithCache(
	fn: ast.FunctionDefinition,
	options: VerifierOptions,
	context: PassContext,
): FunctionVerification {
	const settings = {
		maxPaths: options.maxPaths,
		maxQuantifierExpansion: options.maxQuantifierExpansion,
		checkPreconditions: options.checkPreconditions,
	};
	const key = context.cache === undefined ? null : VerificationCache.keyOf(fn, settings);
	if (context.cache !== undefined && key !== null) {
		const cached = context.cache.get(key);
		if (cached !== null) {
			return cached;
		}
	}

	const verification = verifyFunctionContracts(fn, {
		...settings,
		timeoutMs: timeoutFor(options, fn.id),
		signal: context.signal,
		tracer: context.tracer,
	});
	if (context.cache !== undefined && key !== null) {
		context.cache.set(key, verification);
	}
	return verification;
}

/**
 * `runVerificationPass` checks declared effects and verifies contracts for a
 * compilation unit.
 *
 * The functions are read but never modified; everything the pass concludes
 * is returned in the report. Malformed input throws an
 * `InternalCompilerError`; every other outcome is reported.
 *
 * @throws ConfigurationError when `input` is not valid `VerifierOptions`.
 */
export async function runVerificationPass(
	functions: readonly ast.FunctionDefinition[],
	input: unknown = {},
	context: PassContext = {},
): Promise<VerificationReport> {
	const options = resolveOptions(input);
	const logger = options.verbose ? context.logger ?? silentLogger : silentLogger;
	const tracer = context.tracer ?? NO_TRACE;
	const pool = new WorkPool(options.concurrency ?? defaultConcurrency());

	tracer.start("runVerificationPass");
	const graph = buildCallGraph(functions);
	let cancelled = false;

	let effects: Map<ast.FunctionID, EffectSet> | null = null;
	let effectDiagnostics = new Map<ast.FunctionID, Diagnostic[]>();
	if (options.enforceEffects) {
		const result = await propagateEffects(graph, context.resolver ?? builtinManifest(), {
			unknownExternalPolicy: options.unknownExternalPolicy,
			pool,
			signal: context.signal,
			tracer,
		});
		effects = result.computed;
		effectDiagnostics = result.diagnostics;
		cancelled = cancelled || result.cancelled;
	}

	const verifications = new Map<ast.FunctionID, FunctionVerification>();
	if (options.staticVerification) {
		tracer.start("verifyContracts");
		const outcomes = await pool.map(functions, fn => verifyWithCache(fn, options, context), context.signal);
		tracer.stop("verifyContracts");
		for (let i = 0; i < functions.length; i++) {
			const outcome = outcomes[i];
			if (outcome.tag === "skipped") {
				cancelled = true;
				verifications.set(functions[i].id, cancelledVerification(functions[i]));
			} else {
				verifications.set(functions[i].id, outcome.value);
			}
		}
	}

	const report: VerificationReport = {
		effects,
		contracts: new Map(),
		decisions: new Map(),
		preconditions: new Map(),
		diagnostics: [],
		summary: {
			functions: functions.length,
			proven: 0,
			disproven: 0,
			unproven: 0,
			unsupported: 0,
			elided: 0,
			effectViolations: 0,
			unknownExternals: 0,
		},
		cancelled,
	};

	for (const fn of functions) {
		for (const diagnostic of effectDiagnostics.get(fn.id) ?? []) {
			report.diagnostics.push(diagnostic);
			if (diagnostic.kind === "effect-violation") {
				report.summary.effectViolations += 1;
			} else if (diagnostic.kind === "unknown-external-effect") {
				report.summary.unknownExternals += 1;
			}
		}

		const verification = verifications.get(fn.id);
		if (verification === undefined) {
			continue;
		}
		report.preconditions.set(fn.id, verification.preconditions);
		if (verification.preconditions === "unsatisfiable") {
			report.diagnostics.push(new PreconditionUnsatisfiableErr({
				functionID: fn.id,
				functionName: fn.name,
				location: fn.location,
			}));
		}

		for (const contract of fn.postconditions) {
			const outcome = verification.postconditions.get(contract.id);
			if (outcome === undefined) {
				continue;
			}
			const decision = classify(fn, contract, outcome, options);
			report.contracts.set(contract.id, outcome);
			report.decisions.set(contract.id, decision);
			report.summary[outcome.tag] += 1;
			if (decision.elide) {
				report.summary.elided += 1;
			}
			if (decision.diagnostic !== null) {
				report.diagnostics.push(decision.diagnostic);
			} else if (decision.note !== null) {
				logger(decision.note);
			}
		}
	}

	if (context.cache !== undefined) {
		logger("verification cache: " + context.cache.hits + " hits, " + context.cache.misses + " misses");
	}
	logger(displaySummary(report.summary));
	tracer.stop("runVerificationPass");
	return report;
}
