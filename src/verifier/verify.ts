import * as ast from "./ast.js";
import { CounterexampleValue } from "./diagnostics.js";
import * as formula from "./formula.js";
import { Formula, Model } from "./formula.js";
import { DEFAULT_LIMITS, SearchLimits, checkSat } from "./lia.js";
import { ExecutionPath, enumeratePaths } from "./paths.js";
import { Budget, UnknownReason } from "./smt.js";
import { NO_TRACE, Tracer } from "./trace.js";
import { ContractTranslator, contextFor } from "./translate.js";

/// `VerificationOutcome` is the result of checking one postcondition.
/// * `"proven"`: it holds on every path, for every input satisfying the
///   preconditions.
/// * `"disproven"`: some input satisfying the preconditions violates it.
/// * `"unproven"`: the solver ran out of budget, was cancelled, or gave up.
/// * `"unsupported"`: the contract or body uses a construct outside the
///   decidable fragment; no solver was consulted.
export type VerificationOutcome = { tag: "proven" }
	| { tag: "disproven", counterexample: Map<string, CounterexampleValue>, path: ast.SourceLocation }
	| { tag: "unproven", reason: UnknownReason }
	| { tag: "unsupported", construct: string, location: ast.SourceLocation };

export type PreconditionCheck = "satisfiable" | "unsatisfiable" | "unknown" | "unchecked";

export interface FunctionVerification {
	functionID: ast.FunctionID,

	/// One outcome per postcondition, in declaration order.
	postconditions: Map<ast.ContractID, VerificationOutcome>,

	preconditions: PreconditionCheck,
}

export interface ContractCheckOptions {
	/// The budget for all queries about this function.
	timeoutMs: number,
	maxPaths: number,
	maxQuantifierExpansion: number,
	checkPreconditions: boolean,
	signal?: AbortSignal,
	tracer?: Tracer,
	limits?: SearchLimits,
	clock?: () => number,
}

/// A postcondition to be checked on one path: the formulas whose
/// conjunction describes an input reaching the path and violating it.
interface PathQuery {
	path: ExecutionPath,
	formulas: Formula[],
}

type Prepared = { tag: "queries", queries: PathQuery[] } | VerificationOutcome;

function mentionsResult(e: ast.Expression): boolean {
	let found = false;
	ast.forEachSubexpression(e, sub => {
		found = found || sub.tag === "result";
	});
	return found;
}

/**
 * `counterexampleOf` reads the parameters of `fn` from a model, in
 * declaration order, followed by the value `path` returns for them.
 * Parameters the model leaves unconstrained take the values `0` and `false`.
 */
function counterexampleOf(
	fn: ast.FunctionDefinition,
	path: ExecutionPath,
	model: Model,
	maxQuantifierExpansion: number,
): Map<string, CounterexampleValue> {
	const out = new Map<string, CounterexampleValue>();
	for (const parameter of fn.parameters) {
		const t = parameter.type;
		if (t.tag === "type-primitive" && t.primitive === "Int") {
			out.set(parameter.name, { tag: "int", int: model.ints.get(parameter.name) ?? 0n });
		} else if (t.tag === "type-primitive" && t.primitive === "Boolean") {
			out.set(parameter.name, { tag: "bool", bool: model.bools.get(parameter.name) ?? false });
		}
	}

	if (path.returned === null) {
		return out;
	}
	const translated = new ContractTranslator(contextFor(fn, null, maxQuantifierExpansion)).translateValue(path.returned);
	if (translated.tag !== "translated") {
		return out;
	}
	const value = translated.value;
	if (value.sort === "bool") {
		out.set("result", { tag: "bool", bool: formula.evaluate(value.formula, model) });
	} else {
		const piece = value.term.find(p => formula.evaluate(p.guard, model));
		if (piece !== undefined) {
			out.set("result", { tag: "int", int: piece.value.evaluate(model.ints) });
		}
	}
	return out;
}

/**
 * `verifyFunctionContracts(fn, options)` checks each postcondition of `fn`
 * on every path through its body, assuming its preconditions.
 *
 * Every contract and path condition is translated before any query is
 * solved, so an unsupported construct is reported without consulting the
 * solver. All queries for one function share a single time budget.
 */
export function verifyFunctionContracts(fn: ast.FunctionDefinition, options: ContractCheckOptions): FunctionVerification {
	const tracer = options.tracer ?? NO_TRACE;
	const limits = options.limits ?? DEFAULT_LIMITS;
	const verification: FunctionVerification = {
		functionID: fn.id,
		postconditions: new Map(),
		preconditions: "unchecked",
	};
	if (fn.postconditions.length === 0 && (!options.checkPreconditions || fn.preconditions.length === 0)) {
		return verification;
	}

	tracer.start(["verify", fn.name]);
	try {
		const budget = new Budget(options.timeoutMs, options.signal, options.clock);
		const translator = new ContractTranslator(contextFor(fn, null, options.maxQuantifierExpansion));

		const preconditions: Formula[] = [];
		let unsupportedPrecondition: VerificationOutcome | null = null;
		for (const contract of fn.preconditions) {
			const translated = translator.translate(contract.expression);
			if (translated.tag === "unsupported") {
				unsupportedPrecondition = unsupportedPrecondition ?? translated;
			} else {
				preconditions.push(translated.value);
			}
		}

		if (options.checkPreconditions && fn.preconditions.length !== 0 && unsupportedPrecondition === null) {
			const result = checkSat(preconditions, budget, tracer, limits);
			verification.preconditions = result.tag === "refuted"
				? "unsatisfiable"
				: result.tag === "model" ? "satisfiable" : "unknown";
		}

		const enumeration = enumeratePaths(fn, options.maxPaths);
		const prepared = new Map<ast.ContractID, Prepared>();
		for (const contract of fn.postconditions) {
			prepared.set(contract.id, prepare(fn, contract, enumeration, preconditions, unsupportedPrecondition, options));
		}

		for (const contract of fn.postconditions) {
			const p = prepared.get(contract.id);
			if (p === undefined) {
				continue;
			} else if (p.tag !== "queries") {
				verification.postconditions.set(contract.id, p);
				continue;
			}
			tracer.start(["postcondition", contract.id, "on", p.queries.length, "paths"]);
			try {
				verification.postconditions.set(contract.id, solveQueries(fn, p.queries, budget, tracer, limits, options));
			} finally {
				tracer.stop();
			}
		}
		return verification;
	} finally {
		tracer.stop();
	}
}

function prepare(
	fn: ast.FunctionDefinition,
	contract: ast.Contract,
	enumeration: ReturnType<typeof enumeratePaths>,
	preconditions: Formula[],
	unsupportedPrecondition: VerificationOutcome | null,
	options: ContractCheckOptions,
): Prepared {
	if (unsupportedPrecondition !== null) {
		return unsupportedPrecondition;
	} else if (enumeration.tag === "unsupported") {
		return { tag: "unsupported", construct: enumeration.construct, location: enumeration.location };
	} else if (enumeration.tag === "too-many-paths") {
		return { tag: "unproven", reason: "complexity" };
	}

	const conditions = new ContractTranslator(contextFor(fn, null, options.maxQuantifierExpansion));
	const queries: PathQuery[] = [];
	for (const path of enumeration.paths) {
		if (path.returned === null && mentionsResult(contract.expression)) {
			return { tag: "unsupported", construct: "`result` of a function returning no value", location: contract.location };
		}
		const formulas = [...preconditions];
		for (const condition of path.conditions) {
			const translated = conditions.translate(condition);
			if (translated.tag === "unsupported") {
				return translated;
			}
			formulas.push(translated.value);
		}
		const post = new ContractTranslator(contextFor(fn, path.returned, options.maxQuantifierExpansion))
			.translate(contract.expression);
		if (post.tag === "unsupported") {
			return post;
		}
		formulas.push(formula.not(post.value));
		queries.push({ path, formulas });
	}
	return { tag: "queries", queries };
}

/// `solveQueries` finds a violating input on some path, or shows that there
/// is none. A violation found on any path outranks running out of budget
/// on another.
function solveQueries(
	fn: ast.FunctionDefinition,
	queries: PathQuery[],
	budget: Budget,
	tracer: Tracer,
	limits: SearchLimits,
	options: ContractCheckOptions,
): VerificationOutcome {
	let unknown: UnknownReason | null = null;
	for (const query of queries) {
		const result = checkSat(query.formulas, budget, tracer, limits);
		if (result.tag === "refuted") {
			continue;
		} else if (result.tag === "unknown") {
			unknown = unknown ?? result.reason;
			if (result.reason !== "complexity") {
				// The budget is shared, so later queries cannot finish either.
				break;
			}
			continue;
		}

		const model = result.model;
		if (!formula.evaluate(formula.and(...query.formulas), model)) {
			unknown = unknown ?? "complexity";
			continue;
		}
		return {
			tag: "disproven",
			counterexample: counterexampleOf(fn, query.path, model, options.maxQuantifierExpansion),
			path: query.path.location,
		};
	}
	if (unknown !== null) {
		return { tag: "unproven", reason: unknown };
	}
	return { tag: "proven" };
}
