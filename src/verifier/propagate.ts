import * as ast from "./ast.js";
import { CallGraph, CallSite } from "./callgraph.js";
import { UnknownExternalPolicy } from "./config.js";
import {
	CallChainLink,
	Diagnostic,
	EffectOrigin,
	EffectViolationErr,
	InternalCompilerError,
	UnknownExternalEffectErr,
} from "./diagnostics.js";
import { ALL_EFFECTS, EffectCode, EffectSet, isEffectCode } from "./effects.js";
import { ManifestResolver, Resolution } from "./manifest.js";
import { Decomposition, decompose, independentGroups } from "./scc.js";
import { WorkPool } from "./scheduler.js";
import { NO_TRACE, Tracer } from "./trace.js";

/// `LocalEffect` is an effect performed directly by a statement of a function
/// body, rather than by a callee.
export interface LocalEffect {
	code: EffectCode,
	operation: string,
	location: ast.SourceLocation,
}

/// `localEffects(fn)` lists the effects of the primitive operations in a
/// function's body, in source order.
export function localEffects(fn: ast.FunctionDefinition): LocalEffect[] {
	const out: LocalEffect[] = [];
	const walk = (statements: readonly ast.Statement[]) => {
		for (const statement of statements) {
			if (statement.tag === "primitive") {
				if (!isEffectCode(statement.effect)) {
					throw new InternalCompilerError("primitive `" + statement.operation + "` has unknown effect code `" + statement.effect + "`");
				}
				out.push({ code: statement.effect, operation: statement.operation, location: statement.location });
			} else if (statement.tag === "throw") {
				out.push({ code: "throw", operation: "throw", location: statement.location });
			} else if (statement.tag === "assign" && statement.target.tag === "field") {
				out.push({ code: "mut", operation: "store to `." + statement.target.field + "`", location: statement.location });
			}
			for (const block of ast.nestedBlocks(statement)) {
				walk(block);
			}
		}
	};
	walk(fn.body);
	return out;
}

type Contribution = { tag: "local", effect: LocalEffect }
	| { tag: "external", site: CallSite, effects: EffectSet };

/// `FunctionSummary` is what a function does without considering its internal
/// callees.
interface FunctionSummary {
	direct: EffectSet,
	contributions: Contribution[],
	diagnostics: Diagnostic[],
}

/**
 * Each function moves through `pending`, then `propagating` while its
 * component iterates to a fixed point, and finally `resolved`.
 */
export type FunctionState = { tag: "pending" }
	| { tag: "propagating", working: EffectSet }
	| { tag: "resolved", effects: EffectSet };

export interface EffectPassOptions {
	unknownExternalPolicy: UnknownExternalPolicy,
	pool?: WorkPool,
	signal?: AbortSignal,
	tracer?: Tracer,
}

export interface EffectPassResult {
	/// The effects each function may perform, including through callees.
	computed: Map<ast.FunctionID, EffectSet>,

	/// Diagnostics for each function, keyed in input order. Every analyzed
	/// function has an entry, which may be empty.
	diagnostics: Map<ast.FunctionID, Diagnostic[]>,

	/// The number of fixed-point iterations spent on each component, by
	/// component index.
	iterations: number[],

	/// When the pass was cancelled, functions whose groups never started are
	/// missing from `computed` and `diagnostics`.
	cancelled: boolean,
}

function declaredEffects(fn: ast.FunctionDefinition): EffectSet {
	const parsed = EffectSet.parse(fn.declaredEffects);
	if (parsed.tag === "invalid") {
		throw new InternalCompilerError("function `" + fn.name + "` declares unknown effect code(s) " + parsed.codes.join(", "));
	}
	return parsed.set;
}

/**
 * `GroupAnalysis` owns the state for one independent group of components.
 * Groups share no mutable state, so they may be analyzed concurrently.
 */
class GroupAnalysis {
	readonly states = new Map<ast.FunctionID, FunctionState>();
	readonly summaries = new Map<ast.FunctionID, FunctionSummary>();
	readonly iterations = new Map<number, number>();
	private readonly resolutions = new Map<string, Resolution>();

	constructor(
		private readonly graph: CallGraph,
		private readonly decomposition: Decomposition<ast.FunctionID>,
		private readonly resolver: ManifestResolver,
		private readonly policy: UnknownExternalPolicy,
	) { }

	private resolve(qualifiedName: string): Resolution {
		const cached = this.resolutions.get(qualifiedName);
		if (cached !== undefined) {
			return cached;
		}
		const resolution = this.resolver.resolve(qualifiedName);
		this.resolutions.set(qualifiedName, resolution);
		return resolution;
	}

	private summarize(id: ast.FunctionID): FunctionSummary {
		const fn = this.graph.getFunction(id);
		const contributions: Contribution[] = [];
		const diagnostics: Diagnostic[] = [];
		let direct = EffectSet.PURE;

		for (const effect of localEffects(fn)) {
			contributions.push({ tag: "local", effect });
			direct = direct.join(EffectSet.of(effect.code));
		}

		for (const site of this.graph.getCallSites(id)) {
			if (site.target.tag !== "external") {
				continue;
			}
			const qualifiedName = site.target.qualifiedName;
			const resolution = this.resolve(qualifiedName);
			if (resolution.tag === "known") {
				contributions.push({ tag: "external", site, effects: resolution.effects });
				direct = direct.join(resolution.effects);
				continue;
			}

			const reason = resolution.tag === "error" ? resolution.message : null;
			if (this.policy !== "permissive" || resolution.tag === "error") {
				diagnostics.push(new UnknownExternalEffectErr({
					functionID: id,
					functionName: fn.name,
					qualifiedName,
					reason,
					location: site.location,
					severity: this.policy === "strict" ? "error" : "warning",
				}));
			}
			if (this.policy !== "strict") {
				// Never assume that an unknown call is pure.
				contributions.push({ tag: "external", site, effects: EffectSet.TOP });
				direct = EffectSet.TOP;
			}
		}

		return { direct, contributions, diagnostics };
	}

	private transition(id: ast.FunctionID, next: FunctionState): void {
		const current: FunctionState = this.states.get(id) ?? { tag: "pending" };
		const allowed = (current.tag === "pending" && next.tag === "propagating")
			|| (current.tag === "propagating" && next.tag !== "pending");
		if (!allowed) {
			throw new InternalCompilerError("function `" + id + "` cannot move from " + current.tag + " to " + next.tag);
		}
		this.states.set(id, next);
	}

	private working(id: ast.FunctionID): EffectSet {
		const state = this.states.get(id);
		if (state === undefined || state.tag === "pending") {
			throw new InternalCompilerError("effects of `" + id + "` were used before they were computed");
		}
		return state.tag === "propagating" ? state.working : state.effects;
	}

	resolved(id: ast.FunctionID): EffectSet {
		const state = this.states.get(id);
		if (state === undefined || state.tag !== "resolved") {
			throw new InternalCompilerError("effects of `" + id + "` are not resolved");
		}
		return state.effects;
	}

	/**
	 * `solveComponent(index)` computes the effects of every member of a
	 * component. All components it depends on must already be solved.
	 */
	solveComponent(index: number): void {
		const members = this.decomposition.components[index];
		const inComponent = new Set(members);

		for (const member of members) {
			const summary = this.summarize(member);
			this.summaries.set(member, summary);
			let working = summary.direct;
			for (const { to } of this.graph.getOutgoing(member)) {
				if (!inComponent.has(to)) {
					working = working.join(this.resolved(to));
				}
			}
			this.transition(member, { tag: "propagating", working });
		}

		// Each round either adds an effect to some member or ends the loop,
		// so this terminates within (members × lattice height) rounds.
		let rounds = 0;
		let changed = this.decomposition.recursive[index];
		while (changed) {
			changed = false;
			rounds += 1;
			for (const member of members) {
				let working = this.working(member);
				for (const { to } of this.graph.getOutgoing(member)) {
					if (inComponent.has(to)) {
						working = working.join(this.working(to));
					}
				}
				if (!working.equals(this.working(member))) {
					this.transition(member, { tag: "propagating", working });
					changed = true;
				}
			}
		}
		this.iterations.set(index, rounds);

		for (const member of members) {
			this.transition(member, { tag: "resolved", effects: this.working(member) });
		}
	}

	/**
	 * `findCallChain` searches breadth-first from `start` for the nearest
	 * operation that introduces `code`, returning the calls leading to it.
	 */
	findCallChain(start: ast.FunctionID, code: EffectCode | typeof ALL_EFFECTS): { chain: CallChainLink[], origin: EffectOrigin | null } {
		const target = code === ALL_EFFECTS ? EffectSet.TOP : EffectSet.of(code);
		const introduces = (effects: EffectSet) => code === ALL_EFFECTS ? effects.isTop : effects.intersects(target);

		const parents = new Map<ast.FunctionID, { from: ast.FunctionID, link: CallChainLink } | null>();
		parents.set(start, null);
		const pathTo = (id: ast.FunctionID): CallChainLink[] => {
			const path: CallChainLink[] = [];
			let parent = parents.get(id);
			while (parent) {
				path.push(parent.link);
				parent = parents.get(parent.from);
			}
			return path.reverse();
		};

		const queue = [start];
		for (let i = 0; i < queue.length; i++) {
			const current = queue[i];
			const summary = this.summaries.get(current);
			if (summary === undefined) {
				throw new InternalCompilerError("no summary for `" + current + "`");
			}

			for (const contribution of summary.contributions) {
				if (contribution.tag === "local" && introduces(EffectSet.of(contribution.effect.code))) {
					const { operation, location } = contribution.effect;
					return {
						chain: pathTo(current),
						origin: { tag: "local-operation", functionID: current, operation, location },
					};
				}
			}
			for (const contribution of summary.contributions) {
				if (contribution.tag === "external" && introduces(contribution.effects)) {
					const site = contribution.site;
					const qualifiedName = this.graph.displayTarget(site.target);
					return {
						chain: [...pathTo(current), { caller: current, callee: qualifiedName, calleeKind: "external", location: site.location }],
						origin: { tag: "external-call", qualifiedName, location: site.location },
					};
				}
			}

			for (const { to, edge } of this.graph.getOutgoing(current)) {
				if (!parents.has(to) && introduces(this.resolved(to))) {
					parents.set(to, {
						from: current,
						link: { caller: current, callee: this.graph.getFunction(to).name, calleeKind: "internal", location: edge.location },
					});
					queue.push(to);
				}
			}
		}
		return { chain: [], origin: null };
	}

	/// `check(id)` compares a function's declared effects against its computed
	/// effects, returning one violation per undeclared effect code.
	check(id: ast.FunctionID): Diagnostic[] {
		const fn = this.graph.getFunction(id);
		const declared = declaredEffects(fn);
		const missing = declared.uncovered(this.resolved(id));
		const out: Diagnostic[] = [];
		for (const code of missing.isPure ? [] : missing.codes()) {
			const { chain, origin } = this.findCallChain(id, code);
			out.push(new EffectViolationErr({
				functionID: id,
				functionName: fn.name,
				effect: code,
				declared: declared.display(),
				callChain: chain,
				origin,
				location: fn.location,
				severity: "error",
			}));
		}
		return out;
	}
}

/**
 * `propagateEffects` computes the transitive effects of every function in the
 * call graph, and reports functions whose declarations do not cover them.
 *
 * Components are solved callees-first. Groups of components with no calls
 * between them are analyzed as independent jobs on `options.pool`.
 */
export async function propagateEffects(
	graph: CallGraph,
	resolver: ManifestResolver,
	options: EffectPassOptions,
): Promise<EffectPassResult> {
	const tracer = options.tracer ?? NO_TRACE;
	const pool = options.pool ?? new WorkPool(1);

	tracer.start("propagateEffects");
	const decomposition = decompose(graph);
	const groups = independentGroups(decomposition);
	tracer.mark(["components:", decomposition.components.length, "groups:", groups.length]);

	const outcomes = await pool.map(groups, group => {
		const analysis = new GroupAnalysis(graph, decomposition, resolver, options.unknownExternalPolicy);
		for (const index of group) {
			analysis.solveComponent(index);
		}

		const results = new Map<ast.FunctionID, { effects: EffectSet, diagnostics: Diagnostic[] }>();
		for (const index of group) {
			for (const member of decomposition.components[index]) {
				const summary = analysis.summaries.get(member);
				results.set(member, {
					effects: analysis.resolved(member),
					diagnostics: [...(summary?.diagnostics ?? []), ...analysis.check(member)],
				});
			}
		}
		return { results, iterations: [...analysis.iterations] };
	}, options.signal);

	// Merge the per-group results, in input order.
	const merged = new Map<ast.FunctionID, { effects: EffectSet, diagnostics: Diagnostic[] }>();
	const iterations = decomposition.components.map(() => 0);
	let cancelled = false;
	for (const outcome of outcomes) {
		if (outcome.tag === "skipped") {
			cancelled = true;
			continue;
		}
		for (const [id, result] of outcome.value.results) {
			merged.set(id, result);
		}
		for (const [index, rounds] of outcome.value.iterations) {
			iterations[index] = rounds;
		}
	}

	const computed = new Map<ast.FunctionID, EffectSet>();
	const diagnostics = new Map<ast.FunctionID, Diagnostic[]>();
	for (const id of graph.getVertexes()) {
		const result = merged.get(id);
		if (result !== undefined) {
			computed.set(id, result.effects);
			diagnostics.set(id, result.diagnostics);
		}
	}
	tracer.stop("propagateEffects");
	return { computed, diagnostics, iterations, cancelled };
}
