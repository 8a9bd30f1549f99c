import * as ast from "./ast.js";
import { DefaultMap } from "./data.js";
import { InternalCompilerError } from "./diagnostics.js";

/// `ResolvedTarget` is the target of a call after bare names have been bound.
export type ResolvedTarget = { tag: "internal", function: ast.FunctionID }
	| { tag: "external", qualifiedName: string };

export interface CallSite {
	caller: ast.FunctionID,
	target: ResolvedTarget,
	arguments: readonly ast.Expression[],
	location: ast.SourceLocation,
}

export interface DirectedGraph<E, V> {
	/**
	 * `getOutgoing(from)` returns the set of edges originating at vertex
	 * `from`, in a stable order.
	 */
	getOutgoing(from: V): { from: V, edge: E, to: V }[];

	getVertexes(): V[];
}

/**
 * `CallGraph` records every call site of every function, in source order.
 *
 * As a `DirectedGraph`, only internal calls are edges; external calls are
 * available from `getCallSites`.
 */
export class CallGraph implements DirectedGraph<CallSite, ast.FunctionID> {
	private sitesByCaller = new DefaultMap<ast.FunctionID, CallSite[]>(() => []);

	constructor(private readonly functions: ReadonlyMap<ast.FunctionID, ast.FunctionDefinition>) { }

	addCall(site: CallSite): void {
		this.sitesByCaller.get(site.caller).push(site);
	}

	getFunction(id: ast.FunctionID): ast.FunctionDefinition {
		const fn = this.functions.get(id);
		if (fn === undefined) {
			throw new InternalCompilerError("no function has id `" + id + "`");
		}
		return fn;
	}

	getCallSites(from: ast.FunctionID): readonly CallSite[] {
		return this.sitesByCaller.get(from);
	}

	getOutgoing(from: ast.FunctionID): { from: ast.FunctionID, edge: CallSite, to: ast.FunctionID }[] {
		const out = [];
		for (const site of this.sitesByCaller.get(from)) {
			if (site.target.tag === "internal") {
				out.push({ from, edge: site, to: site.target.function });
			}
		}
		return out;
	}

	getVertexes(): ast.FunctionID[] {
		return [...this.functions.keys()];
	}

	/// `displayTarget` is the name used for a call's target in diagnostics.
	displayTarget(target: ResolvedTarget): string {
		if (target.tag === "external") {
			return target.qualifiedName;
		}
		return this.getFunction(target.function).name;
	}
}

/// `forEachCall` visits every call expression in `statements` and the blocks
/// nested within them, in source order.
function forEachCall(statements: readonly ast.Statement[], visit: (call: ast.ExpressionCall) => void): void {
	for (const statement of statements) {
		for (const expression of ast.statementExpressions(statement)) {
			ast.forEachSubexpression(expression, e => {
				if (e.tag === "call") {
					visit(e);
				}
			});
		}
		for (const block of ast.nestedBlocks(statement)) {
			forEachCall(block, visit);
		}
	}
}

/**
 * `buildCallGraph` creates one call site for each call expression in each
 * function body. Contracts are not searched, since contracts may not have
 * effects.
 *
 * A call naming a function by a bare name is bound to the function of that
 * name; when there is none, the call is external and keeps the raw name.
 *
 * @throws InternalCompilerError when two functions share an id, when a call
 * refers to an id that is not defined, or when a bare name is ambiguous.
 */
export function buildCallGraph(functions: readonly ast.FunctionDefinition[]): CallGraph {
	const byID = new Map<ast.FunctionID, ast.FunctionDefinition>();
	const byName = new DefaultMap<string, ast.FunctionID[]>(() => []);
	for (const fn of functions) {
		if (byID.has(fn.id)) {
			throw new InternalCompilerError("function id `" + fn.id + "` is defined more than once");
		}
		byID.set(fn.id, fn);
		byName.get(fn.name).push(fn.id);
	}

	const graph = new CallGraph(byID);
	for (const fn of functions) {
		forEachCall(fn.body, call => {
			graph.addCall({
				caller: fn.id,
				target: bindTarget(call.target, byID, byName),
				arguments: call.arguments,
				location: call.location,
			});
		});
	}
	return graph;
}

function bindTarget(
	target: ast.CallTarget,
	byID: ReadonlyMap<ast.FunctionID, ast.FunctionDefinition>,
	byName: DefaultMap<string, ast.FunctionID[]>,
): ResolvedTarget {
	if (target.tag === "internal") {
		if (!byID.has(target.function)) {
			throw new InternalCompilerError("call to undefined function id `" + target.function + "`");
		}
		return target;
	} else if (target.tag === "external") {
		return target;
	}

	const candidates = byName.has(target.name) ? byName.get(target.name) : [];
	if (candidates.length === 1) {
		return { tag: "internal", function: candidates[0] };
	} else if (candidates.length > 1) {
		throw new InternalCompilerError("the name `" + target.name + "` refers to " + candidates.length + " functions");
	}
	return { tag: "external", qualifiedName: target.name };
}
