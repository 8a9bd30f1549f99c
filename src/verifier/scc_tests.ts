import * as ast from "./ast.js";
import { buildCallGraph, DirectedGraph } from "./callgraph.js";
import { callNamed, defineFunction, evaluate } from "./construct.js";
import { InternalCompilerError } from "./diagnostics.js";
import { decompose, independentGroups } from "./scc.js";
import { assert } from "./test.js";

function names(components: readonly (readonly ast.FunctionID[])[]): string[][] {
	return components.map(component => component.map(id => id.toString()));
}

function calling(id: string, ...callees: string[]): ast.FunctionDefinition {
	return defineFunction({ id, body: callees.map(callee => evaluate(callNamed(callee))) });
}

export const tests = {
	"callees-come-first"() {
		const graph = buildCallGraph([
			calling("a", "b"),
			calling("b", "a", "c"),
			calling("c"),
			calling("d", "d"),
			calling("e"),
		]);
		const decomposition = decompose(graph);

		assert(names(decomposition.components), "is equal to", [["c"], ["a", "b"], ["d"], ["e"]]);
		assert(decomposition.dependencies, "is equal to", [[], [0], [], []]);
		assert(decomposition.recursive, "is equal to", [false, true, true, false]);
		assert([...decomposition.componentOf].map(([id, i]) => id + "=" + i), "is equal to", ["c=0", "a=1", "b=1", "d=2", "e=3"]);
		assert(independentGroups(decomposition), "is equal to", [[0, 1], [2], [3]]);
	},
	"every-vertex-in-one-component"() {
		const graph = buildCallGraph([
			calling("main", "parse", "run"),
			calling("parse", "lex"),
			calling("lex"),
			calling("run", "eval"),
			calling("eval", "apply", "lex"),
			calling("apply", "eval"),
		]);
		const decomposition = decompose(graph);

		const seen = names(decomposition.components).flat().sort();
		assert(seen, "is equal to", ["apply", "eval", "lex", "main", "parse", "run"]);
		for (let i = 0; i < decomposition.components.length; i++) {
			for (const dependency of decomposition.dependencies[i]) {
				assert(dependency < i, "is equal to", true);
			}
		}
		assert(names(decomposition.components).pop(), "is equal to", ["main"]);
		assert(decomposition.componentOf.get(ast.functionID("eval")), "is equal to", decomposition.componentOf.get(ast.functionID("apply")));
	},
	"deep-chains-do-not-recurse"() {
		const n = 10_000;
		const functions: ast.FunctionDefinition[] = [];
		for (let i = 0; i < n; i++) {
			functions.push(i + 1 < n ? calling("f" + i, "f" + (i + 1)) : calling("f" + i));
		}
		const decomposition = decompose(buildCallGraph(functions));

		assert(decomposition.components.length, "is equal to", n);
		assert(names(decomposition.components.slice(0, 1)), "is equal to", [["f" + (n - 1)]]);
		assert(names(decomposition.components.slice(n - 1)), "is equal to", [["f0"]]);
		assert(decomposition.dependencies[n - 1], "is equal to", [n - 2]);
		assert(independentGroups(decomposition).length, "is equal to", 1);
	},
	"edge-outside-the-graph"() {
		const graph: DirectedGraph<null, number> = {
			getVertexes: () => [1],
			getOutgoing: from => [{ from, edge: null, to: 2 }],
		};
		assert(() => decompose(graph), "throws", InternalCompilerError);
	},
};
