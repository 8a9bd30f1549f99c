import { DirectedGraph } from "./callgraph.js";
import { DisjointSet } from "./data.js";
import { InternalCompilerError } from "./diagnostics.js";

export interface Decomposition<V> {
	/// The strongly connected components, ordered so that every edge from a
	/// vertex of `components[a]` to a vertex of `components[b]` (a ≠ b) has
	/// b < a. Callees come before their callers.
	components: V[][],

	/// `componentOf.get(v)` is the index of the component containing `v`.
	componentOf: Map<V, number>,

	/// `dependencies[a]` lists, in increasing order and without repetition,
	/// the components `b ≠ a` which `components[a]` has an edge to.
	dependencies: number[][],

	/// `recursive[a]` holds when a vertex of `components[a]` can reach itself:
	/// the component has more than one vertex, or a vertex with a self-edge.
	recursive: boolean[],
}

type Frame<V> = {
	vertex: V,
	successors: V[],
	cursor: number,
};

/**
 * `decompose(graph)` finds the strongly connected components of the graph
 * using Tarjan's algorithm.
 *
 * The traversal uses an explicit stack, so arbitrarily deep call chains do
 * not exhaust the JavaScript call stack. Vertexes are visited in the order
 * `getVertexes()` lists them, so the result is deterministic.
 */
export function decompose<E, V>(graph: DirectedGraph<E, V>): Decomposition<V> {
	const vertexes = graph.getVertexes();
	const known = new Set(vertexes);

	const index = new Map<V, number>();
	const lowlink = new Map<V, number>();
	const onStack = new Set<V>();
	const stack: V[] = [];
	const components: V[][] = [];
	let nextIndex = 0;

	const successorsOf = (v: V): V[] => graph.getOutgoing(v).map(edge => {
		if (!known.has(edge.to)) {
			throw new InternalCompilerError("edge to a vertex which is not in the graph");
		}
		return edge.to;
	});

	const lookup = (map: Map<V, number>, v: V): number => {
		const n = map.get(v);
		if (n === undefined) {
			throw new InternalCompilerError("decompose: vertex was not visited");
		}
		return n;
	};

	for (const root of vertexes) {
		if (index.has(root)) {
			continue;
		}

		const work: Frame<V>[] = [];
		const enter = (v: V) => {
			index.set(v, nextIndex);
			lowlink.set(v, nextIndex);
			nextIndex += 1;
			stack.push(v);
			onStack.add(v);
			work.push({ vertex: v, successors: successorsOf(v), cursor: 0 });
		};

		enter(root);
		while (work.length !== 0) {
			const frame = work[work.length - 1];
			if (frame.cursor < frame.successors.length) {
				const w = frame.successors[frame.cursor];
				frame.cursor += 1;
				if (!index.has(w)) {
					enter(w);
				} else if (onStack.has(w)) {
					lowlink.set(frame.vertex, Math.min(lookup(lowlink, frame.vertex), lookup(index, w)));
				}
				continue;
			}

			work.pop();
			const v = frame.vertex;
			if (lookup(lowlink, v) === lookup(index, v)) {
				const component: V[] = [];
				while (true) {
					const w = stack.pop();
					if (w === undefined) {
						throw new InternalCompilerError("decompose: component stack underflow");
					}
					onStack.delete(w);
					component.push(w);
					if (w === v) {
						break;
					}
				}
				// Members are listed in the order they were first visited.
				components.push(component.reverse());
			}

			const parent = work[work.length - 1];
			if (parent !== undefined) {
				lowlink.set(parent.vertex, Math.min(lookup(lowlink, parent.vertex), lookup(lowlink, v)));
			}
		}
	}

	const componentOf = new Map<V, number>();
	components.forEach((component, i) => {
		for (const v of component) {
			componentOf.set(v, i);
		}
	});

	const dependencies: number[][] = [];
	const recursive: boolean[] = [];
	for (let i = 0; i < components.length; i++) {
		const targets = new Set<number>();
		let selfEdge = false;
		for (const v of components[i]) {
			for (const edge of graph.getOutgoing(v)) {
				const target = lookup(componentOf, edge.to);
				if (target === i) {
					selfEdge = true;
				} else if (target > i) {
					throw new InternalCompilerError("decompose: components are not in dependency order");
				} else {
					targets.add(target);
				}
			}
		}
		dependencies.push([...targets].sort((a, b) => a - b));
		recursive.push(components[i].length > 1 || selfEdge);
	}

	return { components, componentOf, dependencies, recursive };
}

/**
 * `independentGroups(decomposition)` partitions the components into groups
 * with no edge between any two groups. Groups can be processed concurrently.
 *
 * Each group lists its component indexes in increasing (dependency) order.
 */
export function independentGroups<V>(decomposition: Decomposition<V>): number[][] {
	const groups = new DisjointSet<number>();
	for (let i = 0; i < decomposition.components.length; i++) {
		groups.init(i);
		for (const dependency of decomposition.dependencies[i]) {
			groups.union(i, dependency);
		}
	}
	return groups.components().map(group => group.sort((a, b) => a - b));
}
