import { InternalCompilerError } from "./diagnostics.js";

/**
 * `DefaultMap` is a `Map` which creates (and retains) a value the first time
 * a missing key is requested.
 */
export class DefaultMap<K, V> {
	private map = new Map<K, V>();
	constructor(private defaulter: (k: K) => V) { }

	get(key: K): V {
		const existing = this.map.get(key);
		if (existing !== undefined) {
			return existing;
		}
		const v = this.defaulter(key);
		this.map.set(key, v);
		return v;
	}

	has(key: K): boolean {
		return this.map.has(key);
	}

	get size(): number {
		return this.map.size;
	}

	clear(): void {
		this.map.clear();
	}

	*[Symbol.iterator](): Generator<[K, V]> {
		yield* this.map[Symbol.iterator]();
	}
}

/**
 * DisjointSet implements the "disjoint set" (a.k.a "union find")
 * data-structure, which tracks the set of components in an undirected graph as
 * edges are added.
 */
export class DisjointSet<E> {
	private parents: Map<E, E> = new Map();
	private ranks: Map<E, number> = new Map();

	init(e: E): void {
		if (!this.parents.has(e)) {
			this.parents.set(e, e);
			this.ranks.set(e, 0);
		}
	}

	private parentOf(e: E): E {
		const parent = this.parents.get(e);
		if (parent === undefined) {
			throw new InternalCompilerError("DisjointSet element was not initialized");
		}
		return parent;
	}

	/**
	 * representative returns a "representative" element of the given object's
	 * equivalence class, such that two elements are members of the same
	 * equivalence class if and only if their representatives are the same.
	 */
	representative(e: E): E {
		this.init(e);
		while (true) {
			const parent = this.parentOf(e);
			if (parent === e) {
				break;
			}
			const grandparent = this.parentOf(parent);
			this.parents.set(e, grandparent);
			e = grandparent;
		}
		return e;
	}

	compareEqual(a: E, b: E): boolean {
		return this.representative(a) === this.representative(b);
	}

	/**
	 * union merges the equivalence classes of a and b.
	 *
	 * returns false when the objects were already members of the same
	 * equivalence class.
	 */
	union(a: E, b: E): boolean {
		const ra = this.representative(a);
		const rb = this.representative(b);
		if (ra === rb) {
			return false;
		}

		const rankA = this.ranks.get(ra) ?? 0;
		const rankB = this.ranks.get(rb) ?? 0;
		const [child, parent] = rankA < rankB ? [ra, rb] : [rb, ra];
		this.parents.set(child, parent);
		if (rankA === rankB) {
			this.ranks.set(parent, rankA + 1);
		}
		return true;
	}

	/**
	 * components returns the equivalence classes, each listed in the order
	 * its elements were first initialized. Classes are ordered by their
	 * earliest element.
	 */
	components(): E[][] {
		const components = new DefaultMap<E, E[]>(() => []);
		for (const e of this.parents.keys()) {
			components.get(this.representative(e)).push(e);
		}
		return [...components].map(([_, members]) => members);
	}
}

/** `compareStrings` orders strings by UTF-16 code units, independent of locale. */
export function compareStrings(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}
