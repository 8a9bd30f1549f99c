import { compareStrings } from "./data.js";
import { InternalCompilerError } from "./diagnostics.js";
import * as formula from "./formula.js";
import { Formula, Linear, Model, ceilDiv, floorDiv } from "./formula.js";
import { Literal } from "./sat.js";
import { Budget, RefutationResult, SMTSolver, TheoryVerdict, UnknownReason } from "./smt.js";
import { NO_TRACE, Tracer } from "./trace.js";

/// `Bound` is `linear ≤ 0`, with the literals whose assignment asserted it.
interface Bound {
	linear: Linear,
	origins: ReadonlySet<Literal>,
}

export type IntegerResult = { tag: "sat", model: Map<string, bigint> }
	| { tag: "unsat", core: Set<Literal> }
	| { tag: "unknown", reason: UnknownReason };

export interface SearchLimits {
	/// How many nested integer case splits are explored.
	maxDepth: number,

	/// How many case splits are explored in total.
	maxNodes: number,

	/// How many constraints an elimination step may produce.
	maxConstraints: number,
}

export const DEFAULT_LIMITS: SearchLimits = {
	maxDepth: 16,
	maxNodes: 200,
	maxConstraints: 4_000,
};

type Elimination = IntegerResult | { tag: "split", variable: string, below: bigint };

function union<T>(...sets: ReadonlySet<T>[]): Set<T> {
	const out = new Set<T>();
	for (const set of sets) {
		for (const e of set) {
			out.add(e);
		}
	}
	return out;
}

/// `closestToZero` picks the integer in `[lo, hi]` with least magnitude.
function closestToZero(lo: bigint | null, hi: bigint | null): bigint {
	if (lo !== null && lo > 0n) {
		return lo;
	} else if (hi !== null && hi < 0n) {
		return hi;
	}
	return 0n;
}

/**
 * `IntegerSearch` decides a conjunction of linear constraints over the
 * integers.
 *
 * Variables are eliminated one at a time by Fourier-Motzkin elimination,
 * tightening each derived constraint to its integer consequence. A model is
 * then rebuilt by back-substitution. When a variable's integer range turns
 * out empty (its rational range lies strictly between two integers) the
 * search splits on which side of that gap the variable lies.
 *
 * An unsatisfiable conjunction yields the origins of the constraints used
 * to derive the contradiction.
 */
export class IntegerSearch {
	private nodes = 0;

	constructor(
		private readonly budget: Budget,
		private readonly limits: SearchLimits = DEFAULT_LIMITS,
	) { }

	solve(bounds: Bound[]): IntegerResult {
		return this.branch(bounds, 0);
	}

	private branch(bounds: Bound[], depth: number): IntegerResult {
		this.nodes += 1;
		if (depth > this.limits.maxDepth || this.nodes > this.limits.maxNodes) {
			return { tag: "unknown", reason: "complexity" };
		}
		const stopped = this.budget.exhausted();
		if (stopped !== null) {
			return { tag: "unknown", reason: stopped };
		}

		const result = this.eliminate(bounds);
		if (result.tag !== "split") {
			return result;
		}

		// Case split, x ≤ k or x ≥ k + 1, which needs no justification.
		const x = Linear.variable(result.variable);
		const low = this.branch([...bounds, { linear: x.addConstant(-result.below), origins: new Set() }], depth + 1);
		if (low.tag === "sat") {
			return low;
		}
		const high = this.branch([
			...bounds,
			{ linear: x.scale(-1n).addConstant(result.below + 1n), origins: new Set() },
		], depth + 1);
		if (high.tag === "sat" || high.tag === "unknown") {
			return high;
		} else if (low.tag === "unknown") {
			return low;
		}
		return { tag: "unsat", core: union(low.core, high.core) };
	}

	private eliminate(input: Bound[]): Elimination {
		const byKey = new Map<string, Bound>();
		for (const bound of input) {
			const linear = bound.linear.tighten();
			if (linear.isConstant()) {
				if (linear.constant > 0n) {
					return { tag: "unsat", core: new Set(bound.origins) };
				}
				continue;
			}
			const key = linear.key();
			if (!byKey.has(key)) {
				byKey.set(key, { linear, origins: bound.origins });
			}
		}
		const bounds = [...byKey.values()];

		const counts = new Map<string, { lower: number, upper: number }>();
		for (const bound of bounds) {
			for (const [name, c] of bound.linear.terms) {
				const count = counts.get(name) ?? { lower: 0, upper: 0 };
				if (c > 0n) {
					count.upper += 1;
				} else {
					count.lower += 1;
				}
				counts.set(name, count);
			}
		}
		if (counts.size === 0) {
			return { tag: "sat", model: new Map() };
		}

		// Eliminate the variable producing the fewest new constraints.
		let x = "";
		let cost = Infinity;
		for (const name of [...counts.keys()].sort(compareStrings)) {
			const count = counts.get(name) ?? { lower: 0, upper: 0 };
			const c = count.lower * count.upper - count.lower - count.upper;
			if (c < cost) {
				cost = c;
				x = name;
			}
		}

		const lowers: Bound[] = [];
		const uppers: Bound[] = [];
		const projected: Bound[] = [];
		for (const bound of bounds) {
			const c = bound.linear.coefficient(x);
			if (c > 0n) {
				uppers.push(bound);
			} else if (c < 0n) {
				lowers.push(bound);
			} else {
				projected.push(bound);
			}
		}
		for (const upper of uppers) {
			for (const lower of lowers) {
				const a = upper.linear.coefficient(x);
				const b = -lower.linear.coefficient(x);
				projected.push({
					linear: upper.linear.scale(b).add(lower.linear.scale(a)),
					origins: union(upper.origins, lower.origins),
				});
			}
		}
		if (projected.length > this.limits.maxConstraints) {
			return { tag: "unknown", reason: "complexity" };
		}
		const stopped = this.budget.exhausted();
		if (stopped !== null) {
			return { tag: "unknown", reason: stopped };
		}

		const inner = this.eliminate(projected);
		if (inner.tag !== "sat") {
			return inner;
		}

		// Variables occurring only alongside `x` are unconstrained by the
		// projection.
		const model = inner.model;
		for (const bound of [...lowers, ...uppers]) {
			for (const name of bound.linear.terms.keys()) {
				if (name !== x && !model.has(name)) {
					model.set(name, 0n);
				}
			}
		}

		let hi: bigint | null = null;
		for (const upper of uppers) {
			// a·x + rest ≤ 0, so x ≤ ⌊-rest / a⌋.
			const a = upper.linear.coefficient(x);
			const limit = floorDiv(-upper.linear.withoutVariable(x).evaluate(model), a);
			hi = hi === null || limit < hi ? limit : hi;
		}
		let lo: bigint | null = null;
		for (const lower of lowers) {
			// -b·x + rest ≤ 0, so x ≥ ⌈rest / b⌉.
			const b = -lower.linear.coefficient(x);
			const limit = ceilDiv(lower.linear.withoutVariable(x).evaluate(model), b);
			lo = lo === null || limit > lo ? limit : lo;
		}

		if (lo !== null && hi !== null && lo > hi) {
			return { tag: "split", variable: x, below: hi };
		}
		model.set(x, closestToZero(lo, hi));
		return { tag: "sat", model };
	}
}

type TermMeaning = { tag: "atom", linear: Linear }
	| { tag: "bool", name: string }
	| { tag: "gate" };

/**
 * `LinearArithmeticSolver` decides formulas of linear integer arithmetic
 * with Boolean structure.
 *
 * Each distinct atom `L ≤ 0` becomes one literal; since over the integers
 * `¬(L ≤ 0)` is `-L + 1 ≤ 0`, an atom and its complement share a literal.
 */
export class LinearArithmeticSolver extends SMTSolver<Formula, Model> {
	/// Term 1 is constantly true.
	private readonly trueTerm = 1;
	private readonly meanings: TermMeaning[] = [{ tag: "gate" }, { tag: "gate" }];
	private readonly atoms = new Map<string, Literal>();
	private readonly boolVariables = new Map<string, Literal>();

	constructor(
		tracer: Tracer = NO_TRACE,
		private readonly limits: SearchLimits = DEFAULT_LIMITS,
	) {
		super(tracer);
		this.clauses.push([this.trueTerm]);
	}

	private allocate(meaning: TermMeaning): Literal {
		this.meanings.push(meaning);
		return this.meanings.length - 1;
	}

	showLiteral(literal: Literal): string {
		const term = literal > 0 ? literal : -literal;
		const meaning = this.meanings[term];
		let shown: string;
		if (term === this.trueTerm) {
			shown = "true";
		} else if (meaning === undefined) {
			throw new InternalCompilerError("LinearArithmeticSolver: unknown term " + term);
		} else if (meaning.tag === "atom") {
			shown = "(" + meaning.linear.display() + " <= 0)";
		} else if (meaning.tag === "bool") {
			shown = meaning.name;
		} else {
			shown = "g" + term;
		}
		return literal > 0 ? shown : "!" + shown;
	}

	private atom(linear: Linear): Literal {
		const canonical = linear.tighten();
		const key = canonical.key();
		const existing = this.atoms.get(key);
		if (existing !== undefined) {
			return existing;
		}
		const complement = this.atoms.get(canonical.scale(-1n).addConstant(1n).tighten().key());
		if (complement !== undefined) {
			return -complement;
		}
		const literal = this.allocate({ tag: "atom", linear: canonical });
		this.atoms.set(key, literal);
		return literal;
	}

	/// `encode` returns a literal equivalent to `f`, adding the clauses
	/// defining any gates it introduces.
	private encode(f: Formula, clauses: Literal[][]): Literal {
		switch (f.tag) {
			case "constant":
				return f.value ? this.trueTerm : -this.trueTerm;
			case "bool-variable": {
				const existing = this.boolVariables.get(f.name);
				if (existing !== undefined) {
					return existing;
				}
				const literal = this.allocate({ tag: "bool", name: f.name });
				this.boolVariables.set(f.name, literal);
				return literal;
			}
			case "le":
				return this.atom(f.linear);
			case "not":
				return -this.encode(f.formula, clauses);
			case "and": {
				const children = f.formulas.map(child => this.encode(child, clauses));
				const gate = this.allocate({ tag: "gate" });
				for (const child of children) {
					clauses.push([-gate, child]);
				}
				clauses.push([gate, ...children.map(child => -child)]);
				return gate;
			}
			case "or": {
				const children = f.formulas.map(child => this.encode(child, clauses));
				const gate = this.allocate({ tag: "gate" });
				for (const child of children) {
					clauses.push([gate, -child]);
				}
				clauses.push([-gate, ...children]);
				return gate;
			}
			case "iff": {
				const a = this.encode(f.left, clauses);
				const b = this.encode(f.right, clauses);
				const gate = this.allocate({ tag: "gate" });
				clauses.push([-gate, -a, b], [-gate, a, -b], [gate, a, b], [gate, -a, -b]);
				return gate;
			}
		}
	}

	protected clausify(constraint: Formula): Literal[][] {
		const clauses: Literal[][] = [];
		const root = this.encode(constraint, clauses);
		clauses.push([root]);
		return clauses;
	}

	protected checkTheory(assignment: Literal[], budget: Budget): TheoryVerdict<Model> {
		const bounds: Bound[] = [];
		const bools = new Map<string, boolean>();
		for (const literal of assignment) {
			const meaning = this.meanings[literal > 0 ? literal : -literal];
			if (meaning === undefined) {
				throw new InternalCompilerError("LinearArithmeticSolver: unknown term " + literal);
			} else if (meaning.tag === "atom") {
				const linear = literal > 0 ? meaning.linear : meaning.linear.scale(-1n).addConstant(1n);
				bounds.push({ linear, origins: new Set([literal]) });
			} else if (meaning.tag === "bool") {
				bools.set(meaning.name, literal > 0);
			}
		}

		const result = new IntegerSearch(budget, this.limits).solve(bounds);
		if (result.tag === "sat") {
			return { tag: "consistent", model: { ints: result.model, bools } };
		} else if (result.tag === "unknown") {
			return result;
		} else if (result.core.size === 0) {
			throw new InternalCompilerError("LinearArithmeticSolver: contradiction without origins");
		}
		this.tracer.mark(["theory conflict of", result.core.size, "atoms"]);
		return { tag: "conflict", conflictClauses: [[...result.core].map(literal => -literal)] };
	}
}

/**
 * `checkSat(formulas, budget)` searches for a model satisfying every one of
 * `formulas`.
 */
export function checkSat(
	formulas: Formula[],
	budget: Budget,
	tracer: Tracer = NO_TRACE,
	limits: SearchLimits = DEFAULT_LIMITS,
): RefutationResult<Model> {
	const solver = new LinearArithmeticSolver(tracer, limits);
	solver.addConstraint(formula.and(...formulas));
	return solver.attemptRefutation(budget);
}
