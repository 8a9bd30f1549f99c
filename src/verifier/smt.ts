import { InternalCompilerError } from "./diagnostics.js";
import { CDCLSolver, Literal } from "./sat.js";
import { NO_TRACE, Tracer } from "./trace.js";

/// Why a query was given up on.
export type UnknownReason = "timeout" | "cancelled" | "complexity";

/**
 * `Budget` bounds the work spent on queries: a wall-clock deadline, and
 * optionally an `AbortSignal` through which the host cancels the pass.
 */
export class Budget {
	private readonly deadline: number;

	constructor(
		timeoutMs: number,
		private readonly signal?: AbortSignal,
		private readonly clock: () => number = () => performance.now(),
	) {
		this.deadline = clock() + timeoutMs;
	}

	/// `exhausted()` is `null` while work may continue.
	exhausted(): "timeout" | "cancelled" | null {
		if (this.signal?.aborted) {
			return "cancelled";
		} else if (this.clock() >= this.deadline) {
			return "timeout";
		}
		return null;
	}
}

export type RefutationResult<Model> = { tag: "refuted" }
	| { tag: "model", model: Model }
	| { tag: "unknown", reason: UnknownReason };

/// `TheoryVerdict` is a theory solver's judgement of a Boolean assignment.
/// A conflict carries clauses, over literals of the assignment, which every
/// model of the theory satisfies but the assignment falsifies.
export type TheoryVerdict<Model> = { tag: "consistent", model: Model }
	| { tag: "conflict", conflictClauses: Literal[][] }
	| { tag: "unknown", reason: UnknownReason };

/**
 * `SMTSolver` decides "satisfiability modulo theories" by lazy clause
 * generation: a SAT solver proposes Boolean models of the clausified
 * constraints, and the theory solver either accepts one or explains why it is
 * infeasible with a clause that rules it out.
 *
 * Refutations are sound. A model is returned only when the theory solver
 * accepts it.
 */
export abstract class SMTSolver<E, Model> {
	protected clauses: Literal[][] = [];

	constructor(protected readonly tracer: Tracer = NO_TRACE) { }

	/// `addConstraint(constraint)` requires every later model to satisfy
	/// `constraint`.
	addConstraint(constraint: E): void {
		this.clauses.push(...this.clausify(constraint));
	}

	abstract showLiteral(literal: Literal): string;

	showFormula(clauses: Literal[][]): string[] {
		return clauses.map(clause => clause.length === 0
			? "false"
			: clause.map(literal => this.showLiteral(literal)).join("  ||  "));
	}

	/**
	 * `attemptRefutation(budget)` searches for a model of the constraints
	 * added so far.
	 *
	 * @returns `"refuted"` when the constraints provably have no model in the
	 * theory, and `"unknown"` when the budget ran out first or the theory
	 * solver gave up.
	 */
	attemptRefutation(budget: Budget): RefutationResult<Model> {
		this.tracer.start("attemptRefutation");
		try {
			return this.search(budget);
		} finally {
			this.tracer.stop("attemptRefutation");
		}
	}

	private search(budget: Budget): RefutationResult<Model> {
		this.tracer.mark(["instance of", this.clauses.length, "clauses"], () => this.showFormula(this.clauses).join("\n"));

		let maxTerm = 1;
		for (const clause of this.clauses) {
			if (clause.length === 0) {
				return { tag: "refuted" };
			}
			for (const literal of clause) {
				maxTerm = Math.max(maxTerm, literal > 0 ? literal : -literal);
			}
		}

		const solver = new CDCLSolver();
		solver.initTerms(maxTerm);
		for (const clause of this.clauses) {
			solver.addClause(clause);
		}

		for (let round = 1; ; round++) {
			const stopped = budget.exhausted();
			if (stopped !== null) {
				return { tag: "unknown", reason: stopped };
			}

			const booleanModel = solver.solve(() => budget.exhausted() !== null);
			solver.reset();
			if (booleanModel === "unsatisfiable") {
				this.tracer.mark(["refuted after", round, "rounds"]);
				return { tag: "refuted" };
			} else if (booleanModel === "interrupted") {
				return { tag: "unknown", reason: budget.exhausted() ?? "timeout" };
			}

			const verdict = this.checkTheory(booleanModel, budget);
			if (verdict.tag === "consistent") {
				this.tracer.mark(["model found after", round, "rounds"]);
				return { tag: "model", model: verdict.model };
			} else if (verdict.tag === "unknown") {
				return verdict;
			} else if (verdict.conflictClauses.length === 0) {
				throw new InternalCompilerError("SMTSolver: theory conflict without any clause");
			}

			for (const clause of verdict.conflictClauses) {
				this.tracer.mark("learned theory clause", () => this.showFormula([clause]).join("\n"));
				if (clause.length === 0) {
					return { tag: "refuted" };
				}
				solver.addClause(clause);
			}
		}
	}

	/**
	 * `checkTheory(assignment, budget)` asks the theory solver whether the
	 * theory atoms of a total Boolean assignment can hold together.
	 */
	protected abstract checkTheory(assignment: Literal[], budget: Budget): TheoryVerdict<Model>;

	/// `clausify` returns clauses equisatisfiable with `constraint`, allocating
	/// literals for its atoms and subformulas as needed.
	protected abstract clausify(constraint: E): Literal[][];
}
