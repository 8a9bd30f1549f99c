import { InternalCompilerError } from "./diagnostics.js";

/**
 * `Literal` is a non-zero integer naming a Boolean variable ("term") and a
 * polarity: `+t` holds when term `t` is true, and `-t` when it is false.
 */
export type Literal = number;

/// `ClauseID` is an index into the clauses of a `CDCLSolver`.
type ClauseID = number;

/// The antecedent of a term assigned by a decision rather than by
/// propagation.
const DECISION = -1;

/// `SolveResult` is the outcome of `CDCLSolver.solve`:
/// * `"unsatisfiable"`: no assignment extending the assignment at the time
///   of the call satisfies every clause.
/// * `"interrupted"`: the caller asked the search to stop.
/// * `Literal[]`: a total satisfying assignment, in assignment order.
export type SolveResult = "unsatisfiable" | "interrupted" | Literal[];

function termOf(literal: Literal): number {
	return literal > 0 ? literal : -literal;
}

/// `PendingUnits` holds literals forced by unit clauses which have not yet
/// been assigned, each with the clause forcing it.
class PendingUnits {
	private readonly byTerm = new Map<number, { literal: Literal, antecedent: ClauseID }>();

	/// `offer` records a forced literal. It returns the antecedent of the
	/// opposite literal when one is already pending, which is a conflict.
	offer(literal: Literal, antecedent: ClauseID): ClauseID | null {
		const existing = this.byTerm.get(termOf(literal));
		if (existing === undefined) {
			this.byTerm.set(termOf(literal), { literal, antecedent });
			return null;
		} else if (existing.literal !== literal) {
			return existing.antecedent;
		}
		return null;
	}

	/// `take` removes and returns some pending literal.
	take(): { literal: Literal, antecedent: ClauseID } | null {
		for (const [term, unit] of this.byTerm) {
			this.byTerm.delete(term);
			return unit;
		}
		return null;
	}

	clear(): void {
		this.byTerm.clear();
	}
}

/// `Conflict` describes a term forced both ways during propagation.
interface Conflict {
	literal: Literal,
	literalAntecedent: ClauseID,
	oppositeAntecedent: ClauseID,
}

/**
 * `CDCLSolver` decides the satisfiability of a conjunction of clauses using
 * conflict-driven clause learning.
 *
 * Unit propagation uses two watched literals per clause: the first two
 * entries of each clause array are its watches, and the watches of an
 * unsatisfied clause are never falsified while another unfalsified literal
 * remains. Decisions follow a cVSIDS ordering, which favors terms appearing
 * in recently learned clauses.
 */
export class CDCLSolver {
	private readonly clauses: Literal[][] = [];

	/// `watching[2t]` lists the clauses watching `+t`, and `watching[2t+1]`
	/// those watching `-t`.
	private readonly watching: ClauseID[][] = [];

	/// `occurrences[2t]` and `occurrences[2t+1]` count the appearances of `+t`
	/// and `-t` in clauses, which chooses the polarity of decisions.
	private readonly occurrences: number[] = [];

	/// `value[t]` is `1` or `-1` for assigned terms, and `0` otherwise.
	private readonly value: (-1 | 0 | 1)[] = [0];

	private readonly trail: Literal[] = [];

	/// `trailIndex[t]` is the position of term `t` in the trail, or `-1`.
	private readonly trailIndex: number[] = [-1];

	private readonly level: number[] = [0];
	private readonly antecedent: ClauseID[] = [DECISION];
	private decisionLevel = 0;

	get termCount(): number {
		return this.value.length - 1;
	}

	/// `initTerms(n)` makes terms `1` through `n` available to clauses.
	initTerms(n: number): void {
		for (let t = this.value.length; t <= n; t++) {
			this.value.push(0);
			this.trailIndex.push(-1);
			this.level.push(0);
			this.antecedent.push(DECISION);
			this.watching[2 * t] = [];
			this.watching[2 * t + 1] = [];
			this.occurrences[2 * t] = 0;
			this.occurrences[2 * t + 1] = 0;
		}
	}

	private slot(literal: Literal): number {
		return literal > 0 ? 2 * literal : 2 * -literal + 1;
	}

	private isTrue(literal: Literal): boolean {
		return this.value[termOf(literal)] * literal > 0;
	}

	private isFalse(literal: Literal): boolean {
		return this.value[termOf(literal)] * literal < 0;
	}

	/// `assignment()` returns the assigned literals in assignment order.
	assignment(): Literal[] {
		return this.trail.slice();
	}

	/**
	 * `addClause(literals)` adds the disjunction of `literals`.
	 *
	 * Repeated literals are dropped. A clause containing a literal and its
	 * negation is always satisfied and is not stored, so `"tautology"` is
	 * returned in place of an id.
	 *
	 * At least one literal must be unassigned.
	 */
	addClause(literals: readonly Literal[]): ClauseID | "tautology" {
		const clause: Literal[] = [];
		const seen = new Map<number, Literal>();
		let unassigned = false;
		for (const literal of literals) {
			const term = termOf(literal);
			if (term >= this.value.length) {
				throw new InternalCompilerError("CDCLSolver.addClause: term " + term + " was not initialized");
			}
			const previous = seen.get(term);
			if (previous === undefined) {
				seen.set(term, literal);
				clause.push(literal);
				unassigned = unassigned || this.value[term] === 0;
			} else if (previous !== literal) {
				return "tautology";
			}
		}
		if (!unassigned) {
			throw new InternalCompilerError("CDCLSolver.addClause: every literal of [" + clause + "] is assigned");
		}

		for (const literal of clause) {
			this.occurrences[this.slot(literal)] += 1;
		}

		// Unassigned literals first, then the most recently assigned, so that
		// the watches are as fresh as possible.
		const rank = (literal: Literal) => {
			const index = this.trailIndex[termOf(literal)];
			return index < 0 ? Infinity : index;
		};
		clause.sort((a, b) => rank(b) - rank(a));

		const id = this.clauses.length;
		this.clauses.push(clause);
		for (const literal of clause.slice(0, 2)) {
			this.watching[this.slot(literal)].push(id);
		}
		return id;
	}

	/**
	 * `solve(shouldStop)` searches for an assignment satisfying every clause.
	 *
	 * `shouldStop` is polled between decisions; once it returns `true` the
	 * search is abandoned. The assignment found is left in place; call
	 * `reset()` before adding clauses or solving again.
	 */
	solve(shouldStop: () => boolean = () => false): SolveResult {
		if (this.decisionLevel !== 0) {
			throw new InternalCompilerError("CDCLSolver.solve: requires decision level 0");
		} else if (this.termCount === 0) {
			throw new InternalCompilerError("CDCLSolver.solve: requires at least one term");
		}

		const pending = this.collectUnits();
		if (pending === "unsatisfiable" || this.propagate(pending) !== null) {
			return "unsatisfiable";
		}

		const activity = this.value.map(() => 0);
		for (const clause of this.clauses) {
			if (clause.length >= 2) {
				for (const literal of clause) {
					activity[termOf(literal)] += 1;
				}
			}
		}
		const order: number[] = [];
		for (let t = 1; t < this.value.length; t++) {
			order.push(t);
		}
		const byActivity = (a: number, b: number) => activity[b] - activity[a];
		order.sort(byActivity);

		let cursor = 0;
		let steps = 0;
		while (this.trail.length < this.termCount) {
			steps += 1;
			if (steps % 64 === 0 && shouldStop()) {
				return "interrupted";
			}

			const term = order[cursor];
			cursor = (cursor + 1) % order.length;
			if (this.value[term] !== 0) {
				continue;
			}

			const negative = this.occurrences[2 * term + 1];
			const positive = this.occurrences[2 * term];
			const decision = positive < negative ? term : -term;
			this.decisionLevel += 1;
			pending.offer(decision, DECISION);

			for (let conflict = this.propagate(pending); conflict !== null; conflict = this.propagate(pending)) {
				const learned = this.analyze(conflict);
				const asserting = this.backjump(learned);
				if (asserting === "unsatisfiable") {
					return "unsatisfiable";
				}
				const id = this.addClause(learned);
				if (id === "tautology") {
					throw new InternalCompilerError("CDCLSolver.solve: learned a tautology");
				}
				pending.clear();
				pending.offer(asserting, id);

				for (const literal of learned) {
					activity[termOf(literal)] += 1;
				}
				for (let t = 0; t < activity.length; t++) {
					activity[t] *= 0.99;
				}
				order.sort(byActivity);
				cursor = 0;
			}
		}
		return this.assignment();
	}

	/// `collectUnits` finds the clauses which are unit under the current
	/// assignment.
	private collectUnits(): PendingUnits | "unsatisfiable" {
		const pending = new PendingUnits();
		for (let id = 0; id < this.clauses.length; id++) {
			let open: Literal | null = null;
			let openCount = 0;
			let satisfied = false;
			for (const literal of this.clauses[id]) {
				if (this.isTrue(literal)) {
					satisfied = true;
					break;
				} else if (!this.isFalse(literal)) {
					open = literal;
					openCount += 1;
				}
			}
			if (!satisfied && openCount === 0) {
				return "unsatisfiable";
			} else if (!satisfied && openCount === 1 && open !== null && pending.offer(open, id) !== null) {
				return "unsatisfiable";
			}
		}
		return pending;
	}

	/// `propagate` assigns pending literals until none remain, or until a term
	/// is forced both ways.
	private propagate(pending: PendingUnits): Conflict | null {
		for (let unit = pending.take(); unit !== null; unit = pending.take()) {
			const forced = this.assign(unit.literal, unit.antecedent);
			for (const f of forced) {
				const opposite = pending.offer(f.literal, f.antecedent);
				if (opposite !== null) {
					pending.clear();
					return { literal: f.literal, literalAntecedent: f.antecedent, oppositeAntecedent: opposite };
				}
			}
		}
		return null;
	}

	/**
	 * `assign` makes `literal` true and updates the watches of the clauses
	 * watching its negation.
	 *
	 * It returns the literals which became forced.
	 */
	private assign(literal: Literal, antecedent: ClauseID): { literal: Literal, antecedent: ClauseID }[] {
		const term = termOf(literal);
		if (this.value[term] !== 0) {
			throw new InternalCompilerError("CDCLSolver.assign: term " + term + " is already assigned");
		}

		const forced: { literal: Literal, antecedent: ClauseID }[] = [];
		const watchers = this.watching[this.slot(-literal)];
		let kept = 0;
		for (const id of watchers) {
			const clause = this.clauses[id];
			const position = clause[0] === -literal ? 0 : 1;

			let satisfiedAt = -1;
			let openAt = -1;
			let openCount = 0;
			for (let i = 0; i < clause.length; i++) {
				if (this.isTrue(clause[i])) {
					satisfiedAt = i;
					break;
				} else if (!this.isFalse(clause[i])) {
					openCount += 1;
					openAt = i;
				}
			}

			if (satisfiedAt >= 0 && satisfiedAt <= 1) {
				watchers[kept] = id;
				kept += 1;
			} else if (satisfiedAt > 1) {
				// Move the watch to the satisfying literal.
				[clause[position], clause[satisfiedAt]] = [clause[satisfiedAt], clause[position]];
				this.watching[this.slot(clause[position])].push(id);
			} else if (openCount === 1) {
				// Only `-literal` itself is open.
				throw new InternalCompilerError("CDCLSolver.assign: assigning " + literal + " falsifies clause #" + id);
			} else if (openCount === 2) {
				// The other watch is the only remaining open literal.
				forced.push({ literal: clause[1 - position], antecedent: id });
				watchers[kept] = id;
				kept += 1;
			} else {
				// An unwatched open literal is the last one found.
				[clause[position], clause[openAt]] = [clause[openAt], clause[position]];
				this.watching[this.slot(clause[position])].push(id);
			}
		}
		watchers.length = kept;

		this.value[term] = literal > 0 ? 1 : -1;
		this.trailIndex[term] = this.trail.length;
		this.trail.push(literal);
		this.antecedent[term] = antecedent;
		this.level[term] = this.decisionLevel;
		return forced;
	}

	/**
	 * `analyze` derives a learned clause from a conflict by resolving away
	 * every literal of the current decision level which was implied by
	 * propagation, leaving the decision itself (the "rel_sat" scheme).
	 *
	 * Every literal of the learned clause is false under the current
	 * assignment, and only one belongs to the current decision level.
	 */
	private analyze(conflict: Conflict): Literal[] {
		const learned: Literal[] = [];
		const seen = new Set<Literal>();
		const queue: Literal[] = [conflict.literal, -conflict.literal];
		for (let i = 0; i < queue.length; i++) {
			const literal = queue[i];
			const term = termOf(literal);
			const conflicting = literal === conflict.literal || literal === -conflict.literal;

			let reason: ClauseID;
			if (literal === conflict.literal) {
				reason = conflict.literalAntecedent;
			} else if (literal === -conflict.literal) {
				reason = conflict.oppositeAntecedent;
			} else {
				reason = this.antecedent[term];
			}

			if (reason === DECISION || (!conflicting && this.level[term] < this.decisionLevel)) {
				learned.push(literal);
			} else {
				for (const other of this.clauses[reason]) {
					if (other !== literal && !seen.has(other)) {
						seen.add(other);
						queue.push(other);
					}
				}
			}
		}
		return learned;
	}

	/**
	 * `backjump(learned)` undoes decisions until `learned` is a unit clause,
	 * returning the literal it then forces.
	 *
	 * It returns `"unsatisfiable"` when `learned` consists only of literals
	 * falsified before any decision.
	 */
	private backjump(learned: readonly Literal[]): Literal | "unsatisfiable" {
		let highest = 0;
		let asserting: Literal | null = null;
		let tied = false;
		for (const literal of learned) {
			const level = this.level[termOf(literal)];
			if (level > highest) {
				highest = level;
				asserting = literal;
				tied = false;
			} else if (level === highest) {
				tied = true;
			}
		}

		let second = 0;
		for (const literal of learned) {
			const level = this.level[termOf(literal)];
			if (level < highest && level > second) {
				second = level;
			}
		}

		if (highest === 0 || asserting === null) {
			return "unsatisfiable";
		} else if (tied) {
			throw new InternalCompilerError("CDCLSolver.backjump: learned clause has several literals at the latest level");
		}
		this.backtrack(second);
		return asserting;
	}

	/// `backtrack(level)` undoes assignments made after decision level
	/// `level`.
	backtrack(level: number): void {
		while (this.decisionLevel > level && this.trail.length > 0) {
			const literal = this.trail.pop();
			if (literal === undefined) {
				break;
			}
			const term = termOf(literal);
			this.value[term] = 0;
			this.trailIndex[term] = -1;
			if (this.antecedent[term] === DECISION) {
				this.decisionLevel -= 1;
			}
		}
	}

	/// `reset()` undoes every assignment, including those made before the
	/// first decision.
	reset(): void {
		this.backtrack(-1);
		this.decisionLevel = 0;
	}

	/// `checkWatches` throws when the watched-literal invariant does not hold.
	checkWatches(): void {
		const watchers: Literal[][] = this.clauses.map(() => []);
		for (let t = 1; t < this.value.length; t++) {
			for (const id of this.watching[2 * t]) {
				watchers[id].push(t);
			}
			for (const id of this.watching[2 * t + 1]) {
				watchers[id].push(-t);
			}
		}
		for (let id = 0; id < this.clauses.length; id++) {
			const clause = this.clauses[id];
			const watches = watchers[id];
			if (watches.length !== Math.min(2, clause.length)) {
				throw new Error("clause #" + id + " has " + watches.length + " watches");
			}
			for (const w of watches) {
				if (clause.indexOf(w) > 1) {
					throw new Error("clause #" + id + " watches " + w + " which is not one of its first two literals");
				}
			}
			const satisfied = clause.some(literal => this.isTrue(literal));
			const open = clause.filter(literal => !this.isTrue(literal) && !this.isFalse(literal));
			if (!satisfied && open.length >= 2) {
				for (const w of watches) {
					if (this.isFalse(w)) {
						throw new Error("clause #" + id + " watches falsified " + w + " while " + open + " are open");
					}
				}
			}
		}
	}
}
