import { compareStrings } from "./data.js";

function abs(n: bigint): bigint {
	return n < 0n ? -n : n;
}

export function gcd(a: bigint, b: bigint): bigint {
	a = abs(a);
	b = abs(b);
	while (b !== 0n) {
		[a, b] = [b, a % b];
	}
	return a;
}

/// `floorDiv(a, b)` is the greatest integer not exceeding `a / b`.
export function floorDiv(a: bigint, b: bigint): bigint {
	if (b < 0n) {
		a = -a;
		b = -b;
	}
	const q = a / b;
	return q * b > a ? q - 1n : q;
}

/// `ceilDiv(a, b)` is the least integer not less than `a / b`.
export function ceilDiv(a: bigint, b: bigint): bigint {
	return -floorDiv(-a, b);
}

/**
 * `Linear` is an integer linear combination `c₁·x₁ + ... + cₙ·xₙ + k`.
 *
 * Terms are kept sorted by variable name, and no coefficient is zero, so two
 * equal combinations have the same `key()`.
 */
export class Linear {
	private constructor(
		readonly terms: ReadonlyMap<string, bigint>,
		readonly constant: bigint,
	) { }

	static constant(k: bigint): Linear {
		return new Linear(new Map(), k);
	}

	static variable(name: string): Linear {
		return new Linear(new Map([[name, 1n]]), 0n);
	}

	private static build(terms: Iterable<[string, bigint]>, constant: bigint): Linear {
		const sorted = [...terms].filter(([_, c]) => c !== 0n).sort((a, b) => compareStrings(a[0], b[0]));
		return new Linear(new Map(sorted), constant);
	}

	isConstant(): boolean {
		return this.terms.size === 0;
	}

	coefficient(name: string): bigint {
		return this.terms.get(name) ?? 0n;
	}

	add(other: Linear): Linear {
		const terms = new Map(this.terms);
		for (const [name, c] of other.terms) {
			terms.set(name, (terms.get(name) ?? 0n) + c);
		}
		return Linear.build(terms, this.constant + other.constant);
	}

	scale(factor: bigint): Linear {
		return Linear.build(
			[...this.terms].map(([name, c]): [string, bigint] => [name, c * factor]),
			this.constant * factor,
		);
	}

	subtract(other: Linear): Linear {
		return this.add(other.scale(-1n));
	}

	addConstant(k: bigint): Linear {
		return new Linear(this.terms, this.constant + k);
	}

	/// `withoutVariable(name)` drops the term of `name`.
	withoutVariable(name: string): Linear {
		return Linear.build([...this.terms].filter(([n]) => n !== name), this.constant);
	}

	evaluate(model: ReadonlyMap<string, bigint>): bigint {
		let sum = this.constant;
		for (const [name, c] of this.terms) {
			sum += c * (model.get(name) ?? 0n);
		}
		return sum;
	}

	/**
	 * `tighten()` returns an equivalent (over the integers) constraint for
	 * `this ≤ 0` whose coefficients have no common factor.
	 *
	 * `2x + 1 ≤ 0` tightens to `x + 1 ≤ 0`, since `x ≤ -1/2` means `x ≤ -1`.
	 */
	tighten(): Linear {
		let g = 0n;
		for (const c of this.terms.values()) {
			g = gcd(g, c);
		}
		if (g <= 1n) {
			return this;
		}
		return Linear.build(
			[...this.terms].map(([name, c]): [string, bigint] => [name, c / g]),
			ceilDiv(this.constant, g),
		);
	}

	key(): string {
		const parts = [];
		for (const [name, c] of this.terms) {
			parts.push(c.toString() + "*" + name);
		}
		parts.push(this.constant.toString());
		return parts.join(" + ");
	}

	display(): string {
		if (this.isConstant()) {
			return this.constant.toString();
		}
		let out = "";
		for (const [name, c] of this.terms) {
			const magnitude = abs(c) === 1n ? "" : abs(c).toString() + "*";
			if (out === "") {
				out = (c < 0n ? "-" : "") + magnitude + name;
			} else {
				out += (c < 0n ? " - " : " + ") + magnitude + name;
			}
		}
		if (this.constant !== 0n) {
			out += (this.constant < 0n ? " - " : " + ") + abs(this.constant).toString();
		}
		return out;
	}
}

/**
 * `Formula` is a quantifier-free formula over integer linear constraints and
 * Boolean variables.
 *
 * `{ tag: "le", linear }` means `linear ≤ 0`; every integer comparison is
 * expressed this way.
 */
export type Formula = { tag: "constant", value: boolean }
	| { tag: "bool-variable", name: string }
	| { tag: "le", linear: Linear }
	| { tag: "not", formula: Formula }
	| { tag: "and", formulas: Formula[] }
	| { tag: "or", formulas: Formula[] }
	| { tag: "iff", left: Formula, right: Formula };

export const TRUE: Formula = { tag: "constant", value: true };
export const FALSE: Formula = { tag: "constant", value: false };

export function constant(value: boolean): Formula {
	return value ? TRUE : FALSE;
}

export function boolVariable(name: string): Formula {
	return { tag: "bool-variable", name };
}

export function le(linear: Linear): Formula {
	if (linear.isConstant()) {
		return constant(linear.constant <= 0n);
	}
	return { tag: "le", linear };
}

export function not(formula: Formula): Formula {
	if (formula.tag === "constant") {
		return constant(!formula.value);
	} else if (formula.tag === "not") {
		return formula.formula;
	}
	return { tag: "not", formula };
}

export function and(...formulas: Formula[]): Formula {
	const out: Formula[] = [];
	for (const f of formulas) {
		if (f.tag === "constant") {
			if (!f.value) {
				return FALSE;
			}
		} else if (f.tag === "and") {
			out.push(...f.formulas);
		} else {
			out.push(f);
		}
	}
	if (out.length === 0) {
		return TRUE;
	} else if (out.length === 1) {
		return out[0];
	}
	return { tag: "and", formulas: out };
}

export function or(...formulas: Formula[]): Formula {
	const out: Formula[] = [];
	for (const f of formulas) {
		if (f.tag === "constant") {
			if (f.value) {
				return TRUE;
			}
		} else if (f.tag === "or") {
			out.push(...f.formulas);
		} else {
			out.push(f);
		}
	}
	if (out.length === 0) {
		return FALSE;
	} else if (out.length === 1) {
		return out[0];
	}
	return { tag: "or", formulas: out };
}

export function implies(left: Formula, right: Formula): Formula {
	return or(not(left), right);
}

export function iff(left: Formula, right: Formula): Formula {
	if (left.tag === "constant") {
		return left.value ? right : not(right);
	} else if (right.tag === "constant") {
		return right.value ? left : not(left);
	}
	return { tag: "iff", left, right };
}

/// `lessEqual(a, b)` is `a ≤ b`.
export function lessEqual(a: Linear, b: Linear): Formula {
	return le(a.subtract(b));
}

/// `lessThan(a, b)` is `a < b`, which over the integers is `a - b + 1 ≤ 0`.
export function lessThan(a: Linear, b: Linear): Formula {
	return le(a.subtract(b).addConstant(1n));
}

export function equal(a: Linear, b: Linear): Formula {
	return and(lessEqual(a, b), lessEqual(b, a));
}

export interface Model {
	ints: ReadonlyMap<string, bigint>,
	bools: ReadonlyMap<string, boolean>,
}

/// `evaluate(formula, model)` treats variables absent from the model as `0`
/// and `false`.
export function evaluate(formula: Formula, model: Model): boolean {
	switch (formula.tag) {
		case "constant":
			return formula.value;
		case "bool-variable":
			return model.bools.get(formula.name) ?? false;
		case "le":
			return formula.linear.evaluate(model.ints) <= 0n;
		case "not":
			return !evaluate(formula.formula, model);
		case "and":
			return formula.formulas.every(f => evaluate(f, model));
		case "or":
			return formula.formulas.some(f => evaluate(f, model));
		case "iff":
			return evaluate(formula.left, model) === evaluate(formula.right, model);
	}
}

export function displayFormula(formula: Formula): string {
	switch (formula.tag) {
		case "constant":
			return String(formula.value);
		case "bool-variable":
			return formula.name;
		case "le":
			return formula.linear.display() + " <= 0";
		case "not":
			return "!(" + displayFormula(formula.formula) + ")";
		case "and":
			return "(" + formula.formulas.map(displayFormula).join(" && ") + ")";
		case "or":
			return "(" + formula.formulas.map(displayFormula).join(" || ") + ")";
		case "iff":
			return "(" + displayFormula(formula.left) + " <=> " + displayFormula(formula.right) + ")";
	}
}
