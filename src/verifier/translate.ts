import * as ast from "./ast.js";
import { InternalCompilerError } from "./diagnostics.js";
import * as formula from "./formula.js";
import { Formula, Linear } from "./formula.js";

/**
 * `IntTerm` is an integer-valued term, split into pieces by the conditions
 * under which each applies. The guards are mutually exclusive and together
 * exhaustive, so a term with no conditional expressions has exactly one piece
 * guarded by `true`.
 */
export type IntTerm = { guard: Formula, value: Linear }[];

export type Translated = { sort: "int", term: IntTerm } | { sort: "bool", formula: Formula };

export type Translation<T> = { tag: "translated", value: T }
	| { tag: "unsupported", construct: string, location: ast.SourceLocation };

/// Thrown within a translation to abandon it; never escapes `translate`.
class Unsupported {
	constructor(readonly construct: string, readonly location: ast.SourceLocation) { }
}

export interface TranslationContext {
	/// The types of the variables in scope, usually a function's parameters.
	variables: ReadonlyMap<string, ast.Type>,

	/// The expression standing for `result`, already written in terms of the
	/// variables in scope, or `null` outside of a postcondition.
	result: { expression: ast.Expression, type: ast.Type } | null,

	maxQuantifierExpansion: number,
}

function isInt(t: ast.Type): boolean {
	return t.tag === "type-primitive" && t.primitive === "Int";
}

function isBoolean(t: ast.Type): boolean {
	return t.tag === "type-primitive" && t.primitive === "Boolean";
}

function constantTerm(k: bigint): IntTerm {
	return [{ guard: formula.TRUE, value: Linear.constant(k) }];
}

/// `combine` applies `f` to every feasible pair of pieces.
function combine<T>(
	left: IntTerm,
	right: IntTerm,
	f: (a: Linear, b: Linear) => T,
): { guard: Formula, value: T }[] {
	const out: { guard: Formula, value: T }[] = [];
	for (const a of left) {
		for (const b of right) {
			const guard = formula.and(a.guard, b.guard);
			if (guard.tag === "constant" && !guard.value) {
				continue;
			}
			out.push({ guard, value: f(a.value, b.value) });
		}
	}
	return out;
}

/// `constantValue` is the value of a term with a single unconditional,
/// constant piece.
function constantValue(term: IntTerm): bigint | null {
	if (term.length === 1 && term[0].guard.tag === "constant" && term[0].value.isConstant()) {
		return term[0].value.constant;
	}
	return null;
}

/**
 * `ContractTranslator` lowers contract expressions into formulas of linear
 * integer arithmetic.
 *
 * Anything outside that fragment (calls, floating point, strings, non-linear
 * arithmetic, quantifiers over ranges which are not constant) makes the whole
 * expression unsupported. Nothing is ever partially translated.
 */
export class ContractTranslator {
	private readonly bound: Map<string, bigint>[] = [];

	constructor(private readonly context: TranslationContext) { }

	/**
	 * `translate(e)` lowers a Boolean expression.
	 */
	translate(e: ast.Expression): Translation<Formula> {
		try {
			return { tag: "translated", value: this.booleanOf(e) };
		} catch (error) {
			if (error instanceof Unsupported) {
				return { tag: "unsupported", construct: error.construct, location: error.location };
			}
			throw error;
		}
	}

	/**
	 * `translateValue(e)` lowers an expression of either sort; it is used to
	 * evaluate returned values for counterexamples.
	 */
	translateValue(e: ast.Expression): Translation<Translated> {
		try {
			return { tag: "translated", value: this.valueOf(e) };
		} catch (error) {
			if (error instanceof Unsupported) {
				return { tag: "unsupported", construct: error.construct, location: error.location };
			}
			throw error;
		}
	}

	private booleanOf(e: ast.Expression): Formula {
		const v = this.valueOf(e);
		if (v.sort !== "bool") {
			throw new InternalCompilerError("expected a Boolean expression at offset " + e.location.offset);
		}
		return v.formula;
	}

	private intOf(e: ast.Expression): IntTerm {
		const v = this.valueOf(e);
		if (v.sort !== "int") {
			throw new InternalCompilerError("expected an Int expression at offset " + e.location.offset);
		}
		return v.term;
	}

	private lookup(name: string): bigint | null {
		for (let i = this.bound.length - 1; i >= 0; i--) {
			const value = this.bound[i].get(name);
			if (value !== undefined) {
				return value;
			}
		}
		return null;
	}

	private variableOf(name: string, type: ast.Type, location: ast.SourceLocation): Translated {
		if (isInt(type)) {
			return { sort: "int", term: [{ guard: formula.TRUE, value: Linear.variable(name) }] };
		} else if (isBoolean(type)) {
			return { sort: "bool", formula: formula.boolVariable(name) };
		} else if (type.tag === "type-primitive" && type.primitive === "Float") {
			throw new Unsupported("floating-point value `" + name + "`", location);
		}
		throw new Unsupported("value `" + name + "` of type " + ast.displayType(type), location);
	}

	private valueOf(e: ast.Expression): Translated {
		switch (e.tag) {
			case "int":
				return { sort: "int", term: constantTerm(e.int) };
			case "bool":
				return { sort: "bool", formula: formula.constant(e.bool) };
			case "float":
				throw new Unsupported("floating-point literal", e.location);
			case "string":
				throw new Unsupported("string literal", e.location);
			case "variable": {
				const bound = this.lookup(e.name);
				if (bound !== null) {
					return { sort: "int", term: constantTerm(bound) };
				}
				const type = this.context.variables.get(e.name);
				if (type === undefined) {
					throw new InternalCompilerError("contract refers to unknown variable `" + e.name + "`");
				}
				return this.variableOf(e.name, type, e.location);
			}
			case "result": {
				const result = this.context.result;
				if (result === null) {
					throw new InternalCompilerError("`result` used outside of a postcondition");
				} else if (!isInt(result.type) && !isBoolean(result.type)) {
					throw new Unsupported("result of type " + ast.displayType(result.type), e.location);
				}
				// The result expression is written over the parameters, so no
				// quantified variable is in scope within it.
				const bound = this.bound.splice(0, this.bound.length);
				try {
					return this.valueOf(result.expression);
				} finally {
					this.bound.push(...bound);
				}
			}
			case "unary":
				if (e.operator === "not") {
					return { sort: "bool", formula: formula.not(this.booleanOf(e.operand)) };
				}
				return {
					sort: "int",
					term: this.intOf(e.operand).map(piece => ({ guard: piece.guard, value: piece.value.scale(-1n) })),
				};
			case "binary":
				return this.binaryOf(e);
			case "conditional": {
				const condition = this.booleanOf(e.condition);
				const then = this.valueOf(e.then);
				const otherwise = this.valueOf(e.otherwise);
				if (then.sort === "bool" && otherwise.sort === "bool") {
					return {
						sort: "bool",
						formula: formula.or(
							formula.and(condition, then.formula),
							formula.and(formula.not(condition), otherwise.formula),
						),
					};
				} else if (then.sort === "int" && otherwise.sort === "int") {
					const pieces: IntTerm = [];
					for (const [guard, branch] of [[condition, then.term], [formula.not(condition), otherwise.term]] as const) {
						for (const piece of branch) {
							const g = formula.and(guard, piece.guard);
							if (g.tag !== "constant" || g.value) {
								pieces.push({ guard: g, value: piece.value });
							}
						}
					}
					return { sort: "int", term: pieces };
				}
				throw new InternalCompilerError("conditional branches have different types");
			}
			case "call":
				throw new Unsupported("function call", e.location);
			case "quantifier":
				return { sort: "bool", formula: this.quantifierOf(e) };
		}
	}

	private binaryOf(e: ast.ExpressionBinary): Translated {
		switch (e.operator) {
			case "&&":
				return { sort: "bool", formula: formula.and(this.booleanOf(e.left), this.booleanOf(e.right)) };
			case "||":
				return { sort: "bool", formula: formula.or(this.booleanOf(e.left), this.booleanOf(e.right)) };
			case "==>":
				return { sort: "bool", formula: formula.implies(this.booleanOf(e.left), this.booleanOf(e.right)) };
			case "+":
				return { sort: "int", term: combine(this.intOf(e.left), this.intOf(e.right), (a, b) => a.add(b)) };
			case "-":
				return { sort: "int", term: combine(this.intOf(e.left), this.intOf(e.right), (a, b) => a.subtract(b)) };
			case "*": {
				const left = this.intOf(e.left);
				const right = this.intOf(e.right);
				return {
					sort: "int",
					term: combine(left, right, (a, b) => {
						if (a.isConstant()) {
							return b.scale(a.constant);
						} else if (b.isConstant()) {
							return a.scale(b.constant);
						}
						throw new Unsupported("non-linear multiplication", e.location);
					}),
				};
			}
			case "/":
			case "%": {
				const left = constantValue(this.intOf(e.left));
				const right = constantValue(this.intOf(e.right));
				if (left === null || right === null || right === 0n) {
					throw new Unsupported(e.operator === "/" ? "division" : "remainder", e.location);
				}
				// Integer division truncates toward zero.
				return { sort: "int", term: constantTerm(e.operator === "/" ? left / right : left % right) };
			}
			case "==":
			case "!=": {
				const left = this.valueOf(e.left);
				const right = this.valueOf(e.right);
				let equal: Formula;
				if (left.sort === "bool" && right.sort === "bool") {
					equal = formula.iff(left.formula, right.formula);
				} else if (left.sort === "int" && right.sort === "int") {
					equal = this.compare(left.term, right.term, formula.equal);
				} else {
					throw new InternalCompilerError("comparison of an Int with a Boolean");
				}
				return { sort: "bool", formula: e.operator === "==" ? equal : formula.not(equal) };
			}
			case "<":
				return { sort: "bool", formula: this.compare(this.intOf(e.left), this.intOf(e.right), formula.lessThan) };
			case "<=":
				return { sort: "bool", formula: this.compare(this.intOf(e.left), this.intOf(e.right), formula.lessEqual) };
			case ">":
				return { sort: "bool", formula: this.compare(this.intOf(e.right), this.intOf(e.left), formula.lessThan) };
			case ">=":
				return { sort: "bool", formula: this.compare(this.intOf(e.right), this.intOf(e.left), formula.lessEqual) };
		}
	}

	private compare(left: IntTerm, right: IntTerm, relation: (a: Linear, b: Linear) => Formula): Formula {
		const pieces = combine(left, right, relation);
		return formula.or(...pieces.map(piece => formula.and(piece.guard, piece.value)));
	}

	private quantifierOf(e: ast.ExpressionQuantifier): Formula {
		if (!isInt(e.variableType)) {
			throw new Unsupported("quantifier over " + ast.displayType(e.variableType), e.location);
		}
		const from = constantValue(this.intOf(e.from));
		const to = constantValue(this.intOf(e.to));
		if (from === null || to === null) {
			throw new Unsupported("quantifier over a range which is not constant", e.location);
		} else if (to - from > BigInt(this.context.maxQuantifierExpansion)) {
			throw new Unsupported("quantifier over more than " + this.context.maxQuantifierExpansion + " values", e.location);
		}

		const instances: Formula[] = [];
		for (let i = from; i < to; i++) {
			this.bound.push(new Map([[e.variable, i]]));
			try {
				instances.push(this.booleanOf(e.body));
			} finally {
				this.bound.pop();
			}
		}
		return e.quantifier === "forall" ? formula.and(...instances) : formula.or(...instances);
	}
}

/// `translateContract` lowers one contract in the scope of a function's
/// parameters.
export function translateContract(
	fn: ast.FunctionDefinition,
	expression: ast.Expression,
	result: ast.Expression | null,
	maxQuantifierExpansion: number,
): Translation<Formula> {
	return new ContractTranslator(contextFor(fn, result, maxQuantifierExpansion)).translate(expression);
}

export function contextFor(
	fn: ast.FunctionDefinition,
	result: ast.Expression | null,
	maxQuantifierExpansion: number,
): TranslationContext {
	const variables = new Map<string, ast.Type>();
	for (const parameter of fn.parameters) {
		variables.set(parameter.name, parameter.type);
	}
	return {
		variables,
		result: result === null ? null : { expression: result, type: fn.returnType },
		maxQuantifierExpansion,
	};
}
