import * as ast from "./ast.js";
import { InternalCompilerError } from "./diagnostics.js";

/**
 * `ExecutionPath` is one way through a function's body.
 *
 * Every condition and the returned expression are written in terms of the
 * function's parameters: local variables have been replaced by the values
 * they hold at that point of the path.
 */
export interface ExecutionPath {
	/// Boolean expressions which all hold along this path, in the order the
	/// branches were taken.
	conditions: ast.Expression[],

	/// The returned expression, or `null` when a `Unit` function finishes
	/// without a value.
	returned: ast.Expression | null,

	location: ast.SourceLocation,
}

export type PathEnumeration = { tag: "paths", paths: ExecutionPath[], pruned: number }
	| { tag: "unsupported", construct: string, location: ast.SourceLocation }
	| { tag: "too-many-paths", limit: number };

type Environment = ReadonlyMap<string, ast.Expression>;

/// `Work` is the remainder of a path still to be walked. Leaving a block
/// restores the variables it declared to their enclosing bindings.
type Work = { tag: "statement", statement: ast.Statement }
	| { tag: "exit-block", declared: string[], outer: Environment };

class TooManyPaths { }

/// `substitute(e, env)` replaces each free variable of `e` bound in `env`.
export function substitute(e: ast.Expression, env: Environment): ast.Expression {
	if (env.size === 0) {
		return e;
	}
	switch (e.tag) {
		case "int":
		case "bool":
		case "float":
		case "string":
		case "result":
			return e;
		case "variable":
			return env.get(e.name) ?? e;
		case "unary":
			return { ...e, operand: substitute(e.operand, env) };
		case "binary":
			return { ...e, left: substitute(e.left, env), right: substitute(e.right, env) };
		case "conditional":
			return {
				...e,
				condition: substitute(e.condition, env),
				then: substitute(e.then, env),
				otherwise: substitute(e.otherwise, env),
			};
		case "call":
			return { ...e, arguments: e.arguments.map(argument => substitute(argument, env)) };
		case "quantifier": {
			const inner = new Map(env);
			inner.delete(e.variable);

			// Rename the bound variable when a replacement mentions it, so that
			// the replacement keeps referring to the enclosing binding.
			const bodyFree = freeVariables(e.body);
			const mentioned = new Set<string>();
			for (const name of bodyFree) {
				const replacement = inner.get(name);
				if (replacement !== undefined) {
					for (const free of freeVariables(replacement)) {
						mentioned.add(free);
					}
				}
			}
			let variable = e.variable;
			if (mentioned.has(e.variable)) {
				while (mentioned.has(variable) || bodyFree.has(variable)) {
					variable += "'";
				}
				inner.set(e.variable, { tag: "variable", name: variable, location: e.location });
			}
			return {
				...e,
				variable,
				from: substitute(e.from, env),
				to: substitute(e.to, env),
				body: substitute(e.body, inner),
			};
		}
	}
}

/// `freeVariables(e)` is the set of variable names `e` refers to outside of
/// any quantifier binding them.
export function freeVariables(e: ast.Expression): Set<string> {
	const out = new Set<string>();
	const visit = (e: ast.Expression, bound: ReadonlySet<string>): void => {
		switch (e.tag) {
			case "variable":
				if (!bound.has(e.name)) {
					out.add(e.name);
				}
				return;
			case "unary":
				return visit(e.operand, bound);
			case "binary":
				visit(e.left, bound);
				return visit(e.right, bound);
			case "conditional":
				visit(e.condition, bound);
				visit(e.then, bound);
				return visit(e.otherwise, bound);
			case "call":
				for (const argument of e.arguments) {
					visit(argument, bound);
				}
				return;
			case "quantifier":
				visit(e.from, bound);
				visit(e.to, bound);
				return visit(e.body, new Set([...bound, e.variable]));
			default:
				return;
		}
	};
	visit(e, new Set());
	return out;
}

/// `expressionKey` is equal for expressions which are the same up to their
/// source locations.
export function expressionKey(e: ast.Expression): string {
	switch (e.tag) {
		case "int":
			return e.int.toString();
		case "bool":
			return String(e.bool);
		case "float":
			return "float(" + e.float + ")";
		case "string":
			return JSON.stringify(e.string);
		case "variable":
			return e.name;
		case "result":
			return "result";
		case "unary":
			return e.operator + "(" + expressionKey(e.operand) + ")";
		case "binary":
			return "(" + expressionKey(e.left) + " " + e.operator + " " + expressionKey(e.right) + ")";
		case "conditional":
			return "(" + expressionKey(e.condition) + " ? " + expressionKey(e.then) + " : " + expressionKey(e.otherwise) + ")";
		case "call": {
			const args = e.arguments.map(expressionKey).join(", ");
			const target = e.target;
			const name = target.tag === "internal" ? "#" + target.function
				: target.tag === "external" ? target.qualifiedName
					: target.name;
			return name + "(" + args + ")";
		}
		case "quantifier":
			return e.quantifier + " " + e.variable + " in [" + expressionKey(e.from) + ", " + expressionKey(e.to) + "). "
				+ expressionKey(e.body);
	}
}

function negate(e: ast.Expression): ast.Expression {
	if (e.tag === "bool") {
		return { ...e, bool: !e.bool };
	} else if (e.tag === "unary" && e.operator === "not") {
		return e.operand;
	}
	return { tag: "unary", operator: "not", operand: e, location: e.location };
}

function findLoop(block: readonly ast.Statement[]): ast.StatementWhile | null {
	for (const statement of block) {
		if (statement.tag === "while") {
			return statement;
		}
		for (const nested of ast.nestedBlocks(statement)) {
			const loop = findLoop(nested);
			if (loop !== null) {
				return loop;
			}
		}
	}
	return null;
}

function declaredIn(block: readonly ast.Statement[]): string[] {
	const out: string[] = [];
	for (const statement of block) {
		if (statement.tag === "let") {
			out.push(statement.variable);
		}
	}
	return out;
}

/**
 * `enumeratePaths` lists the paths through the body of `fn`, each ending in a
 * `return` (or, for a `Unit` function, at the end of the body).
 *
 * Paths ending in `throw` are dropped: postconditions describe only normal
 * returns. Branches whose condition is the literal `false`, or the negation of
 * a condition already taken on the path, are never entered.
 *
 * Bodies containing loops are unsupported.
 */
export function enumeratePaths(fn: ast.FunctionDefinition, maxPaths: number): PathEnumeration {
	const loop = findLoop(fn.body);
	if (loop !== null) {
		return { tag: "unsupported", construct: "loop", location: loop.location };
	}

	const paths: ExecutionPath[] = [];
	let pruned = 0;
	const unitFunction = fn.returnType.tag === "type-primitive" && fn.returnType.primitive === "Unit";

	const finish = (path: ExecutionPath) => {
		paths.push(path);
		if (paths.length > maxPaths) {
			throw new TooManyPaths();
		}
	};

	// Returns `null` when the branch can never be entered, and otherwise the
	// conditions of the path after entering it.
	const assume = (conditions: ast.Expression[], keys: ReadonlySet<string>, condition: ast.Expression) => {
		if (condition.tag === "bool") {
			return condition.bool ? { conditions, keys } : null;
		}
		const key = expressionKey(condition);
		if (keys.has(key)) {
			return { conditions, keys };
		} else if (keys.has(expressionKey(negate(condition)))) {
			return null;
		}
		return { conditions: [...conditions, condition], keys: new Set([...keys, key]) };
	};

	const walk = (work: readonly Work[], env: Environment, conditions: ast.Expression[], keys: ReadonlySet<string>): void => {
		for (let i = 0; i < work.length; i++) {
			const item = work[i];
			if (item.tag === "exit-block") {
				const restored = new Map(env);
				for (const name of item.declared) {
					const outer = item.outer.get(name);
					if (outer === undefined) {
						restored.delete(name);
					} else {
						restored.set(name, outer);
					}
				}
				env = restored;
				continue;
			}

			const statement = item.statement;
			switch (statement.tag) {
				case "let":
					env = new Map(env).set(statement.variable, substitute(statement.value, env));
					break;
				case "assign":
					if (statement.target.tag === "local") {
						env = new Map(env).set(statement.target.variable, substitute(statement.value, env));
					}
					break;
				case "expression":
				case "primitive":
					break;
				case "throw":
					return;
				case "return":
					finish({
						conditions,
						returned: statement.value === null ? null : substitute(statement.value, env),
						location: statement.location,
					});
					return;
				case "while":
					throw new InternalCompilerError("loop found after it was ruled out");
				case "if": {
					const rest = work.slice(i + 1);
					const condition = substitute(statement.condition, env);
					const branches: [ast.Expression, ast.Statement[]][] = [
						[condition, statement.then],
						[negate(condition), statement.otherwise],
					];
					for (const [guard, block] of branches) {
						const entered = assume(conditions, keys, guard);
						if (entered === null) {
							pruned += 1;
							continue;
						}
						const blockWork: Work[] = block.map((s): Work => ({ tag: "statement", statement: s }));
						blockWork.push({ tag: "exit-block", declared: declaredIn(block), outer: env });
						walk([...blockWork, ...rest], env, entered.conditions, entered.keys);
					}
					return;
				}
			}
		}

		if (unitFunction) {
			finish({ conditions, returned: null, location: fn.location });
		}
	};

	try {
		walk(fn.body.map((s): Work => ({ tag: "statement", statement: s })), new Map(), [], new Set());
	} catch (e) {
		if (e instanceof TooManyPaths) {
			return { tag: "too-many-paths", limit: maxPaths };
		}
		throw e;
	}
	return { tag: "paths", paths, pruned };
}
