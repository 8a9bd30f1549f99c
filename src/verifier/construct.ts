import * as ast from "./ast.js";

// Helpers for hosts (and tests) building function definitions directly,
// rather than from parsed source.

export function at(offset: number, length = 1, fileID = "input"): ast.SourceLocation {
	return { fileID, offset, length };
}

export function int(value: number | bigint, location = ast.NONE): ast.ExpressionInt {
	return { tag: "int", int: BigInt(value), location };
}

export function bool(value: boolean, location = ast.NONE): ast.ExpressionBoolean {
	return { tag: "bool", bool: value, location };
}

export function float(value: number, location = ast.NONE): ast.ExpressionFloat {
	return { tag: "float", float: value, location };
}

export function string(value: string, location = ast.NONE): ast.ExpressionString {
	return { tag: "string", string: value, location };
}

export function variable(name: string, location = ast.NONE): ast.ExpressionVariable {
	return { tag: "variable", name, location };
}

export function result(location = ast.NONE): ast.ExpressionResult {
	return { tag: "result", location };
}

export function not(operand: ast.Expression, location = ast.NONE): ast.ExpressionUnary {
	return { tag: "unary", operator: "not", operand, location };
}

export function negate(operand: ast.Expression, location = ast.NONE): ast.ExpressionUnary {
	return { tag: "unary", operator: "neg", operand, location };
}

export function binary(
	left: ast.Expression,
	operator: ast.BinaryOperator,
	right: ast.Expression,
	location = ast.NONE,
): ast.ExpressionBinary {
	return { tag: "binary", operator, left, right, location };
}

export function conditional(
	condition: ast.Expression,
	then: ast.Expression,
	otherwise: ast.Expression,
	location = ast.NONE,
): ast.ExpressionConditional {
	return { tag: "conditional", condition, then, otherwise, location };
}

export function call(target: ast.CallTarget, args: ast.Expression[] = [], location = ast.NONE): ast.ExpressionCall {
	return { tag: "call", target, arguments: args, location };
}

/// `callNamed(name)` calls a function of this unit by name, or an external
/// member when there is none.
export function callNamed(name: string, args: ast.Expression[] = [], location = ast.NONE): ast.ExpressionCall {
	return call({ tag: "named", name }, args, location);
}

export function callExternal(qualifiedName: string, args: ast.Expression[] = [], location = ast.NONE): ast.ExpressionCall {
	return call({ tag: "external", qualifiedName }, args, location);
}

export function quantifier(
	kind: "forall" | "exists",
	name: string,
	from: ast.Expression,
	to: ast.Expression,
	body: ast.Expression,
	location = ast.NONE,
): ast.ExpressionQuantifier {
	return { tag: "quantifier", quantifier: kind, variable: name, variableType: ast.T_INT, from, to, body, location };
}

export function let_(name: string, type: ast.Type, value: ast.Expression, location = ast.NONE): ast.StatementLet {
	return { tag: "let", variable: name, type, value, location };
}

export function assign(name: string, value: ast.Expression, location = ast.NONE): ast.StatementAssign {
	return { tag: "assign", target: { tag: "local", variable: name }, value, location };
}

export function store(object: ast.Expression, field: string, value: ast.Expression, location = ast.NONE): ast.StatementAssign {
	return { tag: "assign", target: { tag: "field", object, field }, value, location };
}

export function return_(value: ast.Expression | null, location = ast.NONE): ast.StatementReturn {
	return { tag: "return", value, location };
}

export function if_(
	condition: ast.Expression,
	then: ast.Statement[],
	otherwise: ast.Statement[] = [],
	location = ast.NONE,
): ast.StatementIf {
	return { tag: "if", condition, then, otherwise, location };
}

export function while_(condition: ast.Expression, body: ast.Statement[], location = ast.NONE): ast.StatementWhile {
	return { tag: "while", condition, body, location };
}

export function evaluate(expression: ast.Expression, location = ast.NONE): ast.StatementExpression {
	return { tag: "expression", expression, location };
}

export function primitive(
	operation: string,
	effect: string,
	args: ast.Expression[] = [],
	location = ast.NONE,
): ast.StatementPrimitive {
	return { tag: "primitive", operation, effect, arguments: args, location };
}

export function throw_(value: ast.Expression, location = ast.NONE): ast.StatementThrow {
	return { tag: "throw", value, location };
}

export interface FunctionShape {
	id: string,

	/// Defaults to `id`.
	name?: string,

	parameters?: [string, ast.Type][],
	returnType?: ast.Type,
	effects?: string[],
	requires?: ast.Expression[],
	ensures?: ast.Expression[],
	body?: ast.Statement[],
	location?: ast.SourceLocation,
}

/**
 * `defineFunction` builds a function definition. Contracts are given the
 * ids `<id>/requires/<n>` and `<id>/ensures/<n>`, counting from zero.
 */
export function defineFunction(shape: FunctionShape): ast.FunctionDefinition {
	const location = shape.location ?? ast.NONE;
	const contracts = (kind: string, expressions: ast.Expression[]): ast.Contract[] =>
		expressions.map((expression, i) => ({
			id: ast.contractID(shape.id + "/" + kind + "/" + i),
			expression,
			location: expression.location,
		}));
	return {
		id: ast.functionID(shape.id),
		name: shape.name ?? shape.id,
		parameters: (shape.parameters ?? []).map(([name, type]) => ({ name, type, location })),
		returnType: shape.returnType ?? ast.T_UNIT,
		declaredEffects: shape.effects ?? [],
		preconditions: contracts("requires", shape.requires ?? []),
		postconditions: contracts("ensures", shape.ensures ?? []),
		body: shape.body ?? [],
		location,
	};
}
