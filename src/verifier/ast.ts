/// `SourceLocation` represents a span of a file.
export interface SourceLocation {
	fileID: string,

	// The offset from the first character, measured in UTF-16 code-units
	// (JavaScript "characters").
	offset: number,

	// The length of the span, measured in UTF-16 code-units.
	length: number,
}

export const NONE: SourceLocation = {
	fileID: "unknown",
	offset: 0,
	length: 0,
};

export function displayLocation(location: SourceLocation): string {
	return location.fileID + ":" + location.offset + "+" + location.length;
}

export type FunctionID = string & { __brand: "function-id" };
export type ContractID = string & { __brand: "contract-id" };

export function functionID(id: string): FunctionID {
	return id as FunctionID;
}

export function contractID(id: string): ContractID {
	return id as ContractID;
}

/// `TypePrimitive` represents one of the "built-in" primitive types.
/// Only `"Int"` (unbounded mathematical integers) and `"Boolean"` are
/// understood by the static contract verifier.
export interface TypePrimitive {
	tag: "type-primitive",
	primitive: "Int" | "Boolean" | "Float" | "String" | "Unit",
}

export const T_INT: TypePrimitive = { tag: "type-primitive", primitive: "Int" };
export const T_BOOLEAN: TypePrimitive = { tag: "type-primitive", primitive: "Boolean" };
export const T_FLOAT: TypePrimitive = { tag: "type-primitive", primitive: "Float" };
export const T_STRING: TypePrimitive = { tag: "type-primitive", primitive: "String" };
export const T_UNIT: TypePrimitive = { tag: "type-primitive", primitive: "Unit" };

/// `TypeNamed` is any user-defined or library type. The verifier treats
/// these opaquely.
export interface TypeNamed {
	tag: "type-named",
	name: string,
}

export type Type = TypePrimitive | TypeNamed;

export function displayType(t: Type): string {
	if (t.tag === "type-primitive") {
		return t.primitive;
	}
	return t.name;
}

export interface Parameter {
	readonly name: string,
	readonly type: Type,
	readonly location: SourceLocation,
}

export interface Contract {
	readonly id: ContractID,
	readonly expression: Expression,
	readonly location: SourceLocation,
}

export interface FunctionDefinition {
	readonly id: FunctionID,
	readonly name: string,
	readonly parameters: readonly Parameter[],
	readonly returnType: Type,

	/// Effect codes, such as `"fs:r"` or `"cw"`. `"*"` declares every effect.
	readonly declaredEffects: readonly string[],

	readonly preconditions: readonly Contract[],

	/// Postconditions may refer to the returned value using an
	/// `ExpressionResult`.
	readonly postconditions: readonly Contract[],

	readonly body: readonly Statement[],
	readonly location: SourceLocation,
}

export type BinaryOperator = "+" | "-" | "*" | "/" | "%"
	| "==" | "!=" | "<" | "<=" | ">" | ">="
	| "&&" | "||" | "==>";

export interface ExpressionInt {
	tag: "int",
	int: bigint,
	location: SourceLocation,
}

export interface ExpressionBoolean {
	tag: "bool",
	bool: boolean,
	location: SourceLocation,
}

export interface ExpressionFloat {
	tag: "float",
	float: number,
	location: SourceLocation,
}

export interface ExpressionString {
	tag: "string",
	string: string,
	location: SourceLocation,
}

export interface ExpressionVariable {
	tag: "variable",
	name: string,
	location: SourceLocation,
}

/// `ExpressionResult` is the `result` placeholder of a postcondition.
export interface ExpressionResult {
	tag: "result",
	location: SourceLocation,
}

export interface ExpressionUnary {
	tag: "unary",
	operator: "neg" | "not",
	operand: Expression,
	location: SourceLocation,
}

export interface ExpressionBinary {
	tag: "binary",
	operator: BinaryOperator,
	left: Expression,
	right: Expression,
	location: SourceLocation,
}

export interface ExpressionConditional {
	tag: "conditional",
	condition: Expression,
	then: Expression,
	otherwise: Expression,
	location: SourceLocation,
}

/// `CallTarget` names the function invoked by a call expression.
/// * `"internal"`: a function defined in this compilation unit.
/// * `"external"`: a library member, resolved through a manifest.
/// * `"named"`: a bare name not yet bound; it becomes internal when a
///   function of that name exists, and external otherwise.
export type CallTarget = { tag: "internal", function: FunctionID }
	| { tag: "external", qualifiedName: string }
	| { tag: "named", name: string };

export interface ExpressionCall {
	tag: "call",
	target: CallTarget,
	arguments: Expression[],
	location: SourceLocation,
}

/// `ExpressionQuantifier` quantifies `variable` over the integers in
/// `[from, to)`.
export interface ExpressionQuantifier {
	tag: "quantifier",
	quantifier: "forall" | "exists",
	variable: string,
	variableType: Type,
	from: Expression,
	to: Expression,
	body: Expression,
	location: SourceLocation,
}

export type Expression = ExpressionInt
	| ExpressionBoolean
	| ExpressionFloat
	| ExpressionString
	| ExpressionVariable
	| ExpressionResult
	| ExpressionUnary
	| ExpressionBinary
	| ExpressionConditional
	| ExpressionCall
	| ExpressionQuantifier;

export interface StatementLet {
	tag: "let",
	variable: string,
	type: Type,
	value: Expression,
	location: SourceLocation,
}

/// `StatementAssign` rebinds a local variable, or stores into a field of an
/// object (which is a mutation effect).
export interface StatementAssign {
	tag: "assign",
	target: { tag: "local", variable: string } | { tag: "field", object: Expression, field: string },
	value: Expression,
	location: SourceLocation,
}

export interface StatementReturn {
	tag: "return",
	value: Expression | null,
	location: SourceLocation,
}

export interface StatementIf {
	tag: "if",
	condition: Expression,
	then: Statement[],
	otherwise: Statement[],
	location: SourceLocation,
}

export interface StatementWhile {
	tag: "while",
	condition: Expression,
	body: Statement[],
	location: SourceLocation,
}

export interface StatementExpression {
	tag: "expression",
	expression: Expression,
	location: SourceLocation,
}

/// `StatementPrimitive` is a built-in operation with a fixed effect, such as
/// printing to the console (`"cw"`).
export interface StatementPrimitive {
	tag: "primitive",
	operation: string,
	effect: string,
	arguments: Expression[],
	location: SourceLocation,
}

export interface StatementThrow {
	tag: "throw",
	value: Expression,
	location: SourceLocation,
}

export type Statement = StatementLet
	| StatementAssign
	| StatementReturn
	| StatementIf
	| StatementWhile
	| StatementExpression
	| StatementPrimitive
	| StatementThrow;

/// `forEachSubexpression` visits `e` and every expression nested within it,
/// in evaluation order (operands before the operator).
export function forEachSubexpression(e: Expression, visit: (e: Expression) => void): void {
	if (e.tag === "unary") {
		forEachSubexpression(e.operand, visit);
	} else if (e.tag === "binary") {
		forEachSubexpression(e.left, visit);
		forEachSubexpression(e.right, visit);
	} else if (e.tag === "conditional") {
		forEachSubexpression(e.condition, visit);
		forEachSubexpression(e.then, visit);
		forEachSubexpression(e.otherwise, visit);
	} else if (e.tag === "call") {
		for (const argument of e.arguments) {
			forEachSubexpression(argument, visit);
		}
	} else if (e.tag === "quantifier") {
		forEachSubexpression(e.from, visit);
		forEachSubexpression(e.to, visit);
		forEachSubexpression(e.body, visit);
	}
	visit(e);
}

/// `statementExpressions` returns the expressions directly held by a
/// statement (not those of nested blocks).
export function statementExpressions(s: Statement): Expression[] {
	switch (s.tag) {
		case "let":
			return [s.value];
		case "assign":
			if (s.target.tag === "field") {
				return [s.target.object, s.value];
			}
			return [s.value];
		case "return":
			return s.value === null ? [] : [s.value];
		case "if":
		case "while":
			return [s.condition];
		case "expression":
			return [s.expression];
		case "primitive":
			return s.arguments;
		case "throw":
			return [s.value];
	}
}

/// `nestedBlocks` returns the blocks nested directly within a statement.
export function nestedBlocks(s: Statement): Statement[][] {
	if (s.tag === "if") {
		return [s.then, s.otherwise];
	} else if (s.tag === "while") {
		return [s.body];
	}
	return [];
}
