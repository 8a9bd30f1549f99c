import * as ast from "./ast.js";
import {
	assign,
	at,
	binary,
	bool,
	defineFunction,
	evaluate,
	callNamed,
	if_,
	int,
	let_,
	quantifier,
	return_,
	string,
	throw_,
	variable,
	while_,
} from "./construct.js";
import { enumeratePaths, expressionKey, PathEnumeration, substitute } from "./paths.js";
import { assert } from "./test.js";

const x = variable("x");
const b = variable("b");

function shown(enumeration: PathEnumeration) {
	if (enumeration.tag !== "paths") {
		return enumeration;
	}
	return enumeration.paths.map(path => ({
		conditions: path.conditions.map(expressionKey),
		returned: path.returned === null ? null : expressionKey(path.returned),
	}));
}

function intFunction(body: ast.Statement[]): ast.FunctionDefinition {
	return defineFunction({
		id: "f",
		parameters: [["x", ast.T_INT], ["b", ast.T_BOOLEAN]],
		returnType: ast.T_INT,
		body,
	});
}

export const tests = {
	"locals-are-replaced-by-their-values"() {
		const fn = intFunction([
			let_("y", ast.T_INT, binary(x, "+", int(1))),
			if_(binary(variable("y"), ">", int(0)), [
				return_(variable("y")),
			], [
				assign("y", binary(int(0), "-", variable("y"))),
				return_(variable("y")),
			]),
		]);
		assert(shown(enumeratePaths(fn, 16)), "is equal to", [
			{ conditions: ["((x + 1) > 0)"], returned: "(x + 1)" },
			{ conditions: ["not(((x + 1) > 0))"], returned: "(0 - (x + 1))" },
		]);
	},
	"substitution-respects-quantified-variables"() {
		const env = new Map<string, ast.Expression>([["i", int(5)], ["x", variable("y")]]);
		const e = quantifier("forall", "i", int(0), variable("i"), binary(variable("i"), ">", x));
		assert(expressionKey(substitute(e, env)), "is equal to", "forall i in [0, 5). (i > y)");
	},
	"substitution-renames-a-bound-variable-it-would-capture"() {
		const env = new Map<string, ast.Expression>([["x", variable("i")]]);
		const e = quantifier("forall", "i", int(0), int(5), binary(variable("i"), ">", x));
		assert(expressionKey(substitute(e, env)), "is equal to", "forall i' in [0, 5). (i' > i)");
	},
	"locals-keep-their-meaning-inside-quantifiers"() {
		const fn = defineFunction({
			id: "f",
			parameters: [["i", ast.T_INT]],
			returnType: ast.T_INT,
			body: [
				let_("y", ast.T_INT, variable("i")),
				if_(quantifier("forall", "i", int(0), int(1), binary(variable("y"), "==", variable("i"))), [
					return_(int(1)),
				], [
					return_(int(0)),
				]),
			],
		});
		assert(shown(enumeratePaths(fn, 16)), "is equal to", [
			{ conditions: ["forall i' in [0, 1). (i == i')"], returned: "1" },
			{ conditions: ["not(forall i' in [0, 1). (i == i'))"], returned: "0" },
		]);
	},
	"expression-keys-ignore-locations"() {
		const a = binary(variable("x", at(1)), "<", int(3, at(5)), at(1, 5));
		const c = binary(x, "<", int(3));
		assert(expressionKey(a), "is equal to", expressionKey(c));
		assert(expressionKey(string("a\"b")), "is equal to", "\"a\\\"b\"");
		assert(expressionKey(callNamed("g", [x, int(2)])), "is equal to", "g(x, 2)");
	},
	"repeated-and-contradicted-conditions-are-pruned"() {
		const fn = intFunction([
			if_(b, [
				if_(b, [return_(int(1))], [return_(int(2))]),
			], [
				return_(int(3)),
			]),
		]);
		const enumeration = enumeratePaths(fn, 16);
		assert(shown(enumeration), "is equal to", [
			{ conditions: ["b"], returned: "1" },
			{ conditions: ["not(b)"], returned: "3" },
		]);
		assert(enumeration.tag === "paths" && enumeration.pruned, "is equal to", 1);
	},
	"literal-conditions-are-pruned"() {
		const fn = intFunction([
			if_(bool(false), [return_(int(1))]),
			return_(int(2)),
		]);
		const enumeration = enumeratePaths(fn, 16);
		assert(shown(enumeration), "is equal to", [{ conditions: [], returned: "2" }]);
		assert(enumeration.tag === "paths" && enumeration.pruned, "is equal to", 1);
	},
	"loops-are-unsupported"() {
		const fn = intFunction([
			if_(b, [while_(b, [], at(12))]),
			return_(x),
		]);
		assert(enumeratePaths(fn, 16), "is equal to", { tag: "unsupported", construct: "loop", location: at(12) });
	},
	"throwing-paths-are-dropped"() {
		const fn = intFunction([
			if_(binary(x, "<", int(0)), [throw_(string("negative"))]),
			return_(x),
		]);
		assert(shown(enumeratePaths(fn, 16)), "is equal to", [
			{ conditions: ["not((x < 0))"], returned: "x" },
		]);
	},
	"unit-functions-return-at-the-end"() {
		const fn = defineFunction({
			id: "log",
			parameters: [["b", ast.T_BOOLEAN]],
			body: [
				if_(b, [return_(null, at(8))]),
				evaluate(callNamed("System.Console.WriteLine")),
			],
			location: at(3),
		});
		const enumeration = enumeratePaths(fn, 16);
		assert(shown(enumeration), "is equal to", [
			{ conditions: ["b"], returned: null },
			{ conditions: ["not(b)"], returned: null },
		]);
		assert(enumeration.tag === "paths" && enumeration.paths.map(path => path.location), "is equal to", [at(8), at(3)]);
	},
	"falling-off-a-value-function-is-not-a-path"() {
		const fn = intFunction([if_(b, [return_(int(1))])]);
		assert(shown(enumeratePaths(fn, 16)), "is equal to", [{ conditions: ["b"], returned: "1" }]);
	},
	"path-limit"() {
		const body: ast.Statement[] = [];
		for (let i = 0; i < 4; i++) {
			body.push(if_(variable("c" + i), []));
		}
		body.push(return_(int(0)));
		const fn = intFunction(body);

		assert(enumeratePaths(fn, 10), "is equal to", { tag: "too-many-paths", limit: 10 });
		const all = enumeratePaths(fn, 16);
		assert(all.tag === "paths" && all.paths.length, "is equal to", 16);
	},
	"block-scoped-lets-are-restored"() {
		const shadowed = intFunction([
			let_("v", ast.T_INT, int(1)),
			if_(b, [let_("v", ast.T_INT, int(2))]),
			return_(variable("v")),
		]);
		assert(shown(enumeratePaths(shadowed, 16)), "is equal to", [
			{ conditions: ["b"], returned: "1" },
			{ conditions: ["not(b)"], returned: "1" },
		]);

		const assigned = intFunction([
			let_("v", ast.T_INT, int(1)),
			if_(b, [assign("v", int(2))]),
			return_(variable("v")),
		]);
		assert(shown(enumeratePaths(assigned, 16)), "is equal to", [
			{ conditions: ["b"], returned: "2" },
			{ conditions: ["not(b)"], returned: "1" },
		]);
	},
};
