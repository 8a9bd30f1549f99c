import * as ast from "./ast.js";
import {
	at,
	binary,
	bool,
	callNamed,
	conditional,
	defineFunction,
	float,
	int,
	not,
	quantifier,
	result,
	string,
	variable,
} from "./construct.js";
import { InternalCompilerError } from "./diagnostics.js";
import { displayFormula, Formula } from "./formula.js";
import { assert } from "./test.js";
import { ContractTranslator, contextFor, Translation, translateContract } from "./translate.js";

const fn = defineFunction({
	id: "f",
	parameters: [
		["x", ast.T_INT],
		["y", ast.T_INT],
		["b", ast.T_BOOLEAN],
		["ratio", ast.T_FLOAT],
		["shape", { tag: "type-named", name: "Shape" }],
	],
	returnType: ast.T_INT,
});

function shown(translation: Translation<Formula>): string {
	if (translation.tag === "unsupported") {
		return "unsupported: " + translation.construct;
	}
	return displayFormula(translation.value);
}

function lower(e: ast.Expression, returned: ast.Expression | null = null, maxQuantifierExpansion = 256): string {
	return shown(translateContract(fn, e, returned, maxQuantifierExpansion));
}

const x = variable("x");
const y = variable("y");
const b = variable("b");

export const tests = {
	"linear-comparisons"() {
		assert(lower(binary(binary(x, "+", binary(int(2), "*", y)), ">", int(3))), "is equal to", "-x - 2*y + 4 <= 0");
		assert(lower(binary(x, "<", y)), "is equal to", "x - y + 1 <= 0");
		assert(lower(binary(binary(x, "*", int(-3)), "<=", binary(int(0), "-", y))), "is equal to", "-3*x + y <= 0");
		assert(lower(binary(x, "!=", x)), "is equal to", "false");
	},
	"boolean-structure"() {
		assert(lower(binary(b, "&&", not(binary(x, "==", y)))), "is equal to", "(b && !((x - y <= 0 && -x + y <= 0)))");
		assert(lower(binary(b, "==>", binary(x, ">=", int(0)))), "is equal to", "(!(b) || -x <= 0)");
		assert(lower(binary(b, "==", bool(false))), "is equal to", "!(b)");
	},
	"integer-conditionals-split-into-pieces"() {
		assert(lower(binary(conditional(b, x, int(0)), "<=", int(5))), "is equal to", "((b && x - 5 <= 0) || !(b))");
	},
	"constant-division-folds"() {
		assert(lower(binary(x, ">=", binary(int(7), "/", int(2)))), "is equal to", "-x + 3 <= 0");
		assert(lower(binary(x, ">=", binary(int(-7), "%", int(2)))), "is equal to", "-x - 1 <= 0");
	},
	"unsupported-constructs"() {
		assert(lower(binary(x, "<", float(1.5))), "is equal to", "unsupported: floating-point literal");
		assert(lower(binary(variable("ratio"), "<", int(1))), "is equal to", "unsupported: floating-point value `ratio`");
		assert(lower(binary(variable("shape"), "==", variable("shape"))), "is equal to", "unsupported: value `shape` of type Shape");
		assert(lower(binary(string("a"), "==", string("a"))), "is equal to", "unsupported: string literal");
		assert(lower(binary(binary(x, "*", y), ">", int(0))), "is equal to", "unsupported: non-linear multiplication");
		assert(lower(binary(binary(x, "/", int(2)), ">", int(0))), "is equal to", "unsupported: division");
		assert(lower(binary(binary(int(1), "%", int(0)), ">", int(0))), "is equal to", "unsupported: remainder");
	},
	"calls-are-unsupported-and-located"() {
		const translation = translateContract(fn, binary(callNamed("abs", [x], at(5)), ">=", int(0)), null, 256);
		assert(translation, "is equal to", { tag: "unsupported", construct: "function call", location: at(5) });
	},
	"nothing-is-partially-translated"() {
		// The supported conjunct is not kept.
		const e = binary(binary(x, ">", int(0)), "&&", binary(callNamed("ok"), "==", bool(true)));
		assert(translateContract(fn, e, null, 256).tag, "is equal to", "unsupported");
	},
	"bounded-quantifiers-expand"() {
		const i = variable("i");
		assert(
			lower(quantifier("forall", "i", int(0), int(3), binary(binary(x, "+", i), ">=", int(0)))),
			"is equal to",
			"(-x <= 0 && -x - 1 <= 0 && -x - 2 <= 0)",
		);
		assert(
			lower(quantifier("exists", "i", int(1), binary(int(1), "+", int(2)), binary(x, "==", i))),
			"is equal to",
			"((x - 1 <= 0 && -x + 1 <= 0) || (x - 2 <= 0 && -x + 2 <= 0))",
		);
		assert(lower(quantifier("exists", "i", int(0), int(0), binary(x, "==", i))), "is equal to", "false");
		assert(lower(quantifier("forall", "i", int(5), int(0), bool(false))), "is equal to", "true");
	},
	"quantifier-limits"() {
		const body = binary(variable("i"), ">=", int(0));
		assert(lower(quantifier("forall", "i", int(0), int(5), body), null, 4), "is equal to", "unsupported: quantifier over more than 4 values");
		assert(lower(quantifier("forall", "i", int(0), int(4), body), null, 4), "is equal to", "true");
		assert(lower(quantifier("forall", "i", int(0), x, body)), "is equal to", "unsupported: quantifier over a range which is not constant");
	},
	"result-stands-for-the-returned-expression"() {
		assert(lower(binary(result(), ">=", int(0)), binary(x, "-", int(1))), "is equal to", "-x + 1 <= 0");
		assert(lower(binary(result(), "==", x), conditional(b, x, y)), "is equal to", "(b || (!(b) && -x + y <= 0 && x - y <= 0))");
	},
	"result-of-unsupported-type"() {
		const shapeFunction = defineFunction({ id: "g", returnType: { tag: "type-named", name: "Shape" } });
		assert(
			shown(translateContract(shapeFunction, binary(result(), "==", result()), variable("s"), 256)),
			"is equal to",
			"unsupported: result of type Shape",
		);
	},
	"malformed-contracts"() {
		assert(() => lower(binary(variable("z"), ">", int(0))), "throws", InternalCompilerError);
		assert(() => lower(binary(result(), ">", int(0))), "throws", InternalCompilerError);
		assert(() => lower(binary(x, "&&", b)), "throws", InternalCompilerError);
	},
	"translateValue"() {
		const translator = new ContractTranslator(contextFor(fn, null, 256));
		const value = translator.translateValue(binary(x, "+", int(1)));
		assert(value.tag === "translated" && value.value.sort, "is equal to", "int");
		const truth = translator.translateValue(binary(x, "<", int(1)));
		assert(truth.tag === "translated" && truth.value.sort, "is equal to", "bool");
	},
};
