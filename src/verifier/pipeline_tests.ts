import * as ast from "./ast.js";
import { VerificationCache } from "./cache.js";
import { ConfigurationError } from "./config.js";
import {
	at,
	binary,
	callExternal,
	defineFunction,
	evaluate,
	if_,
	int,
	result,
	return_,
	variable,
} from "./construct.js";
import { Severity } from "./diagnostics.js";
import { JsonManifestResolver } from "./manifest.js";
import { displaySummary, PassContext, runVerificationPass, VerificationReport } from "./pipeline.js";
import { assert, assertRejects, specDescribe } from "./test.js";
import { PreconditionCheck, VerificationOutcome } from "./verify.js";

const resolver = new JsonManifestResolver({
	version: "1.0",
	namespaces: {
		"Api": {
			types: {
				"Client": { members: { "Post": ["net:w"] } },
			},
		},
	},
}, "test");

const x = variable("x");
const PROVEN: VerificationOutcome = { tag: "proven" };
const CANCELLED: VerificationOutcome = { tag: "unproven", reason: "cancelled" };

const unit: ast.FunctionDefinition[] = [
	defineFunction({
		id: "abs",
		parameters: [["x", ast.T_INT]],
		returnType: ast.T_INT,
		ensures: [binary(result(), ">=", int(0))],
		body: [
			if_(binary(x, "<", int(0)), [return_(binary(int(0), "-", x))], [return_(x)]),
		],
	}),
	defineFunction({
		id: "decrement",
		parameters: [["x", ast.T_INT]],
		returnType: ast.T_INT,
		requires: [binary(x, ">=", int(0))],
		ensures: [binary(result(), ">=", int(0), at(20))],
		body: [return_(binary(x, "-", int(1)), at(30))],
	}),
	defineFunction({
		id: "fetch",
		effects: ["db:r"],
		body: [evaluate(callExternal("Api.Client.Post", [], at(7)))],
		location: at(0, 30),
	}),
	defineFunction({
		id: "spin",
		body: [evaluate(callExternal("Acme.Widget.Spin", [], at(9)))],
	}),
	defineFunction({
		id: "impossible",
		parameters: [["x", ast.T_INT]],
		returnType: ast.T_INT,
		requires: [binary(x, ">", int(0)), binary(x, "<", int(0))],
		ensures: [binary(result(), "==", int(1))],
		body: [return_(x)],
		location: at(60),
	}),
];

const DISPROVEN = "warning [contract-disproven] The postcondition of `decrement` at input:20+1 "
	+ "can be violated, for example when x=0, result=-1.";
const VIOLATION = "error [effect-violation] Function `fetch` performs the undeclared effect `net:w` (network write), "
	+ "but declares only [db:r]. It calls `Api.Client.Post` at input:7+1";
const UNKNOWN = "error [unknown-external-effect] Function `spin` calls `Acme.Widget.Spin`, whose effects are unknown. "
	+ "at input:9+1";
const UNCALLABLE = "warning [precondition-unsatisfiable] The preconditions of `impossible` can never be satisfied "
	+ "together, so it can never be called at input:60+1";

function pass(input: object, context: PassContext = {}): Promise<VerificationReport> {
	return runVerificationPass(unit, input, { resolver, ...context });
}

function rendered(report: VerificationReport): string[] {
	return report.diagnostics.map(d => d.render());
}

export const tests = {
	async "diagnostics-in-input-order"() {
		const report = await pass({ concurrency: 2 });
		assert(rendered(report), "is equal to", [DISPROVEN, VIOLATION, UNKNOWN, UNCALLABLE]);
		assert(report.cancelled, "is equal to", false);
	},
	async "outcomes-and-decisions"() {
		const report = await pass({ concurrency: 2 });
		const decrementOutcome = report.contracts.get(ast.contractID("decrement/ensures/0"));
		assert(decrementOutcome?.tag, "is equal to", "disproven");
		assert(report.contracts.get(ast.contractID("abs/ensures/0")), "is equal to", PROVEN);
		assert(report.contracts.get(ast.contractID("impossible/ensures/0")), "is equal to", PROVEN);

		assert([...report.decisions.keys()], "is equal to", [
			ast.contractID("abs/ensures/0"),
			ast.contractID("decrement/ensures/0"),
			ast.contractID("impossible/ensures/0"),
		]);
		assert([...report.decisions.values()].map(d => d.elide), "is equal to", [true, false, true]);

		const preconditions: PreconditionCheck[] = ["unchecked", "satisfiable", "unchecked", "unchecked", "unsatisfiable"];
		assert([...report.preconditions.values()], "is equal to", preconditions);
	},
	async "computed-effects"() {
		const report = await pass({ concurrency: 1 });
		assert(report.effects, "is not null");
		const displayed = [...report.effects].map(([id, effects]) => [id, effects.display()]);
		assert(displayed, "is equal to", [
			["abs", "[pure]"],
			["decrement", "[pure]"],
			["fetch", "[net:w]"],
			["spin", "[pure]"],
			["impossible", "[pure]"],
		]);
	},
	async "summary"() {
		const report = await pass({ concurrency: 2 });
		assert(report.summary, "is equal to", {
			functions: 5,
			proven: 2,
			disproven: 1,
			unproven: 0,
			unsupported: 0,
			elided: 2,
			effectViolations: 1,
			unknownExternals: 1,
		});
		assert(displaySummary(report.summary), "is equal to",
			"verified 5 functions: 2 proven, 1 disproven, 0 unproven, 0 unsupported; "
			+ "2 checks elided, 1 effect violations, 1 unknown externals");
	},
	async "verbose-logging"() {
		const lines: string[] = [];
		await pass({ verbose: true, concurrency: 2 }, { logger: line => lines.push(line) });
		assert(lines, "is equal to", [
			"postcondition abs/ensures/0 of `abs` is proven",
			"postcondition impossible/ensures/0 of `impossible` is proven",
			"verified 5 functions: 2 proven, 1 disproven, 0 unproven, 0 unsupported; "
			+ "2 checks elided, 1 effect violations, 1 unknown externals",
		]);

		const quiet: string[] = [];
		await pass({ concurrency: 2 }, { logger: line => quiet.push(line) });
		assert(quiet, "is equal to", []);
	},
	async "concurrency-does-not-change-the-report"() {
		const sequential = await pass({ concurrency: 1 });
		const concurrent = await pass({ concurrency: 4 });
		assert(rendered(concurrent), "is equal to", specDescribe(rendered(sequential), "diagnostics of a sequential pass"));
		assert(concurrent.contracts, "is equal to", sequential.contracts);
		assert(concurrent.summary, "is equal to", sequential.summary);
	},
	async "cancelled-before-starting"() {
		const controller = new AbortController();
		controller.abort();
		const report = await pass({ concurrency: 2 }, { signal: controller.signal });
		assert(report.cancelled, "is equal to", true);
		assert(report.contracts, "is equal to", new Map([
			[ast.contractID("abs/ensures/0"), CANCELLED],
			[ast.contractID("decrement/ensures/0"), CANCELLED],
			[ast.contractID("impossible/ensures/0"), CANCELLED],
		]));
		assert(report.summary.unproven, "is equal to", 3);
		assert(report.summary.elided, "is equal to", 0);
		assert(rendered(report), "is equal to", []);
	},
	async "effects-not-enforced"() {
		const report = await pass({ enforceEffects: false, concurrency: 2 });
		assert(report.effects, "is equal to", null);
		assert(rendered(report), "is equal to", [DISPROVEN, UNCALLABLE]);
		assert(report.summary.effectViolations, "is equal to", 0);
	},
	async "static-verification-disabled"() {
		const report = await pass({ staticVerification: false, concurrency: 2 });
		assert(rendered(report), "is equal to", [VIOLATION, UNKNOWN]);
		assert(report.contracts.size, "is equal to", 0);
		assert(report.preconditions.size, "is equal to", 0);
		assert(report.summary.elided, "is equal to", 0);
	},
	async "disproven-as-error"() {
		const report = await pass({ disprovenIsError: true, enforceEffects: false, concurrency: 2 });
		const severities: Severity[] = ["error", "warning"];
		assert(report.diagnostics.map(d => d.severity), "is equal to", severities);
	},
	async "cache-is-reused"() {
		const cache = new VerificationCache();
		const lines: string[] = [];
		const first = await pass({ verbose: true, concurrency: 2 }, { cache, logger: line => lines.push(line) });
		assert(cache.size, "is equal to", 5);

		lines.length = 0;
		const second = await pass({ verbose: true, concurrency: 2 }, { cache, logger: line => lines.push(line) });
		assert(lines[2], "is equal to", "verification cache: 5 hits, 5 misses");
		assert(second.contracts, "is equal to", first.contracts);
		assert(rendered(second), "is equal to", rendered(first));
	},
	async "invalid-options"() {
		await assertRejects(pass({ concurrency: 0 }), ConfigurationError);
		await assertRejects(pass({ bogus: true }), ConfigurationError);
	},
};
