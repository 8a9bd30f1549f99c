import * as cache_tests from "./cache_tests.js";
import * as callgraph_tests from "./callgraph_tests.js";
import * as config_tests from "./config_tests.js";
import * as data_tests from "./data_tests.js";
import * as effects_tests from "./effects_tests.js";
import * as formula_tests from "./formula_tests.js";
import * as lia_tests from "./lia_tests.js";
import * as manifest_tests from "./manifest_tests.js";
import * as paths_tests from "./paths_tests.js";
import * as pipeline_tests from "./pipeline_tests.js";
import * as policy_tests from "./policy_tests.js";
import * as propagate_tests from "./propagate_tests.js";
import * as sat_tests from "./sat_tests.js";
import * as scc_tests from "./scc_tests.js";
import * as scheduler_tests from "./scheduler_tests.js";
import * as smt_tests from "./smt_tests.js";
import * as trace_tests from "./trace_tests.js";
import * as translate_tests from "./translate_tests.js";
import * as verify_tests from "./verify_tests.js";

import * as util from "util";

export type Run = PassRun | FailRun;

export interface PassRun {
	name: string,
	type: "pass",
	elapsedMillis: number,
}

export interface FailRun {
	name: string,
	type: "fail",
	exception: unknown,
	elapsedMillis: number,
}

export type TestBody = () => void | Promise<void>;

export class TestRunner {
	runs: Run[] = [];

	constructor(private testNameFilter?: string) { }

	async runTest(name: string, body: TestBody): Promise<void> {
		if (name.indexOf(this.testNameFilter || "") < 0) {
			return;
		}

		const beforeMillis = Date.now();
		try {
			await body();
			const elapsedMillis = Date.now() - beforeMillis;
			this.runs.push({ name, type: "pass", elapsedMillis });
		} catch (e) {
			const elapsedMillis = Date.now() - beforeMillis;
			this.runs.push({ name, type: "fail", exception: e, elapsedMillis });
		}
	}

	async runTests(title: string, obj: { [k: string]: TestBody }): Promise<void> {
		for (const k in obj) {
			await this.runTest(title + "." + k, obj[k]);
		}
	}

	printReport(): number {
		const passed: PassRun[] = [];
		const failed: FailRun[] = [];
		for (const run of this.runs) {
			if (run.type === "pass") {
				passed.push(run);
			} else {
				failed.push(run);
			}
		}

		for (const pass of passed) {
			console.log("  pass  " + pass.name);
		}

		for (const failure of failed) {
			console.log("\u{25be}".repeat(80));
			console.log("  FAIL! " + failure.name);
			const indent = "      ";
			let exception: string;
			if (failure.exception instanceof Error) {
				exception = "(" + failure.exception.constructor.name + ") " + failure.exception.stack;
			} else {
				exception = util.inspect(failure.exception, { depth: 16 });
			}
			console.log(indent + exception.replace(/\t/g, "    ").replace(/\n/g, "\n" + indent));
			console.log("\u{25b4}".repeat(80));
		}

		console.log("");
		console.log("Passed: " + passed.length + ".");
		console.log("Failed: " + failed.length + (failed.length == 0 ? "." : "!"));

		if (this.runs.length !== 0) {
			let slowest = this.runs[0];
			for (let i = 1; i < this.runs.length; i++) {
				if (this.runs[i].elapsedMillis > slowest.elapsedMillis) {
					slowest = this.runs[i];
				}
			}
			console.log("Slowest: " + slowest.name + " took " + slowest.elapsedMillis + " ms");
		}

		if (passed.length === 0 || failed.length !== 0) {
			return 1;
		}
		return 0;
	}
}

type Comparison = { eq: true }
	| { eq: false, path: unknown[], expectedValue?: unknown, description?: string };

/// `Matcher` stands in for an expected value, deciding for itself whether a
/// tested value matches.
export class Matcher {
	constructor(readonly match: (test: unknown) => Comparison) { }
}

export type Spec<T> = T
	| (T extends object ? { [K in keyof T]: Spec<T[K]> } : never)
	| Matcher;

export function specDescribe<T>(value: Spec<T>, description: string, path?: string): Spec<T> {
	return new Matcher(test => {
		const cmp = deepEqual(test, value);
		if (cmp.eq === true) {
			return cmp;
		}
		cmp.description = description;
		if (path !== undefined) {
			cmp.path = [path, ...cmp.path];
		}
		return cmp;
	});
}

function deepEqual(a: unknown, b: unknown): Comparison {
	if (b instanceof Matcher) {
		return b.match(a);
	} else if (a === b) {
		return { eq: true };
	} else if (typeof a !== typeof b) {
		return { eq: false, path: [], expectedValue: b };
	} else if (a instanceof Set && b instanceof Set) {
		for (const v of a) {
			if (!b.has(v)) {
				return { eq: false, path: [v] };
			}
		}
		for (const v of b) {
			if (!a.has(v)) {
				return { eq: false, path: [v] };
			}
		}
		return { eq: true };
	} else if (a instanceof Set || b instanceof Set) {
		return { eq: false, path: [] };
	} else if (a instanceof Map && b instanceof Map) {
		for (const [k, v] of a) {
			if (!b.has(k)) {
				return { eq: false, path: [k] };
			}
			const cmp = deepEqual(v, b.get(k));
			if (!cmp.eq) {
				return { eq: false, path: [k, ...cmp.path], expectedValue: cmp.expectedValue };
			}
		}
		for (const k of b.keys()) {
			if (!a.has(k)) {
				return { eq: false, path: [k] };
			}
		}
		return { eq: true };
	} else if (a instanceof Map || b instanceof Map) {
		return { eq: false, path: [] };
	} else if (typeof a === "object" && typeof b === "object") {
		if (a === null || b === null) {
			return { eq: false, path: [], expectedValue: b };
		}

		const expected = new Map<string, unknown>(Object.entries(b));
		const checked = new Set<string>();
		for (const [k, v] of Object.entries(a)) {
			const cmp = deepEqual(v, expected.get(k));
			if (!cmp.eq) {
				return { eq: false, path: [k, ...cmp.path], expectedValue: cmp.expectedValue };
			}
			checked.add(k);
		}
		for (const k of expected.keys()) {
			if (!checked.has(k)) {
				return { eq: false, path: [k] };
			}
		}
		return { eq: true };
	}
	return { eq: false, path: [], expectedValue: b };
}

type ErrorClass = abstract new (...args: never[]) => Error;

export function assert<A, B extends A>(a: A, op: "is equal to", b: Spec<B>): asserts a is B;
export function assert<A>(a: A, op: "is array"): asserts a is Extract<A, readonly unknown[]>;
export function assert(a: () => unknown, op: "throws", e: ErrorClass): void;
export function assert<A>(a: A | null, op: "is not null"): asserts a is A;

export function assert(...args: [unknown, "is equal to", unknown] | [unknown, "is array"] | [() => unknown, "throws", ErrorClass] | [unknown, "is not null"]): void {
	if (args[1] === "is equal to") {
		const [a, _, b] = args;
		const cmp = deepEqual(a, b);
		if (!cmp.eq) {
			const sa = util.inspect(a, { depth: 16, colors: true });
			const sb = util.inspect("expectedValue" in cmp ? cmp.expectedValue : b, { depth: 16, colors: true });
			const expected = cmp.description !== undefined ? " (" + cmp.description + ")" : "";
			throw new Error(`Expected \n${sa}\nto be equal to\n${sb}${expected}\nbut found difference in path \`${util.inspect(cmp.path)}\``);
		}
	} else if (args[1] === "is array") {
		const [a] = args;
		if (!Array.isArray(a)) {
			throw new Error("Expected `" + util.inspect(a, { depth: 16 }) + "` to be an array.");
		}
	} else if (args[1] === "throws") {
		const [f, _, expected] = args;
		let threw = false;
		try {
			f();
		} catch (e) {
			if (!(e instanceof expected)) {
				throw e;
			}
			threw = true;
		}
		if (!threw) {
			throw new Error(`Expected an error to be thrown.`);
		}
	} else if (args[1] === "is not null") {
		const a = args[0];
		if (a === null) {
			throw new Error(`Expected \nnull\nto be not null.`);
		}
	} else {
		const _: never = args;
		throw new Error("unhandled assertion type `" + JSON.stringify(args[1]) + "`");
	}
}

/// `assertRejects(p, e)` waits for `p`, which must be rejected with an
/// instance of `e`.
export async function assertRejects(p: Promise<unknown>, expected: ErrorClass): Promise<void> {
	try {
		await p;
	} catch (e) {
		if (!(e instanceof expected)) {
			throw e;
		}
		return;
	}
	throw new Error(`Expected the promise to be rejected.`);
}

const testRunner = new TestRunner(process.argv[2]);

await testRunner.runTests("data_tests", data_tests.tests);
await testRunner.runTests("effects_tests", effects_tests.tests);
await testRunner.runTests("manifest_tests", manifest_tests.tests);
await testRunner.runTests("callgraph_tests", callgraph_tests.tests);
await testRunner.runTests("scc_tests", scc_tests.tests);
await testRunner.runTests("propagate_tests", propagate_tests.tests);
await testRunner.runTests("formula_tests", formula_tests.tests);
await testRunner.runTests("translate_tests", translate_tests.tests);
await testRunner.runTests("paths_tests", paths_tests.tests);
await testRunner.runTests("sat_tests", sat_tests.tests);
await testRunner.runTests("smt_tests", smt_tests.tests);
await testRunner.runTests("lia_tests", lia_tests.tests);
await testRunner.runTests("verify_tests", verify_tests.tests);
await testRunner.runTests("policy_tests", policy_tests.tests);
await testRunner.runTests("cache_tests", cache_tests.tests);
await testRunner.runTests("scheduler_tests", scheduler_tests.tests);
await testRunner.runTests("config_tests", config_tests.tests);
await testRunner.runTests("trace_tests", trace_tests.tests);
await testRunner.runTests("pipeline_tests", pipeline_tests.tests);
process.exitCode = testRunner.printReport();
