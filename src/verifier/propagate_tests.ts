import * as ast from "./ast.js";
import { buildCallGraph } from "./callgraph.js";
import { UnknownExternalPolicy } from "./config.js";
import {
	at,
	callExternal,
	callNamed,
	defineFunction,
	evaluate,
	int,
	primitive,
	store,
	string,
	throw_,
	variable,
} from "./construct.js";
import { EffectViolationErr, InternalCompilerError } from "./diagnostics.js";
import { JsonManifestResolver } from "./manifest.js";
import { EffectPassResult, localEffects, propagateEffects } from "./propagate.js";
import { WorkPool } from "./scheduler.js";
import { assert, assertRejects } from "./test.js";

const resolver = new JsonManifestResolver({
	version: "1.0",
	namespaces: {
		"Api": {
			types: {
				"Client": { members: { "Post": ["net:w"], "Get": ["net:r"] } },
			},
		},
		"Disk": {
			types: {
				"File": { members: { "Read": ["fs:r"], "Write": ["fs:w"] } },
			},
		},
		"Bad": {
			types: {
				"Thing": { members: { "Do": ["nope"] } },
			},
		},
	},
}, "test");

function propagate(
	functions: ast.FunctionDefinition[],
	unknownExternalPolicy: UnknownExternalPolicy = "strict",
	pool?: WorkPool,
): Promise<EffectPassResult> {
	return propagateEffects(buildCallGraph(functions), resolver, { unknownExternalPolicy, pool });
}

function displayed(result: EffectPassResult): Record<string, string> {
	const out: Record<string, string> = {};
	for (const [id, effects] of result.computed) {
		out[id] = effects.display();
	}
	return out;
}

function rendered(result: EffectPassResult, id: string): string[] {
	return (result.diagnostics.get(ast.functionID(id)) ?? []).map(d => d.render());
}

export const tests = {
	"localEffects"() {
		const fn = defineFunction({
			id: "f",
			parameters: [["box", { tag: "type-named", name: "Box" }]],
			body: [
				primitive("print", "cw", [string("hi")], at(1)),
				store(variable("box"), "count", int(1), at(2)),
				throw_(string("boom"), at(3)),
			],
		});
		assert(localEffects(fn), "is equal to", [
			{ code: "cw", operation: "print", location: at(1) },
			{ code: "mut", operation: "store to `.count`", location: at(2) },
			{ code: "throw", operation: "throw", location: at(3) },
		]);
	},
	async "acyclic-propagation-is-exact"() {
		const result = await propagate([
			defineFunction({ id: "top", effects: ["*"], body: [evaluate(callNamed("mid")), primitive("clock", "time")] }),
			defineFunction({ id: "mid", effects: ["*"], body: [evaluate(callNamed("leaf1")), evaluate(callNamed("leaf2")), throw_(int(0))] }),
			defineFunction({ id: "leaf1", effects: ["*"], body: [primitive("print", "cw")] }),
			defineFunction({ id: "leaf2", effects: ["*"], body: [evaluate(callExternal("Disk.File.Read"))] }),
			defineFunction({ id: "idle", effects: [] }),
		]);

		assert(displayed(result), "is equal to", {
			top: "[cw, fs:r, time, throw]",
			mid: "[cw, fs:r, throw]",
			leaf1: "[cw]",
			leaf2: "[fs:r]",
			idle: "[pure]",
		});
		assert(result.iterations, "is equal to", [0, 0, 0, 0, 0]);
		assert(result.cancelled, "is equal to", false);
		for (const diagnostics of result.diagnostics.values()) {
			assert(diagnostics, "is equal to", []);
		}
	},
	async "cyclic-propagation-converges"() {
		const result = await propagate([
			defineFunction({ id: "f", effects: ["cw", "fs:r"], body: [primitive("print", "cw"), evaluate(callNamed("g"))] }),
			defineFunction({ id: "g", effects: ["cw", "fs:r"], body: [evaluate(callExternal("Disk.File.Read")), evaluate(callNamed("f"))] }),
		]);

		assert(displayed(result), "is equal to", { f: "[cw, fs:r]", g: "[cw, fs:r]" });
		assert(result.iterations, "is equal to", [2]);
		assert(rendered(result, "f"), "is equal to", []);
		assert(rendered(result, "g"), "is equal to", []);
	},
	async "self-recursion"() {
		const result = await propagate([
			defineFunction({ id: "loop", effects: ["cw"], body: [primitive("print", "cw"), evaluate(callNamed("loop"))] }),
		]);
		assert(displayed(result), "is equal to", { loop: "[cw]" });
		assert(result.iterations, "is equal to", [1]);
	},
	async "violation-names-the-call-site"() {
		const result = await propagate([
			defineFunction({
				id: "fetch",
				effects: ["db:r"],
				body: [evaluate(callExternal("Api.Client.Post", [], at(7)))],
				location: at(0, 30),
			}),
		]);

		const diagnostics = result.diagnostics.get(ast.functionID("fetch")) ?? [];
		assert(diagnostics.length, "is equal to", 1);
		const violation = diagnostics[0];
		if (!(violation instanceof EffectViolationErr)) {
			throw new Error("expected an EffectViolationErr");
		}
		assert(violation.effect, "is equal to", "net:w");
		assert(violation.severity, "is equal to", "error");
		assert(violation.callChain, "is equal to", [
			{ caller: ast.functionID("fetch"), callee: "Api.Client.Post", calleeKind: "external", location: at(7) },
		]);
		assert(violation.origin, "is equal to", { tag: "external-call", qualifiedName: "Api.Client.Post", location: at(7) });
		assert(violation.location, "is equal to", at(0, 30));
		assert(violation.render(), "is equal to",
			"error [effect-violation] Function `fetch` performs the undeclared effect `net:w` (network write), "
			+ "but declares only [db:r]. It calls `Api.Client.Post` at input:7+1");
	},
	async "violation-through-callees"() {
		const result = await propagate([
			defineFunction({ id: "main", effects: [], body: [evaluate(callNamed("helper", [], at(3)))] }),
			defineFunction({ id: "helper", effects: ["cw"], body: [evaluate(callNamed("log", [], at(5)))] }),
			defineFunction({ id: "log", effects: ["cw"], body: [primitive("print", "cw", [], at(9))] }),
		]);

		assert(rendered(result, "helper"), "is equal to", []);
		assert(rendered(result, "log"), "is equal to", []);
		assert(rendered(result, "main"), "is equal to", [
			"error [effect-violation] Function `main` performs the undeclared effect `cw` (console output), "
			+ "but declares only [pure]. It calls `helper` at input:3+1 It calls `log` at input:5+1 "
			+ "The effect is performed by `print` at input:9+1",
		]);
	},
	async "violation-per-undeclared-code"() {
		const result = await propagate([
			defineFunction({
				id: "sync",
				effects: ["fs:r"],
				body: [
					evaluate(callExternal("Disk.File.Write")),
					evaluate(callExternal("Api.Client.Get")),
					evaluate(callExternal("Disk.File.Read")),
				],
			}),
		]);
		const diagnostics = result.diagnostics.get(ast.functionID("sync")) ?? [];
		assert(diagnostics.map(d => d instanceof EffectViolationErr ? d.effect : d.kind), "is equal to", ["fs:w", "net:r"]);
	},
	async "read-write-declarations-cover-reads-and-writes"() {
		const result = await propagate([
			defineFunction({ id: "reader", effects: ["fs:r"], body: [evaluate(callExternal("Disk.File.Read"))] }),
			defineFunction({ id: "writer", effects: ["fs:w"], body: [evaluate(callExternal("Disk.File.Write"))] }),
			defineFunction({ id: "both", effects: ["fs:rw"], body: [evaluate(callNamed("reader")), evaluate(callNamed("writer"))] }),
			defineFunction({ id: "readOnly", effects: ["fs:r"], body: [evaluate(callNamed("writer", [], at(12)))] }),
		]);

		assert(displayed(result).both, "is equal to", "[fs:rw]");
		assert(rendered(result, "both"), "is equal to", []);

		const diagnostics = result.diagnostics.get(ast.functionID("readOnly")) ?? [];
		assert(diagnostics.length, "is equal to", 1);
		const violation = diagnostics[0];
		if (!(violation instanceof EffectViolationErr)) {
			throw new Error("expected an EffectViolationErr");
		}
		assert(violation.effect, "is equal to", "fs:w");
		assert(violation.callChain.map(link => link.callee), "is equal to", ["writer", "Disk.File.Write"]);
		assert(violation.callChain.map(link => link.calleeKind), "is equal to", ["internal", "external"]);
	},
	async "unknown-external-strict"() {
		const result = await propagate([
			defineFunction({ id: "f", effects: [], body: [evaluate(callExternal("Acme.Thing.Do", [], at(3)))] }),
		], "strict");
		assert(displayed(result), "is equal to", { f: "[pure]" });
		assert(rendered(result, "f"), "is equal to", [
			"error [unknown-external-effect] Function `f` calls `Acme.Thing.Do`, whose effects are unknown. at input:3+1",
		]);
	},
	async "unknown-external-warn-assumes-every-effect"() {
		const result = await propagate([
			defineFunction({ id: "f", effects: ["cw"], body: [evaluate(callExternal("Acme.Thing.Do", [], at(3)))] }),
		], "warn");
		assert(displayed(result), "is equal to", { f: "[*]" });
		assert(rendered(result, "f"), "is equal to", [
			"warning [unknown-external-effect] Function `f` calls `Acme.Thing.Do`, whose effects are unknown. at input:3+1",
			"error [effect-violation] Function `f` performs the undeclared effect `*` (any effect), "
			+ "but declares only [cw]. It calls `Acme.Thing.Do` at input:3+1",
		]);
	},
	async "unknown-external-permissive"() {
		const result = await propagate([
			defineFunction({ id: "anything", effects: ["*"], body: [evaluate(callExternal("Acme.Thing.Do", [], at(6)))] }),
			defineFunction({ id: "caller", effects: ["cw"], body: [evaluate(callNamed("anything", [], at(4)))] }),
		], "permissive");
		assert(displayed(result), "is equal to", { anything: "[*]", caller: "[*]" });
		assert(rendered(result, "anything"), "is equal to", []);
		assert(rendered(result, "caller"), "is equal to", [
			"error [effect-violation] Function `caller` performs the undeclared effect `*` (any effect), "
			+ "but declares only [cw]. It calls `anything` at input:4+1 It calls `Acme.Thing.Do` at input:6+1",
		]);
	},
	async "manifest-errors-are-always-reported"() {
		const result = await propagate([
			defineFunction({ id: "f", effects: ["*"], body: [evaluate(callExternal("Bad.Thing.Do", [], at(2)))] }),
		], "permissive");
		assert(rendered(result, "f"), "is equal to", [
			"warning [unknown-external-effect] Function `f` calls `Bad.Thing.Do`, whose effects are unknown "
			+ "(manifest `test` lists unknown effect code(s) `nope` for `Bad.Thing.Do`). at input:2+1",
		]);
	},
	async "concurrent-groups-match-sequential"() {
		const functions: ast.FunctionDefinition[] = [];
		for (let i = 0; i < 12; i++) {
			functions.push(defineFunction({
				id: "f" + i,
				effects: i % 3 === 0 ? [] : ["cw"],
				body: i % 2 === 0
					? [primitive("print", "cw")]
					: [evaluate(callNamed("f" + (i - 1)))],
			}));
		}
		const sequential = await propagate(functions, "strict", new WorkPool(1));
		const concurrent = await propagate(functions, "strict", new WorkPool(4));

		assert(displayed(concurrent), "is equal to", displayed(sequential));
		assert([...concurrent.diagnostics.keys()], "is equal to", [...sequential.diagnostics.keys()]);
		for (const [id, diagnostics] of sequential.diagnostics) {
			assert(rendered(concurrent, id), "is equal to", diagnostics.map(d => d.render()));
		}
		assert(rendered(sequential, "f0").length, "is equal to", 1);
		assert(rendered(sequential, "f3").length, "is equal to", 1);
	},
	async "cancelled-before-start"() {
		const controller = new AbortController();
		controller.abort();
		const result = await propagateEffects(buildCallGraph([defineFunction({ id: "f" })]), resolver, {
			unknownExternalPolicy: "strict",
			signal: controller.signal,
		});
		assert(result.cancelled, "is equal to", true);
		assert(result.computed.size, "is equal to", 0);
	},
	async "malformed-declarations"() {
		await assertRejects(propagate([defineFunction({ id: "f", effects: ["disk"] })]), InternalCompilerError);
		await assertRejects(propagate([defineFunction({ id: "g", body: [primitive("beep", "sound")] })]), InternalCompilerError);
	},
};
