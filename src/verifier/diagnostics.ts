import { ContractID, displayLocation, FunctionID, SourceLocation } from "./ast.js";
import { ALL_EFFECTS, describeEffect, EffectCode } from "./effects.js";

export type Severity = "error" | "warning" | "info";

export type DiagnosticKind = "effect-violation"
	| "unknown-external-effect"
	| "contract-disproven"
	| "precondition-unsatisfiable";

/// A `MessageElement` is either text or a reference to source, which a host
/// may render as a code excerpt.
export type MessageElement = string | SourceLocation;

/// `CallChainLink` references one call site along a chain of calls.
export interface CallChainLink {
	caller: FunctionID,

	/// The internal function's name, or the external member's qualified name.
	callee: string,

	calleeKind: "internal" | "external",
	location: SourceLocation,
}

/// `EffectOrigin` is the operation at the end of a call chain which actually
/// performs an effect.
export type EffectOrigin = { tag: "external-call", qualifiedName: string, location: SourceLocation }
	| { tag: "local-operation", functionID: FunctionID, operation: string, location: SourceLocation };

export type CounterexampleValue = { tag: "int", int: bigint } | { tag: "bool", bool: boolean };

export function displayValue(value: CounterexampleValue): string {
	return value.tag === "int" ? value.int.toString() : String(value.bool);
}

/// `displayCounterexample` renders a counterexample as `name=value` pairs, in
/// the map's order.
export function displayCounterexample(counterexample: ReadonlyMap<string, CounterexampleValue>): string {
	const pairs = [];
	for (const [name, value] of counterexample) {
		pairs.push(name + "=" + displayValue(value));
	}
	return pairs.join(", ");
}

export abstract class Diagnostic {
	abstract readonly kind: DiagnosticKind;

	constructor(
		readonly functionID: FunctionID,
		readonly severity: Severity,
		readonly message: MessageElement[],
		readonly location: SourceLocation,
	) { }

	render(): string {
		const text = this.message.map(e => typeof e === "string" ? e : "at " + displayLocation(e)).join(" ");
		return this.severity + " [" + this.kind + "] " + text;
	}

	toString(): string {
		return this.render();
	}
}

export class EffectViolationErr extends Diagnostic {
	override readonly kind = "effect-violation";
	readonly effect: EffectCode | typeof ALL_EFFECTS;
	readonly callChain: CallChainLink[];
	readonly origin: EffectOrigin | null;

	constructor(args: {
		functionID: FunctionID,
		functionName: string,
		effect: EffectCode | typeof ALL_EFFECTS,
		declared: string,
		callChain: CallChainLink[],
		origin: EffectOrigin | null,
		location: SourceLocation,
		severity: Severity,
	}) {
		const message: MessageElement[] = [
			"Function `" + args.functionName + "` performs the undeclared effect `" + args.effect
			+ "` (" + describeEffect(args.effect) + "), but declares only " + args.declared + ".",
		];
		for (const link of args.callChain) {
			message.push("It calls `" + link.callee + "`", link.location);
		}
		if (args.origin !== null && args.origin.tag === "local-operation") {
			message.push("The effect is performed by `" + args.origin.operation + "`", args.origin.location);
		}
		super(args.functionID, args.severity, message, args.location);
		this.effect = args.effect;
		this.callChain = args.callChain;
		this.origin = args.origin;
	}
}

export class UnknownExternalEffectErr extends Diagnostic {
	override readonly kind = "unknown-external-effect";
	readonly qualifiedName: string;

	constructor(args: {
		functionID: FunctionID,
		functionName: string,
		qualifiedName: string,
		reason: string | null,
		location: SourceLocation,
		severity: Severity,
	}) {
		super(args.functionID, args.severity, [
			"Function `" + args.functionName + "` calls `" + args.qualifiedName
			+ "`, whose effects are unknown"
			+ (args.reason === null ? "." : " (" + args.reason + ")."),
			args.location,
		], args.location);
		this.qualifiedName = args.qualifiedName;
	}
}

export class ContractDisprovenErr extends Diagnostic {
	override readonly kind = "contract-disproven";
	readonly contractID: ContractID;
	readonly counterexample: ReadonlyMap<string, CounterexampleValue>;

	constructor(args: {
		functionID: FunctionID,
		functionName: string,
		contractID: ContractID,
		counterexample: ReadonlyMap<string, CounterexampleValue>,
		location: SourceLocation,
		severity: Severity,
	}) {
		super(args.functionID, args.severity, [
			"The postcondition of `" + args.functionName + "`",
			args.location,
			"can be violated, for example when " + displayCounterexample(args.counterexample) + ".",
		], args.location);
		this.contractID = args.contractID;
		this.counterexample = args.counterexample;
	}
}

export class PreconditionUnsatisfiableErr extends Diagnostic {
	override readonly kind = "precondition-unsatisfiable";

	constructor(args: {
		functionID: FunctionID,
		functionName: string,
		location: SourceLocation,
	}) {
		super(args.functionID, "warning", [
			"The preconditions of `" + args.functionName + "` can never be satisfied together, so it can never be called",
			args.location,
		], args.location);
	}
}

/**
 * `InternalCompilerError` reports malformed input, such as a call to a
 * function id which was never defined. It is never a user-facing diagnostic.
 */
export class InternalCompilerError extends Error {
	constructor(message: string) {
		super("ICE: " + message);
		this.name = "InternalCompilerError";
	}
}
