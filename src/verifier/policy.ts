import * as ast from "./ast.js";
import { ContractDisprovenErr, Diagnostic } from "./diagnostics.js";
import { VerificationOutcome } from "./verify.js";

/// `ContractDecision` is what the compiler does with one postcondition's
/// runtime check.
export interface ContractDecision {
	/// Whether the runtime check may be omitted from the generated code.
	elide: boolean,

	diagnostic: Diagnostic | null,

	/// A note for verbose output, or `null` when there is nothing to say.
	note: string | null,
}

export interface PolicyOptions {
	disprovenIsError: boolean,
}

export function describeOutcome(outcome: VerificationOutcome): string {
	switch (outcome.tag) {
		case "proven":
			return "proven";
		case "disproven":
			return "disproven";
		case "unproven":
			return "unproven (" + outcome.reason + ")";
		case "unsupported":
			return "unsupported (" + outcome.construct + " at " + ast.displayLocation(outcome.location) + ")";
	}
}

/**
 * `classify` decides the fate of a postcondition's runtime check.
 *
 * Only a proven postcondition has its check elided. A disproven one is
 * always reported. Unproven and unsupported postcondition checks stay in
 * place without a diagnostic.
 */
export function classify(
	fn: ast.FunctionDefinition,
	contract: ast.Contract,
	outcome: VerificationOutcome,
	options: PolicyOptions,
): ContractDecision {
	const note = "postcondition " + contract.id + " of `" + fn.name + "` is " + describeOutcome(outcome);
	switch (outcome.tag) {
		case "proven":
			return { elide: true, diagnostic: null, note };
		case "disproven":
			return {
				elide: false,
				diagnostic: new ContractDisprovenErr({
					functionID: fn.id,
					functionName: fn.name,
					contractID: contract.id,
					counterexample: outcome.counterexample,
					location: contract.location,
					severity: options.disprovenIsError ? "error" : "warning",
				}),
				note,
			};
		case "unproven":
		case "unsupported":
			return { elide: false, diagnostic: null, note };
	}
}
