import { z } from "zod";
import { FunctionID } from "./ast.js";

/// How calls to external members with no manifest entry are treated.
/// * `"strict"`: report an error, and assume nothing about the call.
/// * `"warn"`: report a warning, and assume the call may have any effect.
/// * `"permissive"`: silently assume the call may have any effect.
export const UnknownExternalPolicy = z.enum(["strict", "warn", "permissive"]);
export type UnknownExternalPolicy = z.infer<typeof UnknownExternalPolicy>;

const Millis = z.number().int().positive();

export const VerifierOptions = z.object({
	/// Whether contracts are verified statically at all.
	staticVerification: z.boolean().default(true),

	/// Whether declared effects are enforced. Disabling this skips the effect
	/// pass entirely.
	enforceEffects: z.boolean().default(true),

	unknownExternalPolicy: UnknownExternalPolicy.default("strict"),

	/// The budget for proving the postconditions of one function.
	solverTimeoutMs: Millis.default(5_000),

	/// Per-function budgets, keyed by function id.
	timeoutOverrides: z.record(Millis).default({}),

	/// Report disproven contracts as errors rather than warnings.
	disprovenIsError: z.boolean().default(false),

	/// Check that each function's preconditions can be satisfied together.
	checkPreconditions: z.boolean().default(true),

	/// Log unproven and unsupported contracts, and a summary of each pass.
	verbose: z.boolean().default(false),

	/// The number of concurrent jobs; the number of available cores when
	/// absent.
	concurrency: z.number().int().positive().optional(),

	/// Functions with more paths than this are not verified.
	maxPaths: z.number().int().positive().default(1024),

	/// Quantifiers over wider ranges than this are unsupported.
	maxQuantifierExpansion: z.number().int().positive().default(256),
}).strict();

export type VerifierOptions = z.output<typeof VerifierOptions>;
export type VerifierOptionsInput = z.input<typeof VerifierOptions>;

export class ConfigurationError extends Error {
	constructor(readonly issues: string[]) {
		super("invalid verifier options:\n\t" + issues.join("\n\t"));
		this.name = "ConfigurationError";
	}
}

/**
 * `resolveOptions` validates options supplied by a host (for example, parsed
 * from command line flags) and fills in defaults.
 *
 * @throws ConfigurationError
 */
export function resolveOptions(input: unknown = {}): VerifierOptions {
	const parsed = VerifierOptions.safeParse(input);
	if (!parsed.success) {
		throw new ConfigurationError(parsed.error.issues.map(issue => {
			const path = issue.path.length === 0 ? "(options)" : issue.path.join(".");
			return path + ": " + issue.message;
		}));
	}
	return parsed.data;
}

export function timeoutFor(options: VerifierOptions, id: FunctionID): number {
	if (Object.prototype.hasOwnProperty.call(options.timeoutOverrides, id)) {
		return options.timeoutOverrides[id];
	}
	return options.solverTimeoutMs;
}
