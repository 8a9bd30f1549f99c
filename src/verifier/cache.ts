import { createHash } from "crypto";
import * as ast from "./ast.js";
import { FunctionVerification } from "./verify.js";

/// The settings which can change the outcome of verifying a function.
export interface CacheSettings {
	maxPaths: number,
	maxQuantifierExpansion: number,
	checkPreconditions: boolean,
}

function canonicalJSON(value: unknown): string {
	return JSON.stringify(value, (_, v: unknown) => typeof v === "bigint" ? v.toString() + "n" : v);
}

/// A result is only reused when running out of budget played no part in
/// it, since a rerun may be given more time.
function isStable(verification: FunctionVerification): boolean {
	if (verification.preconditions === "unknown") {
		return false;
	}
	for (const outcome of verification.postconditions.values()) {
		if (outcome.tag === "unproven" && outcome.reason !== "complexity") {
			return false;
		}
	}
	return true;
}

function copy(verification: FunctionVerification): FunctionVerification {
	return {
		functionID: verification.functionID,
		postconditions: new Map(verification.postconditions),
		preconditions: verification.preconditions,
	};
}

/**
 * `VerificationCache` remembers the contract verification of functions
 * across passes, keyed by a SHA-256 hash of everything the result depends
 * on.
 */
export class VerificationCache {
	private readonly entries = new Map<string, FunctionVerification>();
	hits = 0;
	misses = 0;

	static keyOf(fn: ast.FunctionDefinition, settings: CacheSettings): string {
		const hash = createHash("sha256");
		hash.update(canonicalJSON({
			settings: [settings.maxPaths, settings.maxQuantifierExpansion, settings.checkPreconditions],
			function: fn,
		}));
		return hash.digest("hex");
	}

	get(key: string): FunctionVerification | null {
		const entry = this.entries.get(key);
		if (entry === undefined) {
			this.misses += 1;
			return null;
		}
		this.hits += 1;
		return copy(entry);
	}

	/// `set` returns whether the result was stored.
	set(key: string, verification: FunctionVerification): boolean {
		if (!isStable(verification)) {
			return false;
		}
		this.entries.set(key, copy(verification));
		return true;
	}

	get size(): number {
		return this.entries.size;
	}
}
