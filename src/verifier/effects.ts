import { InternalCompilerError } from "./diagnostics.js";

/// The closed set of effect codes a function may declare.
///
/// Codes of the form `family:r`, `family:w` and `family:rw` name read, write
/// and read/write access to one resource family. `family:rw` is a supertype of
/// both `family:r` and `family:w`.
export const EFFECT_CODES = [
	"cw", "cr",
	"fs:r", "fs:w", "fs:rw",
	"net:r", "net:w", "net:rw",
	"db:r", "db:w", "db:rw",
	"env:r", "env:w", "env:rw",
	"proc",
	"alloc", "unsafe",
	"time", "rand",
	"mut", "throw",
] as const;

export type EffectCode = typeof EFFECT_CODES[number];

/// `"*"` declares (or stands for) every effect; it is the top of the lattice.
export const ALL_EFFECTS = "*";

const DESCRIPTIONS: Record<EffectCode, string> = {
	"cw": "console output",
	"cr": "console input",
	"fs:r": "filesystem read",
	"fs:w": "filesystem write",
	"fs:rw": "filesystem read/write",
	"net:r": "network read",
	"net:w": "network write",
	"net:rw": "network read/write",
	"db:r": "database read",
	"db:w": "database write",
	"db:rw": "database read/write",
	"env:r": "environment read",
	"env:w": "environment write",
	"env:rw": "environment read/write",
	"proc": "process control",
	"alloc": "memory allocation",
	"unsafe": "unsafe memory access",
	"time": "system time",
	"rand": "randomness",
	"mut": "mutation",
	"throw": "exception",
};

export function isEffectCode(code: string): code is EffectCode {
	return Object.prototype.hasOwnProperty.call(DESCRIPTIONS, code);
}

export function describeEffect(code: EffectCode | typeof ALL_EFFECTS): string {
	if (code === ALL_EFFECTS) {
		return "any effect";
	}
	return DESCRIPTIONS[code];
}

/// Atoms are the codes which are not the union of other codes. Every set is
/// represented as a bitmask over atoms.
const ATOMS: readonly EffectCode[] = EFFECT_CODES.filter(code => !code.endsWith(":rw"));

function atomBit(code: EffectCode): number {
	const index = ATOMS.indexOf(code);
	if (index < 0) {
		throw new InternalCompilerError("`" + code + "` is not an atomic effect");
	}
	return 1 << index;
}

function codeBits(code: EffectCode): number {
	if (code.endsWith(":rw")) {
		const family = code.substring(0, code.length - 3);
		return bitsOfFamily(family);
	}
	return atomBit(code);
}

function bitsOfFamily(family: string): number {
	let bits = 0;
	for (const atom of ATOMS) {
		if (atom === family + ":r" || atom === family + ":w") {
			bits |= atomBit(atom);
		}
	}
	return bits;
}

/**
 * `EffectSet` is an immutable element of the effect join-semilattice.
 *
 * The lattice is the powerset of atomic effects, ordered by inclusion, with an
 * additional top element `*` standing for "any effect". A read/write code
 * contributes both of its atoms, so `{fs:rw}` and `{fs:r, fs:w}` are the same
 * set.
 */
export class EffectSet {
	static readonly PURE = new EffectSet(0, false);
	static readonly TOP = new EffectSet(0, true);

	private constructor(
		private readonly bits: number,
		readonly isTop: boolean,
	) { }

	static of(...codes: (EffectCode | typeof ALL_EFFECTS)[]): EffectSet {
		let bits = 0;
		for (const code of codes) {
			if (code === ALL_EFFECTS) {
				return EffectSet.TOP;
			}
			bits |= codeBits(code);
		}
		return new EffectSet(bits, false);
	}

	/**
	 * `parse` validates a list of codes from an untrusted source, such as a
	 * function declaration or a manifest document.
	 */
	static parse(codes: readonly string[]): { tag: "ok", set: EffectSet } | { tag: "invalid", codes: string[] } {
		const invalid: string[] = [];
		const valid: (EffectCode | typeof ALL_EFFECTS)[] = [];
		for (const code of codes) {
			if (code === ALL_EFFECTS || isEffectCode(code)) {
				valid.push(code);
			} else {
				invalid.push(code);
			}
		}
		if (invalid.length !== 0) {
			return { tag: "invalid", codes: invalid };
		}
		return { tag: "ok", set: EffectSet.of(...valid) };
	}

	get isPure(): boolean {
		return !this.isTop && this.bits === 0;
	}

	join(other: EffectSet): EffectSet {
		if (this.isTop || other.isTop) {
			return EffectSet.TOP;
		}
		const bits = this.bits | other.bits;
		if (bits === this.bits) {
			return this;
		}
		return new EffectSet(bits, false);
	}

	/**
	 * `covers(other)` holds when every effect of `other` is permitted by this
	 * set under subtyping: `{fs:rw}` covers `{fs:r}`, and only `*` covers `*`.
	 */
	covers(other: EffectSet): boolean {
		if (this.isTop) {
			return true;
		} else if (other.isTop) {
			return false;
		}
		return (other.bits & ~this.bits) === 0;
	}

	/**
	 * `uncovered(other)` is the part of `other` which this set does not
	 * permit. It is the top when `other` is the top and this set is not.
	 */
	uncovered(other: EffectSet): EffectSet {
		if (this.isTop) {
			return EffectSet.PURE;
		} else if (other.isTop) {
			return EffectSet.TOP;
		}
		return new EffectSet(other.bits & ~this.bits, false);
	}

	/// `intersects(other)` holds when the two sets share an effect.
	intersects(other: EffectSet): boolean {
		if (this.isPure || other.isPure) {
			return false;
		} else if (this.isTop || other.isTop) {
			return true;
		}
		return (this.bits & other.bits) !== 0;
	}

	has(code: EffectCode): boolean {
		return this.covers(EffectSet.of(code));
	}

	equals(other: EffectSet): boolean {
		return this.isTop === other.isTop && this.bits === other.bits;
	}

	/**
	 * `codes()` lists the smallest set of codes naming this set, in catalog
	 * order; a family with both atoms is shown as its read/write code.
	 */
	codes(): (EffectCode | typeof ALL_EFFECTS)[] {
		if (this.isTop) {
			return [ALL_EFFECTS];
		}
		const out: EffectCode[] = [];
		let remaining = this.bits;
		for (const code of EFFECT_CODES) {
			const bits = codeBits(code);
			if (code.endsWith(":rw")) {
				if ((this.bits & bits) === bits) {
					out.push(code);
					remaining &= ~bits;
				}
			}
		}
		for (const atom of ATOMS) {
			if ((remaining & atomBit(atom)) !== 0) {
				out.push(atom);
			}
		}
		return out.sort((a, b) => EFFECT_CODES.indexOf(a) - EFFECT_CODES.indexOf(b));
	}

	display(): string {
		if (this.isTop) {
			return "[*]";
		} else if (this.bits === 0) {
			return "[pure]";
		}
		return "[" + this.codes().join(", ") + "]";
	}
}
