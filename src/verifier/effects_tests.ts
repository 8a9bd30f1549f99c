import { describeEffect, EFFECT_CODES, EffectSet } from "./effects.js";
import { assert } from "./test.js";

const samples = [
	EffectSet.PURE,
	EffectSet.TOP,
	EffectSet.of("cw"),
	EffectSet.of("fs:r"),
	EffectSet.of("fs:rw", "time"),
	EffectSet.of("net:w", "mut", "throw"),
];

export const tests = {
	"join-is-a-semilattice"() {
		for (const a of samples) {
			assert(a.join(a).equals(a), "is equal to", true);
			for (const b of samples) {
				assert(a.join(b).equals(b.join(a)), "is equal to", true);
				for (const c of samples) {
					assert(a.join(b).join(c).equals(a.join(b.join(c))), "is equal to", true);
				}
			}
		}
	},
	"join-with-pure-and-top"() {
		for (const a of samples) {
			assert(a.join(EffectSet.PURE).equals(a), "is equal to", true);
			assert(a.join(EffectSet.TOP).isTop, "is equal to", true);
			assert(EffectSet.TOP.covers(a), "is equal to", true);
			assert(a.covers(EffectSet.PURE), "is equal to", true);
		}
	},
	"read-write-covers-both-halves"() {
		const rw = EffectSet.of("fs:rw");
		assert(rw.covers(EffectSet.of("fs:r")), "is equal to", true);
		assert(rw.covers(EffectSet.of("fs:w")), "is equal to", true);
		assert(EffectSet.of("fs:r").covers(rw), "is equal to", false);
		assert(EffectSet.of("fs:r", "fs:w").covers(rw), "is equal to", true);
		assert(EffectSet.of("fs:r", "fs:w").equals(rw), "is equal to", true);
		assert(rw.covers(EffectSet.of("net:r")), "is equal to", false);
		assert(EffectSet.of("db:rw").has("db:w"), "is equal to", true);
	},
	"only-top-covers-top"() {
		const everything = EffectSet.of(...EFFECT_CODES);
		assert(everything.covers(EffectSet.TOP), "is equal to", false);
		assert(EffectSet.TOP.covers(EffectSet.TOP), "is equal to", true);
		assert(everything.uncovered(EffectSet.TOP).isTop, "is equal to", true);
	},
	"uncovered"() {
		const missing = EffectSet.of("fs:r").uncovered(EffectSet.of("fs:rw", "cw"));
		assert(missing.codes(), "is equal to", ["cw", "fs:w"]);
		assert(EffectSet.TOP.uncovered(EffectSet.of("cw")).isPure, "is equal to", true);
	},
	"intersects"() {
		assert(EffectSet.of("fs:rw").intersects(EffectSet.of("fs:w")), "is equal to", true);
		assert(EffectSet.of("fs:r").intersects(EffectSet.of("fs:w")), "is equal to", false);
		assert(EffectSet.TOP.intersects(EffectSet.of("cw")), "is equal to", true);
		assert(EffectSet.TOP.intersects(EffectSet.PURE), "is equal to", false);
	},
	"display"() {
		assert(EffectSet.PURE.display(), "is equal to", "[pure]");
		assert(EffectSet.TOP.display(), "is equal to", "[*]");
		assert(EffectSet.of("fs:w", "cw", "fs:r").display(), "is equal to", "[cw, fs:rw]");
		assert(EffectSet.of("time", "net:r").display(), "is equal to", "[net:r, time]");
		assert(EffectSet.of("cw", "*").display(), "is equal to", "[*]");
	},
	"parse"() {
		assert(EffectSet.parse(["cw", "bogus", "net"]), "is equal to", { tag: "invalid", codes: ["bogus", "net"] });

		const parsed = EffectSet.parse(["env:r", "env:w"]);
		assert(parsed.tag, "is equal to", "ok");
		if (parsed.tag === "ok") {
			assert(parsed.set.codes(), "is equal to", ["env:rw"]);
		}

		const top = EffectSet.parse(["*", "cw"]);
		assert(top.tag === "ok" && top.set.isTop, "is equal to", true);
	},
	"describeEffect"() {
		assert(describeEffect("fs:rw"), "is equal to", "filesystem read/write");
		assert(describeEffect("*"), "is equal to", "any effect");
	},
};
