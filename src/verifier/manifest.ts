import * as fs from "fs";
import { z } from "zod";
import { InternalCompilerError } from "./diagnostics.js";
import { EffectSet } from "./effects.js";

const EffectList = z.array(z.string());

const TypeManifest = z.object({
	defaultEffects: EffectList.optional(),
	members: z.record(EffectList).optional(),
}).strict();

const NamespaceManifest = z.object({
	defaultEffects: EffectList.optional(),
	types: z.record(TypeManifest).optional(),
}).strict();

/**
 * `ManifestDocument` is the on-disk format declaring the effects of external
 * members, keyed by namespace, then type, then member name.
 *
 * A member named `"*"` is a wildcard for every member of its type. A
 * namespace key ending in `".*"` supplies defaults for every namespace nested
 * within it.
 */
export const ManifestDocument = z.object({
	version: z.literal("1.0"),
	description: z.string().optional(),
	namespaces: z.record(NamespaceManifest),
}).strict();

export type ManifestDocument = z.infer<typeof ManifestDocument>;

export type ResolutionRule = "member" | "type-wildcard" | "type-default" | "namespace-default";

export type Resolution = {
	tag: "known",
	effects: EffectSet,
	source: { manifest: string, rule: ResolutionRule, key: string },
} | { tag: "unknown" }
	| { tag: "error", message: string };

/**
 * `ManifestResolver` maps the qualified name of an external member to the
 * effects it may perform.
 *
 * Resolvers must be pure: the same name always resolves the same way for the
 * lifetime of a verification pass.
 */
export interface ManifestResolver {
	resolve(qualifiedName: string): Resolution;
}

/**
 * `splitQualifiedName("A.B.Type.member(int)")` is
 * `{ namespace: "A.B", type: "Type", member: "member" }`.
 *
 * Argument lists and generic arguments are discarded. A name with only two
 * segments belongs to the global namespace `""`.
 */
export function splitQualifiedName(qualifiedName: string): { namespace: string, type: string, member: string } | null {
	let name = qualifiedName.trim();
	const argumentStart = name.search(/[(<]/);
	if (argumentStart >= 0) {
		name = name.substring(0, argumentStart);
	}

	// `Type::member` names the member after the last `::`, so that a
	// constructor `Type::.ctor` keeps its member name `.ctor`.
	let member: string;
	const separator = name.lastIndexOf("::");
	if (separator >= 0) {
		member = name.substring(separator + 2);
		name = name.substring(0, separator).replaceAll("::", ".");
	} else {
		const dot = name.lastIndexOf(".");
		if (dot < 0) {
			return null;
		}
		member = name.substring(dot + 1);
		name = name.substring(0, dot);
	}

	const segments = name.split(".");
	if (member === "" || segments.some(segment => segment === "")) {
		return null;
	}
	const type = segments[segments.length - 1];
	return { namespace: segments.slice(0, -1).join("."), type, member };
}

/// `enclosingNamespaces("A.B.C")` is `["A.B", "A"]`.
function enclosingNamespaces(namespace: string): string[] {
	const out = [];
	const segments = namespace.split(".");
	for (let i = segments.length - 1; i > 0; i--) {
		out.push(segments.slice(0, i).join("."));
	}
	return out;
}

export class JsonManifestResolver implements ManifestResolver {
	constructor(
		private readonly document: ManifestDocument,
		private readonly manifestName: string,
	) { }

	private found(codes: string[], rule: ResolutionRule, key: string): Resolution {
		const parsed = EffectSet.parse(codes);
		if (parsed.tag === "invalid") {
			return {
				tag: "error",
				message: "manifest `" + this.manifestName + "` lists unknown effect code(s) "
					+ parsed.codes.map(c => "`" + c + "`").join(", ") + " for `" + key + "`",
			};
		}
		return {
			tag: "known",
			effects: parsed.set,
			source: { manifest: this.manifestName, rule, key },
		};
	}

	resolve(qualifiedName: string): Resolution {
		const parts = splitQualifiedName(qualifiedName);
		if (parts === null) {
			return { tag: "unknown" };
		}

		const namespaceKey = parts.namespace;
		const typeKey = namespaceKey === "" ? parts.type : namespaceKey + "." + parts.type;
		const namespace = this.document.namespaces[namespaceKey];
		const type = namespace?.types?.[parts.type];
		if (type !== undefined) {
			const members = type.members ?? {};
			if (Object.prototype.hasOwnProperty.call(members, parts.member)) {
				return this.found(members[parts.member], "member", typeKey + "." + parts.member);
			} else if (Object.prototype.hasOwnProperty.call(members, "*")) {
				return this.found(members["*"], "type-wildcard", typeKey + ".*");
			} else if (type.defaultEffects !== undefined) {
				return this.found(type.defaultEffects, "type-default", typeKey);
			}
		}

		if (namespace?.defaultEffects !== undefined) {
			return this.found(namespace.defaultEffects, "namespace-default", namespaceKey);
		}

		for (const enclosing of enclosingNamespaces(namespaceKey)) {
			const pattern = this.document.namespaces[enclosing + ".*"];
			if (pattern?.defaultEffects !== undefined) {
				return this.found(pattern.defaultEffects, "namespace-default", enclosing + ".*");
			}
			const outer = this.document.namespaces[enclosing];
			if (outer?.defaultEffects !== undefined) {
				return this.found(outer.defaultEffects, "namespace-default", enclosing);
			}
		}

		return { tag: "unknown" };
	}
}

/**
 * `LayeredResolver` consults several resolvers, highest priority first, and
 * returns the first answer that is not `"unknown"`.
 */
export class LayeredResolver implements ManifestResolver {
	private readonly layers: ManifestResolver[];

	/// `layers` are listed from lowest to highest priority, so that a project
	/// manifest listed after the built-in catalog overrides it.
	constructor(layers: readonly ManifestResolver[]) {
		this.layers = [...layers].reverse();
	}

	resolve(qualifiedName: string): Resolution {
		for (const layer of this.layers) {
			const resolution = layer.resolve(qualifiedName);
			if (resolution.tag !== "unknown") {
				return resolution;
			}
		}
		return { tag: "unknown" };
	}
}

export type ManifestLoad = { tag: "loaded", document: ManifestDocument }
	| { tag: "failed", errors: string[] };

/**
 * `parseManifest` validates the text of a manifest document. `source` names
 * the document in error messages.
 */
export function parseManifest(text: string, source: string): ManifestLoad {
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (e) {
		const reason = e instanceof Error ? e.message : String(e);
		return { tag: "failed", errors: [source + ": invalid JSON: " + reason] };
	}

	const parsed = ManifestDocument.safeParse(json);
	if (!parsed.success) {
		return {
			tag: "failed",
			errors: parsed.error.issues.map(issue => {
				const path = issue.path.length === 0 ? "(root)" : issue.path.join(".");
				return source + ": " + path + ": " + issue.message;
			}),
		};
	}
	return { tag: "loaded", document: parsed.data };
}

export function loadManifestFile(path: string | URL): ManifestLoad {
	let text: string;
	try {
		text = fs.readFileSync(path, "utf-8");
	} catch (e) {
		const reason = e instanceof Error ? e.message : String(e);
		return { tag: "failed", errors: [String(path) + ": " + reason] };
	}
	return parseManifest(text, String(path));
}

export const BUILTIN_MANIFEST_URL = new URL("../../manifests/builtin.json", import.meta.url);

/**
 * `builtinManifest()` loads the catalog of standard library effects shipped
 * with this package. Hosts which relocate the catalog pass its `location`.
 *
 * @throws InternalCompilerError when the catalog cannot be read or is invalid.
 */
export function builtinManifest(location: string | URL = BUILTIN_MANIFEST_URL): JsonManifestResolver {
	const load = loadManifestFile(location);
	if (load.tag === "failed") {
		throw new InternalCompilerError("the built-in manifest is invalid:\n\t" + load.errors.join("\n\t"));
	}
	return new JsonManifestResolver(load.document, "builtin");
}
