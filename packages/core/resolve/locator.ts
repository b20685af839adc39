import path from "node:path"
import type { ManifestSource } from "../schema/types"
import type { AbsolutePath } from "../types/branded"
import { coerceAbsolutePath } from "../types/coerce"

/** Where a package archive is read from once its locator is resolved. */
export type ResolvedLocator =
	| { readonly type: "local"; readonly path: AbsolutePath }
	| { readonly type: "remote"; readonly url: string }

const REMOTE_LOCATOR_PATTERN = /^https?:\/\//i

/**
 * Resolve a package `source` against the manifest that declared it.
 * URLs are kept, absolute paths are read as-is, relative paths are relative to
 * the manifest's directory or URL.
 */
export function resolveLocator(locator: string, manifest: ManifestSource): ResolvedLocator | null {
	const trimmed = locator.trim()
	if (REMOTE_LOCATOR_PATTERN.test(trimmed)) {
		return { type: "remote", url: trimmed }
	}

	if (path.isAbsolute(trimmed)) {
		const resolved = coerceAbsolutePath(trimmed)
		return resolved ? { path: resolved, type: "local" } : null
	}

	if (manifest.type === "local") {
		const resolved = coerceAbsolutePath(trimmed, path.dirname(manifest.path))
		return resolved ? { path: resolved, type: "local" } : null
	}

	try {
		return { type: "remote", url: new URL(trimmed, manifest.url).href }
	} catch {
		return null
	}
}

export function formatLocator(locator: ResolvedLocator): string {
	return locator.type === "local" ? locator.path : locator.url
}
