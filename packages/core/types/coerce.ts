import path from "node:path"
import { clean, valid, validRange } from "semver"
import type {
	AbsolutePath,
	ContentHash,
	NonEmptyString,
	RelativePath,
	Semver,
	SourceName,
} from "./branded"

export function coerceNonEmpty(value: string): NonEmptyString | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

const SOURCE_NAME_INVALID_CHARS = /[/\\:@\s]/

export function coerceSourceName(value: string): SourceName | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (SOURCE_NAME_INVALID_CHARS.test(trimmed)) return null
	return trimmed as SourceName
}

const CONTENT_HASH_PATTERN = /^[0-9a-f]{64}$/

export function coerceContentHash(value: string): ContentHash | null {
	const normalized = value.trim().toLowerCase()
	if (!CONTENT_HASH_PATTERN.test(normalized)) return null
	return normalized as ContentHash
}

export function coerceSemver(value: string): Semver | null {
	const trimmed = value.trim()
	if (!valid(trimmed)) return null
	const cleaned = clean(trimmed)
	return cleaned ? (cleaned as Semver) : null
}

export function isValidRange(value: string): boolean {
	return validRange(value.trim()) !== null
}

export function coerceAbsolutePath(
	value: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}

export function coerceAbsolutePathDirect(value: string): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return path.normalize(trimmed) as AbsolutePath
}

export type RelativePathNormalization =
	| { ok: true; value: RelativePath }
	| { ok: false; reason: "empty" | "absolute" | "traversal" }

/**
 * Normalize a path that must stay inside some root directory.
 * Pure function - returns reason codes, callers wrap with context-specific errors.
 */
export function normalizeRelativePath(value: string): RelativePathNormalization {
	const trimmed = value.trim()
	if (!trimmed) {
		return { ok: false, reason: "empty" }
	}

	const cleaned = trimmed.replace(/\\/g, "/")
	if (cleaned.startsWith("/") || /^[a-zA-Z]:\//.test(cleaned)) {
		return { ok: false, reason: "absolute" }
	}

	const segments = cleaned.split("/")
	if (segments.some((segment) => segment === "..")) {
		return { ok: false, reason: "traversal" }
	}

	const normalized = path.posix.normalize(cleaned).replace(/^\.\/+/, "")
	if (!normalized || normalized === ".") {
		return { ok: false, reason: "empty" }
	}

	return { ok: true, value: normalized as RelativePath }
}

export function relativePathErrorMessage(
	reason: "empty" | "absolute" | "traversal",
): string {
	switch (reason) {
		case "empty":
			return "Path must not be empty."
		case "absolute":
			return "Path must be relative."
		case "traversal":
			return "Path must not escape its root."
	}
}

/**
 * True when `target` resolves strictly inside `root`.
 */
export function isWithinRoot(root: string, target: string): boolean {
	const relative = path.relative(path.resolve(root), path.resolve(root, target))
	return (
		relative.length > 0 &&
		relative !== ".." &&
		!relative.startsWith(`..${path.sep}`) &&
		!path.isAbsolute(relative)
	)
}

/**
 * Join segments onto an absolute base. The result stays absolute.
 */
export function joinAbsolute(base: AbsolutePath, ...segments: string[]): AbsolutePath {
	return path.join(base, ...segments) as AbsolutePath
}
