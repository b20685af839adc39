import type { GithubLocation } from "../schema/types"
import { coerceNonEmpty, normalizeRelativePath, relativePathErrorMessage } from "../types/coerce"
import type { Result, ValidationError } from "../types/error"

const GITHUB_SPEC_PATTERN = /^github:([^/\s]+)\/([^@\s/]+)@([^:\s]+):(.+)$/
const RAW_GITHUB_BASE = "https://raw.githubusercontent.com"

/**
 * Parse `github:owner/repo@ref:path`.
 */
export function parseProviderSpec(spec: string): Result<GithubLocation, ValidationError> {
	const match = GITHUB_SPEC_PATTERN.exec(spec.trim())
	const owner = match?.[1] ? coerceNonEmpty(match[1]) : null
	const repo = match?.[2] ? coerceNonEmpty(match[2]) : null
	const ref = match?.[3] ? coerceNonEmpty(match[3]) : null
	if (!match || !owner || !repo || !ref) {
		return invalid(`Invalid provider "${spec}": expected github:owner/repo@ref:path.`)
	}

	const manifestPath = normalizeRelativePath(match[4] ?? "")
	if (!manifestPath.ok) {
		return invalid(
			`Invalid provider path in "${spec}": ${relativePathErrorMessage(manifestPath.reason)}`,
		)
	}

	return { ok: true, value: { owner, path: manifestPath.value, ref, repo } }
}

export function formatProviderSpec(github: GithubLocation): string {
	return `github:${github.owner}/${github.repo}@${github.ref}:${github.path}`
}

export function providerManifestUrl(github: GithubLocation): string {
	return `${RAW_GITHUB_BASE}/${github.owner}/${github.repo}/${github.ref}/${github.path}`
}

function invalid(message: string): Result<never, ValidationError> {
	return {
		error: { field: "provider", message, source: "manual", type: "validation" },
		ok: false,
	}
}
