import { rcompare } from "semver"
import type { App, ManifestSource, Package } from "../schema/types"
import type { NonEmptyString, Semver, SourceName } from "../types/branded"
import { coerceNonEmpty, coerceSemver, coerceSourceName } from "../types/coerce"
import type { AppCandidate, Result, ValidationError } from "../types/error"
import { formatLocator, type ResolvedLocator, resolveLocator } from "./locator"

/** One app of one subscribed artifactory, tagged with where it came from. */
export interface CatalogEntry {
	readonly source: SourceName
	readonly manifest: ManifestSource
	readonly app: App
}

/** A package offered by some catalog entry, with its locator already resolved. */
export interface IndexedPackage {
	readonly package: Package
	readonly source: SourceName
	readonly locator: ResolvedLocator
}

export type PackageIndex = ReadonlyMap<string, readonly IndexedPackage[]>

export interface AppRequest {
	readonly name: NonEmptyString
	readonly source?: SourceName
	readonly version?: Semver
}

export type LookupOutcome =
	| { type: "unique"; entry: CatalogEntry }
	| { type: "ambiguous"; candidates: CatalogEntry[] }
	| { type: "missing" }

const REQUEST_PATTERN = /^(?:([^/\s]+)\/)?([^@/\s]+)(?:@(\S+))?$/

/**
 * Parse `name`, `source/name`, `name@version` or `source/name@version`.
 */
export function parseAppRequest(input: string): Result<AppRequest, ValidationError> {
	const match = REQUEST_PATTERN.exec(input.trim())
	const name = match?.[2] ? coerceNonEmpty(match[2]) : null
	if (!match || !name) {
		return invalidRequest(input, "expected [source/]name[@version]")
	}

	let source: SourceName | undefined
	if (match[1] !== undefined) {
		const coerced = coerceSourceName(match[1])
		if (!coerced) {
			return invalidRequest(input, `invalid source "${match[1]}"`)
		}
		source = coerced
	}

	let version: Semver | undefined
	if (match[3] !== undefined) {
		const coerced = coerceSemver(match[3])
		if (!coerced) {
			return invalidRequest(input, `invalid version "${match[3]}"`)
		}
		version = coerced
	}

	return { ok: true, value: { name, source, version } }
}

export function formatAppRequest(request: AppRequest): string {
	const qualified = request.source ? `${request.source}/${request.name}` : request.name
	return request.version ? `${qualified}@${request.version}` : qualified
}

export function formatCandidate(candidate: AppCandidate): string {
	return `${candidate.source}/${candidate.name}@${candidate.version}`
}

export function toCandidate(entry: CatalogEntry): AppCandidate {
	return { name: entry.app.name, source: entry.source, version: entry.app.version }
}

/**
 * Find the catalog entry a request names.
 *
 * Within one source the highest matching version wins; matches in more than
 * one source are ambiguous and every match is returned.
 */
export function lookupApp(
	entries: readonly CatalogEntry[],
	request: AppRequest,
): LookupOutcome {
	const matches = entries.filter(
		(entry) =>
			entry.app.name === request.name &&
			(request.source === undefined || entry.source === request.source) &&
			(request.version === undefined || entry.app.version === request.version),
	)

	if (matches.length === 0) {
		return { type: "missing" }
	}

	const sources = new Set(matches.map((entry) => entry.source))
	if (sources.size > 1) {
		return { candidates: matches, type: "ambiguous" }
	}

	const [best] = [...matches].sort((a, b) => rcompare(a.app.version, b.app.version))
	return best ? { entry: best, type: "unique" } : { type: "missing" }
}

/**
 * Index every package of every app by name. A package offered by several
 * apps or sources (same name, version and sha256) is indexed once, from the
 * first entry that offers it.
 */
export function buildPackageIndex(entries: readonly CatalogEntry[]): PackageIndex {
	const index = new Map<string, IndexedPackage[]>()
	const seen = new Set<string>()

	for (const entry of entries) {
		for (const pkg of entry.app.packages) {
			const key = identityKey(pkg)
			if (seen.has(key)) continue

			const locator = resolveLocator(pkg.source, entry.manifest)
			if (!locator) continue

			seen.add(key)
			const candidates = index.get(pkg.name) ?? []
			candidates.push({ locator, package: pkg, source: entry.source })
			index.set(pkg.name, candidates)
		}
	}

	return index
}

/**
 * Preference order: highest version first, then the smallest resolved locator.
 */
export function comparePreference(a: IndexedPackage, b: IndexedPackage): number {
	const byVersion = rcompare(a.package.version, b.package.version)
	if (byVersion !== 0) return byVersion
	const left = formatLocator(a.locator)
	const right = formatLocator(b.locator)
	return left < right ? -1 : left > right ? 1 : 0
}

export function identityKey(pkg: Pick<Package, "name" | "version" | "sha256">): string {
	return `${pkg.name}@${pkg.version}#${pkg.sha256}`
}

export interface SearchGroup {
	readonly source: SourceName
	readonly apps: readonly CatalogEntry[]
}

/**
 * Case-insensitive substring search over app names and descriptions, grouped
 * by source in catalog order.
 */
export function searchCatalog(
	entries: readonly CatalogEntry[],
	query: string,
): SearchGroup[] {
	const needle = query.trim().toLowerCase()
	const groups = new Map<SourceName, CatalogEntry[]>()

	for (const entry of entries) {
		const haystacks = [entry.app.name, entry.app.description]
		if (!haystacks.some((text) => text.toLowerCase().includes(needle))) continue
		const group = groups.get(entry.source) ?? []
		group.push(entry)
		groups.set(entry.source, group)
	}

	return [...groups].map(([source, apps]) => ({ apps, source }))
}

function invalidRequest(input: string, reason: string): Result<never, ValidationError> {
	return {
		error: {
			field: "app",
			message: `Invalid app "${input}": ${reason}.`,
			source: "manual",
			type: "validation",
		},
		ok: false,
	}
}
