/**
 * Artifactory store
 *
 * Loads and parses artifactory manifests from local files or URLs and keeps
 * the parsed result for a while. Manifests are immutable once fetched, so a
 * cached entry is either used whole or re-fetched whole.
 */

import {
	type Artifactory,
	type DepotError,
	formatManifestSource,
	type ManifestSource,
	parseArtifactory,
	type Result,
} from "@depot/core"
import { consola } from "consola"
import { readFileUtf8 } from "@/src/core/io/fs"
import type { Transport } from "@/src/core/packages/transport"

const log = consola.withTag("artifactory")

export interface LoadOptions {
	/** Skip the cache and fetch again. */
	fresh?: boolean
}

export interface ArtifactoryStore {
	load(source: ManifestSource, options?: LoadOptions): Promise<Result<Artifactory, DepotError>>
}

export interface ArtifactoryStoreOptions {
	transport: Transport
	ttlMs: number
	now?: () => number
}

interface CacheEntry {
	artifactory: Artifactory
	loadedAt: number
}

export function createArtifactoryStore(options: ArtifactoryStoreOptions): ArtifactoryStore {
	const now = options.now ?? Date.now
	const cache = new Map<string, CacheEntry>()

	return {
		async load(source, loadOptions = {}) {
			const key = formatManifestSource(source)
			const cached = cache.get(key)
			if (!loadOptions.fresh && cached && now() - cached.loadedAt < options.ttlMs) {
				return { ok: true, value: cached.artifactory }
			}

			const contents = await readManifest(source, options.transport)
			if (!contents.ok) {
				return contents
			}

			const parsed = parseArtifactory(contents.value, key)
			if (!parsed.ok) {
				return parsed
			}

			log.debug(`Loaded ${parsed.value.name} from ${key}.`)
			cache.set(key, { artifactory: parsed.value, loadedAt: now() })
			return parsed
		},
	}
}

async function readManifest(
	source: ManifestSource,
	transport: Transport,
): Promise<Result<string, DepotError>> {
	if (source.type === "local") {
		return readFileUtf8(source.path)
	}

	const bytes = await transport.get(source.url)
	if (!bytes.ok) {
		return bytes
	}
	return { ok: true, value: new TextDecoder().decode(bytes.value) }
}
