import { createArtifactoryStore, type ArtifactoryStore } from "@/src/core/artifactory/store"
import type { ConfigStore } from "@/src/core/config/store"
import { type ArchiveExtractor, createTarExtractor } from "@/src/core/install/extract"
import { createSymlinkPublisher, type EntryPointPublisher } from "@/src/core/install/entrypoints"
import type { PackageCache } from "@/src/core/packages/fetch"
import { type HashFunction, sha256 } from "@/src/core/packages/hash"
import { createHttpTransport, type Transport } from "@/src/core/packages/transport"
import type { DepotEnv } from "@/src/env"

/** Everything the engine needs from the outside world. */
export interface DepotContext {
	config: ConfigStore
	artifactories: ArtifactoryStore
	transport: Transport
	hash: HashFunction
	extractor: ArchiveExtractor
	publisher: EntryPointPublisher
	cache: PackageCache
	fetchConcurrency: number
	fetchTimeoutMs: number
	/** Base directory for relative artifactory paths given on the command line. */
	cwd: string
	now: () => Date
}

export function createContext(
	env: DepotEnv,
	config: ConfigStore,
	overrides: Partial<Omit<DepotContext, "config">> = {},
): DepotContext {
	const transport = overrides.transport ?? createHttpTransport()
	return {
		artifactories:
			overrides.artifactories ??
			createArtifactoryStore({ transport, ttlMs: env.catalogTtlMs }),
		cache: overrides.cache ?? new Map(),
		config,
		cwd: overrides.cwd ?? process.cwd(),
		extractor: overrides.extractor ?? createTarExtractor(),
		fetchConcurrency: overrides.fetchConcurrency ?? env.fetchConcurrency,
		fetchTimeoutMs: overrides.fetchTimeoutMs ?? env.fetchTimeoutMs,
		hash: overrides.hash ?? sha256,
		now: overrides.now ?? (() => new Date()),
		publisher: overrides.publisher ?? createSymlinkPublisher(),
		transport,
	}
}
