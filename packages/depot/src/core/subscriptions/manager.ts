/**
 * Subscription manager
 *
 * Owns the subscription and provider lists in the config and builds the merged
 * catalog every resolution runs against. Subscriptions and providers share one
 * name space.
 */

import path from "node:path"
import {
	type CatalogEntry,
	type Config,
	coerceSourceName,
	currentVersion,
	type DepotError,
	type DuplicateNameError,
	MANIFEST_EXTENSION,
	type ManifestSource,
	type NotFoundError,
	parseManifestSource,
	parseProviderSpec,
	type Provider,
	providerManifestUrl,
	type Result,
	type SearchGroup,
	type SourceName,
	type Subscription,
	searchCatalog,
} from "@depot/core"
import { consola } from "consola"
import type { DepotContext } from "@/src/core/context"
import { safeStat } from "@/src/core/io/fs"

const log = consola.withTag("subscriptions")

export interface CatalogFailure {
	source: SourceName
	error: DepotError
}

export interface MergedCatalog {
	entries: CatalogEntry[]
	failures: CatalogFailure[]
}

export interface CatalogOptions {
	fresh?: boolean
}

export async function subscribe(
	context: DepotContext,
	name: string,
	source: string,
): Promise<Result<Subscription, DepotError>> {
	const sourceName = parseSourceName(name)
	if (!sourceName.ok) return sourceName

	if (nameTaken(context.config.current(), sourceName.value)) {
		return duplicateName(sourceName.value)
	}

	const manifestSource = parseManifestSource(source, context.cwd)
	if (!manifestSource) {
		return {
			error: {
				field: "source",
				message: `Invalid artifactory source "${source}".`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	if (manifestSource.type === "local") {
		const local = await checkLocalManifest(manifestSource.path)
		if (!local.ok) return local
	}

	const loaded = await context.artifactories.load(manifestSource, { fresh: true })
	if (!loaded.ok) return loaded

	const subscription: Subscription = {
		autoUpdate: false,
		handlerVersion: currentVersion("subscription"),
		name: sourceName.value,
		source: manifestSource,
	}

	// The name may have been taken while the manifest loaded.
	let raced = false
	const saved = await context.config.update((config) => {
		if (nameTaken(config, subscription.name)) {
			raced = true
			return config
		}
		return { ...config, subscriptions: [...config.subscriptions, subscription] }
	})
	if (!saved.ok) return saved
	if (raced) return duplicateName(subscription.name)

	log.debug(`Subscribed to ${sourceName.value} (${loaded.value.apps.length} apps).`)
	return { ok: true, value: subscription }
}

/**
 * Drop a subscription. Installed packages stay until the next sync.
 */
export async function unsubscribe(
	context: DepotContext,
	name: string,
): Promise<Result<Subscription, DepotError>> {
	const existing = context.config.current().subscriptions.find((entry) => entry.name === name)
	if (!existing) {
		return notFound("subscription", name)
	}

	const saved = await context.config.update((config) => ({
		...config,
		subscriptions: config.subscriptions.filter((entry) => entry.name !== name),
	}))
	if (!saved.ok) return saved

	return { ok: true, value: existing }
}

export function listSubscriptions(context: DepotContext): readonly Subscription[] {
	return context.config.current().subscriptions
}

export async function addProvider(
	context: DepotContext,
	name: string,
	spec: string,
): Promise<Result<Provider, DepotError>> {
	const sourceName = parseSourceName(name)
	if (!sourceName.ok) return sourceName

	if (nameTaken(context.config.current(), sourceName.value)) {
		return duplicateName(sourceName.value)
	}

	const github = parseProviderSpec(spec)
	if (!github.ok) return github

	const provider: Provider = {
		github: github.value,
		handlerVersion: currentVersion("provider"),
		name: sourceName.value,
	}

	let raced = false
	const saved = await context.config.update((config) => {
		if (nameTaken(config, provider.name)) {
			raced = true
			return config
		}
		return { ...config, providers: [...config.providers, provider] }
	})
	if (!saved.ok) return saved
	if (raced) return duplicateName(provider.name)

	return { ok: true, value: provider }
}

export async function removeProvider(
	context: DepotContext,
	name: string,
): Promise<Result<Provider, DepotError>> {
	const existing = context.config.current().providers.find((entry) => entry.name === name)
	if (!existing) {
		return notFound("provider", name)
	}

	const saved = await context.config.update((config) => ({
		...config,
		providers: config.providers.filter((entry) => entry.name !== name),
	}))
	if (!saved.ok) return saved

	return { ok: true, value: existing }
}

export function listProviders(context: DepotContext): readonly Provider[] {
	return context.config.current().providers
}

export function providerSource(provider: Provider): ManifestSource {
	return { type: "remote", url: providerManifestUrl(provider.github) }
}

/**
 * Every app of every subscription, then of every provider, tagged with the
 * source name. Sources that fail to load are reported, not skipped silently.
 */
export async function mergedCatalog(
	context: DepotContext,
	options: CatalogOptions = {},
): Promise<MergedCatalog> {
	const config = context.config.current()
	const sources: Array<{ name: SourceName; manifest: ManifestSource }> = [
		...config.subscriptions.map((subscription) => ({
			manifest: subscription.source,
			name: subscription.name,
		})),
		...config.providers.map((provider) => ({
			manifest: providerSource(provider),
			name: provider.name,
		})),
	]

	const loaded = await Promise.all(
		sources.map((source) =>
			context.artifactories.load(source.manifest, { fresh: options.fresh }),
		),
	)

	const catalog: MergedCatalog = { entries: [], failures: [] }
	for (const [index, result] of loaded.entries()) {
		const source = sources[index]
		if (!source) continue
		if (!result.ok) {
			log.debug(`Failed to load ${source.name}: ${result.error.message}`)
			catalog.failures.push({ error: result.error, source: source.name })
			continue
		}
		for (const app of result.value.apps) {
			catalog.entries.push({ app, manifest: source.manifest, source: source.name })
		}
	}

	return catalog
}

export async function searchApps(
	context: DepotContext,
	query: string,
	options: CatalogOptions = {},
): Promise<{ groups: SearchGroup[]; failures: CatalogFailure[] }> {
	const catalog = await mergedCatalog(context, options)
	return { failures: catalog.failures, groups: searchCatalog(catalog.entries, query) }
}

function parseSourceName(name: string): Result<SourceName, DepotError> {
	const sourceName = coerceSourceName(name)
	if (!sourceName) {
		return {
			error: {
				field: "name",
				message: `Invalid name "${name}": names must not be empty or contain "/", "\\", ":", "@" or spaces.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}
	return { ok: true, value: sourceName }
}

function nameTaken(config: Config, name: SourceName): boolean {
	return (
		config.subscriptions.some((entry) => entry.name === name) ||
		config.providers.some((entry) => entry.name === name)
	)
}

function duplicateName(name: SourceName): Result<never, DuplicateNameError> {
	return {
		error: {
			message: `The name "${name}" is already used by a subscription or provider.`,
			name,
			target: "source",
			type: "duplicate_name",
		},
		ok: false,
	}
}

async function checkLocalManifest(manifestPath: string): Promise<Result<void, DepotError>> {
	if (path.extname(manifestPath) !== MANIFEST_EXTENSION) {
		return {
			error: {
				field: "source",
				message: `Artifactory file ${manifestPath} must be a ${MANIFEST_EXTENSION} file.`,
				path: manifestPath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const stats = await safeStat(manifestPath)
	if (!stats.ok) return stats
	if (!stats.value?.isFile()) {
		return {
			error: {
				message: `Artifactory file ${manifestPath} does not exist.`,
				target: "artifactory",
				type: "not_found",
			},
			ok: false,
		}
	}
	return { ok: true, value: undefined }
}

function notFound(target: string, name: string): Result<never, NotFoundError> {
	return {
		error: {
			message: `No ${target} named "${name}".`,
			target,
			type: "not_found",
		},
		ok: false,
	}
}
