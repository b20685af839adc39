/**
 * Config codec
 *
 * The config file is the only persisted state. Every nested entity (subscription,
 * provider, installed record) carries its own handler version and is upgraded
 * on its own before the document is validated.
 */

import path from "node:path"
import { parseToml, zodFailure } from "../manifest/parse"
import {
	type RawConfig,
	type RawInstalledRecord,
	type RawProvider,
	type RawSubscription,
	rawConfigSchema,
} from "../schema/raw"
import type {
	AppRef,
	Config,
	InstalledCommand,
	InstalledRecord,
	ManifestSource,
	Provider,
	Subscription,
} from "../schema/types"
import { type RawRecord, upgradeEntity } from "../schema/versions"
import type { AbsolutePath, NonEmptyString, SourceName } from "../types/branded"
import {
	coerceAbsolutePath,
	coerceAbsolutePathDirect,
	coerceContentHash,
	coerceNonEmpty,
	coerceSemver,
	coerceSourceName,
	normalizeRelativePath,
	relativePathErrorMessage,
} from "../types/coerce"
import type {
	Result,
	SchemaEntity,
	UnsupportedSchemaError,
	ValidationError,
} from "../types/error"
import { isRecord } from "../types/guards"

export interface ConfigDefaults {
	installDir: AbsolutePath
	binDir: AbsolutePath
}

const REMOTE_SOURCE_PATTERN = /^https?:\/\//i

export function emptyConfig(defaults: ConfigDefaults): Config {
	return {
		binDir: defaults.binDir,
		handlerVersion: 1,
		installDir: defaults.installDir,
		packages: [],
		providers: [],
		subscriptions: [],
	}
}

/**
 * Parse the config file.
 *
 * @param configPath - absolute path of the file; relative local sources resolve against its directory
 * @param defaults - directories used when the file does not set them
 */
export function parseConfig(
	contents: string,
	configPath: AbsolutePath,
	defaults: ConfigDefaults,
): Result<Config> {
	const data = parseToml(contents, configPath)
	if (!data.ok) {
		return data
	}

	const upgraded = upgradeConfigTree(data.value)
	if (!upgraded.ok) {
		return upgraded
	}

	const parsed = rawConfigSchema.safeParse(upgraded.value)
	if (!parsed.success) {
		return zodFailure(parsed.error, "config", configPath)
	}

	return coerceConfig(parsed.data, configPath, defaults)
}

/**
 * Interpret a subscription source: http(s) URLs stay remote, anything else is a
 * local path resolved against `baseDir`.
 */
export function parseManifestSource(source: string, baseDir: string): ManifestSource | null {
	const trimmed = source.trim()
	if (REMOTE_SOURCE_PATTERN.test(trimmed)) {
		return URL.canParse(trimmed) ? { type: "remote", url: trimmed } : null
	}
	const resolved = coerceAbsolutePath(trimmed, baseDir)
	return resolved ? { path: resolved, type: "local" } : null
}

export function formatManifestSource(source: ManifestSource): string {
	return source.type === "remote" ? source.url : source.path
}

function upgradeConfigTree(
	data: RawRecord,
): Result<RawRecord, UnsupportedSchemaError | ValidationError> {
	const config = upgradeEntity("config", data, "config")
	if (!config.ok) {
		return config
	}

	const output: RawRecord = { ...config.value }
	const nested: Array<[string, SchemaEntity]> = [
		["subscribed_artifactories", "subscription"],
		["providers", "provider"],
		["packages", "record"],
	]

	for (const [key, entity] of nested) {
		const entries = config.value[key]
		if (!Array.isArray(entries)) continue

		const list: unknown[] = entries
		const upgradedEntries: unknown[] = []
		for (const [index, entry] of list.entries()) {
			if (!isRecord(entry)) {
				upgradedEntries.push(entry)
				continue
			}
			const upgraded = upgradeEntity(entity, entry, `${key}[${index}]`)
			if (!upgraded.ok) {
				return upgraded
			}
			upgradedEntries.push(upgraded.value)
		}
		output[key] = upgradedEntries
	}

	return { ok: true, value: output }
}

function coerceConfig(
	raw: RawConfig,
	configPath: AbsolutePath,
	defaults: ConfigDefaults,
): Result<Config> {
	const installDir = optionalDir(raw.install_dir, "install_dir", configPath)
	if (!installDir.ok) return installDir
	const binDir = optionalDir(raw.bin_dir, "bin_dir", configPath)
	if (!binDir.ok) return binDir
	const sgoinfreDir = optionalDir(raw.sgoinfre_dir, "sgoinfre_dir", configPath)
	if (!sgoinfreDir.ok) return sgoinfreDir
	const goinfreDir = optionalDir(raw.goinfre_dir, "goinfre_dir", configPath)
	if (!goinfreDir.ok) return goinfreDir

	const names = new Set<string>()
	const baseDir = path.dirname(configPath)

	const subscriptions: Subscription[] = []
	for (const [index, rawSubscription] of raw.subscribed_artifactories.entries()) {
		const subscription = coerceSubscription(
			rawSubscription,
			`subscribed_artifactories[${index}]`,
			baseDir,
			configPath,
		)
		if (!subscription.ok) return subscription
		if (names.has(subscription.value.name)) {
			return invalid(
				`subscribed_artifactories[${index}].name`,
				`Duplicate source name "${subscription.value.name}".`,
				configPath,
			)
		}
		names.add(subscription.value.name)
		subscriptions.push(subscription.value)
	}

	const providers: Provider[] = []
	for (const [index, rawProvider] of raw.providers.entries()) {
		const provider = coerceProvider(rawProvider, `providers[${index}]`, configPath)
		if (!provider.ok) return provider
		if (names.has(provider.value.name)) {
			return invalid(
				`providers[${index}].name`,
				`Duplicate source name "${provider.value.name}".`,
				configPath,
			)
		}
		names.add(provider.value.name)
		providers.push(provider.value)
	}

	const packages: InstalledRecord[] = []
	for (const [index, rawRecord] of raw.packages.entries()) {
		const record = coerceRecord(rawRecord, `packages[${index}]`, configPath)
		if (!record.ok) return record
		packages.push(record.value)
	}

	return {
		ok: true,
		value: {
			binDir: binDir.value ?? defaults.binDir,
			goinfreDir: goinfreDir.value,
			handlerVersion: raw.config_handler_version,
			installDir: installDir.value ?? defaults.installDir,
			packages,
			providers,
			sgoinfreDir: sgoinfreDir.value,
			subscriptions,
		},
	}
}

function coerceSubscription(
	raw: RawSubscription,
	at: string,
	baseDir: string,
	configPath: AbsolutePath,
): Result<Subscription> {
	const name = sourceName(raw.name, `${at}.name`, configPath)
	if (!name.ok) return name

	const source = parseManifestSource(raw.source, baseDir)
	if (!source) {
		return invalid(`${at}.source`, `Invalid source "${raw.source}".`, configPath)
	}

	return {
		ok: true,
		value: {
			autoUpdate: raw.auto_update,
			handlerVersion: raw.subscription_handler_version,
			name: name.value,
			source,
		},
	}
}

function coerceProvider(raw: RawProvider, at: string, configPath: AbsolutePath): Result<Provider> {
	const name = sourceName(raw.name, `${at}.name`, configPath)
	if (!name.ok) return name

	const owner = nonEmpty(raw.owner, `${at}.owner`, configPath)
	if (!owner.ok) return owner
	const repo = nonEmpty(raw.repo, `${at}.repo`, configPath)
	if (!repo.ok) return repo
	const ref = nonEmpty(raw.ref, `${at}.ref`, configPath)
	if (!ref.ok) return ref

	const manifestPath = normalizeRelativePath(raw.path)
	if (!manifestPath.ok) {
		return invalid(`${at}.path`, relativePathErrorMessage(manifestPath.reason), configPath)
	}

	return {
		ok: true,
		value: {
			github: { owner: owner.value, path: manifestPath.value, ref: ref.value, repo: repo.value },
			handlerVersion: raw.provider_handler_version,
			name: name.value,
		},
	}
}

function coerceRecord(
	raw: RawInstalledRecord,
	at: string,
	configPath: AbsolutePath,
): Result<InstalledRecord> {
	const name = nonEmpty(raw.name, `${at}.name`, configPath)
	if (!name.ok) return name

	const version = coerceSemver(raw.version)
	if (!version) {
		return invalid(`${at}.version`, `Invalid version "${raw.version}".`, configPath)
	}

	const sha256 = coerceContentHash(raw.sha256)
	if (!sha256) {
		return invalid(`${at}.sha256`, "Invalid sha256.", configPath)
	}

	const installPath = coerceAbsolutePathDirect(raw.install_path)
	if (!installPath) {
		return invalid(`${at}.install_path`, "install_path must be absolute.", configPath)
	}

	const commands: InstalledCommand[] = []
	for (const [index, rawCommand] of raw.commands.entries()) {
		const field = `${at}.commands[${index}]`
		const command = nonEmpty(rawCommand.command, `${field}.command`, configPath)
		if (!command.ok) return command
		const commandPath = normalizeRelativePath(rawCommand.path)
		if (!commandPath.ok) {
			return invalid(
				`${field}.path`,
				relativePathErrorMessage(commandPath.reason),
				configPath,
			)
		}
		const entryPoint = coerceAbsolutePathDirect(rawCommand.entry_point)
		if (!entryPoint) {
			return invalid(`${field}.entry_point`, "entry_point must be absolute.", configPath)
		}
		const appSource = sourceName(rawCommand.app_source, `${field}.app_source`, configPath)
		if (!appSource.ok) return appSource
		const appName = nonEmpty(rawCommand.app_name, `${field}.app_name`, configPath)
		if (!appName.ok) return appName
		commands.push({
			app: { name: appName.value, source: appSource.value },
			command: command.value,
			entryPoint,
			path: commandPath.value,
		})
	}

	const apps: AppRef[] = []
	for (const [index, rawApp] of raw.apps.entries()) {
		const source = sourceName(rawApp.source, `${at}.apps[${index}].source`, configPath)
		if (!source.ok) return source
		const appName = nonEmpty(rawApp.name, `${at}.apps[${index}].name`, configPath)
		if (!appName.ok) return appName
		apps.push({ name: appName.value, source: source.value })
	}

	return {
		ok: true,
		value: {
			apps,
			commands,
			handlerVersion: raw.record_handler_version,
			installPath,
			installedAt: raw.installed_at,
			orphaned: raw.orphaned,
			package: { name: name.value, sha256, version },
		},
	}
}

function optionalDir(
	value: string | undefined,
	field: string,
	configPath: AbsolutePath,
): Result<AbsolutePath | undefined, ValidationError> {
	if (value === undefined) {
		return { ok: true, value: undefined }
	}
	const resolved = coerceAbsolutePathDirect(value)
	if (!resolved) {
		return invalid(field, `${field} must be an absolute path.`, configPath)
	}
	return { ok: true, value: resolved }
}

function sourceName(
	value: string,
	field: string,
	configPath: AbsolutePath,
): Result<SourceName, ValidationError> {
	const name = coerceSourceName(value)
	if (!name) {
		return invalid(field, `Invalid source name "${value}".`, configPath)
	}
	return { ok: true, value: name }
}

function nonEmpty(
	value: string,
	field: string,
	configPath: AbsolutePath,
): Result<NonEmptyString, ValidationError> {
	const coerced = coerceNonEmpty(value)
	if (!coerced) {
		return invalid(field, `${field} must not be empty.`, configPath)
	}
	return { ok: true, value: coerced }
}

function invalid(
	field: string,
	message: string,
	configPath: AbsolutePath,
): Result<never, ValidationError> {
	return {
		error: { field, message, path: configPath, source: "manual", type: "validation" },
		ok: false,
	}
}
