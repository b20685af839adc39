import { parse, TomlError } from "smol-toml"
import type { z } from "zod"
import { parseDependencyRef } from "../schema/dependency"
import {
	type RawApp,
	type RawArtifactory,
	type RawPackage,
	formatZodError,
	rawArtifactorySchema,
} from "../schema/raw"
import type { App, Artifactory, Command, DependencyRef, Package } from "../schema/types"
import { type RawRecord, upgradeEntity } from "../schema/versions"
import type { NonEmptyString } from "../types/branded"
import {
	coerceContentHash,
	coerceNonEmpty,
	coerceSemver,
	normalizeRelativePath,
	relativePathErrorMessage,
} from "../types/coerce"
import type {
	Result,
	UnsupportedSchemaError,
	ValidationError,
} from "../types/error"
import { isRecord } from "../types/guards"

const COMMAND_NAME_PATTERN = /^[^/\\\s]+$/

/**
 * Parse an artifactory manifest.
 *
 * The document is upgraded entity by entity (artifactory, each app, each
 * package) before it is validated, then coerced into branded types.
 *
 * @param source - path or URL of the manifest, used in error messages
 */
export function parseArtifactory(contents: string, source: string): Result<Artifactory> {
	const data = parseToml(contents, source)
	if (!data.ok) {
		return data
	}

	const upgraded = upgradeArtifactoryTree(data.value)
	if (!upgraded.ok) {
		return upgraded
	}

	const parsed = rawArtifactorySchema.safeParse(upgraded.value)
	if (!parsed.success) {
		return zodFailure(parsed.error, "artifactory", source)
	}

	return coerceArtifactory(parsed.data, source)
}

/**
 * Parse TOML into a top-level table.
 */
export function parseToml(contents: string, source: string): Result<RawRecord> {
	let data: unknown
	try {
		data = parse(contents)
	} catch (error) {
		const message =
			error instanceof TomlError ? `Invalid TOML: ${error.message}` : "Invalid TOML."
		return {
			error: {
				message,
				path: source,
				rawError: error instanceof Error ? error : undefined,
				source,
				type: "parse",
			},
			ok: false,
		}
	}

	if (!isRecord(data)) {
		return {
			error: { message: "Invalid TOML: expected a table.", path: source, source, type: "parse" },
			ok: false,
		}
	}

	return { ok: true, value: data }
}

function upgradeArtifactoryTree(
	data: RawRecord,
): Result<RawRecord, UnsupportedSchemaError | ValidationError> {
	const artifactory = upgradeEntity("artifactory", data, "artifactory")
	if (!artifactory.ok) {
		return artifactory
	}

	const apps = artifactory.value.apps
	if (!Array.isArray(apps)) {
		return artifactory
	}

	const appList: unknown[] = apps
	const upgradedApps: unknown[] = []
	for (const [appIndex, app] of appList.entries()) {
		if (!isRecord(app)) {
			upgradedApps.push(app)
			continue
		}

		const appAt = `apps[${appIndex}]`
		const upgradedApp = upgradeEntity("app", app, appAt)
		if (!upgradedApp.ok) {
			return upgradedApp
		}

		const packages = upgradedApp.value.packages
		if (!Array.isArray(packages)) {
			upgradedApps.push(upgradedApp.value)
			continue
		}

		const packageList: unknown[] = packages
		const upgradedPackages: unknown[] = []
		for (const [packageIndex, pkg] of packageList.entries()) {
			if (!isRecord(pkg)) {
				upgradedPackages.push(pkg)
				continue
			}
			const upgradedPackage = upgradeEntity(
				"package",
				pkg,
				`${appAt}.packages[${packageIndex}]`,
			)
			if (!upgradedPackage.ok) {
				return upgradedPackage
			}
			upgradedPackages.push(upgradedPackage.value)
		}

		upgradedApps.push({ ...upgradedApp.value, packages: upgradedPackages })
	}

	return { ok: true, value: { ...artifactory.value, apps: upgradedApps } }
}

function coerceArtifactory(raw: RawArtifactory, source: string): Result<Artifactory> {
	const name = requireNonEmpty(raw.name, "name", source)
	if (!name.ok) return name

	const apps: App[] = []
	const seen = new Set<string>()
	for (const [index, rawApp] of raw.apps.entries()) {
		const app = coerceApp(rawApp, `apps[${index}]`, source)
		if (!app.ok) return app

		const key = `${app.value.name}@${app.value.version}`
		if (seen.has(key)) {
			return invalid(
				`apps[${index}]`,
				`Duplicate app "${key}" in artifactory "${name.value}".`,
				source,
			)
		}
		seen.add(key)
		apps.push(app.value)
	}

	return {
		ok: true,
		value: {
			apps,
			description: raw.description,
			handlerVersion: raw.artifactory_handler_version,
			maintainer: raw.maintainer,
			name: name.value,
			public: raw.public,
		},
	}
}

function coerceApp(raw: RawApp, at: string, source: string): Result<App> {
	const name = requireNonEmpty(raw.name, `${at}.name`, source)
	if (!name.ok) return name

	const version = coerceSemver(raw.version)
	if (!version) {
		return invalid(`${at}.version`, `Invalid version "${raw.version}" for app "${raw.name}".`, source)
	}

	const commands: Command[] = []
	for (const [index, rawCommand] of raw.commands.entries()) {
		const field = `${at}.commands[${index}]`
		const command = requireNonEmpty(rawCommand.command, `${field}.command`, source)
		if (!command.ok) return command
		if (
			!COMMAND_NAME_PATTERN.test(command.value) ||
			command.value === "." ||
			command.value === ".."
		) {
			return invalid(`${field}.command`, `Invalid command name "${command.value}".`, source)
		}

		const commandPath = normalizeRelativePath(rawCommand.path)
		if (!commandPath.ok) {
			return invalid(
				`${field}.path`,
				`Invalid path for command "${command.value}": ${relativePathErrorMessage(commandPath.reason)}`,
				source,
			)
		}

		commands.push({ command: command.value, path: commandPath.value })
	}

	const packages: Package[] = []
	for (const [index, rawPackage] of raw.packages.entries()) {
		const pkg = coercePackage(rawPackage, `${at}.packages[${index}]`, source)
		if (!pkg.ok) return pkg
		packages.push(pkg.value)
	}

	return {
		ok: true,
		value: {
			commands,
			description: raw.description,
			handlerVersion: raw.app_handler_version,
			license: raw.license,
			name: name.value,
			packages,
			version,
		},
	}
}

function coercePackage(raw: RawPackage, at: string, source: string): Result<Package> {
	const name = requireNonEmpty(raw.name, `${at}.name`, source)
	if (!name.ok) return name

	const version = coerceSemver(raw.version)
	if (!version) {
		return invalid(
			`${at}.version`,
			`Invalid version "${raw.version}" for package "${raw.name}".`,
			source,
		)
	}

	const sha256 = coerceContentHash(raw.sha256)
	if (!sha256) {
		return invalid(
			`${at}.sha256`,
			`Invalid sha256 for package "${raw.name}": expected 64 hex characters.`,
			source,
		)
	}

	const locator = requireNonEmpty(raw.source, `${at}.source`, source)
	if (!locator.ok) return locator

	const dependencies: DependencyRef[] = []
	for (const [index, rawDependency] of raw.dependencies.entries()) {
		const dependency = parseDependencyRef(rawDependency, `${at}.dependencies[${index}]`)
		if (!dependency.ok) {
			return { error: { ...dependency.error, path: source }, ok: false }
		}
		dependencies.push(dependency.value)
	}

	return {
		ok: true,
		value: {
			dependencies,
			handlerVersion: raw.package_handler_version,
			license: raw.license,
			name: name.value,
			sha256,
			source: locator.value,
			version,
		},
	}
}

function requireNonEmpty(
	value: string,
	field: string,
	source: string,
): Result<NonEmptyString, ValidationError> {
	const coerced = coerceNonEmpty(value)
	if (!coerced) {
		return invalid(field, `${field} must not be empty.`, source)
	}
	return { ok: true, value: coerced }
}

function invalid(
	field: string,
	message: string,
	source: string,
): Result<never, ValidationError> {
	return {
		error: { field, message, path: source, source: "manual", type: "validation" },
		ok: false,
	}
}

export function zodFailure(
	error: z.ZodError,
	label: string,
	source: string,
): Result<never, ValidationError> {
	const issue = error.issues[0]
	return {
		error: {
			field: issue && issue.path.length > 0 ? issue.path.join(".") : label,
			message: formatZodError(error, label),
			path: source,
			source: "zod",
			type: "validation",
			zodError: error,
		},
		ok: false,
	}
}
