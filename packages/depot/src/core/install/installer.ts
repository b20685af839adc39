/**
 * Installer
 *
 * Turns a verified archive into an install directory, entry points and a
 * config record. Every failure undoes the work of the same call before it
 * returns; the config only changes once everything else is in place.
 */

import path from "node:path"
import {
	type AbsolutePath,
	type AppRef,
	type Command,
	type CommandConflictError,
	type Config,
	coerceAbsolutePathDirect,
	type DuplicateNameError,
	type EntryPointRemovalError,
	type ExtractionFailureError,
	type InstalledCommand,
	type InstalledRecord,
	isWithinRoot,
	joinAbsolute,
	type NotFoundError,
	type Package,
	type PathTraversalError,
	type Result,
	currentVersion,
} from "@depot/core"
import { consola } from "consola"
import type { DepotContext } from "@/src/core/context"
import type { ArchiveEntry } from "@/src/core/install/extract"
import { ensureDir, removePath, safeStat } from "@/src/core/io/fs"
import type { IoError } from "@/src/core/io/types"
import type { VerifiedPackage } from "@/src/core/packages/fetch"

const log = consola.withTag("install")

export type InstallError =
	| IoError
	| PathTraversalError
	| ExtractionFailureError
	| CommandConflictError
	| NotFoundError
	| DuplicateNameError
	| EntryPointRemovalError

export interface InstallRequest {
	verified: VerifiedPackage
	/** The app the package is installed for. */
	app: AppRef
	/** Commands `app` exposes from this package. */
	commands: readonly Command[]
}

interface PublishedEntryPoint {
	entryPoint: AbsolutePath
	previous?: AbsolutePath
}

export function sameApp(left: AppRef, right: AppRef): boolean {
	return left.source === right.source && left.name === right.name
}

/** Commands of `app` that the record does not expose yet. */
export function pendingCommands(
	record: InstalledRecord,
	app: AppRef,
	commands: readonly Command[],
): Command[] {
	return commands.filter(
		(command) =>
			!record.commands.some(
				(installed) => installed.command === command.command && sameApp(installed.app, app),
			),
	)
}

export function installPathFor(config: Config, pkg: Pick<Package, "name" | "version">): AbsolutePath {
	return joinAbsolute(config.installDir, `${pkg.name}-${pkg.version}`)
}

export async function install(
	context: DepotContext,
	request: InstallRequest,
): Promise<Result<InstalledRecord, InstallError>> {
	const { bytes, planned } = request.verified
	const pkg = planned.package
	const config = context.config.current()
	const installPath = installPathFor(config, pkg)
	const label = `${pkg.name}@${pkg.version}`

	if (config.packages.some((record) => record.installPath === installPath)) {
		return {
			error: {
				message: `${label} is already installed at ${installPath}.`,
				name: label,
				target: "package",
				type: "duplicate_name",
			},
			ok: false,
		}
	}

	const cleared = await removePath(installPath)
	if (!cleared.ok) return cleared

	const entries = await context.extractor.list(bytes)
	if (!entries.ok) {
		return extractionFailure(pkg, installPath, entries.error.message, entries.error.rawError)
	}

	const escaping = entries.value.find((entry) => escapesRoot(installPath, entry))
	if (escaping) {
		return {
			error: {
				entry: escaping.path,
				message: `Archive entry "${escaping.path}" of ${label} would be written outside ${installPath}.`,
				name: pkg.name,
				root: installPath,
				type: "path_traversal",
			},
			ok: false,
		}
	}

	const created = await ensureDir(installPath)
	if (!created.ok) return created

	const extracted = await context.extractor.extract(bytes, installPath)
	if (!extracted.ok) {
		await removePath(installPath)
		return extractionFailure(pkg, installPath, extracted.error.message, extracted.error.rawError)
	}

	const published: PublishedEntryPoint[] = []
	const rollback = async (): Promise<void> => {
		await restoreEntryPoints(context, published)
		const removed = await removePath(installPath)
		if (!removed.ok) {
			log.warn(`Could not remove ${installPath}: ${removed.error.message}`)
		}
	}

	const commands = await exposeCommands(
		context,
		config,
		pkg,
		installPath,
		request.app,
		request.commands,
		published,
	)
	if (!commands.ok) {
		await rollback()
		return commands
	}

	const record: InstalledRecord = {
		apps: [request.app],
		commands: commands.value,
		handlerVersion: currentVersion("record"),
		installPath,
		installedAt: context.now().toISOString(),
		orphaned: false,
		package: { name: pkg.name, sha256: pkg.sha256, version: pkg.version },
	}

	const saved = await context.config.update((current) => ({
		...current,
		packages: [...current.packages, record],
	}))
	if (!saved.ok) {
		await rollback()
		return saved
	}

	log.debug(`Installed ${label} into ${installPath}.`)
	return { ok: true, value: record }
}

/**
 * Expose the commands `app` declares on an already installed package. Commands
 * the record already exposes for `app` are skipped; on failure the entry points
 * created here are restored and the record is left as it was.
 */
export async function publishCommands(
	context: DepotContext,
	record: InstalledRecord,
	app: AppRef,
	commands: readonly Command[],
): Promise<Result<InstalledRecord, InstallError>> {
	const config = context.config.current()
	const current = config.packages.find((entry) => entry.installPath === record.installPath)
	if (!current) {
		return {
			error: {
				message: `${record.package.name}@${record.package.version} is not installed.`,
				path: record.installPath,
				target: "package",
				type: "not_found",
			},
			ok: false,
		}
	}

	const pending = pendingCommands(current, app, commands)
	if (pending.length === 0) {
		return { ok: true, value: current }
	}

	const published: PublishedEntryPoint[] = []
	const exposed = await exposeCommands(
		context,
		config,
		current.package,
		current.installPath,
		app,
		pending,
		published,
	)
	if (!exposed.ok) {
		await restoreEntryPoints(context, published)
		return exposed
	}

	const updated: InstalledRecord = { ...current, commands: [...current.commands, ...exposed.value] }
	const saved = await context.config.update((latest) => ({
		...latest,
		packages: latest.packages.map((entry) =>
			entry.installPath === current.installPath ? updated : entry,
		),
	}))
	if (!saved.ok) {
		await restoreEntryPoints(context, published)
		return saved
	}

	log.debug(`Exposed ${exposed.value.length} commands of ${formatAppLabel(app)}.`)
	return { ok: true, value: updated }
}

/**
 * Withdraw the entry points of the record's commands matching `leaving`.
 * An entry point another command still uses, or one that no longer points
 * into the record's directory, is left in place. Returns the commands the
 * record keeps; the config itself is not written.
 */
export async function releaseCommands(
	context: DepotContext,
	record: InstalledRecord,
	leaving: (command: InstalledCommand) => boolean,
): Promise<Result<InstalledCommand[], InstallError>> {
	const kept = record.commands.filter((command) => !leaving(command))
	const released = record.commands.filter(leaving)
	const others = context.config
		.current()
		.packages.flatMap((entry) => (entry.installPath === record.installPath ? kept : entry.commands))

	const remaining: string[] = []
	for (const command of released) {
		if (others.some((other) => other.entryPoint === command.entryPoint)) {
			continue
		}
		const state = await context.publisher.inspect(command.entryPoint)
		if (!state.ok) {
			remaining.push(command.entryPoint)
			continue
		}
		if (state.value.type !== "link" || !isWithinRoot(record.installPath, state.value.target)) {
			continue
		}
		const removed = await context.publisher.unpublish(command.entryPoint)
		if (!removed.ok) {
			remaining.push(command.entryPoint)
		}
	}

	if (remaining.length > 0) {
		return entryPointRemoval(record, remaining)
	}
	return { ok: true, value: kept }
}

/** Re-create the record's entry points that have gone missing. */
export async function restoreCommands(
	context: DepotContext,
	record: InstalledRecord,
): Promise<Result<void, InstallError>> {
	for (const command of record.commands) {
		const state = await context.publisher.inspect(command.entryPoint)
		if (!state.ok) return state
		if (state.value.type !== "absent") continue
		const published = await context.publisher.publish(
			command.entryPoint,
			joinAbsolute(record.installPath, command.path),
		)
		if (!published.ok) return published
	}
	return { ok: true, value: undefined }
}

async function exposeCommands(
	context: DepotContext,
	config: Config,
	pkg: Pick<Package, "name" | "version">,
	installPath: AbsolutePath,
	app: AppRef,
	commands: readonly Command[],
	published: PublishedEntryPoint[],
): Promise<Result<InstalledCommand[], InstallError>> {
	const exposed: InstalledCommand[] = []
	if (commands.length === 0) {
		return { ok: true, value: exposed }
	}

	const bin = await ensureDir(config.binDir)
	if (!bin.ok) return bin

	for (const command of commands) {
		const result = await exposeCommand(context, config, pkg, installPath, app, command)
		if (!result.ok) return result
		published.push(result.value.published)
		exposed.push(result.value.command)
	}
	return { ok: true, value: exposed }
}

async function restoreEntryPoints(
	context: DepotContext,
	published: readonly PublishedEntryPoint[],
): Promise<void> {
	for (const entry of [...published].reverse()) {
		const restored = entry.previous
			? await context.publisher.publish(entry.entryPoint, entry.previous)
			: await context.publisher.unpublish(entry.entryPoint)
		if (!restored.ok) {
			log.warn(`Could not restore ${entry.entryPoint}: ${restored.error.message}`)
		}
	}
}

async function exposeCommand(
	context: DepotContext,
	config: Config,
	pkg: Pick<Package, "name" | "version">,
	installPath: AbsolutePath,
	app: AppRef,
	command: Command,
): Promise<
	Result<
		{ command: InstalledCommand; published: PublishedEntryPoint },
		InstallError
	>
> {
	const label = `${pkg.name}@${pkg.version}`
	if (!isWithinRoot(installPath, command.path)) {
		return {
			error: {
				entry: command.path,
				message: `Command "${command.command}" of ${label} points outside ${installPath}.`,
				name: pkg.name,
				root: installPath,
				type: "path_traversal",
			},
			ok: false,
		}
	}

	const target = joinAbsolute(installPath, command.path)
	const stats = await safeStat(target)
	if (!stats.ok) return stats
	if (!stats.value?.isFile()) {
		return {
			error: {
				message: `Command "${command.command}" points at ${command.path}, which ${label} does not contain.`,
				path: target,
				target: "command",
				type: "not_found",
			},
			ok: false,
		}
	}

	const entryPoint = joinAbsolute(config.binDir, command.command)
	const state = await context.publisher.inspect(entryPoint)
	if (!state.ok) return state

	const owner = config.packages.find((record) =>
		record.commands.some((installed) => installed.entryPoint === entryPoint),
	)

	let conflict: string | undefined
	if (owner && owner.package.name !== pkg.name) {
		conflict = `${owner.package.name}@${owner.package.version}`
	} else if (state.value.type === "file") {
		conflict = "an unmanaged file"
	} else if (
		state.value.type === "link" &&
		!owner &&
		!isWithinRoot(installPath, state.value.target)
	) {
		conflict = "an unmanaged link"
	}

	if (conflict) {
		return {
			error: {
				command: command.command,
				message: `Command "${command.command}" is already provided by ${conflict} at ${entryPoint}.`,
				owner: conflict,
				path: entryPoint,
				type: "command_conflict",
			},
			ok: false,
		}
	}

	const previous =
		state.value.type === "link" ? coerceAbsolutePathDirect(state.value.target) : null
	const published = await context.publisher.publish(entryPoint, target)
	if (!published.ok) return published

	return {
		ok: true,
		value: {
			command: { app, command: command.command, entryPoint, path: command.path },
			published: { entryPoint, previous: previous ?? undefined },
		},
	}
}

/**
 * Remove an installed package: its entry points (only those still pointing
 * into its directory), then the directory, then the record.
 */
export async function remove(
	context: DepotContext,
	record: InstalledRecord,
): Promise<Result<void, InstallError>> {
	const remaining: string[] = []
	for (const command of record.commands) {
		const state = await context.publisher.inspect(command.entryPoint)
		if (!state.ok) {
			remaining.push(command.entryPoint)
			continue
		}
		if (state.value.type !== "link" || !isWithinRoot(record.installPath, state.value.target)) {
			continue
		}
		const removed = await context.publisher.unpublish(command.entryPoint)
		if (!removed.ok) {
			remaining.push(command.entryPoint)
		}
	}

	if (remaining.length > 0) {
		return entryPointRemoval(record, remaining)
	}

	const removed = await removePath(record.installPath)
	if (!removed.ok) return removed

	const saved = await context.config.update((config) => ({
		...config,
		packages: config.packages.filter((entry) => entry.installPath !== record.installPath),
	}))
	if (!saved.ok) return saved

	log.debug(`Removed ${record.package.name}@${record.package.version}.`)
	return { ok: true, value: undefined }
}

function escapesRoot(root: AbsolutePath, entry: ArchiveEntry): boolean {
	const entryPath = entry.path.replace(/\\/g, "/")
	if (path.posix.normalize(entryPath).replace(/\/+$/, "") === ".") {
		return false
	}
	if (path.isAbsolute(entryPath) || !isWithinRoot(root, entryPath)) {
		return true
	}
	if (entry.linkpath === undefined) {
		return false
	}

	const linkpath = entry.linkpath.replace(/\\/g, "/")
	if (path.isAbsolute(linkpath)) {
		return true
	}
	const linkTarget = path.resolve(path.dirname(path.resolve(root, entryPath)), linkpath)
	return linkTarget !== root && !isWithinRoot(root, linkTarget)
}

function entryPointRemoval(
	record: InstalledRecord,
	remaining: string[],
): Result<never, EntryPointRemovalError> {
	const label = `${record.package.name}@${record.package.version}`
	return {
		error: {
			message: `Could not remove entry points of ${label}: ${remaining.join(", ")}.`,
			name: label,
			remaining,
			type: "entry_point_removal",
		},
		ok: false,
	}
}

function formatAppLabel(app: AppRef): string {
	return `${app.source}/${app.name}`
}

function extractionFailure(
	pkg: Package,
	installPath: AbsolutePath,
	message: string,
	rawError?: Error,
): Result<never, ExtractionFailureError> {
	return {
		error: {
			message: `Could not extract ${pkg.name}@${pkg.version}: ${message}`,
			name: pkg.name,
			path: installPath,
			rawError,
			type: "extraction_failure",
		},
		ok: false,
	}
}
