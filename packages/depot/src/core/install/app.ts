/**
 * App installation
 *
 * Installs or removes whole apps. Work is split in two stages: `planAppChanges`
 * diffs a resolution plan against the installed records without touching
 * anything, and `applyAppChanges` fetches, verifies and then commits the
 * changes one package at a time. Records an upgrade replaces are only retired
 * once every new package is in place.
 */

import {
	type AppCandidate,
	type AppRef,
	type AppRequest,
	type Config,
	type DepotError,
	formatAppRequest,
	identityKey,
	type InstalledRecord,
	type PlannedPackage,
	parseAppRequest,
	type ResolutionPlan,
	type Result,
	resolveApp,
} from "@depot/core"
import { consola } from "consola"
import type { DepotContext } from "@/src/core/context"
import {
	install,
	pendingCommands,
	publishCommands,
	releaseCommands,
	remove,
	restoreCommands,
	sameApp,
} from "@/src/core/install/installer"
import { fetchPackages, type VerifiedPackage } from "@/src/core/packages/fetch"
import { type MergedCatalog, mergedCatalog } from "@/src/core/subscriptions/manager"

const log = consola.withTag("app")

export type PackageAction =
	| { type: "keep"; planned: PlannedPackage; record: InstalledRecord }
	| { type: "attach"; planned: PlannedPackage; record: InstalledRecord }
	| { type: "install"; planned: PlannedPackage }
	| { type: "upgrade"; planned: PlannedPackage; from: InstalledRecord }
	| { type: "detach"; record: InstalledRecord }

export interface AppChanges {
	app: AppRef
	plan: ResolutionPlan
	actions: PackageAction[]
}

export interface ApplyOptions {
	allOrNothing?: boolean
	signal?: AbortSignal
}

export interface InstallAppOptions extends ApplyOptions {
	/** Reuse an already merged catalog instead of loading one. */
	catalog?: MergedCatalog
}

export function formatAppRef(app: AppRef): string {
	return `${app.source}/${app.name}`
}

export function isNoop(changes: AppChanges): boolean {
	return changes.actions.every((action) => action.type === "keep")
}

/**
 * Diff a plan against the installed records. Records are matched by package
 * name, then version. A root record that lacks some of the app's commands is
 * attached again so they get exposed.
 */
export function planAppChanges(config: Config, plan: ResolutionPlan): AppChanges {
	const app: AppRef = { name: plan.entry.app.name, source: plan.entry.source }
	const owned = config.packages.filter((record) => record.apps.some((ref) => sameApp(ref, app)))
	const root = rootOf(plan)
	const actions: PackageAction[] = []
	const retained = new Set<string>()

	for (const planned of plan.packages) {
		const { name, version } = planned.package
		const exact = config.packages.find(
			(record) => record.package.name === name && record.package.version === version,
		)
		if (exact) {
			retained.add(exact.installPath)
			const attached = exact.apps.some((ref) => sameApp(ref, app))
			const missing =
				planned === root ? pendingCommands(exact, app, plan.entry.app.commands) : []
			actions.push({
				planned,
				record: exact,
				type: attached && !exact.orphaned && missing.length === 0 ? "keep" : "attach",
			})
			continue
		}

		const previous = owned.find((record) => record.package.name === name)
		if (previous) {
			retained.add(previous.installPath)
			actions.push({ from: previous, planned, type: "upgrade" })
		} else {
			actions.push({ planned, type: "install" })
		}
	}

	for (const record of owned) {
		if (!retained.has(record.installPath)) {
			actions.push({ record, type: "detach" })
		}
	}

	return { actions, app, plan }
}

/** Work committed by `applyAppChanges`, undone when a later step fails. */
type Committed =
	| { type: "installed"; record: InstalledRecord; replaced?: InstalledRecord }
	| { type: "attached"; before: InstalledRecord }

/**
 * Fetch and verify every package the changes install, then commit the changes
 * in plan order. Nothing is touched until every archive has been verified.
 *
 * New and attached records are committed first; records replaced by an upgrade
 * or no longer needed are only released afterwards. A failure while committing
 * undoes what this call committed, so the previous installation keeps working.
 * An abort stops between packages and keeps what was committed.
 */
export async function applyAppChanges(
	context: DepotContext,
	changes: AppChanges,
	options: ApplyOptions = {},
): Promise<Result<void, DepotError>> {
	const needed = changes.actions.flatMap((action) =>
		action.type === "install" || action.type === "upgrade" ? [action.planned] : [],
	)

	const verified = new Map<string, VerifiedPackage>()
	if (needed.length > 0) {
		const report = await fetchPackages(needed, context, {
			allOrNothing: options.allOrNothing,
			concurrency: context.fetchConcurrency,
			signal: options.signal,
			timeoutMs: context.fetchTimeoutMs,
		})
		const failure = needed
			.map((planned) => report.failures.find((entry) => entry.planned === planned))
			.find((entry) => entry !== undefined)
		if (failure) {
			return { error: failure.error, ok: false }
		}
		if (report.verified.length < needed.length) {
			return aborted("fetch")
		}
		for (const item of report.verified) {
			verified.set(identityKey(item.planned.package), item)
		}
	}

	const committed: Committed[] = []
	for (const action of changes.actions) {
		if (action.type === "keep" || action.type === "detach") continue
		if (options.signal?.aborted) {
			return aborted("install")
		}
		const applied = await commitAction(context, changes, action, verified)
		if (!applied.ok) {
			await rollBack(context, committed)
			return applied
		}
		committed.push(applied.value)
	}

	for (const action of changes.actions) {
		const record = retiredRecord(action)
		if (!record) continue
		const retired = await detachApp(context, record, changes.app)
		if (!retired.ok) return retired
	}

	return { ok: true, value: undefined }
}

function retiredRecord(action: PackageAction): InstalledRecord | undefined {
	switch (action.type) {
		case "upgrade":
			return action.from
		case "detach":
			return action.record
		default:
			return undefined
	}
}

async function commitAction(
	context: DepotContext,
	changes: AppChanges,
	action: Extract<PackageAction, { type: "attach" | "install" | "upgrade" }>,
	verified: ReadonlyMap<string, VerifiedPackage>,
): Promise<Result<Committed, DepotError>> {
	const commands =
		action.planned === rootOf(changes.plan) ? changes.plan.entry.app.commands : []

	if (action.type === "attach") {
		const attached = await attachApp(context, action.record, changes.app)
		if (!attached.ok) return attached
		const exposed = await publishCommands(context, attached.value, changes.app, commands)
		if (!exposed.ok) {
			await restoreRecord(context, action.record)
			return exposed
		}
		return { ok: true, value: { before: action.record, type: "attached" } }
	}

	const item = verified.get(identityKey(action.planned.package))
	if (!item) {
		return aborted("install")
	}
	const installed = await install(context, { app: changes.app, commands, verified: item })
	if (!installed.ok) return installed

	log.debug(`Installed ${action.planned.package.name}@${action.planned.package.version}.`)
	return {
		ok: true,
		value: {
			record: installed.value,
			replaced: action.type === "upgrade" ? action.from : undefined,
			type: "installed",
		},
	}
}

async function rollBack(context: DepotContext, committed: readonly Committed[]): Promise<void> {
	for (const entry of [...committed].reverse()) {
		if (entry.type === "attached") {
			await restoreRecord(context, entry.before)
			continue
		}

		const removed = await remove(context, entry.record)
		if (!removed.ok) {
			log.warn(`Could not roll back ${entry.record.installPath}: ${removed.error.message}`)
		}
		if (entry.replaced) {
			const restored = await restoreCommands(context, entry.replaced)
			if (!restored.ok) {
				log.warn(`Could not restore commands of ${entry.replaced.installPath}: ${restored.error.message}`)
			}
		}
	}
}

/** Put a record back the way it was before it was attached. */
async function restoreRecord(context: DepotContext, before: InstalledRecord): Promise<void> {
	const current = context.config
		.current()
		.packages.find((entry) => entry.installPath === before.installPath)
	if (!current) return

	const released = await releaseCommands(
		context,
		current,
		(command) =>
			!before.commands.some(
				(previous) =>
					previous.entryPoint === command.entryPoint && sameApp(previous.app, command.app),
			),
	)
	if (!released.ok) {
		log.warn(`Could not restore ${before.installPath}: ${released.error.message}`)
		return
	}

	const saved = await context.config.update((config) => ({
		...config,
		packages: config.packages.map((entry) =>
			entry.installPath === before.installPath ? before : entry,
		),
	}))
	if (!saved.ok) {
		log.warn(`Could not restore ${before.installPath}: ${saved.error.message}`)
	}
}

async function attachApp(
	context: DepotContext,
	record: InstalledRecord,
	app: AppRef,
): Promise<Result<InstalledRecord, DepotError>> {
	const current =
		context.config.current().packages.find((entry) => entry.installPath === record.installPath) ??
		record
	const attached = current.apps.some((ref) => sameApp(ref, app))
	const updated: InstalledRecord = {
		...current,
		apps: attached ? current.apps : [...current.apps, app],
		orphaned: false,
	}
	if (attached && !current.orphaned) {
		return { ok: true, value: current }
	}

	const saved = await context.config.update((config) => ({
		...config,
		packages: config.packages.map((entry) =>
			entry.installPath === record.installPath ? updated : entry,
		),
	}))
	return saved.ok ? { ok: true, value: updated } : saved
}

/**
 * Drop `app` from a record and withdraw the commands it declared there; a
 * record left with no app is removed.
 */
export async function detachApp(
	context: DepotContext,
	record: InstalledRecord,
	app: AppRef,
): Promise<Result<void, DepotError>> {
	const current = context.config
		.current()
		.packages.find((entry) => entry.installPath === record.installPath)
	if (!current) {
		return { ok: true, value: undefined }
	}

	const remaining = current.apps.filter((ref) => !sameApp(ref, app))
	if (remaining.length === 0) {
		return remove(context, current)
	}
	if (remaining.length === current.apps.length) {
		return { ok: true, value: undefined }
	}

	const kept = await releaseCommands(context, current, (command) => sameApp(command.app, app))
	if (!kept.ok) return kept

	const saved = await context.config.update((config) => ({
		...config,
		packages: config.packages.map((entry) =>
			entry.installPath === record.installPath
				? { ...entry, apps: remaining, commands: kept.value }
				: entry,
		),
	}))
	return saved.ok ? { ok: true, value: undefined } : saved
}

export interface InstallAppReport {
	changes: AppChanges
	/** True when everything the plan needs was already installed. */
	unchanged: boolean
}

export async function installApp(
	context: DepotContext,
	input: string | AppRequest,
	options: InstallAppOptions = {},
): Promise<Result<InstallAppReport, DepotError>> {
	const request = typeof input === "string" ? parseAppRequest(input) : { ok: true as const, value: input }
	if (!request.ok) return request

	const catalog = options.catalog ?? (await mergedCatalog(context))
	for (const failure of catalog.failures) {
		log.debug(`Skipping ${failure.source}: ${failure.error.message}`)
	}

	const plan = resolveApp(catalog.entries, request.value)
	if (!plan.ok) return plan

	const changes = planAppChanges(context.config.current(), plan.value)
	if (isNoop(changes)) {
		return { ok: true, value: { changes, unchanged: true } }
	}

	log.debug(
		`Applying ${changes.actions.length} changes for ${formatAppRequest(request.value)}.`,
	)
	const applied = await applyAppChanges(context, changes, options)
	if (!applied.ok) return applied

	return { ok: true, value: { changes, unchanged: false } }
}

/** Distinct app refs over all records, in record order. */
export function installedApps(config: Config): AppRef[] {
	const apps: AppRef[] = []
	for (const record of config.packages) {
		for (const ref of record.apps) {
			if (!apps.some((app) => sameApp(app, ref))) {
				apps.push(ref)
			}
		}
	}
	return apps
}

/**
 * Detach an installed app from its records, newest record first.
 * `input` is `name` or `source/name`.
 */
export async function removeApp(
	context: DepotContext,
	input: string,
): Promise<Result<AppRef, DepotError>> {
	const request = parseAppRequest(input)
	if (!request.ok) return request

	const config = context.config.current()
	const matches = installedApps(config).filter(
		(app) =>
			app.name === request.value.name &&
			(request.value.source === undefined || app.source === request.value.source),
	)

	const [app, ...others] = matches
	if (!app) {
		return {
			error: {
				message: `App "${input}" is not installed.`,
				target: "app",
				type: "not_found",
			},
			ok: false,
		}
	}

	if (others.length > 0) {
		const candidates = matches.flatMap((match) => installedCandidate(config, match))
		return {
			error: {
				candidates,
				message: `App "${input}" is installed from several sources: ${matches.map(formatAppRef).join(", ")}.`,
				name: request.value.name,
				type: "ambiguous_app",
			},
			ok: false,
		}
	}

	const records = config.packages.filter((record) =>
		record.apps.some((ref) => sameApp(ref, app)),
	)
	for (const record of [...records].reverse()) {
		const detached = await detachApp(context, record, app)
		if (!detached.ok) return detached
	}

	return { ok: true, value: app }
}

function installedCandidate(config: Config, app: AppRef): AppCandidate[] {
	const records = config.packages.filter((record) =>
		record.apps.some((ref) => sameApp(ref, app)),
	)
	const root =
		records.find((record) => record.package.name === app.name) ?? records[records.length - 1]
	return root ? [{ name: app.name, source: app.source, version: root.package.version }] : []
}

/** The root package is the last one in the plan. */
function rootOf(plan: ResolutionPlan): PlannedPackage | undefined {
	return plan.packages[plan.packages.length - 1]
}

function aborted(stage: string): Result<never, DepotError> {
	return {
		error: { message: `Stopped before ${stage} finished.`, stage, type: "aborted" },
		ok: false,
	}
}
