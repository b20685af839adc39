/**
 * Sync engine
 *
 * Re-resolves every installed app against a freshly loaded catalog and moves
 * the install tree to match. Apps are handled one after another and fail
 * independently.
 */

import {
	type AppRef,
	type Config,
	type DepotError,
	type Result,
	resolveApp,
} from "@depot/core"
import { consola } from "consola"
import type { DepotContext } from "@/src/core/context"
import {
	type AppChanges,
	applyAppChanges,
	formatAppRef,
	installedApps,
	isNoop,
	planAppChanges,
} from "@/src/core/install/app"
import { sameApp } from "@/src/core/install/installer"
import { mergedCatalog } from "@/src/core/subscriptions/manager"
import { toSyncFailure } from "@/src/core/sync/errors"
import type { SyncOptions, SyncSummary } from "@/src/core/sync/types"

const log = consola.withTag("sync")

export async function runSync(context: DepotContext, options: SyncOptions): Promise<SyncSummary> {
	const catalog = await mergedCatalog(context, { fresh: true })
	const summary: SyncSummary = {
		apps: [],
		catalogFailures: catalog.failures,
		detached: 0,
		dryRun: options.dryRun,
		failures: [],
		installed: 0,
		orphaned: [],
		upgraded: 0,
	}

	for (const app of installedApps(context.config.current())) {
		if (options.signal?.aborted) {
			summary.failures.push(
				toSyncFailure(app, { message: "Sync aborted.", stage: "sync", type: "aborted" }),
			)
			break
		}

		const plan = resolveApp(catalog.entries, { name: app.name, source: app.source })
		if (!plan.ok) {
			log.debug(`Could not resolve ${formatAppRef(app)}: ${plan.error.message}`)
			summary.orphaned.push(app)
			summary.failures.push(toSyncFailure(app, plan.error, "resolve"))
			if (!options.dryRun) {
				const marked = await markOrphaned(context, app)
				if (!marked.ok) {
					summary.failures.push(toSyncFailure(app, marked.error, "orphan"))
				}
			}
			continue
		}

		const changes = planAppChanges(context.config.current(), plan.value)
		summary.apps.push({ actions: changes.actions, app })
		if (isNoop(changes) || options.dryRun) {
			count(summary, changes)
			continue
		}

		const applied = await applyAppChanges(context, changes, options)
		if (!applied.ok) {
			summary.failures.push(toSyncFailure(app, applied.error))
			continue
		}
		count(summary, changes)
	}

	return summary
}

function count(summary: SyncSummary, changes: AppChanges): void {
	for (const action of changes.actions) {
		if (action.type === "install") summary.installed += 1
		if (action.type === "upgrade") summary.upgraded += 1
		if (action.type === "detach") summary.detached += 1
	}
}

function ownsRecord(app: AppRef): (record: Config["packages"][number]) => boolean {
	return (record) => record.apps.some((ref) => sameApp(ref, app))
}

/**
 * Flag the app's records as orphaned. Already flagged records are left alone,
 * so repeating this writes nothing.
 */
async function markOrphaned(
	context: DepotContext,
	app: AppRef,
): Promise<Result<void, DepotError>> {
	const owns = ownsRecord(app)
	const pending = context.config
		.current()
		.packages.some((record) => owns(record) && !record.orphaned)
	if (!pending) {
		return { ok: true, value: undefined }
	}

	const saved = await context.config.update((config) => ({
		...config,
		packages: config.packages.map((record) =>
			owns(record) && !record.orphaned ? { ...record, orphaned: true } : record,
		),
	}))
	return saved.ok ? { ok: true, value: undefined } : saved
}
