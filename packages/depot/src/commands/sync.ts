import { consola } from "consola"
import { describeAction } from "@/src/commands/install"
import { CommandResult, formatErrorChain } from "@/src/commands/types"
import type { DepotContext } from "@/src/core/context"
import { formatAppRef } from "@/src/core/install/app"
import { runSync } from "@/src/core/sync/sync"
import type { SyncSummary } from "@/src/core/sync/types"

export async function syncCommand(
	context: DepotContext,
	options: { dryRun: boolean; allOrNothing?: boolean; signal?: AbortSignal },
): Promise<CommandResult<SyncSummary>> {
	consola.start(options.dryRun ? "Planning sync..." : "Syncing apps...")

	const summary = await runSync(context, {
		allOrNothing: options.allOrNothing,
		dryRun: options.dryRun,
		signal: options.signal,
	})

	for (const failure of summary.catalogFailures) {
		consola.warn(`Could not load ${failure.source}: ${failure.error.message}`)
	}

	for (const outcome of summary.apps) {
		for (const action of outcome.actions) {
			const line = describeAction(action, options.dryRun)
			if (line) consola.info(`${formatAppRef(outcome.app)}: ${line}`)
		}
	}

	for (const app of summary.orphaned) {
		consola.warn(`${formatAppRef(app)} is no longer offered; its packages are kept and flagged orphaned.`)
	}

	if (summary.failures.length > 0) {
		for (const failure of summary.failures) {
			consola.error(`${formatAppRef(failure.app)} failed during ${failure.stage}:`)
			consola.error(formatErrorChain(failure.error))
		}
		process.exitCode = 1
		return CommandResult.unchanged(`${summary.failures.length} app(s) could not be synced.`)
	}

	const changed = summary.installed + summary.upgraded + summary.detached
	if (changed === 0 && summary.apps.every((outcome) => outcome.actions.every((action) => action.type === "keep"))) {
		return CommandResult.unchanged("Everything is up to date.")
	}

	const verb = options.dryRun ? "Would install" : "Installed"
	consola.info(
		`${verb} ${summary.installed}, upgraded ${summary.upgraded}, released ${summary.detached} package(s).`,
	)
	return CommandResult.completed(summary)
}
