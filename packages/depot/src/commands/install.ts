import type { AppRequest } from "@depot/core"
import { consola } from "consola"
import { type CandidatePicker, promptCandidate } from "@/src/commands/prompt"
import { CommandResult } from "@/src/commands/types"
import type { DepotContext } from "@/src/core/context"
import {
	type InstallAppReport,
	installApp,
	type PackageAction,
} from "@/src/core/install/app"
import { mergedCatalog } from "@/src/core/subscriptions/manager"

export interface InstallCommandOptions {
	allOrNothing: boolean
	nonInteractive: boolean
	pick?: CandidatePicker
	signal?: AbortSignal
}

export async function installCommand(
	context: DepotContext,
	app: string,
	options: InstallCommandOptions,
): Promise<CommandResult<InstallAppReport>> {
	consola.start(`Resolving ${app}...`)
	const catalog = await mergedCatalog(context)
	for (const failure of catalog.failures) {
		consola.warn(`Skipping ${failure.source}: ${failure.error.message}`)
	}

	let result = await installApp(context, app, {
		allOrNothing: options.allOrNothing,
		catalog,
		signal: options.signal,
	})

	if (!result.ok && result.error.type === "ambiguous_app" && !options.nonInteractive) {
		const pick = options.pick ?? promptCandidate
		const chosen = await pick(`Several artifactories offer "${app}". Pick one:`, result.error.candidates)
		if (!chosen) {
			return CommandResult.cancelled()
		}
		const request: AppRequest = {
			name: chosen.name,
			source: chosen.source,
			version: chosen.version,
		}
		result = await installApp(context, request, {
			allOrNothing: options.allOrNothing,
			catalog,
			signal: options.signal,
		})
	}

	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	const { changes, unchanged } = result.value
	const label = `${changes.app.source}/${changes.app.name}@${changes.plan.entry.app.version}`
	if (unchanged) {
		return CommandResult.unchanged(`${label} is already installed.`)
	}

	for (const action of changes.actions) {
		const line = describeAction(action)
		if (line) consola.info(line)
	}
	consola.success(`Installed ${label}.`)
	return CommandResult.completed(result.value)
}

export function describeAction(action: PackageAction, dryRun = false): string | null {
	switch (action.type) {
		case "keep":
			return null
		case "attach":
			return `${dryRun ? "Would reuse" : "Reused"} ${action.record.package.name}@${action.record.package.version}`
		case "install":
			return `${dryRun ? "Would install" : "Installed"} ${action.planned.package.name}@${action.planned.package.version}`
		case "upgrade":
			return `${dryRun ? "Would upgrade" : "Upgraded"} ${action.planned.package.name} ${action.from.package.version} -> ${action.planned.package.version}`
		case "detach":
			return `${dryRun ? "Would release" : "Released"} ${action.record.package.name}@${action.record.package.version}`
	}
}
