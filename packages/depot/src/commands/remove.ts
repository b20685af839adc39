import type { AppRef } from "@depot/core"
import { consola } from "consola"
import { type CandidatePicker, promptCandidate } from "@/src/commands/prompt"
import { CommandResult } from "@/src/commands/types"
import type { DepotContext } from "@/src/core/context"
import { formatAppRef, removeApp } from "@/src/core/install/app"

export interface RemoveCommandOptions {
	nonInteractive: boolean
	pick?: CandidatePicker
}

export async function removeCommand(
	context: DepotContext,
	app: string,
	options: RemoveCommandOptions,
): Promise<CommandResult<AppRef>> {
	consola.start(`Removing ${app}...`)
	let result = await removeApp(context, app)

	if (!result.ok && result.error.type === "ambiguous_app" && !options.nonInteractive) {
		const pick = options.pick ?? promptCandidate
		const chosen = await pick(`"${app}" is installed from several sources. Pick one:`, result.error.candidates)
		if (!chosen) {
			return CommandResult.cancelled()
		}
		result = await removeApp(context, `${chosen.source}/${chosen.name}`)
	}

	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	consola.success(`Removed ${formatAppRef(result.value)}.`)
	return CommandResult.completed(result.value)
}
