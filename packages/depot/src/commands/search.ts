import type { SearchGroup } from "@depot/core"
import { consola } from "consola"
import { CommandResult } from "@/src/commands/types"
import type { DepotContext } from "@/src/core/context"
import { type CatalogFailure, searchApps } from "@/src/core/subscriptions/manager"

export async function searchCommand(
	context: DepotContext,
	query: string,
): Promise<CommandResult<SearchGroup[]>> {
	const { failures, groups } = await searchApps(context, query)
	warnFailures(failures)
	if (groups.length === 0) {
		return CommandResult.unchanged(`No apps match "${query}".`)
	}
	printGroups(groups)
	return CommandResult.completed(groups)
}

/** Every app of every subscribed artifactory. */
export async function listCommand(context: DepotContext): Promise<CommandResult<SearchGroup[]>> {
	const { failures, groups } = await searchApps(context, "")
	warnFailures(failures)
	if (groups.length === 0) {
		return CommandResult.unchanged(
			"No apps available. Use `depot artifactory subscribe` to add an artifactory.",
		)
	}
	printGroups(groups)
	return CommandResult.completed(groups)
}

export function formatGroups(groups: readonly SearchGroup[]): string[] {
	const lines: string[] = []
	for (const group of groups) {
		lines.push(`${group.source}:`)
		for (const entry of group.apps) {
			const description = entry.app.description ? ` - ${entry.app.description}` : ""
			lines.push(`  ${entry.app.name}@${entry.app.version}${description}`)
		}
	}
	return lines
}

function printGroups(groups: readonly SearchGroup[]): void {
	for (const line of formatGroups(groups)) {
		consola.log(line)
	}
}

function warnFailures(failures: readonly CatalogFailure[]): void {
	for (const failure of failures) {
		consola.warn(`Could not load ${failure.source}: ${failure.error.message}`)
	}
}
