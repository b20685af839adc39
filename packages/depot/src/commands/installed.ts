import type { InstalledRecord } from "@depot/core"
import { consola } from "consola"
import { CommandResult } from "@/src/commands/types"
import type { DepotContext } from "@/src/core/context"
import { formatAppRef } from "@/src/core/install/app"

export async function installedCommand(
	context: DepotContext,
): Promise<CommandResult<readonly InstalledRecord[]>> {
	const records = context.config.current().packages
	if (records.length === 0) {
		return CommandResult.unchanged("No packages installed.")
	}
	for (const line of formatRecords(records)) {
		consola.log(line)
	}
	return CommandResult.completed(records)
}

export function formatRecords(records: readonly InstalledRecord[]): string[] {
	return records.map((record) => {
		const apps = record.apps.map(formatAppRef).join(", ")
		const commands = record.commands.map((command) => command.command).join(", ")
		const parts = [`${record.package.name}@${record.package.version}`, `apps: ${apps}`]
		if (commands) parts.push(`commands: ${commands}`)
		if (record.orphaned) parts.push("orphaned")
		return parts.join("  ")
	})
}
