import { consola } from "consola"
import { CommandResult } from "@/src/commands/types"
import { type MirrorReport, mirrorScratchTier } from "@/src/core/config/tiers"
import type { DepotContext } from "@/src/core/context"

export async function tiersSync(context: DepotContext): Promise<CommandResult<MirrorReport>> {
	const config = context.config.current()
	if (!config.sgoinfreDir || !config.goinfreDir) {
		return CommandResult.unchanged(
			"Both sgoinfre_dir and goinfre_dir must be set. Use `depot config set-sgoinfre` and `depot config set-goinfre`.",
		)
	}

	consola.start(`Mirroring ${config.sgoinfreDir} into ${config.goinfreDir}...`)
	const mirrored = await mirrorScratchTier(config)
	if (!mirrored.ok) {
		return CommandResult.failed(mirrored.error)
	}
	if (mirrored.value.copied.length === 0) {
		return CommandResult.unchanged("The scratch tier is up to date.")
	}

	for (const entry of mirrored.value.copied) {
		consola.info(`Copied ${entry}`)
	}
	return CommandResult.completed(mirrored.value)
}
