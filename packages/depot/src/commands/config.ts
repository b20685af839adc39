import { homedir } from "node:os"
import { type AbsolutePath, type Config, coerceAbsolutePath } from "@depot/core"
import { consola } from "consola"
import { CommandResult } from "@/src/commands/types"
import type { DepotContext } from "@/src/core/context"
import { expandHome } from "@/src/env"

export type ScratchTier = "sgoinfre" | "goinfre"

export async function configShow(context: DepotContext): Promise<CommandResult<Config>> {
	const config = context.config.current()
	for (const line of formatConfig(config, context.config.path)) {
		consola.log(line)
	}
	return CommandResult.completed(config)
}

export function formatConfig(config: Config, configPath: AbsolutePath): string[] {
	return [
		`config: ${configPath}`,
		`install_dir: ${config.installDir}`,
		`bin_dir: ${config.binDir}`,
		`sgoinfre_dir: ${config.sgoinfreDir ?? "(unset)"}`,
		`goinfre_dir: ${config.goinfreDir ?? "(unset)"}`,
		`subscriptions: ${config.subscriptions.length}`,
		`providers: ${config.providers.length}`,
		`packages: ${config.packages.length}`,
	]
}

export async function configSetTier(
	context: DepotContext,
	tier: ScratchTier,
	value: string,
	home: string = homedir(),
): Promise<CommandResult<AbsolutePath>> {
	const field = tier === "sgoinfre" ? "sgoinfre_dir" : "goinfre_dir"
	const dir = coerceAbsolutePath(expandHome(value, home), context.cwd)
	if (!dir) {
		return CommandResult.failed({
			field,
			message: `Invalid directory "${value}".`,
			source: "manual",
			type: "validation",
		})
	}

	const current = tier === "sgoinfre" ? context.config.current().sgoinfreDir : context.config.current().goinfreDir
	if (current === dir) {
		return CommandResult.unchanged(`${field} is already ${dir}.`)
	}

	const saved = await context.config.update((config) =>
		tier === "sgoinfre" ? { ...config, sgoinfreDir: dir } : { ...config, goinfreDir: dir },
	)
	if (!saved.ok) {
		return CommandResult.failed(saved.error)
	}

	consola.success(`Set ${field} to ${dir}.`)
	return CommandResult.completed(dir)
}
