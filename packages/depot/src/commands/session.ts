import { consola } from "consola"
import { openConfigStore } from "@/src/core/config/store"
import { ensureLayout, mirrorScratchTier } from "@/src/core/config/tiers"
import { createContext, type DepotContext } from "@/src/core/context"
import { loadEnv } from "@/src/env"
import { CommandResult, printOutcome } from "@/src/commands/types"

/**
 * Load the environment and config, create the directory layout and build the
 * engine context. Mirrors the scratch tier on the way; a failed mirror is only
 * a warning.
 */
export async function openSession(
	env: NodeJS.ProcessEnv = process.env,
): Promise<CommandResult<DepotContext>> {
	const loaded = loadEnv(env)
	if (!loaded.ok) {
		return CommandResult.failed(loaded.error)
	}

	const store = await openConfigStore(loaded.value.configPath, {
		binDir: loaded.value.binDir,
		installDir: loaded.value.installDir,
	})
	if (!store.ok) {
		return CommandResult.failed(store.error)
	}

	const layout = await ensureLayout(store.value.current())
	if (!layout.ok) {
		return CommandResult.failed(layout.error)
	}

	const mirrored = await mirrorScratchTier(store.value.current())
	if (!mirrored.ok) {
		consola.warn(`Could not mirror the scratch tier: ${mirrored.error.message}`)
	} else if (mirrored.value.copied.length > 0) {
		consola.info(`Mirrored ${mirrored.value.copied.length} entries into the scratch tier.`)
	}

	return CommandResult.completed(createContext(loaded.value, store.value))
}

/**
 * Open a session, run `command` against it and print the outcome. Ctrl-C
 * aborts the signal handed to `command`.
 */
export async function runCommand<T>(
	title: string,
	command: (context: DepotContext, signal: AbortSignal) => Promise<CommandResult<T>>,
	env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
	consola.info(title)
	const session = await openSession(env)
	if (session.status !== "completed") {
		printOutcome(session)
		return
	}

	const controller = new AbortController()
	const onInterrupt = () => {
		consola.warn("Interrupted, stopping after the current step.")
		controller.abort()
	}
	process.once("SIGINT", onInterrupt)
	try {
		printOutcome(await command(session.value, controller.signal))
	} finally {
		process.removeListener("SIGINT", onInterrupt)
	}
}
