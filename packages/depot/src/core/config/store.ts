/**
 * Config store
 *
 * The config is loaded once and every later change goes through `update`,
 * which runs mutations one at a time and persists each result atomically
 * before the next one starts. The in-memory copy only moves forward once the
 * file has been written.
 */

import {
	type AbsolutePath,
	type Config,
	type ConfigDefaults,
	type DepotError,
	emptyConfig,
	parseConfig,
	type Result,
	serializeConfig,
} from "@depot/core"
import { consola } from "consola"
import { readFileUtf8, safeStat, writeFileAtomic } from "@/src/core/io/fs"
import type { IoError } from "@/src/core/io/types"
import { SerialQueue } from "@/src/utils/pool"

const log = consola.withTag("config")

export interface ConfigStore {
	readonly path: AbsolutePath
	current(): Config
	/**
	 * Apply `mutate` to the latest config and persist the result. Returning the
	 * same object skips the write.
	 */
	update(mutate: (config: Config) => Config): Promise<Result<Config, IoError>>
	/** Number of writes performed by this store. */
	revision(): number
}

export async function loadConfig(
	configPath: AbsolutePath,
	defaults: ConfigDefaults,
): Promise<Result<Config, DepotError>> {
	const stats = await safeStat(configPath)
	if (!stats.ok) {
		return stats
	}

	if (!stats.value) {
		log.debug(`No config at ${configPath}, starting empty.`)
		return { ok: true, value: emptyConfig(defaults) }
	}

	const contents = await readFileUtf8(configPath)
	if (!contents.ok) {
		return contents
	}

	return parseConfig(contents.value, configPath, defaults)
}

export async function openConfigStore(
	configPath: AbsolutePath,
	defaults: ConfigDefaults,
): Promise<Result<ConfigStore, DepotError>> {
	const loaded = await loadConfig(configPath, defaults)
	if (!loaded.ok) {
		return loaded
	}
	return { ok: true, value: createConfigStore(configPath, loaded.value) }
}

export function createConfigStore(configPath: AbsolutePath, initial: Config): ConfigStore {
	const queue = new SerialQueue()
	let config = initial
	let writes = 0

	return {
		current: () => config,
		path: configPath,
		revision: () => writes,
		update: (mutate) =>
			queue.run(async (): Promise<Result<Config, IoError>> => {
				const next = mutate(config)
				if (next === config) {
					return { ok: true, value: config }
				}

				const written = await writeFileAtomic(configPath, serializeConfig(next))
				if (!written.ok) {
					return written
				}

				config = next
				writes += 1
				log.debug(`Saved ${configPath} (revision ${writes}).`)
				return { ok: true, value: config }
			}),
	}
}
