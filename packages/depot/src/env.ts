import { homedir } from "node:os"
import path from "node:path"
import {
	type AbsolutePath,
	CONFIG_DIR,
	CONFIG_FILENAME,
	coerceAbsolutePath,
	DEFAULT_BIN_DIR,
	DEFAULT_CATALOG_TTL_MS,
	DEFAULT_FETCH_CONCURRENCY,
	DEFAULT_FETCH_TIMEOUT_MS,
	DEFAULT_INSTALL_DIR,
	type Result,
	type ValidationError,
} from "@depot/core"
import { z } from "zod"

const optionalPath = z
	.string()
	.transform((value) => value.trim())
	.optional()

const envSchema = z.object({
	DEPOT_BIN_DIR: optionalPath,
	DEPOT_CATALOG_TTL_MS: z.coerce.number().int().nonnegative().default(DEFAULT_CATALOG_TTL_MS),
	DEPOT_CONFIG: optionalPath,
	DEPOT_FETCH_CONCURRENCY: z.coerce
		.number()
		.int()
		.positive()
		.default(DEFAULT_FETCH_CONCURRENCY),
	DEPOT_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
	DEPOT_HOME: optionalPath,
})

export interface DepotEnv {
	configPath: AbsolutePath
	installDir: AbsolutePath
	binDir: AbsolutePath
	fetchConcurrency: number
	fetchTimeoutMs: number
	catalogTtlMs: number
}

/**
 * Read depot settings from the environment. Paths may start with `~`;
 * relative paths resolve against `cwd`.
 */
export function loadEnv(
	env: NodeJS.ProcessEnv = process.env,
	home: string = homedir(),
	cwd: string = process.cwd(),
): Result<DepotEnv, ValidationError> {
	const parsed = envSchema.safeParse(env)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		return {
			error: {
				field: issue ? issue.path.join(".") : "env",
				message: `Invalid environment: ${parsed.error.issues
					.map((entry) => `${entry.path.join(".")}: ${entry.message}`)
					.join("; ")}`,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const values = parsed.data
	const resolve = (value: string | undefined, fallback: string): AbsolutePath | null =>
		coerceAbsolutePath(expandHome(value || fallback, home), cwd)

	const configPath = resolve(values.DEPOT_CONFIG, path.join(home, CONFIG_DIR, CONFIG_FILENAME))
	const installDir = resolve(values.DEPOT_HOME, path.join(home, DEFAULT_INSTALL_DIR))
	const binDir = resolve(values.DEPOT_BIN_DIR, path.join(home, DEFAULT_BIN_DIR))
	if (!configPath || !installDir || !binDir) {
		return {
			error: {
				field: "env",
				message: "Could not resolve depot directories.",
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: {
			binDir,
			catalogTtlMs: values.DEPOT_CATALOG_TTL_MS,
			configPath,
			fetchConcurrency: values.DEPOT_FETCH_CONCURRENCY,
			fetchTimeoutMs: values.DEPOT_FETCH_TIMEOUT_MS,
			installDir,
		},
	}
}

export function expandHome(value: string, home: string): string {
	if (value === "~") return home
	if (value.startsWith("~/")) return path.join(home, value.slice(2))
	return value
}
