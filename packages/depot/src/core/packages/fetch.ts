/**
 * Fetcher & verifier
 *
 * Reads every planned archive, hashes it and compares the digest with the
 * declared sha256 before anything is handed to the installer. Verified bytes
 * are cached by hash for the life of the process.
 */

import {
	type AbortedError,
	type ContentHash,
	type FetchTimeoutError,
	formatLocator,
	type IntegrityFailureError,
	type NetworkError,
	type PlannedPackage,
	type Result,
} from "@depot/core"
import { consola } from "consola"
import type { IoError } from "@/src/core/io/types"
import type { HashFunction } from "@/src/core/packages/hash"
import { readLocator, type Transport } from "@/src/core/packages/transport"
import { mapPool } from "@/src/utils/pool"

const log = consola.withTag("fetch")

export type FetchError =
	| IoError
	| NetworkError
	| IntegrityFailureError
	| FetchTimeoutError
	| AbortedError

export interface VerifiedPackage {
	planned: PlannedPackage
	bytes: Uint8Array
}

export interface FetchFailure {
	planned: PlannedPackage
	error: FetchError
}

export interface FetchReport {
	verified: VerifiedPackage[]
	failures: FetchFailure[]
}

/** Verified archive bytes keyed by content hash. */
export type PackageCache = Map<ContentHash, Uint8Array>

export interface FetchContext {
	transport: Transport
	hash: HashFunction
	cache: PackageCache
}

export interface FetchOptions {
	concurrency: number
	timeoutMs: number
	/** Stop starting new fetches after the first failure. */
	allOrNothing?: boolean
	signal?: AbortSignal
}

/**
 * Fetch and verify `planned` with bounded concurrency. Verified packages keep
 * plan order.
 */
export async function fetchPackages(
	planned: readonly PlannedPackage[],
	context: FetchContext,
	options: FetchOptions,
): Promise<FetchReport> {
	const failures: FetchFailure[] = []
	const stop = () =>
		Boolean(options.signal?.aborted) || (Boolean(options.allOrNothing) && failures.length > 0)

	const results = await mapPool(
		planned,
		options.concurrency,
		async (item) => {
			const result = await fetchPackage(item, context, options)
			if (!result.ok) {
				failures.push({ error: result.error, planned: item })
			}
			return result
		},
		stop,
	)

	const verified: VerifiedPackage[] = []
	for (const result of results) {
		if (result?.ok) {
			verified.push(result.value)
		}
	}

	return { failures, verified }
}

export async function fetchPackage(
	planned: PlannedPackage,
	context: FetchContext,
	options: Pick<FetchOptions, "timeoutMs" | "signal">,
): Promise<Result<VerifiedPackage, FetchError>> {
	const { package: pkg } = planned
	const cached = context.cache.get(pkg.sha256)
	if (cached) {
		log.debug(`Using cached ${pkg.name}@${pkg.version}.`)
		return { ok: true, value: { bytes: cached, planned } }
	}

	if (options.signal?.aborted) {
		return {
			error: { message: "Fetch aborted.", stage: "fetch", type: "aborted" },
			ok: false,
		}
	}

	const bytes = await readWithTimeout(planned, context, options)
	if (!bytes.ok) {
		return bytes
	}

	const actual = context.hash(bytes.value).toLowerCase()
	if (actual !== pkg.sha256) {
		return {
			error: {
				actual,
				expected: pkg.sha256,
				message: `Integrity check failed for ${pkg.name}@${pkg.version}: expected sha256 ${pkg.sha256}, got ${actual}.`,
				name: pkg.name,
				type: "integrity_failure",
				version: pkg.version,
			},
			ok: false,
		}
	}

	context.cache.set(pkg.sha256, bytes.value)
	log.debug(`Verified ${pkg.name}@${pkg.version} (${bytes.value.byteLength} bytes).`)
	return { ok: true, value: { bytes: bytes.value, planned } }
}

async function readWithTimeout(
	planned: PlannedPackage,
	context: FetchContext,
	options: Pick<FetchOptions, "timeoutMs" | "signal">,
): Promise<Result<Uint8Array, FetchError>> {
	const controller = new AbortController()
	const onAbort = () => controller.abort()
	options.signal?.addEventListener("abort", onAbort, { once: true })

	let timer: NodeJS.Timeout | undefined
	const timeout = new Promise<Result<never, FetchTimeoutError>>((resolve) => {
		timer = setTimeout(() => {
			resolve({
				error: {
					message: `Fetching ${planned.package.name}@${planned.package.version} timed out after ${options.timeoutMs}ms.`,
					name: planned.package.name,
					source: formatLocator(planned.locator),
					timeoutMs: options.timeoutMs,
					type: "fetch_timeout",
				},
				ok: false,
			})
			controller.abort()
		}, options.timeoutMs)
	})

	try {
		return await Promise.race([
			readLocator(planned.locator, context.transport, controller.signal),
			timeout,
		])
	} finally {
		clearTimeout(timer)
		options.signal?.removeEventListener("abort", onAbort)
	}
}
