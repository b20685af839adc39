import type { NetworkError, ResolvedLocator, Result } from "@depot/core"
import { readBytes } from "@/src/core/io/fs"
import type { IoError } from "@/src/core/io/types"
import { formatError, toRawError } from "@/src/utils/errors"
import { fetchWithRetry, type RetryOptions } from "@/src/utils/fetch"

/** Moves bytes from a URL. */
export interface Transport {
	get(url: string, signal?: AbortSignal): Promise<Result<Uint8Array, NetworkError>>
}

export function createHttpTransport(options: RetryOptions = {}): Transport {
	return {
		async get(url, signal) {
			let response: Response
			try {
				response = await fetchWithRetry(url, { signal }, options)
			} catch (error) {
				return {
					error: {
						message: `Request to ${url} failed: ${formatError(error)}`,
						rawError: toRawError(error),
						source: url,
						type: "network",
					},
					ok: false,
				}
			}

			if (!response.ok) {
				return {
					error: {
						message: `Request to ${url} failed with status ${response.status}.`,
						source: url,
						status: response.status,
						type: "network",
					},
					ok: false,
				}
			}

			try {
				return { ok: true, value: new Uint8Array(await response.arrayBuffer()) }
			} catch (error) {
				return {
					error: {
						message: `Reading ${url} failed: ${formatError(error)}`,
						rawError: toRawError(error),
						source: url,
						type: "network",
					},
					ok: false,
				}
			}
		},
	}
}

/**
 * Read the bytes behind a resolved locator: local paths from disk, URLs
 * through the transport.
 */
export async function readLocator(
	locator: ResolvedLocator,
	transport: Transport,
	signal?: AbortSignal,
): Promise<Result<Uint8Array, IoError | NetworkError>> {
	if (locator.type === "local") {
		return readBytes(locator.path)
	}
	return transport.get(locator.url, signal)
}
