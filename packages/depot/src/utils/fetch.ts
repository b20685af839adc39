import { sleep } from "@/src/utils/sleep"

export interface RetryOptions {
	retries?: number
	/** Delay before attempt N + 1 is `backoffMs * N`. */
	backoffMs?: number
	fetchImpl?: typeof fetch
}

export async function fetchWithRetry(
	url: string,
	init?: RequestInit,
	options: RetryOptions = {},
): Promise<Response> {
	const { backoffMs = 1000, fetchImpl = fetch, retries = 3 } = options
	let lastError: unknown = null
	for (let attempt = 0; attempt < retries; attempt += 1) {
		try {
			return await fetchImpl(url, init)
		} catch (error) {
			lastError = error
			if (init?.signal?.aborted) {
				break
			}
			if (attempt < retries - 1) {
				await sleep(backoffMs * (attempt + 1))
			}
		}
	}
	throw lastError instanceof Error ? lastError : new Error("Request failed")
}
