import type { IoError, Result } from "@depot/core"

export type { IoError } from "@depot/core"

export type IoResult<T> = Result<T, IoError>

export function ioFailure(
	message: string,
	path: string,
	operation: string,
	rawError?: Error,
): IoResult<never> {
	return {
		error: {
			message,
			operation,
			path,
			rawError,
			type: "io",
		},
		ok: false,
	}
}
