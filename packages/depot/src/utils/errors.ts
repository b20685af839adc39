export function formatError(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}
	if (typeof error === "string") {
		return error
	}
	return "Unknown error."
}

export function toRawError(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined
}

export function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		const code = error.code
		return typeof code === "string" ? code : undefined
	}
	return undefined
}
