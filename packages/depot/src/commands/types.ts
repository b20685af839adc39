import type { BaseError, DepotError } from "@depot/core"
import { consola } from "consola"
import type { ZodError } from "zod"

// CommandResult models user-facing flow outcomes; engine operations keep { ok, value } results.
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "unchanged"; reason: string }
	| { status: "cancelled" }
	| { status: "failed"; error: DepotError }

export const CommandResult = {
	cancelled: (): CommandResult<never> => ({ status: "cancelled" }),
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (error: DepotError): CommandResult<never> => ({ error, status: "failed" }),
	unchanged: (reason: string): CommandResult<never> => ({
		reason,
		status: "unchanged",
	}),
} as const

export function printOutcome(result: CommandResult<unknown>): void {
	switch (result.status) {
		case "completed":
			consola.success("Done.")
			break
		case "unchanged":
			consola.info(result.reason)
			break
		case "cancelled":
			consola.info("Canceled.")
			break
		case "failed":
			consola.error(formatErrorChain(result.error))
			printRawErrors(result.error)
			process.exitCode = 1
			break
	}
}

export function formatErrorChain(error: BaseError): string {
	return formatErrorChainLines(error, 0).join("\n")
}

function formatErrorChainLines(error: BaseError, indent: number): string[] {
	const prefix = " ".repeat(indent)
	const detailParts = buildDetailParts(error)
	const details = detailParts.length ? ` (${detailParts.join(", ")})` : ""
	const lines = [`${prefix}[${error.type}] ${error.message}${details}`]

	const zodError = "zodError" in error ? error.zodError : undefined
	if (isZodError(zodError)) {
		lines.push(`${prefix}  Zod issues:`)
		for (const issue of zodError.issues) {
			const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>"
			lines.push(`${prefix}  - ${pathLabel}: ${issue.message}`)
		}
	}

	if ("candidates" in error && Array.isArray(error.candidates)) {
		for (const candidate of error.candidates) {
			if (isCandidate(candidate)) {
				lines.push(`${prefix}  - ${candidate.source}/${candidate.name}@${candidate.version}`)
			}
		}
	}

	if (error.cause) {
		lines.push(`${prefix}Caused by:`)
		lines.push(...formatErrorChainLines(error.cause, indent + 2))
	}

	return lines
}

function isZodError(value: unknown): value is ZodError {
	return (
		typeof value === "object" &&
		value !== null &&
		"issues" in value &&
		Array.isArray(value.issues)
	)
}

function isCandidate(value: unknown): value is { source: string; name: string; version: string } {
	return (
		typeof value === "object" &&
		value !== null &&
		"source" in value &&
		"name" in value &&
		"version" in value
	)
}

function printRawErrors(error: BaseError): void {
	if (error.rawError) {
		console.error(error.rawError)
	}
	if (error.cause) {
		printRawErrors(error.cause)
	}
}

function buildDetailParts(error: BaseError): string[] {
	const details: string[] = []
	if ("field" in error && typeof error.field === "string") {
		details.push(`field=${error.field}`)
	}
	if ("path" in error && typeof error.path === "string") {
		details.push(`path=${error.path}`)
	}
	if ("source" in error && typeof error.source === "string") {
		details.push(`source=${error.source}`)
	}
	if ("operation" in error && typeof error.operation === "string") {
		details.push(`operation=${error.operation}`)
	}
	if ("stage" in error && typeof error.stage === "string") {
		details.push(`stage=${error.stage}`)
	}
	if ("target" in error && typeof error.target === "string") {
		details.push(`target=${error.target}`)
	}
	if ("status" in error && typeof error.status === "number") {
		details.push(`status=${error.status}`)
	}
	if ("command" in error && typeof error.command === "string") {
		details.push(`command=${error.command}`)
	}
	return details
}
