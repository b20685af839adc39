import { validRange } from "semver"
import { coerceNonEmpty } from "../types/coerce"
import type { Result, ValidationError } from "../types/error"
import type { DependencyRef } from "./types"

const DEPENDENCY_PATTERN = /^([^@\s]+)(?:@(.+))?$/

/**
 * Parse a dependency reference: `name` or `name@<semver range>`.
 */
export function parseDependencyRef(
	raw: string,
	field: string,
): Result<DependencyRef, ValidationError> {
	const trimmed = raw.trim()
	const match = DEPENDENCY_PATTERN.exec(trimmed)
	const name = match?.[1] ? coerceNonEmpty(match[1]) : null
	if (!match || !name) {
		return invalid(field, `Invalid dependency "${raw}": expected name or name@range.`)
	}

	const range = match[2]?.trim()
	if (range === undefined) {
		return { ok: true, value: { name, raw: trimmed } }
	}

	if (!range || validRange(range) === null) {
		return invalid(field, `Invalid version range in dependency "${raw}".`)
	}

	return {
		ok: true,
		value: { name, range, raw: trimmed },
	}
}

export function formatRequirement(name: string, range: string | undefined): string {
	return range ? `${name}@${range}` : name
}

function invalid(field: string, message: string): Result<never, ValidationError> {
	return {
		error: { field, message, source: "manual", type: "validation" },
		ok: false,
	}
}
