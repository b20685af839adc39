import type { NonEmptyString, Semver, SourceName } from "./branded"
import {
	coerceNonEmpty,
	coerceSemver,
	coerceSourceName,
} from "./coerce"

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function isNonEmpty(value: string): value is NonEmptyString {
	return coerceNonEmpty(value) !== null
}

export function isSourceName(value: string): value is SourceName {
	return coerceSourceName(value) !== null
}

export function isSemver(value: string): value is Semver {
	return coerceSemver(value) === value
}
