import type { ZodError } from "zod"
import type { AbsolutePath, ContentHash, Semver, SourceName } from "./branded"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: string
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: string
	  })

export type ParseError = BaseError & {
	type: "parse"
	source: string
	path?: string
}

export type IoError = BaseError & {
	type: "io"
	path: string
	operation: string
}

export type NetworkError = BaseError & {
	type: "network"
	source: string
	status?: number
}

export type SchemaEntity =
	| "config"
	| "artifactory"
	| "app"
	| "package"
	| "subscription"
	| "provider"
	| "record"

export type UnsupportedSchemaError = BaseError & {
	type: "unsupported_schema"
	entity: SchemaEntity
	version: number
	supported: readonly number[]
}

export type DuplicateNameError = BaseError & {
	type: "duplicate_name"
	target: string
	name: string
}

export type NotFoundError = BaseError & {
	type: "not_found"
	target: string
	path?: AbsolutePath
}

export interface AppCandidate {
	source: SourceName
	name: string
	version: Semver
}

export type AmbiguousAppError = BaseError & {
	type: "ambiguous_app"
	name: string
	candidates: AppCandidate[]
}

export type DependencyCycleError = BaseError & {
	type: "dependency_cycle"
	cycle: string[]
}

export type MissingDependencyError = BaseError & {
	type: "missing_dependency"
	name: string
	requiredBy: string
	range?: string
}

/** One `from -> dependency` edge in the dependency graph. */
export interface RequirementEdge {
	from: string
	dependency: string
	range: string
}

export type VersionConflictError = BaseError & {
	type: "version_conflict"
	name: string
	edges: [RequirementEdge, RequirementEdge]
}

export type IntegrityFailureError = BaseError & {
	type: "integrity_failure"
	name: string
	version: Semver
	expected: ContentHash
	actual: string
}

export type ExtractionFailureError = BaseError & {
	type: "extraction_failure"
	name: string
	path: string
}

export type PathTraversalError = BaseError & {
	type: "path_traversal"
	name: string
	entry: string
	root: string
}

export type CommandConflictError = BaseError & {
	type: "command_conflict"
	command: string
	owner: string
	path: string
}

export type FetchTimeoutError = BaseError & {
	type: "fetch_timeout"
	name: string
	source: string
	timeoutMs: number
}

export type EntryPointRemovalError = BaseError & {
	type: "entry_point_removal"
	name: string
	remaining: string[]
}

export type AbortedError = BaseError & {
	type: "aborted"
	stage: string
}

export type CoreError =
	| ValidationError
	| ParseError
	| UnsupportedSchemaError
	| NotFoundError

export type ResolveError =
	| NotFoundError
	| AmbiguousAppError
	| DependencyCycleError
	| MissingDependencyError
	| VersionConflictError

export type DepotError =
	| ValidationError
	| ParseError
	| IoError
	| NetworkError
	| UnsupportedSchemaError
	| DuplicateNameError
	| NotFoundError
	| AmbiguousAppError
	| DependencyCycleError
	| MissingDependencyError
	| VersionConflictError
	| IntegrityFailureError
	| ExtractionFailureError
	| PathTraversalError
	| CommandConflictError
	| FetchTimeoutError
	| EntryPointRemovalError
	| AbortedError

export type Result<T, E extends BaseError = CoreError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
