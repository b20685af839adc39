import type {
	AbsolutePath,
	ContentHash,
	NonEmptyString,
	RelativePath,
	Semver,
	SourceName,
} from "../types/branded"

/**
 * A dependency reference as written in a manifest: `name` or `name@range`.
 * `raw` is written back untouched.
 */
export interface DependencyRef {
	readonly raw: string
	readonly name: NonEmptyString
	/** Semver range; absent means any version, highest preferred. */
	readonly range?: string
}

export interface Command {
	readonly command: NonEmptyString
	readonly path: RelativePath
}

export interface Package {
	readonly name: NonEmptyString
	readonly version: Semver
	readonly sha256: ContentHash
	readonly license: string
	readonly source: NonEmptyString
	readonly dependencies: readonly DependencyRef[]
	readonly handlerVersion: number
}

export interface App {
	readonly name: NonEmptyString
	readonly version: Semver
	readonly license: string
	readonly description: string
	readonly handlerVersion: number
	readonly commands: readonly Command[]
	readonly packages: readonly Package[]
}

export interface Artifactory {
	readonly name: NonEmptyString
	readonly description: string
	readonly public: boolean
	readonly maintainer: string
	readonly handlerVersion: number
	readonly apps: readonly App[]
}

/** Where a manifest lives: a local file or a remote URL. */
export type ManifestSource =
	| { readonly type: "local"; readonly path: AbsolutePath }
	| { readonly type: "remote"; readonly url: string }

export interface Subscription {
	readonly name: SourceName
	readonly source: ManifestSource
	readonly autoUpdate: boolean
	readonly handlerVersion: number
}

export interface GithubLocation {
	readonly owner: NonEmptyString
	readonly repo: NonEmptyString
	readonly ref: NonEmptyString
	readonly path: RelativePath
}

export interface Provider {
	readonly name: SourceName
	readonly github: GithubLocation
	readonly handlerVersion: number
}

/** An app that pulled a package into the install tree. */
export interface AppRef {
	readonly source: SourceName
	readonly name: NonEmptyString
}

export interface PackageIdentity {
	readonly name: NonEmptyString
	readonly version: Semver
	readonly sha256: ContentHash
}

export interface InstalledCommand {
	/** The app that declared the command. */
	readonly app: AppRef
	readonly command: NonEmptyString
	readonly path: RelativePath
	readonly entryPoint: AbsolutePath
}

export interface InstalledRecord {
	readonly package: PackageIdentity
	readonly installPath: AbsolutePath
	readonly commands: readonly InstalledCommand[]
	readonly installedAt: string
	readonly apps: readonly AppRef[]
	readonly orphaned: boolean
	readonly handlerVersion: number
}

export interface Config {
	readonly packages: readonly InstalledRecord[]
	readonly providers: readonly Provider[]
	readonly installDir: AbsolutePath
	readonly sgoinfreDir?: AbsolutePath
	readonly goinfreDir?: AbsolutePath
	readonly binDir: AbsolutePath
	readonly subscriptions: readonly Subscription[]
	readonly handlerVersion: number
}
