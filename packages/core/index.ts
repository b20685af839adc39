/**
 * @depot/core
 *
 * Schema, codecs and resolution for depot. Nothing here touches the filesystem
 * or the network.
 */

export {
	type ConfigDefaults,
	emptyConfig,
	formatManifestSource,
	parseConfig,
	parseManifestSource,
} from "./config/parse"
export { formatProviderSpec, parseProviderSpec, providerManifestUrl } from "./config/provider"
export { serializeConfig } from "./config/write"
export {
	CONFIG_DIR,
	CONFIG_FILENAME,
	DEFAULT_BIN_DIR,
	DEFAULT_CATALOG_TTL_MS,
	DEFAULT_FETCH_CONCURRENCY,
	DEFAULT_FETCH_TIMEOUT_MS,
	DEFAULT_INSTALL_DIR,
	MANIFEST_EXTENSION,
} from "./constants"
export { parseArtifactory, parseToml } from "./manifest/parse"
export { serializeArtifactory } from "./manifest/write"
export {
	type AppRequest,
	buildPackageIndex,
	type CatalogEntry,
	comparePreference,
	formatAppRequest,
	formatCandidate,
	identityKey,
	type IndexedPackage,
	type LookupOutcome,
	lookupApp,
	type PackageIndex,
	parseAppRequest,
	type SearchGroup,
	searchCatalog,
	toCandidate,
} from "./resolve/catalog"
export { formatLocator, type ResolvedLocator, resolveLocator } from "./resolve/locator"
export { type PlannedPackage, type ResolutionPlan, resolveApp } from "./resolve/resolver"
export { formatRequirement, parseDependencyRef } from "./schema/dependency"
export type {
	App,
	AppRef,
	Artifactory,
	Command,
	Config,
	DependencyRef,
	GithubLocation,
	InstalledCommand,
	InstalledRecord,
	ManifestSource,
	Package,
	PackageIdentity,
	Provider,
	Subscription,
} from "./schema/types"
export {
	currentVersion,
	HANDLER_VERSIONS,
	supportedVersions,
	upgradeEntity,
} from "./schema/versions"
export type {
	AbsolutePath,
	ContentHash,
	NonEmptyString,
	RelativePath,
	Semver,
	SourceName,
} from "./types/branded"
export {
	coerceAbsolutePath,
	coerceAbsolutePathDirect,
	coerceContentHash,
	coerceNonEmpty,
	coerceSemver,
	coerceSourceName,
	isValidRange,
	isWithinRoot,
	joinAbsolute,
	normalizeRelativePath,
	relativePathErrorMessage,
} from "./types/coerce"
export type {
	AbortedError,
	AmbiguousAppError,
	AppCandidate,
	BaseError,
	CommandConflictError,
	CoreError,
	DependencyCycleError,
	DepotError,
	DuplicateNameError,
	EntryPointRemovalError,
	ExtractionFailureError,
	FetchTimeoutError,
	IntegrityFailureError,
	IoError,
	MissingDependencyError,
	NetworkError,
	NotFoundError,
	ParseError,
	PathTraversalError,
	RequirementEdge,
	ResolveError,
	Result,
	SchemaEntity,
	UnsupportedSchemaError,
	ValidationError,
	VersionConflictError,
} from "./types/error"
export { isNonEmpty, isRecord, isSemver, isSourceName } from "./types/guards"
