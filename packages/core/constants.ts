/**
 * Shared constants for depot.
 */

/** Config file name inside the config directory */
export const CONFIG_FILENAME = "config.toml"

/** Config directory (relative to home) */
export const CONFIG_DIR = ".config/depot"

/** Default install root (relative to home) */
export const DEFAULT_INSTALL_DIR = ".local/share/depot/packages"

/** Default entry-point directory (relative to home) */
export const DEFAULT_BIN_DIR = ".local/bin"

/** Manifests are TOML documents */
export const MANIFEST_EXTENSION = ".toml"

export const DEFAULT_FETCH_CONCURRENCY = 4
export const DEFAULT_FETCH_TIMEOUT_MS = 60_000
export const DEFAULT_CATALOG_TTL_MS = 300_000
