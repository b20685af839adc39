/**
 * Handler versions
 *
 * Every persisted entity carries an integer handler version. This module is the
 * only place that knows which versions exist and how an older shape becomes the
 * current one. Upgrades are pure functions over the raw (snake_case) record and
 * run before validation, so nothing downstream ever sees an old shape.
 */

import type {
	Result,
	SchemaEntity,
	UnsupportedSchemaError,
	ValidationError,
} from "../types/error"

export type RawRecord = Record<string, unknown>

/** Upgrades a record from version N to N + 1. */
type Upgrade = (raw: RawRecord) => RawRecord

interface EntityVersioning {
	field: string
	current: number
	/** Keyed by the version the upgrade starts from. */
	upgrades: Readonly<Record<number, Upgrade>>
}

export const HANDLER_VERSIONS: Readonly<Record<SchemaEntity, EntityVersioning>> = {
	app: {
		current: 1,
		field: "app_handler_version",
		upgrades: {
			0: (raw) => ({
				...raw,
				commands: raw.commands ?? [],
				description: raw.description ?? "",
			}),
		},
	},
	artifactory: {
		current: 1,
		field: "artifactory_handler_version",
		upgrades: {
			0: (raw) => ({
				...raw,
				description: raw.description ?? "",
				maintainer: raw.maintainer ?? "",
				public: raw.public ?? false,
			}),
		},
	},
	config: {
		current: 1,
		field: "config_handler_version",
		upgrades: {
			0: (raw) => ({
				...raw,
				packages: raw.packages ?? [],
				providers: raw.providers ?? [],
				subscribed_artifactories: raw.subscribed_artifactories ?? [],
			}),
		},
	},
	package: {
		current: 1,
		field: "package_handler_version",
		upgrades: {
			0: (raw) => ({
				...raw,
				dependencies: raw.dependencies ?? [],
				sha256: typeof raw.sha256 === "string" ? raw.sha256.toLowerCase() : raw.sha256,
			}),
		},
	},
	provider: {
		current: 1,
		field: "provider_handler_version",
		upgrades: {},
	},
	record: {
		current: 1,
		field: "record_handler_version",
		upgrades: {},
	},
	subscription: {
		current: 1,
		field: "subscription_handler_version",
		upgrades: {},
	},
}

export function currentVersion(entity: SchemaEntity): number {
	return HANDLER_VERSIONS[entity].current
}

/**
 * Versions this build can read: every version with an upgrade chain reaching
 * the current one, plus the current one.
 */
export function supportedVersions(entity: SchemaEntity): number[] {
	const { current, upgrades } = HANDLER_VERSIONS[entity]
	const supported = [current]
	for (let version = current - 1; version >= 0; version -= 1) {
		if (!upgrades[version]) break
		supported.unshift(version)
	}
	return supported
}

/**
 * Check a record's handler version and bring it to the current shape.
 *
 * @param at - location of the record inside its document, for messages
 */
export function upgradeEntity(
	entity: SchemaEntity,
	raw: RawRecord,
	at: string,
): Result<RawRecord, UnsupportedSchemaError | ValidationError> {
	const { current, field, upgrades } = HANDLER_VERSIONS[entity]
	const declared = raw[field]

	if (declared === undefined) {
		return {
			error: {
				field: `${at}.${field}`,
				message: `${at}: missing ${field}.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	if (typeof declared !== "number" || !Number.isInteger(declared) || declared < 0) {
		return {
			error: {
				field: `${at}.${field}`,
				message: `${at}: ${field} must be a non-negative integer.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const supported = supportedVersions(entity)
	if (!supported.includes(declared)) {
		return { ok: false, ...unsupported(entity, declared, supported, at) }
	}

	let upgraded: RawRecord = raw
	for (let version = declared; version < current; version += 1) {
		const step = upgrades[version]
		if (!step) {
			return { ok: false, ...unsupported(entity, declared, supported, at) }
		}
		upgraded = step(upgraded)
	}

	return { ok: true, value: { ...upgraded, [field]: current } }
}

function unsupported(
	entity: SchemaEntity,
	version: number,
	supported: number[],
	at: string,
): { error: UnsupportedSchemaError } {
	return {
		error: {
			entity,
			message: `${at}: unsupported ${entity} handler version ${version} (supported: ${supported.join(", ")}).`,
			supported,
			type: "unsupported_schema",
			version,
		},
	}
}
