/**
 * zod schemas for the current (post-upgrade) raw shapes of every document.
 * Field names follow the on-disk snake_case keys. Empty arrays may be left
 * out, since TOML writers drop empty arrays of tables.
 */

import { z } from "zod"

const trimmedString = (label: string) =>
	z
		.string()
		.transform((value) => value.trim())
		.refine((value) => value.length > 0, {
			message: `${label} must not be empty.`,
		})

const handlerVersion = z.number().int().nonnegative()

export const rawCommandSchema = z
	.object({
		command: trimmedString("command"),
		path: trimmedString("path"),
	})
	.strict()

export const rawPackageSchema = z
	.object({
		dependencies: z.array(trimmedString("dependency")).default([]),
		license: z.string(),
		name: trimmedString("name"),
		package_handler_version: handlerVersion,
		sha256: trimmedString("sha256"),
		source: trimmedString("source"),
		version: trimmedString("version"),
	})
	.strict()

export const rawAppSchema = z
	.object({
		app_handler_version: handlerVersion,
		commands: z.array(rawCommandSchema).default([]),
		description: z.string(),
		license: z.string(),
		name: trimmedString("name"),
		packages: z.array(rawPackageSchema).min(1, "an app needs at least one package"),
		version: trimmedString("version"),
	})
	.strict()

export const rawArtifactorySchema = z
	.object({
		apps: z.array(rawAppSchema).default([]),
		artifactory_handler_version: handlerVersion,
		description: z.string(),
		maintainer: z.string(),
		name: trimmedString("name"),
		public: z.boolean(),
	})
	.strict()

export type RawCommand = z.infer<typeof rawCommandSchema>
export type RawPackage = z.infer<typeof rawPackageSchema>
export type RawApp = z.infer<typeof rawAppSchema>
export type RawArtifactory = z.infer<typeof rawArtifactorySchema>

export const rawSubscriptionSchema = z
	.object({
		auto_update: z.boolean().default(false),
		name: trimmedString("name"),
		source: trimmedString("source"),
		subscription_handler_version: handlerVersion,
	})
	.strict()

export const rawProviderSchema = z
	.object({
		name: trimmedString("name"),
		owner: trimmedString("owner"),
		path: trimmedString("path"),
		provider_handler_version: handlerVersion,
		ref: trimmedString("ref"),
		repo: trimmedString("repo"),
	})
	.strict()

export const rawInstalledRecordSchema = z
	.object({
		apps: z
			.array(
				z
					.object({
						name: trimmedString("name"),
						source: trimmedString("source"),
					})
					.strict(),
			)
			.default([]),
		commands: z
			.array(
				z
					.object({
						app_name: trimmedString("app_name"),
						app_source: trimmedString("app_source"),
						command: trimmedString("command"),
						entry_point: trimmedString("entry_point"),
						path: trimmedString("path"),
					})
					.strict(),
			)
			.default([]),
		install_path: trimmedString("install_path"),
		installed_at: trimmedString("installed_at"),
		name: trimmedString("name"),
		orphaned: z.boolean().default(false),
		record_handler_version: handlerVersion,
		sha256: trimmedString("sha256"),
		version: trimmedString("version"),
	})
	.strict()

export const rawConfigSchema = z
	.object({
		bin_dir: trimmedString("bin_dir").optional(),
		config_handler_version: handlerVersion,
		goinfre_dir: trimmedString("goinfre_dir").optional(),
		install_dir: trimmedString("install_dir").optional(),
		packages: z.array(rawInstalledRecordSchema).default([]),
		providers: z.array(rawProviderSchema).default([]),
		sgoinfre_dir: trimmedString("sgoinfre_dir").optional(),
		subscribed_artifactories: z.array(rawSubscriptionSchema).default([]),
	})
	.strict()

export type RawSubscription = z.infer<typeof rawSubscriptionSchema>
export type RawProvider = z.infer<typeof rawProviderSchema>
export type RawInstalledRecord = z.infer<typeof rawInstalledRecordSchema>
export type RawConfig = z.infer<typeof rawConfigSchema>

export function formatZodError(error: z.ZodError, label: string): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join(".") : label
		return `${path}: ${issue.message}`
	})
	return `Invalid ${label}: ${issues.join("; ")}`
}
