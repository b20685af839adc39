import { stringify } from "smol-toml"
import { withTrailingNewline } from "../manifest/write"
import type { Config, InstalledRecord, Provider, Subscription } from "../schema/types"
import { currentVersion } from "../schema/versions"
import { formatManifestSource } from "./parse"

/**
 * Serialize a Config to TOML, stamping current handler versions.
 */
export function serializeConfig(config: Config): string {
	const output: Record<string, unknown> = {
		bin_dir: config.binDir,
		config_handler_version: currentVersion("config"),
		install_dir: config.installDir,
	}

	if (config.sgoinfreDir) {
		output.sgoinfre_dir = config.sgoinfreDir
	}

	if (config.goinfreDir) {
		output.goinfre_dir = config.goinfreDir
	}

	output.subscribed_artifactories = config.subscriptions.map(serializeSubscription)
	output.providers = config.providers.map(serializeProvider)
	output.packages = config.packages.map(serializeRecord)

	return withTrailingNewline(stringify(output))
}

function serializeSubscription(subscription: Subscription): Record<string, unknown> {
	return {
		auto_update: subscription.autoUpdate,
		name: subscription.name,
		source: formatManifestSource(subscription.source),
		subscription_handler_version: currentVersion("subscription"),
	}
}

function serializeProvider(provider: Provider): Record<string, unknown> {
	return {
		name: provider.name,
		owner: provider.github.owner,
		path: provider.github.path,
		provider_handler_version: currentVersion("provider"),
		ref: provider.github.ref,
		repo: provider.github.repo,
	}
}

function serializeRecord(record: InstalledRecord): Record<string, unknown> {
	return {
		apps: record.apps.map((app) => ({ name: app.name, source: app.source })),
		commands: record.commands.map((command) => ({
			app_name: command.app.name,
			app_source: command.app.source,
			command: command.command,
			entry_point: command.entryPoint,
			path: command.path,
		})),
		install_path: record.installPath,
		installed_at: record.installedAt,
		name: record.package.name,
		orphaned: record.orphaned,
		record_handler_version: currentVersion("record"),
		sha256: record.package.sha256,
		version: record.package.version,
	}
}
