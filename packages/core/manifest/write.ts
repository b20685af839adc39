import { stringify } from "smol-toml"
import type { App, Artifactory, Package } from "../schema/types"
import { currentVersion } from "../schema/versions"

/**
 * Serialize an Artifactory to TOML, stamping current handler versions.
 */
export function serializeArtifactory(artifactory: Artifactory): string {
	const output: Record<string, unknown> = {
		artifactory_handler_version: currentVersion("artifactory"),
		description: artifactory.description,
		maintainer: artifactory.maintainer,
		name: artifactory.name,
		public: artifactory.public,
	}

	if (artifactory.apps.length > 0) {
		output.apps = artifactory.apps.map(serializeApp)
	}

	return withTrailingNewline(stringify(output))
}

function serializeApp(app: App): Record<string, unknown> {
	return {
		app_handler_version: currentVersion("app"),
		commands: app.commands.map((command) => ({
			command: command.command,
			path: command.path,
		})),
		description: app.description,
		license: app.license,
		name: app.name,
		packages: app.packages.map(serializePackage),
		version: app.version,
	}
}

function serializePackage(pkg: Package): Record<string, unknown> {
	return {
		dependencies: pkg.dependencies.map((dependency) => dependency.raw),
		license: pkg.license,
		name: pkg.name,
		package_handler_version: currentVersion("package"),
		sha256: pkg.sha256,
		source: pkg.source,
		version: pkg.version,
	}
}

export function withTrailingNewline(toml: string): string {
	return toml.endsWith("\n") ? toml : `${toml}\n`
}
