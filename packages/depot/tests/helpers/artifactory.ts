/**
 * Artifactory fixtures
 *
 * Builds real gzip tarballs with `tar` and writes a manifest describing them,
 * so tests exercise the same parse, fetch and extract path as the CLI.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"
import {
	type AbsolutePath,
	type App,
	type Artifactory,
	coerceContentHash,
	type Package,
	serializeArtifactory,
} from "@depot/core"
import { abs, command, dependency, hash, nes, semver } from "@depot/core/testing"
import { c } from "tar"
import { sha256 } from "@/src/core/packages/hash"

export interface FixturePackage {
	name: string
	version: string
	/** Archive members by relative path. */
	files?: Record<string, string>
	dependencies?: string[]
	/** Declare a sha256 that does not match the archive. */
	corrupt?: boolean
}

export interface FixtureApp {
	name: string
	version: string
	description?: string
	commands?: Record<string, string>
	packages: FixturePackage[]
}

/**
 * Pack `files` into a gzip tarball at `archivePath` and return its bytes.
 */
export async function buildArchive(
	archivePath: string,
	files: Record<string, string>,
): Promise<Uint8Array> {
	const staging = `${archivePath}.staging`
	for (const [relative, contents] of Object.entries(files)) {
		const target = join(staging, relative)
		await mkdir(dirname(target), { recursive: true })
		await writeFile(target, contents)
	}
	await mkdir(dirname(archivePath), { recursive: true })
	await c({ cwd: staging, file: archivePath, gzip: true }, Object.keys(files))
	return new Uint8Array(await readFile(archivePath))
}

/**
 * Write archives for every package and an `artifactory.toml` in `dir`.
 * Returns the manifest path.
 */
export async function publishArtifactory(
	dir: string,
	name: string,
	apps: FixtureApp[],
): Promise<AbsolutePath> {
	const built: App[] = []
	for (const fixture of apps) {
		const packages: Package[] = []
		for (const pkg of fixture.packages) {
			packages.push(await publishPackage(dir, pkg))
		}
		built.push({
			commands: Object.entries(fixture.commands ?? {}).map(([commandName, target]) =>
				command(commandName, target),
			),
			description: fixture.description ?? `${fixture.name} app`,
			handlerVersion: 1,
			license: "MIT",
			name: nes(fixture.name),
			packages,
			version: semver(fixture.version),
		})
	}

	const artifactory: Artifactory = {
		apps: built,
		description: `${name} test artifactory`,
		handlerVersion: 1,
		maintainer: "tests",
		name: nes(name),
		public: true,
	}

	const manifestPath = join(dir, "artifactory.toml")
	await mkdir(dir, { recursive: true })
	await writeFile(manifestPath, serializeArtifactory(artifactory))
	return abs(manifestPath)
}

async function publishPackage(dir: string, fixture: FixturePackage): Promise<Package> {
	const source = `packages/${fixture.name}-${fixture.version}.tar.gz`
	const files = fixture.files ?? { [`bin/${fixture.name}`]: `#!/bin/sh\necho ${fixture.name}\n` }
	const bytes = await buildArchive(join(dir, source), files)
	const digest = fixture.corrupt ? hash("0") : coerceContentHash(sha256(bytes))
	if (!digest) {
		throw new Error(`Could not hash ${source}`)
	}

	return {
		dependencies: (fixture.dependencies ?? []).map(dependency),
		handlerVersion: 1,
		license: "MIT",
		name: nes(fixture.name),
		sha256: digest,
		source: nes(source),
		version: semver(fixture.version),
	}
}
