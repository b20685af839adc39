import { join } from "node:path"
import { describe, expect, it } from "vitest"
import type { DepotContext } from "@/src/core/context"
import { installApp } from "@/src/core/install/app"
import { subscribe } from "@/src/core/subscriptions/manager"
import { runSync } from "@/src/core/sync/sync"
import {
	createTestContext,
	exists,
	type FixtureApp,
	linkTarget,
	publishArtifactory,
	withTempDir,
} from "@/tests/helpers"

function hello(version: string, dependencies: string[] = []): FixtureApp {
	return {
		commands: { hello: "bin/hello" },
		name: "hello",
		packages: [
			{ dependencies, name: "hello", version },
			{ name: "lib", version: "1.0.0" },
		],
		version,
	}
}

async function installed(dir: string, apps: FixtureApp[]): Promise<DepotContext> {
	const context = createTestContext(dir)
	await subscribe(context, "main", await publishArtifactory(join(dir, "repo"), "main", apps))
	const result = await installApp(context, "hello")
	if (!result.ok) {
		throw new Error(result.error.message)
	}
	return context
}

function versions(context: DepotContext): string[] {
	return context.config
		.current()
		.packages.map((record) => `${record.package.name}@${record.package.version}`)
}

describe("runSync", () => {
	it("writes nothing when the catalog has not changed", async () => {
		await withTempDir(async (dir) => {
			const context = await installed(dir, [hello("1.0.0", ["lib"])])
			const revision = context.config.revision()

			const first = await runSync(context, { dryRun: false })
			const second = await runSync(context, { dryRun: false })

			expect(context.config.revision()).toBe(revision)
			for (const summary of [first, second]) {
				expect(summary.failures).toEqual([])
				expect(summary.apps.flatMap((outcome) => outcome.actions.map((action) => action.type))).toEqual([
					"keep",
					"keep",
				])
			}
		})
	})

	it("upgrades install-then-retire and releases dependencies no longer needed", async () => {
		await withTempDir(async (dir) => {
			const context = await installed(dir, [hello("1.0.0", ["lib"])])
			await publishArtifactory(join(dir, "repo"), "main", [hello("1.1.0")])

			const summary = await runSync(context, { dryRun: false })

			expect(summary.failures).toEqual([])
			expect(summary.upgraded).toBe(1)
			expect(summary.detached).toBe(1)
			expect(versions(context)).toEqual(["hello@1.1.0"])
			expect(await linkTarget(join(dir, "bin", "hello"))).toBe(
				join(dir, "install", "hello-1.1.0", "bin", "hello"),
			)
			expect(await exists(join(dir, "install", "hello-1.0.0"))).toBe(false)
			expect(await exists(join(dir, "install", "lib-1.0.0"))).toBe(false)

			const revision = context.config.revision()
			await runSync(context, { dryRun: false })
			expect(context.config.revision()).toBe(revision)
		})
	})

	it("only plans in dry-run mode", async () => {
		await withTempDir(async (dir) => {
			const context = await installed(dir, [hello("1.0.0")])
			await publishArtifactory(join(dir, "repo"), "main", [hello("1.1.0")])
			const revision = context.config.revision()

			const summary = await runSync(context, { dryRun: true })

			expect(summary.dryRun).toBe(true)
			expect(summary.upgraded).toBe(1)
			expect(summary.apps[0]?.actions.map((action) => action.type)).toEqual(["upgrade"])
			expect(context.config.revision()).toBe(revision)
			expect(versions(context)).toEqual(["hello@1.0.0"])
		})
	})

	it("flags apps that no longer resolve as orphaned and keeps their files", async () => {
		await withTempDir(async (dir) => {
			const context = await installed(dir, [hello("1.0.0")])
			await publishArtifactory(join(dir, "repo"), "main", [
				{ name: "other", packages: [{ name: "other", version: "1.0.0" }], version: "1.0.0" },
			])

			const summary = await runSync(context, { dryRun: false })

			expect(summary.orphaned.map((app) => `${app.source}/${app.name}`)).toEqual(["main/hello"])
			expect(summary.failures.map((failure) => [failure.stage, failure.error.type])).toEqual([
				["resolve", "not_found"],
			])
			expect(context.config.current().packages.map((record) => record.orphaned)).toEqual([true])
			expect(await exists(join(dir, "install", "hello-1.0.0", "bin", "hello"))).toBe(true)

			const revision = context.config.revision()
			await runSync(context, { dryRun: false })
			expect(context.config.revision()).toBe(revision)
		})
	})

	it("clears the orphaned flag once the app resolves again", async () => {
		await withTempDir(async (dir) => {
			const context = await installed(dir, [hello("1.0.0")])
			await publishArtifactory(join(dir, "repo"), "main", [])
			await runSync(context, { dryRun: false })
			await publishArtifactory(join(dir, "repo"), "main", [hello("1.0.0")])

			const summary = await runSync(context, { dryRun: false })

			expect(summary.failures).toEqual([])
			expect(summary.apps[0]?.actions.map((action) => action.type)).toEqual(["attach"])
			expect(context.config.current().packages.map((record) => record.orphaned)).toEqual([false])
		})
	})

	it("keeps the previous installation when an upgrade fails partway", async () => {
		await withTempDir(async (dir) => {
			const context = createTestContext(dir)
			const tool = (version: string, lib: string): FixtureApp => ({
				commands: { tool: "bin/tool" },
				name: "tool",
				packages: [
					{ dependencies: [`lib@^${lib}`], name: "tool", version },
					{ name: "lib", version: lib },
				],
				version,
			})
			await subscribe(
				context,
				"main",
				await publishArtifactory(join(dir, "repo"), "main", [tool("1.0.0", "1.0.0")]),
			)
			await installApp(context, "tool")
			const broken = tool("2.0.0", "2.0.0")
			await publishArtifactory(join(dir, "repo"), "main", [
				{
					...broken,
					packages: broken.packages.map((entry) =>
						entry.name === "tool" ? { ...entry, files: { "README.md": "no binary" } } : entry,
					),
				},
			])

			const summary = await runSync(context, { dryRun: false })

			expect(summary.failures.map((failure) => [failure.stage, failure.error.type])).toEqual([
				["install", "not_found"],
			])
			expect(versions(context)).toEqual(["lib@1.0.0", "tool@1.0.0"])
			expect(await exists(join(dir, "install", "lib-1.0.0"))).toBe(true)
			expect(await exists(join(dir, "install", "lib-2.0.0"))).toBe(false)
			expect(await exists(join(dir, "install", "tool-2.0.0"))).toBe(false)
			expect(await linkTarget(join(dir, "bin", "tool"))).toBe(
				join(dir, "install", "tool-1.0.0", "bin", "tool"),
			)
		})
	})

	it("continues with other apps after one fails", async () => {
		await withTempDir(async (dir) => {
			const context = createTestContext(dir)
			const apps: FixtureApp[] = [
				hello("1.0.0"),
				{ name: "tool", packages: [{ name: "tool", version: "1.0.0" }], version: "1.0.0" },
			]
			await subscribe(context, "main", await publishArtifactory(join(dir, "repo"), "main", apps))
			await installApp(context, "hello")
			await installApp(context, "tool")
			await publishArtifactory(join(dir, "repo"), "main", [
				{ ...hello("1.1.0"), packages: [{ corrupt: true, name: "hello", version: "1.1.0" }] },
				{ name: "tool", packages: [{ name: "tool", version: "2.0.0" }], version: "2.0.0" },
			])

			const summary = await runSync(context, { dryRun: false })

			expect(summary.failures.map((failure) => [failure.app.name, failure.stage, failure.error.type])).toEqual([
				["hello", "fetch", "integrity_failure"],
			])
			expect(versions(context)).toEqual(["hello@1.0.0", "tool@2.0.0"])
		})
	})
})
