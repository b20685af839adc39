#!/usr/bin/env tsx

import { Command } from "commander"
import { consola } from "consola"
import { artifactoryList, artifactorySubscribe, artifactoryUnsubscribe } from "@/src/commands/artifactory"
import { configSetTier, configShow } from "@/src/commands/config"
import { installCommand } from "@/src/commands/install"
import { installedCommand } from "@/src/commands/installed"
import { providerAdd, providerList, providerRemove } from "@/src/commands/provider"
import { removeCommand } from "@/src/commands/remove"
import { listCommand, searchCommand } from "@/src/commands/search"
import { runCommand } from "@/src/commands/session"
import { syncCommand } from "@/src/commands/sync"
import { tiersSync } from "@/src/commands/tiers"

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("depot")
		.description("Install apps from decentralized artifactories")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("install")
		.aliases(["i", "add"])
		.description("Install an app and its dependencies")
		.argument("<app>", "App as name, source/name or name@version")
		.option("--all-or-nothing", "Stop fetching after the first failure")
		.option("--non-interactive", "Run without prompts")
		.action(async (app: string, options: { allOrNothing?: boolean; nonInteractive?: boolean }) => {
			await runCommand("depot install", (context, signal) =>
				installCommand(context, app, {
					allOrNothing: Boolean(options.allOrNothing),
					nonInteractive: Boolean(options.nonInteractive),
					signal,
				}),
			)
		})

	program
		.command("remove")
		.alias("rm")
		.description("Remove an installed app")
		.argument("<app>", "App as name or source/name")
		.option("--non-interactive", "Run without prompts")
		.action(async (app: string, options: { nonInteractive?: boolean }) => {
			await runCommand("depot remove", (context) =>
				removeCommand(context, app, { nonInteractive: Boolean(options.nonInteractive) }),
			)
		})

	program
		.command("sync")
		.aliases(["update", "up"])
		.description("Bring installed apps up to date with their artifactories")
		.option("--dry-run", "Plan changes without modifying files")
		.option("--all-or-nothing", "Stop fetching an app after its first failure")
		.action(async (options: { dryRun?: boolean; allOrNothing?: boolean }) => {
			await runCommand("depot sync", (context, signal) =>
				syncCommand(context, {
					allOrNothing: Boolean(options.allOrNothing),
					dryRun: Boolean(options.dryRun),
					signal,
				}),
			)
		})

	program
		.command("search")
		.description("Search apps by name or description")
		.argument("<query>", "Text to look for")
		.action(async (query: string) => {
			await runCommand("depot search", (context) => searchCommand(context, query))
		})

	program
		.command("list")
		.description("List every app of every subscribed artifactory")
		.action(async () => {
			await runCommand("depot list", listCommand)
		})

	program
		.command("installed")
		.description("List installed packages")
		.action(async () => {
			await runCommand("depot installed", installedCommand)
		})

	const artifactory = program.command("artifactory").description("Manage subscriptions")

	artifactory
		.command("subscribe")
		.description("Subscribe to an artifactory")
		.argument("<name>", "Local name for the artifactory")
		.argument("<source>", "Path to a .toml manifest or an http(s) URL")
		.action(async (name: string, source: string) => {
			await runCommand("depot artifactory subscribe", (context) =>
				artifactorySubscribe(context, name, source),
			)
		})

	artifactory
		.command("unsubscribe")
		.description("Drop a subscription")
		.argument("<name>", "Subscription name")
		.action(async (name: string) => {
			await runCommand("depot artifactory unsubscribe", (context) =>
				artifactoryUnsubscribe(context, name),
			)
		})

	artifactory
		.command("list")
		.description("List subscriptions")
		.action(async () => {
			await runCommand("depot artifactory list", artifactoryList)
		})

	const provider = program.command("provider").description("Manage GitHub providers")

	provider
		.command("add")
		.description("Add a provider")
		.argument("<name>", "Local name for the provider")
		.argument("<spec>", "github:owner/repo@ref:path/to/artifactory.toml")
		.action(async (name: string, spec: string) => {
			await runCommand("depot provider add", (context) => providerAdd(context, name, spec))
		})

	provider
		.command("remove")
		.description("Remove a provider")
		.argument("<name>", "Provider name")
		.action(async (name: string) => {
			await runCommand("depot provider remove", (context) => providerRemove(context, name))
		})

	provider
		.command("list")
		.description("List providers")
		.action(async () => {
			await runCommand("depot provider list", providerList)
		})

	const config = program.command("config").description("Show or change settings")

	config
		.command("show")
		.description("Print the current settings")
		.action(async () => {
			await runCommand("depot config show", configShow)
		})

	config
		.command("set-sgoinfre")
		.description("Set the persistent scratch directory")
		.argument("<path>", "Directory")
		.action(async (dir: string) => {
			await runCommand("depot config set-sgoinfre", (context) =>
				configSetTier(context, "sgoinfre", dir),
			)
		})

	config
		.command("set-goinfre")
		.description("Set the fast local scratch directory")
		.argument("<path>", "Directory")
		.action(async (dir: string) => {
			await runCommand("depot config set-goinfre", (context) =>
				configSetTier(context, "goinfre", dir),
			)
		})

	program
		.command("tiers")
		.description("Manage scratch tiers")
		.command("sync")
		.description("Copy sgoinfre entries missing from goinfre")
		.action(async () => {
			await runCommand("depot tiers sync", tiersSync)
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
