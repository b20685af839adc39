import { formatManifestSource, type Subscription } from "@depot/core"
import { consola } from "consola"
import { CommandResult } from "@/src/commands/types"
import type { DepotContext } from "@/src/core/context"
import {
	listSubscriptions,
	subscribe,
	unsubscribe,
} from "@/src/core/subscriptions/manager"

export async function artifactorySubscribe(
	context: DepotContext,
	name: string,
	source: string,
): Promise<CommandResult<Subscription>> {
	consola.start(`Subscribing to ${source}...`)
	const result = await subscribe(context, name, source)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}
	consola.success(`Subscribed to ${name} (${formatManifestSource(result.value.source)}).`)
	return CommandResult.completed(result.value)
}

export async function artifactoryUnsubscribe(
	context: DepotContext,
	name: string,
): Promise<CommandResult<Subscription>> {
	const result = await unsubscribe(context, name)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}
	consola.success(`Unsubscribed from ${name}. Installed apps stay until the next sync.`)
	return CommandResult.completed(result.value)
}

export async function artifactoryList(
	context: DepotContext,
): Promise<CommandResult<readonly Subscription[]>> {
	const subscriptions = listSubscriptions(context)
	if (subscriptions.length === 0) {
		return CommandResult.unchanged("No subscriptions.")
	}
	for (const subscription of subscriptions) {
		consola.log(`${subscription.name}  ${formatManifestSource(subscription.source)}`)
	}
	return CommandResult.completed(subscriptions)
}
