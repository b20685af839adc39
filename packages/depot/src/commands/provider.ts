import { formatProviderSpec, type Provider } from "@depot/core"
import { consola } from "consola"
import { CommandResult } from "@/src/commands/types"
import type { DepotContext } from "@/src/core/context"
import { addProvider, listProviders, removeProvider } from "@/src/core/subscriptions/manager"

export async function providerAdd(
	context: DepotContext,
	name: string,
	spec: string,
): Promise<CommandResult<Provider>> {
	const result = await addProvider(context, name, spec)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}
	consola.success(`Added provider ${name} (${formatProviderSpec(result.value.github)}).`)
	return CommandResult.completed(result.value)
}

export async function providerRemove(
	context: DepotContext,
	name: string,
): Promise<CommandResult<Provider>> {
	const result = await removeProvider(context, name)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}
	consola.success(`Removed provider ${name}.`)
	return CommandResult.completed(result.value)
}

export async function providerList(
	context: DepotContext,
): Promise<CommandResult<readonly Provider[]>> {
	const providers = listProviders(context)
	if (providers.length === 0) {
		return CommandResult.unchanged("No providers.")
	}
	for (const provider of providers) {
		consola.log(`${provider.name}  ${formatProviderSpec(provider.github)}`)
	}
	return CommandResult.completed(providers)
}
