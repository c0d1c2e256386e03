import {
	PROVIDER_TYPES,
	type ProviderType,
	getConfigPath,
	getProvider,
	isProviderType,
	listProviders,
	loadConfig,
	maskApiKey,
	saveConfig,
} from "@blueprint-forge/core"
import { Command } from "commander"
import { FAIL } from "../utils/output"

function requireProvider(value: string): ProviderType {
	const provider = value.trim().toLowerCase()
	if (!isProviderType(provider)) {
		console.error(
			`${FAIL} Unknown provider: ${value}. Must be one of ${PROVIDER_TYPES.join(", ")}`,
		)
		process.exit(1)
	}
	return provider
}

export const configCommand = new Command("config").description(
	"Manage blueprint-forge configuration",
)

configCommand
	.command("set-key <provider> <key>")
	.description("Store an API key for a provider")
	.action((providerName: string, key: string) => {
		const provider = requireProvider(providerName)
		const config = loadConfig()
		config.apiKeys = { ...config.apiKeys, [provider]: key }
		saveConfig(config)
		console.log(`${getProvider(provider).displayName} API key saved to ${getConfigPath()}`)
	})

configCommand
	.command("set-provider <provider>")
	.description("Set the default provider")
	.action((providerName: string) => {
		const provider = requireProvider(providerName)
		const config = loadConfig()
		config.defaultProvider = provider
		saveConfig(config)
		console.log(`Default provider set to ${provider}`)
	})

configCommand
	.command("set-model <provider> <model>")
	.description("Set the model used for a provider")
	.action((providerName: string, model: string) => {
		const provider = requireProvider(providerName)
		const info = getProvider(provider)
		if (!info.allowsCustomModels && !info.models.some((m) => m.id === model)) {
			console.error(
				`${FAIL} Unknown model ${model} for ${info.displayName}. Must be one of ${info.models.map((m) => m.id).join(", ")}`,
			)
			process.exit(1)
		}
		const config = loadConfig()
		config.models = { ...config.models, [provider]: model }
		saveConfig(config)
		console.log(`${info.displayName} model set to ${model}`)
	})

configCommand
	.command("show")
	.description("Show current configuration")
	.action(() => {
		const configPath = getConfigPath()
		const config = loadConfig()

		console.log(`Config file: ${configPath}\n`)
		console.log(
			`Default provider: ${config.defaultProvider ?? process.env.DEFAULT_PROVIDER ?? "openai"}`,
		)

		for (const info of listProviders()) {
			const stored = config.apiKeys?.[info.type]
			const envKey = process.env[info.apiKeyEnv]
			const key = stored
				? `${maskApiKey(stored)} (config)`
				: envKey
					? `${maskApiKey(envKey)} (env)`
					: "not set"
			const model =
				config.models?.[info.type] ?? process.env[info.modelEnv] ?? info.defaultModel
			console.log(`${info.displayName}: key ${key}, model ${model}`)
		}

		if (config.maxTokens !== undefined) {
			console.log(`\nMax tokens: ${config.maxTokens}`)
		}
		if (config.temperature !== undefined) {
			console.log(`Temperature: ${config.temperature}`)
		}
	})

configCommand
	.command("clear [provider]")
	.description("Clear stored API keys (all, or one provider)")
	.action((providerName: string | undefined) => {
		const config = loadConfig()

		if (!providerName) {
			delete config.apiKeys
			saveConfig(config)
			console.log("All API keys cleared")
			return
		}

		const provider = requireProvider(providerName)
		const apiKeys = { ...config.apiKeys }
		delete apiKeys[provider]
		config.apiKeys = apiKeys
		saveConfig(config)
		console.log(`${getProvider(provider).displayName} API key cleared`)

		const envName = getProvider(provider).apiKeyEnv
		if (process.env[envName]) {
			console.log(`\nNote: ${envName} environment variable is still set`)
		}
	})

configCommand
	.command("path")
	.description("Show the config file path")
	.action(() => {
		console.log(getConfigPath())
	})
