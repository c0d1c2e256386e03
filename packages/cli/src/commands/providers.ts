import { getApiKey, listProviders, loadConfig } from "@blueprint-forge/core"
import { Command } from "commander"
import { formatProvider } from "../utils/output"

export const providersCommand = new Command("providers")
	.description("List model providers, their models and prices")
	.action(() => {
		const config = loadConfig()
		const blocks = listProviders().map((info) =>
			formatProvider(info, getApiKey(info.type, config, process.env) !== undefined),
		)
		console.log(blocks.join("\n\n"))
	})
