import { DEFAULT_OUTPUT_DIR } from "@blueprint-forge/core"
import { Command } from "commander"
import { configCommand } from "./commands/config"
import { inspectCommand } from "./commands/inspect"
import { listCommand } from "./commands/list"
import { platformsCommand } from "./commands/platforms"
import { providersCommand } from "./commands/providers"
import { tiersCommand } from "./commands/tiers"
import { type GenerateOptions, generate } from "./generate"

const program = new Command()
	.name("blueprint-forge")
	.description(
		"Turn a SaaS idea into a technical blueprint: requirements, database, API, frontend and deployment",
	)
	.version("0.1.0")
	.argument("[idea]", "Business idea to plan (or use --file)")
	.option("-f, --file <path>", "Read the business idea from a file")
	.option(
		"-d, --detail <level>",
		"Detail level: high_level, detailed, production_ready",
		"detailed",
	)
	.option("-p, --platform <platform>", "Deployment platform (see: platforms)", "aws")
	.option("--custom-platform <name>", "Target name when --platform is other")
	.option("--provider <provider>", "Model provider (see: providers)")
	.option("-m, --model <model>", "Model id for the provider")
	.option("-o, --output <dir>", "Output directory", DEFAULT_OUTPUT_DIR)
	.option("--json", "Print progress events as NDJSON")
	.option("-v, --verbose", "Print the stage timeline after every event")
	.action(async (idea: string | undefined, options: GenerateOptions) => {
		if (!idea && !options.file) {
			program.help()
		}
		await generate(idea, options)
	})

program.addCommand(configCommand)
program.addCommand(listCommand)
program.addCommand(inspectCommand)
program.addCommand(tiersCommand)
program.addCommand(platformsCommand)
program.addCommand(providersCommand)

await program.parseAsync()
