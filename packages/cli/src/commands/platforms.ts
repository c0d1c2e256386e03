import { listPlatforms } from "@blueprint-forge/core"
import { Command } from "commander"

export const platformsCommand = new Command("platforms")
	.description("List deployment platforms and their recommended services")
	.action(() => {
		for (const { id, services } of listPlatforms()) {
			if (!services) {
				console.log(`${id}: any other target (use --custom-platform <name>)`)
				continue
			}
			const { recommended } = services
			console.log(`${id}: ${services.name}`)
			console.log(
				`   ${recommended.compute}, ${recommended.database}, ${recommended.storage}`,
			)
		}
	})
