import { listDetailLevels } from "@blueprint-forge/core"
import { Command } from "commander"
import { formatDetailLevel } from "../utils/output"

export const tiersCommand = new Command("tiers")
	.description("List detail levels and their per-stage limits")
	.action(() => {
		console.log(listDetailLevels().map(formatDetailLevel).join("\n\n"))
	})
