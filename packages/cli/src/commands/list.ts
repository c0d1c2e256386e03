import { resolve } from "node:path"
import { DEFAULT_OUTPUT_DIR, listRuns } from "@blueprint-forge/core"
import { Command } from "commander"
import { colorStatus } from "../utils/output"

const IDEA_PREVIEW = 60

function preview(idea: string): string {
	const line = idea.replace(/\s+/g, " ")
	return line.length > IDEA_PREVIEW ? `${line.slice(0, IDEA_PREVIEW)}...` : line
}

export const listCommand = new Command("list")
	.description("List saved blueprint runs, newest first")
	.option("-o, --output <dir>", "Output directory", DEFAULT_OUTPUT_DIR)
	.option("-n, --limit <count>", "Show at most this many runs", "20")
	.action(async (options: { output: string; limit: string }) => {
		const runs = await listRuns(resolve(options.output))

		if (runs.length === 0) {
			console.log("No runs found.")
			console.log('\nUse "blueprint-forge <idea>" to generate a blueprint.')
			return
		}

		const limit = Number.parseInt(options.limit, 10)
		const shown = Number.isNaN(limit) ? runs : runs.slice(0, limit)

		console.log("Runs:\n")
		for (const run of shown) {
			console.log(`${run.id} (${colorStatus(run.status)})`)
			console.log(`   Idea: ${preview(run.idea)}`)
			console.log(
				`   ${run.detailLevel} on ${run.platform}, ${run.provider}/${run.model}`,
			)
			console.log("")
		}

		if (shown.length < runs.length) {
			console.log(`${runs.length - shown.length} older run(s) not shown`)
		}
	})
