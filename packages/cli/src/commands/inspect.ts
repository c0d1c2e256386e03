import { resolve } from "node:path"
import {
	DEFAULT_OUTPUT_DIR,
	STAGE_IDS,
	type StageId,
	getLatestRun,
	getRunDir,
	loadBlueprint,
	loadRunMeta,
	loadStageResult,
} from "@blueprint-forge/core"
import { Command } from "commander"
import { FAIL, formatRunSummary } from "../utils/output"

function isStageId(value: string): value is StageId {
	return STAGE_IDS.some((id) => id === value)
}

export const inspectCommand = new Command("inspect")
	.description("Inspect a blueprint run")
	.argument("[run]", "Run ID (defaults to latest)")
	.option("-o, --output <dir>", "Output directory", DEFAULT_OUTPUT_DIR)
	.option("-s, --stage <stage>", `Show one stage result (${STAGE_IDS.join(", ")})`)
	.option("--json", "Output raw JSON")
	.action(
		async (
			runArg: string | undefined,
			options: { output: string; stage?: string; json?: boolean },
		) => {
			const outputDir = resolve(options.output)
			const run = runArg
				? await loadRunMeta(outputDir, runArg)
				: await getLatestRun(outputDir)

			if (!run) {
				console.error(
					`${FAIL} ${runArg ? `Run not found: ${runArg}` : "No runs found"}`,
				)
				process.exit(1)
			}

			if (options.stage) {
				if (!isStageId(options.stage)) {
					console.error(
						`${FAIL} Unknown stage: ${options.stage}. Must be one of ${STAGE_IDS.join(", ")}`,
					)
					process.exit(1)
				}
				const result = await loadStageResult(outputDir, run.id, options.stage)
				if (!result) {
					console.error(`${FAIL} Stage "${options.stage}" has no saved result in this run`)
					process.exit(1)
				}
				console.log(JSON.stringify(result, null, 2))
				return
			}

			if (options.json) {
				console.log(JSON.stringify(run, null, 2))
				return
			}

			console.log(formatRunSummary(run))
			if (run.error) {
				console.log(`\nError: ${run.error}`)
			}
			console.log(`\nRun directory: ${getRunDir(outputDir, run.id)}`)

			const blueprint = await loadBlueprint(outputDir, run.id)
			if (blueprint) {
				console.log("\n--- Technology Stack ---\n")
				for (const [layer, choice] of Object.entries(blueprint.technologyStackSummary)) {
					console.log(`  ${layer}: ${choice}`)
				}
				console.log(`\nEstimated timeline: ${blueprint.estimatedTimeline}`)
			}
		},
	)
