/**
 * Main generate command - runs the five stages and saves the blueprint
 */

import { readFile } from "node:fs/promises"
import { resolve } from "node:path"
import {
	type AppSettings,
	type Blueprint,
	BlueprintPipeline,
	type BlueprintRun,
	DEFAULT_OUTPUT_DIR,
	type DetailLevel,
	type ProgressEvent,
	ProgressTracker,
	type UserInput,
	applyEvent,
	createRun,
	errorMessage,
	generateRunId,
	getRunDir,
	isBlueprintError,
	loadConfig,
	recordStageFiles,
	resolveConfiguration,
	resolveSettings,
	saveBlueprint,
	saveRunMeta,
	saveStageResult,
	trySaveRunMeta,
	validateInput,
} from "@blueprint-forge/core"
import { FAIL, OK, WARN, formatDuration, formatEvent } from "./utils/output"

export interface GenerateOptions {
	file?: string
	detail?: string
	platform?: string
	customPlatform?: string
	provider?: string
	model?: string
	output?: string
	json?: boolean
	verbose?: boolean
}

async function readIdea(
	idea: string | undefined,
	file: string | undefined,
): Promise<string> {
	if (file) {
		return (await readFile(resolve(file), "utf-8")).trim()
	}
	return idea?.trim() ?? ""
}

function exitWith(error: unknown): never {
	if (isBlueprintError(error)) {
		switch (error.kind) {
			case "configuration":
				console.error(`${FAIL} Configuration error: ${error.message}`)
				break
			case "validation":
				console.error(`${FAIL} ${error.message}`)
				break
			case "stage":
				console.error(`${FAIL} Generation failed: ${error.message}`)
				break
			case "cancelled":
				console.error(`${WARN} ${error.message}`)
				process.exit(130)
		}
	} else {
		console.error(`${FAIL} ${errorMessage(error)}`)
	}
	process.exit(1)
}

function mirrorEvent(timeline: ProgressTracker, event: ProgressEvent): void {
	if (!event.stage) return
	if (event.status === "in_progress") {
		timeline.startStage(event.phaseIndex)
	} else if (event.status === "completed") {
		timeline.completeStage(event.phaseIndex)
	}
}

/**
 * Main generate function
 */
export async function generate(
	idea: string | undefined,
	options: GenerateOptions = {},
): Promise<void> {
	const outputDir = resolve(options.output ?? DEFAULT_OUTPUT_DIR)
	const verbose = options.verbose ?? false

	let input: UserInput
	let detailLevel: DetailLevel
	let settings: AppSettings
	try {
		input = validateInput({
			businessIdea: await readIdea(idea, options.file),
			detailLevel: options.detail,
			deploymentPlatform: options.platform,
			customPlatform: options.customPlatform,
		})
		detailLevel = resolveConfiguration(input.detailLevel).level
		settings = resolveSettings({
			provider: options.provider,
			model: options.model,
			config: loadConfig(),
			env: process.env,
		})
	} catch (error) {
		exitWith(error)
	}

	const pipeline = BlueprintPipeline.fromSettings(settings)
	const startedAt = new Date()
	let run: BlueprintRun = createRun({
		id: generateRunId(startedAt),
		idea: input.businessIdea,
		detailLevel,
		platform: input.deploymentPlatform,
		provider: settings.provider,
		model: settings.model,
		startedAt: startedAt.toISOString(),
	})
	await saveRunMeta(outputDir, run)

	const controller = new AbortController()
	const onSigint = () => {
		console.log(`\n${WARN} Cancelling after the current stage...`)
		controller.abort()
	}
	process.once("SIGINT", onSigint)

	if (!options.json) {
		console.log(`Generating blueprint with ${pipeline.provider}/${pipeline.model}`)
		console.log(`Run: ${run.id}\n`)
	}

	const timeline = new ProgressTracker()
	let blueprint: Blueprint
	try {
		const events = pipeline.stream(input, { signal: controller.signal })
		let step = await events.next()
		while (!step.done) {
			const event = step.value
			run = applyEvent(run, event)
			if (event.stage && event.status === "completed" && event.result) {
				const files = await saveStageResult(
					outputDir,
					run.id,
					event.stage,
					event.result,
					event.diagram,
				)
				run = recordStageFiles(run, event.stage, files)
			}
			await saveRunMeta(outputDir, run)
			if (options.json) {
				console.log(JSON.stringify(event))
			} else if (event.phase !== "Complete") {
				console.log(formatEvent(event))
			}
			if (verbose && !options.json) {
				mirrorEvent(timeline, event)
				console.log(timeline.renderTimeline())
			}
			step = await events.next()
		}
		blueprint = step.value
	} catch (error) {
		const saveError = await trySaveRunMeta(outputDir, run)
		if (saveError) {
			console.error(`${WARN} Could not save run metadata: ${saveError.message}`)
		}
		exitWith(error)
	} finally {
		process.off("SIGINT", onSigint)
	}

	const files = await saveBlueprint(outputDir, run.id, blueprint)
	if (options.json) return

	const runDir = getRunDir(outputDir, run.id)
	const elapsed = Date.now() - startedAt.getTime()
	console.log(`\n${OK} Blueprint ${blueprint.id} ready in ${formatDuration(elapsed)}`)
	for (const file of files) {
		console.log(`  ${OK} Saved: ${resolve(runDir, file)}`)
	}
	console.log(`\nEstimated timeline: ${blueprint.estimatedTimeline}`)
}
