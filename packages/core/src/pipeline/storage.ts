import { mkdir, readFile, readdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { z } from "zod"
import {
	ApiDesignSchema,
	BlueprintSchema,
	DEPLOYMENT_PLATFORMS,
	DatabaseSchemaSchema,
	DeploymentPlanSchema,
	FrontendDesignSchema,
	RequirementsAnalysisSchema,
	STAGE_IDS,
} from "../blueprint/schema"
import type { Blueprint, StageId, StageOutputs } from "../blueprint/types"
import { DETAIL_LEVEL_IDS } from "../config/detail-levels"
import { PROVIDER_TYPES } from "../llm/providers"
import { blueprintToJson, blueprintToMarkdown, blueprintToYaml } from "../output/export"
import { STAGES, type BlueprintRun } from "./types"

export const DEFAULT_OUTPUT_DIR = "blueprints"

const StageRecordSchema = z.object({
	stage: z.enum(STAGE_IDS),
	name: z.string(),
	status: z.enum(["pending", "running", "completed", "failed"]),
	startedAt: z.string().optional(),
	completedAt: z.string().optional(),
	duration: z.number().optional(),
	outputFile: z.string().optional(),
	outputFiles: z.array(z.string()).optional(),
	error: z.string().optional(),
})

const BlueprintRunSchema: z.ZodType<BlueprintRun> = z.object({
	id: z.string(),
	idea: z.string(),
	detailLevel: z.enum(DETAIL_LEVEL_IDS),
	platform: z.enum(DEPLOYMENT_PLATFORMS),
	provider: z.enum(PROVIDER_TYPES),
	model: z.string(),
	startedAt: z.string(),
	completedAt: z.string().optional(),
	status: z.enum(["running", "completed", "failed", "cancelled"]),
	stages: z.array(StageRecordSchema),
	progress: z.number(),
	blueprintId: z.string().optional(),
	error: z.string().optional(),
})

const STAGE_SCHEMAS: {
	[S in StageId]: z.ZodType<StageOutputs[S], z.ZodTypeDef, unknown>
} = {
	requirements: RequirementsAnalysisSchema,
	database: DatabaseSchemaSchema,
	api: ApiDesignSchema,
	frontend: FrontendDesignSchema,
	deployment: DeploymentPlanSchema,
}

/**
 * Generate a run ID from current timestamp
 */
export function generateRunId(now = new Date()): string {
	const pad = (n: number) => n.toString().padStart(2, "0")

	return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}-${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
}

/**
 * Get runs directory under an output root
 */
export function getRunsDir(outputDir = DEFAULT_OUTPUT_DIR): string {
	return join(outputDir, "runs")
}

/**
 * Get a specific run directory
 */
export function getRunDir(outputDir: string, runId: string): string {
	return join(getRunsDir(outputDir), runId)
}

/**
 * Ensure run directory exists
 */
export async function ensureRunDir(
	outputDir: string,
	runId: string,
): Promise<string> {
	const runDir = getRunDir(outputDir, runId)
	await mkdir(runDir, { recursive: true })
	return runDir
}

async function readJson(filepath: string): Promise<unknown> {
	try {
		return JSON.parse(await readFile(filepath, "utf-8"))
	} catch {
		return null
	}
}

/**
 * Save run metadata
 */
export async function saveRunMeta(
	outputDir: string,
	run: BlueprintRun,
): Promise<void> {
	const runDir = await ensureRunDir(outputDir, run.id)
	await writeFile(join(runDir, "meta.json"), JSON.stringify(run, null, 2))
}

/**
 * Save run metadata, handing back the write error instead of throwing
 */
export async function trySaveRunMeta(
	outputDir: string,
	run: BlueprintRun,
): Promise<Error | undefined> {
	try {
		await saveRunMeta(outputDir, run)
		return undefined
	} catch (error) {
		return error instanceof Error ? error : new Error(String(error))
	}
}

/**
 * Load run metadata; null when missing or unreadable
 */
export async function loadRunMeta(
	outputDir: string,
	runId: string,
): Promise<BlueprintRun | null> {
	const raw = await readJson(join(getRunDir(outputDir, runId), "meta.json"))
	const parsed = BlueprintRunSchema.safeParse(raw)
	return parsed.success ? parsed.data : null
}

/**
 * File name prefix for a stage, e.g. 02-database
 */
export function stageFilePrefix(stage: StageId): string {
	const index = STAGES.findIndex((s) => s.id === stage)
	return `${(index + 1).toString().padStart(2, "0")}-${stage}`
}

/**
 * Save a stage result and its diagram; returns the file names written
 */
export async function saveStageResult(
	outputDir: string,
	runId: string,
	stage: StageId,
	result: StageOutputs[StageId],
	diagram?: string,
): Promise<string[]> {
	const runDir = await ensureRunDir(outputDir, runId)
	const prefix = stageFilePrefix(stage)
	const files = [`${prefix}.json`]
	await writeFile(join(runDir, `${prefix}.json`), JSON.stringify(result, null, 2))

	if (diagram) {
		files.push(`${prefix}.mermaid`)
		await writeFile(join(runDir, `${prefix}.mermaid`), diagram)
	}
	return files
}

/**
 * Load a stage result, checked against its schema
 */
export async function loadStageResult<S extends StageId>(
	outputDir: string,
	runId: string,
	stage: S,
): Promise<StageOutputs[S] | null> {
	const raw = await readJson(
		join(getRunDir(outputDir, runId), `${stageFilePrefix(stage)}.json`),
	)
	const parsed = STAGE_SCHEMAS[stage].safeParse(raw)
	return parsed.success ? parsed.data : null
}

/**
 * Write the blueprint in every export format
 */
export async function saveBlueprint(
	outputDir: string,
	runId: string,
	blueprint: Blueprint,
): Promise<string[]> {
	const runDir = await ensureRunDir(outputDir, runId)
	const outputs: Array<[string, string]> = [
		["blueprint.json", blueprintToJson(blueprint)],
		["blueprint.md", blueprintToMarkdown(blueprint)],
		["blueprint.yaml", blueprintToYaml(blueprint)],
		["architecture.mermaid", blueprint.architectureDiagram],
	]
	for (const [filename, content] of outputs) {
		await writeFile(join(runDir, filename), content)
	}
	return outputs.map(([filename]) => filename)
}

export async function loadBlueprint(
	outputDir: string,
	runId: string,
): Promise<Blueprint | null> {
	const raw = await readJson(join(getRunDir(outputDir, runId), "blueprint.json"))
	const parsed = BlueprintSchema.safeParse(raw)
	return parsed.success ? parsed.data : null
}

/**
 * List all runs, sorted by date descending
 */
export async function listRuns(
	outputDir = DEFAULT_OUTPUT_DIR,
): Promise<BlueprintRun[]> {
	let runIds: string[]
	try {
		const entries = await readdir(getRunsDir(outputDir), {
			withFileTypes: true,
		})
		runIds = entries
			.filter((e) => e.isDirectory())
			.map((e) => e.name)
			.sort()
			.reverse()
	} catch {
		return []
	}

	const runs: BlueprintRun[] = []
	for (const runId of runIds) {
		const run = await loadRunMeta(outputDir, runId)
		if (run) {
			runs.push(run)
		}
	}
	return runs
}

/**
 * Get the most recent run
 */
export async function getLatestRun(
	outputDir = DEFAULT_OUTPUT_DIR,
): Promise<BlueprintRun | null> {
	const runs = await listRuns(outputDir)
	return runs[0] ?? null
}
