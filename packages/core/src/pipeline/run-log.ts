import type { DeploymentPlatform } from "../blueprint/types"
import type { DetailLevel } from "../config/detail-levels"
import type { ProviderType } from "../llm/providers"
import {
	type BlueprintRun,
	type ProgressEvent,
	STAGES,
	type StageRecord,
} from "./types"

export interface NewRun {
	id: string
	idea: string
	detailLevel: DetailLevel
	platform: DeploymentPlatform
	provider: ProviderType
	model: string
	startedAt: string
}

export function createRun(fields: NewRun): BlueprintRun {
	return {
		...fields,
		status: "running",
		progress: 0,
		stages: STAGES.map((stage) => ({
			stage: stage.id,
			name: stage.name,
			status: "pending",
		})),
	}
}

function elapsed(from: string | undefined, to: string): number | undefined {
	if (!from) return undefined
	return Date.parse(to) - Date.parse(from)
}

function applyToStage(record: StageRecord, event: ProgressEvent): StageRecord {
	switch (event.status) {
		case "in_progress":
			return { ...record, status: "running", startedAt: event.timestamp }
		case "completed":
			return {
				...record,
				status: "completed",
				completedAt: event.timestamp,
				duration: elapsed(record.startedAt, event.timestamp),
			}
		case "error":
			return {
				...record,
				status: "failed",
				completedAt: event.timestamp,
				duration: elapsed(record.startedAt, event.timestamp),
				error: event.reasoning,
			}
		case "cancelled":
			return record.status === "running" ? { ...record, status: "pending" } : record
	}
}

/**
 * Fold one progress event into a run record
 */
export function applyEvent(run: BlueprintRun, event: ProgressEvent): BlueprintRun {
	const stages = event.stage
		? run.stages.map((record) =>
				record.stage === event.stage ? applyToStage(record, event) : record,
			)
		: run.stages

	const next: BlueprintRun = { ...run, stages, progress: event.progress }

	if (event.status === "error") {
		return {
			...next,
			status: "failed",
			completedAt: event.timestamp,
			error: event.reasoning,
		}
	}
	if (event.status === "cancelled") {
		return { ...next, status: "cancelled", completedAt: event.timestamp }
	}
	if (event.blueprint) {
		return {
			...next,
			status: "completed",
			completedAt: event.timestamp,
			blueprintId: event.blueprint.id,
		}
	}
	return next
}

/**
 * Attach the files a stage wrote to its record
 */
export function recordStageFiles(
	run: BlueprintRun,
	stage: StageRecord["stage"],
	files: string[],
): BlueprintRun {
	return {
		...run,
		stages: run.stages.map((record) =>
			record.stage === stage
				? { ...record, outputFile: files[0], outputFiles: files }
				: record,
		),
	}
}
