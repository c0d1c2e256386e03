import type {
	Blueprint,
	DeploymentPlatform,
	StageId,
	StageResult,
} from "../blueprint/types"
import type { DetailLevel } from "../config/detail-levels"
import type { ProviderType } from "../llm/providers"

export interface StageDefinition {
	id: StageId
	name: string
}

/**
 * Pipeline stages in execution order
 */
export const STAGES: readonly StageDefinition[] = Object.freeze([
	{ id: "requirements", name: "Requirements Analysis" },
	{ id: "database", name: "Database Schema" },
	{ id: "api", name: "API Design" },
	{ id: "frontend", name: "Frontend Architecture" },
	{ id: "deployment", name: "Deployment Plan" },
] as const)

export const STAGE_COUNT = STAGES.length

export type EventStatus = "in_progress" | "completed" | "error" | "cancelled"

export type TerminalPhase = "Complete" | "Error" | "Cancelled"

/**
 * One snapshot of a running pipeline
 */
export interface ProgressEvent {
	/** Stage name, or a terminal phase */
	readonly phase: string
	/** Index of the stage this event concerns; STAGE_COUNT on Complete */
	readonly phaseIndex: number
	readonly stage?: StageId
	readonly reasoning: string
	/** 0-100 */
	readonly progress: number
	readonly status: EventStatus
	readonly diagram?: string
	readonly result?: StageResult
	readonly blueprint?: Blueprint
	readonly timestamp: string
}

export type StageStatus = "pending" | "running" | "completed" | "failed"
export type RunStatus = "running" | "completed" | "failed" | "cancelled"

export interface StageRecord {
	stage: StageId
	name: string
	status: StageStatus
	startedAt?: string
	completedAt?: string
	duration?: number
	outputFile?: string
	outputFiles?: string[]
	error?: string
}

/**
 * Persisted summary of one generation
 */
export interface BlueprintRun {
	id: string
	idea: string
	detailLevel: DetailLevel
	platform: DeploymentPlatform
	provider: ProviderType
	model: string
	startedAt: string
	completedAt?: string
	status: RunStatus
	stages: StageRecord[]
	progress: number
	blueprintId?: string
	error?: string
}
