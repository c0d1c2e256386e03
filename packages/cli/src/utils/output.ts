import {
	type BlueprintRun,
	type DetailConfiguration,
	type ProgressEvent,
	type ProviderInfo,
	type StageRecord,
	estimateCost,
} from "@blueprint-forge/core"

export const OK = "\x1b[32m✓\x1b[0m"
export const FAIL = "\x1b[31m✗\x1b[0m"
export const WARN = "\x1b[33m!\x1b[0m"

/**
 * Format a duration in milliseconds to human readable string
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${ms}ms`
	if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
	return `${(ms / 60000).toFixed(1)}m`
}

function progressBar(percent: number, width = 20): string {
	const filled = Math.round((Math.min(Math.max(percent, 0), 100) / 100) * width)
	return `[${"#".repeat(filled)}${"-".repeat(width - filled)}]`
}

/**
 * Format one pipeline event as a console line
 */
export function formatEvent(event: ProgressEvent): string {
	const bar = progressBar(event.progress)
	const percent = `${Math.round(event.progress)}%`.padStart(4)

	switch (event.status) {
		case "in_progress":
			return `  \x1b[33m⋯\x1b[0m ${bar} ${percent} ${event.phase}: ${event.reasoning}`
		case "completed":
			return `  ${OK} ${bar} ${percent} ${event.phase}`
		case "error":
			return `  ${FAIL} ${event.reasoning}`
		case "cancelled":
			return `  ${WARN} ${event.reasoning}`
	}
}

/**
 * Format a stage record for console output
 */
export function formatStageRecord(record: StageRecord): string {
	const status =
		record.status === "completed"
			? OK
			: record.status === "failed"
				? FAIL
				: record.status === "running"
					? "\x1b[33m⋯\x1b[0m"
					: "○"

	const duration =
		record.duration !== undefined ? ` (${formatDuration(record.duration)})` : ""
	const error = record.error ? `\n    Error: ${record.error}` : ""

	return `  ${status} ${record.name}${duration}${error}`
}

function statusColor(status: BlueprintRun["status"]): string {
	return status === "completed"
		? "\x1b[32m"
		: status === "failed"
			? "\x1b[31m"
			: "\x1b[33m"
}

export function colorStatus(status: BlueprintRun["status"]): string {
	return `${statusColor(status)}${status}\x1b[0m`
}

/**
 * Format a run summary
 */
export function formatRunSummary(run: BlueprintRun): string {
	const lines: string[] = []

	lines.push(`Run: ${run.id}`)
	lines.push(`Idea: ${run.idea}`)
	lines.push(`Detail level: ${run.detailLevel}`)
	lines.push(`Platform: ${run.platform}`)
	lines.push(`Model: ${run.provider}/${run.model}`)
	lines.push(`Status: ${colorStatus(run.status)} (${Math.round(run.progress)}%)`)
	lines.push(`Started: ${run.startedAt}`)
	if (run.completedAt) {
		lines.push(`Completed: ${run.completedAt}`)
	}
	if (run.blueprintId) {
		lines.push(`Blueprint: ${run.blueprintId}`)
	}
	lines.push("")
	lines.push("Stages:")
	for (const record of run.stages) {
		lines.push(formatStageRecord(record))
	}

	return lines.join("\n")
}

/**
 * Format a detail tier with its per-stage limits
 */
export function formatDetailLevel(config: DetailConfiguration): string {
	const { database, api, frontend, deployment } = config.stages
	return [
		`${config.level}: ${config.description}`,
		`  Tables: up to ${database.maxTables}, indexes: ${database.includeIndexes ? "yes" : "no"}`,
		`  Endpoints: up to ${api.maxEndpoints}, error responses: ${api.includeErrorResponses ? "yes" : "no"}`,
		`  Components: up to ${frontend.maxComponents}, props: ${frontend.includeProps ? "yes" : "no"}`,
		`  Deployment: ${deployment.detail}, cost estimate: ${deployment.includeCostEstimate ? "yes" : "no"}`,
	].join("\n")
}

// Rough token use of one five-stage run
const BLUEPRINT_INPUT_TOKENS = 20_000
const BLUEPRINT_OUTPUT_TOKENS = 20_000

/**
 * Format a provider and its model catalogue
 */
export function formatProvider(info: ProviderInfo, hasKey: boolean): string {
	const key = hasKey ? OK : "○"
	const lines = [`${key} ${info.displayName} (${info.type})`]
	lines.push(`   Key: ${info.apiKeyEnv}, model override: ${info.modelEnv}`)
	for (const model of info.models) {
		const marker = model.id === info.defaultModel ? " (default)" : ""
		const perRun = estimateCost(
			info.type,
			model.id,
			BLUEPRINT_INPUT_TOKENS,
			BLUEPRINT_OUTPUT_TOKENS,
		)
		lines.push(
			`   - ${model.id}${marker}: $${model.costPerMillionInput}/$${model.costPerMillionOutput} per 1M tokens, ~$${perRun.toFixed(2)} per blueprint`,
		)
	}
	if (info.allowsCustomModels) {
		lines.push("   - any other model id is passed through")
	}
	return lines.join("\n")
}
