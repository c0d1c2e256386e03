/**
 * Cross-stage summary built once all five stages have succeeded
 */

import { randomUUID } from "node:crypto"
import type {
	Blueprint,
	StageOutputs,
	TechnologyStackSummary,
	UserInput,
} from "../blueprint/types"
import { clipLabel, escapeLabel } from "../output/mermaid"

export const IMPLEMENTATION_RECOMMENDATIONS: readonly string[] = Object.freeze([
	"Start with MVP features to validate core functionality",
	"Implement authentication and user management first",
	"Set up CI/CD pipeline early in the development process",
	"Use feature flags for gradual rollout of new features",
	"Implement comprehensive logging and monitoring from day one",
])

export const NEXT_STEPS: readonly string[] = Object.freeze([
	"Set up development environment and version control",
	"Initialize project with chosen technology stack",
	"Implement database schema and migrations",
	"Build authentication system",
	"Develop core API endpoints",
	"Create basic frontend components",
	"Set up deployment pipeline",
	"Configure monitoring and logging",
])

export const UNDECIDED_BACKEND = "To be determined"

const TIMELINES = {
	low: "6-8 weeks",
	medium: "3-4 months",
	high: "4-6 months",
} as const

export type TimelineEstimate = (typeof TIMELINES)[keyof typeof TIMELINES]

/**
 * Map a complexity label to a delivery estimate; unknown labels count as medium
 */
export function estimateTimeline(complexity: string): TimelineEstimate {
	switch (complexity.trim().toLowerCase()) {
		case "low":
			return TIMELINES.low
		case "high":
			return TIMELINES.high
		default:
			return TIMELINES.medium
	}
}

function node(id: string, label: string): string {
	return `        ${id}["${escapeLabel(label)}"]`
}

export function buildArchitectureDiagram(stages: StageOutputs): string {
	const { frontend, api, database, deployment } = stages

	return [
		"graph TB",
		'    subgraph "Frontend Layer"',
		node("FE", frontend.framework),
		node("FE_STATE", frontend.stateManagement),
		"    end",
		"",
		'    subgraph "API Layer"',
		node("API", api.baseUrl),
		node("AUTH", clipLabel(api.authenticationStrategy)),
		"    end",
		"",
		'    subgraph "Data Layer"',
		node("DB", `${database.tables.length} tables`),
		"    end",
		"",
		'    subgraph "Infrastructure"',
		node("DEPLOY", deployment.platform.toUpperCase()),
		node("MONITOR", clipLabel(deployment.monitoringStrategy)),
		"    end",
		"",
		"    FE --> API",
		"    FE_STATE -.manages.-> FE",
		"    API --> AUTH",
		"    API --> DB",
		"    DEPLOY -.hosts.-> API",
		"    DEPLOY -.hosts.-> FE",
		"    DEPLOY -.hosts.-> DB",
		"    MONITOR -.observes.-> API",
		"    MONITOR -.observes.-> DB",
		"",
		"    style FE fill:#e1f5ff",
		"    style API fill:#fff3e0",
		"    style DB fill:#f3e5f5",
		"    style DEPLOY fill:#e8f5e9",
	].join("\n")
}

export function buildTechnologyStackSummary(
	stages: StageOutputs,
): TechnologyStackSummary {
	const tools = stages.deployment.monitoringTools.slice(0, 2)
	return {
		frontend: stages.frontend.framework,
		backend: UNDECIDED_BACKEND,
		database: stages.deployment.databaseService,
		hosting: stages.deployment.platform,
		monitoring: tools.length > 0 ? tools.join(", ") : "TBD",
	}
}

export interface AssembleOptions {
	id?: string
	now?: Date
}

export function assembleBlueprint(
	input: UserInput,
	stages: StageOutputs,
	options: AssembleOptions = {},
): Blueprint {
	return {
		id: options.id ?? randomUUID(),
		createdAt: (options.now ?? new Date()).toISOString(),
		input,
		requirements: stages.requirements,
		databaseSchema: stages.database,
		apiDesign: stages.api,
		frontendDesign: stages.frontend,
		deploymentPlan: stages.deployment,
		architectureDiagram: buildArchitectureDiagram(stages),
		implementationRecommendations: [...IMPLEMENTATION_RECOMMENDATIONS],
		nextSteps: [...NEXT_STEPS],
		estimatedTimeline: estimateTimeline(
			stages.requirements.complexityAssessment,
		),
		technologyStackSummary: buildTechnologyStackSummary(stages),
	}
}
