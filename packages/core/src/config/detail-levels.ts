/**
 * Detail tiers: per-stage limits used to build the stage prompts
 */

import type { StageId } from "../blueprint/types"
import { ConfigurationError } from "../errors"
import { deepFreeze } from "../freeze"

export const DETAIL_LEVEL_IDS = [
	"high_level",
	"detailed",
	"production_ready",
] as const

export type DetailLevel = (typeof DETAIL_LEVEL_IDS)[number]

export interface RequirementsStageConfig {
	guidance: string
}

export interface DatabaseStageConfig {
	maxTables: number
	includeIndexes: boolean
	includeConstraints: "primary_key_only" | "all"
	fieldDescriptions: "brief" | "detailed" | "comprehensive"
	includePartitioning?: boolean
	includeReplication?: boolean
}

export interface ApiStageConfig {
	maxEndpoints: number
	includeRequestBodySchema: boolean
	includeErrorResponses: boolean
	includeParameters: "path_only" | "all"
	includeRateLimiting?: boolean
	includeCachingStrategy?: boolean
	includeVersioning?: boolean
}

export interface FrontendStageConfig {
	maxComponents: number
	componentDetail: "high_level" | "detailed" | "comprehensive"
	includeProps: boolean
	includeState: boolean
	includeDependencies: boolean
	includePerformanceOptimization?: boolean
	includeErrorBoundaries?: boolean
	includeTestingStrategy?: boolean
}

export interface DeploymentStageConfig {
	detail: "minimal" | "detailed" | "production_grade"
	includeCostEstimate: boolean
	securityMeasures: "basic" | "comprehensive" | "enterprise"
	monitoring: "basic" | "detailed" | "comprehensive"
	includeDisasterRecovery?: boolean
	includeCompliance?: boolean
	includeScalabilityPlan?: boolean
	includeCiCdPipeline?: boolean
}

export interface StageConfigurations {
	requirements: RequirementsStageConfig
	database: DatabaseStageConfig
	api: ApiStageConfig
	frontend: FrontendStageConfig
	deployment: DeploymentStageConfig
}

export interface DetailConfiguration {
	level: DetailLevel
	description: string
	stages: StageConfigurations
}

const DETAIL_LEVELS: Record<DetailLevel, DetailConfiguration> = {
	high_level: {
		level: "high_level",
		description: "High-level overview with key components",
		stages: {
			requirements: {
				guidance: "Focus on core features only. Keep the analysis concise.",
			},
			database: {
				maxTables: 10,
				includeIndexes: false,
				includeConstraints: "primary_key_only",
				fieldDescriptions: "brief",
			},
			api: {
				maxEndpoints: 10,
				includeRequestBodySchema: false,
				includeErrorResponses: false,
				includeParameters: "path_only",
			},
			frontend: {
				maxComponents: 8,
				componentDetail: "high_level",
				includeProps: false,
				includeState: false,
				includeDependencies: false,
			},
			deployment: {
				detail: "minimal",
				includeCostEstimate: false,
				securityMeasures: "basic",
				monitoring: "basic",
			},
		},
	},
	detailed: {
		level: "detailed",
		description: "Detailed specification with comprehensive information",
		stages: {
			requirements: {
				guidance:
					"Provide comprehensive analysis with all major features and considerations.",
			},
			database: {
				maxTables: 20,
				includeIndexes: true,
				includeConstraints: "all",
				fieldDescriptions: "detailed",
			},
			api: {
				maxEndpoints: 30,
				includeRequestBodySchema: true,
				includeErrorResponses: true,
				includeParameters: "all",
			},
			frontend: {
				maxComponents: 20,
				componentDetail: "detailed",
				includeProps: true,
				includeState: true,
				includeDependencies: true,
			},
			deployment: {
				detail: "detailed",
				includeCostEstimate: true,
				securityMeasures: "comprehensive",
				monitoring: "detailed",
			},
		},
	},
	production_ready: {
		level: "production_ready",
		description: "Production-ready with security, monitoring, and scalability",
		stages: {
			requirements: {
				guidance:
					"Provide exhaustive analysis including advanced features, security considerations, and scalability requirements.",
			},
			database: {
				maxTables: 30,
				includeIndexes: true,
				includeConstraints: "all",
				fieldDescriptions: "comprehensive",
				includePartitioning: true,
				includeReplication: true,
			},
			api: {
				maxEndpoints: 50,
				includeRequestBodySchema: true,
				includeErrorResponses: true,
				includeParameters: "all",
				includeRateLimiting: true,
				includeCachingStrategy: true,
				includeVersioning: true,
			},
			frontend: {
				maxComponents: 35,
				componentDetail: "comprehensive",
				includeProps: true,
				includeState: true,
				includeDependencies: true,
				includePerformanceOptimization: true,
				includeErrorBoundaries: true,
				includeTestingStrategy: true,
			},
			deployment: {
				detail: "production_grade",
				includeCostEstimate: true,
				securityMeasures: "enterprise",
				monitoring: "comprehensive",
				includeDisasterRecovery: true,
				includeCompliance: true,
				includeScalabilityPlan: true,
				includeCiCdPipeline: true,
			},
		},
	},
}

deepFreeze(DETAIL_LEVELS)

export function isDetailLevel(value: string): value is DetailLevel {
	return Object.hasOwn(DETAIL_LEVELS, value)
}

/**
 * List tier ids in ascending order of detail
 */
export function listDetailLevels(): DetailConfiguration[] {
	return Object.values(DETAIL_LEVELS)
}

/**
 * Look up a detail tier by name
 */
export function resolveConfiguration(tier: string): DetailConfiguration {
	if (!isDetailLevel(tier)) {
		throw new ConfigurationError(
			`Unknown detail level: ${tier}. Must be one of ${Object.keys(DETAIL_LEVELS).join(", ")}`,
		)
	}
	return DETAIL_LEVELS[tier]
}

function isStageKey(
	stages: StageConfigurations,
	key: string,
): key is keyof StageConfigurations {
	return Object.hasOwn(stages, key)
}

/**
 * Look up one stage's slice of a detail tier
 */
export function getStageConfiguration<S extends StageId>(
	tier: string,
	stage: S,
): StageConfigurations[S]
export function getStageConfiguration(
	tier: string,
	stage: string,
): StageConfigurations[StageId]
export function getStageConfiguration(
	tier: string,
	stage: string,
): StageConfigurations[StageId] {
	const { stages } = resolveConfiguration(tier)
	if (!isStageKey(stages, stage)) {
		throw new ConfigurationError(
			`Unknown stage: ${stage}. Must be one of ${Object.keys(stages).join(", ")}`,
		)
	}
	return stages[stage]
}
