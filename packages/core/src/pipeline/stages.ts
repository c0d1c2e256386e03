/**
 * The five stage requesters. Each issues exactly one structured request and
 * wraps any failure in a StageFailure.
 */

import type { z } from "zod"
import {
	ApiDesignSchema,
	DatabaseSchemaSchema,
	DeploymentPlanSchema,
	FrontendDesignSchema,
	RequirementsAnalysisSchema,
} from "../blueprint/schema"
import type {
	ApiDesign,
	DatabaseSchema,
	DeploymentPlan,
	FrontendDesign,
	RequirementsAnalysis,
	StageId,
	StageOutputs,
	UserInput,
} from "../blueprint/types"
import type { ModelProfile } from "../config"
import type {
	ApiStageConfig,
	DatabaseStageConfig,
	DeploymentStageConfig,
	DetailConfiguration,
	DetailLevel,
	FrontendStageConfig,
	RequirementsStageConfig,
} from "../config/detail-levels"
import { StageFailure } from "../errors"
import type { ModelCaller } from "../llm/client"
import {
	type DeploymentContext,
	RESPONSE_FORMATS,
	SYSTEM_PROMPTS,
	buildApiPrompt,
	buildDatabasePrompt,
	buildDeploymentPrompt,
	buildFrontendPrompt,
	buildRequirementsPrompt,
} from "../llm/prompts"

export interface RequesterOptions {
	caller: ModelCaller
	profile: ModelProfile
	signal?: AbortSignal
}

async function request<S extends StageId>(
	stage: S,
	prompt: string,
	schema: z.ZodType<StageOutputs[S], z.ZodTypeDef, unknown>,
	options: RequesterOptions,
): Promise<StageOutputs[S]> {
	try {
		return await options.caller.issueStructuredRequest({
			stage,
			system: SYSTEM_PROMPTS[stage],
			prompt,
			schema,
			responseFormat: RESPONSE_FORMATS[stage],
			maxTokens: options.profile.maxTokens,
			temperature: options.profile.temperature,
			signal: options.signal,
		})
	} catch (error) {
		throw new StageFailure(stage, error)
	}
}

export function analyzeRequirements(
	businessIdea: string,
	level: DetailLevel,
	config: RequirementsStageConfig,
	options: RequesterOptions,
): Promise<RequirementsAnalysis> {
	return request(
		"requirements",
		buildRequirementsPrompt(businessIdea, level, config),
		RequirementsAnalysisSchema,
		options,
	)
}

export function designDatabase(
	requirements: RequirementsAnalysis,
	config: DatabaseStageConfig,
	options: RequesterOptions,
): Promise<DatabaseSchema> {
	return request(
		"database",
		buildDatabasePrompt(requirements, config),
		DatabaseSchemaSchema,
		options,
	)
}

export function designApi(
	requirements: RequirementsAnalysis,
	database: DatabaseSchema,
	config: ApiStageConfig,
	options: RequesterOptions,
): Promise<ApiDesign> {
	return request(
		"api",
		buildApiPrompt(requirements, database, config),
		ApiDesignSchema,
		options,
	)
}

export function designFrontend(
	requirements: RequirementsAnalysis,
	api: ApiDesign,
	config: FrontendStageConfig,
	options: RequesterOptions,
): Promise<FrontendDesign> {
	return request(
		"frontend",
		buildFrontendPrompt(requirements, api, config),
		FrontendDesignSchema,
		options,
	)
}

export function planDeployment(
	context: DeploymentContext,
	platform: string,
	config: DeploymentStageConfig,
	options: RequesterOptions,
): Promise<DeploymentPlan> {
	return request(
		"deployment",
		buildDeploymentPrompt(context, platform, config),
		DeploymentPlanSchema,
		options,
	)
}

/**
 * Platform name the deployment stage targets
 */
export function deploymentTarget(input: UserInput): string {
	if (input.deploymentPlatform === "other" && input.customPlatform) {
		return input.customPlatform
	}
	return input.deploymentPlatform
}

// Summaries shown when a stage completes

function list(values: string[], limit?: number): string {
	return (limit === undefined ? values : values.slice(0, limit)).join(", ")
}

export function summarizeRequirements(result: RequirementsAnalysis): string {
	return [
		`Core Features: ${list(result.coreFeatures)}`,
		`User Types: ${list(result.userTypes)}`,
		`Key Entities: ${list(result.keyEntities)}`,
		`Business Model: ${result.businessModel}`,
		`Complexity: ${result.complexityAssessment}`,
	].join("\n")
}

export function summarizeDatabase(result: DatabaseSchema): string {
	return [
		`Tables: ${result.tables.length}`,
		`Key Tables: ${list(
			result.tables.map((t) => t.name),
			5,
		)}`,
		`Design Rationale: ${result.reasoning}`,
	].join("\n")
}

export function summarizeApi(result: ApiDesign): string {
	return [
		`Base URL: ${result.baseUrl}`,
		`Endpoints: ${result.endpoints.length}`,
		`Authentication: ${result.authenticationStrategy}`,
		`Key Endpoints: ${list(
			result.endpoints.map((e) => `${e.method} ${e.path}`),
			5,
		)}`,
		`Design Rationale: ${result.reasoning}`,
	].join("\n")
}

export function summarizeFrontend(result: FrontendDesign): string {
	return [
		`Framework: ${result.framework}`,
		`Components: ${result.components.length}`,
		`State Management: ${result.stateManagement} (${result.stateManagementLibrary ?? "built-in"})`,
		`Styling: ${result.stylingApproach}`,
		`Key Components: ${list(
			result.components.map((c) => c.name),
			5,
		)}`,
		`Design Rationale: ${result.reasoning}`,
	].join("\n")
}

export function summarizeDeployment(result: DeploymentPlan): string {
	return [
		`Platform: ${result.platform}`,
		`Database Service: ${result.databaseService}`,
		`Hosting Service: ${result.hostingService}`,
		`CI/CD: ${result.ciCdStrategy}`,
		`Monitoring: ${result.monitoringStrategy}`,
		`Estimated Cost: ${result.estimatedMonthlyCost ?? "TBD"}`,
		`Design Rationale: ${result.reasoning}`,
	].join("\n")
}

// Stage runners used by the pipeline

export interface StageRunContext {
	input: UserInput
	configuration: DetailConfiguration
	outputs: Partial<StageOutputs>
	caller: ModelCaller
	profiles: { orchestrator: ModelProfile; specialist: ModelProfile }
	signal?: AbortSignal
}

export type StageCompletion = {
	[S in StageId]: {
		stage: S
		result: StageOutputs[S]
		summary: string
		diagram?: string
	}
}[StageId]

function need<T>(value: T | undefined, stage: StageId): T {
	if (value === undefined) {
		throw new Error(`The ${stage} output is not available yet`)
	}
	return value
}

function options(
	ctx: StageRunContext,
	profile: ModelProfile,
): RequesterOptions {
	return { caller: ctx.caller, profile, signal: ctx.signal }
}

export function startMessage(stage: StageId, ctx: StageRunContext): string {
	switch (stage) {
		case "requirements":
			return `Analyzing your business idea with ${ctx.caller.provider.toUpperCase()}...`
		case "database":
			return "Designing a normalized database schema with tables, relationships, and indexes..."
		case "api":
			return "Creating RESTful API endpoints based on the database schema and business requirements..."
		case "frontend":
			return "Designing frontend component hierarchy and state management strategy..."
		case "deployment":
			return `Creating infrastructure and deployment plan for ${deploymentTarget(ctx.input).toUpperCase()}...`
	}
}

/**
 * Run one stage against the outputs accumulated so far
 */
export async function runStage(
	stage: StageId,
	ctx: StageRunContext,
): Promise<StageCompletion> {
	const { stages } = ctx.configuration
	const { outputs } = ctx
	const specialist = options(ctx, ctx.profiles.specialist)

	switch (stage) {
		case "requirements": {
			const result = await analyzeRequirements(
				ctx.input.businessIdea,
				ctx.configuration.level,
				stages.requirements,
				options(ctx, ctx.profiles.orchestrator),
			)
			return { stage, result, summary: summarizeRequirements(result) }
		}
		case "database": {
			const result = await designDatabase(
				need(outputs.requirements, "requirements"),
				stages.database,
				specialist,
			)
			return {
				stage,
				result,
				summary: summarizeDatabase(result),
				diagram: result.mermaidDiagram,
			}
		}
		case "api": {
			const result = await designApi(
				need(outputs.requirements, "requirements"),
				need(outputs.database, "database"),
				stages.api,
				specialist,
			)
			return {
				stage,
				result,
				summary: summarizeApi(result),
				diagram: result.mermaidDiagram,
			}
		}
		case "frontend": {
			const result = await designFrontend(
				need(outputs.requirements, "requirements"),
				need(outputs.api, "api"),
				stages.frontend,
				specialist,
			)
			return {
				stage,
				result,
				summary: summarizeFrontend(result),
				diagram: result.mermaidDiagram,
			}
		}
		case "deployment": {
			const result = await planDeployment(
				{
					requirements: need(outputs.requirements, "requirements"),
					database: need(outputs.database, "database"),
					api: need(outputs.api, "api"),
					frontend: need(outputs.frontend, "frontend"),
				},
				deploymentTarget(ctx.input),
				stages.deployment,
				specialist,
			)
			return {
				stage,
				result,
				summary: summarizeDeployment(result),
				diagram: result.mermaidDiagram,
			}
		}
	}
}
