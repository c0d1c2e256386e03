import type { z } from "zod"
import type {
	ApiDesignSchema,
	ApiEndpointSchema,
	BlueprintSchema,
	DEPLOYMENT_PLATFORMS,
	DatabaseSchemaSchema,
	DatabaseTableSchema,
	DeploymentPlanSchema,
	FrontendComponentSchema,
	FrontendDesignSchema,
	RequirementsAnalysisSchema,
	STAGE_IDS,
	TechnologyStackSummarySchema,
	UserInputSchema,
} from "./schema"

export type DeploymentPlatform = (typeof DEPLOYMENT_PLATFORMS)[number]

/** Validated user input, defaults applied */
export type UserInput = z.infer<typeof UserInputSchema>
/** Raw input as a caller hands it in */
export type UserInputDraft = z.input<typeof UserInputSchema>

export type RequirementsAnalysis = z.infer<typeof RequirementsAnalysisSchema>
export type DatabaseTable = z.infer<typeof DatabaseTableSchema>
export type DatabaseSchema = z.infer<typeof DatabaseSchemaSchema>
export type ApiEndpoint = z.infer<typeof ApiEndpointSchema>
export type ApiDesign = z.infer<typeof ApiDesignSchema>
export type FrontendComponent = z.infer<typeof FrontendComponentSchema>
export type FrontendDesign = z.infer<typeof FrontendDesignSchema>
export type DeploymentPlan = z.infer<typeof DeploymentPlanSchema>
export type TechnologyStackSummary = z.infer<
	typeof TechnologyStackSummarySchema
>
export type Blueprint = z.infer<typeof BlueprintSchema>

export type StageId = (typeof STAGE_IDS)[number]

export interface StageOutputs {
	requirements: RequirementsAnalysis
	database: DatabaseSchema
	api: ApiDesign
	frontend: FrontendDesign
	deployment: DeploymentPlan
}

export type StageResult = StageOutputs[StageId]
