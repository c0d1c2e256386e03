import { z } from "zod"

export const DEPLOYMENT_PLATFORMS = [
	"aws",
	"gcp",
	"azure",
	"digital_ocean",
	"heroku",
	"vercel",
	"render",
	"railway",
	"fly_io",
	"other",
] as const

/** Pipeline stage ids, in execution order */
export const STAGE_IDS = [
	"requirements",
	"database",
	"api",
	"frontend",
	"deployment",
] as const

export const MIN_IDEA_LENGTH = 10

export const UserInputSchema = z.object({
	// Length in code points
	businessIdea: z
		.string()
		.refine(
			(idea) => [...idea].length >= MIN_IDEA_LENGTH,
			`Business idea must be at least ${MIN_IDEA_LENGTH} characters`,
		),
	detailLevel: z.string().default("detailed"),
	deploymentPlatform: z.enum(DEPLOYMENT_PLATFORMS).default("aws"),
	customPlatform: z.string().min(1).optional(),
})

// Requirements

export const RequirementsAnalysisSchema = z.object({
	coreFeatures: z.array(z.string()).min(1),
	userTypes: z.array(z.string()).min(1),
	keyEntities: z.array(z.string()).min(1),
	businessModel: z.string(),
	// Free-text label; the timeline estimate only understands low/medium/high
	complexityAssessment: z.string(),
	keyTechnicalChallenges: z.array(z.string()).default([]),
})

// Database

export const DataTypeSchema = z.enum([
	"string",
	"integer",
	"float",
	"boolean",
	"date",
	"datetime",
	"text",
	"json",
	"uuid",
	"binary",
])

export const FieldConstraintSchema = z.enum([
	"primary_key",
	"foreign_key",
	"unique",
	"not_null",
	"indexed",
	"auto_increment",
])

export const DatabaseFieldSchema = z.object({
	name: z.string(),
	dataType: DataTypeSchema,
	constraints: z.array(FieldConstraintSchema).default([]),
	foreignKeyReference: z.string().optional(),
	description: z.string(),
	defaultValue: z.string().optional(),
})

export const DatabaseTableSchema = z.object({
	name: z.string(),
	description: z.string(),
	fields: z.array(DatabaseFieldSchema).min(1),
	indexes: z.array(z.string()).default([]),
})

export const DatabaseSchemaSchema = z.object({
	tables: z.array(DatabaseTableSchema).min(1),
	relationships: z.array(z.string()).default([]),
	reasoning: z.string(),
	mermaidDiagram: z.string(),
})

// API

export const HttpMethodSchema = z.enum(["GET", "POST", "PUT", "PATCH", "DELETE"])

export const AuthTypeSchema = z.enum([
	"none",
	"jwt",
	"oauth2",
	"api_key",
	"session",
	"basic",
])

export const ApiParameterSchema = z.object({
	name: z.string(),
	location: z.enum(["path", "query", "body", "header"]),
	dataType: z.string(),
	required: z.boolean().default(true),
	description: z.string(),
	example: z.string().optional(),
})

export const ApiResponseSchema = z.object({
	statusCode: z.number().int(),
	description: z.string(),
})

export const ApiEndpointSchema = z.object({
	path: z.string(),
	method: HttpMethodSchema,
	name: z.string(),
	description: z.string(),
	authRequired: z.boolean().default(true),
	authType: AuthTypeSchema.optional(),
	parameters: z.array(ApiParameterSchema).default([]),
	responses: z.array(ApiResponseSchema).min(1),
	databaseOperations: z.array(z.string()).default([]),
})

export const ApiDesignSchema = z.object({
	baseUrl: z.string().default("/api/v1"),
	endpoints: z.array(ApiEndpointSchema).min(1),
	authenticationStrategy: z.string(),
	rateLimiting: z.string().optional(),
	versioningStrategy: z.string().default("URL path versioning (e.g., /api/v1/)"),
	reasoning: z.string(),
	mermaidDiagram: z.string(),
})

// Frontend

export const ComponentTypeSchema = z.enum([
	"page",
	"layout",
	"feature",
	"ui",
	"utility",
	"hook",
])

export const StateManagementSchema = z.enum([
	"local",
	"context",
	"global_store",
	"server",
	"props",
])

export const NamedTypeSchema = z.object({
	name: z.string(),
	type: z.string(),
})

export const FrontendComponentSchema = z.object({
	name: z.string(),
	type: ComponentTypeSchema,
	path: z.string(),
	description: z.string(),
	props: z.array(NamedTypeSchema).default([]),
	state: z.array(NamedTypeSchema).default([]),
	apiCalls: z.array(z.string()).default([]),
	dependencies: z
		.array(
			z.object({
				componentName: z.string(),
				dependencyType: z.enum(["uses", "contains", "calls", "imports"]),
			}),
		)
		.default([]),
})

export const FrontendDesignSchema = z.object({
	framework: z.string(),
	components: z.array(FrontendComponentSchema).min(1),
	routingStructure: z
		.array(z.object({ path: z.string(), component: z.string() }))
		.default([]),
	stateManagement: StateManagementSchema,
	stateManagementLibrary: z.string().optional(),
	stylingApproach: z.string(),
	keyLibraries: z.array(z.string()).default([]),
	reasoning: z.string(),
	mermaidDiagram: z.string(),
})

// Deployment

// Configuration values pass through as the model wrote them
const ConfigurationRecordSchema = z
	.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
	.default({})

export const InfrastructureComponentSchema = z.object({
	name: z.string(),
	service: z.string(),
	purpose: z.string(),
	configuration: ConfigurationRecordSchema,
	estimatedCost: z.string().optional(),
})

export const DeploymentPlanSchema = z.object({
	platform: z.string(),
	infrastructure: z.array(InfrastructureComponentSchema).min(1),
	databaseService: z.string(),
	hostingService: z.string(),
	ciCdStrategy: z.string(),
	monitoringStrategy: z.string(),
	monitoringTools: z.array(z.string()).default([]),
	scalingStrategy: z.string(),
	securityMeasures: z.array(z.string()).min(1),
	backupStrategy: z.string().optional(),
	estimatedMonthlyCost: z.string().optional(),
	deploymentSteps: z.array(z.string()).default([]),
	reasoning: z.string(),
	mermaidDiagram: z.string(),
})

// Aggregate

export const TechnologyStackSummarySchema = z.object({
	frontend: z.string(),
	backend: z.string(),
	database: z.string(),
	hosting: z.string(),
	monitoring: z.string(),
})

export const BlueprintSchema = z.object({
	id: z.string().uuid(),
	createdAt: z.string().datetime(),
	input: UserInputSchema,
	requirements: RequirementsAnalysisSchema,
	databaseSchema: DatabaseSchemaSchema,
	apiDesign: ApiDesignSchema,
	frontendDesign: FrontendDesignSchema,
	deploymentPlan: DeploymentPlanSchema,
	architectureDiagram: z.string(),
	implementationRecommendations: z.array(z.string()).min(1),
	nextSteps: z.array(z.string()),
	estimatedTimeline: z.string(),
	technologyStackSummary: TechnologyStackSummarySchema,
})
