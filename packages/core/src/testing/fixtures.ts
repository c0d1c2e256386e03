import type { StageOutputs } from "../blueprint/types"

/**
 * Schema-valid stage outputs for a field-service scheduling product
 */
export function createStageOutputs(): StageOutputs {
	return {
		requirements: {
			coreFeatures: ["Job scheduling", "Invoicing"],
			userTypes: ["Owner", "Technician"],
			keyEntities: ["Customer", "Job", "Invoice"],
			businessModel: "Monthly subscription per seat",
			complexityAssessment: "Medium",
			keyTechnicalChallenges: ["Offline sync for technicians"],
		},
		database: {
			tables: [
				{
					name: "customers",
					description: "People and businesses that book jobs",
					fields: [
						{
							name: "id",
							dataType: "uuid",
							constraints: ["primary_key"],
							description: "Customer id",
						},
						{
							name: "email",
							dataType: "string",
							constraints: ["unique", "not_null"],
							description: "Contact email",
						},
					],
					indexes: ["idx_customers_email"],
				},
				{
					name: "jobs",
					description: "Scheduled work orders",
					fields: [
						{
							name: "id",
							dataType: "uuid",
							constraints: ["primary_key"],
							description: "Job id",
						},
						{
							name: "customer_id",
							dataType: "uuid",
							constraints: ["foreign_key"],
							foreignKeyReference: "customers.id",
							description: "Owning customer",
						},
					],
					indexes: [],
				},
			],
			relationships: ["customers 1:N jobs"],
			reasoning: "Jobs belong to customers",
			mermaidDiagram: 'erDiagram\n    CUSTOMERS ||--o{ JOBS : "books"',
		},
		api: {
			baseUrl: "/api/v1",
			endpoints: [
				{
					path: "/jobs",
					method: "GET",
					name: "List jobs",
					description: "Jobs visible to the caller",
					authRequired: true,
					authType: "jwt",
					parameters: [],
					responses: [{ statusCode: 200, description: "Job list" }],
					databaseOperations: ["SELECT jobs"],
				},
				{
					path: "/jobs",
					method: "POST",
					name: "Create job",
					description: "Book a new job",
					authRequired: true,
					authType: "jwt",
					parameters: [],
					responses: [{ statusCode: 201, description: "Created job" }],
					databaseOperations: ["INSERT jobs"],
				},
			],
			authenticationStrategy: "JWT bearer tokens issued at login",
			versioningStrategy: "URL path versioning",
			reasoning: "Resources map to tables",
			mermaidDiagram: "sequenceDiagram\n    Client->>API: GET /api/v1/jobs",
		},
		frontend: {
			framework: "React",
			components: [
				{
					name: "JobList",
					type: "page",
					path: "src/pages/JobList.tsx",
					description: "Lists upcoming jobs",
					props: [],
					state: [],
					apiCalls: ["GET /jobs"],
					dependencies: [],
				},
			],
			routingStructure: [{ path: "/jobs", component: "JobList" }],
			stateManagement: "server",
			stateManagementLibrary: "TanStack Query",
			stylingApproach: "Tailwind CSS",
			keyLibraries: [],
			reasoning: "Server state dominates",
			mermaidDiagram: "graph TD\n    App --> JobList",
		},
		deployment: {
			platform: "aws",
			infrastructure: [
				{
					name: "API",
					service: "ECS Fargate",
					purpose: "Runs the API",
					configuration: { cpu: 512 },
				},
			],
			databaseService: "RDS PostgreSQL",
			hostingService: "ECS Fargate",
			ciCdStrategy: "GitHub Actions",
			monitoringStrategy: "CloudWatch dashboards and alarms on latency",
			monitoringTools: ["CloudWatch", "Sentry", "PagerDuty"],
			scalingStrategy: "Scale tasks on CPU",
			securityMeasures: ["TLS everywhere"],
			estimatedMonthlyCost: "$150",
			deploymentSteps: [],
			reasoning: "Managed services keep operations small",
			mermaidDiagram: "graph TB\n    ALB --> ECS",
		},
	}
}
