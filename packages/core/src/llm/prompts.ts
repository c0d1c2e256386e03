/**
 * Stage prompts for blueprint generation
 */

import type {
	ApiDesign,
	DatabaseSchema,
	FrontendDesign,
	RequirementsAnalysis,
	StageId,
} from "../blueprint/types"
import { formatRecommendedServices } from "../config/platforms"
import type {
	ApiStageConfig,
	DatabaseStageConfig,
	DeploymentStageConfig,
	DetailLevel,
	FrontendStageConfig,
	RequirementsStageConfig,
} from "../config/detail-levels"

/** Prior outputs longer than this are cut in the deployment prompt */
export const SUMMARY_LIMIT = 500

export const SYSTEM_PROMPTS: Readonly<Record<StageId, string>> = {
	requirements:
		"You are an expert software architect specializing in SaaS application design. You turn business ideas into complete technical requirements.",
	database:
		"You are an expert database architect. You design normalized, scalable relational schemas and document them with Mermaid ER diagrams.",
	api: "You are an expert API architect. You design RESTful APIs that follow HTTP conventions and document key flows with Mermaid sequence diagrams.",
	frontend:
		"You are an expert frontend architect. You design component hierarchies, routing and state management and document them with Mermaid diagrams.",
	deployment:
		"You are an expert DevOps architect. You design cloud infrastructure, CI/CD and operations plans and document them with Mermaid diagrams.",
}

/**
 * Serialize a prior stage output for embedding in a prompt
 */
export function toContext(value: unknown): string {
	return JSON.stringify(value, null, 2)
}

export function truncate(text: string, limit = SUMMARY_LIMIT): string {
	return text.length > limit ? `${text.slice(0, limit)}...` : text
}

function optionLines(options: Array<[string, boolean | undefined]>): string {
	return options
		.filter(([, enabled]) => enabled)
		.map(([label]) => `- ${label}`)
		.join("\n")
}

function section(title: string, body: string): string {
	return body ? `## ${title}\n${body}\n\n` : ""
}

export function buildRequirementsPrompt(
	businessIdea: string,
	level: DetailLevel,
	config: RequirementsStageConfig,
): string {
	return `## Business Idea
${businessIdea}

## Detail Level
${level}: ${config.guidance}

## Task
Analyze this business idea and extract:
1. Core features (what the application must do)
2. User types (who will use the application)
3. Key entities (every domain object the data model needs)
4. Business model (how it generates revenue)
5. Complexity assessment: exactly one of low, medium or high
6. Key technical challenges

Be thorough. For each feature consider which entities, user roles and workflows it needs, and which supporting features (notifications, audit logs, search) it implies.`
}

export function buildDatabasePrompt(
	requirements: RequirementsAnalysis,
	config: DatabaseStageConfig,
): string {
	const extras = optionLines([
		["Describe a partitioning strategy for large tables", config.includePartitioning],
		["Describe read replicas and replication", config.includeReplication],
	])

	return `## Requirements
${toContext(requirements)}

## Target Specifications
- Target number of tables: ${config.maxTables} (a guideline: cover every feature)
- Include indexes: ${config.includeIndexes}
- Constraints: ${config.includeConstraints === "all" ? "all (primary keys, foreign keys, unique, not null)" : "primary keys only"}
- Field descriptions: ${config.fieldDescriptions}

${section("Production Requirements", extras)}## Task
Design a normalized (3NF) schema that supports every core feature, with clear relationships, audit fields (created_at, updated_at) where appropriate, and indexes for the main query paths.

Include a Mermaid ER diagram (\`erDiagram\`) in mermaidDiagram. Use single curly braces, quote relationship labels and mark fields with PK, FK or UK.`
}

export function buildApiPrompt(
	requirements: RequirementsAnalysis,
	database: DatabaseSchema,
	config: ApiStageConfig,
): string {
	const extras = optionLines([
		["Define a rate limiting policy", config.includeRateLimiting],
		["Define a caching strategy", config.includeCachingStrategy],
		["Define an API versioning strategy", config.includeVersioning],
	])

	return `## Requirements
${toContext(requirements)}

## Database Schema
${toContext(database.tables)}

## Constraints
- Maximum endpoints: ${config.maxEndpoints}
- Include request body schemas: ${config.includeRequestBodySchema}
- Include error responses: ${config.includeErrorResponses}
- Parameters: ${config.includeParameters === "all" ? "path, query, body and header" : "path parameters only"}

${section("Production Requirements", extras)}## Task
Design a RESTful API that exposes all key functionality, aligns with the database tables and includes authentication.

Include a Mermaid sequence diagram (\`sequenceDiagram\`) of the most important flows in mermaidDiagram, with HTTP methods in the message labels.`
}

export function buildFrontendPrompt(
	requirements: RequirementsAnalysis,
	api: ApiDesign,
	config: FrontendStageConfig,
): string {
	const extras = optionLines([
		["Describe performance optimizations (code splitting, memoization)", config.includePerformanceOptimization],
		["Include error boundary components", config.includeErrorBoundaries],
		["Describe the component testing strategy", config.includeTestingStrategy],
	])
	const endpoints = api.endpoints
		.map((endpoint) => `- ${endpoint.method} ${api.baseUrl}${endpoint.path}: ${endpoint.name}`)
		.join("\n")

	return `## Requirements
${toContext(requirements)}

## API Endpoints
${endpoints}

## Constraints
- Maximum components: ${config.maxComponents}
- Include props: ${config.includeProps}
- Include state: ${config.includeState}
- Include component dependencies: ${config.includeDependencies}
- Component detail level: ${config.componentDetail}

${section("Production Requirements", extras)}## Task
Choose a modern framework suited to the requirements and design a component hierarchy (pages, layouts, features, UI components, hooks), routing, state management and styling. Map components to the API endpoints they call.

Include a Mermaid component hierarchy (\`graph TD\`) in mermaidDiagram.`
}

export interface DeploymentContext {
	requirements: RequirementsAnalysis
	database: DatabaseSchema
	api: ApiDesign
	frontend: FrontendDesign
}

export function buildDeploymentPrompt(
	context: DeploymentContext,
	platform: string,
	config: DeploymentStageConfig,
): string {
	const target = platform.toUpperCase()
	const extras = optionLines([
		["Plan disaster recovery (RPO/RTO, backups, failover)", config.includeDisasterRecovery],
		["Address compliance requirements (GDPR, SOC 2)", config.includeCompliance],
		["Describe a scalability plan", config.includeScalabilityPlan],
		["Detail the CI/CD pipeline stages", config.includeCiCdPipeline],
	])
	const recommended = formatRecommendedServices(platform)

	return `## Requirements
${toContext(context.requirements)}

## Database Schema Summary
${truncate(toContext(context.database))}

## API Design Summary
${truncate(toContext(context.api))}

## Frontend Design Summary
${truncate(toContext(context.frontend))}

## Target Platform
${target}

${section("Platform Services", recommended)}## Detail Level
${config.detail}
- Include cost estimates: ${config.includeCostEstimate}
- Security measures: ${config.securityMeasures}
- Monitoring: ${config.monitoring}

${section("Production Requirements", extras)}## Task
Create a deployment plan that uses services appropriate to ${target}, is cost-effective for a small team, scales as the application grows, and covers security, monitoring, logging and CI/CD.

Include a Mermaid infrastructure diagram (\`graph TB\` with subgraphs) in mermaidDiagram.`
}

const FORMAT_PREAMBLE = "## Response Format\nReturn ONLY valid JSON matching this structure:"

export const RESPONSE_FORMATS: Readonly<Record<StageId, string>> = {
	requirements: `${FORMAT_PREAMBLE}
\`\`\`json
{
  "coreFeatures": ["Feature"],
  "userTypes": ["User type"],
  "keyEntities": ["Entity"],
  "businessModel": "How it makes money",
  "complexityAssessment": "low | medium | high",
  "keyTechnicalChallenges": ["Challenge"]
}
\`\`\``,
	database: `${FORMAT_PREAMBLE}
\`\`\`json
{
  "tables": [
    {
      "name": "users",
      "description": "Registered accounts",
      "fields": [
        {
          "name": "id",
          "dataType": "string | integer | float | boolean | date | datetime | text | json | uuid | binary",
          "constraints": ["primary_key | foreign_key | unique | not_null | indexed | auto_increment"],
          "foreignKeyReference": "table.field (foreign keys only)",
          "description": "What the field holds",
          "defaultValue": "optional"
        }
      ],
      "indexes": ["idx_users_email"]
    }
  ],
  "relationships": ["users 1:N orders"],
  "reasoning": "Why the schema looks like this",
  "mermaidDiagram": "erDiagram ..."
}
\`\`\``,
	api: `${FORMAT_PREAMBLE}
\`\`\`json
{
  "baseUrl": "/api/v1",
  "endpoints": [
    {
      "path": "/users/{id}",
      "method": "GET | POST | PUT | PATCH | DELETE",
      "name": "Get user",
      "description": "What the endpoint does",
      "authRequired": true,
      "authType": "none | jwt | oauth2 | api_key | session | basic",
      "parameters": [
        {
          "name": "id",
          "location": "path | query | body | header",
          "dataType": "uuid",
          "required": true,
          "description": "User id"
        }
      ],
      "responses": [{ "statusCode": 200, "description": "The user" }],
      "databaseOperations": ["SELECT users"]
    }
  ],
  "authenticationStrategy": "How clients authenticate",
  "rateLimiting": "optional",
  "versioningStrategy": "URL path versioning",
  "reasoning": "Why the API looks like this",
  "mermaidDiagram": "sequenceDiagram ..."
}
\`\`\``,
	frontend: `${FORMAT_PREAMBLE}
\`\`\`json
{
  "framework": "React with Next.js",
  "components": [
    {
      "name": "UserList",
      "type": "page | layout | feature | ui | utility | hook",
      "path": "src/components/UserList.tsx",
      "description": "What it renders",
      "props": [{ "name": "users", "type": "User[]" }],
      "state": [{ "name": "filter", "type": "string" }],
      "apiCalls": ["GET /users"],
      "dependencies": [{ "componentName": "UserCard", "dependencyType": "uses | contains | calls | imports" }]
    }
  ],
  "routingStructure": [{ "path": "/users", "component": "UserList" }],
  "stateManagement": "local | context | global_store | server | props",
  "stateManagementLibrary": "optional",
  "stylingApproach": "Tailwind CSS",
  "keyLibraries": ["react-query"],
  "reasoning": "Why the frontend looks like this",
  "mermaidDiagram": "graph TD ..."
}
\`\`\``,
	deployment: `${FORMAT_PREAMBLE}
\`\`\`json
{
  "platform": "aws",
  "infrastructure": [
    {
      "name": "API service",
      "service": "ECS Fargate",
      "purpose": "Runs the API",
      "configuration": { "cpu": 512, "memory": "1GB" },
      "estimatedCost": "optional"
    }
  ],
  "databaseService": "RDS PostgreSQL",
  "hostingService": "ECS Fargate",
  "ciCdStrategy": "How code ships",
  "monitoringStrategy": "How the system is observed",
  "monitoringTools": ["CloudWatch"],
  "scalingStrategy": "How it scales",
  "securityMeasures": ["Secrets in Secrets Manager"],
  "backupStrategy": "optional",
  "estimatedMonthlyCost": "optional",
  "deploymentSteps": ["Step"],
  "reasoning": "Why the plan looks like this",
  "mermaidDiagram": "graph TB ..."
}
\`\`\``,
}
