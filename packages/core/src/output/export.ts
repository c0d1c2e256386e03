/**
 * Blueprint exporters: JSON, Markdown and YAML
 */

import { stringify } from "yaml"
import type { Blueprint } from "../blueprint/types"
import { diagramWithFallback, stripCodeFence, validateMermaid } from "./mermaid"

export function blueprintToJson(blueprint: Blueprint): string {
	return JSON.stringify(blueprint, null, 2)
}

export function blueprintToYaml(blueprint: Blueprint): string {
	return stringify(blueprint)
}

function bullets(items: string[]): string[] {
	return items.map((item) => `- ${item}`)
}

function numbered(items: string[]): string[] {
	return items.map((item, i) => `${i + 1}. ${item}`)
}

function cell(value: string): string {
	return value.replace(/\|/g, "\\|").replace(/\n/g, " ")
}

function mermaidBlock(diagram: string): string[] {
	if (!validateMermaid(diagram)) return ["", diagramWithFallback(diagram)]
	return ["", "```mermaid", stripCodeFence(diagram), "```"]
}

function titleCase(key: string): string {
	return key.charAt(0).toUpperCase() + key.slice(1)
}

/**
 * Render a blueprint as a standalone Markdown document
 */
export function blueprintToMarkdown(blueprint: Blueprint): string {
	const {
		input,
		requirements,
		databaseSchema,
		apiDesign,
		frontendDesign,
		deploymentPlan,
	} = blueprint
	const lines: string[] = []
	const push = (...more: string[]) => lines.push(...more)
	const rule = () => push("", "---", "")

	push(
		"# Technical Blueprint",
		"",
		`**Generated**: ${blueprint.createdAt}`,
		`**Blueprint ID**: ${blueprint.id}`,
	)
	rule()

	push(
		"## Business Idea",
		"",
		input.businessIdea,
		"",
		`**Detail Level**: ${input.detailLevel}`,
		`**Target Platform**: ${input.customPlatform ?? input.deploymentPlatform}`,
	)
	rule()

	push("## Architecture Overview", ...mermaidBlock(blueprint.architectureDiagram))
	rule()

	push(
		"## Requirements Analysis",
		"",
		"### Core Features",
		...bullets(requirements.coreFeatures),
		"",
		"### User Types",
		...bullets(requirements.userTypes),
		"",
		"### Key Entities",
		...bullets(requirements.keyEntities),
		"",
		"### Business Model",
		requirements.businessModel,
		"",
		"### Complexity Assessment",
		requirements.complexityAssessment,
	)
	if (requirements.keyTechnicalChallenges.length > 0) {
		push(
			"",
			"### Key Technical Challenges",
			...bullets(requirements.keyTechnicalChallenges),
		)
	}
	rule()

	push(
		"## Database Schema",
		"",
		`### Tables (${databaseSchema.tables.length} total)`,
	)
	for (const table of databaseSchema.tables) {
		push(
			"",
			`#### ${table.name}`,
			table.description,
			"",
			"| Field | Type | Constraints |",
			"|-------|------|-------------|",
			...table.fields.map(
				(field) =>
					`| ${cell(field.name)} | ${field.dataType} | ${field.constraints.join(", ")} |`,
			),
		)
	}
	push(...mermaidBlock(databaseSchema.mermaidDiagram))
	push("", "### Database Design Rationale", databaseSchema.reasoning)
	rule()

	push(
		"## API Design",
		"",
		`**Base URL**: ${apiDesign.baseUrl}`,
		"",
		`**Authentication**: ${apiDesign.authenticationStrategy}`,
		"",
		`### Endpoints (${apiDesign.endpoints.length} total)`,
	)
	for (const endpoint of apiDesign.endpoints) {
		push(
			"",
			`#### ${endpoint.method} ${endpoint.path}`,
			`**Name**: ${endpoint.name}`,
			"",
			`**Description**: ${endpoint.description}`,
			"",
			`**Auth Required**: ${endpoint.authRequired}`,
		)
	}
	push(...mermaidBlock(apiDesign.mermaidDiagram))
	push("", "### API Design Rationale", apiDesign.reasoning)
	rule()

	push(
		"## Frontend Architecture",
		"",
		`**Framework**: ${frontendDesign.framework}`,
		"",
		`**State Management**: ${frontendDesign.stateManagement}`,
		"",
		`**Styling**: ${frontendDesign.stylingApproach}`,
		"",
		`### Components (${frontendDesign.components.length} total)`,
	)
	for (const component of frontendDesign.components) {
		push(
			"",
			`#### ${component.name}`,
			`**Type**: ${component.type}`,
			"",
			`**Path**: \`${component.path}\``,
			"",
			`**Description**: ${component.description}`,
		)
	}
	push(...mermaidBlock(frontendDesign.mermaidDiagram))
	push("", "### Frontend Design Rationale", frontendDesign.reasoning)
	rule()

	push(
		"## Deployment Plan",
		"",
		`**Platform**: ${deploymentPlan.platform}`,
		"",
		`**Database Service**: ${deploymentPlan.databaseService}`,
		"",
		`**Hosting Service**: ${deploymentPlan.hostingService}`,
		"",
		`**CI/CD Strategy**: ${deploymentPlan.ciCdStrategy}`,
		"",
		`**Monitoring Strategy**: ${deploymentPlan.monitoringStrategy}`,
		"",
		`**Estimated Monthly Cost**: ${deploymentPlan.estimatedMonthlyCost ?? "TBD"}`,
		"",
		"### Security Measures",
		...bullets(deploymentPlan.securityMeasures),
	)
	push(...mermaidBlock(deploymentPlan.mermaidDiagram))
	push("", "### Deployment Rationale", deploymentPlan.reasoning)
	rule()

	push(
		"## Technology Stack Summary",
		"",
		...Object.entries(blueprint.technologyStackSummary).map(
			([key, value]) => `- **${titleCase(key)}**: ${value}`,
		),
	)
	rule()

	push(
		"## Implementation Recommendations",
		"",
		...numbered(blueprint.implementationRecommendations),
	)
	rule()

	push("## Next Steps", "", ...numbered(blueprint.nextSteps))
	rule()

	push("## Estimated Timeline", "", blueprint.estimatedTimeline, "")

	return lines.join("\n")
}
