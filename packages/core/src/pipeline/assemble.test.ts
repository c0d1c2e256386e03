import { describe, expect, test } from "vitest"
import { BlueprintSchema } from "../blueprint/schema"
import { createStageOutputs } from "../testing/fixtures"
import {
	IMPLEMENTATION_RECOMMENDATIONS,
	NEXT_STEPS,
	assembleBlueprint,
	buildArchitectureDiagram,
	buildTechnologyStackSummary,
	estimateTimeline,
} from "./assemble"

describe("estimateTimeline", () => {
	test("maps the three buckets", () => {
		expect(estimateTimeline("low")).toBe("6-8 weeks")
		expect(estimateTimeline("medium")).toBe("3-4 months")
		expect(estimateTimeline("high")).toBe("4-6 months")
	})

	test("ignores case and surrounding whitespace", () => {
		expect(estimateTimeline("HIGH")).toBe("4-6 months")
		expect(estimateTimeline("  Low ")).toBe("6-8 weeks")
	})

	test("falls back to medium", () => {
		expect(estimateTimeline("extreme")).toBe("3-4 months")
		expect(estimateTimeline("")).toBe("3-4 months")
	})
})

describe("buildArchitectureDiagram", () => {
	test("fills the layer template from stage outputs", () => {
		const diagram = buildArchitectureDiagram(createStageOutputs())
		const lines = diagram.split("\n")

		expect(lines[0]).toBe("graph TB")
		expect(lines).toContain('        FE["React"]')
		expect(lines).toContain('        FE_STATE["server"]')
		expect(lines).toContain('        API["/api/v1"]')
		expect(lines).toContain('        AUTH["JWT bearer tokens issued at lo..."]')
		expect(lines).toContain('        DB["2 tables"]')
		expect(lines).toContain('        DEPLOY["AWS"]')
		expect(lines).toContain('        MONITOR["CloudWatch dashboards and alar..."]')
		expect(lines).toContain("    DEPLOY -.hosts.-> DB")
		expect(lines.at(-1)).toBe("    style DEPLOY fill:#e8f5e9")
	})

	test("keeps short labels whole and escapes quotes", () => {
		const outputs = createStageOutputs()
		outputs.api.authenticationStrategy = 'Session "cookie"'
		const diagram = buildArchitectureDiagram(outputs)

		expect(diagram).toContain('AUTH["Session &quot;cookie&quot;"]')
	})
})

describe("buildTechnologyStackSummary", () => {
	test("takes the first two monitoring tools", () => {
		expect(buildTechnologyStackSummary(createStageOutputs())).toEqual({
			frontend: "React",
			backend: "To be determined",
			database: "RDS PostgreSQL",
			hosting: "aws",
			monitoring: "CloudWatch, Sentry",
		})
	})

	test("reports TBD without monitoring tools", () => {
		const outputs = createStageOutputs()
		outputs.deployment.monitoringTools = []

		expect(buildTechnologyStackSummary(outputs).monitoring).toBe("TBD")
	})
})

describe("assembleBlueprint", () => {
	test("produces a schema-valid document", () => {
		const blueprint = assembleBlueprint(
			{
				businessIdea: "Scheduling for plumbing contractors",
				detailLevel: "detailed",
				deploymentPlatform: "aws",
			},
			createStageOutputs(),
			{ now: new Date("2025-01-02T03:04:05.000Z") },
		)

		expect(BlueprintSchema.safeParse(blueprint).success).toBe(true)
		expect(blueprint.createdAt).toBe("2025-01-02T03:04:05.000Z")
		expect(blueprint.implementationRecommendations).toEqual([
			...IMPLEMENTATION_RECOMMENDATIONS,
		])
		expect(blueprint.nextSteps).toHaveLength(8)
		expect(blueprint.nextSteps[0]).toBe(NEXT_STEPS[0])
		expect(blueprint.estimatedTimeline).toBe("3-4 months")
	})
})
