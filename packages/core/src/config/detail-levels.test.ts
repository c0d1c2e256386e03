import { describe, expect, test } from "vitest"
import { ConfigurationError } from "../errors"
import {
	getStageConfiguration,
	listDetailLevels,
	resolveConfiguration,
} from "./detail-levels"

const STAGE_KEYS = ["requirements", "database", "api", "frontend", "deployment"]

describe("resolveConfiguration", () => {
	test.each(["high_level", "detailed", "production_ready"])(
		"%s has all five stage configurations",
		(tier) => {
			const config = resolveConfiguration(tier)

			expect(config.level).toBe(tier)
			expect(Object.keys(config.stages)).toEqual(STAGE_KEYS)
		},
	)

	test("is pure", () => {
		expect(resolveConfiguration("detailed")).toEqual(
			resolveConfiguration("detailed"),
		)
	})

	test("returns frozen configurations", () => {
		const config = resolveConfiguration("detailed")

		expect(Object.isFrozen(config)).toBe(true)
		expect(Object.isFrozen(config.stages.database)).toBe(true)
	})

	test("tiers scale their limits", () => {
		expect(resolveConfiguration("high_level").stages.database.maxTables).toBe(10)
		expect(resolveConfiguration("detailed").stages.api.maxEndpoints).toBe(30)
		expect(
			resolveConfiguration("production_ready").stages.frontend.maxComponents,
		).toBe(35)
	})

	test("rejects unknown tiers and names the valid ones", () => {
		expect(() => resolveConfiguration("exhaustive")).toThrow(ConfigurationError)
		expect(() => resolveConfiguration("exhaustive")).toThrow(
			"Unknown detail level: exhaustive. Must be one of high_level, detailed, production_ready",
		)
	})

	test("does not resolve inherited object keys", () => {
		expect(() => resolveConfiguration("toString")).toThrow(ConfigurationError)
	})
})

describe("getStageConfiguration", () => {
	test("returns the stage slice", () => {
		expect(getStageConfiguration("high_level", "api")).toEqual({
			maxEndpoints: 10,
			includeRequestBodySchema: false,
			includeErrorResponses: false,
			includeParameters: "path_only",
		})
	})

	test("rejects unknown stage keys", () => {
		expect(() => getStageConfiguration("detailed", "testing")).toThrow(
			"Unknown stage: testing. Must be one of requirements, database, api, frontend, deployment",
		)
	})
})

describe("listDetailLevels", () => {
	test("lists tiers in ascending detail", () => {
		expect(listDetailLevels().map((c) => c.level)).toEqual([
			"high_level",
			"detailed",
			"production_ready",
		])
	})
})
