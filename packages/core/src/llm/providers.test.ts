import { describe, expect, test } from "vitest"
import {
	estimateCost,
	findModel,
	getProvider,
	isProviderType,
	listProviders,
} from "./providers"

describe("provider catalogue", () => {
	test("lists every provider once, default model included", () => {
		const providers = listProviders()

		expect(providers.map((p) => p.type)).toEqual([
			"openai",
			"deepseek",
			"kimi",
			"groq",
			"openrouter",
			"anthropic",
		])
		for (const info of providers) {
			expect(findModel(info.type, info.defaultModel)?.id).toBe(info.defaultModel)
		}
	})

	test("recognises provider names", () => {
		expect(isProviderType("groq")).toBe(true)
		expect(isProviderType("mistral")).toBe(false)
		expect(isProviderType("toString")).toBe(false)
	})

	test("uses the Anthropic protocol only for Anthropic", () => {
		const anthropic = listProviders().filter((p) => p.protocol === "anthropic")

		expect(anthropic.map((p) => p.type)).toEqual(["anthropic"])
		expect(getProvider("kimi").apiKeyEnv).toBe("MOONSHOT_API_KEY")
	})
})

describe("estimateCost", () => {
	test("prices input and output tokens per million", () => {
		expect(estimateCost("openai", "gpt-4o", 1_000_000, 500_000)).toBeCloseTo(7.5)
	})

	test("returns zero for models outside the catalogue", () => {
		expect(estimateCost("openrouter", "some/unlisted-model", 1000, 1000)).toBe(0)
	})
})
