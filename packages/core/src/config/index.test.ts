import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { ConfigurationError } from "../errors"
import {
	getPlatformServices,
	isKnownPlatform,
	listPlatforms,
	loadConfig,
	maskApiKey,
	resolveSettings,
	saveConfig,
} from "./index"

describe("resolveSettings", () => {
	test("defaults to OpenAI with the environment key", () => {
		const settings = resolveSettings({ env: { OPENAI_API_KEY: "test-key" } })

		expect(settings).toEqual({
			provider: "openai",
			model: "gpt-4-turbo",
			apiKey: "test-key",
			baseUrl: "https://api.openai.com/v1",
			timeoutMs: 300000,
			retries: 2,
			profiles: {
				orchestrator: { maxTokens: 4096, temperature: 0.7 },
				specialist: { maxTokens: 4096, temperature: 0.3 },
			},
		})
		expect(Object.isFrozen(settings)).toBe(true)
	})

	test("explicit options beat the config file and environment", () => {
		const settings = resolveSettings({
			provider: "groq",
			model: "openai/gpt-oss-120b",
			config: {
				defaultProvider: "deepseek",
				apiKeys: { groq: "test-config-key" },
			},
			env: { DEFAULT_PROVIDER: "kimi", GROQ_API_KEY: "test-env-key" },
		})

		expect(settings.provider).toBe("groq")
		expect(settings.model).toBe("openai/gpt-oss-120b")
		expect(settings.apiKey).toBe("test-config-key")
		expect(settings.baseUrl).toBe("https://api.groq.com/openai/v1")
	})

	test("reads provider and model from the environment", () => {
		const settings = resolveSettings({
			env: {
				DEFAULT_PROVIDER: "deepseek",
				DEEPSEEK_API_KEY: "test-key",
				DEEPSEEK_MODEL: "deepseek-reasoner",
			},
		})

		expect(settings.provider).toBe("deepseek")
		expect(settings.model).toBe("deepseek-reasoner")
	})

	test("applies numeric overrides", () => {
		const settings = resolveSettings({
			env: {
				OPENAI_API_KEY: "test-key",
				MAX_TOKENS: "2048",
				TEMPERATURE: "0.1",
				BLUEPRINT_TIMEOUT_MS: "60000",
			},
		})

		expect(settings.profiles.specialist).toEqual({
			maxTokens: 2048,
			temperature: 0.1,
		})
		expect(settings.profiles.orchestrator.temperature).toBe(0.7)
		expect(settings.timeoutMs).toBe(60000)
	})

	test("rejects a missing API key", () => {
		expect(() => resolveSettings({ provider: "kimi", env: {} })).toThrow(
			"No API key for Kimi (Moonshot). Set MOONSHOT_API_KEY",
		)
	})

	test("rejects an unknown provider", () => {
		expect(() =>
			resolveSettings({ provider: "mistral", env: { OPENAI_API_KEY: "test-key" } }),
		).toThrow(ConfigurationError)
	})

	test("rejects an unknown model for a closed catalogue", () => {
		expect(() =>
			resolveSettings({ model: "gpt-2", env: { OPENAI_API_KEY: "test-key" } }),
		).toThrow("Unknown model gpt-2 for OpenAI")
	})

	test("accepts any model where the provider allows it", () => {
		const settings = resolveSettings({
			provider: "openrouter",
			model: "meta-llama/llama-3.1-8b-instruct",
			env: { OPENROUTER_API_KEY: "test-key" },
		})

		expect(settings.model).toBe("meta-llama/llama-3.1-8b-instruct")
	})

	test("rejects a non-numeric numeric setting", () => {
		expect(() =>
			resolveSettings({ env: { OPENAI_API_KEY: "test-key", MAX_TOKENS: "lots" } }),
		).toThrow('MAX_TOKENS must be a number, got "lots"')
	})
})

describe("config file", () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "blueprint-forge-config-"))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	test("saves and loads", () => {
		const path = join(dir, "nested", "config.json")
		saveConfig({ defaultProvider: "groq", apiKeys: { groq: "test-key" } }, path)

		expect(loadConfig(path)).toEqual({
			defaultProvider: "groq",
			apiKeys: { groq: "test-key" },
		})
	})

	test("reads a missing file as empty", () => {
		expect(loadConfig(join(dir, "absent.json"))).toEqual({})
	})

	test("reads a malformed file as empty", async () => {
		const path = join(dir, "config.json")
		await writeFile(path, JSON.stringify({ maxTokens: "many" }))

		expect(loadConfig(path)).toEqual({})
	})
})

describe("maskApiKey", () => {
	test("shows the first 8 and last 4 characters", () => {
		expect(maskApiKey("test-secret-value-1234")).toBe("test-sec...1234")
	})

	test("hides short keys entirely", () => {
		expect(maskApiKey("test-key")).toBe("********")
	})
})

describe("platforms", () => {
	test("every platform but other has services", () => {
		const missing = listPlatforms()
			.filter((p) => !p.services)
			.map((p) => p.id)

		expect(missing).toEqual(["other"])
	})

	test("recommends services for AWS", () => {
		expect(getPlatformServices("aws")?.recommended.compute).toBe(
			"ECS with Fargate",
		)
		expect(isKnownPlatform("other")).toBe(false)
		expect(getPlatformServices("hetzner")).toBeUndefined()
	})
})
