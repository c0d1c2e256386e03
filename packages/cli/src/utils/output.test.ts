import { getProvider } from "@blueprint-forge/core"
import { describe, expect, test } from "vitest"
import {
	formatDuration,
	formatEvent,
	formatProvider,
	formatStageRecord,
} from "./output"

describe("formatDuration", () => {
	test("picks a unit by magnitude", () => {
		expect(formatDuration(850)).toBe("850ms")
		expect(formatDuration(12_300)).toBe("12.3s")
		expect(formatDuration(90_000)).toBe("1.5m")
	})
})

describe("formatEvent", () => {
	const base = {
		phaseIndex: 1,
		stage: "database" as const,
		timestamp: "2025-03-01T12:00:00.000Z",
	}

	test("shows a bar and the start message", () => {
		expect(
			formatEvent({
				...base,
				phase: "Database Schema",
				reasoning: "Designing tables",
				progress: 20,
				status: "in_progress",
			}),
		).toBe("  \x1b[33m⋯\x1b[0m [####----------------]  20% Database Schema: Designing tables")
	})

	test("marks completed stages", () => {
		expect(
			formatEvent({
				...base,
				phase: "Database Schema",
				reasoning: "Tables: 2",
				progress: 40,
				status: "completed",
			}),
		).toBe("  \x1b[32m✓\x1b[0m [########------------]  40% Database Schema")
	})

	test("prints the error text", () => {
		expect(
			formatEvent({
				...base,
				phase: "Error",
				reasoning: "An error occurred with OPENAI provider: boom",
				progress: 20,
				status: "error",
			}),
		).toBe("  \x1b[31m✗\x1b[0m An error occurred with OPENAI provider: boom")
	})
})

describe("formatStageRecord", () => {
	test("includes duration and error", () => {
		expect(
			formatStageRecord({
				stage: "api",
				name: "API Design",
				status: "failed",
				duration: 1500,
				error: "timed out",
			}),
		).toBe("  \x1b[31m✗\x1b[0m API Design (1.5s)\n    Error: timed out")
	})

	test("shows pending stages as open circles", () => {
		expect(
			formatStageRecord({ stage: "frontend", name: "Frontend Architecture", status: "pending" }),
		).toBe("  ○ Frontend Architecture")
	})
})

describe("formatProvider", () => {
	test("marks the default model and custom model support", () => {
		const lines = formatProvider(getProvider("openrouter"), false).split("\n")

		expect(lines[0]).toBe("○ OpenRouter (openrouter)")
		expect(lines[1]).toBe("   Key: OPENROUTER_API_KEY, model override: OPENROUTER_MODEL")
		expect(lines[2]).toBe(
			"   - anthropic/claude-3.5-sonnet (default): $3/$15 per 1M tokens, ~$0.36 per blueprint",
		)
		expect(lines.at(-1)).toBe("   - any other model id is passed through")
	})
})
