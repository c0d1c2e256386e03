import { describe, expect, test } from "vitest"
import {
	clipLabel,
	diagramWithFallback,
	escapeLabel,
	stripCodeFence,
	validateMermaid,
} from "./mermaid"

describe("validateMermaid", () => {
	test("accepts known diagram types in any case", () => {
		expect(validateMermaid("graph TB\n  A --> B")).toBe(true)
		expect(validateMermaid("erDiagram\n  USERS ||--o{ POSTS : has")).toBe(true)
		expect(validateMermaid("sequenceDiagram\n  A->>B: hi")).toBe(true)
		expect(validateMermaid("classDiagram\n  class User")).toBe(true)
		expect(validateMermaid("stateDiagram-v2\n  [*] --> Idle")).toBe(true)
	})

	test("rejects empty and unknown text", () => {
		expect(validateMermaid(undefined)).toBe(false)
		expect(validateMermaid("   ")).toBe(false)
		expect(validateMermaid("pie title Pets")).toBe(false)
	})
})

describe("stripCodeFence", () => {
	test("removes a tagged fence", () => {
		expect(stripCodeFence("```mermaid\ngraph TB\n  A --> B\n```")).toBe(
			"graph TB\n  A --> B",
		)
	})

	test("leaves bare diagrams alone", () => {
		expect(stripCodeFence("  graph TB\n  A --> B  ")).toBe("graph TB\n  A --> B")
	})
})

describe("diagramWithFallback", () => {
	test("passes valid diagrams through", () => {
		expect(diagramWithFallback("graph TB")).toBe("graph TB")
	})

	test("substitutes a fenced placeholder", () => {
		expect(diagramWithFallback("")).toBe("```\nDiagram generation pending...\n```")
		expect(diagramWithFallback(undefined, "No diagram")).toBe("```\nNo diagram\n```")
	})
})

describe("labels", () => {
	test("escapes quotes and angle brackets", () => {
		expect(escapeLabel('Use "JWT" <v2>')).toBe("Use &quot;JWT&quot; &lt;v2&gt;")
	})

	test("clips only past the limit", () => {
		expect(clipLabel("a".repeat(30))).toBe("a".repeat(30))
		expect(clipLabel("a".repeat(31))).toBe(`${"a".repeat(30)}...`)
	})

	test("never splits an astral character", () => {
		expect(clipLabel("🔒".repeat(30))).toBe("🔒".repeat(30))
		expect(clipLabel("🔒".repeat(31))).toBe(`${"🔒".repeat(30)}...`)
	})
})
