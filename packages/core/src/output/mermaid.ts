/**
 * Mermaid diagram helpers
 */

const DIAGRAM_KEYWORDS = [
	"graph",
	"erdiagram",
	"sequencediagram",
	"flowchart",
	"classdiagram",
	"statediagram",
]

const DIAGRAM_FALLBACK_TEXT = "Diagram generation pending..."

/**
 * Escape special characters in Mermaid labels
 */
export function escapeLabel(label: string): string {
	return label
		.replace(/"/g, "&quot;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
}

/**
 * Shorten a label, marking the cut with "..."
 */
export function clipLabel(label: string, max = 30): string {
	const chars = [...label]
	return chars.length > max ? `${chars.slice(0, max).join("")}...` : label
}

/**
 * Cheap sanity check: non-empty and mentions a known diagram type
 */
export function validateMermaid(diagram: string | undefined): boolean {
	if (!diagram?.trim()) return false
	const lower = diagram.toLowerCase()
	return DIAGRAM_KEYWORDS.some((keyword) => lower.includes(keyword))
}

/**
 * Remove a surrounding ``` fence (with or without a language tag)
 */
export function stripCodeFence(diagram: string): string {
	let body = diagram.trim()
	if (body.startsWith("```")) {
		const firstNewline = body.indexOf("\n")
		body = firstNewline === -1 ? "" : body.slice(firstNewline + 1)
	}
	if (body.endsWith("```")) {
		body = body.slice(0, -3)
	}
	return body.trim()
}

/**
 * The diagram if it looks valid, otherwise a fenced placeholder
 */
export function diagramWithFallback(
	diagram: string | undefined,
	fallbackText = DIAGRAM_FALLBACK_TEXT,
): string {
	if (diagram && validateMermaid(diagram)) {
		return diagram
	}
	return `\`\`\`\n${fallbackText}\n\`\`\``
}
