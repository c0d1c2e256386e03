/**
 * Model callers: text transports plus a structured-output layer on top
 */

import Anthropic from "@anthropic-ai/sdk"
import { z } from "zod"
import type { StageId } from "../blueprint/types"
import type { AppSettings } from "../config"
import { errorMessage } from "../errors"
import { type ProviderType, getProvider } from "./providers"

export interface StructuredRequest<T> {
	stage: StageId
	system: string
	prompt: string
	schema: z.ZodType<T, z.ZodTypeDef, unknown>
	/** Describes the JSON shape the reply must take */
	responseFormat: string
	maxTokens: number
	temperature: number
	signal?: AbortSignal
}

/**
 * The only capability stage code depends on
 */
export interface ModelCaller {
	readonly provider: ProviderType
	readonly model: string
	issueStructuredRequest<T>(request: StructuredRequest<T>): Promise<T>
}

export interface ChatMessage {
	role: "user" | "assistant"
	content: string
}

export interface TextRequest {
	system: string
	messages: ChatMessage[]
	maxTokens: number
	temperature: number
	signal?: AbortSignal
}

export interface TextTransport {
	complete(request: TextRequest): Promise<string>
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

/**
 * Abort when the caller aborts or the timeout elapses, whichever comes first
 */
function timeoutSignal(
	timeoutMs: number,
	parent?: AbortSignal,
): { signal: AbortSignal; dispose: () => void } {
	const controller = new AbortController()
	const timer = setTimeout(
		() => controller.abort(new Error(`Request timed out after ${timeoutMs}ms`)),
		timeoutMs,
	)
	const onAbort = () => controller.abort(parent?.reason)
	if (parent?.aborted) {
		controller.abort(parent.reason)
	} else {
		parent?.addEventListener("abort", onAbort, { once: true })
	}
	return {
		signal: controller.signal,
		dispose: () => {
			clearTimeout(timer)
			parent?.removeEventListener("abort", onAbort)
		},
	}
}

const ChatCompletionSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({ content: z.string().nullable() }),
			}),
		)
		.min(1),
})

export interface OpenAiCompatibleOptions {
	providerName: string
	baseUrl: string
	apiKey: string
	model: string
	timeoutMs: number
	fetch?: FetchLike
}

/**
 * Chat completions over fetch, for every OpenAI-compatible provider
 */
export class OpenAiCompatibleTransport implements TextTransport {
	private readonly fetchImpl: FetchLike

	constructor(private readonly options: OpenAiCompatibleOptions) {
		this.fetchImpl = options.fetch ?? fetch
	}

	async complete(request: TextRequest): Promise<string> {
		const { providerName, baseUrl, apiKey, model, timeoutMs } = this.options
		const { signal, dispose } = timeoutSignal(timeoutMs, request.signal)

		try {
			const res = await this.fetchImpl(`${baseUrl}/chat/completions`, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					Authorization: `Bearer ${apiKey}`,
				},
				body: JSON.stringify({
					model,
					messages: [
						{ role: "system", content: request.system },
						...request.messages,
					],
					max_tokens: request.maxTokens,
					temperature: request.temperature,
					response_format: { type: "json_object" },
				}),
				signal,
			})

			if (!res.ok) {
				const text = await res.text()
				throw new Error(`${providerName} API error ${res.status}: ${text}`)
			}

			const body = ChatCompletionSchema.safeParse(await res.json())
			if (!body.success) {
				throw new Error(`${providerName} returned an unexpected response body`)
			}
			const content = body.data.choices[0]?.message.content
			if (!content) {
				throw new Error(`No text response from ${providerName}`)
			}
			return content
		} finally {
			dispose()
		}
	}
}

export interface AnthropicOptions {
	apiKey: string
	model: string
	timeoutMs: number
	client?: Anthropic
}

/**
 * Anthropic Messages API through the official SDK
 */
export class AnthropicTransport implements TextTransport {
	private readonly client: Anthropic

	constructor(private readonly options: AnthropicOptions) {
		this.client =
			options.client ??
			new Anthropic({
				apiKey: options.apiKey,
				timeout: options.timeoutMs,
				maxRetries: 0,
			})
	}

	async complete(request: TextRequest): Promise<string> {
		const response = await this.client.messages.create(
			{
				model: this.options.model,
				max_tokens: request.maxTokens,
				temperature: request.temperature,
				system: request.system,
				messages: request.messages,
			},
			{ signal: request.signal },
		)

		const textBlock = response.content.find((block) => block.type === "text")
		if (!textBlock || textBlock.type !== "text") {
			throw new Error("No text response from Anthropic")
		}

		return textBlock.text
	}
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ")
}

function correctionPrompt(problem: string): string {
	return `Your previous reply could not be used: ${problem}

Reply again with only the corrected JSON object.`
}

/**
 * Turns free-text replies into schema-checked values, re-asking on bad output
 */
export class StructuredModelCaller implements ModelCaller {
	constructor(
		readonly provider: ProviderType,
		readonly model: string,
		private readonly transport: TextTransport,
		private readonly retries: number,
	) {}

	async issueStructuredRequest<T>(request: StructuredRequest<T>): Promise<T> {
		const messages: ChatMessage[] = [
			{
				role: "user",
				content: `${request.prompt}\n\n${request.responseFormat}`,
			},
		]
		let problem = ""

		for (let attempt = 0; attempt <= this.retries; attempt++) {
			const text = await this.transport.complete({
				system: request.system,
				messages,
				maxTokens: request.maxTokens,
				temperature: request.temperature,
				signal: request.signal,
			})

			try {
				const parsed = request.schema.safeParse(parseJsonResponse(text))
				if (parsed.success) {
					return parsed.data
				}
				problem = formatIssues(parsed.error)
			} catch (error) {
				problem = errorMessage(error)
			}

			messages.push(
				{ role: "assistant", content: text },
				{ role: "user", content: correctionPrompt(problem) },
			)
		}

		throw new Error(
			`Invalid ${request.stage} output after ${this.retries + 1} attempts: ${problem}`,
		)
	}
}

export interface ModelCallerOptions {
	fetch?: FetchLike
	anthropicClient?: Anthropic
}

/**
 * Build the caller for the configured provider
 */
export function createModelCaller(
	settings: AppSettings,
	options: ModelCallerOptions = {},
): ModelCaller {
	const { provider, model, apiKey, baseUrl, timeoutMs, retries } = settings
	const info = getProvider(provider)
	const { protocol } = info
	let transport: TextTransport
	switch (protocol) {
		case "openai-compatible":
			transport = new OpenAiCompatibleTransport({
				providerName: info.displayName,
				baseUrl,
				apiKey,
				model,
				timeoutMs,
				fetch: options.fetch,
			})
			break
		case "anthropic":
			transport = new AnthropicTransport({
				apiKey,
				model,
				timeoutMs,
				client: options.anthropicClient,
			})
			break
		default: {
			const unreachable: never = protocol
			throw new Error(`Unsupported protocol: ${String(unreachable)}`)
		}
	}

	return new StructuredModelCaller(provider, model, transport, retries)
}

/**
 * Find balanced JSON structure starting at a position
 */
function findBalancedJson(
	text: string,
	startChar: string,
	endChar: string,
): string | null {
	const startIdx = text.indexOf(startChar)
	if (startIdx === -1) return null

	let depth = 0
	let inString = false
	let escapeNext = false

	for (let i = startIdx; i < text.length; i++) {
		const char = text[i]

		if (escapeNext) {
			escapeNext = false
			continue
		}

		if (char === "\\") {
			escapeNext = true
			continue
		}

		if (char === '"') {
			inString = !inString
			continue
		}

		if (inString) continue

		if (char === startChar) {
			depth++
		} else if (char === endChar) {
			depth--
			if (depth === 0) {
				return text.slice(startIdx, i + 1)
			}
		}
	}

	return null
}

function tryParse(text: string | null): { value: unknown } | undefined {
	if (text === null) return undefined
	try {
		return { value: JSON.parse(text) }
	} catch {
		return undefined
	}
}

/**
 * Parse JSON from a model reply, handling markdown code blocks and
 * surrounding prose
 */
export function parseJsonResponse(response: string): unknown {
	const jsonMatch = response.match(/```(?:json)?\s*([\s\S]*?)```/)
	const jsonString = jsonMatch ? jsonMatch[1]?.trim() : response.trim()

	if (!jsonString) {
		throw new Error("Empty response from model")
	}

	const direct = tryParse(jsonString)
	if (direct) return direct.value

	// Try whichever structure appears first in the reply
	const objectIdx = response.indexOf("{")
	const arrayIdx = response.indexOf("[")
	const objectFirst =
		objectIdx !== -1 && (arrayIdx === -1 || objectIdx < arrayIdx)
	const order: Array<[string, string]> = objectFirst
		? [
				["{", "}"],
				["[", "]"],
			]
		: [
				["[", "]"],
				["{", "}"],
			]

	for (const [open, close] of order) {
		const found = tryParse(findBalancedJson(response, open, close))
		if (found) return found.value
	}

	throw new Error(
		`Failed to parse JSON from model response: ${response.slice(0, 200)}`,
	)
}
