/**
 * Model provider catalogue
 */

export const PROVIDER_TYPES = [
	"openai",
	"deepseek",
	"kimi",
	"groq",
	"openrouter",
	"anthropic",
] as const

export type ProviderType = (typeof PROVIDER_TYPES)[number]

export interface ModelInfo {
	id: string
	displayName: string
	maxTokens: number
	/** USD per million input tokens */
	costPerMillionInput: number
	/** USD per million output tokens */
	costPerMillionOutput: number
}

export interface ProviderInfo {
	type: ProviderType
	displayName: string
	baseUrl: string
	apiKeyEnv: string
	modelEnv: string
	defaultModel: string
	models: ModelInfo[]
	/** Whether model ids outside `models` are accepted as-is */
	allowsCustomModels: boolean
	/** Wire protocol used to reach the provider */
	protocol: "openai-compatible" | "anthropic"
}

export const PROVIDERS: Readonly<Record<ProviderType, ProviderInfo>> = {
	openai: {
		type: "openai",
		displayName: "OpenAI",
		baseUrl: "https://api.openai.com/v1",
		apiKeyEnv: "OPENAI_API_KEY",
		modelEnv: "OPENAI_MODEL",
		defaultModel: "gpt-4-turbo",
		models: [
			{
				id: "gpt-4-turbo",
				displayName: "GPT-4 Turbo",
				maxTokens: 4096,
				costPerMillionInput: 10,
				costPerMillionOutput: 30,
			},
			{
				id: "gpt-4o",
				displayName: "GPT-4o",
				maxTokens: 4096,
				costPerMillionInput: 2.5,
				costPerMillionOutput: 10,
			},
		],
		allowsCustomModels: false,
		protocol: "openai-compatible",
	},
	deepseek: {
		type: "deepseek",
		displayName: "DeepSeek",
		baseUrl: "https://api.deepseek.com/v1",
		apiKeyEnv: "DEEPSEEK_API_KEY",
		modelEnv: "DEEPSEEK_MODEL",
		defaultModel: "deepseek-chat",
		models: [
			{
				id: "deepseek-chat",
				displayName: "DeepSeek Chat",
				maxTokens: 4096,
				costPerMillionInput: 0.27,
				costPerMillionOutput: 1.1,
			},
			{
				id: "deepseek-reasoner",
				displayName: "DeepSeek Reasoner",
				maxTokens: 8192,
				costPerMillionInput: 0.55,
				costPerMillionOutput: 2.19,
			},
		],
		allowsCustomModels: false,
		protocol: "openai-compatible",
	},
	kimi: {
		type: "kimi",
		displayName: "Kimi (Moonshot)",
		baseUrl: "https://api.moonshot.cn/v1",
		apiKeyEnv: "MOONSHOT_API_KEY",
		modelEnv: "KIMI_MODEL",
		defaultModel: "moonshot-v1-8k",
		models: [
			{
				id: "moonshot-v1-8k",
				displayName: "Moonshot v1 8K",
				maxTokens: 8192,
				costPerMillionInput: 2,
				costPerMillionOutput: 6,
			},
		],
		allowsCustomModels: false,
		protocol: "openai-compatible",
	},
	groq: {
		type: "groq",
		displayName: "Groq",
		baseUrl: "https://api.groq.com/openai/v1",
		apiKeyEnv: "GROQ_API_KEY",
		modelEnv: "GROQ_MODEL",
		defaultModel: "llama-3.3-70b-versatile",
		models: [
			{
				id: "llama-3.3-70b-versatile",
				displayName: "Llama 3.3 70B Versatile",
				maxTokens: 32768,
				costPerMillionInput: 0,
				costPerMillionOutput: 0,
			},
			{
				id: "openai/gpt-oss-120b",
				displayName: "GPT-OSS 120B",
				maxTokens: 32768,
				costPerMillionInput: 0,
				costPerMillionOutput: 0,
			},
			{
				id: "moonshotai/kimi-k2-instruct-0905",
				displayName: "Kimi K2 Instruct",
				maxTokens: 32768,
				costPerMillionInput: 0,
				costPerMillionOutput: 0,
			},
		],
		allowsCustomModels: false,
		protocol: "openai-compatible",
	},
	openrouter: {
		type: "openrouter",
		displayName: "OpenRouter",
		baseUrl: "https://openrouter.ai/api/v1",
		apiKeyEnv: "OPENROUTER_API_KEY",
		modelEnv: "OPENROUTER_MODEL",
		defaultModel: "anthropic/claude-3.5-sonnet",
		models: [
			{
				id: "anthropic/claude-3.5-sonnet",
				displayName: "Claude 3.5 Sonnet (via OpenRouter)",
				maxTokens: 8192,
				costPerMillionInput: 3,
				costPerMillionOutput: 15,
			},
		],
		allowsCustomModels: true,
		protocol: "openai-compatible",
	},
	anthropic: {
		type: "anthropic",
		displayName: "Anthropic",
		baseUrl: "https://api.anthropic.com",
		apiKeyEnv: "ANTHROPIC_API_KEY",
		modelEnv: "ANTHROPIC_MODEL",
		defaultModel: "claude-3-5-sonnet-20241022",
		models: [
			{
				id: "claude-3-5-sonnet-20241022",
				displayName: "Claude 3.5 Sonnet",
				maxTokens: 8192,
				costPerMillionInput: 3,
				costPerMillionOutput: 15,
			},
			{
				id: "claude-3-5-haiku-20241022",
				displayName: "Claude 3.5 Haiku",
				maxTokens: 8192,
				costPerMillionInput: 0.8,
				costPerMillionOutput: 4,
			},
		],
		allowsCustomModels: true,
		protocol: "anthropic",
	},
}

export function isProviderType(value: string): value is ProviderType {
	return Object.hasOwn(PROVIDERS, value)
}

export function getProvider(provider: ProviderType): ProviderInfo {
	return PROVIDERS[provider]
}

export function listProviders(): ProviderInfo[] {
	return PROVIDER_TYPES.map((type) => PROVIDERS[type])
}

export function findModel(
	provider: ProviderType,
	model: string,
): ModelInfo | undefined {
	return PROVIDERS[provider].models.find((m) => m.id === model)
}

/**
 * Estimate the USD cost of one call. Unknown models cost nothing.
 */
export function estimateCost(
	provider: ProviderType,
	model: string,
	inputTokens: number,
	outputTokens: number,
): number {
	const info = findModel(provider, model)
	if (!info) return 0
	return (
		(inputTokens / 1_000_000) * info.costPerMillionInput +
		(outputTokens / 1_000_000) * info.costPerMillionOutput
	)
}
