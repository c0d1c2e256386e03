/**
 * Configuration storage and settings resolution
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs"
import { homedir } from "node:os"
import { dirname, join } from "node:path"
import { z } from "zod"
import { ConfigurationError } from "../errors"
import {
	type ProviderType,
	findModel,
	getProvider,
	isProviderType,
	PROVIDER_TYPES,
} from "../llm/providers"

export * from "./detail-levels"
export * from "./platforms"

const ConfigFileSchema = z.object({
	defaultProvider: z.string().optional(),
	models: z.record(z.string()).optional(),
	apiKeys: z.record(z.string()).optional(),
	maxTokens: z.number().int().positive().optional(),
	temperature: z.number().min(0).max(2).optional(),
})

export type BlueprintConfig = z.infer<typeof ConfigFileSchema>

/**
 * Get the path to the config file
 */
export function getConfigPath(): string {
	return join(homedir(), ".config", "blueprint-forge", "config.json")
}

/**
 * Load config from disk. A missing or malformed file reads as empty.
 */
export function loadConfig(configPath = getConfigPath()): BlueprintConfig {
	if (!existsSync(configPath)) {
		return {}
	}

	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(configPath, "utf-8"))
	} catch {
		return {}
	}
	const parsed = ConfigFileSchema.safeParse(raw)
	return parsed.success ? parsed.data : {}
}

/**
 * Save config to disk
 */
export function saveConfig(
	config: BlueprintConfig,
	configPath = getConfigPath(),
): void {
	const configDir = dirname(configPath)

	if (!existsSync(configDir)) {
		mkdirSync(configDir, { recursive: true })
	}

	writeFileSync(configPath, JSON.stringify(config, null, 2))
}

/**
 * Mask an API key for display (show first 8 and last 4 chars)
 */
export function maskApiKey(key: string): string {
	if (key.length <= 12) {
		return "*".repeat(key.length)
	}
	return `${key.slice(0, 8)}...${key.slice(-4)}`
}

// Settings

export interface ModelProfile {
	maxTokens: number
	temperature: number
}

export interface AppSettings {
	readonly provider: ProviderType
	readonly model: string
	readonly apiKey: string
	readonly baseUrl: string
	readonly timeoutMs: number
	/** Extra attempts after malformed model output */
	readonly retries: number
	readonly profiles: Readonly<{
		/** Requirements stage */
		orchestrator: ModelProfile
		/** Database, API, Frontend and Deployment stages */
		specialist: ModelProfile
	}>
}

export type Env = Record<string, string | undefined>

export interface ResolveSettingsOptions {
	provider?: string
	model?: string
	config?: BlueprintConfig
	env?: Env
}

export const DEFAULT_MAX_TOKENS = 4096
export const DEFAULT_TEMPERATURE = 0.3
export const ORCHESTRATOR_TEMPERATURE = 0.7
export const DEFAULT_TIMEOUT_MS = 300_000
export const DEFAULT_RETRIES = 2

function readNumber(env: Env, name: string): number | undefined {
	const raw = env[name]
	if (raw === undefined || raw.trim() === "") return undefined
	const value = Number(raw)
	if (!Number.isFinite(value)) {
		throw new ConfigurationError(`${name} must be a number, got "${raw}"`)
	}
	return value
}

/**
 * Pick the provider: explicit > config file > DEFAULT_PROVIDER > openai
 */
export function resolveProvider(
	explicit: string | undefined,
	config: BlueprintConfig,
	env: Env,
): ProviderType {
	const chosen = explicit ?? config.defaultProvider ?? env.DEFAULT_PROVIDER
	if (chosen === undefined) return "openai"
	const normalized = chosen.trim().toLowerCase()
	if (!isProviderType(normalized)) {
		throw new ConfigurationError(
			`Unknown provider: ${chosen}. Must be one of ${PROVIDER_TYPES.join(", ")}`,
		)
	}
	return normalized
}

/**
 * Look up the API key for a provider: config file > environment
 */
export function getApiKey(
	provider: ProviderType,
	config: BlueprintConfig = loadConfig(),
	env: Env = process.env,
): string | undefined {
	const key = config.apiKeys?.[provider] ?? env[getProvider(provider).apiKeyEnv]
	return key?.trim() ? key : undefined
}

/**
 * Build the settings for one process. Fails before any network call.
 */
export function resolveSettings(
	options: ResolveSettingsOptions = {},
): AppSettings {
	const config = options.config ?? {}
	const env = options.env ?? {}
	const provider = resolveProvider(options.provider, config, env)
	const info = getProvider(provider)

	const model =
		options.model ??
		config.models?.[provider] ??
		env[info.modelEnv] ??
		info.defaultModel
	if (!info.allowsCustomModels && !findModel(provider, model)) {
		throw new ConfigurationError(
			`Unknown model ${model} for ${info.displayName}. Must be one of ${info.models.map((m) => m.id).join(", ")}`,
		)
	}

	const apiKey = getApiKey(provider, config, env)
	if (!apiKey) {
		throw new ConfigurationError(
			`No API key for ${info.displayName}. Set ${info.apiKeyEnv} or run: blueprint-forge config set-key ${provider} <key>`,
		)
	}

	const maxTokens =
		config.maxTokens ?? readNumber(env, "MAX_TOKENS") ?? DEFAULT_MAX_TOKENS
	const temperature =
		config.temperature ?? readNumber(env, "TEMPERATURE") ?? DEFAULT_TEMPERATURE
	const timeoutMs = readNumber(env, "BLUEPRINT_TIMEOUT_MS") ?? DEFAULT_TIMEOUT_MS

	return Object.freeze({
		provider,
		model,
		apiKey,
		baseUrl: info.baseUrl,
		timeoutMs,
		retries: DEFAULT_RETRIES,
		profiles: Object.freeze({
			orchestrator: Object.freeze({
				maxTokens,
				temperature: ORCHESTRATOR_TEMPERATURE,
			}),
			specialist: Object.freeze({ maxTokens, temperature }),
		}),
	})
}
