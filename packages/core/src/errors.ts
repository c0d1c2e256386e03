/**
 * Error taxonomy for blueprint generation.
 *
 * Callers switch on `kind` to tell invalid input apart from a failed model call.
 */

import type { StageId } from "./blueprint/types"

export type BlueprintErrorKind =
	| "configuration"
	| "validation"
	| "stage"
	| "cancelled"

export abstract class BlueprintError extends Error {
	abstract readonly kind: BlueprintErrorKind
}

/**
 * Unknown detail tier, stage key, provider or model, or missing API key.
 * Raised before any network call.
 */
export class ConfigurationError extends BlueprintError {
	readonly kind = "configuration" as const

	constructor(message: string) {
		super(message)
		this.name = "ConfigurationError"
	}
}

/**
 * The user input was rejected before the pipeline started
 */
export class ValidationError extends BlueprintError {
	readonly kind = "validation" as const
	readonly issues: string[]

	constructor(issues: string[]) {
		super(`Invalid input: ${issues.join("; ")}`)
		this.name = "ValidationError"
		this.issues = issues
	}
}

/**
 * A stage's model call failed, timed out, or returned output that does not
 * match the stage schema. Fatal to the run.
 */
export class StageFailure extends BlueprintError {
	readonly kind = "stage" as const
	readonly stage: StageId

	constructor(stage: StageId, cause: unknown) {
		super(`${stage} stage failed: ${errorMessage(cause)}`, { cause })
		this.name = "StageFailure"
		this.stage = stage
	}
}

export class PipelineCancelled extends BlueprintError {
	readonly kind = "cancelled" as const

	constructor(readonly nextStage?: StageId) {
		super(
			nextStage
				? `Blueprint generation cancelled before the ${nextStage} stage`
				: "Blueprint generation cancelled",
		)
		this.name = "PipelineCancelled"
	}
}

export function isBlueprintError(error: unknown): error is BlueprintError {
	return error instanceof BlueprintError
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
