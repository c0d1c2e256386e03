import { UserInputSchema } from "../blueprint/schema"
import type {
	Blueprint,
	StageId,
	StageOutputs,
	UserInput,
	UserInputDraft,
} from "../blueprint/types"
import { type AppSettings, resolveConfiguration } from "../config"
import {
	PipelineCancelled,
	StageFailure,
	ValidationError,
	errorMessage,
} from "../errors"
import { deepFreeze } from "../freeze"
import {
	type ModelCaller,
	type ModelCallerOptions,
	createModelCaller,
} from "../llm/client"
import { assembleBlueprint } from "./assemble"
import { ProgressTracker } from "./progress"
import {
	type StageCompletion,
	type StageRunContext,
	runStage,
	startMessage,
} from "./stages"
import {
	type ProgressEvent,
	STAGES,
	STAGE_COUNT,
	type StageDefinition,
} from "./types"

export * from "./assemble"
export * from "./progress"
export * from "./run-log"
export * from "./stages"
export * from "./storage"
export * from "./types"

export const COMPLETE_MESSAGE =
	"Blueprint generation complete! Your technical architecture is ready."

export interface PipelineOptions {
	caller: ModelCaller
	profiles: AppSettings["profiles"]
	now?: () => Date
	createId?: () => string
}

export interface RunOptions {
	signal?: AbortSignal
}

/**
 * Reject bad input before any stage runs
 */
export function validateInput(draft: unknown): UserInput {
	const parsed = UserInputSchema.safeParse(draft)
	if (!parsed.success) {
		throw new ValidationError(
			parsed.error.issues.map((issue) =>
				issue.path.length > 0
					? `${issue.path.join(".")}: ${issue.message}`
					: issue.message,
			),
		)
	}
	return parsed.data
}

function storeOutput(
	outputs: Partial<StageOutputs>,
	completion: StageCompletion,
): void {
	switch (completion.stage) {
		case "requirements":
			outputs.requirements = completion.result
			break
		case "database":
			outputs.database = completion.result
			break
		case "api":
			outputs.api = completion.result
			break
		case "frontend":
			outputs.frontend = completion.result
			break
		case "deployment":
			outputs.deployment = completion.result
			break
	}
}

function collectOutputs(outputs: Partial<StageOutputs>): StageOutputs {
	const { requirements, database, api, frontend, deployment } = outputs
	if (!requirements || !database || !api || !frontend || !deployment) {
		throw new Error("Cannot assemble a blueprint before every stage completes")
	}
	return { requirements, database, api, frontend, deployment }
}

/**
 * Five-stage sequential generation. Each call to stream() or run() owns its
 * own tracker and results.
 */
export class BlueprintPipeline {
	private readonly now: () => Date

	constructor(private readonly options: PipelineOptions) {
		this.now = options.now ?? (() => new Date())
	}

	static fromSettings(
		settings: AppSettings,
		callerOptions?: ModelCallerOptions,
	): BlueprintPipeline {
		return new BlueprintPipeline({
			caller: createModelCaller(settings, callerOptions),
			profiles: settings.profiles,
		})
	}

	get provider(): string {
		return this.options.caller.provider
	}

	get model(): string {
		return this.options.caller.model
	}

	private event(
		fields: Omit<ProgressEvent, "timestamp">,
	): ProgressEvent {
		return Object.freeze({ ...fields, timestamp: this.now().toISOString() })
	}

	private cancelled(
		stage: StageDefinition,
		index: number,
		tracker: ProgressTracker,
	): ProgressEvent {
		return this.event({
			phase: "Cancelled",
			phaseIndex: index,
			stage: stage.id,
			reasoning: `Blueprint generation cancelled before ${stage.name} finished`,
			progress: tracker.progress(),
			status: "cancelled",
		})
	}

	/**
	 * Run all stages, yielding a ProgressEvent at each transition. Resolves to
	 * the assembled blueprint; throws the StageFailure after its error event.
	 */
	async *stream(
		draft: UserInputDraft,
		runOptions: RunOptions = {},
	): AsyncGenerator<ProgressEvent, Blueprint, undefined> {
		const input = validateInput(draft)
		const configuration = resolveConfiguration(input.detailLevel)
		const { signal } = runOptions
		const tracker = new ProgressTracker()
		const outputs: Partial<StageOutputs> = {}
		const ctx: StageRunContext = {
			input,
			configuration,
			outputs,
			caller: this.options.caller,
			profiles: this.options.profiles,
			signal,
		}

		for (const [index, stage] of STAGES.entries()) {
			if (signal?.aborted) {
				yield this.cancelled(stage, index, tracker)
				throw new PipelineCancelled(stage.id)
			}

			tracker.startStage(index)
			yield this.event({
				phase: stage.name,
				phaseIndex: index,
				stage: stage.id,
				reasoning: startMessage(stage.id, ctx),
				progress: tracker.progress(),
				status: "in_progress",
			})

			let completion: StageCompletion
			try {
				completion = await runStage(stage.id, ctx)
			} catch (error) {
				if (signal?.aborted) {
					yield this.cancelled(stage, index, tracker)
					throw new PipelineCancelled(stage.id)
				}
				const failure = toStageFailure(stage.id, error)
				yield this.event({
					phase: "Error",
					phaseIndex: index,
					stage: stage.id,
					reasoning: `An error occurred with ${this.provider.toUpperCase()} provider: ${errorMessage(failure.cause)}`,
					progress: tracker.progress(),
					status: "error",
				})
				throw failure
			}

			deepFreeze(completion.result)
			storeOutput(outputs, completion)
			tracker.completeStage(index)
			yield this.event({
				phase: stage.name,
				phaseIndex: index,
				stage: stage.id,
				reasoning: completion.summary,
				progress: tracker.progress(),
				status: "completed",
				diagram: completion.diagram,
				result: completion.result,
			})
		}

		const blueprint = deepFreeze(
			assembleBlueprint(input, collectOutputs(outputs), {
				id: this.options.createId?.(),
				now: this.now(),
			}),
		)
		yield this.event({
			phase: "Complete",
			phaseIndex: STAGE_COUNT,
			reasoning: COMPLETE_MESSAGE,
			progress: 100,
			status: "completed",
			blueprint,
		})
		return blueprint
	}

	/**
	 * Run to completion, optionally observing each event
	 */
	async run(
		draft: UserInputDraft,
		runOptions: RunOptions & { onEvent?: (event: ProgressEvent) => void } = {},
	): Promise<Blueprint> {
		const events = this.stream(draft, runOptions)
		let step = await events.next()
		while (!step.done) {
			runOptions.onEvent?.(step.value)
			step = await events.next()
		}
		return step.value
	}
}

function toStageFailure(stage: StageId, error: unknown): StageFailure {
	return error instanceof StageFailure ? error : new StageFailure(stage, error)
}
