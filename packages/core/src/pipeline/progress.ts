import { STAGES, type StageDefinition } from "./types"

export type TimelineStatus = "completed" | "in_progress" | "pending"

const MARKERS: Record<TimelineStatus, string> = {
	completed: "✓",
	in_progress: "⋯",
	pending: "○",
}

/**
 * Tracks which stage is active. Stages must start and finish in order.
 */
export class ProgressTracker {
	private current = 0
	private running = false

	constructor(private readonly stages: readonly StageDefinition[] = STAGES) {}

	get currentIndex(): number {
		return this.current
	}

	get isComplete(): boolean {
		return this.current === this.stages.length
	}

	reset(): void {
		this.current = 0
		this.running = false
	}

	startStage(index: number): void {
		if (this.running) {
			throw new Error(
				`Cannot start stage ${index} while stage ${this.current} is running`,
			)
		}
		if (index !== this.current) {
			throw new Error(
				`Stages run in order: expected stage ${this.current}, got ${index}`,
			)
		}
		this.running = true
	}

	completeStage(index: number): void {
		if (!this.running || index !== this.current) {
			throw new Error(`Stage ${index} is not running`)
		}
		this.current = index + 1
		this.running = false
	}

	/** Percentage of stages completed, 0-100 */
	progress(): number {
		return (this.current * 100) / this.stages.length
	}

	stageStatus(index: number): TimelineStatus {
		if (index < this.current) return "completed"
		if (index === this.current) return "in_progress"
		return "pending"
	}

	renderTimeline(): string {
		return this.stages
			.map(
				(stage, index) => `${MARKERS[this.stageStatus(index)]} ${stage.name}`,
			)
			.join("\n")
	}
}
