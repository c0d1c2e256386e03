import { describe, expect, test } from "vitest"
import { ProgressTracker } from "./progress"

describe("ProgressTracker", () => {
	test("starts at zero with the first stage in progress", () => {
		const tracker = new ProgressTracker()

		expect(tracker.progress()).toBe(0)
		expect(tracker.stageStatus(0)).toBe("in_progress")
		expect(tracker.stageStatus(1)).toBe("pending")
	})

	test("progress follows completed stages", () => {
		const tracker = new ProgressTracker()
		tracker.startStage(0)
		expect(tracker.progress()).toBe(0)
		tracker.completeStage(0)
		expect(tracker.progress()).toBe(20)
		tracker.startStage(1)
		tracker.completeStage(1)
		tracker.startStage(2)

		expect(tracker.progress()).toBe(40)
		expect(tracker.stageStatus(0)).toBe("completed")
		expect(tracker.stageStatus(1)).toBe("completed")
		expect(tracker.stageStatus(2)).toBe("in_progress")
		expect(tracker.stageStatus(4)).toBe("pending")
	})

	test("reaches 100 after the last stage", () => {
		const tracker = new ProgressTracker()
		for (let i = 0; i < 5; i++) {
			tracker.startStage(i)
			tracker.completeStage(i)
		}

		expect(tracker.progress()).toBe(100)
		expect(tracker.isComplete).toBe(true)
	})

	test("renders a timeline with status markers", () => {
		const tracker = new ProgressTracker()
		tracker.startStage(0)
		tracker.completeStage(0)
		tracker.startStage(1)

		expect(tracker.renderTimeline()).toBe(
			[
				"✓ Requirements Analysis",
				"⋯ Database Schema",
				"○ API Design",
				"○ Frontend Architecture",
				"○ Deployment Plan",
			].join("\n"),
		)
	})

	test("rejects out-of-order and repeated starts", () => {
		const tracker = new ProgressTracker()

		expect(() => tracker.startStage(1)).toThrow("expected stage 0, got 1")
		tracker.startStage(0)
		expect(() => tracker.startStage(0)).toThrow("while stage 0 is running")
		tracker.completeStage(0)
		expect(() => tracker.startStage(0)).toThrow("expected stage 1, got 0")
	})

	test("reset clears state from a previous run", () => {
		const tracker = new ProgressTracker()
		tracker.startStage(0)
		tracker.completeStage(0)
		tracker.startStage(1)
		tracker.reset()

		expect(tracker.currentIndex).toBe(0)
		expect(tracker.progress()).toBe(0)
		expect(() => tracker.startStage(0)).not.toThrow()
	})
})
