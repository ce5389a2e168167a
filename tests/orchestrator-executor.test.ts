import { describe, expect, it } from "vitest";
import type { StageAction } from "../src/core/engine.js";
import { executeStage } from "../src/orchestrator/executor.js";

function context(log: string[] = []) {
	return {
		runId: "run-1",
		stageId: "stage",
		params: {},
		cwd: process.cwd(),
		secretParams: [],
		log: (chunk: string) => {
			log.push(chunk);
		},
	};
}

function waitForAbort(signal: AbortSignal): Promise<void> {
	return new Promise((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
}

describe("stage executor", () => {
	it("reports success", async () => {
		const outcome = await executeStage(async () => ({ ok: true }), context(), {
			timeoutMs: 1_000,
			signal: new AbortController().signal,
		});
		expect(outcome).toEqual({ status: "success" });
	});

	it("turns a failed result into an action failure", async () => {
		const outcome = await executeStage(async () => ({ ok: false, message: "boom", exitCode: 3 }), context(), {
			timeoutMs: 1_000,
			signal: new AbortController().signal,
		});
		expect(outcome).toEqual({
			status: "failed",
			error: { kind: "action-failure", message: "boom", exitCode: 3 },
		});
	});

	it("turns a thrown error into an action failure", async () => {
		const action: StageAction = async () => {
			throw new Error("kaput");
		};
		const outcome = await executeStage(action, context(), {
			timeoutMs: 1_000,
			signal: new AbortController().signal,
		});
		expect(outcome).toEqual({ status: "failed", error: { kind: "action-failure", message: "kaput" } });
	});

	it("cancels a stage that exceeds its timeout", async () => {
		let sawAbort = false;
		const action: StageAction = async ({ signal }) => {
			await waitForAbort(signal);
			sawAbort = true;
			return { ok: false, message: "stopped" };
		};
		const outcome = await executeStage(action, context(), {
			timeoutMs: 20,
			signal: new AbortController().signal,
		});
		expect(outcome).toEqual({
			status: "canceled",
			error: { kind: "action-timeout", message: "Stage timed out after 20ms" },
		});
		expect(sawAbort).toBe(true);
	});

	it("forwards run cancellation to the action", async () => {
		const controller = new AbortController();
		const action: StageAction = async ({ signal }) => {
			await waitForAbort(signal);
			return { ok: true };
		};
		setTimeout(() => controller.abort("user request"), 10);
		const outcome = await executeStage(action, context(), { timeoutMs: 5_000, signal: controller.signal });
		expect(outcome).toEqual({
			status: "canceled",
			error: { kind: "canceled", message: "Run canceled: user request" },
		});
	});

	it("abandons an action that ignores the abort after the grace period", async () => {
		const log: string[] = [];
		const outcome = await executeStage(() => new Promise(() => undefined), context(log), {
			timeoutMs: 10,
			signal: new AbortController().signal,
			abortGraceMs: 10,
		});
		expect(outcome.status).toBe("canceled");
		expect(log).toEqual(["Stage did not stop within 10ms of being aborted; abandoning it.\n"]);
	});
});
