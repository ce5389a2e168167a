import type { ActionContext, ActionResult, StageAction } from "../core/engine.js";
import { ActionFailure, ActionTimeout, RunCanceledError, toStageError } from "../core/errors.js";
import type { StageError, TerminalStageStatus } from "../core/types.js";
import { clampTimerDelay, normalizeAbortReason } from "../utils/abort.js";

export type ExecutionOutcome = {
	status: Extract<TerminalStageStatus, "success" | "failed" | "canceled">;
	error?: StageError;
};

export type ExecuteStageOptions = {
	timeoutMs: number;
	signal: AbortSignal;
	// How long an aborted action may take to wind down before it is abandoned.
	abortGraceMs?: number;
};

const DEFAULT_ABORT_GRACE_MS = 5_000;

type Settled = { type: "result"; result: ActionResult } | { type: "error"; error: unknown };

export async function executeStage(
	action: StageAction,
	context: Omit<ActionContext, "signal">,
	options: ExecuteStageOptions,
): Promise<ExecutionOutcome> {
	const controller = new AbortController();
	const forwardAbort = (): void => {
		controller.abort(new RunCanceledError(normalizeAbortReason(options.signal.reason)));
	};
	if (options.signal.aborted) {
		forwardAbort();
	} else {
		options.signal.addEventListener("abort", forwardAbort, { once: true });
	}
	const timer = setTimeout(() => {
		controller.abort(new ActionTimeout(options.timeoutMs));
	}, clampTimerDelay(options.timeoutMs));

	const running: Promise<Settled> = invoke(action, { ...context, signal: controller.signal });
	try {
		const settled = await Promise.race([running, abortedSignal(controller.signal)]);
		if (controller.signal.aborted) {
			await windDown(running, options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS, context);
			return { status: "canceled", error: toStageError(controller.signal.reason) };
		}
		return toOutcome(settled);
	} finally {
		clearTimeout(timer);
		options.signal.removeEventListener("abort", forwardAbort);
	}
}

async function invoke(action: StageAction, context: ActionContext): Promise<Settled> {
	try {
		return { type: "result", result: await action(context) };
	} catch (error) {
		return { type: "error", error };
	}
}

function abortedSignal(signal: AbortSignal): Promise<null> {
	if (signal.aborted) {
		return Promise.resolve(null);
	}
	return new Promise((resolve) => {
		signal.addEventListener("abort", () => resolve(null), { once: true });
	});
}

async function windDown(
	running: Promise<Settled>,
	graceMs: number,
	context: Omit<ActionContext, "signal">,
): Promise<void> {
	let timer: NodeJS.Timeout | undefined;
	const abandoned = new Promise<"abandoned">((resolve) => {
		timer = setTimeout(() => resolve("abandoned"), graceMs);
	});
	const settled = await Promise.race([running, abandoned]);
	clearTimeout(timer);
	if (settled === "abandoned") {
		context.log(`Stage did not stop within ${graceMs}ms of being aborted; abandoning it.\n`);
	}
}

function toOutcome(settled: Settled | null): ExecutionOutcome {
	if (!settled) {
		return { status: "canceled", error: toStageError(new RunCanceledError()) };
	}
	if (settled.type === "error") {
		return { status: "failed", error: toStageError(settled.error) };
	}
	if (settled.result.ok) {
		return { status: "success" };
	}
	return {
		status: "failed",
		error: toStageError(new ActionFailure(settled.result.message, settled.result.exitCode)),
	};
}
