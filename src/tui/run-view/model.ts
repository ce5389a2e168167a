import type { RunEvent } from "../../core/engine.js";
import type { StageGraph } from "../../core/graph.js";
import { computeDepths } from "../../core/graph.js";
import type { RunStatus, StageStatus } from "../../core/types.js";
import { MAX_BUFFERED_LINES } from "./constants.js";

export type StageView = {
	stageId: string;
	name: string;
	depth: number;
	status: StageStatus;
	durationMs?: number;
	waitingOnLock?: string;
	subRunId?: string;
	error?: string;
};

export type RunViewState = {
	runId?: string;
	status: RunStatus;
	stages: StageView[];
	output: Record<string, string[]>;
};

export function createRunViewState(graph: StageGraph): RunViewState {
	const depths = computeDepths(graph);
	return {
		status: "pending",
		stages: graph.nodes.map((node): StageView => ({
			stageId: node.spec.id,
			name: node.spec.name,
			depth: depths[node.index],
			status: "blocked",
		})),
		output: {},
	};
}

/**
 * Folds one event into the view. Only events of the root run are applied;
 * sub-runs show up through their parent stage.
 */
export function applyRunEvent(state: RunViewState, event: RunEvent): RunViewState {
	if (event.type === "run-started") {
		if (event.parentRunId || state.runId) {
			return state;
		}
		return { ...state, runId: event.runId, status: "running" };
	}
	if (event.runId !== state.runId) {
		return state;
	}

	switch (event.type) {
		case "stage-status":
			return updateStage(state, event.stageId, {
				status: event.status,
				waitingOnLock: undefined,
				error: event.error?.message,
			});
		case "stage-started":
			return updateStage(state, event.stageId, { status: "running", subRunId: event.subRunId });
		case "lock-waiting":
			return updateStage(state, event.stageId, { waitingOnLock: event.lockName });
		case "lock-acquired":
			return updateStage(state, event.stageId, { waitingOnLock: undefined });
		case "stage-finished":
			return updateStage(state, event.stageId, {
				status: event.status,
				durationMs: event.durationMs,
				waitingOnLock: undefined,
				error: event.error?.message,
			});
		case "run-finished":
			return { ...state, status: event.status };
		default:
			return state;
	}
}

export function appendStageOutput(
	state: RunViewState,
	stageId: string,
	chunk: string,
): RunViewState {
	const current = state.output[stageId] ?? [];
	const pieces = chunk.split(/\r?\n/);
	const lines = [...current];
	const first = pieces.shift() ?? "";
	if (lines.length > 0) {
		lines[lines.length - 1] += first;
	} else {
		lines.push(first);
	}
	lines.push(...pieces);
	return {
		...state,
		output: { ...state.output, [stageId]: lines.slice(-MAX_BUFFERED_LINES) },
	};
}

/**
 * Maps output of the root run or one of its sub-runs to the root stage that
 * produced it.
 */
export function resolveOutputStage(
	state: RunViewState,
	runId: string,
	stageId: string,
): string | undefined {
	if (runId === state.runId) {
		return stageId;
	}
	const owner = state.stages.find(
		(stage) =>
			stage.subRunId !== undefined &&
			(runId === stage.subRunId || runId.startsWith(`${stage.subRunId}.`)),
	);
	return owner?.stageId;
}

function updateStage(state: RunViewState, stageId: string, patch: Partial<StageView>): RunViewState {
	return {
		...state,
		stages: state.stages.map((stage) => (stage.stageId === stageId ? { ...stage, ...patch } : stage)),
	};
}
