import type { RunEvent } from "../core/engine.js";
import type { PipelineDefinition, RunResult, StageState } from "../core/types.js";
import { formatDuration } from "../tui/run-view/format.js";

export type StageSummary = {
	stageId: string;
	status: StageState["status"];
	durationMs?: number;
	error?: string;
	exitCode?: number;
	logPath?: string;
	subRun?: RunSummary;
};

export type RunSummary = {
	runId: string;
	pipeline: { id: string; name: string; path?: string };
	status: RunResult["status"];
	startedAt: string;
	finishedAt: string;
	stages: StageSummary[];
	logsDir?: string;
};

export function buildJsonSummary(
	result: RunResult,
	definition: PipelineDefinition,
	logsDir?: string,
): RunSummary {
	return {
		runId: result.runId,
		pipeline: { id: definition.id, name: definition.name, path: definition.path },
		status: result.status,
		startedAt: result.startedAt,
		finishedAt: result.finishedAt,
		stages: result.stages.map((stage) => ({
			stageId: stage.stageId,
			status: stage.status,
			durationMs: stage.durationMs,
			error: stage.error?.message,
			exitCode: stage.error?.exitCode,
			logPath: stage.logPath,
			subRun: stage.subRun && subPipelineSummary(stage.subRun, definition, stage.stageId),
		})),
		logsDir,
	};
}

function subPipelineSummary(
	result: RunResult,
	parent: PipelineDefinition,
	stageId: string,
): RunSummary | undefined {
	const stage = parent.stages.find((item) => item.id === stageId);
	if (stage?.body.kind !== "pipeline") {
		return undefined;
	}
	return buildJsonSummary(result, stage.body.definition);
}

export function formatStageResult(stage: StageState, indent = "  "): string[] {
	const duration = stage.durationMs !== undefined ? ` (${formatDuration(stage.durationMs)})` : "";
	const error = stage.error ? `: ${stage.error.message}` : "";
	const lines = [`${indent}${stage.stageId} ${stage.status}${duration}${error}`];
	for (const child of stage.subRun?.stages ?? []) {
		lines.push(...formatStageResult(child, `${indent}  `));
	}
	return lines;
}

/**
 * Formats a run event as one progress line for non-interactive output.
 * Events of sub-runs are labelled with their path below the root run.
 */
export function createEventLineFormatter(): (event: RunEvent) => string | undefined {
	let rootRunId: string | undefined;

	const label = (runId: string, stageId: string): string => {
		if (!rootRunId || runId === rootRunId || !runId.startsWith(`${rootRunId}.`)) {
			return stageId;
		}
		return `${runId.slice(rootRunId.length + 1).split(".").join("/")}/${stageId}`;
	};

	return (event) => {
		switch (event.type) {
			case "run-started":
				if (!rootRunId) {
					rootRunId = event.runId;
					return `Running ${event.pipelineName} (${event.stages.length} stage(s), run ${event.runId})`;
				}
				return undefined;
			case "stage-started":
				return `[${label(event.runId, event.stageId)}] started`;
			case "lock-waiting":
				return `[${label(event.runId, event.stageId)}] waiting for lock "${event.lockName}"`;
			case "lock-acquired":
				return `[${label(event.runId, event.stageId)}] acquired lock "${event.lockName}"`;
			case "stage-finished": {
				const error = event.error ? `: ${event.error.message}` : "";
				return `[${label(event.runId, event.stageId)}] ${event.status} (${formatDuration(event.durationMs)})${error}`;
			}
			case "stage-status":
				if (event.status === "skipped" || event.status === "upstream-failed") {
					return `[${label(event.runId, event.stageId)}] ${event.status}`;
				}
				if (event.status === "failed" || event.status === "canceled") {
					// Failed conditions and canceled queued stages never start.
					const error = event.error ? `: ${event.error.message}` : "";
					return `[${label(event.runId, event.stageId)}] ${event.status}${error}`;
				}
				return undefined;
			case "run-finished":
				return event.runId === rootRunId ? `Finished ${event.status}` : undefined;
			default:
				return undefined;
		}
	};
}
