import type { RunEventListener } from "../core/engine.js";
import { DefinitionError } from "../core/errors.js";
import { buildStageGraph } from "../core/graph.js";
import { bindInputs, createRunId } from "../core/plan.js";
import type {
	ParamValue,
	PipelineDefinition,
	RunResult,
	RunStatus,
	StageSpec,
	StageState,
} from "../core/types.js";
import { createCommandAction } from "../actions/command-action.js";
import type { ActionRegistry } from "../actions/registry.js";
import { createActionRegistry, resolveAction } from "../actions/registry.js";
import { MemoryLockBackend } from "../locks/memory-backend.js";
import { MutexManager } from "../locks/mutex-manager.js";
import type { RunStore } from "../store/run-store.js";
import { sanitizePathSegment } from "../utils/path-safety.js";
import { redactParams } from "../utils/redact.js";
import type { StageActionResolution, StageLog } from "./scheduler.js";
import { runScheduler } from "./scheduler.js";
import { bindSubPipelineParams, createSubPipelineAction } from "./sub-pipeline.js";

export const DEFAULT_STAGE_TIMEOUT_MS = 60 * 60_000;
export const DEFAULT_LOCK_TIMEOUT_MS = 30 * 60_000;

export type RunOptions = {
	params?: Record<string, ParamValue>;
	signal?: AbortSignal;
	maxParallel?: number;
	mutex?: MutexManager;
	actions?: ActionRegistry;
	defaultTimeoutMs?: number;
	abortGraceMs?: number;
	cwd?: string;
	secretParams?: string[];
	runStore?: RunStore;
	runId?: string;
	parentRunId?: string;
	onEvent?: RunEventListener;
	onOutput?: (runId: string, stageId: string, chunk: string) => void;
};

// Runs that bring no mutex of their own contend on this one.
const defaultMutex = new MutexManager(new MemoryLockBackend(), {
	defaultTimeoutMs: DEFAULT_LOCK_TIMEOUT_MS,
});

type ResolvedRunOptions = RunOptions & {
	mutex: MutexManager;
	actions: ActionRegistry;
	secretParams: string[];
};

/**
 * Runs a pipeline to completion and reports every stage's terminal state.
 *
 * Definition problems (cycles, dangling references, unknown actions, missing
 * required inputs) throw `DefinitionError` before any stage is dispatched.
 * Stage failures never throw; they show up in the result.
 */
export async function runPipeline(
	definition: PipelineDefinition,
	options: RunOptions = {},
): Promise<RunResult> {
	const resolved: ResolvedRunOptions = {
		...options,
		mutex: options.mutex ?? defaultMutex,
		actions: options.actions ?? createActionRegistry(),
		secretParams: options.secretParams ?? [],
	};
	if (resolved.maxParallel !== undefined && (!Number.isInteger(resolved.maxParallel) || resolved.maxParallel < 1)) {
		throw new Error(`maxParallel must be a positive integer, received ${resolved.maxParallel}`);
	}
	validateActions(definition, resolved.actions, new Set());
	return runValidated(definition, resolved);
}

async function runValidated(
	definition: PipelineDefinition,
	options: ResolvedRunOptions,
): Promise<RunResult> {
	const graph = buildStageGraph(definition);
	const params = bindInputs(definition, options.params ?? {});
	const runId = options.runId ?? createRunId();
	const signal = options.signal ?? new AbortController().signal;
	const startedAt = new Date().toISOString();
	const logDir = options.runStore?.createLogsDir(runId);
	const emit: RunEventListener = (event) => options.onEvent?.(event);

	emit({
		type: "run-started",
		runId,
		parentRunId: options.parentRunId,
		pipelineId: definition.id,
		pipelineName: definition.name,
		params: redactParams(params, options.secretParams),
		stages: definition.stages.map((stage) => ({ stageId: stage.id, needs: stage.needs })),
		logDir,
		createdAt: startedAt,
	});

	const resolveStageAction = (stage: StageSpec, state: StageState): StageActionResolution => {
		if (stage.body.kind === "pipeline") {
			const subRunId = `${runId}.${sanitizePathSegment(stage.id, "stage")}`;
			const action = createSubPipelineAction(
				stage.body.definition,
				stage.with,
				(request) =>
					runValidated(request.definition, {
						...options,
						params: request.bindings,
						signal: request.signal,
						runId: subRunId,
						parentRunId: runId,
					}),
				(result) => {
					state.subRun = result;
				},
			);
			return { action, params, subRunId };
		}

		const stageParams = Object.freeze({ ...params, ...bindSubPipelineParams(stage.with, params) });
		const action =
			stage.body.kind === "command"
				? createCommandAction(stage.body.command)
				: resolveAction(options.actions, stage.body.ref);
		return { action, params: stageParams };
	};

	const openLog = (stageId: string): StageLog => {
		const onChunk = options.onOutput
			? (chunk: string) => options.onOutput?.(runId, stageId, chunk)
			: undefined;
		if (options.runStore) {
			return options.runStore.openStageLog(runId, stageId, onChunk);
		}
		return {
			write: (chunk) => onChunk?.(chunk),
			close: async () => undefined,
		};
	};

	const { states, canceled } = await runScheduler({
		runId,
		graph,
		params,
		signal,
		mutex: options.mutex,
		defaultTimeoutMs: options.defaultTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS,
		abortGraceMs: options.abortGraceMs,
		maxParallel: options.maxParallel,
		cwd: options.cwd ?? process.cwd(),
		secretParams: options.secretParams,
		resolveAction: resolveStageAction,
		openLog,
		emit,
	});

	const status = aggregateRunStatus(states, canceled);
	const finishedAt = new Date().toISOString();
	emit({ type: "run-finished", runId, status, finishedAt });

	return {
		runId,
		pipelineId: definition.id,
		pipelineName: definition.name,
		params,
		status,
		startedAt,
		finishedAt,
		stages: states,
	};
}

export function aggregateRunStatus(
	states: StageState[],
	canceled: boolean,
): Extract<RunStatus, "success" | "failed" | "canceled"> {
	if (states.every((state) => state.status === "success" || state.status === "skipped")) {
		return "success";
	}
	if (states.some((state) => state.status === "failed")) {
		return "failed";
	}
	// A stage that hit its own timeout is canceled, but the run was not.
	return canceled ? "canceled" : "failed";
}

export function exitCodeForStatus(status: RunResult["status"]): number {
	switch (status) {
		case "success":
			return 0;
		case "canceled":
			return 130;
		default:
			return 1;
	}
}

function validateActions(
	definition: PipelineDefinition,
	actions: ActionRegistry,
	visited: Set<string>,
): void {
	if (visited.has(definition.id)) {
		return;
	}
	visited.add(definition.id);
	for (const stage of definition.stages) {
		if (stage.body.kind === "action" && !actions.has(stage.body.ref)) {
			throw new DefinitionError(
				`Stage "${stage.id}" uses unknown action "${stage.body.ref}"`,
				definition.path ?? definition.name,
			);
		}
		if (stage.body.kind === "pipeline") {
			validateActions(stage.body.definition, actions, visited);
		}
	}
}
