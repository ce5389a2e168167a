import type { RunEventListener, StageAction } from "../core/engine.js";
import { RunCanceledError, formatErrorMessage, toStageError } from "../core/errors.js";
import type { StageGraph } from "../core/graph.js";
import type {
	RunParameters,
	StageError,
	StageSpec,
	StageState,
	StageStatus,
	TerminalStageStatus,
} from "../core/types.js";
import type { LockToken, MutexManager } from "../locks/mutex-manager.js";
import { normalizeAbortReason } from "../utils/abort.js";
import type { ExecutionOutcome } from "./executor.js";
import { executeStage } from "./executor.js";

export type StageLog = {
	path?: string;
	write: (chunk: string) => void;
	close: () => Promise<void>;
};

export type StageActionResolution = {
	action: StageAction;
	params: RunParameters;
	subRunId?: string;
};

export type SchedulerOptions = {
	runId: string;
	graph: StageGraph;
	params: RunParameters;
	signal: AbortSignal;
	mutex: MutexManager;
	defaultTimeoutMs: number;
	abortGraceMs?: number;
	maxParallel?: number;
	cwd: string;
	secretParams: string[];
	resolveAction: (stage: StageSpec, state: StageState) => StageActionResolution;
	openLog: (stageId: string) => StageLog;
	emit: RunEventListener;
};

export type SchedulerResult = {
	states: StageState[];
	canceled: boolean;
};

const SATISFIED: ReadonlySet<StageStatus> = new Set<StageStatus>(["success", "skipped"]);
const TERMINAL: ReadonlySet<StageStatus> = new Set<StageStatus>([
	"success",
	"failed",
	"canceled",
	"skipped",
	"upstream-failed",
]);

/**
 * Walks the stage graph until every stage is terminal.
 *
 * Ready stages are dispatched together, up to `maxParallel`. A stage whose
 * predecessors all succeeded (or were skipped) runs unless its condition is
 * false; any other terminal predecessor marks it upstream-failed without
 * running it.
 */
export function runScheduler(options: SchedulerOptions): Promise<SchedulerResult> {
	const { graph, runId, emit } = options;
	const states: StageState[] = graph.nodes.map((node) => ({
		stageId: node.spec.id,
		status: "blocked",
	}));
	const waitingOn = graph.nodes.map((node) => node.predecessors.length);
	const readyQueue: number[] = [];
	let running = 0;
	let canceled = options.signal.aborted;

	return new Promise((resolve) => {
		let finished = false;

		const finish = (): void => {
			if (finished) {
				return;
			}
			finished = true;
			options.signal.removeEventListener("abort", onAbort);
			resolve({ states, canceled });
		};

		const settle = (
			index: number,
			status: TerminalStageStatus,
			error?: StageError,
			announce = true,
		): void => {
			const state = states[index];
			state.status = status;
			state.error = error;
			if (announce) {
				state.finishedAt ??= new Date().toISOString();
				emit({
					type: "stage-status",
					runId,
					stageId: state.stageId,
					status,
					at: state.finishedAt,
					error,
				});
			}
			for (const successor of graph.nodes[index].successors) {
				waitingOn[successor] -= 1;
				if (waitingOn[successor] === 0) {
					evaluate(successor);
				}
			}
		};

		const evaluate = (index: number): void => {
			const node = graph.nodes[index];
			const blockedBy = node.predecessors.find(
				(predecessor) => !SATISFIED.has(states[predecessor].status),
			);
			if (blockedBy !== undefined) {
				settle(index, "upstream-failed", {
					kind: "upstream-failure",
					message: `Upstream stage "${states[blockedBy].stageId}" ${states[blockedBy].status}`,
				});
				return;
			}
			if (canceled) {
				settle(index, "canceled", cancelError());
				return;
			}
			if (node.spec.if) {
				let enabled: boolean;
				try {
					enabled = node.spec.if.evaluate(options.params);
				} catch (error) {
					settle(index, "failed", {
						kind: "action-failure",
						message: `Condition "${node.spec.if.source}" failed: ${formatErrorMessage(error)}`,
					});
					return;
				}
				if (!enabled) {
					settle(index, "skipped");
					return;
				}
			}
			states[index].status = "ready";
			emit({
				type: "stage-status",
				runId,
				stageId: node.spec.id,
				status: "ready",
				at: new Date().toISOString(),
			});
			readyQueue.push(index);
		};

		const dispatch = (): void => {
			while (
				readyQueue.length > 0 &&
				(options.maxParallel === undefined || running < options.maxParallel)
			) {
				const index = readyQueue.shift();
				if (index === undefined) {
					break;
				}
				running += 1;
				void runStage(index).then(
					(outcome) => {
						running -= 1;
						settle(index, outcome.status, outcome.error, false);
						dispatch();
					},
					(error: unknown) => {
						running -= 1;
						settle(index, "failed", toStageError(error));
						dispatch();
					},
				);
			}
			if (running === 0 && readyQueue.length === 0 && states.every((s) => TERMINAL.has(s.status))) {
				finish();
			}
		};

		const cancelError = (): StageError =>
			toStageError(new RunCanceledError(normalizeAbortReason(options.signal.reason)));

		const onAbort = (): void => {
			canceled = true;
			const pending = readyQueue.splice(0, readyQueue.length);
			for (const index of pending) {
				settle(index, "canceled", cancelError());
			}
			dispatch();
		};

		const runStage = async (index: number): Promise<ExecutionOutcome> => {
			const stage = graph.nodes[index].spec;
			const state = states[index];
			const startedAt = new Date().toISOString();
			state.status = "running";
			state.startedAt = startedAt;
			const log = options.openLog(stage.id);
			state.logPath = log.path;

			let outcome: ExecutionOutcome;
			try {
				const resolved = options.resolveAction(stage, state);
				emit({
					type: "stage-started",
					runId,
					stageId: stage.id,
					startedAt,
					logPath: log.path,
					subRunId: resolved.subRunId,
				});
				outcome = await runWithLock(stage, resolved, log);
			} catch (error) {
				outcome = { status: "failed", error: toStageError(error) };
			}

			try {
				await log.close();
			} catch (error) {
				if (outcome.status === "success") {
					outcome = {
						status: "failed",
						error: { kind: "action-failure", message: `Failed to close stage log: ${formatErrorMessage(error)}` },
					};
				}
			}

			const finishedAt = new Date().toISOString();
			state.finishedAt = finishedAt;
			state.durationMs = Date.parse(finishedAt) - Date.parse(startedAt);
			emit({
				type: "stage-finished",
				runId,
				stageId: stage.id,
				status: outcome.status,
				startedAt,
				finishedAt,
				durationMs: state.durationMs,
				error: outcome.error,
			});
			return outcome;
		};

		const runWithLock = async (
			stage: StageSpec,
			resolved: StageActionResolution,
			log: StageLog,
		): Promise<ExecutionOutcome> => {
			let token: LockToken | undefined;
			let outcome: ExecutionOutcome;
			try {
				if (stage.lock) {
					emit({
						type: "lock-waiting",
						runId,
						stageId: stage.id,
						lockName: stage.lock.name,
						at: new Date().toISOString(),
					});
					token = await options.mutex.acquire(
						stage.lock.name,
						{ runId, stageId: stage.id },
						stage.lock.timeoutMs,
						options.signal,
					);
					emit({
						type: "lock-acquired",
						runId,
						stageId: stage.id,
						lockName: stage.lock.name,
						at: token.acquiredAt,
					});
				}
				outcome = await executeStage(
					resolved.action,
					{
						runId,
						stageId: stage.id,
						params: resolved.params,
						cwd: options.cwd,
						secretParams: options.secretParams,
						log: log.write,
					},
					{
						timeoutMs: stage.timeoutMs ?? options.defaultTimeoutMs,
						signal: options.signal,
						abortGraceMs: options.abortGraceMs,
					},
				);
			} catch (error) {
				outcome = {
					status: error instanceof RunCanceledError ? "canceled" : "failed",
					error: toStageError(error),
				};
			}

			if (token) {
				try {
					await options.mutex.release(token);
					emit({
						type: "lock-released",
						runId,
						stageId: stage.id,
						lockName: token.name,
						at: new Date().toISOString(),
					});
				} catch (error) {
					outcome = {
						status: "failed",
						error: {
							kind: "action-failure",
							message: `Failed to release lock "${token.name}": ${formatErrorMessage(error)}`,
						},
					};
				}
			}
			return outcome;
		};

		if (!canceled) {
			options.signal.addEventListener("abort", onAbort, { once: true });
		}
		for (const index of graph.order) {
			if (graph.nodes[index].predecessors.length === 0) {
				evaluate(index);
			}
		}
		dispatch();
	});
}
