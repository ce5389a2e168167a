import fs from "node:fs";
import path from "node:path";
import type { RunEvent } from "../core/engine.js";
import type { RunRecord } from "../core/types.js";
import type { StageLog } from "../orchestrator/scheduler.js";
import { ensureWithinBase, hashedFileName } from "../utils/path-safety.js";

export const RUN_RECORD_SCHEMA_VERSION = 1;

export class RunStore {
	constructor(private readonly baseDir: string) {}

	get base(): string {
		return this.baseDir;
	}

	ensureBaseDir(): void {
		fs.mkdirSync(this.baseDir, { recursive: true });
	}

	createRunDir(runId: string): string {
		this.ensureBaseDir();
		const runDir = ensureWithinBase(this.baseDir, runId, "run id");
		fs.mkdirSync(runDir, { recursive: true });
		return runDir;
	}

	createLogsDir(runId: string): string {
		const runDir = this.createRunDir(runId);
		const logsDir = path.join(runDir, "logs");
		fs.mkdirSync(logsDir, { recursive: true });
		return logsDir;
	}

	createLogFile(runId: string, stageId: string): string {
		const logsDir = this.createLogsDir(runId);
		return ensureWithinBase(logsDir, getStageLogFileName(stageId), "stage log file");
	}

	openStageLog(runId: string, stageId: string, onChunk?: (chunk: string) => void): StageLog {
		const logPath = this.createLogFile(runId, stageId);
		const stream = fs.createWriteStream(logPath, { flags: "a" });
		let streamError: Error | null = null;
		stream.on("error", (error: Error) => {
			streamError = error;
		});

		return {
			path: logPath,
			write: (chunk) => {
				stream.write(chunk);
				onChunk?.(chunk);
			},
			close: () =>
				new Promise<void>((resolve, reject) => {
					if (streamError) {
						reject(streamError);
						return;
					}
					stream.once("error", reject);
					stream.end(() => resolve());
				}),
		};
	}

	writeRun(run: RunRecord): void {
		const runDir = this.createRunDir(run.id);
		const recordPath = path.join(runDir, "run.json");
		fs.writeFileSync(recordPath, JSON.stringify(run, null, 2));
	}

	readRun(runId: string): RunRecord | null {
		const recordPath = path.join(ensureWithinBase(this.baseDir, runId, "run id"), "run.json");
		if (!fs.existsSync(recordPath)) {
			return null;
		}
		return JSON.parse(fs.readFileSync(recordPath, "utf-8")) as RunRecord;
	}
}

export function getStageLogFileName(stageId: string): string {
	return hashedFileName(stageId, "stage", ".log");
}

export function createRunEventPersister(runStore: RunStore): (event: RunEvent) => void {
	const runs = new Map<string, RunRecord>();

	return (event) => {
		if (event.type === "run-started") {
			const run: RunRecord = {
				schemaVersion: RUN_RECORD_SCHEMA_VERSION,
				id: event.runId,
				pipelineId: event.pipelineId,
				pipelineName: event.pipelineName,
				parentRunId: event.parentRunId,
				params: event.params,
				status: "running",
				createdAt: event.createdAt,
				stages: event.stages.map((stage) => ({
					stageId: stage.stageId,
					status: "blocked",
				})),
				logDir: event.logDir,
			};
			runs.set(run.id, run);
			runStore.writeRun(run);
			return;
		}

		const run = runs.get(event.runId);
		if (!run) {
			return;
		}

		switch (event.type) {
			case "stage-status": {
				const stage = run.stages.find((item) => item.stageId === event.stageId);
				if (!stage) {
					return;
				}
				stage.status = event.status;
				stage.error = event.error;
				if (event.status !== "ready") {
					stage.finishedAt = event.at;
				}
				break;
			}
			case "stage-started": {
				const stage = run.stages.find((item) => item.stageId === event.stageId);
				if (!stage) {
					return;
				}
				stage.status = "running";
				stage.startedAt = event.startedAt;
				stage.logPath = event.logPath;
				stage.subRunId = event.subRunId;
				break;
			}
			case "stage-finished": {
				const stage = run.stages.find((item) => item.stageId === event.stageId);
				if (!stage) {
					return;
				}
				stage.status = event.status;
				stage.startedAt = event.startedAt;
				stage.finishedAt = event.finishedAt;
				stage.durationMs = event.durationMs;
				stage.error = event.error;
				break;
			}
			case "run-finished":
				run.status = event.status;
				run.finishedAt = event.finishedAt;
				runStore.writeRun(run);
				runs.delete(run.id);
				return;
			default:
				return;
		}
		runStore.writeRun(run);
	};
}
