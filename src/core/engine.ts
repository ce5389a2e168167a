import type {
	ParamValue,
	RunParameters,
	RunStatus,
	StageError,
	StageStatus,
	TerminalStageStatus,
} from "./types.js";

export type ActionResult = { ok: true } | { ok: false; message: string; exitCode?: number };

export type ActionContext = {
	runId: string;
	stageId: string;
	params: RunParameters;
	signal: AbortSignal;
	cwd: string;
	secretParams: string[];
	log: (chunk: string) => void;
};

export type StageAction = (context: ActionContext) => Promise<ActionResult>;

export type RunEvent =
	| {
			type: "run-started";
			runId: string;
			parentRunId?: string;
			pipelineId: string;
			pipelineName: string;
			params: Record<string, ParamValue>;
			stages: { stageId: string; needs: string[] }[];
			logDir?: string;
			createdAt: string;
	  }
	| {
			type: "stage-status";
			runId: string;
			stageId: string;
			status: Exclude<StageStatus, "blocked" | "running">;
			at: string;
			error?: StageError;
	  }
	| {
			type: "lock-waiting";
			runId: string;
			stageId: string;
			lockName: string;
			at: string;
	  }
	| {
			type: "lock-acquired";
			runId: string;
			stageId: string;
			lockName: string;
			at: string;
	  }
	| {
			type: "lock-released";
			runId: string;
			stageId: string;
			lockName: string;
			at: string;
	  }
	| {
			type: "stage-started";
			runId: string;
			stageId: string;
			startedAt: string;
			logPath?: string;
			subRunId?: string;
	  }
	| {
			type: "stage-finished";
			runId: string;
			stageId: string;
			status: Extract<TerminalStageStatus, "success" | "failed" | "canceled">;
			startedAt?: string;
			finishedAt: string;
			durationMs: number;
			error?: StageError;
	  }
	| {
			type: "run-finished";
			runId: string;
			status: Extract<RunStatus, "success" | "failed" | "canceled">;
			finishedAt: string;
	  };

export type RunEventListener = (event: RunEvent) => void;
