export type ParamValue = string | number | boolean;

export type RunParameters = Readonly<Record<string, ParamValue>>;

export type StageCondition = {
	source: string;
	evaluate: (params: RunParameters) => boolean;
};

export type LockSpec = {
	name: string;
	timeoutMs?: number;
};

export type StageBody =
	| { kind: "command"; command: string }
	| { kind: "action"; ref: string }
	| { kind: "pipeline"; definition: PipelineDefinition };

export type StageSpec = {
	id: string;
	name: string;
	needs: string[];
	body: StageBody;
	with: Record<string, ParamValue>;
	if?: StageCondition;
	lock?: LockSpec;
	timeoutMs?: number;
};

export type InputSpec = {
	required: boolean;
	default?: ParamValue;
};

export type PipelineDefinition = {
	id: string;
	name: string;
	path?: string;
	inputs: Record<string, InputSpec>;
	stages: StageSpec[];
};

export type RunStatus = "pending" | "running" | "success" | "failed" | "canceled";

// "skipped" is a false condition; "upstream-failed" is a skip caused by a
// predecessor that did not succeed.
export type StageStatus =
	| "blocked"
	| "ready"
	| "running"
	| "success"
	| "failed"
	| "canceled"
	| "skipped"
	| "upstream-failed";

export type TerminalStageStatus = Extract<
	StageStatus,
	"success" | "failed" | "canceled" | "skipped" | "upstream-failed"
>;

export type StageErrorKind =
	| "action-failure"
	| "action-timeout"
	| "lock-timeout"
	| "upstream-failure"
	| "canceled";

export type StageError = {
	kind: StageErrorKind;
	message: string;
	exitCode?: number;
};

export type StageState = {
	stageId: string;
	status: StageStatus;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
	error?: StageError;
	logPath?: string;
	subRun?: RunResult;
};

export type RunResult = {
	runId: string;
	pipelineId: string;
	pipelineName: string;
	params: RunParameters;
	status: Extract<RunStatus, "success" | "failed" | "canceled">;
	startedAt: string;
	finishedAt: string;
	stages: StageState[];
};

export type StageRun = {
	stageId: string;
	status: StageStatus;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
	error?: StageError;
	logPath?: string;
	subRunId?: string;
};

export type RunRecord = {
	schemaVersion?: number;
	id: string;
	pipelineId: string;
	pipelineName: string;
	parentRunId?: string;
	params: Record<string, ParamValue>;
	status: RunStatus;
	createdAt: string;
	finishedAt?: string;
	stages: StageRun[];
	logDir?: string;
};
