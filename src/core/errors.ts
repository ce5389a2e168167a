import type { StageError } from "./types.js";

export class DefinitionError extends Error {
	constructor(
		message: string,
		public readonly source?: string,
	) {
		super(source ? `${source}: ${message}` : message);
		this.name = "DefinitionError";
	}
}

export class LockAcquisitionTimeout extends Error {
	constructor(
		public readonly lockName: string,
		public readonly timeoutMs: number,
	) {
		super(`Timed out after ${timeoutMs}ms waiting for lock "${lockName}"`);
		this.name = "LockAcquisitionTimeout";
	}
}

export class ActionFailure extends Error {
	constructor(
		message: string,
		public readonly exitCode?: number,
	) {
		super(message);
		this.name = "ActionFailure";
	}
}

export class ActionTimeout extends Error {
	constructor(public readonly timeoutMs: number) {
		super(`Stage timed out after ${timeoutMs}ms`);
		this.name = "ActionTimeout";
	}
}

export class RunCanceledError extends Error {
	constructor(reason?: string) {
		super(reason ? `Run canceled: ${reason}` : "Run canceled");
		this.name = "RunCanceledError";
	}
}

export function toStageError(error: unknown): StageError {
	if (error instanceof LockAcquisitionTimeout) {
		return { kind: "lock-timeout", message: error.message };
	}
	if (error instanceof ActionTimeout) {
		return { kind: "action-timeout", message: error.message };
	}
	if (error instanceof RunCanceledError) {
		return { kind: "canceled", message: error.message };
	}
	if (error instanceof ActionFailure) {
		return { kind: "action-failure", message: error.message, exitCode: error.exitCode };
	}
	return { kind: "action-failure", message: formatErrorMessage(error) };
}

export function formatErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
