import type { RunStatus, StageStatus } from "../../core/types.js";
import { SPINNER_FRAMES } from "./constants.js";

export const RUN_STATUS_LABELS: Record<RunStatus, string> = {
	pending: "queued",
	running: "running",
	success: "success",
	failed: "failed",
	canceled: "canceled",
};

export const STAGE_STATUS_LABELS: Record<StageStatus, string> = {
	blocked: "blocked",
	ready: "ready",
	running: "running",
	success: "success",
	failed: "failed",
	canceled: "canceled",
	skipped: "skipped",
	"upstream-failed": "upstream failed",
};

export function stageGlyph(status: StageStatus, spinnerIndex: number, waitingOnLock = false): string {
	switch (status) {
		case "success":
			return "●";
		case "failed":
			return "✕";
		case "running":
			return waitingOnLock ? "⧗" : (SPINNER_FRAMES[spinnerIndex] ?? "⠋");
		case "canceled":
			return "◌";
		case "skipped":
			return "⊘";
		case "upstream-failed":
			return "↯";
		case "ready":
			return "◎";
		default:
			return "○";
	}
}

export function runGlyph(status: RunStatus, spinnerIndex: number): string {
	switch (status) {
		case "success":
			return "●";
		case "failed":
			return "✕";
		case "running":
			return SPINNER_FRAMES[spinnerIndex] ?? "⠋";
		case "canceled":
			return "◌";
		default:
			return "○";
	}
}

export type StatusColor = "green" | "red" | "yellow" | "gray" | "cyan" | undefined;

export function colorForStage(status: StageStatus): StatusColor {
	switch (status) {
		case "success":
			return "green";
		case "failed":
		case "upstream-failed":
			return "red";
		case "running":
			return "yellow";
		case "ready":
			return "cyan";
		case "canceled":
		case "skipped":
			return "gray";
		default:
			return undefined;
	}
}

export function colorForRun(status: RunStatus): StatusColor {
	switch (status) {
		case "success":
			return "green";
		case "failed":
			return "red";
		case "running":
			return "yellow";
		case "canceled":
			return "gray";
		default:
			return undefined;
	}
}
