import type { RunStatus } from "../../core/types.js";

export type RunViewMode = "summary" | "details";

export type HelpTextInput = {
	viewMode: RunViewMode;
	cancelPromptVisible: boolean;
	status: RunStatus;
};

export function formatHelpText({ viewMode, cancelPromptVisible, status }: HelpTextInput): string {
	if (cancelPromptVisible) {
		return "Y: cancel run · N/Esc: continue run";
	}
	const quit = status === "running" || status === "pending" ? "C: cancel run" : "Q: exit";
	if (viewMode === "summary") {
		return `Tab: switch view · D: details · ${quit}`;
	}
	return `Up/Down: select stage · Tab: switch view · S: summary · ${quit}`;
}
