import { describe, expect, it } from "vitest";
import { formatHelpText } from "../src/tui/run-view/help.js";

describe("run view help text", () => {
	it("offers cancel while the run is active", () => {
		expect(formatHelpText({ viewMode: "summary", cancelPromptVisible: false, status: "running" })).toBe(
			"Tab: switch view · D: details · C: cancel run",
		);
	});

	it("offers exit once the run has finished", () => {
		expect(formatHelpText({ viewMode: "details", cancelPromptVisible: false, status: "failed" })).toBe(
			"Up/Down: select stage · Tab: switch view · S: summary · Q: exit",
		);
	});

	it("shows the cancel confirmation controls", () => {
		expect(formatHelpText({ viewMode: "details", cancelPromptVisible: true, status: "running" })).toBe(
			"Y: cancel run · N/Esc: continue run",
		);
	});
});
