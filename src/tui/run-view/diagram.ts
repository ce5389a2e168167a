import { formatDuration, padRight } from "./format.js";
import type { StageView } from "./model.js";
import { stageGlyph } from "./status.js";

const MIN_COLUMN_WIDTH = 16;
const COLUMN_SEPARATOR = "  ──→  ";

/**
 * Lays stages out in columns by dependency depth, roots on the left.
 */
export function buildDiagramLines(stages: StageView[], spinnerIndex: number): string[] {
	if (stages.length === 0) {
		return ["No stages selected."];
	}

	const maxDepth = Math.max(...stages.map((stage) => stage.depth), 0);
	const columns: string[][] = Array.from({ length: maxDepth + 1 }, () => []);
	for (const stage of stages) {
		columns[stage.depth].push(buildStageLabel(stage, spinnerIndex));
	}

	const columnWidths = columns.map((column) =>
		Math.max(MIN_COLUMN_WIDTH, ...column.map((item) => item.length)),
	);
	const maxRows = Math.max(...columns.map((column) => column.length), 1);

	const lines: string[] = [];
	for (let row = 0; row < maxRows; row += 1) {
		let line = "";
		for (let col = 0; col < columns.length; col += 1) {
			line += padRight(columns[col][row] ?? "", columnWidths[col]);
			if (col < columns.length - 1) {
				line += row === 0 ? COLUMN_SEPARATOR : " ".repeat(COLUMN_SEPARATOR.length);
			}
		}
		lines.push(line.trimEnd());
	}
	return lines;
}

export function buildStageLabel(stage: StageView, spinnerIndex: number): string {
	const glyph = stageGlyph(stage.status, spinnerIndex, stage.waitingOnLock !== undefined);
	const duration = stage.durationMs !== undefined ? ` ${formatDuration(stage.durationMs)}` : "";
	return `${glyph} ${stage.stageId}${duration}`;
}
