import { Box, Text, useApp, useInput } from "ink";
import { useEffect, useMemo, useRef, useState } from "react";
import type { RunEventListener } from "../../core/engine.js";
import type { StageGraph } from "../../core/graph.js";
import type { RunResult } from "../../core/types.js";
import { DEFAULT_VIEW, LOG_TAIL_LINES, SPINNER_FRAMES, SPINNER_INTERVAL_MS } from "./constants.js";
import { buildDiagramLines, buildStageLabel } from "./diagram.js";
import type { RunViewMode } from "./help.js";
import { formatHelpText } from "./help.js";
import type { RunViewState } from "./model.js";
import { appendStageOutput, applyRunEvent, createRunViewState, resolveOutputStage } from "./model.js";
import { colorForRun, colorForStage, runGlyph, RUN_STATUS_LABELS, STAGE_STATUS_LABELS } from "./status.js";

export type RunHandlers = {
	onEvent: RunEventListener;
	onOutput: (runId: string, stageId: string, chunk: string) => void;
};

export type RunOutcome = { result: RunResult } | { error: unknown };

export type RunViewProps = {
	graph: StageGraph;
	pipelineName: string;
	start: (handlers: RunHandlers) => Promise<RunResult>;
	onCancel: () => void;
	onComplete: (outcome: RunOutcome) => void;
};

const OUTPUT_FLUSH_MS = 100;

export function RunView({ graph, pipelineName, start, onCancel, onComplete }: RunViewProps): JSX.Element {
	const { exit } = useApp();
	const [state, setState] = useState<RunViewState>(() => createRunViewState(graph));
	const [viewMode, setViewMode] = useState<RunViewMode>(DEFAULT_VIEW);
	const [selectedIndex, setSelectedIndex] = useState(0);
	const [spinnerIndex, setSpinnerIndex] = useState(0);
	const [cancelPromptVisible, setCancelPromptVisible] = useState(false);
	const [done, setDone] = useState(false);
	const started = useRef(false);
	const pendingOutput = useRef<{ runId: string; stageId: string; chunk: string }[]>([]);
	const flushTimer = useRef<NodeJS.Timeout | null>(null);

	useEffect(() => {
		if (started.current) {
			return;
		}
		started.current = true;

		const flushOutput = (): void => {
			flushTimer.current = null;
			const chunks = pendingOutput.current;
			pendingOutput.current = [];
			setState((prev) =>
				chunks.reduce((acc, item) => {
					const stageId = resolveOutputStage(acc, item.runId, item.stageId);
					return stageId ? appendStageOutput(acc, stageId, item.chunk) : acc;
				}, prev),
			);
		};

		const handlers: RunHandlers = {
			onEvent: (event) => setState((prev) => applyRunEvent(prev, event)),
			onOutput: (runId, stageId, chunk) => {
				pendingOutput.current.push({ runId, stageId, chunk });
				if (!flushTimer.current) {
					flushTimer.current = setTimeout(flushOutput, OUTPUT_FLUSH_MS);
				}
			},
		};

		start(handlers).then(
			(result) => {
				onComplete({ result });
				setDone(true);
			},
			(error: unknown) => {
				onComplete({ error });
				setDone(true);
				exit();
			},
		);
	}, [exit, onComplete, start]);

	useEffect(() => {
		const interval = setInterval(() => {
			setSpinnerIndex((prev) => (prev + 1) % SPINNER_FRAMES.length);
		}, SPINNER_INTERVAL_MS);
		return () => {
			clearInterval(interval);
			if (flushTimer.current) {
				clearTimeout(flushTimer.current);
			}
		};
	}, []);

	useInput((input, key) => {
		if (cancelPromptVisible) {
			if (input === "y" || input === "Y") {
				setCancelPromptVisible(false);
				onCancel();
				return;
			}
			if (input === "n" || input === "N" || key.escape) {
				setCancelPromptVisible(false);
			}
			return;
		}
		// Ctrl+C arrives here as "c" because the app renders with exitOnCtrlC off.
		if (input === "c" || input === "C") {
			if (!done) {
				setCancelPromptVisible(true);
			}
			return;
		}
		if ((input === "q" || input === "Q") && done) {
			exit();
			return;
		}
		if (key.tab || input === "\t") {
			setViewMode((prev) => (prev === "summary" ? "details" : "summary"));
			return;
		}
		if (input === "s") {
			setViewMode("summary");
			return;
		}
		if (input === "d") {
			setViewMode("details");
			return;
		}
		if (viewMode === "details") {
			if (key.upArrow) {
				setSelectedIndex((prev) => Math.max(0, prev - 1));
				return;
			}
			if (key.downArrow) {
				setSelectedIndex((prev) => Math.min(state.stages.length - 1, prev + 1));
			}
		}
	});

	const diagramLines = useMemo(
		() => buildDiagramLines(state.stages, spinnerIndex),
		[spinnerIndex, state.stages],
	);
	const selected = state.stages[selectedIndex];
	const tail = selected ? (state.output[selected.stageId] ?? []).slice(-LOG_TAIL_LINES) : [];
	const waiting = state.stages.filter((stage) => stage.waitingOnLock !== undefined);

	return (
		<Box flexDirection="column" padding={1}>
			<Box flexDirection="column" marginBottom={1}>
				<Text>
					{pipelineName}
					{state.runId ? ` · ${state.runId}` : ""}
				</Text>
				<Text color={colorForRun(state.status)} dimColor={state.status === "pending"}>
					{runGlyph(state.status, spinnerIndex)} {RUN_STATUS_LABELS[state.status]}
				</Text>
			</Box>

			{viewMode === "summary" ? (
				<Box flexDirection="column" borderStyle="round" paddingX={2} paddingY={1}>
					<Text dimColor>Summary</Text>
					{diagramLines.map((line, index) => (
						<Text key={`line-${index}`}>{line}</Text>
					))}
				</Box>
			) : (
				<Box flexDirection="row">
					<Box flexDirection="column" borderStyle="round" paddingX={2} width={36}>
						<Text dimColor>Stages</Text>
						{state.stages.map((stage, index) => (
							<Text
								key={stage.stageId}
								color={colorForStage(stage.status)}
								inverse={index === selectedIndex}
							>
								{buildStageLabel(stage, spinnerIndex)}
							</Text>
						))}
					</Box>
					<Box flexDirection="column" borderStyle="round" paddingX={2} flexGrow={1}>
						<Text dimColor>
							{selected ? `${selected.name} · ${STAGE_STATUS_LABELS[selected.status]}` : "Output"}
						</Text>
						{selected?.error ? <Text color="red">{selected.error}</Text> : null}
						{tail.map((line, index) => (
							<Text key={`tail-${index}`} wrap="truncate-end">
								{line}
							</Text>
						))}
					</Box>
				</Box>
			)}

			{waiting.map((stage) => (
				<Text key={`lock-${stage.stageId}`} color="yellow">
					{stage.stageId} waiting for lock "{stage.waitingOnLock}"
				</Text>
			))}
			<Text dimColor>{formatHelpText({ viewMode, cancelPromptVisible, status: state.status })}</Text>
		</Box>
	);
}
