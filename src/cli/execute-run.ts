import React from "react";
import { outro } from "@clack/prompts";
import { render } from "ink";
import type { RunEventListener } from "../core/engine.js";
import { buildStageGraph } from "../core/graph.js";
import type { PipelineDefinition, RunResult } from "../core/types.js";
import type { RunOptions } from "../orchestrator/run-controller.js";
import { runPipeline } from "../orchestrator/run-controller.js";
import type { RunHandlers, RunOutcome } from "../tui/run-view/run-view.js";
import { RunView } from "../tui/run-view/run-view.js";
import { createEventLineFormatter } from "./output.js";

export type ExecuteRunInput = {
	definition: PipelineDefinition;
	options: RunOptions;
	controller: AbortController;
	isTty: boolean;
	json: boolean;
};

export async function executeRun({
	definition,
	options,
	controller,
	isTty,
	json,
}: ExecuteRunInput): Promise<RunResult> {
	if (isTty && !json) {
		const result = await runWithInk(definition, options, controller);
		outro(`Run ${result.runId} finished ${result.status}.`);
		return result;
	}

	const formatLine = createEventLineFormatter();
	const printLines: RunEventListener = (event) => {
		if (json) {
			return;
		}
		const line = formatLine(event);
		if (line) {
			process.stdout.write(`${line}\n`);
		}
	};
	return runPipeline(definition, {
		...options,
		signal: controller.signal,
		onEvent: combineListeners(options.onEvent, printLines),
	});
}

function runWithInk(
	definition: PipelineDefinition,
	options: RunOptions,
	controller: AbortController,
): Promise<RunResult> {
	const graph = buildStageGraph(definition);
	const start = (handlers: RunHandlers): Promise<RunResult> =>
		runPipeline(definition, {
			...options,
			signal: controller.signal,
			onEvent: combineListeners(options.onEvent, handlers.onEvent),
			onOutput: handlers.onOutput,
		});

	return new Promise((resolve, reject) => {
		let outcome: RunOutcome | null = null;
		const handleComplete = (value: RunOutcome): void => {
			outcome = value;
		};

		const { waitUntilExit, unmount } = render(
			React.createElement(RunView, {
				graph,
				pipelineName: definition.name,
				start,
				onCancel: () => controller.abort("canceled from the run view"),
				onComplete: handleComplete,
			}),
			{ exitOnCtrlC: false },
		);

		waitUntilExit().then(
			() => {
				unmount();
				if (!outcome) {
					reject(new Error("Run view closed before the run finished."));
					return;
				}
				if ("error" in outcome) {
					reject(outcome.error);
					return;
				}
				resolve(outcome.result);
			},
			(error: unknown) => reject(error),
		);
	});
}

function combineListeners(...listeners: (RunEventListener | undefined)[]): RunEventListener {
	return (event) => {
		for (const listener of listeners) {
			listener?.(event);
		}
	};
}
