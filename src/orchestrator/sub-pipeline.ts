import type { StageAction } from "../core/engine.js";
import { interpolate } from "../core/expressions.js";
import type { ParamValue, PipelineDefinition, RunParameters, RunResult } from "../core/types.js";

export type ChildRunRequest = {
	definition: PipelineDefinition;
	bindings: Record<string, ParamValue>;
	signal: AbortSignal;
};

export type ChildRunner = (request: ChildRunRequest) => Promise<RunResult>;

/**
 * Resolves a call site's `with` block against the caller's parameters.
 *
 * The result is the only thing the child run sees: caller parameters that are
 * not bound here never reach it.
 */
export function bindSubPipelineParams(
	bindings: Record<string, ParamValue>,
	parentParams: RunParameters,
): Record<string, ParamValue> {
	const bound: Record<string, ParamValue> = {};
	for (const [name, value] of Object.entries(bindings)) {
		bound[name] = typeof value === "string" ? interpolate(value, parentParams) : value;
	}
	return bound;
}

export function createSubPipelineAction(
	definition: PipelineDefinition,
	bindings: Record<string, ParamValue>,
	runChild: ChildRunner,
	onResult: (result: RunResult) => void,
): StageAction {
	return async (context) => {
		const result = await runChild({
			definition,
			bindings: bindSubPipelineParams(bindings, context.params),
			signal: context.signal,
		});
		onResult(result);
		if (result.status === "success") {
			return { ok: true };
		}
		return { ok: false, message: `Sub-pipeline "${definition.name}" finished ${result.status}` };
	};
}
