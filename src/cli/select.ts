import { cancel, isCancel, multiselect, select, text } from "@clack/prompts";
import type { ParamValue, PipelineDefinition } from "../core/types.js";

export async function selectPipeline(
	pipelines: PipelineDefinition[],
): Promise<PipelineDefinition | null> {
	const selection = await select({
		message: "Select a pipeline",
		options: pipelines.map((pipeline) => ({
			value: pipeline.id,
			label: pipeline.name,
		})),
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return pipelines.find((pipeline) => pipeline.id === selection) ?? null;
}

export async function selectStageIds(definition: PipelineDefinition): Promise<string[] | null> {
	const selection = await multiselect({
		message: "Select stages to run (needs are added)",
		options: definition.stages.map((stage) => ({
			value: stage.id,
			label: stage.name === stage.id ? stage.id : `${stage.name} (${stage.id})`,
		})),
		initialValues: definition.stages.map((stage) => stage.id),
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return selection;
}

export function findMissingInputs(
	definition: PipelineDefinition,
	params: Record<string, ParamValue>,
): string[] {
	return Object.entries(definition.inputs)
		.filter(([name, input]) => input.required && input.default === undefined && params[name] === undefined)
		.map(([name]) => name);
}

export async function promptInputs(names: string[]): Promise<Record<string, string> | null> {
	const values: Record<string, string> = {};
	for (const name of names) {
		const value = await text({
			message: `Value for required input ${name}`,
			validate: (input) => (input.length === 0 ? "A value is required." : undefined),
		});
		if (isCancel(value)) {
			cancel("Canceled.");
			return null;
		}
		values[name] = value;
	}
	return values;
}
