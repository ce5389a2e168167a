import crypto from "node:crypto";
import { DefinitionError } from "./errors.js";
import type { ParamValue, PipelineDefinition, RunParameters } from "./types.js";

export function expandStageIdsWithNeeds(
	definition: PipelineDefinition,
	selected: string[],
): string[] {
	const stageMap = new Map(definition.stages.map((stage) => [stage.id, stage]));
	const expanded = new Set<string>();

	const visit = (stageId: string): void => {
		if (expanded.has(stageId)) {
			return;
		}
		const stage = stageMap.get(stageId);
		if (!stage) {
			throw new DefinitionError(`Unknown stage "${stageId}"`, definition.path ?? definition.name);
		}
		expanded.add(stageId);
		stage.needs.forEach(visit);
	};

	selected.forEach(visit);
	return definition.stages.filter((stage) => expanded.has(stage.id)).map((stage) => stage.id);
}

export function selectStages(definition: PipelineDefinition, selected: string[]): PipelineDefinition {
	if (selected.length === 0) {
		return definition;
	}
	const keep = new Set(expandStageIdsWithNeeds(definition, selected));
	return {
		...definition,
		stages: definition.stages.filter((stage) => keep.has(stage.id)),
	};
}

export function bindInputs(
	definition: PipelineDefinition,
	provided: Record<string, ParamValue>,
): RunParameters {
	const bound: Record<string, ParamValue> = {};
	for (const [name, input] of Object.entries(definition.inputs)) {
		if (input.default !== undefined) {
			bound[name] = input.default;
		}
	}
	Object.assign(bound, provided);

	const missing = Object.entries(definition.inputs)
		.filter(([name, input]) => input.required && bound[name] === undefined)
		.map(([name]) => name);
	if (missing.length > 0) {
		throw new DefinitionError(
			`Missing required input(s): ${missing.join(", ")}`,
			definition.path ?? definition.name,
		);
	}
	return Object.freeze(bound);
}

export function createRunId(): string {
	const now = new Date();
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}
