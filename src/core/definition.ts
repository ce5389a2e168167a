import { DefinitionError } from "./errors.js";
import { compileCondition } from "./expressions.js";
import { buildStageGraph } from "./graph.js";
import type {
	InputSpec,
	LockSpec,
	ParamValue,
	PipelineDefinition,
	StageBody,
	StageCondition,
	StageSpec,
} from "./types.js";

export type StageInput = {
	id: string;
	name?: string;
	needs?: string[];
	if?: string | StageCondition;
	lock?: string | LockSpec;
	timeoutMs?: number;
	with?: Record<string, ParamValue>;
	run?: string;
	action?: string;
	pipeline?: PipelineDefinition;
};

export type PipelineInput = {
	id?: string;
	name: string;
	path?: string;
	inputs?: Record<string, Partial<InputSpec>>;
	stages: StageInput[];
};

/**
 * Validates a pipeline and freezes it into a definition.
 *
 * Rejects duplicate, dangling and cyclic stage references, stages without
 * exactly one body, and sub-pipeline calls that leave a required input unbound.
 */
export function definePipeline(input: PipelineInput): PipelineDefinition {
	const origin = input.path ?? input.name;
	const stages = input.stages.map((stage) => toStageSpec(stage, origin));
	const inputs: Record<string, InputSpec> = {};
	for (const [name, spec] of Object.entries(input.inputs ?? {})) {
		inputs[name] = { required: spec.required ?? false, default: spec.default };
	}

	const definition: PipelineDefinition = {
		id: input.id ?? input.path ?? input.name,
		name: input.name,
		path: input.path,
		inputs,
		stages,
	};

	buildStageGraph(definition);
	return deepFreeze(definition);
}

function toStageSpec(stage: StageInput, origin: string): StageSpec {
	return {
		id: stage.id,
		name: stage.name ?? stage.id,
		needs: stage.needs ?? [],
		body: toStageBody(stage, origin),
		with: stage.with ?? {},
		if: typeof stage.if === "string" ? compileCondition(stage.if, origin) : stage.if,
		lock: toLockSpec(stage, origin),
		timeoutMs: toTimeout(stage.timeoutMs, `Stage "${stage.id}" timeout`, origin),
	};
}

function toStageBody(stage: StageInput, origin: string): StageBody {
	const bodies: StageBody[] = [];
	if (stage.run !== undefined) {
		bodies.push({ kind: "command", command: stage.run });
	}
	if (stage.action !== undefined) {
		bodies.push({ kind: "action", ref: stage.action });
	}
	if (stage.pipeline !== undefined) {
		bodies.push({ kind: "pipeline", definition: stage.pipeline });
	}
	const [body] = bodies;
	if (!body || bodies.length > 1) {
		throw new DefinitionError(
			`Stage "${stage.id}" must declare exactly one of run, action or uses`,
			origin,
		);
	}
	if (body.kind === "pipeline") {
		const bound = stage.with ?? {};
		const missing = Object.entries(body.definition.inputs)
			.filter(([name, spec]) => spec.required && spec.default === undefined && !(name in bound))
			.map(([name]) => name);
		if (missing.length > 0) {
			throw new DefinitionError(
				`Stage "${stage.id}" does not bind required input(s) of "${body.definition.name}": ${missing.join(", ")}`,
				origin,
			);
		}
	}
	return body;
}

function toLockSpec(stage: StageInput, origin: string): LockSpec | undefined {
	if (stage.lock === undefined) {
		return undefined;
	}
	const lock = typeof stage.lock === "string" ? { name: stage.lock } : stage.lock;
	if (lock.name.trim().length === 0) {
		throw new DefinitionError(`Stage "${stage.id}" has an empty lock name`, origin);
	}
	return {
		name: lock.name,
		timeoutMs: toTimeout(lock.timeoutMs, `Stage "${stage.id}" lock timeout`, origin),
	};
}

function toTimeout(value: number | undefined, label: string, origin: string): number | undefined {
	if (value === undefined) {
		return undefined;
	}
	if (!Number.isFinite(value) || value <= 0) {
		throw new DefinitionError(`${label} must be a positive number`, origin);
	}
	return value;
}

function deepFreeze<T extends object>(value: T): T {
	for (const child of Object.values(value)) {
		if (child && typeof child === "object" && !Object.isFrozen(child)) {
			deepFreeze(child);
		}
	}
	Object.freeze(value);
	return value;
}
