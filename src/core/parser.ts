import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { ZodIssue } from "zod";
import type { PipelineInput, StageInput } from "./definition.js";
import { definePipeline } from "./definition.js";
import { DefinitionError } from "./errors.js";
import { PipelineYamlSchema, type PipelineYaml, type StageYaml } from "./schema.js";
import type { PipelineDefinition } from "./types.js";

const MINUTE_MS = 60_000;

type LoadState = {
	loaded: Map<string, PipelineDefinition>;
	loading: string[];
};

export function loadPipeline(pipelinePath: string): PipelineDefinition {
	return loadResolved(path.resolve(pipelinePath), { loaded: new Map(), loading: [] });
}

export function parsePipelineSource(
	source: string,
	pipelinePath: string,
	resolveSubPipeline: (uses: string, fromPath: string) => PipelineDefinition,
): PipelineDefinition {
	const doc = YAML.parseDocument(source);
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw new DefinitionError(`${line}:${col} ${error.message}`, pipelinePath);
	}

	const result = PipelineYamlSchema.safeParse(doc.toJSON() ?? {});
	if (!result.success) {
		throw new DefinitionError(formatIssues(result.error.issues), pipelinePath);
	}

	return definePipeline(toPipelineInput(result.data, pipelinePath, resolveSubPipeline));
}

function loadResolved(pipelinePath: string, state: LoadState): PipelineDefinition {
	const cached = state.loaded.get(pipelinePath);
	if (cached) {
		return cached;
	}
	if (state.loading.includes(pipelinePath)) {
		const chain = [...state.loading.slice(state.loading.indexOf(pipelinePath)), pipelinePath];
		throw new DefinitionError(
			`Sub-pipeline reference cycle: ${chain.map((item) => path.basename(item)).join(" -> ")}`,
			pipelinePath,
		);
	}
	if (!fs.existsSync(pipelinePath)) {
		throw new DefinitionError("Pipeline file not found", pipelinePath);
	}

	state.loading.push(pipelinePath);
	try {
		const raw = fs.readFileSync(pipelinePath, "utf-8");
		const definition = parsePipelineSource(raw, pipelinePath, (uses, fromPath) =>
			loadResolved(path.resolve(path.dirname(fromPath), uses), state),
		);
		state.loaded.set(pipelinePath, definition);
		return definition;
	} finally {
		state.loading.pop();
	}
}

function toPipelineInput(
	parsed: PipelineYaml,
	pipelinePath: string,
	resolveSubPipeline: (uses: string, fromPath: string) => PipelineDefinition,
): PipelineInput {
	const inputs: PipelineInput["inputs"] = {};
	for (const [name, input] of Object.entries(parsed.inputs)) {
		inputs[name] = input ?? { required: false };
	}

	return {
		id: pipelinePath,
		name: parsed.name ?? path.basename(pipelinePath),
		path: pipelinePath,
		inputs,
		stages: Object.entries(parsed.stages).map(([stageId, stage]) =>
			toStageInput(stageId, stage, pipelinePath, resolveSubPipeline),
		),
	};
}

function toStageInput(
	stageId: string,
	stage: StageYaml,
	pipelinePath: string,
	resolveSubPipeline: (uses: string, fromPath: string) => PipelineDefinition,
): StageInput {
	return {
		id: stageId,
		name: stage.name,
		needs: normalizeNeeds(stage.needs),
		if: typeof stage.if === "boolean" ? String(stage.if) : stage.if,
		lock: normalizeLock(stage.lock),
		timeoutMs: minutesToMs(stage["timeout-minutes"]),
		with: stage.with,
		run: stage.run,
		action: stage.action,
		pipeline: stage.uses ? resolveSubPipeline(stage.uses, pipelinePath) : undefined,
	};
}

function normalizeNeeds(needs?: string | string[]): string[] {
	if (!needs) {
		return [];
	}
	return Array.isArray(needs) ? needs : [needs];
}

function normalizeLock(lock: StageYaml["lock"]): StageInput["lock"] {
	if (lock === undefined || typeof lock === "string") {
		return lock;
	}
	return { name: lock.name, timeoutMs: minutesToMs(lock["timeout-minutes"]) };
}

function minutesToMs(minutes?: number): number | undefined {
	return minutes === undefined ? undefined : Math.round(minutes * MINUTE_MS);
}

function formatIssues(issues: ZodIssue[]): string {
	return issues
		.map((issue) => {
			const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
			return `${where}: ${issue.message}`;
		})
		.join("; ");
}
