import fs from "node:fs";
import path from "node:path";
import { loadPipeline } from "./parser.js";
import type { PipelineDefinition } from "./types.js";

export function findPipelineFiles(pipelinesDir: string): string[] {
	if (!fs.existsSync(pipelinesDir)) {
		return [];
	}

	return fs
		.readdirSync(pipelinesDir)
		.filter((file: string) => file.endsWith(".yml") || file.endsWith(".yaml"))
		.sort()
		.map((file: string) => path.join(pipelinesDir, file));
}

export function discoverPipelines(pipelinesDir: string): PipelineDefinition[] {
	return findPipelineFiles(pipelinesDir).map((pipelinePath) => loadPipeline(pipelinePath));
}

export function resolvePipeline(
	pipelines: PipelineDefinition[],
	selector?: string,
): PipelineDefinition | undefined {
	if (!selector) {
		return pipelines.length === 1 ? pipelines[0] : undefined;
	}
	return pipelines.find(
		(pipeline) =>
			pipeline.name === selector ||
			pipeline.id.endsWith(selector) ||
			(pipeline.path !== undefined && path.basename(pipeline.path, path.extname(pipeline.path)) === selector),
	);
}
