import { DefinitionError } from "./errors.js";
import type { PipelineDefinition, StageSpec } from "./types.js";

export type StageNode = {
	index: number;
	spec: StageSpec;
	predecessors: number[];
	successors: number[];
};

export type StageGraph = {
	definition: PipelineDefinition;
	nodes: StageNode[];
	indexById: Map<string, number>;
	// Topological order of node indices; ties keep definition order.
	order: number[];
};

export function buildStageGraph(definition: PipelineDefinition): StageGraph {
	const origin = definition.path ?? definition.name;
	const indexById = new Map<string, number>();

	definition.stages.forEach((stage, index) => {
		if (indexById.has(stage.id)) {
			throw new DefinitionError(`Duplicate stage "${stage.id}"`, origin);
		}
		indexById.set(stage.id, index);
	});

	const nodes: StageNode[] = definition.stages.map((spec, index) => ({
		index,
		spec,
		predecessors: [],
		successors: [],
	}));

	for (const node of nodes) {
		for (const need of new Set(node.spec.needs)) {
			const predecessor = indexById.get(need);
			if (predecessor === undefined) {
				throw new DefinitionError(
					`Stage "${node.spec.id}" needs unknown stage "${need}"`,
					origin,
				);
			}
			if (predecessor === node.index) {
				throw new DefinitionError(`Stage "${node.spec.id}" needs itself`, origin);
			}
			node.predecessors.push(predecessor);
			nodes[predecessor].successors.push(node.index);
		}
	}

	const order = topologicalOrder(nodes);
	if (order.length !== nodes.length) {
		const ordered = new Set(order);
		const cyclic = nodes.filter((node) => !ordered.has(node.index)).map((node) => node.spec.id);
		throw new DefinitionError(`Dependency cycle between stages: ${cyclic.join(", ")}`, origin);
	}

	return { definition, nodes, indexById, order };
}

export function computeDepths(graph: StageGraph): number[] {
	const depths = new Array<number>(graph.nodes.length).fill(0);
	for (const index of graph.order) {
		const node = graph.nodes[index];
		depths[index] =
			node.predecessors.length === 0
				? 0
				: Math.max(...node.predecessors.map((predecessor) => depths[predecessor])) + 1;
	}
	return depths;
}

function topologicalOrder(nodes: StageNode[]): number[] {
	const inDegree = nodes.map((node) => node.predecessors.length);
	const queue = nodes.filter((node) => inDegree[node.index] === 0).map((node) => node.index);
	const ordered: number[] = [];

	while (queue.length > 0) {
		const index = queue.shift();
		if (index === undefined) {
			continue;
		}
		ordered.push(index);
		for (const next of nodes[index].successors) {
			inDegree[next] -= 1;
			if (inDegree[next] === 0) {
				queue.push(next);
			}
		}
	}

	return ordered;
}
