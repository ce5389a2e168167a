import { describe, expect, it } from "vitest";
import { definePipeline } from "../src/core/definition.js";
import { DefinitionError } from "../src/core/errors.js";
import { bindInputs, createRunId, expandStageIdsWithNeeds, selectStages } from "../src/core/plan.js";

const pipeline = definePipeline({
	name: "Refresh",
	inputs: {
		PULUMI_STACK_NAME: { required: true },
		AWS_REGION: { default: "us-east-1" },
	},
	stages: [
		{ id: "lint", action: "noop" },
		{ id: "refresh", action: "noop", needs: ["lint"] },
		{ id: "preview", action: "noop", needs: ["refresh"] },
		{ id: "docs", action: "noop" },
	],
});

describe("core plan", () => {
	it("expands selected stages with transitive needs in definition order", () => {
		expect(expandStageIdsWithNeeds(pipeline, ["preview"])).toEqual(["lint", "refresh", "preview"]);
	});

	it("rejects unknown stage ids", () => {
		expect(() => expandStageIdsWithNeeds(pipeline, ["deploy"])).toThrow(DefinitionError);
		expect(() => expandStageIdsWithNeeds(pipeline, ["deploy"])).toThrow('Unknown stage "deploy"');
	});

	it("narrows a definition to the selection", () => {
		const selected = selectStages(pipeline, ["refresh", "docs"]);
		expect(selected.stages.map((stage) => stage.id)).toEqual(["lint", "refresh", "docs"]);
		expect(selectStages(pipeline, [])).toBe(pipeline);
	});

	it("binds provided values over input defaults", () => {
		const params = bindInputs(pipeline, { PULUMI_STACK_NAME: "dev", EXTRA: true });
		expect(params).toEqual({ AWS_REGION: "us-east-1", PULUMI_STACK_NAME: "dev", EXTRA: true });
		expect(Object.isFrozen(params)).toBe(true);
	});

	it("reports missing required inputs", () => {
		expect(() => bindInputs(pipeline, {})).toThrow("Refresh: Missing required input(s): PULUMI_STACK_NAME");
	});

	it("creates sortable unique run ids", () => {
		const first = createRunId();
		const second = createRunId();
		expect(first).toMatch(/^\d{8}T\d{6}-[0-9a-f]{6}$/);
		expect(first).not.toBe(second);
	});
});
