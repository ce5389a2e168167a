import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { discoverPipelines, findPipelineFiles, resolvePipeline } from "../src/core/discovery.js";
import { DefinitionError } from "../src/core/errors.js";
import { loadPipeline } from "../src/core/parser.js";

function writePipelines(files: Record<string, string[]>): string {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-parser-"));
	for (const [name, lines] of Object.entries(files)) {
		fs.writeFileSync(path.join(dir, name), lines.join("\n"));
	}
	return dir;
}

describe("pipeline parser", () => {
	it("loads stages, locks, conditions and sub-pipelines", () => {
		const dir = writePipelines({
			"refresh.yml": [
				"name: Refresh Stack",
				"inputs:",
				"  RUNNER_OS:",
				"    default: Linux",
				"stages:",
				"  lint:",
				"    name: Pre-commit",
				"    run: pre-commit run -a",
				"    if: params.RUNNER_OS != 'Windows'",
				"    lock: mutex-venv",
				"    timeout-minutes: 30",
				"  pulumi-refresh:",
				"    uses: ./pulumi.yml",
				"    needs: lint",
				"    with:",
				"      AWS_REGION: us-east-1",
				"      PULUMI_REFRESH: true",
				"  preview:",
				"    action: noop",
				"    needs: [pulumi-refresh]",
				"    lock:",
				"      name: mutex-stack",
				"      timeout-minutes: 0.5",
			],
			"pulumi.yml": [
				"inputs:",
				"  AWS_REGION:",
				"    required: true",
				"  PULUMI_REFRESH:",
				"stages:",
				"  refresh:",
				"    run: pulumi refresh",
			],
		});

		const definition = loadPipeline(path.join(dir, "refresh.yml"));
		expect(definition.name).toBe("Refresh Stack");
		expect(definition.inputs).toEqual({ RUNNER_OS: { required: false, default: "Linux" } });
		expect(definition.stages.map((stage) => stage.id)).toEqual(["lint", "pulumi-refresh", "preview"]);

		const [lint, refresh, preview] = definition.stages;
		expect(lint.name).toBe("Pre-commit");
		expect(lint.body).toEqual({ kind: "command", command: "pre-commit run -a" });
		expect(lint.lock).toEqual({ name: "mutex-venv", timeoutMs: undefined });
		expect(lint.timeoutMs).toBe(1_800_000);
		expect(lint.if?.evaluate({ RUNNER_OS: "Windows" })).toBe(false);

		expect(refresh.needs).toEqual(["lint"]);
		expect(refresh.with).toEqual({ AWS_REGION: "us-east-1", PULUMI_REFRESH: true });
		expect(refresh.body.kind).toBe("pipeline");
		if (refresh.body.kind === "pipeline") {
			expect(refresh.body.definition.name).toBe("pulumi.yml");
			expect(refresh.body.definition.inputs.PULUMI_REFRESH).toEqual({ required: false, default: undefined });
		}

		expect(preview.body).toEqual({ kind: "action", ref: "noop" });
		expect(preview.lock).toEqual({ name: "mutex-stack", timeoutMs: 30_000 });
	});

	it("reports YAML syntax errors with a position", () => {
		const dir = writePipelines({ "bad.yml": ["stages:", "  a: [unclosed"] });
		expect(() => loadPipeline(path.join(dir, "bad.yml"))).toThrow(DefinitionError);
	});

	it("reports schema errors with their path", () => {
		const dir = writePipelines({
			"bad.yml": ["stages:", "  a:", "    run: echo", "    retries: 3"],
		});
		expect(() => loadPipeline(path.join(dir, "bad.yml"))).toThrow(/stages\.a: Unrecognized key/);
	});

	it("rejects sub-pipeline reference cycles", () => {
		const dir = writePipelines({
			"a.yml": ["stages:", "  call-b:", "    uses: ./b.yml"],
			"b.yml": ["stages:", "  call-a:", "    uses: ./a.yml"],
		});
		expect(() => loadPipeline(path.join(dir, "a.yml"))).toThrow(
			"Sub-pipeline reference cycle: a.yml -> b.yml -> a.yml",
		);
	});

	it("rejects missing sub-pipeline files", () => {
		const dir = writePipelines({ "a.yml": ["stages:", "  call:", "    uses: ./missing.yml"] });
		expect(() => loadPipeline(path.join(dir, "a.yml"))).toThrow("Pipeline file not found");
	});

	it("rejects call sites that leave required inputs unbound", () => {
		const dir = writePipelines({
			"a.yml": ["stages:", "  call:", "    uses: ./child.yml"],
			"child.yml": ["inputs:", "  STACK:", "    required: true", "stages:", "  x:", "    action: noop"],
		});
		expect(() => loadPipeline(path.join(dir, "a.yml"))).toThrow(
			'Stage "call" does not bind required input(s) of "child.yml": STACK',
		);
	});

	it("rejects dependency cycles", () => {
		const dir = writePipelines({
			"cycle.yml": ["stages:", "  a:", "    run: echo", "    needs: b", "  b:", "    run: echo", "    needs: a"],
		});
		expect(() => loadPipeline(path.join(dir, "cycle.yml"))).toThrow("Dependency cycle between stages: a, b");
	});
});

describe("pipeline discovery", () => {
	it("finds yml and yaml files in name order", () => {
		const dir = writePipelines({
			"b.yaml": ["name: Bravo", "stages:", "  x:", "    action: noop"],
			"a.yml": ["name: Alpha", "stages:", "  x:", "    action: noop"],
			"notes.txt": ["ignored"],
		});
		expect(findPipelineFiles(dir).map((file) => path.basename(file))).toEqual(["a.yml", "b.yaml"]);

		const pipelines = discoverPipelines(dir);
		expect(pipelines.map((pipeline) => pipeline.name)).toEqual(["Alpha", "Bravo"]);
		expect(resolvePipeline(pipelines, "Bravo")?.name).toBe("Bravo");
		expect(resolvePipeline(pipelines, "a")?.name).toBe("Alpha");
		expect(resolvePipeline(pipelines, "b.yaml")?.name).toBe("Bravo");
		expect(resolvePipeline(pipelines)).toBeUndefined();
	});

	it("returns nothing for a missing directory", () => {
		expect(findPipelineFiles(path.join(os.tmpdir(), "pipewright-does-not-exist"))).toEqual([]);
	});
});
