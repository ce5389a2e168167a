import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "../src/cli/run-cli.js";

type Captured = { stdout: string; stderr: string };

let captured: Captured;
const stdoutIsTty = process.stdout.isTTY;

beforeEach(() => {
	captured = { stdout: "", stderr: "" };
	process.stdout.isTTY = false;
	vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
		captured.stdout += chunk.toString();
		return true;
	});
	vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
		captured.stderr += chunk.toString();
		return true;
	});
});

afterEach(() => {
	vi.restoreAllMocks();
	process.stdout.isTTY = stdoutIsTty;
	process.exitCode = undefined;
});

function createRepo(files: Record<string, string[]>): string {
	const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-cli-"));
	for (const [name, lines] of Object.entries(files)) {
		const filePath = path.join(repoRoot, name);
		fs.mkdirSync(path.dirname(filePath), { recursive: true });
		fs.writeFileSync(filePath, lines.join("\n"));
	}
	return repoRoot;
}

const REFRESH = [
	"name: Refresh",
	"inputs:",
	"  STACK:",
	"    required: true",
	"stages:",
	"  lint:",
	"    run: echo lint ${{ params.STACK }}",
	"    lock: venv",
	"  refresh:",
	"    run: echo refresh",
	"    needs: lint",
	"  docs:",
	"    action: noop",
];

describe("cli", () => {
	it("lists pipelines as JSON", async () => {
		const repoRoot = createRepo({ ".pipewright/pipelines/refresh.yml": REFRESH });
		await runCli(["list", "--json"], repoRoot);

		const listing = JSON.parse(captured.stdout);
		expect(listing).toHaveLength(1);
		expect(listing[0]).toMatchObject({
			name: "Refresh",
			stages: [
				{ id: "lint", needs: [], lock: "venv" },
				{ id: "refresh", needs: ["lint"] },
				{ id: "docs", needs: [] },
			],
		});
	});

	it("validates every pipeline and reports broken ones", async () => {
		const repoRoot = createRepo({
			".pipewright/pipelines/good.yml": REFRESH,
			".pipewright/pipelines/loop.yml": ["stages:", "  a:", "    run: echo", "    needs: a"],
		});
		await runCli(["validate"], repoRoot);

		const lines = captured.stdout.trim().split("\n");
		expect(lines).toHaveLength(2);
		expect(lines[0]).toMatch(/^✓ Refresh \(3 stage\(s\)\) /);
		expect(lines[1]).toMatch(/^✕ .*loop\.yml: Stage "a" needs itself$/);
		expect(process.exitCode).toBe(2);
	});

	it("runs a pipeline and prints a JSON summary", async () => {
		const repoRoot = createRepo({ ".pipewright/pipelines/refresh.yml": REFRESH });
		await runCli(["run", "--pipeline", "refresh", "--param", "STACK=dev", "--json"], repoRoot);

		const summary = JSON.parse(captured.stdout);
		expect(summary).toMatchObject({
			pipeline: { name: "Refresh" },
			status: "success",
			stages: [
				{ stageId: "lint", status: "success" },
				{ stageId: "refresh", status: "success" },
				{ stageId: "docs", status: "success" },
			],
		});
		expect(process.exitCode).toBe(0);

		const runJson = path.join(repoRoot, ".pipewright", "runs", summary.runId, "run.json");
		expect(JSON.parse(fs.readFileSync(runJson, "utf-8"))).toMatchObject({
			status: "success",
			params: { STACK: "dev" },
		});
		expect(fs.readFileSync(summary.stages[0].logPath, "utf-8")).toBe("$ echo lint dev\nlint dev\n");
		expect(fs.readdirSync(path.join(repoRoot, ".pipewright", "locks"))).toEqual([]);
	});

	it("runs only the selected stages and their needs", async () => {
		const repoRoot = createRepo({ ".pipewright/pipelines/refresh.yml": REFRESH });
		await runCli(
			["run", "-p", "Refresh", "--stage", "refresh", "--param", "STACK=dev", "--lock-backend", "memory", "--json"],
			repoRoot,
		);

		const summary = JSON.parse(captured.stdout);
		expect(summary.stages.map((stage: { stageId: string }) => stage.stageId)).toEqual(["lint", "refresh"]);
	});

	it("uses config params and exits 1 on a failed stage", async () => {
		const repoRoot = createRepo({
			".pipewright.yml": ["pipelinesDir: pipes", "params:", "  STACK: prod"],
			"pipes/fail.yml": [
				"inputs:",
				"  STACK:",
				"    required: true",
				"stages:",
				"  boom:",
				"    run: exit 4",
			],
		});
		await runCli(["run", "--json"], repoRoot);

		const summary = JSON.parse(captured.stdout);
		expect(summary.status).toBe("failed");
		expect(summary.stages[0]).toMatchObject({
			stageId: "boom",
			status: "failed",
			error: "Command exited with code 4",
			exitCode: 4,
		});
		expect(process.exitCode).toBe(1);
	});

	it("prints progress lines without --json", async () => {
		const repoRoot = createRepo({ ".pipewright/pipelines/refresh.yml": REFRESH });
		await runCli(["run", "--stage", "docs", "--param", "STACK=dev"], repoRoot);

		const lines = captured.stdout.trim().split("\n");
		expect(lines[0]).toMatch(/^Running Refresh \(1 stage\(s\), run .+\)$/);
		expect(lines[1]).toBe("[docs] started");
		expect(lines[2]).toMatch(/^\[docs\] success \(\d+ms\)$/);
		expect(lines[3]).toBe("Finished success");
		expect(lines[4]).toMatch(/^ {2}docs success \(\d+ms\)$/);
		expect(lines[5]).toMatch(/^Logs: /);
	});

	it("exits 2 for missing required inputs", async () => {
		const repoRoot = createRepo({ ".pipewright/pipelines/refresh.yml": REFRESH });
		await runCli(["run", "--json"], repoRoot);

		expect(captured.stderr).toMatch(/^Pipeline error: .*refresh\.yml: Missing required input\(s\): STACK\n$/);
		expect(process.exitCode).toBe(2);
	});

	it("exits 2 for unknown pipelines and options", async () => {
		const repoRoot = createRepo({ ".pipewright/pipelines/refresh.yml": REFRESH });
		await runCli(["run", "--pipeline", "deploy", "--json"], repoRoot);
		expect(captured.stderr).toBe('Unknown pipeline "deploy".\n');
		expect(process.exitCode).toBe(2);

		captured.stderr = "";
		await runCli(["--wat"], repoRoot);
		expect(captured.stderr).toBe("Unknown option(s): --wat\nRun `pipewright --help` for usage.\n");
	});

	it("reports invalid config", async () => {
		const repoRoot = createRepo({ ".pipewright.yml": ["maxParallel: 0"] });
		await runCli(["list"], repoRoot);
		expect(captured.stderr).toBe("Config error: maxParallel: Number must be greater than 0\n");
		expect(process.exitCode).toBe(2);
	});

	it("initializes the pipelines dir and ignores run state", async () => {
		const repoRoot = createRepo({ ".gitignore": ["node_modules"] });
		fs.mkdirSync(path.join(repoRoot, ".git"));
		await runCli(["init"], repoRoot);

		expect(fs.existsSync(path.join(repoRoot, ".pipewright", "pipelines"))).toBe(true);
		expect(fs.readFileSync(path.join(repoRoot, ".gitignore"), "utf-8")).toBe(
			"node_modules\n.pipewright/runs\n.pipewright/locks\n",
		);
		expect(captured.stdout).toBe(
			"Created .pipewright/pipelines.\nAdded .pipewright/runs, .pipewright/locks to .gitignore.\n",
		);
	});

	it("prints help", async () => {
		await runCli(["--help"]);
		expect(captured.stdout.startsWith("pipewright <command> [options]\n")).toBe(true);
	});
});
