import { describe, expect, it } from "vitest";
import { parseArgs, parseParam } from "../src/cli/args.js";

describe("cli args", () => {
	it("parses run options and repeatable param flags", () => {
		const parsed = parseArgs([
			"run",
			"--pipeline",
			"refresh.yml",
			"--stage",
			"lint,preview",
			"--param",
			"AWS_REGION=us-east-1",
			"--param",
			"PULUMI_REFRESH=a=b",
			"--max-parallel",
			"3",
			"--lock-backend",
			"memory",
			"--json",
		]);

		expect(parsed).toMatchObject({
			command: "run",
			pipeline: "refresh.yml",
			stages: ["lint", "preview"],
			params: { AWS_REGION: "us-east-1", PULUMI_REFRESH: "a=b" },
			maxParallel: 3,
			lockBackend: "memory",
			json: true,
			unknown: [],
			errors: [],
		});
	});

	it("accumulates repeated --stage flags", () => {
		expect(parseArgs(["--stage", "a", "--stage", "b,c"]).stages).toEqual(["a", "b", "c"]);
	});

	it("captures unknown options", () => {
		const parsed = parseArgs(["--wat", "--json"]);
		expect(parsed.unknown).toEqual(["--wat"]);
		expect(parsed.json).toBe(true);
	});

	it("reports missing values for valued flags", () => {
		const parsed = parseArgs(["--pipeline", "--stage", "build"]);
		expect(parsed.errors).toEqual(["Missing value for --pipeline"]);
		expect(parsed.stages).toEqual(["build"]);
	});

	it("reports invalid values", () => {
		const parsed = parseArgs(["--max-parallel", "0", "--lock-backend", "redis", "--param", "=x"]);
		expect(parsed.maxParallel).toBeUndefined();
		expect(parsed.lockBackend).toBeUndefined();
		expect(parsed.errors).toEqual([
			"Invalid value for --max-parallel: 0 (expected a positive integer)",
			"Invalid value for --lock-backend: redis (expected file|memory)",
			"Invalid value for --param: =x (expected KEY=VALUE)",
		]);
	});

	it("parses other subcommands", () => {
		expect(parseArgs(["validate"]).command).toBe("validate");
		expect(parseArgs(["list", "--json"]).command).toBe("list");
		expect(parseArgs(["init"]).command).toBe("init");
		expect(parseArgs(["deploy"]).errors).toEqual(["Unknown command: deploy"]);
	});

	it("splits params on the first equals sign", () => {
		expect(parseParam("KEY=a=b")).toEqual(["KEY", "a=b"]);
		expect(parseParam("KEY=")).toEqual(["KEY", ""]);
		expect(parseParam("novalue")).toBeUndefined();
	});
});
