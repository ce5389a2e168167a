import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, resolveConfigPath } from "../src/config/load-config.js";
import { ConfigSchema } from "../src/config/schema.js";

describe("config schema", () => {
	it("applies defaults", () => {
		const parsed = ConfigSchema.parse({});
		expect(parsed).toEqual({
			pipelinesDir: ".pipewright/pipelines",
			runsDir: ".pipewright/runs",
			defaults: { timeoutMinutes: 60, lockTimeoutMinutes: 30 },
			locks: { backend: "file", dir: ".pipewright/locks", pollIntervalMs: 250 },
			params: {},
			secrets: [],
		});
	});

	it("rejects invalid values", () => {
		expect(() => ConfigSchema.parse({ locks: { backend: "redis" } })).toThrow();
		expect(() => ConfigSchema.parse({ maxParallel: 0 })).toThrow();
	});
});

describe("load config", () => {
	it("returns defaults when .pipewright.yml does not exist", () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-config-empty-"));
		const loaded = loadConfig(repoRoot);

		expect(loaded.path).toBeUndefined();
		expect(loaded.config.locks.backend).toBe("file");
		expect(loaded.config.defaults.timeoutMinutes).toBe(60);
	});

	it("loads and validates .pipewright.yml", () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-config-ok-"));
		const configPath = path.join(repoRoot, ".pipewright.yml");
		fs.writeFileSync(
			configPath,
			[
				"pipelinesDir: pipelines",
				"maxParallel: 2",
				"locks:",
				"  backend: memory",
				"params:",
				"  AWS_REGION: us-east-1",
				"  PULUMI_REFRESH: true",
				"secrets: [API_KEY]",
			].join("\n"),
		);

		const loaded = loadConfig(repoRoot);
		expect(loaded.path).toBe(configPath);
		expect(loaded.config.pipelinesDir).toBe("pipelines");
		expect(loaded.config.maxParallel).toBe(2);
		expect(loaded.config.locks).toEqual({
			backend: "memory",
			dir: ".pipewright/locks",
			pollIntervalMs: 250,
		});
		expect(loaded.config.params).toEqual({ AWS_REGION: "us-east-1", PULUMI_REFRESH: true });
		expect(loaded.config.secrets).toEqual(["API_KEY"]);
	});

	it("throws on invalid config shape", () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-config-invalid-"));
		fs.writeFileSync(
			path.join(repoRoot, ".pipewright.yml"),
			["defaults:", "  timeoutMinutes: -5"].join("\n"),
		);

		expect(() => loadConfig(repoRoot)).toThrow();
	});

	it("resolves relative config paths against the repo root", () => {
		expect(resolveConfigPath("/repo", "runs")).toBe(path.join("/repo", "runs"));
		expect(resolveConfigPath("/repo", "/var/locks")).toBe("/var/locks");
	});
});
