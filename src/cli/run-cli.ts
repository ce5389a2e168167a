import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { intro } from "@clack/prompts";
import { ZodError } from "zod";
import type { PipewrightConfig } from "../config/schema.js";
import { loadConfig, resolveConfigPath } from "../config/load-config.js";
import { discoverPipelines, findPipelineFiles, resolvePipeline } from "../core/discovery.js";
import { DefinitionError, formatErrorMessage } from "../core/errors.js";
import { loadPipeline } from "../core/parser.js";
import { createRunId, selectStages } from "../core/plan.js";
import type { ParamValue, PipelineDefinition } from "../core/types.js";
import { createLockBackend } from "../locks/factory.js";
import { MutexManager } from "../locks/mutex-manager.js";
import { exitCodeForStatus } from "../orchestrator/run-controller.js";
import { RunStore, createRunEventPersister } from "../store/run-store.js";
import type { CliOptions } from "./args.js";
import { parseArgs, printHelp, readPackageVersion } from "./args.js";
import { executeRun } from "./execute-run.js";
import { runInit } from "./init.js";
import { createInterruptHandler } from "./interrupt.js";
import { buildJsonSummary, formatStageResult } from "./output.js";
import { findMissingInputs, promptInputs, selectPipeline, selectStageIds } from "./select.js";

const EXIT_USAGE = 2;
const EXIT_CANCELED = 130;

export async function runCli(
	argv: string[] = process.argv.slice(2),
	repoRoot: string = process.cwd(),
): Promise<void> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return;
	}
	if (args.version) {
		process.stdout.write(`pipewright ${readPackageVersion()}\n`);
		return;
	}
	if (args.unknown?.length) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `pipewright --help` for usage.\n");
		process.exitCode = EXIT_USAGE;
		return;
	}
	if (args.errors?.length) {
		for (const error of args.errors) {
			process.stderr.write(`${error}\n`);
		}
		process.exitCode = EXIT_USAGE;
		return;
	}

	let config: PipewrightConfig;
	try {
		config = loadConfig(repoRoot).config;
	} catch (error) {
		process.stderr.write(`Config error: ${formatConfigError(error)}\n`);
		process.exitCode = EXIT_USAGE;
		return;
	}
	const pipelinesDir = resolveConfigPath(repoRoot, config.pipelinesDir);

	try {
		switch (args.command) {
			case "init":
				runInit(repoRoot, pipelinesDir);
				return;
			case "validate":
				runValidate(repoRoot, pipelinesDir, args);
				return;
			case "list":
				runList(repoRoot, pipelinesDir, args);
				return;
			default:
				await runRun(repoRoot, pipelinesDir, config, args);
		}
	} catch (error) {
		if (error instanceof DefinitionError) {
			process.stderr.write(`Pipeline error: ${error.message}\n`);
			process.exitCode = EXIT_USAGE;
			return;
		}
		throw error;
	}
}

function runValidate(repoRoot: string, pipelinesDir: string, args: CliOptions): void {
	const files = args.pipeline
		? [resolvePipelineFile(repoRoot, pipelinesDir, args.pipeline)]
		: findPipelineFiles(pipelinesDir);
	if (files.length === 0) {
		process.stderr.write(`No pipelines found in ${pipelinesDir}.\n`);
		process.exitCode = EXIT_USAGE;
		return;
	}

	let invalid = 0;
	const results: { path: string; name?: string; stages?: number; error?: string }[] = [];
	for (const file of files) {
		try {
			const definition = loadPipeline(file);
			results.push({ path: file, name: definition.name, stages: definition.stages.length });
		} catch (error) {
			if (!(error instanceof DefinitionError)) {
				throw error;
			}
			invalid += 1;
			results.push({ path: file, error: error.message });
		}
	}

	if (args.json) {
		process.stdout.write(`${JSON.stringify(results)}\n`);
	} else {
		for (const result of results) {
			if (result.error) {
				process.stdout.write(`✕ ${result.error}\n`);
			} else {
				process.stdout.write(`✓ ${result.name} (${result.stages} stage(s)) ${result.path}\n`);
			}
		}
	}
	process.exitCode = invalid > 0 ? EXIT_USAGE : 0;
}

function runList(repoRoot: string, pipelinesDir: string, args: CliOptions): void {
	const pipelines = discoverPipelines(pipelinesDir);
	if (args.json) {
		const listing = pipelines.map((pipeline) => ({
			id: pipeline.id,
			name: pipeline.name,
			path: pipeline.path,
			inputs: pipeline.inputs,
			stages: pipeline.stages.map((stage) => ({
				id: stage.id,
				name: stage.name,
				needs: stage.needs,
				lock: stage.lock?.name,
			})),
		}));
		process.stdout.write(`${JSON.stringify(listing)}\n`);
		return;
	}
	if (pipelines.length === 0) {
		process.stdout.write(`No pipelines found in ${pipelinesDir}.\n`);
		return;
	}
	for (const pipeline of pipelines) {
		const location = pipeline.path ? ` ${path.relative(repoRoot, pipeline.path)}` : "";
		process.stdout.write(`${pipeline.name}${location}\n`);
		for (const stage of pipeline.stages) {
			const needs = stage.needs.length > 0 ? ` <- ${stage.needs.join(", ")}` : "";
			const lock = stage.lock ? ` [lock ${stage.lock.name}]` : "";
			process.stdout.write(`  ${stage.id}${needs}${lock}\n`);
		}
	}
}

async function runRun(
	repoRoot: string,
	pipelinesDir: string,
	config: PipewrightConfig,
	args: CliOptions,
): Promise<void> {
	const isTty = Boolean(process.stdout.isTTY);
	const interactive = isTty && !args.json;

	let definition = await resolveRunPipeline(repoRoot, pipelinesDir, args, interactive);
	if (!definition) {
		return;
	}

	let stageIds = args.stages;
	if (!stageIds && interactive && definition.stages.length > 1) {
		const choice = await selectStageIds(definition);
		if (!choice) {
			process.exitCode = EXIT_CANCELED;
			return;
		}
		stageIds = choice;
	}
	definition = selectStages(definition, stageIds ?? []);

	const params: Record<string, ParamValue> = { ...config.params, ...args.params };
	const missing = findMissingInputs(definition, params);
	if (missing.length > 0 && interactive) {
		const values = await promptInputs(missing);
		if (!values) {
			process.exitCode = EXIT_CANCELED;
			return;
		}
		Object.assign(params, values);
	}

	const backend = createLockBackend(args.lockBackend ?? config.locks.backend, {
		dir: resolveConfigPath(repoRoot, config.locks.dir),
		pollIntervalMs: config.locks.pollIntervalMs,
	});
	const mutex = new MutexManager(backend, {
		defaultTimeoutMs: minutesToMs(config.defaults.lockTimeoutMinutes),
	});
	const runStore = new RunStore(resolveConfigPath(repoRoot, config.runsDir));
	const runId = createRunId();

	const controller = new AbortController();
	const handleInterrupt = createInterruptHandler({
		controller,
		mutex,
		exit: (code) => process.exit(code),
		exitCode: EXIT_CANCELED,
	});
	const onSigint = (): void => {
		handleInterrupt().catch((error: unknown) => {
			process.stderr.write(`pipewright: ${formatErrorMessage(error)}\n`);
			process.exit(EXIT_CANCELED);
		});
	};
	process.on("SIGINT", onSigint);

	try {
		const result = await executeRun({
			definition,
			controller,
			isTty,
			json: Boolean(args.json),
			options: {
				params,
				runId,
				maxParallel: args.maxParallel ?? config.maxParallel,
				mutex,
				defaultTimeoutMs: minutesToMs(config.defaults.timeoutMinutes),
				cwd: repoRoot,
				secretParams: config.secrets,
				runStore,
				onEvent: createRunEventPersister(runStore),
			},
		});

		const logsDir = path.join(runStore.base, result.runId, "logs");
		if (args.json) {
			process.stdout.write(`${JSON.stringify(buildJsonSummary(result, definition, logsDir))}\n`);
		} else {
			for (const stage of result.stages) {
				for (const line of formatStageResult(stage)) {
					process.stdout.write(`${line}\n`);
				}
			}
			process.stdout.write(`Logs: ${logsDir}\n`);
		}
		process.exitCode = exitCodeForStatus(result.status);
	} finally {
		process.off("SIGINT", onSigint);
	}
}

async function resolveRunPipeline(
	repoRoot: string,
	pipelinesDir: string,
	args: CliOptions,
	interactive: boolean,
): Promise<PipelineDefinition | null> {
	if (args.pipeline && isPipelineFile(repoRoot, args.pipeline)) {
		return loadPipeline(path.resolve(repoRoot, args.pipeline));
	}

	const pipelines = discoverPipelines(pipelinesDir);
	if (pipelines.length === 0) {
		process.stderr.write(`No pipelines found in ${pipelinesDir}.\n`);
		process.exitCode = EXIT_USAGE;
		return null;
	}

	const resolved = resolvePipeline(pipelines, args.pipeline);
	if (resolved) {
		return resolved;
	}
	if (args.pipeline) {
		process.stderr.write(`Unknown pipeline "${args.pipeline}".\n`);
		process.exitCode = EXIT_USAGE;
		return null;
	}
	if (!interactive) {
		process.stderr.write("No pipeline selected. Use --pipeline.\n");
		process.exitCode = EXIT_USAGE;
		return null;
	}

	intro("pipewright");
	const selected = await selectPipeline(pipelines);
	if (!selected) {
		process.exitCode = EXIT_CANCELED;
		return null;
	}
	return selected;
}

function resolvePipelineFile(repoRoot: string, pipelinesDir: string, selector: string): string {
	if (isPipelineFile(repoRoot, selector)) {
		return path.resolve(repoRoot, selector);
	}
	const match = findPipelineFiles(pipelinesDir).find(
		(file) => path.basename(file) === selector || path.basename(file, path.extname(file)) === selector,
	);
	if (!match) {
		throw new DefinitionError(`Unknown pipeline "${selector}"`);
	}
	return match;
}

function isPipelineFile(repoRoot: string, selector: string): boolean {
	return /\.ya?ml$/.test(selector) && fs.existsSync(path.resolve(repoRoot, selector));
}

function minutesToMs(minutes: number): number {
	return Math.round(minutes * 60_000);
}

function formatConfigError(error: unknown): string {
	if (error instanceof ZodError) {
		return error.issues
			.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
			.join("; ");
	}
	return formatErrorMessage(error);
}
