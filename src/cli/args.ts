import fs from "node:fs";
import type { ParamValue } from "../core/types.js";

export type CliCommand = "run" | "validate" | "list" | "init";

export type CliOptions = {
	command: CliCommand;
	pipeline?: string;
	stages?: string[];
	params?: Record<string, ParamValue>;
	maxParallel?: number;
	lockBackend?: "file" | "memory";
	json?: boolean;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

const COMMANDS: CliCommand[] = ["run", "validate", "list", "init"];

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args[0];
		const known = COMMANDS.find((item) => item === command);
		if (known) {
			options.command = known;
		} else {
			options.errors?.push(`Unknown command: ${command}`);
		}
		args.shift();
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--pipeline":
			case "-p":
				options.pipeline = takeValue(arg, args, options);
				break;
			case "--stage":
				{
					const value = takeValue("--stage", args, options);
					if (value) {
						options.stages = [...(options.stages ?? []), ...value.split(",").filter(Boolean)];
					}
				}
				break;
			case "--param":
				{
					const value = takeValue("--param", args, options);
					if (value) {
						const parsed = parseParam(value);
						if (parsed) {
							options.params = { ...options.params, [parsed[0]]: parsed[1] };
						} else {
							options.errors?.push(`Invalid value for --param: ${value} (expected KEY=VALUE)`);
						}
					}
				}
				break;
			case "--max-parallel":
				{
					const value = takeValue("--max-parallel", args, options);
					if (value) {
						const parsed = Number(value);
						if (Number.isInteger(parsed) && parsed > 0) {
							options.maxParallel = parsed;
						} else {
							options.errors?.push(
								`Invalid value for --max-parallel: ${value} (expected a positive integer)`,
							);
						}
					}
				}
				break;
			case "--lock-backend":
				{
					const value = takeValue("--lock-backend", args, options);
					if (value === "file" || value === "memory") {
						options.lockBackend = value;
					} else if (value) {
						options.errors?.push(`Invalid value for --lock-backend: ${value} (expected file|memory)`);
					}
				}
				break;
			case "--json":
				options.json = true;
				break;
			default:
				if (arg) {
					options.unknown?.push(arg);
				}
				break;
		}
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`pipewright <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                   Run a pipeline (default)\n`);
	process.stdout.write(`  validate              Load and check pipeline definitions\n`);
	process.stdout.write(`  list                  List pipelines and their stages\n`);
	process.stdout.write(`  init                  Create the pipelines dir and ignore run state\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  -p, --pipeline <name>  Pipeline file name or name\n`);
	process.stdout.write(`  --stage <ids>          Comma-separated stage ids (adds their needs)\n`);
	process.stdout.write(`  --param <k=v>          Run parameter (repeatable)\n`);
	process.stdout.write(`  --max-parallel <n>     Maximum stages running at once\n`);
	process.stdout.write(`  --lock-backend <b>     Lock backend: file|memory\n`);
	process.stdout.write(`  --json                 Print JSON summary\n`);
	process.stdout.write(`  -h, --help             Show help\n`);
	process.stdout.write(`  -v, --version          Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed = JSON.parse(raw) as { version?: string };
	return parsed.version ?? "0.0.0";
}

export function parseParam(value: string): [string, string] | undefined {
	const separator = value.indexOf("=");
	if (separator <= 0) {
		return undefined;
	}
	return [value.slice(0, separator).trim(), value.slice(separator + 1)];
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
