#!/usr/bin/env node
import { formatErrorMessage } from "./core/errors.js";
import { runCli } from "./cli/run-cli.js";

runCli().catch((error: unknown) => {
	process.stderr.write(`pipewright: ${formatErrorMessage(error)}\n`);
	process.exitCode = 1;
});
