import { spawn } from "node:child_process";
import type { ActionContext, ActionResult, StageAction } from "../core/engine.js";
import { formatErrorMessage } from "../core/errors.js";
import { interpolate } from "../core/expressions.js";
import type { RunParameters } from "../core/types.js";
import { redactText } from "../utils/redact.js";

const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const IS_WINDOWS = process.platform === "win32";
const FORCE_KILL_DELAY_MS = 2_000;

export function createCommandAction(command: string): StageAction {
	return (context) => runCommand(interpolate(command, context.params), context);
}

export function paramsToEnv(params: RunParameters): Record<string, string> {
	const env: Record<string, string> = {};
	for (const [name, value] of Object.entries(params)) {
		if (ENV_NAME_PATTERN.test(name)) {
			env[name] = String(value);
		}
	}
	return env;
}

function runCommand(command: string, context: ActionContext): Promise<ActionResult> {
	return new Promise((resolve) => {
		context.log(`$ ${redactText(command, context.params, context.secretParams)}\n`);
		if (context.signal.aborted) {
			resolve({ ok: false, message: "Command aborted before start" });
			return;
		}

		// Its own process group on POSIX, so an abort reaches every process the
		// shell started and not just the shell.
		const child = spawn(command, {
			cwd: context.cwd,
			env: { ...process.env, ...paramsToEnv(context.params) },
			shell: true,
			stdio: ["ignore", "pipe", "pipe"],
			detached: !IS_WINDOWS,
		});
		let settled = false;
		const settle = (result: ActionResult): void => {
			if (settled) {
				return;
			}
			settled = true;
			context.signal.removeEventListener("abort", onAbort);
			resolve(result);
		};
		const signalGroup = (signal: NodeJS.Signals): void => {
			try {
				if (IS_WINDOWS || child.pid === undefined) {
					child.kill(signal);
				} else {
					process.kill(-child.pid, signal);
				}
			} catch (error) {
				if (!isMissingProcess(error)) {
					context.log(`Failed to send ${signal} to command: ${formatErrorMessage(error)}\n`);
				}
			}
		};
		const onAbort = (): void => {
			signalGroup("SIGTERM");
			// Escalates even after the shell has exited: a process it started may
			// have ignored SIGTERM.
			setTimeout(() => signalGroup("SIGKILL"), FORCE_KILL_DELAY_MS).unref();
		};
		context.signal.addEventListener("abort", onAbort, { once: true });

		child.stdout.on("data", (chunk: Buffer) => {
			context.log(redactText(chunk.toString(), context.params, context.secretParams));
		});
		child.stderr.on("data", (chunk: Buffer) => {
			context.log(redactText(chunk.toString(), context.params, context.secretParams));
		});

		child.on("error", (error: Error) => {
			settle({ ok: false, message: `Failed to start command: ${error.message}` });
		});

		child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
			if (code === 0) {
				settle({ ok: true });
				return;
			}
			if (code === null) {
				settle({ ok: false, message: `Command terminated by ${signal ?? "signal"}` });
				return;
			}
			settle({ ok: false, message: `Command exited with code ${code}`, exitCode: code });
		});
	});
}

function isMissingProcess(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ESRCH";
}
