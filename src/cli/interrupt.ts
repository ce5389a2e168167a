import { formatErrorMessage } from "../core/errors.js";
import type { MutexManager } from "../locks/mutex-manager.js";

export type InterruptHandlerOptions = {
	controller: AbortController;
	mutex: MutexManager;
	exit: (code: number) => void;
	exitCode: number;
};

/**
 * First interrupt cancels the run. A second one releases whatever locks the
 * run still holds and exits without waiting for stages to wind down.
 */
export function createInterruptHandler({
	controller,
	mutex,
	exit,
	exitCode,
}: InterruptHandlerOptions): () => Promise<void> {
	let interrupts = 0;
	return async () => {
		interrupts += 1;
		if (interrupts === 1) {
			process.stderr.write("Canceling run (press Ctrl+C again to exit now)...\n");
			controller.abort("interrupted");
			return;
		}
		if (interrupts > 2) {
			return;
		}
		const failures = await mutex.releaseAll();
		for (const error of failures) {
			process.stderr.write(`Failed to release lock: ${formatErrorMessage(error)}\n`);
		}
		exit(exitCode);
	};
}
