import { LockAcquisitionTimeout, RunCanceledError } from "../core/errors.js";
import { clampTimerDelay, normalizeAbortReason } from "../utils/abort.js";
import type { LockBackend, LockHolder, LockToken } from "./mutex-manager.js";
import { createLockToken } from "./mutex-manager.js";

type Waiter = {
	holder: LockHolder;
	grant: (token: LockToken) => void;
};

type LockEntry = {
	token: LockToken;
	waiters: Waiter[];
};

// Locks shared by every run that uses this backend. Waiters are served in arrival
// order, which is a courtesy rather than a guarantee of the interface.
export class MemoryLockBackend implements LockBackend {
	readonly id = "memory";
	private readonly locks = new Map<string, LockEntry>();

	acquire(
		name: string,
		holder: LockHolder,
		timeoutMs: number,
		signal?: AbortSignal,
	): Promise<LockToken> {
		if (signal?.aborted) {
			return Promise.reject(new RunCanceledError(normalizeAbortReason(signal.reason)));
		}

		const entry = this.locks.get(name);
		if (!entry) {
			const token = createLockToken(name, holder);
			this.locks.set(name, { token, waiters: [] });
			return Promise.resolve(token);
		}

		return new Promise<LockToken>((resolve, reject) => {
			const cleanup = (): void => {
				clearTimeout(timer);
				signal?.removeEventListener("abort", onAbort);
				const current = this.locks.get(name);
				if (current) {
					current.waiters = current.waiters.filter((item) => item !== waiter);
				}
			};
			const waiter: Waiter = {
				holder,
				grant: (token) => {
					cleanup();
					resolve(token);
				},
			};
			const onAbort = (): void => {
				cleanup();
				reject(new RunCanceledError(normalizeAbortReason(signal?.reason)));
			};
			const timer = setTimeout(() => {
				cleanup();
				reject(new LockAcquisitionTimeout(name, timeoutMs));
			}, clampTimerDelay(timeoutMs));

			entry.waiters.push(waiter);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	async release(token: LockToken): Promise<void> {
		const entry = this.locks.get(token.name);
		if (!entry || entry.token.id !== token.id) {
			return;
		}
		const next = entry.waiters.shift();
		if (!next) {
			this.locks.delete(token.name);
			return;
		}
		entry.token = createLockToken(token.name, next.holder);
		next.grant(entry.token);
	}

	isHeld(name: string): boolean {
		return this.locks.has(name);
	}

	waitingCount(name: string): number {
		return this.locks.get(name)?.waiters.length ?? 0;
	}
}
