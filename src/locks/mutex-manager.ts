import crypto from "node:crypto";

export type LockHolder = {
	runId: string;
	stageId: string;
};

export type LockToken = {
	id: string;
	name: string;
	holder: LockHolder;
	acquiredAt: string;
};

/**
 * Storage for named advisory locks.
 *
 * `acquire` resolves once the caller is the sole holder of `name`, rejects with
 * `LockAcquisitionTimeout` when `timeoutMs` elapses first, and rejects with
 * `RunCanceledError` when `signal` aborts. A rejected acquire leaves no waiter
 * behind. `release` only ever removes the lock the token describes.
 */
export interface LockBackend {
	readonly id: string;
	acquire(
		name: string,
		holder: LockHolder,
		timeoutMs: number,
		signal?: AbortSignal,
	): Promise<LockToken>;
	release(token: LockToken): Promise<void>;
}

export type MutexManagerOptions = {
	defaultTimeoutMs: number;
};

export class MutexManager {
	private readonly held = new Map<string, LockToken>();

	constructor(
		private readonly backend: LockBackend,
		private readonly options: MutexManagerOptions,
	) {}

	async acquire(
		name: string,
		holder: LockHolder,
		timeoutMs?: number,
		signal?: AbortSignal,
	): Promise<LockToken> {
		const token = await this.backend.acquire(
			name,
			holder,
			timeoutMs ?? this.options.defaultTimeoutMs,
			signal,
		);
		this.held.set(token.id, token);
		return token;
	}

	async release(token: LockToken): Promise<void> {
		if (!this.held.delete(token.id)) {
			return;
		}
		await this.backend.release(token);
	}

	heldTokens(): LockToken[] {
		return Array.from(this.held.values());
	}

	/** Releases every lock still held. Failures are reported, not thrown. */
	async releaseAll(): Promise<Error[]> {
		const results = await Promise.allSettled(this.heldTokens().map((token) => this.release(token)));
		return results.flatMap((result) =>
			result.status === "rejected"
				? [result.reason instanceof Error ? result.reason : new Error(String(result.reason))]
				: [],
		);
	}
}

export function createLockToken(name: string, holder: LockHolder): LockToken {
	return {
		id: crypto.randomUUID(),
		name,
		holder,
		acquiredAt: new Date().toISOString(),
	};
}
