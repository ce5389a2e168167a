// Cross-process lock backend.
// A lock is held while <dir>/<name>.lock exists; creation uses O_EXCL so only
// one process can win. Holders are never expired or evicted.

import fs from "node:fs";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { LockAcquisitionTimeout, RunCanceledError } from "../core/errors.js";
import { isAbortError, normalizeAbortReason } from "../utils/abort.js";
import { ensureWithinBase, hashedFileName } from "../utils/path-safety.js";
import type { LockBackend, LockHolder, LockToken } from "./mutex-manager.js";
import { createLockToken } from "./mutex-manager.js";

export type FileLockBackendOptions = {
	dir: string;
	pollIntervalMs?: number;
};

type LockFilePayload = {
	tokenId: string;
	name: string;
	pid: number;
	runId: string;
	stageId: string;
	acquiredAt: string;
};

const DEFAULT_POLL_INTERVAL_MS = 250;

export class FileLockBackend implements LockBackend {
	readonly id = "file";
	private readonly dir: string;
	private readonly pollIntervalMs: number;

	constructor(options: FileLockBackendOptions) {
		this.dir = path.resolve(options.dir);
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
	}

	getLockPath(name: string): string {
		return ensureWithinBase(this.dir, getLockFileName(name), "lock file");
	}

	async acquire(
		name: string,
		holder: LockHolder,
		timeoutMs: number,
		signal?: AbortSignal,
	): Promise<LockToken> {
		await fs.promises.mkdir(this.dir, { recursive: true });
		const lockPath = this.getLockPath(name);
		const deadline = Date.now() + timeoutMs;

		for (;;) {
			if (signal?.aborted) {
				throw new RunCanceledError(normalizeAbortReason(signal.reason));
			}
			const token = await this.tryCreate(lockPath, name, holder);
			if (token) {
				return token;
			}
			const remaining = deadline - Date.now();
			if (remaining <= 0) {
				throw new LockAcquisitionTimeout(name, timeoutMs);
			}
			try {
				await sleep(Math.min(this.pollIntervalMs, remaining), undefined, { signal });
			} catch (error) {
				if (isAbortError(error)) {
					throw new RunCanceledError(normalizeAbortReason(signal?.reason));
				}
				throw error;
			}
		}
	}

	async release(token: LockToken): Promise<void> {
		const lockPath = this.getLockPath(token.name);
		const payload = await readPayload(lockPath);
		if (!payload || payload.tokenId !== token.id) {
			return;
		}
		await safeUnlink(lockPath);
	}

	async readHolder(name: string): Promise<LockFilePayload | null> {
		return readPayload(this.getLockPath(name));
	}

	private async tryCreate(
		lockPath: string,
		name: string,
		holder: LockHolder,
	): Promise<LockToken | null> {
		let handle: fs.promises.FileHandle;
		try {
			handle = await fs.promises.open(lockPath, "wx");
		} catch (error) {
			if (getErrorCode(error) === "EEXIST") {
				return null;
			}
			throw error;
		}

		const token = createLockToken(name, holder);
		const payload: LockFilePayload = {
			tokenId: token.id,
			name,
			pid: process.pid,
			runId: holder.runId,
			stageId: holder.stageId,
			acquiredAt: token.acquiredAt,
		};
		try {
			await handle.writeFile(`${JSON.stringify(payload)}\n`, "utf8");
		} catch (error) {
			await handle.close();
			await safeUnlink(lockPath);
			throw error;
		}
		await handle.close();
		return token;
	}
}

export function getLockFileName(name: string): string {
	return hashedFileName(name, "lock", ".lock");
}

async function readPayload(lockPath: string): Promise<LockFilePayload | null> {
	let raw: string;
	try {
		raw = await fs.promises.readFile(lockPath, "utf8");
	} catch (error) {
		if (getErrorCode(error) === "ENOENT") {
			return null;
		}
		throw error;
	}
	// The winner may not have written its payload yet.
	if (raw.trim().length === 0) {
		return null;
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		if (error instanceof SyntaxError) {
			return null;
		}
		throw error;
	}
	return isLockFilePayload(parsed) ? parsed : null;
}

function isLockFilePayload(value: unknown): value is LockFilePayload {
	if (!value || typeof value !== "object") {
		return false;
	}
	return "tokenId" in value && typeof value.tokenId === "string" && "name" in value;
}

async function safeUnlink(filePath: string): Promise<void> {
	try {
		await fs.promises.unlink(filePath);
	} catch (error) {
		if (getErrorCode(error) !== "ENOENT") {
			throw error;
		}
	}
}

function getErrorCode(error: unknown): string | undefined {
	if (!error || typeof error !== "object" || !("code" in error)) {
		return undefined;
	}
	return typeof error.code === "string" ? error.code : undefined;
}
