import { FileLockBackend } from "./file-backend.js";
import { MemoryLockBackend } from "./memory-backend.js";
import type { LockBackend } from "./mutex-manager.js";

export type LockBackendSettings = {
	dir: string;
	pollIntervalMs: number;
};

type LockBackendFactory = (settings: LockBackendSettings) => LockBackend;

const LOCK_BACKEND_REGISTRY: Record<string, LockBackendFactory> = {
	file: (settings) => new FileLockBackend(settings),
	memory: () => new MemoryLockBackend(),
};

export function createLockBackend(backendId: string, settings: LockBackendSettings): LockBackend {
	const normalized = backendId.trim().toLowerCase();
	const factory = LOCK_BACKEND_REGISTRY[normalized];
	if (!factory) {
		throw new Error(
			`Unsupported lock backend "${backendId}". Available backends: ${listLockBackends().join(", ")}`,
		);
	}
	return factory(settings);
}

export function listLockBackends(): string[] {
	return Object.keys(LOCK_BACKEND_REGISTRY);
}
