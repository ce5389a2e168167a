import { describe, expect, it } from "vitest";
import { LockAcquisitionTimeout, RunCanceledError } from "../src/core/errors.js";
import { MemoryLockBackend } from "../src/locks/memory-backend.js";
import { MutexManager } from "../src/locks/mutex-manager.js";

const holder = (runId: string) => ({ runId, stageId: "lint" });

describe("memory lock backend", () => {
	it("grants a free lock immediately", async () => {
		const backend = new MemoryLockBackend();
		const token = await backend.acquire("venv", holder("r1"), 1_000);
		expect(token).toMatchObject({ name: "venv", holder: { runId: "r1", stageId: "lint" } });
		expect(backend.isHeld("venv")).toBe(true);
		await backend.release(token);
		expect(backend.isHeld("venv")).toBe(false);
	});

	it("hands the lock to waiters in arrival order", async () => {
		const backend = new MemoryLockBackend();
		const first = await backend.acquire("venv", holder("r1"), 1_000);
		const order: string[] = [];
		const second = backend.acquire("venv", holder("r2"), 1_000).then((token) => {
			order.push("r2");
			return token;
		});
		const third = backend.acquire("venv", holder("r3"), 1_000).then((token) => {
			order.push("r3");
			return token;
		});
		expect(backend.waitingCount("venv")).toBe(2);

		await backend.release(first);
		const secondToken = await second;
		expect(order).toEqual(["r2"]);
		await backend.release(secondToken);
		const thirdToken = await third;
		expect(order).toEqual(["r2", "r3"]);
		expect(thirdToken.holder.runId).toBe("r3");
	});

	it("lets different names proceed concurrently", async () => {
		const backend = new MemoryLockBackend();
		const a = await backend.acquire("venv", holder("r1"), 1_000);
		const b = await backend.acquire("stack", holder("r2"), 1_000);
		expect(a.name).toBe("venv");
		expect(b.name).toBe("stack");
	});

	it("times out and leaves no waiter behind", async () => {
		const backend = new MemoryLockBackend();
		await backend.acquire("venv", holder("r1"), 1_000);
		await expect(backend.acquire("venv", holder("r2"), 20)).rejects.toBeInstanceOf(LockAcquisitionTimeout);
		expect(backend.waitingCount("venv")).toBe(0);
	});

	it("stops waiting when the signal aborts", async () => {
		const backend = new MemoryLockBackend();
		await backend.acquire("venv", holder("r1"), 1_000);
		const controller = new AbortController();
		const waiting = backend.acquire("venv", holder("r2"), 10_000, controller.signal);
		controller.abort("stop");
		await expect(waiting).rejects.toThrow(new RunCanceledError("stop").message);
		expect(backend.waitingCount("venv")).toBe(0);
	});

	it("ignores tokens that do not hold the lock", async () => {
		const backend = new MemoryLockBackend();
		const token = await backend.acquire("venv", holder("r1"), 1_000);
		await backend.release({ ...token, id: "someone-else" });
		expect(backend.isHeld("venv")).toBe(true);
	});
});

describe("mutex manager", () => {
	it("applies the default timeout and releases each token once", async () => {
		const backend = new MemoryLockBackend();
		const mutex = new MutexManager(backend, { defaultTimeoutMs: 20 });
		const token = await mutex.acquire("venv", holder("r1"));
		expect(mutex.heldTokens()).toEqual([token]);
		await expect(mutex.acquire("venv", holder("r2"))).rejects.toThrow(
			'Timed out after 20ms waiting for lock "venv"',
		);

		await mutex.release(token);
		expect(mutex.heldTokens()).toEqual([]);
		const next = await mutex.acquire("venv", holder("r3"));
		// A stale token must not free the lock now held by r3.
		await mutex.release(token);
		expect(backend.isHeld("venv")).toBe(true);
		await mutex.release(next);
		expect(backend.isHeld("venv")).toBe(false);
	});
});

describe("releaseAll", () => {
	it("frees every held lock", async () => {
		const backend = new MemoryLockBackend();
		const mutex = new MutexManager(backend, { defaultTimeoutMs: 20 });
		await mutex.acquire("venv", holder("r1"));
		await mutex.acquire("stack", holder("r1"));

		expect(await mutex.releaseAll()).toEqual([]);
		expect(mutex.heldTokens()).toEqual([]);
		expect(backend.isHeld("venv")).toBe(false);
		expect(backend.isHeld("stack")).toBe(false);
	});
});
