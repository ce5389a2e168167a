export function normalizeAbortReason(reason: unknown): string | undefined {
	if (reason === undefined || reason === null) return undefined;
	if (typeof reason === "string") return reason;
	if (reason instanceof Error) return reason.message;
	return String(reason);
}

export function isAbortError(error: unknown): boolean {
	return error instanceof Error && error.name === "AbortError";
}

const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(delayMs: number): number {
	return Math.max(0, Math.min(delayMs, MAX_TIMER_DELAY_MS));
}
