export function formatDuration(durationMs: number): string {
	if (durationMs < 1000) {
		return `${Math.round(durationMs)}ms`;
	}
	const seconds = durationMs / 1000;
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = Math.round(seconds % 60);
	if (minutes < 60) {
		return `${minutes}m${remainder}s`;
	}
	return `${Math.floor(minutes / 60)}h${minutes % 60}m`;
}

export function padRight(value: string, length: number): string {
	if (value.length >= length) {
		return value;
	}
	return value + " ".repeat(length - value.length);
}
