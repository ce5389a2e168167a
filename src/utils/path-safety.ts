import crypto from "node:crypto";
import path from "node:path";

export function ensureWithinBase(baseDir: string, childPath: string, label: string): string {
	const base = path.resolve(baseDir);
	const resolved = path.resolve(base, childPath);
	const rel = path.relative(base, resolved);
	if (rel.startsWith("..") || path.isAbsolute(rel)) {
		throw new Error(`Invalid ${label}: path escapes base directory`);
	}
	return resolved;
}

export function sanitizePathSegment(value: string, fallback: string): string {
	const normalized = value
		.trim()
		.replace(/[\\/]+/g, "-")
		.replace(/[^a-zA-Z0-9._-]+/g, "-")
		.replace(/^-+|-+$/g, "")
		.slice(0, 64);
	return normalized.length > 0 ? normalized : fallback;
}

// Keys that sanitize to the same segment still get distinct names.
export function hashedFileName(key: string, fallback: string, extension: string): string {
	const base = sanitizePathSegment(key.toLowerCase(), fallback);
	const hash = crypto.createHash("sha1").update(key).digest("hex").slice(0, 8);
	return `${base}-${hash}${extension}`;
}
