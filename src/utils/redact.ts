import type { ParamValue, RunParameters } from "../core/types.js";

export const REDACTED = "<redacted>";

const SECRET_NAME_PATTERN = /(secret|token|password|passwd|private[_-]?key)/i;

export function isSecretParam(name: string, secretParams: string[]): boolean {
	return secretParams.includes(name) || SECRET_NAME_PATTERN.test(name);
}

export function redactParams(
	params: RunParameters,
	secretParams: string[] = [],
): Record<string, ParamValue> {
	const redacted: Record<string, ParamValue> = {};
	for (const [name, value] of Object.entries(params)) {
		redacted[name] = isSecretParam(name, secretParams) ? REDACTED : value;
	}
	return redacted;
}

export function redactText(text: string, params: RunParameters, secretParams: string[] = []): string {
	let redacted = text;
	const values = Object.entries(params)
		.filter(([name]) => isSecretParam(name, secretParams))
		.map(([, value]) => String(value))
		.filter((value) => value.length > 0)
		.sort((a, b) => b.length - a.length);
	for (const value of values) {
		redacted = redacted.split(value).join(REDACTED);
	}
	return redacted;
}
