import { DefinitionError } from "./errors.js";
import type { ParamValue, RunParameters, StageCondition } from "./types.js";

type Token =
	| { type: "and" | "or" | "not" | "eq" | "neq" | "lparen" | "rparen" }
	| { type: "string"; value: string }
	| { type: "word"; value: string };

type Expr =
	| { type: "and" | "or"; left: Expr; right: Expr }
	| { type: "not"; operand: Expr }
	| { type: "compare"; op: "eq" | "neq"; left: Operand; right: Operand }
	| { type: "truthy"; operand: Operand };

type Operand = { type: "literal"; value: ParamValue } | { type: "param"; name: string };

const WRAPPER_PATTERN = /^\$\{\{([\s\S]*)\}\}$/;
const INTERPOLATION_PATTERN = /\$\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g;
const WORD_PATTERN = /^[A-Za-z0-9_.-]+/;

export function compileCondition(source: string, origin?: string): StageCondition {
	const trimmed = source.trim();
	const unwrapped = trimmed.match(WRAPPER_PATTERN)?.[1]?.trim() ?? trimmed;
	if (unwrapped.length === 0) {
		throw new DefinitionError("Empty condition expression", origin);
	}
	const parser = new ConditionParser(tokenize(unwrapped, origin), unwrapped, origin);
	const expr = parser.parse();
	return {
		source: trimmed,
		evaluate: (params) => evaluate(expr, params),
	};
}

export function interpolate(template: string, params: RunParameters): string {
	return template.replace(INTERPOLATION_PATTERN, (_match, key: string) => {
		const value = resolveParam(key, params);
		return value === undefined ? "" : String(value);
	});
}

export function isTruthy(value: ParamValue | undefined): boolean {
	if (value === undefined) {
		return false;
	}
	if (typeof value === "boolean") {
		return value;
	}
	if (typeof value === "number") {
		return value !== 0;
	}
	const normalized = value.trim().toLowerCase();
	return normalized !== "" && normalized !== "false" && normalized !== "0";
}

function resolveParam(key: string, params: RunParameters): ParamValue | undefined {
	const name = key.startsWith("params.") ? key.slice("params.".length) : key;
	return Object.prototype.hasOwnProperty.call(params, name) ? params[name] : undefined;
}

function tokenize(input: string, origin?: string): Token[] {
	const tokens: Token[] = [];
	let i = 0;
	while (i < input.length) {
		const rest = input.slice(i);
		const char = input[i];
		if (/\s/.test(char)) {
			i += 1;
			continue;
		}
		if (rest.startsWith("&&")) {
			tokens.push({ type: "and" });
			i += 2;
			continue;
		}
		if (rest.startsWith("||")) {
			tokens.push({ type: "or" });
			i += 2;
			continue;
		}
		if (rest.startsWith("==")) {
			tokens.push({ type: "eq" });
			i += 2;
			continue;
		}
		if (rest.startsWith("!=")) {
			tokens.push({ type: "neq" });
			i += 2;
			continue;
		}
		if (char === "!") {
			tokens.push({ type: "not" });
			i += 1;
			continue;
		}
		if (char === "(") {
			tokens.push({ type: "lparen" });
			i += 1;
			continue;
		}
		if (char === ")") {
			tokens.push({ type: "rparen" });
			i += 1;
			continue;
		}
		if (char === "'" || char === '"') {
			const end = input.indexOf(char, i + 1);
			if (end === -1) {
				throw new DefinitionError(`Unterminated string in condition "${input}"`, origin);
			}
			tokens.push({ type: "string", value: input.slice(i + 1, end) });
			i = end + 1;
			continue;
		}
		const word = rest.match(WORD_PATTERN)?.[0];
		if (!word) {
			throw new DefinitionError(`Unexpected "${char}" in condition "${input}"`, origin);
		}
		tokens.push({ type: "word", value: word });
		i += word.length;
	}
	return tokens;
}

class ConditionParser {
	private position = 0;

	constructor(
		private readonly tokens: Token[],
		private readonly input: string,
		private readonly origin?: string,
	) {}

	parse(): Expr {
		const expr = this.parseOr();
		if (this.position < this.tokens.length) {
			throw this.error("unexpected trailing tokens");
		}
		return expr;
	}

	private parseOr(): Expr {
		let left = this.parseAnd();
		while (this.peek()?.type === "or") {
			this.position += 1;
			left = { type: "or", left, right: this.parseAnd() };
		}
		return left;
	}

	private parseAnd(): Expr {
		let left = this.parseUnary();
		while (this.peek()?.type === "and") {
			this.position += 1;
			left = { type: "and", left, right: this.parseUnary() };
		}
		return left;
	}

	private parseUnary(): Expr {
		const token = this.peek();
		if (token?.type === "not") {
			this.position += 1;
			return { type: "not", operand: this.parseUnary() };
		}
		if (token?.type === "lparen") {
			this.position += 1;
			const inner = this.parseOr();
			if (this.peek()?.type !== "rparen") {
				throw this.error("missing closing parenthesis");
			}
			this.position += 1;
			return inner;
		}
		const left = this.parseOperand();
		const op = this.peek();
		if (op?.type === "eq" || op?.type === "neq") {
			this.position += 1;
			return { type: "compare", op: op.type, left, right: this.parseOperand() };
		}
		return { type: "truthy", operand: left };
	}

	private parseOperand(): Operand {
		const token = this.peek();
		if (!token) {
			throw this.error("unexpected end of expression");
		}
		this.position += 1;
		if (token.type === "string") {
			return { type: "literal", value: token.value };
		}
		if (token.type !== "word") {
			throw this.error(`unexpected "${describeToken(token)}"`);
		}
		if (token.value === "true" || token.value === "false") {
			return { type: "literal", value: token.value === "true" };
		}
		if (/^-?\d+(\.\d+)?$/.test(token.value)) {
			return { type: "literal", value: Number(token.value) };
		}
		return { type: "param", name: token.value };
	}

	private peek(): Token | undefined {
		return this.tokens[this.position];
	}

	private error(detail: string): DefinitionError {
		return new DefinitionError(`Invalid condition "${this.input}": ${detail}`, this.origin);
	}
}

function describeToken(token: Token): string {
	switch (token.type) {
		case "and":
			return "&&";
		case "or":
			return "||";
		case "not":
			return "!";
		case "eq":
			return "==";
		case "neq":
			return "!=";
		case "lparen":
			return "(";
		case "rparen":
			return ")";
		default:
			return token.value;
	}
}

function evaluate(expr: Expr, params: RunParameters): boolean {
	switch (expr.type) {
		case "and":
			return evaluate(expr.left, params) && evaluate(expr.right, params);
		case "or":
			return evaluate(expr.left, params) || evaluate(expr.right, params);
		case "not":
			return !evaluate(expr.operand, params);
		case "truthy":
			return isTruthy(resolveOperand(expr.operand, params));
		case "compare": {
			const equal = compareValues(
				resolveOperand(expr.left, params),
				resolveOperand(expr.right, params),
			);
			return expr.op === "eq" ? equal : !equal;
		}
	}
}

function resolveOperand(operand: Operand, params: RunParameters): ParamValue | undefined {
	if (operand.type === "literal") {
		return operand.value;
	}
	return resolveParam(operand.name, params);
}

function compareValues(left: ParamValue | undefined, right: ParamValue | undefined): boolean {
	return String(left ?? "") === String(right ?? "");
}
