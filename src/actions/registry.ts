import type { StageAction } from "../core/engine.js";

export type ActionRegistry = ReadonlyMap<string, StageAction>;

const BUILTIN_ACTIONS: Record<string, StageAction> = {
	noop: async () => ({ ok: true }),
};

export function createActionRegistry(extra: Record<string, StageAction> = {}): ActionRegistry {
	return new Map(Object.entries({ ...BUILTIN_ACTIONS, ...extra }));
}

export function resolveAction(registry: ActionRegistry, ref: string): StageAction {
	const action = registry.get(ref);
	if (!action) {
		throw new Error(
			`Unknown action "${ref}". Available actions: ${Array.from(registry.keys()).join(", ")}`,
		);
	}
	return action;
}
