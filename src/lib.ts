export { createActionRegistry, resolveAction } from "./actions/registry.js";
export type { ActionRegistry } from "./actions/registry.js";
export { createCommandAction } from "./actions/command-action.js";
export { definePipeline } from "./core/definition.js";
export type { PipelineInput, StageInput } from "./core/definition.js";
export { discoverPipelines, resolvePipeline } from "./core/discovery.js";
export type { ActionContext, ActionResult, RunEvent, RunEventListener, StageAction } from "./core/engine.js";
export {
	ActionFailure,
	ActionTimeout,
	DefinitionError,
	LockAcquisitionTimeout,
	RunCanceledError,
} from "./core/errors.js";
export { compileCondition, interpolate } from "./core/expressions.js";
export { buildStageGraph } from "./core/graph.js";
export type { StageGraph } from "./core/graph.js";
export { loadPipeline } from "./core/parser.js";
export { bindInputs, selectStages } from "./core/plan.js";
export type * from "./core/types.js";
export { FileLockBackend } from "./locks/file-backend.js";
export { createLockBackend } from "./locks/factory.js";
export { MemoryLockBackend } from "./locks/memory-backend.js";
export { MutexManager } from "./locks/mutex-manager.js";
export type { LockBackend, LockHolder, LockToken } from "./locks/mutex-manager.js";
export {
	DEFAULT_LOCK_TIMEOUT_MS,
	DEFAULT_STAGE_TIMEOUT_MS,
	aggregateRunStatus,
	exitCodeForStatus,
	runPipeline,
} from "./orchestrator/run-controller.js";
export type { RunOptions } from "./orchestrator/run-controller.js";
export { RunStore, createRunEventPersister } from "./store/run-store.js";
