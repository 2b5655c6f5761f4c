/**
 * Command exports
 */

export { planCommand, summarizePlan, describePlan, type PlanSummary } from './plan.js';
export { applyCommand, type ApplySummary, type IssuedBatch } from './apply.js';
export { statusCommand, type StatusOptions, type GroupStatus } from './status.js';
export { importCommand, type ImportOptions } from './import.js';
export { destroyCommand, type DestroyOptions } from './destroy.js';
