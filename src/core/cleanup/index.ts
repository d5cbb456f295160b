/**
 * Cleanup module exports
 */

export { type DeletionOptions, executeDeletions } from "./orchestrator";
export { planChainDeletions, planDeletions } from "./retention";
