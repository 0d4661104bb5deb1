/**
 * Pipeline facade.
 */
export { PipelineOrchestrator, newRunId } from './orchestrator.js';
export type { PipelineOutcome, PipelineRunStatus, RunOptions, OrchestratorDeps } from './orchestrator.js';
export { recordFinancialDecision, feasibilityEstimate } from './financial.js';
export type { FinancialOverrides } from './financial.js';
