/**
 * Stage runner facade.
 */
export { StageRunnerRegistry, defaultStageRunners, getAllStageProfiles } from './registry.js';
export type { StageProfile } from './registry.js';
export { buildArtifact, lowConfidence, stringList } from './types.js';
export type { StageRunner, StageSources } from './types.js';
export { targetingRunner } from './targeting.js';
export { feasibilityRunner, highestTier } from './feasibility.js';
export { complianceRunner } from './compliance.js';
export { synthesisRunner } from './synthesis.js';
