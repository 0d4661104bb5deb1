/**
 * Stage runner contract.
 *
 * A runner reads a frozen snapshot of the case and its external sources and
 * returns an artifact or a LowConfidence result. It never appends to the case;
 * the orchestrator records what it returns.
 */

import type { KnowledgeBase } from '../knowledge/index.js';
import type {
  AssessmentIntake, CaseEvent, LowConfidence, PipelineConfig, ReviewArtifact, ReviewRole, Risk, StageResult,
} from '../types/index.js';

export interface StageSources {
  run_id: string;
  /** ISO timestamp at which the current run started. */
  started_at: string;
  intake: AssessmentIntake;
  knowledge: KnowledgeBase;
  finance: PipelineConfig['finance'];
  now: () => Date;
}

export interface StageRunner {
  run(role: ReviewRole, snapshot: readonly CaseEvent[], sources: StageSources, signal: AbortSignal): Promise<StageResult>;
}

export function buildArtifact(
  role: ReviewRole,
  sources: StageSources,
  fields: { flags?: string[]; findings: Record<string, unknown>; blocking?: boolean; confidence: number; risks?: Risk[] },
): ReviewArtifact {
  return {
    role,
    run_id: sources.run_id,
    produced_at: sources.now().toISOString(),
    flags: fields.flags ?? [],
    findings: fields.findings,
    blocking: fields.blocking ?? false,
    confidence: fields.confidence,
    risks: fields.risks ?? [],
    low_confidence: false,
  };
}

export function lowConfidence(
  role: ReviewRole, confidence: number, reason: string, partial: ReviewArtifact | null = null,
): LowConfidence {
  return {
    kind: 'low_confidence',
    role,
    confidence,
    reason,
    partial: partial ? { ...partial, confidence, low_confidence: true } : null,
  };
}

/** String entries of an untyped findings value. */
export function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
