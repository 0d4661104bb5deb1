/**
 * Pipeline Orchestrator.
 *
 *   A  outcomes_strategist
 *   B  technical_pm + legal_counsel, concurrently, over the same post-A snapshot
 *   C  one negotiation per blocking risk, then the financial decision
 *   -  gate: every DEADLOCK/TIMEOUT resolved by a human, latest decision approved
 *   D  document_architect
 *
 * A halted run escalates and returns; nothing is retried automatically.
 * Roles already recorded for the run are skipped, so resume() picks up where a
 * stalled or aborted run stopped.
 */

import { randomUUID } from 'node:crypto';
import type { CaseRecord, CaseRegistry } from '../case/case-record.js';
import { artifactsForRun, blockingRisks, financialDecisionForRun, isArchived } from '../case/projections.js';
import { GateBlockedError, InvalidInputError, IrrecoverableError, isPipelineError } from '../errors.js';
import type { EscalationChannel } from '../escalation/channel.js';
import type { KnowledgeBase } from '../knowledge/index.js';
import { EntityLock, NegotiationCoordinator, PolicyResponder } from '../negotiation/index.js';
import type { NegotiationResponder } from '../negotiation/index.js';
import { financialBlockers, interventionBlockers, resolveReportStatus } from '../reporting/status.js';
import type { StageRunnerRegistry, StageSources } from '../stages/index.js';
import { recordAudit } from '../storage/audit.js';
import { reviewArtifactSchema } from '../types/schemas.js';
import { isLowConfidence, ROLE_DISPLAY } from '../types/index.js';
import type {
  AuditAction, Blocker, CaseEvent, PipelineConfig, PipelineStep, ReportStatus, ReviewArtifact, ReviewRole, StageResult,
} from '../types/index.js';
import { recordFinancialDecision } from './financial.js';

export type PipelineRunStatus = 'completed' | 'stalled' | 'aborted' | 'failed';

export interface PipelineOutcome {
  assessment_id: string;
  run_id: string;
  status: PipelineRunStatus;
  /** Last step reached. */
  step: PipelineStep;
  blockers: Blocker[];
  report_status: ReportStatus;
  error: { code: string; message: string } | null;
}

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
}

export interface OrchestratorDeps {
  cases: CaseRegistry;
  runners: StageRunnerRegistry;
  knowledge: KnowledgeBase;
  escalation: EscalationChannel;
  config: PipelineConfig;
  responder?: NegotiationResponder;
}

type Halt = Omit<PipelineOutcome, 'assessment_id' | 'run_id' | 'report_status'>;

interface RunContext {
  record: CaseRecord;
  runId: string;
  signal: AbortSignal;
  sources: StageSources;
}

const HALT_PRIORITY: Record<PipelineRunStatus, number> = { failed: 3, aborted: 2, stalled: 1, completed: 0 };

export function newRunId(): string {
  return `RUN-${randomUUID().slice(0, 8)}`;
}

export class PipelineOrchestrator {
  private caseLock = new EntityLock();
  private negotiationLock = new EntityLock();
  private responder: NegotiationResponder;

  constructor(private deps: OrchestratorDeps) {
    this.responder = deps.responder ?? new PolicyResponder();
  }

  /**
   * A coordinator over the case. Coordinators hold no state of their own; the
   * shared lock serializes the pipeline and direct turn submissions per entity.
   */
  coordinatorFor(record: CaseRecord): NegotiationCoordinator {
    return new NegotiationCoordinator(record, {
      turnTimeoutMs: this.deps.config.negotiation.turn_timeout_ms,
      responderRole: this.responder.role,
      lock: this.negotiationLock,
    });
  }

  run(assessmentId: string, options: RunOptions = {}): Promise<PipelineOutcome> {
    return this.caseLock.run(assessmentId, () => this.execute(assessmentId, options.runId ?? newRunId(), options.signal));
  }

  resume(assessmentId: string, runId: string, options: Omit<RunOptions, 'runId'> = {}): Promise<PipelineOutcome> {
    return this.caseLock.run(assessmentId, () => this.execute(assessmentId, runId, options.signal));
  }

  // -------------------------------------------------------------------------
  // Steps
  // -------------------------------------------------------------------------

  private async execute(assessmentId: string, runId: string, signal = new AbortController().signal): Promise<PipelineOutcome> {
    const record = this.deps.cases.open(assessmentId);
    if (isArchived(record.snapshot())) {
      throw new InvalidInputError(`Assessment ${assessmentId} is archived`, { assessment_id: assessmentId });
    }

    const ctx: RunContext = { record, runId, signal, sources: this.sourcesFor(record, runId) };
    this.audit(ctx, 'pipeline.start', { resumed: artifactsForRun(record.snapshot(), runId).size > 0 });

    try {
      const halt = await this.steps(ctx);
      return halt ? this.finish(ctx, halt) : this.finish(ctx, { status: 'completed', step: 'D', blockers: [], error: null });
    } catch (err) {
      if (err instanceof IrrecoverableError || !isPipelineError(err)) throw err;
      return this.finish(ctx, {
        status: 'failed', step: 'C', blockers: [], error: { code: err.code, message: err.message },
      });
    }
  }

  private async steps(ctx: RunContext): Promise<Halt | null> {
    const a = await this.runStage(ctx, 'outcomes_strategist', 'A', ctx.record.snapshot());
    if (a) return a;

    const postA = ctx.record.snapshot();
    const settled = await Promise.allSettled([
      this.runStage(ctx, 'technical_pm', 'B', postA),
      this.runStage(ctx, 'legal_counsel', 'B', postA),
    ]);
    const b = mergeHalts(settled.map((s) => s.status === 'fulfilled' ? s.value : failedHalt('B', s.reason)));
    if (b) return b;

    if (ctx.signal.aborted) return abortedHalt('C');
    const c = await this.negotiateRisks(ctx);
    if (c) return c;

    if (!financialDecisionForRun(ctx.record.snapshot(), ctx.runId)) {
      recordFinancialDecision(ctx.record, ctx.runId, `FD-${ctx.runId}`, this.deps.config.finance);
    }

    const gate = this.checkGate(ctx);
    if (gate) return gate;
    if (ctx.signal.aborted) return abortedHalt('C');

    return this.runStage(ctx, 'document_architect', 'D', ctx.record.snapshot());
  }

  private async runStage(ctx: RunContext, role: ReviewRole, step: PipelineStep, snapshot: readonly CaseEvent[]): Promise<Halt | null> {
    if (artifactsForRun(snapshot, ctx.runId).has(role)) return null;
    if (ctx.signal.aborted) return abortedHalt(step);

    let result: StageResult;
    try {
      result = await this.deps.runners.get(role).run(role, snapshot, ctx.sources, ctx.signal);
    } catch (err) {
      if (ctx.signal.aborted) return abortedHalt(step);
      this.audit(ctx, 'pipeline.stage_failed', { role, error: errorMessage(err) });
      return failedHalt(step, err, role);
    }
    if (ctx.signal.aborted) return abortedHalt(step);

    let artifact: ReviewArtifact;
    if (isLowConfidence(result)) {
      const floor = this.deps.config.pipeline.confidence_floor;
      const recorded = result.partial !== null && result.confidence >= floor;
      this.audit(ctx, 'pipeline.low_confidence', { role, confidence: result.confidence, floor, recorded, reason: result.reason });
      if (!result.partial || !recorded) {
        const blocker: Blocker = {
          kind: 'low_confidence',
          target_id: role,
          message: result.partial
            ? `${ROLE_DISPLAY[role]} confidence ${result.confidence.toFixed(2)} is below the floor ${floor.toFixed(2)}: ${result.reason}`
            : `${ROLE_DISPLAY[role]} produced no usable artifact: ${result.reason}`,
        };
        this.escalate(ctx, role, step, 'Stage needs human review', [blocker]);
        return { status: 'stalled', step, blockers: [blocker], error: null };
      }
      artifact = { ...result.partial, confidence: result.confidence, low_confidence: true };
    } else {
      artifact = result;
    }

    const parsed = reviewArtifactSchema.safeParse(artifact);
    if (!parsed.success || parsed.data.role !== role || parsed.data.run_id !== ctx.runId) {
      const err = new InvalidInputError(`${role} returned an artifact that does not belong to run ${ctx.runId}`, { role });
      this.audit(ctx, 'pipeline.stage_failed', { role, error: err.message });
      return failedHalt(step, err, role);
    }

    ctx.record.append({ kind: 'StageCompleted', source_role: role, payload: { run_id: ctx.runId, artifact: parsed.data } });
    this.audit(ctx, 'pipeline.stage_completed', {
      role, step, blocking: parsed.data.blocking, risks: parsed.data.risks.length, low_confidence: parsed.data.low_confidence,
    });
    return null;
  }

  /** Negotiations run to completion even when the run is being aborted. */
  private async negotiateRisks(ctx: RunContext): Promise<Halt | null> {
    const risks = blockingRisks(artifactsForRun(ctx.record.snapshot(), ctx.runId).values());
    if (risks.length === 0) return null;

    const coordinator = this.coordinatorFor(ctx.record);
    const settled = await Promise.allSettled(risks.map((risk) => coordinator.negotiate(risk, this.responder)));
    for (const s of settled) {
      if (s.status === 'rejected' && s.reason instanceof IrrecoverableError) throw s.reason;
    }
    return mergeHalts(settled.map((s) => s.status === 'fulfilled' ? null : failedHalt('C', s.reason)));
  }

  private checkGate(ctx: RunContext): Halt | null {
    const snapshot = ctx.record.snapshot();
    const blockers = [...interventionBlockers(snapshot), ...financialBlockers(snapshot)];
    if (blockers.length === 0) return null;

    const err = new GateBlockedError(ctx.record.assessmentId, blockers.map((b) => b.message));
    this.audit(ctx, 'governance.gate_blocked', { blockers: blockers.map((b) => b.target_id) });
    for (const blocker of blockers) {
      this.escalate(ctx, blocker.target_id, 'C', 'Final compilation gate is blocked', blockers);
    }
    return { status: 'stalled', step: 'C', blockers, error: { code: err.code, message: err.message } };
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private sourcesFor(record: CaseRecord, runId: string): StageSources {
    const firstOfRun = record.snapshot().find((e) => e.kind === 'StageCompleted' && e.payload.run_id === runId);
    return {
      run_id: runId,
      started_at: firstOfRun ? firstOfRun.timestamp : record.now().toISOString(),
      intake: record.intake(),
      knowledge: this.deps.knowledge,
      finance: this.deps.config.finance,
      now: () => record.now(),
    };
  }

  private finish(ctx: RunContext, halt: Halt): PipelineOutcome {
    const outcome: PipelineOutcome = {
      assessment_id: ctx.record.assessmentId,
      run_id: ctx.runId,
      ...halt,
      report_status: resolveReportStatus(ctx.record.snapshot(), this.deps.config.pipeline.required_roles),
    };
    const action: AuditAction = halt.status === 'completed' ? 'pipeline.completed'
      : halt.status === 'aborted' ? 'pipeline.aborted' : 'pipeline.stalled';
    this.audit(ctx, action, {
      status: halt.status, step: halt.step, blockers: halt.blockers.map((b) => b.target_id), report_status: outcome.report_status,
    });
    return outcome;
  }

  private escalate(ctx: RunContext, targetId: string, step: PipelineStep, reason: string, blockers: Blocker[]): void {
    const context = { assessment_id: ctx.record.assessmentId, run_id: ctx.runId, step, reason, blockers };
    try {
      this.deps.escalation.escalate(targetId, context);
      this.audit(ctx, 'governance.escalation', { target_id: targetId, step, delivered: true });
    } catch (err) {
      this.audit(ctx, 'governance.escalation', { target_id: targetId, step, delivered: false, error: errorMessage(err) });
    }
  }

  private audit(ctx: RunContext, action: AuditAction, details: Record<string, unknown>): void {
    recordAudit(action, 'system', 'pipeline_run', ctx.runId, details, ctx.record.assessmentId);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function abortedHalt(step: PipelineStep): Halt {
  return { status: 'aborted', step, blockers: [], error: null };
}

function failedHalt(step: PipelineStep, err: unknown, role?: ReviewRole): Halt {
  return {
    status: 'failed',
    step,
    blockers: [{ kind: 'stage_failed', target_id: role ?? step, message: errorMessage(err) }],
    error: { code: isPipelineError(err) ? err.code : 'STAGE_ERROR', message: errorMessage(err) },
  };
}

/** The most severe halt, carrying every blocker from the step. */
function mergeHalts(halts: ReadonlyArray<Halt | null>): Halt | null {
  let worst: Halt | null = null;
  const blockers: Blocker[] = [];
  for (const h of halts) {
    if (!h) continue;
    blockers.push(...h.blockers);
    if (!worst || HALT_PRIORITY[h.status] > HALT_PRIORITY[worst.status]) worst = h;
  }
  return worst ? { ...worst, blockers } : null;
}
