/**
 * AssessmentService: the facade the MCP tools call.
 *
 * Owns the case registry, the orchestrator (and through it each case's
 * negotiation coordinator) and the escalation channel. Every entry point
 * validates its input before anything is appended.
 */

import { CaseRegistry } from './case/case-record.js';
import type { Clock } from './case/event-log.js';
import { latestRunId, negotiations } from './case/projections.js';
import { getConfig } from './config.js';
import { InvalidInputError, SequenceViolationError } from './errors.js';
import { FileEscalationChannel } from './escalation/channel.js';
import type { EscalationChannel } from './escalation/channel.js';
import { loadKnowledge } from './knowledge/index.js';
import type { KnowledgeBase } from './knowledge/index.js';
import type { NegotiationResponder, SubmittedTurn, TurnResult } from './negotiation/index.js';
import { PipelineOrchestrator, recordFinancialDecision } from './pipeline/index.js';
import type { FinancialOverrides, PipelineOutcome } from './pipeline/index.js';
import { buildCaseView, resolveReportStatus } from './reporting/status.js';
import { defaultStageRunners } from './stages/index.js';
import type { StageRunnerRegistry } from './stages/index.js';
import { recordAudit } from './storage/audit.js';
import { FileCaseStorage } from './storage/event-store.js';
import type { CaseStorage } from './storage/event-store.js';
import { humanResolutionSchema } from './types/schemas.js';
import type {
  AssessmentIntake, CaseView, FinancialDecision, HumanResolutionPayload, NegotiationState,
  PipelineConfig, ReportStatus,
} from './types/index.js';

export interface AssessmentServiceOptions {
  config?: PipelineConfig;
  storage?: CaseStorage;
  escalation?: EscalationChannel;
  runners?: StageRunnerRegistry;
  responder?: NegotiationResponder;
  knowledge?: KnowledgeBase;
  clock?: Clock;
}

export interface CaseSummary {
  assessment_id: string;
  status: ReportStatus;
  archived: boolean;
  events: number;
}

export class AssessmentService {
  readonly cases: CaseRegistry;
  readonly orchestrator: PipelineOrchestrator;
  private config: PipelineConfig;

  constructor(options: AssessmentServiceOptions = {}) {
    this.config = options.config ?? getConfig();
    this.cases = new CaseRegistry(options.storage ?? new FileCaseStorage(this.config.storage.base_path), options.clock);
    this.orchestrator = new PipelineOrchestrator({
      cases: this.cases,
      runners: options.runners ?? defaultStageRunners(),
      knowledge: options.knowledge ?? loadKnowledge(this.config.storage.knowledge_path),
      escalation: options.escalation ?? new FileEscalationChannel(this.config.storage.base_path),
      config: this.config,
      responder: options.responder,
    });
  }

  /** Rates and overhead the pipeline prices with. */
  get finance(): PipelineConfig['finance'] {
    return this.config.finance;
  }

  // -------------------------------------------------------------------------
  // Pipeline
  // -------------------------------------------------------------------------

  async startAssessment(
    intake: AssessmentIntake, options: { assessmentId?: string; signal?: AbortSignal } = {},
  ): Promise<PipelineOutcome> {
    const record = this.cases.create(intake, options.assessmentId);
    return this.orchestrator.run(record.assessmentId, { signal: options.signal });
  }

  /** Continue the latest run (or a named one); a case with no run yet starts one. */
  async resumeAssessment(assessmentId: string, runId?: string, signal?: AbortSignal): Promise<PipelineOutcome> {
    const record = this.cases.open(assessmentId);
    const target = runId ?? latestRunId(record.snapshot());
    return target
      ? this.orchestrator.resume(assessmentId, target, { signal })
      : this.orchestrator.run(assessmentId, { signal });
  }

  getCaseView(assessmentId: string): CaseView {
    const record = this.cases.open(assessmentId);
    return buildCaseView(assessmentId, record.snapshot(), this.config.pipeline.required_roles);
  }

  listCases(): CaseSummary[] {
    return this.cases.list().map((id) => {
      const view = this.getCaseView(id);
      return { assessment_id: id, status: view.status, archived: view.archived, events: view.last_sequence_no };
    });
  }

  archiveCase(assessmentId: string, reason: string): CaseView {
    const record = this.cases.open(assessmentId);
    record.append({ kind: 'CaseArchived', source_role: 'human', payload: { reason } });
    recordAudit('case.archived', 'human', 'case', assessmentId, { reason }, assessmentId);
    const view = buildCaseView(assessmentId, record.snapshot(), this.config.pipeline.required_roles);
    this.cases.release(assessmentId);
    return view;
  }

  // -------------------------------------------------------------------------
  // Negotiations
  // -------------------------------------------------------------------------

  negotiationStatus(assessmentId: string, negotiationId: string): NegotiationState {
    const record = this.cases.open(assessmentId);
    return this.orchestrator.coordinatorFor(record).getStatus(negotiationId);
  }

  /** Waits for any negotiation the pipeline is driving on the same entity. */
  submitTurn(assessmentId: string, negotiationId: string, turn: SubmittedTurn): Promise<TurnResult> {
    const record = this.cases.open(assessmentId);
    return this.orchestrator.coordinatorFor(record).submitTurnSerialized(negotiationId, turn);
  }

  /** Human resolution intake for a DEADLOCK or TIMEOUT negotiation. */
  resolveNegotiation(assessmentId: string, resolution: HumanResolutionPayload): NegotiationState {
    const parsed = humanResolutionSchema.safeParse(resolution);
    if (!parsed.success) throw new InvalidInputError('Resolution is malformed', { issues: parsed.error.issues });
    if (parsed.data.resolved_by.trim().length === 0) throw new InvalidInputError('resolved_by is required');

    const record = this.cases.open(assessmentId);
    const state = this.orchestrator.coordinatorFor(record).getStatus(parsed.data.negotiation_id);
    if (state.status !== 'DEADLOCK' && state.status !== 'TIMEOUT') {
      throw new SequenceViolationError(`Negotiation ${state.negotiation_id} is ${state.status}; only DEADLOCK or TIMEOUT take a human resolution`, {
        negotiation_id: state.negotiation_id, status: state.status,
      });
    }
    if (state.human_resolution?.status === 'RESOLVED') {
      throw new SequenceViolationError(`Negotiation ${state.negotiation_id} is already resolved by ${state.human_resolution.resolved_by}`, {
        negotiation_id: state.negotiation_id,
      });
    }

    record.append({ kind: 'HumanResolution', source_role: 'human', payload: parsed.data });
    recordAudit('governance.human_resolution', parsed.data.resolved_by, 'negotiation', state.negotiation_id, {
      status: parsed.data.status, final_outcome: parsed.data.final_outcome,
    }, assessmentId);

    const updated = negotiations(record.snapshot()).find((n) => n.negotiation_id === state.negotiation_id);
    return updated ?? state;
  }

  // -------------------------------------------------------------------------
  // Financials
  // -------------------------------------------------------------------------

  /** Append a new decision for the latest run; earlier decisions stay in the log. */
  reevaluateFinancials(
    assessmentId: string, overrides: FinancialOverrides,
  ): { decision: FinancialDecision; report_status: ReportStatus } {
    const record = this.cases.open(assessmentId);
    const snapshot = record.snapshot();
    const runId = latestRunId(snapshot);
    if (!runId) throw new InvalidInputError(`Assessment ${assessmentId} has no pipeline run to re-evaluate`);

    const prior = snapshot.filter((e) => e.kind === 'FinancialDecision' && e.payload.run_id === runId).length;
    const decision = recordFinancialDecision(record, runId, `FD-${runId}-R${prior}`, this.config.finance, overrides);
    return { decision, report_status: resolveReportStatus(record.snapshot(), this.config.pipeline.required_roles) };
  }
}
