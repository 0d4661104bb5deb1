/**
 * Negotiation Coordinator: the bounded three-turn protocol over one risk.
 *
 *   turn 1  initiator flags the risk and the acceptable mitigations
 *   turn 2  responder proposes a mitigation and its exclusion scope
 *   turn 3  initiator's review: validation matrix plus flagged-field coverage
 *
 * Every negotiation ends RESOLVED, DEADLOCK or TIMEOUT. There is no
 * modification loop: anything short of acceptance at turn 3 is DEADLOCK.
 * State is never held here; each call re-projects the case log.
 */

import {
  acceptableMitigations, conflictingRequiredFields, reviewProposal,
} from '../decision/index.js';
import type { CaseRecord } from '../case/case-record.js';
import { findNegotiation, negotiationForRisk } from '../case/projections.js';
import { InvalidInputError, IrrecoverableError, SequenceViolationError, TimeoutError } from '../errors.js';
import { recordAudit } from '../storage/audit.js';
import { mitigationProposalSchema, riskSchema } from '../types/schemas.js';
import type {
  MitigationProposal, NegotiationState, NegotiationStatus, ReviewRole, Risk, TurnPayload,
} from '../types/index.js';
import { EntityLock } from './entity-lock.js';
import type { NegotiationResponder } from './responder.js';

export type SubmittedTurn =
  | { turn: 2; role: ReviewRole; proposal: MitigationProposal }
  | { turn: 3; role: ReviewRole };

export interface TurnResult {
  negotiation_id: string;
  /** False when the turn arrived after its budget and the negotiation timed out instead. */
  accepted: boolean;
  status: NegotiationStatus;
  state: NegotiationState;
}

export interface CoordinatorOptions {
  turnTimeoutMs: number;
  responderRole?: ReviewRole;
  /** Shared across coordinators so every writer to a case waits on the same entity keys. */
  lock?: EntityLock;
}

export function negotiationIdFor(riskId: string): string {
  return `NEG-${riskId}`;
}

export class NegotiationCoordinator {
  private lock: EntityLock;
  private responderRole: ReviewRole;

  constructor(private record: CaseRecord, private options: CoordinatorOptions) {
    if (!(options.turnTimeoutMs > 0)) {
      throw new InvalidInputError('turnTimeoutMs must be positive', { turn_timeout_ms: options.turnTimeoutMs });
    }
    this.responderRole = options.responderRole ?? 'technical_pm';
    this.lock = options.lock ?? new EntityLock();
  }

  // -------------------------------------------------------------------------
  // Protocol boundary
  // -------------------------------------------------------------------------

  initiate(risk: Risk): string {
    const parsed = riskSchema.safeParse(risk);
    if (!parsed.success) throw new InvalidInputError('Risk is malformed', { issues: parsed.error.issues });
    const r = parsed.data;
    if (r.raised_by === this.responderRole) {
      throw new InvalidInputError(`Risk raised by ${r.raised_by} cannot be negotiated against itself`, { risk_id: r.risk_id });
    }

    const existing = negotiationForRisk(this.record.snapshot(), r.risk_id);
    if (existing) {
      throw new SequenceViolationError(`Risk ${r.risk_id} already has negotiation ${existing.negotiation_id}`, {
        risk_id: r.risk_id, negotiation_id: existing.negotiation_id,
      });
    }

    const negotiationId = negotiationIdFor(r.risk_id);
    const participants = { initiator: r.raised_by, responder: this.responderRole };
    this.record.append({
      kind: 'NegotiationTurn',
      source_role: r.raised_by,
      payload: {
        negotiation_id: negotiationId,
        risk_id: r.risk_id,
        affected_entity: r.affected_entity,
        participants,
        turn: {
          turn: 1,
          role: r.raised_by,
          risk_description: r.description,
          category: r.category,
          flagged_fields: [...r.flagged_fields],
          acceptable_mitigations: acceptableMitigations(r.category),
        },
      },
    });
    this.audit('negotiation.initiated', r.raised_by, negotiationId, { risk_id: r.risk_id, entity: r.affected_entity });

    const conflicts = conflictingRequiredFields(r.category, r.flagged_fields, r.required_fields);
    if (conflicts.length > 0) {
      this.record.append({
        kind: 'NegotiationDeadlocked',
        source_role: 'system',
        payload: {
          negotiation_id: negotiationId, risk_id: r.risk_id,
          status: 'DEADLOCK', reason: 'irreconcilable_requirement', turn: 1,
        },
      });
      this.audit('negotiation.deadlocked', 'system', negotiationId, { reason: 'irreconcilable_requirement', fields: conflicts });
    }
    return negotiationId;
  }

  submitTurn(negotiationId: string, submitted: SubmittedTurn): TurnResult {
    const state = this.requireState(negotiationId);

    if (state.status !== 'NEGOTIATING') {
      this.audit('negotiation.rejected_turn', submitted.role, negotiationId, { turn: submitted.turn, status: state.status });
      throw new SequenceViolationError(`Negotiation ${negotiationId} is already ${state.status}`, {
        negotiation_id: negotiationId, status: state.status,
      });
    }
    if (submitted.turn !== state.turn + 1) {
      this.audit('negotiation.rejected_turn', submitted.role, negotiationId, { turn: submitted.turn, expected: state.turn + 1 });
      throw new SequenceViolationError(`Negotiation ${negotiationId} expects turn ${state.turn + 1}, got turn ${submitted.turn}`, {
        negotiation_id: negotiationId, expected: state.turn + 1, received: submitted.turn,
      });
    }

    const expectedRole = submitted.turn === 2 ? state.participants.responder : state.participants.initiator;
    if (submitted.role !== expectedRole) {
      throw new InvalidInputError(`Turn ${submitted.turn} belongs to ${expectedRole}, not ${submitted.role}`, {
        negotiation_id: negotiationId,
      });
    }

    let proposal: MitigationProposal | null = null;
    if (submitted.turn === 2) {
      const parsed = mitigationProposalSchema.safeParse(submitted.proposal);
      if (!parsed.success) throw new InvalidInputError('Proposal is malformed', { issues: parsed.error.issues });
      proposal = parsed.data;
    }

    if (this.isExpired(state)) {
      const timedOut = this.timeOut(state);
      return { negotiation_id: negotiationId, accepted: false, status: timedOut.status, state: timedOut };
    }

    if (proposal) {
      this.appendTurn(state, { turn: 2, role: submitted.role, proposal });
      this.audit('negotiation.turn', submitted.role, negotiationId, { turn: 2, mitigation: proposal.mitigation });
    } else {
      this.finalReview(state);
    }

    const next = this.requireState(negotiationId);
    return { negotiation_id: negotiationId, accepted: true, status: next.status, state: next };
  }

  /** submitTurn, queued behind any negotiation in progress on the same entity. */
  submitTurnSerialized(negotiationId: string, submitted: SubmittedTurn): Promise<TurnResult> {
    const { affected_entity: entity } = this.requireState(negotiationId);
    return this.lock.run(this.lockKey(entity), async () => this.submitTurn(negotiationId, submitted));
  }

  /** Current state; an open negotiation past its turn budget is timed out first. */
  getStatus(negotiationId: string): NegotiationState {
    const state = this.requireState(negotiationId);
    if (state.status === 'NEGOTIATING' && this.isExpired(state)) return this.timeOut(state);
    return state;
  }

  // -------------------------------------------------------------------------
  // Driver
  // -------------------------------------------------------------------------

  /**
   * Run a risk's negotiation to a terminal state, reusing an existing one.
   * Negotiations on the same affected entity are serialized.
   */
  negotiate(risk: Risk, responder: NegotiationResponder): Promise<NegotiationState> {
    return this.lock.run(this.lockKey(risk.affected_entity), () => this.drive(risk, responder));
  }

  private async drive(risk: Risk, responder: NegotiationResponder): Promise<NegotiationState> {
    const existing = negotiationForRisk(this.record.snapshot(), risk.risk_id);
    const negotiationId = existing ? existing.negotiation_id : this.initiate(risk);

    let state = this.getStatus(negotiationId);
    if (state.status !== 'NEGOTIATING') return state;

    if (state.turn === 1) {
      const proposal = await this.awaitProposal(state, risk, responder);
      // Another writer may have moved the negotiation while the responder worked.
      state = this.requireState(negotiationId);
      if (state.status !== 'NEGOTIATING') return state;
      if (state.turn === 1) {
        if (!proposal) return this.timeOut(state);
        const result = this.submitTurn(negotiationId, { turn: 2, role: responder.role, proposal });
        if (result.status !== 'NEGOTIATING') return result.state;
        state = result.state;
      }
    }

    return this.submitTurn(negotiationId, { turn: 3, role: state.participants.initiator }).state;
  }

  /** The responder's proposal, or null if the turn budget ran out or the responder failed. */
  private async awaitProposal(
    state: NegotiationState, risk: Risk, responder: NegotiationResponder,
  ): Promise<MitigationProposal | null> {
    const remaining = Math.max(0, this.deadline(state) - this.record.now().getTime());
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const expired = new Promise<null>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(new TimeoutError(`Responder ${responder.role}`, this.options.turnTimeoutMs));
        resolve(null);
      }, remaining);
    });

    try {
      return await Promise.race([
        responder.propose({
          negotiation_id: state.negotiation_id,
          risk,
          acceptable_mitigations: [...state.acceptable_mitigations],
        }, controller.signal),
        expired,
      ]);
    } catch (err) {
      this.audit('negotiation.rejected_turn', responder.role, state.negotiation_id, {
        turn: 2, error: err instanceof Error ? err.message : String(err),
      });
      return null;
    } finally {
      clearTimeout(timer);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private finalReview(state: NegotiationState): void {
    const proposal = state.proposal;
    if (!proposal) {
      throw new IrrecoverableError(`Negotiation ${state.negotiation_id} reached turn 2 without a proposal`);
    }
    const review = reviewProposal(state.category, state.flagged_fields, proposal);
    this.appendTurn(state, { turn: 3, role: state.participants.initiator, ...review });
    this.audit('negotiation.turn', state.participants.initiator, state.negotiation_id, { turn: 3, verdict: review.verdict });

    if (review.verdict === 'accept') {
      this.record.append({
        kind: 'NegotiationResolved',
        source_role: 'system',
        payload: {
          negotiation_id: state.negotiation_id,
          risk_id: state.risk_id,
          mitigation: proposal.mitigation,
          exclusion_scope: [...proposal.exclusion_scope],
        },
      });
      this.audit('negotiation.resolved', 'system', state.negotiation_id, { mitigation: proposal.mitigation });
      return;
    }

    this.record.append({
      kind: 'NegotiationDeadlocked',
      source_role: 'system',
      payload: {
        negotiation_id: state.negotiation_id, risk_id: state.risk_id,
        status: 'DEADLOCK', reason: 'unresolved_at_turn_limit', turn: 3,
      },
    });
    this.audit('negotiation.deadlocked', 'system', state.negotiation_id, {
      reason: 'unresolved_at_turn_limit', validation: review.validation, uncovered_fields: review.uncovered_fields,
    });
  }

  private appendTurn(
    state: NegotiationState,
    turn: Exclude<TurnPayload, { turn: 1 }>,
  ): void {
    this.record.append({
      kind: 'NegotiationTurn',
      source_role: turn.role,
      payload: {
        negotiation_id: state.negotiation_id,
        risk_id: state.risk_id,
        affected_entity: state.affected_entity,
        participants: { ...state.participants },
        turn,
      },
    });
  }

  private timeOut(state: NegotiationState): NegotiationState {
    this.record.append({
      kind: 'NegotiationDeadlocked',
      source_role: 'system',
      payload: {
        negotiation_id: state.negotiation_id, risk_id: state.risk_id,
        status: 'TIMEOUT', reason: 'timeout', turn: state.turn,
      },
    });
    this.audit('negotiation.timeout', 'system', state.negotiation_id, {
      turn: state.turn, budget_ms: this.options.turnTimeoutMs,
    });
    return this.requireState(state.negotiation_id);
  }

  private deadline(state: NegotiationState): number {
    return Date.parse(state.last_activity_at) + this.options.turnTimeoutMs;
  }

  private isExpired(state: NegotiationState): boolean {
    return this.record.now().getTime() >= this.deadline(state);
  }

  private lockKey(entity: string): string {
    return `${this.record.assessmentId}/${entity}`;
  }

  private requireState(negotiationId: string): NegotiationState {
    const state = findNegotiation(this.record.snapshot(), negotiationId);
    if (!state) throw new InvalidInputError(`Negotiation ${negotiationId} not found`, { negotiation_id: negotiationId });
    return state;
  }

  private audit(
    action: Parameters<typeof recordAudit>[0], actor: string, negotiationId: string, details: Record<string, unknown>,
  ): void {
    recordAudit(action, actor, 'negotiation', negotiationId, details, this.record.assessmentId);
  }
}
