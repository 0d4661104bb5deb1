/**
 * Pure projections over a case event list.
 *
 * Nothing here caches: every function folds the events it is given, so the
 * same prefix always yields the same value.
 */

import type {
  CaseEvent, CaseEventOf, CaseOpenedPayload, FinancialDecision, NegotiationState,
  ReviewArtifact, ReviewRole, Risk,
} from '../types/index.js';

type Events = readonly CaseEvent[];

export function caseOpened(events: Events): CaseOpenedPayload | null {
  const first = events[0];
  return first && first.kind === 'CaseOpened' ? first.payload : null;
}

export function isArchived(events: Events): boolean {
  return events.some((e) => e.kind === 'CaseArchived');
}

/** The run that most recently recorded a stage or financial outcome. */
export function latestRunId(events: Events): string | null {
  for (let i = events.length - 1; i >= 0; i--) {
    const e = events[i];
    if (e.kind === 'StageCompleted' || e.kind === 'FinancialDecision') return e.payload.run_id;
  }
  return null;
}

/** Latest artifact per role for one run; a re-run of a role replaces its earlier artifact. */
export function artifactsForRun(events: Events, runId: string): Map<ReviewRole, ReviewArtifact> {
  const byRole = new Map<ReviewRole, ReviewArtifact>();
  for (const e of events) {
    if (e.kind === 'StageCompleted' && e.payload.run_id === runId) {
      byRole.set(e.payload.artifact.role, e.payload.artifact);
    }
  }
  return byRole;
}

/** Distinct risks raised by blocking artifacts, first occurrence wins. */
export function blockingRisks(artifacts: Iterable<ReviewArtifact>): Risk[] {
  const seen = new Map<string, Risk>();
  for (const artifact of artifacts) {
    if (!artifact.blocking) continue;
    for (const risk of artifact.risks) {
      if (!seen.has(risk.risk_id)) seen.set(risk.risk_id, risk);
    }
  }
  return [...seen.values()];
}

// ---------------------------------------------------------------------------
// Negotiations
// ---------------------------------------------------------------------------

export function negotiations(events: Events): NegotiationState[] {
  const states = new Map<string, NegotiationState>();

  for (const e of events) {
    switch (e.kind) {
      case 'NegotiationTurn': {
        const { negotiation_id, turn } = e.payload;
        if (turn.turn === 1) {
          states.set(negotiation_id, {
            negotiation_id,
            risk_id: e.payload.risk_id,
            affected_entity: e.payload.affected_entity,
            category: turn.category,
            flagged_fields: [...turn.flagged_fields],
            participants: { ...e.payload.participants },
            turn: 1,
            status: 'NEGOTIATING',
            reason: null,
            acceptable_mitigations: [...turn.acceptable_mitigations],
            proposal: null,
            opened_at: e.timestamp,
            last_activity_at: e.timestamp,
            terminal_sequence_no: null,
            human_resolution: null,
          });
          break;
        }
        const state = states.get(negotiation_id);
        if (!state) break;
        state.turn = turn.turn;
        state.last_activity_at = e.timestamp;
        if (turn.turn === 2) state.proposal = { ...turn.proposal, exclusion_scope: [...turn.proposal.exclusion_scope] };
        break;
      }
      case 'NegotiationResolved': {
        const state = states.get(e.payload.negotiation_id);
        if (!state || state.status !== 'NEGOTIATING') break;
        state.status = 'RESOLVED';
        state.last_activity_at = e.timestamp;
        state.terminal_sequence_no = e.sequence_no;
        break;
      }
      case 'NegotiationDeadlocked': {
        const state = states.get(e.payload.negotiation_id);
        if (!state || state.status !== 'NEGOTIATING') break;
        state.status = e.payload.status;
        state.reason = e.payload.reason;
        state.last_activity_at = e.timestamp;
        state.terminal_sequence_no = e.sequence_no;
        break;
      }
      case 'HumanResolution': {
        const state = states.get(e.payload.negotiation_id);
        if (!state || state.terminal_sequence_no === null) break;
        state.human_resolution = { ...e.payload };
        break;
      }
      default:
        break;
    }
  }

  return [...states.values()];
}

export function findNegotiation(events: Events, negotiationId: string): NegotiationState | null {
  return negotiations(events).find((n) => n.negotiation_id === negotiationId) ?? null;
}

export function negotiationForRisk(events: Events, riskId: string): NegotiationState | null {
  return negotiations(events).find((n) => n.risk_id === riskId) ?? null;
}

/** DEADLOCK/TIMEOUT with no later HumanResolution marking it RESOLVED. */
export function needsIntervention(state: NegotiationState): boolean {
  if (state.status !== 'DEADLOCK' && state.status !== 'TIMEOUT') return false;
  return state.human_resolution?.status !== 'RESOLVED';
}

// ---------------------------------------------------------------------------
// Financial decisions
// ---------------------------------------------------------------------------

export function latestFinancialDecision(events: Events): CaseEventOf<'FinancialDecision'> | null {
  for (let i = events.length - 1; i >= 0; i--) {
    const e = events[i];
    if (e.kind === 'FinancialDecision') return e;
  }
  return null;
}

export function financialDecisionForRun(events: Events, runId: string): FinancialDecision | null {
  let found: FinancialDecision | null = null;
  for (const e of events) {
    if (e.kind === 'FinancialDecision' && e.payload.run_id === runId) found = e.payload.decision;
  }
  return found;
}
