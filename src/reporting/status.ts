/**
 * Report Status Resolver.
 *
 * Pure projections, recomputed on every read. A case is APPROVED exactly when
 * listBlockers returns nothing; every blocker names the negotiation, financial
 * decision or role that holds the report back.
 */

import {
  artifactsForRun, isArchived, latestFinancialDecision, latestRunId, needsIntervention, negotiations,
} from '../case/projections.js';
import { ROLE_DISPLAY } from '../types/index.js';
import type {
  Blocker, CaseEvent, CaseView, NegotiationState, ReportStatus, ReviewArtifact, ReviewRole,
} from '../types/index.js';

type Events = readonly CaseEvent[];

const pct = (n: number): string => `${(n * 100).toFixed(1)}%`;

function describeUnresolved(n: NegotiationState): string {
  const base = `Negotiation ${n.negotiation_id} (${n.risk_id}) ended ${n.status}` + (n.reason ? ` (${n.reason})` : '');
  if (n.human_resolution?.status === 'REJECTED') {
    return `${base}; human reviewer ${n.human_resolution.resolved_by} rejected it`;
  }
  return `${base}; human resolution required`;
}

/** DEADLOCK/TIMEOUT negotiations without a RESOLVED human decision. */
export function interventionBlockers(events: Events): Blocker[] {
  return negotiations(events).filter(needsIntervention).map((n): Blocker => ({
    kind: 'negotiation_unresolved',
    target_id: n.negotiation_id,
    message: describeUnresolved(n),
  }));
}

/** The gate's financial condition: the latest decision must be approved. */
export function financialBlockers(events: Events): Blocker[] {
  const latest = latestFinancialDecision(events);
  if (!latest) {
    return [{ kind: 'financial_missing', target_id: 'financial_decision', message: 'No financial decision recorded' }];
  }
  const d = latest.payload.decision;
  if (d.outcome === 'approved') return [];
  return [{
    kind: 'financial_gate',
    target_id: d.decision_id,
    message: `Financial decision ${d.decision_id} is ${d.outcome}: margin ${pct(d.computed_margin)} against target ${pct(d.target_margin)} (${d.tier})`,
  }];
}

export function artifactBlockers(events: Events, requiredRoles: readonly ReviewRole[]): Blocker[] {
  const runId = latestRunId(events);
  const artifacts = runId ? artifactsForRun(events, runId) : new Map<ReviewRole, ReviewArtifact>();
  return requiredRoles.filter((role) => !artifacts.has(role)).map((role): Blocker => ({
    kind: 'missing_artifact',
    target_id: role,
    message: runId
      ? `No ${ROLE_DISPLAY[role]} artifact (${role}) in run ${runId}`
      : `No ${ROLE_DISPLAY[role]} artifact (${role}); no pipeline run recorded`,
  }));
}

export function listBlockers(events: Events, requiredRoles: readonly ReviewRole[]): Blocker[] {
  return [
    ...interventionBlockers(events),
    ...financialBlockers(events),
    ...artifactBlockers(events, requiredRoles),
  ];
}

export function resolveReportStatus(events: Events, requiredRoles: readonly ReviewRole[]): ReportStatus {
  if (negotiations(events).some(needsIntervention)) return 'PENDING_INTERVENTION';
  if (financialBlockers(events).length === 0 && artifactBlockers(events, requiredRoles).length === 0) return 'APPROVED';
  return 'DRAFT';
}

export function buildCaseView(assessmentId: string, events: Events, requiredRoles: readonly ReviewRole[]): CaseView {
  const runId = latestRunId(events);
  const last = events[events.length - 1];
  return {
    assessment_id: assessmentId,
    status: resolveReportStatus(events, requiredRoles),
    run_id: runId,
    artifacts: runId ? [...artifactsForRun(events, runId).values()] : [],
    negotiations: negotiations(events),
    financial_decision: latestFinancialDecision(events)?.payload.decision ?? null,
    blockers: listBlockers(events, requiredRoles),
    archived: isArchived(events),
    last_sequence_no: last ? last.sequence_no : 0,
  };
}
