/**
 * Runtime schemas for everything that crosses a trust boundary:
 * replayed case events, tool inputs and knowledge tables.
 * Persisted numbers are finite; JSON writes Infinity and NaN as null.
 */

import { z } from 'zod';

export const reviewRoleSchema = z.enum([
  'outcomes_strategist', 'technical_pm', 'legal_counsel', 'finance_director', 'document_architect',
]);

export const sourceRoleSchema = z.union([reviewRoleSchema, z.literal('system'), z.literal('human')]);

export const tierSchema = z.enum(['standard', 'configuration', 'customization', 'custom_build']);

export const financialOutcomeSchema = z.enum([
  'approved', 'timeline_adjustment', 'scope_reduction', 'pricing_adjustment', 'rejected',
]);

export const mitigationSchema = z.enum([
  'field_redaction', 'filtered_sql_view', 'synthetic_data_generation', 'data_masking',
]);

export const riskCategorySchema = z.enum(['pii_exposure', 'phi_exposure', 'cross_border_transfer', 'excessive_access']);

export const riskSeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);

export const dataCharacteristicsSchema = z.object({
  pii_required_by_client: z.boolean(),
  pii_colocated_with_business_data: z.boolean(),
  structure_only: z.boolean(),
  dev_test_context: z.boolean(),
});

export const riskSchema = z.object({
  risk_id: z.string().min(1),
  category: riskCategorySchema,
  severity: riskSeveritySchema,
  affected_entity: z.string().min(1),
  raised_by: reviewRoleSchema,
  description: z.string(),
  flagged_fields: z.array(z.string()).min(1),
  required_fields: z.array(z.string()),
  data_characteristics: dataCharacteristicsSchema,
});

export const reviewArtifactSchema = z.object({
  role: reviewRoleSchema,
  run_id: z.string(),
  produced_at: z.string(),
  flags: z.array(z.string()),
  findings: z.record(z.unknown()),
  blocking: z.boolean(),
  confidence: z.number().finite(),
  risks: z.array(riskSchema),
  low_confidence: z.boolean(),
});

export const intakeSchema = z.object({
  client_context: z.string(),
  transcript: z.string(),
  contract_value: z.number().finite().nullable(),
  required_fields: z.array(z.string()),
  data_characteristics: dataCharacteristicsSchema,
});

export const mitigationProposalSchema = z.object({
  mitigation: mitigationSchema,
  exclusion_scope: z.array(z.string()),
  rationale: z.string(),
});

const mitigationValidationSchema = z.object({
  satisfiesMinimization: z.boolean(),
  satisfiesLeastPrivilege: z.boolean(),
});

const participantsSchema = z.object({ initiator: reviewRoleSchema, responder: reviewRoleSchema });

const turnSchema = z.discriminatedUnion('turn', [
  z.object({
    turn: z.literal(1),
    role: reviewRoleSchema,
    risk_description: z.string(),
    category: riskCategorySchema,
    flagged_fields: z.array(z.string()),
    acceptable_mitigations: z.array(mitigationSchema),
  }),
  z.object({
    turn: z.literal(2),
    role: reviewRoleSchema,
    proposal: mitigationProposalSchema,
  }),
  z.object({
    turn: z.literal(3),
    role: reviewRoleSchema,
    validation: mitigationValidationSchema,
    covers_flagged_fields: z.boolean(),
    uncovered_fields: z.array(z.string()),
    verdict: z.enum(['accept', 'reject']),
  }),
]);

const turnNumberSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export const financialDecisionSchema = z.object({
  decision_id: z.string(),
  tier: tierSchema,
  hours: z.number().finite(),
  hourly_rate: z.number().finite(),
  pm_overhead_pct: z.number().finite(),
  estimated_cost: z.number().finite(),
  contract_value: z.number().finite(),
  pricing_source: z.enum(['client_budget', 'recommended']),
  computed_margin: z.number().finite(),
  target_margin: z.number().finite(),
  gap: z.number().finite(),
  outcome: financialOutcomeSchema,
});

export const humanResolutionSchema = z.object({
  negotiation_id: z.string(),
  status: z.enum(['RESOLVED', 'REJECTED']),
  final_outcome: z.string(),
  resolved_by: z.string(),
  notes: z.string(),
});

const envelope = {
  sequence_no: z.number().int().positive(),
  timestamp: z.string(),
  source_role: sourceRoleSchema,
  prev_hash: z.string(),
  hash: z.string(),
};

export const caseEventSchema = z.discriminatedUnion('kind', [
  z.object({
    ...envelope,
    kind: z.literal('CaseOpened'),
    payload: z.object({ assessment_id: z.string(), intake: intakeSchema }),
  }),
  z.object({
    ...envelope,
    kind: z.literal('StageCompleted'),
    payload: z.object({ run_id: z.string(), artifact: reviewArtifactSchema }),
  }),
  z.object({
    ...envelope,
    kind: z.literal('NegotiationTurn'),
    payload: z.object({
      negotiation_id: z.string(),
      risk_id: z.string(),
      affected_entity: z.string(),
      participants: participantsSchema,
      turn: turnSchema,
    }),
  }),
  z.object({
    ...envelope,
    kind: z.literal('NegotiationResolved'),
    payload: z.object({
      negotiation_id: z.string(),
      risk_id: z.string(),
      mitigation: mitigationSchema,
      exclusion_scope: z.array(z.string()),
    }),
  }),
  z.object({
    ...envelope,
    kind: z.literal('NegotiationDeadlocked'),
    payload: z.object({
      negotiation_id: z.string(),
      risk_id: z.string(),
      status: z.enum(['DEADLOCK', 'TIMEOUT']),
      reason: z.enum(['irreconcilable_requirement', 'unresolved_at_turn_limit', 'timeout']),
      turn: turnNumberSchema,
    }),
  }),
  z.object({
    ...envelope,
    kind: z.literal('FinancialDecision'),
    payload: z.object({ run_id: z.string(), decision: financialDecisionSchema }),
  }),
  z.object({
    ...envelope,
    kind: z.literal('HumanResolution'),
    payload: humanResolutionSchema,
  }),
  z.object({
    ...envelope,
    kind: z.literal('CaseArchived'),
    payload: z.object({ reason: z.string() }),
  }),
]);

export const auditActionSchema = z.enum([
  'case.opened', 'case.archived', 'case.event_appended', 'case.replay_failed',
  'pipeline.start', 'pipeline.stage_completed', 'pipeline.stage_failed',
  'pipeline.low_confidence', 'pipeline.stalled', 'pipeline.completed', 'pipeline.aborted',
  'negotiation.initiated', 'negotiation.turn', 'negotiation.resolved',
  'negotiation.deadlocked', 'negotiation.timeout', 'negotiation.rejected_turn',
  'financial.decision', 'governance.gate_blocked', 'governance.escalation',
  'governance.human_resolution',
]);

export const auditEntrySchema = z.object({
  entry_id: z.string(),
  action: auditActionSchema,
  actor: z.string(),
  target_type: z.string(),
  target_id: z.string(),
  details: z.record(z.unknown()),
  timestamp: z.string(),
  correlation_id: z.string(),
});
