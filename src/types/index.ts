/**
 * Core type definitions for the assessment pipeline.
 *
 * Organized into: Roles, Decision, Risk & Negotiation, Case Events,
 * Projections, Tool Output, Config.
 */

// ---------------------------------------------------------------------------
// Roles
// ---------------------------------------------------------------------------

export type ReviewRole =
  | 'outcomes_strategist'
  | 'technical_pm'
  | 'legal_counsel'
  | 'finance_director'
  | 'document_architect';

export type SourceRole = ReviewRole | 'system' | 'human';

export const ROLE_DISPLAY: Record<ReviewRole, string> = {
  outcomes_strategist: 'Targeting',
  technical_pm: 'Feasibility',
  legal_counsel: 'Compliance',
  finance_director: 'Economics',
  document_architect: 'Synthesis',
};

export type PipelineStep = 'A' | 'B' | 'C' | 'D';

// ---------------------------------------------------------------------------
// Decision Engine Types
// ---------------------------------------------------------------------------

export type ImplementationTier = 'standard' | 'configuration' | 'customization' | 'custom_build';

export type FinancialOutcome =
  | 'approved'
  | 'timeline_adjustment'
  | 'scope_reduction'
  | 'pricing_adjustment'
  | 'rejected';

export type MitigationType =
  | 'field_redaction'
  | 'filtered_sql_view'
  | 'synthetic_data_generation'
  | 'data_masking';

export type RiskCategory = 'pii_exposure' | 'phi_exposure' | 'cross_border_transfer' | 'excessive_access';

export type RiskSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface DataCharacteristics {
  pii_required_by_client: boolean;
  pii_colocated_with_business_data: boolean;
  structure_only: boolean;
  dev_test_context: boolean;
}

export interface MarginResult {
  implementationCost: number;
  margin: number;
}

export interface MitigationValidation {
  satisfiesMinimization: boolean;
  satisfiesLeastPrivilege: boolean;
}

export type PricingSource = 'client_budget' | 'recommended';

export interface FinancialDecision {
  decision_id: string;
  tier: ImplementationTier;
  hours: number;
  hourly_rate: number;
  pm_overhead_pct: number;
  estimated_cost: number;
  contract_value: number;
  pricing_source: PricingSource;
  computed_margin: number;
  target_margin: number;
  gap: number;
  outcome: FinancialOutcome;
}

// ---------------------------------------------------------------------------
// Review Artifacts & Risks
// ---------------------------------------------------------------------------

export interface Risk {
  risk_id: string;
  category: RiskCategory;
  severity: RiskSeverity;
  affected_entity: string;
  raised_by: ReviewRole;
  description: string;
  flagged_fields: string[];
  required_fields: string[];
  data_characteristics: DataCharacteristics;
}

export interface ReviewArtifact {
  role: ReviewRole;
  run_id: string;
  produced_at: string;
  flags: string[];
  findings: Record<string, unknown>;
  blocking: boolean;
  confidence: number;
  risks: Risk[];
  low_confidence: boolean;
}

export interface LowConfidence {
  kind: 'low_confidence';
  role: ReviewRole;
  confidence: number;
  reason: string;
  partial: ReviewArtifact | null;
}

export type StageResult = ReviewArtifact | LowConfidence;

export function isLowConfidence(result: StageResult): result is LowConfidence {
  return 'kind' in result && result.kind === 'low_confidence';
}

// ---------------------------------------------------------------------------
// Negotiation Types
// ---------------------------------------------------------------------------

export type NegotiationStatus = 'NEGOTIATING' | 'RESOLVED' | 'DEADLOCK' | 'TIMEOUT';

export type DeadlockReason = 'irreconcilable_requirement' | 'unresolved_at_turn_limit' | 'timeout';

export interface MitigationProposal {
  mitigation: MitigationType;
  exclusion_scope: string[];
  rationale: string;
}

export interface TurnOnePayload {
  turn: 1;
  role: ReviewRole;
  risk_description: string;
  category: RiskCategory;
  flagged_fields: string[];
  acceptable_mitigations: MitigationType[];
}

export interface TurnTwoPayload {
  turn: 2;
  role: ReviewRole;
  proposal: MitigationProposal;
}

export interface TurnThreePayload {
  turn: 3;
  role: ReviewRole;
  validation: MitigationValidation;
  covers_flagged_fields: boolean;
  uncovered_fields: string[];
  verdict: 'accept' | 'reject';
}

export type TurnPayload = TurnOnePayload | TurnTwoPayload | TurnThreePayload;

export interface NegotiationState {
  negotiation_id: string;
  risk_id: string;
  affected_entity: string;
  category: RiskCategory;
  flagged_fields: string[];
  participants: { initiator: ReviewRole; responder: ReviewRole };
  turn: 1 | 2 | 3;
  status: NegotiationStatus;
  reason: DeadlockReason | null;
  acceptable_mitigations: MitigationType[];
  proposal: MitigationProposal | null;
  opened_at: string;
  last_activity_at: string;
  terminal_sequence_no: number | null;
  human_resolution: HumanResolutionPayload | null;
}

// ---------------------------------------------------------------------------
// Case Events
// ---------------------------------------------------------------------------

export interface AssessmentIntake {
  client_context: string;
  transcript: string;
  contract_value: number | null;
  required_fields: string[];
  data_characteristics: DataCharacteristics;
}

export interface CaseOpenedPayload {
  assessment_id: string;
  intake: AssessmentIntake;
}

export interface StageCompletedPayload {
  run_id: string;
  artifact: ReviewArtifact;
}

export interface NegotiationTurnPayload {
  negotiation_id: string;
  risk_id: string;
  affected_entity: string;
  participants: { initiator: ReviewRole; responder: ReviewRole };
  turn: TurnPayload;
}

export interface NegotiationResolvedPayload {
  negotiation_id: string;
  risk_id: string;
  mitigation: MitigationType;
  exclusion_scope: string[];
}

export interface NegotiationDeadlockedPayload {
  negotiation_id: string;
  risk_id: string;
  status: 'DEADLOCK' | 'TIMEOUT';
  reason: DeadlockReason;
  turn: 1 | 2 | 3;
}

export interface FinancialDecisionPayload {
  run_id: string;
  decision: FinancialDecision;
}

export interface HumanResolutionPayload {
  negotiation_id: string;
  status: 'RESOLVED' | 'REJECTED';
  final_outcome: string;
  resolved_by: string;
  notes: string;
}

export interface CaseArchivedPayload {
  reason: string;
}

export interface CaseEventPayloads {
  CaseOpened: CaseOpenedPayload;
  StageCompleted: StageCompletedPayload;
  NegotiationTurn: NegotiationTurnPayload;
  NegotiationResolved: NegotiationResolvedPayload;
  NegotiationDeadlocked: NegotiationDeadlockedPayload;
  FinancialDecision: FinancialDecisionPayload;
  HumanResolution: HumanResolutionPayload;
  CaseArchived: CaseArchivedPayload;
}

export type CaseEventKind = keyof CaseEventPayloads;

interface EventEnvelope<K extends CaseEventKind> {
  readonly sequence_no: number;
  readonly timestamp: string;
  readonly source_role: SourceRole;
  readonly kind: K;
  readonly payload: CaseEventPayloads[K];
  readonly prev_hash: string;
  readonly hash: string;
}

/** Discriminated by `kind`; narrowing on it types the payload. */
export type CaseEvent = { [K in CaseEventKind]: EventEnvelope<K> }[CaseEventKind];

export type CaseEventOf<K extends CaseEventKind> = Extract<CaseEvent, { kind: K }>;

// ---------------------------------------------------------------------------
// Projections
// ---------------------------------------------------------------------------

export type ReportStatus = 'DRAFT' | 'PENDING_INTERVENTION' | 'APPROVED';

export type BlockerKind =
  | 'negotiation_unresolved'
  | 'financial_gate'
  | 'financial_missing'
  | 'missing_artifact'
  | 'low_confidence'
  | 'stage_failed';

export interface Blocker {
  kind: BlockerKind;
  target_id: string;
  message: string;
}

export interface CaseView {
  assessment_id: string;
  status: ReportStatus;
  run_id: string | null;
  artifacts: ReviewArtifact[];
  negotiations: NegotiationState[];
  financial_decision: FinancialDecision | null;
  blockers: Blocker[];
  archived: boolean;
  last_sequence_no: number;
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export type AuditAction =
  | 'case.opened' | 'case.archived' | 'case.event_appended' | 'case.replay_failed'
  | 'pipeline.start' | 'pipeline.stage_completed' | 'pipeline.stage_failed'
  | 'pipeline.low_confidence' | 'pipeline.stalled' | 'pipeline.completed' | 'pipeline.aborted'
  | 'negotiation.initiated' | 'negotiation.turn' | 'negotiation.resolved'
  | 'negotiation.deadlocked' | 'negotiation.timeout' | 'negotiation.rejected_turn'
  | 'financial.decision' | 'governance.gate_blocked' | 'governance.escalation'
  | 'governance.human_resolution';

export interface AuditEntry {
  entry_id: string;
  action: AuditAction;
  actor: string;
  target_type: string;
  target_id: string;
  details: Record<string, unknown>;
  timestamp: string;
  correlation_id: string;
}

// ---------------------------------------------------------------------------
// Bootstrap Prompt System
// ---------------------------------------------------------------------------

export interface ToolOutput {
  status: 'success' | 'error' | 'needs_input' | 'needs_approval';
  data: Record<string, unknown>;
  message: string;
  next: {
    control: 'agent' | 'user';
    description: string;
    bootstrap_prompt: string;
  } | null;
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface PipelineConfig {
  pipeline: {
    confidence_floor: number;
    required_roles: ReviewRole[];
  };
  negotiation: {
    turn_timeout_ms: number;
  };
  finance: {
    hourly_rate: number;
    pm_overhead_pct: number;
    manual_baseline_hours: number;
  };
  storage: {
    base_path: string;
    knowledge_path: string;
  };
}
