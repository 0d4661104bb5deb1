/**
 * Negotiation responders: whoever answers turn 1 with a proposal.
 *
 * The policy responder stands in for the technical PM: it proposes the
 * mitigation the Decision Engine selects and excludes every flagged field.
 */

import { selectMitigation } from '../decision/index.js';
import type { MitigationProposal, MitigationType, ReviewRole, Risk } from '../types/index.js';

export interface ProposalRequest {
  negotiation_id: string;
  risk: Risk;
  acceptable_mitigations: MitigationType[];
}

export interface NegotiationResponder {
  readonly role: ReviewRole;
  /** Must settle or observe `signal`; the coordinator stops waiting when the turn budget runs out. */
  propose(request: ProposalRequest, signal: AbortSignal): Promise<MitigationProposal>;
}

export class PolicyResponder implements NegotiationResponder {
  readonly role: ReviewRole = 'technical_pm';

  async propose(request: ProposalRequest, signal: AbortSignal): Promise<MitigationProposal> {
    signal.throwIfAborted();
    const { risk } = request;
    const mitigation = selectMitigation(risk.category, risk.data_characteristics);
    return {
      mitigation,
      exclusion_scope: [...risk.flagged_fields],
      rationale: `${mitigation} selected for ${risk.category} on ${risk.affected_entity}`,
    };
  }
}
