/**
 * Negotiation facade.
 */
export { NegotiationCoordinator, negotiationIdFor } from './coordinator.js';
export type { SubmittedTurn, TurnResult, CoordinatorOptions } from './coordinator.js';
export { EntityLock } from './entity-lock.js';
export { PolicyResponder } from './responder.js';
export type { NegotiationResponder, ProposalRequest } from './responder.js';
