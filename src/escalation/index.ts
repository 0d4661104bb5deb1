/**
 * Escalation facade.
 */
export { FileEscalationChannel, MemoryEscalationChannel, formatNotice } from './channel.js';
export type { EscalationChannel, EscalationContext, EscalationRecord } from './channel.js';
