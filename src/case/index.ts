export { EventLog, hashEvent, systemClock } from './event-log.js';
export type { CaseEventDraft, Clock } from './event-log.js';
export { CaseRecord, CaseRegistry } from './case-record.js';
export * from './projections.js';
