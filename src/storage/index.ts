/**
 * Storage facade: re-exports all storage subsystems.
 */
export { recordAudit, queryAuditLog, getAuditStats, verifyAuditChain, GENESIS_HASH } from './audit.js';
export {
  FileEventStore, FileCaseStorage, MemoryEventStore, MemoryCaseStorage, isSafeAssessmentId,
} from './event-store.js';
export type { EventStore, CaseStorage } from './event-store.js';
