/**
 * Append-only case event log.
 *
 * The log is the single ordering authority for a case: sequence numbers are
 * allocated here and nowhere else, each event is hash-chained to the previous
 * one, and appended events are frozen. Replaying a persisted log re-verifies
 * the sequence and the chain; any mismatch halts processing for the case.
 */

import { createHash } from 'node:crypto';
import { IrrecoverableError } from '../errors.js';
import { GENESIS_HASH } from '../storage/audit.js';
import type { EventStore } from '../storage/event-store.js';
import { caseEventSchema } from '../types/schemas.js';
import type { CaseEvent, CaseEventPayloads, CaseEventKind, SourceRole } from '../types/index.js';

export type CaseEventDraft = {
  [K in CaseEventKind]: { kind: K; source_role: SourceRole; payload: CaseEventPayloads[K] }
}[CaseEventKind];

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Key-sorted copy, so the hash does not depend on property order after a parse. */
function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      out[k] = canonical(v);
    }
    return out;
  }
  return value;
}

export function hashEvent(
  fields: { sequence_no: number; timestamp: string; source_role: SourceRole; kind: CaseEventKind; payload: unknown },
  prevHash: string,
): string {
  const body = JSON.stringify(canonical({
    sequence_no: fields.sequence_no,
    timestamp: fields.timestamp,
    source_role: fields.source_role,
    kind: fields.kind,
    payload: fields.payload,
  }));
  return createHash('sha256').update(body + prevHash).digest('hex');
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export class EventLog {
  private events: CaseEvent[] = [];

  private constructor(private store: EventStore, private clock: Clock) {}

  /** Open a log by replaying its store. Throws IrrecoverableError on corruption. */
  static replay(store: EventStore, clock: Clock = systemClock): EventLog {
    const log = new EventLog(store, clock);
    const lines = store.readLines();
    let prevHash = GENESIS_HASH;

    lines.forEach((line, idx) => {
      const expectedSeq = idx + 1;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        throw new IrrecoverableError(`Event ${expectedSeq} is not valid JSON`, { sequence_no: expectedSeq });
      }
      const parsed = caseEventSchema.safeParse(raw);
      if (!parsed.success) {
        throw new IrrecoverableError(`Event ${expectedSeq} does not match the event schema`, {
          sequence_no: expectedSeq, issues: parsed.error.issues,
        });
      }
      const event: CaseEvent = parsed.data;
      if (event.sequence_no !== expectedSeq) {
        throw new IrrecoverableError(
          `Sequence violation on replay: expected ${expectedSeq}, found ${event.sequence_no}`,
          { expected: expectedSeq, found: event.sequence_no },
        );
      }
      if (event.prev_hash !== prevHash || hashEvent(event, prevHash) !== event.hash) {
        throw new IrrecoverableError(`Hash chain broken at event ${expectedSeq}`, { sequence_no: expectedSeq });
      }
      prevHash = event.hash;
      log.events.push(deepFreeze(event));
    });

    return log;
  }

  append(draft: CaseEventDraft): CaseEvent {
    const sequenceNo = this.events.length + 1;
    const prevHash = this.lastHash();
    const timestamp = this.clock().toISOString();
    const cloned = structuredClone(draft);
    const hash = hashEvent({
      sequence_no: sequenceNo, timestamp, source_role: cloned.source_role, kind: cloned.kind, payload: cloned.payload,
    }, prevHash);

    const event: CaseEvent = { ...cloned, sequence_no: sequenceNo, timestamp, prev_hash: prevHash, hash };
    // Persist before publishing so readers never see an event the store does not hold.
    this.store.append(event);
    this.events.push(deepFreeze(event));
    return event;
  }

  /** A consistent, frozen prefix of the log. */
  snapshot(): readonly CaseEvent[] {
    return Object.freeze([...this.events]);
  }

  get length(): number {
    return this.events.length;
  }

  lastHash(): string {
    return this.events.length > 0 ? this.events[this.events.length - 1].hash : GENESIS_HASH;
  }

  now(): Date {
    return this.clock();
  }
}
