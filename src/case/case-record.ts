/**
 * Case Record: one per assessment, owning its event log.
 *
 * The registry is the only place records are created or opened, so each
 * assessment has exactly one in-process EventLog (the single sequence
 * allocator) no matter how many callers touch it.
 */

import { randomBytes } from 'node:crypto';
import { CaseNotFoundError, InvalidInputError, IrrecoverableError } from '../errors.js';
import { recordAudit } from '../storage/audit.js';
import { isSafeAssessmentId } from '../storage/event-store.js';
import type { CaseStorage } from '../storage/event-store.js';
import { intakeSchema } from '../types/schemas.js';
import type { AssessmentIntake, CaseEvent } from '../types/index.js';
import { EventLog, systemClock } from './event-log.js';
import type { CaseEventDraft, Clock } from './event-log.js';
import { caseOpened, isArchived } from './projections.js';

export class CaseRecord {
  constructor(readonly assessmentId: string, private log: EventLog) {}

  append(draft: CaseEventDraft): CaseEvent {
    if (isArchived(this.log.snapshot())) {
      throw new InvalidInputError(`Assessment ${this.assessmentId} is archived`, { assessment_id: this.assessmentId });
    }
    const event = this.log.append(draft);
    recordAudit('case.event_appended', draft.source_role, 'case', this.assessmentId, {
      sequence_no: event.sequence_no, kind: event.kind,
    }, this.assessmentId);
    return event;
  }

  snapshot(): readonly CaseEvent[] {
    return this.log.snapshot();
  }

  get length(): number {
    return this.log.length;
  }

  intake(): AssessmentIntake {
    const opened = caseOpened(this.log.snapshot());
    if (!opened) throw new IrrecoverableError(`Assessment ${this.assessmentId} has no CaseOpened event`);
    return opened.intake;
  }

  now(): Date {
    return this.log.now();
  }
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

function generateAssessmentId(clock: Clock): string {
  const date = clock().toISOString().slice(0, 10).replace(/-/g, '');
  return `AS-${date}-${randomBytes(4).toString('hex')}`;
}

export class CaseRegistry {
  private open_ = new Map<string, CaseRecord>();

  constructor(private storage: CaseStorage, private clock: Clock = systemClock) {}

  create(intake: AssessmentIntake, assessmentId?: string): CaseRecord {
    const parsed = intakeSchema.safeParse(intake);
    if (!parsed.success) {
      throw new InvalidInputError('Assessment intake is invalid', { issues: parsed.error.issues });
    }
    if (parsed.data.contract_value !== null && !(parsed.data.contract_value > 0)) {
      throw new InvalidInputError('contract_value must be positive when given', { contract_value: parsed.data.contract_value });
    }

    const id = assessmentId ?? generateAssessmentId(this.clock);
    if (!isSafeAssessmentId(id)) throw new InvalidInputError(`Invalid assessment id: ${id}`);
    if (this.open_.has(id) || this.storage.exists(id)) {
      throw new InvalidInputError(`Assessment ${id} already exists`, { assessment_id: id });
    }

    const record = new CaseRecord(id, EventLog.replay(this.storage.open(id), this.clock));
    this.open_.set(id, record);
    record.append({ kind: 'CaseOpened', source_role: 'system', payload: { assessment_id: id, intake: parsed.data } });
    recordAudit('case.opened', 'system', 'case', id, { required_fields: parsed.data.required_fields }, id);
    return record;
  }

  /** Open a case, replaying and verifying its persisted log on first access. */
  open(assessmentId: string): CaseRecord {
    if (!isSafeAssessmentId(assessmentId)) throw new InvalidInputError(`Invalid assessment id: ${assessmentId}`);
    const cached = this.open_.get(assessmentId);
    if (cached) return cached;
    if (!this.storage.exists(assessmentId)) throw new CaseNotFoundError(assessmentId);

    let log: EventLog;
    try {
      log = EventLog.replay(this.storage.open(assessmentId), this.clock);
    } catch (err) {
      if (err instanceof IrrecoverableError) {
        recordAudit('case.replay_failed', 'system', 'case', assessmentId, { error: err.message, ...err.details }, assessmentId);
      }
      throw err;
    }
    const record = new CaseRecord(assessmentId, log);
    this.open_.set(assessmentId, record);
    return record;
  }

  /** Drop the in-process record; the next open() replays it from storage. */
  release(assessmentId: string): void {
    this.open_.delete(assessmentId);
  }

  /** Records held in process. */
  get openCount(): number {
    return this.open_.size;
  }

  list(): string[] {
    const ids = new Set([...this.storage.list(), ...this.open_.keys()]);
    return [...ids].sort();
  }
}
