/**
 * Human escalation channel: fire-and-forget notification that a case needs a
 * person. The orchestrator never waits on it; the answer comes back later as
 * a HumanResolution event.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { Blocker, PipelineStep } from '../types/index.js';

export interface EscalationContext {
  assessment_id: string;
  run_id: string;
  step: PipelineStep;
  reason: string;
  blockers: Blocker[];
}

export interface EscalationRecord {
  /** Negotiation id, financial decision id or role, whichever holds the case. */
  target_id: string;
  context: EscalationContext;
  raised_at: string;
}

export interface EscalationChannel {
  escalate(targetId: string, context: EscalationContext): void;
}

export class FileEscalationChannel implements EscalationChannel {
  private dir: string;

  constructor(baseDir: string) {
    this.dir = join(baseDir, 'escalations');
  }

  escalate(targetId: string, context: EscalationContext): void {
    mkdirSync(this.dir, { recursive: true });
    const record: EscalationRecord = { target_id: targetId, context, raised_at: new Date().toISOString() };
    appendFileSync(join(this.dir, 'escalations.jsonl'), JSON.stringify(record) + '\n');
    appendFileSync(join(this.dir, `${context.assessment_id}.txt`), formatNotice(record));
  }
}

export class MemoryEscalationChannel implements EscalationChannel {
  records: EscalationRecord[] = [];

  escalate(targetId: string, context: EscalationContext): void {
    this.records.push({ target_id: targetId, context, raised_at: new Date().toISOString() });
  }
}

export function formatNotice(record: EscalationRecord): string {
  const { context } = record;
  const lines = [
    '==================================================',
    'HUMAN INTERVENTION REQUIRED',
    '==================================================',
    `Assessment: ${context.assessment_id}`,
    `Run:        ${context.run_id} (halted at step ${context.step})`,
    `Target:     ${record.target_id}`,
    `Raised:     ${record.raised_at}`,
    `Reason:     ${context.reason}`,
    '',
    'Blockers:',
    ...context.blockers.map((b) => `  - [${b.kind}] ${b.target_id}: ${b.message}`),
    '',
  ];
  return lines.join('\n') + '\n';
}
