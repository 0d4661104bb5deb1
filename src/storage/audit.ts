/**
 * Operational audit log: JSONL file, hash-chained for tamper evidence.
 *
 * Every case append, negotiation transition, gate decision and escalation is
 * recorded here with the assessment id as correlation id. This is the
 * process-wide trail; the per-case event log is the source of truth.
 */

import { appendFileSync, mkdirSync, existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createHash, randomUUID } from 'node:crypto';
import { z } from 'zod';
import { getConfig } from '../config.js';
import { auditEntrySchema } from '../types/schemas.js';
import type { AuditEntry, AuditAction } from '../types/index.js';

export const GENESIS_HASH = '0'.repeat(64);

type ChainedEntry = AuditEntry & { h: string };

function auditDir(): string {
  const dir = join(getConfig().storage.base_path, 'audit');
  mkdirSync(dir, { recursive: true });
  return dir;
}

function auditFile(): string { return join(auditDir(), 'audit.jsonl'); }

function readEntries(): ChainedEntry[] {
  const f = auditFile();
  if (!existsSync(f)) return [];
  const lines = readFileSync(f, 'utf-8').split('\n').filter(Boolean);
  const entries: ChainedEntry[] = [];
  for (const line of lines) {
    const parsed = parseLine(line);
    if (parsed) entries.push(parsed);
  }
  return entries;
}

const chainedEntrySchema = auditEntrySchema.extend({ h: z.string() });

/** Unparseable lines are skipped; the case logs, not this trail, are authoritative. */
function parseLine(line: string): ChainedEntry | null {
  let value: unknown;
  try { value = JSON.parse(line); } catch { return null; }
  const parsed = chainedEntrySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Head of each audit file's chain; this process is the file's only writer. */
const lastHashes = new Map<string, string>();

function hashEntry(entry: AuditEntry, prev: string): string {
  return createHash('sha256').update(JSON.stringify(entry) + prev).digest('hex');
}

/** Seeded once per file from its last parseable line. */
function getLastHash(file: string): string {
  const cached = lastHashes.get(file);
  if (cached !== undefined) return cached;

  let head = GENESIS_HASH;
  if (existsSync(file)) {
    const lines = readFileSync(file, 'utf-8').split('\n').filter(Boolean);
    for (let i = lines.length - 1; i >= 0; i--) {
      const parsed = parseLine(lines[i]);
      if (parsed) { head = parsed.h; break; }
    }
  }
  lastHashes.set(file, head);
  return head;
}

export function recordAudit(
  action: AuditAction, actor: string,
  targetType: string, targetId: string,
  details: Record<string, unknown> = {},
  correlationId?: string,
): AuditEntry {
  const entry: AuditEntry = {
    entry_id: randomUUID(),
    action, actor, target_type: targetType, target_id: targetId,
    details, timestamp: new Date().toISOString(),
    correlation_id: correlationId ?? randomUUID(),
  };
  const file = auditFile();
  const h = hashEntry(entry, getLastHash(file));
  appendFileSync(file, JSON.stringify({ ...entry, h }) + '\n');
  lastHashes.set(file, h);
  return entry;
}

/** Walk the whole trail; `broken_at` is the entry_id of the first link that does not verify. */
export function verifyAuditChain(): { valid: boolean; entries: number; broken_at: string | null } {
  const entries = readEntries();
  let prev = GENESIS_HASH;
  for (const { h, ...entry } of entries) {
    if (hashEntry(entry, prev) !== h) return { valid: false, entries: entries.length, broken_at: entry.entry_id };
    prev = h;
  }
  return { valid: true, entries: entries.length, broken_at: null };
}

export function queryAuditLog(filters: {
  action?: AuditAction; actor?: string; target_type?: string;
  target_id?: string; correlation_id?: string;
  since?: string; until?: string; limit?: number;
}): AuditEntry[] {
  let entries: AuditEntry[] = readEntries();

  if (filters.action) entries = entries.filter((e) => e.action === filters.action);
  if (filters.actor) entries = entries.filter((e) => e.actor === filters.actor);
  if (filters.target_type) entries = entries.filter((e) => e.target_type === filters.target_type);
  if (filters.target_id) entries = entries.filter((e) => e.target_id === filters.target_id);
  if (filters.correlation_id) entries = entries.filter((e) => e.correlation_id === filters.correlation_id);
  const { since, until } = filters;
  if (since) entries = entries.filter((e) => e.timestamp >= since);
  if (until) entries = entries.filter((e) => e.timestamp <= until);

  entries.reverse();
  return entries.slice(0, filters.limit ?? 100);
}

export function getAuditStats(): { total_entries: number; actions_breakdown: Record<string, number>; recent_24h: number } {
  const entries = readEntries();
  const since24h = new Date(Date.now() - 86400000).toISOString();
  const breakdown: Record<string, number> = {};
  let recent = 0;
  for (const e of entries) {
    breakdown[e.action] = (breakdown[e.action] ?? 0) + 1;
    if (e.timestamp >= since24h) recent++;
  }
  return { total_entries: entries.length, actions_breakdown: breakdown, recent_24h: recent };
}
