/**
 * Durable storage for case event logs.
 *
 * One JSONL file per assessment under <data>/cases/. Lines are only ever
 * appended; the in-memory variant backs tests and embedded use.
 */

import { appendFileSync, mkdirSync, existsSync, readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { CaseEvent } from '../types/index.js';

export interface EventStore {
  /** Raw persisted lines in append order. Parsing and verification belong to the log. */
  readLines(): string[];
  append(event: CaseEvent): void;
}

export interface CaseStorage {
  open(assessmentId: string): EventStore;
  exists(assessmentId: string): boolean;
  list(): string[];
}

const SAFE_ID = /^[a-zA-Z0-9_-]+$/;

export function isSafeAssessmentId(id: string): boolean {
  return SAFE_ID.test(id) && id.length <= 128;
}

// ---------------------------------------------------------------------------
// File-backed
// ---------------------------------------------------------------------------

export class FileEventStore implements EventStore {
  constructor(private file: string) {}

  readLines(): string[] {
    if (!existsSync(this.file)) return [];
    return readFileSync(this.file, 'utf-8').split('\n').filter((l) => l.trim().length > 0);
  }

  append(event: CaseEvent): void {
    appendFileSync(this.file, JSON.stringify(event) + '\n');
  }
}

export class FileCaseStorage implements CaseStorage {
  private dir: string;

  constructor(baseDir: string) {
    this.dir = join(baseDir, 'cases');
    mkdirSync(this.dir, { recursive: true });
  }

  private filePath(id: string): string {
    return join(this.dir, `${id}.jsonl`);
  }

  open(assessmentId: string): EventStore {
    return new FileEventStore(this.filePath(assessmentId));
  }

  exists(assessmentId: string): boolean {
    return existsSync(this.filePath(assessmentId));
  }

  list(): string[] {
    if (!existsSync(this.dir)) return [];
    return readdirSync(this.dir)
      .filter((f) => f.endsWith('.jsonl'))
      .map((f) => f.slice(0, -'.jsonl'.length))
      .sort();
  }
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export class MemoryEventStore implements EventStore {
  lines: string[] = [];

  readLines(): string[] {
    return [...this.lines];
  }

  append(event: CaseEvent): void {
    this.lines.push(JSON.stringify(event));
  }
}

export class MemoryCaseStorage implements CaseStorage {
  private stores = new Map<string, MemoryEventStore>();

  open(assessmentId: string): MemoryEventStore {
    let store = this.stores.get(assessmentId);
    if (!store) {
      store = new MemoryEventStore();
      this.stores.set(assessmentId, store);
    }
    return store;
  }

  exists(assessmentId: string): boolean {
    const store = this.stores.get(assessmentId);
    return store !== undefined && store.lines.length > 0;
  }

  list(): string[] {
    return [...this.stores.keys()].filter((id) => this.exists(id)).sort();
  }
}
