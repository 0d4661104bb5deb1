import { describe, it, expect } from 'vitest';
import { CaseRegistry, EventLog, hashEvent } from '../src/case/index.js';
import { CaseNotFoundError, InvalidInputError, IrrecoverableError } from '../src/errors.js';
import { GENESIS_HASH, MemoryCaseStorage, MemoryEventStore } from '../src/storage/index.js';
import { intake } from './helpers.js';

const clock = () => new Date('2025-03-01T10:00:00.000Z');

function seededStore(): MemoryEventStore {
  const store = new MemoryEventStore();
  const log = EventLog.replay(store, clock);
  log.append({ kind: 'CaseOpened', source_role: 'system', payload: { assessment_id: 'AS-1', intake: intake() } });
  log.append({ kind: 'CaseArchived', source_role: 'human', payload: { reason: 'duplicate' } });
  return store;
}

describe('Event Log', () => {
  it('allocates sequence numbers and chains hashes', () => {
    const log = EventLog.replay(new MemoryEventStore(), clock);
    const first = log.append({ kind: 'CaseOpened', source_role: 'system', payload: { assessment_id: 'AS-1', intake: intake() } });
    const second = log.append({ kind: 'CaseArchived', source_role: 'human', payload: { reason: 'duplicate' } });

    expect(first.sequence_no).toBe(1);
    expect(second.sequence_no).toBe(2);
    expect(first.prev_hash).toBe(GENESIS_HASH);
    expect(second.prev_hash).toBe(first.hash);
    expect(first.hash).toBe(hashEvent(first, GENESIS_HASH));
    expect(first.timestamp).toBe('2025-03-01T10:00:00.000Z');
    expect(log.lastHash()).toBe(second.hash);
  });

  it('freezes appended events and isolates them from the draft', () => {
    const log = EventLog.replay(new MemoryEventStore(), clock);
    const draftIntake = intake();
    const event = log.append({ kind: 'CaseOpened', source_role: 'system', payload: { assessment_id: 'AS-1', intake: draftIntake } });
    draftIntake.transcript = 'changed';

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
    const opened = log.snapshot()[0];
    expect(opened.kind === 'CaseOpened' ? opened.payload.intake.transcript : null).toBe(intake().transcript);
  });

  it('keeps earlier snapshots unchanged by later appends', () => {
    const log = EventLog.replay(new MemoryEventStore(), clock);
    log.append({ kind: 'CaseOpened', source_role: 'system', payload: { assessment_id: 'AS-1', intake: intake() } });
    const before = log.snapshot();
    log.append({ kind: 'CaseArchived', source_role: 'human', payload: { reason: 'done' } });
    expect(before).toHaveLength(1);
    expect(log.snapshot()).toHaveLength(2);
  });

  it('replays a persisted log to the same head', () => {
    const store = seededStore();
    const replayed = EventLog.replay(store, clock);
    expect(replayed.length).toBe(2);
    expect(replayed.snapshot().map((e) => e.kind)).toEqual(['CaseOpened', 'CaseArchived']);
  });

  it('halts on a tampered payload', () => {
    const store = seededStore();
    store.lines[1] = store.lines[1].replace('duplicate', 'mistake');
    expect(() => EventLog.replay(store, clock)).toThrow(IrrecoverableError);
  });

  it('halts on reordered events', () => {
    const store = seededStore();
    store.lines = [store.lines[1], store.lines[0]];
    expect(() => EventLog.replay(store, clock)).toThrow(/Sequence violation on replay: expected 1, found 2/);
  });

  it('halts on a line that is not JSON', () => {
    const store = seededStore();
    store.lines.push('{oops');
    expect(() => EventLog.replay(store, clock)).toThrow('Event 3 is not valid JSON');
  });
});

describe('Case Registry', () => {
  it('generates dated assessment ids', () => {
    const registry = new CaseRegistry(new MemoryCaseStorage(), clock);
    const record = registry.create(intake());
    expect(record.assessmentId).toMatch(/^AS-20250301-[0-9a-f]{8}$/);
    expect(record.length).toBe(1);
    expect(registry.list()).toEqual([record.assessmentId]);
  });

  it('rejects invalid intake before anything is appended', () => {
    const storage = new MemoryCaseStorage();
    const registry = new CaseRegistry(storage, clock);
    expect(() => registry.create(intake({ contract_value: 0 }), 'AS-zero')).toThrow(InvalidInputError);
    expect(() => registry.create(intake(), 'bad id!')).toThrow(InvalidInputError);
    expect(storage.list()).toEqual([]);
  });

  it('rejects a contract value that would not survive a round trip to disk', () => {
    const storage = new MemoryCaseStorage();
    const registry = new CaseRegistry(storage, clock);
    expect(() => registry.create(intake({ contract_value: Infinity }), 'AS-inf')).toThrow('Assessment intake is invalid');
    expect(() => registry.create(intake({ contract_value: NaN }), 'AS-nan')).toThrow(InvalidInputError);
    expect(storage.list()).toEqual([]);
  });

  it('reopens a case from storage with the intake it was created with', () => {
    const storage = new MemoryCaseStorage();
    const live = new CaseRegistry(storage, clock).create(intake({ contract_value: 16500 }), 'AS-reopen');
    const replayed = new CaseRegistry(storage, clock).open('AS-reopen');

    expect(replayed.intake()).toEqual(live.intake());
    expect(replayed.intake().contract_value).toBe(16500);
    expect(replayed.snapshot().map((e) => e.hash)).toEqual(live.snapshot().map((e) => e.hash));
  });

  it('releases an in-process record and replays it on the next open', () => {
    const storage = new MemoryCaseStorage();
    const registry = new CaseRegistry(storage, clock);
    const first = registry.create(intake(), 'AS-release');
    expect(registry.openCount).toBe(1);

    registry.release('AS-release');
    expect(registry.openCount).toBe(0);
    expect(registry.list()).toEqual(['AS-release']);

    const reopened = registry.open('AS-release');
    expect(reopened).not.toBe(first);
    expect(reopened.length).toBe(1);
  });

  it('rejects duplicate ids', () => {
    const registry = new CaseRegistry(new MemoryCaseStorage(), clock);
    registry.create(intake(), 'AS-dup');
    expect(() => registry.create(intake(), 'AS-dup')).toThrow('Assessment AS-dup already exists');
  });

  it('reports unknown cases', () => {
    const registry = new CaseRegistry(new MemoryCaseStorage(), clock);
    expect(() => registry.open('AS-missing')).toThrow(CaseNotFoundError);
  });

  it('refuses to open a corrupted case', () => {
    const storage = new MemoryCaseStorage();
    new CaseRegistry(storage, clock).create(intake(), 'AS-corrupt');
    storage.open('AS-corrupt').lines[0] = storage.open('AS-corrupt').lines[0].replace('30000', '90000');

    expect(() => new CaseRegistry(storage, clock).open('AS-corrupt')).toThrow(IrrecoverableError);
  });

  it('accepts no appends once archived', () => {
    const registry = new CaseRegistry(new MemoryCaseStorage(), clock);
    const record = registry.create(intake(), 'AS-arch');
    record.append({ kind: 'CaseArchived', source_role: 'human', payload: { reason: 'withdrawn' } });
    expect(() => record.append({ kind: 'CaseArchived', source_role: 'human', payload: { reason: 'again' } })).toThrow(InvalidInputError);
    expect(record.length).toBe(2);
  });
});
