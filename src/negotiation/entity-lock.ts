/**
 * Keyed serialization: tasks sharing a key run one at a time, in submission
 * order; tasks on different keys run concurrently. A key is dropped once its
 * last task settles.
 */

import pLimit from 'p-limit';

interface Slot {
  limiter: ReturnType<typeof pLimit>;
  users: number;
}

export class EntityLock {
  private slots = new Map<string, Slot>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let slot = this.slots.get(key);
    if (!slot) {
      slot = { limiter: pLimit(1), users: 0 };
      this.slots.set(key, slot);
    }
    const held = slot;
    held.users++;
    return held.limiter(task).finally(() => {
      held.users--;
      if (held.users === 0 && this.slots.get(key) === held) this.slots.delete(key);
    });
  }

  /** Number of tasks queued or running for a key. */
  pending(key: string): number {
    return this.slots.get(key)?.users ?? 0;
  }

  /** Keys with at least one task queued or running. */
  get size(): number {
    return this.slots.size;
  }
}
