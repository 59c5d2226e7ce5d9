/**
 * Per-key mutual exclusion for runs, with a conflict policy.
 *
 * At most one job occupies a key at any moment. When a job arrives for an
 * occupied key:
 * - `cancel` aborts the occupant, drops anything already waiting, and takes
 *   the slot as soon as the occupant has finished;
 * - `queue` waits its turn in arrival order;
 * - `reject` returns immediately without running.
 *
 * Jobs receive an `AbortSignal` and must wind down promptly when it fires.
 */
export type ConflictPolicy = 'cancel' | 'queue' | 'reject';
export type SlotJob = (signal: AbortSignal) => Promise<void>;
export type SlotOutcome = 'ran' | 'rejected' | 'superseded';

interface Waiter {
  admit: (controller: AbortController) => void;
  supersede: () => void;
}

interface Slot {
  active: AbortController | undefined;
  done: Promise<void>;
  waiters: Waiter[];
}

export class SlotSupersededError extends Error {
  constructor() {
    super('superseded by a newer request');
    this.name = 'SlotSupersededError';
  }
}

export class RunSlots {
  private readonly slots = new Map<string, Slot>();

  async run(key: string, policy: ConflictPolicy, job: SlotJob): Promise<SlotOutcome> {
    let slot = this.slots.get(key);
    let controller: AbortController;

    if (!slot) {
      controller = new AbortController();
      slot = { active: controller, done: Promise.resolve(), waiters: [] };
      this.slots.set(key, slot);
    } else {
      if (policy === 'reject') {
        return 'rejected';
      }
      if (policy === 'cancel') {
        slot.active?.abort(new SlotSupersededError());
        for (const waiter of slot.waiters.splice(0)) {
          waiter.supersede();
        }
      }
      const waiting = slot;
      const admitted = await new Promise<AbortController | undefined>((resolve) => {
        waiting.waiters.push({ admit: resolve, supersede: () => resolve(undefined) });
      });
      if (!admitted) {
        return 'superseded';
      }
      controller = admitted;
    }

    const current = slot;
    let finish: () => void = () => undefined;
    current.done = new Promise<void>((resolve) => {
      finish = resolve;
    });
    try {
      await job(controller.signal);
    } finally {
      finish();
      this.handOff(key, current);
    }
    return 'ran';
  }

  isBusy(key: string): boolean {
    return this.slots.has(key);
  }

  /** Queued jobs for `key`, not counting the occupant. */
  waiting(key: string): number {
    return this.slots.get(key)?.waiters.length ?? 0;
  }

  /** Aborts the occupant of `key` and drops its waiters. Returns whether anything was there. */
  cancel(key: string, reason?: unknown): boolean {
    const slot = this.slots.get(key);
    if (!slot) return false;
    for (const waiter of slot.waiters.splice(0)) {
      waiter.supersede();
    }
    slot.active?.abort(reason);
    return true;
  }

  /** Resolves once the current occupant of `key` (if any) has finished. */
  async whenIdle(key: string): Promise<void> {
    await this.slots.get(key)?.done;
  }

  cancelAll(reason?: unknown): void {
    for (const key of [...this.slots.keys()]) {
      this.cancel(key, reason);
    }
  }

  async drain(): Promise<void> {
    await Promise.all([...this.slots.values()].map((slot) => slot.done));
  }

  private handOff(key: string, slot: Slot): void {
    const next = slot.waiters.shift();
    if (!next) {
      slot.active = undefined;
      this.slots.delete(key);
      return;
    }
    // The slot stays occupied across the hand-off so no newcomer can slip in.
    const controller = new AbortController();
    slot.active = controller;
    next.admit(controller);
  }
}
