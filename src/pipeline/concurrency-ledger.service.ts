import { Injectable, Logger } from '@nestjs/common';
import { Owner, describeOwner, slotId } from './interfaces/owner.interface';

export interface LedgerEntry {
  kind: 'user' | 'channel';
  id: number;
  count: number;
}

/**
 * Per-owner count of in-flight jobs. Pure bookkeeping: the ceiling an owner
 * is held to is decided by the coordinator.
 */
@Injectable()
export class ConcurrencyLedgerService {
  private readonly logger = new Logger(ConcurrencyLedgerService.name);
  private readonly users: Map<number, number> = new Map();
  private readonly channels: Map<number, number> = new Map();

  increment(owner: Owner): number {
    const counters = this.countersFor(owner);
    const id = slotId(owner);
    const next = (counters.get(id) ?? 0) + 1;
    counters.set(id, next);
    return next;
  }

  /**
   * Never goes below zero. An underflow means a second release of the same
   * slot and is only logged.
   */
  decrement(owner: Owner): number {
    const counters = this.countersFor(owner);
    const id = slotId(owner);
    const current = counters.get(id) ?? 0;

    if (current <= 0) {
      this.logger.warn(`Ledger underflow ignored for ${describeOwner(owner)}`);
      return 0;
    }

    const next = current - 1;
    if (next === 0) {
      counters.delete(id);
    } else {
      counters.set(id, next);
    }
    return next;
  }

  count(owner: Owner): number {
    return this.countersFor(owner).get(slotId(owner)) ?? 0;
  }

  /** Overwrite a counter; reserved for reconciliation against the registry. */
  resetSlot(kind: LedgerEntry['kind'], id: number, value: number): void {
    const counters = kind === 'user' ? this.users : this.channels;
    if (value <= 0) {
      counters.delete(id);
    } else {
      counters.set(id, value);
    }
  }

  total(): number {
    let sum = 0;
    for (const count of this.users.values()) sum += count;
    for (const count of this.channels.values()) sum += count;
    return sum;
  }

  entries(): LedgerEntry[] {
    return [
      ...Array.from(this.users.entries(), ([id, count]) => ({ kind: 'user' as const, id, count })),
      ...Array.from(this.channels.entries(), ([id, count]) => ({ kind: 'channel' as const, id, count })),
    ];
  }

  clear(): void {
    this.users.clear();
    this.channels.clear();
  }

  private countersFor(owner: Owner): Map<number, number> {
    return owner.kind === 'user' ? this.users : this.channels;
  }
}
