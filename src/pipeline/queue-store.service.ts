import { Injectable } from '@nestjs/common';
import { QueueEntry } from './interfaces/job.interface';
import { Owner, slotId } from './interfaces/owner.interface';

/**
 * FIFO queues of submissions waiting for a slot, one per owner. Order across
 * owners is not kept; caps are enforced before anything reaches `enqueue`.
 */
@Injectable()
export class QueueStoreService {
  private readonly users: Map<number, QueueEntry[]> = new Map();
  private readonly channels: Map<number, QueueEntry[]> = new Map();

  /**
   * @returns the owner's queue depth after insertion, i.e. the entry's position
   */
  enqueue(owner: Owner, entry: QueueEntry): number {
    const queue = this.queueFor(owner, true);
    queue.push(entry);
    return queue.length;
  }

  /** Put a drained entry that could not be admitted back at the head. */
  requeueFront(owner: Owner, entry: QueueEntry): number {
    const queue = this.queueFor(owner, true);
    queue.unshift(entry);
    return queue.length;
  }

  dequeueNext(owner: Owner): QueueEntry | undefined {
    const queue = this.queueFor(owner, false);
    const entry = queue.shift();
    if (queue.length === 0) {
      this.queuesFor(owner).delete(slotId(owner));
    }
    return entry;
  }

  /**
   * Remove the first entry matching `predicate` from the owner's queue.
   */
  discard(owner: Owner, predicate: (entry: QueueEntry) => boolean): QueueEntry | undefined {
    const queue = this.queueFor(owner, false);
    const index = queue.findIndex(predicate);
    if (index === -1) {
      return undefined;
    }
    const [removed] = queue.splice(index, 1);
    if (queue.length === 0) {
      this.queuesFor(owner).delete(slotId(owner));
    }
    return removed;
  }

  hasPending(owner: Owner): boolean {
    return this.depth(owner) > 0;
  }

  depth(owner: Owner): number {
    return this.queueFor(owner, false).length;
  }

  total(): number {
    let sum = 0;
    for (const queue of this.users.values()) sum += queue.length;
    for (const queue of this.channels.values()) sum += queue.length;
    return sum;
  }

  /** One representative owner per non-empty queue (its head entry's owner). */
  owners(): Owner[] {
    const heads: Owner[] = [];
    for (const queue of [...this.users.values(), ...this.channels.values()]) {
      if (queue.length > 0) {
        heads.push(queue[0].owner);
      }
    }
    return heads;
  }

  clear(): number {
    const dropped = this.total();
    this.users.clear();
    this.channels.clear();
    return dropped;
  }

  private queuesFor(owner: Owner): Map<number, QueueEntry[]> {
    return owner.kind === 'user' ? this.users : this.channels;
  }

  private queueFor(owner: Owner, create: boolean): QueueEntry[] {
    const queues = this.queuesFor(owner);
    const id = slotId(owner);
    const existing = queues.get(id);
    if (existing) {
      return existing;
    }
    if (!create) {
      return [];
    }
    const queue: QueueEntry[] = [];
    queues.set(id, queue);
    return queue;
  }
}
