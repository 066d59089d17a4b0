/**
 * Event Log
 *
 * Record of the events committed transitions set, kept in a fixed-size ring:
 * once full, the oldest event is dropped. Sequence numbers start at 1 and
 * never repeat, so a client paging with `since` sees a gap rather than a
 * replay when it falls behind the ring.
 */

import { ContractEvent } from '../ledger';
import { decodeText } from '../token';

export const DEFAULT_EVENT_LOG_CAPACITY = 1000;

export interface RecordedEvent {
  sequence: number;
  txId: string;
  name: string;
  /** JSON text as the contract set it. */
  payload: string;
  committedAt: number;
}

export interface SerializedEventLog {
  nextSequence: number;
  events: RecordedEvent[];
}

export class EventLog {
  private ring: Array<RecordedEvent | undefined>;
  private head = 0; // slot of the oldest retained event
  private count = 0;
  private nextSequence = 1;

  constructor(readonly capacity: number = DEFAULT_EVENT_LOG_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`event log capacity must be a positive integer, got ${capacity}`);
    }
    this.ring = new Array<RecordedEvent | undefined>(capacity);
  }

  /** Number of events still retained. */
  get length(): number {
    return this.count;
  }

  /** Sequence of the newest event, 0 when nothing was ever appended. */
  get lastSequence(): number {
    return this.nextSequence - 1;
  }

  append(txId: string, event: ContractEvent): RecordedEvent {
    const recorded: RecordedEvent = {
      sequence: this.nextSequence,
      txId,
      name: event.name,
      payload: decodeText(event.payload),
      committedAt: Date.now(),
    };
    this.push(recorded);
    return recorded;
  }

  /** Retained events with a sequence number greater than `afterSequence`. */
  since(afterSequence: number, limit: number = 100): RecordedEvent[] {
    const firstSequence = this.nextSequence - this.count;
    const offset = Math.max(0, Math.floor(afterSequence) - firstSequence + 1);
    const end = Math.min(this.count, offset + Math.max(0, limit));

    const page: RecordedEvent[] = [];
    for (let i = offset; i < end; i++) {
      const event = this.ring[(this.head + i) % this.capacity];
      if (event !== undefined) page.push(event);
    }
    return page;
  }

  snapshot(): SerializedEventLog {
    return { nextSequence: this.nextSequence, events: this.since(0, this.count) };
  }

  restore(serialized: SerializedEventLog): void {
    this.ring = new Array<RecordedEvent | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
    this.nextSequence = 1;
    for (const event of serialized.events.slice(-this.capacity)) {
      this.push(event);
    }
    this.nextSequence = Math.max(serialized.nextSequence, this.nextSequence);
  }

  private push(event: RecordedEvent): void {
    if (this.count < this.capacity) {
      this.ring[(this.head + this.count) % this.capacity] = event;
      this.count++;
    } else {
      this.ring[this.head] = event;
      this.head = (this.head + 1) % this.capacity;
    }
    this.nextSequence = event.sequence + 1;
  }
}
