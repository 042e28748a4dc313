/**
 * Bounded activity log. Fixed-capacity ring buffer; the oldest record is
 * overwritten once it is full.
 */

import type { ActivityRecord } from '../types.js';
import { ACTIVITY_LOG_CAPACITY } from '../config.js';

export class ActivityLog {
  private readonly buffer: Array<ActivityRecord | undefined>;
  private start = 0;
  private count = 0;

  constructor(capacity: number = ACTIVITY_LOG_CAPACITY, records: readonly ActivityRecord[] = []) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('Activity log capacity must be a positive integer');
    }
    this.buffer = new Array<ActivityRecord | undefined>(capacity).fill(undefined);
    for (const record of records) this.append(record);
  }

  append(record: ActivityRecord): void {
    const frozen = Object.freeze({ ...record });
    const capacity = this.buffer.length;
    if (this.count < capacity) {
      this.buffer[(this.start + this.count) % capacity] = frozen;
      this.count += 1;
    } else {
      this.buffer[this.start] = frozen;
      this.start = (this.start + 1) % capacity;
    }
  }

  /** The newest `limit` records, oldest first. */
  tail(limit: number = this.count): ActivityRecord[] {
    const n = Math.max(0, Math.min(limit, this.count));
    const out: ActivityRecord[] = [];
    for (let i = this.count - n; i < this.count; i++) {
      const record = this.buffer[(this.start + i) % this.buffer.length];
      if (record) out.push(record);
    }
    return out;
  }

  size(): number {
    return this.count;
  }

  capacity(): number {
    return this.buffer.length;
  }
}
