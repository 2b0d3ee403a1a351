// src/transport/pending-requests.ts

import { Mutex } from 'async-mutex';
import { SEQUENCE_SPACE } from '../constants/constants.js';
import type { ResponseCallback } from '../types/nbe-types.js';

export interface Registration {
  seqNo: number;
  /** A callback was still waiting on this slot and got replaced */
  replaced: boolean;
}

/**
 * Callbacks of in-flight requests, one slot per sequence number.
 *
 * The sequence counter lives here too: it starts at 0 and is advanced before
 * each use, wrapping from 99 back to 0, so the first request carries 1.
 * Advancing and filling a slot happen in one critical section.
 */
export class PendingRequestTable {
  private readonly slots: Array<ResponseCallback | null> = new Array<ResponseCallback | null>(
    SEQUENCE_SPACE
  ).fill(null);
  private seqNo: number = 0;
  private readonly mutex: Mutex = new Mutex();

  /**
   * Advances the counter and stores `callback` under the new sequence number.
   */
  async register(callback: ResponseCallback): Promise<Registration> {
    const release = await this.mutex.acquire();
    try {
      this.seqNo = this.seqNo + 1 >= SEQUENCE_SPACE ? 0 : this.seqNo + 1;
      const replaced = this.slots[this.seqNo] != null;
      this.slots[this.seqNo] = callback;
      return { seqNo: this.seqNo, replaced };
    } finally {
      release();
    }
  }

  /**
   * Removes and returns the callback waiting on `seqNo`.
   */
  async take(seqNo: number): Promise<ResponseCallback | null> {
    if (!this.inRange(seqNo)) return null;
    return this.mutex.runExclusive(() => {
      const callback = this.slots[seqNo] ?? null;
      this.slots[seqNo] = null;
      return callback;
    });
  }

  /**
   * Empties the slot, but only while it still holds `callback`: a later
   * request may already have reused the sequence number.
   */
  async release(seqNo: number, callback?: ResponseCallback): Promise<void> {
    if (!this.inRange(seqNo)) return;
    await this.mutex.runExclusive(() => {
      if (callback === undefined || this.slots[seqNo] === callback) {
        this.slots[seqNo] = null;
      }
    });
  }

  has(seqNo: number): boolean {
    return this.inRange(seqNo) && this.slots[seqNo] != null;
  }

  get size(): number {
    return this.slots.reduce((count, slot) => (slot ? count + 1 : count), 0);
  }

  /** Last sequence number handed out */
  get currentSeqNo(): number {
    return this.seqNo;
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.slots.fill(null);
    });
  }

  private inRange(seqNo: number): boolean {
    return Number.isInteger(seqNo) && seqNo >= 0 && seqNo < SEQUENCE_SPACE;
  }
}
