/**
 * Turn Sequencer
 *
 * Hands out per-key tickets in issue order. A ticket becomes ready once
 * every earlier ticket on the same key is done, so work that finishes out
 * of order is still applied in the order it was issued.
 */

export interface Ticket {
  readonly key: string;
  readonly seq: number;
  /** Resolves when all earlier tickets on the key are done */
  readonly ready: Promise<void>;
  /** Idempotent */
  done(): void;
}

interface Lane {
  nextSeq: number;
  head: number;
  doneEarly: Set<number>;
  waiters: Map<number, () => void>;
}

export class TurnSequencer {
  private lanes = new Map<string, Lane>();

  issue(key: string): Ticket {
    let lane = this.lanes.get(key);
    if (!lane) {
      lane = { nextSeq: 0, head: 0, doneEarly: new Set(), waiters: new Map() };
      this.lanes.set(key, lane);
    }

    const seq = lane.nextSeq++;
    const waiters = lane.waiters;
    const ready = seq === lane.head
      ? Promise.resolve()
      : new Promise<void>(resolve => {
          waiters.set(seq, resolve);
        });

    let settled = false;
    return {
      key,
      seq,
      ready,
      done: () => {
        if (settled) return;
        settled = true;
        this.settle(key, seq);
      }
    };
  }

  /**
   * Tickets issued but not yet done on `key`.
   */
  pending(key: string): number {
    const lane = this.lanes.get(key);
    return lane ? lane.nextSeq - lane.head : 0;
  }

  private settle(key: string, seq: number): void {
    const lane = this.lanes.get(key);
    if (!lane) return;

    if (seq !== lane.head) {
      lane.doneEarly.add(seq);
      return;
    }

    lane.head++;
    while (lane.doneEarly.delete(lane.head)) {
      lane.head++;
    }

    if (lane.head === lane.nextSeq) {
      this.lanes.delete(key);
      return;
    }

    const wake = lane.waiters.get(lane.head);
    if (wake) {
      lane.waiters.delete(lane.head);
      wake();
    }
  }
}
