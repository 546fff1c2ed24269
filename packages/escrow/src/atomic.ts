/**
 * @swapescrow/escrow — Atomic execution unit.
 *
 * Runs a body against a fixed set of participants. Every participant is
 * checkpointed before the body starts; if the body throws, every
 * participant is restored (last first) and the original error is
 * rethrown unchanged. Operations therefore carry no undo logic.
 */

import type { Checkpointable } from "@swapescrow/ledger";

export class AtomicExecutor {
  private readonly _participants: readonly Checkpointable[];

  constructor(participants: readonly Checkpointable[]) {
    this._participants = [...participants];
  }

  run<T>(body: () => T): T {
    const restores = this._participants.map((p) => p.checkpoint());
    try {
      return body();
    } catch (err) {
      for (const restore of restores.reverse()) {
        restore();
      }
      throw err;
    }
  }
}
