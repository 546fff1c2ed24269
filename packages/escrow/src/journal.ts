/**
 * @swapescrow/escrow — Event journal.
 *
 * Append-only, in-memory log of committed escrow operations. Each entry
 * is hashed using RFC 8785 (JCS) canonicalization + SHA-256 and linked
 * to its predecessor:
 *
 *   entry[1].hash = sha256(canonicalize(entry[1]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n]) + entry[n-1].hash)
 *
 * Subscribers are notified synchronously on append. The entry is
 * recorded before any subscriber runs, and every subscriber is notified
 * even when an earlier one throws; failures are then reported together
 * as a SubscriberError.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { EscrowEvent } from "@swapescrow/types";

export const GENESIS_HASH = "genesis";

export interface JournalEntry {
  /** 1-based position in the journal */
  readonly position: number;
  readonly event: EscrowEvent;
  readonly previousHash: string;
  readonly hash: string;
}

export type JournalHandler = (entry: JournalEntry) => void;

export class SubscriberError extends Error {
  constructor(
    public readonly entry: JournalEntry,
    public readonly failures: readonly unknown[],
  ) {
    super(`${failures.length} journal subscriber(s) failed at position ${entry.position}`);
    this.name = "SubscriberError";
  }
}

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface IntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Hashing
// =============================================================================

export function computeEntryHash(
  event: EscrowEvent,
  position: number,
  previousHash: string,
): string {
  const content = canonicalize({
    event: { type: event.type, metadata: event.metadata, payload: event.payload },
    position,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Recompute the chain over `entries` in position order.
 */
export function verifyJournal(entries: readonly JournalEntry[]): IntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  entries.forEach((entry, index) => {
    const expectedPosition = index + 1;
    if (entry.position !== expectedPosition) {
      errors.push({
        position: entry.position,
        reason: `Position gap: expected ${expectedPosition}, got ${entry.position}`,
      });
    }
    if (entry.previousHash !== previousHash) {
      errors.push({
        position: entry.position,
        reason: `previousHash mismatch at position ${entry.position}`,
      });
    }
    const expectedHash = computeEntryHash(entry.event, entry.position, entry.previousHash);
    if (entry.hash !== expectedHash) {
      errors.push({
        position: entry.position,
        reason: `Hash mismatch at position ${entry.position}`,
      });
    }
    if (errors.length === 0) {
      lastVerifiedPosition = entry.position;
    }
    previousHash = entry.hash;
  });

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}

// =============================================================================
// Journal
// =============================================================================

export class EventJournal {
  private readonly _entries: JournalEntry[] = [];
  private readonly _subscribers = new Set<JournalHandler>();
  private _lastHash: string = GENESIS_HASH;

  append(event: EscrowEvent): JournalEntry {
    const position = this._entries.length + 1;
    const previousHash = this._lastHash;
    const entry: JournalEntry = {
      position,
      event,
      previousHash,
      hash: computeEntryHash(event, position, previousHash),
    };

    this._entries.push(entry);
    this._lastHash = entry.hash;

    const failures: unknown[] = [];
    for (const handler of this._subscribers) {
      try {
        handler(entry);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length > 0) {
      throw new SubscriberError(entry, failures);
    }
    return entry;
  }

  /**
   * @returns a function that removes the handler
   */
  subscribe(handler: JournalHandler): () => void {
    this._subscribers.add(handler);
    return () => {
      this._subscribers.delete(handler);
    };
  }

  entries(): readonly JournalEntry[] {
    return [...this._entries];
  }

  get size(): number {
    return this._entries.length;
  }

  get lastHash(): string {
    return this._lastHash;
  }

  verifyIntegrity(): IntegrityResult {
    return verifyJournal(this._entries);
  }
}
