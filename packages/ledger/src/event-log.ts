/**
 * @snipledger/ledger — Append-only in-memory event log.
 *
 * Properties:
 * - Sequences are 1-based, contiguous, never reused
 * - Events are frozen once appended
 * - Subscribers are called synchronously, in sequence order, after the append
 * - A subscriber that throws is reported to the error sink; the append and
 *   the operation that caused it still succeed
 * - No durability (state is lost on process exit)
 */

import type { LedgerEvent, LedgerEventBody, LedgerEventType } from "./events.js";

export type LedgerEventHandler = (event: LedgerEvent) => void;

/** Receives errors thrown by subscribers. */
export type SubscriberErrorSink = (error: unknown, event: LedgerEvent) => void;

function reportToConsole(error: unknown, event: LedgerEvent): void {
  console.error(`Ledger event subscriber failed on ${event.type} #${event.sequence}:`, error);
}

export interface Subscription {
  unsubscribe(): void;
}

export interface EventQuery {
  /** First sequence to return (inclusive). Default: 1 */
  readonly fromSequence?: number | undefined;
  /** Maximum number of events to return. Default: unlimited */
  readonly maxCount?: number | undefined;
  /** Only return events of this type. */
  readonly type?: LedgerEventType | undefined;
}

export class LedgerEventLog {
  private readonly _events: LedgerEvent[] = [];
  private readonly _subscribers = new Set<LedgerEventHandler>();

  constructor(private readonly _onSubscriberError: SubscriberErrorSink = reportToConsole) {}

  /**
   * Append an event and notify subscribers. Every subscriber is called even
   * when an earlier one throws.
   */
  append(body: LedgerEventBody): LedgerEvent {
    const event: LedgerEvent = Object.freeze({
      ...body,
      sequence: this._events.length + 1,
    });
    this._events.push(event);

    for (const handler of this._subscribers) {
      try {
        handler(event);
      } catch (err) {
        this._onSubscriberError(err, event);
      }
    }

    return event;
  }

  read(query?: EventQuery): readonly LedgerEvent[] {
    const fromSequence = query?.fromSequence ?? 1;
    const type = query?.type;
    const maxCount = query?.maxCount;

    let result = this._events.filter(
      (e) => e.sequence >= fromSequence && (type === undefined || e.type === type),
    );

    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }

    return result;
  }

  subscribe(handler: LedgerEventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  get size(): number {
    return this._events.length;
  }
}
