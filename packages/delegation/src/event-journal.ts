/**
 * @ubistream/delegation: In-memory event journal.
 *
 * Keeps every committed engine event in order with a 1-based,
 * gap-free sequence number, and dispatches new events synchronously to
 * subscribers. A failing listener does not stop the others, and its
 * error goes to `onListenerError`, never to the caller of `append`.
 */

import type { EngineEvent, JournaledEvent } from "@ubistream/types";

export type EventListener = (entry: JournaledEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

export type ListenerErrorHandler = (error: unknown, entry: JournaledEvent) => void;

export interface EventJournalOptions {
  /** Receives listener failures. Defaults to a process warning. */
  readonly onListenerError?: ListenerErrorHandler;
}

function warnListenerError(error: unknown, entry: JournaledEvent): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.emitWarning(
    `Listener failed on event ${String(entry.sequence)} (${entry.event.type}): ${reason}`,
    "EventListenerWarning",
  );
}

export class EventJournal {
  private readonly _log: JournaledEvent[] = [];
  private readonly _listeners = new Set<EventListener>();
  private readonly _onListenerError: ListenerErrorHandler;

  constructor(history: readonly JournaledEvent[] = [], options: EventJournalOptions = {}) {
    this._onListenerError = options.onListenerError ?? warnListenerError;
    history.forEach((entry, i) => {
      if (entry.sequence !== i + 1) {
        throw new Error(`Journal history has sequence ${String(entry.sequence)} at position ${String(i + 1)}`);
      }
      this._log.push(entry);
    });
  }

  // ─── Append ─────────────────────────────────────────────────────────

  /**
   * Assign sequence numbers, store, then notify subscribers in order.
   * Every listener sees every entry, whatever the others do.
   */
  append(events: readonly EngineEvent[]): readonly JournaledEvent[] {
    const entries = events.map((event) => {
      const entry: JournaledEvent = { sequence: this._log.length + 1, event };
      this._log.push(entry);
      return entry;
    });

    for (const listener of [...this._listeners]) {
      for (const entry of entries) {
        try {
          listener(entry);
        } catch (error) {
          this._onListenerError(error, entry);
        }
      }
    }

    return entries;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readAll(fromSequence = 1): readonly JournaledEvent[] {
    if (!Number.isSafeInteger(fromSequence) || fromSequence < 1) {
      throw new RangeError(`fromSequence must be a positive integer, got ${String(fromSequence)}`);
    }
    return this._log.slice(fromSequence - 1);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(listener: EventListener): Subscription {
    this._listeners.add(listener);
    return {
      unsubscribe: () => {
        this._listeners.delete(listener);
      },
    };
  }
}
