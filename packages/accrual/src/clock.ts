/**
 * @ubistream/accrual: Clocks.
 *
 * Every operation samples time exactly once. Views read `now()`;
 * state-changing operations read `transactionTime()`.
 */

import type { UnixSeconds } from "@ubistream/types";
import { AccrualError } from "./types.js";

export interface Clock {
  /** Current time for read-only queries. */
  now(): UnixSeconds;

  /** Time at which the next state-changing operation executes. */
  transactionTime(): UnixSeconds;
}

/**
 * Wall-clock time, truncated to whole seconds.
 */
export class SystemClock implements Clock {
  now(): UnixSeconds {
    return Math.floor(Date.now() / 1000);
  }

  transactionTime(): UnixSeconds {
    return this.now();
  }
}

export interface ManualClockOptions {
  /**
   * Seconds added before every `transactionTime()` sample.
   * 1 models a chain that mines each transaction one second after the
   * previous block.
   */
  readonly autoAdvance?: number;
}

/**
 * Settable, monotonic clock for tests and simulations.
 */
export class ManualClock implements Clock {
  private _current: UnixSeconds;
  private readonly _autoAdvance: number;

  constructor(start: UnixSeconds, options?: ManualClockOptions) {
    const autoAdvance = options?.autoAdvance ?? 0;
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new RangeError(`Clock start must be a non-negative integer, got ${String(start)}`);
    }
    if (!Number.isSafeInteger(autoAdvance) || autoAdvance < 0) {
      throw new RangeError(`autoAdvance must be a non-negative integer, got ${String(autoAdvance)}`);
    }
    this._current = start;
    this._autoAdvance = autoAdvance;
  }

  now(): UnixSeconds {
    return this._current;
  }

  transactionTime(): UnixSeconds {
    this._current += this._autoAdvance;
    return this._current;
  }

  /**
   * Jump to an absolute time. Time never moves backwards.
   */
  set(time: UnixSeconds): void {
    if (!Number.isSafeInteger(time) || time < this._current) {
      throw new AccrualError(
        "CLOCK_REGRESSION",
        `Cannot move clock from ${String(this._current)} to ${String(time)}`,
      );
    }
    this._current = time;
  }

  advance(seconds: number): void {
    this.set(this._current + seconds);
  }
}
