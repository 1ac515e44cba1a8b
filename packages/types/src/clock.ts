/**
 * Clock implementations.
 */

import type { Clock } from "./collaborators.js";
import type { UnixSeconds } from "./financial.js";

/**
 * Wall clock, truncated to whole seconds.
 */
export class SystemClock implements Clock {
  now(): UnixSeconds {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to. Used by tests and the demo.
 */
export class ManualClock implements Clock {
  private current: UnixSeconds;

  constructor(start: UnixSeconds) {
    this.current = start;
  }

  now(): UnixSeconds {
    return this.current;
  }

  set(time: UnixSeconds): void {
    this.current = time;
  }

  advance(seconds: number): UnixSeconds {
    this.current += seconds;
    return this.current;
  }
}
