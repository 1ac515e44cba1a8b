/**
 * TimedWindow — the closed interval [start, end] during which a sale is open.
 */

import type { UnixSeconds } from "@vestline/types";
import type { SaleWindow } from "./types.js";
import { SaleError } from "./types.js";

export class TimedWindow implements SaleWindow {
  readonly start: UnixSeconds;
  readonly end: UnixSeconds;

  constructor(window: SaleWindow) {
    const { start, end } = window;
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
      throw new SaleError("INVALID_CONFIGURATION", "Sale window bounds must be integer unix seconds");
    }
    if (end <= start) {
      throw new SaleError(
        "INVALID_CONFIGURATION",
        `Sale end (${end}) must be after its start (${start})`,
      );
    }
    this.start = start;
    this.end = end;
  }

  hasStarted(now: UnixSeconds): boolean {
    return now >= this.start;
  }

  isOpen(now: UnixSeconds): boolean {
    return now >= this.start && now <= this.end;
  }

  hasExpired(now: UnixSeconds): boolean {
    return now > this.end;
  }

  withEnd(end: UnixSeconds): TimedWindow {
    return new TimedWindow({ start: this.start, end });
  }

  toJSON(): SaleWindow {
    return { start: this.start, end: this.end };
  }
}
