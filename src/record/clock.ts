/**
 * Process clock state: one immutable snapshot of "now", replaced whole on refresh
 */

/** All fields derive from the same sampled instant */
export interface ClockSnapshot {
  /** UTC epoch seconds with fractional part */
  readonly epoch: number;
  /** Epoch truncated to the whole second */
  readonly second: number;
  /** Epoch as 15-char fixed width text with 4 decimals */
  readonly epochText: string;
  /** YYMMDD, UTC */
  readonly utcDate: string;
  /** HHMMSS, UTC */
  readonly utcTime: string;
  /** YYMMDD, local time */
  readonly localDate: string;
  /** HHMMSS, local time */
  readonly localTime: string;
}

/** Source of epoch seconds; swapped out in tests */
export type EpochSource = () => number;

const systemEpoch: EpochSource = () => Date.now() / 1000;

function two(n: number): string {
  return String(n).padStart(2, "0");
}

/** Render epoch seconds the way record prefixes carry them: `%15.4f` */
export function formatEpoch(epoch: number): string {
  return epoch.toFixed(4).padStart(15, " ");
}

/** Build a snapshot from one instant; pure */
export function snapshotAt(epoch: number): ClockSnapshot {
  const second = Math.trunc(epoch);
  const date = new Date(second * 1000);
  return Object.freeze({
    epoch,
    second,
    epochText: formatEpoch(epoch),
    utcDate: two(date.getUTCFullYear() % 100) + two(date.getUTCMonth() + 1) + two(date.getUTCDate()),
    utcTime: two(date.getUTCHours()) + two(date.getUTCMinutes()) + two(date.getUTCSeconds()),
    localDate: two(date.getFullYear() % 100) + two(date.getMonth() + 1) + two(date.getDate()),
    localTime: two(date.getHours()) + two(date.getMinutes()) + two(date.getSeconds()),
  });
}

/**
 * Shared clock. `refresh` computes a complete snapshot before publishing it with
 * a single assignment, so `current()` never returns a mix of two instants.
 */
export class Clock {
  private snapshot: ClockSnapshot;

  constructor(private readonly source: EpochSource = systemEpoch) {
    this.snapshot = snapshotAt(source());
  }

  /** Sample the source (or take `explicitEpoch`) and publish a new snapshot */
  refresh(explicitEpoch?: number): ClockSnapshot {
    const next = snapshotAt(explicitEpoch ?? this.source());
    this.snapshot = next;
    return next;
  }

  /** Last published snapshot */
  current(): ClockSnapshot {
    return this.snapshot;
  }
}
