/**
 * Unit tests for the shared clock
 */

import { describe, it, expect } from "vitest";
import { Clock, formatEpoch, snapshotAt } from "../../src/record/clock.js";

describe("formatEpoch", () => {
  it("renders four decimals in a 15-character field", () => {
    expect(formatEpoch(1700000000.5)).toBe("1700000000.5000");
    expect(formatEpoch(12.25)).toBe("        12.2500");
  });
});

describe("snapshotAt", () => {
  it("derives UTC calendar fields from the truncated second", () => {
    const snap = snapshotAt(1700000000.75);

    expect(snap.second).toBe(1700000000);
    expect(snap.epochText).toBe("1700000000.7500");
    expect(snap.utcDate).toBe("231114");
    expect(snap.utcTime).toBe("221320");
  });

  it("derives local calendar fields with two-digit year", () => {
    const epoch = new Date(2026, 0, 1, 23, 59, 58).getTime() / 1000;
    const snap = snapshotAt(epoch);

    expect(snap.localDate).toBe("260101");
    expect(snap.localTime).toBe("235958");
  });

  it("returns a frozen snapshot", () => {
    expect(Object.isFrozen(snapshotAt(1))).toBe(true);
  });
});

describe("Clock", () => {
  it("samples its source on refresh", () => {
    let now = 1700000000;
    const clock = new Clock(() => now);

    now = 1700000001.25;
    const snap = clock.refresh();

    expect(snap.epoch).toBe(1700000001.25);
    expect(clock.current()).toBe(snap);
  });

  it("seeds the snapshot from an explicit epoch", () => {
    const clock = new Clock(() => 1700000000);
    const snap = clock.refresh(1438631586);

    expect(snap.epoch).toBe(1438631586);
    expect(snap.epochText).toBe("1438631586.0000");
    expect(snap.utcDate).toBe("150803");
  });

  it("publishes whole snapshots: an earlier reference never changes", () => {
    let now = 1700000000;
    const clock = new Clock(() => now);
    const before = clock.current();

    now = 1800000000;
    clock.refresh();

    expect(before.epoch).toBe(1700000000);
    expect(before.utcDate).toBe("231114");
    expect(clock.current().epoch).toBe(1800000000);
  });
});
