/**
 * Unit tests for the stop signal
 */

import { describe, it, expect } from "vitest";
import { StopSignal } from "../../src/daemon/stop-signal.js";

describe("StopSignal", () => {
  it("starts untriggered", () => {
    const stop = new StopSignal();

    expect(stop.triggered).toBe(false);
    expect(stop.reason).toBeNull();
  });

  it("keeps the first reason", () => {
    const stop = new StopSignal();
    stop.trigger("SIGINT");
    stop.trigger("stop command");

    expect(stop.triggered).toBe(true);
    expect(stop.reason).toBe("SIGINT");
  });

  it("releases waiters registered before the trigger", async () => {
    const stop = new StopSignal();
    const waiting = Promise.all([stop.wait(), stop.wait()]);
    stop.trigger("stop command");

    expect(await waiting).toEqual(["stop command", "stop command"]);
  });

  it("resolves immediately once triggered", async () => {
    const stop = new StopSignal();
    stop.trigger("SIGTERM");

    expect(await stop.wait()).toBe("SIGTERM");
  });
});
