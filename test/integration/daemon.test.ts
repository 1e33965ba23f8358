/**
 * Integration tests: a daemon on an ephemeral port, driven over TCP
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createHash } from "node:crypto";
import { mkdtempSync, readdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { LineClient } from "../../src/client/line-client.js";
import { sendEvents } from "../../src/client/sender.js";
import { mergeAndValidateConfig } from "../../src/config/loader.js";
import type { ConfigOverrides } from "../../src/config/types.js";
import { Daemon } from "../../src/daemon/daemon.js";
import { Logger } from "../../src/utils/logger.js";
import type { ViewerRecord } from "../../src/viewer/types.js";

const HOST = "127.0.0.1";

describe("Daemon", () => {
  let dir: string;
  let daemon: Daemon | null;
  const logger = new Logger({ level: "error" }, { stderr: false });

  function createDaemon(overrides: ConfigOverrides, viewer?: (record: ViewerRecord) => void): Daemon {
    const { config } = mergeAndValidateConfig(
      {
        storage: { identity: "itest" },
        shutdown: { drainTimeoutSeconds: 2, stopTimeoutSeconds: 2 },
      },
      { host: HOST, port: 1, ...overrides },
    );
    // Port 1 passes validation; bind to an ephemeral port instead
    config.server.port = 0;
    daemon = new Daemon({ config, logger, viewer, writerPollMs: 20, closeGraceMs: 200 });
    return daemon;
  }

  /** Every stored line across the daemon's files, oldest file first */
  function storedLines(): string[] {
    return readdirSync(dir)
      .sort()
      .flatMap((name) => readFileSync(join(dir, name), "utf-8").split("\n"))
      .filter((line) => line.length > 0);
  }

  function payloadOf(line: string): Record<string, unknown> {
    return JSON.parse(line.split("\t")[8]) as Record<string, unknown>;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "stamplog-daemon-"));
    daemon = null;
  });

  afterEach(async () => {
    await daemon?.shutdown();
    rmSync(dir, { recursive: true, force: true });
  });

  it("stores accepted lines between begin and end markers", async () => {
    const d = createDaemon({ pathTemplate: join(dir, "~me~-~ymd~.log") });
    const address = await d.start();
    const running = d.run();

    const client = await LineClient.connect(HOST, address.port);
    expect(await client.send('{"_msg":"hello","_el":2}')).toBe("OK");
    expect(await client.send("!ping!")).toBe("OK|!ping!");
    expect(await client.send("not json")).toBe('E: bad json dict: "not json"');
    client.write("");
    expect(await client.send("!x!")).toBe("OK|!x!");
    expect(await client.send("!STOP!")).toBe("OK");

    const report = await running;
    await client.close();

    expect(report).toEqual({ drained: true, writerStopped: true, pending: 0 });
    expect(d.stop.reason).toBe("stop command");
    expect(d.writer.isStopped).toBe(true);
    expect(d.listener.totalConnections).toBe(1);
    expect(d.listener.openConnections).toBe(0);
    expect(readdirSync(dir).every((name) => name.startsWith("itest-"))).toBe(true);

    const lines = storedLines();
    expect(lines).toHaveLength(3);

    const begins = payloadOf(lines[0]);
    expect(begins._ip).toBe("0.0.0.0");
    expect(begins._id).toBe("----");
    expect(begins._el).toBe("0");
    expect(String(begins._msg).startsWith("main begins @ ")).toBe(true);

    const fields = lines[1].split("\t");
    expect(fields).toHaveLength(9);
    expect(fields[0]).toBe("1");
    expect(fields[1]).toHaveLength(15);
    expect(fields[2]).toBe(fields[1]);
    expect(fields.slice(3, 7)).toEqual(["____", "____", "2", "_"]);
    expect(fields[7]).toBe(createHash("sha1").update(fields[8]).digest("hex"));
    expect(payloadOf(lines[1])).toEqual({
      _msg: "hello",
      _ip: HOST,
      _ts: fields[1],
      _id: "____",
      _si: "____",
      _el: "2",
      _sl: "_",
    });

    expect(String(payloadOf(lines[2])._msg).startsWith("main ends @ ")).toBe(true);
  });

  it("keeps each connection's records in order", async () => {
    const d = createDaemon({ pathTemplate: join(dir, "~ymd~.log") });
    const address = await d.start();

    const clients = await Promise.all(["c001", "c002", "c003"].map(() => LineClient.connect(HOST, address.port)));
    await Promise.all(
      clients.map(async (client, c) => {
        for (let n = 1; n <= 5; n++) {
          expect(await client.send(JSON.stringify({ _id: `c00${c + 1}`, n }))).toBe("OK");
        }
      }),
    );

    const report = await d.shutdown();
    await Promise.all(clients.map((client) => client.close()));

    expect(report.drained).toBe(true);
    const records = storedLines().map(payloadOf);
    expect(records).toHaveLength(17);
    for (const id of ["c001", "c002", "c003"]) {
      expect(records.filter((r) => r._id === id).map((r) => r.n)).toEqual([1, 2, 3, 4, 5]);
    }
  });

  it("renders records through the viewer when persistence is off", async () => {
    const seen: ViewerRecord[] = [];
    const d = createDaemon({ verbose: true }, (record) => void seen.push(record));
    const address = await d.start();

    const client = await LineClient.connect(HOST, address.port);
    expect(await client.send('{"_id":"web1","_msg":"shown"}')).toBe("OK");
    await d.shutdown();
    await client.close();

    expect(seen.map((r) => r.event._msg)).toEqual([
      expect.stringMatching(/^main begins @ /),
      "shown",
      expect.stringMatching(/^main ends @ /),
    ]);
    expect(seen[1].id).toBe("web1");
    expect(readdirSync(dir)).toEqual([]);
  });

  it("accepts the sender's numbered events and its stop command", async () => {
    const d = createDaemon({ pathTemplate: join(dir, "~ymd~.log") });
    const address = await d.start();
    const running = d.run();

    const summary = await sendEvents(
      {
        host: HOST,
        port: address.port,
        srcId: "load",
        subId: "____",
        errorLevel: "1",
        subLevel: "_",
        count: 3,
        rateSeconds: 0,
        stop: true,
      },
      logger,
    );
    await running;

    expect(summary).toEqual({ sent: 3, accepted: 3, rejected: [] });
    const records = storedLines().map(payloadOf).filter((r) => r._id === "load");
    expect(records.map((r) => r._msg)).toEqual(["n001", "n002", "n003"]);
  });

  it("refuses to start without a viewer when one is configured", () => {
    expect(() => createDaemon({ verbose: true })).toThrow("viewer enabled but no viewer supplied");
  });
});
