/**
 * Unit tests for the record normalizer
 */

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { Clock } from "../../src/record/clock.js";
import { looksLikeIpv4, Normalizer, sourcePrefixed } from "../../src/record/normalizer.js";
import type { NormalizeResult } from "../../src/record/types.js";

const RECEIVED = 1700000000.5;

function fixedNormalizer(epoch = RECEIVED): Normalizer {
  return new Normalizer(new Clock(() => epoch));
}

function accepted(result: NormalizeResult): Extract<NormalizeResult, { ok: true }> {
  if (!result.ok) throw new Error(`rejected: ${result.reason}`);
  return result;
}

function rejected(result: NormalizeResult): string {
  if (result.ok) throw new Error("accepted");
  return result.reason;
}

/** Split a record into its nine fields, without the trailing newline */
function fieldsOf(record: string): string[] {
  expect(record.endsWith("\n")).toBe(true);
  return record.slice(0, -1).split("\t");
}

function payloadOf(record: string): Record<string, unknown> {
  return JSON.parse(fieldsOf(record)[8]) as Record<string, unknown>;
}

describe("Normalizer", () => {
  describe("accepted lines", () => {
    it("fills defaults and writes every control key back", () => {
      const result = accepted(fixedNormalizer().normalize('10.0.0.7\t{"_msg":"hello"}'));
      const json =
        '{"_el":"_","_id":"____","_ip":"10.0.0.7","_msg":"hello","_si":"____","_sl":"_","_ts":"1700000000.5000"}';

      expect(fieldsOf(result.record)).toEqual([
        "1",
        "1700000000.5000",
        "1700000000.5000",
        "____",
        "____",
        "_",
        "_",
        createHash("sha1").update(json).digest("hex"),
        json,
      ]);
      expect(result.digest).toBe(createHash("sha1").update(json).digest("hex"));
      expect(result.fields).toEqual({
        receivedAt: "1700000000.5000",
        eventTs: "1700000000.5000",
        id: "____",
        subId: "____",
        errorLevel: "_",
        subLevel: "_",
      });
    });

    it("zero-pads integer control values", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_id":7,"_si":42,"_el":3,"_sl":0}'));

      expect(fieldsOf(result.record).slice(3, 7)).toEqual(["0007", "0042", "3", "0"]);
      expect(payloadOf(result.record)).toMatchObject({ _id: "0007", _si: "0042", _el: "3", _sl: "0" });
    });

    it("counts the sign toward the pad width", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_id":-5}'));

      expect(result.fields.id).toBe("-005");
    });

    it("keeps string control values as given", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_id":"web1","_si":"auth","_el":"4","_sl":"x"}'));

      expect(result.fields).toMatchObject({ id: "web1", subId: "auth", errorLevel: "4", subLevel: "x" });
    });

    it("keeps payload integers beyond double precision exact", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"order":12345678901234567890,"f":1.5}'));
      const json = fieldsOf(result.record)[8];

      expect(json).toContain('"order":12345678901234567890');
      expect(json).toContain('"f":1.5');
      expect(result.digest).toBe(createHash("sha1").update(json).digest("hex"));
    });

    it("renders large integer control values from their digits", () => {
      const result = accepted(
        fixedNormalizer().normalize('1.2.3.4\t{"_id":12345678901234567890,"_si":-98765432109876543210}'),
      );

      expect(result.fields.id).toBe("12345678901234567890");
      expect(result.fields.subId).toBe("-98765432109876543210");
    });

    it("counts booleans as 1 and 0", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_id":true,"_si":false,"_el":true,"_sl":false}'));

      expect(result.fields).toMatchObject({ id: "0001", subId: "0000", errorLevel: "1", subLevel: "0" });
    });

    it("keeps object control values on one line", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_id":{"k":"a\\nb"}}'));

      expect(result.fields.id).toBe('{"k":"a\\nb"}');
      expect(fieldsOf(result.record)).toHaveLength(9);
    });

    it("treats null control values as absent", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_id":null,"_el":null}'));

      expect(result.fields.id).toBe("____");
      expect(result.fields.errorLevel).toBe("_");
    });

    it("keeps a sender string timestamp", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_ts":"1438631586.0000"}'));

      expect(fieldsOf(result.record)[1]).toBe("1700000000.5000");
      expect(fieldsOf(result.record)[2]).toBe("1438631586.0000");
      expect(payloadOf(result.record)._ts).toBe("1438631586.0000");
    });

    it("renders a numeric timestamp but leaves the payload value numeric", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_ts":1438631586.25}'));

      expect(result.fields.eventTs).toBe("1438631586.2500");
      expect(payloadOf(result.record)._ts).toBe(1438631586.25);
    });

    it("replaces an empty timestamp with the receive time", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_ts":""}'));

      expect(result.fields.eventTs).toBe("1700000000.5000");
      expect(payloadOf(result.record)._ts).toBe("1700000000.5000");
    });

    it("overwrites a sender-supplied _ip with the peer address", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_ip":"9.9.9.9"}'));

      expect(payloadOf(result.record)._ip).toBe("1.2.3.4");
    });

    it("keeps the record ASCII by escaping non-ASCII text", () => {
      const result = accepted(fixedNormalizer().normalize('1.2.3.4\t{"_msg":"café"}'));
      const json = fieldsOf(result.record)[8];

      expect(json).toContain('"_msg":"caf\\u00e9"');
      expect(/^[\x00-\x7f]*$/.test(result.record)).toBe(true);
    });

    it("produces the same digest when its own payload is resubmitted later", () => {
      const first = accepted(fixedNormalizer().normalize('10.0.0.7\t{"_msg":"again","_el":2,"n":[1,2]}'));
      const payload = fieldsOf(first.record)[8];

      const second = accepted(fixedNormalizer(RECEIVED + 3600).normalize(sourcePrefixed("10.0.0.7", payload)));

      expect(second.digest).toBe(first.digest);
      expect(fieldsOf(second.record)[8]).toBe(payload);
      expect(second.fields.receivedAt).toBe("1700003600.5000");
    });

    it("refreshes the shared clock on every call", () => {
      let now = 1700000000;
      const clock = new Clock(() => now);
      const normalizer = new Normalizer(clock);

      now = 1700000042;
      normalizer.normalize('1.2.3.4\t{}');

      expect(clock.current().epoch).toBe(1700000042);
    });
  });

  describe("rejected lines", () => {
    it("needs a delimiter", () => {
      expect(rejected(fixedNormalizer().normalize("1.2.3.4"))).toBe("split ip/payload: no delimiter");
    });

    it("needs a dotted-quad source", () => {
      expect(rejected(fixedNormalizer().normalize("not-an-ip\t{}"))).toBe('bad _ip: "not-an-ip"');
      expect(rejected(fixedNormalizer().normalize("1.2.3\t{}"))).toBe('bad _ip: "1.2.3"');
      expect(rejected(fixedNormalizer().normalize("\t{}"))).toBe('bad _ip: ""');
    });

    it("needs a brace-delimited payload", () => {
      expect(rejected(fixedNormalizer().normalize("1.2.3.4\tnot json"))).toBe('bad json dict: "not json"');
      expect(rejected(fixedNormalizer().normalize("1.2.3.4\t{bad"))).toBe('bad json dict: "{bad"');
      expect(rejected(fixedNormalizer().normalize("1.2.3.4\t"))).toBe('bad json dict: ""');
    });

    it.each(["_ts", "_id", "_si", "_el", "_sl"])("rejects %s values that would split the record", (key) => {
      const normalizer = fixedNormalizer();

      expect(rejected(normalizer.normalize(`1.2.3.4\t{"${key}":"ab\\n1\\t2"}`))).toBe(`bad ${key}: "ab\\n1\\t2"`);
      expect(rejected(normalizer.normalize(`1.2.3.4\t{"${key}":"x\\r"}`))).toBe(`bad ${key}: "x\\r"`);
    });

    it("reports JSON syntax errors", () => {
      expect(rejected(fixedNormalizer().normalize('1.2.3.4\t{"a":}')).startsWith("json parse: ")).toBe(true);
    });
  });
});

describe("looksLikeIpv4", () => {
  it("checks shape only", () => {
    expect(looksLikeIpv4("127.0.0.1")).toBe(true);
    expect(looksLikeIpv4("999.1.1.9")).toBe(true);
    expect(looksLikeIpv4("::1")).toBe(false);
    expect(looksLikeIpv4("a.1.1.1")).toBe(false);
    expect(looksLikeIpv4("1.1.1.1.")).toBe(false);
  });
});
