/**
 * Qualifier Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { findQualifying, type QualifyOptions } from "../index.js";
import { FakeGoalClient } from "../../__tests__/helpers/fake-goal-client.js";
import { MemoryRecordStore } from "../../__tests__/helpers/memory-store.js";
import type { RemoteDatapoint } from "../../../types/index.js";

const SOURCE = "source-goal";
const TARGET = "target-goal";
const MARKER = "Auto-entered via Apple Health";

const OPTIONS: QualifyOptions = { targetGoal: TARGET, timezone: "America/New_York" };

// 2025-09-26, New York (UTC-4)
const AT_0459_59 = 1758877199;
const AT_0500 = 1758877200;
const AT_0700 = 1758884400;
const AT_0745 = 1758887100;
const AT_0830 = 1758889800;
const AT_0830_01 = 1758889801;
const AT_1900 = 1758927600; // 23:00 UTC
const AT_2359_59 = 1758945599;
// 2025-09-27 06:15
const NEXT_DAY_0615 = 1758968100;

let nextId = 1;

function manual(timestamp: number, value: number): RemoteDatapoint {
  return { id: `m${nextId++}`, timestamp, value, comment: "Manual entry" };
}

function imported(timestamp: number, value: number, fulltext?: string): RemoteDatapoint {
  const dp: RemoteDatapoint = { id: `a${nextId++}`, timestamp, value, comment: MARKER };
  return fulltext === undefined ? dp : { ...dp, fulltext };
}

describe("findQualifying", () => {
  let client: FakeGoalClient;
  let store: MemoryRecordStore;

  beforeEach(() => {
    client = new FakeGoalClient();
    store = new MemoryRecordStore();
  });

  async function run(source: RemoteDatapoint[], options: QualifyOptions = OPTIONS) {
    client.seed(SOURCE, source);
    return findQualifying(client, store, SOURCE, options);
  }

  describe("time window", () => {
    it.each([
      ["05:00:00", AT_0500, 1],
      ["08:30:00", AT_0830, 1],
      ["08:30:01", AT_0830_01, 0],
      ["04:59:59", AT_0459_59, 0],
    ])("should treat a meditation at %s accordingly", async (_label, timestamp, expected) => {
      const outcome = await run([manual(timestamp, 40)]);

      expect(outcome.recorded).toHaveLength(expected);
      expect(outcome.outsideWindow).toBe(1 - expected);
    });
  });

  describe("duration", () => {
    it("should accept exactly 35 minutes", async () => {
      const outcome = await run([manual(AT_0700, 35)]);

      expect(outcome.recorded.map((d) => d.sourceValue)).toEqual([35]);
    });

    it("should reject 34.999 minutes", async () => {
      const outcome = await run([manual(AT_0700, 34.999)]);

      expect(outcome.recorded).toEqual([]);
      expect(outcome.tooShort).toBe(1);
    });
  });

  it("should record a qualifying meditation locally and remotely", async () => {
    const outcome = await run([manual(AT_0700, 40)]);

    const comment = "Early meditation: 40.0 minutes at 07:00";
    expect(store.datapoints).toEqual([
      { value: 1, timestamp: AT_0700, comment, id: `local_${AT_0700}_1` },
    ]);
    expect(store.saves).toBe(1);
    expect(client.creates).toEqual([{ goal: TARGET, value: 1, timestamp: AT_0700, comment }]);
    expect(outcome.recorded).toEqual([
      {
        value: 1,
        timestamp: AT_0700,
        comment,
        date: "2025-09-26",
        sourceValue: 40,
        occurrence: { year: 2025, month: 9, day: 26, hour: 7, minute: 0, second: 0 },
        occurrenceSource: "timestamp",
        remoteCreated: true,
      },
    ]);
  });

  it("should keep only the longest meditation of a day", async () => {
    const outcome = await run([manual(AT_0500, 35), manual(AT_0745, 50)]);

    expect(outcome.recorded).toHaveLength(1);
    expect(store.datapoints).toEqual([
      {
        value: 1,
        timestamp: AT_0745,
        comment: "Early meditation: 50.0 minutes at 07:45",
        id: `local_${AT_0745}_1`,
      },
    ]);
  });

  it("should keep the longest auto-imported meditation of a day", async () => {
    const outcome = await run([
      imported(AT_2359_59, 35, "2025-Sep-26 entered at 07:21 by alice via BeemiOS"),
      imported(1758946000, 50, "2025-Sep-26 entered at 08:00 by alice via BeemiOS"),
    ]);

    expect(outcome.recorded.map((d) => [d.date, d.timestamp, d.comment])).toEqual([
      ["2025-09-26", 1758946000, "Early meditation: 50.0 minutes at 08:00"],
    ]);
  });

  it("should record one datapoint per day, in date order", async () => {
    const outcome = await run([manual(NEXT_DAY_0615, 36), manual(AT_0700, 40)]);

    expect(outcome.recorded.map((d) => d.date)).toEqual(["2025-09-26", "2025-09-27"]);
    expect(client.creates.map((c) => c.timestamp)).toEqual([AT_0700, NEXT_DAY_0615]);
    expect(store.saves).toBe(2);
  });

  describe("auto-import override", () => {
    it("should evaluate an auto-imported datapoint at its fulltext time", async () => {
      const outcome = await run([imported(AT_1900, 45, "2025-Sep-26 entered at 07:21 by alice via BeemiOS")]);

      expect(outcome.recorded).toHaveLength(1);
      expect(outcome.recorded[0]).toMatchObject({
        timestamp: AT_1900,
        comment: "Early meditation: 45.0 minutes at 07:21",
        occurrenceSource: "fulltext",
      });
    });

    it("should evaluate the same datapoint without the marker at its timestamp", async () => {
      const outcome = await run([
        { ...manual(AT_1900, 45), fulltext: "2025-Sep-26 entered at 07:21 by alice via BeemiOS" },
      ]);

      expect(outcome.recorded).toEqual([]);
      expect(outcome.outsideWindow).toBe(1);
    });

    it("should reject an auto-imported afternoon entry", async () => {
      const outcome = await run([imported(AT_2359_59, 45, "2025-Sep-26 entered at 14:00 by alice via BeemiOS")]);

      expect(outcome.recorded).toEqual([]);
      expect(outcome.outsideWindow).toBe(1);
    });

    it("should skip an auto-imported datapoint whose fulltext cannot be read", async () => {
      const outcome = await run([
        imported(AT_0700, 45),
        imported(AT_0700 + 60, 45, "2025-Feb-30 entered at 25:61 by alice via BeemiOS"),
      ]);

      expect(outcome.unresolvable).toBe(2);
      expect(outcome.recorded).toEqual([]);
      expect(client.creates).toEqual([]);
    });
  });

  describe("idempotence", () => {
    it("should not duplicate a meditation already recorded", async () => {
      store = new MemoryRecordStore([{ value: 1, timestamp: AT_2359_59, comment: "Already there" }]);

      const outcome = await run([imported(AT_2359_59, 45, "2025-Sep-26 entered at 07:21 by alice via BeemiOS")]);

      expect(outcome.alreadyRecorded).toBe(1);
      expect(outcome.recorded).toEqual([]);
      expect(store.datapoints).toHaveLength(1);
      expect(client.creates).toEqual([]);
    });

    it("should produce nothing on a second run", async () => {
      const source = [manual(AT_0700, 40)];

      await run(source);
      const second = await run(source);

      expect(second.recorded).toEqual([]);
      expect(second.alreadyRecorded).toBe(1);
      expect(store.datapoints).toHaveLength(1);
      expect(client.creates).toHaveLength(1);
    });

    it("should not add a second datapoint to a day that already has one", async () => {
      store = new MemoryRecordStore([{ value: 1, timestamp: AT_0500, comment: "Early meditation: 35.0 minutes at 05:00" }]);

      const outcome = await run([manual(AT_0500, 35), manual(AT_0745, 50)]);

      expect(outcome.recorded).toEqual([]);
      expect(store.datapoints).toHaveLength(1);
    });
  });

  it("should keep the local datapoint when the remote create fails", async () => {
    client.writesSucceed = false;

    const outcome = await run([manual(AT_0700, 40)]);

    expect(store.datapoints).toHaveLength(1);
    expect(store.saves).toBe(1);
    expect(outcome.recorded[0]?.remoteCreated).toBe(false);
    expect(outcome.failures).toEqual([{ date: "2025-09-26", timestamp: AT_0700, targetGoal: TARGET }]);
  });

  it("should report without writing in dry-run", async () => {
    const outcome = await run([manual(AT_0700, 40)], { ...OPTIONS, dryRun: true });

    expect(outcome.recorded.map((d) => d.date)).toEqual(["2025-09-26"]);
    expect(store.datapoints).toEqual([]);
    expect(store.saves).toBe(0);
    expect(client.creates).toEqual([]);
  });

  it("should report a source goal that could not be fetched", async () => {
    client.failFetch(SOURCE);

    const outcome = await findQualifying(client, store, SOURCE, OPTIONS);

    expect(outcome.scanned).toBe(0);
    expect(outcome.recorded).toEqual([]);
    expect(outcome.fetchFailure).toMatchObject({ goal: SOURCE, page: 1 });
  });

  it("should use standard time in winter", async () => {
    // 2025-01-15 06:00 EST
    const outcome = await run([manual(1736938800, 40)]);

    expect(outcome.recorded.map((d) => [d.date, d.comment])).toEqual([
      ["2025-01-15", "Early meditation: 40.0 minutes at 06:00"],
    ]);
  });
});
