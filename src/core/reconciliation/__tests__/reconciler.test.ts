/**
 * Reconciler Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { reconcile, planReconciliation } from "../index.js";
import { ErrorCode } from "../../errors.js";
import { FakeGoalClient } from "../../__tests__/helpers/fake-goal-client.js";
import { MemoryRecordStore } from "../../__tests__/helpers/memory-store.js";

const GOAL = "test-goal";

describe("planReconciliation", () => {
  it("should be empty when both sides hold the same keys", () => {
    const plan = planReconciliation(
      [{ id: "r1", timestamp: 123, value: 1, comment: "remote" }],
      [{ timestamp: 123, value: 1, comment: "local" }]
    );

    expect(plan).toEqual({ toDelete: [], toCreate: [] });
  });

  it("should ignore comments and ids when comparing", () => {
    const plan = planReconciliation(
      [{ id: "r1", timestamp: 123, value: 1, comment: "one" }],
      [{ timestamp: 123, value: 1, comment: "two", id: "local_123_1" }]
    );

    expect(plan.toDelete).toEqual([]);
    expect(plan.toCreate).toEqual([]);
  });

  it("should pick the first remote datapoint for a duplicated key", () => {
    const plan = planReconciliation(
      [
        { id: "first", timestamp: 456, value: 2, comment: "" },
        { id: "second", timestamp: 456, value: 2, comment: "" },
      ],
      []
    );

    expect(plan.toDelete.map((dp) => dp.id)).toEqual(["first"]);
  });

  it("should take the first local comment for a duplicated key", () => {
    const plan = planReconciliation(
      [],
      [
        { timestamp: 456, value: 2, comment: "kept" },
        { timestamp: 456, value: 2, comment: "dropped" },
      ]
    );

    expect(plan.toCreate).toEqual([{ timestamp: 456, value: 2, comment: "kept" }]);
  });

  it("should treat equal timestamps with different values as different datapoints", () => {
    const plan = planReconciliation(
      [{ id: "r1", timestamp: 100, value: 1, comment: "" }],
      [{ timestamp: 100, value: 2, comment: "" }]
    );

    expect(plan.toDelete.map((dp) => dp.id)).toEqual(["r1"]);
    expect(plan.toCreate).toEqual([{ timestamp: 100, value: 2, comment: "" }]);
  });
});

describe("reconcile", () => {
  let client: FakeGoalClient;

  beforeEach(() => {
    client = new FakeGoalClient();
  });

  it("should do nothing when remote and local match", async () => {
    client.seed(GOAL, [{ id: "test1", timestamp: 123, value: 1, comment: "" }]);
    const store = new MemoryRecordStore([{ timestamp: 123, value: 1, comment: "test" }]);

    const outcome = await reconcile(client, store, GOAL);

    expect(client.deletes).toEqual([]);
    expect(client.creates).toEqual([]);
    expect(outcome).toEqual({
      goal: GOAL,
      remoteCount: 1,
      localCount: 1,
      deleted: 0,
      created: 0,
      failures: [],
      dryRun: false,
    });
  });

  it("should delete exactly the remote-only datapoint", async () => {
    client.seed(GOAL, [
      { id: "test1", timestamp: 1, value: 10, comment: "" },
      { id: "test2", timestamp: 2, value: 20, comment: "" },
    ]);
    const store = new MemoryRecordStore([{ timestamp: 1, value: 10, comment: "" }]);

    const outcome = await reconcile(client, store, GOAL);

    expect(client.deletes).toEqual([{ goal: GOAL, id: "test2" }]);
    expect(client.creates).toEqual([]);
    expect(outcome.deleted).toBe(1);
  });

  it("should create exactly the local-only datapoint with its comment", async () => {
    client.seed(GOAL, [{ id: "test1", timestamp: 1, value: 10, comment: "" }]);
    const store = new MemoryRecordStore([
      { timestamp: 1, value: 10, comment: "a" },
      { timestamp: 3, value: 30, comment: "b" },
    ]);

    const outcome = await reconcile(client, store, GOAL);

    expect(client.creates).toEqual([{ goal: GOAL, value: 30, timestamp: 3, comment: "b" }]);
    expect(client.deletes).toEqual([]);
    expect(outcome.created).toBe(1);
  });

  it("should be idempotent", async () => {
    client.seed(GOAL, [
      { id: "x", timestamp: 5, value: 1, comment: "" },
      { id: "y", timestamp: 6, value: 1, comment: "" },
    ]);
    const store = new MemoryRecordStore([
      { timestamp: 6, value: 1, comment: "" },
      { timestamp: 7, value: 1, comment: "new" },
    ]);

    await reconcile(client, store, GOAL);
    const writesAfterFirstRun = client.creates.length + client.deletes.length;
    const second = await reconcile(client, store, GOAL);

    expect(writesAfterFirstRun).toBe(2);
    expect(client.creates.length + client.deletes.length).toBe(2);
    expect(second.created).toBe(0);
    expect(second.deleted).toBe(0);
  });

  it("should never modify the local store", async () => {
    client.seed(GOAL, [{ id: "r", timestamp: 9, value: 9, comment: "" }]);
    const store = new MemoryRecordStore([{ timestamp: 1, value: 1, comment: "" }]);

    await reconcile(client, store, GOAL);

    expect(store.datapoints).toEqual([{ timestamp: 1, value: 1, comment: "" }]);
    expect(store.saves).toBe(0);
  });

  it("should record each failed write and carry on", async () => {
    client.seed(GOAL, [{ id: "stale", timestamp: 2, value: 20, comment: "" }]);
    client.writesSucceed = false;
    const store = new MemoryRecordStore([
      { timestamp: 3, value: 30, comment: "" },
      { timestamp: 4, value: 40, comment: "" },
    ]);

    const outcome = await reconcile(client, store, GOAL);

    expect(client.deletes).toHaveLength(1);
    expect(client.creates).toHaveLength(2);
    expect(outcome.deleted).toBe(0);
    expect(outcome.created).toBe(0);
    expect(outcome.failures).toEqual([
      { action: "delete", timestamp: 2, value: 20, id: "stale" },
      { action: "create", timestamp: 3, value: 30 },
      { action: "create", timestamp: 4, value: 40 },
    ]);
  });

  it("should only report the plan in dry-run", async () => {
    client.seed(GOAL, [{ id: "stale", timestamp: 2, value: 20, comment: "" }]);
    const store = new MemoryRecordStore([{ timestamp: 3, value: 30, comment: "" }]);

    const outcome = await reconcile(client, store, GOAL, { dryRun: true });

    expect(client.deletes).toEqual([]);
    expect(client.creates).toEqual([]);
    expect(outcome).toMatchObject({ deleted: 1, created: 1, dryRun: true });
  });

  it("should report a failed fetch while reconciling against what was fetched", async () => {
    client.failFetch(GOAL);
    const store = new MemoryRecordStore([
      { timestamp: 3, value: 30, comment: "" },
      { timestamp: 4, value: 40, comment: "" },
    ]);

    const outcome = await reconcile(client, store, GOAL);

    expect(client.creates).toHaveLength(2);
    expect(outcome).toEqual({
      goal: GOAL,
      remoteCount: 0,
      localCount: 2,
      deleted: 0,
      created: 2,
      failures: [],
      fetchFailure: {
        goal: GOAL,
        page: 1,
        code: ErrorCode.REMOTE_HTTP_STATUS,
        message: "HTTP 500 Internal Server Error",
      },
      dryRun: false,
    });
  });
});
