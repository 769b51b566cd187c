/**
 * In-memory record store for tests that don't need the file system
 */

import type { Datapoint } from "../../../types/index.js";
import {
  localDatapointId,
  type IRecordStore,
  type StoreSummary,
} from "../../store/index.js";

export class MemoryRecordStore implements IRecordStore {
  readonly datapoints: Datapoint[];
  saves = 0;

  constructor(datapoints: Datapoint[] = []) {
    this.datapoints = datapoints.map((dp) => ({ ...dp }));
  }

  getDatapoints(): readonly Datapoint[] {
    return this.datapoints;
  }

  exists(timestamp: number, value: number): boolean {
    return this.datapoints.some((dp) => dp.timestamp === timestamp && dp.value === value);
  }

  append(value: number, timestamp: number, comment: string): Datapoint {
    const dp: Datapoint = { value, timestamp, comment, id: localDatapointId(timestamp, value) };
    this.datapoints.push(dp);
    return dp;
  }

  async save(): Promise<void> {
    this.saves++;
  }

  summary(): StoreSummary {
    return { path: ":memory:", count: this.datapoints.length, lastUpdated: "2025-09-26T12:00:00.000Z" };
  }
}
