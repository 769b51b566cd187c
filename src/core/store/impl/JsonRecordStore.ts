/**
 * JSON Record Store
 *
 * Holds the whole record file in memory. Every save rewrites the file;
 * there is no locking, so two concurrent runs can overwrite each other.
 */

import type { Datapoint, StoreFile } from "../../../types/index.js";
import { StoreError, ErrorCode } from "../../errors.js";
import { fileExists, readJsonFile, writeJsonFile } from "../../../utils/fs.js";
import { StoreFileSchema, formatValidationIssues } from "../../../utils/validation.js";
import { createLogger } from "../../../utils/logger.js";
import {
  localDatapointId,
  type IRecordStore,
  type StoreSummary,
} from "../interfaces/IRecordStore.js";

const logger = createLogger("record-store");

export interface JsonRecordStoreOptions {
  /** Clock used for `last_updated` */
  now?: () => Date;
}

export class JsonRecordStore implements IRecordStore {
  private readonly filePath: string;
  private readonly data: StoreFile;
  private readonly now: () => Date;

  private constructor(filePath: string, data: StoreFile, now: () => Date) {
    this.filePath = filePath;
    this.data = data;
    this.now = now;
  }

  /**
   * Load the record file, or create and persist an empty one when it is missing.
   *
   * @throws StoreError when the file cannot be read or does not hold a record list
   */
  static async load(filePath: string, options: JsonRecordStoreOptions = {}): Promise<JsonRecordStore> {
    const now = options.now ?? (() => new Date());

    if (!(await fileExists(filePath))) {
      logger.info({ filePath }, "Creating new record file");
      const store = new JsonRecordStore(
        filePath,
        { datapoints: [], last_updated: now().toISOString() },
        now
      );
      await store.write();
      return store;
    }

    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new StoreError(`Record file is not valid JSON: ${error.message}`, ErrorCode.STORE_CORRUPT, {
          filePath,
        });
      }
      throw new StoreError("Failed to read record file", ErrorCode.STORE_READ_FAILED, {
        filePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = StoreFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreError(
        `Record file has an unexpected shape: ${formatValidationIssues(parsed.error)}`,
        ErrorCode.STORE_CORRUPT,
        { filePath }
      );
    }

    logger.info({ filePath, count: parsed.data.datapoints.length }, "Loaded record file");
    return new JsonRecordStore(filePath, parsed.data, now);
  }

  getDatapoints(): readonly Datapoint[] {
    return this.data.datapoints;
  }

  exists(timestamp: number, value: number): boolean {
    return this.data.datapoints.some((dp) => dp.timestamp === timestamp && dp.value === value);
  }

  append(value: number, timestamp: number, comment: string): Datapoint {
    const datapoint: Datapoint = {
      value,
      timestamp,
      comment,
      id: localDatapointId(timestamp, value),
    };
    this.data.datapoints.push(datapoint);
    logger.info({ datapoint }, "Added datapoint to local record file");
    return datapoint;
  }

  async save(): Promise<void> {
    this.data.last_updated = this.now().toISOString();
    await this.write();
    logger.debug({ filePath: this.filePath, count: this.data.datapoints.length }, "Record file saved");
  }

  summary(): StoreSummary {
    return {
      path: this.filePath,
      count: this.data.datapoints.length,
      lastUpdated: this.data.last_updated,
    };
  }

  private async write(): Promise<void> {
    try {
      await writeJsonFile(this.filePath, this.data);
    } catch (error) {
      throw new StoreError("Failed to write record file", ErrorCode.STORE_WRITE_FAILED, {
        filePath: this.filePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
