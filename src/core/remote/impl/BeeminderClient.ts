/**
 * Beeminder Client Implementation
 *
 * Reads, creates, and deletes goal datapoints over the v1 REST API.
 * No retries: a failed page ends pagination and is reported alongside the
 * pages already read, a failed write returns false.
 */

import type { RemoteDatapoint } from "../../../types/index.js";
import { ok, err, isErr, andThen, type Result } from "../../../types/result.js";
import { RemoteApiError, ErrorCode } from "../../errors.js";
import { DatapointPageSchema, formatValidationIssues } from "../../../utils/validation.js";
import { createLogger } from "../../../utils/logger.js";
import type { SyncConfig } from "../../config/index.js";
import {
  DATAPOINTS_PAGE_SIZE,
  type BeeminderClientOptions,
  type FetchFn,
  type GoalFetchResult,
  type IGoalClient,
} from "../interfaces/IGoalClient.js";

const logger = createLogger("beeminder-client");

const DEFAULT_TIMEOUT_MS = 30_000;

export class BeeminderClient implements IGoalClient {
  private readonly baseUrl: string;
  private readonly username: string;
  private readonly authToken: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(options: BeeminderClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.username = options.username;
    this.authToken = options.authToken;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  static fromConfig(config: SyncConfig, fetchImpl?: FetchFn): BeeminderClient {
    return new BeeminderClient({
      baseUrl: config.baseUrl,
      username: config.username,
      authToken: config.authToken,
      timeoutMs: config.requestTimeoutMs,
      fetch: fetchImpl,
    });
  }

  // ===========================================================================
  // IGoalClient
  // ===========================================================================

  async fetchAll(goal: string): Promise<RemoteDatapoint[]> {
    const { datapoints } = await this.fetchPages(goal);
    return datapoints;
  }

  async fetchPages(goal: string): Promise<GoalFetchResult> {
    const datapoints: RemoteDatapoint[] = [];

    for (let page = 1; ; page++) {
      const url = this.datapointsUrl(goal);
      url.searchParams.set("auth_token", this.authToken);
      url.searchParams.set("page", String(page));
      url.searchParams.set("per_page", String(DATAPOINTS_PAGE_SIZE));

      const body = await this.request(url, { method: "GET" }, goal, (response) => response.json());
      const result = andThen(body, (json) => parsePage(json, goal));

      if (isErr(result)) {
        logger.error(
          { goal, page, code: result.error.code, status: result.error.status, kept: datapoints.length },
          `Error fetching goal data: ${result.error.message}`
        );
        return {
          datapoints,
          failure: { goal, page, code: result.error.code, message: result.error.message },
        };
      }

      const pageData = result.value;
      if (pageData.length === 0) {
        break;
      }

      datapoints.push(...pageData);
      logger.debug({ goal, page, count: pageData.length }, "Fetched datapoint page");

      if (pageData.length < DATAPOINTS_PAGE_SIZE) {
        break;
      }
    }

    logger.info({ goal, total: datapoints.length }, "Fetched goal datapoints");
    return { datapoints };
  }

  async create(goal: string, value: number, timestamp: number, comment: string): Promise<boolean> {
    const body = new URLSearchParams({
      auth_token: this.authToken,
      value: String(value),
      timestamp: String(timestamp),
      comment,
    });

    const result = await this.request(this.datapointsUrl(goal), { method: "POST", body }, goal, drain);
    if (isErr(result)) {
      logger.error(
        { goal, value, timestamp, code: result.error.code, status: result.error.status },
        `Error adding datapoint: ${result.error.message}`
      );
      return false;
    }

    logger.info({ goal, value, timestamp }, "Added datapoint");
    return true;
  }

  async delete(goal: string, id: string): Promise<boolean> {
    const url = new URL(
      `${this.goalUrl(goal)}/datapoints/${encodeURIComponent(id)}.json`
    );
    url.searchParams.set("auth_token", this.authToken);

    const result = await this.request(url, { method: "DELETE" }, goal, drain);
    if (isErr(result)) {
      logger.error(
        { goal, id, code: result.error.code, status: result.error.status },
        `Error deleting datapoint: ${result.error.message}`
      );
      return false;
    }

    logger.info({ goal, id }, "Deleted datapoint");
    return true;
  }

  // ===========================================================================
  // HTTP
  // ===========================================================================

  private goalUrl(goal: string): string {
    return `${this.baseUrl}/users/${encodeURIComponent(this.username)}/goals/${encodeURIComponent(goal)}`;
  }

  /**
   * Datapoints collection URL. GET carries the token as a query parameter,
   * POST carries it in the form body.
   */
  private datapointsUrl(goal: string): URL {
    return new URL(`${this.goalUrl(goal)}/datapoints.json`);
  }

  private async request<T>(
    url: URL,
    init: RequestInit,
    goal: string,
    read: (response: Response) => Promise<T>
  ): Promise<Result<T, RemoteApiError>> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });

      if (!response.ok) {
        return err(
          new RemoteApiError(
            `HTTP ${response.status} ${response.statusText}`.trim(),
            ErrorCode.REMOTE_HTTP_STATUS,
            { status: response.status, goal }
          )
        );
      }

      return ok(await read(response));
    } catch (error) {
      if (controller.signal.aborted) {
        return err(
          new RemoteApiError(`Request timed out after ${this.timeoutMs}ms`, ErrorCode.REMOTE_TIMEOUT, { goal })
        );
      }
      if (error instanceof SyntaxError) {
        return err(
          new RemoteApiError(`Response is not JSON: ${error.message}`, ErrorCode.REMOTE_INVALID_RESPONSE, { goal })
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      return err(new RemoteApiError(`Request failed: ${message}`, ErrorCode.REMOTE_REQUEST_FAILED, { goal }));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

async function drain(response: Response): Promise<void> {
  await response.text();
}

function parsePage(json: unknown, goal: string): Result<RemoteDatapoint[], RemoteApiError> {
  const parsed = DatapointPageSchema.safeParse(json);
  if (!parsed.success) {
    return err(
      new RemoteApiError(
        `Unexpected datapoint page: ${formatValidationIssues(parsed.error)}`,
        ErrorCode.REMOTE_INVALID_RESPONSE,
        { goal }
      )
    );
  }
  return ok(parsed.data);
}
