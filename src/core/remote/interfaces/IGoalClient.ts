/**
 * Goal Client Interface
 *
 * Contract for the remote datapoint store. Failures never throw: reads
 * return what they managed to collect and writes report a success flag.
 */

import type { RemoteDatapoint } from "../../../types/index.js";
import type { ErrorCode } from "../../errors.js";

/**
 * Signature of the fetch function the client issues requests through
 */
export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * The page request that ended a fetch early
 */
export interface FetchFailure {
  goal: string;
  page: number;
  code: ErrorCode;
  message: string;
}

export interface GoalFetchResult {
  /** Datapoints of every page read before any failure, in request order */
  datapoints: RemoteDatapoint[];
  /** Set when a page failed and the list is incomplete */
  failure?: FetchFailure;
}

export interface IGoalClient {
  /**
   * Fetch every datapoint of a goal, page by page, in request order.
   * On a failed page, returns the datapoints accumulated before it.
   */
  fetchAll(goal: string): Promise<RemoteDatapoint[]>;

  /**
   * Same pages as `fetchAll`, also reporting the page that failed, if any
   */
  fetchPages(goal: string): Promise<GoalFetchResult>;

  /**
   * Create a datapoint. Resolves to false on any transport or HTTP failure.
   */
  create(goal: string, value: number, timestamp: number, comment: string): Promise<boolean>;

  /**
   * Delete a datapoint by its remote id. Resolves to false on any failure.
   */
  delete(goal: string, id: string): Promise<boolean>;
}

export interface BeeminderClientOptions {
  baseUrl: string;
  username: string;
  authToken: string;
  /** Per-request timeout (default: 30s) */
  timeoutMs?: number;
  fetch?: FetchFn;
}

/** Largest page the datapoints endpoint serves */
export const DATAPOINTS_PAGE_SIZE = 300;
