/**
 * Qualification Interface
 *
 * Types for turning source-goal meditations into one "early meditation"
 * datapoint per calendar day.
 */

import type { OccurrenceSource, WallClockTime } from "../../../types/index.js";
import type { QualificationRules } from "../../config/index.js";
import type { FetchFailure } from "../../remote/index.js";

/**
 * A derived datapoint chosen for a calendar day
 */
export interface DerivedDatapoint {
  /** Always 1 */
  value: number;
  /** Copied from the source datapoint */
  timestamp: number;
  comment: string;
  /** Calendar day in the configured timezone, YYYY-MM-DD */
  date: string;
  sourceValue: number;
  occurrence: WallClockTime;
  occurrenceSource: OccurrenceSource;
  /** Whether the target goal accepted it. False in dry-run. */
  remoteCreated: boolean;
}

export interface QualificationFailure {
  date: string;
  timestamp: number;
  targetGoal: string;
}

export interface QualificationOutcome {
  sourceGoal: string;
  targetGoal: string;
  /** Source datapoints examined */
  scanned: number;
  /** Auto-imported datapoints whose entry time could not be read */
  unresolvable: number;
  outsideWindow: number;
  tooShort: number;
  /** Qualifying datapoints that already have a derived datapoint locally */
  alreadyRecorded: number;
  /** One entry per newly qualifying day, ascending by date */
  recorded: DerivedDatapoint[];
  /** Days recorded locally whose remote create failed */
  failures: QualificationFailure[];
  /** Set when the source goal could only be read in part */
  fetchFailure?: FetchFailure;
  dryRun: boolean;
}

export interface QualifyOptions {
  targetGoal: string;
  /** IANA timezone for calendar days and the window */
  timezone: string;
  rules?: QualificationRules;
  /** Report qualifying days without touching the store or the remote */
  dryRun?: boolean;
}
