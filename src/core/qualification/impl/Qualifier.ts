/**
 * Qualifier Implementation
 *
 * Scans a source goal for meditations long enough and early enough, keeps
 * the longest one per calendar day, and records a value-1 datapoint for
 * each such day locally and on the target goal.
 */

import type { Occurrence, RemoteDatapoint } from "../../../types/index.js";
import type { IGoalClient } from "../../remote/index.js";
import type { IRecordStore } from "../../store/index.js";
import { DEFAULT_QUALIFICATION_RULES } from "../../config/index.js";
import { createLogger } from "../../../utils/logger.js";
import {
  calendarDate,
  clockTime,
  resolveOccurrence,
  secondsOfDay,
} from "./occurrence.js";
import type {
  DerivedDatapoint,
  QualificationOutcome,
  QualifyOptions,
} from "../interfaces/IQualification.js";

const logger = createLogger("qualifier");

/** Value of every derived datapoint */
export const DERIVED_VALUE = 1;

interface Candidate {
  source: RemoteDatapoint;
  occurrence: Occurrence;
  date: string;
}

/**
 * Comment attached to a derived datapoint
 */
export function describeEarlyMeditation(minutes: number, occurrence: Occurrence): string {
  return `Early meditation: ${minutes.toFixed(1)} minutes at ${clockTime(occurrence.time)}`;
}

/**
 * Record one derived datapoint for every calendar day of `sourceGoal` with a
 * qualifying meditation not yet recorded.
 *
 * The local append and save happen before the remote create and are not
 * undone when the create fails.
 */
export async function findQualifying(
  client: IGoalClient,
  store: IRecordStore,
  sourceGoal: string,
  options: QualifyOptions
): Promise<QualificationOutcome> {
  const rules = options.rules ?? DEFAULT_QUALIFICATION_RULES;
  const dryRun = options.dryRun ?? false;
  const { targetGoal, timezone } = options;

  logger.info({ sourceGoal, targetGoal, timezone, dryRun }, "Checking for qualifying meditations");

  const { datapoints, failure: fetchFailure } = await client.fetchPages(sourceGoal);

  const outcome: QualificationOutcome = {
    sourceGoal,
    targetGoal,
    scanned: datapoints.length,
    unresolvable: 0,
    outsideWindow: 0,
    tooShort: 0,
    alreadyRecorded: 0,
    recorded: [],
    failures: [],
    dryRun,
  };
  if (fetchFailure) {
    outcome.fetchFailure = fetchFailure;
  }

  const best = new Map<string, Candidate>();
  const recordedDates = new Set<string>();

  for (const source of datapoints) {
    const occurrence = resolveOccurrence(source, timezone, rules.autoImportMarker);
    if (!occurrence) {
      outcome.unresolvable++;
      logger.warn({ id: source.id, timestamp: source.timestamp }, "Skipping auto-imported datapoint without a readable entry time");
      continue;
    }

    const seconds = secondsOfDay(occurrence.time);
    if (seconds < rules.windowStartSeconds || seconds > rules.windowEndSeconds) {
      outcome.outsideWindow++;
      continue;
    }

    if (source.value < rules.minimumMinutes) {
      outcome.tooShort++;
      continue;
    }

    const date = calendarDate(occurrence.time);

    if (store.exists(source.timestamp, DERIVED_VALUE)) {
      outcome.alreadyRecorded++;
      recordedDates.add(date);
      logger.debug({ date, timestamp: source.timestamp }, "Qualifying meditation already recorded");
      continue;
    }

    const current = best.get(date);
    if (!current || source.value > current.source.value) {
      best.set(date, { source, occurrence, date });
    }
  }

  // A day keeps the derived datapoint it already has
  for (const date of recordedDates) {
    best.delete(date);
  }

  const chosen = [...best.values()].sort((a, b) => a.date.localeCompare(b.date));

  for (const candidate of chosen) {
    const { source, occurrence, date } = candidate;
    const comment = describeEarlyMeditation(source.value, occurrence);

    logger.info(
      { date, minutes: source.value, at: clockTime(occurrence.time), via: occurrence.source },
      "Found qualifying meditation"
    );

    const derived: DerivedDatapoint = {
      value: DERIVED_VALUE,
      timestamp: source.timestamp,
      comment,
      date,
      sourceValue: source.value,
      occurrence: occurrence.time,
      occurrenceSource: occurrence.source,
      remoteCreated: false,
    };

    if (dryRun) {
      outcome.recorded.push(derived);
      continue;
    }

    store.append(DERIVED_VALUE, source.timestamp, comment);
    await store.save();

    derived.remoteCreated = await client.create(targetGoal, DERIVED_VALUE, source.timestamp, comment);
    if (!derived.remoteCreated) {
      outcome.failures.push({ date, timestamp: source.timestamp, targetGoal });
    }
    outcome.recorded.push(derived);
  }

  logger.info(
    {
      sourceGoal,
      scanned: outcome.scanned,
      recorded: outcome.recorded.length,
      alreadyRecorded: outcome.alreadyRecorded,
      failed: outcome.failures.length,
    },
    "Qualification complete"
  );
  return outcome;
}
