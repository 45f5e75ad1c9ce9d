import { isJsonObject, JsonValue } from "../common/values";
import { ExpectedPayload } from "../types";
import { Comparator, DEFAULT_COMPARATORS, valuesMatch } from "./comparators";

export const ABSENT = Symbol("absent");
export type Absent = typeof ABSENT;

export interface Mismatch {
  key: string;
  expected: JsonValue;
  reported: JsonValue | Absent;
}

/** Sorted by key. */
export type MismatchReport = Mismatch[];

export const DEFAULT_BATTERY_LOW_THRESHOLD = 20;

/**
 * Compares every expected key against the device's last reported state.
 * Keys the device reports but we never commanded are ignored.
 */
export function reconcile(
  expected: ExpectedPayload,
  reported: JsonValue | null,
  chain: readonly Comparator[] = DEFAULT_COMPARATORS
): MismatchReport {
  const keys = Object.keys(expected).sort();

  if (!isJsonObject(reported)) {
    return keys.map((key) => ({
      key,
      expected: expected[key],
      reported: ABSENT,
    }));
  }

  const report: MismatchReport = [];
  for (const key of keys) {
    const want = expected[key];
    if (!Object.prototype.hasOwnProperty.call(reported, key)) {
      report.push({ key, expected: want, reported: ABSENT });
      continue;
    }
    const got = reported[key];
    if (!valuesMatch(want, got, chain)) {
      report.push({ key, expected: want, reported: got });
    }
  }
  return report;
}

export function formatReported(value: JsonValue | Absent): string {
  return value === ABSENT ? "<absent>" : JSON.stringify(value);
}

/**
 * Battery note for a device's state; null when there is nothing to flag.
 */
export function batteryAnnotation(
  reported: JsonValue | null,
  threshold: number = DEFAULT_BATTERY_LOW_THRESHOLD
): string | null {
  if (!isJsonObject(reported)) {
    return "battery unknown";
  }
  if (reported.battery_low === true) {
    return "battery low";
  }
  const level = reported.battery;
  if (typeof level === "number" && level < threshold) {
    return `battery ${level}%`;
  }
  if (!("battery_low" in reported) && !("battery" in reported)) {
    return "battery unknown";
  }
  return null;
}
