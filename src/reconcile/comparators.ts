import { isDeepStrictEqual } from "util";
import {
  canonicalScheduleTokens,
  isScheduleString,
} from "../schedule/generator";
import { collapseWhitespace, JsonValue, parseDecimal } from "../common/values";

export const NUMERIC_TOLERANCE = 1e-6;

export interface Comparator {
  name: "numeric" | "schedule" | "text" | "strict";
  /** Whether this comparator handles the pair at all. */
  accepts: (expected: JsonValue, reported: JsonValue) => boolean;
  equal: (expected: JsonValue, reported: JsonValue) => boolean;
}

export const numericComparator: Comparator = {
  name: "numeric",
  accepts: (expected, reported) =>
    parseDecimal(expected) !== null && parseDecimal(reported) !== null,
  equal: (expected, reported) => {
    const a = parseDecimal(expected);
    const b = parseDecimal(reported);
    return a !== null && b !== null && Math.abs(a - b) <= NUMERIC_TOLERANCE;
  },
};

export const scheduleComparator: Comparator = {
  name: "schedule",
  accepts: (expected, reported) =>
    isScheduleString(expected) && isScheduleString(reported),
  equal: (expected, reported) => {
    if (!isScheduleString(expected) || !isScheduleString(reported)) {
      return false;
    }
    const a = canonicalScheduleTokens(expected);
    const b = canonicalScheduleTokens(reported);
    return (
      a.length === b.length &&
      a.every(
        (token, i) =>
          token.time === b[i].time && token.temperature === b[i].temperature
      )
    );
  },
};

export const textComparator: Comparator = {
  name: "text",
  accepts: (expected, reported) =>
    typeof expected === "string" && typeof reported === "string",
  equal: (expected, reported) =>
    typeof expected === "string" &&
    typeof reported === "string" &&
    collapseWhitespace(expected) === collapseWhitespace(reported),
};

export const strictComparator: Comparator = {
  name: "strict",
  accepts: () => true,
  equal: (expected, reported) => isDeepStrictEqual(expected, reported),
};

export const DEFAULT_COMPARATORS: readonly Comparator[] = [
  numericComparator,
  scheduleComparator,
  textComparator,
  strictComparator,
];

export function selectComparator(
  expected: JsonValue,
  reported: JsonValue,
  chain: readonly Comparator[] = DEFAULT_COMPARATORS
): Comparator {
  return chain.find((c) => c.accepts(expected, reported)) ?? strictComparator;
}

export function valuesMatch(
  expected: JsonValue,
  reported: JsonValue,
  chain: readonly Comparator[] = DEFAULT_COMPARATORS
): boolean {
  return selectComparator(expected, reported, chain).equal(expected, reported);
}
