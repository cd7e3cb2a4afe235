import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import type {
  RemoteMessageHandle,
  RetentionExpression,
  RetentionRule,
  RetentionUnit,
} from "../types/archive.types.js";
import { ValidationError } from "../types/errors.js";

dayjs.extend(utc);

const UNITS: Record<string, RetentionUnit> = {
  D: "day",
  W: "week",
  M: "month",
  Y: "year",
};

const EXPRESSION_PATTERN = /^(\d+)([DWMY])$/i;

/**
 * Parse `<integer><D|W|M|Y>`, e.g. `30D`, `6m`, `1Y`.
 */
export function parseRetentionExpression(text: string): RetentionExpression {
  const match = EXPRESSION_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(
      `Invalid time range '${text}'. Use <number><D|W|M|Y>, e.g. 30D, 2W, 6M or 1Y`,
      "since",
      text,
    );
  }

  const quantity = Number.parseInt(match[1], 10);
  if (!Number.isSafeInteger(quantity) || quantity < 1) {
    throw new ValidationError(
      `Time range '${text}' must be at least 1`,
      "since",
      text,
    );
  }

  return {
    quantity,
    unit: UNITS[match[2].toUpperCase()],
    source: text,
  };
}

/**
 * Calendar subtraction in UTC: one month back from March 31 lands on the last
 * day of February.
 */
export function computeCutoff(now: Date, expression: RetentionExpression): Date {
  return dayjs.utc(now).subtract(expression.quantity, expression.unit).toDate();
}

export function shouldDelete(
  messageDate: Date,
  now: Date,
  expression?: RetentionExpression,
): boolean {
  if (!expression) {
    return true;
  }
  return messageDate.getTime() < computeCutoff(now, expression).getTime();
}

export function cutoffFor(rule: RetentionRule, now: Date): Date | undefined {
  return rule.mode === "olderThan" ? computeCutoff(now, rule.expression) : undefined;
}

/**
 * The listed messages a rule allows deleting, in listing order.
 */
export function selectForDeletion(
  handles: readonly RemoteMessageHandle[],
  now: Date,
  rule: RetentionRule,
): RemoteMessageHandle[] {
  switch (rule.mode) {
    case "none":
      return [];
    case "all":
      return [...handles];
    case "olderThan":
      return handles.filter((handle) =>
        shouldDelete(handle.internalDate, now, rule.expression),
      );
  }
}

/**
 * Server-side pre-filter for the clean-only path. IMAP BEFORE compares whole
 * days in the server's own time zone while the date is sent as a UTC day, so
 * search two days past the cutoff day and let shouldDelete decide.
 */
export function searchBeforeDate(cutoff: Date): Date {
  return dayjs.utc(cutoff).startOf("day").add(2, "day").toDate();
}

export function describeRule(rule: RetentionRule, now: Date): string {
  switch (rule.mode) {
    case "none":
      return "no deletion";
    case "all":
      return "all messages";
    case "olderThan":
      return `older than ${dayjs.utc(computeCutoff(now, rule.expression)).format("YYYY-MM-DD")}`;
  }
}
