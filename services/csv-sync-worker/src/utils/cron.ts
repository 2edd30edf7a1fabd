// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/utils/cron`
 * Purpose: Cron expression parsing utilities.
 * Scope: Validates cron+timezone and computes the next fire time.
 * Invariants: Always returns a date strictly after `from`.
 * Side-effects: none
 * Links: scheduler.ts
 * @internal
 */

import cronParser from "cron-parser";

export class InvalidCronExpressionError extends Error {
  constructor(
    public readonly cron: string,
    public readonly reason: string
  ) {
    super(`Invalid cron expression "${cron}": ${reason}`);
    this.name = "InvalidCronExpressionError";
  }
}

export function isInvalidCronExpressionError(
  error: unknown
): error is InvalidCronExpressionError {
  return error instanceof Error && error.name === "InvalidCronExpressionError";
}

/**
 * Computes the next run time from a cron expression and timezone.
 * @throws InvalidCronExpressionError for unparseable expressions or unknown timezones
 */
export function computeNextCronTime(
  cron: string,
  timezone: string,
  from: Date = new Date()
): Date {
  try {
    const interval = cronParser.parseExpression(cron, {
      currentDate: from,
      tz: timezone,
    });
    return interval.next().toDate();
  } catch (error) {
    throw new InvalidCronExpressionError(
      cron,
      error instanceof Error ? error.message : String(error)
    );
  }
}
