// Calendar dates as stored in FRBRdate/@date.

import { ValidationError } from "../shared/errors.ts";

/** A calendar date without time or zone. */
export interface PlainDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export type DateInput = PlainDate | Date | string;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

/** Parse an ISO-8601 date (optionally with a time part, which is ignored). */
export function parseDate(text: string): PlainDate {
  const m = ISO_DATE_RE.exec(text.trim());
  if (!m) throw new ValidationError(`Unable to parse date: ${text}`, { actual: text });

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  // Round-trip through Date to reject 2021-02-30 and friends.
  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new ValidationError(`Unable to parse date: ${text}`, { actual: text });
  }
  return { year, month, day };
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

/** `YYYY-MM-DD`; strings pass through unchanged, absent values become "". */
export function formatDate(value: DateInput | null | undefined): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (value instanceof Date) {
    return `${pad(value.getFullYear(), 4)}-${pad(value.getMonth() + 1, 2)}-${pad(value.getDate(), 2)}`;
  }
  return `${pad(value.year, 4)}-${pad(value.month, 2)}-${pad(value.day, 2)}`;
}

export function today(): PlainDate {
  const now = new Date();
  return { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
}
