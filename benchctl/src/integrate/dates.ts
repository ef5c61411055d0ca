import { InvalidDateError } from "../core/errors.js";

const ISO_DATE = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * Parse an ISO-8601 date or date-time. Values without a zone designator are
 * read as UTC, so "2021-05-01" is midnight UTC on that day.
 */
export function parseCommitDate(text: string): Date {
  const m = ISO_DATE.exec(text.trim());
  if (!m) throw new InvalidDateError(text);

  const [, day, time, zone] = m;
  const date = new Date(`${day}T${time ?? "00:00"}${zone ?? "Z"}`);
  if (Number.isNaN(date.getTime())) throw new InvalidDateError(text);

  // Reject calendar overflow such as 2021-02-30, which Date silently rolls over.
  if (!zone && date.toISOString().slice(0, 10) !== day) throw new InvalidDateError(text);
  return date;
}
