import { DateTime } from "luxon";
import { normalizeSpaces } from "./utils";

export const ISO_DATE_FORMAT = "yyyy-MM-dd";

/**
 * Parses `input` with the first matching luxon format and returns the
 * calendar date as `YYYY-MM-DD`, or null when no format matches.
 */
export function parseDate(input: string, formats: readonly string[]): string | null {
  const text = normalizeSpaces(input);
  if (!text) return null;

  for (const format of formats) {
    const parsed = DateTime.fromFormat(text, format, {
      zone: "utc",
      locale: "en-US",
    });
    if (parsed.isValid) return parsed.toFormat(ISO_DATE_FORMAT);
  }
  return null;
}
