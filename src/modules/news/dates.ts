/**
 * Publish-date parsing for feed items.
 *
 * Formats are tried in order and the first match wins. A string that matches
 * none of them yields null; callers substitute the ingestion time.
 */

import { isValid, parse } from 'date-fns';

type DateFormat = {
  pattern: string;
  /** pattern carries no zone; read the wall clock as UTC */
  utc?: boolean;
};

const DATE_FORMATS: readonly DateFormat[] = [
  // RFC 822 (weekday removed beforehand); two-digit years first, since
  // yyyy would read "24" as the year 24
  { pattern: 'd MMM yy HH:mm:ss xx' },
  { pattern: 'd MMM yy HH:mm xx' },
  { pattern: 'd MMM yyyy HH:mm:ss xx' },
  { pattern: 'd MMM yyyy HH:mm xx' },
  // ISO 8601
  { pattern: "yyyy-MM-dd'T'HH:mm:ssXXX" },
  { pattern: "yyyy-MM-dd'T'HH:mm:ssxx" },
  // Atom, with milliseconds
  { pattern: "yyyy-MM-dd'T'HH:mm:ss.SSSXXX" },
  { pattern: 'yyyy-MM-dd', utc: true },
];

// RFC 822 named zones
const ZONE_OFFSETS: Record<string, string> = {
  GMT: '+0000',
  UTC: '+0000',
  UT: '+0000',
  Z: '+0000',
  EST: '-0500',
  EDT: '-0400',
  CST: '-0600',
  CDT: '-0500',
  MST: '-0700',
  MDT: '-0600',
  PST: '-0800',
  PDT: '-0700',
};

function normalizeDateString(value: string): string {
  return value
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/^[A-Za-z]{3,9},\s*/, '')
    .replace(/ ([A-Za-z]{1,3})$/, (match, zone: string) => {
      const offset = ZONE_OFFSETS[zone.toUpperCase()];
      return offset ? ` ${offset}` : match;
    });
}

export function parsePublishedDate(value: string | undefined, referenceDate: Date = new Date()): Date | null {
  if (!value) return null;
  const normalized = normalizeDateString(value);
  if (!normalized) return null;

  for (const format of DATE_FORMATS) {
    const parsed = parse(normalized, format.pattern, referenceDate);
    if (!isValid(parsed)) continue;

    if (format.utc) {
      return new Date(Date.UTC(
        parsed.getFullYear(),
        parsed.getMonth(),
        parsed.getDate(),
        parsed.getHours(),
        parsed.getMinutes(),
        parsed.getSeconds(),
      ));
    }
    return parsed;
  }

  return null;
}
