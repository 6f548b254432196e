/**
 * Work History
 *
 * Period parsing and duration derivation for oracle-extracted jobs.
 *
 * Periods are canonicalised to 'YYYY-MM' or 'YYYY'. Durations count months
 * inclusively: '2020-01' to '2020-12' is 12 months.
 */

import type { WorkHistoryEntry } from '../types';
import type { RawWorkHistoryItem } from '../validation/schemas';
import { ScreeningErrorFactory } from '../errors/types';
import { uniqueIgnoreCase } from './textUtils';

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12
};

const OPEN_ENDED = /^(present|current|now|ongoing|today)$/i;

interface ParsedPeriod {
  year: number;
  /** 1-12, or null when only the year is known */
  month: number | null;
}

/**
 * Parse 'YYYY-MM', 'YYYY-MM-DD', 'YYYY', 'MM/YYYY' or 'Mon YYYY'
 */
export function parsePeriod(period: string | null | undefined): ParsedPeriod | null {
  if (!period) {
    return null;
  }
  const value = period.trim();

  let match = value.match(/^(\d{4})(?:-(\d{1,2})(?:-\d{1,2})?)?$/);
  if (match) {
    return withMonth(Number(match[1]), match[2] === undefined ? null : Number(match[2]));
  }

  match = value.match(/^(\d{1,2})\/(\d{4})$/);
  if (match) {
    return withMonth(Number(match[2]), Number(match[1]));
  }

  match = value.match(/^([A-Za-z]{3})[A-Za-z]*\.?,?\s+(\d{4})$/);
  if (match) {
    const month = MONTHS[match[1].toLowerCase()];
    return month === undefined ? null : withMonth(Number(match[2]), month);
  }

  return null;
}

function withMonth(year: number, month: number | null): ParsedPeriod | null {
  if (month !== null && (month < 1 || month > 12)) {
    return null;
  }
  return { year, month };
}

/**
 * Canonical 'YYYY-MM' or 'YYYY' form, or null when unparseable
 */
export function canonicalPeriod(period: string | null | undefined): string | null {
  const parsed = parsePeriod(period);
  if (!parsed) {
    return null;
  }
  return parsed.month === null
    ? String(parsed.year)
    : `${parsed.year}-${String(parsed.month).padStart(2, '0')}`;
}

/**
 * Month ordinal for ordering and arithmetic. A year-only period resolves to
 * January when it starts a range and December when it ends one. Missing or
 * unparseable periods sort before everything.
 */
export function periodOrdinal(period: string | null | undefined, side: 'start' | 'end'): number {
  const parsed = parsePeriod(period);
  if (!parsed) {
    return Number.NEGATIVE_INFINITY;
  }
  const month = parsed.month ?? (side === 'start' ? 1 : 12);
  return parsed.year * 12 + (month - 1);
}

/**
 * Inclusive month count between two periods.
 *
 * - null end (or 'present') is the month of `ingestedAt`
 * - missing or unparseable start gives 0
 * - end before start gives 0
 */
export function resolveDurationMonths(
  startPeriod: string | null,
  endPeriod: string | null,
  ingestedAt: string
): number {
  const start = periodOrdinal(startPeriod, 'start');
  if (start === Number.NEGATIVE_INFINITY) {
    return 0;
  }

  let end: number;
  if (endPeriod === null || OPEN_ENDED.test(endPeriod.trim())) {
    const asOf = new Date(ingestedAt);
    if (isNaN(asOf.getTime())) {
      throw ScreeningErrorFactory.invalidArgument('ingestedAt', 'Must be an ISO 8601 timestamp', ingestedAt);
    }
    end = asOf.getUTCFullYear() * 12 + asOf.getUTCMonth();
  } else {
    end = periodOrdinal(endPeriod, 'end');
  }

  if (end < start) {
    return 0;
  }
  return end - start + 1;
}

/**
 * Build work-history entries from oracle output.
 *
 * An oracle-reported duration is trusted when present; otherwise it is
 * derived from the periods.
 */
export function normalizeWorkHistory(
  items: readonly RawWorkHistoryItem[],
  ingestedAt: string
): WorkHistoryEntry[] {
  return items.map(item => {
    const startPeriod = canonicalPeriod(item.start_date);
    const endPeriod = canonicalPeriod(item.end_date);
    const reported = item.duration_months;

    const durationMonths = reported !== undefined && reported >= 0
      ? Math.round(reported)
      : resolveDurationMonths(startPeriod, endPeriod, ingestedAt);

    return {
      company: item.company.trim(),
      title: item.title.trim(),
      startPeriod,
      endPeriod,
      durationMonths,
      technologies: uniqueIgnoreCase(item.technologies)
    };
  });
}
