/**
 * Date Format Generator
 * Generates dates in YYYY-MM-DD format (ISO 8601 calendar date)
 */

import type { FormatGenerator } from '../../registry/format-registry.js';
import type { Rng } from '../../util/rng.js';

const MIN_YEAR = 1970;
const MAX_YEAR = 2037;

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export function drawCalendarDate(rng: Rng): CalendarDate {
  const year = rng.int(MIN_YEAR, MAX_YEAR);
  const month = rng.int(1, 12);
  const day = rng.int(1, daysInMonth(year, month));
  return { year, month, day };
}

export function formatCalendarDate({ year, month, day }: CalendarDate): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isCalendarDate(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

export class DateGenerator implements FormatGenerator {
  readonly name = 'date';

  generate(rng: Rng): string {
    return formatCalendarDate(drawCalendarDate(rng));
  }

  validate(value: string): boolean {
    return isCalendarDate(value);
  }

  getExamples(): readonly string[] {
    return ['2023-01-15', '2022-12-31', '2024-02-29', '1990-07-04'];
  }
}
