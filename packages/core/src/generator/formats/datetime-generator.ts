/**
 * Date-Time Format Generator
 * Generates UTC timestamps as YYYY-MM-DDTHH:MM:SSZ (RFC 3339, second precision)
 */

import type { FormatGenerator } from '../../registry/format-registry.js';
import type { Rng } from '../../util/rng.js';
import {
  drawCalendarDate,
  formatCalendarDate,
  isCalendarDate,
  pad,
} from './date-generator.js';

const DATE_TIME_RE =
  /^(\d{4}-\d{2}-\d{2})T([01]\d|2[0-3]):([0-5]\d):([0-5]\d)(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

export class DateTimeGenerator implements FormatGenerator {
  readonly name = 'date-time';
  readonly aliases = ['datetime', 'dateTime'];

  generate(rng: Rng): string {
    const date = formatCalendarDate(drawCalendarDate(rng));
    const time = `${pad(rng.int(0, 23))}:${pad(rng.int(0, 59))}:${pad(rng.int(0, 59))}`;
    return `${date}T${time}Z`;
  }

  validate(value: string): boolean {
    const match = DATE_TIME_RE.exec(value);
    return match !== null && isCalendarDate(match[1]);
  }

  getExamples(): readonly string[] {
    return ['2023-01-15T10:30:00Z', '2024-02-29T23:59:59Z', '1999-12-31T00:00:00Z'];
  }
}
