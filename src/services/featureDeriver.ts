import moment from 'moment';
import { CellValue, ColumnRoles, EnrichedRow, EnrichedTable, RawRow, RawTable, WeekdayName } from '@/types/data';
import { PreparationError } from '@/utils/errors';
import { describeColumnTypes } from '@/services/tableLoader';
import { logger } from '@/utils/logger';

export const DEFAULT_HOUR = 12;

export const WEEKDAYS: readonly WeekdayName[] = [
  'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'
];

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

// TODO: confirm with the data owners whether July..December should be ordered too;
// the source dataset only covered the first half of the year.
export const MONTH_ORDER: readonly string[] = MONTH_NAMES.slice(0, 6);

// Day-first for ambiguous numeric dates; ISO stays year-first.
const DATE_FORMATS: moment.MomentFormatSpecification = [
  moment.ISO_8601,
  'D/M/YYYY',
  'D/M/YYYY H:mm',
  'D/M/YYYY H:mm:ss',
  'D-M-YYYY',
  'D-M-YYYY H:mm',
  'D-M-YYYY H:mm:ss',
  'D.M.YYYY',
  'D/M/YY',
  'D-M-YY',
  'YYYY/M/D',
  'D MMM YYYY',
  'D MMMM YYYY',
  'MMM D, YYYY',
  'MMMM D, YYYY',
  'ddd, D MMM YYYY'
];

export const ANOMALOUS_AMOUNT = 360;
export const CORRECTED_AMOUNT = 36;

/**
 * Parses a date cell with the day-first convention. Returns `YYYY-MM-DD`, or
 * null when the value is not a recognisable date. Date cells carry their
 * wall-clock value in UTC.
 */
export function parseDayFirstDate(value: CellValue | undefined): string | null {
  if (value instanceof Date) {
    const m = moment.utc(value);
    return m.isValid() ? m.format('YYYY-MM-DD') : null;
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (!text) return null;
  const m = moment.utc(text, DATE_FORMATS, true);
  return m.isValid() ? m.format('YYYY-MM-DD') : null;
}

/**
 * Hour of day from a time cell: the integer before the first colon, or
 * DEFAULT_HOUR for anything else (missing, no colon, not an integer, not 0..23).
 */
export function parseHour(value: CellValue | undefined): number {
  if (value === null || value === undefined) return DEFAULT_HOUR;
  if (value instanceof Date) {
    const m = moment.utc(value);
    return m.isValid() ? m.hour() : DEFAULT_HOUR;
  }

  const text = String(value);
  const colon = text.indexOf(':');
  if (colon < 0) return DEFAULT_HOUR;

  const token = text.slice(0, colon).trim();
  if (!/^\+?\d+$/.test(token)) return DEFAULT_HOUR;
  const hour = parseInt(token, 10);
  return hour >= 0 && hour <= 23 ? hour : DEFAULT_HOUR;
}

export function weekdayOf(parsedDate: string | null): WeekdayName | null {
  if (!parsedDate) return null;
  const m = moment.utc(parsedDate, 'YYYY-MM-DD', true);
  return m.isValid() ? WEEKDAYS[m.isoWeekday() - 1] : null;
}

export function monthOf(parsedDate: string | null): string | null {
  if (!parsedDate) return null;
  const m = moment.utc(parsedDate, 'YYYY-MM-DD', true);
  return m.isValid() ? MONTH_NAMES[m.month()] : null;
}

/** Position in the ordered month vocabulary, null when the month is outside it. */
export function monthOrder(monthName: string | null): number | null {
  if (!monthName) return null;
  const index = MONTH_ORDER.indexOf(monthName);
  return index >= 0 ? index : null;
}

export function weekdayOrder(dayName: WeekdayName | null): number | null {
  return dayName ? WEEKDAYS.indexOf(dayName) : null;
}

/**
 * Known data-entry anomaly: a bill of 360 is a mistyped 36.
 * Only the exact number 360 is rewritten; running it twice changes nothing.
 */
export function correctAmountAnomaly(row: RawRow, amountColumn: string): RawRow {
  if (row[amountColumn] !== ANOMALOUS_AMOUNT) return row;
  return { ...row, [amountColumn]: CORRECTED_AMOUNT };
}

/**
 * Adds the calendar and hour features to every row and applies the amount
 * correction. Rows are never dropped; bad cells become null or the default hour.
 */
export function enrich(table: RawTable, roles: ColumnRoles): EnrichedTable {
  if (!table.columns.includes(roles.date)) {
    throw new PreparationError(
      'MissingDateColumn',
      `Date column '${roles.date}' not found in data`,
      {
        columnTypes: describeColumnTypes(table),
        sampleRows: table.rows.slice(0, 5)
      }
    );
  }

  const warnings: string[] = [];
  const hasTimeColumn = table.columns.includes(roles.time);
  if (!hasTimeColumn) {
    const message = `Time column '${roles.time}' not found, using default hour ${DEFAULT_HOUR}`;
    logger.warn(message);
    warnings.push(message);
  }

  const rows: EnrichedRow[] = table.rows.map(row => {
    const parsedDate = parseDayFirstDate(row[roles.date]);
    const weekdayName = weekdayOf(parsedDate);
    return {
      source: correctAmountAnomaly(row, roles.amount),
      parsedDate,
      weekdayName,
      dayName: weekdayName,
      monthName: monthOf(parsedDate),
      hour: hasTimeColumn ? parseHour(row[roles.time]) : DEFAULT_HOUR
    };
  });

  const unparsedDates = rows.filter(row => row.parsedDate === null).length;
  if (unparsedDates > 0) {
    logger.debug(`${unparsedDates} of ${rows.length} rows have an unparseable date`);
  }

  return { columns: [...table.columns], roles, rows, warnings };
}
