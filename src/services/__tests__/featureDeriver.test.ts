import { describe, it, expect } from 'vitest';
import {
  correctAmountAnomaly,
  DEFAULT_HOUR,
  enrich,
  monthOf,
  monthOrder,
  parseDayFirstDate,
  parseHour,
  weekdayOf,
  weekdayOrder
} from '@/services/featureDeriver';
import { PreparationError } from '@/utils/errors';
import { ColumnRoles, RawTable } from '@/types/data';

const roles: ColumnRoles = {
  date: 'Sale Date',
  time: 'Sale Time',
  location: 'Store Location',
  category: 'Product Category',
  amount: 'Total Bill'
};

const table: RawTable = {
  columns: ['Sale Date', 'Sale Time', 'Store Location', 'Product Category', 'Total Bill'],
  rows: [
    { 'Sale Date': '01/02/2024', 'Sale Time': '08:15', 'Store Location': 'Downtown', 'Product Category': 'Coffee', 'Total Bill': 360 },
    { 'Sale Date': 'soon', 'Sale Time': 'lunch', 'Store Location': 'Uptown', 'Product Category': 'Tea', 'Total Bill': 15 },
    { 'Sale Date': null, 'Sale Time': null, 'Store Location': null, 'Product Category': null, 'Total Bill': null }
  ]
};

describe('parseDayFirstDate', () => {
  it('reads ambiguous numeric dates day first', () => {
    expect(parseDayFirstDate('01/02/2024')).toBe('2024-02-01');
    expect(parseDayFirstDate('13/01/2024')).toBe('2024-01-13');
    expect(parseDayFirstDate('5-3-2024')).toBe('2024-03-05');
  });

  it('keeps ISO dates year first', () => {
    expect(parseDayFirstDate('2024-03-05')).toBe('2024-03-05');
    expect(parseDayFirstDate('2024-03-05T10:30:00')).toBe('2024-03-05');
  });

  it('reads month names', () => {
    expect(parseDayFirstDate('5 Mar 2024')).toBe('2024-03-05');
  });

  it('reads Date cells in UTC', () => {
    expect(parseDayFirstDate(new Date(Date.UTC(2024, 0, 15)))).toBe('2024-01-15');
    expect(parseDayFirstDate(new Date(Date.UTC(2024, 0, 15, 23, 59)))).toBe('2024-01-15');
  });

  it('returns null for anything that is not a date', () => {
    expect(parseDayFirstDate('not a date')).toBeNull();
    expect(parseDayFirstDate('31/02/2024')).toBeNull();
    expect(parseDayFirstDate('')).toBeNull();
    expect(parseDayFirstDate(null)).toBeNull();
    expect(parseDayFirstDate(42)).toBeNull();
    expect(parseDayFirstDate(undefined)).toBeNull();
  });
});

describe('parseHour', () => {
  it('takes the integer before the first colon', () => {
    expect(parseHour('08:15')).toBe(8);
    expect(parseHour('23:59:59')).toBe(23);
    expect(parseHour(' 7:05')).toBe(7);
    expect(parseHour('0:00')).toBe(0);
  });

  it('defaults to 12 for missing or unusable values', () => {
    expect(parseHour(null)).toBe(DEFAULT_HOUR);
    expect(parseHour(undefined)).toBe(DEFAULT_HOUR);
    expect(parseHour('noon')).toBe(12);
    expect(parseHour(815)).toBe(12);
    expect(parseHour('ab:cd')).toBe(12);
    expect(parseHour('24:00')).toBe(12);
    expect(parseHour('-1:00')).toBe(12);
  });

  it('uses the hour of Date cells', () => {
    expect(parseHour(new Date(Date.UTC(1899, 11, 31, 14, 5)))).toBe(14);
  });
});

describe('calendar names', () => {
  it('derives weekday and month names', () => {
    expect(weekdayOf('2024-01-01')).toBe('Monday');
    expect(weekdayOf('2024-01-07')).toBe('Sunday');
    expect(monthOf('2024-03-05')).toBe('March');
    expect(monthOf('2024-07-04')).toBe('July');
  });

  it('propagates null dates', () => {
    expect(weekdayOf(null)).toBeNull();
    expect(monthOf(null)).toBeNull();
  });

  it('orders weekdays from Monday and months only from January to June', () => {
    expect(weekdayOrder('Monday')).toBe(0);
    expect(weekdayOrder('Sunday')).toBe(6);
    expect(monthOrder('January')).toBe(0);
    expect(monthOrder('June')).toBe(5);
    expect(monthOrder('July')).toBeNull();
    expect(monthOrder(null)).toBeNull();
  });
});

describe('correctAmountAnomaly', () => {
  it('rewrites 360 to 36 without touching the input row', () => {
    const row = { bill: 360, other: 360 };
    const corrected = correctAmountAnomaly(row, 'bill');

    expect(corrected).toEqual({ bill: 36, other: 360 });
    expect(row.bill).toBe(360);
  });

  it('leaves other values alone and is idempotent', () => {
    expect(correctAmountAnomaly({ bill: 36 }, 'bill')).toEqual({ bill: 36 });
    expect(correctAmountAnomaly({ bill: 361 }, 'bill')).toEqual({ bill: 361 });
    expect(correctAmountAnomaly({ bill: '360' }, 'bill')).toEqual({ bill: '360' });

    const once = correctAmountAnomaly({ bill: 360 }, 'bill');
    expect(correctAmountAnomaly(once, 'bill')).toEqual(once);
  });
});

describe('enrich', () => {
  it('keeps every row and derives the calendar features', () => {
    const enriched = enrich(table, roles);

    expect(enriched.rows).toHaveLength(3);
    expect(enriched.rows[0]).toEqual({
      source: { 'Sale Date': '01/02/2024', 'Sale Time': '08:15', 'Store Location': 'Downtown', 'Product Category': 'Coffee', 'Total Bill': 36 },
      parsedDate: '2024-02-01',
      weekdayName: 'Thursday',
      dayName: 'Thursday',
      monthName: 'February',
      hour: 8
    });
    expect(enriched.rows[1]).toMatchObject({ parsedDate: null, weekdayName: null, monthName: null, hour: 12 });
    expect(enriched.rows[2]).toMatchObject({ parsedDate: null, hour: 12 });
    expect(enriched.warnings).toEqual([]);
  });

  it('does not modify the raw table', () => {
    enrich(table, roles);
    expect(table.rows[0]['Total Bill']).toBe(360);
  });

  it('keeps every hour within 0..23', () => {
    const enriched = enrich(table, roles);
    for (const row of enriched.rows) {
      expect(row.hour).toBeGreaterThanOrEqual(0);
      expect(row.hour).toBeLessThanOrEqual(23);
    }
  });

  it('defaults every hour and warns when the time column is absent', () => {
    const enriched = enrich(table, { ...roles, time: 'Checkout Time' });

    expect(enriched.rows.map(row => row.hour)).toEqual([12, 12, 12]);
    expect(enriched.warnings).toEqual(["Time column 'Checkout Time' not found, using default hour 12"]);
  });

  it('fails with MissingDateColumn when the date column is absent', () => {
    let caught: unknown;
    try {
      enrich(table, { ...roles, date: 'Order Date' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PreparationError);
    if (caught instanceof PreparationError) {
      expect(caught.kind).toBe('MissingDateColumn');
      expect(caught.status).toBe(422);
      expect(caught.message).toBe("Date column 'Order Date' not found in data");
      expect(caught.details).toMatchObject({
        kind: 'MissingDateColumn',
        columnTypes: {
          'Sale Date': 'string',
          'Sale Time': 'string',
          'Store Location': 'string',
          'Product Category': 'string',
          'Total Bill': 'number'
        }
      });
    }
  });
});
