import _ from 'lodash';
import {
  AggregateView,
  CellValue,
  DashboardSummary,
  DashboardViews,
  EnrichedRow,
  EnrichedTable,
  FilterInput,
  FilterOptions,
  FilterState
} from '@/types/data';
import { DEFAULT_HOUR } from '@/services/featureDeriver';

export const ALL_LOCATIONS = 'All Locations';
export const ALL_CATEGORIES = 'All Categories';

/**
 * Reads an amount cell as a number. Handles "1,234.56", "$36", plain numbers;
 * anything else is null.
 */
export function parseAmount(value: CellValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const cleaned = value.replace(/[€£$,\s]/g, '');
  if (!cleaned) return null;
  const parsed = parseFloat(cleaned);
  return isNaN(parsed) ? null : parsed;
}

function amountOf(row: EnrichedRow, amountColumn: string): number {
  return parseAmount(row.source[amountColumn]) ?? 0;
}

/** Grouping key of a dimension cell; blanks have no group. */
export function groupKey(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  const key = value instanceof Date ? value.toISOString() : String(value);
  return key === '' ? null : key;
}

/**
 * Order of dimension values: numbers numerically ahead of text, everything
 * else by its grouping key.
 */
export function compareGroupValues(a: CellValue, b: CellValue): number {
  const aNumeric = typeof a === 'number';
  const bNumeric = typeof b === 'number';
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (aNumeric !== bNumeric) return aNumeric ? -1 : 1;

  const aKey = groupKey(a) ?? '';
  const bKey = groupKey(b) ?? '';
  return aKey < bKey ? -1 : aKey > bKey ? 1 : 0;
}

interface RowFilter {
  location?: string;
  category?: string;
  hour?: number;
}

/**
 * Apply filters to enriched rows. Location and category accept their "All"
 * sentinel as no restriction; hour is an exact match when given.
 */
export function applyFilters(table: EnrichedTable, filters: RowFilter): EnrichedRow[] {
  const { location, category } = table.roles;
  let filtered = table.rows;

  if (filters.location && filters.location !== ALL_LOCATIONS) {
    filtered = filtered.filter(row => groupKey(row.source[location]) === filters.location);
  }

  if (filters.category && filters.category !== ALL_CATEGORIES) {
    filtered = filtered.filter(row => groupKey(row.source[category]) === filters.category);
  }

  if (filters.hour !== undefined) {
    filtered = filtered.filter(row => row.hour === filters.hour);
  }

  return filtered;
}

/**
 * Sums the amount per group. Points come back in ascending order of the
 * grouped values; rows without a key are left out.
 */
export function sumAmountBy(
  rows: EnrichedRow[],
  amountColumn: string,
  valueOf: (row: EnrichedRow) => CellValue | undefined
): AggregateView {
  const keyed = rows.filter(row => groupKey(valueOf(row)) !== null);
  const grouped = _.groupBy(keyed, row => groupKey(valueOf(row)));
  const groups = Object.values(grouped).map(items => ({ value: valueOf(items[0]) ?? null, items }));

  return groups
    .sort((a, b) => compareGroupValues(a.value, b.value))
    .map(({ value, items }) => ({
      label: groupKey(value) ?? '',
      value: _.sumBy(items, row => amountOf(row, amountColumn))
    }));
}

export function dailyRevenue(table: EnrichedTable, filters: FilterState): AggregateView {
  const rows = applyFilters(table, { location: filters.location, hour: filters.hour });
  return sumAmountBy(rows, table.roles.amount, row => row.parsedDate);
}

export function revenueByLocation(table: EnrichedTable, filters: FilterState): AggregateView {
  const rows = applyFilters(table, { location: filters.location, category: filters.category });
  const points = sumAmountBy(rows, table.roles.amount, row => row.source[table.roles.location]);
  return _.orderBy(points, 'value', 'desc');
}

export function revenueByCategory(table: EnrichedTable, filters: FilterState): AggregateView {
  const rows = applyFilters(table, { location: filters.location, category: filters.category });
  const points = sumAmountBy(rows, table.roles.amount, row => row.source[table.roles.category]);
  return _.orderBy(points, 'value', 'desc');
}

/**
 * The daily trend is filtered by location and hour, the two bar views by
 * location and category. Category never narrows the trend and hour never
 * narrows the bars.
 */
export function aggregate(table: EnrichedTable, filters: FilterState): DashboardViews {
  return {
    daily: dailyRevenue(table, filters),
    byLocation: revenueByLocation(table, filters),
    byCategory: revenueByCategory(table, filters)
  };
}

function distinctKeys(table: EnrichedTable, column: string): string[] {
  const values = table.rows
    .map(row => row.source[column] ?? null)
    .filter(value => groupKey(value) !== null);
  return _.uniqBy(values, groupKey)
    .sort(compareGroupValues)
    .map(value => groupKey(value) ?? '');
}

export function filterOptions(table: EnrichedTable): FilterOptions {
  const hours = table.rows.map(row => row.hour);
  const min = _.min(hours) ?? DEFAULT_HOUR;
  const max = _.max(hours) ?? DEFAULT_HOUR;

  return {
    locations: [ALL_LOCATIONS, ...distinctKeys(table, table.roles.location)],
    categories: [ALL_CATEGORIES, ...distinctKeys(table, table.roles.category)],
    hour: { min, max, default: _.clamp(DEFAULT_HOUR, min, max) }
  };
}

/**
 * Fills unset filters with their defaults and keeps the hour inside the
 * observed range.
 */
export function normalizeFilters(input: FilterInput, options: FilterOptions): FilterState {
  return {
    location: input.location || ALL_LOCATIONS,
    category: input.category || ALL_CATEGORIES,
    hour: _.clamp(input.hour ?? options.hour.default, options.hour.min, options.hour.max)
  };
}

export function summarize(table: EnrichedTable): DashboardSummary {
  const amounts = table.rows
    .map(row => parseAmount(row.source[table.roles.amount]))
    .filter((amount): amount is number => amount !== null);
  const totalRevenue = _.sum(amounts);
  const dates = table.rows
    .map(row => row.parsedDate)
    .filter((date): date is string => date !== null)
    .sort();

  return {
    totalRevenue,
    transactionCount: table.rows.length,
    averageTransaction: amounts.length > 0 ? totalRevenue / amounts.length : null,
    dateRange: dates.length > 0 ? { start: dates[0], end: dates[dates.length - 1] } : null
  };
}
