
// Raw cell as produced by the spreadsheet / delimited text readers
export type CellValue = string | number | boolean | Date | null;

export type RawRow = Record<string, CellValue>;

export interface RawTable {
  columns: string[];
  rows: RawRow[];
}

export type FileKind = 'spreadsheet' | 'delimited';

export interface LoadedTable {
  table: RawTable;
  fileName: string;
  kind: FileKind;
  sheetNames: string[];
  sheetUsed?: string;
}

// Column roles
export type Role = 'date' | 'time' | 'location' | 'category' | 'amount';

export type ColumnRoles = Record<Role, string>;

export interface ColumnDetection {
  roles: ColumnRoles;
  candidates: Record<Role, string[]>;
  fallbacks: Role[];
}

// Enrichment
export type WeekdayName =
  | 'Monday' | 'Tuesday' | 'Wednesday' | 'Thursday' | 'Friday' | 'Saturday' | 'Sunday';

export interface EnrichedRow {
  source: RawRow;
  parsedDate: string | null; // YYYY-MM-DD
  weekdayName: WeekdayName | null;
  dayName: WeekdayName | null;
  monthName: string | null;
  hour: number;
}

export interface EnrichedTable {
  columns: string[];
  roles: ColumnRoles;
  rows: EnrichedRow[];
  warnings: string[];
}

// Filters
export interface FilterState {
  location: string;
  category: string;
  hour: number;
}

export interface FilterInput {
  location?: string;
  category?: string;
  hour?: number;
}

export interface HourBounds {
  min: number;
  max: number;
  default: number;
}

export interface FilterOptions {
  locations: string[];
  categories: string[];
  hour: HourBounds;
}

// Aggregates
export interface AggregatePoint {
  label: string;
  value: number;
}

export type AggregateView = AggregatePoint[];

export interface DashboardViews {
  daily: AggregateView;
  byLocation: AggregateView;
  byCategory: AggregateView;
}

export interface DashboardSummary {
  totalRevenue: number;
  transactionCount: number;
  averageTransaction: number | null;
  dateRange: { start: string; end: string } | null;
}

export type ChartKind = 'line' | 'bar';

export interface ChartDescriptor {
  id: 'daily-revenue' | 'sales-by-location' | 'sales-by-category';
  kind: ChartKind;
  title: string;
  xAxisTitle: string;
  yAxisTitle: string;
  points: AggregateView;
}

// Pagination interfaces
export interface PaginatedResponse<T> {
  data: T[];
  pagination: {
    total: number;
    limit: number;
    offset: number;
    hasMore: boolean;
    totalPages: number;
    currentPage: number;
  };
}

// API Response interfaces
export interface ApiResponse<T> {
  success: boolean;
  data: T;
  message?: string;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
