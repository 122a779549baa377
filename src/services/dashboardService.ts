import _ from 'lodash';
import {
  CellValue,
  ChartDescriptor,
  ColumnDetection,
  DashboardSummary,
  DashboardViews,
  EnrichedRow,
  EnrichedTable,
  FileKind,
  FilterInput,
  FilterOptions,
  FilterState,
  PaginatedResponse,
  RawRow,
  RawTable
} from '@/types/data';
import { CacheService, fingerprint } from './cacheService';
import { loadTable } from './tableLoader';
import { detectColumns } from './columnResolver';
import { enrich } from './featureDeriver';
import { aggregate, filterOptions, normalizeFilters, summarize } from './aggregator';
import { buildCharts } from './chartBuilder';
import { NoDatasetError } from '@/utils/errors';
import { config } from '@/utils/config';
import { logger } from '@/utils/logger';

export const DERIVED_COLUMNS = ['parsed_date', 'weekday_name', 'day_name', 'month_name', 'hour'] as const;

export type DisplayRow = Record<string, CellValue>;

export interface PreparedDataset {
  id: string;
  fileName: string;
  kind: FileKind;
  sheetNames: string[];
  sheetUsed?: string;
  loadedAt: string;
  raw: RawTable;
  detection: ColumnDetection;
  enriched: EnrichedTable;
}

export interface UploadResult {
  fileName: string;
  kind: FileKind;
  sheetNames: string[];
  sheetUsed?: string;
  shape: { rows: number; columns: number };
  columns: string[];
  detection: ColumnDetection;
  warnings: string[];
  cached: boolean;
}

export function toDisplayRow(row: EnrichedRow): DisplayRow {
  return {
    ...row.source,
    parsed_date: row.parsedDate,
    weekday_name: row.weekdayName,
    day_name: row.dayName,
    month_name: row.monthName,
    hour: row.hour
  };
}

export function paginate<T>(data: T[], limit: number, offset: number = 0): PaginatedResponse<T> {
  return {
    data: data.slice(offset, offset + limit),
    pagination: {
      total: data.length,
      limit,
      offset,
      hasMore: offset + limit < data.length,
      totalPages: Math.ceil(data.length / limit),
      currentPage: Math.floor(offset / limit) + 1
    }
  };
}

/**
 * Upload → resolve → enrich runs once per distinct file and is cached; every
 * query re-aggregates the cached enriched table from scratch.
 */
export class DashboardService {
  private readonly cache: CacheService<PreparedDataset>;

  constructor(cache: CacheService<PreparedDataset> = new CacheService<PreparedDataset>()) {
    this.cache = cache;
  }

  /**
   * Load and prepare an uploaded file. A failed upload leaves the dashboard
   * empty rather than showing the previous file.
   */
  async ingest(fileName: string, content: Buffer): Promise<UploadResult> {
    const key = fingerprint(fileName, content);
    const cached = this.cache.get(key);
    if (cached) {
      logger.info(`Reusing prepared data for ${fileName}`);
      return this.describeUpload(cached, true);
    }

    try {
      const loaded = await loadTable(fileName, content);
      const detection = detectColumns(loaded.table.columns);
      logger.info('Using columns', detection.roles);
      if (detection.fallbacks.length > 0) {
        logger.warn(`No named match for roles: ${detection.fallbacks.join(', ')}; using positional columns`);
      }

      const enriched = enrich(loaded.table, detection.roles);
      const dataset: PreparedDataset = {
        id: key,
        fileName: loaded.fileName,
        kind: loaded.kind,
        sheetNames: loaded.sheetNames,
        sheetUsed: loaded.sheetUsed,
        loadedAt: new Date().toISOString(),
        raw: loaded.table,
        detection,
        enriched
      };
      this.cache.set(key, dataset);
      return this.describeUpload(dataset, false);
    } catch (error) {
      this.cache.clear();
      throw error;
    }
  }

  private describeUpload(dataset: PreparedDataset, cached: boolean): UploadResult {
    return {
      fileName: dataset.fileName,
      kind: dataset.kind,
      sheetNames: dataset.sheetNames,
      sheetUsed: dataset.sheetUsed,
      shape: { rows: dataset.raw.rows.length, columns: dataset.raw.columns.length },
      columns: dataset.raw.columns,
      detection: dataset.detection,
      warnings: dataset.enriched.warnings,
      cached
    };
  }

  getDataset(): PreparedDataset {
    const dataset = this.cache.current();
    if (!dataset) {
      throw new NoDatasetError();
    }
    return dataset;
  }

  hasDataset(): boolean {
    return this.cache.current() !== null;
  }

  getColumns(): ColumnDetection {
    return this.getDataset().detection;
  }

  getPreview(limit: number = config.previewRows): { columns: string[]; rows: RawRow[] } {
    const { raw } = this.getDataset();
    return { columns: raw.columns, rows: raw.rows.slice(0, limit) };
  }

  getFilterOptions(): FilterOptions {
    return filterOptions(this.getDataset().enriched);
  }

  getViews(input: FilterInput): { filters: FilterState; views: DashboardViews } {
    const { enriched } = this.getDataset();
    const filters = normalizeFilters(input, filterOptions(enriched));
    return { filters, views: aggregate(enriched, filters) };
  }

  getCharts(input: FilterInput): { filters: FilterState; charts: ChartDescriptor[] } {
    const { filters, views } = this.getViews(input);
    return { filters, charts: buildCharts(views, filters) };
  }

  getSummary(): DashboardSummary {
    return summarize(this.getDataset().enriched);
  }

  getTable(limit: number = config.tablePageSize, offset: number = 0): PaginatedResponse<DisplayRow> & { columns: string[] } {
    const { enriched } = this.getDataset();
    const columns = _.uniq([...enriched.columns, ...DERIVED_COLUMNS]);
    const page = paginate(enriched.rows, limit, offset);
    return { columns, data: page.data.map(toDisplayRow), pagination: page.pagination };
  }

  reset(): void {
    this.cache.clear();
  }
}

export const dashboardService = new DashboardService();
