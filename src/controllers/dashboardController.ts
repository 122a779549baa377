import { Request, Response } from 'express';
import { dashboardService, DashboardService } from '@/services/dashboardService';
import { ApiResponse, ErrorResponse, FilterInput } from '@/types/data';
import { isDashboardError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { config } from '@/utils/config';

export class DashboardController {
  constructor(private readonly service: DashboardService = dashboardService) {}

  /**
   * Upload a spreadsheet or delimited file (raw request body)
   */
  async upload(req: Request, res: Response) {
    try {
      const fileName = this.parseFileName(req);
      if (!fileName) {
        this.reject(res, 400, {
          code: 'MISSING_FILE_NAME',
          message: 'Provide the file name in the x-file-name header or the filename query parameter'
        });
        return;
      }
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        this.reject(res, 400, { code: 'EMPTY_UPLOAD', message: 'Request body must contain the file contents' });
        return;
      }

      logger.info(`Receiving upload ${fileName} (${req.body.length} bytes)`);
      const result = await this.service.ingest(fileName, req.body);
      this.send(res, result, result.cached ? 200 : 201);
    } catch (error) {
      this.fail(res, error, 'UPLOAD_ERROR', 'Failed to process uploaded file');
    }
  }

  /**
   * Get detected column roles and candidate columns
   */
  async getColumns(req: Request, res: Response) {
    try {
      this.send(res, this.service.getColumns());
    } catch (error) {
      this.fail(res, error, 'COLUMNS_ERROR', 'Failed to get column detection');
    }
  }

  async getPreview(req: Request, res: Response) {
    try {
      const limit = req.query.limit ? parseInt(String(req.query.limit), 10) : config.previewRows;
      this.send(res, this.service.getPreview(limit));
    } catch (error) {
      this.fail(res, error, 'PREVIEW_ERROR', 'Failed to get data preview');
    }
  }

  /**
   * Get available filter options (locations, categories, hour range)
   */
  async getFilterOptions(req: Request, res: Response) {
    try {
      this.send(res, this.service.getFilterOptions());
    } catch (error) {
      this.fail(res, error, 'FILTER_OPTIONS_ERROR', 'Failed to get filter options');
    }
  }

  /**
   * Get daily revenue, location and category views for the current filters
   */
  async getViews(req: Request, res: Response) {
    try {
      const filters = this.parseFilters(req);
      logger.info('Getting dashboard views', filters);
      this.send(res, this.service.getViews(filters));
    } catch (error) {
      this.fail(res, error, 'VIEWS_ERROR', 'Failed to get dashboard views');
    }
  }

  async getCharts(req: Request, res: Response) {
    try {
      const filters = this.parseFilters(req);
      this.send(res, this.service.getCharts(filters));
    } catch (error) {
      this.fail(res, error, 'CHARTS_ERROR', 'Failed to build charts');
    }
  }

  /**
   * Get summary statistics for the whole dataset
   */
  async getSummary(req: Request, res: Response) {
    try {
      this.send(res, this.service.getSummary());
    } catch (error) {
      this.fail(res, error, 'SUMMARY_ERROR', 'Failed to get summary statistics');
    }
  }

  /**
   * Get enriched rows, paginated
   */
  async getTable(req: Request, res: Response) {
    try {
      const limit = req.query.limit ? parseInt(String(req.query.limit), 10) : config.tablePageSize;
      const offset = req.query.offset ? parseInt(String(req.query.offset), 10) : 0;
      this.send(res, this.service.getTable(limit, offset));
    } catch (error) {
      this.fail(res, error, 'TABLE_ERROR', 'Failed to get data table');
    }
  }

  private send<T>(res: Response, data: T, status: number = 200) {
    const body: ApiResponse<T> = { success: true, data };
    res.status(status).json(body);
  }

  private reject(res: Response, status: number, error: ErrorResponse['error']) {
    const body: ErrorResponse = { success: false, error };
    res.status(status).json(body);
  }

  private fail(res: Response, error: unknown, code: string, message: string) {
    if (isDashboardError(error)) {
      logger.warn(`${message}: ${error.message}`, { code: error.code });
      this.reject(res, error.status, {
        code: error.code,
        message: error.message,
        ...(error.details !== undefined && { details: error.details })
      });
      return;
    }

    logger.error(`${message}:`, error);
    this.reject(res, 500, {
      code,
      message,
      details: error instanceof Error ? error.message : 'Unknown error'
    });
  }

  /** Percent-encoded header value, else the query parameter; undefined when unusable. */
  private parseFileName(req: Request): string | undefined {
    const header = req.header('x-file-name');
    if (header) {
      try {
        return decodeURIComponent(header).trim() || undefined;
      } catch (error) {
        logger.warn(`Malformed x-file-name header: ${header}`, error);
        return undefined;
      }
    }
    return req.query.filename ? String(req.query.filename).trim() || undefined : undefined;
  }

  private parseFilters(req: Request): FilterInput {
    const location = req.query.location ? String(req.query.location) : undefined;
    const category = req.query.category ? String(req.query.category) : undefined;
    const hour = req.query.hour !== undefined ? parseInt(String(req.query.hour), 10) : undefined;
    return { location, category, hour };
  }
}

export const dashboardController = new DashboardController();
