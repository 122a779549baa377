import express, { Router, Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { dashboardController } from '@/controllers/dashboardController';
import { config } from '@/utils/config';

const router = Router();

export const viewQuerySchema = Joi.object({
  location: Joi.string().optional(),
  category: Joi.string().optional(),
  hour: Joi.number().integer().min(0).max(23).optional(),
}).unknown(true);

export const pageQuerySchema = Joi.object({
  limit: Joi.number().integer().min(1).max(1000).optional(),
  offset: Joi.number().integer().min(0).optional(),
}).unknown(true);

export const uploadQuerySchema = Joi.object({
  filename: Joi.string().max(255).optional(),
}).unknown(true);

function validateQuery(schema: Joi.ObjectSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const { error } = schema.validate(req.query, { abortEarly: false });
    if (error) {
      return res.status(400).json({ success: false, error: { code: 'INVALID_QUERY', message: 'Invalid query parameters', details: error.details.map(d => d.message) } });
    }
    next();
  };
}

const rawUpload = express.raw({ type: () => true, limit: config.maxUploadBytes });

/**
 * @route POST /api/v1/dashboard/upload
 * @desc Upload a sales file (.xlsx, .xls, .csv, .tsv, .txt) as the raw request body
 * @access Public
 */
router.post('/upload', validateQuery(uploadQuerySchema), rawUpload, dashboardController.upload.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/columns
 * @desc Get the detected column roles and candidates
 * @access Public
 */
router.get('/columns', dashboardController.getColumns.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/preview
 * @desc Get the first rows of the uploaded table
 * @access Public
 */
router.get('/preview', validateQuery(pageQuerySchema), dashboardController.getPreview.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/filter-options
 * @desc Get store locations, product categories and hour range
 * @access Public
 */
router.get('/filter-options', dashboardController.getFilterOptions.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/views
 * @desc Get daily revenue, sales by location and sales by category
 * @access Public
 */
router.get('/views', validateQuery(viewQuerySchema), dashboardController.getViews.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/charts
 * @desc Get chart descriptors for the current filters
 * @access Public
 */
router.get('/charts', validateQuery(viewQuerySchema), dashboardController.getCharts.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/summary
 * @desc Get total revenue, transaction count, average transaction and date range
 * @access Public
 */
router.get('/summary', dashboardController.getSummary.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/table
 * @desc Get the enriched data table with pagination
 * @access Public
 */
router.get('/table', validateQuery(pageQuerySchema), dashboardController.getTable.bind(dashboardController));

export default router;
