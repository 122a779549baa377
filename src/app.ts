import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';

import { requestLogger, errorLogger } from '@/utils/logger';
import { config } from '@/utils/config';
import { isDashboardError } from '@/utils/errors';
import dashboardRoutes from '@/routes/dashboard';
import { dashboardService } from '@/services/dashboardService';

const app = express();

app.use(helmet());
app.use(cors({
  origin: true,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-File-Name']
}));
app.use(compression());

if (config.nodeEnv !== 'test') {
  app.use(morgan('combined'));
}
app.use(requestLogger);

// Health check endpoint
app.get('/health', (req, res) => {
  res.json({
    success: true,
    message: 'Sales Lens API is running',
    timestamp: new Date().toISOString(),
    environment: config.nodeEnv,
    datasetLoaded: dashboardService.hasDataset(),
    version: process.env.npm_package_version || '1.0.0'
  });
});

app.use('/api/v1/dashboard', dashboardRoutes);

app.get('/api/v1', (req, res) => {
  res.json({
    success: true,
    message: 'Sales Lens API',
    version: '1.0.0',
    endpoints: {
      upload: '/api/v1/dashboard/upload',
      columns: '/api/v1/dashboard/columns',
      filterOptions: '/api/v1/dashboard/filter-options',
      views: '/api/v1/dashboard/views',
      charts: '/api/v1/dashboard/charts',
      summary: '/api/v1/dashboard/summary',
      table: '/api/v1/dashboard/table'
    }
  });
});

// 404 handler
app.use('*', (req, res) => {
  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.originalUrl} not found`
    }
  });
});

app.use(errorLogger);

app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
  // body-parser errors (e.g. entity.too.large) carry their own status
  const status = isDashboardError(error)
    ? error.status
    : error instanceof Error && 'status' in error && typeof error.status === 'number' ? error.status : 500;
  const code = isDashboardError(error)
    ? error.code
    : status === 413 ? 'FILE_TOO_LARGE' : 'INTERNAL_SERVER_ERROR';

  res.status(status).json({
    success: false,
    error: {
      code,
      message: error instanceof Error ? error.message : 'An unexpected error occurred',
      ...(config.nodeEnv === 'development' && error instanceof Error && { stack: error.stack })
    }
  });
});

export default app;
