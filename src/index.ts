import dotenv from 'dotenv';
import path from 'path';

// Register module aliases for runtime path resolution
import moduleAlias from 'module-alias';
moduleAlias.addAliases({
  '@': path.join(__dirname, '.'),
});

// Load environment variables FIRST, before any other imports
const envCandidates = [
  path.join(process.cwd(), '.env'),
  path.join(__dirname, '../.env')
];
for (const p of envCandidates) {
  const loaded = dotenv.config({ path: p, override: true });
  if (loaded.parsed) {
    console.log(`Loaded env from: ${p}`);
  }
}

import app from '@/app';
import { logger } from '@/utils/logger';
import { config } from '@/utils/config';
import { dashboardService } from '@/services/dashboardService';

const server = app.listen(config.port, () => {
  logger.info(`Sales Lens API server running on port ${config.port}`);
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Health check: http://localhost:${config.port}/health`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down gracefully`);
  dashboardService.reset();
  server.close(() => process.exit(0));
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
