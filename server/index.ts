/**
 * Literary Search Assistant - API Server
 *
 * Express.js server behind the single-page client:
 * - crawls a book-platform page and extracts a short excerpt
 * - asks Google Gemini for literary metadata (characters, era, tone, adaptations, review)
 * - answers deep queries and free chat about the latest book
 * - keeps per-session feedback and placeholder loan statistics in memory
 *
 * @requires Express.js 5.x
 * @requires Node.js 20.x
 */

// config first: it loads .env before anything reads process.env
import { loadConfig } from './config';
import path from 'path';
import { createApp } from './app';
import { logger } from './logger';

const config = loadConfig();

const app = createApp({
  config,
  clientDir: config.nodeEnv === 'production' ? path.join(__dirname, '../client') : undefined,
});

const server = app.listen(config.port, '0.0.0.0', () => {
  logger.info(`🚀 API Server running on port ${config.port}`);
  logger.info('📚 Health check: /health');
  logger.info('📖 Search endpoint: /api/search');
  if (!config.geminiApiKey) {
    logger.info('🔑 No GEMINI_API_KEY set; clients must send their own key');
  }
});

server.on('error', (err) => {
  logger.error(`❌ Server error: ${err.message}`);
  process.exit(1);
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error(`❌ Uncaught Exception: ${error.stack ?? error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`❌ Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

export default app;
