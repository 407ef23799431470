import express from 'express';
import cors from 'cors';
import path from 'path';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import compression from 'compression';
import type { ServerConfig } from './config';
import { logger } from './logger';
import { errorHandler } from './middleware/errorHandler';
import { createLibraryRouter } from './routes/library';
import { createLoanStatsProvider } from './services/loanStatsProvider';
import { createGeminiModelFactory, TextModelFactory } from './services/geminiService';
import { SessionRegistry } from './services/sessionRegistry';

export interface AppOptions {
  config: ServerConfig;
  registry?: SessionRegistry;
  modelFactory?: TextModelFactory;
  /** Directory holding the built web client, served in production. */
  clientDir?: string;
}

export const createApp = ({ config, registry, modelFactory, clientDir }: AppOptions) => {
  const app = express();

  const sessions = registry ?? new SessionRegistry({
    idleTtlMs: config.sessionIdleTtlMs,
    statsProvider: createLoanStatsProvider(config.loanStatsMode),
  });

  // Security middleware
  app.use(helmet());
  app.use(compression());

  // Every search costs one crawl plus one model call per page
  const searchLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 20,
    message: {
      error: 'Too many search requests from this IP, please try again later.',
      retryAfter: '15 minutes'
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const generalLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 300,
    message: {
      error: 'Too many requests from this IP, please try again later.',
      retryAfter: '15 minutes'
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(generalLimiter);
  app.use('/api/search', searchLimiter);

  // CORS and body parsing
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use('/api', createLibraryRouter({
    registry: sessions,
    modelFactory: modelFactory ?? createGeminiModelFactory(config.geminiModel),
    config,
    fallbackApiKey: config.geminiApiKey,
  }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    logger.debug('✅ Health check endpoint called');
    res.json({ status: 'ok', message: 'Literary Search Assistant API is running', sessions: sessions.size });
  });

  // In production, serve the React app for all non-API routes
  if (clientDir) {
    app.use(express.static(clientDir));
    app.get('/{*splat}', (req, res) => {
      res.sendFile(path.join(clientDir, 'index.html'));
    });
  }

  app.use(errorHandler);

  return app;
};
