import dotenv from 'dotenv';
import type { LoanStatsMode } from './services/loanStatsProvider';

// Load environment variables from .env file
dotenv.config();

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  geminiApiKey?: string;
  geminiModel: string;
  fetchTimeoutMs: number;
  maxCrawlPages: number;
  loanStatsMode: LoanStatsMode;
  sessionIdleTtlMs: number;
}

const DEFAULT_MODEL = 'gemini-2.5-flash';

const parseIntegerEnv = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const normalizeLoanStatsMode = (value: string | undefined): LoanStatsMode => {
  const v = (value || '').trim().toLowerCase();
  return v === 'random' ? 'random' : 'seeded';
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const apiKey = (env.GEMINI_API_KEY || '').trim();
  return {
    port: parseIntegerEnv(env.PORT, 3001),
    nodeEnv: env.NODE_ENV || 'development',
    geminiApiKey: apiKey || undefined,
    geminiModel: (env.GEMINI_MODEL || '').trim() || DEFAULT_MODEL,
    fetchTimeoutMs: Math.max(500, parseIntegerEnv(env.FETCH_TIMEOUT_MS, 5000)),
    maxCrawlPages: Math.max(1, Math.min(20, parseIntegerEnv(env.MAX_CRAWL_PAGES, 5))),
    loanStatsMode: normalizeLoanStatsMode(env.LOAN_STATS_MODE),
    sessionIdleTtlMs: Math.max(60_000, parseIntegerEnv(env.SESSION_IDLE_TTL_MS, 2 * 60 * 60 * 1000)),
  };
};
