import type { Request, Response } from 'express';
import type { TranscriptTab } from '../../types';
import type { ServerConfig } from '../config';
import { HttpError } from '../errors';
import { logger } from '../logger';
import { apiKeyOf, sessionOf } from '../middleware/session';
import { answerQuery, chatAboutBooks } from '../services/bookResponder';
import type { TextModelFactory } from '../services/geminiService';
import { searchAndExtract } from '../services/searchPipeline';
import type { SessionRegistry } from '../services/sessionRegistry';

export interface LibraryControllerDeps {
  registry: SessionRegistry;
  modelFactory: TextModelFactory;
  config: Pick<ServerConfig, 'fetchTimeoutMs' | 'maxCrawlPages'>;
}

// Fields have already passed the route's validation chain.
const stringField = (req: Request, key: string): string => {
  const body: Record<string, unknown> = req.body ?? {};
  const value = body[key];
  return typeof value === 'string' ? value : '';
};

const optionalIntField = (req: Request, key: string): number | undefined => {
  const body: Record<string, unknown> = req.body ?? {};
  const value = body[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
};

const isTranscriptTab = (value: string): value is TranscriptTab => value === 'query' || value === 'chat';

// Express 5 types a route param as string | string[].
const routeParam = (req: Request, key: string): string => {
  const value = req.params[key];
  return typeof value === 'string' ? value : '';
};

export const createLibraryController = ({ registry, modelFactory, config }: LibraryControllerDeps) => ({
  createSession(req: Request, res: Response) {
    const session = registry.create();
    res.status(201).json({ sessionId: session.id });
  },

  endSession(req: Request, res: Response) {
    const id = routeParam(req, 'id');
    if (!registry.end(id)) {
      throw new HttpError(404, 'SESSION_NOT_FOUND', `No active session with id ${id}`, 'Session not found');
    }
    res.status(204).end();
  },

  /**
   * POST /api/search
   *
   * Crawls the submitted page, analyses it with Gemini and stores the book in
   * the session. A failed crawl is not an error: the response carries no books
   * and one warning.
   */
  async search(req: Request, res: Response) {
    const startTime = Date.now();
    const session = sessionOf(res);
    const url = stringField(req, 'url');
    const maxPages = optionalIntField(req, 'maxPages') ?? 1;

    logger.info(`🔎 Search requested for ${url} (maxPages=${maxPages})`);
    const model = modelFactory(apiKeyOf(res));
    const result = await searchAndExtract(session, model, url, {
      maxPages: Math.min(maxPages, config.maxCrawlPages),
      timeoutMs: config.fetchTimeoutMs,
    });

    res.json({
      ...result,
      processingTime: `${((Date.now() - startTime) / 1000).toFixed(2)}s`,
    });
  },

  listBooks(req: Request, res: Response) {
    res.json({ books: sessionOf(res).listBooks() });
  },

  async query(req: Request, res: Response) {
    const session = sessionOf(res);
    const outcome = await answerQuery(session, modelFactory(apiKeyOf(res)), stringField(req, 'question'));
    res.json(outcome);
  },

  async chat(req: Request, res: Response) {
    const session = sessionOf(res);
    const answer = await chatAboutBooks(session, modelFactory(apiKeyOf(res)), stringField(req, 'message'));
    res.json({ answer });
  },

  transcript(req: Request, res: Response) {
    const tab = routeParam(req, 'tab');
    if (!isTranscriptTab(tab)) {
      throw new HttpError(404, 'UNKNOWN_TRANSCRIPT', `No transcript named "${tab}". Use "query" or "chat".`, 'Unknown transcript');
    }
    res.json({ tab, entries: sessionOf(res).transcript(tab) });
  },

  addFeedback(req: Request, res: Response) {
    const entry = sessionOf(res).appendFeedback(
      stringField(req, 'title'),
      stringField(req, 'category'),
      stringField(req, 'comment'),
    );
    res.status(201).json({ title: entry.title, category: entry.category, count: entry.comments.length });
  },

  feedbackReport(req: Request, res: Response) {
    res.json({ entries: sessionOf(res).feedbackReport() });
  },
});

export type LibraryController = ReturnType<typeof createLibraryController>;
