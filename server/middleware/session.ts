import type { NextFunction, Request, Response } from 'express';
import { HttpError } from '../errors';
import type { SessionRegistry } from '../services/sessionRegistry';
import { SessionStore } from '../services/sessionStore';

export const SESSION_HEADER = 'x-session-id';
export const API_KEY_HEADER = 'x-gemini-api-key';

export const requireSession = (registry: SessionRegistry) =>
  (req: Request, res: Response, next: NextFunction) => {
    const id = req.get(SESSION_HEADER)?.trim();
    if (!id) {
      throw new HttpError(400, 'SESSION_REQUIRED', `Send the ${SESSION_HEADER} header returned by POST /api/sessions`, 'Session required');
    }
    const session = registry.get(id);
    if (!session) {
      throw new HttpError(404, 'SESSION_NOT_FOUND', 'The session has ended or never existed. Start a new one.', 'Session not found');
    }
    res.locals.session = session;
    next();
  };

/**
 * The key typed into the sidebar wins; the server's own key is the fallback.
 * Neither is ever stored.
 */
export const requireApiKey = (fallbackKey?: string) =>
  (req: Request, res: Response, next: NextFunction) => {
    const apiKey = req.get(API_KEY_HEADER)?.trim() || fallbackKey;
    if (!apiKey) {
      throw new HttpError(401, 'API_KEY_REQUIRED', 'Enter a Gemini API key in the sidebar.', 'Gemini API key required');
    }
    res.locals.apiKey = apiKey;
    next();
  };

export const sessionOf = (res: Response): SessionStore => {
  const session: unknown = res.locals.session;
  if (!(session instanceof SessionStore)) {
    throw new HttpError(500, 'INTERNAL_ERROR', 'Session middleware did not run', 'Internal server error');
  }
  return session;
};

export const apiKeyOf = (res: Response): string => {
  const apiKey: unknown = res.locals.apiKey;
  if (typeof apiKey !== 'string') {
    throw new HttpError(500, 'INTERNAL_ERROR', 'API key middleware did not run', 'Internal server error');
  }
  return apiKey;
};
