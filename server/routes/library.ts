import express from 'express';
import { body, validationResult } from 'express-validator';
import { createLibraryController, LibraryControllerDeps } from '../controllers/libraryController';
import { requireApiKey, requireSession } from '../middleware/session';

export interface LibraryRouterDeps extends LibraryControllerDeps {
  fallbackApiKey?: string;
}

// Validation error handler
const handleValidationErrors = (req: express.Request, res: express.Response, next: express.NextFunction) => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    res.status(400).json({
      error: 'Validation failed',
      code: 'VALIDATION_FAILED',
      details: errors.array().map(err => ({
        field: err.type === 'field' ? err.path : 'body',
        message: err.msg,
      })),
    });
    return;
  }
  next();
};

export const createLibraryRouter = (deps: LibraryRouterDeps) => {
  const router = express.Router();
  const controller = createLibraryController(deps);
  const withSession = requireSession(deps.registry);
  const withApiKey = requireApiKey(deps.fallbackApiKey);

  const validateSearch = [
    body('url')
      .isString()
      .trim()
      .isURL({ protocols: ['http', 'https'], require_protocol: true, require_tld: false })
      .withMessage('url must be an absolute http(s) URL'),
    body('maxPages')
      .optional()
      .isInt({ min: 1, max: deps.config.maxCrawlPages })
      .withMessage(`maxPages must be between 1 and ${deps.config.maxCrawlPages}`)
      .toInt(),
  ];

  const validateQuestion = [
    body('question').isString().trim().notEmpty().withMessage('question must be a non-empty string'),
  ];

  const validateChat = [
    body('message').isString().trim().notEmpty().withMessage('message must be a non-empty string'),
  ];

  const validateFeedback = [
    body('title').isString().trim().notEmpty().withMessage('title must be a non-empty string'),
    body('category').isString().trim().notEmpty().withMessage('category must be a non-empty string'),
    body('comment').isString().withMessage('comment must be a string'),
  ];

  router.post('/sessions', controller.createSession);
  router.delete('/sessions/:id', controller.endSession);

  /**
   * POST /api/search
   *
   * Body: { url: string, maxPages?: number }
   * Headers: x-session-id, x-gemini-api-key (optional when the server has a key)
   * Response: { books: BookMetadata[], warnings: string[], processingTime }
   */
  router.post('/search', withSession, validateSearch, handleValidationErrors, withApiKey, controller.search);
  router.get('/books', withSession, controller.listBooks);

  router.post('/query', withSession, validateQuestion, handleValidationErrors, withApiKey, controller.query);
  router.post('/chat', withSession, validateChat, handleValidationErrors, withApiKey, controller.chat);
  router.get('/transcripts/:tab', withSession, controller.transcript);

  router.post('/feedback', withSession, validateFeedback, handleValidationErrors, controller.addFeedback);
  router.get('/feedback', withSession, controller.feedbackReport);

  return router;
};
