import { RequestHandler, Router } from 'express';
import { CompletionsHandler } from '../../handlers/completions.handler.js';

export function createCompletionsRoutes(
  handler: CompletionsHandler,
  authenticate: RequestHandler
): Router {
  const router = Router();

  router.use(authenticate);
  router.get('/stats', handler.getMyStats.bind(handler));
  router.get('/:challengeId', handler.getMyCompletion.bind(handler));
  router.get('/', handler.getMyCompletions.bind(handler));

  return router;
}
