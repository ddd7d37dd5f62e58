import { Router } from 'express';
import type { SessionController } from '../controllers/sessionController';

export function createSessionRoutes(sessionController: SessionController): Router {
  const router = Router();

  // Create a session from the supplied config and ask the first question
  router.post('/start', sessionController.startSession);

  // Retry the first question for a session that failed to start
  router.post('/:sessionId/start', sessionController.retryStart);

  // Answer the pending question
  router.post('/:sessionId/answers', sessionController.submitAnswer);

  // Discard all progress and return to NotStarted
  router.post('/:sessionId/reset', sessionController.resetSession);

  // Current phase, turns and evaluation
  router.get('/:sessionId', sessionController.getSession);

  return router;
}
