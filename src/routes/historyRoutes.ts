import { Router } from 'express';
import type { HistoryController } from '../controllers/historyController';

export function createHistoryRoutes(historyController: HistoryController): Router {
  const router = Router();

  router.get('/', historyController.listHistory);

  return router;
}
