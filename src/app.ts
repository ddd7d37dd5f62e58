import express, { Application } from 'express';
import cors from 'cors';
import { serverConfig } from './config/services';
import { SessionController, type SessionControllerDeps } from './controllers/sessionController';
import { HistoryController } from './controllers/historyController';
import { HistoryService } from './services/history/historyService';
import { createSessionRoutes } from './routes/sessionRoutes';
import { createHistoryRoutes } from './routes/historyRoutes';
import { errorHandler } from './middlewares/errorHandler';

export function createApp(deps: SessionControllerDeps): Application {
  const app: Application = express();

  // Middleware
  app.use(cors({
    origin: serverConfig.frontendUrl,
    credentials: true,
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  const historyController = new HistoryController(new HistoryService(deps.transcriptStore));

  // API Routes
  app.get('/api/interview/options', historyController.getOptions);
  app.use('/api/sessions', createSessionRoutes(new SessionController(deps)));
  app.use('/api/history', createHistoryRoutes(historyController));

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
