import { serverConfig } from './config/services';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { createApp } from './app';
import { RedisActiveSessionStore } from './repositories/activeSessionRepository';
import { MongoTranscriptStore, NullTranscriptStore } from './repositories/transcriptRepository';
import { createCompletionGateway } from './services/ai/completionGateway';

const startServer = async () => {
  try {
    // Connect to MongoDB
    const persistenceEnabled = await connectDatabase();
    console.log(persistenceEnabled ? '✓ MongoDB connected' : '⚠️  Transcript storage disabled');

    // Connect to Redis
    await connectRedis();
    console.log('✓ Redis connected');

    const app = createApp({
      activeSessions: new RedisActiveSessionStore(),
      transcriptStore: persistenceEnabled ? new MongoTranscriptStore() : new NullTranscriptStore(),
      createGateway: createCompletionGateway,
    });

    // Start Express server
    app.listen(serverConfig.port, () => {
      console.log(`✓ Server running on port ${serverConfig.port}`);
      console.log(`✓ Environment: ${serverConfig.environment}`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

const shutdown = (signal: string) => {
  console.log(`${signal} signal received: closing server gracefully`);
  Promise.all([disconnectRedis(), disconnectDatabase()])
    .catch((error) => console.error('Error during shutdown:', error))
    .finally(() => process.exit(0));
};

// Handle graceful shutdown
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

void startServer();
