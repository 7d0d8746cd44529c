import { createServer } from 'http';
import { config } from './config/env';
import { connectDatabase, disconnectDatabase } from './config/database';
import { createApp } from './app';

const app = createApp();
const httpServer = createServer(app);

const shutdown = (signal: string): void => {
  console.log(`${signal} received, shutting down...`);
  httpServer.close(() => {
    disconnectDatabase()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('❌ Error during shutdown:', error);
        process.exit(1);
      });
  });
};

// Connect to database and start server
const startServer = async (): Promise<void> => {
  await connectDatabase();

  httpServer.listen(config.port, () => {
    console.log(`🚀 Server is running on http://localhost:${config.port}${config.apiPrefix}`);
  });

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});

export default app;
