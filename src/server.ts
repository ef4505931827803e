import { createApp } from './app';
import { connectDatabase, disconnectDatabase } from './config/database';
import { loadEnv } from './config/env';
import { APNSAdapter } from './notificationAdapters/apns.adapter';
import { GCMAdapter } from './notificationAdapters/gcm.adapter';
import { MongoDeviceRepository } from './repositories/device.repository';
import { MongoNotificationLog } from './repositories/notification.repository';
import { logger } from './utils/logger';

// Start server
async function startServer(): Promise<void> {
  const env = loadEnv();

  // Connect to database
  await connectDatabase(env.MONGODB_URI);

  const app = createApp({
    devices: new MongoDeviceRepository(env.OWNER_MODEL),
    notifications: new MongoNotificationLog(),
    apns: new APNSAdapter(env.APNS),
    gcm: new GCMAdapter(env.GCM),
    accessTokenSecret: env.ACCESS_TOKEN_SECRET,
  });

  // Start listening
  const server = app.listen(env.PORT, () => {
    logger.info('Server running', { port: env.PORT, environment: env.NODE_ENV });
  });

  // Graceful shutdown
  process.on('SIGINT', () => {
    server.close(() => {
      disconnectDatabase()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
  });
}

startServer().catch(error => {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
