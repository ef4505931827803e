import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { authenticate } from './middleware/auth.middleware';
import { createDeviceController } from './controllers/device.controller';
import { createNotificationController } from './controllers/notification.controller';
import { createDeviceRoutes } from './routes/device.routes';
import { createNotificationRoutes } from './routes/notification.routes';
import { IApnsClient, IGcmClient } from './notificationAdapters/push.interface';
import { IDeviceRepository } from './repositories/device.repository';
import { INotificationLog } from './repositories/notification.repository';
import { DispatchService } from './services/dispatch.service';
import { DeviceService } from './services/device.service';
import { NotificationService } from './services/notification.service';

export interface AppDependencies {
  devices: IDeviceRepository;
  notifications: INotificationLog;
  apns: IApnsClient;
  gcm: IGcmClient;
  accessTokenSecret: string;
}

/** Wires the dispatch core and its collaborators into an Express application. */
export function createApp(deps: AppDependencies): Application {
  const dispatch = new DispatchService(deps);
  const deviceService = new DeviceService(deps.devices, dispatch);
  const notificationService = new NotificationService(deps.devices, deps.notifications, dispatch);
  const requireAuth = authenticate(deps.accessTokenSecret);

  const app: Application = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/devices', createDeviceRoutes(createDeviceController(deviceService), requireAuth));
  app.use('/notifications', createNotificationRoutes(createNotificationController(notificationService), requireAuth));

  return app;
}
