import { RequestHandler, Router } from 'express';
import {
  NotificationController,
  sendNotificationValidation,
  listNotificationsValidation,
} from '../controllers/notification.controller';
import { authorize } from '../middleware/rbac.middleware';
import { PERMISSIONS } from '../config/permissions';

export function createNotificationRoutes(controller: NotificationController, authenticate: RequestHandler): Router {
  const router = Router();

  // POST /notifications/send - Internal/service-to-service dispatch
  router.post('/send', authenticate, authorize([PERMISSIONS.PUSH_SEND]), sendNotificationValidation, controller.send);

  // GET /notifications - Audit history
  router.get('/', authenticate, authorize([PERMISSIONS.NOTIFICATION_READ]), listNotificationsValidation, controller.list);

  return router;
}
