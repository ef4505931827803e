import { RequestHandler, Router } from 'express';
import {
  DeviceController,
  registerDeviceValidation,
  updateDeviceValidation,
  deactivateExpiredValidation,
} from '../controllers/device.controller';
import { authorize } from '../middleware/rbac.middleware';
import { PERMISSIONS } from '../config/permissions';

export function createDeviceRoutes(controller: DeviceController, authenticate: RequestHandler): Router {
  const router = Router();

  // --- Maintenance Endpoints ---

  // POST /devices/expired/deactivate - Deactivate APNS devices reported dead by the feedback service
  router.post(
    '/expired/deactivate',
    authenticate,
    authorize([PERMISSIONS.DEVICE_MAINTAIN]),
    deactivateExpiredValidation,
    controller.deactivateExpired
  );

  // --- Registration Endpoints (provider comes from the path) ---

  router.post('/apns', authenticate, authorize([PERMISSIONS.DEVICE_REGISTER]), registerDeviceValidation, controller.registerApns);
  router.post('/gcm', authenticate, authorize([PERMISSIONS.DEVICE_REGISTER]), registerDeviceValidation, controller.registerGcm);

  // --- Owner Endpoints ---

  router.get('/', authenticate, controller.list);
  router.patch('/:id', authenticate, updateDeviceValidation, controller.update);

  return router;
}
