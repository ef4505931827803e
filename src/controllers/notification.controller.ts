import { Request, Response } from 'express';
import { body, query, validationResult } from 'express-validator';
import { DeviceProvider } from '../models/device.model';
import { NotificationService } from '../services/notification.service';
import { ResponseBuilder } from '../utils/response-builder';
import { parsePushSendOptions } from '../utils/validation';
import { respondWithError } from './error.handler';

const PROVIDER_BY_NAME: Record<string, DeviceProvider> = {
  apns: DeviceProvider.APNS,
  gcm: DeviceProvider.GCM,
};

// --- Validation Middleware ---

export const sendNotificationValidation = [
  body('message').isString().withMessage('Message must be a string.'),
  body('deviceId').optional().isMongoId().withMessage('Device ID must be valid Mongo ID.'),
  body('deviceIds').optional().isArray().withMessage('Device IDs must be an array.'),
  body('deviceIds.*').isMongoId().withMessage('Device IDs must be valid Mongo IDs.'),
  body('provider').optional().isIn(Object.keys(PROVIDER_BY_NAME)).withMessage('Provider must be apns or gcm.'),
  body('options').optional().isObject().withMessage('Options must be an object.'),
];

export const listNotificationsValidation = [
  query('page').optional().isInt({ min: 1 }).withMessage('Page must be a positive integer.').toInt(),
  query('per_page').optional().isInt({ min: 1, max: 100 }).withMessage('per_page must be between 1 and 100.').toInt(),
  query('deviceId').optional().isMongoId().withMessage('Device ID must be valid Mongo ID.'),
];

export interface NotificationController {
  send(req: Request, res: Response): Promise<void>;
  list(req: Request, res: Response): Promise<void>;
}

export function createNotificationController(notificationService: NotificationService): NotificationController {
  return {
    /** Dispatches a message to devices. POST /notifications/send */
    async send(req, res) {
      // 1. Input Validation
      if (ResponseBuilder.rejectInvalid(res, validationResult(req))) return;

      const { message, deviceId, deviceIds, provider } = req.body;
      const modes = [deviceId, provider].filter(value => value !== undefined).length;
      if (modes > 1 || (modes === 0 && deviceIds === undefined) || (deviceId !== undefined && deviceIds !== undefined)) {
        return ResponseBuilder.validationError(res, [
          { reason: 'Provide exactly one of deviceId, deviceIds, or provider (optionally with deviceIds).' },
        ]);
      }

      try {
        // 2. Service Call: Resolve targets, record, dispatch
        const result = await notificationService.send({
          message,
          deviceId,
          deviceIds,
          provider: typeof provider === 'string' ? PROVIDER_BY_NAME[provider] : undefined,
          options: parsePushSendOptions(req.body.options),
        });

        // 3. Success: a return means "attempted", not "delivered"
        return ResponseBuilder.success(res, { status: result === null ? 'noop' : 'attempted', result });
      } catch (error: unknown) {
        return respondWithError(res, error, 'Internal server error dispatching notification.');
      }
    },

    /** Lists audit records. GET /notifications */
    async list(req, res) {
      if (ResponseBuilder.rejectInvalid(res, validationResult(req))) return;

      const page = Number(req.query.page ?? 1);
      const perPage = Number(req.query.per_page ?? 20);
      const deviceId = typeof req.query.deviceId === 'string' ? req.query.deviceId : undefined;

      try {
        const result = await notificationService.listNotifications({ page, perPage, deviceId });
        return ResponseBuilder.paginated(res, result.data, { page, perPage }, result.total);
      } catch (error: unknown) {
        return respondWithError(res, error, 'Internal server error listing notifications.');
      }
    },
  };
}
