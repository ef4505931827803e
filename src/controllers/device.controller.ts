import { Request, Response } from 'express';
import { body, param, validationResult } from 'express-validator';
import { DeviceProvider } from '../models/device.model';
import { DeviceService } from '../services/device.service';
import { IJob } from '../jobs/jobRegistry';
import { handleExpiredTokensJob } from '../jobs/handlers/expiredTokensHandler';
import { ErrorCode } from '../types/error-dtos';
import { ResponseBuilder } from '../utils/response-builder';
import { respondWithError } from './error.handler';

// --- Validation Middleware ---

export const registerDeviceValidation = [
  body('registrationId').isString().trim().notEmpty().withMessage('Registration ID is required.'),
  body('deviceId').optional().isString().isLength({ max: 255 }).withMessage('Device ID must be at most 255 characters.'),
  body('name').optional().isString().isLength({ max: 255 }).withMessage('Name must be at most 255 characters.'),
  body('active').optional().isBoolean({ strict: true }).withMessage('Active must be a boolean.'),
  body('provider').not().exists().withMessage('Provider is set by the endpoint and cannot be supplied.'),
];

export const updateDeviceValidation = [
  param('id').isMongoId().withMessage('Device ID must be valid Mongo ID.'),
  body('name').optional().isString().isLength({ max: 255 }).withMessage('Name must be at most 255 characters.'),
  body('active').optional().isBoolean({ strict: true }).withMessage('Active must be a boolean.'),
];

export const deactivateExpiredValidation = [
  body('credentialFile').optional().isString().withMessage('Credential file must be a path string.'),
];

export interface DeviceController {
  registerApns(req: Request, res: Response): Promise<void>;
  registerGcm(req: Request, res: Response): Promise<void>;
  list(req: Request, res: Response): Promise<void>;
  update(req: Request, res: Response): Promise<void>;
  deactivateExpired(req: Request, res: Response): Promise<void>;
}

export function createDeviceController(deviceService: DeviceService): DeviceController {
  const register = (provider: DeviceProvider) => async (req: Request, res: Response): Promise<void> => {
    if (ResponseBuilder.rejectInvalid(res, validationResult(req))) return;
    if (!req.user) return ResponseBuilder.error(res, ErrorCode.UNAUTHORIZED, 'Authentication required', 401);

    try {
      const device = await deviceService.registerDevice(provider, req.user.sub, {
        registrationId: String(req.body.registrationId),
        deviceId: typeof req.body.deviceId === 'string' ? req.body.deviceId : undefined,
        name: typeof req.body.name === 'string' ? req.body.name : undefined,
        active: typeof req.body.active === 'boolean' ? req.body.active : undefined,
      });
      return ResponseBuilder.success(res, device, 201);
    } catch (error: unknown) {
      return respondWithError(res, error, 'Internal server error registering device.');
    }
  };

  return {
    /** Registers an APNS device. POST /devices/apns */
    registerApns: register(DeviceProvider.APNS),

    /** Registers a GCM device. POST /devices/gcm */
    registerGcm: register(DeviceProvider.GCM),

    /** Lists the caller's devices. GET /devices */
    async list(req, res) {
      if (!req.user) return ResponseBuilder.error(res, ErrorCode.UNAUTHORIZED, 'Authentication required', 401);
      try {
        const devices = await deviceService.listDevices(req.user.sub);
        return ResponseBuilder.success(res, { data: devices });
      } catch (error: unknown) {
        return respondWithError(res, error, 'Internal server error listing devices.');
      }
    },

    /** Renames or (de)activates a device. PATCH /devices/:id */
    async update(req, res) {
      if (ResponseBuilder.rejectInvalid(res, validationResult(req))) return;
      if (!req.user) return ResponseBuilder.error(res, ErrorCode.UNAUTHORIZED, 'Authentication required', 401);

      try {
        const device = await deviceService.updateDevice(req.user.sub, req.params.id, {
          name: typeof req.body.name === 'string' ? req.body.name : undefined,
          active: typeof req.body.active === 'boolean' ? req.body.active : undefined,
        });
        return ResponseBuilder.success(res, device);
      } catch (error: unknown) {
        return respondWithError(res, error, 'Internal server error updating device.');
      }
    },

    /** Runs the expired-token job. POST /devices/expired/deactivate */
    async deactivateExpired(req, res) {
      if (ResponseBuilder.rejectInvalid(res, validationResult(req))) return;

      const payload: IJob['payload'] = {};
      if (typeof req.body.credentialFile === 'string') payload.credentialFile = req.body.credentialFile;
      const job: IJob = { jobId: `job_${Date.now()}`, type: 'devices.prune_expired', payload };

      try {
        const summary = await handleExpiredTokensJob(job, deviceService);
        return ResponseBuilder.success(res, { expiredCount: summary.expired.length, deactivated: summary.deactivated });
      } catch (error: unknown) {
        return respondWithError(res, error, 'Internal server error pruning expired devices.');
      }
    },
  };
}
