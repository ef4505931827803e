// src/jobs/handlers/expiredTokensHandler.ts
import { ExpiredDevicesSummary, DeviceService } from '../../services/device.service';
import { IJob, validateJobPayload } from '../jobRegistry';

/**
 * Worker Logic Handler for the 'devices.prune_expired' job type.
 * Pulls the APNS feedback list and deactivates matching devices.
 */
export async function handleExpiredTokensJob(job: IJob, deviceService: DeviceService): Promise<ExpiredDevicesSummary> {
    validateJobPayload(job.type, job.payload);

    const { credentialFile } = job.payload;
    return deviceService.deactivateExpiredDevices(typeof credentialFile === 'string' ? credentialFile : undefined);
}
