// src/services/device.service.ts
import { DeviceOf, DeviceProvider, IDevice } from '../models/device.model';
import { DeviceUpdate, IDeviceRepository, NewDeviceInput } from '../repositories/device.repository';
import { DeviceNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DispatchService } from './dispatch.service';

export interface ExpiredDevicesSummary {
  expired: string[];
  deactivated: number;
}

export class DeviceService {
  constructor(
    private readonly devices: IDeviceRepository,
    private readonly dispatch: DispatchService
  ) {}

  /**
   * Registers a device for `owner`. The provider comes from the endpoint used, never the body.
   */
  public async registerDevice<P extends DeviceProvider>(
    provider: P,
    owner: string,
    input: Omit<NewDeviceInput, 'owner'>
  ): Promise<DeviceOf<P>> {
    const device = await this.devices.register(provider, { ...input, owner });
    logger.info('Device registered', { deviceRef: device.id, provider, owner });
    return device;
  }

  public async listDevices(owner: string): Promise<IDevice[]> {
    return this.devices.listByOwner(owner);
  }

  /**
   * Renames or (de)activates one of the owner's devices.
   * @throws {DeviceNotFoundError} - when the device is missing or belongs to someone else.
   */
  public async updateDevice(owner: string, id: string, changes: DeviceUpdate): Promise<IDevice> {
    const device = await this.devices.findById(id);
    if (!device || device.owner !== owner) {
      throw new DeviceNotFoundError(id);
    }

    const updated = await this.devices.update(id, changes);
    if (!updated) {
      throw new DeviceNotFoundError(id);
    }
    return updated;
  }

  /**
   * Asks APNS for dead tokens and deactivates the matching APNS devices.
   */
  public async deactivateExpiredDevices(credentialFile?: string): Promise<ExpiredDevicesSummary> {
    const expired = await this.dispatch.getExpiredTokens(credentialFile);
    const deactivated = await this.devices.deactivateByRegistrationIds(DeviceProvider.APNS, expired);

    logger.info('Expired APNS devices deactivated', { expired: expired.length, deactivated });
    return { expired, deactivated };
  }
}
