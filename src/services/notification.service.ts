import { describeDevice, DeviceProvider, IDevice } from '../models/device.model';
import { INotificationRecord } from '../models/notification.model';
import { PushSendOptions } from '../notificationAdapters/push.interface';
import { IDeviceRepository } from '../repositories/device.repository';
import { INotificationLog, NotificationListQuery } from '../repositories/notification.repository';
import { DeviceNotFoundError } from '../utils/errors';
import { DispatchResult, DispatchService } from './dispatch.service';

// DTO for an incoming send request. Exactly one targeting mode applies:
// `deviceId` (single device), `provider` (+ optional `deviceIds`), or `deviceIds` (any mix).
export interface ISendRequest {
  message: string;
  deviceId?: string;
  deviceIds?: string[];
  provider?: DeviceProvider;
  options?: PushSendOptions;
}

export interface INotificationSummary extends INotificationRecord {
  summary: string;
}

/** "<first device>[ and N other]: <message>" */
export function formatNotificationSummary(record: INotificationRecord, firstDevice: IDevice | undefined): string {
  const label = firstDevice ? describeDevice(firstDevice) : 'unknown device';
  const othersText = record.deviceIds.length > 1 ? ` and ${record.deviceIds.length - 1} other` : '';
  return `${label}${othersText}: ${record.message}`;
}

export class NotificationService {
  constructor(
    private readonly devices: IDeviceRepository,
    private readonly notifications: INotificationLog,
    private readonly dispatch: DispatchService
  ) {}

  /**
   * Resolves the request's targets from the registry and dispatches.
   * @throws {DeviceNotFoundError} - single-device mode with an unknown id.
   */
  public async send(request: ISendRequest): Promise<DispatchResult> {
    const { message, options = {} } = request;

    if (request.deviceId) {
      const device = await this.devices.findById(request.deviceId);
      if (!device) {
        throw new DeviceNotFoundError(request.deviceId);
      }
      return this.dispatch.sendMessage(device, message, options);
    }

    if (request.provider !== undefined) {
      const set = await this.devices.byProvider(request.provider, request.deviceIds);
      return this.dispatch.sendMessage(set, message, options);
    }

    const targets = await this.devices.findByIds(request.deviceIds ?? []);
    return this.dispatch.sendMessage(targets, message, options);
  }

  /**
   * Lists audit records, newest first, each with a one-line summary.
   */
  public async listNotifications(query: NotificationListQuery): Promise<{ total: number; data: INotificationSummary[] }> {
    const page = await this.notifications.list(query);

    const firstIds = page.data.map(record => record.deviceIds[0]).filter((id): id is string => id !== undefined);
    const firstDevices = new Map((await this.devices.findByIds(firstIds)).map(device => [device.id, device]));

    return {
      total: page.total,
      data: page.data.map(record => {
        const firstId = record.deviceIds[0];
        return {
          ...record,
          summary: formatNotificationSummary(record, firstId ? firstDevices.get(firstId) : undefined),
        };
      }),
    };
  }
}
