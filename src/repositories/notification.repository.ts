// src/repositories/notification.repository.ts
import { Types } from 'mongoose';
import { IDevice } from '../models/device.model';
import { INotificationDocument, INotificationRecord, NotificationModel } from '../models/notification.model';
import { PushSendOptions } from '../notificationAdapters/push.interface';
import { PaginationQuery } from '../types/pagination-dtos';
import { serializeExtraArgs } from '../utils/serialize';

export interface NotificationListQuery extends PaginationQuery {
  deviceId?: string;
}

export interface NotificationPage {
  total: number;
  data: INotificationRecord[];
}

/**
 * Notification Log. Records are append-only.
 */
export interface INotificationLog {
  /** Creates the single audit record for one dispatch call. */
  record(devices: readonly IDevice[], message: string, options: PushSendOptions): Promise<INotificationRecord>;

  /** Newest first. */
  list(query: NotificationListQuery): Promise<NotificationPage>;
}

function toRecord(doc: INotificationDocument & { _id: Types.ObjectId }): INotificationRecord {
  return {
    id: doc._id.toString(),
    deviceIds: doc.devices.map(device => device.toString()),
    message: doc.message,
    extraArgs: doc.extraArgs,
    sentAt: doc.sentAt,
  };
}

export class MongoNotificationLog implements INotificationLog {
  public async record(devices: readonly IDevice[], message: string, options: PushSendOptions): Promise<INotificationRecord> {
    const notification = new NotificationModel({
      devices: devices.map(device => new Types.ObjectId(device.id)),
      message,
      extraArgs: serializeExtraArgs(options),
    });
    await notification.save();
    return toRecord(notification.toObject());
  }

  public async list(query: NotificationListQuery): Promise<NotificationPage> {
    const filter = query.deviceId && Types.ObjectId.isValid(query.deviceId)
      ? { devices: new Types.ObjectId(query.deviceId) }
      : {};
    const skip = (query.page - 1) * query.perPage;

    const [total, docs] = await Promise.all([
      NotificationModel.countDocuments(filter),
      NotificationModel.find(filter).sort({ sentAt: -1 }).skip(skip).limit(query.perPage).lean(),
    ]);

    return { total, data: docs.map(toRecord) };
  }
}
