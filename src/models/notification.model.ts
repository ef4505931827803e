import { Schema, model, Types } from 'mongoose';

/** One audit entry per dispatch call, linked to every targeted device. */
export interface INotificationRecord {
  id: string;
  deviceIds: string[];
  message: string;
  extraArgs: string; // JSON-serialized send options
  sentAt: Date;
}

export interface INotificationDocument {
  _id?: Types.ObjectId;
  devices: Types.ObjectId[];
  message: string;
  extraArgs: string;
  sentAt: Date;
}

const NotificationSchema = new Schema<INotificationDocument>({
  devices: [{ type: Schema.Types.ObjectId, ref: 'Device', index: true }],
  message: { type: String, default: '' },
  extraArgs: { type: String, default: '{}' },
  sentAt: { type: Date, default: Date.now, immutable: true, index: true },
});

export const NotificationModel = model<INotificationDocument>('Notification', NotificationSchema);
