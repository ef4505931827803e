// src/models/device.model.ts
import { Schema, model, models, Model, Types } from 'mongoose';

export enum DeviceProvider {
  APNS = 0,
  GCM = 1,
}

/**
 * A stored device identity. `provider` is the raw tag read from storage; it is only
 * trusted after resolution into one of the tagged variants below.
 */
export interface IDevice {
  id: string;
  name?: string;
  active: boolean;
  owner?: string;
  createdAt: Date;
  deviceId?: string;
  registrationId: string;
  provider: number;
}

export interface ApnsDevice extends IDevice {
  provider: DeviceProvider.APNS;
}

export interface GcmDevice extends IDevice {
  provider: DeviceProvider.GCM;
}

export type PushDevice = ApnsDevice | GcmDevice;

export type DeviceOf<P extends DeviceProvider> = Extract<PushDevice, { provider: P }>;

/** A provider-scoped collection, as returned by the registry's `byProvider` view. */
export interface ProviderDeviceSet<P extends DeviceProvider = DeviceProvider> {
  provider: P;
  devices: DeviceOf<P>[];
}

export function isDeviceOf<P extends DeviceProvider>(provider: P) {
  return (device: IDevice): device is DeviceOf<P> => device.provider === provider;
}

/** Display label: name, then device id, then "<Variant> for <owner>". */
export function describeDevice(device: IDevice): string {
  if (device.name) return device.name;
  if (device.deviceId) return device.deviceId;

  const variant =
    device.provider === DeviceProvider.APNS ? 'APNSDevice' : device.provider === DeviceProvider.GCM ? 'GCMDevice' : 'Device';
  return `${variant} for ${device.owner ?? 'unknown user'}`;
}

// --- Persistence ---

export interface IDeviceDocument {
  _id?: Types.ObjectId;
  name?: string;
  active: boolean;
  owner?: Types.ObjectId;
  deviceId?: string;
  registrationId: string;
  provider: DeviceProvider;
  createdAt?: Date;
}

/**
 * Builds the Device model. The owner reference points at the configured user model,
 * which is why the schema is not declared at module load.
 */
export function createDeviceModel(ownerModel: string): Model<IDeviceDocument> {
  const existing: Model<IDeviceDocument> | undefined = models.Device;
  if (existing) return existing;

  const DeviceSchema = new Schema<IDeviceDocument>(
    {
      name: { type: String, maxlength: 255 },
      active: { type: Boolean, default: true, index: true }, // Inactive devices are not sent notifications
      owner: { type: Schema.Types.ObjectId, ref: ownerModel, index: true },
      deviceId: { type: String, maxlength: 255, unique: true, sparse: true },
      registrationId: { type: String, required: true },
      provider: {
        type: Number,
        enum: [DeviceProvider.APNS, DeviceProvider.GCM],
        required: true,
        immutable: true,
        index: true,
      },
    },
    { timestamps: { createdAt: 'createdAt', updatedAt: false } }
  );

  DeviceSchema.index({ provider: 1, registrationId: 1 });

  return model<IDeviceDocument>('Device', DeviceSchema);
}
