// src/repositories/device.repository.ts
import { Model, Types } from 'mongoose';
import {
  createDeviceModel,
  DeviceOf,
  DeviceProvider,
  IDevice,
  IDeviceDocument,
  isDeviceOf,
  ProviderDeviceSet,
} from '../models/device.model';
import { UnknownProviderError } from '../utils/errors';

export interface NewDeviceInput {
  name?: string;
  active?: boolean;
  owner?: string;
  deviceId?: string;
  registrationId: string;
}

export interface DeviceUpdate {
  name?: string;
  active?: boolean;
}

/** `(id, provider)` projection used by the grouping step. */
export interface ProviderPair {
  id: string;
  provider: number;
}

/**
 * Device Registry. Provider-scoped collections are only obtainable through `byProvider`.
 */
export interface IDeviceRepository {
  /** Devices tagged with `provider`, optionally restricted to `ids` (in that order). */
  byProvider<P extends DeviceProvider>(provider: P, ids?: readonly string[]): Promise<ProviderDeviceSet<P>>;

  /** One projection query over `ids`; unknown ids are absent from the result. */
  providerPairs(ids: readonly string[]): Promise<ProviderPair[]>;

  /** Stores a device under `provider`. A known `deviceId` is re-registered in place. */
  register<P extends DeviceProvider>(provider: P, input: NewDeviceInput): Promise<DeviceOf<P>>;

  findById(id: string): Promise<IDevice | null>;
  findByIds(ids: readonly string[]): Promise<IDevice[]>;
  listByOwner(owner: string): Promise<IDevice[]>;
  update(id: string, changes: DeviceUpdate): Promise<IDevice | null>;

  /** Marks matching devices of `provider` inactive and returns how many changed. */
  deactivateByRegistrationIds(provider: DeviceProvider, registrationIds: readonly string[]): Promise<number>;
}

/** Restores the caller's id order on query results. */
export function orderByIds<T extends { id: string }>(items: T[], ids: readonly string[]): T[] {
  const position = new Map(ids.map((id, index) => [id, index]));
  return [...items].sort((a, b) => (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0));
}

function toObjectIds(ids: readonly string[]): Types.ObjectId[] {
  return ids.filter(id => Types.ObjectId.isValid(id)).map(id => new Types.ObjectId(id));
}

function toDevice(doc: IDeviceDocument & { _id: Types.ObjectId }): IDevice {
  return {
    id: doc._id.toString(),
    name: doc.name ?? undefined,
    active: doc.active,
    owner: doc.owner?.toString(),
    createdAt: doc.createdAt ?? new Date(0),
    deviceId: doc.deviceId ?? undefined,
    registrationId: doc.registrationId,
    provider: doc.provider,
  };
}

function narrow<P extends DeviceProvider>(provider: P, device: IDevice): DeviceOf<P> {
  if (!isDeviceOf(provider)(device)) {
    throw new UnknownProviderError(device.provider);
  }
  return device;
}

export class MongoDeviceRepository implements IDeviceRepository {
  private readonly model: Model<IDeviceDocument>;

  /** @param ownerModel - model name the `owner` reference points at (e.g. 'User'). */
  constructor(ownerModel: string) {
    this.model = createDeviceModel(ownerModel);
  }

  public async byProvider<P extends DeviceProvider>(provider: P, ids?: readonly string[]): Promise<ProviderDeviceSet<P>> {
    const filter = ids ? { provider, _id: { $in: toObjectIds(ids) } } : { provider };
    const docs = await this.model.find(filter).sort({ createdAt: 1 }).lean();
    const devices = docs.map(toDevice).filter(isDeviceOf(provider));
    return { provider, devices: ids ? orderByIds(devices, ids) : devices };
  }

  public async providerPairs(ids: readonly string[]): Promise<ProviderPair[]> {
    const docs = await this.model
      .find({ _id: { $in: toObjectIds(ids) } })
      .select('_id provider')
      .lean();
    const pairs = docs.map(doc => ({ id: doc._id.toString(), provider: doc.provider }));
    return orderByIds(pairs, ids);
  }

  /** One upsert: keyed by `(deviceId, provider)` when a hardware id is given, else a fresh id. */
  public async register<P extends DeviceProvider>(provider: P, input: NewDeviceInput): Promise<DeviceOf<P>> {
    const $set: Partial<IDeviceDocument> = { registrationId: input.registrationId, active: input.active ?? true };
    if (input.name !== undefined) $set.name = input.name;
    if (input.owner) $set.owner = new Types.ObjectId(input.owner);

    // A deviceId held by the other provider fails on the unique index (E11000)
    const filter = input.deviceId ? { deviceId: input.deviceId, provider } : { _id: new Types.ObjectId(), provider };
    const doc = await this.model
      .findOneAndUpdate(filter, { $set }, { new: true, upsert: true, runValidators: true, setDefaultsOnInsert: true })
      .lean();
    if (!doc) {
      throw new Error(`Device upsert returned no document for provider ${provider}`);
    }
    return narrow(provider, toDevice(doc));
  }

  public async findById(id: string): Promise<IDevice | null> {
    if (!Types.ObjectId.isValid(id)) return null;
    const doc = await this.model.findById(id).lean();
    return doc ? toDevice(doc) : null;
  }

  public async findByIds(ids: readonly string[]): Promise<IDevice[]> {
    const docs = await this.model.find({ _id: { $in: toObjectIds(ids) } }).lean();
    return orderByIds(docs.map(toDevice), ids);
  }

  public async listByOwner(owner: string): Promise<IDevice[]> {
    if (!Types.ObjectId.isValid(owner)) return [];
    const docs = await this.model.find({ owner: new Types.ObjectId(owner) }).sort({ createdAt: -1 }).lean();
    return docs.map(toDevice);
  }

  public async update(id: string, changes: DeviceUpdate): Promise<IDevice | null> {
    if (!Types.ObjectId.isValid(id)) return null;
    const $set: DeviceUpdate = {};
    if (changes.name !== undefined) $set.name = changes.name;
    if (changes.active !== undefined) $set.active = changes.active;

    const doc = await this.model.findByIdAndUpdate(id, { $set }, { new: true }).lean();
    return doc ? toDevice(doc) : null;
  }

  public async deactivateByRegistrationIds(provider: DeviceProvider, registrationIds: readonly string[]): Promise<number> {
    if (registrationIds.length === 0) return 0;
    const result = await this.model.updateMany(
      { provider, registrationId: { $in: [...registrationIds] }, active: true },
      { $set: { active: false } }
    );
    return result.modifiedCount;
  }
}
