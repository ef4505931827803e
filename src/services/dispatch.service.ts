// src/services/dispatch.service.ts
import {
  DeviceProvider,
  IDevice,
  isDeviceOf,
  ProviderDeviceSet,
  PushDevice,
} from '../models/device.model';
import {
  ApnsSendOptions,
  GcmData,
  GcmSendOptions,
  IApnsClient,
  IGcmClient,
  ProviderResponse,
  PushSendOptions,
} from '../notificationAdapters/push.interface';
import { IDeviceRepository, ProviderPair } from '../repositories/device.repository';
import { INotificationLog } from '../repositories/notification.repository';
import { ProviderName, UnknownProviderError } from '../utils/errors';
import { logger } from '../utils/logger';

export type DispatchTarget = IDevice | ProviderDeviceSet | readonly IDevice[];

/** Per-provider responses of a grouped send. Providers with no devices are absent. */
export type GroupedDispatchResult = Partial<Record<ProviderName, ProviderResponse>>;

export type DispatchResult = ProviderResponse | GroupedDispatchResult | null;

export interface DispatchDependencies {
  devices: IDeviceRepository;
  notifications: INotificationLog;
  apns: IApnsClient;
  gcm: IGcmClient;
}

/** How one provider turns a message and options into its client's call. */
interface ProviderStrategy<TPayload, TOptions> {
  name: ProviderName;
  buildPayload(message: string, options: PushSendOptions): { payload: TPayload; options: TOptions };
  singleSend(registrationId: string, payload: TPayload, options: TOptions): Promise<ProviderResponse>;
  bulkSend(registrationIds: string[], payload: TPayload, options: TOptions): Promise<ProviderResponse>;
}

interface ProviderDelivery {
  name: ProviderName;
  single(registrationId: string, message: string, options: PushSendOptions): Promise<ProviderResponse>;
  bulk(registrationIds: string[], message: string, options: PushSendOptions): Promise<ProviderResponse>;
}

function defineStrategy<TPayload, TOptions>(strategy: ProviderStrategy<TPayload, TOptions>): ProviderDelivery {
  return {
    name: strategy.name,
    single: (registrationId, message, options) => {
      const built = strategy.buildPayload(message, options);
      return strategy.singleSend(registrationId, built.payload, built.options);
    },
    bulk: (registrationIds, message, options) => {
      const built = strategy.buildPayload(message, options);
      return strategy.bulkSend(registrationIds, built.payload, built.options);
    },
  };
}

/** APNS carries the message as the alert; `extra` stays with the options as custom payload keys. */
export function buildApnsCall(message: string, options: PushSendOptions): { payload: string; options: ApnsSendOptions } {
  const { extra, badge, sound, category, contentAvailable, expiration, priority } = options;
  return {
    payload: message,
    options: { extra, badge, sound, category, contentAvailable, expiration, priority },
  };
}

/** GCM has no message field, so the message is merged into the `extra` mapping. */
export function buildGcmCall(message: string, options: PushSendOptions): { payload: GcmData; options: GcmSendOptions } {
  const { extra, collapseKey, delayWhileIdle, timeToLive } = options;
  return {
    payload: { ...(extra ?? {}), message },
    options: { collapseKey, delayWhileIdle, timeToLive },
  };
}

/**
 * Resolves a stored device into its provider variant without copying it.
 * @throws {UnknownProviderError}
 */
export function resolveDevice(device: IDevice): PushDevice {
  if (isDeviceOf(DeviceProvider.APNS)(device)) return device;
  if (isDeviceOf(DeviceProvider.GCM)(device)) return device;
  throw new UnknownProviderError(device.provider);
}

function toProvider(tag: number): DeviceProvider {
  if (tag === DeviceProvider.APNS) return DeviceProvider.APNS;
  if (tag === DeviceProvider.GCM) return DeviceProvider.GCM;
  throw new UnknownProviderError(tag);
}

/**
 * Buckets device ids by provider, keeping input order inside each bucket.
 * @throws {UnknownProviderError} - on the first unrecognised tag.
 */
export function groupDeviceIdsByProvider(pairs: readonly ProviderPair[]): Map<DeviceProvider, string[]> {
  const buckets = new Map<DeviceProvider, string[]>();
  for (const { id, provider } of pairs) {
    const key = toProvider(provider);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(id);
    } else {
      buckets.set(key, [id]);
    }
  }
  return buckets;
}

/** Drops repeated devices, keeping the first occurrence of each id. */
export function uniqueDevices<T extends IDevice>(devices: readonly T[]): T[] {
  const seen = new Set<string>();
  return devices.filter(device => {
    if (seen.has(device.id)) return false;
    seen.add(device.id);
    return true;
  });
}

function isDeviceCollection(target: DispatchTarget): target is readonly IDevice[] {
  return Array.isArray(target);
}

/**
 * Dispatch core: resolves targets, records one notification per call, then hands
 * registration ids to the provider clients. The record is always written before the
 * provider call and is kept if that call fails.
 */
export class DispatchService {
  private readonly strategies: Record<DeviceProvider, ProviderDelivery>;

  constructor(private readonly deps: DispatchDependencies) {
    const { apns, gcm } = deps;
    this.strategies = {
      [DeviceProvider.APNS]: defineStrategy({
        name: 'apns',
        buildPayload: buildApnsCall,
        singleSend: (registrationId, alert, options) => apns.sendSingle(registrationId, alert, options),
        bulkSend: (registrationIds, alert, options) => apns.sendBulk(registrationIds, alert, options),
      }),
      [DeviceProvider.GCM]: defineStrategy({
        name: 'gcm',
        buildPayload: buildGcmCall,
        singleSend: (registrationId, data, options) => gcm.sendSingle(registrationId, data, options),
        bulkSend: (registrationIds, data, options) => gcm.sendBulk(registrationIds, data, options),
      }),
    };
  }

  /**
   * Sends `message` to one device, a provider-scoped set, or any (possibly mixed) collection.
   * Empty sets and collections return null without recording anything.
   */
  public sendMessage(target: IDevice, message: string, options?: PushSendOptions): Promise<ProviderResponse>;
  public sendMessage(target: ProviderDeviceSet, message: string, options?: PushSendOptions): Promise<ProviderResponse | null>;
  public sendMessage(target: readonly IDevice[], message: string, options?: PushSendOptions): Promise<GroupedDispatchResult | null>;
  public sendMessage(target: DispatchTarget, message: string, options?: PushSendOptions): Promise<DispatchResult>;
  public async sendMessage(target: DispatchTarget, message: string, options: PushSendOptions = {}): Promise<DispatchResult> {
    if (isDeviceCollection(target)) {
      return this.sendToCollection(target, message, options);
    }
    if ('devices' in target) {
      return this.sendToProviderSet(target, message, options);
    }
    return this.sendToDevice(target, message, options);
  }

  /** Generic path: the device's provider is looked up from its stored tag. */
  public async sendToDevice(device: IDevice, message: string, options: PushSendOptions = {}): Promise<ProviderResponse> {
    const resolved = resolveDevice(device);
    await this.record([device], message, options);
    return this.deliverSingle(resolved, message, options);
  }

  /** Provider-specific path for a device that is already resolved. */
  public async sendToResolvedDevice(device: PushDevice, message: string, options: PushSendOptions = {}): Promise<ProviderResponse> {
    await this.record([device], message, options);
    return this.deliverSingle(device, message, options);
  }

  /** Bulk path for a set obtained from `IDeviceRepository.byProvider`. */
  public async sendToProviderSet(
    set: ProviderDeviceSet,
    message: string,
    options: PushSendOptions = {}
  ): Promise<ProviderResponse | null> {
    if (set.devices.length === 0) return null;

    const strategy = this.strategyFor(toProvider(set.provider));
    const unique = { provider: set.provider, devices: uniqueDevices(set.devices) };
    await this.record(unique.devices, message, options);
    return this.deliverBulk(strategy, unique, message, options);
  }

  /**
   * Grouped path: one projection query, one bucket per provider, one bulk call per bucket.
   * Every tag is resolved before the record is written. Repeated devices are recorded and sent once.
   */
  public async sendToCollection(
    collection: readonly IDevice[],
    message: string,
    options: PushSendOptions = {}
  ): Promise<GroupedDispatchResult | null> {
    if (collection.length === 0) return null;

    const devices = uniqueDevices(collection);
    const pairs = await this.deps.devices.providerPairs(devices.map(device => device.id));
    const buckets = groupDeviceIdsByProvider(pairs);

    await this.record(devices, message, options);

    const results: GroupedDispatchResult = {};
    for (const [provider, ids] of buckets) {
      const strategy = this.strategyFor(provider);
      const set = await this.deps.devices.byProvider(provider, ids);
      results[strategy.name] = await this.deliverBulk(strategy, set, message, options);
    }
    return results;
  }

  /**
   * Registration ids APNS reports as dead. GCM exposes no equivalent signal.
   */
  public async getExpiredTokens(credentialFile?: string): Promise<string[]> {
    const tokens = await this.deps.apns.fetchInactiveIds(credentialFile);
    return [...new Set(tokens)];
  }

  private strategyFor(provider: DeviceProvider): ProviderDelivery {
    return this.strategies[provider];
  }

  private async record(devices: readonly IDevice[], message: string, options: PushSendOptions): Promise<void> {
    const notification = await this.deps.notifications.record(devices, message, options);
    logger.info('Notification recorded', { notificationId: notification.id, devices: devices.length });
  }

  private deliverSingle(device: PushDevice, message: string, options: PushSendOptions): Promise<ProviderResponse> {
    const strategy = this.strategyFor(device.provider);
    logger.debug('Dispatching single push', { provider: strategy.name, device: device.id });
    return strategy.single(device.registrationId, message, options);
  }

  /** Inactive devices stay on the record but are left out of the id list. */
  private deliverBulk(
    strategy: ProviderDelivery,
    set: ProviderDeviceSet,
    message: string,
    options: PushSendOptions
  ): Promise<ProviderResponse> {
    const registrationIds = set.devices.filter(device => device.active).map(device => device.registrationId);
    logger.info('Dispatching bulk push', {
      provider: strategy.name,
      recipients: registrationIds.length,
      skippedInactive: set.devices.length - registrationIds.length,
    });
    return strategy.bulk(registrationIds, message, options);
  }
}
