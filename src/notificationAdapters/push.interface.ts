// src/notificationAdapters/push.interface.ts
import { ProviderName } from '../utils/errors';

/**
 * Keyword options accepted by a send call. `extra` is a free-form mapping; the
 * remaining keys are read by whichever provider understands them.
 */
export interface PushSendOptions {
  extra?: Record<string, unknown>;
  // APNS
  badge?: number;
  sound?: string;
  category?: string;
  contentAvailable?: boolean;
  expiration?: number; // Unix seconds
  priority?: 5 | 10;
  // GCM
  collapseKey?: string;
  delayWhileIdle?: boolean;
  timeToLive?: number; // Seconds
}

export type ApnsSendOptions = Pick<
  PushSendOptions,
  'extra' | 'badge' | 'sound' | 'category' | 'contentAvailable' | 'expiration' | 'priority'
>;

export type GcmSendOptions = Pick<PushSendOptions, 'collapseKey' | 'delayWhileIdle' | 'timeToLive'>;

/** GCM has no message field: the message travels inside `data` under the `message` key. */
export type GcmData = Record<string, unknown>;

// --- Responses ---

export interface ApnsDeliveryResult {
  registrationId: string;
  status: number; // HTTP status returned for this token
  apnsId?: string;
  reason?: string; // e.g. 'BadDeviceToken', 'Unregistered'
}

export interface ApnsResponse {
  provider: 'apns';
  results: ApnsDeliveryResult[];
}

export interface GcmDeliveryResult {
  registrationId: string;
  messageId?: string;
  canonicalRegistrationId?: string;
  error?: string;
}

export interface GcmResponse {
  provider: 'gcm';
  multicastIds: number[];
  success: number;
  failure: number;
  canonicalIds: number;
  results: GcmDeliveryResult[];
}

export type ProviderResponse = ApnsResponse | GcmResponse;

// --- Clients ---

interface IPushClient<TPayload, TOptions> {
  providerName: ProviderName;

  /** Sends one message to one registration id. */
  sendSingle(registrationId: string, payload: TPayload, options: TOptions): Promise<ProviderResponse>;

  /** Sends one message to many registration ids in as few provider calls as the protocol allows. */
  sendBulk(registrationIds: string[], payload: TPayload, options: TOptions): Promise<ProviderResponse>;
}

/**
 * The Standard Interface for the Apple-style push client. The payload is the alert text.
 */
export interface IApnsClient extends IPushClient<string, ApnsSendOptions> {
  providerName: 'apns';

  /** Registration ids the provider reports as permanently undeliverable. */
  fetchInactiveIds(credentialFile?: string): Promise<string[]>;
}

/**
 * The Standard Interface for the Google-style push client. The payload is the data mapping.
 */
export interface IGcmClient extends IPushClient<GcmData, GcmSendOptions> {
  providerName: 'gcm';
}
