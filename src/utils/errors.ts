// src/utils/errors.ts

export type ProviderName = 'apns' | 'gcm';

/** Base class for failures raised by the dispatch core and its collaborators. */
export class PushError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A device's stored provider tag matches neither APNS nor GCM. */
export class UnknownProviderError extends PushError {
  public readonly provider: unknown;

  constructor(provider: unknown) {
    super('unknown_provider', `UnknownProvider: ${String(provider)}`);
    this.provider = provider;
  }
}

/** The provider call failed (network, credentials, rejected or oversized payload). */
export class ProviderTransportError extends PushError {
  public readonly provider: ProviderName;
  public readonly statusCode?: number;
  public readonly reason?: string;

  constructor(provider: ProviderName, message: string, options: { statusCode?: number; reason?: string } = {}) {
    super('provider_error', `ProviderTransport(${provider}): ${message}`);
    this.provider = provider;
    this.statusCode = options.statusCode;
    this.reason = options.reason;
  }
}

export class DeviceNotFoundError extends PushError {
  constructor(id: string) {
    super('not_found', `DeviceNotFound: ${id}`);
  }
}
