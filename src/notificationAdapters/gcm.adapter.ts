// src/notificationAdapters/gcm.adapter.ts
import { z } from 'zod';
import { GcmConfig } from '../config/env';
import { inBatches } from '../utils/batching';
import { ProviderTransportError } from '../utils/errors';
import { logger } from '../utils/logger';
import { GcmData, GcmDeliveryResult, GcmResponse, GcmSendOptions, IGcmClient } from './push.interface';

const GcmResultSchema = z.object({
  message_id: z.string().optional(),
  registration_id: z.string().optional(),
  error: z.string().optional(),
});

const GcmResponseSchema = z.object({
  multicast_id: z.number(),
  success: z.number(),
  failure: z.number(),
  canonical_ids: z.number(),
  results: z.array(GcmResultSchema).default([]),
});

type GcmTarget = { to: string } | { registration_ids: string[] };

/** Builds the JSON body for the GCM HTTP endpoint. Undefined options are left out. */
export function buildGcmBody(target: GcmTarget, data: GcmData, options: GcmSendOptions): Record<string, unknown> {
  const body: Record<string, unknown> = { ...target, data };

  if (options.collapseKey !== undefined) body.collapse_key = options.collapseKey;
  if (options.delayWhileIdle !== undefined) body.delay_while_idle = options.delayWhileIdle;
  if (options.timeToLive !== undefined) body.time_to_live = options.timeToLive;

  return body;
}

function emptyResponse(): GcmResponse {
  return { provider: 'gcm', multicastIds: [], success: 0, failure: 0, canonicalIds: 0, results: [] };
}

export class GCMAdapter implements IGcmClient {
  public providerName = 'gcm' as const;

  constructor(private readonly config: GcmConfig) {}

  public async sendSingle(registrationId: string, data: GcmData, options: GcmSendOptions): Promise<GcmResponse> {
    const response = await this.post([registrationId], buildGcmBody({ to: registrationId }, data, options));
    const [result] = response.results;
    if (result?.error) {
      throw new ProviderTransportError('gcm', `Delivery rejected: ${result.error}`, { reason: result.error });
    }
    return response;
  }

  public async sendBulk(registrationIds: string[], data: GcmData, options: GcmSendOptions): Promise<GcmResponse> {
    const merged = emptyResponse();
    if (registrationIds.length === 0) {
      return merged;
    }

    for (const chunk of inBatches(registrationIds, this.config.maxRecipients)) {
      const response = await this.post(chunk, buildGcmBody({ registration_ids: chunk }, data, options));
      merged.multicastIds.push(...response.multicastIds);
      merged.success += response.success;
      merged.failure += response.failure;
      merged.canonicalIds += response.canonicalIds;
      merged.results.push(...response.results);
    }

    return merged;
  }

  private async post(registrationIds: string[], body: Record<string, unknown>): Promise<GcmResponse> {
    if (!this.config.apiKey) {
      throw new ProviderTransportError('gcm', 'GCM_API_KEY is not configured');
    }

    let res: Response;
    try {
      res = await fetch(this.config.postUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `key=${this.config.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new ProviderTransportError('gcm', error instanceof Error ? error.message : 'Request failed');
    }

    if (!res.ok) {
      const text = await res.text();
      throw new ProviderTransportError('gcm', `HTTP ${res.status}: ${text}`, { statusCode: res.status });
    }

    const parsed = GcmResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderTransportError('gcm', 'Malformed response body', { statusCode: res.status });
    }

    const results: GcmDeliveryResult[] = parsed.data.results.map((result, index) => ({
      registrationId: registrationIds[index] ?? '',
      messageId: result.message_id,
      canonicalRegistrationId: result.registration_id,
      error: result.error,
    }));

    logger.debug('GCM request completed', {
      recipients: registrationIds.length,
      success: parsed.data.success,
      failure: parsed.data.failure,
    });

    return {
      provider: 'gcm',
      multicastIds: [parsed.data.multicast_id],
      success: parsed.data.success,
      failure: parsed.data.failure,
      canonicalIds: parsed.data.canonical_ids,
      results,
    };
  }
}
