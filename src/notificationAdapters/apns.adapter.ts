// src/notificationAdapters/apns.adapter.ts
import fs from 'fs';
import http2 from 'http2';
import tls from 'tls';
import { z } from 'zod';
import { ApnsConfig } from '../config/env';
import { inBatches } from '../utils/batching';
import { ProviderTransportError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ApnsDeliveryResult, ApnsResponse, ApnsSendOptions, IApnsClient } from './push.interface';

export const APNS_MAX_PAYLOAD_BYTES = 4096;

const FEEDBACK_HEADER_BYTES = 6; // uint32 timestamp + uint16 token length

const ApnsErrorBodySchema = z.object({ reason: z.string() });

/**
 * Builds the APNS JSON payload. Custom keys from `extra` sit beside the `aps` dictionary.
 * @throws {ProviderTransportError} - when the encoded payload exceeds APNS_MAX_PAYLOAD_BYTES.
 */
export function buildApnsPayload(alert: string, options: ApnsSendOptions): Record<string, unknown> {
  const aps: Record<string, unknown> = { alert };

  if (options.badge !== undefined) aps.badge = options.badge;
  if (options.sound !== undefined) aps.sound = options.sound;
  if (options.category !== undefined) aps.category = options.category;
  if (options.contentAvailable) aps['content-available'] = 1;

  const payload = { ...(options.extra ?? {}), aps };

  const size = Buffer.byteLength(JSON.stringify(payload), 'utf8');
  if (size > APNS_MAX_PAYLOAD_BYTES) {
    throw new ProviderTransportError('apns', `Payload of ${size} bytes exceeds ${APNS_MAX_PAYLOAD_BYTES}`);
  }

  return payload;
}

/** Request headers derived from the send options. */
export function buildApnsHeaders(topic: string | undefined, options: ApnsSendOptions): Record<string, string> {
  const headers: Record<string, string> = { 'apns-push-type': 'alert' };

  if (topic) headers['apns-topic'] = topic;
  if (options.expiration !== undefined) headers['apns-expiration'] = String(options.expiration);
  if (options.priority !== undefined) headers['apns-priority'] = String(options.priority);

  return headers;
}

/**
 * Decodes the feedback service stream: repeated frames of
 * `uint32 timestamp | uint16 token length | token`. A truncated trailing frame is dropped.
 */
export function parseFeedbackFrames(buffer: Buffer): string[] {
  const tokens: string[] = [];
  let offset = 0;

  while (offset + FEEDBACK_HEADER_BYTES <= buffer.length) {
    const tokenLength = buffer.readUInt16BE(offset + 4);
    const start = offset + FEEDBACK_HEADER_BYTES;
    const end = start + tokenLength;
    if (end > buffer.length) break;

    tokens.push(buffer.subarray(start, end).toString('hex'));
    offset = end;
  }

  return tokens;
}

function parseReason(body: string): string | undefined {
  if (!body) return undefined;
  try {
    const parsed = ApnsErrorBodySchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.reason : undefined;
  } catch {
    return undefined; // Non-JSON error body; the status code is kept
  }
}

export class APNSAdapter implements IApnsClient {
  public providerName = 'apns' as const;

  constructor(private readonly config: ApnsConfig) {}

  public async sendSingle(registrationId: string, alert: string, options: ApnsSendOptions): Promise<ApnsResponse> {
    const response = await this.send([registrationId], alert, options);
    const [result] = response.results;
    if (result && result.status !== 200) {
      throw new ProviderTransportError('apns', `Delivery rejected: ${result.reason ?? 'unknown reason'}`, {
        statusCode: result.status,
        reason: result.reason,
      });
    }
    return response;
  }

  /** One HTTP/2 session, one concurrent stream per token. Per-token rejections are reported, not thrown. */
  public async sendBulk(registrationIds: string[], alert: string, options: ApnsSendOptions): Promise<ApnsResponse> {
    return this.send(registrationIds, alert, options);
  }

  public async fetchInactiveIds(credentialFile?: string): Promise<string[]> {
    const pem = this.readCredentials(credentialFile);
    const ca = this.readCa();
    const data = await new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const socket = tls.connect({
        host: this.config.feedbackHost,
        port: this.config.feedbackPort,
        cert: pem,
        key: pem,
        ca,
      });
      socket.setTimeout(this.config.timeoutMs, () => {
        socket.destroy();
        reject(new ProviderTransportError('apns', `Feedback service timed out after ${this.config.timeoutMs} ms`));
      });
      socket.on('data', (chunk: Buffer) => chunks.push(chunk));
      socket.on('end', () => resolve(Buffer.concat(chunks)));
      socket.on('error', error => reject(new ProviderTransportError('apns', `Feedback service: ${error.message}`)));
    });

    const tokens = parseFeedbackFrames(data);
    logger.info('APNS feedback fetched', { inactive: tokens.length });
    return tokens;
  }

  private async send(registrationIds: string[], alert: string, options: ApnsSendOptions): Promise<ApnsResponse> {
    if (registrationIds.length === 0) {
      return { provider: 'apns', results: [] };
    }

    const body = JSON.stringify(buildApnsPayload(alert, options));
    const headers = buildApnsHeaders(this.config.topic, options);
    const pem = this.readCredentials();

    const session = http2.connect(`https://${this.config.host}:${this.config.port}`, {
      cert: pem,
      key: pem,
      ca: this.readCa(),
    });
    session.on('error', error => logger.error('APNS session error', { error: error.message }));

    // Streams of a batch are multiplexed on the one session; results keep input order.
    const results: ApnsDeliveryResult[] = [];
    try {
      for (const batch of inBatches(registrationIds, this.config.maxConcurrentStreams)) {
        results.push(...(await Promise.all(batch.map(id => this.post(session, id, body, headers)))));
      }
    } finally {
      session.close();
    }

    logger.debug('APNS requests completed', {
      recipients: registrationIds.length,
      rejected: results.filter(r => r.status !== 200).length,
    });

    return { provider: 'apns', results };
  }

  private post(
    session: http2.ClientHttp2Session,
    registrationId: string,
    body: string,
    headers: Record<string, string>
  ): Promise<ApnsDeliveryResult> {
    return new Promise((resolve, reject) => {
      const stream = session.request({
        ':method': 'POST',
        ':path': `/3/device/${registrationId}`,
        'content-type': 'application/json',
        ...headers,
      });

      let status = 0;
      let apnsId: string | undefined;
      const chunks: Buffer[] = [];

      stream.on('response', responseHeaders => {
        status = Number(responseHeaders[':status']);
        const id = responseHeaders['apns-id'];
        apnsId = typeof id === 'string' ? id : undefined;
      });
      stream.on('data', (chunk: Buffer | string) => chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
      stream.on('end', () =>
        resolve({ registrationId, status, apnsId, reason: parseReason(Buffer.concat(chunks).toString('utf8')) })
      );
      stream.on('error', error => reject(new ProviderTransportError('apns', error.message)));
      stream.setTimeout(this.config.timeoutMs, () => {
        stream.close(http2.constants.NGHTTP2_CANCEL);
        reject(new ProviderTransportError('apns', `Request timed out after ${this.config.timeoutMs} ms`));
      });

      stream.end(body);
    });
  }

  private readCa(): Buffer | undefined {
    const path = this.config.caFile;
    if (!path) return undefined;
    try {
      return fs.readFileSync(path);
    } catch (error) {
      throw new ProviderTransportError('apns', `Cannot read CA file ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private readCredentials(credentialFile?: string): Buffer {
    const path = credentialFile ?? this.config.certificate;
    if (!path) {
      throw new ProviderTransportError('apns', 'APNS_CERTIFICATE is not configured');
    }
    try {
      return fs.readFileSync(path);
    } catch (error) {
      throw new ProviderTransportError('apns', `Cannot read certificate ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
