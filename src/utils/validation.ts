import { z } from 'zod';
import { PushSendOptions } from '../notificationAdapters/push.interface';

const MAX_GCM_TIME_TO_LIVE = 2419200; // 4 weeks

/**
 * Send options as accepted from untrusted input (request bodies, job payloads).
 */
export const PushSendOptionsSchema: z.ZodType<PushSendOptions> = z
  .object({
    extra: z.record(z.unknown()).optional(),
    badge: z.number().int().nonnegative().optional(),
    sound: z.string().optional(),
    category: z.string().optional(),
    contentAvailable: z.boolean().optional(),
    expiration: z.number().int().nonnegative().optional(),
    priority: z.union([z.literal(5), z.literal(10)]).optional(),
    collapseKey: z.string().optional(),
    delayWhileIdle: z.boolean().optional(),
    timeToLive: z.number().int().min(0).max(MAX_GCM_TIME_TO_LIVE).optional(),
  })
  .strict();

/**
 * Parses send options, defaulting to none.
 * @throws {Error} - 'InvalidOptions: <field>: <reason>'
 */
export function parsePushSendOptions(value: unknown): PushSendOptions {
  if (value === undefined || value === null) return {};

  const parsed = PushSendOptionsSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'options';
    throw new Error(`InvalidOptions: ${field}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
