import { Types } from 'mongoose';
import { PushSendOptions } from '../notificationAdapters/push.interface';

/**
 * Recursively serializes response values:
 * - Converts ObjectIds to strings
 * - Converts Dates to ISO 8601 strings
 * - Handles nested objects and arrays
 */
export function serializeDocument(doc: unknown): unknown {
  if (doc === undefined || doc === null) return doc;

  return JSON.parse(
    JSON.stringify(doc, (_key, value: unknown) => {
      if (value instanceof Types.ObjectId) {
        return value.toString();
      }
      return value;
    })
  );
}

/** Serializes send options into the opaque `extraArgs` blob stored on a notification. */
export function serializeExtraArgs(options: PushSendOptions): string {
  return JSON.stringify(options);
}
