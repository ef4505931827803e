import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export interface ApnsConfig {
  certificate?: string;
  /** Extra CA bundle trusted for both APNS endpoints, e.g. behind a TLS-inspecting proxy. */
  caFile?: string;
  host: string;
  port: number;
  feedbackHost: string;
  feedbackPort: number;
  topic?: string;
  /** Idle limit for one HTTP/2 stream or the feedback socket. */
  timeoutMs: number;
  /** Streams opened at once on the HTTP/2 session. */
  maxConcurrentStreams: number;
}

export interface GcmConfig {
  apiKey?: string;
  postUrl: string;
  maxRecipients: number;
}

export interface EnvConfig {
  NODE_ENV: string;
  PORT: number;
  MONGODB_URI: string;
  ACCESS_TOKEN_SECRET: string;
  OWNER_MODEL: string;
  APNS: ApnsConfig;
  GCM: GcmConfig;
}

function optional(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim() !== '' ? value : undefined;
}

function parseInteger(key: string, fallback: number, min = 1): number {
  const raw = optional(key);
  if (raw === undefined) return fallback;

  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid integer for environment variable: ${key}`);
  }
  if (parsed < min) {
    throw new Error(`Invalid integer for environment variable: ${key} must be at least ${min}`);
  }
  return parsed;
}

/**
 * Reads and validates the process environment.
 * @throws {Error} - 'Missing required environment variable: KEY', or 'Invalid integer…' for
 *   a numeric setting that does not parse or is below 1.
 */
export function loadEnv(): EnvConfig {
  const required = ['MONGODB_URI', 'ACCESS_TOKEN_SECRET'];

  for (const key of required) {
    if (!process.env[key]) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
  }

  const MONGODB_URI = process.env.MONGODB_URI;
  const ACCESS_TOKEN_SECRET = process.env.ACCESS_TOKEN_SECRET;

  // These are guaranteed to exist due to validation above
  if (!MONGODB_URI || !ACCESS_TOKEN_SECRET) {
    throw new Error('Environment validation failed');
  }

  return {
    NODE_ENV: process.env.NODE_ENV || 'development',
    PORT: parseInteger('PORT', 5000),
    MONGODB_URI,
    ACCESS_TOKEN_SECRET,
    OWNER_MODEL: optional('OWNER_MODEL') ?? 'User',
    APNS: {
      certificate: optional('APNS_CERTIFICATE'),
      caFile: optional('APNS_CA_FILE'),
      host: optional('APNS_HOST') ?? 'api.sandbox.push.apple.com',
      port: parseInteger('APNS_PORT', 443),
      feedbackHost: optional('APNS_FEEDBACK_HOST') ?? 'feedback.sandbox.push.apple.com',
      feedbackPort: parseInteger('APNS_FEEDBACK_PORT', 2196),
      topic: optional('APNS_TOPIC'),
      timeoutMs: parseInteger('APNS_TIMEOUT_MS', 10000),
      maxConcurrentStreams: parseInteger('APNS_MAX_CONCURRENT_STREAMS', 100),
    },
    GCM: {
      apiKey: optional('GCM_API_KEY'),
      postUrl: optional('GCM_POST_URL') ?? 'https://fcm.googleapis.com/fcm/send',
      maxRecipients: parseInteger('GCM_MAX_RECIPIENTS', 1000),
    },
  };
}
