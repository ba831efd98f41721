import { ConfigError } from './errors';
import {
  DEFAULT_BULK_LIMIT,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_RIVER_DATA_API_URL,
  DEFAULT_STATION_LIMIT,
} from './fetcher';

export const DEFAULT_ATTRIBUTION = 'By @CalgaryRiverBot';

export interface SocialCredentials {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessTokenSecret: string;
}

export interface RiverBotConfig {
  credentials: SocialCredentials | null;
  apiUrl: string;
  bulkLimit: number;
  stationLimit: number;
  requestTimeoutMs: number;
  attribution: string;
}

type Env = Record<string, string | undefined>;

export const CREDENTIAL_VARIABLES: Record<keyof SocialCredentials, string> = {
  consumerKey: 'RIVER_BOT_CONSUMER_KEY',
  consumerSecret: 'RIVER_BOT_CONSUMER_SECRET',
  accessToken: 'RIVER_BOT_ACCESS_TOKEN',
  accessTokenSecret: 'RIVER_BOT_ACCESS_TOKEN_SECRET',
};

function readValue(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readValue(env, name);
  if (raw === null) return fallback;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return parsed;
}

function readUrl(env: Env, name: string, fallback: string): string {
  const raw = readValue(env, name);
  if (raw === null) return fallback;

  try {
    return new URL(raw).toString();
  } catch {
    throw new ConfigError(`${name} must be an absolute URL (got "${raw}")`);
  }
}

/**
 * Read social credentials. Every one of the four variables must be set.
 */
export function readCredentials(env: Env): SocialCredentials {
  const missing: string[] = [];
  const pick = (key: keyof SocialCredentials): string => {
    const value = readValue(env, CREDENTIAL_VARIABLES[key]);
    if (value === null) {
      missing.push(CREDENTIAL_VARIABLES[key]);
      return '';
    }
    return value;
  };

  const credentials: SocialCredentials = {
    consumerKey: pick('consumerKey'),
    consumerSecret: pick('consumerSecret'),
    accessToken: pick('accessToken'),
    accessTokenSecret: pick('accessTokenSecret'),
  };

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  return credentials;
}

export function loadConfig(
  env: Env = process.env,
  options: { requireCredentials?: boolean } = {}
): RiverBotConfig {
  const { requireCredentials = true } = options;

  return {
    credentials: requireCredentials ? readCredentials(env) : null,
    apiUrl: readUrl(env, 'RIVER_DATA_API_URL', DEFAULT_RIVER_DATA_API_URL),
    bulkLimit: readPositiveInt(env, 'RIVER_BULK_LIMIT', DEFAULT_BULK_LIMIT),
    stationLimit: readPositiveInt(env, 'RIVER_STATION_LIMIT', DEFAULT_STATION_LIMIT),
    requestTimeoutMs: readPositiveInt(env, 'RIVER_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT),
    attribution: readValue(env, 'RIVER_CHART_ATTRIBUTION') ?? DEFAULT_ATTRIBUTION,
  };
}
