/**
 * River Reading Fetcher
 *
 * Pulls raw gauge rows from the open-data river levels endpoint. The feed is a
 * Socrata resource: `station_number` filters, `$order` sorts, `$limit` caps.
 */

import { UpstreamFetchError } from './errors';
import { parseFeedTimestamp } from './formatTimestamp';
import type { RawValue, ReadingRow } from './types';

// ============================================================================
// CONFIGURATION
// ============================================================================

export const DEFAULT_RIVER_DATA_API_URL = 'https://data.calgary.ca/resource/5fdg-ifgr.json';
export const DEFAULT_BULK_LIMIT = 20000;
export const DEFAULT_STATION_LIMIT = 5000;
export const DEFAULT_REQUEST_TIMEOUT = 30000; // 30 seconds

const USER_AGENT = 'river-gauge-bot/0.1';
const NEWEST_FIRST = 'timestamp DESC';

export interface FetchOptions {
  apiUrl: string;
  limit: number;
  timeoutMs: number;
}

// ============================================================================
// PARSING
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRawValue(value: unknown): RawValue {
  if (typeof value === 'string' || typeof value === 'number') return value;
  return null;
}

function toIdentifier(value: unknown): string | null {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Convert feed objects into reading rows. Rows without a usable timestamp or
 * station number are dropped; level and flow stay as delivered.
 */
export function parseReadingRows(payload: unknown[]): ReadingRow[] {
  const rows: ReadingRow[] = [];
  let dropped = 0;

  for (const item of payload) {
    if (!isRecord(item)) {
      dropped++;
      continue;
    }

    const timestamp = typeof item.timestamp === 'string' ? item.timestamp : null;
    const observedAt = timestamp ? parseFeedTimestamp(timestamp) : null;
    const stationId = toIdentifier(item.station_number);

    if (!timestamp || !observedAt || !stationId) {
      dropped++;
      continue;
    }

    rows.push({
      timestamp,
      observedAt,
      stationId,
      stationName: toIdentifier(item.station_name) ?? stationId,
      level: toRawValue(item.level),
      flow: toRawValue(item.flow),
    });
  }

  if (dropped > 0) {
    console.warn(`[River Fetcher] Dropped ${dropped} malformed rows`);
  }

  return rows;
}

// ============================================================================
// API CLIENT
// ============================================================================

async function requestRows(url: URL, timeoutMs: number): Promise<unknown[]> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let response: Response;
  try {
    response = await fetch(url.toString(), {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
      signal: controller.signal,
    });
  } catch (error) {
    throw new UpstreamFetchError(`Request to ${url.host} failed`, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    throw new UpstreamFetchError(
      `River data request failed: ${response.status} ${response.statusText}`,
      { status: response.status }
    );
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new UpstreamFetchError('River data response was not valid JSON', { cause: error });
  }

  if (!Array.isArray(data)) {
    throw new UpstreamFetchError('River data response was not an array of rows');
  }

  return data;
}

/**
 * Fetch the most recent rows for every station in one request.
 */
export async function fetchFresh(options: FetchOptions): Promise<ReadingRow[]> {
  const url = new URL(options.apiUrl);
  url.searchParams.set('$order', NEWEST_FIRST);
  url.searchParams.set('$limit', String(Math.round(options.limit)));

  console.log(`[River Fetcher] Fetching up to ${options.limit} rows for all stations...`);
  const rows = parseReadingRows(await requestRows(url, options.timeoutMs));
  console.log(`[River Fetcher] Fetched ${rows.length} rows`);

  return rows;
}

/**
 * Fetch the most recent rows for a single station.
 */
export async function fetchStation(stationId: string, options: FetchOptions): Promise<ReadingRow[]> {
  const url = new URL(options.apiUrl);
  url.searchParams.set('station_number', stationId);
  url.searchParams.set('$order', NEWEST_FIRST);
  url.searchParams.set('$limit', String(Math.round(options.limit)));

  console.log(`[River Fetcher] Fetching up to ${options.limit} rows for ${stationId}...`);
  const rows = parseReadingRows(await requestRows(url, options.timeoutMs));
  console.log(`[River Fetcher] Fetched ${rows.length} rows for ${stationId}`);

  return rows;
}
