/**
 * Reading Shaper
 *
 * Turns the bulk reading table into per-station views: numeric coercion for
 * level and flow, newest-first ordering, and an optional daily aggregate.
 */

import { addHours, differenceInHours } from 'date-fns';
import { fetchStation } from './fetcher';
import type { FetchOptions } from './fetcher';
import { fromDayKey, toDayKey } from './formatTimestamp';
import { getStation } from './stations';
import type {
  AggregateRow,
  Reading,
  ReadingRow,
  StationCatalog,
  StationResult,
} from './types';

export interface ShapeOptions {
  aggregate?: boolean;
}

/**
 * Coerce a feed value to a number. Anything that is not a complete numeric
 * literal is missing (null); bad values never abort a run.
 */
export function coerceNumeric(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toReading(row: ReadingRow): Reading {
  return {
    timestamp: row.timestamp,
    observedAt: row.observedAt,
    stationId: row.stationId,
    stationName: row.stationName,
    level: coerceNumeric(row.level),
    flow: coerceNumeric(row.flow),
  };
}

// ============================================================================
// Aggregation
// ============================================================================

interface MetricStats {
  mean: number;
  min: number;
  max: number;
}

function summarize(values: number[]): MetricStats {
  if (values.length === 0) return { mean: 0, min: 0, max: 0 };

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  return { mean: sum / values.length, min, max };
}

/**
 * Resample readings to one row per calendar day. Every day between the first
 * and last reading gets a row; metrics with no valid values that day are 0.
 */
export function aggregateDaily(readings: readonly Reading[]): AggregateRow[] {
  if (readings.length === 0) return [];

  const byDay = new Map<string, { levels: number[]; flows: number[] }>();
  for (const reading of readings) {
    const key = toDayKey(reading.observedAt);
    let bucket = byDay.get(key);
    if (!bucket) {
      bucket = { levels: [], flows: [] };
      byDay.set(key, bucket);
    }
    if (reading.level !== null) bucket.levels.push(reading.level);
    if (reading.flow !== null) bucket.flows.push(reading.flow);
  }

  const keys = Array.from(byDay.keys()).sort();
  // Whole 24h steps on the feed clock; local calendar arithmetic would drift over DST
  const first = fromDayKey(keys[0]);
  const span = differenceInHours(fromDayKey(keys[keys.length - 1]), first) / 24;

  const rows: AggregateRow[] = [];
  for (let offset = 0; offset <= span; offset++) {
    const date = toDayKey(addHours(first, offset * 24));
    const bucket = byDay.get(date);
    const level = summarize(bucket?.levels ?? []);
    const flow = summarize(bucket?.flows ?? []);

    rows.push({
      date,
      levelMean: level.mean,
      levelMin: level.min,
      levelMax: level.max,
      flowMean: flow.mean,
      flowMin: flow.min,
      flowMax: flow.max,
    });
  }

  return rows;
}

// ============================================================================
// Shaping
// ============================================================================

export function latestReading(readings: readonly Reading[]): Reading | null {
  let latest: Reading | null = null;
  for (const reading of readings) {
    if (!latest || reading.observedAt.getTime() > latest.observedAt.getTime()) {
      latest = reading;
    }
  }
  return latest;
}

function unknownStation(stationId: string): StationResult<never> {
  return {
    success: false,
    error: {
      code: 'unknown_station',
      description: `Station ${stationId} is not in the station catalog`,
    },
  };
}

/**
 * Extract one station's readings from an already-fetched table.
 */
export function shapeFrom(
  table: readonly ReadingRow[],
  stationId: string,
  catalog: StationCatalog,
  options: { aggregate: true }
): StationResult<AggregateRow[]>;
export function shapeFrom(
  table: readonly ReadingRow[],
  stationId: string,
  catalog: StationCatalog,
  options?: { aggregate?: false }
): StationResult<Reading[]>;
export function shapeFrom(
  table: readonly ReadingRow[],
  stationId: string,
  catalog: StationCatalog,
  options: ShapeOptions = {}
): StationResult<Reading[] | AggregateRow[]> {
  if (!getStation(catalog, stationId)) return unknownStation(stationId);

  const readings = table
    .filter((row) => row.stationId === stationId)
    .map(toReading)
    .sort((a, b) => b.observedAt.getTime() - a.observedAt.getTime());

  if (options.aggregate) {
    return { success: true, data: aggregateDaily(readings) };
  }

  return { success: true, data: readings };
}

/**
 * Fetch a single station's rows and shape them. Unknown stations fail
 * without touching the network.
 */
export function shapeFresh(
  stationId: string,
  catalog: StationCatalog,
  fetchOptions: FetchOptions,
  options: { aggregate: true }
): Promise<StationResult<AggregateRow[]>>;
export function shapeFresh(
  stationId: string,
  catalog: StationCatalog,
  fetchOptions: FetchOptions,
  options?: { aggregate?: false }
): Promise<StationResult<Reading[]>>;
export async function shapeFresh(
  stationId: string,
  catalog: StationCatalog,
  fetchOptions: FetchOptions,
  options: ShapeOptions = {}
): Promise<StationResult<Reading[] | AggregateRow[]>> {
  if (!getStation(catalog, stationId)) return unknownStation(stationId);

  const table = await fetchStation(stationId, fetchOptions);
  return options.aggregate
    ? shapeFrom(table, stationId, catalog, { aggregate: true })
    : shapeFrom(table, stationId, catalog);
}
