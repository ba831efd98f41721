// ============================================================================
// Station Types
// ============================================================================

export type Marker = 'safe' | 'warn' | 'danger';

/** A marker, or no marker when the station has no rules or the flow is missing */
export type StatusMarker = Marker | 'unclassified';

export interface ThresholdRule {
  upperBound: number;
  marker: Marker;
}

export interface StationDescriptor {
  id: string;                          // Gauge code e.g. "05BJ001"
  name: string;                        // Full name e.g. "Elbow River below Glenmore Dam"
  shortName: string;                   // Chart legend label e.g. "Elbow blw. Glenmore"
  flowThresholds: readonly ThresholdRule[];  // Ascending by upperBound
}

export type StationCatalog = ReadonlyMap<string, StationDescriptor>;

// ============================================================================
// Reading Types
// ============================================================================

export type RawValue = string | number | null;

/**
 * One row of the bulk reading table, as the feed delivered it.
 * `timestamp` is kept verbatim; `observedAt` is its wall-clock parse.
 */
export interface ReadingRow {
  timestamp: string;
  observedAt: Date;
  stationId: string;
  stationName: string;
  level: RawValue;
  flow: RawValue;
}

export interface Reading {
  timestamp: string;
  observedAt: Date;
  stationId: string;
  stationName: string;
  level: number | null;
  flow: number | null;
}

export interface AggregateRow {
  date: string;        // yyyy-MM-dd in the feed's own clock
  levelMean: number;
  levelMin: number;
  levelMax: number;
  flowMean: number;
  flowMin: number;
  flowMax: number;
}

// ============================================================================
// Result Types
// ============================================================================

export interface StationError {
  code: 'unknown_station';
  description: string;
}

export type StationResult<T> =
  | { success: true; data: T }
  | { success: false; error: StationError };

// ============================================================================
// Chart Types
// ============================================================================

export type ChartMetric = 'flow' | 'level';

export interface StationSeries {
  stationId: string;
  readings: Reading[];
}

export interface ChartRow {
  date: Date;
  value: number | null;
  location: string;
}

export interface ChartImage {
  metric: ChartMetric;
  filename: string;
  data: Buffer;
}

export interface ChartPair {
  flow: ChartImage;
  level: ChartImage;
}
