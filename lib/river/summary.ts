import { formatHeaderTimestamp } from './formatTimestamp';
import { MARKER_SYMBOLS, TRACKED_STATIONS } from './stations';
import type { TrackedStation } from './stations';
import { classifyFlow } from './statusClassifier';
import type { Reading, StationCatalog } from './types';

export type SummaryReadings = Record<TrackedStation, Reading | null>;

const MISSING = 'N/A';

/**
 * Round to a fixed number of decimals and drop trailing zeros
 * (1000.10 -> "1000.1", 1048.6 at 0 decimals -> "1049").
 */
export function formatMeasurement(value: number | null, decimals: number): string {
  if (value === null || !Number.isFinite(value)) return MISSING;
  return String(Number(value.toFixed(decimals)));
}

function flowAndLevel(reading: Reading | null): string {
  const flow = formatMeasurement(reading?.flow ?? null, 2);
  const level = formatMeasurement(reading?.level ?? null, 2);
  return `${flow} m3/min, ${level} m`;
}

/**
 * Build the post text from the most recent reading of each tracked station.
 * Missing values and missing stations render as N/A.
 */
export function formatSummary(readings: SummaryReadings, catalog: StationCatalog): string {
  const { bow, elbow, glenmore, bowCochrane } = readings;

  const header = bow ? formatHeaderTimestamp(bow.observedAt) : MISSING;

  const marker = classifyFlow(catalog, TRACKED_STATIONS.elbow, elbow?.flow ?? null);
  const symbol = MARKER_SYMBOLS[marker];
  const elbowPrefix = symbol ? `${symbol}: ` : '';

  // Reservoir elevation is reported to the whole metre
  const glenmoreLevel = formatMeasurement(glenmore?.level ?? null, 0);

  return [
    `River Stats ${header}`,
    `Bow Cochrane: ${flowAndLevel(bowCochrane)}`,
    `Bow YYC: ${flowAndLevel(bow)}`,
    `Elbow YYC: ${elbowPrefix}${flowAndLevel(elbow)}`,
    `Glenmore Reservoir: ${glenmoreLevel} m`,
  ].join('\n');
}
