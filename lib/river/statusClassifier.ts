import { FALLBACK_MARKER, getStation } from './stations';
import type { StationCatalog, StatusMarker } from './types';

/**
 * Map a flow reading to a status marker using the station's threshold rules.
 * The first rule whose upper bound exceeds the flow wins; past every bound the
 * flow is Danger. Stations without rules and missing flows are unclassified.
 */
export function classifyFlow(
  catalog: StationCatalog,
  stationId: string,
  flow: number | null
): StatusMarker {
  const station = getStation(catalog, stationId);
  if (!station || station.flowThresholds.length === 0) return 'unclassified';
  if (flow === null || Number.isNaN(flow)) return 'unclassified';

  for (const rule of station.flowThresholds) {
    if (flow < rule.upperBound) return rule.marker;
  }

  return FALLBACK_MARKER;
}
