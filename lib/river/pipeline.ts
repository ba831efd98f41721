/**
 * River Update Pipeline
 *
 * One run: fetch the bulk table, shape every catalog station, format the
 * summary, render both charts and publish. Each step awaits the previous one;
 * any fatal error stops the run before anything is posted.
 */

import { renderCharts, writeChartFiles } from './charts';
import type { ChartOptions } from './charts';
import { ConfigError } from './errors';
import { publishUpdate } from './publisher';
import type { PublishResult, SocialClient } from './publisher';
import { latestReading, shapeFrom } from './shaper';
import { CHARTED_STATIONS, TRACKED_STATIONS } from './stations';
import { formatSummary } from './summary';
import type {
  ChartPair,
  Reading,
  ReadingRow,
  StationCatalog,
  StationSeries,
} from './types';

export interface RiverUpdateDeps {
  catalog: StationCatalog;
  fetchReadings: () => Promise<ReadingRow[]>;
  /** null skips publishing (dry run) */
  client: SocialClient | null;
  chartOptions?: ChartOptions;
  /** Also write the PNGs here, before anything is published */
  outDir?: string;
}

export interface RiverUpdateResult {
  summary: string;
  charts: ChartPair;
  post: PublishResult | null;
}

function shapeAll(table: readonly ReadingRow[], catalog: StationCatalog): Map<string, Reading[]> {
  const shaped = new Map<string, Reading[]>();

  for (const stationId of catalog.keys()) {
    const result = shapeFrom(table, stationId, catalog);
    if (!result.success) {
      throw new ConfigError(result.error.description);
    }
    if (result.data.length === 0) {
      console.warn(`[River Update] No readings for ${stationId}`);
    }
    shaped.set(stationId, result.data);
  }

  return shaped;
}

export async function runRiverUpdate(deps: RiverUpdateDeps): Promise<RiverUpdateResult> {
  const { catalog } = deps;

  console.log('[River Update] Starting river update...');
  const table = await deps.fetchReadings();

  const shaped = shapeAll(table, catalog);
  const latest = (stationId: string) => latestReading(shaped.get(stationId) ?? []);

  const summary = formatSummary(
    {
      bow: latest(TRACKED_STATIONS.bow),
      elbow: latest(TRACKED_STATIONS.elbow),
      glenmore: latest(TRACKED_STATIONS.glenmore),
      bowCochrane: latest(TRACKED_STATIONS.bowCochrane),
    },
    catalog
  );
  // Logged before publishing so the text survives a failed post
  console.log(`[River Update] Summary:\n${summary}`);

  const series: StationSeries[] = CHARTED_STATIONS.map((stationId) => ({
    stationId,
    readings: shaped.get(stationId) ?? [],
  }));
  const charts = await renderCharts(series, series, catalog, deps.chartOptions);

  if (deps.outDir) {
    await writeChartFiles(charts, deps.outDir);
  }

  if (!deps.client) {
    console.log('[River Update] Dry run, skipping publish');
    return { summary, charts, post: null };
  }

  const post = await publishUpdate(deps.client, summary, [charts.flow, charts.level]);
  console.log(`[River Update] Published post ${post.postId}`);

  return { summary, charts, post };
}
