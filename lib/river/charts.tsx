/**
 * Chart Renderer
 *
 * Builds the flow and level charts as PNG buffers. Series are flattened to a
 * long-format table (date, value, location), regrouped into one line per
 * location, drawn as SVG and rasterized with sharp.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { renderToStaticMarkup } from 'react-dom/server';
import sharp from 'sharp';
import { RiverLineChart } from '@/components/RiverLineChart';
import type { ChartLine } from '@/components/RiverLineChart';
import { seriesColor } from '@/styles/theme';
import { DEFAULT_ATTRIBUTION } from './config';
import { EmptySeriesError, RenderError } from './errors';
import { getStation } from './stations';
import type {
  ChartImage,
  ChartMetric,
  ChartPair,
  ChartRow,
  StationCatalog,
  StationSeries,
} from './types';

export const METRIC_LABELS: Record<ChartMetric, string> = {
  flow: 'Flow (m3/s)',
  level: 'Level (m)',
};

export interface ChartOptions {
  attribution?: string;
  width?: number;
  height?: number;
}

/**
 * Flatten per-station series into one row per reading, labelled with the
 * station's short name.
 */
export function toLongFormat(
  series: readonly StationSeries[],
  metric: ChartMetric,
  catalog: StationCatalog
): ChartRow[] {
  const rows: ChartRow[] = [];

  for (const { stationId, readings } of series) {
    const location = getStation(catalog, stationId)?.shortName ?? readings[0]?.stationName ?? stationId;
    for (const reading of readings) {
      rows.push({ date: reading.observedAt, value: reading[metric], location });
    }
  }

  return rows;
}

/** One chart line per location, in first-seen order, points oldest first */
export function groupByLocation(rows: readonly ChartRow[]): ChartLine[] {
  const lines = new Map<string, ChartLine>();

  for (const row of rows) {
    let line = lines.get(row.location);
    if (!line) {
      line = { location: row.location, color: seriesColor(lines.size), points: [] };
      lines.set(row.location, line);
    }
    line.points.push({ time: row.date.getTime(), value: row.value });
  }

  for (const line of lines.values()) {
    line.points.sort((a, b) => a.time - b.time);
  }

  return Array.from(lines.values());
}

function assertNotEmpty(series: readonly StationSeries[]): void {
  for (const { stationId, readings } of series) {
    if (readings.length === 0) throw new EmptySeriesError(stationId);
  }
}

/**
 * Render one metric's chart to a PNG buffer.
 */
export async function renderChart(
  series: readonly StationSeries[],
  metric: ChartMetric,
  catalog: StationCatalog,
  options: ChartOptions = {}
): Promise<ChartImage> {
  if (series.length === 0) throw new EmptySeriesError('(none)');
  assertNotEmpty(series);

  try {
    const lines = groupByLocation(toLongFormat(series, metric, catalog));
    const svg = renderToStaticMarkup(
      <RiverLineChart
        lines={lines}
        yLabel={METRIC_LABELS[metric]}
        attribution={options.attribution ?? DEFAULT_ATTRIBUTION}
        width={options.width}
        height={options.height}
      />
    );
    const data = await sharp(Buffer.from(svg)).png().toBuffer();
    return { metric, filename: `${metric}.png`, data };
  } catch (error) {
    throw new RenderError(`Failed to render ${metric} chart`, { cause: error });
  }
}

/**
 * Render the flow and level charts.
 */
export async function renderCharts(
  flowSeries: readonly StationSeries[],
  levelSeries: readonly StationSeries[],
  catalog: StationCatalog,
  options: ChartOptions = {}
): Promise<ChartPair> {
  const flow = await renderChart(flowSeries, 'flow', catalog, options);
  const level = await renderChart(levelSeries, 'level', catalog, options);

  console.log(
    `[River Charts] Rendered flow (${flow.data.length} bytes) and level (${level.data.length} bytes)`
  );

  return { flow, level };
}

/**
 * Write rendered charts to a directory. Returns the written paths.
 */
export async function writeChartFiles(charts: ChartPair, directory: string): Promise<string[]> {
  await mkdir(directory, { recursive: true });

  const written: string[] = [];
  for (const chart of [charts.flow, charts.level]) {
    const target = path.join(directory, chart.filename);
    await writeFile(target, chart.data);
    written.push(target);
  }

  console.log(`[River Charts] Wrote ${written.join(', ')}`);
  return written;
}
