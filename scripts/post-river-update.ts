/**
 * Run-once river update.
 *
 * Fetches the latest gauge readings, renders the charts and posts the
 * summary. Scheduling is left to cron or whatever invokes this script.
 *
 *   tsx scripts/post-river-update.ts [--dry-run] [--out-dir <dir>]
 *   tsx scripts/post-river-update.ts --daily <stationId>
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';
import {
  createStationCatalog,
  createTwitterClient,
  fetchFresh,
  formatMeasurement,
  loadConfig,
  RiverBotError,
  runRiverUpdate,
  shapeFresh,
} from '@/lib/river';
import type { RiverBotConfig, StationCatalog } from '@/lib/river';

const USAGE = `Usage:
  post-river-update [--dry-run] [--out-dir <dir>]
  post-river-update --daily <stationId>`;

async function printDailyAggregate(
  stationId: string,
  catalog: StationCatalog,
  config: RiverBotConfig
): Promise<number> {
  const result = await shapeFresh(
    stationId,
    catalog,
    { apiUrl: config.apiUrl, limit: config.stationLimit, timeoutMs: config.requestTimeoutMs },
    { aggregate: true }
  );

  if (!result.success) {
    console.error(`[River Update] ${result.error.description}`);
    return 1;
  }

  console.log('date        level mean/min/max        flow mean/min/max');
  for (const row of result.data) {
    const level = [row.levelMean, row.levelMin, row.levelMax].map((v) => formatMeasurement(v, 2));
    const flow = [row.flowMean, row.flowMin, row.flowMax].map((v) => formatMeasurement(v, 2));
    console.log(`${row.date}  ${level.join(' / ').padEnd(24)}  ${flow.join(' / ')}`);
  }

  return 0;
}

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      'dry-run': { type: 'boolean', default: false },
      'out-dir': { type: 'string' },
      daily: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const catalog = createStationCatalog();
  const dryRun = values['dry-run'] === true || values.daily !== undefined;
  const config = loadConfig(process.env, { requireCredentials: !dryRun });

  if (values.daily !== undefined) {
    return printDailyAggregate(values.daily, catalog, config);
  }

  await runRiverUpdate({
    catalog,
    fetchReadings: () =>
      fetchFresh({ apiUrl: config.apiUrl, limit: config.bulkLimit, timeoutMs: config.requestTimeoutMs }),
    client: config.credentials ? createTwitterClient(config.credentials) : null,
    chartOptions: { attribution: config.attribution },
    outDir: values['out-dir'],
  });

  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof RiverBotError) {
      console.error(`[River Update] ${error.name} (${error.code}): ${error.message}`);
      if (error.cause) console.error('[River Update] Caused by:', error.cause);
    } else {
      console.error('[River Update] Fatal:', error);
    }
    process.exitCode = 1;
  }
);
