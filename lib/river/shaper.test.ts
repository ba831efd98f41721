import { afterEach, describe, expect, it, vi } from 'vitest';
import { parseFeedTimestamp } from './formatTimestamp';
import { aggregateDaily, coerceNumeric, latestReading, shapeFresh, shapeFrom } from './shaper';
import { createStationCatalog } from './stations';
import type { RawValue, Reading, ReadingRow } from './types';

const catalog = createStationCatalog();

function row(stationId: string, timestamp: string, level: RawValue, flow: RawValue): ReadingRow {
  const observedAt = parseFeedTimestamp(timestamp);
  if (!observedAt) throw new Error(`bad fixture timestamp ${timestamp}`);
  return { timestamp, observedAt, stationId, stationName: `Station ${stationId}`, level, flow };
}

function reading(timestamp: string, level: number | null, flow: number | null): Reading {
  const { observedAt, stationId, stationName } = row('05BJ001', timestamp, null, null);
  return { timestamp, observedAt, stationId, stationName, level, flow };
}

describe('coerceNumeric', () => {
  it('parses numeric strings and passes numbers through', () => {
    expect(coerceNumeric('12.5')).toBe(12.5);
    expect(coerceNumeric(' 3 ')).toBe(3);
    expect(coerceNumeric(-0.25)).toBe(-0.25);
  });

  it('turns everything else into null', () => {
    expect(coerceNumeric('')).toBeNull();
    expect(coerceNumeric('   ')).toBeNull();
    expect(coerceNumeric('NA')).toBeNull();
    expect(coerceNumeric('12abc')).toBeNull();
    expect(coerceNumeric(null)).toBeNull();
    expect(coerceNumeric(undefined)).toBeNull();
    expect(coerceNumeric(Number.NaN)).toBeNull();
    expect(coerceNumeric(Infinity)).toBeNull();
    expect(coerceNumeric({})).toBeNull();
  });
});

describe('shapeFrom', () => {
  const table = [
    row('05BJ001', '2024-06-03T06:00:00.000', '0.90', '14.2'),
    row('05BH004', '2024-06-03T06:15:00.000', '1.23', '101.5'),
    row('05BJ001', '2024-06-03T06:15:00.000', '0.91', 'NA'),
  ];

  it('returns a failure result for unknown stations', () => {
    const result = shapeFrom(table, 'XX00000', catalog);
    expect(result).toEqual({
      success: false,
      error: { code: 'unknown_station', description: 'Station XX00000 is not in the station catalog' },
    });
  });

  it('filters to the station, coerces values and orders newest first', () => {
    const result = shapeFrom(table, '05BJ001', catalog);
    if (!result.success) throw new Error('expected success');

    expect(result.data.map((r) => r.timestamp)).toEqual([
      '2024-06-03T06:15:00.000',
      '2024-06-03T06:00:00.000',
    ]);
    expect(result.data[0].level).toBe(0.91);
    expect(result.data[0].flow).toBeNull();
    expect(result.data[1].flow).toBe(14.2);
  });

  it('returns an empty list for a known station with no rows', () => {
    expect(shapeFrom(table, '05BJ004', catalog)).toEqual({ success: true, data: [] });
  });

  it('aggregates by day when asked', () => {
    const result = shapeFrom(table, '05BJ001', catalog, { aggregate: true });
    if (!result.success) throw new Error('expected success');
    expect(result.data).toEqual([
      {
        date: '2024-06-03',
        levelMean: 0.905,
        levelMin: 0.9,
        levelMax: 0.91,
        flowMean: 14.2,
        flowMin: 14.2,
        flowMax: 14.2,
      },
    ]);
  });
});

describe('aggregateDaily', () => {
  it('computes mean, min and max independently', () => {
    const rows = aggregateDaily([
      reading('2024-06-03T01:00:00.000', 2, 10),
      reading('2024-06-03T13:00:00.000', 4, 20),
    ]);
    expect(rows).toEqual([
      { date: '2024-06-03', levelMean: 3, levelMin: 2, levelMax: 4, flowMean: 15, flowMin: 10, flowMax: 20 },
    ]);
  });

  it('ignores missing values within a day', () => {
    const [day] = aggregateDaily([
      reading('2024-06-03T01:00:00.000', null, 10),
      reading('2024-06-03T02:00:00.000', 5, null),
      reading('2024-06-03T03:00:00.000', 7, 30),
    ]);
    expect(day.levelMean).toBe(6);
    expect(day.flowMean).toBe(20);
  });

  it('zero-fills days without valid readings, including gap days', () => {
    const rows = aggregateDaily([
      reading('2024-06-05T08:00:00.000', 1, 8),
      reading('2024-06-03T08:00:00.000', null, null),
    ]);
    const zero = { levelMean: 0, levelMin: 0, levelMax: 0, flowMean: 0, flowMin: 0, flowMax: 0 };
    expect(rows).toEqual([
      { date: '2024-06-03', ...zero },
      { date: '2024-06-04', ...zero },
      { date: '2024-06-05', levelMean: 1, levelMin: 1, levelMax: 1, flowMean: 8, flowMin: 8, flowMax: 8 },
    ]);
  });

  it('returns nothing for no readings', () => {
    expect(aggregateDaily([])).toEqual([]);
  });
});

describe('latestReading', () => {
  it('picks the most recent observation regardless of order', () => {
    const latest = latestReading([
      reading('2024-06-03T06:00:00.000', 1, 1),
      reading('2024-06-03T07:30:00.000', 2, 2),
      reading('2024-06-02T23:00:00.000', 3, 3),
    ]);
    expect(latest?.timestamp).toBe('2024-06-03T07:30:00.000');
  });

  it('returns null for an empty list', () => {
    expect(latestReading([])).toBeNull();
  });
});

describe('shapeFresh', () => {
  const fetchOptions = { apiUrl: 'https://example.test/rivers.json', limit: 50, timeoutMs: 1000 };

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('fails for unknown stations without a request', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    const result = await shapeFresh('XX00000', catalog, fetchOptions);

    expect(result.success).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fetches the station and aggregates it', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(
        JSON.stringify([
          { timestamp: '2024-06-03T06:15:00.000', station_number: '05BJ004', station_name: 'Bragg', level: '1.5', flow: '10' },
          { timestamp: '2024-06-03T06:00:00.000', station_number: '05BJ004', station_name: 'Bragg', level: '1.5', flow: '20' },
        ]),
        { status: 200 }
      )
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await shapeFresh('05BJ004', catalog, fetchOptions, { aggregate: true });

    expect(new URL(fetchMock.mock.calls[0][0]).searchParams.get('station_number')).toBe('05BJ004');
    expect(result).toEqual({
      success: true,
      data: [
        { date: '2024-06-03', levelMean: 1.5, levelMin: 1.5, levelMax: 1.5, flowMean: 15, flowMin: 10, flowMax: 20 },
      ],
    });
  });
});
