import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  formatHeaderTimestamp,
  formatTickLabel,
  fromDayKey,
  parseFeedTimestamp,
  toDayKey,
} from './formatTimestamp';
import { aggregateDaily } from './shaper';
import type { Reading } from './types';

function observed(timestamp: string): Date {
  const date = parseFeedTimestamp(timestamp);
  if (!date) throw new Error(`bad fixture timestamp ${timestamp}`);
  return date;
}

function reading(timestamp: string, level: number, flow: number): Reading {
  return { timestamp, observedAt: observed(timestamp), stationId: '05BJ001', stationName: '05BJ001', level, flow };
}

describe('parseFeedTimestamp', () => {
  it('rejects values that are not timestamps', () => {
    expect(parseFeedTimestamp('yesterday')).toBeNull();
  });

  it('reads the wall clock without a host offset', () => {
    expect(observed('2024-06-03T06:15:00.000').toISOString()).toBe('2024-06-03T06:15:00.000Z');
  });
});

// The host zone must never leak into the rendered clock
for (const zone of ['America/Edmonton', 'Australia/Sydney']) {
  describe(`feed clock with the host in ${zone}`, () => {
    const previous = process.env.TZ;

    beforeAll(() => {
      process.env.TZ = zone;
    });

    afterAll(() => {
      if (previous === undefined) delete process.env.TZ;
      else process.env.TZ = previous;
    });

    it('keeps a spring-forward gap time as delivered', () => {
      const date = observed('2024-03-10T02:30:00.000');
      expect(formatHeaderTimestamp(date)).toBe('03/10/2024 02:30 AM');
      expect(formatTickLabel(date)).toBe('Mar 10 02:30');
    });

    it('keys days by the feed date', () => {
      expect(toDayKey(observed('2024-06-03T23:45:00.000'))).toBe('2024-06-03');
      expect(toDayKey(observed('2024-06-04T00:10:00.000'))).toBe('2024-06-04');
      expect(toDayKey(fromDayKey('2024-11-03'))).toBe('2024-11-03');
    });

    it('fills a continuous day range across a DST change', () => {
      const rows = aggregateDaily([
        reading('2024-11-02T12:00:00.000', 1, 10),
        reading('2024-11-04T12:00:00.000', 3, 30),
      ]);
      expect(rows.map((row) => row.date)).toEqual(['2024-11-02', '2024-11-03', '2024-11-04']);
    });
  });
}
