import { describe, expect, it } from 'vitest';
import { ConfigError } from './errors';
import {
  CHARTED_STATIONS,
  createStationCatalog,
  DEFAULT_STATIONS,
  getStation,
  TRACKED_STATIONS,
} from './stations';

describe('createStationCatalog', () => {
  it('indexes the default stations by id', () => {
    const catalog = createStationCatalog();
    expect(catalog.size).toBe(DEFAULT_STATIONS.length);
    expect(getStation(catalog, '05BJ008')?.shortName).toBe('Glenmore Reservoir');
    expect(getStation(catalog, 'missing')).toBeNull();
  });

  it('includes every tracked and charted station', () => {
    const catalog = createStationCatalog();
    for (const id of Object.values(TRACKED_STATIONS)) {
      expect(catalog.has(id)).toBe(true);
    }
    for (const id of CHARTED_STATIONS) {
      expect(catalog.has(id)).toBe(true);
    }
  });

  it('freezes descriptors and their rules', () => {
    const station = getStation(createStationCatalog(), '05BJ001');
    expect(Object.isFrozen(station)).toBe(true);
    expect(Object.isFrozen(station?.flowThresholds)).toBe(true);
    expect(Object.isFrozen(station?.flowThresholds[0])).toBe(true);
  });

  it('does not share rule objects with the input', () => {
    const rules = [{ upperBound: 10, marker: 'safe' as const }];
    const catalog = createStationCatalog([{ id: 'A', name: 'A', shortName: 'A', flowThresholds: rules }]);
    rules[0].upperBound = 99;
    expect(getStation(catalog, 'A')?.flowThresholds[0].upperBound).toBe(10);
  });

  it('rejects thresholds that are not ascending', () => {
    expect(() =>
      createStationCatalog([
        {
          id: 'BAD',
          name: 'Bad',
          shortName: 'Bad',
          flowThresholds: [
            { upperBound: 35, marker: 'warn' },
            { upperBound: 20, marker: 'safe' },
          ],
        },
      ])
    ).toThrow(ConfigError);
  });

  it('rejects duplicate station ids', () => {
    const station = { id: 'DUP', name: 'Dup', shortName: 'Dup', flowThresholds: [] };
    expect(() => createStationCatalog([station, station])).toThrow('Station DUP is defined more than once');
  });
});
