import { describe, it, expect } from 'vitest';
import { OfflineMapsProvider } from '../src/services/maps';
import {
  createLegEstimator,
  estimateLegFromDistance,
  Leg,
  LegEstimator,
  optimizeRoute,
  RouteStop,
} from '../src/services/routeOptimizer';
import { FakeMapsProvider } from './helpers';

function stop(id: number, hour: number, longitude: number | null): RouteStop {
  return {
    id,
    start_at: `2024-01-05T${String(hour).padStart(2, '0')}:00:00.000Z`,
    latitude: longitude === null ? null : 0,
    longitude,
  };
}

// One unit of longitude costs 100 seconds
const lineEstimator: LegEstimator = async (from, to): Promise<Leg> => {
  const seconds = Math.abs(to.lon - from.lon) * 100;
  return { seconds, meters: seconds * 10, text: `${seconds}s`, source: 'estimate' };
};

function ids(stops: RouteStop[]): number[] {
  return stops.map((s) => s.id);
}

describe('optimizeRoute', () => {
  it('returns an empty route unchanged', async () => {
    expect(await optimizeRoute([], lineEstimator)).toEqual([]);
  });

  it('returns a single stop unchanged', async () => {
    const only = [stop(1, 9, 0)];
    expect(await optimizeRoute(only, lineEstimator)).toEqual(only);
  });

  it('keeps input order when no stop has coordinates', async () => {
    const stops = [stop(1, 11, null), stop(2, 9, null)];
    expect(ids(await optimizeRoute(stops, lineEstimator))).toEqual([1, 2]);
  });

  it('starts at the earliest stop and always drives to the nearest next one', async () => {
    const stops = [stop(1, 9, 0), stop(2, 10, 3), stop(3, 11, 1), stop(4, 12, 2)];
    expect(ids(await optimizeRoute(stops, lineEstimator))).toEqual([1, 3, 4, 2]);
  });

  it('starts at the earliest stop even when it is not first in the input', async () => {
    const stops = [stop(1, 12, 5), stop(2, 8, 0), stop(3, 10, 4)];
    expect(ids(await optimizeRoute(stops, lineEstimator))).toEqual([2, 3, 1]);
  });

  it('returns a permutation of the input', async () => {
    const stops = [stop(1, 9, 2), stop(2, 10, 7), stop(3, 11, 1), stop(4, 12, null), stop(5, 13, 4)];
    const ordered = await optimizeRoute(stops, lineEstimator);
    expect([...ids(ordered)].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('places stops without coordinates last in their original order', async () => {
    const stops = [stop(1, 7, null), stop(2, 9, 0), stop(3, 10, 2), stop(4, 8, null), stop(5, 11, 1)];
    expect(ids(await optimizeRoute(stops, lineEstimator))).toEqual([2, 5, 3, 1, 4]);
  });

  it('breaks cost ties by input order', async () => {
    const stops = [stop(1, 9, 0), stop(2, 10, 1), stop(3, 11, -1)];
    expect(ids(await optimizeRoute(stops, lineEstimator))).toEqual([1, 2, 3]);

    const swapped = [stop(1, 9, 0), stop(3, 11, -1), stop(2, 10, 1)];
    expect(ids(await optimizeRoute(swapped, lineEstimator))).toEqual([1, 3, 2]);
  });
});

describe('leg estimation', () => {
  it('estimates from straight-line distance at the fallback speed', () => {
    expect(estimateLegFromDistance({ lat: 0, lon: 0 }, { lat: 0, lon: 1 }, 40)).toEqual({
      seconds: 10008,
      meters: 111195,
      text: '2 hours 47 mins',
      source: 'estimate',
    });
  });

  it('falls back to the estimate when the maps provider has no answer', async () => {
    const estimate = createLegEstimator(new OfflineMapsProvider(), 40);
    const leg = await estimate({ lat: 0, lon: 0 }, { lat: 0, lon: 1 });
    expect(leg.source).toBe('estimate');
    expect(leg.seconds).toBe(10008);
  });

  it('falls back to the estimate when the maps provider throws', async () => {
    const maps = new FakeMapsProvider({
      drive: () => {
        throw new Error('quota exceeded');
      },
    });
    const estimate = createLegEstimator(maps, 40);

    const leg = await estimate({ lat: 0, lon: 0 }, { lat: 0, lon: 1 });

    expect(leg.source).toBe('estimate');
    expect(leg.seconds).toBe(10008);
  });

  it('uses and memoizes maps answers', async () => {
    const maps = new FakeMapsProvider({
      drive: () => ({ seconds: 600, meters: 5000, text: '10 mins' }),
    });
    const estimate = createLegEstimator(maps, 40);

    const first = await estimate({ lat: 1, lon: 2 }, { lat: 3, lon: 4 });
    const second = await estimate({ lat: 1, lon: 2 }, { lat: 3, lon: 4 });

    expect(first).toEqual({ seconds: 600, meters: 5000, text: '10 mins', source: 'maps' });
    expect(second).toBe(first);
    expect(maps.driveCalls).toBe(1);
  });
});
