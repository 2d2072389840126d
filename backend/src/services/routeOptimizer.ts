import { Coordinates } from '../types/domain';
import { formatDuration, hasCoordinates, haversineKm } from '../utils/geo';
import { MapsProvider } from './maps';

/**
 * Route Optimizer
 *
 * Greedy nearest-neighbor ordering of one therapist's stops for a day.
 * Every leg is costed in seconds of driving: the maps provider's answer when it
 * has one, otherwise the straight-line distance at an assumed average speed.
 */

export interface RouteStop {
  id: number;
  start_at: string;
  latitude: number | null;
  longitude: number | null;
}

export interface Leg {
  seconds: number;
  meters: number;
  text: string;
  source: 'maps' | 'estimate';
}

type Routable<T> = T & { latitude: number; longitude: number };

export type LegEstimator = (from: Coordinates, to: Coordinates) => Promise<Leg>;

export function estimateLegFromDistance(from: Coordinates, to: Coordinates, speedKmh: number): Leg {
  const km = haversineKm(from, to);
  const seconds = Math.round((km / speedKmh) * 3600);
  return {
    seconds,
    meters: Math.round(km * 1000),
    text: formatDuration(seconds),
    source: 'estimate',
  };
}

/**
 * Leg estimator bound to one maps provider, memoized for the lifetime of the
 * returned function (one optimization request).
 */
export function createLegEstimator(maps: MapsProvider, fallbackSpeedKmh: number): LegEstimator {
  const memo = new Map<string, Promise<Leg>>();

  return (from, to) => {
    const key = `${from.lat},${from.lon}->${to.lat},${to.lon}`;
    const cached = memo.get(key);
    if (cached) {
      return cached;
    }

    const pending = maps
      .driveTime(from, to)
      .catch(() => null)
      .then((drive): Leg => {
        if (drive) {
          return { seconds: drive.seconds, meters: drive.meters, text: drive.text, source: 'maps' };
        }
        return estimateLegFromDistance(from, to, fallbackSpeedKmh);
      });
    memo.set(key, pending);
    return pending;
  };
}

export function coordinatesOf(stop: { latitude: number; longitude: number }): Coordinates {
  return { lat: stop.latitude, lon: stop.longitude };
}

/**
 * Returns a permutation of `stops`.
 *
 * Stops without coordinates keep their relative order and are placed after every
 * routed stop. With fewer than two routable stops the input order is returned.
 */
export async function optimizeRoute<T extends RouteStop>(
  stops: T[],
  estimateLeg: LegEstimator
): Promise<T[]> {
  const routable = stops.filter((stop): stop is Routable<T> => hasCoordinates(stop));
  if (routable.length < 2) {
    return [...stops];
  }

  let current = routable.reduce((earliest, stop) =>
    stop.start_at < earliest.start_at ? stop : earliest
  );
  const remaining = routable.filter((stop) => stop !== current);
  const rank = new Map<T, number>([[current, 0]]);

  while (remaining.length > 0) {
    const origin = coordinatesOf(current);
    const legs = await Promise.all(
      remaining.map((stop) => estimateLeg(origin, coordinatesOf(stop)))
    );

    let bestIndex = 0;
    for (let i = 1; i < legs.length; i++) {
      if (legs[i].seconds < legs[bestIndex].seconds) {
        bestIndex = i;
      }
    }

    const [next] = remaining.splice(bestIndex, 1);
    rank.set(next, rank.size);
    current = next;
  }

  const unranked = stops.length;
  return stops
    .map((stop, index) => ({ stop, index }))
    .sort((a, b) => {
      const byRank = (rank.get(a.stop) ?? unranked) - (rank.get(b.stop) ?? unranked);
      return byRank !== 0 ? byRank : a.index - b.index;
    })
    .map(({ stop }) => stop);
}
