import axios, { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { MapsSettings } from '../../config/env';
import { Coordinates } from '../../types/domain';
import { loggers } from '../../utils/logger';
import { DriveEstimate, MapsProvider, Place } from './types';

/**
 * Google Maps client (Geocoding + Distance Matrix APIs)
 * Every failure, including a timeout or an unexpected payload, resolves to null
 */

const PROVIDER = 'google-maps';

const GeocodeResponseSchema = z.object({
  status: z.string(),
  results: z
    .array(
      z.object({
        geometry: z.object({
          location: z.object({ lat: z.number(), lng: z.number() }),
        }),
      })
    )
    .default([]),
});

const DistanceMatrixResponseSchema = z.object({
  status: z.string(),
  rows: z
    .array(
      z.object({
        elements: z.array(
          z.object({
            status: z.string(),
            distance: z.object({ value: z.number(), text: z.string() }).optional(),
            duration: z.object({ value: z.number(), text: z.string() }).optional(),
          })
        ),
      })
    )
    .default([]),
});

function describePlace(place: Place): string {
  return typeof place === 'string' ? place : `${place.lat},${place.lon}`;
}

function describeError(error: unknown): string {
  if (error instanceof AxiosError) {
    return `${error.message} (${error.response?.status || error.code || 'unknown'})`;
  }
  return error instanceof Error ? error.message : String(error);
}

export class GoogleMapsProvider implements MapsProvider {
  readonly mode = 'live' as const;
  private readonly http: AxiosInstance;

  constructor(private readonly settings: MapsSettings) {
    this.http = axios.create({
      baseURL: settings.apiBase,
      timeout: settings.timeoutMs,
    });
  }

  async geocode(address: string): Promise<Coordinates | null> {
    try {
      loggers.providerRequest(PROVIDER, 'geocode', { address });

      const response = await this.http.get('/maps/api/geocode/json', {
        params: { address, key: this.settings.apiKey },
      });
      const parsed = GeocodeResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        loggers.providerError(PROVIDER, 'geocode', 'malformed response', true);
        return null;
      }

      const first = parsed.data.results[0];
      if (!first) {
        return null;
      }
      return { lat: first.geometry.location.lat, lon: first.geometry.location.lng };
    } catch (error) {
      loggers.providerError(PROVIDER, 'geocode', describeError(error), true);
      return null;
    }
  }

  async driveTime(origin: Place, destination: Place): Promise<DriveEstimate | null> {
    try {
      loggers.providerRequest(PROVIDER, 'distancematrix', {
        origin: describePlace(origin),
        destination: describePlace(destination),
      });

      const response = await this.http.get('/maps/api/distancematrix/json', {
        params: {
          origins: describePlace(origin),
          destinations: describePlace(destination),
          mode: 'driving',
          key: this.settings.apiKey,
        },
      });
      const parsed = DistanceMatrixResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        loggers.providerError(PROVIDER, 'distancematrix', 'malformed response', true);
        return null;
      }

      const element = parsed.data.rows[0]?.elements[0];
      if (!element || element.status !== 'OK' || !element.duration || !element.distance) {
        return null;
      }

      return {
        seconds: element.duration.value,
        meters: element.distance.value,
        text: element.duration.text,
      };
    } catch (error) {
      loggers.providerError(PROVIDER, 'distancematrix', describeError(error), true);
      return null;
    }
  }
}
