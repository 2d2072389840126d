import { Request, Response } from 'express';
import { AppServices } from '../container';
import { AppError, asyncHandler } from '../middleware/errorHandler';

/**
 * Maps Controller
 * Manual probes of the configured maps provider
 */

function queryString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function createMapsController(services: AppServices) {
  function requireLiveMaps(): void {
    if (services.maps.mode !== 'live') {
      throw new AppError('Google Maps not configured (missing API key)', 400);
    }
  }

  return {
    /**
     * GET /test/geocode?address=...
     */
    testGeocode: asyncHandler(async (req: Request, res: Response) => {
      requireLiveMaps();
      const address = queryString(req.query.address);
      if (!address) {
        throw new AppError('missing address', 400);
      }

      const location = await services.maps.geocode(address);
      if (!location) {
        res.status(404).json({ status: 'no_results' });
        return;
      }
      res.json({ lat: location.lat, lon: location.lon, status: 'ok' });
    }),

    /**
     * GET /test/distance?from=...&to=...
     */
    testDistance: asyncHandler(async (req: Request, res: Response) => {
      requireLiveMaps();
      const origin = queryString(req.query.from);
      const destination = queryString(req.query.to);
      if (!origin || !destination) {
        throw new AppError("missing parameters 'from' and/or 'to'", 400);
      }

      const drive = await services.maps.driveTime(origin, destination);
      if (!drive) {
        res.status(404).json({ status: 'no_results' });
        return;
      }
      res.json({
        distance_km: Math.round(drive.meters) / 1000,
        duration_min: Math.round(drive.seconds / 6) / 10,
        status: 'ok',
      });
    }),
  };
}
