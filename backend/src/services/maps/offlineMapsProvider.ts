import { Coordinates } from '../../types/domain';
import { DriveEstimate, MapsProvider } from './types';

/**
 * Used when no maps API key is configured. Route costs fall back to great-circle estimates.
 */
export class OfflineMapsProvider implements MapsProvider {
  readonly mode = 'offline' as const;

  async geocode(_address: string): Promise<Coordinates | null> {
    return null;
  }

  async driveTime(): Promise<DriveEstimate | null> {
    return null;
  }
}
