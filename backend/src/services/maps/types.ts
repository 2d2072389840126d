import { Coordinates } from '../../types/domain';

/**
 * Maps provider contract. Implementations never throw: an unavailable answer is null.
 */

/** Coordinates, or a free-text address the provider resolves itself */
export type Place = Coordinates | string;

export interface DriveEstimate {
  seconds: number;
  meters: number;
  text: string;
}

export interface MapsProvider {
  readonly mode: 'live' | 'offline';
  geocode(address: string): Promise<Coordinates | null>;
  driveTime(origin: Place, destination: Place): Promise<DriveEstimate | null>;
}
