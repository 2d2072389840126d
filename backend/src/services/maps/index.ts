import { AppConfig } from '../../config/env';
import { GoogleMapsProvider } from './googleMapsProvider';
import { OfflineMapsProvider } from './offlineMapsProvider';
import { MapsProvider } from './types';

export * from './types';
export { GoogleMapsProvider } from './googleMapsProvider';
export { OfflineMapsProvider } from './offlineMapsProvider';

export function createMapsProvider(config: AppConfig): MapsProvider {
  return config.maps ? new GoogleMapsProvider(config.maps) : new OfflineMapsProvider();
}
