import type { LastKnownPosition, LogPayload } from '../types';

export const GEOLOCATION_OPTIONS: PositionOptions = {
  enableHighAccuracy: true,
  timeout: 8000,
  maximumAge: 60000,
};

export interface PositionReading {
  coords: { latitude: number; longitude: number; accuracy: number };
}

// The subset of the browser Geolocation API used here
export interface PositionSource {
  getCurrentPosition(
    onSuccess: (position: PositionReading) => void,
    onError: (error: { code: number; message: string }) => void,
    options: PositionOptions
  ): void;
}

export class GeolocationUnsupportedError extends Error {
  constructor() {
    super('Geolocation is not supported in this browser');
    this.name = 'GeolocationUnsupportedError';
  }
}

export const getPositionSource = (): PositionSource | null =>
  typeof navigator !== 'undefined' && navigator.geolocation ? navigator.geolocation : null;

/**
 * Asks the device for its current position once. Rejects with
 * GeolocationUnsupportedError when there is no source, or with the platform's
 * error when the lookup fails or times out.
 */
export function requestPosition(source: PositionSource | null): Promise<LastKnownPosition> {
  return new Promise((resolve, reject) => {
    if (!source) {
      reject(new GeolocationUnsupportedError());
      return;
    }
    source.getCurrentPosition(
      (pos) => resolve({
        latitude: pos.coords.latitude,
        longitude: pos.coords.longitude,
        accuracy: pos.coords.accuracy,
      }),
      (error) => reject(new Error(error.message || `Geolocation error ${error.code}`)),
      GEOLOCATION_OPTIONS
    );
  });
}

export const toLogPayload = (position: LastKnownPosition | null): LogPayload => ({
  latitude: position ? position.latitude : null,
  longitude: position ? position.longitude : null,
});
