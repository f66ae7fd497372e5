import { describe, expect, it, vi } from 'vitest';
import {
  GEOLOCATION_OPTIONS,
  GeolocationUnsupportedError,
  PositionReading,
  requestPosition,
  toLogPayload,
} from './geolocation';

type ErrorCallback = (error: { code: number; message: string }) => void;

describe('requestPosition', () => {
  it('resolves with latitude, longitude and accuracy', async () => {
    const source = {
      getCurrentPosition: vi.fn((onSuccess: (p: PositionReading) => void, _onError: ErrorCallback, _options: PositionOptions) =>
        onSuccess({ coords: { latitude: 59.3293, longitude: 18.0686, accuracy: 25 } })
      ),
    };

    await expect(requestPosition(source)).resolves.toEqual({ latitude: 59.3293, longitude: 18.0686, accuracy: 25 });
    expect(source.getCurrentPosition).toHaveBeenCalledWith(expect.any(Function), expect.any(Function), {
      enableHighAccuracy: true,
      timeout: 8000,
      maximumAge: 60000,
    });
  });

  it('rejects when the platform reports an error', async () => {
    const source = {
      getCurrentPosition: vi.fn((_onSuccess: (p: PositionReading) => void, onError: ErrorCallback, _options: PositionOptions) =>
        onError({ code: 1, message: 'User denied Geolocation' })
      ),
    };

    await expect(requestPosition(source)).rejects.toThrow('User denied Geolocation');
  });

  it('rejects without asking when geolocation is unsupported', async () => {
    await expect(requestPosition(null)).rejects.toBeInstanceOf(GeolocationUnsupportedError);
  });

  it('uses high accuracy with an 8 s timeout and 60 s cache', () => {
    expect(GEOLOCATION_OPTIONS).toEqual({ enableHighAccuracy: true, timeout: 8000, maximumAge: 60000 });
  });
});

describe('toLogPayload', () => {
  it('sends only latitude and longitude', () => {
    expect(toLogPayload({ latitude: 1.5, longitude: -2.25, accuracy: 10 })).toEqual({ latitude: 1.5, longitude: -2.25 });
  });

  it('sends nulls when there is no known position', () => {
    expect(toLogPayload(null)).toEqual({ latitude: null, longitude: null });
  });
});
