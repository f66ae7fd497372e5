import axios from 'axios';

export interface GeocoderRequest {
  params: Record<string, string | number>;
  headers: Record<string, string>;
  timeout: number;
}

export type HttpGet = (url: string, request: GeocoderRequest) => Promise<{ data: unknown }>;

export type ReverseGeocode = (latitude: number, longitude: number) => Promise<string>;

export interface GeocoderOptions {
  url: string;
  userAgent: string;
  timeoutMs?: number;
  http?: HttpGet;
}

interface NominatimResponse {
  display_name?: string;
  address?: Record<string, string | undefined>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asNominatim = (data: unknown): NominatimResponse => {
  if (!isRecord(data)) return {};
  const address: Record<string, string | undefined> = {};
  if (isRecord(data.address)) {
    for (const [key, value] of Object.entries(data.address)) {
      if (typeof value === 'string') address[key] = value;
    }
  }
  return {
    display_name: typeof data.display_name === 'string' ? data.display_name : undefined,
    address,
  };
};

/** Builds "suburb, city, state, country" from a Nominatim address, skipping absent parts. */
export function formatPlaceName(data: unknown): string {
  const { address = {}, display_name } = asNominatim(data);
  const parts = [
    address.suburb,
    address.city || address.town || address.village,
    address.state,
    address.country,
  ].filter((p): p is string => Boolean(p));

  return parts.length > 0 ? parts.join(', ') : display_name || '';
}

const axiosGet: HttpGet = (url, request) => axios.get(url, request);

/**
 * Creates a reverse geocoder backed by Nominatim. Lookups that fail resolve to
 * an empty name so that a geocoding outage never blocks logging.
 */
export function createReverseGeocoder(options: GeocoderOptions): ReverseGeocode {
  const { url, userAgent, timeoutMs = 4000, http = axiosGet } = options;

  return async (latitude, longitude) => {
    try {
      const response = await http(url, {
        params: { lat: latitude, lon: longitude, format: 'json', zoom: 14, addressdetails: 1 },
        headers: { 'User-Agent': userAgent },
        timeout: timeoutMs,
      });
      return formatPlaceName(response.data);
    } catch (error) {
      console.error(`Reverse geocoding failed for ${latitude},${longitude}:`, error instanceof Error ? error.message : error);
      return '';
    }
  };
}

export const disabledGeocoder: ReverseGeocode = async () => '';
