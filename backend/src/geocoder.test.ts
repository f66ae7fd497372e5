import { describe, expect, it, vi } from 'vitest';
import { createReverseGeocoder, formatPlaceName } from './geocoder';

describe('formatPlaceName', () => {
  it('joins suburb, city, state and country', () => {
    expect(
      formatPlaceName({
        address: { suburb: 'Mitte', city: 'Berlin', state: 'Berlin', country: 'Germany', postcode: '10117' },
      })
    ).toBe('Mitte, Berlin, Berlin, Germany');
  });

  it('falls back from city to town and village', () => {
    expect(formatPlaceName({ address: { town: 'Hallstatt', country: 'Austria' } })).toBe('Hallstatt, Austria');
    expect(formatPlaceName({ address: { village: 'Giethoorn', state: 'Overijssel' } })).toBe('Giethoorn, Overijssel');
  });

  it('uses display_name when the address has none of the parts', () => {
    expect(formatPlaceName({ display_name: 'Somewhere at sea', address: { ocean: 'Atlantic' } })).toBe(
      'Somewhere at sea'
    );
  });

  it('returns an empty name for unusable responses', () => {
    expect(formatPlaceName(null)).toBe('');
    expect(formatPlaceName({ error: 'Unable to geocode' })).toBe('');
  });
});

describe('createReverseGeocoder', () => {
  it('queries the configured endpoint with the reverse parameters', async () => {
    const http = vi.fn(async () => ({ data: { address: { city: 'Lisbon', country: 'Portugal' } } }));
    const geocode = createReverseGeocoder({ url: 'https://geocoder.test/reverse', userAgent: 'geolog-test', http });

    await expect(geocode(38.7223, -9.1393)).resolves.toBe('Lisbon, Portugal');
    expect(http).toHaveBeenCalledWith('https://geocoder.test/reverse', {
      params: { lat: 38.7223, lon: -9.1393, format: 'json', zoom: 14, addressdetails: 1 },
      headers: { 'User-Agent': 'geolog-test' },
      timeout: 4000,
    });
  });

  it('resolves to an empty name when the lookup fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const http = vi.fn(async () => {
      throw new Error('timeout of 4000ms exceeded');
    });
    const geocode = createReverseGeocoder({ url: 'https://geocoder.test/reverse', userAgent: 'geolog-test', http });

    await expect(geocode(1, 2)).resolves.toBe('');
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
