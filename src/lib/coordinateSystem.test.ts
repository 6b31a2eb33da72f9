import { describe, it, expect } from 'vitest';
import {
  WGS84_LONGLAT,
  utmProjection,
  utmZoneForLongitude,
  utmToLngLat,
  lngLatToUtm,
  reprojectSamples,
} from './coordinateSystem';
import type { ChemistrySample, LngLat } from '@/types';

/**
 * Reference values below were computed independently with the
 * Krüger series for the transverse Mercator on the WGS84 ellipsoid.
 */

describe('utmProjection', () => {
  it('should build the zone 16 north definition', () => {
    expect(utmProjection(16)).toBe('+proj=utm +zone=16 +datum=WGS84 +units=m +no_defs');
  });

  it('should add +south for the southern hemisphere', () => {
    expect(utmProjection(33, 'south')).toBe(
      '+proj=utm +zone=33 +south +datum=WGS84 +units=m +no_defs'
    );
  });

  it('should reject zones outside 1..60', () => {
    expect(() => utmProjection(0)).toThrow('Invalid UTM zone: 0');
    expect(() => utmProjection(61)).toThrow('Invalid UTM zone: 61');
    expect(() => utmProjection(16.5)).toThrow('Invalid UTM zone: 16.5');
  });

  it('should target geographic longitude/latitude on WGS84', () => {
    expect(WGS84_LONGLAT).toBe('+proj=longlat +datum=WGS84 +no_defs');
  });
});

describe('utmZoneForLongitude', () => {
  it('should place northwest Indiana in zone 16', () => {
    expect(utmZoneForLongitude(-87.304729)).toBe(16);
  });

  it('should number zones from 180°W', () => {
    expect(utmZoneForLongitude(-180)).toBe(1);
    expect(utmZoneForLongitude(0)).toBe(31);
    expect(utmZoneForLongitude(-90)).toBe(16);
    expect(utmZoneForLongitude(-84.0001)).toBe(16);
    expect(utmZoneForLongitude(-84)).toBe(17);
  });

  it('should fold 180° into zone 60', () => {
    expect(utmZoneForLongitude(180)).toBe(60);
  });

  it('should reject non-finite longitudes', () => {
    expect(() => utmZoneForLongitude(Number.NaN)).toThrow('Invalid longitude');
  });
});

describe('utmToLngLat', () => {
  it('should put the zone 16 false easting on the -87° central meridian', () => {
    const [lng, lat] = utmToLngLat({ easting: 500000, northing: 4600000 });
    expect(lng).toBeCloseTo(-87, 9);
    expect(lat).toBeCloseTo(41.551665, 5);
  });

  it('should convert a Gary, Indiana sample position', () => {
    const [lng, lat] = utmToLngLat({ easting: 474700, northing: 4606000 });
    expect(lng).toBeCloseTo(-87.303621, 5);
    expect(lat).toBeCloseTo(41.605308, 5);
  });

  it('should map the equator on the central meridian to [-87, 0]', () => {
    const [lng, lat] = utmToLngLat({ easting: 500000, northing: 0 });
    expect(lng).toBeCloseTo(-87, 9);
    expect(lat).toBeCloseTo(0, 9);
  });

  it('should reject non-finite input', () => {
    expect(() => utmToLngLat({ easting: Number.NaN, northing: 4600000 })).toThrow(
      'Invalid UTM coordinates'
    );
  });
});

describe('lngLatToUtm', () => {
  it('should project the first monitor into zone 16', () => {
    const { easting, northing } = lngLatToUtm([-87.304729, 41.60668]);
    // Within half a metre of the reference values
    expect(Math.abs(easting - 474608.242)).toBeLessThan(0.5);
    expect(Math.abs(northing - 4606152.693)).toBeLessThan(0.5);
  });

  it('should give the false easting on the central meridian', () => {
    const { easting } = lngLatToUtm([-87, 41]);
    expect(easting).toBeCloseTo(500000, 3);
  });

  it('should round-trip geographic → UTM → geographic within sub-metre tolerance', () => {
    const points: LngLat[] = [
      [-87.304729, 41.60668],
      [-86.9075, 41.717778],
      [-89.5, 37.2],
    ];

    for (const point of points) {
      const [lng, lat] = utmToLngLat(lngLatToUtm(point));
      // 1e-7° is about 1 cm
      expect(Math.abs(lng - point[0])).toBeLessThan(1e-7);
      expect(Math.abs(lat - point[1])).toBeLessThan(1e-7);
    }
  });

  it('should reject non-finite input', () => {
    expect(() => lngLatToUtm([Number.POSITIVE_INFINITY, 41])).toThrow('Invalid WGS84 coordinates');
  });
});

describe('reprojectSamples', () => {
  const samples: ChemistrySample[] = [
    {
      sampleId: 'T-1',
      site: 'Test Site A',
      date: '2024-01-02',
      analyte: 'PM2.5',
      value: 10,
      units: 'ug/m3',
      easting: 474700,
      northing: 4606000,
    },
    {
      sampleId: 'T-2',
      site: 'Test Site B',
      date: '2024-01-03',
      analyte: 'SO2',
      value: 2.5,
      units: 'ppb',
      easting: 500000,
      northing: 4600000,
    },
  ];

  it('should keep order and every original field', () => {
    const projected = reprojectSamples(samples);

    expect(projected).toHaveLength(2);
    expect(projected[0]).toMatchObject(samples[0]);
    expect(projected[1]).toMatchObject(samples[1]);
    expect(projected.map((s) => s.sampleId)).toEqual(['T-1', 'T-2']);
  });

  it('should add the reprojected position', () => {
    const projected = reprojectSamples(samples);

    expect(projected[0].lng).toBeCloseTo(-87.303621, 5);
    expect(projected[0].lat).toBeCloseTo(41.605308, 5);
    expect(projected[1].lng).toBeCloseTo(-87, 9);
    expect(projected[1].lat).toBeCloseTo(41.551665, 5);
  });

  it('should not modify the input rows', () => {
    reprojectSamples(samples);
    expect(samples[0]).not.toHaveProperty('lng');
  });

  it('should name the failing sample on invalid input', () => {
    const bad = [{ ...samples[0], sampleId: 'T-bad', northing: Number.NaN }];
    expect(() => reprojectSamples(bad)).toThrow('Invalid UTM coordinates for T-bad');
  });

  it('should return an empty array for an empty table', () => {
    expect(reprojectSamples([])).toEqual([]);
  });
});
