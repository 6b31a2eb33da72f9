import { describe, it, expect } from 'vitest';
import {
  DEFAULT_DATUM,
  SAMPLE_UTM_ZONE,
  DEG_TO_RAD,
  isValidLatitude,
  isValidLongitude,
  clamp,
} from './constants';

describe('constants', () => {
  it('should use WGS84 as the default datum', () => {
    expect(DEFAULT_DATUM).toBe('WGS84');
  });

  it('should place the chemistry samples in UTM zone 16', () => {
    expect(SAMPLE_UTM_ZONE).toBe(16);
  });

  describe('DEG_TO_RAD', () => {
    it('should convert degrees to radians', () => {
      expect(180 * DEG_TO_RAD).toBeCloseTo(Math.PI, 10);
    });
  });
});

describe('coordinate range checks', () => {
  describe('isValidLatitude', () => {
    it('should accept the closed range [-90, 90]', () => {
      expect(isValidLatitude(-90)).toBe(true);
      expect(isValidLatitude(0)).toBe(true);
      expect(isValidLatitude(41.60668)).toBe(true);
      expect(isValidLatitude(90)).toBe(true);
    });

    it('should reject out-of-range and non-finite values', () => {
      expect(isValidLatitude(90.0001)).toBe(false);
      expect(isValidLatitude(-91)).toBe(false);
      expect(isValidLatitude(Number.NaN)).toBe(false);
      expect(isValidLatitude(Number.POSITIVE_INFINITY)).toBe(false);
    });
  });

  describe('isValidLongitude', () => {
    it('should accept the closed range [-180, 180]', () => {
      expect(isValidLongitude(-180)).toBe(true);
      expect(isValidLongitude(-87.304729)).toBe(true);
      expect(isValidLongitude(180)).toBe(true);
    });

    it('should reject out-of-range and non-finite values', () => {
      expect(isValidLongitude(180.5)).toBe(false);
      expect(isValidLongitude(-200)).toBe(false);
      expect(isValidLongitude(Number.NaN)).toBe(false);
    });
  });
});

describe('clamp', () => {
  it('should clamp values within range', () => {
    expect(clamp(5, 0, 10)).toBe(5);
    expect(clamp(-5, 0, 10)).toBe(0);
    expect(clamp(15, 0, 10)).toBe(10);
  });

  it('should handle edge cases', () => {
    expect(clamp(0, 0, 10)).toBe(0);
    expect(clamp(10, 0, 10)).toBe(10);
  });
});
