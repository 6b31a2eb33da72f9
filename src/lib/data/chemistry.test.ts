import { describe, it, expect } from 'vitest';
import { loadChemistrySamples, validateChemistrySample } from './chemistry';

describe('loadChemistrySamples', () => {
  it('should load the sample table', async () => {
    const samples = await loadChemistrySamples();

    expect(samples).toHaveLength(8);
    expect(samples[0]).toEqual({
      sampleId: 'S-001',
      site: 'Grand Calumet East',
      date: '2024-05-14',
      analyte: 'PM2.5',
      value: 12.4,
      units: 'ug/m3',
      easting: 474700,
      northing: 4606000,
    });
  });

  it('should hold UTM metres rather than degrees', async () => {
    const samples = await loadChemistrySamples();

    for (const sample of samples) {
      expect(sample.easting).toBeGreaterThan(160000);
      expect(sample.easting).toBeLessThan(840000);
      expect(sample.northing).toBeGreaterThan(4000000);
    }
  });
});

describe('validateChemistrySample', () => {
  const valid = {
    sampleId: 'T-1',
    site: 'Test Site',
    date: '2024-01-01',
    analyte: 'O3',
    value: 30,
    units: 'ppb',
    easting: 470000,
    northing: 4600000,
  };

  it('should accept a well-formed row', () => {
    expect(validateChemistrySample(valid, 0)).toEqual(valid);
  });

  it('should reject a missing northing', () => {
    const rest: Record<string, unknown> = { ...valid };
    delete rest.northing;
    expect(() => validateChemistrySample(rest, 5)).toThrow(
      'Chemistry row 5: field "northing" must be a finite number'
    );
  });

  it('should reject a non-object row', () => {
    expect(() => validateChemistrySample(null, 1)).toThrow('Chemistry row 1: expected an object');
  });
});
