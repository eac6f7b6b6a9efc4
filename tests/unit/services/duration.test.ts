/**
 * Tests for duration parsing
 */

import { describe, it, expect } from 'vitest';
import {
  parseDuration,
  entryElapsedHours,
} from '../../../src/services/reconcile/duration.js';
import { MalformedDurationError } from '../../../src/services/reconcile/errors.js';

describe('parseDuration', () => {
  it('combines hours and minutes', () => {
    expect(parseDuration('PT1H30M')).toBe(1.5);
  });

  it('converts seconds to hours', () => {
    expect(parseDuration('PT45S')).toBe(0.0125);
  });

  it('parses all three components', () => {
    expect(parseDuration('PT2H15M36S')).toBeCloseTo(2.26, 10);
  });

  it('parses components independently', () => {
    expect(parseDuration('PT3H')).toBe(3);
    expect(parseDuration('PT90M')).toBe(1.5);
    expect(parseDuration('PT1H1800S')).toBe(1.5);
  });

  it('treats a running timer as zero', () => {
    expect(parseDuration(null)).toBe(0);
  });

  it('treats an empty period as zero', () => {
    expect(parseDuration('PT')).toBe(0);
  });

  it('rejects malformed encodings', () => {
    expect(() => parseDuration('1H30M')).toThrow(MalformedDurationError);
    expect(() => parseDuration('PT1.5H')).toThrow(MalformedDurationError);
    expect(() => parseDuration('PT30M1H')).toThrow(MalformedDurationError);
    expect(() => parseDuration('P1DT2H')).toThrow(MalformedDurationError);
    expect(() => parseDuration('')).toThrow(MalformedDurationError);
  });

  it('reports the offending encoding', () => {
    let caught: unknown;
    try {
      parseDuration('PTxH');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MalformedDurationError);
    expect(caught).toMatchObject({
      code: 'MALFORMED_DURATION',
      message: 'Malformed duration: "PTxH"',
    });
  });
});

describe('entryElapsedHours', () => {
  const base = { id: 'e1', start: 0, projectId: null, description: '' };

  it('reads the duration of a stopped entry', () => {
    expect(entryElapsedHours({ ...base, interval: { state: 'stopped', duration: 'PT2H' } })).toBe(2);
  });

  it('gives zero for a running entry', () => {
    expect(entryElapsedHours({ ...base, interval: { state: 'running' } })).toBe(0);
  });
});
