import { describe, it, expect } from 'vitest';
import { isIsoTimestamp, normalizeDateTimeSeparator, normalizeUtcSuffix } from './dates.js';

describe('normalizeUtcSuffix', () => {
  it('replaces a trailing Z with +00:00', () => {
    expect(normalizeUtcSuffix('2099-01-01T00:00:00Z')).toBe('2099-01-01T00:00:00+00:00');
  });

  it('leaves other values untouched', () => {
    expect(normalizeUtcSuffix('2099-01-01T00:00:00')).toBe('2099-01-01T00:00:00');
    expect(normalizeUtcSuffix('2099-01-01T00:00:00+02:00')).toBe('2099-01-01T00:00:00+02:00');
  });
});

describe('normalizeDateTimeSeparator', () => {
  it('turns a space separator into T', () => {
    expect(normalizeDateTimeSeparator('2099-01-01 10:00:00')).toBe('2099-01-01T10:00:00');
  });

  it('leaves T-separated values and plain dates untouched', () => {
    expect(normalizeDateTimeSeparator('2099-01-01T10:00:00')).toBe('2099-01-01T10:00:00');
    expect(normalizeDateTimeSeparator('2099-01-01')).toBe('2099-01-01');
  });
});

describe('isIsoTimestamp', () => {
  it('accepts date-times without a zone', () => {
    expect(isIsoTimestamp('2099-01-01T00:00:00')).toBe(true);
  });

  it('accepts UTC and offset date-times', () => {
    expect(isIsoTimestamp('2099-01-01T00:00:00Z')).toBe(true);
    expect(isIsoTimestamp('2026-10-19T08:30:00.000Z')).toBe(true);
    expect(isIsoTimestamp('2099-01-01T00:00:00+02:00')).toBe(true);
  });

  it('accepts a space between date and time', () => {
    expect(isIsoTimestamp('2099-01-01 10:00:00')).toBe(true);
    expect(isIsoTimestamp('2099-01-01 10:00:00Z')).toBe(true);
  });

  it('accepts plain calendar dates', () => {
    expect(isIsoTimestamp('2099-01-01')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isIsoTimestamp('not-a-date')).toBe(false);
    expect(isIsoTimestamp('')).toBe(false);
    expect(isIsoTimestamp('01/02/2099')).toBe(false);
    expect(isIsoTimestamp('2099-13-01T00:00:00')).toBe(false);
    expect(isIsoTimestamp('2099-01-01  10:00:00')).toBe(false);
  });
});
