import { describe, it, expect } from 'vitest';

import { parseDuration } from '../../src/config/duration.js';

describe('parseDuration', () => {
  it('reads single-unit durations', () => {
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('2m')).toBe(120_000);
    expect(parseDuration('1h')).toBe(3_600_000);
  });

  it('reads compound and fractional durations', () => {
    expect(parseDuration('1m30s')).toBe(90_000);
    expect(parseDuration('1.5h')).toBe(5_400_000);
    expect(parseDuration('4.35s')).toBe(4_350);
    expect(parseDuration('.5s')).toBe(500);
  });

  it('truncates below a millisecond', () => {
    expect(parseDuration('1500us')).toBe(1);
    expect(parseDuration('999999ns')).toBe(0);
  });

  it('accepts a bare zero', () => {
    expect(parseDuration('0')).toBe(0);
  });

  it('keeps the sign of negative durations', () => {
    expect(parseDuration('-5s')).toBe(-5_000);
    expect(parseDuration('-1m30s')).toBe(-90_000);
    expect(parseDuration('-1500us')).toBe(-1);
    expect(parseDuration('+2s')).toBe(2_000);
  });

  it('rejects missing units and junk', () => {
    expect(() => parseDuration('10')).toThrow('invalid duration "10"');
    expect(() => parseDuration('-')).toThrow('invalid duration "-"');
    expect(() => parseDuration('soon')).toThrow('invalid duration "soon"');
    expect(() => parseDuration('5s later')).toThrow('invalid duration');
    expect(() => parseDuration('')).toThrow('empty duration');
  });
});
