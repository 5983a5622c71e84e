import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parsePort, parseQuota, toOverrides } from '../../../src/cli/options.js';

describe('parseQuota', () => {
  it('parses a USD amount', () => {
    expect(parseQuota('2.5')).toBe(2.5);
    expect(parseQuota('0')).toBe(0);
    expect(parseQuota('-1')).toBe(-1);
  });

  it('rejects non-numeric values', () => {
    expect(() => parseQuota('abc')).toThrow('Quota must be a number.');
    expect(() => parseQuota('Infinity')).toThrow(InvalidArgumentError);
    expect(() => parseQuota('')).toThrow(InvalidArgumentError);
  });
});

describe('parsePort', () => {
  it('parses a port', () => {
    expect(parsePort('5000')).toBe(5000);
  });

  it('rejects out-of-range and fractional ports', () => {
    expect(() => parsePort('70000')).toThrow(InvalidArgumentError);
    expect(() => parsePort('50.5')).toThrow(InvalidArgumentError);
    expect(() => parsePort('')).toThrow(InvalidArgumentError);
  });
});

describe('toOverrides', () => {
  it('maps flags onto config fields', () => {
    expect(toOverrides({ quota: 1, port: 8080, host: '0.0.0.0', pricing: 'p.csv', config: 'c.json' })).toEqual({
      ceilingUsd: 1,
      port: 8080,
      host: '0.0.0.0',
      pricingFile: 'p.csv',
    });
  });
});
