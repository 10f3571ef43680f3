import { describe, it, expect } from 'vitest';
import { config, positiveInt } from '../src/config.js';

describe('positiveInt', () => {
  it('reads a positive integer', () => {
    expect(positiveInt('8', 4)).toBe(8);
    expect(positiveInt(' 12 ', 4)).toBe(12);
  });

  it('falls back on missing, zero, negative or unreadable values', () => {
    expect(positiveInt(undefined, 4)).toBe(4);
    expect(positiveInt('', 4)).toBe(4);
    expect(positiveInt('0', 4)).toBe(4);
    expect(positiveInt('-3', 4)).toBe(4);
    expect(positiveInt('abc', 4)).toBe(4);
  });
});

describe('config', () => {
  it('always has a usable import concurrency', () => {
    expect(Number.isInteger(config.importer.concurrency)).toBe(true);
    expect(config.importer.concurrency).toBeGreaterThan(0);
  });
});
