import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getEnv, resetEnv } from '../env.js';
import { ConfigurationError } from '../../types/errors.js';

const KEYS = [
  'CATALOG_OCR_ENABLED',
  'CATALOG_OCR_MIN_TEXT_CHARS',
  'CATALOG_OCR_CONCURRENCY',
  'CATALOG_DOCUMENT_CONCURRENCY',
] as const;

describe('getEnv', () => {
  const saved: Partial<Record<(typeof KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetEnv();
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetEnv();
  });

  it('applies defaults', () => {
    const env = getEnv();
    expect(env.NODE_ENV).toBe('test');
    expect(env.CATALOG_OCR_ENABLED).toBe(true);
    expect(env.CATALOG_OCR_MIN_TEXT_CHARS).toBe(200);
    expect(env.CATALOG_OCR_CONCURRENCY).toBe(2);
    expect(env.CATALOG_DOCUMENT_CONCURRENCY).toBe(4);
  });

  it('reads overrides', () => {
    process.env.CATALOG_OCR_ENABLED = 'false';
    process.env.CATALOG_OCR_MIN_TEXT_CHARS = '50';
    process.env.CATALOG_DOCUMENT_CONCURRENCY = '8';

    const env = getEnv();
    expect(env.CATALOG_OCR_ENABLED).toBe(false);
    expect(env.CATALOG_OCR_MIN_TEXT_CHARS).toBe(50);
    expect(env.CATALOG_DOCUMENT_CONCURRENCY).toBe(8);
  });

  it('caches until reset', () => {
    const first = getEnv();
    process.env.CATALOG_OCR_CONCURRENCY = '3';
    expect(getEnv()).toBe(first);

    resetEnv();
    expect(getEnv().CATALOG_OCR_CONCURRENCY).toBe(3);
  });

  it('rejects a concurrency below one', () => {
    process.env.CATALOG_DOCUMENT_CONCURRENCY = '0';
    expect(() => getEnv()).toThrow(ConfigurationError);
  });
});
