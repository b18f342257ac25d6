/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables the extractor reads.
 * Values are parsed manually with defaults and validated once, then cached.
 */

// Load dotenv early to ensure environment variables are available before validation
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

type NodeEnv = 'development' | 'production' | 'test';

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;

  // Logging Configuration
  LOG_LEVEL?: string;
  LOG_PRETTY?: string;

  // OCR fallback
  CATALOG_OCR_ENABLED: boolean;
  CATALOG_OCR_MIN_TEXT_CHARS: number;
  CATALOG_OCR_CONCURRENCY: number;

  // Document fan-out
  CATALOG_DOCUMENT_CONCURRENCY: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {ConfigurationError} If required validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  let nodeEnv: NodeEnv = 'development';
  if (isNodeEnv(nodeEnvRaw)) {
    nodeEnv = nodeEnvRaw;
  } else {
    errors.push(`NODE_ENV: Invalid value "${nodeEnvRaw}". Must be development, production, or test.`);
  }

  const minTextChars = parseNumericEnv(process.env.CATALOG_OCR_MIN_TEXT_CHARS, 200);
  if (minTextChars < 0) {
    errors.push(`CATALOG_OCR_MIN_TEXT_CHARS: Invalid value "${process.env.CATALOG_OCR_MIN_TEXT_CHARS}". Must be 0 or greater.`);
  }

  // OCR backends are slow and usually shared; keep this small.
  const ocrConcurrency = parseNumericEnv(process.env.CATALOG_OCR_CONCURRENCY, 2);
  if (ocrConcurrency < 1) {
    errors.push(`CATALOG_OCR_CONCURRENCY: Invalid value "${process.env.CATALOG_OCR_CONCURRENCY}". Must be at least 1.`);
  }

  const documentConcurrency = parseNumericEnv(process.env.CATALOG_DOCUMENT_CONCURRENCY, 4);
  if (documentConcurrency < 1) {
    errors.push(`CATALOG_DOCUMENT_CONCURRENCY: Invalid value "${process.env.CATALOG_DOCUMENT_CONCURRENCY}". Must be at least 1.`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`,
      { errors }
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,

    LOG_LEVEL: process.env.LOG_LEVEL,
    LOG_PRETTY: process.env.LOG_PRETTY,

    CATALOG_OCR_ENABLED: parseBooleanEnv(process.env.CATALOG_OCR_ENABLED, true),
    CATALOG_OCR_MIN_TEXT_CHARS: minTextChars,
    CATALOG_OCR_CONCURRENCY: ocrConcurrency,

    CATALOG_DOCUMENT_CONCURRENCY: documentConcurrency,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
