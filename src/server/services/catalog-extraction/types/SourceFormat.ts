/**
 * Catalog source formats the engine understands.
 *
 * - `scanned-era`: OCR-recovered text from scanned historical catalogs
 *   (`1.125 Title` headers, per-page OCR fallback)
 * - `current-era`: text of rendered catalog markup (`6.100A Title` headers)
 * - `credit-hour`: subject-plus-number catalogs with credits on the header
 *   line (`CS 2500. Title. (4 Hours)`)
 */
export const SOURCE_FORMATS = ['scanned-era', 'current-era', 'credit-hour'] as const;

export type SourceFormat = (typeof SOURCE_FORMATS)[number];
