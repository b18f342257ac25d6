/**
 * Page text normalization
 *
 * Repairs layout artifacts of a single page independent of source format:
 * line terminators, hyphenation across line breaks, blank-line runs and
 * trailing whitespace. The result is stable under re-application.
 */

import type { NormalizedPage, RawPage } from '../types/Page.js';

const HYPHENATED_LINE_BREAK = /([A-Za-z])-\n(?=[A-Za-z])/g;
const BLANK_LINE_RUN = /\n{3,}/g;

function rightTrimLines(text: string): string {
  return text
    .split('\n')
    .map(line => line.trimEnd())
    .join('\n');
}

/**
 * Normalize one page of extracted text.
 *
 * `"archi-\ntecture"` becomes `"architecture"`; a hyphen at the start of a
 * line, or next to a non-letter, is left alone.
 */
export function normalizePageText(text: unknown): string {
  if (typeof text !== 'string' || text.length === 0) {
    return '';
  }

  let s = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  // Trim before joining so "archi-  \ntecture" joins on the first pass too
  s = rightTrimLines(s);
  s = s.replace(HYPHENATED_LINE_BREAK, '$1');
  s = s.replace(BLANK_LINE_RUN, '\n\n');
  s = rightTrimLines(s);

  return s.trim();
}

export function normalizePage(page: RawPage): NormalizedPage {
  return {
    documentId: page.documentId,
    pageIndex: page.pageIndex,
    text: normalizePageText(page.text),
    ocrApplied: false,
  };
}

/**
 * Split normalized page text into lines for segmentation
 */
export function toLines(text: string): string[] {
  return text.length === 0 ? [] : text.split('\n');
}
