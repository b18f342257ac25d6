/**
 * Record Normalizer
 *
 * Canonicalizes identifiers, titles and credit tokens, and turns a segmented
 * block plus its extracted fields into a validated CourseRecord.
 *
 * Examples:
 * - "cs2500"        -> "CS 2500"
 * - "6 . 100a"      -> "6.100A"
 * - "1-4 Hours"     -> { min: 1, max: 4 }
 * - "3-2-7 units"   -> { min: 12, max: 12 }
 */

import type { IHeaderGrammar } from '../interfaces/IHeaderGrammar.js';
import type { RawCourseBlock } from '../types/CourseBlock.js';
import type { CourseRecord, CreditRange, ExtractedFields } from '../types/CourseRecord.js';

const SUBJECT_NUMBER_RE = /^([A-Z]{2,6})\s*-?\s*(\d{3,5}[A-Z]?)$/;
const HTML_TAG_RE = /<[^>]*>/g;
const NUMBER_RE = /\d+(?:\.\d+)?/g;
const UNIT_TRIPLE_RE = /^\s*(\d+)\s*-\s*(\d+)\s*-\s*(\d+)\s*units\b/i;

export type RejectionReason = 'empty_identifier' | 'empty_title' | 'header_mismatch';

export type RecordBuildResult =
  | { ok: true; record: CourseRecord }
  | { ok: false; reason: RejectionReason };

function collapse(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

export function canonicalIdentifier(raw: string): string {
  const id = collapse(raw.toUpperCase()).replace(/\s*\.\s*/g, '.');
  const subjectNumber = SUBJECT_NUMBER_RE.exec(id);
  return subjectNumber ? `${subjectNumber[1]} ${subjectNumber[2]}` : id;
}

/**
 * Leading segment of an identifier: `6.100A` -> `6`, `CS 2500` -> `CS`
 */
export function subjectPrefix(identifier: string): string {
  return identifier.split(/[.\s-]/)[0] ?? '';
}

export function canonicalTitle(raw: string): string {
  return collapse(raw.replace(HTML_TAG_RE, ' ')).replace(/\.$/, '');
}

export function cleanDescription(raw: string): string {
  return collapse(raw.replace(HTML_TAG_RE, ' '));
}

/**
 * Numeric range of a credit token. Unparseable or absent tokens give nulls.
 */
export function parseCredits(token: string | null | undefined): CreditRange {
  if (!token) {
    return { min: null, max: null };
  }

  const t = token.replace(/–/g, '-');
  const nums = (t.match(NUMBER_RE) ?? []).map(Number);
  if (nums.length === 0) {
    return { min: null, max: null };
  }

  if (t.includes('-') && nums.length >= 2) {
    const [a, b] = nums;
    return { min: Math.min(a, b), max: Math.max(a, b) };
  }

  return { min: nums[0], max: nums[0] };
}

/**
 * Like parseCredits, except a lecture-lab-preparation triple is summed
 */
export function parseUnits(token: string | null | undefined): CreditRange {
  const triple = token ? UNIT_TRIPLE_RE.exec(token) : null;
  if (triple) {
    const total = Number(triple[1]) + Number(triple[2]) + Number(triple[3]);
    return { min: total, max: total };
  }
  return parseCredits(token);
}

/**
 * Validate a block and assemble its record.
 *
 * The header is re-parsed through the grammar that produced it; a block whose
 * header no longer matches is rejected rather than emitted.
 */
export function buildCourseRecord(
  block: RawCourseBlock,
  fields: ExtractedFields,
  grammar: IHeaderGrammar
): RecordBuildResult {
  const identifier = canonicalIdentifier(block.identifier);
  if (identifier.length === 0) {
    return { ok: false, reason: 'empty_identifier' };
  }

  const title = canonicalTitle(block.title);
  if (title.length === 0) {
    return { ok: false, reason: 'empty_title' };
  }

  const reparsed = grammar.match(`${block.identifier} ${block.title}`);
  if (!reparsed || canonicalIdentifier(reparsed.identifier) !== identifier) {
    return { ok: false, reason: 'header_mismatch' };
  }

  const creditsRaw = block.creditsFragment ?? fields.units ?? null;
  const credits = parseUnits(creditsRaw);

  return {
    ok: true,
    record: {
      identifier,
      subject: subjectPrefix(identifier),
      title,
      description: cleanDescription(fields.description),
      creditsRaw,
      creditsMin: credits.min,
      creditsMax: credits.max,
      prereq: fields.prereq ?? null,
      levelTerm: fields.levelTerm ?? null,
      instructors: fields.instructors ?? null,
      sourceDocumentId: block.sourceDocumentId,
      startPage: block.startPage,
    },
  };
}
