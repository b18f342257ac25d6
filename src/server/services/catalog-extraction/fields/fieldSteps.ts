/**
 * Field extraction steps
 *
 * Each step looks at the residual body text (lines kept, joined with "\n").
 * A capturing step removes its matched span before returning, so later steps
 * never see characters an earlier step claimed.
 */

import type { CarvedField, FieldStepResult, IFieldExtractionStep } from '../interfaces/IFieldExtractionStep.js';

// Horizontal whitespace only: markers must not reach across line breaks.
const CREDIT_TRIPLE = String.raw`\d+[ \t]*-[ \t]*\d+[ \t]*-[ \t]*\d+[ \t]*[Uu]nits`;
const CREDIT_SINGLE = String.raw`\d+(?:\.\d+)?(?:[ \t]*[-–][ \t]*\d+(?:\.\d+)?)?[ \t]*(?:[Uu]nits|UNITS|SH|[Hh]ours|HOURS|[Cc]redits?)`;

/**
 * The value may wrap onto following lines that start lower-case
 * ("Permission of\ninstructor"); it ends at a level/term or credit marker,
 * at a line break before any other line, or at the end of the text.
 */
export const PREREQ_RE = new RegExp(
  String.raw`\b(?:[Pp]rereq(?:uisites?)?|PREREQ)[ \t]*:[ \t]*((?:[^\n]|\n(?=[ \t]*[a-z]))+?)(?=\b[UG][ \t]*\(|\b${CREDIT_TRIPLE}\b|\b${CREDIT_SINGLE}\b|\n(?![ \t]*[a-z])|$)`
);

export const LEVEL_TERM_RE = /\b([UG])[ \t]*\(([^)\n]+)\)/;

/** Tried in order; the first pattern that matches wins */
export const UNIT_TOKEN_RES: readonly RegExp[] = [
  /\b(\d+[ \t]*-[ \t]*\d+[ \t]*-[ \t]*\d+[ \t]*units)\b/i,
  /\b(\d+(?:\.\d+)?(?:[ \t]*[-–][ \t]*\d+(?:\.\d+)?)?[ \t]*units)\b/i,
  /\b(\d+(?:\.\d+)?(?:[ \t]*[-–][ \t]*\d+(?:\.\d+)?)?[ \t]*(?:SH|Hours|Hrs|Credits?))\b/i,
];

export const LABELLED_INSTRUCTORS_RE = /^[ \t]*Instructors?[ \t]*:[ \t]*(.+?)[ \t]*$/im;

/** `Staff`, `A. Madry`, `S. Devadas, J. K. Smith` on a line of its own */
export const STANDALONE_INSTRUCTORS_RE =
  /^[ \t]*(Staff|(?:[A-Z]\.[ \t]*)+[A-Z][a-z]+(?:[-'][A-Z][a-z]+)?(?:[ \t]*,[ \t]*(?:[A-Z]\.[ \t]*)+[A-Z][a-z]+(?:[-'][A-Z][a-z]+)?)*)[ \t]*$/m;

export const SUBJECT_MEETS_WITH_RE =
  /^\s*Subject meets with\b[\s\S]*?(?=\b(?:Presents|Introduces|Provides|Covers|Explores|Develops|Focuses|Examines|Studies|Designs|Addresses)\b)/i;

export const ADMIN_LINE_RE = /^(?:Prereq|Units|Lecture|Lab|Recitation|Instructors?|Textbook|Coreq|Same subject as)\b/i;

const MAX_INSTRUCTOR_LINE = 80;
const NOISE_LINE_MAX = 2;

function collapse(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

/**
 * Remove a matched span, leaving a single space so neighbouring words stay apart
 */
function carve(residual: string, match: RegExpExecArray): string {
  return residual.slice(0, match.index) + ' ' + residual.slice(match.index + match[0].length);
}

function mapLines(residual: string, keep: (line: string) => boolean): string {
  return residual.split('\n').filter(keep).join('\n');
}

/**
 * Build a capturing step from a pattern whose group 1 holds the value
 */
function captureStep(
  name: string,
  field: CarvedField,
  pattern: RegExp,
  format: (match: RegExpExecArray) => string = m => m[1],
  accept: (match: RegExpExecArray) => boolean = () => true
): IFieldExtractionStep {
  return {
    name,
    apply(residual: string): FieldStepResult {
      const m = pattern.exec(residual);
      if (!m || !accept(m)) {
        return { residual };
      }
      const value = collapse(format(m));
      if (value.length === 0) {
        return { residual };
      }
      return { residual: carve(residual, m), capture: { field, value } };
    },
  };
}

/**
 * Lines of two characters or fewer are scan noise
 */
export const dropNoiseLines: IFieldExtractionStep = {
  name: 'drop-noise-lines',
  apply: residual => ({ residual: mapLines(residual, line => line.trim().length > NOISE_LINE_MAX) }),
};

export const prereqStep = captureStep('prereq', 'prereq', PREREQ_RE);

export const levelTermStep = captureStep('level-term', 'levelTerm', LEVEL_TERM_RE, m => `${m[1]} (${collapse(m[2])})`);

export const unitsStep: IFieldExtractionStep = {
  name: 'units',
  apply(residual: string): FieldStepResult {
    for (const pattern of UNIT_TOKEN_RES) {
      const m = pattern.exec(residual);
      if (m) {
        return { residual: carve(residual, m), capture: { field: 'units', value: collapse(m[1]) } };
      }
    }
    return { residual };
  },
};

export const labelledInstructorsStep = captureStep('labelled-instructors', 'instructors', LABELLED_INSTRUCTORS_RE);

export const standaloneInstructorsStep = captureStep(
  'standalone-instructors',
  'instructors',
  STANDALONE_INSTRUCTORS_RE,
  m => m[1],
  m => m[0].trim().length <= MAX_INSTRUCTOR_LINE
);

/**
 * Drops a leading cross-listing preamble up to the first narrative verb
 */
export const subjectMeetsWithStep: IFieldExtractionStep = {
  name: 'subject-meets-with',
  apply: residual => ({ residual: residual.replace(SUBJECT_MEETS_WITH_RE, '') }),
};

/**
 * Administrative lines are dropped wholesale, not carved
 */
export const adminLineFilter: IFieldExtractionStep = {
  name: 'admin-line-filter',
  apply: residual => ({ residual: mapLines(residual, line => !ADMIN_LINE_RE.test(line.trim())) }),
};

/**
 * Joins the remaining lines and strips punctuation left orphaned by carving
 */
export const residualCleanup: IFieldExtractionStep = {
  name: 'residual-cleanup',
  apply(residual: string): FieldStepResult {
    const joined = residual
      .split('\n')
      .map(collapse)
      .filter(line => line.length > 0 && /[\p{L}\p{N}]/u.test(line))
      .join(' ');

    const cleaned = joined
      .replace(/\(\s*\)/g, ' ')
      .replace(/(^|\s)[.,;:]+(?=\s|$)/g, '$1');

    return { residual: collapse(cleaned) };
  },
};
