import { describe, it, expect } from 'vitest';
import {
  buildCourseRecord,
  canonicalIdentifier,
  canonicalTitle,
  cleanDescription,
  parseCredits,
  parseUnits,
  subjectPrefix,
} from '../records/RecordNormalizer.js';
import { creditHourGrammar, scannedEraGrammar } from '../segmentation/headerGrammars.js';
import type { RawCourseBlock } from '../types/CourseBlock.js';

describe('canonicalIdentifier', () => {
  it('upper-cases and removes spaces around dots', () => {
    expect(canonicalIdentifier('  6 . 100a ')).toBe('6.100A');
    expect(canonicalIdentifier('1.125')).toBe('1.125');
  });

  it('puts a single space between subject and number', () => {
    expect(canonicalIdentifier('cs2500')).toBe('CS 2500');
    expect(canonicalIdentifier('ARCH-1110')).toBe('ARCH 1110');
    expect(canonicalIdentifier('MATH   1341')).toBe('MATH 1341');
  });
});

describe('subjectPrefix', () => {
  it('returns the segment before the first separator', () => {
    expect(subjectPrefix('6.100A')).toBe('6');
    expect(subjectPrefix('21H.001')).toBe('21H');
    expect(subjectPrefix('CS 2500')).toBe('CS');
  });
});

describe('canonicalTitle', () => {
  it('strips markup, collapses whitespace and drops one trailing period', () => {
    expect(canonicalTitle('<b>Fundamentals of  Computer Science 1.</b>')).toBe('Fundamentals of Computer Science 1');
    expect(canonicalTitle('Title..')).toBe('Title.');
  });
});

describe('cleanDescription', () => {
  it('strips markup and collapses whitespace', () => {
    expect(cleanDescription('Presents <i>an</i>\n introduction.')).toBe('Presents an introduction.');
  });
});

describe('parseCredits', () => {
  it('parses ranges', () => {
    expect(parseCredits('1-4 Hours')).toEqual({ min: 1, max: 4 });
    expect(parseCredits('4–1 Hours')).toEqual({ min: 1, max: 4 });
  });

  it('parses single values', () => {
    expect(parseCredits('4 SH')).toEqual({ min: 4, max: 4 });
    expect(parseCredits('12 units')).toEqual({ min: 12, max: 12 });
    expect(parseCredits('1.5 Hours')).toEqual({ min: 1.5, max: 1.5 });
  });

  it('takes the first number when there is no hyphen', () => {
    expect(parseCredits('3 or 4 credits')).toEqual({ min: 3, max: 3 });
  });

  it('returns nulls for absent or unparseable tokens', () => {
    expect(parseCredits(null)).toEqual({ min: null, max: null });
    expect(parseCredits(undefined)).toEqual({ min: null, max: null });
    expect(parseCredits('')).toEqual({ min: null, max: null });
    expect(parseCredits('variable')).toEqual({ min: null, max: null });
  });
});

describe('parseUnits', () => {
  it('sums a lecture-lab-preparation triple', () => {
    expect(parseUnits('3-2-7 units')).toEqual({ min: 12, max: 12 });
  });

  it('falls back to parseCredits for other tokens', () => {
    expect(parseUnits('12 units')).toEqual({ min: 12, max: 12 });
    expect(parseUnits('1-4 Hours')).toEqual({ min: 1, max: 4 });
    expect(parseUnits(null)).toEqual({ min: null, max: null });
  });
});

describe('buildCourseRecord', () => {
  const scannedBlock: RawCourseBlock = {
    identifier: '1.125',
    title: 'Architecting Software Systems',
    bodyLines: [],
    sourceDocumentId: 'doc-1',
    startPage: 3,
  };

  it('builds a record with explicit nulls for absent fields', () => {
    const result = buildCourseRecord(
      scannedBlock,
      { description: 'Presents principles of software', prereq: '1.00', units: '12 units' },
      scannedEraGrammar
    );

    expect(result).toEqual({
      ok: true,
      record: {
        identifier: '1.125',
        subject: '1',
        title: 'Architecting Software Systems',
        description: 'Presents principles of software',
        creditsRaw: '12 units',
        creditsMin: 12,
        creditsMax: 12,
        prereq: '1.00',
        levelTerm: null,
        instructors: null,
        sourceDocumentId: 'doc-1',
        startPage: 3,
      },
    });
  });

  it('prefers header credits over a body units token', () => {
    const block: RawCourseBlock = {
      identifier: 'CS 2500',
      title: 'Fundamentals of Computer Science 1.',
      creditsFragment: '4 Hours',
      bodyLines: [],
      sourceDocumentId: 'doc-2',
      startPage: 1,
    };

    const result = buildCourseRecord(block, { description: 'Introduces design.', units: '12 units' }, creditHourGrammar);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.record.title).toBe('Fundamentals of Computer Science 1');
      expect(result.record.subject).toBe('CS');
      expect(result.record.creditsRaw).toBe('4 Hours');
      expect(result.record.creditsMin).toBe(4);
      expect(result.record.creditsMax).toBe(4);
    }
  });

  it('keeps records whose credits cannot be parsed', () => {
    const result = buildCourseRecord(scannedBlock, { description: 'Covers systems.' }, scannedEraGrammar);
    expect(result.ok && result.record.creditsRaw).toBeNull();
    expect(result.ok && result.record.creditsMin).toBeNull();
  });

  it('rejects an empty title', () => {
    expect(buildCourseRecord({ ...scannedBlock, title: '<i></i>' }, { description: '' }, scannedEraGrammar)).toEqual({
      ok: false,
      reason: 'empty_title',
    });
  });

  it('rejects an empty identifier', () => {
    expect(buildCourseRecord({ ...scannedBlock, identifier: '  ' }, { description: '' }, scannedEraGrammar)).toEqual({
      ok: false,
      reason: 'empty_identifier',
    });
  });

  it('rejects a header the grammar no longer accepts', () => {
    expect(buildCourseRecord({ ...scannedBlock, identifier: 'XYZ' }, { description: '' }, scannedEraGrammar)).toEqual({
      ok: false,
      reason: 'header_mismatch',
    });
  });
});
