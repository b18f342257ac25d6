/**
 * Course record serializer
 *
 * Maps records to their snake_case wire shape and validates the result.
 */

import { ZodError } from 'zod';
import { courseRecordObjectSchema, type CourseRecordObject } from './schemas.js';
import type { CourseRecord } from '../types/CourseRecord.js';
import { ContractValidationError } from '../../../types/errors.js';

export function toCourseRecordObject(record: CourseRecord): CourseRecordObject {
  return {
    identifier: record.identifier,
    subject: record.subject,
    title: record.title,
    description: record.description,
    credits_raw: record.creditsRaw,
    credits_min: record.creditsMin,
    credits_max: record.creditsMax,
    prereq: record.prereq,
    level_term: record.levelTerm,
    instructors: record.instructors,
    source_document_id: record.sourceDocumentId,
    start_page: record.startPage,
  };
}

/**
 * Serialize records to validated plain objects, preserving order
 *
 * @throws {ContractValidationError} if a record violates the output contract
 */
export function serializeCourseRecords(records: readonly CourseRecord[]): CourseRecordObject[] {
  return records.map((record, index) => {
    try {
      return courseRecordObjectSchema.parse(toCourseRecordObject(record));
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ContractValidationError(
          `Course record ${index} (${record.identifier}) validation failed: ${error.message}`,
          error.issues
        );
      }
      throw error;
    }
  });
}

/**
 * Serialize records to a JSON array string
 *
 * @throws {ContractValidationError} if a record violates the output contract
 */
export function serializeCourseRecordsJson(records: readonly CourseRecord[]): string {
  return JSON.stringify(serializeCourseRecords(records), null, 2);
}
