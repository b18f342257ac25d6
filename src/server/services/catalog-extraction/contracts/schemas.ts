/**
 * Catalog Extraction Contract Schemas (Zod)
 *
 * Runtime validation of documents entering the engine and of serialized
 * course records leaving it.
 */

import { z } from 'zod';
import { SOURCE_FORMATS } from '../types/SourceFormat.js';

export const sourceFormatSchema = z.enum(SOURCE_FORMATS);

export const rawPageSchema = z.object({
  documentId: z.string().min(1, 'documentId is required'),
  pageIndex: z.number().int().positive('pageIndex is 1-based'),
  text: z.string({ required_error: 'page text is missing' }),
});

export const catalogDocumentInputSchema = z
  .object({
    documentId: z.string().min(1, 'documentId is required'),
    sourceFormat: sourceFormatSchema,
    pages: z.array(rawPageSchema).min(1, 'document has no pages'),
  })
  .refine(
    (data) => new Set(data.pages.map(p => p.pageIndex)).size === data.pages.length,
    { message: 'pageIndex values must be unique within a document', path: ['pages'] }
  );

/**
 * Serialized course record (snake_case, absent values as explicit null)
 */
export const courseRecordObjectSchema = z
  .object({
    identifier: z.string().min(1),
    subject: z.string(),
    title: z.string().min(1),
    description: z.string(),
    credits_raw: z.string().nullable(),
    credits_min: z.number().nullable(),
    credits_max: z.number().nullable(),
    prereq: z.string().nullable(),
    level_term: z.string().nullable(),
    instructors: z.string().nullable(),
    source_document_id: z.string().min(1),
    start_page: z.number().int().positive(),
  })
  .strict()
  .refine(
    (data) => data.credits_min === null || data.credits_max === null || data.credits_min <= data.credits_max,
    { message: 'credits_min must not exceed credits_max', path: ['credits_min'] }
  );

export type CatalogDocumentInputValidated = z.infer<typeof catalogDocumentInputSchema>;
export type CourseRecordObject = z.infer<typeof courseRecordObjectSchema>;
