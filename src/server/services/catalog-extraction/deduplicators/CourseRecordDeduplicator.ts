import type { CourseRecord } from '../types/CourseRecord.js';
import { canonicalIdentifier } from '../records/RecordNormalizer.js';

/**
 * Identity of a course across documents: canonical identifier plus lower-cased title
 */
export type DedupKey = `${string}|${string}`;

export function dedupKey(record: Pick<CourseRecord, 'identifier' | 'title'>): DedupKey {
  return `${canonicalIdentifier(record.identifier)}|${record.title.toLowerCase()}`;
}

/**
 * Keeps the first record seen for each key. Feed records in document input
 * order for deterministic output.
 */
export class CourseRecordDeduplicator {
  private readonly seen = new Set<DedupKey>();
  private readonly kept: CourseRecord[] = [];
  private duplicateCount = 0;

  /**
   * @returns true if the record was kept, false if it duplicated an earlier one
   */
  add(record: CourseRecord): boolean {
    const key = dedupKey(record);
    if (this.seen.has(key)) {
      this.duplicateCount++;
      return false;
    }
    this.seen.add(key);
    this.kept.push(record);
    return true;
  }

  addAll(records: Iterable<CourseRecord>): void {
    for (const record of records) {
      this.add(record);
    }
  }

  get records(): CourseRecord[] {
    return [...this.kept];
  }

  get duplicates(): number {
    return this.duplicateCount;
  }
}
