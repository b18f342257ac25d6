/**
 * Segmentation State Machine
 *
 * Splits the ordered line stream of one document into raw course blocks.
 * The machine state is a plain value threaded through `transition`, one call
 * per line; nothing is mutated in place.
 *
 *   idle    --header-->  inBlock(fresh block)
 *   inBlock --header-->  inBlock(fresh block), previous block flushed
 *   inBlock --other-->   inBlock(line appended)
 *   idle    --other-->   idle (line dropped)
 */

import type { IHeaderGrammar } from '../interfaces/IHeaderGrammar.js';
import type { CourseHeader, RawCourseBlock } from '../types/CourseBlock.js';
import type { NormalizedPage } from '../types/Page.js';
import { toLines } from '../normalizers/PageTextNormalizer.js';

export type SegmentationState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'inBlock'; readonly open: RawCourseBlock };

export const INITIAL_STATE: SegmentationState = { kind: 'idle' };

/**
 * A block leaving the machine: either completed, or discarded for having no title
 */
export type FlushedBlock =
  | { readonly kind: 'completed'; readonly block: RawCourseBlock }
  | { readonly kind: 'discarded'; readonly block: RawCourseBlock };

export interface TransitionResult {
  readonly state: SegmentationState;
  readonly flushed?: FlushedBlock;
  /** True when the line was dropped because no block was open */
  readonly dropped: boolean;
}

export interface SegmentationResult {
  blocks: RawCourseBlock[];
  /** Blocks thrown away at flush time because their title was empty */
  discarded: RawCourseBlock[];
  /** Lines seen before the first header */
  droppedLines: number;
}

function openBlock(header: CourseHeader, documentId: string): RawCourseBlock {
  return {
    identifier: header.identifier,
    title: header.titleFragment,
    ...(header.creditsFragment !== undefined && { creditsFragment: header.creditsFragment }),
    bodyLines: [],
    sourceDocumentId: documentId,
    startPage: header.pageIndex,
  };
}

function flushBlock(block: RawCourseBlock): FlushedBlock {
  return block.title.trim().length === 0
    ? { kind: 'discarded', block }
    : { kind: 'completed', block };
}

/**
 * Flush whatever block is open. Used at end of document.
 */
export function flush(state: SegmentationState): FlushedBlock | undefined {
  return state.kind === 'inBlock' ? flushBlock(state.open) : undefined;
}

/**
 * Advance the machine by one line.
 */
export function transition(
  state: SegmentationState,
  line: string,
  pageIndex: number,
  grammar: IHeaderGrammar,
  documentId: string
): TransitionResult {
  const match = grammar.match(line);

  if (match) {
    const header: CourseHeader = { ...match, pageIndex };
    const flushed = flush(state);
    return {
      state: { kind: 'inBlock', open: openBlock(header, documentId) },
      ...(flushed && { flushed }),
      dropped: false,
    };
  }

  if (state.kind === 'inBlock') {
    const open: RawCourseBlock = { ...state.open, bodyLines: [...state.open.bodyLines, line] };
    return { state: { kind: 'inBlock', open }, dropped: false };
  }

  return { state, dropped: true };
}

/**
 * Run the machine over all pages of one document, in page order.
 */
export function segmentPages(
  pages: readonly NormalizedPage[],
  grammar: IHeaderGrammar,
  documentId: string
): SegmentationResult {
  const result: SegmentationResult = { blocks: [], discarded: [], droppedLines: 0 };
  let state: SegmentationState = INITIAL_STATE;

  const collect = (flushed: FlushedBlock | undefined) => {
    if (!flushed) return;
    if (flushed.kind === 'completed') {
      result.blocks.push(flushed.block);
    } else {
      result.discarded.push(flushed.block);
    }
  };

  for (const page of pages) {
    for (const line of toLines(page.text)) {
      const next = transition(state, line, page.pageIndex, grammar, documentId);
      collect(next.flushed);
      if (next.dropped) {
        result.droppedLines++;
      }
      state = next.state;
    }
  }

  collect(flush(state));
  return result;
}
