import type { StyleFlags } from './style-flags.js';

/**
 * A contiguous, non-empty piece of paragraph text with the style active for it.
 * The text is copied out of the source and never spans a markup delimiter.
 */
export interface StyledRun {
  readonly text: string;
  readonly style: StyleFlags;
}

/**
 * Debug state interface for zero-allocation diagnostics
 */
export interface ScannerDebugState {
  /** Current absolute position (index) in the source. */
  pos: number;

  /** End of the range being scanned (exclusive). */
  end: number;

  /** Where the pending, not yet flushed slice begins. */
  sliceStart: number;

  /** Style that applies to the pending slice. */
  style: StyleFlags;

  /** Human-readable style (e.g. 'Bold|Italic', 'None'). */
  styleName: string;

  /** The text of the last run produced by scan(). */
  currentRunText: string;

  /** The offset where the next run will start scanning. */
  nextOffset: number;
}
