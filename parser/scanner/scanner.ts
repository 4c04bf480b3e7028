import { CharacterCodes, scalarWidthAt } from './character-codes.js';
import type { ScannerDebugState, StyledRun } from './run-types.js';
import { StyleFlags, describeStyle, toggleStyle } from './style-flags.js';

export interface Scanner {
  /** Initialize scanner text and optional start/length. */
  initText(text: string, start?: number, length?: number): void;

  /**
   * Advances to the next non-empty run and updates the public run fields.
   * Returns false once the range is exhausted; the fields then keep the last run.
   */
  scan(): boolean;

  /** Fill a zero-allocation diagnostics state object. */
  fillDebugState(state: ScannerDebugState): void;

  /** Text of the current run (always materialized). */
  readonly runText: string;

  /** Style active for the current run. */
  readonly runStyle: StyleFlags;

  /** Where scanning for the next run resumes (offset into the source). */
  readonly offsetNext: number;
}

/** A folded newline becomes this. */
const NEWLINE_REPLACEMENT = ' ';

/**
 * Inline scanner with closure-based architecture.
 *
 * A single left-to-right pass: the pending slice is tracked as an offset and
 * only materialized when a delimiter, a newline or the end of input flushes it.
 * Styles toggle independently, so overlapping regions need no stack.
 */
export function createScanner(): Scanner {
  // Scanner state - encapsulated within closure
  let source = '';
  let pos = 0;
  let end = 0;
  let sliceStart = 0;
  let style: StyleFlags = StyleFlags.None;

  // Scanner interface fields
  let runText = '';
  let runStyle: StyleFlags = StyleFlags.None;
  let offsetNext = 0;

  function initText(text: string, start: number = 0, length?: number): void {
    const rangeEnd = length !== undefined ? start + length : text.length;
    if (start < 0 || start > text.length)
      throw new Error(`Scanner: start ${start} is outside the text (length ${text.length})`);
    if (rangeEnd < start || rangeEnd > text.length)
      throw new Error(`Scanner: length ${length} runs past the end of the text`);

    source = text;
    pos = start;
    end = rangeEnd;
    sliceStart = start;
    style = StyleFlags.None;

    runText = '';
    runStyle = StyleFlags.None;
    offsetNext = start;
  }

  function scan(): boolean {
    const produced = scanImpl();
    offsetNext = pos;
    return produced;
  }

  /**
   * Materialize the pending slice up to `sliceEnd` under the current style.
   * Empty slices carry no render effect and are skipped; returns whether a run was set.
   */
  function flush(sliceEnd: number, suffix: string): boolean {
    const text = source.substring(sliceStart, sliceEnd) + suffix;
    if (!text) return false;
    runText = text;
    runStyle = style;
    return true;
  }

  function scanImpl(): boolean {
    while (pos < end) {
      const ch = source.charCodeAt(pos);
      switch (ch) {
        case CharacterCodes.backslash: {
          const produced = flush(pos, '');
          const escaped = pos + 1;
          if (escaped < end) {
            // the escaped character opens the next slice verbatim
            sliceStart = escaped;
            pos = escaped + scalarWidthAt(source, escaped, end);
          } else {
            // trailing backslash is dropped
            sliceStart = end;
            pos = end;
          }
          if (produced) return true;
          break;
        }

        case CharacterCodes.lineFeed: {
          const produced = flush(pos, NEWLINE_REPLACEMENT);
          pos++;
          sliceStart = pos;
          if (produced) return true;
          break;
        }

        case CharacterCodes.asterisk: {
          const produced = flush(pos, '');
          if (pos + 1 < end && source.charCodeAt(pos + 1) === CharacterCodes.asterisk) {
            style = toggleStyle(style, StyleFlags.Bold);
            pos += 2;
          } else {
            style = toggleStyle(style, StyleFlags.Italic);
            pos++;
          }
          sliceStart = pos;
          if (produced) return true;
          break;
        }

        case CharacterCodes.tilde: {
          if (pos + 1 < end && source.charCodeAt(pos + 1) === CharacterCodes.tilde) {
            const produced = flush(pos, '');
            style = toggleStyle(style, StyleFlags.Strikethrough);
            pos += 2;
            sliceStart = pos;
            if (produced) return true;
          } else {
            // a lone tilde is ordinary text
            pos++;
          }
          break;
        }

        default:
          pos++;
          break;
      }
    }

    if (sliceStart < end) {
      const produced = flush(end, '');
      sliceStart = end;
      return produced;
    }

    return false;
  }

  function fillDebugState(state: ScannerDebugState): void {
    state.pos = pos;
    state.end = end;
    state.sliceStart = sliceStart;
    state.style = style;
    state.styleName = describeStyle(style);
    state.currentRunText = runText;
    state.nextOffset = offsetNext;
  }

  // Return the scanner interface object
  const scanner: Scanner = {
    initText,
    scan,
    fillDebugState,

    // Run fields are read-only views of the closure state; scan() owns them
    get runText() { return runText; },
    get runStyle() { return runStyle; },
    get offsetNext() { return offsetNext; }
  };

  return scanner;
}

/**
 * Scan a whole paragraph into its run list.
 * Total over any input: unbalanced markers leave their style on to the end.
 */
export function scanRuns(text: string, start?: number, length?: number): StyledRun[] {
  const scanner = createScanner();
  scanner.initText(text, start, length);
  const runs: StyledRun[] = [];
  while (scanner.scan()) {
    runs.push({ text: scanner.runText, style: scanner.runStyle });
  }
  return runs;
}
