import type { StyledRun } from '../scanner/run-types.js';
import { scanRuns } from '../scanner/scanner.js';
import { StyleFlags, transitionCodes } from '../scanner/style-flags.js';

/**
 * Render a run list to text with embedded SGR codes.
 *
 * Only the attributes that change between neighbouring runs are switched, and
 * whatever is still active after the last run is closed, so the output always
 * leaves the terminal unstyled. An empty run list renders to ''.
 */
export function renderRuns(runs: readonly StyledRun[]): string {
  let output = '';
  let previousStyle: StyleFlags = StyleFlags.None;
  for (const run of runs) {
    output += transitionCodes(previousStyle, run.style) + run.text;
    previousStyle = run.style;
  }
  return output + transitionCodes(previousStyle, StyleFlags.None);
}

/** Scan and render a single paragraph. */
export function renderText(text: string): string {
  return renderRuns(scanRuns(text));
}
