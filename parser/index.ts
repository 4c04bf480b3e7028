export { createScanner, scanRuns } from './scanner/scanner.js';
export type { Scanner } from './scanner/scanner.js';
export type { StyledRun, ScannerDebugState } from './scanner/run-types.js';
export {
  StyleFlags,
  toggleStyle,
  hasStyle,
  styleDifference,
  startCodes,
  endCodes,
  transitionCodes,
  describeStyle
} from './scanner/style-flags.js';
export { renderRuns, renderText } from './renderer/run-renderer.js';

// Document layer
export * from './document.js';
