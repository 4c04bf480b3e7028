/**
 * Document layer: splits input into paragraphs, scans each one into runs and
 * joins the rendered paragraphs back together.
 */

import { renderRuns } from './renderer/run-renderer.js';
import type { StyledRun } from './scanner/run-types.js';
import { scanRuns } from './scanner/scanner.js';

/**
 * Element kinds. Paragraph is the only block the markup knows about.
 */
export enum ElementKind {
  Paragraph,
}

export interface ParagraphElement {
  kind: ElementKind.Paragraph;
  pos: number;                      // Offset of the paragraph in the source
  end: number;                      // Offset just past the paragraph (exclusive)
  runs: readonly StyledRun[];
}

export type DocumentElement = ParagraphElement;

export interface Document {
  source: string;
  elements: readonly DocumentElement[];
}

/**
 * How the input is cut into paragraphs before scanning.
 * - `blank-line`: every "\n\n" ends a paragraph
 * - `single`: the whole input is one paragraph
 */
export type ParagraphMode = 'blank-line' | 'single';

/**
 * Parser configuration options
 */
export interface ParseOptions {
  /** Paragraph segmentation rule (default: 'blank-line') */
  paragraphMode?: ParagraphMode;
}

const PARAGRAPH_SEPARATOR = '\n\n';
const PARAGRAPH_TERMINATOR = '\n\n';

export function createParagraphElement(source: string, pos: number, end: number): ParagraphElement {
  return {
    kind: ElementKind.Paragraph,
    pos,
    end,
    runs: scanRuns(source, pos, end - pos)
  };
}

/**
 * Parse a document. Paragraph ranges behave like a plain string split, so
 * "a\n\n\n\nb" has an empty paragraph between `a` and `b`, and empty input is
 * one empty paragraph.
 */
export function parseDocument(text: string, options: ParseOptions = {}): Document {
  const paragraphMode = options.paragraphMode ?? 'blank-line';
  const elements: DocumentElement[] = [];

  if (paragraphMode === 'single') {
    elements.push(createParagraphElement(text, 0, text.length));
    return { source: text, elements };
  }

  let pos = 0;
  while (true) {
    const separator = text.indexOf(PARAGRAPH_SEPARATOR, pos);
    if (separator < 0) break;
    elements.push(createParagraphElement(text, pos, separator));
    pos = separator + PARAGRAPH_SEPARATOR.length;
  }
  elements.push(createParagraphElement(text, pos, text.length));

  return { source: text, elements };
}

export function renderElement(element: DocumentElement): string {
  switch (element.kind) {
    case ElementKind.Paragraph:
      return renderRuns(element.runs);
  }
}

/** Every element is followed by a blank line, the last one included. */
export function renderDocument(document: Document): string {
  let output = '';
  for (const element of document.elements) {
    output += renderElement(element) + PARAGRAPH_TERMINATOR;
  }
  return output;
}

/** Parse and render in one step. */
export function renderMarkup(text: string, options?: ParseOptions): string {
  return renderDocument(parseDocument(text, options));
}
