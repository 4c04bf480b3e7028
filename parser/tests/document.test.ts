/**
 * Tests for paragraph segmentation and document rendering
 */

import { describe, expect, test } from 'vitest';
import {
  ElementKind,
  createParagraphElement,
  parseDocument,
  renderDocument,
  renderElement,
  renderMarkup
} from '../document.js';
import { StyleFlags } from '../scanner/style-flags.js';

describe('Document', () => {
  describe('parseDocument', () => {
    test('blank lines separate paragraphs', () => {
      const document = parseDocument('lorem\n\n*ipsum*');
      expect(document.source).toBe('lorem\n\n*ipsum*');
      expect(document.elements).toEqual([
        {
          kind: ElementKind.Paragraph,
          pos: 0,
          end: 5,
          runs: [{ text: 'lorem', style: StyleFlags.None }]
        },
        {
          kind: ElementKind.Paragraph,
          pos: 7,
          end: 14,
          runs: [{ text: 'ipsum', style: StyleFlags.Italic }]
        }
      ]);
    });

    test('empty input is one empty paragraph', () => {
      const document = parseDocument('');
      expect(document.elements).toEqual([
        { kind: ElementKind.Paragraph, pos: 0, end: 0, runs: [] }
      ]);
    });

    test('four newlines leave an empty paragraph in between', () => {
      const document = parseDocument('lorem\n\n\n\nipsum');
      expect(document.elements.map(element => [element.pos, element.end])).toEqual([
        [0, 5],
        [7, 7],
        [9, 14]
      ]);
    });

    test('a third newline starts the next paragraph', () => {
      const document = parseDocument('lorem\n\n\nipsum');
      expect(document.elements.map(element => element.runs)).toEqual([
        [{ text: 'lorem', style: StyleFlags.None }],
        [
          { text: ' ', style: StyleFlags.None },
          { text: 'ipsum', style: StyleFlags.None }
        ]
      ]);
    });

    test('style does not carry over into the next paragraph', () => {
      const document = parseDocument('**lorem\n\nipsum');
      expect(document.elements.map(element => element.runs)).toEqual([
        [{ text: 'lorem', style: StyleFlags.Bold }],
        [{ text: 'ipsum', style: StyleFlags.None }]
      ]);
    });

    test('single mode keeps blank lines inside one paragraph', () => {
      const document = parseDocument('lorem\n\nipsum', { paragraphMode: 'single' });
      expect(document.elements).toEqual([
        {
          kind: ElementKind.Paragraph,
          pos: 0,
          end: 12,
          runs: [
            { text: 'lorem ', style: StyleFlags.None },
            { text: ' ', style: StyleFlags.None },
            { text: 'ipsum', style: StyleFlags.None }
          ]
        }
      ]);
    });
  });

  describe('rendering', () => {
    test('renderElement renders a paragraph', () => {
      const paragraph = createParagraphElement('xx**lorem**xx', 2, 11);
      expect(renderElement(paragraph)).toBe('\x1b[1mlorem\x1b[22m');
    });

    test('every paragraph is followed by a blank line', () => {
      const document = parseDocument('**lorem**\n\nipsum');
      expect(renderDocument(document)).toBe('\x1b[1mlorem\x1b[22m\n\nipsum\n\n');
    });

    test('an open style is closed before the paragraph break', () => {
      expect(renderMarkup('~~lorem\n\nipsum')).toBe('\x1b[9mlorem\x1b[29m\n\nipsum\n\n');
    });

    test('empty input renders a single blank line', () => {
      expect(renderMarkup('')).toBe('\n\n');
    });

    test('single mode folds the blank line into spaces', () => {
      expect(renderMarkup('lorem\n\nipsum', { paragraphMode: 'single' })).toBe('lorem  ipsum\n\n');
    });
  });
});
