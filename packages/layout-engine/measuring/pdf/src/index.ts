/**
 * Text measurer for the card layout engine.
 *
 * Responsibilities:
 * - Parse paragraph markup into bold/italic spans
 * - Greedy line breaking against a content width
 * - Produce explicit measures for every leaf block, so layout never needs to
 *   draw something to learn its height
 *
 * Line breaking strategy:
 * - Breaks on whitespace; runs of whitespace collapse to one space
 * - `<br/>` forces a break
 * - Single words wider than the content width are kept on their own line
 */

import type {
  BlockMeasurer,
  DividerBlock,
  DividerMeasure,
  LeafBlock,
  LeafMeasure,
  Line,
  LineSegment,
  ParagraphBlock,
  ParagraphMeasure,
  SpacerBlock,
  SpacerMeasure,
  TableBlock,
  TableMeasure,
  TextStyle,
} from '@statforge/contracts';
import { faceFor, type FontMetrics } from './font-metrics.js';
import { parseMarkup, type TextSpan } from './rich-text.js';

export { createDeterministicMetrics, createPdfKitMetrics, faceFor } from './font-metrics.js';
export type { FontMetrics, PdfFontHost } from './font-metrics.js';
export { parseMarkup, plainText } from './rich-text.js';
export type { BreakSpan, Span, TextSpan } from './rich-text.js';

type Word = Omit<TextSpan, 'kind'>;

type LineBuilder = {
  pieces: Word[];
  width: number;
};

const sameStyle = (a: Word, b: Word): boolean => a.bold === b.bold && a.italic === b.italic;

/**
 * Breaks styled text into lines no wider than `maxWidth`.
 */
export function breakLines(text: string, style: TextStyle, maxWidth: number, metrics: FontMetrics): Line[] {
  const widthOf = (word: Word): number =>
    metrics.widthOf(word.text, faceFor(style.faces, word.bold, word.italic), style.fontSize);

  const lines: Line[] = [];
  let current: LineBuilder = { pieces: [], width: 0 };
  let pendingSpace: Word | null = null;

  const finishLine = () => {
    lines.push(toLine(current.pieces, style, widthOf));
    current = { pieces: [], width: 0 };
    pendingSpace = null;
  };

  const append = (word: Word, width: number) => {
    const last = current.pieces[current.pieces.length - 1];
    if (last && sameStyle(last, word)) {
      last.text += word.text;
    } else {
      current.pieces.push({ ...word });
    }
    current.width += width;
  };

  for (const span of parseMarkup(text, style.textTransform)) {
    if (span.kind === 'break') {
      finishLine();
      continue;
    }
    for (const token of span.text.split(/(\s+)/)) {
      if (token.length === 0) continue;
      const word: Word = { text: token, bold: span.bold, italic: span.italic };
      if (/^\s+$/.test(token)) {
        pendingSpace = { ...word, text: ' ' };
        continue;
      }

      const wordWidth = widthOf(word);
      const space: Word | null = current.pieces.length > 0 ? pendingSpace : null;
      const spaceWidth = space ? widthOf(space) : 0;

      if (current.pieces.length > 0 && current.width + spaceWidth + wordWidth > maxWidth) {
        finishLine();
      } else if (space) {
        append(space, spaceWidth);
      }
      append(word, wordWidth);
      pendingSpace = null;
    }
  }
  if (current.pieces.length > 0) {
    finishLine();
  }

  return lines;
}

function toLine(pieces: Word[], style: TextStyle, widthOf: (word: Word) => number): Line {
  const segments: LineSegment[] = [];
  let x = 0;
  for (const piece of pieces) {
    const width = widthOf(piece);
    segments.push({ text: piece.text, bold: piece.bold, italic: piece.italic, x, width });
    x += width;
  }
  return { segments, width: x, lineHeight: style.leading };
}

const sumLineHeights = (lines: Line[]): number => lines.reduce((sum, line) => sum + line.lineHeight, 0);

export function measureParagraph(block: ParagraphBlock, maxWidth: number, metrics: FontMetrics): ParagraphMeasure {
  const lines = breakLines(block.text, block.style, maxWidth, metrics);
  return {
    kind: 'paragraph',
    lines,
    totalHeight: sumLineHeights(lines),
    spaceBefore: block.style.spaceBefore,
    spaceAfter: block.style.spaceAfter,
  };
}

const resolveColumnWidths = (block: TableBlock, maxWidth: number): number[] => {
  const columnCount = block.rows.reduce((max, row) => Math.max(max, row.length), 0);
  const fractions = block.columnFractions;
  if (fractions && fractions.length === columnCount) {
    return fractions.map((fraction) => fraction * maxWidth);
  }
  return Array.from({ length: columnCount }, () => (columnCount > 0 ? maxWidth / columnCount : 0));
};

/** Cells carry no padding; a row is as tall as its tallest cell. */
export function measureTable(block: TableBlock, maxWidth: number, metrics: FontMetrics): TableMeasure {
  const columnWidths = resolveColumnWidths(block, maxWidth);
  const rows = block.rows.map((row) => {
    const cells = row.map((cell, index) => {
      const width = columnWidths[index] ?? 0;
      return { width, lines: breakLines(cell.text, cell.style, width, metrics) };
    });
    const height = cells.reduce((max, cell) => Math.max(max, sumLineHeights(cell.lines)), 0);
    return { height, cells };
  });
  return {
    kind: 'table',
    columnWidths,
    rows,
    totalHeight: rows.reduce((sum, row) => sum + row.height, 0),
    spaceBefore: block.spaceBefore,
  };
}

export const measureDivider = (block: DividerBlock): DividerMeasure => ({
  kind: 'divider',
  totalHeight: block.lineHeight + block.spacing,
});

export const measureSpacer = (block: SpacerBlock): SpacerMeasure => ({
  kind: 'spacer',
  totalHeight: block.height,
});

export function measureBlock(block: LeafBlock, maxWidth: number, metrics: FontMetrics): LeafMeasure {
  switch (block.kind) {
    case 'paragraph':
      return measureParagraph(block, maxWidth, metrics);
    case 'table':
      return measureTable(block, maxWidth, metrics);
    case 'divider':
      return measureDivider(block);
    case 'spacer':
      return measureSpacer(block);
  }
}

/**
 * Binds a metrics source into a {@link BlockMeasurer}, caching by block and
 * width. Blocks are immutable once built, so identity is a safe key.
 */
export function createBlockMeasurer(metrics: FontMetrics): BlockMeasurer {
  const cache = new WeakMap<LeafBlock, Map<number, LeafMeasure>>();
  return (block, maxWidth) => {
    let byWidth = cache.get(block);
    if (!byWidth) {
      byWidth = new Map();
      cache.set(block, byWidth);
    }
    const cached = byWidth.get(maxWidth);
    if (cached) return cached;
    const measure = measureBlock(block, maxWidth, metrics);
    byWidth.set(maxWidth, measure);
    return measure;
  };
}
