/**
 * Test-only block builders and a fixed-metrics measurer.
 *
 * DO NOT import this file from production code. Only *.test.ts files may
 * import from here.
 */

import type {
  BlockMeasurer,
  DividerBlock,
  KeepTogetherBlock,
  LeafBlock,
  Line,
  ParagraphBlock,
  RegionTemplate,
  SpacerBlock,
  TableBlock,
  TextStyle,
} from '@statforge/contracts';

/** Height of every table row produced by {@link fakeMeasurer}. */
export const ROW_HEIGHT = 10;

export const makeStyle = (overrides: Partial<TextStyle> = {}): TextStyle => ({
  name: 'text',
  faces: { regular: 'Body', bold: 'Body-Bold', italic: 'Body-Italic', boldItalic: 'Body-BoldItalic' },
  fontSize: 8,
  leading: 10,
  spaceBefore: 0,
  spaceAfter: 0,
  alignment: 'left',
  color: 'black',
  ...overrides,
});

/** A paragraph that {@link fakeMeasurer} measures to exactly `lineCount` lines. */
export const paragraph = (id: string, lineCount: number, style: Partial<TextStyle> = {}): ParagraphBlock => ({
  kind: 'paragraph',
  id,
  text: Array.from({ length: lineCount }, (_, index) => `${id} line ${index}`).join('<br/>'),
  style: makeStyle(style),
});

export const table = (id: string, rowCount: number, spaceBefore = 0): TableBlock => ({
  kind: 'table',
  id,
  rows: Array.from({ length: rowCount }, () => [
    { text: 'a', style: makeStyle() },
    { text: 'b', style: makeStyle() },
  ]),
  spaceBefore,
});

export const divider = (id: string, lineHeight = 1, spacing = 2, overhang = 0): DividerBlock => ({
  kind: 'divider',
  id,
  color: 'red',
  lineHeight,
  spacing,
  overhang,
});

export const spacer = (id: string, height: number): SpacerBlock => ({ kind: 'spacer', id, height });

export const group = (id: string, ...blocks: LeafBlock[]): KeepTogetherBlock => ({ kind: 'keepTogether', id, blocks });

export const template = (height: number, overrides: Partial<RegionTemplate> = {}): RegionTemplate => ({
  x: 0,
  y: 0,
  width: 100,
  height,
  padding: { left: 0, right: 0, bottom: 0, top: 0 },
  ...overrides,
});

/** Paragraph lines are split on `<br/>` and take the style's leading; table rows are {@link ROW_HEIGHT} tall. */
export const fakeMeasurer: BlockMeasurer = (block, maxWidth) => {
  switch (block.kind) {
    case 'paragraph': {
      const lines: Line[] = block.text.split('<br/>').map((text) => ({
        segments: [{ text, bold: false, italic: false, x: 0, width: 0 }],
        width: 0,
        lineHeight: block.style.leading,
      }));
      return {
        kind: 'paragraph',
        lines,
        totalHeight: lines.length * block.style.leading,
        spaceBefore: block.style.spaceBefore,
        spaceAfter: block.style.spaceAfter,
      };
    }
    case 'table': {
      const columns = block.rows[0]?.length ?? 0;
      const columnWidth = columns > 0 ? maxWidth / columns : 0;
      return {
        kind: 'table',
        columnWidths: Array.from({ length: columns }, () => columnWidth),
        rows: block.rows.map((row) => ({
          height: ROW_HEIGHT,
          cells: row.map(() => ({ width: columnWidth, lines: [] })),
        })),
        totalHeight: block.rows.length * ROW_HEIGHT,
        spaceBefore: block.spaceBefore,
      };
    }
    case 'divider':
      return { kind: 'divider', totalHeight: block.lineHeight + block.spacing };
    case 'spacer':
      return { kind: 'spacer', totalHeight: block.height };
  }
};
