import { describe, expect, it, vi } from 'vitest';
import type { DividerBlock, ParagraphBlock, TableBlock, TextStyle } from '@statforge/contracts';
import { breakLines, createBlockMeasurer, createDeterministicMetrics, measureBlock } from './index.js';

// Every character is 5pt wide at this size.
const style: TextStyle = {
  name: 'text',
  faces: { regular: 'R', bold: 'B', italic: 'I', boldItalic: 'BI' },
  fontSize: 10,
  leading: 12,
  spaceBefore: 3,
  spaceAfter: 1,
  alignment: 'left',
  color: 'black',
};

const metrics = createDeterministicMetrics(0.5);

const lineTexts = (text: string, width: number) =>
  breakLines(text, style, width, metrics).map((line) => line.segments.map((segment) => segment.text).join(''));

describe('breakLines', () => {
  it('keeps short text on one line', () => {
    expect(lineTexts('one two', 100)).toEqual(['one two']);
  });

  it('wraps greedily on whitespace', () => {
    // "aaa bbb" is 35pt, adding " ccc" would make 55pt.
    expect(lineTexts('aaa bbb ccc', 50)).toEqual(['aaa bbb', 'ccc']);
  });

  it('collapses whitespace runs and drops leading space after a wrap', () => {
    expect(lineTexts('aaa    bbb', 20)).toEqual(['aaa', 'bbb']);
  });

  it('keeps an over-long word on its own line', () => {
    expect(lineTexts('a enormousword b', 30)).toEqual(['a', 'enormousword', 'b']);
  });

  it('forces breaks at <br/>', () => {
    expect(lineTexts('one<br/>two', 500)).toEqual(['one', 'two']);
  });

  it('splits segments where the style changes and positions them', () => {
    const [line] = breakLines('<b>HP:</b> 45', style, 500, metrics);
    expect(line.segments).toEqual([
      { text: 'HP:', bold: true, italic: false, x: 0, width: 15 },
      { text: ' 45', bold: false, italic: false, x: 15, width: 15 },
    ]);
    expect(line.width).toBe(30);
    expect(line.lineHeight).toBe(12);
  });

  it('measures with the face selected by the span flags', () => {
    const widthOf = vi.fn((text: string) => text.length);
    breakLines('<i>x</i>', style, 100, { widthOf });
    expect(widthOf).toHaveBeenCalledWith('x', 'I', 10);
  });

  it('returns no lines for empty text', () => {
    expect(breakLines('', style, 100, metrics)).toEqual([]);
  });
});

describe('measureBlock', () => {
  it('measures paragraphs from their lines and style spacing', () => {
    const block: ParagraphBlock = { kind: 'paragraph', id: 'p', text: 'aaa bbb ccc', style };
    const measure = measureBlock(block, 50, metrics);
    expect(measure).toMatchObject({ kind: 'paragraph', totalHeight: 24, spaceBefore: 3, spaceAfter: 1 });
  });

  it('measures table rows by their tallest cell', () => {
    const block: TableBlock = {
      kind: 'table',
      id: 't',
      rows: [[{ text: 'aaa bbb', style }, { text: 'x', style }]],
      spaceBefore: 2,
    };
    const measure = measureBlock(block, 40, metrics);
    if (measure.kind !== 'table') throw new Error('expected a table measure');
    expect(measure.columnWidths).toEqual([20, 20]);
    expect(measure.rows[0].height).toBe(24);
    expect(measure.totalHeight).toBe(24);
    expect(measure.spaceBefore).toBe(2);
  });

  it('honours column fractions', () => {
    const block: TableBlock = {
      kind: 'table',
      id: 't',
      rows: [[{ text: 'a', style }, { text: 'b', style }]],
      columnFractions: [0.25, 0.75],
      spaceBefore: 0,
    };
    const measure = measureBlock(block, 100, metrics);
    expect(measure.kind === 'table' && measure.columnWidths).toEqual([25, 75]);
  });

  it('measures dividers as rule plus spacing', () => {
    const block: DividerBlock = { kind: 'divider', id: 'd', color: 'red', lineHeight: 0.5, spacing: 3, overhang: 5 };
    expect(measureBlock(block, 100, metrics)).toEqual({ kind: 'divider', totalHeight: 3.5 });
  });

  it('measures spacers by their height', () => {
    expect(measureBlock({ kind: 'spacer', id: 's', height: 4 }, 100, metrics)).toEqual({
      kind: 'spacer',
      totalHeight: 4,
    });
  });
});

describe('createBlockMeasurer', () => {
  it('caches measures per block and width', () => {
    const widthOf = vi.fn((text: string) => text.length);
    const measure = createBlockMeasurer({ widthOf });
    const block: ParagraphBlock = { kind: 'paragraph', id: 'p', text: 'word', style };

    const first = measure(block, 100);
    const calls = widthOf.mock.calls.length;
    expect(measure(block, 100)).toBe(first);
    expect(widthOf.mock.calls.length).toBe(calls);
    expect(measure(block, 50)).not.toBe(first);
  });
});
