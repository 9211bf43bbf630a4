import {
  mm,
  type BlockId,
  type DividerBlock,
  type KeepTogetherBlock,
  type LeafBlock,
  type ParagraphBlock,
  type SpacerBlock,
  type TableBlock,
  type TextStyle,
} from '@statforge/contracts';

/** Thickness of a section divider. */
export const DIVIDER_LINE_HEIGHT = mm(0.25);
/** Gap kept below a section divider. */
export const DIVIDER_SPACING = mm(1);
/** Dividers run across the 2mm text margin of their region. */
export const DIVIDER_OVERHANG = mm(2);

/**
 * Creates block factories that number their ids in creation order, so the
 * same entity always yields the same ids.
 */
export function createBlockFactory(prefix: string) {
  let counter = 0;
  const nextId = (): BlockId => `${prefix}-${(counter += 1)}`;

  return {
    paragraph: (text: string, style: TextStyle): ParagraphBlock => ({ kind: 'paragraph', id: nextId(), text, style }),
    table: (rows: TableBlock['rows'], spaceBefore: number): TableBlock => ({
      kind: 'table',
      id: nextId(),
      rows,
      spaceBefore,
    }),
    divider: (color: string): DividerBlock => ({
      kind: 'divider',
      id: nextId(),
      color,
      lineHeight: DIVIDER_LINE_HEIGHT,
      spacing: DIVIDER_SPACING,
      overhang: DIVIDER_OVERHANG,
    }),
    spacer: (height: number): SpacerBlock => ({ kind: 'spacer', id: nextId(), height }),
    keepTogether: (blocks: LeafBlock[]): KeepTogetherBlock => ({ kind: 'keepTogether', id: nextId(), blocks }),
  };
}

export type BlockFactory = ReturnType<typeof createBlockFactory>;

/** `<i><b>Heading.</b></i> body`, the lead-in used for abilities, actions and item entries. */
export const headedText = (heading: string, body?: string | null): string =>
  body == null ? `<i><b>${heading}.</b></i>` : `<i><b>${heading}.</b></i> ${body}`;
