import { mm, type CardSizeId, type CardSizeVariant, type Insets, type RegionTemplate } from '@statforge/contracts';

/** Size escalation order, smallest first. */
export const CARD_SIZE_ORDER: readonly CardSizeId[] = ['small', 'large', 'epic', 'superEpic'];

export const BASE_WIDTH = mm(63);
export const BASE_HEIGHT = mm(89);
/** Width of the rule between the back-face columns. */
export const STANDARD_BORDER = mm(2.5);
/** Padding between a region's edge and its text. */
export const TEXT_MARGIN = mm(2);
/** Nominal glyph height of footer text, used to centre it in the bottom border. */
const FOOTER_TEXT_HEIGHT = mm(2.25);

const insets = (left: number, right: number, bottom: number, top: number, bleed: number): Insets => ({
  left: mm(left) + bleed,
  right: mm(right) + bleed,
  bottom: mm(bottom) + bleed,
  top: mm(top) + bleed,
});

const columnPadding = (top: number): Insets => ({
  left: TEXT_MARGIN,
  right: TEXT_MARGIN,
  bottom: TEXT_MARGIN,
  top,
});

function createSmall(bleed: number): CardSizeVariant {
  const width = BASE_WIDTH + 2 * bleed;
  const height = BASE_HEIGHT + 2 * bleed;
  const frontBorder = insets(2.5, 2.5, 7, 7, bleed);
  const backBorder = insets(2.5, 2.5, 9.2, 2.5, bleed);
  return {
    id: 'small',
    width,
    height,
    bleed,
    frontBorder,
    backBorder,
    regions: [
      {
        x: backBorder.left,
        y: backBorder.top,
        width: width - backBorder.left - backBorder.right,
        height: height - backBorder.top - backBorder.bottom,
        padding: columnPadding(0),
      },
    ],
    rotatable: true,
    footer: {
      primary: { x: frontBorder.left, baseline: mm(5.5) + bleed },
      secondary: { x: backBorder.left, baseline: mm(3) + bleed },
      single: { x: backBorder.left, baseline: mm(3.5) + bleed },
    },
  };
}

function createTwoColumn(id: CardSizeId, baseHeight: number, backBottom: number, bleed: number): CardSizeVariant {
  const width = BASE_WIDTH * 2 + 2 * bleed;
  const height = baseHeight + 2 * bleed;
  const frontBorder = insets(3.5, 3.5, 7, 7, bleed);
  const backBorder = insets(4, 4, backBottom, 3, bleed);
  const columnWidth = width / 2 - backBorder.left - STANDARD_BORDER / 2;
  const columnHeight = height - backBorder.top - backBorder.bottom;
  const regions: RegionTemplate[] = [
    { x: backBorder.left, y: backBorder.top, width: columnWidth, height: columnHeight, padding: columnPadding(0) },
    {
      x: width / 2 + STANDARD_BORDER / 2,
      y: backBorder.top,
      width: columnWidth,
      height: columnHeight,
      padding: columnPadding(mm(1)),
    },
  ];
  const baseline = (backBorder.bottom - bleed - FOOTER_TEXT_HEIGHT) / 2 + bleed;
  return {
    id,
    width,
    height,
    bleed,
    frontBorder,
    backBorder,
    regions,
    // Square and taller cards keep their illustration upright.
    rotatable: id === 'large',
    gutter: { x: width / 2 - STANDARD_BORDER / 2, y: 0, width: STANDARD_BORDER, height },
    footer: {
      primary: { x: frontBorder.left, baseline },
      secondary: { x: width / 2 + STANDARD_BORDER / 2, baseline },
      single: { x: backBorder.left, baseline },
    },
  };
}

/**
 * Builds the geometry of one card size. Every call returns a new value so a
 * layout attempt never shares state with another.
 */
export function createCardSizeVariant(id: CardSizeId, bleed = 0): CardSizeVariant {
  switch (id) {
    case 'small':
      return createSmall(bleed);
    case 'large':
      return createTwoColumn('large', BASE_HEIGHT, 8.5, bleed);
    case 'epic':
      return createTwoColumn('epic', BASE_WIDTH * 2, 6.5, bleed);
    case 'superEpic':
      return createTwoColumn('superEpic', BASE_WIDTH * 3, 6.5, bleed);
  }
}

