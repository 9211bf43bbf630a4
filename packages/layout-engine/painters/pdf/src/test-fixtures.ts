/**
 * Test-only card fixtures.
 *
 * DO NOT import this file from production code. Only *.test.ts files may
 * import from here.
 */

import type {
  BackFaceLayout,
  CardContent,
  CardSizeId,
  CardSizeVariant,
  FrontFaceLayout,
  ParagraphBlock,
  TextStyle,
} from '@statforge/contracts';

export const textStyle: TextStyle = {
  name: 'text',
  faces: { regular: 'Body', bold: 'Body-Bold', italic: 'Body-Italic', boldItalic: 'Body-BoldItalic' },
  fontSize: 10,
  leading: 12,
  spaceBefore: 0,
  spaceAfter: 0,
  alignment: 'left',
  color: 'black',
};

export const makeVariant = (id: CardSizeId = 'small', width = 100, height = 140): CardSizeVariant => ({
  id,
  width,
  height,
  bleed: 0,
  frontBorder: { left: 5, right: 5, bottom: 20, top: 20 },
  backBorder: { left: 5, right: 5, bottom: 25, top: 5 },
  regions: [],
  rotatable: true,
  footer: {
    primary: { x: 5, baseline: 15 },
    secondary: { x: 5, baseline: 8 },
    single: { x: 5, baseline: 10 },
  },
});

const titleBlock: ParagraphBlock = { kind: 'paragraph', id: 'title', text: 'Goblin', style: textStyle };

export const makeContent = (overrides: Partial<CardContent> = {}): CardContent => ({
  title: 'Goblin',
  footer: [],
  frontTitle: () => titleBlock,
  backBlocks: () => [titleBlock],
  ...overrides,
});

export const makeFrontLayout = (overrides: Partial<FrontFaceLayout> = {}): FrontFaceLayout => ({
  orientation: 'normal',
  faceWidth: 100,
  faceHeight: 140,
  frame: { x: 5, y: 20, width: 90, height: 100 },
  title: {
    kind: 'para',
    blockId: 'title',
    style: textStyle,
    fromLine: 0,
    toLine: 0,
    lines: [],
    x: 10,
    y: 100,
    width: 80,
    height: 0,
  },
  ...overrides,
});

export const emptyBack = (size: CardSizeId = 'small'): BackFaceLayout => ({ size, regions: [] });
