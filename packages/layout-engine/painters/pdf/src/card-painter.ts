import {
  mm,
  type BackFaceLayout,
  type CardContent,
  type CardSizeVariant,
  type Fragment,
  type FrontFaceLayout,
  type Insets,
  type Rect,
} from '@statforge/contracts';
import type { FontMetrics } from '@statforge/measuring-pdf';
import type { CardPalette } from '@statforge/style-engine';
import type { RecordingSurface } from './surface.js';
import { paintLines } from './text.js';

export const CARD_CORNER_RADIUS = mm(3);
export const BACKGROUND_CORNER_RADIUS = mm(2);
/** Gap between captions sharing a footer slot. */
const CAPTION_GAP = mm(1);
/** Distance from the front frame's bottom edge down to the artist credit's top. */
const ARTIST_OFFSET = mm(1);

export type PaintOptions = {
  palette: Readonly<CardPalette>;
  metrics: FontMetrics;
  /** Image drawn behind the text. A solid palette background when omitted. */
  background?: string;
};

const inset = (width: number, height: number, border: Insets): Rect => ({
  x: border.left,
  y: border.top,
  width: width - border.left - border.right,
  height: height - border.top - border.bottom,
});

const paintBorder = (surface: RecordingSurface, variant: CardSizeVariant, options: PaintOptions): void => {
  const radius = Math.max(CARD_CORNER_RADIUS - variant.bleed, 0);
  surface.fillRoundRect({ x: 0, y: 0, width: variant.width, height: variant.height }, radius, options.palette.border);
};

const paintBackground = (
  surface: RecordingSurface,
  area: Rect,
  width: number,
  height: number,
  options: PaintOptions,
): void => {
  surface.save();
  surface.clipRoundRect(area, BACKGROUND_CORNER_RADIUS);
  if (options.background) {
    surface.image(options.background, { x: 0, y: 0, width, height });
  } else {
    surface.fillRect(area, options.palette.background);
  }
  surface.restore();
};

export function paintFragment(surface: RecordingSurface, fragment: Fragment): void {
  switch (fragment.kind) {
    case 'para':
      if (fragment.style.backColor) {
        surface.fillRect(
          { x: fragment.x, y: fragment.y, width: fragment.width, height: fragment.height },
          fragment.style.backColor,
        );
      }
      paintLines(surface, fragment.lines, fragment.style, fragment);
      return;
    case 'table':
      for (const row of fragment.rows) {
        for (const cell of row.cells) {
          paintLines(surface, cell.lines, cell.style, { x: cell.x, y: row.y, width: cell.width });
        }
      }
      return;
    case 'divider':
      surface.fillRect(
        { x: fragment.x, y: fragment.y, width: fragment.width, height: fragment.height },
        fragment.color,
      );
      return;
  }
}

/**
 * Paints the illustrated face of a card with its top-left corner at the
 * surface origin. A turned face is drawn in its own frame and rotated a
 * quarter turn onto the card.
 */
export function paintFrontFace(
  surface: RecordingSurface,
  content: CardContent,
  variant: CardSizeVariant,
  layout: FrontFaceLayout,
  options: PaintOptions,
): void {
  surface.save();
  paintBorder(surface, variant, options);
  if (layout.orientation === 'turn90') {
    surface.transform(0, -1, 1, 0, 0, variant.height);
  }

  paintBackground(surface, layout.frame, layout.faceWidth, layout.faceHeight, options);
  if (layout.image) {
    const { path, ...rect } = layout.image;
    surface.image(path, rect);
  }
  paintFragment(surface, layout.title);

  if (content.artist) {
    const { artist } = content;
    const width = options.metrics.widthOf(artist.text, artist.font, artist.fontSize);
    const baseline = layout.frame.y + layout.frame.height + ARTIST_OFFSET + artist.fontSize;
    surface.text(artist.text, (layout.faceWidth - width) / 2, baseline, artist);
  }
  surface.restore();
}

/** Paints the text face of a card: background, column gutter, flowed regions and footer captions. */
export function paintBackFace(
  surface: RecordingSurface,
  content: CardContent,
  variant: CardSizeVariant,
  layout: BackFaceLayout,
  options: PaintOptions,
): void {
  surface.save();
  paintBorder(surface, variant, options);
  paintBackground(surface, inset(variant.width, variant.height, variant.backBorder), variant.width, variant.height, options);
  if (variant.gutter) {
    surface.fillRect(variant.gutter, options.palette.border);
  }

  for (const region of layout.regions) {
    for (const fragment of region.fragments) {
      paintFragment(surface, fragment);
    }
  }

  const cursors = new Map<string, number>();
  for (const caption of content.footer) {
    const slot = variant.footer[caption.slot];
    const x = cursors.get(caption.slot) ?? slot.x;
    surface.text(caption.text, x, variant.height - slot.baseline, caption);
    cursors.set(caption.slot, x + options.metrics.widthOf(caption.text, caption.font, caption.fontSize) + CAPTION_GAP);
  }
  surface.restore();
}
