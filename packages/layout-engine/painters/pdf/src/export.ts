import type { BackFaceLayout, CardContent, CardSizeVariant, FrontFaceLayout } from '@statforge/contracts';
import { paintBackFace, paintFrontFace, type PaintOptions } from './card-painter.js';
import { RecordingSurface, type PdfTarget, type SurfaceOp } from './surface.js';

/** ISO A4 in points. */
export const A4_SIZE = { width: 595.28, height: 841.89 } as const;

/** A card whose size has been chosen and whose faces are laid out. */
export type LaidOutCard = {
  content: CardContent;
  variant: CardSizeVariant;
  front: FrontFaceLayout;
  back: BackFaceLayout;
};

/** Both faces of a card recorded with their top-left corner at the origin. */
export type PaintedCard = {
  /** Position of the card in the list given to {@link paintCards}. */
  index: number;
  title: string;
  variant: CardSizeVariant;
  front: SurfaceOp[];
  back: SurfaceOp[];
};

export type PageSize = {
  width: number;
  height: number;
};

/**
 * Reverses every run of `size` items, keeping the runs in order:
 * `[A, B, C, D, E, F]` in runs of 3 becomes `[C, B, A, F, E, D]`.
 * A short final run is reversed on its own.
 */
export function reverseSegments<T>(items: readonly T[], size: number): T[] {
  if (size <= 0) return [...items];
  const result: T[] = [];
  for (let start = 0; start < items.length; start += size) {
    result.push(...items.slice(start, start + size).reverse());
  }
  return result;
}

/**
 * Records both faces of every card, each into its own surface. A card whose
 * painting throws is discarded and reported; the others are unaffected.
 */
export function paintCards(cards: readonly LaidOutCard[], options: PaintOptions): PaintedCard[] {
  const painted: PaintedCard[] = [];
  cards.forEach((card, index) => {
    const surface = new RecordingSurface();
    try {
      paintFrontFace(surface, card.content, card.variant, card.front, options);
      const front = surface.take();
      paintBackFace(surface, card.content, card.variant, card.back, options);
      painted.push({ index, title: card.content.title, variant: card.variant, front, back: surface.take() });
    } catch (error) {
      surface.restart();
      console.error('[PdfPainter] Card painting failed:', { title: card.content.title, error });
    }
  });
  return painted;
}

/** One page per face, each the size of its card: front, then back. */
export function exportSingles(target: PdfTarget, cards: readonly PaintedCard[]): void {
  for (const card of cards) {
    const surface = new RecordingSurface();
    surface.addPage(card.variant.width, card.variant.height);
    surface.drawRecording(card.front, 0, 0);
    surface.addPage(card.variant.width, card.variant.height);
    surface.drawRecording(card.back, 0, 0);
    surface.commitTo(target);
  }
}

/**
 * Lays small cards out on sheets for duplex printing: a sheet of fronts,
 * then a sheet of backs whose rows are reversed and pushed against the right
 * edge so every back lands behind its front. Larger cards do not fit the
 * grid and follow as single pages.
 */
export function exportGrid(target: PdfTarget, cards: readonly PaintedCard[], page: PageSize = A4_SIZE): void {
  const gridCards = cards.filter((card) => card.variant.id === 'small');
  const singles = cards.filter((card) => card.variant.id !== 'small');
  for (const card of singles) {
    console.warn(`[PdfPainter] "${card.title}" needs the ${card.variant.id} size; adding it as single pages`);
  }

  const [first] = gridCards;
  if (first) {
    const { width, height } = first.variant;
    const perRow = Math.max(1, Math.floor(page.width / width));
    const perPage = perRow * Math.max(1, Math.floor(page.height / height));
    const mirroredLeft = page.width - width * perRow;

    for (let start = 0; start < gridCards.length; start += perPage) {
      const sheet: Array<PaintedCard | null> = gridCards.slice(start, start + perPage);
      while (sheet.length < perPage) sheet.push(null);

      const surface = new RecordingSurface();
      surface.addPage(page.width, page.height);
      sheet.forEach((card, index) => {
        if (card) surface.drawRecording(card.front, (index % perRow) * width, Math.floor(index / perRow) * height);
      });
      surface.addPage(page.width, page.height);
      reverseSegments(sheet, perRow).forEach((card, index) => {
        if (card) {
          surface.drawRecording(card.back, mirroredLeft + (index % perRow) * width, Math.floor(index / perRow) * height);
        }
      });
      surface.commitTo(target);
    }
  }

  exportSingles(target, singles);
}
