import type {
  BackFaceLayout,
  BlockMeasurer,
  CardContent,
  CardSizeId,
  CardSizeVariant,
  FrontFaceLayout,
} from '@statforge/contracts';
import { CARD_SIZE_ORDER, createCardSizeVariant } from './card-sizes.js';
import { flowContent } from './flow.js';
import { layoutFrontFace } from './front-face.js';

export type SizeAttempt = {
  size: CardSizeId;
  /** Whether the splitting pass ran for this size. */
  split: boolean;
  status: 'done' | 'failed';
};

export type CardSelection =
  | {
      status: 'fitted';
      variant: CardSizeVariant;
      front: FrontFaceLayout;
      back: BackFaceLayout;
      attempts: SizeAttempt[];
    }
  | {
      status: 'overflow';
      attempts: SizeAttempt[];
    };

export type SelectCardSizeOptions = {
  measure: BlockMeasurer;
  /** Retry each size with splitting before escalating. Defaults to true. */
  allowSplit?: boolean;
  bleed?: number;
};

/**
 * Picks the smallest card size whose regions hold all of the content.
 *
 * Sizes are tried smallest first; each size is built afresh together with its
 * block sequence and flowed once without splitting, then once with splitting
 * when allowed. A size that still overflows escalates to the next one. The
 * attempts list records every size tried, in order, exactly once.
 */
export function selectCardSize(content: CardContent, options: SelectCardSizeOptions): CardSelection {
  const { measure, allowSplit = true, bleed = 0 } = options;
  const sizes = CARD_SIZE_ORDER.filter((size) => !content.sizes || content.sizes.includes(size));
  const attempts: SizeAttempt[] = [];

  for (const size of sizes) {
    const variant = createCardSizeVariant(size, bleed);
    let result = flowContent(content.backBlocks(variant), variant.regions, measure, { allowSplit: false });
    let split = false;
    if (result.status === 'failed' && allowSplit) {
      split = true;
      result = flowContent(content.backBlocks(variant), variant.regions, measure, { allowSplit: true });
    }
    attempts.push({ size, split, status: result.status });

    if (result.status === 'done') {
      return {
        status: 'fitted',
        variant,
        front: layoutFrontFace(content, variant, measure),
        back: { size, regions: result.regions },
        attempts,
      };
    }
  }

  return { status: 'overflow', attempts };
}
