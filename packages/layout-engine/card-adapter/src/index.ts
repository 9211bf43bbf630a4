/**
 * @statforge/card-adapter
 *
 * Turns validated entity records into {@link CardContent}: the block
 * sequences the layout engine flows, plus the captions the painter draws
 * around them.
 */

import type { CardContent, Caption, CardSizeId, FooterCaption, ImageRef } from '@statforge/contracts';
import {
  DEFAULT_PALETTE,
  FONT_SETS,
  createStyleSheet,
  resolveFont,
  type CardPalette,
  type FontSet,
  type FontSetName,
  type StyleRole,
} from '@statforge/style-engine';
import { buildItemBlocks } from './item.js';
import { buildMonsterBlocks, monsterFrontTitle } from './monster.js';
import type { CardEntity } from './types.js';

export { CardInputError } from './errors.js';
export type { CardInputErrorCode } from './errors.js';
export { DIVIDER_LINE_HEIGHT, DIVIDER_OVERHANG, DIVIDER_SPACING, createBlockFactory, headedText } from './blocks.js';
export type { BlockFactory } from './blocks.js';
export { buildItemBlocks } from './item.js';
export { TITLE_LENGTH_LIMIT, buildMonsterBlocks, formatAbilityScore, monsterFrontTitle, titleScale } from './monster.js';
export { parseEntities, parseEntity } from './schema.js';
export { ABILITY_NAMES } from './types.js';
export type {
  AbilityName,
  AbilityScore,
  AttributeEntry,
  CardEntity,
  DescriptionEntry,
  HeadedEntry,
  ItemEntity,
  LegendaryEntry,
  MonsterEntity,
} from './types.js';

/** Item cards only come in the small size. */
const ITEM_SIZES: readonly CardSizeId[] = ['small'];

export type CardContentOptions = {
  fontSet: FontSet | FontSetName;
  palette?: Readonly<CardPalette>;
  /** The entity's illustration, already resolved on disk. */
  image?: ImageRef;
};

export function createCardContent(entity: CardEntity, options: CardContentOptions): CardContent {
  const fontSet = typeof options.fontSet === 'string' ? FONT_SETS[options.fontSet] : options.fontSet;
  const palette = options.palette ?? DEFAULT_PALETTE;
  const styles = createStyleSheet(fontSet, palette);

  const caption = (slot: FooterCaption['slot'], text: string, role: StyleRole): FooterCaption => ({
    slot,
    text,
    ...resolveFont(fontSet, role),
    color: palette.footerText,
  });
  const artist: Caption | undefined = entity.artist
    ? { text: `Artist: ${entity.artist}`, ...resolveFont(fontSet, 'artist') }
    : undefined;
  const shared = {
    title: entity.title,
    ...(options.image ? { image: options.image } : {}),
    ...(artist ? { artist } : {}),
  };

  if (entity.kind === 'item') {
    const footer: FooterCaption[] = [caption('single', entity.category, 'category')];
    if (entity.subcategory) {
      footer.push(caption('single', `(${entity.subcategory})`, 'subcategory'));
    }
    return {
      ...shared,
      sizes: ITEM_SIZES,
      footer,
      frontTitle: () => ({ kind: 'paragraph', id: 'item-front-title', text: entity.title, style: styles.title }),
      backBlocks: () => buildItemBlocks(entity, styles),
    };
  }

  const footer: FooterCaption[] = [
    caption('primary', `Challenge ${entity.challengeRating} (${entity.experiencePoints} XP)`, 'challenge'),
  ];
  if (entity.source) {
    footer.push(caption('secondary', entity.source, 'text'));
  }
  return {
    ...shared,
    footer,
    frontTitle: (variant) => monsterFrontTitle(entity, styles, variant.id),
    backBlocks: (variant) => buildMonsterBlocks(entity, styles, palette, variant.id),
  };
}
