import { mm, type CardSizeId, type ContentBlock, type ParagraphBlock, type TextStyle } from '@statforge/contracts';
import type { CardPalette, CardStyleSheet } from '@statforge/style-engine';
import { createBlockFactory, headedText, type BlockFactory } from './blocks.js';
import { ABILITY_NAMES, type AbilityScore, type HeadedEntry, type LegendaryEntry, type MonsterEntity } from './types.js';

/** Titles longer than this many characters are shrunk on small cards. */
export const TITLE_LENGTH_LIMIT = 20;

const ABILITY_LABELS = ['STR', 'DEX', 'CON', 'INT', 'WIS', 'CHA'] as const;

/** Font scale for a title: long titles shrink to fit a small card, other sizes keep the full size. */
export function titleScale(title: string, size: CardSizeId): number {
  // Counted in code points, so an emoji or astral glyph is one character.
  const length = [...title].length;
  if (size !== 'small' || length === 0) return 1;
  return Math.min(1, TITLE_LENGTH_LIMIT / length);
}

/** `13` becomes `"13 (+1)"`; text such as `"—"` is shown as given. */
export function formatAbilityScore(score: AbilityScore): string {
  if (typeof score === 'string') return score;
  const modifier = Math.floor((score - 10) / 2);
  return `${score} (${modifier >= 0 ? '+' : ''}${modifier})`;
}

/** The front-face title: scaled like the back title, with no extra leading. */
export function monsterFrontTitle(entity: MonsterEntity, styles: CardStyleSheet, size: CardSizeId): ParagraphBlock {
  const fontSize = styles.title.fontSize * titleScale(entity.title, size);
  return {
    kind: 'paragraph',
    id: 'monster-front-title',
    text: entity.title,
    style: { ...styles.title, fontSize, leading: fontSize },
  };
}

/**
 * A titled section. The header travels with the first entry so it is never
 * left alone at the bottom of a region.
 */
const section = (blocks: BlockFactory, header: ParagraphBlock, entries: ParagraphBlock[]): ContentBlock[] => {
  const [first, ...rest] = entries;
  if (!first) return [];
  return [blocks.keepTogether([header, first]), ...rest];
};

const headedParagraphs = (blocks: BlockFactory, entries: HeadedEntry[], style: TextStyle): ParagraphBlock[] =>
  entries.map(({ heading, body }) => blocks.paragraph(headedText(heading, body), style));

const legendaryParagraph = (blocks: BlockFactory, entry: LegendaryEntry, styles: CardStyleSheet): ParagraphBlock =>
  typeof entry === 'string'
    ? blocks.paragraph(entry, styles.text)
    : blocks.paragraph(headedText(entry.heading, entry.body), styles.legendaryAction);

/**
 * The back-face block sequence of a monster card, in reading order: title,
 * subtitle, stats, ability scores, attributes, abilities, then the action
 * sections, separated by dividers.
 */
export function buildMonsterBlocks(
  entity: MonsterEntity,
  styles: CardStyleSheet,
  palette: CardPalette,
  size: CardSizeId,
): ContentBlock[] {
  const blocks = createBlockFactory('monster');

  // A shrunk title keeps the height of a full-size one.
  const originalSize = styles.title.fontSize;
  const fontSize = originalSize * titleScale(entity.title, size);
  const spacerHeight = (originalSize - fontSize + mm(0.5)) / 2;

  const sequence: ContentBlock[] = [
    blocks.spacer(spacerHeight),
    blocks.paragraph(entity.title, { ...styles.title, fontSize, leading: fontSize + spacerHeight }),
    blocks.paragraph(entity.subtitle, styles.subtitle),
    blocks.table(
      [
        [
          { text: `<b>AC:</b> ${entity.armorClass}<br/><b>Speed:</b> ${entity.speed}`, style: styles.text },
          { text: `<b>HP:</b> ${entity.maxHitPoints}`, style: styles.text },
        ],
      ],
      mm(1),
    ),
    blocks.table(
      [
        ABILITY_LABELS.map((label) => ({ text: label, style: styles.modifierTitle })),
        ABILITY_NAMES.map((name) => ({ text: formatAbilityScore(entity.abilityScores[name]), style: styles.modifier })),
      ],
      mm(1),
    ),
    blocks.divider(palette.border),
  ];

  if (entity.attributes.length > 0) {
    const lines = entity.attributes.map(({ heading, value }) => {
      const text = Array.isArray(value) ? value.join(', ') : value;
      return `<b>${heading}:</b> ${text}`;
    });
    sequence.push(blocks.paragraph(lines.join('<br/>'), styles.text));
  }
  sequence.push(...headedParagraphs(blocks, entity.abilities, styles.text));

  sequence.push(blocks.divider(palette.border));
  sequence.push(
    ...section(
      blocks,
      blocks.paragraph('ACTIONS', styles.actionTitle),
      headedParagraphs(blocks, entity.actions, styles.text),
    ),
  );

  if (entity.reactions.length > 0) {
    sequence.push(blocks.divider(palette.border));
    sequence.push(
      ...section(
        blocks,
        blocks.paragraph('REACTIONS', styles.actionTitle),
        headedParagraphs(blocks, entity.reactions, styles.text),
      ),
    );
  }

  if (entity.legendary.length > 0) {
    sequence.push(blocks.divider(palette.border));
    sequence.push(
      ...section(
        blocks,
        blocks.paragraph('LEGENDARY ACTIONS', styles.actionTitle),
        entity.legendary.map((entry) => legendaryParagraph(blocks, entry, styles)),
      ),
    );
  }

  return sequence;
}
