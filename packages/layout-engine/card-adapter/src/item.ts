import { mm, type ContentBlock } from '@statforge/contracts';
import type { CardStyleSheet } from '@statforge/style-engine';
import { createBlockFactory, headedText } from './blocks.js';
import type { ItemEntity } from './types.js';

/** Back-face blocks of an item card: title, subtitle, then the description. */
export function buildItemBlocks(entity: ItemEntity, styles: CardStyleSheet): ContentBlock[] {
  const blocks = createBlockFactory('item');
  const sequence: ContentBlock[] = [
    blocks.paragraph(entity.title, styles.title),
    blocks.paragraph(entity.subtitle, styles.subtitle),
    blocks.spacer(mm(1)),
  ];

  if (typeof entity.description === 'string') {
    sequence.push(blocks.paragraph(entity.description, styles.text));
    return sequence;
  }

  for (const entry of entity.description) {
    const text = typeof entry === 'string' ? entry : headedText(entry.heading, entry.body);
    sequence.push(blocks.paragraph(text, styles.text));
  }
  return sequence;
}
