import { describe, expect, it } from 'vitest';
import { createCardContent, parseEntity } from '@statforge/card-adapter';
import { selectCardSize } from '@statforge/layout-engine';
import { createBlockMeasurer, createDeterministicMetrics } from '@statforge/measuring-pdf';

const measure = createBlockMeasurer(createDeterministicMetrics());

const monsterRecord = (actionCount: number) => ({
  title: 'Test Colossus',
  subtitle: 'Huge construct, unaligned',
  armor_class: 17,
  max_hit_points: 150,
  speed: '30 ft.',
  strength: 22,
  dexterity: 9,
  constitution: 20,
  intelligence: 3,
  wisdom: 11,
  charisma: 1,
  challenge_rating: 10,
  experience_points: 5900,
  actions: Object.fromEntries(Array.from({ length: actionCount }, (_, index) => [`Strike ${index + 1}`, 'Hits once.'])),
});

describe('card pipeline', () => {
  it('fits a short monster on the first, small attempt', () => {
    const content = createCardContent(parseEntity(monsterRecord(2)), { fontSet: 'standard' });

    const selection = selectCardSize(content, { measure });

    expect(selection.status).toBe('fitted');
    expect(selection.attempts).toEqual([{ size: 'small', split: false, status: 'done' }]);
  });

  it('escalates a long monster past small and large to epic', () => {
    const content = createCardContent(parseEntity(monsterRecord(45)), { fontSet: 'standard' });

    const selection = selectCardSize(content, { measure });

    expect(selection.status).toBe('fitted');
    expect(selection.attempts).toEqual([
      { size: 'small', split: true, status: 'failed' },
      { size: 'large', split: true, status: 'failed' },
      { size: 'epic', split: false, status: 'done' },
    ]);
    if (selection.status === 'fitted') {
      expect(selection.variant.id).toBe('epic');
      expect(selection.back.regions.every((region) => region.fragments.length > 0)).toBe(true);
    }
  });

  it('lays out a monster with abilities, actions and legendary actions on an epic card', () => {
    const numbered = (prefix: string, count: number, body: string): Record<string, string> =>
      Object.fromEntries(Array.from({ length: count }, (_, index) => [`${prefix} ${index + 1}`, body]));
    const entity = parseEntity({
      ...monsterRecord(0),
      abilities: numbered('Trait', 12, 'Does one thing.'),
      actions: numbered('Strike', 20, 'Hits once.'),
      legendary: [
        'The colossus can take 3 legendary actions.',
        ...Array.from({ length: 10 }, (_, index) => ({ [`Stomp ${index + 1}`]: 'Shakes the ground.' })),
      ],
    });
    const content = createCardContent(entity, { fontSet: 'standard' });

    const selection = selectCardSize(content, { measure });

    expect(selection.attempts.map((attempt) => attempt.size)).toEqual(['small', 'large', 'epic']);
    expect(selection.attempts.map((attempt) => attempt.status)).toEqual(['failed', 'failed', 'done']);
    if (selection.status !== 'fitted') return;
    expect(selection.variant.id).toBe('epic');
    const fragments = selection.back.regions.flatMap((region) => region.fragments);
    const headers = fragments.filter(
      (fragment) => fragment.kind === 'para' && fragment.lines[0]?.segments[0]?.text === 'LEGENDARY ACTIONS',
    );
    expect(headers).toHaveLength(1);
    for (const region of selection.back.regions) {
      expect(region.fragments.at(-1)?.kind).not.toBe('divider');
    }
  });

  it('gives items the small card only', () => {
    const item = parseEntity({
      type: 'item',
      title: 'Endless Scroll',
      category: 'Scroll',
      description: Array.from({ length: 60 }, (_, index) => `Line ${index + 1} of an unusually long scroll.`),
    });
    const content = createCardContent(item, { fontSet: 'standard' });

    const selection = selectCardSize(content, { measure });

    expect(selection).toEqual({ status: 'overflow', attempts: [{ size: 'small', split: true, status: 'failed' }] });
  });
});
