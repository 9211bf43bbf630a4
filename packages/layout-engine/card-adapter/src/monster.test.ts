import { describe, expect, it } from 'vitest';
import { mm, type ContentBlock, type ParagraphBlock } from '@statforge/contracts';
import { DEFAULT_PALETTE, createStyleSheet } from '@statforge/style-engine';
import { buildMonsterBlocks, formatAbilityScore, monsterFrontTitle, titleScale } from './monster.js';
import type { MonsterEntity } from './types.js';

const styles = createStyleSheet('standard');

const makeMonster = (overrides: Partial<MonsterEntity> = {}): MonsterEntity => ({
  kind: 'monster',
  title: 'Goblin',
  subtitle: 'Small humanoid',
  armorClass: '15',
  maxHitPoints: '7',
  speed: '30 ft.',
  abilityScores: { strength: 8, dexterity: 14, constitution: 10, intelligence: 10, wisdom: 8, charisma: '—' },
  challengeRating: '1/4',
  experiencePoints: '50',
  source: 'Test Bestiary',
  attributes: [
    { heading: 'Skills', value: 'Stealth +6' },
    { heading: 'Languages', value: ['Common', 'Goblin'] },
  ],
  abilities: [{ heading: 'Nimble Escape', body: 'Disengage as a bonus action.' }],
  actions: [
    { heading: 'Scimitar', body: 'Melee attack.' },
    { heading: 'Shortbow', body: 'Ranged attack.' },
  ],
  reactions: [],
  legendary: [],
  ...overrides,
});

const paragraphAt = (blocks: ContentBlock[], index: number): ParagraphBlock => {
  const block = blocks[index];
  if (block.kind !== 'paragraph') throw new Error(`block ${index} is a ${block.kind}`);
  return block;
};

describe('formatAbilityScore', () => {
  it('appends the signed modifier to numeric scores', () => {
    expect(formatAbilityScore(13)).toBe('13 (+1)');
    expect(formatAbilityScore(10)).toBe('10 (+0)');
    expect(formatAbilityScore(8)).toBe('8 (-1)');
    expect(formatAbilityScore(9)).toBe('9 (-1)');
    expect(formatAbilityScore(30)).toBe('30 (+10)');
  });

  it('passes text through unchanged', () => {
    expect(formatAbilityScore('—')).toBe('—');
  });
});

describe('titleScale', () => {
  it('shrinks long titles on small cards only', () => {
    const title = 'A'.repeat(30);

    expect(titleScale(title, 'small')).toBeCloseTo(20 / 30);
    expect(titleScale(title, 'large')).toBe(1);
    expect(titleScale('Goblin', 'small')).toBe(1);
  });

  it('counts characters outside the basic plane once', () => {
    const title = '\u{1D49C}'.repeat(25);

    expect(title.length).toBe(50);
    expect(titleScale(title, 'small')).toBeCloseTo(20 / 25);
  });
});

describe('buildMonsterBlocks', () => {
  it('emits the blocks in reading order', () => {
    const blocks = buildMonsterBlocks(makeMonster(), styles, DEFAULT_PALETTE, 'small');

    expect(blocks.map((block) => block.kind)).toEqual([
      'spacer',
      'paragraph',
      'paragraph',
      'table',
      'table',
      'divider',
      'paragraph',
      'paragraph',
      'divider',
      'keepTogether',
      'paragraph',
    ]);
  });

  it('formats stats, ability scores and attributes', () => {
    const blocks = buildMonsterBlocks(makeMonster(), styles, DEFAULT_PALETTE, 'small');

    const [stats, scores] = [blocks[3], blocks[4]];
    expect(stats.kind === 'table' && stats.rows[0].map((cell) => cell.text)).toEqual([
      '<b>AC:</b> 15<br/><b>Speed:</b> 30 ft.',
      '<b>HP:</b> 7',
    ]);
    expect(scores.kind === 'table' && scores.rows.map((row) => row.map((cell) => cell.text))).toEqual([
      ['STR', 'DEX', 'CON', 'INT', 'WIS', 'CHA'],
      ['8 (-1)', '14 (+2)', '10 (+0)', '10 (+0)', '8 (-1)', '—'],
    ]);
    expect(paragraphAt(blocks, 6).text).toBe('<b>Skills:</b> Stealth +6<br/><b>Languages:</b> Common, Goblin');
    expect(paragraphAt(blocks, 7).text).toBe('<i><b>Nimble Escape.</b></i> Disengage as a bonus action.');
  });

  it('keeps the actions header with the first action', () => {
    const blocks = buildMonsterBlocks(makeMonster(), styles, DEFAULT_PALETTE, 'small');

    const group = blocks[9];
    expect(group.kind === 'keepTogether' && group.blocks.map((block) => block.kind === 'paragraph' && block.text)).toEqual(
      ['ACTIONS', '<i><b>Scimitar.</b></i> Melee attack.'],
    );
    expect(paragraphAt(blocks, 10).text).toBe('<i><b>Shortbow.</b></i> Ranged attack.');
  });

  it('keeps the full title height when the title shrinks', () => {
    const monster = makeMonster({ title: 'Goblin Chieftain of the Burning Hills' });
    const blocks = buildMonsterBlocks(monster, styles, DEFAULT_PALETTE, 'small');

    const spacer = blocks[0];
    const title = paragraphAt(blocks, 1);
    expect(title.style.fontSize).toBeCloseTo((styles.title.fontSize * 20) / monster.title.length);
    expect(spacer.kind === 'spacer' && spacer.height + title.style.leading).toBeCloseTo(
      styles.title.fontSize + mm(0.5),
    );
  });

  it('adds reactions and legendary actions after their own dividers', () => {
    const monster = makeMonster({
      reactions: [{ heading: 'Parry', body: 'Adds 2 to its AC.' }],
      legendary: ['Can take 3 legendary actions.', { heading: 'Detect', body: 'Makes a check.' }],
    });
    const blocks = buildMonsterBlocks(monster, styles, DEFAULT_PALETTE, 'large');

    expect(blocks.slice(11).map((block) => block.kind)).toEqual([
      'divider',
      'keepTogether',
      'divider',
      'keepTogether',
      'paragraph',
    ]);
    const legendary = blocks[14];
    expect(legendary.kind === 'keepTogether' && legendary.blocks[1]).toMatchObject({
      text: 'Can take 3 legendary actions.',
      style: { name: 'text' },
    });
    expect(paragraphAt(blocks, 15)).toMatchObject({
      text: '<i><b>Detect.</b></i> Makes a check.',
      style: { name: 'legendaryAction' },
    });
  });

  it('draws dividers in the border colour', () => {
    const blocks = buildMonsterBlocks(makeMonster(), styles, { ...DEFAULT_PALETTE, border: '#123456' }, 'small');

    expect(blocks[5]).toMatchObject({ kind: 'divider', color: '#123456' });
  });
});

describe('monsterFrontTitle', () => {
  it('uses the scaled size as its leading', () => {
    const title = monsterFrontTitle(makeMonster({ title: 'A'.repeat(40) }), styles, 'small');

    expect(title.style.fontSize).toBeCloseTo(styles.title.fontSize / 2);
    expect(title.style.leading).toBe(title.style.fontSize);
  });
});
