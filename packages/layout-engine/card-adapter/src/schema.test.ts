import { describe, expect, it } from 'vitest';
import { CardInputError } from './errors.js';
import { parseEntities, parseEntity } from './schema.js';

const goblin = {
  title: 'Goblin',
  subtitle: 'Small humanoid, neutral evil',
  armor_class: '15 (leather armor, shield)',
  max_hit_points: 7,
  speed: '30 ft.',
  strength: 8,
  dexterity: 14,
  constitution: 10,
  intelligence: 10,
  wisdom: 8,
  charisma: '—',
  challenge_rating: '1/4',
  experience_points: 50,
  source: 'Test Bestiary',
  attributes: { Skills: 'Stealth +6', Languages: ['Common', 'Goblin'] },
  actions: { Scimitar: 'Melee Weapon Attack: +4 to hit.' },
};

describe('parseEntity', () => {
  it('maps a monster record to a monster entity', () => {
    const entity = parseEntity(goblin);

    expect(entity).toMatchObject({
      kind: 'monster',
      title: 'Goblin',
      maxHitPoints: '7',
      experiencePoints: '50',
      abilityScores: { strength: 8, charisma: '—' },
      attributes: [
        { heading: 'Skills', value: 'Stealth +6' },
        { heading: 'Languages', value: ['Common', 'Goblin'] },
      ],
      actions: [{ heading: 'Scimitar', body: 'Melee Weapon Attack: +4 to hit.' }],
      abilities: [],
      reactions: [],
      legendary: [],
    });
  });

  it('reads legendary actions as text or single headings', () => {
    const entity = parseEntity({ ...goblin, legendary: ['The goblin can take 3 actions.', { Dash: 'It moves.' }] });

    expect(entity.kind === 'monster' && entity.legendary).toEqual([
      'The goblin can take 3 actions.',
      { heading: 'Dash', body: 'It moves.' },
    ]);
  });

  it('rejects a legendary action that is neither text nor a heading', () => {
    const parse = () => parseEntity({ ...goblin, legendary: [42] });

    expect(parse).toThrow(CardInputError);
    expect(parse).toThrow(expect.objectContaining({ code: 'INVALID_LEGENDARY_ACTION', entity: 'Goblin' }));
  });

  it('rejects a legendary map with more than one heading', () => {
    expect(() => parseEntity({ ...goblin, legendary: [{ Dash: 'a', Hide: 'b' }] })).toThrow(
      expect.objectContaining({ code: 'INVALID_LEGENDARY_ACTION' }),
    );
  });

  it('rejects a monster without its stats', () => {
    const { armor_class: _omitted, ...record } = goblin;

    expect(() => parseEntity(record, 2, 'monsters.yaml')).toThrow(
      expect.objectContaining({ code: 'INVALID_ENTITY', message: expect.stringContaining('armor_class') }),
    );
  });

  it('maps an item record to an item entity', () => {
    const entity = parseEntity({
      type: 'item',
      title: 'Rope',
      subtitle: 'Adventuring gear',
      category: 'Gear',
      description: ['Fifty feet of hempen rope.', { Knots: null, Weight: '10 lb.' }],
      image_path: 'art/rope.png',
    });

    expect(entity).toEqual({
      kind: 'item',
      title: 'Rope',
      subtitle: 'Adventuring gear',
      artist: undefined,
      imagePath: 'art/rope.png',
      category: 'Gear',
      subcategory: undefined,
      description: [
        'Fifty feet of hempen rope.',
        { heading: 'Knots', body: null },
        { heading: 'Weight', body: '10 lb.' },
      ],
    });
  });

  it('rejects an item description that is not text or a list', () => {
    expect(() => parseEntity({ type: 'item', title: 'Rope', category: 'Gear', description: 12 })).toThrow(
      expect.objectContaining({ code: 'INVALID_DESCRIPTION', entity: 'Rope' }),
    );
  });

  it('rejects an unknown record type', () => {
    expect(() => parseEntity({ type: 'spell', title: 'Light' })).toThrow(
      expect.objectContaining({ code: 'INVALID_ENTITY', entity: 'Light' }),
    );
  });

  it('names untitled records by position', () => {
    expect(() => parseEntity('not a record', 4)).toThrow(expect.objectContaining({ entity: 'entry 5' }));
  });
});

describe('parseEntities', () => {
  it('treats an empty document as no entities', () => {
    expect(parseEntities(null)).toEqual([]);
  });

  it('requires a list', () => {
    expect(() => parseEntities({ title: 'Goblin' }, 'cards.yaml')).toThrow('cards.yaml: expected a list of entities');
  });

  it('parses every record in order', () => {
    const entities = parseEntities([goblin, { ...goblin, title: 'Goblin Boss' }]);

    expect(entities.map((entity) => entity.title)).toEqual(['Goblin', 'Goblin Boss']);
  });
});
