import { z } from 'zod';
import { CardInputError, type CardInputErrorCode } from './errors.js';
import type { CardEntity, DescriptionEntry, HeadedEntry, ItemEntity, MonsterEntity } from './types.js';

// Numbers are accepted wherever text is expected: YAML reads `ac: 15` as a number.
const text = z.union([z.string(), z.number()]).transform((value) => String(value));

const abilityScore = z.union([z.number().int(), z.string()]);

const headedMap = z.record(z.string(), text).transform((map): HeadedEntry[] =>
  Object.entries(map).map(([heading, body]) => ({ heading, body })),
);

const singleHeading = z
  .record(z.string(), text)
  .refine((map) => Object.keys(map).length === 1, { message: 'Expected a single `heading: text` pair' })
  .transform((map): HeadedEntry => {
    const [[heading, body]] = Object.entries(map);
    return { heading, body };
  });

const entityBase = {
  title: text.pipe(z.string().min(1)),
  subtitle: text.default(''),
  artist: text.optional(),
  image_path: z.string().min(1).optional(),
};

const monsterRecord = z
  .object({
    type: z.literal('monster').optional(),
    ...entityBase,
    armor_class: text,
    max_hit_points: text,
    speed: text,
    strength: abilityScore,
    dexterity: abilityScore,
    constitution: abilityScore,
    intelligence: abilityScore,
    wisdom: abilityScore,
    charisma: abilityScore,
    challenge_rating: text,
    experience_points: text,
    source: text.default(''),
    attributes: z
      .record(z.string(), z.union([text, z.array(text)]))
      .default({})
      .transform((map) => Object.entries(map).map(([heading, value]) => ({ heading, value }))),
    abilities: headedMap.default({}),
    actions: headedMap.default({}),
    reactions: headedMap.default({}),
    legendary: z.array(z.union([z.string(), singleHeading])).default([]),
  })
  .transform(
    (record): MonsterEntity => ({
      kind: 'monster',
      title: record.title,
      subtitle: record.subtitle,
      artist: record.artist,
      imagePath: record.image_path,
      armorClass: record.armor_class,
      maxHitPoints: record.max_hit_points,
      speed: record.speed,
      abilityScores: {
        strength: record.strength,
        dexterity: record.dexterity,
        constitution: record.constitution,
        intelligence: record.intelligence,
        wisdom: record.wisdom,
        charisma: record.charisma,
      },
      challengeRating: record.challenge_rating,
      experiencePoints: record.experience_points,
      source: record.source,
      attributes: record.attributes,
      abilities: record.abilities,
      actions: record.actions,
      reactions: record.reactions,
      legendary: record.legendary,
    }),
  );

const descriptionEntry = z.union([
  z.string(),
  z
    .record(z.string(), text.nullable())
    .transform((map) => Object.entries(map).map(([heading, body]) => ({ heading, body }))),
]);

const itemRecord = z
  .object({
    type: z.literal('item'),
    ...entityBase,
    category: text,
    subcategory: text.optional(),
    description: z.union([z.string(), z.array(descriptionEntry)]),
  })
  .transform(
    (record): ItemEntity => ({
      kind: 'item',
      title: record.title,
      subtitle: record.subtitle,
      artist: record.artist,
      imagePath: record.image_path,
      category: record.category,
      subcategory: record.subcategory,
      // A map entry with several headings becomes one line per heading.
      description:
        typeof record.description === 'string'
          ? record.description
          : record.description.flatMap<DescriptionEntry>((entry) => (typeof entry === 'string' ? [entry] : entry)),
    }),
  );

const recordType = z.object({ type: z.enum(['monster', 'item']).default('monster') });

const codeForIssue = (issue: z.ZodIssue): CardInputErrorCode => {
  switch (issue.path[0]) {
    case 'legendary':
      return 'INVALID_LEGENDARY_ACTION';
    case 'description':
      return 'INVALID_DESCRIPTION';
    default:
      return 'INVALID_ENTITY';
  }
};

const entityName = (record: unknown, index: number): string => {
  if (typeof record === 'object' && record !== null && 'title' in record && typeof record.title === 'string') {
    return record.title;
  }
  return `entry ${index + 1}`;
};

/**
 * Validates one input record and converts it to a {@link CardEntity}.
 * Records without a `type` are monsters.
 */
export function parseEntity(record: unknown, index = 0, source = 'input'): CardEntity {
  const name = entityName(record, index);
  const kind = recordType.safeParse(record);
  if (!kind.success) {
    throw new CardInputError('INVALID_ENTITY', name, `${source}: "${name}" must be a mapping with a known type`, {
      issues: kind.error.issues,
    });
  }

  const parsed = kind.data.type === 'item' ? itemRecord.safeParse(record) : monsterRecord.safeParse(record);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const where = issue.path.length > 0 ? ` at \`${issue.path.join('.')}\`` : '';
    throw new CardInputError(codeForIssue(issue), name, `${source}: "${name}"${where}: ${issue.message}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/** Validates a parsed input document: a list of entity records. An empty document has no entities. */
export function parseEntities(document: unknown, source = 'input'): CardEntity[] {
  if (document == null) return [];
  if (!Array.isArray(document)) {
    throw new CardInputError('INVALID_ENTITY', source, `${source}: expected a list of entities`);
  }
  return document.map((record: unknown, index) => parseEntity(record, index, source));
}
