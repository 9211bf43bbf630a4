export type AbilityScore = number | string;

export const ABILITY_NAMES = ['strength', 'dexterity', 'constitution', 'intelligence', 'wisdom', 'charisma'] as const;

export type AbilityName = (typeof ABILITY_NAMES)[number];

/** A `heading: body` pair, kept in input order. */
export type HeadedEntry = {
  heading: string;
  body: string;
};

export type AttributeEntry = {
  heading: string;
  value: string | string[];
};

export type LegendaryEntry = string | HeadedEntry;

/** A description line: plain text, or a heading whose body may be omitted. */
export type DescriptionEntry = string | { heading: string; body: string | null };

type EntityBase = {
  title: string;
  subtitle: string;
  artist?: string;
  /** Illustration path as written in the input, relative to the input file. */
  imagePath?: string;
};

export type MonsterEntity = EntityBase & {
  kind: 'monster';
  armorClass: string;
  maxHitPoints: string;
  speed: string;
  abilityScores: Record<AbilityName, AbilityScore>;
  challengeRating: string;
  experiencePoints: string;
  source: string;
  attributes: AttributeEntry[];
  abilities: HeadedEntry[];
  actions: HeadedEntry[];
  reactions: HeadedEntry[];
  legendary: LegendaryEntry[];
};

export type ItemEntity = EntityBase & {
  kind: 'item';
  category: string;
  subcategory?: string;
  description: string | DescriptionEntry[];
};

export type CardEntity = MonsterEntity | ItemEntity;
