/**
 * @statforge/style-engine
 *
 * Owns the card typography: which fonts a font set uses and the paragraph
 * styles built from it. Consumed by the card adapter and the painter; the
 * layout engine only ever sees resolved {@link TextStyle} values.
 */

import { mm, type FontFaces, type TextStyle } from '@statforge/contracts';
import { FONT_SETS, type FontSet, type FontSetName, type StyleRole } from './font-sets.js';

export { FONT_SETS, isFontSetName } from './font-sets.js';
export type { FontSet, FontSetName, FontFamilyRole, RoleSpec, StyleRole } from './font-sets.js';
export { FontLoadError, registerFontSet } from './register-fonts.js';
export type { FontLoadErrorCode, FontRegistrar } from './register-fonts.js';

export type ParagraphStyleName =
  | 'title'
  | 'subtitle'
  | 'text'
  | 'legendaryAction'
  | 'modifier'
  | 'actionTitle'
  | 'modifierTitle';

export type CardStyleSheet = Readonly<Record<ParagraphStyleName, TextStyle>>;

export type CardPalette = {
  border: string;
  background: string;
  footerText: string;
  subtitleBackground: string;
};

export const DEFAULT_PALETTE: Readonly<CardPalette> = {
  border: '#ec1923',
  background: '#f4ead5',
  footerText: 'white',
  subtitleBackground: 'red',
};

/** Extra leading added on top of the font size for every paragraph style. */
export const LEADING_GAP = mm(0.5);

/** A font, size and colour for text drawn outside the flow (footers, artist credit). */
export type ResolvedFont = {
  font: string;
  fontSize: number;
  color: string;
};

export function fontSizeFor(fontSet: FontSet, role: StyleRole): number {
  return mm(fontSet.roles[role].sizeMm) * fontSet.fontScale;
}

export function facesFor(fontSet: FontSet, role: StyleRole): FontFaces {
  return fontSet.families[fontSet.roles[role].family];
}

export function resolveFont(fontSet: FontSet, role: StyleRole): ResolvedFont {
  return {
    font: facesFor(fontSet, role).regular,
    fontSize: fontSizeFor(fontSet, role),
    color: fontSet.roles[role].color,
  };
}

type StyleOverrides = Partial<Omit<TextStyle, 'name' | 'faces' | 'fontSize'>>;

const paragraphStyle = (
  fontSet: FontSet,
  name: ParagraphStyleName,
  role: StyleRole,
  overrides: StyleOverrides = {},
): TextStyle => {
  const fontSize = fontSizeFor(fontSet, role);
  return {
    name,
    faces: facesFor(fontSet, role),
    fontSize,
    leading: fontSize + LEADING_GAP,
    spaceBefore: 0,
    spaceAfter: 0,
    alignment: 'left',
    color: fontSet.roles[role].color,
    ...overrides,
  };
};

export function createStyleSheet(
  fontSet: FontSet | FontSetName,
  palette: Readonly<CardPalette> = DEFAULT_PALETTE,
): CardStyleSheet {
  const set = typeof fontSet === 'string' ? FONT_SETS[fontSet] : fontSet;
  return {
    title: paragraphStyle(set, 'title', 'title', {
      spaceAfter: mm(0.5),
      alignment: 'center',
      textTransform: 'uppercase',
    }),
    subtitle: paragraphStyle(set, 'subtitle', 'subtitle', {
      alignment: 'center',
      backColor: palette.subtitleBackground,
    }),
    text: paragraphStyle(set, 'text', 'text', { spaceBefore: mm(1) }),
    legendaryAction: paragraphStyle(set, 'legendaryAction', 'text'),
    modifier: paragraphStyle(set, 'modifier', 'text', { alignment: 'center' }),
    actionTitle: paragraphStyle(set, 'actionTitle', 'modifierTitle', { spaceBefore: mm(1) }),
    modifierTitle: paragraphStyle(set, 'modifierTitle', 'modifierTitle', { alignment: 'center' }),
  };
}
