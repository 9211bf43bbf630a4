import type { FontFaces } from '@statforge/contracts';

export type FontSetName = 'standard' | 'free' | 'accurate';

export type FontFamilyRole = 'display' | 'body';

/** Text roles used on a card, for paragraphs and for directly drawn strings. */
export type StyleRole =
  | 'title'
  | 'subtitle'
  | 'challenge'
  | 'category'
  | 'subcategory'
  | 'heading'
  | 'text'
  | 'artist'
  | 'modifierTitle';

export type RoleSpec = {
  family: FontFamilyRole;
  /** Nominal glyph height in millimetres, before the set's font scale. */
  sizeMm: number;
  color: string;
};

export type FontSet = {
  name: FontSetName;
  /** Ratio between the nominal glyph height and the font size that produces it. */
  fontScale: number;
  families: Record<FontFamilyRole, FontFaces>;
  /** Font files to register, by font name. Empty for the PDF base-14 fonts. */
  files: Record<string, string>;
  roles: Record<StyleRole, RoleSpec>;
};

const singleFace = (name: string): FontFaces => ({ regular: name, bold: name, italic: name, boldItalic: name });

const roles = (display: FontFamilyRole, artistSizeMm: number): Record<StyleRole, RoleSpec> => ({
  title: { family: display, sizeMm: 2.5, color: 'black' },
  subtitle: { family: 'body', sizeMm: 1.5, color: 'white' },
  challenge: { family: display, sizeMm: 2.25, color: 'black' },
  category: { family: display, sizeMm: 2.25, color: 'black' },
  subcategory: { family: display, sizeMm: 1.5, color: 'black' },
  heading: { family: 'body', sizeMm: 1.5, color: 'black' },
  text: { family: 'body', sizeMm: 1.5, color: 'black' },
  artist: { family: 'body', sizeMm: artistSizeMm, color: 'white' },
  modifierTitle: { family: display, sizeMm: 1.5, color: 'black' },
});

/** Uses the fonts every PDF viewer ships, so it never needs files on disk. */
const STANDARD: FontSet = {
  name: 'standard',
  fontScale: 1.41,
  families: {
    display: { regular: 'Times-Roman', bold: 'Times-Bold', italic: 'Times-Italic', boldItalic: 'Times-BoldItalic' },
    body: {
      regular: 'Helvetica',
      bold: 'Helvetica-Bold',
      italic: 'Helvetica-Oblique',
      boldItalic: 'Helvetica-BoldOblique',
    },
  },
  files: {},
  roles: roles('display', 1.5),
};

const FREE: FontSet = {
  name: 'free',
  fontScale: 1.41,
  families: {
    display: singleFace('Universal Serif'),
    body: {
      regular: 'ScalySans',
      bold: 'ScalySansBold',
      italic: 'ScalySansItalic',
      boldItalic: 'ScalySansBoldItalic',
    },
  },
  files: {
    'Universal Serif': 'Universal Serif.ttf',
    ScalySans: 'ScalySans.ttf',
    ScalySansItalic: 'ScalySans-Italic.ttf',
    ScalySansBold: 'ScalySans-Bold.ttf',
    ScalySansBoldItalic: 'ScalySans-BoldItalic.ttf',
  },
  roles: roles('display', 1.5),
};

const ACCURATE: FontSet = {
  name: 'accurate',
  fontScale: 1.41,
  families: {
    display: singleFace('ModestoExpanded'),
    body: {
      regular: 'ModestoTextLight',
      bold: 'ModestoTextBold',
      italic: 'ModestoTextLightItalic',
      boldItalic: 'ModestoTextBoldItalic',
    },
  },
  files: {
    ModestoExpanded: 'ModestoExpanded-Regular.ttf',
    ModestoTextLight: 'ModestoText-Light.ttf',
    ModestoTextLightItalic: 'ModestoText-LightItalic.ttf',
    ModestoTextBold: 'ModestoText-Bold.ttf',
    ModestoTextBoldItalic: 'ModestoText-BoldItalic.ttf',
  },
  roles: roles('display', 1.25),
};

export const FONT_SETS: Readonly<Record<FontSetName, FontSet>> = {
  standard: STANDARD,
  free: FREE,
  accurate: ACCURATE,
};

export const isFontSetName = (value: string): value is FontSetName =>
  Object.prototype.hasOwnProperty.call(FONT_SETS, value);
