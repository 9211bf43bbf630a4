export { mm, POINTS_PER_MM } from './units.js';

export const CONTRACTS_VERSION = '1.0.0';

/** Unique identifier for a content block within one card. */
export type BlockId = string;

// ============================================================================
// Styles
// ============================================================================

/**
 * Concrete font names for one family, keyed by the span flags that select them.
 * Mirrors the bold/italic mapping a PDF font registry keeps for a family.
 */
export type FontFaces = {
  regular: string;
  bold: string;
  italic: string;
  boldItalic: string;
};

export type TextAlignment = 'left' | 'center';

/** A fully resolved paragraph style. All lengths are in points. */
export type TextStyle = {
  name: string;
  faces: FontFaces;
  fontSize: number;
  leading: number;
  spaceBefore: number;
  spaceAfter: number;
  alignment: TextAlignment;
  color: string;
  /** Fill drawn behind every line of the paragraph. */
  backColor?: string;
  textTransform?: 'uppercase';
};

// ============================================================================
// Content blocks
// ============================================================================

/**
 * Styled text. `text` accepts a small markup subset: `<b>`, `<i>`, `<br/>`
 * and the `&amp;`, `&lt;`, `&gt;` entities. Anything else is literal text.
 */
export type ParagraphBlock = {
  kind: 'paragraph';
  id: BlockId;
  text: string;
  style: TextStyle;
};

export type TableCell = {
  text: string;
  style: TextStyle;
};

export type TableBlock = {
  kind: 'table';
  id: BlockId;
  rows: TableCell[][];
  /** Column widths as fractions of the available width. Equal columns when omitted. */
  columnFractions?: number[];
  spaceBefore: number;
};

export type DividerBlock = {
  kind: 'divider';
  id: BlockId;
  color: string;
  /** Thickness of the drawn rule. */
  lineHeight: number;
  /** Gap below the rule. */
  spacing: number;
  /** Horizontal overhang into the region padding on each side. */
  overhang: number;
};

export type SpacerBlock = {
  kind: 'spacer';
  id: BlockId;
  height: number;
};

export type LeafBlock = ParagraphBlock | TableBlock | DividerBlock | SpacerBlock;

/** Blocks that must land in the same region, e.g. a section header and its first entry. */
export type KeepTogetherBlock = {
  kind: 'keepTogether';
  id: BlockId;
  blocks: LeafBlock[];
};

export type ContentBlock = LeafBlock | KeepTogetherBlock;

// ============================================================================
// Measures
// ============================================================================

/** A run of same-styled text within one measured line. */
export type LineSegment = {
  text: string;
  bold: boolean;
  italic: boolean;
  /** Offset from the start of the line. */
  x: number;
  width: number;
};

export type Line = {
  segments: LineSegment[];
  width: number;
  lineHeight: number;
};

export type ParagraphMeasure = {
  kind: 'paragraph';
  lines: Line[];
  /** Sum of line heights, excluding space before/after. */
  totalHeight: number;
  spaceBefore: number;
  spaceAfter: number;
};

export type TableCellMeasure = {
  width: number;
  lines: Line[];
};

export type TableRowMeasure = {
  height: number;
  cells: TableCellMeasure[];
};

export type TableMeasure = {
  kind: 'table';
  columnWidths: number[];
  rows: TableRowMeasure[];
  totalHeight: number;
  spaceBefore: number;
};

export type DividerMeasure = {
  kind: 'divider';
  totalHeight: number;
};

export type SpacerMeasure = {
  kind: 'spacer';
  totalHeight: number;
};

export type LeafMeasure = ParagraphMeasure | TableMeasure | DividerMeasure | SpacerMeasure;

/**
 * Measures a leaf block at a given content width. Implementations must be pure:
 * the same block at the same width always measures the same.
 */
export type BlockMeasurer = (block: LeafBlock, maxWidth: number) => LeafMeasure;

// ============================================================================
// Fragments
// ============================================================================

export type ParaFragment = {
  kind: 'para';
  blockId: BlockId;
  style: TextStyle;
  fromLine: number;
  toLine: number;
  lines: Line[];
  x: number;
  y: number;
  width: number;
  height: number;
  continuesFromPrev?: boolean;
  continuesOnNext?: boolean;
};

export type TableFragmentCell = {
  x: number;
  width: number;
  style: TextStyle;
  lines: Line[];
};

export type TableFragmentRow = {
  y: number;
  height: number;
  cells: TableFragmentCell[];
};

export type TableFragment = {
  kind: 'table';
  blockId: BlockId;
  rows: TableFragmentRow[];
  x: number;
  y: number;
  width: number;
  height: number;
};

export type DividerFragment = {
  kind: 'divider';
  blockId: BlockId;
  color: string;
  x: number;
  y: number;
  width: number;
  /** Thickness of the rule; the fragment's footprint also includes its spacing. */
  height: number;
};

export type Fragment = ParaFragment | TableFragment | DividerFragment;

// ============================================================================
// Card geometry
// ============================================================================

export type CardSizeId = 'small' | 'large' | 'epic' | 'superEpic';

export type CardFace = 'front' | 'back';

export type Orientation = 'normal' | 'turn90';

export type Insets = {
  left: number;
  right: number;
  bottom: number;
  top: number;
};

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

/** A text-flow target on the back face. Coordinates are relative to the face's top-left corner. */
export type RegionTemplate = Rect & {
  padding: Insets;
};

/** Where a line of footer text starts: `x` from the left edge, `baseline` measured up from the bottom edge. */
export type FooterSlot = {
  x: number;
  baseline: number;
};

export type CardSizeVariant = {
  id: CardSizeId;
  width: number;
  height: number;
  bleed: number;
  frontBorder: Insets;
  backBorder: Insets;
  regions: RegionTemplate[];
  /** Whether the front face may be turned to match a landscape/portrait illustration. */
  rotatable: boolean;
  /** Vertical rule between back-face columns. */
  gutter?: Rect;
  footer: {
    primary: FooterSlot;
    secondary: FooterSlot;
    /** A lone footer line, centred in the bottom border. */
    single: FooterSlot;
  };
};

// ============================================================================
// Layout output
// ============================================================================

export type RegionLayout = RegionTemplate & {
  fragments: Fragment[];
};

/** Back face of a card laid out at one size. */
export type BackFaceLayout = {
  size: CardSizeId;
  regions: RegionLayout[];
};

/**
 * Front face of a card. When `orientation` is `turn90` the face is laid out in
 * a frame `faceWidth × faceHeight` that the painter turns onto the card.
 */
export type FrontFaceLayout = {
  orientation: Orientation;
  faceWidth: number;
  faceHeight: number;
  /** The area inside the front border. */
  frame: Rect;
  image?: Rect & { path: string };
  title: ParaFragment;
};

/** An illustration resolved on disk, with its pixel dimensions. */
export type ImageRef = {
  path: string;
  width: number;
  height: number;
};

// ============================================================================
// Card content
// ============================================================================

export type FooterSlotName = keyof CardSizeVariant['footer'];

/** A single line of text drawn outside the flow, in a fixed font. */
export type Caption = {
  text: string;
  font: string;
  fontSize: number;
  color: string;
};

/** Captions sharing a slot are drawn one after another on the same baseline. */
export type FooterCaption = Caption & {
  slot: FooterSlotName;
};

/**
 * Everything the layout engine and painter need to render one entity. Block
 * sequences are produced per size variant, since the title is scaled on
 * small cards and every attempt must start from fresh blocks.
 */
export type CardContent = {
  title: string;
  /** Sizes the entity may use. All sizes when omitted. */
  sizes?: readonly CardSizeId[];
  image?: ImageRef;
  artist?: Caption;
  footer: FooterCaption[];
  frontTitle(variant: CardSizeVariant): ParagraphBlock;
  backBlocks(variant: CardSizeVariant): ContentBlock[];
};
