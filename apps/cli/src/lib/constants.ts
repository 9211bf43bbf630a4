import type { FontSetName } from '@statforge/style-engine';

export const DEFAULT_OUTPUT = 'cards.pdf';
/** The standard set uses the PDF base-14 fonts and needs no files. */
export const DEFAULT_FONT_SET: FontSetName = 'standard';
export const DEFAULT_FONT_DIR = 'fonts';
export const DEFAULT_BLEED_MM = 0;

export const EXPORT_MODES = ['single', 'grid'] as const;
export type ExportMode = (typeof EXPORT_MODES)[number];
export const DEFAULT_EXPORT_MODE: ExportMode = 'single';

/** Input files a glob pattern may match. */
export const INPUT_EXTENSIONS = ['.yaml', '.yml'] as const;
