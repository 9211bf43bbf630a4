import { existsSync } from 'node:fs';
import path from 'node:path';
import type { FontSet } from './font-sets.js';

export type FontLoadErrorCode = 'FONT_FILE_MISSING' | 'FONT_REGISTRATION_FAILED';

export class FontLoadError extends Error {
  readonly code: FontLoadErrorCode;
  readonly fontName: string;

  constructor(code: FontLoadErrorCode, fontName: string, message: string) {
    super(message);
    Object.setPrototypeOf(this, FontLoadError.prototype);
    this.name = 'FontLoadError';
    this.code = code;
    this.fontName = fontName;
  }
}

/** Anything that can register a font file under a name, e.g. a PDFKit document. */
export type FontRegistrar = {
  registerFont(name: string, src: string): unknown;
};

/**
 * Registers every font file of a set. Missing files fail before anything is
 * registered so a run never starts with half a font set.
 */
export function registerFontSet(fontSet: FontSet, registrar: FontRegistrar, fontDir: string): void {
  const entries = Object.entries(fontSet.files).map(([name, file]) => ({ name, src: path.resolve(fontDir, file) }));

  for (const { name, src } of entries) {
    if (!existsSync(src)) {
      throw new FontLoadError(
        'FONT_FILE_MISSING',
        name,
        `Failed to load the "${fontSet.name}" fonts: ${src} does not exist`,
      );
    }
  }

  for (const { name, src } of entries) {
    try {
      registrar.registerFont(name, src);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FontLoadError('FONT_REGISTRATION_FAILED', name, `Failed to register font "${name}": ${reason}`);
    }
  }
}
