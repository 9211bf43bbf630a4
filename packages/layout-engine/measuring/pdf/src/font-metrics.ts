import type { FontFaces } from '@statforge/contracts';

/** Advance width of a string in a named font. */
export interface FontMetrics {
  widthOf(text: string, font: string, fontSize: number): number;
}

/**
 * The slice of a PDFKit document used for measuring. Declared structurally so
 * the measurer does not depend on a live document type.
 */
export type PdfFontHost = {
  font(name: string, size?: number): unknown;
  widthOfString(text: string): number;
};

/** Measures with the real font programs loaded into a PDFKit document. */
export function createPdfKitMetrics(doc: PdfFontHost): FontMetrics {
  return {
    widthOf(text, font, fontSize) {
      doc.font(font, fontSize);
      return doc.widthOfString(text);
    },
  };
}

/**
 * Font-independent metrics: every character advances `ratio × fontSize`.
 * Used where output must not depend on installed fonts, e.g. tests.
 */
export function createDeterministicMetrics(ratio = 0.5): FontMetrics {
  return {
    widthOf(text, _font, fontSize) {
      return text.length * fontSize * ratio;
    },
  };
}

export const faceFor = (faces: FontFaces, bold: boolean, italic: boolean): string => {
  if (bold && italic) return faces.boldItalic;
  if (bold) return faces.bold;
  if (italic) return faces.italic;
  return faces.regular;
};
