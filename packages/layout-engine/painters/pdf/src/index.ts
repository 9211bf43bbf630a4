/**
 * @statforge/painter-pdf
 *
 * Paints laid-out cards onto recording surfaces and replays them into a
 * PDFKit document, one card per page pair or as printable sheets.
 */

export {
  BACKGROUND_CORNER_RADIUS,
  CARD_CORNER_RADIUS,
  paintBackFace,
  paintFragment,
  paintFrontFace,
} from './card-painter.js';
export type { PaintOptions } from './card-painter.js';
export { A4_SIZE, exportGrid, exportSingles, paintCards, reverseSegments } from './export.js';
export type { LaidOutCard, PageSize, PaintedCard } from './export.js';
export { RecordingSurface } from './surface.js';
export type { Matrix, PdfTarget, SurfaceOp } from './surface.js';
export { DESCENT_RATIO, paintLines } from './text.js';
export type { TextBox } from './text.js';
