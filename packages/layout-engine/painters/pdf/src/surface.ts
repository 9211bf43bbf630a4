import type { Rect } from '@statforge/contracts';

/** Affine matrix `[a, b, c, d, e, f]` as PDF `cm` takes it. */
export type Matrix = [number, number, number, number, number, number];

export type SurfaceOp =
  | { op: 'page'; width: number; height: number }
  | { op: 'save' }
  | { op: 'restore' }
  | { op: 'transform'; matrix: Matrix }
  | { op: 'fillRect'; rect: Rect; color: string }
  | { op: 'fillRoundRect'; rect: Rect; radius: number; color: string }
  | { op: 'clipRoundRect'; rect: Rect; radius: number }
  | { op: 'image'; path: string; rect: Rect }
  | { op: 'text'; text: string; x: number; baseline: number; font: string; fontSize: number; color: string };

/**
 * The slice of a PDFKit document a surface draws into. Declared structurally
 * so tests can record calls without a real document.
 */
export type PdfTarget = {
  addPage(options: { size: [number, number]; margin: number }): unknown;
  save(): unknown;
  restore(): unknown;
  transform(a: number, b: number, c: number, d: number, e: number, f: number): unknown;
  rect(x: number, y: number, width: number, height: number): unknown;
  roundedRect(x: number, y: number, width: number, height: number, radius: number): unknown;
  fill(color: string): unknown;
  clip(): unknown;
  image(src: string, x: number, y: number, options: { width: number; height: number }): unknown;
  font(name: string, size?: number): unknown;
  fillColor(color: string): unknown;
  text(text: string, x: number, y: number, options: { lineBreak: boolean; baseline: 'alphabetic' }): unknown;
};

const applyOp = (target: PdfTarget, op: SurfaceOp): void => {
  switch (op.op) {
    case 'page':
      target.addPage({ size: [op.width, op.height], margin: 0 });
      return;
    case 'save':
      target.save();
      return;
    case 'restore':
      target.restore();
      return;
    case 'transform':
      target.transform(...op.matrix);
      return;
    case 'fillRect':
      target.rect(op.rect.x, op.rect.y, op.rect.width, op.rect.height);
      target.fill(op.color);
      return;
    case 'fillRoundRect':
      target.roundedRect(op.rect.x, op.rect.y, op.rect.width, op.rect.height, op.radius);
      target.fill(op.color);
      return;
    case 'clipRoundRect':
      target.roundedRect(op.rect.x, op.rect.y, op.rect.width, op.rect.height, op.radius);
      target.clip();
      return;
    case 'image':
      target.image(op.path, op.rect.x, op.rect.y, { width: op.rect.width, height: op.rect.height });
      return;
    case 'text':
      target.font(op.font, op.fontSize);
      target.fillColor(op.color);
      target.text(op.text, op.x, op.baseline, { lineBreak: false, baseline: 'alphabetic' });
      return;
  }
};

/**
 * A drawing surface that records operations instead of drawing them.
 * Nothing reaches the document until {@link commitTo}; {@link restart}
 * throws away everything recorded since the last commit.
 */
export class RecordingSurface {
  private ops: SurfaceOp[] = [];

  /** Operations recorded since the last commit or restart. */
  get pending(): readonly SurfaceOp[] {
    return this.ops;
  }

  addPage(width: number, height: number): void {
    this.ops.push({ op: 'page', width, height });
  }

  save(): void {
    this.ops.push({ op: 'save' });
  }

  restore(): void {
    this.ops.push({ op: 'restore' });
  }

  transform(...matrix: Matrix): void {
    this.ops.push({ op: 'transform', matrix });
  }

  translate(x: number, y: number): void {
    this.transform(1, 0, 0, 1, x, y);
  }

  fillRect(rect: Rect, color: string): void {
    this.ops.push({ op: 'fillRect', rect, color });
  }

  fillRoundRect(rect: Rect, radius: number, color: string): void {
    this.ops.push({ op: 'fillRoundRect', rect, radius, color });
  }

  clipRoundRect(rect: Rect, radius: number): void {
    this.ops.push({ op: 'clipRoundRect', rect, radius });
  }

  image(path: string, rect: Rect): void {
    this.ops.push({ op: 'image', path, rect });
  }

  text(text: string, x: number, baseline: number, font: { font: string; fontSize: number; color: string }): void {
    if (text.length === 0) return;
    this.ops.push({ op: 'text', text, x, baseline, font: font.font, fontSize: font.fontSize, color: font.color });
  }

  /** Replays a finished recording with its origin moved to `(x, y)`. */
  drawRecording(ops: readonly SurfaceOp[], x: number, y: number): void {
    this.save();
    this.translate(x, y);
    this.ops.push(...ops);
    this.restore();
  }

  /** Discards everything recorded since the last commit. */
  restart(): void {
    this.ops = [];
  }

  /** Hands back the pending operations and clears them, for replay elsewhere. */
  take(): SurfaceOp[] {
    const ops = this.ops;
    this.ops = [];
    return ops;
  }

  /** Draws the pending operations into the document, in order, and clears them. */
  commitTo(target: PdfTarget): void {
    for (const op of this.take()) {
      applyOp(target, op);
    }
  }
}
