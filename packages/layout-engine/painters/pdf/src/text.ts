import type { Line, TextStyle } from '@statforge/contracts';
import { faceFor } from '@statforge/measuring-pdf';
import type { RecordingSurface } from './surface.js';

/** Share of the font size that hangs below the baseline. */
export const DESCENT_RATIO = 0.2;

export type TextBox = {
  x: number;
  y: number;
  width: number;
};

/**
 * Draws measured lines top-down from `box.y`. Each line sits on a baseline
 * one descent above the bottom of its line box.
 */
export function paintLines(surface: RecordingSurface, lines: readonly Line[], style: TextStyle, box: TextBox): void {
  let top = box.y;
  for (const line of lines) {
    const left = style.alignment === 'center' ? box.x + (box.width - line.width) / 2 : box.x;
    const baseline = top + line.lineHeight - style.fontSize * DESCENT_RATIO;
    for (const segment of line.segments) {
      surface.text(segment.text, left + segment.x, baseline, {
        font: faceFor(style.faces, segment.bold, segment.italic),
        fontSize: style.fontSize,
        color: style.color,
      });
    }
    top += line.lineHeight;
  }
}
