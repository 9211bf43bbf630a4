import { describe, expect, it, vi } from 'vitest';
import { RecordingSurface, type PdfTarget } from './surface.js';

const createTarget = () => {
  const target = {
    addPage: vi.fn(),
    save: vi.fn(),
    restore: vi.fn(),
    transform: vi.fn(),
    rect: vi.fn(),
    roundedRect: vi.fn(),
    fill: vi.fn(),
    clip: vi.fn(),
    image: vi.fn(),
    font: vi.fn(),
    fillColor: vi.fn(),
    text: vi.fn(),
  } satisfies PdfTarget;
  return target;
};

describe('RecordingSurface', () => {
  it('draws nothing until committed', () => {
    const surface = new RecordingSurface();
    const target = createTarget();

    surface.fillRect({ x: 1, y: 2, width: 3, height: 4 }, 'red');
    expect(target.rect).not.toHaveBeenCalled();

    surface.commitTo(target);
    expect(target.rect).toHaveBeenCalledWith(1, 2, 3, 4);
    expect(target.fill).toHaveBeenCalledWith('red');
    expect(surface.pending).toEqual([]);
  });

  it('replays operations in the order they were recorded', () => {
    const surface = new RecordingSurface();
    const target = createTarget();
    const order: string[] = [];
    target.addPage.mockImplementation(() => order.push('page'));
    target.clip.mockImplementation(() => order.push('clip'));
    target.image.mockImplementation(() => order.push('image'));
    target.text.mockImplementation(() => order.push('text'));

    surface.addPage(100, 200);
    surface.clipRoundRect({ x: 0, y: 0, width: 10, height: 10 }, 2);
    surface.image('/art/test.png', { x: 1, y: 1, width: 5, height: 5 });
    surface.text('Hello', 3, 9, { font: 'Helvetica', fontSize: 8, color: 'black' });
    surface.commitTo(target);

    expect(order).toEqual(['page', 'clip', 'image', 'text']);
    expect(target.addPage).toHaveBeenCalledWith({ size: [100, 200], margin: 0 });
    expect(target.roundedRect).toHaveBeenCalledWith(0, 0, 10, 10, 2);
    expect(target.image).toHaveBeenCalledWith('/art/test.png', 1, 1, { width: 5, height: 5 });
    expect(target.font).toHaveBeenCalledWith('Helvetica', 8);
    expect(target.text).toHaveBeenCalledWith('Hello', 3, 9, { lineBreak: false, baseline: 'alphabetic' });
  });

  it('discards uncommitted operations on restart', () => {
    const surface = new RecordingSurface();
    const target = createTarget();

    surface.addPage(100, 100);
    surface.commitTo(target);
    surface.addPage(50, 50);
    surface.fillRect({ x: 0, y: 0, width: 1, height: 1 }, 'red');
    surface.restart();
    surface.commitTo(target);

    expect(target.addPage).toHaveBeenCalledTimes(1);
    expect(target.fill).not.toHaveBeenCalled();
  });

  it('offsets a replayed recording inside its own graphics state', () => {
    const face = new RecordingSurface();
    face.fillRect({ x: 0, y: 0, width: 1, height: 1 }, 'red');
    const surface = new RecordingSurface();

    surface.drawRecording(face.take(), 30, 40);

    expect(surface.pending.map((op) => op.op)).toEqual(['save', 'transform', 'fillRect', 'restore']);
    expect(surface.pending[1]).toEqual({ op: 'transform', matrix: [1, 0, 0, 1, 30, 40] });
    expect(face.pending).toEqual([]);
  });

  it('skips empty text', () => {
    const surface = new RecordingSurface();

    surface.text('', 0, 0, { font: 'Helvetica', fontSize: 8, color: 'black' });

    expect(surface.pending).toEqual([]);
  });
});
