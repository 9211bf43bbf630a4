import { createWriteStream, existsSync } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import PDFDocument from 'pdfkit';
import { createCardContent } from '@statforge/card-adapter';
import { mm, type CardSizeId } from '@statforge/contracts';
import { selectCardSize, type SizeAttempt } from '@statforge/layout-engine';
import { createBlockMeasurer, createPdfKitMetrics } from '@statforge/measuring-pdf';
import { exportGrid, exportSingles, paintCards, type LaidOutCard } from '@statforge/painter-pdf';
import { DEFAULT_PALETTE, FONT_SETS, registerFontSet, type CardPalette } from '@statforge/style-engine';
import type { CliOptions } from '../lib/args.js';
import { CliError } from '../lib/errors.js';
import { expandInputs, loadEntities, probeImage, type ImageProbe, type LoadedEntity } from '../lib/input.js';

export type RenderedCard = {
  title: string;
  size: CardSizeId;
  attempts: SizeAttempt[];
};

export type RenderResult = {
  output: string;
  cards: RenderedCard[];
  /** Titles of entities that did not fit the largest card. */
  skipped: string[];
};

export type RenderDeps = {
  cwd?: string;
  probe?: ImageProbe;
};

type RenderInput = Pick<
  CliOptions,
  'inputs' | 'output' | 'fonts' | 'fontDir' | 'bleedMm' | 'exportMode' | 'background' | 'allowSplit'
>;

const resolveBackground = (
  options: RenderInput,
  cwd: string,
): { palette: Readonly<CardPalette>; background?: string } => {
  switch (options.background.kind) {
    case 'none':
      return { palette: { ...DEFAULT_PALETTE, background: 'white' } };
    case 'parchment':
      return { palette: DEFAULT_PALETTE };
    case 'image': {
      const file = path.resolve(cwd, options.background.path);
      if (!existsSync(file)) {
        throw new CliError('FILE_READ_ERROR', `Background image not found: ${file}`);
      }
      return { palette: DEFAULT_PALETTE, background: file };
    }
  }
};

async function loadAll(files: readonly string[], probe: ImageProbe): Promise<LoadedEntity[]> {
  const loaded: LoadedEntity[] = [];
  for (const file of files) {
    loaded.push(...(await loadEntities(file, probe)));
  }
  return loaded;
}

/**
 * Loads every entity, picks each card's size, paints the cards and writes
 * the PDF. Entities too long for the largest card are logged and skipped.
 */
export async function render(options: RenderInput, deps: RenderDeps = {}): Promise<RenderResult> {
  const cwd = deps.cwd ?? process.cwd();
  const { palette, background } = resolveBackground(options, cwd);

  const files = await expandInputs(options.inputs, cwd);
  const entities = await loadAll(files, deps.probe ?? probeImage);
  if (entities.length === 0) {
    throw new CliError('NO_CARDS', 'No cards to generate');
  }

  const fontSet = FONT_SETS[options.fonts];
  const doc = new PDFDocument({ autoFirstPage: false, margin: 0 });
  registerFontSet(fontSet, doc, path.resolve(cwd, options.fontDir));
  const metrics = createPdfKitMetrics(doc);
  const measure = createBlockMeasurer(metrics);

  const laidOut: LaidOutCard[] = [];
  const cards: RenderedCard[] = [];
  const skipped: string[] = [];
  for (const { entity, image } of entities) {
    const content = createCardContent(entity, { fontSet, palette, ...(image ? { image } : {}) });
    const selection = selectCardSize(content, {
      measure,
      allowSplit: options.allowSplit,
      bleed: mm(options.bleedMm),
    });
    if (selection.status === 'overflow') {
      console.warn(`[statforge] Could not fit ${content.title}`);
      skipped.push(content.title);
      continue;
    }
    laidOut.push({ content, variant: selection.variant, front: selection.front, back: selection.back });
    cards.push({ title: content.title, size: selection.variant.id, attempts: selection.attempts });
  }

  const painted = paintCards(laidOut, { palette, metrics, ...(background ? { background } : {}) });
  if (options.exportMode === 'grid') {
    exportGrid(doc, painted);
  } else {
    exportSingles(doc, painted);
  }

  const output = path.resolve(cwd, options.output);
  const stream = createWriteStream(output);
  doc.pipe(stream);
  doc.end();
  try {
    await finished(stream);
  } catch (error) {
    throw new CliError('FILE_WRITE_ERROR', `Could not write ${output}`, { error });
  }

  const paintedIndexes = new Set(painted.map((card) => card.index));
  return { output, cards: cards.filter((_, index) => paintedIndexes.has(index)), skipped };
}
