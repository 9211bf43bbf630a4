import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import sharp from 'sharp';
import { parse as parseYaml } from 'yaml';
import { CardInputError, parseEntities, type CardEntity } from '@statforge/card-adapter';
import type { ImageRef } from '@statforge/contracts';
import { INPUT_EXTENSIONS } from './constants.js';
import { CliError } from './errors.js';

export type ImageInfo = {
  width: number;
  height: number;
  /** Container format as sharp names it, e.g. `png` or `jpeg`. */
  format: string;
};

export type ImageProbe = (file: string) => Promise<ImageInfo>;

/** Formats PDFKit can embed. */
export const EMBEDDABLE_IMAGE_FORMATS: readonly string[] = ['jpeg', 'png'];

export type LoadedEntity = {
  entity: CardEntity;
  image?: ImageRef;
  /** The input file the entity came from. */
  source: string;
};

/** Reads pixel dimensions and format from the image header. */
export const probeImage: ImageProbe = async (file) => {
  const { width, height, format } = await sharp(file).metadata();
  if (!width || !height) {
    throw new CliError('FILE_READ_ERROR', `Could not read the dimensions of ${file}`);
  }
  return { width, height, format: format ?? 'unknown' };
};

const isInputFile = (file: string): boolean => INPUT_EXTENSIONS.some((extension) => file.endsWith(extension));

/**
 * Expands glob patterns to YAML files. Plain paths are kept as given, in
 * order, and must exist.
 */
export async function expandInputs(patterns: readonly string[], cwd = process.cwd()): Promise<string[]> {
  const files: string[] = [];

  for (const pattern of patterns) {
    if (fg.isDynamicPattern(pattern)) {
      const matches = await fg(pattern, { cwd, absolute: true });
      files.push(...matches.filter(isInputFile).sort());
      continue;
    }
    const file = path.resolve(cwd, pattern);
    if (!existsSync(file)) {
      throw new CliError('FILE_READ_ERROR', `Input file not found: ${file}`);
    }
    files.push(file);
  }

  return files;
}

/**
 * Loads the entities of one YAML file. `image_path` values resolve against
 * the file's directory and must point at an existing image.
 */
export async function loadEntities(file: string, probe: ImageProbe = probeImage): Promise<LoadedEntity[]> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new CliError('FILE_READ_ERROR', `Could not read ${file}`, { error });
  }

  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError('YAML_PARSE_ERROR', `${file}: ${reason}`);
  }

  const loaded: LoadedEntity[] = [];
  for (const entity of parseEntities(document, file)) {
    if (!entity.imagePath) {
      loaded.push({ entity, source: file });
      continue;
    }
    const imageFile = path.resolve(path.dirname(file), entity.imagePath);
    if (!existsSync(imageFile)) {
      throw new CardInputError(
        'IMAGE_NOT_FOUND',
        entity.title,
        `${file}: "${entity.title}" at \`image_path\`: no image at ${imageFile}`,
      );
    }
    const { width, height, format } = await probe(imageFile);
    if (!EMBEDDABLE_IMAGE_FORMATS.includes(format)) {
      throw new CardInputError(
        'UNSUPPORTED_IMAGE',
        entity.title,
        `${file}: "${entity.title}" at \`image_path\`: ${format} images cannot be embedded (use PNG or JPEG)`,
      );
    }
    loaded.push({ entity, image: { path: imageFile, width, height }, source: file });
  }
  return loaded;
}
