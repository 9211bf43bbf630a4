import type {
  BlockMeasurer,
  CardContent,
  CardSizeVariant,
  FrontFaceLayout,
  ImageRef,
  Orientation,
  ParaFragment,
  Rect,
} from '@statforge/contracts';
import { TEXT_MARGIN } from './card-sizes.js';

/** Largest size with the image's aspect ratio that fits inside `maxWidth × maxHeight`. */
export function fitImage(
  image: Pick<ImageRef, 'width' | 'height'>,
  maxWidth: number,
  maxHeight: number,
): { width: number; height: number } {
  if (image.width <= 0 || image.height <= 0) {
    return { width: 0, height: 0 };
  }
  const ratio = Math.min(maxWidth / image.width, maxHeight / image.height);
  return { width: image.width * ratio, height: image.height * ratio };
}

/**
 * Turns the front face when the illustration and the card disagree on
 * landscape versus portrait. Only rotatable variants are ever turned.
 */
export function bestOrientation(variant: CardSizeVariant, image?: Pick<ImageRef, 'width' | 'height'>): Orientation {
  if (!variant.rotatable || !image) return 'normal';
  const imageLandscape = image.width > image.height;
  const cardLandscape = variant.width > variant.height;
  return imageLandscape === cardLandscape ? 'normal' : 'turn90';
}

/**
 * Lays out the front face: the illustration scaled into whatever height the
 * title leaves, centred horizontally with the vertical slack split above and
 * below it, and the title underneath.
 */
export function layoutFrontFace(
  content: CardContent,
  variant: CardSizeVariant,
  measure: BlockMeasurer,
): FrontFaceLayout {
  const orientation = bestOrientation(variant, content.image);
  const turned = orientation === 'turn90';
  const faceWidth = turned ? variant.height : variant.width;
  const faceHeight = turned ? variant.width : variant.height;
  const border = variant.frontBorder;
  const frame: Rect = {
    x: border.left,
    y: border.top,
    width: faceWidth - border.left - border.right,
    height: faceHeight - border.top - border.bottom,
  };
  const contentWidth = Math.max(0, frame.width - 2 * TEXT_MARGIN);

  const titleBlock = content.frontTitle(variant);
  const titleMeasure = measure(titleBlock, contentWidth);
  const lines = titleMeasure.kind === 'paragraph' ? titleMeasure.lines : [];
  const spaceAfter = titleMeasure.kind === 'paragraph' ? titleMeasure.spaceAfter : 0;
  const titleHeight = lines.reduce((sum, line) => sum + line.lineHeight, 0);
  const titleFootprint = titleHeight + spaceAfter + 2 * TEXT_MARGIN;
  const available = frame.height - titleFootprint - 2 * TEXT_MARGIN;

  const fitted =
    content.image && available > 0 && contentWidth > 0
      ? fitImage(content.image, contentWidth, available)
      : { width: 0, height: 0 };
  const space = frame.height - (fitted.height + titleFootprint);

  const title: ParaFragment = {
    kind: 'para',
    blockId: titleBlock.id,
    style: titleBlock.style,
    fromLine: 0,
    toLine: lines.length,
    lines,
    x: frame.x + TEXT_MARGIN,
    y: frame.y + TEXT_MARGIN + Math.max(space, 0) + fitted.height,
    width: contentWidth,
    height: titleHeight,
  };

  return {
    orientation,
    faceWidth,
    faceHeight,
    frame,
    title,
    ...(content.image && fitted.height > 0
      ? {
          image: {
            path: content.image.path,
            x: frame.x + TEXT_MARGIN + (contentWidth - fitted.width) / 2,
            y: frame.y + TEXT_MARGIN + space / 2,
            width: fitted.width,
            height: fitted.height,
          },
        }
      : {}),
  };
}
