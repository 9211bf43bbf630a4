/**
 * @statforge/layout-engine
 *
 * Places measured content blocks into the text regions of a card and picks
 * the smallest card size that holds them. Pure and synchronous: everything
 * here works on values from @statforge/contracts and a {@link BlockMeasurer}.
 */

export {
  BASE_HEIGHT,
  BASE_WIDTH,
  CARD_SIZE_ORDER,
  STANDARD_BORDER,
  TEXT_MARGIN,
  createCardSizeVariant,
} from './card-sizes.js';
export { shouldSuppressDivider } from './dividers.js';
export { flowContent } from './flow.js';
export type { FlowOptions, FlowResult, FlowState } from './flow.js';
export { bestOrientation, fitImage, layoutFrontFace } from './front-face.js';
export { TextRegion, toFlowItem } from './region.js';
export type { FlowItem, GroupItem, LeafItem, RegionSplit } from './region.js';
export { selectCardSize } from './size-selector.js';
export type { CardSelection, SelectCardSizeOptions, SizeAttempt } from './size-selector.js';
