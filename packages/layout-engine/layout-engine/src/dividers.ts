import type { FlowItem, LeafItem, TextRegion } from './region.js';

/**
 * Decides whether a divider should be dropped instead of placed. A divider is
 * only drawn between two blocks that share a region, so it is discarded when:
 * the region is still empty, nothing follows it, or the block that follows
 * would not fit beneath it, space before included.
 */
export function shouldSuppressDivider(region: TextRegion, divider: LeafItem, next: FlowItem | undefined): boolean {
  if (region.isAtTop()) return true;
  if (!next) return true;
  return !region.fitsInSequence([divider, next]);
}
