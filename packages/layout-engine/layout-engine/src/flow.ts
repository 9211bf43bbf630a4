import type { BlockMeasurer, ContentBlock, RegionLayout, RegionTemplate } from '@statforge/contracts';
import { shouldSuppressDivider } from './dividers.js';
import { TextRegion, toFlowItem, type FlowItem } from './region.js';

export type FlowState = 'advancing' | 'switching' | 'failed' | 'done';

export type FlowOptions = {
  /** Let paragraphs and keep-together groups continue in the next region. */
  allowSplit: boolean;
};

export type FlowResult = {
  status: 'done' | 'failed';
  /** One layout per region template, in template order. Unused regions are empty. */
  regions: RegionLayout[];
  /** Items still queued when the flow stopped. Empty when done. */
  pending: FlowItem[];
};

const layoutDebugEnabled =
  typeof process !== 'undefined' && typeof process.env !== 'undefined' && Boolean(process.env.STATFORGE_DEBUG_LAYOUT);

const layoutLog = (...args: unknown[]): void => {
  if (!layoutDebugEnabled) return;

  console.log(...args);
};

const describeItem = (item: FlowItem): string =>
  item.kind === 'group' ? `group ${item.block.id}` : `${item.block.kind} ${item.block.id}@${item.fromLine}`;

/**
 * Flows content blocks through a sequence of region templates.
 *
 * The engine is a small state machine over a pending queue. `advancing`
 * places the queue head in the current region; `switching` opens the next
 * region; running out of regions is `failed`; an empty queue is `done`.
 * Every call owns its queue and regions, so a failed attempt leaves nothing
 * behind.
 */
export function flowContent(
  blocks: readonly ContentBlock[],
  templates: readonly RegionTemplate[],
  measure: BlockMeasurer,
  options: FlowOptions,
): FlowResult {
  const pending: FlowItem[] = blocks.map(toFlowItem);
  const regions: TextRegion[] = [];

  const step = (region: TextRegion): FlowState => {
    const item = pending.shift();
    if (!item) return 'done';

    if (item.kind === 'leaf' && item.block.kind === 'divider' && shouldSuppressDivider(region, item, pending[0])) {
      layoutLog('[flow] suppress', describeItem(item));
      return 'advancing';
    }

    if (region.tryAdd(item)) {
      return 'advancing';
    }

    if (options.allowSplit) {
      const split = region.trySplit(item);
      if (split && region.tryAdd(split.fitting)) {
        layoutLog('[flow] split', describeItem(item), '->', describeItem(split.remaining));
        pending.unshift(split.remaining);
        return 'switching';
      }
    }

    pending.unshift(item);
    return 'switching';
  };

  let state: FlowState = 'switching';
  let region: TextRegion | undefined;
  while (state === 'advancing' || state === 'switching') {
    if (state === 'switching' || !region) {
      const template = templates[regions.length];
      if (!template) {
        layoutLog('[flow] out of regions with', pending.length, 'pending');
        state = 'failed';
        break;
      }
      region = new TextRegion(template, measure);
      regions.push(region);
      layoutLog('[flow] region', regions.length - 1);
    }
    state = step(region);
  }

  return {
    status: state === 'done' ? 'done' : 'failed',
    regions: templates.map((template, index) => regions[index]?.toLayout() ?? { ...template, fragments: [] }),
    pending,
  };
}
