import type {
  BlockMeasurer,
  ContentBlock,
  Fragment,
  KeepTogetherBlock,
  LeafBlock,
  LeafMeasure,
  Line,
  RegionLayout,
  RegionTemplate,
  TableFragmentRow,
} from '@statforge/contracts';

/** Tolerance for floating-point height comparisons. */
const EPSILON = 1e-6;

/**
 * A leaf block waiting to be placed. Paragraphs that were split carry the line
 * range still to draw.
 */
export type LeafItem = {
  kind: 'leaf';
  block: LeafBlock;
  fromLine: number;
  toLine?: number;
};

/** A keep-together block, or what is left of one after a split. */
export type GroupItem = {
  kind: 'group';
  block: KeepTogetherBlock;
  items: LeafItem[];
};

export type FlowItem = LeafItem | GroupItem;

export type RegionSplit = {
  fitting: FlowItem;
  remaining: FlowItem;
};

type Placement = {
  leaf: LeafItem;
  measure: LeafMeasure;
  lines: Line[];
  toLine: number;
  before: number;
  body: number;
  after: number;
};

type Plan = {
  placements: Placement[];
  /** Height the plan needs, excluding the trailing space after. */
  required: number;
};

export const toFlowItem = (block: ContentBlock): FlowItem =>
  block.kind === 'keepTogether'
    ? { kind: 'group', block, items: block.blocks.map((leaf) => ({ kind: 'leaf', block: leaf, fromLine: 0 })) }
    : { kind: 'leaf', block, fromLine: 0 };

const toItem = (block: KeepTogetherBlock, leaves: LeafItem[]): FlowItem =>
  leaves.length === 1 ? leaves[0] : { kind: 'group', block, items: leaves };

const sliceLeaf = (leaf: LeafItem, fromLine: number, toLine?: number): LeafItem => ({
  kind: 'leaf',
  block: leaf.block,
  fromLine,
  ...(toLine != null ? { toLine } : {}),
});

/**
 * A rectangular text-flow target. Blocks are added top-down; the region keeps
 * its write cursor and the fragments committed so far.
 *
 * Space before a block is dropped at the top of the region. Space after a
 * block advances the cursor but is not needed for the block to fit.
 */
export class TextRegion {
  private readonly fragments: Fragment[] = [];
  private cursor = 0;
  private committed = 0;

  constructor(
    readonly template: RegionTemplate,
    private readonly measure: BlockMeasurer,
  ) {}

  get contentWidth(): number {
    const { width, padding } = this.template;
    return Math.max(0, width - padding.left - padding.right);
  }

  get contentHeight(): number {
    const { height, padding } = this.template;
    return Math.max(0, height - padding.top - padding.bottom);
  }

  get remainingHeight(): number {
    return Math.max(0, this.contentHeight - this.cursor);
  }

  /** True until the first block is committed. */
  isAtTop(): boolean {
    return this.committed === 0;
  }

  /**
   * Whether `items` would all fit if placed one after another at the cursor,
   * each measured as `tryAdd` would place it. Changes nothing.
   */
  fitsInSequence(items: readonly FlowItem[]): boolean {
    let atTop = this.isAtTop();
    let required = 0;
    let gap = 0;
    for (const item of items) {
      const plan = this.plan(item, atTop);
      required += gap + plan.required;
      gap = plan.placements[plan.placements.length - 1]?.after ?? 0;
      atTop = false;
    }
    return required <= this.remainingHeight + EPSILON;
  }

  /** Places the item at the cursor, or returns false and changes nothing. */
  tryAdd(item: FlowItem): boolean {
    const plan = this.plan(item, this.isAtTop());
    if (plan.required > this.remainingHeight + EPSILON) {
      return false;
    }
    for (const placement of plan.placements) {
      this.commit(placement);
    }
    return true;
  }

  /**
   * Splits an item that does not fit whole into the part that fits the
   * remaining height and the rest. Paragraphs split between lines. A group
   * never leaves its first block without at least one line of the next.
   * Returns null when nothing fits or the item cannot be split.
   */
  trySplit(item: FlowItem): RegionSplit | null {
    const atTop = this.isAtTop();
    const available = this.remainingHeight;

    if (item.kind === 'leaf') {
      const count = this.fittingLines(item, available, atTop);
      if (count === null) return null;
      return {
        fitting: sliceLeaf(item, item.fromLine, item.fromLine + count),
        remaining: sliceLeaf(item, item.fromLine + count, item.toLine),
      };
    }

    const { placements } = this.plan(item, atTop);
    let used = 0;
    for (let index = 0; index < placements.length; index += 1) {
      const placement = placements[index];
      const gap = index > 0 ? placements[index - 1].after : 0;
      if (used + gap + placement.before + placement.body <= available + EPSILON) {
        used += gap + placement.before + placement.body;
        continue;
      }
      if (index === 0) return null;

      const leaf = item.items[index];
      const count = this.fittingLines(leaf, available - used - gap, false);
      const head = item.items.slice(0, index);
      const tail = item.items.slice(index + 1);
      if (count === null) {
        if (index === 1) return null;
        return { fitting: toItem(item.block, head), remaining: toItem(item.block, [leaf, ...tail]) };
      }
      const splitAt = leaf.fromLine + count;
      return {
        fitting: toItem(item.block, [...head, sliceLeaf(leaf, leaf.fromLine, splitAt)]),
        remaining: toItem(item.block, [sliceLeaf(leaf, splitAt, leaf.toLine), ...tail]),
      };
    }
    return null;
  }

  toLayout(): RegionLayout {
    return { ...this.template, fragments: [...this.fragments] };
  }

  private plan(item: FlowItem, atTop: boolean): Plan {
    const leaves = item.kind === 'group' ? item.items : [item];
    const placements: Placement[] = [];
    let required = 0;
    leaves.forEach((leaf, index) => {
      const placement = this.place(leaf, atTop && index === 0);
      if (index > 0) {
        required += placements[index - 1].after;
      }
      required += placement.before + placement.body;
      placements.push(placement);
    });
    return { placements, required };
  }

  private place(leaf: LeafItem, atTop: boolean): Placement {
    const measure = this.measure(leaf.block, this.contentWidth);
    switch (measure.kind) {
      case 'paragraph': {
        const toLine = leaf.toLine ?? measure.lines.length;
        const lines = measure.lines.slice(leaf.fromLine, toLine);
        return {
          leaf,
          measure,
          lines,
          toLine,
          before: atTop ? 0 : measure.spaceBefore,
          body: lines.reduce((sum, line) => sum + line.lineHeight, 0),
          after: toLine >= measure.lines.length ? measure.spaceAfter : 0,
        };
      }
      case 'table':
        return {
          leaf,
          measure,
          lines: [],
          toLine: 0,
          before: atTop ? 0 : measure.spaceBefore,
          body: measure.totalHeight,
          after: 0,
        };
      case 'divider':
      case 'spacer':
        return { leaf, measure, lines: [], toLine: 0, before: 0, body: measure.totalHeight, after: 0 };
    }
  }

  /** Number of lines of a paragraph that fit `available`, or null when none or all of them do. */
  private fittingLines(leaf: LeafItem, available: number, atTop: boolean): number | null {
    const measure = this.measure(leaf.block, this.contentWidth);
    if (measure.kind !== 'paragraph') return null;

    const toLine = leaf.toLine ?? measure.lines.length;
    let room = available - (atTop ? 0 : measure.spaceBefore);
    let count = 0;
    for (let index = leaf.fromLine; index < toLine; index += 1) {
      const lineHeight = measure.lines[index].lineHeight;
      if (lineHeight > room + EPSILON) break;
      room -= lineHeight;
      count += 1;
    }
    if (count === 0 || leaf.fromLine + count >= toLine) return null;
    return count;
  }

  private commit(placement: Placement): void {
    this.cursor += placement.before;
    const fragment = this.toFragment(placement, this.template.y + this.template.padding.top + this.cursor);
    if (fragment) {
      this.fragments.push(fragment);
    }
    this.cursor = Math.min(this.contentHeight, this.cursor + placement.body + placement.after);
    this.committed += 1;
  }

  private toFragment(placement: Placement, y: number): Fragment | null {
    const x = this.template.x + this.template.padding.left;
    const width = this.contentWidth;
    const { leaf, measure } = placement;

    if (leaf.block.kind === 'paragraph' && measure.kind === 'paragraph') {
      return {
        kind: 'para',
        blockId: leaf.block.id,
        style: leaf.block.style,
        fromLine: leaf.fromLine,
        toLine: placement.toLine,
        lines: placement.lines,
        x,
        y,
        width,
        height: placement.body,
        ...(leaf.fromLine > 0 ? { continuesFromPrev: true } : {}),
        ...(placement.toLine < measure.lines.length ? { continuesOnNext: true } : {}),
      };
    }

    if (leaf.block.kind === 'table' && measure.kind === 'table') {
      const rows: TableFragmentRow[] = [];
      let rowY = y;
      leaf.block.rows.forEach((row, rowIndex) => {
        const rowMeasure = measure.rows[rowIndex];
        let cellX = x;
        const cells = row.map((cell, cellIndex) => {
          const cellMeasure = rowMeasure.cells[cellIndex];
          const placed = { x: cellX, width: cellMeasure.width, style: cell.style, lines: cellMeasure.lines };
          cellX += cellMeasure.width;
          return placed;
        });
        rows.push({ y: rowY, height: rowMeasure.height, cells });
        rowY += rowMeasure.height;
      });
      return { kind: 'table', blockId: leaf.block.id, rows, x, y, width, height: placement.body };
    }

    if (leaf.block.kind === 'divider') {
      const { overhang } = leaf.block;
      return {
        kind: 'divider',
        blockId: leaf.block.id,
        color: leaf.block.color,
        x: x - overhang,
        y,
        width: width + 2 * overhang,
        height: leaf.block.lineHeight,
      };
    }

    return null;
  }
}
