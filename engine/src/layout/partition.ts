import type { Block, PageConfig, RawPage } from '../types.js';

/**
 * A paragraph is a split candidate only when both it and the material already
 * on the page exceed this fraction of the content height.
 */
const PARAGRAPH_SPLIT_FRACTION = 0.3;

interface PartitionState {
  sealed: RawPage[];
  current: Block[];
  height: number;
  previousWasBreak: boolean;
  warnings: string[];
}

export interface PartitionResult {
  pages: RawPage[];
  warnings: string[];
}

// `sealed`, `current` and `warnings` belong to the running fold and grow in place.
function seal(state: PartitionState, forced: boolean): PartitionState {
  state.sealed.push({ blocks: state.current, forced });
  return { ...state, current: [], height: 0 };
}

function append(state: PartitionState, block: Block): PartitionState {
  state.current.push(block);
  return { ...state, height: state.height + block.estimatedHeightPx };
}

/**
 * Paragraph splitting is not implemented: a paragraph that does not fit always
 * moves whole to the next page.
 */
export function trySplitParagraph(_block: Block, _availablePx: number): [Block, Block] | null {
  return null;
}

function step(
  state: PartitionState,
  block: Block,
  index: number,
  config: PageConfig,
): PartitionState {
  const { contentHeight } = config;
  const blockHeight = block.estimatedHeightPx;

  if (block.kind.type === 'page-break') {
    const suppressed = state.current.length === 0 && !state.previousWasBreak;
    const next = suppressed ? state : seal(state, true);
    return { ...next, previousWasBreak: true };
  }

  let next: PartitionState = { ...state, previousWasBreak: false };

  if (blockHeight > contentHeight) {
    next.warnings.push(
      `Block ${index + 1} (${block.kind.type}) is estimated at ${blockHeight}px, ` +
        `taller than the ${contentHeight}px content box`,
    );
  }

  // Keep headings with the body that follows them.
  if (
    block.kind.type === 'heading' &&
    next.current.length > 0 &&
    next.height + blockHeight + config.preset.headingKeepWithPx > contentHeight
  ) {
    next = seal(next, false);
  }

  if (next.height + blockHeight > contentHeight) {
    const splitThreshold = contentHeight * PARAGRAPH_SPLIT_FRACTION;
    if (
      block.kind.type === 'paragraph' &&
      blockHeight > splitThreshold &&
      next.height > splitThreshold
    ) {
      const split = trySplitParagraph(block, contentHeight - next.height);
      if (split) {
        const [head, tail] = split;
        return append(seal(append(next, head), false), tail);
      }
    }

    if (next.current.length > 0) {
      next = seal(next, false);
    }
  }

  return append(next, block);
}

/**
 * Partition blocks into pages with a single greedy pass.
 *
 * Explicit page breaks always seal a page (marked forced), except a lone break
 * with nothing accumulated before it. Consecutive breaks produce empty pages.
 */
export function partitionBlocks(blocks: Block[], config: PageConfig): PartitionResult {
  const initial: PartitionState = {
    sealed: [],
    current: [],
    height: 0,
    previousWasBreak: false,
    warnings: [],
  };

  const final = blocks.reduce(
    (state, block, index) => step(state, block, index, config),
    initial,
  );

  if (final.current.length > 0) {
    final.sealed.push({ blocks: final.current, forced: false });
  }

  return { pages: final.sealed, warnings: final.warnings };
}
