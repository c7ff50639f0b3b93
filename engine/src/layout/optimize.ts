import type { PageConfig, RawPage } from '../types.js';

export function pageHeight(page: RawPage): number {
  return page.blocks.reduce((sum, block) => sum + block.estimatedHeightPx, 0);
}

export function pageHtml(page: RawPage): string {
  return page.blocks.map((block) => block.html).join('');
}

function isBlankPage(page: RawPage): boolean {
  return pageHtml(page).trim() === '';
}

/**
 * Merge sparse implicit pages into their successor when the pair still fits.
 *
 * Forced pages (sealed by an explicit break) pass through untouched, empty ones
 * included. Blank implicit pages are dropped. Each page merges at most once.
 */
export function optimizePages(pages: RawPage[], config: PageConfig): RawPage[] {
  if (pages.length === 0) {
    return pages;
  }

  const { contentHeight } = config;
  const sparseBelow = contentHeight * config.preset.mergeThreshold;
  const optimized: RawPage[] = [];

  let i = 0;
  while (i < pages.length) {
    const page = pages[i];

    if (page.forced) {
      optimized.push(page);
      i += 1;
      continue;
    }

    if (isBlankPage(page)) {
      i += 1;
      continue;
    }

    const height = pageHeight(page);
    const next = i < pages.length - 1 ? pages[i + 1] : undefined;

    if (height < sparseBelow && next && !next.forced) {
      if (height + pageHeight(next) <= contentHeight) {
        optimized.push({ blocks: [...page.blocks, ...next.blocks], forced: false });
        i += 2;
        continue;
      }
    }

    optimized.push(page);
    i += 1;
  }

  return optimized.length > 0 ? optimized : pages;
}
