import { DEFAULT_CALIBRATION } from '../calibration.js';
import { BlockClassifier } from '../classify/classifier.js';
import { stripPageBreakMarkers } from '../html/markers.js';
import { resolvePageConfig } from '../page-sizes/presets.js';
import type {
  Block,
  HeightCalibration,
  Page,
  PageConfig,
  PageInfo,
  PageReport,
  PageSizeName,
  PaginationResult,
  RawPage,
} from '../types.js';
import { optimizePages, pageHeight, pageHtml } from './optimize.js';
import { partitionBlocks } from './partition.js';

const TEXT_PREVIEW_LENGTH = 50;

function toPage(page: RawPage): Page {
  return {
    html: pageHtml(page),
    blocks: page.blocks,
    heightPx: pageHeight(page),
    forced: page.forced,
  };
}

function previewText(text: string): string {
  return text.length > TEXT_PREVIEW_LENGTH ? `${text.slice(0, TEXT_PREVIEW_LENGTH)}...` : text;
}

/**
 * Splits an HTML document into card-sized pages.
 *
 * One instance holds one page-size preset. Changing it with `setPageSize`
 * re-derives the content box; block heights are recomputed on the next call.
 */
export class Paginator {
  private config: PageConfig;
  private classifier: BlockClassifier;
  private readonly calibration: HeightCalibration;

  constructor(sizeName: string = 'medium', calibration: HeightCalibration = DEFAULT_CALIBRATION) {
    this.calibration = calibration;
    this.config = resolvePageConfig(sizeName);
    this.classifier = new BlockClassifier(this.config.contentWidth, calibration);
  }

  /**
   * Switch presets. Unknown names fall back to medium.
   */
  setPageSize(sizeName: string): void {
    this.config = resolvePageConfig(sizeName);
    this.classifier = new BlockClassifier(this.config.contentWidth, this.calibration);
  }

  get sizeName(): PageSizeName {
    return this.config.preset.name;
  }

  getPageInfo(): PageInfo {
    const { preset, contentWidth, contentHeight } = this.config;
    return {
      sizeName: preset.name,
      width: preset.width,
      height: preset.height,
      contentWidth,
      contentHeight,
      padding: { ...preset.padding },
    };
  }

  classify(html: string): Block[] {
    return this.classifier.parse(html);
  }

  paginateDetailed(html: string): PaginationResult {
    const config = this.config;

    if (!html.trim()) {
      return { pages: [], warnings: [], config };
    }

    const blocks = this.classifier.parse(html);
    const partitioned = partitionBlocks(blocks, config);
    const pages = optimizePages(partitioned.pages, config).map(toPage);

    if (pages.length === 0) {
      // Input held nothing classifiable, e.g. only break markers or empty paragraphs.
      const fallback = stripPageBreakMarkers(html).trim();
      return {
        pages: [{ html: fallback, blocks: [], heightPx: 0, forced: false }],
        warnings: partitioned.warnings,
        config,
      };
    }

    return { pages, warnings: partitioned.warnings, config };
  }

  /**
   * One HTML fragment per page; empty strings are intentional blank pages
   */
  paginate(html: string): string[] {
    return this.paginateDetailed(html).pages.map((page) => page.html);
  }

  debugPagination(html: string): PageReport[] {
    const { pages, config } = this.paginateDetailed(html);
    const { contentWidth, contentHeight, preset } = config;

    return pages.map((page, index) => ({
      pageNumber: index + 1,
      sizeName: preset.name,
      contentDimensions: `${contentWidth}×${contentHeight}px`,
      blockCount: page.blocks.length,
      totalHeightPx: page.heightPx,
      maxHeightPx: contentHeight,
      fillRate: `${((page.heightPx / contentHeight) * 100).toFixed(1)}%`,
      forced: page.forced,
      blocks: page.blocks.map((block) => ({
        kind: block.kind.type,
        heightPx: block.estimatedHeightPx,
        textPreview: previewText(block.text),
      })),
    }));
  }
}
