/**
 * Core TypeScript interfaces for the card paginator
 */

export type PageSizeName = 'small' | 'medium' | 'large';

/**
 * Page-size preset for a card
 */
export interface PageSizePreset {
  name: PageSizeName;
  width: number;
  height: number;
  padding: {
    top: number;
    bottom: number;
    sides: number;
  };
  headingKeepWithPx: number; // Minimum body space guaranteed below a heading
  mergeThreshold: number; // Fraction of content height below which a page is sparse
}

/**
 * Resolved page configuration (preset plus derived content box)
 */
export interface PageConfig {
  preset: PageSizePreset;
  contentWidth: number;
  contentHeight: number;
}

/**
 * Calibrated height constants, in pixels
 */
export interface HeightCalibration {
  headingHeights: [number, number, number, number, number, number];
  paragraphBase: number;
  paragraphLine: number;
  listItem: number;
  codeBase: number;
  codeLine: number;
  blockquoteBase: number;
  blockquoteLine: number;
  blockquoteIndent: number;
  tableHeaderRow: number;
  tableBodyRow: number;
  horizontalRule: number;
  image: number;
  marginBottom: number;
  wideCharWidth: number;
  narrowCharWidth: number;
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type BlockKind =
  | { type: 'heading'; level: HeadingLevel }
  | { type: 'paragraph' }
  | { type: 'paragraph-with-images'; imageCount: number }
  | { type: 'list'; itemCount: number }
  | { type: 'code'; lineCount: number }
  | { type: 'blockquote' }
  | { type: 'table'; rowCount: number; headerCount: number }
  | { type: 'horizontal-rule' }
  | { type: 'image' }
  | { type: 'mixed-container'; imageCount: number }
  | { type: 'page-break' }
  | { type: 'plain-text' };

export type BlockType = BlockKind['type'];

/**
 * One classified, measured unit of page content
 */
export interface Block {
  kind: BlockKind;
  html: string; // Source markup, re-emitted as-is
  text: string; // Only used for height estimation
  estimatedHeightPx: number;
  splittable: boolean;
}

/**
 * A page as produced by the partition pass
 */
export interface RawPage {
  blocks: Block[];
  forced: boolean; // Sealed by an explicit page break
}

/**
 * A finished page
 */
export interface Page {
  html: string;
  blocks: Block[];
  heightPx: number;
  forced: boolean;
}

/**
 * Pagination result with soft warnings
 */
export interface PaginationResult {
  pages: Page[];
  warnings: string[];
  config: PageConfig;
}

/**
 * Current page configuration, as reported to callers
 */
export interface PageInfo {
  sizeName: PageSizeName;
  width: number;
  height: number;
  contentWidth: number;
  contentHeight: number;
  padding: {
    top: number;
    bottom: number;
    sides: number;
  };
}

/**
 * Per-page debug report entry
 */
export interface PageReport {
  pageNumber: number;
  sizeName: PageSizeName;
  contentDimensions: string;
  blockCount: number;
  totalHeightPx: number;
  maxHeightPx: number;
  fillRate: string;
  forced: boolean;
  blocks: Array<{
    kind: BlockType;
    heightPx: number;
    textPreview: string;
  }>;
}

/**
 * Result of validating pagination output
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[]; // Fatal issues
  warnings: string[]; // Non-fatal issues
}
