import type { HeadingLevel, HeightCalibration } from '../types.js';

/**
 * Wide (double-width) code points: CJK ideographs, kana, hangul, fullwidth forms and punctuation.
 */
const WIDE_CHAR =
  /[ᄀ-ᅟ⺀-〾ぁ-㏿㐀-䶿一-鿿ꥠ-꥿가-힣豈-﫿︰-﹏＀-｠￠-￦]/;

export function isWideChar(char: string): boolean {
  return WIDE_CHAR.test(char);
}

/**
 * Estimated rendered width of a single line of text
 */
export function measureTextWidth(text: string, calibration: HeightCalibration): number {
  let width = 0;
  for (const char of text) {
    if (char === '\n') {
      continue;
    }
    width += isWideChar(char) ? calibration.wideCharWidth : calibration.narrowCharWidth;
  }
  return width;
}

/**
 * Estimate wrapped line count for text in a box of the given width.
 * Each explicit line break adds one line.
 */
export function estimateLines(
  text: string,
  contentWidth: number,
  calibration: HeightCalibration,
  indent = 0,
): number {
  if (!text) {
    return 1;
  }

  const available = Math.max(1, contentWidth - indent);
  const wrapped = Math.max(1, Math.ceil(measureTextWidth(text, calibration) / available));
  const forcedBreaks = text.split('\n').length - 1;

  return wrapped + forcedBreaks;
}

export interface HeightContext {
  calibration: HeightCalibration;
  contentWidth: number;
}

/**
 * Fixed height added for every image contained in a block
 */
export function imageHeight(imageCount: number, { calibration }: HeightContext): number {
  return imageCount * calibration.image;
}

export function headingHeight(level: HeadingLevel, { calibration }: HeightContext): number {
  return calibration.headingHeights[level - 1] + calibration.marginBottom;
}

/**
 * Height of prose: paragraphs, plain-text fallbacks and image-wrapping containers
 */
export function proseHeight(text: string, imageCount: number, context: HeightContext): number {
  const { calibration, contentWidth } = context;
  // An image-only paragraph has no text line to lay out.
  const textHeight =
    !text && imageCount > 0
      ? 0
      : calibration.paragraphBase +
        estimateLines(text, contentWidth, calibration) * calibration.paragraphLine;

  return textHeight + imageHeight(imageCount, context) + calibration.marginBottom;
}

export function blockquoteHeight(text: string, imageCount: number, context: HeightContext): number {
  const { calibration, contentWidth } = context;
  const lines = estimateLines(text, contentWidth, calibration, calibration.blockquoteIndent);

  return (
    calibration.blockquoteBase +
    lines * calibration.blockquoteLine +
    imageHeight(imageCount, context) +
    calibration.marginBottom
  );
}

export function codeHeight(lineCount: number, { calibration }: HeightContext): number {
  return calibration.codeBase + lineCount * calibration.codeLine + calibration.marginBottom;
}

export function listHeight(itemCount: number, imageCount: number, context: HeightContext): number {
  const { calibration } = context;
  return (
    itemCount * calibration.listItem + imageHeight(imageCount, context) + calibration.marginBottom
  );
}

export function tableHeight(
  headerRows: number,
  bodyRows: number,
  imageCount: number,
  context: HeightContext,
): number {
  const { calibration } = context;
  return (
    headerRows * calibration.tableHeaderRow +
    bodyRows * calibration.tableBodyRow +
    imageHeight(imageCount, context) +
    calibration.marginBottom
  );
}

export function ruleHeight({ calibration }: HeightContext): number {
  return calibration.horizontalRule + calibration.marginBottom;
}

export function standaloneImageHeight(context: HeightContext): number {
  return imageHeight(1, context) + context.calibration.marginBottom;
}
