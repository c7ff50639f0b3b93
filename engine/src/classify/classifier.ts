import { DEFAULT_CALIBRATION } from '../calibration.js';
import {
  isPageBreakComment,
  isPageBreakElement,
  pageBreakMarkersToComments,
} from '../html/markers.js';
import {
  type ChildNode,
  type Element,
  childElements,
  countImages,
  extractRawText,
  extractText,
  extractTextFromNodes,
  isCommentNode,
  isElement,
  isTextNode,
  parseFragment,
  sourceOf,
  startTagOf,
} from '../html/nodes.js';
import type { Block, BlockKind, HeadingLevel, HeightCalibration } from '../types.js';
import {
  blockquoteHeight,
  codeHeight,
  type HeightContext,
  headingHeight,
  imageHeight,
  listHeight,
  proseHeight,
  ruleHeight,
  standaloneImageHeight,
  tableHeight,
} from './heights.js';

/**
 * Closed set of element roles the classifier dispatches on
 */
export type NodeKind =
  | 'heading'
  | 'paragraph'
  | 'list'
  | 'code'
  | 'blockquote'
  | 'table'
  | 'rule'
  | 'image'
  | 'container'
  | 'ignored'
  | 'unknown';

const HEADING_LEVELS = new Map<string, HeadingLevel>([
  ['h1', 1],
  ['h2', 2],
  ['h3', 3],
  ['h4', 4],
  ['h5', 5],
  ['h6', 6],
]);

const TAG_KINDS = new Map<string, NodeKind>([
  ...[...HEADING_LEVELS.keys()].map((tag): [string, NodeKind] => [tag, 'heading']),
  ['p', 'paragraph'],
  ['ul', 'list'],
  ['ol', 'list'],
  ['dl', 'list'],
  ['pre', 'code'],
  ['blockquote', 'blockquote'],
  ['table', 'table'],
  ['hr', 'rule'],
  ['img', 'image'],
  ['div', 'container'],
  ['section', 'container'],
  ['article', 'container'],
  ['main', 'container'],
  ['aside', 'container'],
  ['header', 'container'],
  ['footer', 'container'],
  ['nav', 'container'],
  ['figure', 'container'],
  ['details', 'container'],
  ['script', 'ignored'],
  ['style', 'ignored'],
  ['template', 'ignored'],
]);

const LIST_ITEMS = new Set(['li']);
const DEFINITION_ITEMS = new Set(['dt', 'dd']);

const SPLITTABLE_LIST_ITEMS = 3;
const SPLITTABLE_CODE_LINES = 10;
const SPLITTABLE_TABLE_ROWS = 5;

export function nodeKindOf(tagName: string): NodeKind {
  return TAG_KINDS.get(tagName) ?? 'unknown';
}

function isPageBreakNode(node: ChildNode): boolean {
  if (isElement(node)) {
    return isPageBreakElement(node);
  }
  return isCommentNode(node) && isPageBreakComment(node);
}

function findDescendants(element: Element, tagNames: Set<string>): Element[] {
  const found: Element[] = [];
  for (const child of childElements(element)) {
    if (tagNames.has(child.tagName)) {
      found.push(child);
    }
    found.push(...findDescendants(child, tagNames));
  }
  return found;
}

function isHeaderRow(row: Element): boolean {
  const parent = row.parentNode;
  if (parent && isElement(parent) && parent.tagName === 'thead') {
    return true;
  }

  const cells = childElements(row).filter((cell) => cell.tagName === 'td' || cell.tagName === 'th');
  return cells.length > 0 && cells.every((cell) => cell.tagName === 'th');
}

/**
 * Turns an HTML fragment into an ordered list of measured blocks.
 * Never throws: nodes that cannot be classified degrade to plain text.
 */
export class BlockClassifier {
  private readonly context: HeightContext;

  constructor(contentWidth: number, calibration: HeightCalibration = DEFAULT_CALIBRATION) {
    this.context = { contentWidth, calibration };
  }

  parse(html: string): Block[] {
    if (!html.trim()) {
      return [];
    }

    const blocks: Block[] = [];
    try {
      const source = pageBreakMarkersToComments(html);
      for (const child of parseFragment(source).childNodes) {
        this.visit(child, source, blocks);
      }
    } catch {
      return [this.plainText(html, html.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ').trim(), 0)];
    }
    return blocks;
  }

  private visit(node: ChildNode, source: string, out: Block[]): void {
    if (isTextNode(node)) {
      const raw = sourceOf(node, source).trim();
      if (raw) {
        out.push(this.plainText(`<p>${raw}</p>`, extractText(node), 0));
      }
      return;
    }

    if (isCommentNode(node)) {
      if (isPageBreakComment(node)) {
        out.push(pageBreak());
      }
      return;
    }

    if (!isElement(node)) {
      return;
    }

    const produced: Block[] = [];
    try {
      this.visitElement(node, source, produced);
    } catch {
      const text = extractText(node);
      const imageCount = countImages(node);
      if (text || imageCount > 0) {
        out.push(this.plainText(sourceOf(node, source), text, imageCount));
      }
      return;
    }
    out.push(...produced);
  }

  private visitElement(element: Element, source: string, out: Block[]): void {
    if (isPageBreakElement(element)) {
      out.push(pageBreak());
      return;
    }

    const kind = nodeKindOf(element.tagName);

    switch (kind) {
      case 'heading': {
        const level = HEADING_LEVELS.get(element.tagName) ?? 1;
        const imageCount = countImages(element);
        const html = sourceOf(element, source);
        out.push(
          this.block({ type: 'heading', level }, html, extractText(element), imageCount, {
            height: headingHeight(level, this.context) + imageHeight(imageCount, this.context),
            splittable: false,
          }),
        );
        return;
      }

      case 'paragraph':
        this.visitParagraph(element, source, out);
        return;

      case 'list': {
        const itemTags = element.tagName === 'dl' ? DEFINITION_ITEMS : LIST_ITEMS;
        const itemCount = findDescendants(element, itemTags).length;
        const imageCount = countImages(element);
        const html = sourceOf(element, source);
        out.push(
          this.block({ type: 'list', itemCount }, html, extractText(element), imageCount, {
            height: listHeight(itemCount, imageCount, this.context),
            splittable: itemCount > SPLITTABLE_LIST_ITEMS,
          }),
        );
        return;
      }

      case 'code': {
        const text = extractRawText(element);
        const lineCount = text.split('\n').length;
        const imageCount = countImages(element);
        const html = sourceOf(element, source);
        out.push(
          this.block({ type: 'code', lineCount }, html, text, imageCount, {
            height: codeHeight(lineCount, this.context) + imageHeight(imageCount, this.context),
            splittable: lineCount > SPLITTABLE_CODE_LINES,
          }),
        );
        return;
      }

      case 'blockquote': {
        const text = extractText(element);
        const imageCount = countImages(element);
        const html = sourceOf(element, source);
        out.push(
          this.block({ type: 'blockquote' }, html, text, imageCount, {
            height: blockquoteHeight(text, imageCount, this.context),
            splittable: true,
          }),
        );
        return;
      }

      case 'table': {
        const rows = findDescendants(element, new Set(['tr']));
        const headerCount = rows.filter(isHeaderRow).length;
        const imageCount = countImages(element);
        out.push(
          this.block(
            { type: 'table', rowCount: rows.length, headerCount },
            sourceOf(element, source),
            extractText(element),
            imageCount,
            {
              height: tableHeight(headerCount, rows.length - headerCount, imageCount, this.context),
              splittable: rows.length > SPLITTABLE_TABLE_ROWS,
            },
          ),
        );
        return;
      }

      case 'rule':
        out.push(
          this.block({ type: 'horizontal-rule' }, sourceOf(element, source), '', 0, {
            height: ruleHeight(this.context),
            splittable: false,
          }),
        );
        return;

      case 'image':
        out.push({
          kind: { type: 'image' },
          html: sourceOf(element, source),
          text: '',
          estimatedHeightPx: Math.round(standaloneImageHeight(this.context)),
          splittable: false,
        });
        return;

      case 'container':
        this.visitContainer(element, source, out);
        return;

      case 'ignored':
        return;

      case 'unknown': {
        const text = extractText(element);
        const imageCount = countImages(element);
        if (text || imageCount > 0) {
          out.push(this.plainText(sourceOf(element, source), text, imageCount));
        }
        return;
      }

      default: {
        const exhaustive: never = kind;
        throw new Error(`Unhandled node kind: ${String(exhaustive)}`);
      }
    }
  }

  private visitParagraph(element: Element, source: string, out: Block[]): void {
    if (!element.childNodes.some(isPageBreakNode)) {
      const text = extractText(element);
      const imageCount = countImages(element);
      if (text || imageCount > 0) {
        out.push(this.paragraph(sourceOf(element, source), text, imageCount));
      }
      return;
    }

    // Markers nested in prose: split the paragraph around them, re-wrapping each run.
    const openTag = startTagOf(element, source);
    let run: ChildNode[] = [];

    const flush = () => {
      const text = extractTextFromNodes(run);
      const imageCount = run.reduce((sum, node) => sum + countImages(node), 0);
      if (text || imageCount > 0) {
        const inner = run.map((node) => sourceOf(node, source)).join('');
        out.push(this.paragraph(`${openTag}${inner}</p>`, text, imageCount));
      }
      run = [];
    };

    for (const child of element.childNodes) {
      if (isPageBreakNode(child)) {
        flush();
        out.push(pageBreak());
      } else {
        run.push(child);
      }
    }
    flush();
  }

  private visitContainer(element: Element, source: string, out: Block[]): void {
    const children = childElements(element);

    // Keep an image together with its caption and wrapper.
    if (children.some((child) => child.tagName === 'img' || child.tagName === 'picture')) {
      const text = extractText(element);
      const imageCount = countImages(element);
      out.push(
        this.block({ type: 'mixed-container', imageCount }, sourceOf(element, source), text, imageCount, {
          height: proseHeight(text, imageCount, this.context),
          splittable: false,
        }),
      );
      return;
    }

    const hasBlockChild = children.some(
      (child) => isPageBreakElement(child) || nodeKindOf(child.tagName) !== 'unknown',
    );
    if (hasBlockChild || element.childNodes.some(isPageBreakNode)) {
      for (const child of element.childNodes) {
        this.visit(child, source, out);
      }
      return;
    }

    const text = extractText(element);
    const imageCount = countImages(element);
    if (text || imageCount > 0) {
      out.push(this.plainText(sourceOf(element, source), text, imageCount));
    }
  }

  private paragraph(html: string, text: string, imageCount: number): Block {
    const kind: BlockKind =
      imageCount > 0 ? { type: 'paragraph-with-images', imageCount } : { type: 'paragraph' };
    return this.block(kind, html, text, imageCount, {
      height: proseHeight(text, imageCount, this.context),
      splittable: true,
    });
  }

  private plainText(html: string, text: string, imageCount: number): Block {
    return this.block({ type: 'plain-text' }, html, text, imageCount, {
      height: proseHeight(text, imageCount, this.context),
      splittable: true,
    });
  }

  /**
   * Blocks that contain images are never splittable.
   */
  private block(
    kind: BlockKind,
    html: string,
    text: string,
    imageCount: number,
    measured: { height: number; splittable: boolean },
  ): Block {
    return {
      kind,
      html,
      text,
      estimatedHeightPx: Math.round(measured.height),
      splittable: measured.splittable && imageCount === 0,
    };
  }
}

function pageBreak(): Block {
  return {
    kind: { type: 'page-break' },
    html: '',
    text: '',
    estimatedHeightPx: 0,
    splittable: false,
  };
}
