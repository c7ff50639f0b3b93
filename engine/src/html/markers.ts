import type { CommentNode, Element, Node } from './nodes.js';
import { getAttribute, isElement, parseFragment } from './nodes.js';

export const PAGE_BREAK_CLASS = 'pagebreak-marker';
export const PAGE_BREAK_ATTRIBUTE = 'data-pagebreak';

/**
 * Marker element the Markdown converter emits for an explicit page break
 */
export const PAGE_BREAK_MARKER_HTML = `<div class="${PAGE_BREAK_CLASS}" ${PAGE_BREAK_ATTRIBUTE}="true"></div>`;

/**
 * Comment form of the marker. Unlike a `div`, it stays inside an open `<p>`.
 */
export const PAGE_BREAK_COMMENT_HTML = '<!--pagebreak-->';

const PAGE_BREAK_COMMENT_TEXT = /^\s*page-?break\s*$/i;
const PAGE_BREAK_COMMENT = /<!--\s*page-?break\s*-->/gi;

/**
 * Replace `<!-- pagebreak -->` directives with the marker element
 */
export function normalizePageBreakMarkers(html: string): string {
  return html.replace(PAGE_BREAK_COMMENT, PAGE_BREAK_MARKER_HTML);
}

/**
 * Rewrite every marker element as a page-break comment, leaving all other bytes alone.
 *
 * The HTML parser closes a `<p>` at a `<div>`, so a marker element inside a
 * paragraph would otherwise cut it in two and orphan the tail.
 */
export function pageBreakMarkersToComments(html: string): string {
  if (!/pagebreak/i.test(html)) {
    return html;
  }

  const spans: Array<[number, number]> = [];
  collectMarkerSpans(parseFragment(html), spans);

  let result = '';
  let cursor = 0;
  for (const [start, end] of spans) {
    result += html.slice(cursor, start) + PAGE_BREAK_COMMENT_HTML;
    cursor = end;
  }
  return result + html.slice(cursor);
}

// Spans come out in document order; a marker's own children are not visited.
function collectMarkerSpans(node: Node, spans: Array<[number, number]>): void {
  if (!('childNodes' in node)) {
    return;
  }

  for (const child of node.childNodes) {
    const location = child.sourceCodeLocation;
    if (isElement(child) && isPageBreakElement(child) && location) {
      spans.push([location.startOffset, location.endOffset]);
    } else {
      collectMarkerSpans(child, spans);
    }
  }
}

/**
 * Remove both marker forms from an HTML string
 */
export function stripPageBreakMarkers(html: string): string {
  return pageBreakMarkersToComments(html).replace(PAGE_BREAK_COMMENT, '');
}

export function isPageBreakElement(element: Element): boolean {
  if (element.tagName !== 'div') {
    return false;
  }

  const classes = (getAttribute(element, 'class') ?? '').split(/\s+/).filter(Boolean);
  if (classes.includes(PAGE_BREAK_CLASS)) {
    return true;
  }

  const flag = getAttribute(element, PAGE_BREAK_ATTRIBUTE);
  return flag !== null && flag.trim().toLowerCase() !== 'false';
}

export function isPageBreakComment(comment: CommentNode): boolean {
  return PAGE_BREAK_COMMENT_TEXT.test(comment.data);
}
