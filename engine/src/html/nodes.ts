import * as parse5 from 'parse5';

export type Node = parse5.DefaultTreeAdapterMap['node'];
export type ChildNode = parse5.DefaultTreeAdapterMap['childNode'];
export type Element = parse5.DefaultTreeAdapterMap['element'];
export type TextNode = parse5.DefaultTreeAdapterMap['textNode'];
export type CommentNode = parse5.DefaultTreeAdapterMap['commentNode'];
export type DocumentFragment = parse5.DefaultTreeAdapterMap['documentFragment'];

/**
 * Parse an HTML fragment, keeping source offsets so markup can be re-emitted verbatim
 */
export function parseFragment(html: string): DocumentFragment {
  return parse5.parseFragment(html, { sourceCodeLocationInfo: true });
}

/**
 * Type guard for Element nodes
 */
export function isElement(node: Node): node is Element {
  return 'tagName' in node;
}

/**
 * Type guard for TextNode
 */
export function isTextNode(node: Node): node is TextNode {
  return node.nodeName === '#text';
}

/**
 * Type guard for CommentNode
 */
export function isCommentNode(node: Node): node is CommentNode {
  return node.nodeName === '#comment';
}

/**
 * Get an attribute value from an element
 */
export function getAttribute(element: Element, name: string): string | null {
  const attr = element.attrs.find((a) => a.name === name);
  return attr ? attr.value : null;
}

export function childElements(element: Element): Element[] {
  return element.childNodes.filter(isElement);
}

/**
 * Source markup of a node, sliced from the original input.
 * Falls back to re-serialization when parse5 recorded no offsets.
 */
export function sourceOf(node: ChildNode, source: string): string {
  const location = node.sourceCodeLocation;
  if (location && location.endOffset > location.startOffset) {
    return source.slice(location.startOffset, location.endOffset);
  }

  return parse5.serializeOuter(node);
}

/**
 * Source markup of an element's start tag
 */
export function startTagOf(element: Element, source: string): string {
  const startTag = element.sourceCodeLocation?.startTag;
  if (startTag) {
    return source.slice(startTag.startOffset, startTag.endOffset);
  }

  const attrs = element.attrs.map((attr) => ` ${attr.name}="${escapeAttr(attr.value)}"`);
  return `<${element.tagName}${attrs.join('')}>`;
}

/**
 * Plain text of a node: whitespace collapsed, `<br>` kept as a newline
 */
export function extractText(node: Node): string {
  return extractTextFromNodes([node]);
}

export function extractTextFromNodes(nodes: Node[]): string {
  const pieces: string[] = [];
  for (const node of nodes) {
    collectText(node, pieces);
  }

  return pieces
    .join('')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .trim();
}

function collectText(node: Node, pieces: string[]): void {
  if (isTextNode(node)) {
    pieces.push(node.value.replace(/\s+/g, ' '));
    return;
  }

  if (isElement(node) && node.tagName === 'br') {
    pieces.push('\n');
    return;
  }

  if ('childNodes' in node) {
    for (const child of node.childNodes) {
      collectText(child, pieces);
    }
  }
}

/**
 * Raw text of a node with whitespace untouched (preformatted content)
 */
export function extractRawText(node: Node): string {
  if (isTextNode(node)) {
    return node.value;
  }

  if ('childNodes' in node) {
    return node.childNodes.map((child) => extractRawText(child)).join('');
  }

  return '';
}

/**
 * Count `<img>` elements in a subtree, the node itself included
 */
export function countImages(node: Node): number {
  if (!isElement(node)) {
    return 0;
  }

  if (node.tagName === 'img') {
    return 1;
  }

  return node.childNodes.reduce((sum, child) => sum + countImages(child), 0);
}

function escapeAttr(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}
