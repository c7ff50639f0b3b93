import type { Block, BlockKind, RawPage } from '../../src/types.js';

export function paragraph(heightPx: number, html = `<p>${heightPx}</p>`): Block {
  return block({ type: 'paragraph' }, heightPx, html);
}

export function heading(heightPx: number, html = `<h2>${heightPx}</h2>`): Block {
  return block({ type: 'heading', level: 2 }, heightPx, html);
}

export function image(heightPx: number, html = '<img src="x.png">'): Block {
  return block({ type: 'image' }, heightPx, html);
}

export function pageBreak(): Block {
  return block({ type: 'page-break' }, 0, '');
}

export function block(kind: BlockKind, heightPx: number, html: string): Block {
  return { kind, html, text: html.replace(/<[^>]*>/g, ''), estimatedHeightPx: heightPx, splittable: false };
}

export function rawPage(blocks: Block[], forced = false): RawPage {
  return { blocks, forced };
}

export function heights(pages: RawPage[]): number[][] {
  return pages.map((page) => page.blocks.map((b) => b.estimatedHeightPx));
}
