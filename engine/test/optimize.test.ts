import { describe, expect, it } from 'vitest';
import { optimizePages, pageHtml } from '../src/layout/optimize.js';
import { resolvePageConfig } from '../src/page-sizes/presets.js';
import { heights, paragraph, rawPage } from './helpers/blocks.js';

// Content height 1325px, sparse below 530px
const medium = resolvePageConfig('medium');
// Content height 875px, sparse below 306.25px
const small = resolvePageConfig('small');

describe('page merge optimization', () => {
  it('merges two adjacent sparse pages that fit together', () => {
    const first = rawPage([paragraph(200, '<p>a</p>')]);
    const second = rawPage([paragraph(300, '<p>b</p>'), paragraph(100, '<p>c</p>')]);

    const optimized = optimizePages([first, second], medium);

    expect(optimized).toHaveLength(1);
    expect(pageHtml(optimized[0] ?? rawPage([]))).toBe(pageHtml(first) + pageHtml(second));
    expect(optimized[0]?.forced).toBe(false);
  });

  it('never merges forced pages', () => {
    const pages = [rawPage([paragraph(200)], true), rawPage([paragraph(300)], true)];

    expect(optimizePages(pages, medium)).toEqual(pages);
  });

  it('does not merge a sparse page into a forced successor', () => {
    const pages = [rawPage([paragraph(200)]), rawPage([paragraph(300)], true)];

    expect(optimizePages(pages, medium)).toEqual(pages);
  });

  it('does not merge when the combined height would overflow', () => {
    const pages = [rawPage([paragraph(500)]), rawPage([paragraph(900)])];

    expect(heights(optimizePages(pages, medium))).toEqual([[500], [900]]);
  });

  it('leaves pages at or above the threshold alone', () => {
    const pages = [rawPage([paragraph(600)]), rawPage([paragraph(100)])];

    expect(heights(optimizePages(pages, medium))).toEqual([[600], [100]]);
  });

  it('merges each page at most once', () => {
    const pages = [rawPage([paragraph(100)]), rawPage([paragraph(100)]), rawPage([paragraph(100)])];

    expect(heights(optimizePages(pages, medium))).toEqual([[100, 100], [100]]);
  });

  it('uses a lower threshold for the small preset', () => {
    const pages = [rawPage([paragraph(320)]), rawPage([paragraph(100)])];

    expect(heights(optimizePages(pages, small))).toEqual([[320], [100]]);
    expect(heights(optimizePages(pages, medium))).toEqual([[320, 100]]);
  });

  it('drops blank implicit pages', () => {
    const pages = [rawPage([]), rawPage([paragraph(100)])];

    expect(heights(optimizePages(pages, medium))).toEqual([[100]]);
  });

  it('keeps empty forced pages', () => {
    const pages = [rawPage([paragraph(100)], true), rawPage([], true), rawPage([paragraph(100)])];

    expect(optimizePages(pages, medium)).toEqual(pages);
  });

  it('falls back to the original pages when nothing would survive', () => {
    const pages = [rawPage([])];

    expect(optimizePages(pages, medium)).toBe(pages);
  });
});
