import { describe, expect, it } from 'vitest';
import {
  PAGE_BREAK_MARKER_HTML,
  normalizePageBreakMarkers,
  pageBreakMarkersToComments,
  stripPageBreakMarkers,
} from '../src/html/markers.js';

describe('page-break markers', () => {
  it('defines the marker element emitted for explicit breaks', () => {
    expect(PAGE_BREAK_MARKER_HTML).toBe(
      '<div class="pagebreak-marker" data-pagebreak="true"></div>',
    );
  });

  it('normalizes pagebreak comments regardless of case and spacing', () => {
    const html = '<p>A</p>\n<!--  PAGEBREAK  -->\n<p>B</p><!--page-break--><p>C</p>';

    expect(normalizePageBreakMarkers(html)).toBe(
      `<p>A</p>\n${PAGE_BREAK_MARKER_HTML}\n<p>B</p>${PAGE_BREAK_MARKER_HTML}<p>C</p>`,
    );
  });

  it('leaves other comments alone', () => {
    const html = '<!-- more --><p>A</p>';

    expect(normalizePageBreakMarkers(html)).toBe(html);
  });

  it('strips both marker forms', () => {
    const html =
      `<p>A</p>${PAGE_BREAK_MARKER_HTML}<!-- pagebreak -->` +
      '<div data-pagebreak="true" class="pagebreak-marker"></div><p>B</p>';

    expect(stripPageBreakMarkers(html)).toBe('<p>A</p><p>B</p>');
  });

  it('strips markers recognized by the data attribute alone', () => {
    expect(stripPageBreakMarkers('<div data-pagebreak="true"></div>')).toBe('');
    expect(stripPageBreakMarkers('<p>A</p><DIV DATA-PAGEBREAK></DIV><p>B</p>')).toBe('<p>A</p><p>B</p>');
    expect(stripPageBreakMarkers('<div data-pagebreak="false"></div>')).toBe(
      '<div data-pagebreak="false"></div>',
    );
  });

  it('rewrites marker elements as comments and leaves everything else byte for byte', () => {
    const html = `<p class='a'>x${PAGE_BREAK_MARKER_HTML}y</p>\n<div class="pagebreak-marker x"></div><br/>`;

    expect(pageBreakMarkersToComments(html)).toBe(
      "<p class='a'>x<!--pagebreak-->y</p>\n<!--pagebreak--><br/>",
    );
  });

  it('returns input without markers untouched', () => {
    const html = '<section><p>A</p></section>';

    expect(pageBreakMarkersToComments(html)).toBe(html);
  });
});
