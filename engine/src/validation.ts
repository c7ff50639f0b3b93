/**
 * Runtime validation for pagination output
 */

import type { Block, PaginationResult, ValidationResult } from './types.js';

/**
 * Validate pagination output against the classified blocks and return any issues found
 */
export function validatePagination(blocks: Block[], result: PaginationResult): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { contentHeight } = result.config;
  const contentBlocks = blocks.filter((block) => block.kind.type !== 'page-break');

  // Check 1: Non-empty input produced at least one page
  if (contentBlocks.length > 0 && result.pages.length === 0) {
    errors.push('No pages were generated');
  }

  // Check 2: Every content block appears exactly once, in order
  const expected = contentBlocks.map((block) => block.html).join('');
  const actual = result.pages.map((page) => page.html).join('');
  if (contentBlocks.length > 0 && expected !== actual) {
    const placed = result.pages.reduce((sum, page) => sum + page.blocks.length, 0);
    errors.push(
      `Page content does not match the classified blocks ` +
        `(${placed} placed, ${contentBlocks.length} classified)`,
    );
  }

  result.pages.forEach((page, index) => {
    const pageNumber = index + 1;

    // Check 3: Page fits the content box
    if (page.heightPx > contentHeight) {
      warnings.push(
        `Page ${pageNumber} is estimated at ${page.heightPx}px, ` +
          `beyond the ${contentHeight}px content height`,
      );
    }

    // Check 4: Only explicit breaks may leave a page empty
    if (!page.forced && !page.html.trim()) {
      warnings.push(`Page ${pageNumber} is empty but was not created by a page break`);
    }
  });

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Console lines for a validation result, errors first
 */
export function formatValidationResult(result: ValidationResult): string[] {
  const lines = [
    ...result.errors.map((error) => `  Error: ${error}`),
    ...result.warnings.map((warning) => `  Warning: ${warning}`),
  ];

  return lines.length > 0 ? lines : ['  All checks passed'];
}

export function logValidationResult(result: ValidationResult): void {
  for (const line of formatValidationResult(result)) {
    console.log(line);
  }
}
