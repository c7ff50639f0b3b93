#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { DEFAULT_CALIBRATION, loadCalibration } from './calibration.js';
import { normalizePageBreakMarkers } from './html/markers.js';
import { Paginator } from './layout/paginator.js';
import { getContentBox, isPageSizeName, presets } from './page-sizes/presets.js';
import type { HeightCalibration, PageReport } from './types.js';
import { logValidationResult, validatePagination } from './validation.js';

export { BlockClassifier, nodeKindOf, type NodeKind } from './classify/classifier.js';
export { estimateLines, measureTextWidth } from './classify/heights.js';
export {
  DEFAULT_CALIBRATION,
  describeCalibrationErrors,
  loadCalibration,
  resolveCalibration,
  type CalibrationOverrides,
} from './calibration.js';
export {
  PAGE_BREAK_MARKER_HTML,
  normalizePageBreakMarkers,
  pageBreakMarkersToComments,
  stripPageBreakMarkers,
} from './html/markers.js';
export { optimizePages } from './layout/optimize.js';
export { partitionBlocks } from './layout/partition.js';
export { Paginator } from './layout/paginator.js';
export { defaultPreset, getContentBox, getPreset, presets, resolvePageConfig } from './page-sizes/presets.js';
export type {
  Block,
  BlockKind,
  BlockType,
  HeightCalibration,
  Page,
  PageConfig,
  PageInfo,
  PageReport,
  PageSizeName,
  PageSizePreset,
  PaginationResult,
  RawPage,
  ValidationResult,
} from './types.js';
export { formatValidationResult, logValidationResult, validatePagination } from './validation.js';

interface PaginateCommandOptions {
  input: string;
  output?: string;
  size?: string;
  calibration?: string;
}

interface InspectCommandOptions {
  input: string;
  size?: string;
  calibration?: string;
}

export const program = new Command();

program
  .name('card-paginate')
  .description('Split rendered Markdown HTML into fixed-size card pages')
  .version('0.1.0');

program
  .command('paginate')
  .description('Paginate an HTML document and write one fragment per page')
  .requiredOption('-i, --input <path>', 'Input HTML file path')
  .option('-o, --output <path>', 'Output directory (default: <input>.pages)')
  .option('-s, --size <name>', `Page size (${Object.keys(presets).join(', ')})`, 'medium')
  .option('--calibration <path>', 'JSON file overriding height calibration constants')
  .action(async (options: PaginateCommandOptions) => {
    try {
      const calibration = await resolveCalibrationOption(options.calibration);
      await paginateFile(resolve(options.input), options.output, options.size, calibration);
    } catch (err) {
      console.error('Pagination failed:', err);
      process.exit(1);
    }
  });

program
  .command('inspect')
  .description('Print the estimated layout of every page')
  .requiredOption('-i, --input <path>', 'Input HTML file path')
  .option('-s, --size <name>', `Page size (${Object.keys(presets).join(', ')})`, 'medium')
  .option('--calibration <path>', 'JSON file overriding height calibration constants')
  .action(async (options: InspectCommandOptions) => {
    try {
      const calibration = await resolveCalibrationOption(options.calibration);
      await inspectFile(resolve(options.input), options.size, calibration);
    } catch (err) {
      console.error('Inspection failed:', err);
      process.exit(1);
    }
  });

program
  .command('sizes')
  .description('List available page sizes')
  .action(() => {
    for (const preset of Object.values(presets)) {
      const box = getContentBox(preset);
      console.log(
        `${preset.name.padEnd(8)} ${preset.width}×${preset.height}px, ` +
          `content ${box.width}×${box.height}px`,
      );
    }
  });

/**
 * True when `moduleUrl` is the script node was asked to run.
 * Resolves symlinks so npm `bin` wrappers are recognised.
 */
export function isCliEntrypoint(argv: string[], moduleUrl: string): boolean {
  const entrypointArg = argv[1];
  if (!entrypointArg) {
    return false;
  }

  try {
    return realpathSync(entrypointArg) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

if (isCliEntrypoint(process.argv, import.meta.url)) {
  await program.parseAsync();
}

async function resolveCalibrationOption(path?: string): Promise<HeightCalibration> {
  if (!path) {
    return DEFAULT_CALIBRATION;
  }

  return loadCalibration(resolve(path));
}

function createPaginator(size: string | undefined, calibration: HeightCalibration): Paginator {
  if (size && !isPageSizeName(size.trim().toLowerCase())) {
    console.warn(`  Warning: Unknown page size "${size}", using medium`);
  }

  return new Paginator(size, calibration);
}

async function readDocument(inputPath: string): Promise<string> {
  const html = await readFile(inputPath, 'utf-8');
  return normalizePageBreakMarkers(html);
}

/**
 * Default output directory: the input path with its extension swapped for `.pages`
 */
export function defaultOutputDir(inputPath: string): string {
  return join(dirname(inputPath), `${basename(inputPath, extname(inputPath))}.pages`);
}

export function pageFileName(index: number): string {
  return `page-${String(index + 1).padStart(3, '0')}.html`;
}

export async function paginateFile(
  inputPath: string,
  outputPath: string | undefined,
  size: string | undefined,
  calibration: HeightCalibration,
): Promise<void> {
  const outputDir = outputPath ? resolve(outputPath) : defaultOutputDir(inputPath);
  const paginator = createPaginator(size, calibration);
  const info = paginator.getPageInfo();

  console.log(`Paginating ${inputPath}`);
  console.log(`  Page size: ${info.sizeName} (content ${info.contentWidth}×${info.contentHeight}px)`);

  const html = await readDocument(inputPath);
  const blocks = paginator.classify(html);
  const result = paginator.paginateDetailed(html);

  for (const warning of result.warnings) {
    console.warn(`  Warning: ${warning}`);
  }

  console.log('Validating output...');
  const validation = validatePagination(blocks, result);
  logValidationResult(validation);

  if (!validation.valid) {
    throw new Error('Pagination output failed validation');
  }

  await mkdir(outputDir, { recursive: true });

  const fragments = result.pages.map((page) => page.html);
  for (const [index, fragment] of fragments.entries()) {
    await writeFile(join(outputDir, pageFileName(index)), fragment, 'utf-8');
  }
  await writeFile(join(outputDir, 'pages.json'), `${JSON.stringify(fragments, null, 2)}\n`, 'utf-8');

  console.log(`Wrote ${fragments.length} page${fragments.length === 1 ? '' : 's'} to ${outputDir}`);
}

export async function inspectFile(
  inputPath: string,
  size: string | undefined,
  calibration: HeightCalibration,
): Promise<void> {
  const paginator = createPaginator(size, calibration);
  const html = await readDocument(inputPath);
  const reports = paginator.debugPagination(html);

  console.log('Pagination report');
  console.log('=================');
  console.log(`Path: ${inputPath}`);
  console.log(`Pages: ${reports.length}`);

  for (const report of reports) {
    console.log('');
    console.log(formatReportHeader(report));
    for (const block of report.blocks) {
      console.log(`  ${block.kind.padEnd(22)} ${String(block.heightPx).padStart(5)}px  ${block.textPreview}`);
    }
  }
}

export function formatReportHeader(report: PageReport): string {
  const forced = report.forced ? ', forced' : '';
  return (
    `Page ${report.pageNumber}: ${report.blockCount} block${report.blockCount === 1 ? '' : 's'}, ` +
    `${report.totalHeightPx}/${report.maxHeightPx}px (${report.fillRate}${forced})`
  );
}
