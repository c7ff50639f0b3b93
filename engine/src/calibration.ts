import { readFile } from 'node:fs/promises';
import { type Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { HeightCalibration } from './types.js';

/**
 * Default height constants, calibrated against the card renderer's stylesheet
 */
export const DEFAULT_CALIBRATION: HeightCalibration = {
  headingHeights: [90, 70, 60, 50, 45, 40],
  paragraphBase: 25,
  paragraphLine: 28, // line-height 1.8
  listItem: 35,
  codeBase: 40,
  codeLine: 24,
  blockquoteBase: 60,
  blockquoteLine: 28,
  blockquoteIndent: 100,
  tableHeaderRow: 45,
  tableBodyRow: 40,
  horizontalRule: 35,
  image: 350,
  marginBottom: 20,
  wideCharWidth: 16,
  narrowCharWidth: 9,
};

const Px = Type.Number({ minimum: 0 });

export const CalibrationOverridesSchema = Type.Partial(
  Type.Object(
    {
      headingHeights: Type.Array(Px, { minItems: 6, maxItems: 6 }),
      paragraphBase: Px,
      paragraphLine: Px,
      listItem: Px,
      codeBase: Px,
      codeLine: Px,
      blockquoteBase: Px,
      blockquoteLine: Px,
      blockquoteIndent: Px,
      tableHeaderRow: Px,
      tableBodyRow: Px,
      horizontalRule: Px,
      image: Px,
      marginBottom: Px,
      wideCharWidth: Type.Number({ exclusiveMinimum: 0 }),
      narrowCharWidth: Type.Number({ exclusiveMinimum: 0 }),
    },
    { additionalProperties: false },
  ),
  { additionalProperties: false },
);

export type CalibrationOverrides = Static<typeof CalibrationOverridesSchema>;

/**
 * Merge overrides over the defaults
 */
export function resolveCalibration(overrides: CalibrationOverrides = {}): HeightCalibration {
  const { headingHeights, ...rest } = overrides;
  const merged: HeightCalibration = { ...DEFAULT_CALIBRATION, ...rest };

  if (headingHeights && headingHeights.length === 6) {
    const [h1, h2, h3, h4, h5, h6] = headingHeights;
    merged.headingHeights = [h1, h2, h3, h4, h5, h6];
  }

  return merged;
}

/**
 * Describe why an untrusted value is not valid calibration overrides.
 * Returns an empty list when it is.
 */
export function describeCalibrationErrors(value: unknown): string[] {
  return [...Value.Errors(CalibrationOverridesSchema, value)].map(
    (error) => `${error.path || '/'}: ${error.message}`,
  );
}

/**
 * Load calibration overrides from a JSON file and merge them over the defaults
 */
export async function loadCalibration(path: string): Promise<HeightCalibration> {
  const content = await readFile(path, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Calibration file ${path} is not valid JSON: ${message}`);
  }

  if (!Value.Check(CalibrationOverridesSchema, parsed)) {
    const errors = describeCalibrationErrors(parsed);
    throw new Error(`Invalid calibration file ${path}:\n  ${errors.join('\n  ')}`);
  }

  return resolveCalibration(parsed);
}
