import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CALIBRATION,
  describeCalibrationErrors,
  loadCalibration,
  resolveCalibration,
} from '../src/calibration.js';
import { Paginator } from '../src/layout/paginator.js';

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'card-paginator-calibration-'));

  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe('height calibration', () => {
  it('merges overrides over the defaults', () => {
    const calibration = resolveCalibration({ image: 200, headingHeights: [1, 2, 3, 4, 5, 6] });

    expect(calibration).toEqual({
      ...DEFAULT_CALIBRATION,
      image: 200,
      headingHeights: [1, 2, 3, 4, 5, 6],
    });
    expect(DEFAULT_CALIBRATION.image).toBe(350);
  });

  it('accepts an empty override object', () => {
    expect(describeCalibrationErrors({})).toEqual([]);
    expect(resolveCalibration({})).toEqual(DEFAULT_CALIBRATION);
  });

  it('rejects negative values, unknown keys and short heading lists', () => {
    expect(describeCalibrationErrors({ image: -1 })).not.toEqual([]);
    expect(describeCalibrationErrors({ imageHeight: 300 })).not.toEqual([]);
    expect(describeCalibrationErrors({ headingHeights: [90, 70] })).not.toEqual([]);
    expect(describeCalibrationErrors({ narrowCharWidth: 0 })).not.toEqual([]);
  });

  it('feeds overrides into height estimates', () => {
    const paginator = new Paginator('medium', resolveCalibration({ image: 100 }));

    expect(paginator.classify('<p><img src="a.png"></p>')[0]?.estimatedHeightPx).toBe(120);
  });

  it('loads overrides from a JSON file', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'calibration.json');
      await writeFile(path, JSON.stringify({ paragraphLine: 30, marginBottom: 16 }), 'utf-8');

      const calibration = await loadCalibration(path);

      expect(calibration.paragraphLine).toBe(30);
      expect(calibration.marginBottom).toBe(16);
      expect(calibration.codeLine).toBe(DEFAULT_CALIBRATION.codeLine);
    });
  });

  it('rejects files that fail the schema', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'calibration.json');
      await writeFile(path, JSON.stringify({ image: 'big' }), 'utf-8');

      await expect(loadCalibration(path)).rejects.toThrow(/^Invalid calibration file .*\n {2}\/image: /);
    });
  });

  it('rejects files that are not JSON', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'calibration.json');
      await writeFile(path, '{ image: 200', 'utf-8');

      await expect(loadCalibration(path)).rejects.toThrow(/is not valid JSON/);
    });
  });
});
