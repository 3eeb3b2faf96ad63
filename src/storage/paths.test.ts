/**
 * Path Resolution Utilities Tests
 *
 * @module storage/paths.test
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  STAGE_FILE,
  defaultStageFileName,
  findStageFiles,
  getDefaultCacheDir,
  getProjectConfigPath,
  getReproDir,
  isStageFile,
  isStageFileName,
} from './paths.js';

describe('paths', () => {
  describe('project layout', () => {
    it('places private files under .repro', () => {
      expect(getReproDir('/work/project')).toBe('/work/project/.repro');
      expect(getDefaultCacheDir('/work/project')).toBe('/work/project/.repro/cache');
      expect(getProjectConfigPath('/work/project')).toBe('/work/project/.repro/config.json');
    });
  });

  describe('isStageFileName', () => {
    it('accepts Reprofile and .repro files', () => {
      expect(isStageFileName('Reprofile')).toBe(true);
      expect(isStageFileName('sub/Reprofile')).toBe(true);
      expect(isStageFileName('model.bin.repro')).toBe(true);
    });

    it('rejects other names', () => {
      expect(isStageFileName('.repro')).toBe(false);
      expect(isStageFileName('model.bin')).toBe(false);
      expect(isStageFileName('Reprofile.bak')).toBe(false);
    });
  });

  describe('defaultStageFileName', () => {
    it('names the stage after the first output basename', () => {
      expect(defaultStageFileName(['data/model.bin', 'metrics.json'])).toBe('model.bin.repro');
    });

    it('ignores a trailing slash on directory outputs', () => {
      expect(defaultStageFileName(['data/features/'])).toBe('features.repro');
    });

    it('uses the URL basename for remote outputs', () => {
      expect(defaultStageFileName(['s3://bucket/out/result.csv'])).toBe('result.csv.repro');
    });

    it('falls back to Reprofile without outputs', () => {
      expect(defaultStageFileName([])).toBe(STAGE_FILE);
    });
  });

  describe('on disk', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'paths-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('isStageFile requires a regular file', async () => {
      await fs.mkdir(path.join(tempDir, 'dir.repro'));
      await fs.writeFile(path.join(tempDir, 'a.repro'), '');

      expect(await isStageFile(path.join(tempDir, 'a.repro'))).toBe(true);
      expect(await isStageFile(path.join(tempDir, 'dir.repro'))).toBe(false);
      expect(await isStageFile(path.join(tempDir, 'missing.repro'))).toBe(false);
    });

    it('findStageFiles walks the tree, skipping private directories', async () => {
      await fs.mkdir(path.join(tempDir, 'sub'), { recursive: true });
      await fs.mkdir(path.join(tempDir, '.repro', 'cache'), { recursive: true });
      await fs.mkdir(path.join(tempDir, 'node_modules', 'pkg'), { recursive: true });
      await fs.writeFile(path.join(tempDir, 'Reprofile'), '');
      await fs.writeFile(path.join(tempDir, 'b.repro'), '');
      await fs.writeFile(path.join(tempDir, 'sub', 'a.repro'), '');
      await fs.writeFile(path.join(tempDir, 'notes.txt'), '');
      await fs.writeFile(path.join(tempDir, '.repro', 'cache', 'x.repro'), '');
      await fs.writeFile(path.join(tempDir, 'node_modules', 'pkg', 'y.repro'), '');

      expect(await findStageFiles(tempDir)).toEqual([
        path.join(tempDir, 'Reprofile'),
        path.join(tempDir, 'b.repro'),
        path.join(tempDir, 'sub', 'a.repro'),
      ]);
    });
  });
});
