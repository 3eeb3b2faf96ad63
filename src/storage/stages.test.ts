import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { StageFileFormatError } from '../pipeline/errors.js';
import { readStageFile, renderStageRecord, writeStageFile } from './stages.js';

describe('stages storage', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stages-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const record = {
    command: './train.sh --epochs 3',
    dependencies: [{ path: 'data/train.csv', md5: '0cc175b9c0f1b6a831c399e269772661' }],
    outputs: [{ path: 'model.bin', md5: '92eb5ffee6ae2fec3ad71c777531578f', cache: true }],
    'aggregate-fingerprint': '4a8a08f09d37b73795649038408b5f33',
  };

  it('renders plain scalars without quoting', () => {
    expect(renderStageRecord({ command: 'echo hi' })).toBe('command: echo hi\n');
  });

  it('round-trips a stage record', async () => {
    const filePath = path.join(tempDir, 'model.bin.repro');

    await writeStageFile(filePath, record);

    expect(await readStageFile(filePath)).toEqual(record);
  });

  it('keeps key order as written', async () => {
    const filePath = path.join(tempDir, 'model.bin.repro');
    await writeStageFile(filePath, record);

    const content = await fs.readFile(filePath, 'utf-8');
    const topLevelKeys = content
      .split('\n')
      .filter((line) => /^[a-z-]+:/.test(line))
      .map((line) => line.slice(0, line.indexOf(':')));
    expect(topLevelKeys).toEqual(['command', 'dependencies', 'outputs', 'aggregate-fingerprint']);
  });

  it('reads an empty file as an empty record', async () => {
    const filePath = path.join(tempDir, 'Reprofile');
    await fs.writeFile(filePath, '');

    expect(await readStageFile(filePath)).toEqual({});
  });

  it('reports YAML syntax errors as format errors', async () => {
    const filePath = path.join(tempDir, 'broken.repro');
    await fs.writeFile(filePath, 'command: [unclosed\n');

    const error = await readStageFile(filePath).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StageFileFormatError);
    expect(error).toMatchObject({ filePath });
  });

  it('propagates a missing file', async () => {
    await expect(readStageFile(path.join(tempDir, 'missing.repro'))).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});
