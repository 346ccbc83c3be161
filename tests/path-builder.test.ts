import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ancestorsOf, ensureParentDirs } from '../src/path-builder.js';
import { exists, makeTempDir, muteConsole } from './helpers.js';

describe('ancestorsOf', () => {
  it('lists parent directories outermost first without the root', () => {
    expect(ancestorsOf('/srv/data/file.txt')).toEqual(['/srv', '/srv/data']);
  });

  it('returns nothing for a file directly under the root', () => {
    expect(ancestorsOf('/file.txt')).toEqual([]);
  });
});

describe('ensureParentDirs', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    muteConsole();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates every missing ancestor', async () => {
    const result = await ensureParentDirs(path.join(tmpDir, 'x', 'y', 'file.txt'));

    expect(result.created).toEqual([path.join(tmpDir, 'x'), path.join(tmpDir, 'x', 'y')]);
    expect(result.warnings).toEqual([]);
    expect((await fs.stat(path.join(tmpDir, 'x', 'y'))).isDirectory()).toBe(true);
    expect(await exists(path.join(tmpDir, 'x', 'y', 'file.txt'))).toBe(false);
  });

  it('accepts directories that already exist', async () => {
    await ensureParentDirs(path.join(tmpDir, 'x', 'file.txt'));
    const result = await ensureParentDirs(path.join(tmpDir, 'x', 'file.txt'));

    expect(result).toEqual({ created: [], warnings: [] });
  });

  it('turns a failed directory into a warning instead of an error', async () => {
    await fs.writeFile(path.join(tmpDir, 'blocker'), 'not a directory');

    const result = await ensureParentDirs(path.join(tmpDir, 'blocker', 'sub', 'file.txt'));

    expect(result.created).toEqual([]);
    expect(result.warnings).toEqual([
      { kind: 'mkdir-failed', path: path.join(tmpDir, 'blocker', 'sub'), message: expect.stringContaining('ENOTDIR') }
    ]);
  });
});
