import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import {
  PathValidationError,
  isMissingEntryError,
  safeReadTextFile,
  safeRealpath,
  safeStat,
  validatePath,
} from './safe-fs.js';
import { mkdtemp, realpath, rm, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await realpath(await mkdtemp(join(tmpdir(), 'safe-fs-test-')));
    await writeFile(join(tempDir, 'lazymc.toml'), '[server]\ncommand = "run.sh"\n');
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should resolve relative paths to absolute', () => {
      expect(validatePath('lazymc.toml')).toBe(path.resolve('lazymc.toml'));
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('should reject paths with null bytes', () => {
      expect(() => validatePath('lazymc\0.toml')).toThrow('Path cannot contain null bytes');
    });

    it('should accept non-empty strings without null bytes', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
          (s) => path.isAbsolute(validatePath(s))
        )
      );
    });
  });

  describe('safeReadTextFile', () => {
    it('should read a UTF-8 file', async () => {
      expect(await safeReadTextFile(join(tempDir, 'lazymc.toml'))).toBe('[server]\ncommand = "run.sh"\n');
    });

    it('should reject missing files', async () => {
      await expect(safeReadTextFile(join(tempDir, 'missing.toml'))).rejects.toMatchObject({
        code: 'ENOENT',
      });
    });

    it('should throw validation error for empty path', async () => {
      await expect(safeReadTextFile('')).rejects.toThrow(PathValidationError);
    });
  });

  describe('safeStat', () => {
    it('should stat existing entries', async () => {
      expect((await safeStat(join(tempDir, 'lazymc.toml')))?.isFile()).toBe(true);
      expect((await safeStat(tempDir))?.isDirectory()).toBe(true);
    });

    it('should return undefined for missing entries', async () => {
      expect(await safeStat(join(tempDir, 'missing.toml'))).toBeUndefined();
      expect(await safeStat(join(tempDir, 'lazymc.toml', 'nested'))).toBeUndefined();
    });
  });

  describe('safeRealpath', () => {
    it('should follow symlinks', async () => {
      const link = join(tempDir, 'link.toml');
      await symlink(join(tempDir, 'lazymc.toml'), link);

      expect(await safeRealpath(link)).toBe(join(tempDir, 'lazymc.toml'));
    });

    it('should return the resolved path for missing entries', async () => {
      expect(await safeRealpath(join(tempDir, 'missing.toml'))).toBe(join(tempDir, 'missing.toml'));
    });
  });

  describe('isMissingEntryError', () => {
    it('should recognize ENOENT and ENOTDIR', () => {
      expect(isMissingEntryError(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe(true);
      expect(isMissingEntryError(Object.assign(new Error('x'), { code: 'ENOTDIR' }))).toBe(true);
      expect(isMissingEntryError(Object.assign(new Error('x'), { code: 'EACCES' }))).toBe(false);
      expect(isMissingEntryError('ENOENT')).toBe(false);
    });
  });
});
