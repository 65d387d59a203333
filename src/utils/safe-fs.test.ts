import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { mkdtemp, rm, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  validatePath,
  safeReadFile,
  safeWriteFile,
  safeExists,
  safeMkdir,
  safeReaddir,
  safeUnlink,
  writeFileAtomic,
  isNotFoundError,
  PathValidationError,
} from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'throughline-safe-fs-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('returns absolute paths unchanged', () => {
      expect(validatePath('/tmp/state.json')).toBe('/tmp/state.json');
    });

    it('resolves relative paths', () => {
      expect(path.isAbsolute(validatePath('./state.json'))).toBe(true);
    });

    it('rejects empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('rejects null bytes', () => {
      expect(() => validatePath('/tmp/a\0b')).toThrow('null bytes');
    });

    it('normalizes dot segments', () => {
      fc.assert(
        fc.property(fc.stringMatching(/^[a-z]{1,8}$/), (segment) => {
          expect(validatePath(`/tmp/${segment}/../${segment}`)).toBe(`/tmp/${segment}`);
        })
      );
    });
  });

  it('round-trips text files', async () => {
    const file = join(tempDir, 'note.txt');
    await safeWriteFile(file, 'hello');
    expect(await safeReadFile(file)).toBe('hello');
    expect(await safeExists(file)).toBe(true);
    await safeUnlink(file);
    expect(await safeExists(file)).toBe(false);
  });

  it('creates nested directories', async () => {
    const nested = join(tempDir, 'a', 'b');
    await safeMkdir(nested);
    expect(await safeReaddir(join(tempDir, 'a'))).toEqual(['b']);
  });

  describe('writeFileAtomic', () => {
    it('creates the parent directory and leaves no temp files', async () => {
      const file = join(tempDir, 'nested', 'state.json');
      await writeFileAtomic(file, '{"ok":true}');

      expect(await safeReadFile(file)).toBe('{"ok":true}');
      expect(await readdir(join(tempDir, 'nested'))).toEqual(['state.json']);
    });

    it('replaces existing content', async () => {
      const file = join(tempDir, 'state.json');
      await writeFileAtomic(file, 'first');
      await writeFileAtomic(file, 'second');
      expect(await safeReadFile(file)).toBe('second');
    });
  });

  it('recognizes ENOENT errors', async () => {
    const error: unknown = await safeReadFile(join(tempDir, 'missing.txt')).catch(
      (e: unknown) => e
    );
    expect(isNotFoundError(error)).toBe(true);
    expect(isNotFoundError(new Error('other'))).toBe(false);
  });
});
