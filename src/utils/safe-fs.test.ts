import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import {
  PathValidationError,
  validatePath,
  resolveWithin,
  safeReadFile,
  safeWriteFile,
  safeMkdir,
  safeExists,
  safeRename,
  safeRemove,
} from './safe-fs.js';

describe('safe-fs', () => {
  describe('validatePath', () => {
    it('resolves relative paths to absolute ones', () => {
      expect(validatePath('output/game')).toBe(resolve('output/game'));
    });

    it('rejects empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('rejects null bytes', () => {
      expect(() => validatePath('out\0put')).toThrow('Path cannot contain null bytes');
    });
  });

  describe('resolveWithin', () => {
    it('joins a child inside the root', () => {
      expect(resolveWithin('/srv/output', 'space-blaster')).toBe('/srv/output/space-blaster');
    });

    it('rejects a child that climbs out of the root', () => {
      expect(() => resolveWithin('/srv/output', '../etc')).toThrow(PathValidationError);
    });
  });

  describe('file operations', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'safe-fs-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes and reads back text', async () => {
      const nested = join(dir, 'a', 'b');
      await safeMkdir(nested);
      const file = join(nested, 'index.html');

      await safeWriteFile(file, '<!DOCTYPE html>');

      expect(await safeReadFile(file)).toBe('<!DOCTYPE html>');
      expect(await safeExists(file)).toBe(true);
    });

    it('reports missing files as absent', async () => {
      expect(await safeExists(join(dir, 'missing.txt'))).toBe(false);
    });

    it('renames a file over its destination', async () => {
      const from = join(dir, '.game.js.tmp');
      const to = join(dir, 'game.js');
      await safeWriteFile(to, 'old');
      await safeWriteFile(from, 'new');

      await safeRename(from, to);

      expect(await safeReadFile(to)).toBe('new');
      expect(await safeExists(from)).toBe(false);
    });

    it('removes files and ignores missing ones', async () => {
      const file = join(dir, 'scratch.txt');
      await safeWriteFile(file, 'x');

      await safeRemove(file);
      await safeRemove(file);

      expect(await safeExists(file)).toBe(false);
    });
  });
});
