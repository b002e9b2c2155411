// src/test/unit/fileSystem.test.ts

import * as fs from 'fs';
import * as path from 'path';
import { ApplyError } from '../../errors';
import {
  checkFileModification,
  pathExists,
  readSnapshot,
  withModificationCheck,
  writeFileAtomic,
} from '../../fileSystem';
import { createTempDir, readText, removeTempDir, writeTree } from '../setup/test-utils';

describe('File System Operations', () => {
  let root: string;
  let file: string;

  beforeEach(() => {
    root = createTempDir();
    writeTree(root, { 'a.txt': 'one\n' });
    file = path.join(root, 'a.txt');
    fs.utimesSync(file, new Date(2024, 0, 1), new Date(2024, 0, 1));
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe('checkFileModification', () => {
    it('should proceed when the file is unchanged', async () => {
      const { mtimeMs } = await readSnapshot(file);
      const result = await checkFileModification(file, mtimeMs, { mtimeCheck: true });

      expect(result).toMatchObject({ modified: false, proceed: true });
    });

    it('should stop when the file changed since it was read', async () => {
      const { mtimeMs } = await readSnapshot(file);
      fs.utimesSync(file, new Date(2024, 0, 2), new Date(2024, 0, 2));

      const result = await checkFileModification(file, mtimeMs, { mtimeCheck: true });
      expect(result).toMatchObject({ modified: true, proceed: false });
    });

    it('should skip the check when disabled', async () => {
      const result = await checkFileModification(file, 0, { mtimeCheck: false });
      expect(result).toEqual({ modified: false, proceed: true, originalMtimeMs: 0 });
    });

    it('should not proceed when the file disappeared', async () => {
      const { mtimeMs } = await readSnapshot(file);
      fs.rmSync(file);

      const result = await checkFileModification(file, mtimeMs, { mtimeCheck: true });
      expect(result.proceed).toBe(false);
    });
  });

  describe('withModificationCheck', () => {
    it('should run the write when nothing changed', async () => {
      const { mtimeMs } = await readSnapshot(file);
      await withModificationCheck(file, mtimeMs, () => writeFileAtomic(file, 'two\n'), { mtimeCheck: true });

      expect(readText(root, 'a.txt')).toBe('two\n');
    });

    it('should refuse to overwrite a concurrent edit', async () => {
      const { mtimeMs } = await readSnapshot(file);
      fs.utimesSync(file, new Date(2024, 0, 2), new Date(2024, 0, 2));
      const write = jest.fn(async () => undefined);

      await expect(withModificationCheck(file, mtimeMs, write, { mtimeCheck: true })).rejects.toThrow(
        `File ${file} has been modified since it was read`,
      );
      expect(write).not.toHaveBeenCalled();
    });

    it('should wrap write failures as ApplyError', async () => {
      const failing = withModificationCheck(file, undefined, async () => {
        throw new Error('disk full');
      }, { mtimeCheck: true });

      await expect(failing).rejects.toBeInstanceOf(ApplyError);
      await expect(failing).rejects.toThrow(`Failed to write ${file}: disk full`);
    });
  });

  describe('writeFileAtomic', () => {
    it('should create parent directories and leave no temporary files', async () => {
      const target = path.join(root, 'deep', 'dir', 'b.txt');
      await writeFileAtomic(target, Buffer.from('bytes'));

      expect(fs.readFileSync(target, 'utf8')).toBe('bytes');
      expect(fs.readdirSync(path.dirname(target))).toEqual(['b.txt']);
    });
  });

  describe('pathExists', () => {
    it('should report existing and missing paths', async () => {
      await expect(pathExists(file)).resolves.toBe(true);
      await expect(pathExists(path.join(root, 'missing.txt'))).resolves.toBe(false);
    });
  });
});
