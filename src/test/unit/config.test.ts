/* --------------------------------------------------------------------------
 *  PatchDrift — Unit tests for configuration loading
 * ----------------------------------------------------------------------- */

import * as path from 'path';
import {
  DEFAULT_CONFIG,
  effectiveExcludes,
  isErrnoException,
  loadConfiguration,
  resolveBackupBase,
  resolveConfiguration,
} from '../../config';
import { ConfigurationError } from '../../errors';
import { createTempDir, removeTempDir, writeTree } from '../setup/test-utils';

describe('Configuration', () => {
  describe('resolveConfiguration', () => {
    it('should fill in defaults', () => {
      expect(DEFAULT_CONFIG).toMatchObject({
        threshold: 0.85,
        tieMargin: 0.05,
        lowConfidenceBand: 0.1,
        tieBreak: 'anchors',
        autoAccept: true,
        interactive: false,
        decisionOrder: ['auto', 'suggestion', 'interactive'],
        partialApply: true,
        dryRun: false,
        retention: { keepRecent: 1 },
      });
    });

    it('should list every invalid field', () => {
      expect(() => resolveConfiguration({ threshold: 2, searchRadius: -1 })).toThrow(ConfigurationError);
      expect(() => resolveConfiguration({ threshold: 2, searchRadius: -1 })).toThrow(
        /^Invalid configuration: threshold: .+; searchRadius: .+$/,
      );
    });

    it('should reject unknown enum values from a file', async () => {
      const root = createTempDir();
      try {
        writeTree(root, { '.patchdrift.json': JSON.stringify({ tieBreak: 'random' }) });
        await expect(loadConfiguration(root)).rejects.toThrow(/^Invalid configuration: tieBreak: /);
      } finally {
        removeTempDir(root);
      }
    });
  });

  describe('loadConfiguration', () => {
    let root: string;

    beforeEach(() => {
      root = createTempDir();
    });

    afterEach(() => {
      removeTempDir(root);
    });

    it('should use defaults when no file exists', async () => {
      const result = await loadConfiguration(root);

      expect(result.loaded).toBe(false);
      expect(result.path).toBe(path.join(root, '.patchdrift.json'));
      expect(result.config).toEqual(DEFAULT_CONFIG);
    });

    it('should merge overrides over the file', async () => {
      writeTree(root, { '.patchdrift.json': JSON.stringify({ threshold: 0.7, dryRun: true }) });

      const { config, loaded } = await loadConfiguration(root, { dryRun: false });

      expect(loaded).toBe(true);
      expect(config.threshold).toBe(0.7);
      expect(config.dryRun).toBe(false);
    });

    it('should read an explicit path', async () => {
      writeTree(root, { 'conf/drift.json': JSON.stringify({ maxCandidates: 3 }) });
      const { config } = await loadConfiguration(root, {}, path.join(root, 'conf/drift.json'));
      expect(config.maxCandidates).toBe(3);
    });

    it('should reject malformed files', async () => {
      writeTree(root, { '.patchdrift.json': '{ not json' });
      await expect(loadConfiguration(root)).rejects.toThrow(/^Failed to parse /);

      writeTree(root, { '.patchdrift.json': '[1, 2]' });
      await expect(loadConfiguration(root)).rejects.toThrow('must contain a JSON object');
    });
  });

  describe('helpers', () => {
    it('should place backups under the root by default', () => {
      expect(resolveBackupBase('/work', {})).toBe(path.join('/work', '.diff_backups'));
      expect(resolveBackupBase('/work', { backupBase: 'var/bk' })).toBe(path.join('/work', 'var/bk'));
      expect(resolveBackupBase('/work', { backupBase: '/tmp/bk' })).toBe('/tmp/bk');
    });

    it('should combine default and custom excludes', () => {
      expect(effectiveExcludes({ excludeDirs: ['dist', 'node_modules'], useDefaultExcludes: true })).toEqual([
        '.git', '.venv', 'node_modules', '.diff_backups', 'dist',
      ]);
      expect(effectiveExcludes({ excludeDirs: ['dist'], useDefaultExcludes: false })).toEqual(['dist']);
    });

    it('should recognize errno errors by shape', () => {
      const foreign = { name: 'Error', message: 'ENOENT: no such file', code: 'ENOENT' };

      expect(isErrnoException(foreign)).toBe(true);
      expect(isErrnoException(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
      expect(isErrnoException(new Error('no code'))).toBe(false);
      expect(isErrnoException({ code: 42 })).toBe(false);
      expect(isErrnoException(undefined)).toBe(false);
    });
  });
});
