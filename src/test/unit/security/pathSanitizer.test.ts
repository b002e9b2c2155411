/* --------------------------------------------------------------------------
 *  PatchDrift — Unit tests for path sanitizer
 * ----------------------------------------------------------------------- */

import * as path from 'path';
import { isSafePath, resolveInsideRoot, sanitizePath, toRelativePosix } from '../../../security/pathSanitizer';

describe('Path Sanitizer', () => {
  describe('sanitizePath', () => {
    it('should remove control characters', () => {
      expect(sanitizePath('path\x00with\x1Fcontrol')).toBe('pathwithcontrol');
    });

    it('should remove escaped control sequences', () => {
      expect(sanitizePath('path\\r\\nwith\\nescaped')).toBe('pathwithescaped');
    });

    it('should normalize backslashes to forward slashes', () => {
      expect(sanitizePath('path\\to\\file')).toBe('path/to/file');
    });

    it('should trim whitespace', () => {
      expect(sanitizePath('  path/to/file  ')).toBe('path/to/file');
    });

    it('should handle empty input', () => {
      expect(sanitizePath('')).toBe('');
    });
  });

  describe('isSafePath', () => {
    it('should accept safe relative paths', () => {
      expect(isSafePath('file.txt')).toBe(true);
      expect(isSafePath('dir/file.txt')).toBe(true);
      expect(isSafePath('dir/subdir/file.txt')).toBe(true);
    });

    it('should reject absolute, drive-letter and UNC paths', () => {
      expect(isSafePath('/etc/passwd')).toBe(false);
      expect(isSafePath('C:/Windows/System32')).toBe(false);
      expect(isSafePath('//server/share/file')).toBe(false);
    });

    it('should reject path traversal', () => {
      expect(isSafePath('../file.txt')).toBe(false);
      // Stays inside the root once normalized
      expect(isSafePath('dir/../file.txt')).toBe(true);
      expect(isSafePath('dir/../../file.txt')).toBe(false);
      expect(isSafePath('..')).toBe(false);
      expect(isSafePath('..\\..\\etc\\passwd')).toBe(false);
    });

    it('should reject null bytes, control characters and empty paths', () => {
      expect(isSafePath('file\0.txt')).toBe(false);
      expect(isSafePath('file\x01.txt')).toBe(false);
      expect(isSafePath('')).toBe(false);
    });

    it('should reject extremely long paths', () => {
      expect(isSafePath('a'.repeat(1001))).toBe(false);
    });
  });

  describe('resolveInsideRoot', () => {
    const root = path.resolve('/work/project');

    it('should join safe paths onto the root', () => {
      expect(resolveInsideRoot(root, 'src/a.ts')).toBe(path.join(root, 'src', 'a.ts'));
    });

    it('should refuse escaping paths and the root itself', () => {
      expect(resolveInsideRoot(root, '../other/a.ts')).toBeUndefined();
      expect(resolveInsideRoot(root, '.')).toBeUndefined();
    });
  });

  describe('toRelativePosix', () => {
    it('should produce forward-slash relative paths', () => {
      const root = path.resolve('/work/project');
      expect(toRelativePosix(root, path.join(root, 'a', 'b.ts'))).toBe('a/b.ts');
    });
  });
});
