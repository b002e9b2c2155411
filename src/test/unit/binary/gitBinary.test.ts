/* --------------------------------------------------------------------------
 *  PatchDrift — Unit tests for GIT binary patch decoding
 * ----------------------------------------------------------------------- */

import { deflateSync } from 'zlib';
import { BinaryPatchHandler } from '../../../binary/BinaryPatchHandler';
import { applyGitDelta, decodeBase85Line, decodeBinaryHunk } from '../../../binary/gitBinary';
import { BinaryPatchError } from '../../../errors';
import { BinaryHunk, FileDiff } from '../../../types/patchTypes';
import { encodeBase85Lines } from '../../setup/test-utils';

function block(method: BinaryHunk['method'], raw: Buffer): BinaryHunk {
  return { method, size: raw.length, lines: encodeBase85Lines(deflateSync(raw)) };
}

function binaryDiff(operation: FileDiff['operation'], forward?: BinaryHunk): FileDiff {
  return {
    sourcePath: 'assets/logo.bin',
    targetPath: 'assets/logo.bin',
    operation,
    hunks: [],
    binary: true,
    ...(forward ? { binaryPayload: { forward } } : {}),
  };
}

describe('gitBinary', () => {
  describe('decodeBase85Line', () => {
    it('should decode a data line using its length marker', () => {
      expect([...decodeBase85Line('D00001')]).toEqual([0, 0, 0, 1]);
      expect([...decodeBase85Line('A00001')]).toEqual([0]);
    });

    it('should reject malformed lines', () => {
      expect(() => decodeBase85Line('!00000')).toThrow(BinaryPatchError);
      expect(() => decodeBase85Line('B0000')).toThrow('Binary line has 4 characters, expected 5');
      expect(() => decodeBase85Line('A0000"')).toThrow('Invalid base85 character: "\\""');
    });
  });

  describe('decodeBinaryHunk', () => {
    it('should inflate blocks spanning several lines', () => {
      const raw = Buffer.from(Array.from({ length: 200 }, (_, i) => (i * 37) % 251));
      const hunk = block('literal', raw);

      expect(hunk.lines.length).toBeGreaterThan(1);
      expect(decodeBinaryHunk(hunk).equals(raw)).toBe(true);
    });

    it('should check the declared size', () => {
      const hunk = { ...block('literal', Buffer.from('hello')), size: 3 };
      expect(() => decodeBinaryHunk(hunk)).toThrow('literal block inflates to 5 bytes, expected 3');
    });
  });

  describe('applyGitDelta', () => {
    const base = Buffer.from('hello world');

    it('should combine copy and insert operations', () => {
      const delta = Buffer.from([0x0b, 0x0b, 0x90, 0x06, 0x05, ...Buffer.from('there')]);
      expect(applyGitDelta(base, delta).toString()).toBe('hello there');
    });

    it('should copy from an offset', () => {
      const delta = Buffer.from([0x0b, 0x05, 0x91, 0x06, 0x05]);
      expect(applyGitDelta(base, delta).toString()).toBe('world');
    });

    it('should reject a delta made for another base', () => {
      expect(() => applyGitDelta(base, Buffer.from([0x05, 0x05, 0x05]))).toThrow(
        'Delta expects a 5-byte base, file has 11 bytes',
      );
    });

    it('should reject opcode 0 and short output', () => {
      expect(() => applyGitDelta(base, Buffer.from([0x0b, 0x01, 0x00]))).toThrow('Unexpected delta opcode 0');
      expect(() => applyGitDelta(base, Buffer.from([0x0b, 0x06, 0x90, 0x05]))).toThrow(
        'Delta produced 5 bytes, expected 6',
      );
    });
  });
});

describe('BinaryPatchHandler', () => {
  const handler = new BinaryPatchHandler();

  it('should return literal content', () => {
    const result = handler.apply(binaryDiff('add', block('literal', Buffer.from([1, 2, 3]))), undefined);
    expect(result && [...result]).toEqual([1, 2, 3]);
  });

  it('should apply a delta to the current bytes', () => {
    const delta = Buffer.from([0x0b, 0x05, 0x91, 0x06, 0x05]);
    const result = handler.apply(binaryDiff('modify', block('delta', delta)), Buffer.from('hello world'));
    expect(result?.toString()).toBe('world');
  });

  it('should delete without decoding anything', () => {
    expect(handler.apply(binaryDiff('delete'), Buffer.from('x'))).toBeUndefined();
  });

  it('should refuse a diff without payload', () => {
    expect(() => handler.apply(binaryDiff('modify'), Buffer.from('x'))).toThrow(
      'No binary payload for assets/logo.bin; regenerate the diff with --binary',
    );
  });

  it('should refuse a delta for a missing file', () => {
    const delta = Buffer.from([0x0b, 0x05, 0x91, 0x06, 0x05]);
    expect(() => handler.apply(binaryDiff('add', block('delta', delta)), undefined)).toThrow(
      'Binary delta for assets/logo.bin needs an existing file',
    );
  });
});
