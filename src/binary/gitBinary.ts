/* --------------------------------------------------------------------------
 *  PatchDrift — `GIT binary patch` decoding (base85, zlib, delta)
 * ----------------------------------------------------------------------- */

import { inflateSync } from 'node:zlib';
import { BinaryPatchError, errorMessage } from '../errors';
import { BinaryHunk } from '../types/patchTypes';

const BASE85_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz!#$%&()*+-;<=>?@^_`{|}~';

const BASE85_VALUES = new Map([...BASE85_ALPHABET].map((char, value) => [char, value]));

/**
 * Bytes carried by one data line: `A`–`Z` → 1–26, `a`–`z` → 27–52.
 */
function lineByteCount(marker: string): number {
  const code = marker.charCodeAt(0);
  if (code >= 65 && code <= 90) {
    return code - 64;
  }
  if (code >= 97 && code <= 122) {
    return code - 96 + 26;
  }
  throw new BinaryPatchError(`Invalid binary line length marker: ${JSON.stringify(marker)}`);
}

export function decodeBase85Line(line: string): Buffer {
  const count = lineByteCount(line.charAt(0));
  const encoded = line.slice(1);
  const groups = Math.ceil(count / 4);
  if (encoded.length !== groups * 5) {
    throw new BinaryPatchError(`Binary line has ${encoded.length} characters, expected ${groups * 5}`);
  }

  const out = Buffer.alloc(groups * 4);
  for (let g = 0; g < groups; g++) {
    let value = 0;
    for (let i = 0; i < 5; i++) {
      const char = encoded.charAt(g * 5 + i);
      const digit = BASE85_VALUES.get(char);
      if (digit === undefined) {
        throw new BinaryPatchError(`Invalid base85 character: ${JSON.stringify(char)}`);
      }
      value = value * 85 + digit;
    }
    if (value > 0xffffffff) {
      throw new BinaryPatchError('Base85 group overflows 32 bits');
    }
    out.writeUInt32BE(value, g * 4);
  }
  return out.subarray(0, count);
}

/**
 * Decodes and inflates one literal/delta block.
 */
export function decodeBinaryHunk(hunk: BinaryHunk): Buffer {
  if (hunk.lines.length === 0) {
    throw new BinaryPatchError(`Empty ${hunk.method} block`);
  }
  const deflated = Buffer.concat(hunk.lines.map(decodeBase85Line));

  let inflated: Buffer;
  try {
    inflated = inflateSync(deflated);
  } catch (error) {
    throw new BinaryPatchError(`Could not inflate ${hunk.method} block: ${errorMessage(error)}`);
  }
  if (inflated.length !== hunk.size) {
    throw new BinaryPatchError(`${hunk.method} block inflates to ${inflated.length} bytes, expected ${hunk.size}`);
  }
  return inflated;
}

class DeltaReader {
  offset = 0;

  constructor(private readonly data: Buffer) {}

  get done(): boolean {
    return this.offset >= this.data.length;
  }

  byte(): number {
    if (this.done) {
      throw new BinaryPatchError('Truncated binary delta');
    }
    return this.data[this.offset++];
  }

  /** Little-endian base-128 size */
  size(): number {
    let value = 0;
    let shift = 0;
    let current: number;
    do {
      current = this.byte();
      value += (current & 0x7f) * 2 ** shift;
      shift += 7;
    } while (current & 0x80);
    return value;
  }

  take(length: number): Buffer {
    if (this.offset + length > this.data.length) {
      throw new BinaryPatchError('Truncated binary delta');
    }
    const chunk = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return chunk;
  }
}

/**
 * Rebuilds the target from `base` and a git delta: copy ops (high bit set)
 * take a slice of the base, insert ops (1–127) carry literal bytes.
 */
export function applyGitDelta(base: Buffer, delta: Buffer): Buffer {
  const reader = new DeltaReader(delta);
  const sourceSize = reader.size();
  if (sourceSize !== base.length) {
    throw new BinaryPatchError(`Delta expects a ${sourceSize}-byte base, file has ${base.length} bytes`);
  }
  const targetSize = reader.size();
  const chunks: Buffer[] = [];
  let written = 0;

  while (!reader.done) {
    const opcode = reader.byte();
    if (opcode & 0x80) {
      let offset = 0;
      let size = 0;
      for (let bit = 0; bit < 4; bit++) {
        if (opcode & (0x01 << bit)) {
          offset += reader.byte() * 2 ** (8 * bit);
        }
      }
      for (let bit = 0; bit < 3; bit++) {
        if (opcode & (0x10 << bit)) {
          size += reader.byte() * 2 ** (8 * bit);
        }
      }
      if (size === 0) {
        size = 0x10000;
      }
      if (offset + size > base.length) {
        throw new BinaryPatchError('Delta copy exceeds the base');
      }
      chunks.push(base.subarray(offset, offset + size));
      written += size;
    } else if (opcode > 0) {
      chunks.push(reader.take(opcode));
      written += opcode;
    } else {
      throw new BinaryPatchError('Unexpected delta opcode 0');
    }
  }

  if (written !== targetSize) {
    throw new BinaryPatchError(`Delta produced ${written} bytes, expected ${targetSize}`);
  }
  return Buffer.concat(chunks, written);
}
