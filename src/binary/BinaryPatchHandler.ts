/* --------------------------------------------------------------------------
 *  PatchDrift — Binary file diffs
 * ----------------------------------------------------------------------- */

import { BinaryPatchError } from '../errors';
import { FileDiff } from '../types/patchTypes';
import { applyGitDelta, decodeBinaryHunk } from './gitBinary';

/**
 * Produces the new bytes of a binary file diff. Binary content never goes
 * through the matcher.
 */
export class BinaryPatchHandler {
  /**
   * @param current Bytes on disk, undefined when the file does not exist yet
   * @returns The new content, or undefined when the file is deleted
   * @throws BinaryPatchError when the payload is missing or cannot be decoded
   */
  apply(fileDiff: FileDiff, current: Buffer | undefined): Buffer | undefined {
    if (fileDiff.operation === 'delete') {
      return undefined;
    }

    const payload = fileDiff.binaryPayload;
    if (!payload) {
      throw new BinaryPatchError(`No binary payload for ${fileDiff.targetPath}; regenerate the diff with --binary`);
    }

    const data = decodeBinaryHunk(payload.forward);
    if (payload.forward.method === 'literal') {
      return data;
    }
    if (!current) {
      throw new BinaryPatchError(`Binary delta for ${fileDiff.targetPath} needs an existing file`);
    }
    return applyGitDelta(current, data);
  }
}
