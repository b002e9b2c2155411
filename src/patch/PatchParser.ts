/* --------------------------------------------------------------------------
 *  PatchDrift — Patch Parsing Logic
 * ----------------------------------------------------------------------- */

import { ParseError } from '../errors';
import { BinaryHunk, BinaryPatchPayload, FileDiff, FileOperation, Hunk, PatchSet } from '../types/patchTypes';
import { sanitizePath } from '../security/pathSanitizer';
import { extractFileNamesFromHeader, normalizeLineEndings, stripDiffPrefix } from '../utilities';
import { isBracketedPatch, parseBracketedPatch } from './BracketParser';
import { formatHunkHeader, HunkBuilder, lineKind, NO_NEWLINE_MARKER } from './hunkBuilder';

export const DEV_NULL = '/dev/null';

const HUNK_HEADER_RE = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(.*)$/;
const BINARY_BLOCK_RE = /^(literal|delta) (\d+)$/;

export interface ParseOptions {
  /**
   * Require hunk bodies to match their declared line counts exactly.
   * When false (default) counts are recomputed from the body.
   */
  strict?: boolean;
}

/**
 * Parses diff text into an immutable {@link PatchSet}. Accepts unified diffs
 * (plain or git-style) and bracketed `*** Begin Patch` blocks.
 * @throws ParseError when the input holds no usable file diff or is malformed
 */
export function parsePatchSet(patchText: string, options: ParseOptions = {}): PatchSet {
  const text = normalizeLineEndings(patchText);
  if (text.trim() === '') {
    throw new ParseError('Patch input is empty');
  }

  if (isBracketedPatch(text)) {
    return freezePatchSet('bracketed', parseBracketedPatch(text));
  }

  return freezePatchSet('unified', new UnifiedDiffParser(text, options.strict ?? false).parse());
}

function freezePatchSet(dialect: PatchSet['dialect'], files: FileDiff[]): PatchSet {
  if (files.length === 0) {
    throw new ParseError('No file diffs found in patch input');
  }
  return Object.freeze({ dialect, files: Object.freeze(files.map(f => Object.freeze(f))) });
}

/**
 * Extracts the path as written in a `---`/`+++` header, without timestamps
 * or git prefixes. `/dev/null` is returned untouched.
 */
export function extractHeaderPath(rawHeaderPath: string): string {
  let value = rawHeaderPath.split('\t')[0].trim();
  if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
    value = value.slice(1, -1);
  }
  return value === DEV_NULL ? DEV_NULL : stripDiffPrefix(value);
}

/**
 * The path a file diff writes to: the target, or the source for deletions.
 */
export function extractFilePath(fileDiff: FileDiff): string {
  return fileDiff.operation === 'delete' ? fileDiff.sourcePath : fileDiff.targetPath;
}

interface PendingFile {
  sourcePath?: string;
  targetPath?: string;
  isNew: boolean;
  isDeleted: boolean;
  renameFrom?: string;
  renameTo?: string;
  binary: boolean;
  binaryPayload?: BinaryPatchPayload;
  hunks: Hunk[];
  fromGitHeader: boolean;
}

class UnifiedDiffParser {
  private readonly lines: string[];
  private index = 0;
  private readonly files: FileDiff[] = [];
  private current: PendingFile | undefined;

  constructor(text: string, private readonly strict: boolean) {
    this.lines = text.split('\n');
    // A trailing newline produces one empty element that is not a line
    if (this.lines.at(-1) === '') {
      this.lines.pop();
    }
  }

  parse(): FileDiff[] {
    while (this.index < this.lines.length) {
      const line = this.lines[this.index];

      if (line.startsWith('diff --git ')) {
        this.startFile({ fromGitHeader: true });
        const { oldFile, newFile } = extractFileNamesFromHeader(line);
        this.requireCurrent().sourcePath = oldFile;
        this.requireCurrent().targetPath = newFile;
        this.index++;
      } else if (this.isFileHeaderStart(line)) {
        this.parseFileHeader();
      } else if (line.startsWith('@@')) {
        this.parseHunk();
      } else if (this.current && line === 'GIT binary patch') {
        this.index++;
        this.current.binary = true;
        this.current.binaryPayload = this.parseBinaryPayload();
      } else if (this.current && this.parseExtendedHeader(line)) {
        this.index++;
      } else {
        // Commit messages, `index` lines and other noise between file blocks
        this.index++;
      }
    }

    this.finishFile();
    return this.files;
  }

  private requireCurrent(): PendingFile {
    if (!this.current) {
      throw new ParseError('Hunk found before any file header', this.index + 1);
    }
    return this.current;
  }

  private startFile(init: Partial<PendingFile> = {}): void {
    this.finishFile();
    this.current = {
      isNew: false,
      isDeleted: false,
      binary: false,
      hunks: [],
      fromGitHeader: false,
      ...init,
    };
  }

  private isFileHeaderStart(line: string): boolean {
    if (line.startsWith('--- ')) {
      return true;
    }
    if (line.startsWith('+++ ')) {
      return true;
    }
    // Non-standard `*** a/x` / `--- b/x` pair
    const next = this.lines[this.index + 1] ?? '';
    return /^\*\*\* [ab]\//.test(line) && /^--- [ab]\//.test(next);
  }

  private parseFileHeader(): void {
    const line = this.lines[this.index];
    const next = this.lines[this.index + 1] ?? '';
    let source: string | undefined;
    let target: string | undefined;

    if (line.startsWith('*** ')) {
      source = extractHeaderPath(line.slice(4));
      target = extractHeaderPath(next.slice(4));
      this.index += 2;
    } else if (line.startsWith('--- ')) {
      source = extractHeaderPath(line.slice(4));
      if (next.startsWith('+++ ')) {
        target = extractHeaderPath(next.slice(4));
        this.index += 2;
      } else {
        // Legacy header without a `+++` line
        target = source;
        this.index += 1;
      }
    } else {
      target = extractHeaderPath(line.slice(4));
      source = target;
      this.index += 1;
    }

    // A git block that has not seen hunks yet owns these headers
    const gitBlock = this.current?.fromGitHeader && this.current.hunks.length === 0 && !this.current.binary;
    if (!gitBlock) {
      this.startFile();
    }
    const file = this.requireCurrent();
    if (source === DEV_NULL) {
      file.isNew = true;
    } else {
      file.sourcePath = source;
    }
    if (target === DEV_NULL) {
      file.isDeleted = true;
    } else {
      file.targetPath = target;
    }
  }

  private parseExtendedHeader(line: string): boolean {
    const file = this.requireCurrent();
    if (file.hunks.length > 0) {
      return false;
    }

    if (line.startsWith('new file mode')) {
      file.isNew = true;
    } else if (line.startsWith('deleted file mode')) {
      file.isDeleted = true;
    } else if (line.startsWith('rename from ')) {
      file.renameFrom = sanitizePath(line.slice('rename from '.length));
    } else if (line.startsWith('rename to ')) {
      file.renameTo = sanitizePath(line.slice('rename to '.length));
    } else if (line.startsWith('Binary files ') && line.endsWith(' differ')) {
      file.binary = true;
    } else {
      return false;
    }
    return true;
  }

  private parseBinaryPayload(): BinaryPatchPayload {
    const forward = this.parseBinaryBlock();
    if (!forward) {
      throw new ParseError('GIT binary patch without a literal or delta block', this.index + 1);
    }
    const reverse = this.parseBinaryBlock();
    return reverse ? { forward, reverse } : { forward };
  }

  private parseBinaryBlock(): BinaryHunk | undefined {
    const header = BINARY_BLOCK_RE.exec(this.lines[this.index] ?? '');
    if (!header) {
      return undefined;
    }
    this.index++;
    const data: string[] = [];
    while (this.index < this.lines.length && this.lines[this.index] !== '') {
      data.push(this.lines[this.index]);
      this.index++;
    }
    // Blank separator after the data lines
    if (this.index < this.lines.length) {
      this.index++;
    }
    const method = header[1] === 'literal' ? 'literal' : 'delta';
    return { method, size: Number(header[2]), lines: data };
  }

  private parseHunk(): void {
    const headerLine = this.lines[this.index];
    const file = this.requireCurrent();
    const match = HUNK_HEADER_RE.exec(headerLine);

    if (!match) {
      if (this.strict) {
        throw new ParseError(`Malformed hunk header: ${headerLine}`, this.index + 1);
      }
      // Positionless `@@` separator: matching relies on content alone
      this.index++;
      const builder = new HunkBuilder(headerLine, 0, 0);
      this.readLenientBody(builder);
      if (builder.size === 0) {
        throw new ParseError('Hunk has no body', this.index);
      }
      file.hunks.push(builder.build());
      return;
    }

    const oldStart = Number(match[1]);
    const declaredOld = match[2] === undefined ? 1 : Number(match[2]);
    const newStart = Number(match[3]);
    const declaredNew = match[4] === undefined ? 1 : Number(match[4]);
    const suffix = match[5];
    const headerIndex = this.index;
    this.index++;

    const builder = new HunkBuilder(headerLine, oldStart, newStart);
    if (this.strict) {
      this.readStrictBody(builder, declaredOld, declaredNew, headerIndex);
    } else {
      this.readLenientBody(builder, { old: declaredOld, new: declaredNew });
      if (builder.size === 0 && (declaredOld > 0 || declaredNew > 0)) {
        throw new ParseError(`Unterminated hunk: ${headerLine}`, headerIndex + 1);
      }
    }

    const counted = builder.oldCount === declaredOld && builder.newCount === declaredNew;
    const header = counted
      ? headerLine
      : formatHunkHeader(oldStart, builder.oldCount, newStart, builder.newCount, suffix);
    file.hunks.push(builder.build(header));
  }

  private readStrictBody(builder: HunkBuilder, declaredOld: number, declaredNew: number, headerIndex: number): void {
    while (builder.oldCount < declaredOld || builder.newCount < declaredNew) {
      if (this.index >= this.lines.length) {
        throw new ParseError(`Unterminated hunk: ${this.lines[headerIndex]}`, headerIndex + 1);
      }
      const line = this.lines[this.index];
      if (line.startsWith(NO_NEWLINE_MARKER)) {
        builder.markNoNewline();
        this.index++;
        continue;
      }
      const kind = line === '' ? 'context' : lineKind(line);
      if (!kind) {
        throw new ParseError(`Unterminated hunk: ${this.lines[headerIndex]}`, headerIndex + 1);
      }
      builder.push(kind, line.slice(1));
      this.index++;
      if (builder.oldCount > declaredOld || builder.newCount > declaredNew) {
        throw new ParseError(`Hunk body does not match its header: ${this.lines[headerIndex]}`, headerIndex + 1);
      }
    }

    if (this.lines[this.index]?.startsWith(NO_NEWLINE_MARKER)) {
      builder.markNoNewline();
      this.index++;
    }

    const next = this.lines[this.index];
    if (next !== undefined && lineKind(next) && !this.startsNextFile(this.index)) {
      throw new ParseError(`Hunk body exceeds its declared line counts: ${this.lines[headerIndex]}`, this.index + 1);
    }
  }

  /**
   * Reads body lines until the declared counts are reached or a line cannot
   * belong to a hunk. Counts are only repaired when the body ends early.
   * Positionless hunks have no counts and stop at the first empty line.
   */
  private readLenientBody(builder: HunkBuilder, declared?: { old: number; new: number }): void {
    while (this.index < this.lines.length) {
      const line = this.lines[this.index];

      if (line.startsWith(NO_NEWLINE_MARKER)) {
        if (!builder.markNoNewline()) {
          break;
        }
        this.index++;
        continue;
      }
      if (declared && builder.oldCount >= declared.old && builder.newCount >= declared.new) {
        break;
      }
      if (line === '') {
        // Blank context survives only when more body follows it
        if (!declared || !this.bodyContinuesAfter(this.index)) {
          break;
        }
        builder.push('context', '');
        this.index++;
        continue;
      }

      const kind = lineKind(line);
      if (!kind || this.startsNextFile(this.index)) {
        break;
      }
      builder.push(kind, line.slice(1));
      this.index++;
    }
  }

  private bodyContinuesAfter(index: number): boolean {
    let next = index + 1;
    while (this.lines[next] === '') {
      next++;
    }
    const line = this.lines[next];
    return line !== undefined && lineKind(line) !== undefined && !this.startsNextFile(next);
  }

  private startsNextFile(index: number): boolean {
    const line = this.lines[index];
    const next = this.lines[index + 1] ?? '';
    return line.startsWith('--- ') && next.startsWith('+++ ');
  }

  private finishFile(): void {
    const file = this.current;
    this.current = undefined;
    if (!file) {
      return;
    }

    const operation = resolveOperation(file);
    const sourcePath = file.renameFrom ?? file.sourcePath ?? file.targetPath;
    const targetPath = file.renameTo ?? file.targetPath ?? file.sourcePath;
    if (!sourcePath || !targetPath) {
      throw new ParseError('File diff without a usable path');
    }

    const hasContent = file.hunks.length > 0 || file.binary || operation !== 'modify';
    if (!hasContent) {
      // Mode-only changes carry nothing to apply
      return;
    }

    this.files.push({
      sourcePath,
      targetPath,
      operation,
      hunks: file.binary ? [] : file.hunks,
      binary: file.binary,
      ...(file.binaryPayload ? { binaryPayload: file.binaryPayload } : {}),
    });
  }
}

function resolveOperation(file: PendingFile): FileOperation {
  if (file.isNew) {
    return 'add';
  }
  if (file.isDeleted) {
    return 'delete';
  }
  if (file.renameFrom !== undefined || file.renameTo !== undefined) {
    return 'rename';
  }
  return 'modify';
}
