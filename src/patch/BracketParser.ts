/* --------------------------------------------------------------------------
 *  PatchDrift — Bracketed patch blocks (`*** Begin Patch` … `*** End Patch`)
 * ----------------------------------------------------------------------- */

import { ParseError } from '../errors';
import { FileDiff, FileOperation, Hunk } from '../types/patchTypes';
import { sanitizePath } from '../security/pathSanitizer';
import { formatHunkHeader, HunkBuilder, lineKind, NO_NEWLINE_MARKER } from './hunkBuilder';

const BEGIN_MARKER = '*** Begin Patch';
const END_MARKER = '*** End Patch';
const END_OF_FILE_MARKER = '*** End of File';

const FILE_DIRECTIVE_RE = /^\*\*\* (Update|Add|Delete) File: (.+)$/;
const MOVE_DIRECTIVE_RE = /^\*\*\* Move to: (.+)$/;

export function isBracketedPatch(text: string): boolean {
  return /^\*\*\* (?:Begin|End) Patch\s*$/m.test(text);
}

interface BlockFile {
  operation: FileOperation;
  sourcePath: string;
  targetPath: string;
  hunks: Hunk[];
}

/**
 * Parses every bracketed block in `text`. Text outside the markers is ignored.
 * Hunks carry no line numbers; their placement comes from content alone.
 * @throws ParseError on unbalanced markers or unrecognized lines inside a block
 */
export function parseBracketedPatch(text: string): FileDiff[] {
  const files: FileDiff[] = [];
  const lines = text.split('\n');

  let inBlock = false;
  let beginLine = 0;
  let file: BlockFile | undefined;
  let hunk: HunkBuilder | undefined;
  let pendingBlank = 0;

  const flushHunk = () => {
    if (file && hunk && hunk.size > 0) {
      const header = file.operation === 'add' ? formatHunkHeader(0, 0, 1, hunk.newCount) : undefined;
      file.hunks.push(hunk.build(header));
    }
    hunk = undefined;
    pendingBlank = 0;
  };

  const flushFile = () => {
    flushHunk();
    if (file) {
      files.push({
        sourcePath: file.sourcePath,
        targetPath: file.targetPath,
        operation: file.operation,
        hunks: file.hunks,
        binary: false,
      });
    }
    file = undefined;
  };

  lines.forEach((rawLine, i) => {
    const line = rawLine.trimEnd() === BEGIN_MARKER || rawLine.trimEnd() === END_MARKER ? rawLine.trimEnd() : rawLine;
    const lineNumber = i + 1;

    if (line === BEGIN_MARKER) {
      if (inBlock) {
        throw new ParseError(`Nested "${BEGIN_MARKER}" (block opened at line ${beginLine})`, lineNumber);
      }
      inBlock = true;
      beginLine = lineNumber;
      return;
    }
    if (line === END_MARKER) {
      if (!inBlock) {
        throw new ParseError(`"${END_MARKER}" without a matching "${BEGIN_MARKER}"`, lineNumber);
      }
      flushFile();
      inBlock = false;
      return;
    }
    if (!inBlock) {
      return;
    }

    const directive = FILE_DIRECTIVE_RE.exec(line);
    if (directive) {
      flushFile();
      const filePath = sanitizePath(directive[2]);
      const operation: FileOperation = directive[1] === 'Add' ? 'add' : directive[1] === 'Delete' ? 'delete' : 'modify';
      file = { operation, sourcePath: filePath, targetPath: filePath, hunks: [] };
      return;
    }

    const move = MOVE_DIRECTIVE_RE.exec(line);
    if (move && file?.operation === 'modify') {
      file.operation = 'rename';
      file.targetPath = sanitizePath(move[1]);
      return;
    }

    if (line === END_OF_FILE_MARKER) {
      return;
    }

    if (!file) {
      if (line.trim() === '') {
        return;
      }
      throw new ParseError(`Unrecognized line outside a file section: ${line}`, lineNumber);
    }

    if (line.startsWith('@@')) {
      if (file.operation === 'add' || file.operation === 'delete') {
        throw new ParseError(`Hunk separator not allowed in ${file.operation} section`, lineNumber);
      }
      flushHunk();
      hunk = new HunkBuilder(line.trim(), 0, 0);
      return;
    }

    if (line === '') {
      // Blank lines only count as context when more body follows
      if (hunk) {
        pendingBlank++;
      }
      return;
    }

    if (line.startsWith(NO_NEWLINE_MARKER)) {
      if (!hunk?.markNoNewline()) {
        throw new ParseError('No-newline marker without a preceding line', lineNumber);
      }
      return;
    }

    const kind = lineKind(line);
    if (!kind) {
      throw new ParseError(`Unrecognized line in patch block: ${line}`, lineNumber);
    }
    if (file.operation === 'delete') {
      throw new ParseError('Delete sections take no body', lineNumber);
    }
    if (file.operation === 'add' && kind !== 'added') {
      throw new ParseError('Add File sections may only contain "+" lines', lineNumber);
    }

    hunk ??= file.operation === 'add' ? new HunkBuilder('@@', 0, 1) : new HunkBuilder('@@', 0, 0);
    for (; pendingBlank > 0; pendingBlank--) {
      hunk.push('context', '');
    }
    hunk.push(kind, line.slice(1));
  });

  if (inBlock) {
    throw new ParseError(`"${BEGIN_MARKER}" without a matching "${END_MARKER}"`, beginLine);
  }

  return files;
}
