/* --------------------------------------------------------------------------
 *  PatchDrift — Hunk construction shared by both diff dialects
 * ----------------------------------------------------------------------- */

import { Hunk, HunkLine, HunkLineKind } from '../types/patchTypes';

export const NO_NEWLINE_MARKER = '\\';

const PREFIX_KIND: Record<string, HunkLineKind> = {
  ' ': 'context',
  '+': 'added',
  '-': 'removed',
};

export function lineKind(line: string): HunkLineKind | undefined {
  return PREFIX_KIND[line.charAt(0)];
}

/**
 * Accumulates body lines for one hunk and freezes them into a {@link Hunk}.
 */
export class HunkBuilder {
  private readonly lines: HunkLine[] = [];

  constructor(
    private readonly header: string,
    private readonly oldStart: number,
    private readonly newStart: number,
  ) {}

  get size(): number {
    return this.lines.length;
  }

  get oldCount(): number {
    return this.lines.filter(l => l.kind !== 'added').length;
  }

  get newCount(): number {
    return this.lines.filter(l => l.kind !== 'removed').length;
  }

  push(kind: HunkLineKind, text: string): void {
    this.lines.push({ kind, text, noNewline: false });
  }

  /** Applies a `\ No newline at end of file` marker to the previous line. */
  markNoNewline(): boolean {
    const last = this.lines.at(-1);
    if (!last) {
      return false;
    }
    this.lines[this.lines.length - 1] = { ...last, noNewline: true };
    return true;
  }

  /**
   * @param header Overrides the header passed to the constructor
   */
  build(header: string = this.header): Hunk {
    const lines = Object.freeze([...this.lines]);
    const preLines = lines.filter(l => l.kind !== 'added');
    const postLines = lines.filter(l => l.kind !== 'removed');

    return Object.freeze({
      header,
      oldStart: this.oldStart,
      oldLines: preLines.length,
      newStart: this.newStart,
      newLines: postLines.length,
      lines,
      preImage: Object.freeze(preLines.map(l => l.text)),
      postImage: Object.freeze(postLines.map(l => l.text)),
      noNewlineBefore: preLines.at(-1)?.noNewline ?? false,
      noNewlineAfter: postLines.at(-1)?.noNewline ?? false,
    });
  }
}

export function formatHunkHeader(oldStart: number, oldLines: number, newStart: number, newLines: number, suffix = ''): string {
  return `@@ -${oldStart},${oldLines} +${newStart},${newLines} @@${suffix}`;
}

/**
 * 0-based line the hunk's pre-image was recorded at, or undefined when the
 * diff carries no position (bracketed patches).
 */
export function recordedLine(hunk: Hunk): number | undefined {
  if (hunk.oldStart === 0 && hunk.newStart === 0) {
    return undefined;
  }
  if (hunk.oldLines === 0) {
    // `-N,0` means "insert after line N"
    return hunk.oldStart;
  }
  return hunk.oldStart - 1;
}
