/* --------------------------------------------------------------------------
 *  PatchDrift — Apply session state
 * ----------------------------------------------------------------------- */

import { ApplyResult } from '../types/patchTypes';

/**
 * One apply invocation. Owns its ordered result list; closed once the
 * report has been produced.
 */
export class ApplySession {
  private readonly _results: ApplyResult[] = [];
  private _closed = false;
  private _finishedAt: Date | undefined;

  constructor(
    readonly id: string,
    readonly root: string,
    readonly dryRun: boolean,
    readonly startedAt: Date = new Date(),
  ) {}

  get results(): readonly ApplyResult[] {
    return this._results;
  }

  get closed(): boolean {
    return this._closed;
  }

  get finishedAt(): Date | undefined {
    return this._finishedAt;
  }

  /** True only when every file diff reached `applied`. */
  get success(): boolean {
    return this._results.length > 0 && this._results.every(r => r.status === 'applied');
  }

  addResult(result: ApplyResult): void {
    if (this._closed) {
      throw new Error(`Session ${this.id} is closed`);
    }
    this._results.push(result);
  }

  close(finishedAt: Date = new Date()): void {
    if (!this._closed) {
      this._closed = true;
      this._finishedAt = finishedAt;
    }
  }
}
