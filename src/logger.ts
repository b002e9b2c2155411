/* --------------------------------------------------------------------------
 *  PatchDrift — Shared Output Channels (Singleton)
 * ----------------------------------------------------------------------- */

import { AsyncLocalStorage } from 'node:async_hooks';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Receives fully formatted lines. Defaults to stderr. */
export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let _level: LogLevel = 'warn';
const _scopedLevel = new AsyncLocalStorage<LogLevel>();
let _sink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * A named log destination. `appendLine` always writes; the levelled helpers
 * are filtered by the configured log level.
 */
export class OutputChannel {
  constructor(readonly name: string) {}

  appendLine(message: string): void {
    _sink(`${chalk.dim(`[${this.name}]`)} ${message}`);
  }

  debug(message: string): void {
    this.write('debug', chalk.gray(message));
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', chalk.yellow(message));
  }

  error(message: string): void {
    this.write('error', chalk.red(message));
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[getLogLevel()]) {
      return;
    }
    _sink(`${chalk.dim(`[${this.name}]`)} ${level.toUpperCase()} ${message}`);
  }
}

let _mainChannel: OutputChannel | undefined;
let _gitChannel: OutputChannel | undefined;

export function getMainOutputChannel(): OutputChannel {
  _mainChannel ??= new OutputChannel('PatchDrift');
  return _mainChannel;
}

export function getGitOutputChannel(): OutputChannel {
  _gitChannel ??= new OutputChannel('PatchDrift Git');
  return _gitChannel;
}

export function getOutputChannel(): OutputChannel {
  return getMainOutputChannel();
}

export function setLogLevel(level: LogLevel): void {
  _level = level;
}

/** The level in effect here: the enclosing {@link withLogLevel} scope, else the global one. */
export function getLogLevel(): LogLevel {
  return _scopedLevel.getStore() ?? _level;
}

/**
 * Runs `task` with `level` applied to every channel it logs through,
 * including async continuations. Other callers keep their own level.
 */
export function withLogLevel<T>(level: LogLevel, task: () => Promise<T>): Promise<T> {
  return _scopedLevel.run(level, task);
}

/**
 * Redirects every channel to `sink`. Returns the previous sink so callers
 * (tests, embedding tools) can put it back.
 */
export function setLogSink(sink: LogSink): LogSink {
  const previous = _sink;
  _sink = sink;
  return previous;
}
