/* --------------------------------------------------------------------------
 *  PatchDrift — Unit tests for the output channels
 * ----------------------------------------------------------------------- */

import {
  getGitOutputChannel,
  getLogLevel,
  getOutputChannel,
  LogSink,
  setLogLevel,
  setLogSink,
  withLogLevel,
} from '../../logger';

describe('OutputChannel', () => {
  let lines: string[];
  let previous: LogSink;

  beforeEach(() => {
    lines = [];
    previous = setLogSink(line => lines.push(line));
  });

  afterEach(() => {
    setLogSink(previous);
    setLogLevel('warn');
  });

  it('should filter messages below the configured level', () => {
    setLogLevel('info');
    const channel = getOutputChannel();

    channel.debug('hidden');
    channel.info('hello');

    expect(getLogLevel()).toBe('info');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('INFO hello');
    expect(lines[0]).toContain('[PatchDrift]');
  });

  it('should write nothing when silent except appended lines', () => {
    setLogLevel('silent');

    getOutputChannel().error('dropped');
    getGitOutputChannel().appendLine('always');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[PatchDrift Git]');
    expect(lines[0]).toContain('always');
  });

  it('should scope a level to one task without touching the global level', async () => {
    const seen = await withLogLevel('debug', async () => {
      await Promise.resolve();
      getOutputChannel().debug('scoped');
      return getLogLevel();
    });
    getOutputChannel().info('outside');

    expect(seen).toBe('debug');
    expect(getLogLevel()).toBe('warn');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('DEBUG scoped');
  });

  it('should keep concurrent scopes apart', async () => {
    const tick = () => new Promise<void>(resolve => setTimeout(resolve, 5));
    const quiet = withLogLevel('error', async () => {
      await tick();
      getOutputChannel().info('quiet session');
    });
    const verbose = withLogLevel('info', async () => {
      await tick();
      getOutputChannel().info('verbose session');
    });

    await Promise.all([quiet, verbose]);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('INFO verbose session');
  });

  it('should reuse the same channel', () => {
    expect(getOutputChannel()).toBe(getOutputChannel());
  });
});
