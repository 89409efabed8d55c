import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { spawn } from 'node:child_process';
import { PandocAdapter, buildPandocArgs } from '../../adapters/pandoc/PandocAdapter.js';
import { ConversionError } from '../../utils/errors.js';

// Mock node:child_process
vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

class FakeChild extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  input = '';
}

interface FakeRun {
  stdout?: string;
  stderr?: string;
  code?: number | null;
  signal?: NodeJS.Signals | null;
  spawnError?: Error;
}

function fakeChild(run: FakeRun): FakeChild {
  const child = new FakeChild();
  child.stdin.on('data', (chunk: Buffer) => {
    child.input += chunk.toString('utf8');
  });

  if (run.spawnError) {
    const error = run.spawnError;
    setImmediate(() => child.emit('error', error));
    return child;
  }

  child.stdin.on('finish', () => {
    let open = 2;
    const closeWhenDrained = (): void => {
      open -= 1;
      if (open === 0) {
        // A signal kill reports a null exit code, so null must reach the adapter as-is
        const code = run.code === undefined ? 0 : run.code;
        setImmediate(() => child.emit('close', code, run.signal ?? null));
      }
    };
    child.stdout.once('end', closeWhenDrained);
    child.stderr.once('end', closeWhenDrained);
    child.stdout.end(run.stdout ?? '');
    child.stderr.end(run.stderr ?? '');
  });
  return child;
}

function useChild(child: FakeChild): void {
  vi.mocked(spawn).mockImplementation((() => child) as unknown as typeof spawn);
}

const options = { from: 'markdown', to: 'org', shiftHeadingLevelBy: 4 };

describe('PandocAdapter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('builds pandoc arguments from conversion options', () => {
    expect(buildPandocArgs(options)).toEqual([
      '-f',
      'markdown',
      '-t',
      'org',
      '--shift-heading-level-by=4',
    ]);
  });

  it('feeds the text on stdin and resolves with stdout', async () => {
    const child = fakeChild({ stdout: 'converted\n' });
    useChild(child);
    const adapter = new PandocAdapter({ pandocPath: '/opt/bin/pandoc' });

    const output = await adapter.convert('# Hello', options);

    expect(output).toBe('converted\n');
    expect(child.input).toBe('# Hello');
    expect(spawn).toHaveBeenCalledWith('/opt/bin/pandoc', [
      '-f',
      'markdown',
      '-t',
      'org',
      '--shift-heading-level-by=4',
    ]);
  });

  it('rejects with the exit code and stderr on failure', async () => {
    useChild(fakeChild({ code: 64, stderr: 'unknown reader' }));
    const adapter = new PandocAdapter({ pandocPath: 'pandoc' });

    const error = await adapter.convert('text', options).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConversionError);
    if (!(error instanceof ConversionError)) return;
    expect(error.message).toBe('pandoc exited with code 64');
    expect(error.exitCode).toBe(64);
    expect(error.stderr).toBe('unknown reader');
    expect(error.code).toBe('CONVERSION_FAILED');
  });

  it('rejects when pandoc is killed by a signal', async () => {
    useChild(fakeChild({ code: null, signal: 'SIGKILL' }));
    const adapter = new PandocAdapter({ pandocPath: 'pandoc' });

    await expect(adapter.convert('text', options)).rejects.toThrow('pandoc was killed by SIGKILL');
  });

  it('rejects when pandoc cannot be started', async () => {
    const enoent = Object.assign(new Error('spawn pandoc ENOENT'), { code: 'ENOENT' });
    useChild(fakeChild({ spawnError: enoent }));
    const adapter = new PandocAdapter({ pandocPath: 'pandoc' });

    const error = await adapter.convert('text', options).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConversionError);
    if (!(error instanceof ConversionError)) return;
    expect(error.message).toBe('Failed to start pandoc');
    expect(error.cause).toBe(enoent);
  });
});
