import { describe, it, expect } from 'vitest';
import { SpawnProcessRunner, describeFailure, succeeded, type ProcessOutcome } from './process.js';

const base: ProcessOutcome = {
  exitCode: 0,
  signal: null,
  stdout: '',
  stderrTail: '',
  timedOut: false,
  durationMs: 1,
};

describe('succeeded / describeFailure', () => {
  it('only a clean zero exit succeeds', () => {
    expect(succeeded(base)).toBe(true);
    expect(succeeded({ ...base, timedOut: true })).toBe(false);
    expect(succeeded({ ...base, exitCode: 1 })).toBe(false);
    expect(succeeded({ ...base, exitCode: null, spawnError: 'ENOENT' })).toBe(false);
  });

  it('describes each kind of failure', () => {
    expect(describeFailure({ ...base, exitCode: null, spawnError: 'spawn x ENOENT' }, 100)).toBe('Failed to start: spawn x ENOENT');
    expect(describeFailure({ ...base, exitCode: null, timedOut: true }, 100)).toBe('Processing timed out');
    expect(describeFailure({ ...base, exitCode: null, signal: 'SIGKILL' }, 100)).toBe('Terminated by signal SIGKILL');
    expect(describeFailure({ ...base, exitCode: 2, stderrTail: 'abcdefgh\n' }, 4)).toBe('exit code 2: efgh');
    expect(describeFailure({ ...base, exitCode: 2 }, 4)).toBe('exit code 2: unknown');
  });
});

describe('SpawnProcessRunner', () => {
  const runner = new SpawnProcessRunner(100);

  it('collects stdout lines, the stderr tail and the exit code', async () => {
    const lines: string[] = [];
    const outcome = await runner.run(
      process.execPath,
      ['-e', "process.stdout.write('one\\ntwo\\rthree'); process.stderr.write('oops'); process.exit(3)"],
      { onStdoutLine: (l) => lines.push(l) },
    );

    expect(outcome.exitCode).toBe(3);
    expect(outcome.stderrTail).toBe('oops');
    expect(lines).toEqual(['one', 'two', 'three']);
  });

  it('keeps stdout only when no line callback consumes it', async () => {
    const script = "process.stdout.write('a\\nb\\n')";
    const streamed = await runner.run(process.execPath, ['-e', script], { onStdoutLine: () => undefined });
    const buffered = await runner.run(process.execPath, ['-e', script]);

    expect(streamed.stdout).toBe('');
    expect(buffered.stdout).toBe('a\nb\n');
  });

  it('kills a process that outlives its timeout', async () => {
    const outcome = await runner.run(process.execPath, ['-e', 'setTimeout(() => {}, 60000)'], { timeoutMs: 200 });
    expect(outcome.timedOut).toBe(true);
    expect(succeeded(outcome)).toBe(false);
  });

  it('reports a binary that cannot be spawned', async () => {
    const outcome = await runner.run('/nonexistent/tubesplice-binary', []);
    expect(outcome.spawnError).toBeDefined();
    expect(outcome.exitCode).toBeNull();
  });
});
