import { describe, expect, test, vi } from 'vitest';
import { ClaudeRunner } from '../src/core/runner/engines/claude.js';
import type { RunEvent } from '../src/core/runner/events.js';
import type { EngineConfig, RunInvocation, SpawnFn, SubprocessRunnerOptions } from '../src/core/runner/runner.js';
import { collect, FakeAgentProcess, noopLogger } from './helpers.js';
import type { FakeAgentScript } from './helpers.js';

const engineConfig: EngineConfig = { command: 'claude', args: [], env: {} };

function invocation(overrides: Partial<RunInvocation> = {}): RunInvocation {
  return { runId: 'r1', prompt: 'hello', workingDirectory: '/tmp', engineConfig, ...overrides };
}

function runnerWith(spawn: SpawnFn, overrides: Partial<SubprocessRunnerOptions> = {}): ClaudeRunner {
  return new ClaudeRunner(engineConfig, {
    logger: noopLogger(),
    cancelGraceMs: 1_000,
    maxConsecutiveMalformedLines: 3,
    clock: () => 1_000,
    spawn,
    ...overrides,
  });
}

function scripted(script: FakeAgentScript): { fake: FakeAgentProcess; spawn: SpawnFn } {
  const fake = new FakeAgentProcess(script);
  return { fake, spawn: () => fake };
}

const init = (id: string) => JSON.stringify({ type: 'system', subtype: 'init', session_id: id });
const success = (id: string, result: string) =>
  JSON.stringify({ type: 'result', subtype: 'success', is_error: false, result, session_id: id });

describe('SubprocessRunner lifecycle', () => {
  test('ends with exactly one terminal event after a clean run', async () => {
    const { fake, spawn } = scripted({ lines: [init('s-1'), success('s-1', 'ok')], exitCode: 0 });
    const events = await collect(runnerWith(spawn).start(invocation()));

    expect(events.map((event) => event.type)).toEqual(['started', 'completed']);
    expect(fake.prompt).toBe('hello');
  });

  test('a single malformed line is skipped', async () => {
    const { spawn } = scripted({ lines: [init('s-1'), 'not json at all', success('s-1', 'ok')], exitCode: 0 });
    const events = await collect(runnerWith(spawn).start(invocation()));

    expect(events.map((event) => event.type)).toEqual(['started', 'completed']);
  });

  test('consecutive malformed lines past the threshold fail the run', async () => {
    const { fake, spawn } = scripted({ lines: [init('s-1'), 'x', '{"type":"assistant"}', '[1,2]'] });
    const events = await collect(runnerWith(spawn).start(invocation()));

    expect(events).toEqual([
      { type: 'started', runId: 'r1', engine: 'claude', resumeToken: { engine: 'claude', value: 's-1' } },
      { type: 'errored', runId: 'r1', code: 'STREAM_PARSE_FAILURE', reason: 'unparseable agent output' },
    ]);
    expect(fake.signals).toContain('SIGKILL');
  });

  test('a result line without a trailing newline still completes the run', async () => {
    const { fake, spawn } = scripted({});
    const pending = collect(runnerWith(spawn).start(invocation()));

    fake.stdout.write(`${init('s-1')}\n${success('s-1', 'tail')}`);
    await fake.finish(0);

    expect(await pending).toEqual([
      { type: 'started', runId: 'r1', engine: 'claude', resumeToken: { engine: 'claude', value: 's-1' } },
      { type: 'completed', runId: 'r1', resumeToken: { engine: 'claude', value: 's-1' }, result: 'tail' },
    ]);
  });

  test('stdout is paused while unread lines pile up and resumed as they drain', async () => {
    const lines = [...Array.from({ length: 12 }, () => init('s-1')), success('s-1', 'ok')];
    const { fake, spawn } = scripted({ lines, exitCode: 0 });
    const sequence = runnerWith(spawn, { stdoutHighWaterLines: 4 }).start(invocation());
    const iterator = sequence[Symbol.asyncIterator]();

    expect((await iterator.next()).value).toMatchObject({ type: 'started' });
    await vi.waitFor(() => expect(fake.stdout.isPaused()).toBe(true));

    const rest: RunEvent[] = [];
    for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
      rest.push(next.value);
    }
    expect(rest).toEqual([
      { type: 'completed', runId: 'r1', resumeToken: { engine: 'claude', value: 's-1' }, result: 'ok' },
    ]);
  });

  test('clean exit without a result event is an error', async () => {
    const { spawn } = scripted({ lines: [init('s-1')], exitCode: 0 });
    const events = await collect(runnerWith(spawn).start(invocation()));

    expect(events.at(-1)).toEqual({
      type: 'errored',
      runId: 'r1',
      code: 'SUBPROCESS_CRASH',
      reason: 'claude finished without a result event',
    });
  });

  test('non-zero exit reports the return code', async () => {
    const { spawn } = scripted({ lines: [], exitCode: 2 });
    const events = await collect(runnerWith(spawn).start(invocation()));

    expect(events).toEqual([{ type: 'errored', runId: 'r1', code: 'SUBPROCESS_CRASH', reason: 'claude failed (rc=2)' }]);
  });

  test('a synchronous spawn failure becomes SPAWN_FAILURE', async () => {
    const runner = runnerWith(() => {
      throw new Error('ENOENT');
    });
    const events = await collect(runner.start(invocation()));

    expect(events).toEqual([
      { type: 'errored', runId: 'r1', code: 'SPAWN_FAILURE', reason: 'failed to start claude: ENOENT' },
    ]);
  });

  test('a process error before any output becomes SPAWN_FAILURE', async () => {
    const fake = new FakeAgentProcess();
    const runner = runnerWith(() => {
      setImmediate(() => fake.emit('error', new Error('spawn claude ENOENT')));
      return fake;
    });
    const events = await collect(runner.start(invocation()));

    expect(events).toEqual([
      { type: 'errored', runId: 'r1', code: 'SPAWN_FAILURE', reason: 'failed to start claude: spawn claude ENOENT' },
    ]);
  });

  test('a session id that differs from the resumed one is rejected', async () => {
    const { spawn } = scripted({ lines: [init('s-9')] });
    const events = await collect(
      runnerWith(spawn).start(invocation({ resumeToken: { engine: 'claude', value: 's-0' } })),
    );

    expect(events).toEqual([
      {
        type: 'errored',
        runId: 'r1',
        code: 'SUBPROCESS_CRASH',
        reason: 'claude emitted session id s-9 but expected s-0',
      },
    ]);
  });

  test('a resume token from another engine never spawns', async () => {
    let spawned = false;
    const runner = runnerWith(() => {
      spawned = true;
      return new FakeAgentProcess();
    });
    const events = await collect(runner.start(invocation({ resumeToken: { engine: 'codex', value: 'x' } })));

    expect(spawned).toBe(false);
    expect(events).toEqual([
      { type: 'errored', runId: 'r1', code: 'SPAWN_FAILURE', reason: 'resume token is for engine codex' },
    ]);
  });

  test('the sequence is lazy and single-use', async () => {
    let spawns = 0;
    const runner = runnerWith(() => {
      spawns++;
      return new FakeAgentProcess({ lines: [init('s-1'), success('s-1', 'ok')], exitCode: 0 });
    });
    const sequence = runner.start(invocation());
    expect(spawns).toBe(0);

    await collect(sequence);
    expect(spawns).toBe(1);
    expect(() => sequence[Symbol.asyncIterator]()).toThrow('run r1 has already been consumed');
  });

  test('cancelling before iteration yields Cancelled without spawning', async () => {
    let spawned = false;
    const runner = runnerWith(() => {
      spawned = true;
      return new FakeAgentProcess();
    });
    const sequence = runner.start(invocation());
    sequence.cancel();

    expect(await collect(sequence)).toEqual([{ type: 'cancelled', runId: 'r1' }]);
    expect(spawned).toBe(false);
  });

  test('cancel sends SIGTERM and ends with Cancelled once the process exits', async () => {
    const { fake, spawn } = scripted({ lines: [init('s-1')] });
    const sequence = runnerWith(spawn).start(invocation());
    const iterator = sequence[Symbol.asyncIterator]();

    const first = await iterator.next();
    expect(first.value).toMatchObject({ type: 'started' });
    sequence.cancel();

    const rest: RunEvent[] = [];
    for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
      rest.push(next.value);
    }
    expect(rest).toEqual([{ type: 'cancelled', runId: 'r1' }]);
    expect(fake.signals).toEqual(['SIGTERM']);
  });

  test('a process that ignores SIGTERM is killed after the grace period', async () => {
    const { fake, spawn } = scripted({ lines: [init('s-1')], ignoreSigterm: true });
    const sequence = runnerWith(spawn, { cancelGraceMs: 20 }).start(invocation());
    const iterator = sequence[Symbol.asyncIterator]();

    await iterator.next();
    sequence.cancel();
    const last = await iterator.next();

    expect(last.value).toEqual({ type: 'cancelled', runId: 'r1' });
    expect(fake.signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect((await iterator.next()).done).toBe(true);
  });

  test('a process lingering after its result is killed and the result kept', async () => {
    const { fake, spawn } = scripted({ lines: [init('s-1'), success('s-1', 'finished')] });
    const events = await collect(runnerWith(spawn, { cancelGraceMs: 20 }).start(invocation()));

    expect(events.at(-1)).toEqual({
      type: 'completed',
      runId: 'r1',
      resumeToken: { engine: 'claude', value: 's-1' },
      result: 'finished',
    });
    expect(fake.signals[0]).toBe('SIGKILL');
    expect(fake.signals).not.toContain('SIGTERM');
  });

  test('the engine env is merged over the parent environment', async () => {
    let seenEnv: NodeJS.ProcessEnv = {};
    let seenCwd = '';
    const runner = runnerWith((_command, _args, options) => {
      seenEnv = options.env;
      seenCwd = options.cwd;
      return new FakeAgentProcess({ lines: [init('s-1'), success('s-1', 'ok')], exitCode: 0 });
    });
    await collect(
      runner.start(
        invocation({ workingDirectory: '/srv/project', engineConfig: { ...engineConfig, env: { TETHER_TEST: '1' } } }),
      ),
    );

    expect(seenCwd).toBe('/srv/project');
    expect(seenEnv.TETHER_TEST).toBe('1');
    expect(seenEnv.PATH).toBe(process.env.PATH);
  });
});
