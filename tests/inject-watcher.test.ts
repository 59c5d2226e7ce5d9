import { mkdir, readdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, test, vi } from 'vitest';
import { EventBus } from '../src/core/kernel/event-bus.js';
import type { EventEnvelope } from '../src/core/kernel/event-bus.js';
import type { DispatchRequest } from '../src/core/orchestrator/orchestrator.js';
import type { SlotOutcome } from '../src/core/orchestrator/run-slots.js';
import { badFilePath, InjectWatcher } from '../src/plugins/inject/watcher.js';
import type { InjectTarget } from '../src/plugins/inject/watcher.js';
import { noopLogger, withTempDir } from './helpers.js';

class RecordingTarget implements InjectTarget {
  readonly calls: string[] = [];
  readonly requests: DispatchRequest[] = [];

  async dispatch(request: DispatchRequest): Promise<SlotOutcome> {
    this.calls.push(`dispatch ${request.engine}`);
    this.requests.push(request);
    return 'ran';
  }

  async newSession(chatId: string, engine?: string): Promise<void> {
    this.calls.push(`new ${chatId} ${engine ?? '*'}`);
  }
}

function createWatcher(dir: string, events?: EventBus) {
  const target = new RecordingTarget();
  const watcher = new InjectWatcher({
    dir,
    chatId: '99',
    pollIntervalMs: 10,
    defaultEngine: 'claude',
    target,
    logger: noopLogger(),
    events,
  });
  return { target, watcher };
}

describe('badFilePath', () => {
  test('swaps the json extension', () => {
    expect(badFilePath('/in/a.json')).toBe('/in/a.bad');
    expect(badFilePath('/in/A.JSON')).toBe('/in/A.bad');
  });
});

describe('InjectWatcher', () => {
  test('dispatches valid files in name order and quarantines the rest', async () => {
    await withTempDir('inject', async (dir) => {
      await writeFile(join(dir, 'a.json'), JSON.stringify({ text: 'nightly report', engine: 'codex' }));
      await writeFile(join(dir, 'b.json'), JSON.stringify({ text: '   ' }));
      await writeFile(join(dir, 'c.json'), JSON.stringify({ text: 'start over', new_session: true }));
      await writeFile(join(dir, 'd.json'), 'not json');
      await writeFile(join(dir, 'notes.txt'), 'ignored');
      const { target, watcher } = createWatcher(dir);

      expect(await watcher.pollOnce()).toBe(2);

      expect(target.calls).toEqual(['dispatch codex', 'new 99 claude', 'dispatch claude']);
      expect(target.requests).toEqual([
        { chatId: '99', engine: 'codex', prompt: '[SYSTEM] nightly report', attachments: [] },
        { chatId: '99', engine: 'claude', prompt: '[SYSTEM] start over', attachments: [] },
      ]);
      expect((await readdir(dir)).sort()).toEqual(['b.bad', 'd.bad', 'notes.txt']);
    });
  });

  test('a handled file is not run twice', async () => {
    await withTempDir('inject', async (dir) => {
      await writeFile(join(dir, 'a.json'), JSON.stringify({ text: 'once', newSession: false }));
      const { target, watcher } = createWatcher(dir);

      expect(await watcher.pollOnce()).toBe(1);
      expect(await watcher.pollOnce()).toBe(0);
      expect(target.requests).toHaveLength(1);
    });
  });

  test('publishes an event per dispatched file', async () => {
    await withTempDir('inject', async (dir) => {
      await writeFile(join(dir, 'job.json'), JSON.stringify({ text: 'hi' }));
      const events = new EventBus();
      const seen: EventEnvelope[] = [];
      events.subscribe('inject:dispatched', (event) => seen.push(event));
      const { watcher } = createWatcher(dir, events);

      await watcher.pollOnce();

      expect(seen.map((event) => event.payload)).toEqual([
        { file: 'job.json', chatId: '99', engine: 'claude', outcome: 'ran' },
      ]);
    });
  });

  test('start creates the directory and polls until stopped', async () => {
    await withTempDir('inject', async (root) => {
      const dir = join(root, 'drop');
      const { target, watcher } = createWatcher(dir);

      await watcher.start();
      expect(watcher.isRunning).toBe(true);
      await writeFile(join(dir, 'late.tmp'), JSON.stringify({ text: 'picked up' }));
      await rename(join(dir, 'late.tmp'), join(dir, 'late.json'));

      await vi.waitFor(() => expect(target.requests).toHaveLength(1));
      watcher.stop();
      expect(watcher.isRunning).toBe(false);
    });
  });

  test('configure points later polls at a new directory', async () => {
    await withTempDir('inject', async (root) => {
      const first = join(root, 'first');
      const second = join(root, 'second');
      await mkdir(first);
      await mkdir(second);
      await writeFile(join(second, 'a.json'), JSON.stringify({ text: 'moved' }));
      const { target, watcher } = createWatcher(first);

      expect(await watcher.pollOnce()).toBe(0);
      watcher.configure({ dir: second, chatId: '7', pollIntervalMs: 10, defaultEngine: 'codex' });
      expect(await watcher.pollOnce()).toBe(1);
      expect(target.requests[0]).toMatchObject({ chatId: '7', engine: 'codex', prompt: '[SYSTEM] moved' });
    });
  });
});
