import assert from 'node:assert';
import { describe, it } from 'node:test';

import { EventBus } from '../src/api/event-bus.js';
import { MainLoop } from '../src/api/utilities/main-loop.js';
import { MemoryBus } from '../src/engine/memory-engine.js';
import { EngineError } from '../src/lib/error.js';
import { prepareTestEnvironment, sleep, waitFor } from './index.js';

import type { ElementMessage } from '../src/engine/types.js';

prepareTestEnvironment();

interface Recorded {
  fatal: EngineError[];
  eos: number;
  elements: ElementMessage[];
}

function setup(): { bus: MemoryBus; loop: MainLoop; events: EventBus; recorded: Recorded } {
  const bus = new MemoryBus();
  const loop = new MainLoop();
  const recorded: Recorded = { fatal: [], eos: 0, elements: [] };
  const events = new EventBus(bus, loop, {
    onFatal: (error) => recorded.fatal.push(error),
    onEos: () => {
      recorded.eos++;
    },
    onElementMessage: (message) => recorded.elements.push(message),
  });
  loop.start();
  return { bus, loop, events, recorded };
}

async function teardown(loop: MainLoop, events: EventBus): Promise<void> {
  events.detach();
  loop.quit();
  await loop.join();
}

describe('EventBus', () => {
  it('should turn error messages into fatal engine errors', async () => {
    const { bus, loop, events, recorded } = setup();
    events.attach();

    bus.post({ type: 'error', source: 'identity0', code: 1, message: 'Failed after iterations as requested.', debug: 'identity0: error-after=2' });
    await waitFor(() => recorded.fatal.length === 1);

    const [error] = recorded.fatal;
    assert.ok(error instanceof EngineError);
    assert.strictEqual(error.code, 'ERR_ENGINE');
    assert.strictEqual(error.engineCode, 1);
    assert.strictEqual(error.message, 'Failed after iterations as requested.');
    assert.strictEqual(error.debug, 'identity0: error-after=2');
    await teardown(loop, events);
  });

  it('should report end-of-stream', async () => {
    const { bus, loop, events, recorded } = setup();
    events.attach();

    bus.post({ type: 'eos', source: 'pipeline0' });
    await waitFor(() => recorded.eos === 1);
    assert.strictEqual(recorded.fatal.length, 0);
    await teardown(loop, events);
  });

  it('should only log warnings and state changes', async () => {
    const { bus, loop, events, recorded } = setup();
    events.attach();

    bus.post({ type: 'warning', source: 'queue0', message: 'running late', debug: null });
    bus.post({ type: 'state-changed', source: 'pipeline0', oldState: 'null', newState: 'ready', pending: null });
    bus.post({ type: 'eos', source: 'pipeline0' });

    await waitFor(() => recorded.eos === 1);
    assert.strictEqual(recorded.fatal.length, 0);
    assert.strictEqual(recorded.elements.length, 0);
    await teardown(loop, events);
  });

  it('should forward element messages to the hook', async () => {
    const { bus, loop, events, recorded } = setup();
    events.attach();

    bus.post({ type: 'element', source: 'level0', name: 'level', fields: { rms: -20, peak: true } });
    await waitFor(() => recorded.elements.length === 1);
    assert.deepStrictEqual(recorded.elements[0].fields, { rms: -20, peak: true });
    await teardown(loop, events);
  });

  it('should stop receiving after detach', async () => {
    const { bus, loop, events, recorded } = setup();
    events.attach();
    events.attach();
    assert.strictEqual(events.isAttached, true);

    events.detach();
    assert.strictEqual(events.isAttached, false);
    bus.post({ type: 'eos', source: 'pipeline0' });
    await sleep(20);
    assert.strictEqual(recorded.eos, 0);
    await teardown(loop, events);
  });

  it('should drop messages once the loop quit', async () => {
    const { bus, loop, events, recorded } = setup();
    events.attach();
    loop.quit();
    await loop.join();

    bus.post({ type: 'eos', source: 'pipeline0' });
    await sleep(20);
    assert.strictEqual(recorded.eos, 0);
    events.detach();
  });
});

describe('MainLoop', () => {
  it('should run tasks one at a time, in order', async () => {
    const loop = new MainLoop();
    const order: string[] = [];
    loop.start();

    loop.invoke(async () => {
      order.push('a:start');
      await sleep(10);
      order.push('a:end');
    });
    loop.invoke(() => {
      order.push('b');
    });

    await waitFor(() => order.length === 3);
    assert.deepStrictEqual(order, ['a:start', 'a:end', 'b']);
    loop.quit();
    await loop.join();
  });

  it('should keep running after a task throws', async () => {
    const loop = new MainLoop();
    let ran = false;
    loop.start();

    loop.invoke(() => {
      throw new Error('task failed');
    });
    loop.invoke(() => {
      ran = true;
    });

    await waitFor(() => ran);
    loop.quit();
    await loop.join();
  });

  it('should finish queued tasks before quitting and refuse new ones', async () => {
    const loop = new MainLoop();
    let count = 0;
    loop.invoke(() => {
      count++;
    });
    loop.start();
    loop.quit();

    assert.strictEqual(loop.invoke(() => {
      count++;
    }), false);
    await loop.join();
    assert.strictEqual(count, 1);
    assert.strictEqual(loop.isRunning, false);
  });

  it('should join at once when never started', async () => {
    await new MainLoop().join();
  });
});
