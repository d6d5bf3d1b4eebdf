import assert from 'node:assert';
import { describe, it } from 'node:test';

import { CLOCK_TIME_NONE } from '../src/constants/constants.js';
import { AppSink, AppSrc, StreamErrorCode } from '../src/engine/elements.js';
import { MemoryBus, MemoryEngine } from '../src/engine/memory-engine.js';
import { Caps } from '../src/lib/caps.js';
import { ConfigurationError } from '../src/lib/error.js';
import { prepareTestEnvironment, sleep, waitFor } from './index.js';

import type { MemoryGraph } from '../src/engine/memory-engine.js';
import type { BusMessage, Sample } from '../src/engine/types.js';

prepareTestEnvironment();

function collectMessages(graph: MemoryGraph): BusMessage[] {
  const messages: BusMessage[] = [];
  graph.bus.addWatch((message) => messages.push(message));
  return messages;
}

function appSink(graph: MemoryGraph, name = 'appsink0'): AppSink {
  const element = graph.getByName(name);
  assert.ok(element instanceof AppSink);
  return element;
}

function appSrc(graph: MemoryGraph, name = 'appsrc0'): AppSrc {
  const element = graph.getByName(name);
  assert.ok(element instanceof AppSrc);
  return element;
}

async function dispose(graph: MemoryGraph): Promise<void> {
  await graph.setState('null');
  graph.release();
}

describe('MemoryEngine', () => {
  describe('parseLaunch', () => {
    it('should name graphs and elements by factory and index', () => {
      const engine = new MemoryEngine();
      const first = engine.parseLaunch('videotestsrc ! video/x-raw,format=GRAY8 ! queue ! appsink');
      const second = engine.parseLaunch('audiotestsrc ! fakesink');

      assert.strictEqual(first.name, 'pipeline0');
      assert.strictEqual(second.name, 'pipeline1');
      assert.deepStrictEqual(
        first.elements.map((element) => element.name),
        ['videotestsrc0', 'capsfilter0', 'queue0', 'appsink0'],
      );
      assert.strictEqual(first.getState(), 'null');
      first.release();
      second.release();
    });

    it('should honour explicit names and typed properties', () => {
      const graph = new MemoryEngine().parseLaunch('videotestsrc name=camera num-buffers=5 is-live=true ! fakesink name=out');
      const source = graph.getByName('camera');
      assert.ok(source);
      assert.strictEqual(source.factory, 'videotestsrc');
      assert.strictEqual(source.getProperty('name'), 'camera');
      assert.strictEqual(source.getProperty('num-buffers'), 5);
      assert.strictEqual(source.getProperty('is-live'), true);
      assert.strictEqual(source.getProperty('pattern'), 'black');
      assert.ok(graph.getByName('out'));
      assert.strictEqual(graph.getByName('fakesink0'), null);
      graph.release();
    });

    it('should reject unknown elements, properties and values', () => {
      const engine = new MemoryEngine();
      assert.throws(() => engine.parseLaunch('nosuchsrc ! fakesink'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('videotestsrc volume=3 ! fakesink'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('videotestsrc num-buffers=many ! fakesink'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('videotestsrc pattern=snow ! fakesink'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('appsrc caps=notcaps ! appsink'), ConfigurationError);
    });

    it('should reject endpoint properties it would not honour', () => {
      const engine = new MemoryEngine();
      assert.throws(() => engine.parseLaunch('videotestsrc ! appsink drop=true max-buffers=1'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('videotestsrc ! appsink sync=false'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('appsrc is-live=true block=true ! fakesink'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('appsrc format=time ! fakesink'), ConfigurationError);
    });

    it('should reject chains that do not run from a source to a sink', () => {
      const engine = new MemoryEngine();
      assert.throws(() => engine.parseLaunch('videotestsrc ! queue'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('queue ! fakesink'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('videotestsrc ! fakesink ! fakesink'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('videotestsrc ! appsrc ! fakesink'), ConfigurationError);
      assert.throws(() => engine.parseLaunch('videotestsrc name=a ! fakesink name=a'), ConfigurationError);
    });
  });

  describe('negotiation', () => {
    it('should fixate source caps against downstream constraints', async () => {
      const graph = new MemoryEngine().parseLaunch('videotestsrc ! video/x-raw,format=GRAY8,width=64,height=48 ! appsink');
      assert.strictEqual(await graph.setState('paused'), 'success');
      assert.strictEqual(appSink(graph).getCaps()?.toString(), 'video/x-raw, format=(string)GRAY8, width=(int)64, height=(int)48, framerate=(fraction)30/1');
      await dispose(graph);
      assert.strictEqual(appSink(graph).getCaps(), null);
    });

    it('should fail the state change and post not-negotiated on conflicting caps', async () => {
      const graph = new MemoryEngine().parseLaunch('audiotestsrc ! video/x-raw ! fakesink');
      const messages = collectMessages(graph);

      assert.strictEqual(await graph.setState('playing'), 'failure');
      assert.strictEqual(graph.getState(), 'ready');

      await waitFor(() => messages.some((message) => message.type === 'error'));
      const error = messages.find((message) => message.type === 'error');
      assert.ok(error?.type === 'error');
      assert.strictEqual(error.code, StreamErrorCode.NOT_NEGOTIATED);
      assert.strictEqual(error.source, 'audiotestsrc0');
      await dispose(graph);
    });

    it('should post state changes step by step', async () => {
      const graph = new MemoryEngine().parseLaunch('audiotestsrc num-buffers=0 ! fakesink');
      const messages = collectMessages(graph);
      await graph.setState('paused');
      await waitFor(() => messages.length >= 2);

      const changes = messages.flatMap((message) => (message.type === 'state-changed' ? [`${message.oldState}->${message.newState}`] : []));
      assert.deepStrictEqual(changes, ['null->ready', 'ready->paused']);
      await dispose(graph);
    });
  });

  describe('streaming', () => {
    it('should deliver num-buffers frames with framerate timing, then post eos', async () => {
      const graph = new MemoryEngine().parseLaunch('videotestsrc num-buffers=3 ! appsink');
      const messages = collectMessages(graph);
      const samples: Sample[] = [];
      appSink(graph).setCallback(async (sample) => {
        samples.push(sample);
        return 'ok';
      });

      assert.strictEqual(await graph.setState('playing'), 'success');
      await waitFor(() => messages.some((message) => message.type === 'eos'));

      assert.strictEqual(samples.length, 3);
      assert.deepStrictEqual(
        samples.map((sample) => sample.buffer.pts),
        [0n, 33_333_333n, 66_666_666n],
      );
      assert.deepStrictEqual(
        samples.map((sample) => sample.buffer.offset),
        [0n, 1n, 2n],
      );
      assert.strictEqual(samples[0].buffer.duration, 33_333_333n);
      assert.strictEqual(samples[0].buffer.dts, CLOCK_TIME_NONE);
      assert.strictEqual(samples[0].buffer.data.byteLength, 320 * 240 * 3);
      await dispose(graph);
    });

    it('should time audio buffers from the sample count', async () => {
      const graph = new MemoryEngine().parseLaunch('audiotestsrc num-buffers=2 samplesperbuffer=800 ! audio/x-raw,rate=8000,channels=2 ! appsink');
      const messages = collectMessages(graph);
      const samples: Sample[] = [];
      appSink(graph).setCallback(async (sample) => {
        samples.push(sample);
        return 'ok';
      });

      await graph.setState('playing');
      await waitFor(() => messages.some((message) => message.type === 'eos'));

      assert.deepStrictEqual(
        samples.map(({ buffer }) => [buffer.pts, buffer.duration, buffer.offset]),
        [
          [0n, 100_000_000n, 0n],
          [100_000_000n, 100_000_000n, 800n],
        ],
      );
      assert.strictEqual(samples[0].buffer.data.byteLength, 800 * 2 * 2);
      await dispose(graph);
    });

    it('should post eos once, after every chain finished', async () => {
      const graph = new MemoryEngine().parseLaunch('videotestsrc num-buffers=1 ! fakesink audiotestsrc num-buffers=6 ! fakesink');
      const messages = collectMessages(graph);

      await graph.setState('playing');
      await waitFor(() => messages.some((message) => message.type === 'eos'));
      await sleep(20);

      assert.strictEqual(messages.filter((message) => message.type === 'eos').length, 1);
      await dispose(graph);
    });

    it('should end an unbounded source on an eos event', async () => {
      const graph = new MemoryEngine().parseLaunch('videotestsrc ! video/x-raw,width=4,height=4 ! fakesink');
      const messages = collectMessages(graph);

      await graph.setState('playing');
      await sleep(10);
      assert.strictEqual(await graph.sendEvent('eos'), true);
      await waitFor(() => messages.some((message) => message.type === 'eos'));
      await dispose(graph);
      assert.strictEqual(await graph.sendEvent('eos'), false);
    });

    it('should post an error from identity error-after', async () => {
      const graph = new MemoryEngine().parseLaunch('videotestsrc ! identity error-after=2 ! appsink');
      const messages = collectMessages(graph);
      let received = 0;
      appSink(graph).setCallback(async () => {
        received++;
        return 'ok';
      });

      await graph.setState('playing');
      await waitFor(() => messages.some((message) => message.type === 'error'));

      const error = messages.find((message) => message.type === 'error');
      assert.ok(error?.type === 'error');
      assert.strictEqual(error.source, 'identity0');
      assert.strictEqual(error.code, StreamErrorCode.FAILED);
      assert.strictEqual(received, 1);
      await dispose(graph);
    });

    it('should turn a throwing sink callback into an error message', async () => {
      const graph = new MemoryEngine().parseLaunch('videotestsrc num-buffers=5 ! appsink');
      const messages = collectMessages(graph);
      appSink(graph).setCallback(async () => {
        throw new Error('consumer broke');
      });

      await graph.setState('playing');
      await waitFor(() => messages.some((message) => message.type === 'error'));

      const error = messages.find((message) => message.type === 'error');
      assert.ok(error?.type === 'error');
      assert.strictEqual(error.source, 'appsink0');
      assert.strictEqual(error.debug, 'consumer broke');
      await dispose(graph);
    });
  });

  describe('appsrc', () => {
    const caps = Caps.fromString('video/x-raw,format=GRAY8,width=2,height=2');
    const frame = () => ({
      buffer: { data: new Uint8Array(4), pts: 0n, dts: CLOCK_TIME_NONE, duration: CLOCK_TIME_NONE, offset: 0n },
      caps,
    });

    it('should refuse samples unless playing', async () => {
      const graph = new MemoryEngine().parseLaunch('appsrc ! appsink');
      assert.strictEqual(await appSrc(graph).pushSample(frame()), 'flushing');
      await graph.setState('paused');
      assert.strictEqual(await appSrc(graph).pushSample(frame()), 'flushing');
      await dispose(graph);
    });

    it('should negotiate on the first sample and forward it', async () => {
      const graph = new MemoryEngine().parseLaunch('appsrc ! appsink');
      const samples: Sample[] = [];
      appSink(graph).setCallback(async (sample) => {
        samples.push(sample);
        return 'ok';
      });

      await graph.setState('playing');
      assert.strictEqual(appSink(graph).getCaps(), null);
      assert.strictEqual(await appSrc(graph).pushSample(frame()), 'ok');

      assert.strictEqual(samples.length, 1);
      assert.ok(appSink(graph).getCaps()?.equals(caps));
      await dispose(graph);
    });

    it('should post eos on end-of-stream and refuse later samples', async () => {
      const graph = new MemoryEngine().parseLaunch('appsrc ! appsink');
      const messages = collectMessages(graph);
      await graph.setState('playing');

      assert.strictEqual(await appSrc(graph).endOfStream(), 'ok');
      await waitFor(() => messages.some((message) => message.type === 'eos'));
      assert.strictEqual(await appSrc(graph).pushSample(frame()), 'eos');
      assert.strictEqual(await appSrc(graph).endOfStream(), 'eos');
      await dispose(graph);
    });

    it('should reject samples conflicting with the sink caps', async () => {
      const graph = new MemoryEngine().parseLaunch('appsrc ! appsink caps=video/x-raw,format=RGB');
      const messages = collectMessages(graph);
      await graph.setState('playing');

      assert.strictEqual(await appSrc(graph).pushSample(frame()), 'not-negotiated');
      await waitFor(() => messages.some((message) => message.type === 'error'));
      await dispose(graph);
    });
  });
});

describe('MemoryBus', () => {
  it('should deliver asynchronously and in order', async () => {
    const bus = new MemoryBus();
    const seen: string[] = [];
    bus.addWatch((message) => seen.push(message.source));

    bus.post({ type: 'eos', source: 'a' });
    bus.post({ type: 'eos', source: 'b' });
    assert.deepStrictEqual(seen, []);

    await waitFor(() => seen.length === 2);
    assert.deepStrictEqual(seen, ['a', 'b']);
  });

  it('should keep delivering when a watch throws', async () => {
    const bus = new MemoryBus();
    let delivered = 0;
    bus.addWatch(() => {
      throw new Error('watch failed');
    });
    bus.addWatch(() => {
      delivered++;
    });

    bus.post({ type: 'eos', source: 'a' });
    await waitFor(() => delivered === 1);
  });

  it('should ignore messages after close and stop removed watches', async () => {
    const bus = new MemoryBus();
    let delivered = 0;
    const remove = bus.addWatch(() => {
      delivered++;
    });

    remove();
    bus.post({ type: 'eos', source: 'a' });
    await sleep(10);
    assert.strictEqual(delivered, 0);

    bus.addWatch(() => {
      delivered++;
    });
    bus.close();
    bus.post({ type: 'eos', source: 'a' });
    await sleep(10);
    assert.strictEqual(delivered, 0);
  });
});
