import assert from 'node:assert';
import { describe, it } from 'node:test';

import { BufferSink } from '../src/api/buffer-sink.js';
import { CLOCK_TIME_NONE } from '../src/constants/constants.js';
import { Caps } from '../src/lib/caps.js';
import { ConfigurationError } from '../src/lib/error.js';
import { prepareTestEnvironment, sleep } from './index.js';

import type { AppSinkElement, NewSampleCallback, PropertyValue, Sample } from '../src/engine/types.js';

prepareTestEnvironment();

const GRAY = Caps.fromString('video/x-raw,format=GRAY8,width=2,height=2');
const RGB = Caps.fromString('video/x-raw,format=RGB,width=2,height=1');

class FakeAppSink implements AppSinkElement {
  readonly name = 'appsink0';
  readonly factory = 'appsink';
  callback: NewSampleCallback | null = null;
  negotiated: Caps | null = null;

  getProperty(name: string): PropertyValue | undefined {
    return name === 'name' ? this.name : undefined;
  }

  setProperty(): void {}

  getCaps(): Caps | null {
    return this.negotiated;
  }

  setCallback(callback: NewSampleCallback | null): void {
    this.callback = callback;
  }
}

function sample(bytes: number[], caps: Caps | null, offset = 0n): Sample {
  return {
    buffer: { data: new Uint8Array(bytes), pts: offset * 10n, dts: CLOCK_TIME_NONE, duration: 10n, offset },
    caps,
  };
}

describe('BufferSink', () => {
  it('should reject a bad queue size', () => {
    assert.throws(() => new BufferSink(new FakeAppSink(), { queueSize: 0 }), ConfigurationError);
  });

  it('should install and remove the element callback', () => {
    const element = new FakeAppSink();
    const sink = new BufferSink(element);
    sink.attach();
    assert.ok(element.callback);
    sink.detach();
    assert.strictEqual(element.callback, null);
  });

  it('should resolve caps from the first sample and decode it', async () => {
    const sink = new BufferSink(new FakeAppSink());
    assert.strictEqual(sink.caps, null);

    assert.strictEqual(await sink.onSample(sample([1, 2, 3, 4], GRAY, 3n)), 'ok');
    assert.strictEqual(sink.caps?.format, 'GRAY8');
    assert.strictEqual(sink.queueSize, 1);

    const buffer = await sink.pop(10, () => true);
    assert.ok(buffer);
    assert.deepStrictEqual(buffer.data.shape, [2, 2]);
    assert.deepStrictEqual([...buffer.data.data], [1, 2, 3, 4]);
    assert.strictEqual(buffer.pts, 30n);
    assert.strictEqual(buffer.offset, 3n);
    assert.strictEqual(buffer.dts, CLOCK_TIME_NONE);
  });

  it('should fall back to the element caps', async () => {
    const element = new FakeAppSink();
    element.negotiated = RGB;
    const sink = new BufferSink(element);

    assert.strictEqual(sink.caps?.kind, 'video');
    assert.strictEqual(await sink.onSample(sample([1, 2, 3, 4, 5, 6], null)), 'ok');
    const buffer = await sink.pop(10, () => true);
    assert.deepStrictEqual(buffer?.data.shape, [1, 2, 3]);
  });

  it('should decode frames negotiated at a variable framerate', async () => {
    const sink = new BufferSink(new FakeAppSink());
    const caps = Caps.fromString('video/x-raw,format=GRAY8,width=2,height=2,framerate=0/1');

    assert.strictEqual(await sink.onSample(sample([1, 2, 3, 4], caps)), 'ok');
    assert.strictEqual(sink.caps?.kind === 'video' ? sink.caps.framerate : undefined, null);
    const buffer = await sink.pop(10, () => true);
    assert.deepStrictEqual(buffer?.data.shape, [2, 2]);
  });

  it('should skip samples while caps are unknown or unresolvable', async () => {
    const sink = new BufferSink(new FakeAppSink());

    assert.strictEqual(await sink.onSample(sample([1, 2, 3, 4], null)), 'ok');
    assert.strictEqual(await sink.onSample(sample([1, 2, 3, 4], Caps.fromString('video/x-raw,format=I420,width=2,height=2'))), 'ok');
    assert.strictEqual(sink.queueSize, 0);
    assert.strictEqual(sink.caps, null);
  });

  it('should report an error when the bytes do not fit the format', async () => {
    const sink = new BufferSink(new FakeAppSink());
    assert.strictEqual(await sink.onSample(sample([1, 2, 3], GRAY)), 'error');
    assert.strictEqual(sink.queueSize, 0);
  });

  it('should keep the newest buffers when leaky', async () => {
    const dropped: bigint[] = [];
    const sink = new BufferSink(new FakeAppSink(), {
      queueSize: 2,
      leaky: true,
      onDrop: (_queue, buffer) => dropped.push(buffer.offset),
    });

    for (const offset of [0n, 1n, 2n, 3n]) {
      assert.strictEqual(await sink.onSample(sample([0, 0, 0, 0], GRAY, offset)), 'ok');
    }
    assert.strictEqual(sink.dropped, 2);
    assert.deepStrictEqual(dropped, [0n, 1n]);

    assert.strictEqual((await sink.pop(10, () => true))?.offset, 2n);
    assert.strictEqual((await sink.pop(10, () => true))?.offset, 3n);
  });

  it('should hold the engine back when full and blocking', async () => {
    const sink = new BufferSink(new FakeAppSink(), { queueSize: 1 });
    await sink.onSample(sample([0, 0, 0, 0], GRAY, 0n));

    let settled = false;
    const pending = sink.onSample(sample([0, 0, 0, 0], GRAY, 1n)).then((flow) => {
      settled = true;
      return flow;
    });
    await sleep(20);
    assert.strictEqual(settled, false);

    assert.strictEqual((await sink.pop(10, () => true))?.offset, 0n);
    assert.strictEqual(await pending, 'ok');
    assert.strictEqual(sink.dropped, 0);
  });

  it('should return flushing once closed', async () => {
    const sink = new BufferSink(new FakeAppSink());
    sink.close();
    assert.strictEqual(sink.isClosed, true);
    assert.strictEqual(await sink.onSample(sample([0, 0, 0, 0], GRAY)), 'flushing');
  });

  describe('pop', () => {
    it('should drain queued buffers after the producer went inactive', async () => {
      const sink = new BufferSink(new FakeAppSink());
      await sink.onSample(sample([0, 0, 0, 0], GRAY, 0n));
      await sink.onSample(sample([0, 0, 0, 0], GRAY, 1n));
      sink.close();

      assert.strictEqual((await sink.pop(10, () => false))?.offset, 0n);
      assert.strictEqual((await sink.pop(10, () => false))?.offset, 1n);
      assert.strictEqual(await sink.pop(10, () => false), null);
    });

    it('should keep waiting while active', async () => {
      const sink = new BufferSink(new FakeAppSink());
      const pending = sink.pop(5, () => true);

      await sleep(30);
      await sink.onSample(sample([0, 0, 0, 0], GRAY, 7n));
      assert.strictEqual((await pending)?.offset, 7n);
    });

    it('should wait one more slice when inactive but still open', async () => {
      const sink = new BufferSink(new FakeAppSink());
      const start = Date.now();
      assert.strictEqual(await sink.pop(20, () => false), null);
      assert.ok(Date.now() - start >= 15);
    });

    it('should return null at once when closed and empty', async () => {
      const sink = new BufferSink(new FakeAppSink());
      sink.close();
      const start = Date.now();
      assert.strictEqual(await sink.pop(1000, () => true), null);
      assert.ok(Date.now() - start < 500);
    });
  });
});
