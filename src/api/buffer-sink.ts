import { DEFAULT_QUEUE_SIZE } from '../constants/constants.js';
import { FormatError } from '../lib/error.js';
import { decodeBuffer, resolveFormat } from '../lib/format-descriptor.js';
import { createLogger } from '../lib/logger.js';
import { BackpressureQueue } from './utilities/backpressure-queue.js';

import type { AppSinkElement, FlowReturn, Sample } from '../engine/types.js';
import type { Caps } from '../lib/caps.js';
import type { FormatDescriptor } from '../lib/format-descriptor.js';
import type { SampleBuffer } from '../lib/types.js';

const log = createLogger('BufferSink');

/**
 * Options for {@link BufferSink}.
 */
export interface BufferSinkOptions {
  /**
   * Queue capacity.
   *
   * @default 100
   */
  queueSize?: number;

  /**
   * Evict the oldest buffer instead of blocking the engine when full.
   *
   * @default false
   */
  leaky?: boolean;

  onDrop?: (queue: BackpressureQueue<SampleBuffer>, buffer: SampleBuffer) => void;
}

/**
 * Receives samples from an appsink element and queues them decoded.
 *
 * The format descriptor is resolved once, from the first sample whose caps
 * can be resolved (or from the element's negotiated caps). Samples arriving
 * before that are skipped.
 *
 * @example
 * ```typescript
 * const sink = new BufferSink(appsink, { queueSize: 10, leaky: true });
 * sink.attach();
 *
 * const buffer = await sink.pop(100, () => pipeline.isActive);
 * ```
 */
export class BufferSink {
  readonly element: AppSinkElement;
  private queue: BackpressureQueue<SampleBuffer>;
  private descriptor: FormatDescriptor | null = null;

  /**
   * @throws {ConfigurationError} If the queue size is not a positive integer
   */
  constructor(element: AppSinkElement, options: BufferSinkOptions = {}) {
    this.element = element;
    this.queue = new BackpressureQueue<SampleBuffer>(options.queueSize ?? DEFAULT_QUEUE_SIZE, {
      policy: options.leaky ? 'leaky' : 'block',
      onDrop: options.onDrop,
    });
  }

  /**
   * Resolved format of the received buffers, or null before negotiation.
   */
  get caps(): FormatDescriptor | null {
    return this.descriptor ?? this.resolve(this.element.getCaps());
  }

  /**
   * Buffers waiting to be popped.
   */
  get queueSize(): number {
    return this.queue.size;
  }

  /**
   * Buffers evicted by the leaky policy so far.
   */
  get dropped(): number {
    return this.queue.dropped;
  }

  get isClosed(): boolean {
    return this.queue.isClosed;
  }

  /**
   * Install the new-sample callback on the element.
   */
  attach(): void {
    this.element.setCallback((sample) => this.onSample(sample));
  }

  /**
   * Remove the new-sample callback.
   */
  detach(): void {
    this.element.setCallback(null);
  }

  /**
   * Handle one sample from the engine.
   *
   * @returns `ok` when queued or skipped, `error` when the bytes do not fit the format, `flushing` once closed
   *
   * @internal
   */
  async onSample(sample: Sample): Promise<FlowReturn> {
    const descriptor = this.descriptor ?? this.resolve(sample.caps ?? this.element.getCaps());
    if (!descriptor) {
      log.debug('Skipping buffer received before its format was resolved', { offset: sample.buffer.offset });
      return 'ok';
    }

    let buffer: SampleBuffer;
    try {
      buffer = decodeBuffer(sample.buffer, descriptor);
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error;
      }
      log.error(`Cannot decode buffer: ${error.message}`, { size: sample.buffer.data.byteLength, format: descriptor.format });
      return 'error';
    }

    return (await this.queue.put(buffer)) ? 'ok' : 'flushing';
  }

  /**
   * Wait for the next buffer.
   *
   * Keeps polling in `timeout` slices while `isActive()` holds or buffers remain.
   * Once inactive it waits one more slice, unless the queue was closed.
   *
   * @param timeout - Wait per attempt in milliseconds
   *
   * @param isActive - Whether more buffers may still arrive
   *
   * @returns Next buffer, or null once inactive and drained
   */
  async pop(timeout: number, isActive: () => boolean): Promise<SampleBuffer | null> {
    while (isActive() || this.queue.size > 0) {
      const buffer = await this.queue.get(timeout);
      if (buffer) {
        return buffer;
      }
      if (this.queue.isClosed) {
        return null;
      }
    }

    // Shutdown has begun but the queue is still open: in-flight buffers may land
    return this.queue.isClosed ? null : this.queue.get(timeout);
  }

  /**
   * Stop accepting buffers. Queued buffers can still be popped.
   */
  close(): void {
    this.queue.close();
  }

  private resolve(caps: Caps | null): FormatDescriptor | null {
    if (!caps) {
      return null;
    }
    try {
      this.descriptor = resolveFormat(caps);
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error;
      }
      log.warn(`Cannot resolve caps '${caps.toString()}': ${error.message}`);
      return null;
    }
    log.debug('Resolved sink format', { caps: caps.toString() });
    return this.descriptor;
  }
}
