import { CLOCK_TIME_NONE, NSECONDS_PER_SECOND } from '../constants/constants.js';
import { ConfigurationError, FormatError } from '../lib/error.js';
import { resolveFormat, samplesPerChannel, shapeOf } from '../lib/format-descriptor.js';
import { createLogger } from '../lib/logger.js';
import { encodeArray, shapeEquals, squeezeChannels } from '../lib/ndarray.js';

import type { AppSrcElement, FlowReturn } from '../engine/types.js';
import type { Caps } from '../lib/caps.js';
import type { AudioDescriptor, FormatDescriptor, VideoDescriptor } from '../lib/format-descriptor.js';
import type { NDArray, RawBuffer } from '../lib/types.js';

const log = createLogger('BufferSource');

/**
 * Feeds typed arrays into an appsrc element.
 *
 * Buffers are timestamped from the source format: video frames advance by
 * one frame duration of the framerate, audio blocks by their sample count.
 *
 * @example
 * ```typescript
 * const source = new BufferSource(appsrc);
 * source.setCaps(makeVideoCaps({ width: 320, height: 240, framerate: 10, format: 'RGB' }));
 *
 * await source.push(zeros('uint8', [240, 320, 3])); // pts 0
 * await source.push(zeros('uint8', [240, 320, 3])); // pts 100000000
 * ```
 */
export class BufferSource {
  readonly element: AppSrcElement;
  private descriptor: FormatDescriptor | null = null;
  private frames = 0n;
  private samples = 0n;

  /**
   * @throws {FormatError} If the element already carries caps that cannot be resolved
   */
  constructor(element: AppSrcElement) {
    this.element = element;
    const caps = element.getCaps();
    if (caps) {
      this.descriptor = resolveFormat(caps);
    }
  }

  /**
   * Format of the pushed buffers, or null while unset.
   */
  get caps(): FormatDescriptor | null {
    return this.descriptor;
  }

  /**
   * Number of buffers pushed so far.
   */
  get pushed(): number {
    return Number(this.frames);
  }

  /**
   * Set the source format. Caps cannot change once set.
   *
   * @param caps - Raw video or audio caps
   *
   * @returns false if caps were already set
   *
   * @throws {FormatError} If the caps cannot be resolved or carry the variable framerate `0/1`
   */
  setCaps(caps: Caps): boolean {
    if (this.descriptor) {
      log.warn('Source caps are already set', { element: this.element.name });
      return false;
    }
    if (caps.getFraction('framerate')?.isZero) {
      throw new FormatError('Pushed frames cannot be timestamped at a variable framerate (0/1)');
    }
    const descriptor = resolveFormat(caps);
    this.element.setCaps(caps);
    this.descriptor = descriptor;
    return true;
  }

  /**
   * Push one array into the graph.
   *
   * Resolves once the engine accepted or refused the buffer.
   *
   * @param array - Frame `(height, width, channels)` or audio block `(samples, channels)`; a single channel may be squeezed away
   *
   * @returns Flow result reported by the engine
   *
   * @throws {ConfigurationError} If no caps were set
   *
   * @throws {FormatError} If the element type or shape does not match the caps
   */
  async push(array: NDArray): Promise<FlowReturn> {
    const descriptor = this.descriptor;
    if (!descriptor) {
      throw new ConfigurationError('Source caps are not set; pass sourceCaps or call setSourceVideoCaps() first');
    }
    if (array.elementType !== descriptor.elementType) {
      throw new FormatError(`Expected ${descriptor.elementType} data for ${descriptor.format}, got ${array.elementType}`);
    }

    const shape = shapeOf(descriptor, array.data.byteLength);
    if (!shapeEquals(array.shape, shape) && !shapeEquals(array.shape, squeezeChannels(shape))) {
      throw new FormatError(`Expected shape (${shape.join(', ')}), got (${array.shape.join(', ')})`);
    }

    const data = encodeArray(array);
    const buffer = descriptor.kind === 'video' ? this.videoBuffer(descriptor, data) : this.audioBuffer(descriptor, data);

    const flow = await this.element.pushSample({ buffer, caps: this.element.getCaps() });
    if (flow !== 'ok') {
      log.debug(`Push returned '${flow}'`, { offset: buffer.offset });
    }
    return flow;
  }

  private videoBuffer(descriptor: VideoDescriptor, data: Uint8Array): RawBuffer {
    const index = this.frames++;
    const { framerate } = descriptor;
    return {
      data,
      pts: framerate ? framerate.timestampOf(index) : CLOCK_TIME_NONE,
      dts: CLOCK_TIME_NONE,
      duration: framerate ? framerate.frameDuration() : CLOCK_TIME_NONE,
      offset: index,
    };
  }

  private audioBuffer(descriptor: AudioDescriptor, data: Uint8Array): RawBuffer {
    this.frames++;
    const rate = BigInt(descriptor.rate);
    const start = this.samples;
    const end = start + BigInt(samplesPerChannel(descriptor, data.byteLength));
    this.samples = end;

    const pts = (start * NSECONDS_PER_SECOND) / rate;
    return {
      data,
      pts,
      dts: CLOCK_TIME_NONE,
      duration: (end * NSECONDS_PER_SECOND) / rate - pts,
      offset: start,
    };
  }
}
