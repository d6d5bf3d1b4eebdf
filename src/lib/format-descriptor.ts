import { AUDIO_RAW, VIDEO_RAW } from '../constants/constants.js';
import { getAudioFormatInfo } from './audio-format.js';
import { Caps } from './caps.js';
import { FormatError } from './error.js';
import { decodeBytes, squeezeChannels } from './ndarray.js';
import { getNumChannels, getVideoFormatInfo } from './video-format.js';

import type { Rational } from './rational.js';
import type { ElementType, RawBuffer, SampleBuffer } from './types.js';

/**
 * Resolved layout of raw video buffers.
 */
export interface VideoDescriptor {
  readonly kind: 'video';
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  readonly format: string;
  readonly elementType: ElementType;
  readonly bytesPerElement: number;

  /** Negotiated framerate; null when the caps carry none or the variable rate `0/1` */
  readonly framerate: Rational | null;
}

/**
 * Resolved layout of raw, interleaved audio buffers.
 *
 * The number of samples per channel is not negotiated; it follows
 * from each buffer's byte length.
 */
export interface AudioDescriptor {
  readonly kind: 'audio';
  readonly rate: number;
  readonly channels: number;
  readonly format: string;
  readonly elementType: ElementType;
  readonly bytesPerElement: number;

  /** Storage bytes per sample; a multiple of `bytesPerElement` (F32LE: 4 bytes of uint8) */
  readonly bytesPerSample: number;
}

export type FormatDescriptor = VideoDescriptor | AudioDescriptor;

function requireInt(caps: Caps, field: string): number {
  const value = caps.getInt(field);
  if (value === null || value <= 0) {
    throw new FormatError(`Caps '${caps.name}' lack a positive '${field}' field`);
  }
  return value;
}

function requireString(caps: Caps, field: string): string {
  const value = caps.getString(field);
  if (value === null) {
    throw new FormatError(`Caps '${caps.name}' lack a '${field}' field`);
  }
  return value;
}

/**
 * Resolve raw video caps.
 *
 * @throws {FormatError} If a field is missing or the format has no interleaved channel layout
 */
export function resolveVideoFormat(caps: Caps): VideoDescriptor {
  const width = requireInt(caps, 'width');
  const height = requireInt(caps, 'height');
  const format = requireString(caps, 'format');
  const info = getVideoFormatInfo(format);
  const framerate = caps.getFraction('framerate');

  const descriptor: VideoDescriptor = {
    kind: 'video',
    width,
    height,
    channels: getNumChannels(format),
    format,
    elementType: info.elementType,
    bytesPerElement: info.bytesPerElement,
    framerate: framerate && !framerate.isZero ? framerate : null,
  };
  return Object.freeze(descriptor);
}

/**
 * Resolve raw audio caps.
 *
 * @throws {FormatError} If a field is missing or the layout is not interleaved
 */
export function resolveAudioFormat(caps: Caps): AudioDescriptor {
  const rate = requireInt(caps, 'rate');
  const channels = requireInt(caps, 'channels');
  const format = requireString(caps, 'format');
  const layout = caps.getString('layout');
  if (layout !== null && layout !== 'interleaved') {
    throw new FormatError(`Unsupported audio layout '${layout}'`);
  }
  const info = getAudioFormatInfo(format);

  const descriptor: AudioDescriptor = {
    kind: 'audio',
    rate,
    channels,
    format,
    elementType: info.elementType,
    bytesPerElement: info.bytesPerElement,
    bytesPerSample: info.width / 8,
  };
  return Object.freeze(descriptor);
}

/**
 * Resolve negotiated caps into a format descriptor.
 *
 * @param caps - Negotiated caps
 *
 * @returns Video or audio descriptor
 *
 * @throws {FormatError} If the caps are not raw video/audio or cannot be resolved
 *
 * @example
 * ```typescript
 * const descriptor = resolveFormat(Caps.fromString('video/x-raw,format=RGB,width=320,height=240'));
 * shapeOf(descriptor, 0); // [240, 320, 3]
 * ```
 */
export function resolveFormat(caps: Caps): FormatDescriptor {
  if (caps.isVideo) {
    return resolveVideoFormat(caps);
  }
  if (caps.isAudio) {
    return resolveAudioFormat(caps);
  }
  throw new FormatError(`Unsupported caps '${caps.name}'`);
}

/**
 * Samples per channel in an audio buffer of `byteLength` bytes.
 *
 * @throws {FormatError} If the length is not a whole number of frames
 */
export function samplesPerChannel(descriptor: AudioDescriptor, byteLength: number): number {
  const frameBytes = descriptor.bytesPerSample * descriptor.channels;
  if (byteLength % frameBytes !== 0) {
    throw new FormatError(`Audio buffer of ${byteLength} bytes is not a multiple of ${frameBytes}-byte frames`);
  }
  return byteLength / frameBytes;
}

/**
 * Full shape of a buffer under a descriptor.
 *
 * Video: `(height, width, channels)`. Audio: `(elements, channels)`, which
 * is the sample count only where a sample fits one element.
 *
 * @param descriptor - Format descriptor
 *
 * @param byteLength - Buffer size, only used for audio
 */
export function shapeOf(descriptor: FormatDescriptor, byteLength: number): readonly number[] {
  if (descriptor.kind === 'video') {
    return [descriptor.height, descriptor.width, descriptor.channels];
  }
  const elementsPerSample = descriptor.bytesPerSample / descriptor.bytesPerElement;
  return [samplesPerChannel(descriptor, byteLength) * elementsPerSample, descriptor.channels];
}

/**
 * Shape of a decoded array, with a single channel squeezed away.
 */
export function arrayShapeOf(descriptor: FormatDescriptor, byteLength: number): readonly number[] {
  const shape = shapeOf(descriptor, byteLength);
  return descriptor.channels === 1 ? squeezeChannels(shape) : shape;
}

/**
 * Decode a raw engine buffer into a typed sample buffer.
 *
 * @throws {FormatError} If the byte length does not fit the descriptor
 */
export function decodeBuffer(buffer: RawBuffer, descriptor: FormatDescriptor): SampleBuffer {
  const shape = arrayShapeOf(descriptor, buffer.data.byteLength);
  return {
    data: decodeBytes(buffer.data, descriptor.elementType, shape),
    pts: buffer.pts,
    dts: buffer.dts,
    duration: buffer.duration,
    offset: buffer.offset,
  };
}

/**
 * Caps describing a descriptor, the inverse of {@link resolveFormat}.
 */
export function descriptorToCaps(descriptor: FormatDescriptor): Caps {
  if (descriptor.kind === 'video') {
    const fields = new Caps(VIDEO_RAW, [
      ['format', descriptor.format],
      ['width', descriptor.width],
      ['height', descriptor.height],
    ]);
    return descriptor.framerate ? fields.with({ framerate: descriptor.framerate }) : fields;
  }
  return new Caps(AUDIO_RAW, [
    ['format', descriptor.format],
    ['layout', 'interleaved'],
    ['rate', descriptor.rate],
    ['channels', descriptor.channels],
  ]);
}
