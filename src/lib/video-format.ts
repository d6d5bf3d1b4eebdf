import { readDataFile } from './data-file.js';
import { FormatError } from './error.js';

import type { ElementType } from './types.js';

/**
 * Video format flags, as listed in `data/video-formats.json`.
 */
export type VideoFormatFlag = 'yuv' | 'rgb' | 'gray' | 'alpha' | 'le';

const VIDEO_FORMAT_FLAGS: readonly VideoFormatFlag[] = ['yuv', 'rgb', 'gray', 'alpha', 'le'];

/**
 * Static description of a video format.
 */
export interface VideoFormatInfo {
  /** Format tag, e.g. `RGB` */
  readonly name: string;

  /** Format flags */
  readonly flags: readonly VideoFormatFlag[];

  /** Bits per component */
  readonly depth: number;

  /** Interleaved channel count, or null when the layout has none (planar YUV) */
  readonly channels: number | null;

  /** Element datatype of a decoded buffer */
  readonly elementType: ElementType;

  /** Bytes per element */
  readonly bytesPerElement: number;
}

interface VideoFormatEntry {
  name: string;
  flags: VideoFormatFlag[];
  depth: number;
}

function isVideoFormatFlag(value: unknown): value is VideoFormatFlag {
  return VIDEO_FORMAT_FLAGS.some((flag) => flag === value);
}

function isVideoFormatEntry(value: unknown): value is VideoFormatEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const entry: Record<string, unknown> = { ...value };
  return typeof entry.name === 'string' && typeof entry.depth === 'number' && Array.isArray(entry.flags) && entry.flags.every(isVideoFormatFlag);
}

/**
 * Channel count of a format from its flags.
 *
 * Priority: alpha → 4, rgb → 3, gray → 1. `BGRx` has no alpha flag
 * but is packed into 4 bytes per pixel, so it maps to 4 as well.
 *
 * @internal
 */
export function deriveChannels(name: string, flags: readonly VideoFormatFlag[]): number | null {
  if (name === 'BGRx') {
    return 4;
  }
  if (flags.includes('alpha')) {
    return 4;
  }
  if (flags.includes('rgb')) {
    return 3;
  }
  if (flags.includes('gray')) {
    return 1;
  }
  return null;
}

function loadVideoFormats(): ReadonlyMap<string, VideoFormatInfo> {
  const raw: unknown = readDataFile('video-formats.json');
  if (!Array.isArray(raw)) {
    throw new Error('video-formats.json must contain an array');
  }

  const formats = new Map<string, VideoFormatInfo>();
  for (const entry of raw) {
    if (!isVideoFormatEntry(entry)) {
      throw new Error(`Invalid entry in video-formats.json: ${JSON.stringify(entry)}`);
    }
    const elementType: ElementType = entry.depth === 16 ? 'uint16' : 'uint8';
    formats.set(
      entry.name,
      Object.freeze({
        name: entry.name,
        flags: Object.freeze([...entry.flags]),
        depth: entry.depth,
        channels: deriveChannels(entry.name, entry.flags),
        elementType,
        bytesPerElement: elementType === 'uint16' ? 2 : 1,
      }),
    );
  }
  return formats;
}

// Built once at module load; read-only afterwards
const VIDEO_FORMATS = loadVideoFormats();

/**
 * Look up a video format.
 *
 * @param format - Format tag, e.g. `RGB`, `GRAY8`
 *
 * @returns Format description
 *
 * @throws {FormatError} If the format is unknown
 *
 * @example
 * ```typescript
 * getVideoFormatInfo('RGBA').channels; // 4
 * ```
 */
export function getVideoFormatInfo(format: string): VideoFormatInfo {
  const info = VIDEO_FORMATS.get(format);
  if (!info) {
    throw new FormatError(`Unknown video format '${format}'`);
  }
  return info;
}

/**
 * Interleaved channel count of a video format.
 *
 * @throws {FormatError} If the format is unknown or has no interleaved channel layout
 */
export function getNumChannels(format: string): number {
  const { channels } = getVideoFormatInfo(format);
  if (channels === null) {
    throw new FormatError(`Video format '${format}' has no interleaved channel layout`);
  }
  return channels;
}

/**
 * Whether a format tag is known.
 */
export function isVideoFormat(format: string): boolean {
  return VIDEO_FORMATS.has(format);
}

/**
 * All known video format tags.
 */
export function videoFormatNames(): string[] {
  return [...VIDEO_FORMATS.keys()];
}
