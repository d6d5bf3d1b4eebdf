import { readDataFile } from './data-file.js';
import { FormatError } from './error.js';

import type { ElementType } from './types.js';

/**
 * Static description of an audio sample format.
 */
export interface AudioFormatInfo {
  /** Format tag, e.g. `S16LE` */
  readonly name: string;

  /** Bits of storage per sample */
  readonly width: number;

  /** Significant bits per sample */
  readonly depth: number;

  readonly signed: boolean;
  readonly float: boolean;

  /** Element datatype of a decoded buffer */
  readonly elementType: ElementType;

  /** Bytes per element */
  readonly bytesPerElement: number;
}

interface AudioFormatEntry {
  name: string;
  width: number;
  depth: number;
  signed: boolean;
  float: boolean;
}

function isAudioFormatEntry(value: unknown): value is AudioFormatEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry.name === 'string' &&
    typeof entry.width === 'number' &&
    typeof entry.depth === 'number' &&
    typeof entry.signed === 'boolean' &&
    typeof entry.float === 'boolean'
  );
}

/**
 * Element datatype for an audio sample depth.
 *
 * 8 → int8, 16 → int16, anything else is exposed as raw bytes (uint8).
 *
 * @internal
 */
export function audioElementType(depth: number): ElementType {
  switch (depth) {
    case 8:
      return 'int8';
    case 16:
      return 'int16';
    default:
      return 'uint8';
  }
}

function loadAudioFormats(): ReadonlyMap<string, AudioFormatInfo> {
  const raw: unknown = readDataFile('audio-formats.json');
  if (!Array.isArray(raw)) {
    throw new Error('audio-formats.json must contain an array');
  }

  const formats = new Map<string, AudioFormatInfo>();
  for (const entry of raw) {
    if (!isAudioFormatEntry(entry)) {
      throw new Error(`Invalid entry in audio-formats.json: ${JSON.stringify(entry)}`);
    }
    const elementType = audioElementType(entry.depth);
    formats.set(
      entry.name,
      Object.freeze({
        ...entry,
        elementType,
        bytesPerElement: elementType === 'int16' ? 2 : 1,
      }),
    );
  }
  return formats;
}

const AUDIO_FORMATS = loadAudioFormats();

/**
 * Look up an audio sample format.
 *
 * @param format - Format tag, e.g. `S16LE`
 *
 * @returns Format description
 *
 * @throws {FormatError} If the format is unknown
 */
export function getAudioFormatInfo(format: string): AudioFormatInfo {
  const info = AUDIO_FORMATS.get(format);
  if (!info) {
    throw new FormatError(`Unknown audio format '${format}'`);
  }
  return info;
}

export function isAudioFormat(format: string): boolean {
  return AUDIO_FORMATS.has(format);
}

export function audioFormatNames(): string[] {
  return [...AUDIO_FORMATS.keys()];
}
