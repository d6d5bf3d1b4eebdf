import { AUDIO_RAW, VIDEO_RAW } from '../constants/constants.js';
import { isAudioFormat } from './audio-format.js';
import { FormatError } from './error.js';
import { Rational } from './rational.js';
import { isVideoFormat } from './video-format.js';

import type { RationalLike } from './rational.js';
import type { IDimension } from './types.js';

/**
 * Value of a single caps field.
 */
export type CapsValue = string | number | Rational;

const TYPED_VALUE_RE = /^\((\w+)\)\s*(.*)$/;
const INT_RE = /^-?\d+$/;
const FRACTION_RE = /^\d+\s*\/\s*\d+$/;

function unquote(text: string): string {
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    return text.slice(1, -1);
  }
  return text;
}

function parseValue(field: string, raw: string): CapsValue {
  const typed = TYPED_VALUE_RE.exec(raw);
  if (typed) {
    const [, type, value] = typed;
    switch (type) {
      case 'int':
      case 'i':
        if (!INT_RE.test(value)) {
          throw new FormatError(`Caps field '${field}' is not an int: '${value}'`);
        }
        return Number(value);
      case 'fraction':
        return Rational.parseFraction(value);
      case 'string':
      case 's':
        return unquote(value);
      default:
        throw new FormatError(`Unsupported caps value type '${type}' for field '${field}'`);
    }
  }

  if (FRACTION_RE.test(raw)) {
    return Rational.parseFraction(raw);
  }
  if (INT_RE.test(raw)) {
    return Number(raw);
  }
  return unquote(raw);
}

function formatValue(value: CapsValue): string {
  if (value instanceof Rational) {
    return `(fraction)${value.toString()}`;
  }
  if (typeof value === 'number') {
    return `(int)${value}`;
  }
  return `(string)${value}`;
}

function sameValue(a: CapsValue, b: CapsValue): boolean {
  if (a instanceof Rational && b instanceof Rational) {
    return a.equals(b);
  }
  return a === b;
}

/**
 * Media type plus a set of named fields, describing a buffer format.
 *
 * @example
 * ```typescript
 * const caps = Caps.fromString('video/x-raw,format=RGB,width=320,height=240,framerate=30/1');
 * caps.getInt('width');          // 320
 * caps.getFraction('framerate'); // Rational 30/1
 * caps.toString();
 * // 'video/x-raw, format=(string)RGB, width=(int)320, height=(int)240, framerate=(fraction)30/1'
 * ```
 */
export class Caps {
  readonly name: string;
  private fields: ReadonlyMap<string, CapsValue>;

  /**
   * @param name - Media type, e.g. `video/x-raw`
   *
   * @param fields - Field values in insertion order
   */
  constructor(name: string, fields: Iterable<[string, CapsValue]> = []) {
    if (!/^[\w-]+\/[\w.+-]+$/.test(name)) {
      throw new FormatError(`Invalid caps media type '${name}'`);
    }
    this.name = name;
    this.fields = new Map(fields);
  }

  /**
   * Parse a caps string.
   *
   * Accepts plain (`width=320`) and typed (`width=(int)320`) values.
   *
   * @param text - Caps string
   *
   * @returns Parsed caps
   *
   * @throws {FormatError} If the string cannot be parsed
   */
  static fromString(text: string): Caps {
    const parts = text
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    if (parts.length === 0) {
      throw new FormatError('Empty caps string');
    }

    const [name, ...rest] = parts;
    const fields: [string, CapsValue][] = [];
    for (const part of rest) {
      const eq = part.indexOf('=');
      if (eq <= 0) {
        throw new FormatError(`Malformed caps field '${part}' in '${text}'`);
      }
      const field = part.slice(0, eq).trim();
      fields.push([field, parseValue(field, part.slice(eq + 1).trim())]);
    }
    return new Caps(name, fields);
  }

  /**
   * Whether this describes raw video.
   */
  get isVideo(): boolean {
    return this.name === VIDEO_RAW;
  }

  /**
   * Whether this describes raw audio.
   */
  get isAudio(): boolean {
    return this.name === AUDIO_RAW;
  }

  has(field: string): boolean {
    return this.fields.has(field);
  }

  get(field: string): CapsValue | undefined {
    return this.fields.get(field);
  }

  /**
   * Integer field value, or null when missing or not an integer.
   */
  getInt(field: string): number | null {
    const value = this.fields.get(field);
    return typeof value === 'number' ? value : null;
  }

  /**
   * String field value, or null when missing or not a string.
   */
  getString(field: string): string | null {
    const value = this.fields.get(field);
    return typeof value === 'string' ? value : null;
  }

  /**
   * Fraction field value, or null when missing or not a fraction.
   */
  getFraction(field: string): Rational | null {
    const value = this.fields.get(field);
    return value instanceof Rational ? value : null;
  }

  entries(): IterableIterator<[string, CapsValue]> {
    return this.fields.entries();
  }

  /**
   * Copy with some fields replaced or added.
   */
  with(fields: Record<string, CapsValue>): Caps {
    return new Caps(this.name, [...this.fields, ...Object.entries(fields)]);
  }

  /**
   * Common subset of two caps.
   *
   * @returns Merged caps, or null when media types or any shared field differ
   */
  intersect(other: Caps): Caps | null {
    if (this.name !== other.name) {
      return null;
    }
    const merged = new Map(this.fields);
    for (const [field, value] of other.entries()) {
      const existing = merged.get(field);
      if (existing !== undefined && !sameValue(existing, value)) {
        return null;
      }
      merged.set(field, value);
    }
    return new Caps(this.name, merged);
  }

  equals(other: Caps): boolean {
    if (this.name !== other.name || this.fields.size !== other.fields.size) {
      return false;
    }
    for (const [field, value] of this.fields) {
      const theirs = other.get(field);
      if (theirs === undefined || !sameValue(value, theirs)) {
        return false;
      }
    }
    return true;
  }

  toString(): string {
    const fields = [...this.fields].map(([field, value]) => `${field}=${formatValue(value)}`);
    return [this.name, ...fields].join(', ');
  }
}

/**
 * Parameters of raw video caps.
 */
export interface VideoCapsOptions extends IDimension {
  framerate: RationalLike;
  format: string;
}

/**
 * Parameters of raw audio caps.
 */
export interface AudioCapsOptions {
  rate: number;
  channels: number;
  format: string;
}

function requirePositiveInt(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new FormatError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Build raw video caps.
 *
 * @param options - Width, height, framerate and format
 *
 * @returns Caps such as `video/x-raw, format=(string)RGB, width=(int)320, height=(int)240, framerate=(fraction)10/1`
 *
 * @throws {FormatError} If the format is unknown, a dimension is not a positive integer, or the framerate is malformed or zero
 *
 * @example
 * ```typescript
 * const caps = makeVideoCaps({ width: 320, height: 240, framerate: 10, format: 'GRAY8' });
 * ```
 */
export function makeVideoCaps(options: VideoCapsOptions): Caps {
  requirePositiveInt('width', options.width);
  requirePositiveInt('height', options.height);
  if (!isVideoFormat(options.format)) {
    throw new FormatError(`Unknown video format '${options.format}'`);
  }
  return new Caps(VIDEO_RAW, [
    ['format', options.format],
    ['width', options.width],
    ['height', options.height],
    ['framerate', Rational.parse(options.framerate)],
  ]);
}

/**
 * Build raw, interleaved audio caps.
 *
 * @throws {FormatError} If the format is unknown or rate / channels are not positive integers
 */
export function makeAudioCaps(options: AudioCapsOptions): Caps {
  requirePositiveInt('rate', options.rate);
  requirePositiveInt('channels', options.channels);
  if (!isAudioFormat(options.format)) {
    throw new FormatError(`Unknown audio format '${options.format}'`);
  }
  return new Caps(AUDIO_RAW, [
    ['format', options.format],
    ['layout', 'interleaved'],
    ['rate', options.rate],
    ['channels', options.channels],
  ]);
}
