import { setImmediate as yieldToLoop, setTimeout as sleep } from 'node:timers/promises';

import { CLOCK_TIME_NONE, NSECONDS_PER_SECOND } from '../constants/constants.js';
import { getAudioFormatInfo } from '../lib/audio-format.js';
import { Caps, makeAudioCaps, makeVideoCaps } from '../lib/caps.js';
import { ConfigurationError, FormatError } from '../lib/error.js';
import { resolveVideoFormat } from '../lib/format-descriptor.js';
import { Rational } from '../lib/rational.js';

import type { RawBuffer } from '../lib/types.js';
import type { AppSinkElement, AppSrcElement, BusMessage, FlowReturn, GraphElement, GraphState, NewSampleCallback, PropertyValue, Sample } from './types.js';

/**
 * Error codes posted by the memory engine's elements.
 */
export enum StreamErrorCode {
  FAILED = 1,
  NOT_NEGOTIATED = 4,
  FORMAT = 11,
}

/**
 * What an element needs from the graph that owns it.
 *
 * @internal
 */
export interface ElementHost {
  getState(): GraphState;
  postMessage(message: BusMessage): void;
  sinkReachedEos(sink: MemoryElement): void;
}

type PropertyType = 'int' | 'boolean' | 'string' | 'caps';

interface PropertySpec {
  type: PropertyType;
  default: PropertyValue | null;
  values?: readonly string[];
}

export type ElementRole = 'source' | 'filter' | 'sink';

const INT_RE = /^-?\d+$/;

/**
 * Base class of all memory engine elements.
 *
 * Elements form singly linked chains; buffers travel downstream through
 * {@link receive}, end-of-stream through {@link eos}.
 */
export abstract class MemoryElement implements GraphElement {
  readonly name: string;
  readonly factory: string;
  abstract readonly role: ElementRole;
  downstream: MemoryElement | null = null;

  protected host: ElementHost;
  protected negotiatedCaps: Caps | null = null;
  private specs: Readonly<Record<string, PropertySpec>>;
  private properties = new Map<string, PropertyValue>();

  constructor(host: ElementHost, factory: string, name: string, specs: Record<string, PropertySpec>) {
    this.host = host;
    this.factory = factory;
    this.name = name;
    this.specs = specs;
  }

  getProperty(name: string): PropertyValue | undefined {
    if (name === 'name') {
      return this.name;
    }
    return this.properties.get(name) ?? this.specs[name]?.default ?? undefined;
  }

  /**
   * @throws {ConfigurationError} If the element has no such property or the value has the wrong type
   */
  setProperty(name: string, value: PropertyValue): void {
    const spec = this.specs[name];
    if (!spec) {
      throw new ConfigurationError(`No property '${name}' in element '${this.name}' (${this.factory})`);
    }
    this.properties.set(name, this.coerce(name, spec, value));
  }

  /**
   * Constraint this element puts on caps flowing through it, if any.
   */
  constraint(): Caps | null {
    return null;
  }

  /**
   * Accept caps for the buffers that follow.
   *
   * @returns false when the caps conflict with this element's constraint
   */
  acceptCaps(caps: Caps): boolean {
    const constraint = this.constraint();
    if (constraint && !constraint.intersect(caps)) {
      return false;
    }
    this.negotiatedCaps = caps;
    return true;
  }

  /**
   * Entry point for buffers pushed from upstream.
   */
  async receive(sample: Sample): Promise<FlowReturn> {
    const state = this.host.getState();
    if (state === 'null' || state === 'ready') {
      return 'flushing';
    }
    if (sample.caps && !(this.negotiatedCaps && sample.caps.equals(this.negotiatedCaps)) && !this.acceptCaps(sample.caps)) {
      this.postError(StreamErrorCode.NOT_NEGOTIATED, 'Internal data stream error.', `${this.name}: caps ${sample.caps.toString()} not accepted`);
      return 'not-negotiated';
    }
    return this.chain(sample);
  }

  /**
   * Handle end-of-stream from upstream.
   */
  async eos(): Promise<void> {
    await this.downstream?.eos();
  }

  /**
   * Forget per-stream state when the graph goes back to ready.
   */
  reset(): void {
    this.negotiatedCaps = null;
  }

  protected async chain(sample: Sample): Promise<FlowReturn> {
    return this.pushDownstream(sample);
  }

  protected async pushDownstream(sample: Sample): Promise<FlowReturn> {
    if (!this.downstream) {
      return 'ok';
    }
    return this.downstream.receive(sample);
  }

  protected postError(code: StreamErrorCode, message: string, debug: string | null = null): void {
    this.host.postMessage({ type: 'error', source: this.name, code, message, debug });
  }

  protected intProperty(name: string): number {
    const value = this.getProperty(name);
    return typeof value === 'number' ? value : 0;
  }

  protected booleanProperty(name: string): boolean {
    return this.getProperty(name) === true;
  }

  protected stringProperty(name: string): string {
    const value = this.getProperty(name);
    return typeof value === 'string' ? value : '';
  }

  protected capsProperty(name: string): Caps | null {
    const value = this.getProperty(name);
    return value instanceof Caps ? value : null;
  }

  private coerce(name: string, spec: PropertySpec, value: PropertyValue): PropertyValue {
    const invalid = () => new ConfigurationError(`Invalid value '${value.toString()}' for property '${name}' of '${this.name}'`);

    switch (spec.type) {
      case 'int':
        if (typeof value === 'number' && Number.isSafeInteger(value)) return value;
        if (typeof value === 'string' && INT_RE.test(value)) return Number(value);
        throw invalid();
      case 'boolean':
        if (typeof value === 'boolean') return value;
        if (value === 'true' || value === '1') return true;
        if (value === 'false' || value === '0') return false;
        throw invalid();
      case 'string':
        if (typeof value !== 'string' || (spec.values && !spec.values.includes(value))) throw invalid();
        return value;
      case 'caps':
        if (value instanceof Caps) return value;
        if (typeof value === 'string') {
          try {
            return Caps.fromString(value);
          } catch (error) {
            throw new ConfigurationError(`Invalid caps for property '${name}' of '${this.name}'`, { cause: error });
          }
        }
        throw invalid();
    }
  }
}

const SOURCE_PROPERTIES: Record<string, PropertySpec> = {
  'num-buffers': { type: 'int', default: -1 },
  'is-live': { type: 'boolean', default: false },
};

/**
 * Source running its own streaming task while the graph is playing.
 */
export abstract class TestSource extends MemoryElement {
  readonly role = 'source';
  private task: Promise<void> | null = null;
  private stopRequested = false;
  private eosRequested = false;
  private finished = false;
  private produced = 0;

  /**
   * Pick output caps, honouring a downstream constraint.
   *
   * @throws {FormatError} If the constraint cannot be satisfied
   */
  abstract fixate(constraint: Caps | null): Caps;

  protected abstract createBuffer(index: number, caps: Caps): RawBuffer;

  /**
   * Wall-clock pacing per buffer for live sources, in milliseconds.
   */
  protected abstract bufferDurationMs(caps: Caps): number;

  start(): void {
    if (this.task || this.finished) {
      return;
    }
    this.stopRequested = false;
    this.task = this.loop().finally(() => {
      this.task = null;
    });
  }

  stop(): void {
    this.stopRequested = true;
  }

  /**
   * End the stream at the next buffer boundary.
   */
  async requestEos(): Promise<void> {
    if (this.finished) {
      return;
    }
    this.eosRequested = true;
    if (!this.task) {
      await this.finish();
    }
  }

  override reset(): void {
    super.reset();
    this.stop();
    this.produced = 0;
    this.finished = false;
    this.eosRequested = false;
  }

  private async finish(): Promise<void> {
    if (this.finished) {
      return;
    }
    this.finished = true;
    await this.downstream?.eos();
  }

  private async loop(): Promise<void> {
    const caps = this.negotiatedCaps;
    if (!caps) {
      this.postError(StreamErrorCode.NOT_NEGOTIATED, 'Internal data stream error.', `${this.name}: started without negotiated caps`);
      return;
    }
    const numBuffers = this.intProperty('num-buffers');
    const live = this.booleanProperty('is-live');

    try {
      while (!this.stopRequested) {
        if (this.eosRequested || (numBuffers >= 0 && this.produced >= numBuffers)) {
          await this.finish();
          return;
        }

        if (live) {
          await sleep(this.bufferDurationMs(caps));
        } else {
          await yieldToLoop();
        }
        if (this.stopRequested) {
          return;
        }

        const flow = await this.pushDownstream({ buffer: this.createBuffer(this.produced, caps), caps });
        this.produced++;

        if (flow === 'ok') {
          continue;
        }
        if (flow === 'eos') {
          await this.finish();
          return;
        }
        if (flow !== 'flushing') {
          this.postError(StreamErrorCode.FAILED, 'Internal data stream error.', `${this.name}: streaming stopped, reason ${flow}`);
        }
        return;
      }
    } catch (error) {
      this.postError(StreamErrorCode.FAILED, 'Internal data stream error.', `${this.name}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

function fillPattern(data: Uint8Array, pattern: string, index: number): void {
  switch (pattern) {
    case 'white':
      data.fill(0xff);
      break;
    case 'counter':
      data.fill(index & 0xff);
      break;
    default:
      break;
  }
}

/**
 * Video test source producing solid frames.
 *
 * Defaults to 320x240 RGB at 30/1.
 */
export class VideoTestSrc extends TestSource {
  constructor(host: ElementHost, name: string) {
    super(host, 'videotestsrc', name, {
      ...SOURCE_PROPERTIES,
      pattern: { type: 'string', default: 'black', values: ['black', 'white', 'counter'] },
    });
  }

  fixate(constraint: Caps | null): Caps {
    if (constraint && !constraint.isVideo) {
      throw new FormatError(`${this.name} cannot produce '${constraint.name}'`);
    }
    const caps = makeVideoCaps({
      width: constraint?.getInt('width') ?? 320,
      height: constraint?.getInt('height') ?? 240,
      framerate: constraint?.getFraction('framerate') ?? new Rational(30, 1),
      format: constraint?.getString('format') ?? 'RGB',
    });
    // Only interleaved layouts can be generated
    resolveVideoFormat(caps);
    return caps;
  }

  protected createBuffer(index: number, caps: Caps): RawBuffer {
    const { width, height, channels, bytesPerElement, framerate } = resolveVideoFormat(caps);
    const data = new Uint8Array(width * height * channels * bytesPerElement);
    fillPattern(data, this.stringProperty('pattern'), index);

    const position = BigInt(index);
    return {
      data,
      pts: framerate ? framerate.timestampOf(position) : CLOCK_TIME_NONE,
      dts: CLOCK_TIME_NONE,
      duration: framerate ? framerate.frameDuration() : CLOCK_TIME_NONE,
      offset: position,
    };
  }

  protected bufferDurationMs(caps: Caps): number {
    const framerate = caps.getFraction('framerate');
    return framerate ? (1000 * framerate.den) / framerate.num : 0;
  }
}

/**
 * Audio test source producing interleaved sample blocks.
 *
 * Defaults to mono S16LE at 44100 Hz.
 */
export class AudioTestSrc extends TestSource {
  constructor(host: ElementHost, name: string) {
    super(host, 'audiotestsrc', name, {
      ...SOURCE_PROPERTIES,
      samplesperbuffer: { type: 'int', default: 1024 },
      wave: { type: 'string', default: 'silence', values: ['silence', 'ramp'] },
    });
  }

  fixate(constraint: Caps | null): Caps {
    if (constraint && !constraint.isAudio) {
      throw new FormatError(`${this.name} cannot produce '${constraint.name}'`);
    }
    return makeAudioCaps({
      rate: constraint?.getInt('rate') ?? 44100,
      channels: constraint?.getInt('channels') ?? 1,
      format: constraint?.getString('format') ?? 'S16LE',
    });
  }

  protected createBuffer(index: number, caps: Caps): RawBuffer {
    const rate = BigInt(caps.getInt('rate') ?? 44100);
    const channels = caps.getInt('channels') ?? 1;
    const { width } = getAudioFormatInfo(caps.getString('format') ?? 'S16LE');
    const samples = this.intProperty('samplesperbuffer');

    const data = new Uint8Array(samples * channels * (width / 8));
    if (this.stringProperty('wave') === 'ramp') {
      for (let i = 0; i < data.length; i++) {
        data[i] = (index + i) & 0xff;
      }
    }

    const offset = BigInt(index) * BigInt(samples);
    const pts = (offset * NSECONDS_PER_SECOND) / rate;
    const end = ((offset + BigInt(samples)) * NSECONDS_PER_SECOND) / rate;
    return { data, pts, dts: CLOCK_TIME_NONE, duration: end - pts, offset };
  }

  protected bufferDurationMs(caps: Caps): number {
    const rate = caps.getInt('rate') ?? 44100;
    return (1000 * this.intProperty('samplesperbuffer')) / rate;
  }
}

/**
 * Source endpoint fed by the application.
 *
 * Only `caps` and `num-buffers` exist; flow control comes from
 * {@link pushSample} resolving once downstream took the buffer.
 */
export class AppSrc extends MemoryElement implements AppSrcElement {
  readonly role = 'source';
  private pushed = 0;
  private ended = false;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(host: ElementHost, name: string) {
    super(host, 'appsrc', name, {
      caps: { type: 'caps', default: null },
      'num-buffers': { type: 'int', default: -1 },
    });
  }

  getCaps(): Caps | null {
    return this.capsProperty('caps');
  }

  setCaps(caps: Caps): void {
    this.setProperty('caps', caps);
  }

  /**
   * Output caps are whatever the application set; null defers negotiation to the first sample.
   */
  fixate(): Caps | null {
    return this.getCaps();
  }

  pushSample(sample: Sample): Promise<FlowReturn> {
    return this.serialized(() => this.forward(sample));
  }

  endOfStream(): Promise<FlowReturn> {
    return this.serialized(async () => {
      if (this.ended) {
        return 'eos';
      }
      await this.finish();
      return 'ok';
    });
  }

  override reset(): void {
    super.reset();
    this.pushed = 0;
    this.ended = false;
  }

  private serialized(operation: () => Promise<FlowReturn>): Promise<FlowReturn> {
    const result = this.tail.then(operation);
    this.tail = result.catch(() => undefined);
    return result;
  }

  private async finish(): Promise<void> {
    this.ended = true;
    await this.downstream?.eos();
  }

  private async forward(sample: Sample): Promise<FlowReturn> {
    if (this.ended) {
      return 'eos';
    }
    if (this.host.getState() !== 'playing') {
      return 'flushing';
    }

    const caps = sample.caps ?? this.getCaps();
    if (caps && !(this.negotiatedCaps && caps.equals(this.negotiatedCaps))) {
      this.negotiatedCaps = caps;
    }

    const flow = await this.pushDownstream({ buffer: sample.buffer, caps });
    this.pushed++;

    const numBuffers = this.intProperty('num-buffers');
    if (flow === 'eos' || (numBuffers >= 0 && this.pushed >= numBuffers)) {
      await this.finish();
    }
    return flow;
  }
}

/**
 * Restricts caps to its `caps` property.
 */
export class CapsFilter extends MemoryElement {
  readonly role = 'filter';

  constructor(host: ElementHost, name: string) {
    super(host, 'capsfilter', name, { caps: { type: 'caps', default: null } });
  }

  override constraint(): Caps | null {
    return this.capsProperty('caps');
  }
}

/**
 * Pass-through element that can inject an error or end-of-stream after N buffers.
 */
export class Identity extends MemoryElement {
  readonly role = 'filter';
  private count = 0;

  constructor(host: ElementHost, name: string) {
    super(host, 'identity', name, {
      'error-after': { type: 'int', default: -1 },
      'eos-after': { type: 'int', default: -1 },
      silent: { type: 'boolean', default: true },
    });
  }

  override reset(): void {
    super.reset();
    this.count = 0;
  }

  protected override async chain(sample: Sample): Promise<FlowReturn> {
    this.count++;

    const errorAfter = this.intProperty('error-after');
    if (errorAfter > 0 && this.count >= errorAfter) {
      this.postError(StreamErrorCode.FAILED, 'Failed after iterations as requested.', `${this.name}: error-after=${errorAfter}`);
      return 'error';
    }

    const eosAfter = this.intProperty('eos-after');
    if (eosAfter > 0 && this.count > eosAfter) {
      return 'eos';
    }
    return this.pushDownstream(sample);
  }
}

/**
 * Pure pass-through (`queue`, `videoconvert`, `audioconvert`).
 */
export class Passthrough extends MemoryElement {
  readonly role = 'filter';

  constructor(host: ElementHost, factory: string, name: string) {
    super(host, factory, name, {});
  }
}

/**
 * Sink endpoint handing samples to the application.
 *
 * Only `caps` exists. Queue bounds and dropping belong to the
 * application side of the callback (`queueSize`, `leaky`).
 */
export class AppSink extends MemoryElement implements AppSinkElement {
  readonly role = 'sink';
  private callback: NewSampleCallback | null = null;

  constructor(host: ElementHost, name: string) {
    super(host, 'appsink', name, {
      caps: { type: 'caps', default: null },
    });
  }

  override constraint(): Caps | null {
    return this.capsProperty('caps');
  }

  getCaps(): Caps | null {
    return this.negotiatedCaps;
  }

  setCallback(callback: NewSampleCallback | null): void {
    this.callback = callback;
  }

  override async eos(): Promise<void> {
    this.host.sinkReachedEos(this);
  }

  protected override async chain(sample: Sample): Promise<FlowReturn> {
    if (!this.callback) {
      return 'ok';
    }
    try {
      return await this.callback(sample);
    } catch (error) {
      this.postError(StreamErrorCode.FAILED, 'new-sample callback failed', error instanceof Error ? error.message : String(error));
      return 'error';
    }
  }
}

/**
 * Sink discarding everything (`fakesink`, `fakevideosink`, `fakeaudiosink`).
 */
export class FakeSink extends MemoryElement {
  readonly role = 'sink';

  constructor(host: ElementHost, factory: string, name: string) {
    super(host, factory, name, {
      sync: { type: 'boolean', default: false },
      silent: { type: 'boolean', default: true },
    });
  }

  override async eos(): Promise<void> {
    this.host.sinkReachedEos(this);
  }

  protected override async chain(): Promise<FlowReturn> {
    return 'ok';
  }
}

type ElementFactory = (host: ElementHost, name: string) => MemoryElement;

const FACTORIES: Readonly<Record<string, ElementFactory>> = Object.freeze({
  videotestsrc: (host, name) => new VideoTestSrc(host, name),
  audiotestsrc: (host, name) => new AudioTestSrc(host, name),
  appsrc: (host, name) => new AppSrc(host, name),
  capsfilter: (host, name) => new CapsFilter(host, name),
  identity: (host, name) => new Identity(host, name),
  queue: (host, name) => new Passthrough(host, 'queue', name),
  videoconvert: (host, name) => new Passthrough(host, 'videoconvert', name),
  audioconvert: (host, name) => new Passthrough(host, 'audioconvert', name),
  appsink: (host, name) => new AppSink(host, name),
  fakesink: (host, name) => new FakeSink(host, 'fakesink', name),
  fakevideosink: (host, name) => new FakeSink(host, 'fakevideosink', name),
  fakeaudiosink: (host, name) => new FakeSink(host, 'fakeaudiosink', name),
});

/**
 * Create an element by factory name.
 *
 * @throws {ConfigurationError} If the factory is unknown
 */
export function createElement(host: ElementHost, factory: string, name: string): MemoryElement {
  const create = FACTORIES[factory];
  if (!create) {
    throw new ConfigurationError(`No element '${factory}'`);
  }
  return create(host, name);
}

/**
 * Names of all element factories.
 */
export function elementFactories(): string[] {
  return Object.keys(FACTORIES);
}

export function isTestSource(element: MemoryElement): element is TestSource {
  return element instanceof TestSource;
}
