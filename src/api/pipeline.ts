import { DEFAULT_POP_TIMEOUT, DEFAULT_QUEUE_SIZE, DEFAULT_SHUTDOWN_TIMEOUT } from '../constants/constants.js';
import { MemoryEngine } from '../engine/memory-engine.js';
import { isAppSink, isAppSrc } from '../engine/types.js';
import { Caps, makeAudioCaps, makeVideoCaps } from '../lib/caps.js';
import { ConfigurationError } from '../lib/error.js';
import { resolveFormat } from '../lib/format-descriptor.js';
import { createLogger } from '../lib/logger.js';
import { BufferSink } from './buffer-sink.js';
import { BufferSource } from './buffer-source.js';
import { EventBus } from './event-bus.js';
import { MainLoop } from './utilities/main-loop.js';
import { delay, withTimeout } from './utils.js';

import type { FlowReturn, GraphBus, GraphElement, GraphEngine, GraphHandle, GraphState } from '../engine/types.js';
import type { AudioCapsOptions, VideoCapsOptions } from '../lib/caps.js';
import type { EngineError } from '../lib/error.js';
import type { NDArray, SampleBuffer } from '../lib/types.js';
import type { GraphPipelineOptions, PopOptions, PushOptions, ShutdownOptions } from './types.js';

const log = createLogger('GraphPipeline');

/**
 * Lifecycle state of a {@link GraphPipeline}.
 */
export enum ControllerState {
  Null = 'null',
  Ready = 'ready',
  Paused = 'paused',
  Playing = 'playing',
  Stopping = 'stopping',
  Stopped = 'stopped',
}

function requireNonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number of milliseconds, got ${value}`);
  }
  return value;
}

/**
 * Runs a dataflow graph and exchanges typed buffers with it.
 *
 * Construction through {@link create} only validates options. {@link startup}
 * builds the graph, prerolls it so caps are negotiated, wires the `appsink`
 * and `appsrc` endpoints (at most one of each) and starts playback.
 * {@link shutdown} tears everything down; it runs once, no matter how many
 * callers (the application, a bus error, end-of-stream, a signal) ask for it.
 *
 * @example
 * ```typescript
 * const pipeline = GraphPipeline.create('videotestsrc num-buffers=10 ! video/x-raw,format=GRAY8 ! appsink');
 * await pipeline.startup();
 *
 * while (pipeline.hasMore) {
 *   const buffer = await pipeline.pop();
 *   if (buffer) {
 *     console.log(buffer.pts, buffer.data.shape); // 0n [240, 320]
 *   }
 * }
 *
 * await pipeline.shutdown();
 * ```
 *
 * @example
 * ```typescript
 * // Feed frames into the graph
 * await using pipeline = GraphPipeline.create('appsrc ! videoconvert ! fakevideosink', {
 *   sourceCaps: 'video/x-raw,format=RGB,width=320,height=240,framerate=10/1',
 * });
 * await pipeline.startup();
 *
 * for (let i = 0; i < 10; i++) {
 *   await pipeline.push(zeros('uint8', [240, 320, 3]));
 * }
 * await pipeline.shutdown({ eos: true });
 * ```
 */
export class GraphPipeline implements AsyncDisposable {
  readonly description: string;
  private engine: GraphEngine;
  private options: GraphPipelineOptions;
  private queueSize: number;
  private shutdownTimeout: number;
  private popTimeout: number;
  private interruptSignals: NodeJS.Signals[];
  private sourceCaps: Caps | null;

  private _state = ControllerState.Null;
  private handle: GraphHandle | null = null;
  private loop = new MainLoop();
  private eventBus: EventBus | null = null;
  private _sink: BufferSink | null = null;
  private _source: BufferSource | null = null;
  private started = false;
  private stopping = false;
  private shutdownPromise: Promise<void> | null = null;
  private completed: Promise<void>;
  private resolveCompleted: () => void = () => undefined;

  /**
   * @internal
   */
  private constructor(description: string, options: GraphPipelineOptions, sourceCaps: Caps | null) {
    this.description = description;
    this.options = options;
    this.engine = options.engine ?? new MemoryEngine();
    this.queueSize = options.queueSize ?? DEFAULT_QUEUE_SIZE;
    this.shutdownTimeout = options.shutdownTimeout ?? DEFAULT_SHUTDOWN_TIMEOUT;
    this.popTimeout = options.popTimeout ?? DEFAULT_POP_TIMEOUT;
    this.interruptSignals = options.interruptSignals ?? ['SIGINT'];
    this.sourceCaps = sourceCaps;
    this.completed = new Promise<void>((resolve) => {
      this.resolveCompleted = resolve;
    });
  }

  /**
   * Create a pipeline without starting it.
   *
   * Performs no engine work; the description is only parsed by {@link startup}.
   *
   * @param description - Launch line, e.g. `videotestsrc ! appsink`
   *
   * @param options - Pipeline options
   *
   * @returns Pipeline in the `null` state
   *
   * @throws {ConfigurationError} If the description is empty or an option is out of range
   *
   * @throws {FormatError} If `sourceCaps` cannot be parsed or resolved
   *
   * @example
   * ```typescript
   * const pipeline = GraphPipeline.create('videotestsrc ! appsink', {
   *   queueSize: 3,
   *   leaky: true,
   *   onDrop: (queue) => console.warn(`dropped, ${queue.dropped} so far`),
   * });
   * ```
   */
  static create(description: string, options: GraphPipelineOptions = {}): GraphPipeline {
    if (description.trim().length === 0) {
      throw new ConfigurationError('Pipeline description is empty');
    }
    const queueSize = options.queueSize ?? DEFAULT_QUEUE_SIZE;
    if (!Number.isSafeInteger(queueSize) || queueSize <= 0) {
      throw new ConfigurationError(`queueSize must be a positive integer, got ${queueSize}`);
    }
    requireNonNegative('shutdownTimeout', options.shutdownTimeout ?? DEFAULT_SHUTDOWN_TIMEOUT);
    requireNonNegative('popTimeout', options.popTimeout ?? DEFAULT_POP_TIMEOUT);

    let sourceCaps: Caps | null = null;
    if (options.sourceCaps !== undefined) {
      sourceCaps = typeof options.sourceCaps === 'string' ? Caps.fromString(options.sourceCaps) : options.sourceCaps;
      resolveFormat(sourceCaps);
    }

    return new GraphPipeline(description, options, sourceCaps);
  }

  get state(): ControllerState {
    return this._state;
  }

  /**
   * Whether the pipeline was started and no shutdown has begun.
   */
  get isActive(): boolean {
    return this.started && this.handle !== null && !this.stopping;
  }

  /**
   * Whether a shutdown has begun.
   */
  get isDone(): boolean {
    return this.stopping;
  }

  /**
   * Whether {@link pop} may still return buffers.
   *
   * True until the pipeline is stopped, and afterwards while buffers remain queued.
   *
   * @example
   * ```typescript
   * while (pipeline.hasMore) {
   *   const buffer = await pipeline.pop();
   *   if (buffer) process(buffer);
   * }
   * ```
   */
  get hasMore(): boolean {
    return this._state !== ControllerState.Stopped || (this._sink?.queueSize ?? 0) > 0;
  }

  /**
   * Resolves once the pipeline is stopped.
   */
  get completion(): Promise<void> {
    return this.completed;
  }

  /**
   * Bus of the running graph, or null when not running.
   */
  get bus(): GraphBus | null {
    return this.handle?.bus ?? null;
  }

  /**
   * All elements of the running graph.
   */
  get elements(): readonly GraphElement[] {
    return this.handle?.elements ?? [];
  }

  /**
   * Sink endpoint, when the graph has an `appsink`.
   */
  get sink(): BufferSink | null {
    return this._sink;
  }

  /**
   * Source endpoint, when the graph has an `appsrc`.
   */
  get source(): BufferSource | null {
    return this._source;
  }

  getByName(name: string): GraphElement | null {
    return this.handle?.getByName(name) ?? null;
  }

  /**
   * Elements created by a given factory, e.g. `appsink`.
   */
  getByFactory(factory: string): GraphElement[] {
    return this.elements.filter((element) => element.factory === factory);
  }

  /**
   * Build and start the graph.
   *
   * No-op with a warning when already started. On failure everything is
   * released, the pipeline ends up stopped and the error is rethrown.
   *
   * @throws {ConfigurationError} If the description cannot be built, has several appsink or appsrc elements, or the pipeline was shut down before
   *
   * @throws {FormatError} If the appsrc carries caps that cannot be resolved
   *
   * @example
   * ```typescript
   * const pipeline = GraphPipeline.create('audiotestsrc num-buffers=5 ! appsink');
   * await pipeline.startup();
   * ```
   */
  async startup(): Promise<void> {
    if (this.stopping) {
      throw new ConfigurationError('Pipeline was shut down and cannot be started again');
    }
    if (this.started) {
      log.warn('Pipeline is already running');
      return;
    }
    this.started = true;

    try {
      this.loop.start();

      const handle = this.engine.parseLaunch(this.description);
      this.handle = handle;
      log.debug(`Parsed description with ${handle.elements.length} elements`, { engine: this.engine.name });

      this.eventBus = new EventBus(handle.bus, this.loop, {
        onFatal: (error) => this.onFatal(error),
        onEos: () => this.onEos(),
        onElementMessage: this.options.onElementMessage,
      });
      this.eventBus.attach();

      if (!(await this.changeState(handle, 'ready', ControllerState.Ready))) return;

      // Preroll so caps are negotiated before the endpoints are wired
      if (!(await this.changeState(handle, 'paused', ControllerState.Paused))) return;

      this.wireEndpoints(handle);

      if (!(await this.changeState(handle, 'playing', ControllerState.Playing))) return;

      this.installSignalHandlers();
      log.info('Pipeline playing', { sink: this._sink !== null, source: this._source !== null });
    } catch (error) {
      log.error(`Startup failed: ${error instanceof Error ? error.message : String(error)}`);
      await this.shutdown({ eos: false, timeout: 0 });
      throw error;
    }
  }

  /**
   * Stop the graph and release everything.
   *
   * Runs once; later and concurrent calls get the same promise. Never rejects.
   *
   * @param options - EOS and timeout
   *
   * @example
   * ```typescript
   * // Let the graph finish what it has, waiting up to 500ms for EOS
   * await pipeline.shutdown({ eos: true, timeout: 500 });
   * ```
   */
  shutdown(options: ShutdownOptions = {}): Promise<void> {
    const timeout = options.timeout ?? DEFAULT_SHUTDOWN_TIMEOUT;
    this.shutdownPromise ??= this.teardown(options.eos ?? false, Number.isFinite(timeout) ? Math.max(0, timeout) : DEFAULT_SHUTDOWN_TIMEOUT);
    return this.shutdownPromise;
  }

  /**
   * Take the next buffer from the sink.
   *
   * Waits in `timeout` slices while the pipeline is active or buffers
   * remain, so it returns promptly once the pipeline stops.
   *
   * @param options - Wait per attempt in milliseconds, or pop options
   *
   * @returns Next buffer, or null once the pipeline is inactive and drained
   *
   * @throws {ConfigurationError} If the graph has no appsink (the pipeline is shut down as well)
   *
   * @example
   * ```typescript
   * const controller = new AbortController();
   * process.once('SIGTERM', () => controller.abort());
   *
   * for (let buffer = await pipeline.pop({ signal: controller.signal }); buffer; buffer = await pipeline.pop()) {
   *   console.log(buffer.offset);
   * }
   * ```
   */
  async pop(options: number | PopOptions = {}): Promise<SampleBuffer | null> {
    const popOptions: PopOptions = typeof options === 'number' ? { timeout: options } : options;
    const timeout = requireNonNegative('timeout', popOptions.timeout ?? this.popTimeout);

    const sink = this._sink;
    if (!sink) {
      log.error('No appsink to pop buffers from');
      this.requestShutdown();
      throw new ConfigurationError('pop() needs an appsink element in the pipeline description');
    }

    return this.withAbort(popOptions.signal, () => sink.pop(timeout, () => this.isActive));
  }

  /**
   * Feed one array into the source.
   *
   * @param array - Frame or audio block matching the source caps
   *
   * @param options - Push options
   *
   * @returns Flow result reported by the engine, `flushing` once stopping
   *
   * @throws {ConfigurationError} If the graph has no appsrc (the pipeline is shut down as well) or no source caps are set
   *
   * @throws {FormatError} If the array does not match the source caps
   */
  async push(array: NDArray, options: PushOptions = {}): Promise<FlowReturn> {
    const source = this._source;
    if (!source) {
      log.error('No appsrc to push buffers to');
      this.requestShutdown();
      throw new ConfigurationError('push() needs an appsrc element in the pipeline description');
    }

    return this.withAbort(options.signal, () => source.push(array));
  }

  /**
   * Set raw video caps on the source, if it has none yet.
   *
   * @returns false when there is no source or its caps are already set
   *
   * @throws {FormatError} If the options do not describe valid video caps
   *
   * @example
   * ```typescript
   * pipeline.setSourceVideoCaps({ width: 320, height: 240, framerate: '10/1', format: 'RGB' });
   * ```
   */
  setSourceVideoCaps(options: VideoCapsOptions): boolean {
    if (!this._source) {
      log.warn('No appsrc to set caps on');
      return false;
    }
    return this._source.setCaps(makeVideoCaps(options));
  }

  /**
   * Set raw audio caps on the source, if it has none yet.
   *
   * @returns false when there is no source or its caps are already set
   *
   * @throws {FormatError} If the options do not describe valid audio caps
   */
  setSourceAudioCaps(options: AudioCapsOptions): boolean {
    if (!this._source) {
      log.warn('No appsrc to set caps on');
      return false;
    }
    return this._source.setCaps(makeAudioCaps(options));
  }

  toString(): string {
    return `GraphPipeline(${this._state})`;
  }

  /**
   * Dispose of the pipeline.
   *
   * Equivalent to calling shutdown().
   *
   * @example
   * ```typescript
   * {
   *   await using pipeline = GraphPipeline.create('videotestsrc ! fakesink');
   *   await pipeline.startup();
   * } // Automatically shut down
   * ```
   */
  async [Symbol.asyncDispose](): Promise<void> {
    await this.shutdown();
  }

  private async changeState(handle: GraphHandle, target: GraphState, next: ControllerState): Promise<boolean> {
    if (this.stopping) {
      return false;
    }
    const result = await handle.setState(target);
    if (this.stopping) {
      return false;
    }
    if (result === 'failure') {
      log.error(`Failed to set graph to ${target}`);
      await this.shutdown({ eos: false, timeout: 0 });
      return false;
    }
    this._state = next;
    log.debug(`Graph ${target}`);
    return true;
  }

  private wireEndpoints(handle: GraphHandle): void {
    const sinks = handle.elements.filter(isAppSink);
    const sources = handle.elements.filter(isAppSrc);
    if (sinks.length > 1) {
      throw new ConfigurationError(`Found ${sinks.length} appsink elements (${sinks.map((e) => e.name).join(', ')}); at most one is supported`);
    }
    if (sources.length > 1) {
      throw new ConfigurationError(`Found ${sources.length} appsrc elements (${sources.map((e) => e.name).join(', ')}); at most one is supported`);
    }

    const [appsink] = sinks;
    if (appsink) {
      this._sink = new BufferSink(appsink, { queueSize: this.queueSize, leaky: this.options.leaky, onDrop: this.options.onDrop });
      this._sink.attach();
      log.debug(`Wired sink '${appsink.name}'`);
    }

    const [appsrc] = sources;
    if (appsrc) {
      const source = new BufferSource(appsrc);
      if (this.sourceCaps) {
        if (source.caps) {
          log.warn(`Source '${appsrc.name}' already has caps; ignoring sourceCaps`);
        } else {
          source.setCaps(this.sourceCaps);
        }
      }
      this._source = source;
      log.debug(`Wired source '${appsrc.name}'`);
    }
  }

  private async withAbort<T>(signal: AbortSignal | undefined, operation: () => Promise<T>): Promise<T> {
    if (!signal) {
      return operation();
    }

    const onAbort = () => {
      log.warn('Interrupted, shutting down');
      this.requestShutdown();
    };
    if (signal.aborted) {
      onAbort();
      return operation();
    }

    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await operation();
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private onFatal(error: EngineError): void {
    log.error(`Shutting down after engine error ${error.engineCode}: ${error.message}`);
    this.requestShutdown();
  }

  private onEos(): void {
    log.info('Graph reached end-of-stream');
    // Nothing left to flush, so no EOS is sent
    this.requestShutdown();
  }

  private onSignal = (signal: NodeJS.Signals): void => {
    log.warn(`Received ${signal}, shutting down`);
    this.requestShutdown();
  };

  private installSignalHandlers(): void {
    for (const signal of this.interruptSignals) {
      process.on(signal, this.onSignal);
    }
  }

  private removeSignalHandlers(): void {
    for (const signal of this.interruptSignals) {
      process.off(signal, this.onSignal);
    }
  }

  private requestShutdown(): void {
    this.shutdown({ eos: false, timeout: this.shutdownTimeout }).catch((error: unknown) => {
      log.error('Shutdown failed', { error });
    });
  }

  private async teardown(eos: boolean, timeout: number): Promise<void> {
    const previous = this._state;
    this.stopping = true;

    if (!this.started) {
      this._state = ControllerState.Stopped;
      this.resolveCompleted();
      return;
    }

    this._state = ControllerState.Stopping;
    log.info('Shutdown requested', { from: previous, eos });
    this.removeSignalHandlers();

    try {
      const handle = this.handle;

      if (eos && previous === ControllerState.Playing && handle) {
        const sent = await withTimeout(
          handle.sendEvent('eos').catch((error: unknown) => {
            log.warn('Sending end-of-stream failed', { error });
            return false;
          }),
          timeout,
        );
        if (sent === undefined) {
          log.warn(`End-of-stream not delivered within ${timeout}ms`);
        }
      }

      // Grace period for buffers still in flight
      await delay(timeout);

      this._sink?.close();

      if (handle) {
        if ((await handle.setState('null')) === 'failure') {
          log.warn('Graph did not reach null cleanly');
        }
        this.eventBus?.detach();
        this._sink?.detach();
        handle.release();
        this.handle = null;
      }

      this.loop.quit();
      await this.loop.join();
    } catch (error) {
      log.error('Error during shutdown', { error });
    } finally {
      this._state = ControllerState.Stopped;
      this.resolveCompleted();
      log.info('Shutdown complete');
    }
  }
}
