import type { ElementMessage, GraphEngine } from '../engine/types.js';
import type { Caps } from '../lib/caps.js';
import type { SampleBuffer } from '../lib/types.js';
import type { BackpressureQueue } from './utilities/backpressure-queue.js';

/**
 * Options for {@link GraphPipeline.create}.
 */
export interface GraphPipelineOptions {
  /**
   * Engine building and running the graph.
   *
   * @default new MemoryEngine()
   */
  engine?: GraphEngine;

  /**
   * Capacity of the sink queue.
   *
   * @default 100
   */
  queueSize?: number;

  /**
   * Drop the oldest buffer instead of blocking the engine when the sink queue is full.
   *
   * @default false
   */
  leaky?: boolean;

  /**
   * Called with every buffer evicted from a leaky sink queue.
   */
  onDrop?: (queue: BackpressureQueue<SampleBuffer>, buffer: SampleBuffer) => void;

  /**
   * Caps preset on the source endpoint at startup, as a caps string or {@link Caps}.
   *
   * Resolved when the pipeline is created, so malformed caps fail early.
   */
  sourceCaps?: string | Caps;

  /**
   * EOS wait and drain grace period of automatic shutdowns, in milliseconds.
   *
   * @default 1000
   */
  shutdownTimeout?: number;

  /**
   * Default wait per `pop()` attempt, in milliseconds.
   *
   * @default 100
   */
  popTimeout?: number;

  /**
   * Process signals that shut the pipeline down while it is active.
   *
   * Pass an empty array to leave signal handling to the application.
   *
   * @default ['SIGINT']
   */
  interruptSignals?: NodeJS.Signals[];

  /**
   * Called on the background loop for every element message on the bus.
   */
  onElementMessage?: (message: ElementMessage) => void;
}

/**
 * Options for {@link GraphPipeline.shutdown}.
 */
export interface ShutdownOptions {
  /**
   * Send end-of-stream and wait for it before tearing down (only when playing).
   *
   * @default false
   */
  eos?: boolean;

  /**
   * EOS wait, and again the drain grace period, in milliseconds.
   *
   * @default 1000
   */
  timeout?: number;
}

/**
 * Options for {@link GraphPipeline.pop}.
 */
export interface PopOptions {
  /**
   * Wait per attempt, in milliseconds.
   *
   * @default GraphPipelineOptions.popTimeout
   */
  timeout?: number;

  /**
   * Aborting the signal shuts the pipeline down; `pop()` then drains and returns.
   */
  signal?: AbortSignal;
}

/**
 * Options for {@link GraphPipeline.push}.
 */
export interface PushOptions {
  /**
   * Aborting the signal shuts the pipeline down.
   */
  signal?: AbortSignal;
}
