import { APPSINK_FACTORY, APPSRC_FACTORY } from '../constants/constants.js';

import type { Caps } from '../lib/caps.js';
import type { RawBuffer } from '../lib/types.js';

/**
 * Engine-side graph states, in transition order.
 */
export type GraphState = 'null' | 'ready' | 'paused' | 'playing';

export const GRAPH_STATES: readonly GraphState[] = ['null', 'ready', 'paused', 'playing'];

/**
 * Outcome of passing a buffer along the graph.
 */
export type FlowReturn = 'ok' | 'eos' | 'flushing' | 'not-negotiated' | 'error';

/**
 * Outcome of a state change request.
 */
export type StateChangeReturn = 'success' | 'failure';

/**
 * A buffer together with the caps it was produced under.
 */
export interface Sample {
  buffer: RawBuffer;
  caps: Caps | null;
}

export type PropertyValue = string | number | boolean | Caps;

export interface ErrorMessage {
  type: 'error';
  source: string;
  code: number;
  message: string;
  debug: string | null;
}

export interface EosMessage {
  type: 'eos';
  source: string;
}

export interface WarningMessage {
  type: 'warning';
  source: string;
  message: string;
  debug: string | null;
}

export interface ElementMessage {
  type: 'element';
  source: string;
  name: string;
  fields: Record<string, string | number | boolean>;
}

export interface StateChangedMessage {
  type: 'state-changed';
  source: string;
  oldState: GraphState;
  newState: GraphState;
  pending: GraphState | null;
}

/**
 * Lifecycle message posted on a graph's bus.
 */
export type BusMessage = ErrorMessage | EosMessage | WarningMessage | ElementMessage | StateChangedMessage;

export type BusMessageType = BusMessage['type'];

export type BusWatch = (message: BusMessage) => void;

/**
 * Message bus of a graph.
 *
 * Watches are invoked asynchronously, in posting order.
 */
export interface GraphBus {
  /**
   * Register a watch.
   *
   * @returns Function removing the watch
   */
  addWatch(watch: BusWatch): () => void;

  /**
   * Post a message to all watches.
   */
  post(message: BusMessage): void;
}

/**
 * An element of a running graph.
 */
export interface GraphElement {
  readonly name: string;
  readonly factory: string;
  getProperty(name: string): PropertyValue | undefined;
  setProperty(name: string, value: PropertyValue): void;
}

/**
 * Invoked on the engine's streaming task for every sample reaching an appsink.
 */
export type NewSampleCallback = (sample: Sample) => Promise<FlowReturn>;

/**
 * Sink endpoint through which the application receives buffers.
 */
export interface AppSinkElement extends GraphElement {
  /**
   * Caps negotiated on the sink, or null before negotiation completed.
   */
  getCaps(): Caps | null;

  /**
   * Install (or with null, remove) the new-sample callback.
   */
  setCallback(callback: NewSampleCallback | null): void;
}

/**
 * Source endpoint through which the application feeds buffers.
 */
export interface AppSrcElement extends GraphElement {
  getCaps(): Caps | null;
  setCaps(caps: Caps): void;

  /**
   * Push a sample downstream.
   *
   * Resolves once the graph accepted (or refused) the sample.
   */
  pushSample(sample: Sample): Promise<FlowReturn>;

  /**
   * Signal that no more samples follow.
   */
  endOfStream(): Promise<FlowReturn>;
}

/**
 * Engine-owned graph instance.
 */
export interface GraphHandle {
  readonly name: string;
  readonly bus: GraphBus;
  readonly elements: readonly GraphElement[];
  getByName(name: string): GraphElement | null;
  getState(): GraphState;
  setState(state: GraphState): Promise<StateChangeReturn>;

  /**
   * Send an event into the graph. Only end-of-stream is defined.
   */
  sendEvent(event: 'eos'): Promise<boolean>;

  /**
   * Free the graph. Must be called exactly once, in the null state.
   */
  release(): void;
}

/**
 * Dataflow engine building graphs from textual descriptions.
 */
export interface GraphEngine {
  readonly name: string;

  /**
   * Build a graph from a launch description.
   *
   * @throws {ConfigurationError} If the description cannot be parsed or names unknown elements
   */
  parseLaunch(description: string): GraphHandle;
}

export function isAppSink(element: GraphElement): element is AppSinkElement {
  return element.factory === APPSINK_FACTORY && 'setCallback' in element && 'getCaps' in element;
}

export function isAppSrc(element: GraphElement): element is AppSrcElement {
  return element.factory === APPSRC_FACTORY && 'pushSample' in element && 'setCaps' in element;
}
