import { ConfigurationError, FormatError } from '../lib/error.js';
import { createLogger } from '../lib/logger.js';
import { AppSrc, StreamErrorCode, createElement, isTestSource } from './elements.js';
import { parseLaunchLine } from './launch.js';
import { GRAPH_STATES } from './types.js';

import type { Caps } from '../lib/caps.js';
import type { ElementHost, MemoryElement } from './elements.js';
import type { BusMessage, BusWatch, GraphBus, GraphEngine, GraphHandle, GraphState, StateChangeReturn } from './types.js';

const log = createLogger('MemoryEngine');

/**
 * Bus delivering messages on a later turn of the event loop.
 */
export class MemoryBus implements GraphBus {
  private watches = new Set<BusWatch>();
  private closed = false;

  addWatch(watch: BusWatch): () => void {
    this.watches.add(watch);
    return () => {
      this.watches.delete(watch);
    };
  }

  post(message: BusMessage): void {
    if (this.closed) {
      return;
    }
    setImmediate(() => {
      for (const watch of [...this.watches]) {
        try {
          watch(message);
        } catch (error) {
          log.warn(`Bus watch threw on '${message.type}' message`, { error });
        }
      }
    });
  }

  /**
   * Drop all watches and ignore further messages.
   */
  close(): void {
    this.closed = true;
    this.watches.clear();
  }
}

/**
 * Graph built by {@link MemoryEngine}.
 *
 * @internal
 */
export class MemoryGraph implements GraphHandle, ElementHost {
  readonly name: string;
  readonly bus = new MemoryBus();
  private chains: MemoryElement[][] = [];
  private byName = new Map<string, MemoryElement>();
  private state: GraphState = 'null';
  private eosSinks = new Set<MemoryElement>();
  private eosPosted = false;
  private released = false;
  private generation = 0;

  constructor(name: string) {
    this.name = name;
  }

  get elements(): readonly MemoryElement[] {
    return this.chains.flat();
  }

  /**
   * Append a linked chain of elements.
   *
   * @throws {ConfigurationError} If the chain does not run from a source to a sink, or names clash
   */
  addChain(chain: MemoryElement[]): void {
    const head = chain[0];
    const tail = chain[chain.length - 1];
    if (!head || !tail || head.role !== 'source' || tail.role !== 'sink') {
      throw new ConfigurationError(`Could not link chain '${chain.map((element) => element.factory).join(' ! ')}': it must run from a source to a sink`);
    }
    for (const [i, element] of chain.entries()) {
      if (i > 0 && element.role === 'source') {
        throw new ConfigurationError(`Could not link '${chain[i - 1].name}' to source '${element.name}'`);
      }
      if (i < chain.length - 1 && element.role === 'sink') {
        throw new ConfigurationError(`Could not link sink '${element.name}' to '${chain[i + 1].name}'`);
      }
      if (this.byName.has(element.name)) {
        throw new ConfigurationError(`Element name '${element.name}' is used twice`);
      }
      this.byName.set(element.name, element);
      element.downstream = chain[i + 1] ?? null;
    }
    this.chains.push(chain);
  }

  getByName(name: string): MemoryElement | null {
    return this.byName.get(name) ?? null;
  }

  getState(): GraphState {
    return this.state;
  }

  async setState(target: GraphState): Promise<StateChangeReturn> {
    if (this.released) {
      return 'failure';
    }
    // A newer request supersedes this one
    const generation = ++this.generation;
    const targetIndex = GRAPH_STATES.indexOf(target);
    while (this.state !== target) {
      if (generation !== this.generation || this.released) {
        return 'failure';
      }
      const currentIndex = GRAPH_STATES.indexOf(this.state);
      const next = GRAPH_STATES[currentIndex + (targetIndex > currentIndex ? 1 : -1)];
      if (this.transition(next) === 'failure') {
        return 'failure';
      }
      // Let streaming tasks and bus deliveries interleave with the transition
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
    return 'success';
  }

  async sendEvent(event: 'eos'): Promise<boolean> {
    if (event !== 'eos' || this.released) {
      return false;
    }
    await Promise.all(
      this.sources().map((source) => {
        if (isTestSource(source)) {
          return source.requestEos();
        }
        return source instanceof AppSrc ? source.endOfStream() : undefined;
      }),
    );
    return true;
  }

  release(): void {
    if (this.released) {
      return;
    }
    if (this.state !== 'null') {
      log.warn(`Releasing graph '${this.name}' in state '${this.state}'`);
      this.transition('null');
    }
    this.released = true;
    this.bus.close();
  }

  postMessage(message: BusMessage): void {
    this.bus.post(message);
  }

  sinkReachedEos(sink: MemoryElement): void {
    this.eosSinks.add(sink);
    if (!this.eosPosted && this.eosSinks.size === this.chains.length) {
      this.eosPosted = true;
      this.postMessage({ type: 'eos', source: this.name });
    }
  }

  private sources(): MemoryElement[] {
    return this.chains.map((chain) => chain[0]);
  }

  private transition(next: GraphState): StateChangeReturn {
    const previous = this.state;

    if (previous === 'ready' && next === 'paused' && !this.negotiate()) {
      return 'failure';
    }

    this.state = next;

    if (next === 'playing') {
      for (const source of this.sources()) {
        if (isTestSource(source)) source.start();
      }
    } else if (next === 'paused' && previous === 'playing') {
      for (const source of this.sources()) {
        if (isTestSource(source)) source.stop();
      }
    } else if (next === 'ready' || next === 'null') {
      for (const element of this.elements) {
        element.reset();
      }
      this.eosSinks.clear();
      this.eosPosted = false;
    }

    this.postMessage({ type: 'state-changed', source: this.name, oldState: previous, newState: next, pending: null });
    return 'success';
  }

  /**
   * Fixate caps on every source and offer them along its chain.
   */
  private negotiate(): boolean {
    for (const chain of this.chains) {
      const [source, ...downstream] = chain;

      let constraint: Caps | null = null;
      for (const element of downstream) {
        const own = element.constraint();
        if (!own) continue;
        const merged: Caps | null = constraint ? constraint.intersect(own) : own;
        if (!merged) {
          this.fail(source, `conflicting caps constraints at '${element.name}'`);
          return false;
        }
        constraint = merged;
      }

      let caps: Caps | null;
      try {
        caps = this.fixate(source, constraint);
      } catch (error) {
        if (error instanceof FormatError) {
          this.fail(source, error.message);
          return false;
        }
        throw error;
      }

      // appsrc without caps negotiates on its first sample
      if (!caps) continue;

      for (const element of chain) {
        if (!element.acceptCaps(caps)) {
          this.fail(element, `caps ${caps.toString()} not accepted`);
          return false;
        }
      }
    }
    return true;
  }

  private fixate(source: MemoryElement, constraint: Caps | null): Caps | null {
    if (isTestSource(source)) {
      return source.fixate(constraint);
    }
    return source instanceof AppSrc ? source.fixate() : null;
  }

  private fail(element: MemoryElement, debug: string): void {
    this.postMessage({
      type: 'error',
      source: element.name,
      code: StreamErrorCode.NOT_NEGOTIATED,
      message: 'Internal data stream error.',
      debug: `${element.name}: not-negotiated (${debug})`,
    });
  }
}

/**
 * In-process dataflow engine.
 *
 * Runs raw video / audio test sources, caps filters, app endpoints and
 * fake sinks on the Node.js event loop.
 *
 * @example
 * ```typescript
 * const engine = new MemoryEngine();
 * const graph = engine.parseLaunch('videotestsrc num-buffers=3 ! appsink');
 * await graph.setState('playing');
 * ```
 */
export class MemoryEngine implements GraphEngine {
  readonly name = 'memory';
  private graphCount = 0;

  parseLaunch(description: string): MemoryGraph {
    const specs = parseLaunchLine(description);
    const graph = new MemoryGraph(`pipeline${this.graphCount++}`);
    const counters = new Map<string, number>();

    for (const spec of specs) {
      const chain = spec.map(({ factory, properties }) => {
        let name = properties.get('name');
        if (name === undefined) {
          const index = counters.get(factory) ?? 0;
          counters.set(factory, index + 1);
          name = `${factory}${index}`;
        }

        const element = createElement(graph, factory, name);
        for (const [property, value] of properties) {
          if (property !== 'name') {
            element.setProperty(property, value);
          }
        }
        return element;
      });
      graph.addChain(chain);
    }

    log.debug(`Built graph '${graph.name}'`, { description });
    return graph;
  }
}
