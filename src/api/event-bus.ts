import { EngineError } from '../lib/error.js';
import { createLogger } from '../lib/logger.js';

import type { BusMessage, BusMessageType, ElementMessage, GraphBus } from '../engine/types.js';
import type { MainLoop } from './utilities/main-loop.js';

const log = createLogger('EventBus');

type MessageOf<K extends BusMessageType> = Extract<BusMessage, { type: K }>;

type DispatchTable = {
  [K in BusMessageType]: (message: MessageOf<K>) => void;
};

/**
 * Reactions of the owning controller to bus messages.
 *
 * @internal
 */
export interface EventBusHandlers {
  /** Fatal engine error; the controller shuts down without sending EOS */
  onFatal(error: EngineError): void;

  /** Graph reached end-of-stream */
  onEos(): void;

  /** Application hook for element messages */
  onElementMessage?: (message: ElementMessage) => void;
}

/**
 * Routes engine bus messages to the controller on its background loop.
 *
 * @internal
 */
export class EventBus {
  private bus: GraphBus;
  private loop: MainLoop;
  private handlers: EventBusHandlers;
  private removeWatch: (() => void) | null = null;

  private readonly dispatch: DispatchTable = {
    error: (message) => {
      log.error(`Error ${message.code} ${message.message}: ${message.debug ?? ''}`, { source: message.source });
      this.handlers.onFatal(new EngineError(message.code, message.message, message.debug));
    },
    eos: (message) => {
      log.info('End-of-stream', { source: message.source });
      this.handlers.onEos();
    },
    warning: (message) => {
      log.warn(`Warning ${message.message}: ${message.debug ?? ''}`, { source: message.source });
    },
    element: (message) => {
      log.debug(`Element message '${message.name}'`, { source: message.source, fields: message.fields });
      this.handlers.onElementMessage?.(message);
    },
    'state-changed': (message) => {
      log.debug(`State changed ${message.oldState} -> ${message.newState}`, { source: message.source });
    },
  };

  constructor(bus: GraphBus, loop: MainLoop, handlers: EventBusHandlers) {
    this.bus = bus;
    this.loop = loop;
    this.handlers = handlers;
  }

  get isAttached(): boolean {
    return this.removeWatch !== null;
  }

  /**
   * Start receiving messages. No-op if attached.
   */
  attach(): void {
    if (this.removeWatch) {
      return;
    }
    this.removeWatch = this.bus.addWatch((message) => {
      if (!this.loop.invoke(() => this.handle(message))) {
        log.debug(`Dropped '${message.type}' message after loop quit`);
      }
    });
  }

  detach(): void {
    this.removeWatch?.();
    this.removeWatch = null;
  }

  /**
   * Dispatch a message to its handler.
   */
  handle(message: BusMessage): void {
    switch (message.type) {
      case 'error':
        return this.dispatch.error(message);
      case 'eos':
        return this.dispatch.eos(message);
      case 'warning':
        return this.dispatch.warning(message);
      case 'element':
        return this.dispatch.element(message);
      case 'state-changed':
        return this.dispatch['state-changed'](message);
    }
  }
}
