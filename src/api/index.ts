// Pipeline
export { ControllerState, GraphPipeline } from './pipeline.js';

// Endpoints
export { BufferSink, type BufferSinkOptions } from './buffer-sink.js';
export { BufferSource } from './buffer-source.js';

// EventBus
export { EventBus, type EventBusHandlers } from './event-bus.js';

// Utilities
export * from './utilities/index.js';

// Types
export type * from './types.js';
