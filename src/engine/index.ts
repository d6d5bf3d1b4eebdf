export { parseLaunchLine, type ChainSpec, type ElementSpec } from './launch.js';
export { AppSink, AppSrc, AudioTestSrc, CapsFilter, FakeSink, Identity, MemoryElement, Passthrough, StreamErrorCode, VideoTestSrc, elementFactories } from './elements.js';
export { MemoryBus, MemoryEngine, MemoryGraph } from './memory-engine.js';
export { GRAPH_STATES, isAppSink, isAppSrc } from './types.js';
export type * from './types.js';
