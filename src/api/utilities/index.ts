// BackpressureQueue
export { BackpressureQueue, type BackpressureQueueOptions, type QueuePolicy } from './backpressure-queue.js';

// MainLoop
export { MainLoop, type LoopTask } from './main-loop.js';
