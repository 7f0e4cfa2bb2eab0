export { ConsistencyPropagator } from './propagator.js';
export type { ConsistencyPropagatorOptions, PropagationStats } from './propagator.js';
export { ProjectionQueue, taskKey } from './queue.js';
export type { ProjectionTask, EnqueueResult } from './queue.js';
export { toProjection, tombstone, SEARCH_DESCRIPTORS } from './projection.js';
export type { SearchDescriptor } from './projection.js';
export { backoffDelay } from './backoff.js';
