export { planBatches } from './planner.js';
export { BatchAllocator } from './allocator.js';
export type { BatchPlan } from './planner.js';
