export type { LiveIndexOptions, RebuildResult } from "./types.js";
export { createLiveIndex, type LiveIndex } from "./manager.js";
export { KeyedLock } from "./keyed-lock.js";
export { forEachConcurrent, resolveConcurrency } from "./pool.js";
