export type {
  RawEventKind,
  ChangeEvent,
  FlushResult,
  WatcherStatus,
  WatchError,
} from "./types.js";
export { PendingChangeSet, type PendingChanges } from "./pending.js";
export {
  createChokidarSource,
  type ChokidarSourceOptions,
  type WatchHandlers,
  type WatchSource,
  type WatchSubscription,
} from "./source.js";
export {
  classifyEvent,
  createChangeWatcher,
  type ChangeWatcher,
  type ChangeWatcherDeps,
  type ChangeWatcherOptions,
} from "./engine/change-watcher.js";
