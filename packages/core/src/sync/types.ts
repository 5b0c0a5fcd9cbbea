import type { WatcherState } from "../lifecycle/state-machine.js";

/**
 * Raw notification kinds. The first five are chokidar's; `access` covers
 * sources that report reads, which never change an item.
 */
export type RawEventKind =
  | "add"
  | "change"
  | "unlink"
  | "addDir"
  | "unlinkDir"
  | "access";

/** A raw notification reduced to the item it concerns. */
export interface ChangeEvent {
  id: string;
  removed: boolean;
}

/** Outcome of one debounce flush */
export interface FlushResult {
  deleted: number;
  updated: number;
  failed: number; // re-reads that errored; their entries were left as they were
}

/** Change watcher status, for health reporting */
export interface WatcherStatus {
  state: WatcherState;
  queued: number; // events waiting for the next flush
  lastFlush: string | null; // ISO 8601
  flushes: number;
  errors: WatchError[];
}

export interface WatchError {
  id: string | null;
  message: string;
  timestamp: string;
}
