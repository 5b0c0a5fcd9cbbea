import { stat } from "node:fs/promises";
import type { Logger } from "pino";
import type { LiveIndex } from "../../storage/index/manager.js";
import {
  forEachConcurrent,
  resolveConcurrency,
} from "../../storage/index/pool.js";
import { classifyPath } from "../../records/paths.js";
import { WatchSetupError } from "../../errors/catalog.js";
import {
  createWatcherStateMachine,
  type WatcherState,
} from "../../lifecycle/state-machine.js";
import { PendingChangeSet } from "../pending.js";
import {
  createChokidarSource,
  type WatchSource,
  type WatchSubscription,
} from "../source.js";
import type {
  ChangeEvent,
  FlushResult,
  RawEventKind,
  WatchError,
  WatcherStatus,
} from "../types.js";

export interface ChangeWatcherDeps {
  baseDir: string;
  index: Pick<LiveIndex, "refresh" | "remove">;
  logger: Logger;
  /** Defaults to a chokidar source */
  source?: WatchSource;
}

export interface ChangeWatcherOptions {
  /** Debounce window in milliseconds (default: 2_000) */
  debounceMs?: number;
  /** Max re-reads in flight per flush (default: 32) */
  readConcurrency?: number;
}

export interface ChangeWatcher {
  /**
   * Subscribe and start the debounce loop. Throws WatchSetupError.
   * Concurrent calls share one attempt.
   */
  start(): Promise<void>;

  /** Cancel the loop, wait for an in-flight start or flush, release the subscription */
  stop(): Promise<void>;

  /** Apply everything queued so far without waiting for the next tick */
  flush(): Promise<FlushResult>;

  getStatus(): WatcherStatus;

  readonly state: WatcherState;
}

const MAX_ERRORS = 10;

/** Reduce a raw notification to the item it touches, if any. */
export function classifyEvent(
  kind: RawEventKind,
  path: string,
): ChangeEvent | undefined {
  if (kind === "access") return undefined;

  const id = classifyPath(path);
  if (id === undefined) return undefined;

  return { id, removed: kind === "unlink" || kind === "unlinkDir" };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createChangeWatcher(
  deps: ChangeWatcherDeps,
  options?: ChangeWatcherOptions,
): ChangeWatcher {
  const { baseDir, index, logger } = deps;
  const source = deps.source ?? createChokidarSource();
  const debounceMs = options?.debounceMs ?? 2_000;
  const readConcurrency = resolveConcurrency(options?.readConcurrency, 32);

  const machine = createWatcherStateMachine();
  machine.onStateChange(({ from, to, reason }) => {
    logger.debug({ baseDir, from, to, reason }, "Watcher state changed");
  });
  const pending = new PendingChangeSet();

  // Filled by the delivery callback, drained only by flushes.
  let queue: ChangeEvent[] = [];
  let subscription: WatchSubscription | null = null;
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let startInFlight: Promise<void> | null = null;
  let flushInFlight: Promise<FlushResult> | null = null;
  let lastFlush: string | null = null;
  let flushes = 0;
  let errors: WatchError[] = [];

  function pushError(id: string | null, message: string): void {
    errors.push({ id, message, timestamp: new Date().toISOString() });
    if (errors.length > MAX_ERRORS) {
      errors = errors.slice(-MAX_ERRORS);
    }
  }

  function onEvent(kind: RawEventKind, path: string): void {
    if (!machine.is("watching")) return;

    const event = classifyEvent(kind, path);
    if (event !== undefined) {
      queue.push(event);
    }
  }

  function onError(err: Error): void {
    logger.warn({ err }, "File watcher reported an error");
    pushError(null, err.message);
  }

  async function applyPending(): Promise<FlushResult> {
    // Events arriving from here on belong to the next window.
    const batch = queue;
    queue = [];
    for (const event of batch) {
      pending.add(event);
    }
    const { toDelete, toUpdate } = pending.take();

    // Deletes first: a delete and an update in one window leave the item present.
    let deleted = 0;
    for (const id of toDelete) {
      if (index.remove(id)) deleted++;
    }

    let updated = 0;
    let failed = 0;
    await forEachConcurrent([...toUpdate], readConcurrency, async (id) => {
      try {
        await index.refresh(id);
        updated++;
      } catch (err) {
        failed++;
        logger.warn({ id, err }, "Failed to re-read changed item");
        pushError(id, errorMessage(err));
      }
    });

    lastFlush = new Date().toISOString();
    flushes++;
    if (toDelete.size > 0 || toUpdate.size > 0) {
      logger.debug({ deleted, updated, failed }, "Applied pending changes");
    }
    return { deleted, updated, failed };
  }

  async function runFlush(): Promise<FlushResult> {
    // Join a running flush; run again if events arrived after it took its batch
    if (flushInFlight) {
      const running = flushInFlight;
      const result = await running;
      return queue.length > 0 ? runFlush() : result;
    }

    flushInFlight = applyPending();
    try {
      return await flushInFlight;
    } finally {
      flushInFlight = null;
    }
  }

  function clearIntervalTimer(): void {
    if (intervalId !== null) {
      clearInterval(intervalId);
      intervalId = null;
    }
  }

  function fail(message: string, err?: unknown): never {
    machine.transition("failed", message);
    logger.error({ baseDir, err }, message);
    throw new WatchSetupError(message, {
      baseDir,
      ...(err !== undefined && { reason: errorMessage(err) }),
    });
  }

  async function subscribe(): Promise<void> {
    try {
      const stats = await stat(baseDir);
      if (!stats.isDirectory()) {
        fail(`Cannot watch ${baseDir}: not a directory`);
      }
    } catch (err) {
      if (err instanceof WatchSetupError) throw err;
      fail(`Cannot watch ${baseDir}`, err);
    }

    try {
      subscription = await source.subscribe(baseDir, { onEvent, onError });
    } catch (err) {
      fail(`Failed to subscribe to changes under ${baseDir}`, err);
    }

    machine.transition("watching");
    intervalId = setInterval(() => {
      runFlush().catch((err: unknown) => {
        logger.error({ err }, "Flush failed");
        pushError(null, errorMessage(err));
      });
    }, debounceMs);

    logger.info({ baseDir, debounceMs }, "Watching for changes");
  }

  return {
    get state() {
      return machine.getState();
    },

    start() {
      if (startInFlight) return startInFlight;
      if (!machine.is("idle")) return Promise.resolve(); // Idempotent

      startInFlight = subscribe().finally(() => {
        startInFlight = null;
      });
      return startInFlight;
    },

    async stop() {
      if (startInFlight) {
        // Its failure belongs to the start() caller
        await Promise.allSettled([startInFlight]);
      }
      if (machine.is("stopping", "stopped")) return;
      if (!machine.is("watching")) {
        machine.transition("stopped");
        return;
      }

      machine.transition("stopping");
      clearIntervalTimer();

      // Wait for in-flight flushes, including a follow-up a joiner started
      while (flushInFlight) {
        await flushInFlight;
      }

      if (subscription) {
        await subscription.close();
        subscription = null;
      }
      queue = [];
      machine.transition("stopped");
      logger.info({ baseDir }, "Stopped watching");
    },

    flush: runFlush,

    getStatus(): WatcherStatus {
      return {
        state: machine.getState(),
        queued: queue.length,
        lastFlush,
        flushes,
        errors: [...errors],
      };
    },
  };
}
