import type { Logger } from "pino";
import { createRecordReader, type RecordReader } from "../records/reader.js";
import { createLiveIndex, type LiveIndex } from "../storage/index/manager.js";
import type { RebuildResult } from "../storage/index/types.js";
import {
  createChangeWatcher,
  type ChangeWatcher,
} from "../sync/engine/change-watcher.js";
import type { WatchSource } from "../sync/source.js";
import { WatchSetupError } from "../errors/catalog.js";
import type { StoreConfig } from "../schemas/store-config.js";
import { createLogger } from "../logger/index.js";
import { resolveStorePath } from "../config/paths.js";

export interface OpenStoreOptions {
  baseDir: string;
  logger: Logger;
  readConcurrency?: number;
  watch?: {
    enabled?: boolean;
    debounceMs?: number;
    /** Defaults to a chokidar source */
    source?: WatchSource;
  };
}

export interface Store {
  baseDir: string;
  logger: Logger;
  reader: RecordReader;
  index: LiveIndex;
  /** Null when watching is disabled */
  watcher: ChangeWatcher | null;
  /** Outcome of the initial rebuild */
  initialRebuild: RebuildResult;
  close: () => Promise<void>;
}

/**
 * Build the reader, the live index and the change watcher for one store,
 * populate the index and start watching.
 *
 * A store that cannot be listed fails the open. A watcher that cannot be
 * set up does not: the index keeps serving what the rebuild read.
 */
export async function openStore(options: OpenStoreOptions): Promise<Store> {
  const { baseDir, logger } = options;
  const readConcurrency = options.readConcurrency;

  const reader = createRecordReader(baseDir);
  const index = createLiveIndex({
    reader,
    logger: logger.child({ component: "index" }),
    readConcurrency,
  });

  const initialRebuild = await index.rebuild();

  let watcher: ChangeWatcher | null = null;
  if (options.watch?.enabled ?? true) {
    watcher = createChangeWatcher(
      {
        baseDir,
        index,
        logger: logger.child({ component: "watcher" }),
        source: options.watch?.source,
      },
      { debounceMs: options.watch?.debounceMs, readConcurrency },
    );

    try {
      await watcher.start();
    } catch (err) {
      if (!(err instanceof WatchSetupError)) throw err;
      logger.warn(
        { baseDir, err },
        "Change watching unavailable, serving the initial index only",
      );
    }
  } else {
    logger.info({ baseDir }, "Change watching disabled");
  }

  const close = async () => {
    if (watcher) {
      await watcher.stop();
    }
  };

  return { baseDir, logger, reader, index, watcher, initialRebuild, close };
}

export interface OpenStoreFromConfigOptions {
  /** Defaults to a logger built from `config.logging` */
  logger?: Logger;
  /** Defaults to a chokidar source */
  source?: WatchSource;
}

/** openStore with every setting taken from a loaded config. */
export function openStoreFromConfig(
  config: StoreConfig,
  options?: OpenStoreFromConfigOptions,
): Promise<Store> {
  return openStore({
    baseDir: resolveStorePath(config.store.path),
    logger: options?.logger ?? createLogger(config.logging),
    readConcurrency: config.index.readConcurrency,
    watch: {
      enabled: config.watch.enabled,
      debounceMs: config.watch.debounceMs,
      source: options?.source,
    },
  });
}
