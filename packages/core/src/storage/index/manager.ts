import {
  ROOT,
  TRASH,
  directoryParent,
  isDirectory,
  parentEquals,
  type Item,
  type Parent,
} from "../../records/types.js";
import {
  AmbiguousPathError,
  InvalidMoveError,
  NotADirectoryError,
  NotFoundError,
} from "../../errors/catalog.js";
import {
  isPinnedPath,
  isRootPath,
  isTrashPath,
  splitPath,
} from "../hierarchy/paths.js";
import {
  pathOf,
  resolvePath,
  type ItemLookup,
} from "../hierarchy/resolver.js";
import { KeyedLock } from "./keyed-lock.js";
import { forEachConcurrent, resolveConcurrency } from "./pool.js";
import type { LiveIndexOptions, RebuildResult } from "./types.js";

export interface LiveIndex extends ItemLookup {
  readonly size: number;
  /** Re-read the whole store and replace the index contents. */
  rebuild(): Promise<RebuildResult>;
  /** Insert or overwrite one item. */
  upsert(item: Item): Item;
  /** Returns false if the identifier was not indexed. */
  remove(id: string): boolean;
  /** Re-read one item from disk. On failure the current entry is kept. */
  refresh(id: string): Promise<Item>;
  /** Throws NotFoundError or AmbiguousPathError. */
  resolve(path: string): Item;
  pathOf(id: string): string | undefined;
  list(path: string): Item[];
  pinned(): Item[];
  trash(): Item[];
  moveItem(itemPath: string, targetDirPath: string): Promise<Item>;
}

const DEFAULT_READ_CONCURRENCY = 32;

type Lookup = Map<string, Item>;

function freezeItem(item: Item): Item {
  return Object.freeze({
    ...item,
    parent: Object.freeze({ ...item.parent }),
    kind: Object.freeze({ ...item.kind }),
  });
}

function byName(a: Item, b: Item): number {
  return a.name.localeCompare(b.name) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

export function createLiveIndex(options: LiveIndexOptions): LiveIndex {
  const { reader, logger } = options;
  const readConcurrency = resolveConcurrency(
    options.readConcurrency,
    DEFAULT_READ_CONCURRENCY,
  );

  // Frozen on insert; rebuild swaps the whole map.
  let items: Lookup = new Map();
  const locks = new KeyedLock();

  // While a rebuild runs, every single-item write is stamped here so the
  // swap can keep it over the rebuild's older read.
  let writeSeq = 0;
  let rebuildsInFlight = 0;
  const writtenAt = new Map<string, number>();

  function noteWrite(id: string): void {
    writeSeq++;
    if (rebuildsInFlight > 0) {
      writtenAt.set(id, writeSeq);
    }
  }

  function store(item: Item): Item {
    const frozen = freezeItem(item);
    items.set(frozen.id, frozen);
    noteWrite(frozen.id);
    return frozen;
  }

  /** Carry writes made after `since` from the live map into `next`. */
  function keepNewerWrites(next: Lookup, since: number): void {
    for (const [id, seq] of writtenAt) {
      if (seq <= since) continue;
      const live = items.get(id);
      if (live === undefined) {
        next.delete(id);
      } else {
        next.set(id, live);
      }
    }
  }

  function snapshot(): Item[] {
    return [...items.values()];
  }

  const lookup: ItemLookup = {
    get: (id) => items.get(id),
    snapshot,
  };

  function childrenOf(parent: Parent): Item[] {
    return snapshot()
      .filter((item) => parentEquals(item.parent, parent))
      .sort(byName);
  }

  function pinned(): Item[] {
    return snapshot()
      .filter((item) => item.pinned)
      .sort(byName);
  }

  function resolve(path: string): Item {
    const resolution = resolvePath(lookup, path);
    switch (resolution.status) {
      case "resolved":
        return resolution.item;
      case "ambiguous":
        throw new AmbiguousPathError(path, resolution.candidates);
      case "unresolved":
        throw new NotFoundError(`No item at ${path}`, { path });
    }
  }

  function resolveTarget(targetDirPath: string): Parent {
    const segments = splitPath(targetDirPath);
    if (isRootPath(segments)) return ROOT;
    if (isTrashPath(segments)) return TRASH;

    const target = resolve(targetDirPath);
    if (!isDirectory(target)) {
      throw new NotADirectoryError(targetDirPath);
    }
    return directoryParent(target.id);
  }

  /** Whether `id` is `ancestorId` or sits somewhere below it. */
  function isWithin(id: string, ancestorId: string): boolean {
    const visited = new Set<string>();
    let current: string | undefined = id;
    while (current !== undefined && !visited.has(current)) {
      if (current === ancestorId) return true;
      visited.add(current);
      const parent: Parent | undefined = items.get(current)?.parent;
      current = parent?.type === "directory" ? parent.id : undefined;
    }
    return false;
  }

  return {
    get size() {
      return items.size;
    },

    get: lookup.get,
    snapshot,

    async rebuild() {
      logger.info({ baseDir: reader.baseDir }, "Rebuilding index");

      const startedAt = writeSeq;
      rebuildsInFlight++;
      try {
        let ids: string[];
        try {
          ids = await reader.listIdentifiers();
        } catch (err) {
          logger.error({ baseDir: reader.baseDir, err }, "Cannot list store, keeping current index");
          throw err;
        }

        const next: Lookup = new Map();
        let failed = 0;
        await forEachConcurrent(ids, readConcurrency, async (id) => {
          try {
            next.set(id, freezeItem(await reader.readItem(id)));
          } catch (err) {
            failed++;
            logger.error({ id, err }, "Failed to read item, skipping");
          }
        });

        keepNewerWrites(next, startedAt);
        items = next;
        logger.info({ indexed: next.size, failed }, "Index rebuilt");
        return { indexed: next.size, failed };
      } finally {
        rebuildsInFlight--;
        if (rebuildsInFlight === 0) {
          writtenAt.clear();
        }
      }
    },

    upsert: store,

    remove(id) {
      const removed = items.delete(id);
      noteWrite(id);
      if (removed) {
        logger.debug({ id }, "Removed item");
      }
      return removed;
    },

    refresh(id) {
      return locks.run(id, async () => {
        const item = store(await reader.readItem(id));
        logger.debug({ id }, "Refreshed item");
        return item;
      });
    },

    resolve,

    pathOf(id) {
      return pathOf(lookup, id);
    },

    list(path) {
      const segments = splitPath(path);
      if (isRootPath(segments)) return childrenOf(ROOT);
      if (isTrashPath(segments)) return childrenOf(TRASH);
      if (isPinnedPath(segments)) return pinned();

      const resolution = resolvePath(lookup, path);
      if (resolution.status === "ambiguous") {
        throw new AmbiguousPathError(path, resolution.candidates);
      }
      if (resolution.status === "unresolved") {
        logger.warn({ path }, "No directory found for path");
        return [];
      }
      if (!isDirectory(resolution.item)) {
        logger.warn({ path, id: resolution.item.id }, "Cannot list a document");
        return [];
      }
      return childrenOf(directoryParent(resolution.item.id));
    },

    pinned,

    trash() {
      return childrenOf(TRASH);
    },

    async moveItem(itemPath, targetDirPath) {
      const item = resolve(itemPath);
      const target = resolveTarget(targetDirPath);

      if (target.type === "directory" && isWithin(target.id, item.id)) {
        throw new InvalidMoveError(
          `Cannot move ${itemPath} into itself or one of its descendants`,
          { itemPath, targetDirPath },
        );
      }

      return locks.run(item.id, async () => {
        await reader.rewriteParent(item.id, target);
        logger.info({ id: item.id, itemPath, targetDirPath }, "Moved item");

        try {
          return store(await reader.readItem(item.id));
        } catch (err) {
          // The write landed; index the new parent until the next refresh.
          logger.error({ id: item.id, err }, "Failed to re-read moved item");
          return store({ ...item, parent: target });
        }
      });
    },
  };
}
