import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, unlink } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Logger } from "pino";
import { openStore, openStoreFromConfig, type Store } from "./open-store.js";
import { NotFoundError } from "../errors/catalog.js";
import { createStoreConfigSchema } from "../schemas/store-config.js";
import {
  makeMockLogger,
  testId,
  writeDirectory,
  writeDocument,
} from "../test-utils/store.js";
import { makeFakeSource, type FakeSource } from "../test-utils/watch.js";

const BOOKS = testId(1);
const ALICE = testId(2);
const EMMA = testId(3);

describe("openStore", () => {
  let baseDir: string;
  let logger: Logger;
  let fake: FakeSource;
  let store: Store | undefined;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "open-store-test-"));
    await writeDirectory(baseDir, { id: BOOKS, name: "Books" });
    await writeDocument(baseDir, { id: ALICE, name: "Alice", parent: BOOKS });
    logger = makeMockLogger();
    fake = makeFakeSource();
    store = undefined;
  });

  afterEach(async () => {
    await store?.close();
    await rm(baseDir, { recursive: true, force: true });
  });

  it("indexes the store and starts watching", async () => {
    store = await openStore({
      baseDir,
      logger,
      watch: { source: fake.source, debounceMs: 60_000 },
    });

    expect(store.initialRebuild).toEqual({ indexed: 2, failed: 0 });
    expect(store.index.size).toBe(2);
    expect(store.index.resolve("/Books/Alice").id).toBe(ALICE);
    expect(store.watcher?.state).toBe("watching");
    expect(fake.subscribe.mock.calls[0]?.[0]).toBe(baseDir);
  });

  it("applies watched changes to the index", async () => {
    store = await openStore({
      baseDir,
      logger,
      watch: { source: fake.source, debounceMs: 60_000 },
    });

    await writeDocument(baseDir, { id: EMMA, name: "Emma", parent: BOOKS });
    fake.emit("add", join(baseDir, `${EMMA}.metadata`));
    await unlink(join(baseDir, `${ALICE}.metadata`));
    fake.emit("unlink", join(baseDir, `${ALICE}.metadata`));

    const result = await store.watcher?.flush();

    expect(result).toEqual({ deleted: 1, updated: 1, failed: 0 });
    expect(store.index.list("/Books").map((item) => item.id)).toEqual([EMMA]);
  });

  it("skips the watcher when watching is disabled", async () => {
    store = await openStore({
      baseDir,
      logger,
      watch: { enabled: false, source: fake.source },
    });

    expect(store.watcher).toBeNull();
    expect(fake.subscribe).not.toHaveBeenCalled();
    expect(store.index.size).toBe(2);
  });

  it("keeps serving the index when the watcher cannot start", async () => {
    fake.subscribe.mockRejectedValueOnce(new Error("ENOSPC"));

    store = await openStore({ baseDir, logger, watch: { source: fake.source } });

    expect(store.watcher?.state).toBe("failed");
    expect(store.index.size).toBe(2);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("fails when the store directory is missing", async () => {
    await expect(
      openStore({
        baseDir: join(baseDir, "missing"),
        logger,
        watch: { source: fake.source },
      }),
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(fake.subscribe).not.toHaveBeenCalled();
  });

  it("close stops the watcher", async () => {
    store = await openStore({ baseDir, logger, watch: { source: fake.source } });

    await store.close();

    expect(store.watcher?.state).toBe("stopped");
    expect(fake.close).toHaveBeenCalledTimes(1);
  });
});

describe("openStoreFromConfig", () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "open-store-config-test-"));
    await writeDirectory(baseDir, { id: BOOKS, name: "Books" });
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("takes the store path and watch settings from the config", async () => {
    const config = createStoreConfigSchema(baseDir).parse({
      watch: { enabled: true, debounceMs: 60_000 },
    });
    const fake = makeFakeSource();

    const store = await openStoreFromConfig(config, {
      logger: makeMockLogger(),
      source: fake.source,
    });

    try {
      expect(store.baseDir).toBe(baseDir);
      expect(store.index.size).toBe(1);
      expect(store.watcher?.state).toBe("watching");
    } finally {
      await store.close();
    }
  });

  it("does not watch when the config disables it", async () => {
    const config = createStoreConfigSchema(baseDir).parse({
      watch: { enabled: false },
    });

    const store = await openStoreFromConfig(config, { logger: makeMockLogger() });

    expect(store.watcher).toBeNull();
    await store.close();
  });
});
