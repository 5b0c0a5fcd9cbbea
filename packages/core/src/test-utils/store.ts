/**
 * Fixture builders for on-disk stores and in-memory items.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { vi } from "vitest";
import type { Logger } from "pino";
import type { DocumentFormat, Item, Parent } from "../records/types.js";

/** Deterministic identifier: seed 1 → 00000000-0000-4000-8000-000000000001 */
export function testId(seed: number): string {
  return `00000000-0000-4000-8000-${seed.toString(16).padStart(12, "0")}`;
}

export interface FixtureItem {
  id: string;
  name: string;
  /** Raw on-disk value: "" (root), "trash", or a directory identifier */
  parent?: string;
  pinned?: boolean;
  /** Extra metadata fields written verbatim */
  extra?: Record<string, unknown>;
}

export async function writeDirectory(
  baseDir: string,
  item: FixtureItem,
): Promise<void> {
  await writeFile(
    join(baseDir, `${item.id}.metadata`),
    JSON.stringify({
      type: "CollectionType",
      visibleName: item.name,
      parent: item.parent ?? "",
      pinned: item.pinned ?? false,
      ...item.extra,
    }),
  );
}

export async function writeDocument(
  baseDir: string,
  item: FixtureItem & { format?: DocumentFormat },
): Promise<void> {
  await writeFile(
    join(baseDir, `${item.id}.metadata`),
    JSON.stringify({
      type: "DocumentType",
      visibleName: item.name,
      parent: item.parent ?? "",
      pinned: item.pinned ?? false,
      ...item.extra,
    }),
  );
  await writeFile(
    join(baseDir, `${item.id}.content`),
    JSON.stringify({ fileType: item.format ?? "notebook" }),
  );
}

export function makeDirectory(
  id: string,
  name: string,
  parent: Parent = { type: "root" },
  pinned = false,
): Item {
  return { id, name, parent, pinned, kind: { type: "directory" } };
}

export function makeDocument(
  id: string,
  name: string,
  parent: Parent = { type: "root" },
  pinned = false,
  format: DocumentFormat = "notebook",
): Item {
  return { id, name, parent, pinned, kind: { type: "document", format } };
}

export async function withTempStore(
  fn: (baseDir: string) => Promise<void>,
): Promise<void> {
  const baseDir = await mkdtemp(join(tmpdir(), "store-test-"));
  try {
    await fn(baseDir);
  } finally {
    await rm(baseDir, { recursive: true, force: true });
  }
}

/** Children share the parent's spies. */
export function makeMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}
