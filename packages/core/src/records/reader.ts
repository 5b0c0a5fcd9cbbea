import { readFile, readdir, rename, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import type { z } from "zod";
import { IoError, NotFoundError, ParseError } from "../errors/catalog.js";
import {
  ContentSchema,
  MetadataSchema,
  encodeParent,
} from "../schemas/sidecar.js";
import {
  METADATA_EXTENSION,
  CONTENT_EXTENSION,
  classifySidecar,
  sidecarPath,
  type SidecarKind,
} from "./paths.js";
import type { Item, ItemKind, Parent } from "./types.js";

/** Disk access for one store, bound to its base directory. */
export interface RecordReader {
  readonly baseDir: string;
  readItem(id: string): Promise<Item>;
  listIdentifiers(): Promise<string[]>;
  rewriteParent(id: string, parent: Parent): Promise<void>;
}

export function createRecordReader(baseDir: string): RecordReader {
  return {
    baseDir,
    readItem: (id) => readItem(baseDir, id),
    listIdentifiers: () => listIdentifiers(baseDir),
    rewriteParent: (id, parent) => rewriteParent(baseDir, id, parent),
  };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function toStoreError(err: unknown, path: string): Error {
  if (isErrnoException(err) && err.code === "ENOENT") {
    return new NotFoundError(`Missing file: ${path}`, { path });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new IoError(`Failed to access ${path}: ${message}`, { path });
}

async function readRaw(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err: unknown) {
    throw toStoreError(err, path);
  }
}

function parseJson(raw: string, path: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    throw new ParseError(`Invalid JSON in ${path}`, {
      path,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}

async function readSidecar<T>(
  baseDir: string,
  id: string,
  sidecar: SidecarKind,
  schema: z.ZodType<T>,
): Promise<T> {
  const path = sidecarPath(baseDir, id, sidecar);
  const result = schema.safeParse(parseJson(await readRaw(path), path));
  if (!result.success) {
    throw new ParseError(`Unexpected ${sidecar} format in ${path}`, {
      path,
      issues: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Read one item from its sidecars. Documents also need `<id>.content`
 * for their format; directories only have metadata.
 */
export async function readItem(baseDir: string, id: string): Promise<Item> {
  const metadata = await readSidecar(
    baseDir,
    id,
    METADATA_EXTENSION,
    MetadataSchema,
  );

  let kind: ItemKind;
  if (metadata.type === "DocumentType") {
    const content = await readSidecar(
      baseDir,
      id,
      CONTENT_EXTENSION,
      ContentSchema,
    );
    kind = { type: "document", format: content.fileType };
  } else {
    kind = { type: "directory" };
  }

  return {
    id,
    name: metadata.visibleName,
    parent: metadata.parent,
    pinned: metadata.pinned,
    kind,
  };
}

/** Identifiers of every metadata sidecar directly under `baseDir`, sorted. */
export async function listIdentifiers(baseDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(baseDir);
  } catch (err: unknown) {
    throw toStoreError(err, baseDir);
  }

  const ids: string[] = [];
  for (const entry of entries) {
    const ref = classifySidecar(entry);
    if (ref?.sidecar === METADATA_EXTENSION) {
      ids.push(ref.id);
    }
  }
  return ids.sort();
}

/**
 * Replace the `parent` field of `<id>.metadata` in place. Every other
 * field, known or not, is written back untouched. Atomic: temp file, rename.
 */
export async function rewriteParent(
  baseDir: string,
  id: string,
  parent: Parent,
): Promise<void> {
  const path = sidecarPath(baseDir, id, METADATA_EXTENSION);
  const value = parseJson(await readRaw(path), path);
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ParseError(`Expected a JSON object in ${path}`, { path });
  }

  const updated = { ...value, parent: encodeParent(parent) };
  const tempPath = path + ".tmp." + randomUUID();
  try {
    await writeFile(tempPath, JSON.stringify(updated, null, 2), "utf-8");
    await rename(tempPath, path);
  } catch (err: unknown) {
    throw toStoreError(err, path);
  }
}
