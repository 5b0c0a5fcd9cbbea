import { basename, extname, join } from "node:path";

export const METADATA_EXTENSION = "metadata";
export const CONTENT_EXTENSION = "content";

export type SidecarKind = typeof METADATA_EXTENSION | typeof CONTENT_EXTENSION;

export interface SidecarRef {
  id: string;
  sidecar: SidecarKind;
}

const IDENTIFIER_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Canonical (lower-case) identifier, or undefined if `value` is not one. */
export function parseIdentifier(value: string): string | undefined {
  return IDENTIFIER_PATTERN.test(value) ? value.toLowerCase() : undefined;
}

/** "<base>/<id>.metadata" */
export function sidecarPath(
  baseDir: string,
  id: string,
  sidecar: SidecarKind,
): string {
  return join(baseDir, `${id}.${sidecar}`);
}

/**
 * Splits a sidecar file path into its identifier and sidecar kind.
 * Anything else (temp files, page data, directories) yields undefined.
 */
export function classifySidecar(path: string): SidecarRef | undefined {
  const ext = extname(path);
  const sidecar = ext.slice(1);
  if (sidecar !== METADATA_EXTENSION && sidecar !== CONTENT_EXTENSION) {
    return undefined;
  }

  const id = parseIdentifier(basename(path, ext));
  return id === undefined ? undefined : { id, sidecar };
}

/** Identifier encoded in a metadata or content sidecar path. */
export function classifyPath(path: string): string | undefined {
  return classifySidecar(path)?.id;
}
