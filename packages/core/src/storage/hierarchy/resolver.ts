import { isDirectory, type Item } from "../../records/types.js";
import { TRASH_NAME, joinPath, splitPath } from "./paths.js";

/** Read access the resolver needs from an index. */
export interface ItemLookup {
  get(id: string): Item | undefined;
  snapshot(): Item[];
}

export type Resolution =
  | { status: "resolved"; item: Item }
  | { status: "unresolved" }
  | { status: "ambiguous"; candidates: string[] };

/**
 * Map a display path to an item.
 *
 * Candidates are the items whose name equals the last segment. A single
 * candidate is returned as-is. With several, each candidate's parent chain
 * is checked against the rest of the path and the first match (by
 * identifier) wins; if none matches the path is ambiguous.
 */
export function resolvePath(lookup: ItemLookup, path: string): Resolution {
  const segments = splitPath(path);
  const name = segments[segments.length - 1];
  if (name === undefined) {
    return { status: "unresolved" };
  }

  const candidates = lookup
    .snapshot()
    .filter((item) => item.name === name)
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  const [first] = candidates;
  if (first === undefined) {
    return { status: "unresolved" };
  }
  if (candidates.length === 1) {
    return { status: "resolved", item: first };
  }

  const match = candidates.find((item) =>
    matchesParentChain(lookup, segments, item),
  );
  if (match === undefined) {
    return {
      status: "ambiguous",
      candidates: candidates.map((item) => item.id),
    };
  }
  return { status: "resolved", item: match };
}

/**
 * Whether `item` actually lives at `segments`, walking up its parents.
 *
 * - parent segments left, parent is a directory: that directory must exist,
 *   be a directory and carry the next name up; continue from it
 * - the only parent segment is the trash name: parent must be the trash
 * - no parent segments left: parent must be the root
 *
 * Anything else does not match. A parent seen twice is a cycle and does
 * not match either.
 */
export function matchesParentChain(
  lookup: ItemLookup,
  segments: readonly string[],
  item: Item,
): boolean {
  const visited = new Set<string>([item.id]);
  let remaining = segments.slice(0, -1);
  let current = item;

  for (;;) {
    const parent = current.parent;
    const expectedName = remaining[remaining.length - 1];

    if (expectedName === undefined) {
      return parent.type === "root";
    }

    if (parent.type === "directory") {
      if (visited.has(parent.id)) return false;
      visited.add(parent.id);

      const dir = lookup.get(parent.id);
      if (dir === undefined || !isDirectory(dir) || dir.name !== expectedName) {
        return false;
      }
      current = dir;
      remaining = remaining.slice(0, -1);
      continue;
    }

    if (parent.type === "trash") {
      return remaining.length === 1 && expectedName === TRASH_NAME;
    }

    return false;
  }
}

/**
 * Display path of an item rebuilt from its parent chain, e.g.
 * "/Books/Fiction/Dune" or "/Trash/Old". Undefined when the chain
 * dangles or loops.
 */
export function pathOf(lookup: ItemLookup, id: string): string | undefined {
  const segments: string[] = [];
  const visited = new Set<string>();
  let current = lookup.get(id);

  while (current !== undefined) {
    if (visited.has(current.id)) return undefined;
    visited.add(current.id);
    segments.unshift(current.name);

    const parent = current.parent;
    if (parent.type === "root") {
      return joinPath(segments);
    }
    if (parent.type === "trash") {
      return joinPath([TRASH_NAME, ...segments]);
    }
    current = lookup.get(parent.id);
  }

  return undefined;
}
