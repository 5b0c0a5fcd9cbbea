/** Virtual directory listing every item whose parent is the trash. */
export const TRASH_NAME = "Trash";

/** Virtual directory listing every pinned item, wherever it lives. */
export const PINNED_NAME = "Favorites";

/** "/Books//Fiction/" → ["Books", "Fiction"]. The root is []. */
export function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment !== "");
}

/** ["Books", "Fiction"] → "/Books/Fiction" */
export function joinPath(segments: readonly string[]): string {
  return "/" + segments.join("/");
}

export function isRootPath(segments: readonly string[]): boolean {
  return segments.length === 0;
}

export function isTrashPath(segments: readonly string[]): boolean {
  return segments.length === 1 && segments[0] === TRASH_NAME;
}

export function isPinnedPath(segments: readonly string[]): boolean {
  return segments.length === 1 && segments[0] === PINNED_NAME;
}
