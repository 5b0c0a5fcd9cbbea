/** Where an item lives: at the root, in the trash, or inside a directory. */
export type Parent =
  | { type: "root" }
  | { type: "trash" }
  | { type: "directory"; id: string };

export type DocumentFormat = "notebook" | "pdf" | "epub";

export type ItemKind =
  | { type: "directory" }
  | { type: "document"; format: DocumentFormat };

/** One directory or document entry. Replaced wholesale, never mutated. */
export interface Item {
  readonly id: string;
  readonly name: string;
  readonly parent: Parent;
  readonly pinned: boolean;
  readonly kind: ItemKind;
}

export const ROOT: Parent = { type: "root" };
export const TRASH: Parent = { type: "trash" };

export function directoryParent(id: string): Parent {
  return { type: "directory", id };
}

export function isDirectory(item: Item): boolean {
  return item.kind.type === "directory";
}

export function parentEquals(a: Parent, b: Parent): boolean {
  if (a.type === "directory" && b.type === "directory") {
    return a.id === b.id;
  }
  return a.type === b.type;
}
