import { describe, it, expect } from "vitest";
import {
  matchesParentChain,
  pathOf,
  resolvePath,
  type ItemLookup,
} from "./resolver.js";
import type { Item, Parent } from "../../records/types.js";
import { makeDirectory, makeDocument, testId } from "../../test-utils/store.js";

function lookupOf(items: Item[]): ItemLookup {
  const map = new Map(items.map((item) => [item.id, item]));
  return {
    get: (id) => map.get(id),
    snapshot: () => [...map.values()],
  };
}

const inDir = (id: string): Parent => ({ type: "directory", id });
const TRASH: Parent = { type: "trash" };

const folder1 = makeDirectory(testId(1), "Folder1");
const folder2 = makeDirectory(testId(2), "Folder2");
const notesIn1 = makeDocument(testId(3), "Notes", inDir(testId(1)));
const notesIn2 = makeDocument(testId(4), "Notes", inDir(testId(2)));
const notesAtRoot = makeDocument(testId(5), "Notes");
const notesInTrash = makeDocument(testId(6), "Notes", TRASH);

describe("resolvePath", () => {
  it("is unresolved for the root and for unknown names", () => {
    const lookup = lookupOf([folder1, notesIn1]);
    expect(resolvePath(lookup, "/")).toEqual({ status: "unresolved" });
    expect(resolvePath(lookup, "/Folder1/Missing")).toEqual({ status: "unresolved" });
  });

  it("returns a unique name without checking its parents", () => {
    const lookup = lookupOf([folder1, notesIn1]);
    expect(resolvePath(lookup, "/Elsewhere/Notes")).toEqual({
      status: "resolved",
      item: notesIn1,
    });
  });

  it("picks the candidate whose parent chain matches", () => {
    const lookup = lookupOf([folder1, folder2, notesIn1, notesIn2]);
    expect(resolvePath(lookup, "/Folder1/Notes")).toEqual({
      status: "resolved",
      item: notesIn1,
    });
    expect(resolvePath(lookup, "Folder2/Notes/")).toEqual({
      status: "resolved",
      item: notesIn2,
    });
  });

  it("tells a root item apart from a nested one", () => {
    const lookup = lookupOf([folder1, notesIn1, notesAtRoot]);
    expect(resolvePath(lookup, "/Notes")).toEqual({
      status: "resolved",
      item: notesAtRoot,
    });
    expect(resolvePath(lookup, "/Folder1/Notes")).toEqual({
      status: "resolved",
      item: notesIn1,
    });
  });

  it("resolves trashed items under the trash name", () => {
    const lookup = lookupOf([notesAtRoot, notesInTrash]);
    expect(resolvePath(lookup, "/Trash/Notes")).toEqual({
      status: "resolved",
      item: notesInTrash,
    });
    expect(resolvePath(lookup, "/Notes")).toEqual({
      status: "resolved",
      item: notesAtRoot,
    });
  });

  it("verifies the whole chain, not just the direct parent", () => {
    const books = makeDirectory(testId(10), "Books");
    const work = makeDirectory(testId(11), "Work");
    const fictionInBooks = makeDirectory(testId(12), "Fiction", inDir(testId(10)));
    const fictionInWork = makeDirectory(testId(13), "Fiction", inDir(testId(11)));
    const dune = makeDocument(testId(14), "Dune", inDir(testId(12)));
    const duneDraft = makeDocument(testId(15), "Dune", inDir(testId(13)));
    const lookup = lookupOf([books, work, fictionInBooks, fictionInWork, dune, duneDraft]);

    expect(resolvePath(lookup, "/Work/Fiction/Dune")).toEqual({
      status: "resolved",
      item: duneDraft,
    });
    expect(resolvePath(lookup, "/Books/Fiction/Dune")).toEqual({
      status: "resolved",
      item: dune,
    });
  });

  it("reports ambiguity with every candidate when no chain matches", () => {
    const lookup = lookupOf([folder1, folder2, notesIn2, notesIn1]);
    expect(resolvePath(lookup, "/Folder3/Notes")).toEqual({
      status: "ambiguous",
      candidates: [testId(3), testId(4)],
    });
  });

  it("does not match a root item against a nested path", () => {
    // Regression: a root item must not satisfy "/Folder1/Notes"
    const lookup = lookupOf([folder1, folder2, notesAtRoot, notesIn2]);
    expect(resolvePath(lookup, "/Folder1/Notes")).toEqual({
      status: "ambiguous",
      candidates: [testId(4), testId(5)],
    });
  });

  it("prefers the smallest identifier when several candidates match", () => {
    const twin = makeDocument(testId(7), "Notes", inDir(testId(1)));
    const lookup = lookupOf([folder1, twin, notesIn1]);
    expect(resolvePath(lookup, "/Folder1/Notes")).toEqual({
      status: "resolved",
      item: notesIn1,
    });
  });
});

describe("matchesParentChain", () => {
  it("requires a root parent when there are no parent segments", () => {
    const lookup = lookupOf([folder1, notesIn1, notesInTrash]);
    expect(matchesParentChain(lookup, ["Notes"], notesAtRoot)).toBe(true);
    expect(matchesParentChain(lookup, ["Notes"], notesIn1)).toBe(false);
    expect(matchesParentChain(lookup, ["Notes"], notesInTrash)).toBe(false);
  });

  it("falls back to no match outside the documented cases", () => {
    const lookup = lookupOf([folder1]);
    // root parent, nested path
    expect(matchesParentChain(lookup, ["Folder1", "Notes"], notesAtRoot)).toBe(false);
    // trash parent, non-trash parent segment
    expect(matchesParentChain(lookup, ["Folder1", "Notes"], notesInTrash)).toBe(false);
    // trash parent, trash nested below something else
    expect(matchesParentChain(lookup, ["Folder1", "Trash", "Notes"], notesInTrash)).toBe(false);
  });

  it("treats a dangling parent as no match", () => {
    const orphan = makeDocument(testId(8), "Notes", inDir(testId(99)));
    expect(matchesParentChain(lookupOf([orphan]), ["Folder1", "Notes"], orphan)).toBe(false);
  });

  it("requires the parent to be a directory", () => {
    const notADir = makeDocument(testId(20), "Folder1");
    const child = makeDocument(testId(21), "Notes", inDir(testId(20)));
    expect(matchesParentChain(lookupOf([notADir, child]), ["Folder1", "Notes"], child)).toBe(false);
  });

  it("stops on a parent cycle", () => {
    const a = makeDirectory(testId(30), "Loop", inDir(testId(31)));
    const b = makeDirectory(testId(31), "Loop", inDir(testId(30)));
    const lookup = lookupOf([a, b]);
    expect(matchesParentChain(lookup, ["Loop", "Loop", "Loop", "Loop"], a)).toBe(false);
  });

  it("stops on an item that is its own parent", () => {
    const self = makeDirectory(testId(32), "Self", inDir(testId(32)));
    expect(matchesParentChain(lookupOf([self]), ["Self", "Self"], self)).toBe(false);
  });
});

describe("pathOf", () => {
  it("rebuilds nested and trashed paths", () => {
    const lookup = lookupOf([folder1, notesIn1, notesAtRoot, notesInTrash]);
    expect(pathOf(lookup, testId(3))).toBe("/Folder1/Notes");
    expect(pathOf(lookup, testId(5))).toBe("/Notes");
    expect(pathOf(lookup, testId(6))).toBe("/Trash/Notes");
  });

  it("is undefined for unknown, dangling or cyclic items", () => {
    const orphan = makeDocument(testId(8), "Orphan", inDir(testId(99)));
    const a = makeDirectory(testId(30), "A", inDir(testId(31)));
    const b = makeDirectory(testId(31), "B", inDir(testId(30)));
    const lookup = lookupOf([orphan, a, b]);

    expect(pathOf(lookup, testId(77))).toBeUndefined();
    expect(pathOf(lookup, testId(8))).toBeUndefined();
    expect(pathOf(lookup, testId(30))).toBeUndefined();
  });
});
