export {
  TRASH_NAME,
  PINNED_NAME,
  splitPath,
  joinPath,
  isRootPath,
  isTrashPath,
  isPinnedPath,
} from "./paths.js";

export {
  resolvePath,
  matchesParentChain,
  pathOf,
} from "./resolver.js";

export type { ItemLookup, Resolution } from "./resolver.js";
