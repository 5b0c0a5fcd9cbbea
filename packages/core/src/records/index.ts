export type { Parent, DocumentFormat, ItemKind, Item } from "./types.js";
export {
  ROOT,
  TRASH,
  directoryParent,
  isDirectory,
  parentEquals,
} from "./types.js";
export {
  METADATA_EXTENSION,
  CONTENT_EXTENSION,
  parseIdentifier,
  sidecarPath,
  classifySidecar,
  classifyPath,
  type SidecarKind,
  type SidecarRef,
} from "./paths.js";
export {
  createRecordReader,
  readItem,
  listIdentifiers,
  rewriteParent,
  type RecordReader,
} from "./reader.js";
