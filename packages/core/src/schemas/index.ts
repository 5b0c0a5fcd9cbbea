export {
  ParentFieldSchema,
  MetadataSchema,
  ContentSchema,
  encodeParent,
  type Metadata,
  type Content,
} from "./sidecar.js";
export {
  DEFAULTS,
  LogLevel,
  createStoreConfigSchema,
  type StoreConfig,
  type IndexConfig,
  type WatchConfig,
  type LoggingConfig,
} from "./store-config.js";
