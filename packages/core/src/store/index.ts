export {
  openStore,
  openStoreFromConfig,
  type OpenStoreOptions,
  type OpenStoreFromConfigOptions,
  type Store,
} from "./open-store.js";
