export {
  DEFAULT_ROOT_PATH,
  DEVICE_STORE_PATH,
  defaultStorePath,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveRootPath, resolveStorePath } from "./paths.js";
