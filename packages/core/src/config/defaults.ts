import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "shelf-index");

/** Where the tablet firmware keeps its sidecar store. */
export const DEVICE_STORE_PATH = "/home/root/.local/share/remarkable/xochitl";

/**
 * Store directory used when config.json names none: the device store when
 * running on the tablet itself (linux/arm), otherwise `<root>/store`.
 */
export function defaultStorePath(
  rootPath: string,
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): string {
  if (platform === "linux" && arch === "arm") {
    return DEVICE_STORE_PATH;
  }
  return join(rootPath, "store");
}
