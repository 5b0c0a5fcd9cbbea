import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";

/** "~" and "~/…" point into the current user's home directory. */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/** Absolute root path (config.json and the default store live here). */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

/** Absolute store directory from a configured `store.path`. */
export function resolveStorePath(input: string): string {
  return resolve(expandHomePath(input));
}
