import chokidar from "chokidar";
import type { RawEventKind } from "./types.js";

export interface WatchHandlers {
  /** Called on the delivery path; must only queue work. */
  onEvent(kind: RawEventKind, path: string): void;
  onError(err: Error): void;
}

export interface WatchSubscription {
  close(): Promise<void>;
}

/** Recursive change notifications under a directory. */
export interface WatchSource {
  subscribe(dir: string, handlers: WatchHandlers): Promise<WatchSubscription>;
}

export interface ChokidarSourceOptions {
  /** Poll instead of using native events (network mounts, tests) */
  usePolling?: boolean;
  /** Polling interval in milliseconds (default: chokidar's 100) */
  interval?: number;
}

export function createChokidarSource(
  options?: ChokidarSourceOptions,
): WatchSource {
  return {
    async subscribe(dir, handlers) {
      const watcher = chokidar.watch(dir, {
        persistent: true,
        ignoreInitial: true,
        ignorePermissionErrors: true,
        usePolling: options?.usePolling ?? false,
        ...(options?.interval !== undefined && { interval: options.interval }),
      });

      watcher.on("all", (eventName, path) => handlers.onEvent(eventName, path));
      watcher.on("error", (err) =>
        handlers.onError(err instanceof Error ? err : new Error(String(err))),
      );

      await new Promise<void>((resolve) => {
        watcher.once("ready", () => resolve());
      });

      return {
        close: () => watcher.close(),
      };
    },
  };
}
