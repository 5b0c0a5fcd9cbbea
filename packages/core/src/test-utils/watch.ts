import { vi } from "vitest";
import type { WatchHandlers, WatchSource } from "../sync/source.js";
import type { RawEventKind } from "../sync/types.js";

/** In-process watch source; tests push events through `emit`. */
export function makeFakeSource() {
  let handlers: WatchHandlers | undefined;
  const close = vi.fn(async () => {});
  const subscribe = vi.fn(async (_dir: string, h: WatchHandlers) => {
    handlers = h;
    return { close };
  });
  const source: WatchSource = { subscribe };

  return {
    source,
    subscribe,
    close,
    emit(kind: RawEventKind, path: string) {
      handlers?.onEvent(kind, path);
    },
    error(err: Error) {
      handlers?.onError(err);
    },
  };
}

export type FakeSource = ReturnType<typeof makeFakeSource>;
