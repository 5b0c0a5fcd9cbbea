import type { ChangeEvent } from "./types.js";

export interface PendingChanges {
  toDelete: ReadonlySet<string>;
  toUpdate: ReadonlySet<string>;
}

/**
 * Identifiers touched since the last flush. Sets, so any number of events
 * for one identifier within a window cost a single re-read.
 */
export class PendingChangeSet {
  private toDelete = new Set<string>();
  private toUpdate = new Set<string>();

  get size(): number {
    return this.toDelete.size + this.toUpdate.size;
  }

  add(event: ChangeEvent): void {
    if (event.removed) {
      this.toDelete.add(event.id);
    } else {
      this.toUpdate.add(event.id);
    }
  }

  /** Hand over both sets and start empty ones. */
  take(): PendingChanges {
    const taken = { toDelete: this.toDelete, toUpdate: this.toUpdate };
    this.toDelete = new Set();
    this.toUpdate = new Set();
    return taken;
  }
}
