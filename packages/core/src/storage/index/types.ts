import type { Logger } from "pino";
import type { RecordReader } from "../../records/reader.js";

export interface LiveIndexOptions {
  reader: RecordReader
  logger: Logger
  /** Max sidecar reads in flight during a rebuild (default: 32) */
  readConcurrency?: number
}

export interface RebuildResult {
  indexed: number // items read successfully
  failed: number // identifiers skipped after a read error
}
