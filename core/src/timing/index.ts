export type {
  DurationSource,
  LongOperationInput,
  LongOperationOutcome,
  TimingContext,
} from "./types.js";
export type { StartTimestampResult } from "./start-file.js";
export { createStartFile, readStartTimestamp, consumeStartFile } from "./start-file.js";
export { shouldNotify, resolveElapsedSeconds, runLongOperation } from "./long-operation.js";
