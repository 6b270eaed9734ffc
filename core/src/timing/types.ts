/**
 * Types for operation timing.
 */

import type { HookContext, HookOutcome } from "../notifications/types.js";

/**
 * Where the elapsed time of an operation comes from.
 */
export type DurationSource =
  | { kind: "explicit"; seconds: number }
  | { kind: "start-file"; path: string };

export interface LongOperationInput {
  source: DurationSource;
  /** Notify only when elapsed seconds are strictly greater than this. Default 30. */
  threshold?: number;
  /** Label used in the notification title. Default "Operation". */
  operationType?: string;
}

export interface TimingContext extends HookContext {
  /** Epoch milliseconds. Defaults to Date.now. */
  now?: () => number;
}

export type LongOperationOutcome =
  | { status: "notified"; elapsedSeconds: number; hook: HookOutcome }
  | { status: "below-threshold"; elapsedSeconds: number }
  | { status: "no-timing" }
  | { status: "not-configured" };
