/**
 * Per-user lane queue types
 */

import { DebugLogger } from '../debug-logger.js';

/**
 * State of one user's lane
 */
export interface LaneState {
  /** Lane identifier ("user:<id>") */
  lane: string;
  /** Pending tasks in arrival order */
  queue: QueueEntry[];
  /** Whether a task is currently executing */
  running: boolean;
}

/**
 * Entry in a lane. `run` settles the caller's promise and never rejects.
 */
export interface QueueEntry {
  run: () => Promise<void>;
  /** Timestamp when task was enqueued */
  enqueuedAt: number;
}

/**
 * Logger interface for lane events
 */
export interface LaneLogger {
  debug: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export interface UserLaneQueueConfig {
  /** Warn when a task waited at least this long before running (default: 2000) */
  warnAfterMs?: number;
  logger?: LaneLogger;
}

const laneLogger = new DebugLogger('lane');

export const defaultLogger: LaneLogger = {
  debug: (msg) => laneLogger.debug(msg),
  warn: (msg) => laneLogger.warn(msg),
  error: (msg) => laneLogger.error(msg),
};
