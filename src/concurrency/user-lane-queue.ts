/**
 * Per-user lane queue
 *
 * Messages from one user are handled strictly one after another, in the
 * order they arrived; messages from different users run side by side. The
 * wizard relies on this: the session store has no locking of its own.
 *
 * @example
 * ```typescript
 * const lanes = new UserLaneQueue();
 * const reply = await lanes.enqueue('12345', async () => engine.handle('12345', event));
 * ```
 */

import {
  type LaneState,
  type QueueEntry,
  type UserLaneQueueConfig,
  type LaneLogger,
  defaultLogger,
} from './types.js';

export class UserLaneQueue {
  private lanes: Map<string, LaneState> = new Map();
  private warnAfterMs: number;
  private logger: LaneLogger;

  constructor(config?: UserLaneQueueConfig) {
    this.warnAfterMs = config?.warnAfterMs ?? 2000;
    this.logger = config?.logger ?? defaultLogger;
  }

  /**
   * Lane name for a user id: "42" → "user:42"
   */
  static laneFor(userId: string): string {
    return `user:${userId.trim()}`;
  }

  /**
   * Run `task` after every task already queued for the same user
   */
  enqueue<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const lane = UserLaneQueue.laneFor(userId);
    let state = this.lanes.get(lane);
    if (!state) {
      state = { lane, queue: [], running: false };
      this.lanes.set(lane, state);
    }
    const laneState = state;

    return new Promise<T>((resolve, reject) => {
      const entry: QueueEntry = {
        enqueuedAt: Date.now(),
        run: async () => {
          const startTime = Date.now();
          try {
            const result = await task();
            this.logger.debug(
              `Task done: lane=${lane} duration=${Date.now() - startTime}ms queued=${laneState.queue.length}`
            );
            resolve(result);
          } catch (err) {
            this.logger.debug(
              `Task error: lane=${lane} duration=${Date.now() - startTime}ms error="${String(err)}"`
            );
            reject(err);
          }
        },
      };
      laneState.queue.push(entry);
      this.logger.debug(
        `Enqueued: lane=${lane} size=${laneState.queue.length + (laneState.running ? 1 : 0)}`
      );
      this.pump(laneState);
    });
  }

  /**
   * Queued plus running tasks for a user
   */
  getQueueSize(userId: string): number {
    const state = this.lanes.get(UserLaneQueue.laneFor(userId));
    if (!state) return 0;
    return state.queue.length + (state.running ? 1 : 0);
  }

  /**
   * Queued plus running tasks across all users
   */
  getTotalQueueSize(): number {
    let total = 0;
    for (const state of this.lanes.values()) {
      total += state.queue.length + (state.running ? 1 : 0);
    }
    return total;
  }

  /**
   * Lanes that currently hold work
   */
  getLanes(): string[] {
    return Array.from(this.lanes.keys());
  }

  private pump(state: LaneState): void {
    if (state.running) return;

    const entry = state.queue.shift();
    if (!entry) {
      // Idle lanes are dropped so the map only holds users with work
      this.lanes.delete(state.lane);
      return;
    }

    const waitedMs = Date.now() - entry.enqueuedAt;
    if (waitedMs >= this.warnAfterMs) {
      this.logger.warn(
        `Long wait: lane=${state.lane} waited=${waitedMs}ms queue=${state.queue.length}`
      );
    }

    state.running = true;
    void entry.run().finally(() => {
      state.running = false;
      this.pump(state);
    });
  }
}
