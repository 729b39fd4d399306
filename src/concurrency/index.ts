/**
 * Per-user lane queue: same-user messages in order, different users in parallel
 */

export { UserLaneQueue } from './user-lane-queue.js';

export type { LaneState, QueueEntry, UserLaneQueueConfig, LaneLogger } from './types.js';

export { defaultLogger } from './types.js';
