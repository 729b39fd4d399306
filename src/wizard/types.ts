/**
 * Type definitions for the setup wizard
 */

// ============================================================================
// Catalog
// ============================================================================

/**
 * Rule an answer has to satisfy.
 * - number_positive: decimal number greater than zero
 * - choice_of: one of the listed words (case and surrounding spaces ignored)
 */
export type ValidationRule =
  | { kind: 'number_positive' }
  | { kind: 'choice_of'; choices: readonly string[] };

export type ValidationKind = ValidationRule['kind'];

/**
 * One step of the wizard as written in code or config
 */
export interface QuestionDefinition {
  /** 0-based position; must be contiguous across the catalog */
  index: number;
  /** Stable identifier, e.g. "puffs" */
  key: string;
  /** Caption used in the summary */
  label: string;
  /** Question sent to the user */
  prompt: string;
  /** Fixed reply sent when an answer is refused */
  rejection: string;
  validation: ValidationRule;
}

/**
 * Immutable step held by a QuestionCatalog
 */
export type QuestionSpec = Readonly<QuestionDefinition>;

// ============================================================================
// Answers & sessions
// ============================================================================

export type AnswerValue = number | string;

export type ValidationOutcome =
  | { status: 'accepted'; value: AnswerValue }
  | { status: 'rejected'; reason: string };

/**
 * In-progress wizard run for one user.
 *
 * `answers[i]` is the accepted value for step i, so
 * `answers.length === currentStep` at all times.
 */
export interface Session {
  userId: string;
  currentStep: number;
  answers: AnswerValue[];
}

/**
 * Session as kept by the store, with bookkeeping timestamps (epoch ms)
 */
export interface StoredSession extends Session {
  createdAt: number;
  updatedAt: number;
}

// ============================================================================
// Engine I/O
// ============================================================================

export type WizardEvent = { type: 'start' } | { type: 'cancel' } | { type: 'answer'; text: string };

export type ReplyKind = 'prompt' | 'rejected' | 'completed' | 'cancelled' | 'guidance';

/**
 * Outcome of one event. `step` is where the user now stands when a session
 * is still open.
 */
export type EngineReply =
  | { kind: 'prompt' | 'rejected'; text: string; step: number }
  | { kind: 'completed' | 'cancelled' | 'guidance'; text: string };
