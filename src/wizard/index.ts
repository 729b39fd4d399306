export { QuestionCatalog, parseQuestionDefinitions } from './question-catalog.js';
export { DEFAULT_QUESTIONS } from './default-questions.js';
export { validateAnswer, normalizeChoice, parseDecimal } from './validator.js';
export { buildSummary, SUMMARY_HEADER } from './summary-builder.js';
export { SqliteSessionStore, openSessionDatabase } from './session-store.js';
export type { SessionStore } from './session-store.js';
export {
  ConversationEngine,
  DEFAULT_WIZARD_MESSAGES,
  type ConversationEngineOptions,
  type WizardMessages,
} from './conversation-engine.js';

export type {
  AnswerValue,
  EngineReply,
  QuestionDefinition,
  QuestionSpec,
  ReplyKind,
  Session,
  StoredSession,
  ValidationKind,
  ValidationOutcome,
  ValidationRule,
  WizardEvent,
} from './types.js';
