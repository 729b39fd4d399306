/**
 * Conversation engine
 *
 * State machine behind the setup wizard. A user is either idle (no stored
 * session) or waiting on step k (stored session with currentStep = k). Each
 * event loads the session, works on a copy and writes the result back before
 * the reply is returned, so nothing survives in memory between events.
 *
 * Store failures are not caught here: they propagate to the caller, and the
 * stored session keeps its last committed value.
 *
 * @example
 * ```typescript
 * const engine = new ConversationEngine({ catalog, store });
 * engine.handle('42', { type: 'start' });        // prompt for step 0
 * engine.handle('42', { type: 'answer', text: '20' });
 * ```
 */

import { DebugLogger } from '../debug-logger.js';
import type { QuestionCatalog } from './question-catalog.js';
import type { SessionStore } from './session-store.js';
import { buildSummary } from './summary-builder.js';
import type { EngineReply, Session, WizardEvent } from './types.js';
import { validateAnswer } from './validator.js';

const logger = new DebugLogger('engine');

export interface WizardMessages {
  /** Sent when an answer arrives with no wizard running */
  notStarted: string;
  /** Sent after /cancel */
  cancelled: string;
  /** Sent when a stored session no longer fits the catalog */
  expired: string;
}

export const DEFAULT_WIZARD_MESSAGES: WizardMessages = {
  notStarted: 'No setup in progress. Send /setup to start the wizard first.',
  cancelled: '❌ Setup cancelled. Send /setup to start again.',
  expired: 'Your previous setup can no longer be resumed. Send /setup to start again.',
};

export interface ConversationEngineOptions {
  catalog: QuestionCatalog;
  store: SessionStore;
  messages?: Partial<WizardMessages>;
}

export class ConversationEngine {
  private catalog: QuestionCatalog;
  private store: SessionStore;
  private messages: WizardMessages;

  constructor(options: ConversationEngineOptions) {
    this.catalog = options.catalog;
    this.store = options.store;
    this.messages = { ...DEFAULT_WIZARD_MESSAGES, ...options.messages };
  }

  handle(userId: string, event: WizardEvent): EngineReply {
    switch (event.type) {
      case 'start':
        return this.start(userId);
      case 'cancel':
        return this.cancel(userId);
      case 'answer':
        return this.answer(userId, event.text);
    }
  }

  /**
   * Begin (or restart) the wizard at step 0. Earlier progress is discarded
   * by the same write that opens the new session.
   */
  private start(userId: string): EngineReply {
    this.store.put(userId, { userId, currentStep: 0, answers: [] });
    logger.info(`Wizard started: user=${userId}`);
    return this.prompt(0);
  }

  private cancel(userId: string): EngineReply {
    this.store.delete(userId);
    logger.info(`Wizard cancelled: user=${userId}`);
    return { kind: 'cancelled', text: this.messages.cancelled };
  }

  private answer(userId: string, text: string): EngineReply {
    const stored = this.store.get(userId);
    if (!stored) {
      return { kind: 'guidance', text: this.messages.notStarted };
    }

    const step = stored.currentStep;
    if (step >= this.catalog.stepCount()) {
      logger.warn(
        `Dropping session beyond catalog: user=${userId} step=${step} steps=${this.catalog.stepCount()}`
      );
      this.store.delete(userId);
      return { kind: 'guidance', text: this.messages.expired };
    }

    const outcome = validateAnswer(this.catalog.stepAt(step), text);
    if (outcome.status === 'rejected') {
      logger.debug(`Answer rejected: user=${userId} step=${step}`);
      return { kind: 'rejected', text: outcome.reason, step };
    }

    const answers = [...stored.answers, outcome.value];
    const nextStep = step + 1;

    if (nextStep < this.catalog.stepCount()) {
      const next: Session = { userId, currentStep: nextStep, answers };
      this.store.put(userId, next);
      return this.prompt(nextStep);
    }

    const summary = buildSummary(this.catalog, answers);
    this.store.delete(userId);
    logger.info(`Wizard completed: user=${userId}`);
    return { kind: 'completed', text: summary };
  }

  private prompt(step: number): EngineReply {
    return { kind: 'prompt', text: this.catalog.stepAt(step).prompt, step };
  }
}
