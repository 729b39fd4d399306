/**
 * Message Router
 *
 * Turns normalized chat messages into wizard events and static replies.
 * Every message runs on its sender's lane, so the wizard sees one event at
 * a time per user.
 */

import { UserLaneQueue } from '../concurrency/index.js';
import { DebugLogger } from '../debug-logger.js';
import { wrapError } from '../errors.js';
import type { ConversationEngine } from '../wizard/conversation-engine.js';
import type { WizardEvent } from '../wizard/types.js';
import {
  FAILURE_TEXT,
  HELP_TEXT,
  UNKNOWN_COMMAND_TEXT,
  parseInput,
  welcomeText,
} from './bot-commands.js';
import type { NormalizedMessage, ProcessingResult, RouteKind } from './types.js';

const logger = new DebugLogger('router');

export interface MessageRouterOptions {
  engine: ConversationEngine;
  /** Shared lane queue; a private one is created when omitted */
  lanes?: UserLaneQueue;
}

export class MessageRouter {
  private engine: ConversationEngine;
  private lanes: UserLaneQueue;

  constructor(options: MessageRouterOptions) {
    this.engine = options.engine;
    this.lanes = options.lanes ?? new UserLaneQueue();
  }

  /**
   * Process a normalized message and return the reply. Routing never
   * rejects: failures become the generic failure reply. When `deliver` is
   * given it runs on the sender's lane right after routing, so the next
   * message from that user waits until this reply is out; a delivery
   * failure rejects the returned promise.
   */
  async process(
    message: NormalizedMessage,
    deliver?: (result: ProcessingResult) => Promise<void>
  ): Promise<ProcessingResult> {
    const startTime = Date.now();

    return this.lanes.enqueue(message.userId, async () => {
      const { kind, response } = this.route(message);
      const result: ProcessingResult = { response, kind, duration: Date.now() - startTime };
      if (deliver) {
        await deliver(result);
      }
      return result;
    });
  }

  private route(message: NormalizedMessage): { kind: RouteKind; response: string } {
    const input = parseInput(message.text);

    if (input.type === 'unknown_command') {
      return { kind: 'unknown_command', response: UNKNOWN_COMMAND_TEXT };
    }

    if (input.type === 'command' && input.command === 'start') {
      return { kind: 'welcome', response: welcomeText(message.metadata?.firstName) };
    }
    if (input.type === 'command' && input.command === 'help') {
      return { kind: 'help', response: HELP_TEXT };
    }

    // /setup opens the wizard (the wizard's "start" event), /cancel closes it
    const event: WizardEvent =
      input.type === 'text'
        ? { type: 'answer', text: input.text }
        : input.command === 'setup'
          ? { type: 'start' }
          : { type: 'cancel' };

    try {
      const reply = this.engine.handle(message.userId, event);
      logger.debug(`Routed: user=${message.userId} event=${event.type} reply=${reply.kind}`);
      return { kind: reply.kind, response: reply.text };
    } catch (error) {
      const wrapped = wrapError(error, `Handling ${event.type} for user ${message.userId}`);
      logger.error('Wizard event failed:', wrapped.toJSON());
      return { kind: 'failed', response: FAILURE_TEXT };
    }
  }
}
