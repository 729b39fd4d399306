/**
 * Type definitions for the message gateway
 */

import type { ReplyKind } from '../wizard/types.js';

/**
 * Supported messenger platforms
 */
export type MessageSource = 'telegram';

/**
 * Normalized inbound message
 */
export interface NormalizedMessage {
  /** Source messenger platform */
  source: MessageSource;
  /** Chat the reply goes to */
  channelId: string;
  /** Sender on the platform; the wizard's user key */
  userId: string;
  /** Message text content */
  text: string;
  /** Platform-specific metadata */
  metadata?: MessageMetadata;
}

/**
 * Platform-specific metadata
 */
export interface MessageMetadata {
  /** Sender's first name, used in greetings */
  firstName?: string;
  /** Sender's @username */
  username?: string;
  /** Original message ID */
  messageId?: string;
  /** Telegram chat type (private, group, supergroup, channel) */
  chatType?: string;
}

/**
 * What the router did with a message
 * - welcome/help/unknown_command: static texts, no wizard involved
 * - failed: the wizard raised; the user got the generic failure reply
 */
export type RouteKind = ReplyKind | 'welcome' | 'help' | 'unknown_command' | 'failed';

/**
 * Result of routing one message
 */
export interface ProcessingResult {
  /** Text to send back */
  response: string;
  kind: RouteKind;
  /** Processing time in milliseconds, including time spent queued */
  duration: number;
}

/**
 * Gateway event types
 */
export type GatewayEventType =
  | 'connected'
  | 'disconnected'
  | 'message_received'
  | 'message_sent'
  | 'error';

/**
 * Gateway event
 */
export interface GatewayEvent {
  type: GatewayEventType;
  source: MessageSource;
  timestamp: Date;
  data?: unknown;
  error?: Error;
}

/**
 * Gateway event handler
 */
export type GatewayEventHandler = (event: GatewayEvent) => void;

/**
 * Gateway interface that all platform gateways must implement
 */
export interface Gateway {
  /** Platform identifier */
  readonly source: MessageSource;
  /** Start the gateway */
  start(): Promise<void>;
  /** Stop the gateway */
  stop(): Promise<void>;
  /** Check if gateway is connected */
  isConnected(): boolean;
  /** Register event handler; returns a function that removes it */
  onEvent(handler: GatewayEventHandler): () => void;
}
