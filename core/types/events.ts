/**
 * Event type definitions for the EventBus
 */

import type { CommandInvocation } from './command';
import type { BotMessage, MediaSendRequest, MessageSendRequest, Platform } from './message';

/**
 * All events the system can emit/handle
 *
 * When you emit('message:received', msg), TypeScript ensures msg is a BotMessage.
 */
export interface EventMap {
  // Lifecycle events
  'bot:ready': { platform: Platform };
  'bot:shutdown': { reason?: string };
  'bot:error': { error: Error; context?: string };

  // Incoming events (from platform adapters)
  'message:received': BotMessage;
  'command:received': CommandInvocation;

  // Outgoing events (to platform adapters)
  'message:send': MessageSendRequest;
  'message:suppress-embeds': SuppressEmbedsRequest;
  'media:send': MediaSendRequest;
  'typing:start': TypingRequest;
  'typing:stop': TypingRequest;

  // Internal events
  'plugin:loaded': { pluginId: string };
  'plugin:unloaded': { pluginId: string };
  'plugin:error': { pluginId: string; error: Error };
}

/**
 * Request to hide link previews on a message
 */
export interface SuppressEmbedsRequest {
  channelId: string;
  messageId: string;
  platform: Platform;
}

/**
 * Request to show/hide typing indicator
 */
export interface TypingRequest {
  channelId: string;
  platform: Platform;
}

/**
 * Event names (for type safety)
 */
export type EventName = keyof EventMap;

/**
 * Get payload type for an event
 */
export type EventPayload<E extends EventName> = EventMap[E];

/**
 * Event handler function type
 */
export type EventHandler<E extends EventName> = (payload: EventPayload<E>) => void | Promise<void>;
