/**
 * Shared test fixtures
 */

import { Comments } from '../app/helpers/comments';
import {
  type BotConfig,
  type BotConfigInput,
  type BotMessage,
  type CaptionSource,
  type CommandInvocation,
  createCommandRegistry,
  createEventBus,
  type Logger,
  parseBotConfig,
  type PluginContext,
} from '@core';
import { vi } from 'vitest';

export function createTestLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}

export function createTestConfig(overrides: Partial<BotConfigInput> = {}): BotConfig {
  return parseBotConfig({ tokens: { discord: 'test-secret' }, ...overrides });
}

export function createTestContext(
  config: BotConfig = createTestConfig(),
  captions: CaptionSource = Comments.fromLines(['test caption']),
) {
  const logger = createTestLogger();
  const context: PluginContext = {
    eventBus: createEventBus({ logger }),
    logger,
    config,
    commands: createCommandRegistry(),
    captions,
  };
  return { context, logger };
}

export function createTestMessage(content: string, overrides: Partial<BotMessage> = {}): BotMessage {
  return {
    id: 'msg-001',
    content,
    author: {
      id: 'user-001',
      name: 'TestUser',
      isBot: false,
    },
    channel: { id: 'channel-001' },
    mentionedBot: false,
    platform: 'test',
    ...overrides,
  };
}

export function createTestCommand(commandName: string, overrides: Partial<CommandInvocation> = {}): CommandInvocation {
  return {
    commandName,
    args: {},
    user: { id: 'user-001', name: 'TestUser', isBot: false },
    channel: { id: 'channel-001' },
    platform: 'test',
    reply: vi.fn(async () => {}),
    ...overrides,
  };
}
