/**
 * Plugin Loader unit tests
 */

import { fileURLToPath } from 'node:url';
import {
  type BotMessage,
  discoverPluginFiles,
  loadPlugins,
  type MessageHandlerPlugin,
  shouldHandlerProcess,
} from '@core';
import { describe, expect, test } from 'vitest';
import { createTestConfig, createTestContext, createTestMessage } from './helpers';

const FIXTURES_DIR = fileURLToPath(new URL('./fixtures/plugins', import.meta.url));

describe('PluginLoader', () => {
  describe('shouldHandlerProcess()', () => {
    const createMessage = (overrides: Partial<BotMessage> = {}): BotMessage =>
      createTestMessage('test message', { platform: 'discord', guildId: 'guild-123', ...overrides });

    const createHandler = (overrides: Partial<MessageHandlerPlugin> = {}): MessageHandlerPlugin => ({
      id: 'test-handler',
      type: 'message',
      load: async () => {},
      unload: async () => {},
      shouldHandle: () => true,
      handle: async () => {},
      ...overrides,
    });

    describe('scope filtering', () => {
      test('should reject non-mention messages when scope is undefined (default)', () => {
        expect(shouldHandlerProcess(createHandler(), createMessage({ mentionedBot: false }))).toBe(false);
      });

      test('should accept mention messages when scope is undefined', () => {
        expect(shouldHandlerProcess(createHandler(), createMessage({ mentionedBot: true }))).toBe(true);
      });

      test("should accept all messages when scope is 'all'", () => {
        const handler = createHandler({ scope: 'all' });
        expect(shouldHandlerProcess(handler, createMessage({ mentionedBot: false }))).toBe(true);
      });
    });

    describe('platform filtering', () => {
      test('should accept any platform when platforms is undefined', () => {
        const handler = createHandler({ scope: 'all' });

        expect(shouldHandlerProcess(handler, createMessage({ platform: 'discord' }))).toBe(true);
        expect(shouldHandlerProcess(handler, createMessage({ platform: 'test' }))).toBe(true);
      });

      test('should reject messages from non-matching platforms', () => {
        const handler = createHandler({ scope: 'all', platforms: ['discord'] });
        expect(shouldHandlerProcess(handler, createMessage({ platform: 'test' }))).toBe(false);
      });
    });

    describe('guild filtering', () => {
      test('should reject messages from non-matching guilds', () => {
        const handler = createHandler({ scope: 'all', guildIds: ['guild-123'] });
        expect(shouldHandlerProcess(handler, createMessage({ guildId: 'guild-456' }))).toBe(false);
      });

      test('should accept messages from matching guilds', () => {
        const handler = createHandler({ scope: 'all', guildIds: ['guild-123', 'guild-456'] });
        expect(shouldHandlerProcess(handler, createMessage({ guildId: 'guild-456' }))).toBe(true);
      });

      test('should accept DMs even with guild restrictions', () => {
        const handler = createHandler({ scope: 'all', guildIds: ['guild-123'] });
        const message = createMessage({ guildId: undefined, channel: { id: 'ch-1' } });

        expect(shouldHandlerProcess(handler, message)).toBe(true);
      });
    });
  });

  describe('discoverPluginFiles()', () => {
    test('should find plugin.ts and *.plugin.ts files only', async () => {
      const files = await discoverPluginFiles(FIXTURES_DIR);
      expect(files).toEqual(['alpha/plugin.ts', 'beta.plugin.ts', 'helper.plugin.ts']);
    });
  });

  describe('loadPlugins()', () => {
    test('should load every plugin when config lists none', async () => {
      const { context, logger } = createTestContext();

      const loaded = await loadPlugins({ pluginsDir: FIXTURES_DIR, context, logger });

      expect(loaded.all.map((p) => p.id)).toEqual(['alpha', 'beta']);
      expect(logger.info).toHaveBeenCalledWith('Found 3 plugin files');
    });

    test('should sort message handlers by priority', async () => {
      const { context, logger } = createTestContext();

      const loaded = await loadPlugins({ pluginsDir: FIXTURES_DIR, context, logger });

      expect(loaded.message.map((p) => p.id)).toEqual(['beta', 'alpha']);
    });

    test('should only load plugins listed in config', async () => {
      const { context, logger } = createTestContext(createTestConfig({ plugins: ['beta', 'missing'] }));

      const loaded = await loadPlugins({ pluginsDir: FIXTURES_DIR, context, logger });

      expect(loaded.all.map((p) => p.id)).toEqual(['beta']);
      expect(logger.warn).toHaveBeenCalledWith('Plugin missing is listed in config but was not found');
    });

    test('should dispatch messages to handlers in priority order', async () => {
      const { context, logger } = createTestContext();
      await loadPlugins({ pluginsDir: FIXTURES_DIR, context, logger });

      const sent: Array<string | undefined> = [];
      context.eventBus.on('message:send', (request) => {
        sent.push(request.message.content);
      });

      await context.eventBus.emit('message:received', createTestMessage('hello'));
      await context.eventBus.emit('message:received', createTestMessage('beta only'));

      expect(sent).toEqual(['beta', 'alpha', 'beta']);
    });

    test('should keep dispatching after a handler throws', async () => {
      const { context, logger } = createTestContext();
      await loadPlugins({ pluginsDir: FIXTURES_DIR, context, logger });

      const sent: Array<string | undefined> = [];
      context.eventBus.on('message:send', (request) => {
        sent.push(request.message.content);
      });

      await context.eventBus.emit('message:received', createTestMessage('fail'));

      expect(sent).toEqual(['beta', 'alpha']);
      expect(logger.error).toHaveBeenCalledWith('Plugin beta error', { error: 'beta failed' });
    });
  });
});
