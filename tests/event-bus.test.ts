/**
 * EventBus unit tests
 */

import type { BotMessage, MediaSendRequest } from '@core';
import { createEventBus, EventBus } from '@core';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { createTestCommand, createTestLogger, createTestMessage } from './helpers';

describe('EventBus', () => {
  let bus: EventBus;
  let logger: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    logger = createTestLogger();
    bus = createEventBus({ logger });
  });

  describe('on() and emit()', () => {
    test('should call handler when event is emitted', async () => {
      const received: BotMessage[] = [];

      bus.on('message:received', (msg) => {
        received.push(msg);
      });

      await bus.emit('message:received', createTestMessage('Hello!'));

      expect(received).toHaveLength(1);
      expect(received[0]?.content).toBe('Hello!');
    });

    test('should call handler multiple times for multiple emits', async () => {
      let callCount = 0;

      bus.on('bot:ready', () => {
        callCount++;
      });

      await bus.emit('bot:ready', { platform: 'test' });
      await bus.emit('bot:ready', { platform: 'test' });
      await bus.emit('bot:ready', { platform: 'test' });

      expect(callCount).toBe(3);
    });

    test('should call all handlers for same event', async () => {
      const results: string[] = [];

      bus.on('command:received', () => {
        results.push('handler1');
      });
      bus.on('command:received', () => {
        results.push('handler2');
      });

      await bus.emit('command:received', createTestCommand('test'));

      expect(results).toEqual(['handler1', 'handler2']);
    });

    test('should wait for async handlers', async () => {
      let resolved = false;

      bus.on('message:received', async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        resolved = true;
      });

      await bus.emit('message:received', createTestMessage('async test'));

      expect(resolved).toBe(true);
    });

    test('should not call handlers for different events', async () => {
      let called = false;

      bus.on('bot:ready', () => {
        called = true;
      });

      await bus.emit('bot:shutdown', {});

      expect(called).toBe(false);
    });

    test('should let a handler report back through a callback payload', async () => {
      bus.on('media:send', (request) => {
        request.done(new Error('upload refused'));
      });

      const done = vi.fn<MediaSendRequest['done']>();
      await bus.emit('media:send', {
        channelId: 'channel-001',
        platform: 'test',
        kind: 'video',
        path: '/tmp/clip.mp4',
        filename: 'clip.mp4',
        done,
      });

      expect(done).toHaveBeenCalledTimes(1);
      expect(done.mock.calls[0]?.[0]?.message).toBe('upload refused');
    });
  });

  describe('once()', () => {
    test('should call handler only once', async () => {
      let callCount = 0;

      bus.once('bot:ready', () => {
        callCount++;
      });

      await bus.emit('bot:ready', { platform: 'test' });
      await bus.emit('bot:ready', { platform: 'test' });

      expect(callCount).toBe(1);
      // The second emit finds no handlers and skips dispatch
      expect(logger.debug).toHaveBeenCalledTimes(1);
    });

    test('should keep other handlers subscribed', async () => {
      const results: string[] = [];

      bus.once('bot:ready', () => {
        results.push('once');
      });
      bus.on('bot:ready', () => {
        results.push('always');
      });

      await bus.emit('bot:ready', { platform: 'test' });
      await bus.emit('bot:ready', { platform: 'test' });

      expect(results).toEqual(['once', 'always', 'always']);
    });
  });

  describe('off()', () => {
    test('should only remove the given handler', async () => {
      const results: string[] = [];
      const handler1 = () => {
        results.push('h1');
      };
      const handler2 = () => {
        results.push('h2');
      };

      bus.on('bot:ready', handler1);
      bus.on('bot:ready', handler2);
      bus.off('bot:ready', handler1);

      await bus.emit('bot:ready', { platform: 'test' });

      expect(results).toEqual(['h2']);
    });

    test('should do nothing if handler not found', async () => {
      bus.off('bot:ready', () => {});

      await bus.emit('bot:ready', { platform: 'test' });

      expect(logger.debug).not.toHaveBeenCalled();
    });

    test('should stop a plugin from seeing further messages', async () => {
      const seen: string[] = [];
      const handler = (message: BotMessage) => {
        seen.push(message.content);
      };

      bus.on('message:received', handler);
      await bus.emit('message:received', createTestMessage('first'));
      bus.off('message:received', handler);
      await bus.emit('message:received', createTestMessage('second'));

      expect(seen).toEqual(['first']);
    });
  });

  describe('error isolation', () => {
    test('should continue calling other handlers when one throws', async () => {
      const results: string[] = [];

      bus.on('typing:start', () => {
        throw new Error('Intentional test error');
      });
      bus.on('typing:start', () => {
        results.push('second handler ran');
      });

      await bus.emit('typing:start', { channelId: 'channel-001', platform: 'test' });

      expect(results).toEqual(['second handler ran']);
      expect(logger.error).toHaveBeenCalledWith('Handler for typing:start failed', {
        error: 'Intentional test error',
      });
    });

    test('should emit plugin:error when handler throws', async () => {
      const errors: Error[] = [];

      bus.on('plugin:error', (payload) => {
        errors.push(payload.error);
      });
      bus.on('typing:stop', async () => {
        await Promise.reject(new Error('Test error message'));
      });

      await bus.emit('typing:stop', { channelId: 'channel-001', platform: 'test' });
      // plugin:error is fired, not awaited
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(errors.map((e) => e.message)).toEqual(['Test error message']);
    });

    test('should wrap non-Error throws', async () => {
      const errors: Error[] = [];

      bus.on('plugin:error', (payload) => {
        errors.push(payload.error);
      });
      bus.on('bot:shutdown', () => {
        throw 'plain string';
      });

      await bus.emit('bot:shutdown', { reason: 'SIGTERM' });
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(errors.map((e) => e.message)).toEqual(['plain string']);
    });

    test('should not report a failing plugin:error handler to itself', async () => {
      const calls: string[] = [];

      bus.on('plugin:error', () => {
        calls.push('plugin:error');
        throw new Error('reporter broke');
      });
      bus.on('typing:start', () => {
        throw new Error('first failure');
      });

      await bus.emit('typing:start', { channelId: 'channel-001', platform: 'test' });
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(calls).toEqual(['plugin:error']);
      expect(logger.error).toHaveBeenCalledWith('Handler for plugin:error failed', { error: 'reporter broke' });
    });
  });

  describe('fire()', () => {
    test('should emit without waiting for handlers', () => {
      let completed = false;

      bus.on('bot:ready', async () => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        completed = true;
      });

      bus.fire('bot:ready', { platform: 'test' });

      expect(completed).toBe(false);
    });

    test('should start handlers before returning', () => {
      let started = false;

      bus.on('message:suppress-embeds', () => {
        started = true;
      });

      bus.fire('message:suppress-embeds', { channelId: 'channel-001', messageId: 'msg-001', platform: 'test' });

      expect(started).toBe(true);
    });
  });

  describe('createEventBus()', () => {
    test('should create EventBus with default options', () => {
      expect(createEventBus()).toBeInstanceOf(EventBus);
    });

    test('should trace dispatches on the logger', async () => {
      bus.on('bot:ready', () => {});
      await bus.emit('bot:ready', { platform: 'test' });

      expect(logger.debug).toHaveBeenCalledWith('Dispatching bot:ready', { handlers: 1 });
    });
  });
});
