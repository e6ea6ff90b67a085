import { describe, it, expect } from 'vitest';
import { HandlerTimeoutError } from '../../src/domain/index.js';
import type { Event } from '../../src/domain/index.js';
import { makeDispatcher, makeEvent } from '../helpers.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Dispatcher.dispatchAsync', () => {
  it('awaits handlers one at a time in priority order', async () => {
    const { dispatcher } = makeDispatcher();
    const log: string[] = [];
    dispatcher.subscribe(
      'page_view',
      async () => {
        log.push('slow:start');
        await sleep(10);
        log.push('slow:end');
        return 'slow';
      },
      { name: 'slow', priority: 5 },
    );
    dispatcher.subscribe(
      'page_view',
      () => {
        log.push('fast');
        return 'fast';
      },
      { name: 'fast' },
    );

    const notification = await dispatcher.dispatchAsync(makeEvent());

    expect(log).toEqual(['slow:start', 'slow:end', 'fast']);
    expect(notification.getFunctionNames()).toEqual(['slow', 'fast']);
    expect(notification.get('slow')).toBe('slow');
  });

  it('records rejections and sync throws as failures and keeps going', async () => {
    const { dispatcher } = makeDispatcher();
    dispatcher.subscribe('page_view', async function rejects() {
      throw new Error('async boom');
    });
    dispatcher.subscribe('page_view', function throwsSync() {
      throw new Error('sync boom');
    });
    dispatcher.subscribe('page_view', async function fine() {
      return 'ok';
    });

    const notification = await dispatcher.dispatchAsync(makeEvent());

    expect(notification.status).toBe('failure');
    expect(notification.errors.map((e) => [e.handler, e.message])).toEqual([
      ['rejects', 'async boom'],
      ['throwsSync', 'sync boom'],
    ]);
    expect(notification.getFunctionNames()).toEqual(['fine']);
  });

  it('records a rejection with a value that cannot be converted to a string', async () => {
    const { dispatcher } = makeDispatcher();
    dispatcher.subscribe(
      'page_view',
      async function rejectsOddly() {
        throw Object.create(null);
      },
      { priority: 1 },
    );
    dispatcher.subscribe('page_view', () => 'after', { name: 'after' });

    const notification = await dispatcher.dispatchAsync(makeEvent());

    expect(notification.errors.map((e) => [e.handler, e.message])).toEqual([['rejectsOddly', '[object Object]']]);
    expect(notification.get('after')).toBe('after');
  });

  it('forwards extra arguments', async () => {
    const { dispatcher } = makeDispatcher();
    dispatcher.subscribe('page_view', async (_event: Event, user: unknown) => `hi ${String(user)}`, {
      name: 'greet',
    });

    const notification = await dispatcher.dispatchAsync(makeEvent(), 'global', 'bob');

    expect(notification.get('greet')).toBe('hi bob');
  });

  it('times out handlers that exceed handlerTimeoutMs', async () => {
    const { dispatcher } = makeDispatcher({ config: { handlerTimeoutMs: 20 } });
    dispatcher.subscribe('page_view', function stuck() {
      return new Promise(() => {});
    });
    dispatcher.subscribe('page_view', () => 'after', { name: 'after' });

    const notification = await dispatcher.dispatchAsync(makeEvent());

    expect(notification.errors).toHaveLength(1);
    expect(notification.errors[0]?.error).toBeInstanceOf(HandlerTimeoutError);
    expect(notification.errors[0]?.message).toBe("Handler 'stuck' timed out after 20ms");
    expect(notification.get('after')).toBe('after');
  });

  it('does not time out when handlerTimeoutMs is 0', async () => {
    const { dispatcher } = makeDispatcher({ config: { handlerTimeoutMs: 0 } });
    dispatcher.subscribe('page_view', async function waits() {
      await sleep(5);
      return 'done';
    });

    const notification = await dispatcher.dispatchAsync(makeEvent());

    expect(notification.status).toBe('success');
    expect(notification.get('waits')).toBe('done');
  });

  it('keeps concurrent dispatches independent', async () => {
    const { dispatcher } = makeDispatcher();
    dispatcher.subscribe('page_view', async (event: Event) => {
      await sleep(5);
      return event.data.get('url');
    }, { name: 'url' });

    const [a, b] = await Promise.all([
      dispatcher.dispatchAsync(makeEvent({ data: { url: '/a' } })),
      dispatcher.dispatchAsync(makeEvent({ data: { url: '/b' } })),
    ]);

    expect(a.get('url')).toBe('/a');
    expect(b.get('url')).toBe('/b');
    expect(a.id).not.toBe(b.id);
  });
});
