/**
 * In-process publish/subscribe dispatcher.
 *
 * ```ts
 * const dispatcher = new Dispatcher({ config: loadDispatcherConfig() });
 * dispatcher.subscribe(null, function greet(e) { return `Hello, ${e.data.get('name')}!`; }, { namespace: 'greet' });
 * const notification = dispatcher.dispatch(createEvent({ name: 'greeting_event', data: { name: 'Alice' } }), 'greet');
 * notification.get('greet'); // 'Hello, Alice!'
 * ```
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
