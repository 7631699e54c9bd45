import { describe, test, expect, jest } from '@jest/globals';
import { DiscordMessaging } from '../src/discord/messaging.js';
import { ComponentRouter, isDiscordContext } from '../src/discord/router.js';
import type { InteractionContext } from '../src/paginator/types.js';
import { fakeInteraction } from './helpers.js';

describe('ComponentRouter', () => {
  test('routes every registered role of a session to its handler', async () => {
    const router = new ComponentRouter();
    const handler = jest.fn(async (_ctx: InteractionContext) => undefined);
    router.register('s1', ['next', 'back'], handler);

    await expect(router.dispatch(fakeInteraction('u', 's1|next'))).resolves.toBe(true);
    await expect(router.dispatch(fakeInteraction('u', 's1|back'))).resolves.toBe(true);
    await expect(router.dispatch(fakeInteraction('u', 's1|last'))).resolves.toBe(false);
    expect(handler).toHaveBeenCalledTimes(2);
  });

  test('unregister drops every id of the session only', () => {
    const router = new ComponentRouter();
    router.register('s1', ['next', 'back'], async () => undefined);
    router.register('s2', ['next'], async () => undefined);
    router.unregister('s1');

    expect(router.has('s1|next')).toBe(false);
    expect(router.has('s1|back')).toBe(false);
    expect(router.has('s2|next')).toBe(true);
    expect(router.size).toBe(1);
  });

  test('registering a session again replaces its roles', () => {
    const router = new ComponentRouter();
    router.register('s1', ['next', 'back'], async () => undefined);
    router.register('s1', ['first'], async () => undefined);
    expect(router.has('s1|next')).toBe(false);
    expect(router.has('s1|first')).toBe(true);
  });

  test('handler errors reach the caller', async () => {
    const router = new ComponentRouter();
    router.register('s1', ['callback'], async () => {
      throw new Error('nope');
    });
    await expect(router.dispatch(fakeInteraction('u', 's1|callback'))).rejects.toThrow('nope');
  });

  test('a click on a stopped session is acknowledged without a handler', async () => {
    const router = new ComponentRouter();
    router.register('s1', ['next'], async () => undefined);
    router.unregister('s1');
    const ctx = fakeInteraction('u', 's1|next');
    await expect(router.dispatch(ctx)).resolves.toBe(false);
    expect(ctx.calls).toEqual(['defer']);
  });

  test('ids that are not paginator ids are left alone', async () => {
    const router = new ComponentRouter();
    const ctx = fakeInteraction('u', 'slots:spin');
    await expect(router.dispatch(ctx)).resolves.toBe(false);
    expect(ctx.calls).toEqual([]);
  });

  test('plain contexts are not discord contexts', () => {
    expect(isDiscordContext(fakeInteraction('u', 's1|next'))).toBe(false);
  });
});

describe('DiscordMessaging', () => {
  test('registration goes through its router', () => {
    const messaging = new DiscordMessaging();
    messaging.registerInteractionHandler('s9', ['select', 'next'], async () => undefined);
    expect(messaging.router.has('s9|select')).toBe(true);
    messaging.unregisterInteractionHandler('s9');
    expect(messaging.router.size).toBe(0);
  });
});
