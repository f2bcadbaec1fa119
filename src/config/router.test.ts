import { describe, it, expect } from 'vitest';
import { createConfigStore } from './configStore.js';
import { createReceiverRouter } from './router.js';
import { makeConfig } from '../test/fixtures.js';

describe('createReceiverRouter', () => {
  it('resolves a configured receiver by exact name', () => {
    const router = createReceiverRouter(createConfigStore(makeConfig()));

    const resolved = router.resolve('team-b');

    expect(resolved.ok && resolved.value.type).toBe('github');
  });

  it('reports a receiver that is not configured', () => {
    const router = createReceiverRouter(createConfigStore(makeConfig()));

    expect(router.resolve('ghost-team')).toEqual({
      ok: false,
      error: { kind: 'receiver-not-found', receiver: 'ghost-team', message: 'receiver missing: ghost-team' },
    });
  });

  it('does not match case-insensitively', () => {
    const router = createReceiverRouter(createConfigStore(makeConfig()));

    expect(router.resolve('TEAM-A').ok).toBe(false);
  });

  it('follows the store when the configuration is replaced', () => {
    const store = createConfigStore(makeConfig());
    const router = createReceiverRouter(store);

    store.replace(makeConfig({ receivers: [{ name: 'team-c' }] }));

    expect(router.resolve('team-a').ok).toBe(false);
    expect(router.resolve('team-c').ok).toBe(true);
  });
});
