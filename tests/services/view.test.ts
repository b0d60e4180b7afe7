import { describe, expect, it } from 'vitest';
import { AddressStateStore } from '../../src/services/state';
import { ViewRenderer } from '../../src/services/view';
import { ProviderRegistry } from '../../src/services/providers/registry';
import { fakeExplorerHttp } from '../helpers';

const NOW = 1700000000 + 90061;

function setup() {
  const { http } = fakeExplorerHttp(() => ({ status: 200, body: '{}' }));
  const renderer = new ViewRenderer(ProviderRegistry.withDefaults(http));
  const store = new AddressStateStore();
  store.loadInitial([
    { name: 'Dogecoin', ticker: 'DOGE', api: 'chainz', addresses: [{ address: 'D1' }, { address: 'D2' }] },
    { name: 'Bellscoin', ticker: 'BEL', api: 'blnscan', addresses: [{ address: 'B1' }] },
  ]);
  return { renderer, store };
}

describe('ViewRenderer', () => {
  it('renders observed values with provider links', () => {
    const { renderer, store } = setup();
    store.applyResult(0, 0, { balance: 1.5, lastActivityTimestamp: 1700000000 });

    const [doge] = renderer.render(store.snapshotForRender(), NOW);

    expect(doge.name).toBe('Dogecoin');
    expect(doge.iconUrl).toBe('https://chainz.cryptoid.info/logo/doge.png');
    expect(doge.addresses[0]).toEqual({
      address: 'D1',
      linkUrl: 'https://chainz.cryptoid.info/doge/address.dws?D1.htm',
      balance: '1.5DOGE',
      lastActive: '2023-11-14 22:13:20',
      elapsed: '1 day, 1 hour, 1 minute, 1 second',
    });
  });

  it('renders never-fetched fields as placeholders', () => {
    const { renderer, store } = setup();
    const [, bel] = renderer.render(store.snapshotForRender(), NOW);

    expect(bel).toEqual({
      name: 'Bellscoin',
      ticker: 'BEL',
      iconUrl: 'https://blnexplorer.io/favicon.ico',
      addresses: [
        { address: 'B1', linkUrl: 'https://blnexplorer.io/B1', balance: '?', lastActive: '?', elapsed: '?' },
      ],
    });
  });

  it('renders addresses of the same coin independently', () => {
    const { renderer, store } = setup();
    store.applyResult(0, 1, { lastActivityTimestamp: NOW - 61 });

    const [doge] = renderer.render(store.snapshotForRender(), NOW);

    expect(doge.addresses.map((a) => a.elapsed)).toEqual(['?', '1 minute, 1 second']);
    expect(doge.addresses.map((a) => a.balance)).toEqual(['?', '?']);
  });

  it('renders an out-of-range timestamp as "?"', () => {
    const { renderer, store } = setup();
    store.applyResult(1, 0, { lastActivityTimestamp: 1e15 });

    const [, bel] = renderer.render(store.snapshotForRender(), NOW);

    expect(bel.addresses[0].lastActive).toBe('?');
    expect(bel.addresses[0].elapsed).toBe('?');
  });
});
