import { describe, expect, it } from 'vitest';
import { BlnscanProvider } from '../../src/services/providers/blnscan';
import { fakeExplorerHttp } from '../helpers';

describe('BlnscanProvider', () => {
  it('requests the account endpoint for the address', async () => {
    const { http, urls } = fakeExplorerHttp(() => ({ status: 200, body: '{"txns": []}' }));
    await new BlnscanProvider(http).fetchActivity('BTestAddr1', 'BEL');
    expect(urls).toEqual(['https://blnexplorer.io/api/account/BTestAddr1']);
  });

  it('takes the time of the first transaction as an integer', async () => {
    const { http } = fakeExplorerHttp(() => ({
      status: 200,
      body: '{"txns": [{"time": 1700000000}, {"time": 1600000000}]}',
    }));
    const result = await new BlnscanProvider(http).fetchActivity('BTestAddr1', 'BEL');
    expect(result).toEqual({ ok: true, activity: { lastActivityTimestamp: 1700000000 } });
  });

  it('accepts the time as a numeric string', async () => {
    const { http } = fakeExplorerHttp(() => ({ status: 200, body: '{"txns": [{"time": "1700000000"}]}' }));
    const result = await new BlnscanProvider(http).fetchActivity('BTestAddr1', 'BEL');
    expect(result).toEqual({ ok: true, activity: { lastActivityTimestamp: 1700000000 } });
  });

  it('never reports a balance', () => {
    expect(BlnscanProvider.parse({ balance: 12, txns: [{ time: 1700000000 }] })).toEqual({
      lastActivityTimestamp: 1700000000,
    });
  });

  it('observes nothing from empty or malformed transaction lists', () => {
    expect(BlnscanProvider.parse({ txns: [] })).toEqual({});
    expect(BlnscanProvider.parse({})).toEqual({});
    expect(BlnscanProvider.parse({ txns: 'none' })).toEqual({});
    expect(BlnscanProvider.parse({ txns: [{ time: 'yesterday' }] })).toEqual({});
    expect(BlnscanProvider.parse({ txns: [{ time: 1.5 }] })).toEqual({});
    expect(BlnscanProvider.parse({ txns: [null] })).toEqual({});
  });

  it('rejects negative and padded times', () => {
    expect(BlnscanProvider.parse({ txns: [{ time: '-5' }] })).toEqual({});
    expect(BlnscanProvider.parse({ txns: [{ time: -5 }] })).toEqual({});
    expect(BlnscanProvider.parse({ txns: [{ time: ' 1700000000' }] })).toEqual({});
    expect(BlnscanProvider.parse({ txns: [{ time: '+1700000000' }] })).toEqual({ lastActivityTimestamp: 1700000000 });
  });

  it('builds the favicon and account links', () => {
    const { http } = fakeExplorerHttp(() => ({ status: 200, body: '{}' }));
    const provider = new BlnscanProvider(http);
    expect(provider.iconUrl('BEL')).toBe('https://blnexplorer.io/favicon.ico');
    expect(provider.linkUrl('BEL', 'BTestAddr1')).toBe('https://blnexplorer.io/BTestAddr1');
  });
});
