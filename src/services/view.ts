import type { CoinView } from '../types';
import type { CoinSnapshot } from './state';
import type { ProviderRegistry } from './providers/registry';
import { formatBalance, formatElapsedSince, formatTimestamp } from '../utils/format';

export class ViewRenderer {
  constructor(private readonly providers: ProviderRegistry) { }

  render(coins: ReadonlyArray<CoinSnapshot>, nowSeconds: number = Math.floor(Date.now() / 1000)): CoinView[] {
    return coins.map((coin) => {
      const provider = this.providers.resolve(coin.provider);
      return {
        name: coin.name,
        ticker: coin.ticker,
        iconUrl: provider.iconUrl(coin.ticker),
        addresses: coin.addresses.map((entry) => ({
          address: entry.address,
          linkUrl: provider.linkUrl(coin.ticker, entry.address),
          balance: formatBalance(entry.balance, coin.ticker),
          lastActive: formatTimestamp(entry.lastActivityTimestamp),
          elapsed: formatElapsedSince(entry.lastActivityTimestamp, nowSeconds),
        })),
      };
    });
  }
}
