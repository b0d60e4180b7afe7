import type { Coin, CoinDef, ObservedActivity, RefreshTarget, TrackedAddress } from '../types';

export type CoinSnapshot = Readonly<{
  name: string;
  ticker: string;
  provider: Coin['provider'];
  addresses: ReadonlyArray<Readonly<TrackedAddress>>;
}>;

/**
 * Owns the coin/address registry for the lifetime of the process.
 *
 * Every method is synchronous, so on Node's event loop no snapshot can be
 * taken while a single address is half written. `applyResult` additionally
 * swaps in a fresh record instead of editing the old one, which keeps
 * previously handed-out snapshots unchanged.
 */
export class AddressStateStore {
  private coins: Coin[] = [];

  loadInitial(defs: CoinDef[]): void {
    this.coins = defs.map((def) => ({
      name: def.name,
      ticker: def.ticker,
      provider: def.api,
      addresses: def.addresses.map((a) => ({ address: a.address })),
    }));
  }

  snapshotForUpdate(): RefreshTarget[] {
    const targets: RefreshTarget[] = [];
    this.coins.forEach((coin, coinIndex) => {
      coin.addresses.forEach((entry, addressIndex) => {
        targets.push({
          coinIndex,
          addressIndex,
          address: entry.address,
          ticker: coin.ticker,
          provider: coin.provider,
        });
      });
    });
    return targets;
  }

  applyResult(coinIndex: number, addressIndex: number, observed: ObservedActivity): void {
    const coin = this.coins[coinIndex];
    const current = coin?.addresses[addressIndex];
    if (!coin || !current) {
      throw new RangeError(`No address at coin ${coinIndex}, index ${addressIndex}`);
    }

    const next: TrackedAddress = { ...current };
    if (observed.balance !== undefined) next.balance = observed.balance;
    if (observed.lastActivityTimestamp !== undefined) next.lastActivityTimestamp = observed.lastActivityTimestamp;
    coin.addresses[addressIndex] = next;
  }

  snapshotForRender(): ReadonlyArray<CoinSnapshot> {
    return Object.freeze(
      this.coins.map((coin) =>
        Object.freeze({
          name: coin.name,
          ticker: coin.ticker,
          provider: coin.provider,
          addresses: Object.freeze(coin.addresses.map((a) => Object.freeze({ ...a }))),
        })
      )
    );
  }
}
