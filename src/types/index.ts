export type ProviderId = 'chainz' | 'blnscan';

export interface AddressDef {
  address: string;
}

export interface CoinDef {
  name: string;
  ticker: string;
  api: ProviderId;
  addresses: AddressDef[];
}

export interface CoinConfig {
  coins: CoinDef[];
}

export interface TrackedAddress {
  readonly address: string;
  balance?: number;
  // Unix epoch seconds
  lastActivityTimestamp?: number;
}

export interface Coin {
  name: string;
  ticker: string;
  provider: ProviderId;
  addresses: TrackedAddress[];
}

/**
 * Fields parsed out of one provider response. Each one is optional on its own:
 * a provider may report the activity time without a balance.
 */
export interface ObservedActivity {
  balance?: number;
  lastActivityTimestamp?: number;
}

export interface RefreshTarget {
  coinIndex: number;
  addressIndex: number;
  address: string;
  ticker: string;
  provider: ProviderId;
}

export interface RefreshSummary {
  skipped: boolean;
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface AddressView {
  address: string;
  linkUrl: string;
  balance: string;
  lastActive: string;
  elapsed: string;
}

export interface CoinView {
  name: string;
  ticker: string;
  iconUrl: string;
  addresses: AddressView[];
}
