import type { ObservedActivity } from '../../types';
import type { FetchError } from './http';

export type FetchResult =
  | { ok: true; activity: ObservedActivity }
  | { ok: false; error: FetchError };

/**
 * One explorer integration. `fetchActivity` resolves with a FetchError for
 * transport failures and never rejects; fields it cannot read are left unset.
 */
export interface ActivityProvider {
  readonly id: string;
  fetchActivity(address: string, ticker: string): Promise<FetchResult>;
  iconUrl(ticker: string): string;
  linkUrl(ticker: string, address: string): string;
}
