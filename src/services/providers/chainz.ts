import type { AxiosInstance } from 'axios';
import type { ActivityProvider, FetchResult } from './interface';
import { getJson, isRecord } from './http';
import type { ObservedActivity } from '../../types';

export const CHAINZ_HOST = 'chainz.cryptoid.info';

/**
 * chainz.cryptoid.info address lookups. One explorer hosts many coins, keyed
 * by the lowercase ticker in the path.
 */
export class ChainzProvider implements ActivityProvider {
  readonly id = 'chainz';

  constructor(
    private readonly http: AxiosInstance,
    private readonly host: string = CHAINZ_HOST
  ) { }

  iconUrl(ticker: string): string {
    return `https://${this.host}/logo/${ticker.toLowerCase()}.png`;
  }

  linkUrl(ticker: string, address: string): string {
    return `https://${this.host}/${ticker.toLowerCase()}/address.dws?${address}.htm`;
  }

  async fetchActivity(address: string, ticker: string): Promise<FetchResult> {
    const url = `https://${this.host}/${encodeURIComponent(ticker.toLowerCase())}/api.dws?q=addressinfo&a=${encodeURIComponent(address)}`;
    const res = await getJson(this.http, url);
    if (!res.ok) return res;
    return { ok: true, activity: ChainzProvider.parse(res.body) };
  }

  // { balance?: number, lastBlockTimestamp?: integer }
  static parse(body: unknown): ObservedActivity {
    const activity: ObservedActivity = {};
    if (!isRecord(body)) return activity;

    const balance = body.balance;
    if (typeof balance === 'number' && Number.isFinite(balance)) {
      activity.balance = balance;
    }

    const ts = body.lastBlockTimestamp;
    if (typeof ts === 'number' && Number.isSafeInteger(ts)) {
      activity.lastActivityTimestamp = ts;
    }

    return activity;
  }
}
