import type { AxiosInstance } from 'axios';
import type { ActivityProvider, FetchResult } from './interface';
import { getJson, isRecord } from './http';
import type { ObservedActivity } from '../../types';

export const BLNSCAN_HOST = 'blnexplorer.io';

const INTEGER_STRING = /^\+?\d+$/;

function parseTime(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === 'string') {
    if (!INTEGER_STRING.test(value)) return undefined;
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : undefined;
  }
  return undefined;
}

/**
 * Blnscan account API. It reports transactions newest first and no balance,
 * so only the activity time is ever observed.
 */
export class BlnscanProvider implements ActivityProvider {
  readonly id = 'blnscan';

  constructor(
    private readonly http: AxiosInstance,
    private readonly host: string = BLNSCAN_HOST
  ) { }

  iconUrl(_ticker: string): string {
    return `https://${this.host}/favicon.ico`;
  }

  linkUrl(_ticker: string, address: string): string {
    return `https://${this.host}/${address}`;
  }

  async fetchActivity(address: string, _ticker: string): Promise<FetchResult> {
    const url = `https://${this.host}/api/account/${encodeURIComponent(address)}`;
    const res = await getJson(this.http, url);
    if (!res.ok) return res;
    return { ok: true, activity: BlnscanProvider.parse(res.body) };
  }

  // { txns?: [{ time: integer | "integer" }, ...] }
  static parse(body: unknown): ObservedActivity {
    const activity: ObservedActivity = {};
    if (!isRecord(body) || !Array.isArray(body.txns)) return activity;

    const first: unknown = body.txns[0];
    if (!isRecord(first)) return activity;

    const time = parseTime(first.time);
    if (time !== undefined) {
      activity.lastActivityTimestamp = time;
    }
    return activity;
  }
}
