import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { createExplorerHttp, FetchError } from '../src/services/providers/http';
import type { ActivityProvider, FetchResult } from '../src/services/providers/interface';
import type { ObservedActivity } from '../src/types';

export type FakeReply = { status: number; body: string } | { networkError: string };

/**
 * The real explorer client with its transport swapped for an in-process
 * function. Requested URLs are recorded in `urls`.
 */
export function fakeExplorerHttp(reply: (url: string) => FakeReply) {
  const urls: string[] = [];
  const http = createExplorerHttp(1_000);
  http.defaults.adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const url = config.url ?? '';
    urls.push(url);
    const r = reply(url);
    if ('networkError' in r) {
      throw new AxiosError(`connect ${r.networkError}`, r.networkError, config);
    }
    return { data: r.body, status: r.status, statusText: '', headers: {}, config };
  };
  return { http, urls };
}

export function ok(activity: ObservedActivity): FetchResult {
  return { ok: true, activity };
}

export function failed(message = 'connect ECONNREFUSED'): FetchResult {
  return { ok: false, error: new FetchError(message, 'transport', 'https://explorer.test') };
}

/** Provider whose answers are scripted per address, in call order. */
export class ScriptedProvider implements ActivityProvider {
  readonly calls: string[] = [];
  private readonly script = new Map<string, Array<FetchResult | Error>>();

  constructor(readonly id: string) { }

  on(address: string, ...replies: Array<FetchResult | Error>): this {
    this.script.set(address, [...(this.script.get(address) ?? []), ...replies]);
    return this;
  }

  iconUrl(ticker: string): string {
    return `https://icons.test/${ticker}.png`;
  }

  linkUrl(ticker: string, address: string): string {
    return `https://explorer.test/${ticker}/${address}`;
  }

  async fetchActivity(address: string): Promise<FetchResult> {
    this.calls.push(address);
    const next = this.script.get(address)?.shift();
    if (next instanceof Error) throw next;
    return next ?? failed('no scripted reply');
  }
}
