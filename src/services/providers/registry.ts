import type { AxiosInstance } from 'axios';
import type { ActivityProvider, FetchResult } from './interface';
import { FetchError } from './http';
import { ChainzProvider } from './chainz';
import { BlnscanProvider } from './blnscan';

/** Stand-in for a provider id with no integration: no icon, no link, no data. */
export class UnsupportedProvider implements ActivityProvider {
  constructor(readonly id: string) { }

  iconUrl(): string {
    return '';
  }

  linkUrl(): string {
    return '';
  }

  async fetchActivity(): Promise<FetchResult> {
    return {
      ok: false,
      error: new FetchError(`No provider integration for "${this.id}"`, 'unsupported', ''),
    };
  }
}

export class ProviderRegistry {
  private readonly providers = new Map<string, ActivityProvider>();

  constructor(providers: ActivityProvider[]) {
    for (const provider of providers) {
      this.providers.set(provider.id, provider);
    }
  }

  static withDefaults(http: AxiosInstance): ProviderRegistry {
    return new ProviderRegistry([new ChainzProvider(http), new BlnscanProvider(http)]);
  }

  resolve(id: string): ActivityProvider {
    return this.providers.get(id) ?? new UnsupportedProvider(id);
  }
}
