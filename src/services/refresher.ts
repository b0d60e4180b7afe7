import type { RefreshSummary } from '../types';
import type { AddressStateStore } from './state';
import type { ProviderRegistry } from './providers/registry';

export interface RefreshOptions {
  // A pass finished less than this long ago is reused instead of re-fetching.
  minIntervalMs: number;
  // Pause between consecutive explorer calls within one pass.
  requestDelayMs: number;
  debug?: boolean;
  clock?: () => number;
}

export class RefreshOrchestrator {
  private inflight: Promise<RefreshSummary> | null = null;
  private lastCompletedAt: number | null = null;
  private readonly clock: () => number;

  constructor(
    private readonly store: AddressStateStore,
    private readonly providers: ProviderRegistry,
    private readonly options: RefreshOptions
  ) {
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Brings the store up to date. Callers arriving while a pass runs share it;
   * a recent enough pass is not repeated. Never rejects because of a fetch.
   */
  refresh(): Promise<RefreshSummary> {
    if (this.inflight) return this.inflight;

    if (
      this.lastCompletedAt !== null &&
      this.clock() - this.lastCompletedAt < this.options.minIntervalMs
    ) {
      if (this.options.debug) console.log('[DEBUG] refresh skipped: last pass is still fresh');
      return Promise.resolve({ skipped: true, attempted: 0, succeeded: 0, failed: 0 });
    }

    this.inflight = this.runPass().finally(() => {
      this.lastCompletedAt = this.clock();
      this.inflight = null;
    });
    return this.inflight;
  }

  private async runPass(): Promise<RefreshSummary> {
    const targets = this.store.snapshotForUpdate();
    const summary: RefreshSummary = { skipped: false, attempted: 0, succeeded: 0, failed: 0 };

    for (const [i, target] of targets.entries()) {
      if (i > 0 && this.options.requestDelayMs > 0) {
        await new Promise(r => setTimeout(r, this.options.requestDelayMs));
      }

      summary.attempted++;
      const provider = this.providers.resolve(target.provider);
      try {
        const result = await provider.fetchActivity(target.address, target.ticker);
        if (!result.ok) {
          summary.failed++;
          console.warn(`Failed to fetch ${target.ticker} activity for ${target.address}: ${result.error.message}`);
          continue;
        }

        this.store.applyResult(target.coinIndex, target.addressIndex, result.activity);
        summary.succeeded++;
        if (this.options.debug) {
          console.log(`[DEBUG] ${target.ticker} ${target.address}: ${JSON.stringify(result.activity)}`);
        }
      } catch (e) {
        summary.failed++;
        console.warn(`Unexpected error refreshing ${target.ticker} ${target.address}:`, e);
      }
    }

    if (this.options.debug) {
      console.log(`[DEBUG] refresh pass: ${summary.succeeded}/${summary.attempted} ok, ${summary.failed} failed`);
    }
    return summary;
  }
}
