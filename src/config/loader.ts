import fs from 'fs';
import { z } from 'zod';
import type { CoinConfig } from '../types';

const providerSchema = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['chainz', 'blnscan']));

const addressSchema = z.object({
  address: z.string().trim().min(1, 'address must not be empty'),
});

// A coin lists its addresses, or carries a single `address` (one address per coin).
const coinSchema = z
  .object({
    name: z.string().min(1),
    ticker: z.string().trim().min(1),
    api: providerSchema,
    address: z.string().trim().min(1).optional(),
    addresses: z.array(addressSchema).optional(),
  })
  .transform(({ name, ticker, api, address, addresses }) => ({
    name,
    ticker,
    api,
    addresses: [...(address !== undefined ? [{ address }] : []), ...(addresses ?? [])],
  }))
  .refine((coin) => coin.addresses.length > 0, {
    message: 'coin must list at least one address',
  });

export const coinConfigSchema = z.object({
  coins: z.array(coinSchema).min(1, 'at least one coin must be configured'),
});

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly reason: 'not_found' | 'unreadable' | 'invalid_json' | 'invalid_schema',
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export type ConfigLoadResult =
  | { ok: true; config: CoinConfig }
  | { ok: false; error: ConfigLoadError };

export class CoinConfigLoader {
  static load(path: string): ConfigLoadResult {
    if (!fs.existsSync(path)) {
      return { ok: false, error: new ConfigLoadError(`Coin config not found: ${path}`, path, 'not_found') };
    }

    let raw: string;
    try {
      raw = fs.readFileSync(path, 'utf-8');
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      return { ok: false, error: new ConfigLoadError(`Coin config unreadable: ${path} (${detail})`, path, 'unreadable') };
    }

    return CoinConfigLoader.parse(raw, path);
  }

  static parse(raw: string, path = '<inline>'): ConfigLoadResult {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      return { ok: false, error: new ConfigLoadError(`Coin config is not valid JSON: ${path} (${detail})`, path, 'invalid_json') };
    }

    const parsed = coinConfigSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      return {
        ok: false,
        error: new ConfigLoadError(`Coin config failed validation: ${path}`, path, 'invalid_schema', issues),
      };
    }

    return { ok: true, config: parsed.data };
  }
}
