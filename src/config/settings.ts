import { z } from 'zod';

const settingsSchema = z.object({
  WW_HOST: z.string().min(1).default('127.0.0.1'),
  WW_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  WW_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  WW_REFRESH_INTERVAL_MS: z.coerce.number().int().min(0).default(30_000),
  WW_FETCH_DELAY_MS: z.coerce.number().int().min(0).default(200),
  WW_DEBUG: z.string().optional(),
});

export interface WatcherSettings {
  host: string;
  port: number;
  fetchTimeoutMs: number;
  refreshIntervalMs: number;
  fetchDelayMs: number;
  debug: boolean;
}

/**
 * Reads runtime settings from the environment (after dotenv has populated it).
 * Empty variables count as unset so a blank line in .env falls back to the default.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): WatcherSettings {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('WW_') && value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = settingsSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment settings: ${issues}`);
  }

  const s = parsed.data;
  return {
    host: s.WW_HOST,
    port: s.WW_PORT,
    fetchTimeoutMs: s.WW_FETCH_TIMEOUT_MS,
    refreshIntervalMs: s.WW_REFRESH_INTERVAL_MS,
    fetchDelayMs: s.WW_FETCH_DELAY_MS,
    debug: s.WW_DEBUG === '1',
  };
}
