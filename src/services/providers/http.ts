import axios, { type AxiosInstance } from 'axios';

export type FetchErrorKind = 'transport' | 'status' | 'body' | 'unsupported';

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export type JsonResult = { ok: true; body: unknown } | { ok: false; error: FetchError };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shared client for explorer APIs. Bodies come back as raw text so that a
 * non-JSON reply can be told apart from a JSON one, and status codes are
 * checked by `getJson` rather than thrown by axios.
 */
export function createExplorerHttp(timeoutMs: number): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
    headers: { Accept: 'application/json' },
  });
}

/**
 * axios's `timeout` only covers an idle socket, so a reply that trickles in
 * is also cut off by an abort signal armed for the same duration.
 */
export async function getJson(http: AxiosInstance, url: string): Promise<JsonResult> {
  const timeoutMs = http.defaults.timeout;
  let status: number;
  let data: unknown;
  try {
    const response = await http.get<unknown>(url, {
      signal: timeoutMs !== undefined && timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
    });
    status = response.status;
    data = response.data;
  } catch (e) {
    const detail = axios.isAxiosError(e) ? (e.code ?? e.message) : e instanceof Error ? e.message : String(e);
    return { ok: false, error: new FetchError(`Request failed: ${detail}`, 'transport', url) };
  }

  if (status < 200 || status >= 300) {
    return { ok: false, error: new FetchError(`Unexpected status ${status}`, 'status', url, status) };
  }

  if (typeof data !== 'string') {
    // Already decoded by a custom adapter
    return { ok: true, body: data };
  }

  try {
    return { ok: true, body: JSON.parse(data) };
  } catch {
    return { ok: false, error: new FetchError('Response body is not JSON', 'body', url, status) };
  }
}
