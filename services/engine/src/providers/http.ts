import { errorMessage, failure, success, type ProviderResult } from '../contracts/results';
import { abortable, scopedSignal } from '../util/async';

export type FetchImpl = typeof fetch;

export interface HttpRequest {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string | number | boolean | undefined>;
  body?: Record<string, unknown>;
  headers?: Record<string, string>;
}

export function buildUrl(baseUrl: string, path: string, query: HttpRequest['query'] = {}): URL {
  const url = new URL(path.replace(/^\//, ''), baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
  for (const [k, v] of Object.entries(query)) {
    if (v !== undefined) url.searchParams.set(k, String(v));
  }
  return url;
}

async function safeReadBody(res: Response, signal: AbortSignal): Promise<string> {
  try {
    const text = await abortable(res.text(), signal);
    return text ? ` - ${text.slice(0, 200)}` : '';
  } catch {
    return '';
  }
}

/**
 * One HTTP attempt against an upstream, classified into a ProviderResult
 * carrying the parsed JSON body. Never throws.
 *
 * The attempt timeout covers the body as well as the headers.
 */
export async function sendJson(
  fetchImpl: FetchImpl,
  provider: string,
  url: URL,
  init: RequestInit,
  timeoutMs: number,
  callerSignal?: AbortSignal,
): Promise<ProviderResult<unknown>> {
  const scope = scopedSignal(timeoutMs, callerSignal);
  try {
    return await exchange(fetchImpl, provider, url, init, scope.signal);
  } catch (err) {
    if (callerSignal?.aborted) {
      return failure('Timeout', `${provider}: request abandoned, caller deadline expired`, false);
    }
    if (scope.timedOut()) {
      return failure('Timeout', `${provider}: no response within ${timeoutMs}ms`, true);
    }
    return failure('UpstreamUnavailable', `${provider}: ${errorMessage(err)}`, true);
  } finally {
    scope.dispose();
  }
}

async function exchange(
  fetchImpl: FetchImpl,
  provider: string,
  url: URL,
  init: RequestInit,
  signal: AbortSignal,
): Promise<ProviderResult<unknown>> {
  const res = await fetchImpl(url.toString(), { ...init, signal });

  if (!res.ok) {
    const detail = await safeReadBody(res, signal);
    if (res.status === 429) return failure('RateLimited', `${provider}: rate limited by server`, true);
    if (res.status >= 500) {
      return failure('UpstreamUnavailable', `${provider}: HTTP ${res.status}${detail}`, true);
    }
    if (res.status === 401) return failure('UpstreamRejected', `${provider}: invalid API key`, false);
    if (res.status === 403) return failure('UpstreamRejected', `${provider}: endpoint not available on this plan`, false);
    return failure('UpstreamRejected', `${provider}: HTTP ${res.status}${detail}`, false);
  }

  let text: string;
  try {
    text = await abortable(res.text(), signal);
  } catch (err) {
    if (signal.aborted) throw err;
    return failure('UpstreamUnavailable', `${provider}: response body interrupted (${errorMessage(err)})`, true);
  }
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err) {
    return failure('InvalidUpstreamResponse', `${provider}: response is not JSON (${errorMessage(err)})`, false);
  }
  return success(body);
}
