import type { ZodError } from 'zod';
import type { ProviderSettings } from '../config';
import { failure, type Failure, type ProviderResult } from '../contracts/results';
import type {
  OperationHandler,
  OperationShape,
  ProviderAdapter,
  ProviderId,
  ProviderRequest,
} from '../contracts/provider';
import { createComponentLogger, type Logger } from '../logger';
import { sleep as defaultSleep } from '../util/async';
import { buildUrl, sendJson, type FetchImpl, type HttpRequest } from './http';
import { createRateLimiter, type LimiterClock, type RateLimiter } from './rateLimiter';
import { retryResult } from './retry';

export type AuthPlacement =
  | { in: 'query'; name: string }
  | { in: 'header'; name: string; prefix?: string };

export interface AdapterDefinition<Ops extends { [K in keyof Ops]: OperationShape }> {
  id: ProviderId;
  auth: AuthPlacement;
  operations: { [K in keyof Ops]: OperationHandler<Ops[K]['params'], Ops[K]['result']> };
  /** Some upstreams report errors inside a 200 body. */
  detectBodyError?(body: unknown): Failure | null;
}

export interface AdapterDeps {
  fetch?: FetchImpl;
  limiter?: RateLimiter;
  clock?: LimiterClock;
  random?: () => number;
  baseDelayMs?: number;
  logger?: Logger;
}

export function describeZodError(err: ZodError): string {
  return err.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Uniform fetch contract over one HTTP upstream: rate limit, bounded retries
 * with backoff, then validation into the shared shape.
 */
export class HttpProviderAdapter<Ops extends { [K in keyof Ops]: OperationShape }> implements ProviderAdapter<Ops> {
  readonly id: ProviderId;
  private readonly fetchImpl: FetchImpl;
  private readonly limiter: RateLimiter;
  private readonly clock: LimiterClock;
  private readonly random: () => number;
  private readonly baseDelayMs: number;
  private readonly log: Logger;

  constructor(
    private readonly definition: AdapterDefinition<Ops>,
    private readonly settings: ProviderSettings,
    deps: AdapterDeps = {},
  ) {
    this.id = definition.id;
    this.clock = deps.clock ?? { now: Date.now, sleep: defaultSleep };
    this.fetchImpl = deps.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.limiter = deps.limiter ?? createRateLimiter(settings.rateLimit, this.clock);
    this.random = deps.random ?? Math.random;
    this.baseDelayMs = deps.baseDelayMs ?? 250;
    this.log = deps.logger ?? createComponentLogger(`provider:${definition.id}`);
  }

  async fetch<K extends keyof Ops & string>(
    operation: K,
    parameters: Ops[K]['params'],
    signal?: AbortSignal,
  ): Promise<ProviderResult<Ops[K]['result']>> {
    if (!this.settings.apiKey) {
      return failure('NotConfigured', `${this.id}: API key is not configured`);
    }

    const handler = this.definition.operations[operation];
    const request: ProviderRequest<Ops[K]['params']> = Object.freeze({
      providerId: this.id,
      operation,
      parameters: Object.freeze({ ...parameters }),
      attemptCount: 1,
    });

    return retryResult<Ops[K]['result']>(
      async (attempt) => {
        const attemptRequest = attempt === 1 ? request : Object.freeze({ ...request, attemptCount: attempt });
        const raw = await this.attempt(attemptRequest, handler.request(parameters), signal);
        if (!raw.ok) return raw;
        return handler.normalize(raw.data, parameters);
      },
      {
        maxAttempts: this.settings.maxAttempts,
        baseDelayMs: this.baseDelayMs,
        signal,
        random: this.random,
        sleep: this.clock.sleep,
        onRetry: (attempt, result, delayMs) => {
          this.log.warn({ op: operation, attempt, delayMs, reason: result.ok ? undefined : result.kind }, 'retrying upstream call');
        },
      },
    );
  }

  private async attempt(
    request: ProviderRequest,
    http: HttpRequest,
    signal?: AbortSignal,
  ): Promise<ProviderResult<unknown>> {
    let acquired: boolean;
    try {
      acquired = await this.limiter.acquire(signal);
    } catch {
      return failure('Timeout', `${this.id}: caller deadline expired while queued for rate limit`, false);
    }
    if (!acquired) {
      this.log.warn({ op: request.operation }, 'rate limit exceeded');
      return failure('RateLimited', `${this.id}: local rate limit exceeded`, true);
    }

    const { url, init } = this.buildRequest(http);
    const startedAt = this.clock.now();
    const result = await sendJson(this.fetchImpl, this.id, url, init, this.settings.timeoutMs, signal);
    this.log.debug(
      { op: request.operation, attempt: request.attemptCount, ms: this.clock.now() - startedAt, ok: result.ok },
      'upstream call finished',
    );

    if (result.ok) {
      const bodyError = this.definition.detectBodyError?.(result.data);
      if (bodyError) return bodyError;
    }
    return result;
  }

  private buildRequest(http: HttpRequest): { url: URL; init: RequestInit } {
    const auth = this.definition.auth;
    const query = { ...http.query };
    const headers: Record<string, string> = { accept: 'application/json', ...http.headers };

    if (auth.in === 'query') query[auth.name] = this.settings.apiKey;
    else headers[auth.name] = `${auth.prefix ?? ''}${this.settings.apiKey}`;

    const init: RequestInit = { method: http.method, headers };
    if (http.body) {
      headers['content-type'] = 'application/json';
      init.body = JSON.stringify(http.body);
    }
    return { url: buildUrl(this.settings.baseUrl, http.path, query), init };
  }
}
