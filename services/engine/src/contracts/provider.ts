import type { ProviderResult } from './results';
import type { HttpRequest } from '../providers/http';

export type ProviderId = 'twelve_data' | 'fmp' | 'tavily';

export interface OperationShape {
  params: object;
  result: unknown;
}

/**
 * One logical call to an upstream. Frozen when issued; a retry is a new
 * request with `attemptCount + 1` and the same identity otherwise.
 */
export interface ProviderRequest<P extends object = object> {
  readonly providerId: ProviderId;
  readonly operation: string;
  readonly parameters: Readonly<P>;
  readonly attemptCount: number;
}

export interface OperationHandler<P, R> {
  request(params: P): HttpRequest;
  /** Validate the upstream body and convert it to the shared shape. */
  normalize(body: unknown, params: P): ProviderResult<R>;
}

export interface ProviderAdapter<Ops extends { [K in keyof Ops]: OperationShape }> {
  readonly id: ProviderId;
  fetch<K extends keyof Ops & string>(
    operation: K,
    parameters: Ops[K]['params'],
    signal?: AbortSignal,
  ): Promise<ProviderResult<Ops[K]['result']>>;
}
