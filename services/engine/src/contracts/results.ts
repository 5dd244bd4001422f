/** Failure taxonomy shared by adapters, the cache, the tool registry and the agent loop. */
export const FAILURE_KINDS = [
  'RateLimited',
  'Timeout',
  'UpstreamUnavailable',
  'UpstreamRejected',
  'InvalidUpstreamResponse',
  'InvalidArguments',
  'NotConfigured',
  'UnknownTool',
  'BudgetExhausted',
  'ModelUnavailable',
  'Internal',
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

export interface Success<T> {
  ok: true;
  data: T;
  /** ISO timestamp of the upstream fetch that produced `data`. */
  fetchedAt: string;
}

export interface Failure {
  ok: false;
  kind: FailureKind;
  message: string;
  retriable: boolean;
}

export type ProviderResult<T> = Success<T> | Failure;

export function success<T>(data: T, fetchedAt: Date = new Date()): Success<T> {
  return { ok: true, data, fetchedAt: fetchedAt.toISOString() };
}

export function failure(kind: FailureKind, message: string, retriable = false): Failure {
  return { ok: false, kind, message, retriable };
}

export function mapSuccess<T, U>(result: ProviderResult<T>, fn: (data: T) => U): ProviderResult<U> {
  if (!result.ok) return result;
  return { ok: true, data: fn(result.data), fetchedAt: result.fetchedAt };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
