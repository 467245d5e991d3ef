/**
 * Transport: how one HTTP POST reaches a provider.
 *
 * Owns: connection, timeouts, status classification, temp resources.
 * Does NOT own: retries, payload shape, response decoding.
 */

export interface HttpRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
}

export type RequestOutcome =
  | { kind: 'success'; status: number; body: string }
  | { kind: 'http-error'; status: number; body: string }
  | { kind: 'connection-error'; detail: string }
  | { kind: 'cancelled' };

export interface TimeoutPolicy {
  connectTimeoutMs: number;
  overallTimeoutMs: number;
}

export interface SendOptions extends TimeoutPolicy {
  signal?: AbortSignal;
  /**
   * Called for each raw body chunk of a successful (status < 400) response.
   * When set, `success.body` still carries the full body.
   */
  onData?: (chunk: string) => void;
}

export interface Transport {
  readonly name: string;
  send(request: HttpRequest, options: SendOptions): Promise<RequestOutcome>;
}

export function classifyStatus(status: number, body: string): RequestOutcome {
  if (status >= 400) {
    return { kind: 'http-error', status, body };
  }
  return { kind: 'success', status, body };
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
