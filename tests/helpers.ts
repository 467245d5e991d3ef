import { createLogger } from '../src/middleware/logger.js';
import { ProviderSettingsSchema, type ProviderSettings, type ProviderSettingsInput } from '../src/schemas/request.js';
import { RequestExecutor } from '../src/services/request-executor.js';
import type { HttpRequest, RequestOutcome, SendOptions, Transport } from '../src/transport/types.js';

export const silentLogger = createLogger({ level: 'silent' });

export type ResponderFn = (request: HttpRequest, options: SendOptions) => RequestOutcome | Promise<RequestOutcome>;

export type Responder = RequestOutcome | ResponderFn;

export interface RecordedCall {
  request: HttpRequest;
  options: SendOptions;
}

/**
 * In-process transport: answers from a queue of responders, repeating the
 * last one, and records every call.
 */
export class FakeTransport implements Transport {
  readonly name = 'fake';
  readonly calls: RecordedCall[] = [];
  private responders: Responder[];

  constructor(responders: Responder[]) {
    this.responders = responders;
  }

  async send(request: HttpRequest, options: SendOptions): Promise<RequestOutcome> {
    this.calls.push({ request, options });
    const responder = this.responders[Math.min(this.calls.length - 1, this.responders.length - 1)];
    if (responder === undefined) {
      throw new Error('FakeTransport has no responses queued');
    }
    return typeof responder === 'function' ? responder(request, options) : responder;
  }
}

export function createTestExecutor(transport: Transport, maxAttempts = 3): RequestExecutor {
  return new RequestExecutor({
    transport,
    logger: silentLogger,
    retry: { maxAttempts, initialDelay: 0, maxDelay: 0, factor: 1 },
  });
}

export function settings(input: ProviderSettingsInput): ProviderSettings {
  return ProviderSettingsSchema.parse(input);
}

export const ok = (body: string, status = 200): RequestOutcome => ({ kind: 'success', status, body });

export const httpError = (status: number, body: string): RequestOutcome => ({ kind: 'http-error', status, body });

export const connectionError = (detail: string): RequestOutcome => ({ kind: 'connection-error', detail });

export function sentBody(call: RecordedCall | undefined): unknown {
  if (!call) throw new Error('No request was sent');
  return JSON.parse(call.request.body);
}

/** Replays `fragments` through `onData` and answers with their concatenation. */
export function streamingResponder(fragments: string[]): ResponderFn {
  return (_request, options) => {
    for (const fragment of fragments) {
      options.onData?.(fragment);
    }
    return ok(fragments.join(''));
  };
}
