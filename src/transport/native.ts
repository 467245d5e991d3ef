import { Agent, request, type Dispatcher } from 'undici';
import { logger as defaultLogger, type Logger } from '../middleware/logger.js';
import { describeRequest } from '../middleware/redact.js';
import {
  classifyStatus,
  type HttpRequest,
  type RequestOutcome,
  type SendOptions,
  type Transport,
} from './types.js';

export interface NativeTransportOptions {
  /** Replaces the per-call Agent, e.g. with an undici MockAgent. Never closed by the transport. */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export function describeNetworkError(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code && !error.message.includes(code) ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  return Buffer.from(String(chunk));
}

/**
 * Streams the request through undici. Each call gets its own Agent so the
 * connect timeout applies per call and no socket outlives the call.
 */
export class NativeTransport implements Transport {
  readonly name = 'native';
  private dispatcher?: Dispatcher;
  private logger: Logger;

  constructor(options: NativeTransportOptions = {}) {
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? defaultLogger;
  }

  async send(httpRequest: HttpRequest, options: SendOptions): Promise<RequestOutcome> {
    if (options.signal?.aborted) {
      return { kind: 'cancelled' };
    }

    this.logger.debug({ request: describeRequest(httpRequest) }, 'Native transport request');

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.overallTimeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const ownAgent = this.dispatcher
      ? undefined
      : new Agent({
          connect: { timeout: options.connectTimeoutMs },
          headersTimeout: options.overallTimeoutMs,
          bodyTimeout: options.overallTimeoutMs,
        });

    try {
      const response = await request(httpRequest.url, {
        method: 'POST',
        headers: httpRequest.headers,
        body: httpRequest.body,
        signal: controller.signal,
        dispatcher: this.dispatcher ?? ownAgent,
      });

      if (response.statusCode >= 400 || !options.onData) {
        const body = await response.body.text();
        return classifyStatus(response.statusCode, body);
      }

      const decoder = new TextDecoder();
      let body = '';
      for await (const chunk of response.body) {
        const text = decoder.decode(toBytes(chunk), { stream: true });
        if (text.length > 0) {
          body += text;
          options.onData(text);
        }
      }
      const tail = decoder.decode();
      if (tail.length > 0) {
        body += tail;
        options.onData(tail);
      }
      return classifyStatus(response.statusCode, body);
    } catch (error) {
      if (options.signal?.aborted) {
        return { kind: 'cancelled' };
      }
      if (timedOut) {
        return {
          kind: 'connection-error',
          detail: `Request timed out after ${options.overallTimeoutMs} ms`,
        };
      }
      const detail = describeNetworkError(error);
      this.logger.warn({ url: describeRequest(httpRequest).url, detail }, 'Native transport failed');
      return { kind: 'connection-error', detail };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      if (ownAgent) {
        await ownAgent.destroy();
      }
    }
  }
}
