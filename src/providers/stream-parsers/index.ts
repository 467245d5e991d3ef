import type { StreamDecoder } from '../../services/background-runner.js';
import { describeErrorObject } from '../shapes.js';
import { extractAnthropicDelta } from './anthropic-sse.js';
import { extractGeminiDelta } from './gemini-sse.js';
import { extractResponsesDelta } from './openai-responses-sse.js';
import { extractOpenAIDelta } from './openai-sse.js';
import { SseParser, type SseEvent } from './sse.js';

export { SseParser, type SseEvent } from './sse.js';

/** The wire framing of a provider's streamed responses. */
export type StreamFormat = 'openai-sse' | 'openai-responses-sse' | 'anthropic-sse' | 'gemini-sse';

const extractors: Record<StreamFormat, (payload: unknown) => string | undefined> = {
  'openai-sse': extractOpenAIDelta,
  'openai-responses-sse': extractResponsesDelta,
  'anthropic-sse': extractAnthropicDelta,
  'gemini-sse': extractGeminiDelta,
};

/**
 * SSE → text fragments for one response. An error event in the stream is
 * kept in `error` instead of being emitted as content.
 */
export class ProviderStreamDecoder implements StreamDecoder {
  readonly format: StreamFormat;
  error?: string;
  private parser = new SseParser();

  constructor(format: StreamFormat) {
    this.format = format;
  }

  push(text: string): string[] {
    return this.decode(this.parser.push(text));
  }

  end(): string[] {
    return this.decode(this.parser.end());
  }

  private decode(events: SseEvent[]): string[] {
    const fragments: string[] = [];
    for (const event of events) {
      if (event.data === '[DONE]') continue;

      let payload: unknown;
      try {
        payload = JSON.parse(event.data);
      } catch {
        // keep-alive or partial garbage; nothing to deliver
        continue;
      }

      const streamError = describeErrorObject(payload);
      if (streamError !== undefined) {
        this.error ??= streamError;
        continue;
      }

      const text = extractors[this.format](payload);
      if (text !== undefined && text.length > 0) {
        fragments.push(text);
      }
    }
    return fragments;
  }
}

export function createStreamDecoder(format: StreamFormat): ProviderStreamDecoder {
  return new ProviderStreamDecoder(format);
}
