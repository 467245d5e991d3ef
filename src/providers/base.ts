import type { ErrorKind } from '../errors.js';
import type { HttpRequest, TimeoutPolicy } from '../transport/types.js';
import type { StreamFormat } from './stream-parsers/index.js';

export type Role = 'system' | 'user' | 'assistant';

export interface Message {
  role: Role;
  content: string;
  name?: string;
  /** Structured reasoning returned by an earlier turn; only some providers accept it back. */
  reasoning?: unknown;
  /** Host-only marker; never sent to a provider. */
  isContext?: boolean;
}

export type CanonicalResult =
  | { success: true; text: string }
  | { success: false; message: string; kind: ErrorKind };

export interface QueryOptions {
  /** Streamed fragments, in arrival order. Only called when the provider streams. */
  onChunk?: (chunk: string) => void;
  signal?: AbortSignal;
}

export interface ProviderRequest extends HttpRequest {
  /** Set when the response is an event stream in this framing. */
  stream?: StreamFormat;
  /** Provider-specific budget; large bodies still get the extended one. */
  timeouts?: TimeoutPolicy;
}

export interface LLMProvider {
  readonly name: string;
  query(messages: readonly Message[], options?: QueryOptions): Promise<CanonicalResult>;
}
