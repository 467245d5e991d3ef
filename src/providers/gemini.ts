import { z } from 'zod';
import { ProviderAdapter } from './adapter.js';
import type { Message, ProviderRequest } from './base.js';
import { shape, type ResponseShape } from './shapes.js';

const HARM_CATEGORIES = [
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
] as const;

interface GeminiContent {
  role: 'user' | 'model';
  parts: { text: string }[];
}

interface GenerationConfig {
  temperature?: number;
  maxOutputTokens?: number;
  thinkingConfig?: { thinkingBudget: number };
}

const PartsSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional(), thought: z.boolean().optional() }).passthrough()),
        }),
      })
    )
    .min(1),
});

const OutputSchema = z.object({ output: z.string() });

const AnswersSchema = z.object({
  answers: z.array(z.object({ content: z.string() })).min(1),
});

export const geminiShapes: readonly ResponseShape[] = [
  shape(PartsSchema, (response) =>
    response.candidates[0]?.content.parts.find((part) => part.thought !== true && part.text)?.text
  ),
  shape(OutputSchema, (response) => response.output),
  shape(AnswersSchema, (response) => response.answers[0]?.content),
];

export class GeminiProvider extends ProviderAdapter {
  readonly name = 'gemini';
  readonly displayName = 'Gemini';
  protected readonly successShapes = geminiShapes;

  /** `<base><model>:generateContent?key=…`, or the SSE variant when streaming. */
  buildUrl(stream: boolean): string {
    const key = encodeURIComponent(this.settings.apiKey ?? '');
    const method = stream ? 'streamGenerateContent?alt=sse&' : 'generateContent?';
    return `${this.settings.baseUrl}${this.settings.model}:${method}key=${key}`;
  }

  protected buildRequest(messages: readonly Message[]): ProviderRequest {
    const system = messages.filter((message) => message.role === 'system');
    const contents: GeminiContent[] = messages
      .filter((message) => message.role !== 'system')
      .map((message) => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content }],
      }));

    const body: Record<string, unknown> = {
      contents,
      safety_settings: HARM_CATEGORIES.map((category) => ({ category, threshold: 'BLOCK_NONE' })),
    };
    if (system.length > 0) {
      body.system_instruction = { parts: system.map((message) => ({ text: message.content })) };
    }

    const generationConfig = this.generationConfig();
    if (Object.keys(generationConfig).length > 0) {
      body.generationConfig = generationConfig;
    }

    const stream = this.streamRequested;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (stream) {
      headers.Accept = 'text/event-stream';
    }

    return {
      url: this.buildUrl(stream),
      headers,
      body: JSON.stringify(body),
      stream: stream ? 'gemini-sse' : undefined,
    };
  }

  private generationConfig(): GenerationConfig {
    const params = this.settings.additionalParameters;
    const config: GenerationConfig = {};

    const temperature = this.settings.temperature ?? params.temperature;
    if (typeof temperature === 'number') config.temperature = temperature;

    const maxTokens = this.settings.maxTokens ?? params.max_tokens;
    if (typeof maxTokens === 'number') config.maxOutputTokens = maxTokens;

    if (typeof params.thinking_budget === 'number') {
      config.thinkingConfig = { thinkingBudget: params.thinking_budget };
    }
    return config;
  }
}
