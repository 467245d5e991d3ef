import { z } from 'zod';

export const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
  name: z.string().optional(),
  reasoning: z.unknown().optional(),
  isContext: z.boolean().optional(),
});

export const ProviderKindSchema = z.enum([
  'openai',
  'anthropic',
  'gemini',
  'gigachat',
  'groq',
  'mistral',
  'openrouter',
  'deepseek',
]);

export const TimeoutPolicySchema = z.object({
  connectTimeoutMs: z.number().int().positive(),
  overallTimeoutMs: z.number().int().positive(),
});

export const ProviderSettingsSchema = z.object({
  handler: ProviderKindSchema.optional(),
  model: z.string().min(1),
  baseUrl: z.string().url(),
  apiKey: z.string().optional(),
  authUrl: z.string().url().optional(),
  scope: z.string().optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  enableWebSearch: z.boolean().optional(),
  additionalParameters: z.record(z.unknown()).default({}),
  timeouts: TimeoutPolicySchema.optional(),
});

export const ConfigurationSchema = z.object({
  provider: z.string().min(1),
  providerSettings: z.record(ProviderSettingsSchema),
});

export type ProviderKind = z.infer<typeof ProviderKindSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type ProviderSettingsInput = z.input<typeof ProviderSettingsSchema>;
export type Configuration = z.infer<typeof ConfigurationSchema>;

export const QueryRequestSchema = z.object({
  provider: z.string().min(1).optional(),
  messages: z.array(MessageSchema).min(1),
  stream: z.boolean().optional().default(false),
});

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export const QueryResponseSchema = z.object({
  content: z.string(),
});

export type QueryResponse = z.infer<typeof QueryResponseSchema>;
