import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { ConfigurationSchema, type Configuration } from './schemas/request.js';
import { DEFAULT_RETRY_OPTIONS } from './services/retry.js';

const ProvidersSchema = z
  .string()
  .optional()
  .transform((raw, ctx): Configuration | undefined => {
    if (raw === undefined || raw.trim() === '') return undefined;
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'LLM_PROVIDERS is not valid JSON' });
      return z.NEVER;
    }
    const parsed = ConfigurationSchema.safeParse(json);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
      }
      return z.NEVER;
    }
    return parsed.data;
  });

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LLM_TRANSPORT: z.enum(['auto', 'native', 'process']).default('auto'),
  LLM_CURL_PATH: z.string().min(1).default('curl'),
  LLM_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(DEFAULT_RETRY_OPTIONS.maxAttempts),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_OPTIONS.initialDelay),
  LLM_PROVIDERS: ProvidersSchema,
});

export type AppConfig = z.infer<typeof EnvSchema>;

/** Reads the process environment; invalid values raise a ConfigurationError listing every issue. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}
