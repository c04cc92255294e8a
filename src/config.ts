import { z } from 'zod';
import { ConfigError } from './engine/errors.js';
import { registerSecret, setDebug } from './logger.js';

const optionalSecret = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('data/turnout.db'),
  DEFAULT_COUNTRY: z.string().min(1).default('Israel'),
  DEFAULT_LANGUAGE: z.string().min(1).default('English'),
  TIMEZONE: z.string().min(1).default('Asia/Jerusalem'),
  GEMINI_API_KEY: optionalSecret,
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  LLM_MAX_TOOL_ROUNDS: z.coerce.number().int().min(1).max(10).default(3),
  CONTEXT_WINDOW: z.coerce.number().int().min(1).max(50).default(10),
  BROADCAST_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  WHATSAPP_TOKEN: optionalSecret,
  WHATSAPP_PHONE_NUMBER_ID: optionalSecret,
  WHATSAPP_VERIFY_TOKEN: optionalSecret,
  WHATSAPP_API_VERSION: z.string().min(1).default('v21.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  DEBUG: z
    .string()
    .optional()
    .transform(v => Boolean(v && !['0', 'false', 'no'].includes(v.trim().toLowerCase()))),
});

export interface AppConfig {
  databasePath: string;
  defaultCountry: string;
  defaultLanguage: string;
  timezone: string;
  gemini?: { apiKey: string; model: string; timeoutMs: number; maxToolRounds: number };
  contextWindow: number;
  broadcastConcurrency: number;
  whatsapp?: { token: string; phoneNumberId: string; apiVersion: string };
  verifyToken?: string;
  port: number;
  debug: boolean;
}

/**
 * Builds the process-wide configuration once. Components receive the result
 * explicitly; nothing else reads process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  if (!isValidTimezone(e.TIMEZONE)) throw new ConfigError([`TIMEZONE: unknown time zone "${e.TIMEZONE}"`]);

  registerSecret(e.GEMINI_API_KEY);
  registerSecret(e.WHATSAPP_TOKEN);
  registerSecret(e.WHATSAPP_VERIFY_TOKEN);
  setDebug(e.DEBUG);

  return {
    databasePath: e.DATABASE_PATH,
    defaultCountry: e.DEFAULT_COUNTRY,
    defaultLanguage: e.DEFAULT_LANGUAGE,
    timezone: e.TIMEZONE,
    gemini: e.GEMINI_API_KEY
      ? { apiKey: e.GEMINI_API_KEY, model: e.GEMINI_MODEL, timeoutMs: e.LLM_TIMEOUT_MS, maxToolRounds: e.LLM_MAX_TOOL_ROUNDS }
      : undefined,
    contextWindow: e.CONTEXT_WINDOW,
    broadcastConcurrency: e.BROADCAST_CONCURRENCY,
    whatsapp: e.WHATSAPP_TOKEN && e.WHATSAPP_PHONE_NUMBER_ID
      ? { token: e.WHATSAPP_TOKEN, phoneNumberId: e.WHATSAPP_PHONE_NUMBER_ID, apiVersion: e.WHATSAPP_API_VERSION }
      : undefined,
    verifyToken: e.WHATSAPP_VERIFY_TOKEN,
    port: e.PORT,
    debug: e.DEBUG,
  };
}

function isValidTimezone(tz: string) {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}
