/**
 * Console logger with secret redaction.
 * Tokens registered via registerSecret never reach stdout, even inside error stacks.
 */

import { inspect } from 'node:util';

const BEARER_PATTERN = /(?<=Bearer\s+)\S+/gi;

let debugEnabled = false;
const secretFragments: string[] = [];

/** Turned on from AppConfig.debug when configuration loads. */
export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}
let secretPattern: RegExp | null = null;

/** Register a secret value so it is redacted from all log output. */
export function registerSecret(secret: string | undefined): void {
  if (secret && secret.length >= 8) {
    secretFragments.push(secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
    secretPattern = new RegExp(secretFragments.join('|'), 'g');
  }
}

export function sanitize(message: string): string {
  let result = message.replace(BEARER_PATTERN, '[REDACTED]');
  if (secretPattern) result = result.replace(secretPattern, '[REDACTED]');
  return result;
}

function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) return sanitize(arg.stack ?? arg.message);
      if (typeof arg === 'string') return sanitize(arg);
      return sanitize(inspect(arg, { depth: 3, breakLength: Infinity }));
    })
    .join(' ');
}

function timestamp(): string {
  return new Date().toISOString();
}

export const logger = {
  info(...args: unknown[]): void {
    console.log(`[${timestamp()}] [INFO]`, formatArgs(args));
  },
  warn(...args: unknown[]): void {
    console.warn(`[${timestamp()}] [WARN]`, formatArgs(args));
  },
  error(...args: unknown[]): void {
    console.error(`[${timestamp()}] [ERROR]`, formatArgs(args));
  },
  debug(...args: unknown[]): void {
    if (debugEnabled) {
      console.debug(`[${timestamp()}] [DEBUG]`, formatArgs(args));
    }
  },
};
