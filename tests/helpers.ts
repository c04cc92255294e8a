import type { MessageGateway, SendResult } from '../src/adapters/gateway.js';
import type { DecisionEngine } from '../src/agent/decision.js';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';

export const NOW = new Date('2026-10-19T09:00:00.000Z'); // Monday
export const TZ = 'Asia/Jerusalem';
// Wednesday 21 Oct 2026, 18:00 in Israel (UTC+3)
export const GAME_START = '2026-10-21T15:00:00.000Z';

export interface Sent { to: string; text: string }

export function recordingGateway(result: (to: string) => SendResult = () => ({ ok: true })) {
  const sent: Sent[] = [];
  const gateway: MessageGateway = {
    async send(to, text) {
      const r = result(to);
      if (r.ok) sent.push({ to, text });
      return r;
    },
  };
  return { gateway, sent };
}

export async function makeApp(opts: { engine?: DecisionEngine; gateway?: MessageGateway; env?: NodeJS.ProcessEnv } = {}) {
  const rec = recordingGateway();
  const config = loadConfig({ DATABASE_PATH: ':memory:', TIMEZONE: TZ, ...opts.env });
  const app = await createApp(config, { engine: opts.engine, gateway: opts.gateway ?? rec.gateway, now: () => NOW });
  return { ...app, sent: rec.sent };
}
