import { z } from 'zod';
import { logger } from '../logger.js';
import { logEvent } from '../engine/events.js';
import { errorMessage } from '../engine/errors.js';
import type { AppConfig } from '../config.js';

export type SendResult = { ok: true; messageId?: string } | { ok: false; error: string };

export interface MessageGateway {
  send(to: string, text: string): Promise<SendResult>;
}

/** Development gateway: prints instead of sending. */
export const consoleGateway: MessageGateway = {
  async send(to, text) {
    console.log('[WA]', to, text);
    return { ok: true };
  },
};

type WhatsAppConfig = NonNullable<AppConfig['whatsapp']>;

const sendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string().optional() })).optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

/** WhatsApp Cloud API text messages. Failures are returned, never thrown. */
export function createWhatsAppGateway(cfg: WhatsAppConfig, fetchImpl: typeof fetch = fetch): MessageGateway {
  const url = `https://graph.facebook.com/${cfg.apiVersion}/${cfg.phoneNumberId}/messages`;
  return {
    async send(to, text) {
      try {
        const res = await fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${cfg.token}` },
          body: JSON.stringify({ messaging_product: 'whatsapp', to, type: 'text', text: { body: text } }),
        });
        const parsed = sendResponseSchema.safeParse(await res.json().catch(() => ({})));
        const body: z.infer<typeof sendResponseSchema> = parsed.success ? parsed.data : {};
        if (!res.ok) {
          const error = body.error?.message ?? `HTTP ${res.status}`;
          logger.warn('[WA] send failed', to, error);
          logEvent('gateway.send_failed', { to, error });
          return { ok: false, error };
        }
        return { ok: true, messageId: body.messages?.[0]?.id };
      } catch (err) {
        const error = errorMessage(err);
        logger.warn('[WA] send failed', to, error);
        logEvent('gateway.send_failed', { to, error });
        return { ok: false, error };
      }
    },
  };
}

export function createGateway(config: AppConfig): MessageGateway {
  if (config.whatsapp) return createWhatsAppGateway(config.whatsapp);
  logger.warn('[env] WHATSAPP_TOKEN / WHATSAPP_PHONE_NUMBER_ID not set – outbound messages go to the console.');
  return consoleGateway;
}
