// Invites every active player to the next upcoming game.
// Usage: npm run broadcast [-- --deadline-seconds 120]
import '../src/env_bootstrap.js';
import { parseArgs } from 'node:util';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { logger } from '../src/logger.js';

async function main() {
  const { values } = parseArgs({ options: { 'deadline-seconds': { type: 'string' } } });
  const app = await createApp(loadConfig());
  try {
    const event = app.db.getNextEvent();
    if (!event) {
      logger.warn('[broadcast] no upcoming event; nothing to send');
      return;
    }
    const seconds = values['deadline-seconds'] ? Number(values['deadline-seconds']) : undefined;
    const deadline = seconds && seconds > 0 ? new Date(Date.now() + seconds * 1000) : undefined;
    const report = await app.broadcaster.broadcast(event, app.admin.listActivePlayers(), { deadline });
    for (const r of report.recipients) console.log(r.status.padEnd(22), r.identity_key, r.error ?? '');
    console.log(`sent ${report.succeeded}, failed ${report.failed}, skipped ${report.counts.skipped}`);
  } finally {
    app.close();
  }
}

main().catch(e => { logger.error('[broadcast] failed', e); process.exit(1); });
