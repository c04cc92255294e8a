// Runs one message through the inbound pipeline with replies printed to the console.
// Usage: npm run simulate -- "+972501234567" "I'm in"
import '../src/env_bootstrap.js';
import { randomUUID } from 'node:crypto';
import { consoleGateway } from '../src/adapters/gateway.js';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { logger } from '../src/logger.js';

async function main() {
  const [from, ...words] = process.argv.slice(2);
  if (!from || !words.length) {
    console.error('Usage: simulate_inbound <phone> <message...>');
    process.exit(1);
  }
  const app = await createApp(loadConfig(), { gateway: consoleGateway });
  try {
    const result = await app.router.handleInbound({ from, body: words.join(' '), messageId: `sim-${randomUUID()}` });
    console.log(JSON.stringify(result, null, 2));
  } finally {
    app.close();
  }
}

main().catch(e => { logger.error('[simulate] failed', e); process.exit(1); });
