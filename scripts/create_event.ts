// Usage: npm run create-event -- --start 2026-10-21T18:00:00+03:00 --location "Beach Court 1" --capacity 4
import '../src/env_bootstrap.js';
import { parseArgs } from 'node:util';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { shortDateTime } from '../src/util/time.js';
import { logger } from '../src/logger.js';

async function main() {
  const { values } = parseArgs({
    options: {
      start: { type: 'string' },
      location: { type: 'string', default: 'Beach Court 1' },
      capacity: { type: 'string', default: '4' },
    },
  });
  if (!values.start) throw new Error('--start is required (ISO date-time with offset)');

  const config = loadConfig();
  const app = await createApp(config);
  try {
    const event = app.admin.createEvent(values.start, values.location ?? 'Beach Court 1', Number(values.capacity));
    console.log(`Created ${event.id}: ${event.location}, ${shortDateTime(new Date(event.start_time), config.timezone)}, ${event.capacity} spots`);
  } finally {
    app.close();
  }
}

main().catch(e => { logger.error('[create-event] failed', e); process.exit(1); });
