// Seed script: loads sample players from data/players.sample.json and schedules
// the next game two days out at 18:00 UTC if none is upcoming.
// Run with: npm run seed

import '../src/env_bootstrap.js';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { logger } from '../src/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const dataFile = join(__dirname, '..', 'data', 'players.sample.json');

const sampleSchema = z.array(z.object({
  phone: z.string(),
  name: z.string().min(1),
  language: z.string().optional(),
  country: z.string().optional(),
  skill: z.string().optional(),
}));

async function main() {
  const app = await createApp(loadConfig());
  try {
    const samples = sampleSchema.parse(JSON.parse(readFileSync(dataFile, 'utf-8')));
    for (const s of samples) {
      const p = app.admin.addPlayer(s);
      logger.info('[seed] player', p.identity_key, p.name);
    }
    const existing = app.db.getNextEvent();
    if (existing) {
      logger.info('[seed] next event already scheduled', existing.id, existing.start_time);
      return;
    }
    const start = new Date();
    start.setUTCDate(start.getUTCDate() + 2);
    start.setUTCHours(18, 0, 0, 0);
    const event = app.admin.createEvent(start, 'Beach Court 1', 4);
    logger.info('[seed] event', event.id, event.start_time);
  } finally {
    app.close();
  }
}

main().catch(e => { logger.error('[seed] failed', e); process.exit(1); });
