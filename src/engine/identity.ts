import type { Db } from '../adapters/db.js';
import type { Player } from '../models/types.js';
import { canonicalize, localRendering } from '../util/phone.js';

export interface IdentityResolver {
  resolve(raw: string, country?: string): string;
  lookup(raw: string, country?: string): Player | undefined;
}

/**
 * Matches senders against stored players. Older rows were not always stored in
 * canonical form, so a miss on the canonical key retries the raw string and the
 * local-trunk rendering before giving up. Never writes.
 */
export function createIdentityResolver(db: Db, defaultCountry: string): IdentityResolver {
  function resolve(raw: string, country = defaultCountry) {
    return canonicalize(raw, country);
  }

  function lookup(raw: string, country = defaultCountry) {
    const key = resolve(raw, country);
    const candidates = [key, raw, localRendering(key, country)];
    const tried = new Set<string>();
    for (const candidate of candidates) {
      if (!candidate || tried.has(candidate)) continue;
      tried.add(candidate);
      const player = db.getPlayerByKey(candidate);
      if (player) return player;
    }
    return undefined;
  }

  return { resolve, lookup };
}
