import type { AppConfig } from '../config.js';
import { logger } from '../logger.js';
import type { DecisionEngine } from './decision.js';
import { GeminiDecisionEngine } from './gemini_engine.js';
import { RuleDecisionEngine } from './rule_engine.js';

export async function createDecisionEngine(config: AppConfig): Promise<DecisionEngine> {
  if (config.gemini) return GeminiDecisionEngine.create(config.gemini);
  logger.warn('[env] GEMINI_API_KEY not set – using the keyword engine; invitations use templates.');
  return new RuleDecisionEngine(config.timezone);
}
