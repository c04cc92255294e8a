import { GoogleGenerativeAI, type Tool } from '@google/generative-ai';
import type { AppConfig } from '../config.js';

export type GeminiConfig = NonNullable<AppConfig['gemini']>;

export function buildGemini(cfg: GeminiConfig, opts: { systemInstruction: string; tools?: Tool[] }) {
  if (!cfg.apiKey) throw new Error('Missing GEMINI_API_KEY');
  const genAI = new GoogleGenerativeAI(cfg.apiKey);
  const model = genAI.getGenerativeModel({
    model: cfg.model,
    systemInstruction: opts.systemInstruction,
    tools: opts.tools,
  });
  return { model, cfg };
}
