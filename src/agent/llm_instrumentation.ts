// Lightweight LLM instrumentation utilities.
// Collects recent call metadata for debugging without large log noise.
import { logger } from '../logger.js';
import { errorMessage } from '../engine/errors.js';

export interface LLMRecord {
  id: number;
  label: string;
  start: number;
  end?: number;
  elapsed_ms?: number;
  prompt_hash: string;
  prompt_chars: number;
  output_chars?: number;
  tool_calls?: number;
  ok?: boolean;
  error?: string;
}

const RING_SIZE = 50;
const ring: LLMRecord[] = [];
let seq = 1;

function hash(text: string): string {
  let h = 0, i = 0;
  const len = text.length;
  while (i < len) { h = (h * 31 + text.charCodeAt(i++)) | 0; }
  return (h >>> 0).toString(16);
}

export function startLLM(label: string, prompt: string): LLMRecord {
  const rec: LLMRecord = {
    id: seq++,
    label,
    start: Date.now(),
    prompt_hash: hash(prompt),
    prompt_chars: prompt.length,
  };
  ring.push(rec);
  if (ring.length > RING_SIZE) ring.shift();
  return rec;
}

export function finishLLM(rec: LLMRecord, opts: { output?: string; error?: unknown; tool_calls?: number }) {
  rec.end = Date.now();
  rec.elapsed_ms = rec.end - rec.start;
  if (opts.output !== undefined) rec.output_chars = opts.output.length;
  if (opts.tool_calls !== undefined) rec.tool_calls = opts.tool_calls;
  if (opts.error !== undefined) { rec.ok = false; rec.error = errorMessage(opts.error); }
  else rec.ok = true;
  const base = `[llm] ${rec.label} id=${rec.id} hash=${rec.prompt_hash} ms=${rec.elapsed_ms} ok=${rec.ok}`;
  if (!rec.ok) logger.warn(base, 'err=', rec.error);
  else logger.debug(base, 'outChars=', rec.output_chars, 'toolCalls=', rec.tool_calls);
}

export function recentLLMRecords() { return [...ring]; }
