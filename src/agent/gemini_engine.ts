import { z } from 'zod';
import {
  FunctionCallingMode,
  type Content,
  type FunctionCall,
  type FunctionResponsePart,
  type GenerateContentRequest,
} from '@google/generative-ai';
import type { ConversationContext, ContextTurn } from '../engine/context.js';
import { DecisionUnavailableError, errorMessage } from '../engine/errors.js';
import { logEvent } from '../engine/events.js';
import { withTimeout } from '../util/timeout.js';
import { coerceDecision, type Decision, type DecisionEngine, type ReadQuery, type ReadTools } from './decision.js';
import { buildGemini, type GeminiConfig } from './gemini_client.js';
import { finishLLM, startLLM } from './llm_instrumentation.js';
import { AGENT_SYSTEM_PROMPT } from './prompts.js';
import { loadToolContract, toGeminiTools, type ToolContract, type ToolDef } from './tool_loader.js';

/** The slice of GenerativeModel the engine uses; tests pass an in-process fake. */
export interface ContentModel {
  generateContent(request: GenerateContentRequest): Promise<{
    response: { text(): string; functionCalls(): FunctionCall[] | undefined };
  }>;
}

export interface GeminiEngineOptions {
  timeoutMs: number;
  maxToolRounds: number;
}

const readArgs = z.object({ date_query: z.string().optional() });
const writeArgs = z.object({
  status: z.string(),
  phone_number: z.string().optional(),
  confidence: z.number().min(0).max(1).optional().catch(undefined),
});

function roleOf(turn: ContextTurn) {
  return turn.role === 'outbound' ? 'model' : 'user';
}

// Consecutive turns with the same role are merged into one content entry.
export function toContents(turns: ContextTurn[]): Content[] {
  const contents: Content[] = [];
  for (const turn of turns) {
    const role = roleOf(turn);
    const last = contents[contents.length - 1];
    if (last && last.role === role) last.parts.push({ text: turn.text });
    else contents.push({ role, parts: [{ text: turn.text }] });
  }
  return contents;
}

function safeText(response: { text(): string }) {
  try {
    return response.text().trim();
  } catch {
    // text() throws when the candidate was blocked
    return '';
  }
}

export class GeminiDecisionEngine implements DecisionEngine {
  readonly name = 'gemini';
  private readonly byName: Map<string, ToolDef>;

  constructor(private readonly model: ContentModel, contract: ToolContract, private readonly opts: GeminiEngineOptions) {
    this.byName = new Map(contract.tools.map(t => [t.name, t]));
  }

  static async create(cfg: GeminiConfig, toolsFile?: string) {
    const contract = await loadToolContract(toolsFile);
    const { model } = buildGemini(cfg, { systemInstruction: AGENT_SYSTEM_PROMPT, tools: toGeminiTools(contract) });
    return new GeminiDecisionEngine(model, contract, { timeoutMs: cfg.timeoutMs, maxToolRounds: cfg.maxToolRounds });
  }

  async decide(context: ConversationContext, tools: ReadTools): Promise<Decision> {
    const contents = toContents(context.turns);
    const rec = startLLM('decision.decide', JSON.stringify(contents));
    let toolCalls = 0;
    let answered: ReadQuery | undefined;
    try {
      for (let round = 0; round <= this.opts.maxToolRounds; round++) {
        const result = await withTimeout(this.model.generateContent({ contents }), this.opts.timeoutMs, 'decision');
        const calls = result.response.functionCalls() ?? [];
        if (!calls.length) {
          const text = safeText(result.response);
          finishLLM(rec, { output: text, tool_calls: toolCalls });
          return answered ? { kind: 'answer', query: answered, text } : coerceDecision(text);
        }
        const write = calls.find(c => this.byName.get(c.name)?.kind === 'write');
        if (write) {
          finishLLM(rec, { output: JSON.stringify(write.args), tool_calls: toolCalls + 1 });
          return this.toWrite(write);
        }
        if (round === this.opts.maxToolRounds) break;

        contents.push({ role: 'model', parts: calls.map(functionCall => ({ functionCall })) });
        const responses: FunctionResponsePart[] = [];
        for (const call of calls) {
          toolCalls++;
          const def = this.byName.get(call.name);
          if (!def || def.kind !== 'read') {
            responses.push({ functionResponse: { name: call.name, response: { error: `unknown tool ${call.name}` } } });
            continue;
          }
          const args = readArgs.safeParse(call.args);
          const outcome = await tools({ kind: 'query', query: def.query, date: args.success ? args.data.date_query : undefined });
          if (outcome.ok) answered = def.query;
          responses.push({ functionResponse: { name: call.name, response: outcome.ok ? outcome.data : { error: outcome.error } } });
        }
        contents.push({ role: 'function', parts: responses });
      }
      finishLLM(rec, { output: '', tool_calls: toolCalls });
      logEvent('decision.tool_rounds_exhausted', { identityKey: context.identityKey, toolCalls });
      return { kind: 'reply', text: '' };
    } catch (err) {
      finishLLM(rec, { error: err, tool_calls: toolCalls });
      throw new DecisionUnavailableError(`Gemini decision failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async generate(context: ConversationContext): Promise<string> {
    const contents = toContents(context.turns);
    const rec = startLLM('decision.generate', JSON.stringify(contents));
    let text: string;
    try {
      const result = await withTimeout(
        this.model.generateContent({ contents, toolConfig: { functionCallingConfig: { mode: FunctionCallingMode.NONE } } }),
        this.opts.timeoutMs,
        'generation',
      );
      text = safeText(result.response).replace(/\s*\n+\s*/g, ' ');
    } catch (err) {
      finishLLM(rec, { error: err });
      throw new DecisionUnavailableError(`Gemini generation failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!text) {
      finishLLM(rec, { output: '', error: 'empty output' });
      throw new DecisionUnavailableError('Gemini returned no text');
    }
    finishLLM(rec, { output: text });
    return text;
  }

  private toWrite(call: FunctionCall): Decision {
    const args = writeArgs.safeParse(call.args);
    if (!args.success) return { kind: 'set_status', status: '' };
    return { kind: 'set_status', status: args.data.status, targetKey: args.data.phone_number, confidence: args.data.confidence };
  }
}
