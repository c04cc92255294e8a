import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { SchemaType, type FunctionDeclaration, type FunctionDeclarationsTool, type Schema } from '@google/generative-ai';
import { READ_QUERIES } from './decision.js';

const parameterSchema = z.object({
  description: z.string(),
  required: z.boolean().default(false),
  type: z.enum(['string', 'number']).default('string'),
});

const toolSchema = z.discriminatedUnion('kind', [
  z.object({ name: z.string().min(1), kind: z.literal('read'), query: z.enum(READ_QUERIES), description: z.string(), parameters: z.record(parameterSchema).default({}) }),
  z.object({ name: z.string().min(1), kind: z.literal('write'), description: z.string(), parameters: z.record(parameterSchema).default({}) }),
]);

const contractSchema = z.object({ tools: z.array(toolSchema).min(1) });

export type ToolDef = z.infer<typeof toolSchema>;
export type ToolContract = z.infer<typeof contractSchema>;

export const DEFAULT_TOOLS_FILE = path.join(process.cwd(), 'src', 'agent', 'tools.yaml');

const cache = new Map<string, ToolContract>();

export async function loadToolContract(file = DEFAULT_TOOLS_FILE): Promise<ToolContract> {
  const cached = cache.get(file);
  if (cached) return cached;
  const raw = await fs.readFile(file, 'utf8');
  const parsed = contractSchema.safeParse(yaml.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid tool contract in ${file}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  if (parsed.data.tools.filter(t => t.kind === 'write').length !== 1) {
    throw new Error(`Tool contract in ${file} must declare exactly one write tool`);
  }
  cache.set(file, parsed.data);
  return parsed.data;
}

export function clearToolCache() { cache.clear(); }

function toSchema(p: z.infer<typeof parameterSchema>): Schema {
  return p.type === 'number'
    ? { type: SchemaType.NUMBER, description: p.description }
    : { type: SchemaType.STRING, description: p.description };
}

export function toGeminiTools(contract: ToolContract): FunctionDeclarationsTool[] {
  const functionDeclarations: FunctionDeclaration[] = contract.tools.map(t => ({
    name: t.name,
    description: t.description,
    parameters: {
      type: SchemaType.OBJECT,
      properties: Object.fromEntries(Object.entries(t.parameters).map(([k, p]) => [k, toSchema(p)])),
      required: Object.entries(t.parameters).filter(([, p]) => p.required).map(([k]) => k),
    },
  }));
  return [{ functionDeclarations }];
}
