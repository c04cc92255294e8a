import fs from 'node:fs/promises';
import path from 'node:path';
import Handlebars from 'handlebars';

export const TEMPLATE_DIR = path.join(process.cwd(), 'src', 'templates');
const FALLBACK_LANGUAGE = 'english';

const cache = new Map<string, Handlebars.TemplateDelegate>();

async function exists(file: string) {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

async function load(name: string, language: string): Promise<Handlebars.TemplateDelegate> {
  const lang = language.trim().toLowerCase() || FALLBACK_LANGUAGE;
  const key = `${name}.${lang}`;
  const cached = cache.get(key);
  if (cached) return cached;
  let file = path.join(TEMPLATE_DIR, `${name}.${lang}.hbs`);
  if (!(await exists(file))) {
    if (lang === FALLBACK_LANGUAGE) throw new Error(`Missing template ${name}.${FALLBACK_LANGUAGE}.hbs`);
    file = path.join(TEMPLATE_DIR, `${name}.${FALLBACK_LANGUAGE}.hbs`);
  }
  const source = await fs.readFile(file, 'utf8');
  // Chat text, not HTML.
  const tmpl = Handlebars.compile(source.trim(), { noEscape: true, strict: true });
  cache.set(key, tmpl);
  return tmpl;
}

/** Renders `<name>.<language>.hbs`, falling back to the English variant. */
export async function renderTemplate(name: string, language: string, vars: Record<string, string | number>): Promise<string> {
  const tmpl = await load(name, language);
  return tmpl(vars);
}

export function clearTemplateCache() { cache.clear(); }
