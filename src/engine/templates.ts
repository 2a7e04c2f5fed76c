import fs from 'node:fs';
import path from 'node:path';
import Handlebars from 'handlebars';

// Notification bodies are plain text, so nothing is HTML-escaped.
const cache = new Map<string, Handlebars.TemplateDelegate>();

export function templatesDir() {
  return path.join(process.cwd(), 'src', 'templates');
}

export function renderTemplate(name: string, vars: Record<string, unknown>): string {
  let tmpl = cache.get(name);
  if (!tmpl) {
    const file = path.join(templatesDir(), `${name}.hbs`);
    const source = fs.readFileSync(file, 'utf8');
    tmpl = Handlebars.compile(source, { noEscape: true, strict: true });
    cache.set(name, tmpl);
  }
  return tmpl(vars).trim();
}

