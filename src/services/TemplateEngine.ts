import * as fs from 'fs';
import * as path from 'path';
import * as Mustache from 'mustache';

export const TEMPLATE_DIR = path.join(__dirname, '..', '..', 'templates');

export type TemplateView = Record<string, unknown>;

export interface TemplateEngine {
  render(template: string, data: TemplateView): string;
}

// Generated code is not HTML: interpolate everything unescaped
const RENDER_OPTIONS: Mustache.RenderOptions = { escape: (value: unknown) => String(value) };

export class MustacheTemplateEngine implements TemplateEngine {
  render(template: string, data: TemplateView): string {
    return Mustache.render(template, data, {}, RENDER_OPTIONS);
  }
}

export function loadTemplate(name: string, templateDir: string = TEMPLATE_DIR): string {
  return fs.readFileSync(path.join(templateDir, name), 'utf-8');
}
