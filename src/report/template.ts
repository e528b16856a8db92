import fs from 'fs/promises';
import path from 'path';
import { config } from '../utils/config.js';

export const REQUIRED_PLACEHOLDERS = [
  'title',
  'generation_date',
  'period',
  'total_tasks',
  'courses_count_line',
  'courses_explored_section',
  'section_recently_submitted',
  'section_overdue',
  'section_due_today',
  'section_upcoming',
  'empty_message',
  'footer',
] as const;

export type PlaceholderName = (typeof REQUIRED_PLACEHOLDERS)[number];

export type TemplateContext = Record<PlaceholderName, string | number>;

export const DEFAULT_TEMPLATE_PATH = path.join(config.paths.templatesDir, 'report_template.md');

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

const PLACEHOLDER = /\{([a-z_]+)\}/g;

export function listPlaceholders(template: string): string[] {
  return Array.from(new Set(Array.from(template.matchAll(PLACEHOLDER), (match) => match[1])));
}

/** Names from the required set that the template never mentions. */
export function missingPlaceholders(template: string): PlaceholderName[] {
  const present = new Set(listPlaceholders(template));
  return REQUIRED_PLACEHOLDERS.filter((name) => !present.has(name));
}

export function validateTemplate(template: string): void {
  const missing = missingPlaceholders(template);
  if (missing.length > 0) {
    throw new TemplateError(`Report template is missing placeholder(s): ${missing.map((m) => `{${m}}`).join(', ')}`);
  }
}

/**
 * Plain textual substitution of `{name}` placeholders. A placeholder with no
 * value in the context is an error; values are inserted verbatim.
 */
export function renderTemplate(template: string, context: Record<string, string | number>): string {
  return template.replace(PLACEHOLDER, (match: string, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(context, name)) {
      throw new TemplateError(`No value for placeholder ${match}`);
    }
    return String(context[name]);
  });
}

export async function loadReportTemplate(templatePath: string = DEFAULT_TEMPLATE_PATH): Promise<string> {
  let template: string;
  try {
    template = await fs.readFile(templatePath, 'utf-8');
  } catch (error) {
    throw new TemplateError(`Could not read report template ${templatePath}: ${error}`);
  }
  validateTemplate(template);
  return template;
}
