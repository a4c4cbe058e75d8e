/**
 * Prompt templates for the model backend, read from prompts/*.md
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PROMPTS_DIR = join(__dirname, '../prompts');

export type PromptName = 'code-generation' | 'answer-synthesis' | 'error-explanation';

const cache = new Map<PromptName, string>();

function loadTemplate(name: PromptName): string {
  let template = cache.get(name);
  if (template === undefined) {
    template = readFileSync(join(PROMPTS_DIR, `${name}.md`), 'utf-8');
    cache.set(name, template);
  }
  return template;
}

/**
 * Fill `{{placeholder}}` slots. Unknown placeholders are left in place.
 */
export function renderPrompt(name: PromptName, values: Record<string, string>): string {
  return loadTemplate(name).replace(/\{\{(\w+)\}\}/g, (slot, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : slot
  );
}
