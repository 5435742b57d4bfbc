import { PROMPT_TEMPLATES, type PromptName } from '../../shared/prompts';

export const loadPrompt = (name: PromptName): string => {
  const content = PROMPT_TEMPLATES[name];
  if (!content) {
    throw new Error(`Missing prompt template: ${name}`);
  }
  return content;
};

/** Replaces every `{KEY}` placeholder; unknown placeholders are left as they are. */
export const hydratePrompt = (template: string, values: Record<string, string>): string =>
  template.replace(/\{([A-Z_]+)\}/g, (match, key: string) => values[key] ?? match);
