/**
 * `{name}` placeholder templates for chat prompts.
 */

const PLACEHOLDER = /\{(\w+)\}/g;

export interface PromptTemplate {
  system?: string;
  template: string;
  /** Placeholder names in first-appearance order */
  variables: string[];
}

/**
 * Fill placeholders in one pass. Substituted values are never rescanned, and
 * placeholders without a value are left as written.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : placeholder,
  );
}

export function createPromptTemplate(template: string, options?: { system?: string }): PromptTemplate {
  const names = Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);

  return {
    system: options?.system,
    template,
    variables: [...new Set(names)],
  };
}

/**
 * Throws when a placeholder of the template has no value.
 */
export function executeTemplate(
  template: PromptTemplate,
  variables: Record<string, string>,
): { prompt: string; system?: string } {
  const missing = template.variables.filter(
    (name) => !Object.prototype.hasOwnProperty.call(variables, name),
  );
  if (missing.length > 0) {
    throw new Error(`Missing template variables: ${missing.join(', ')}`);
  }

  return { prompt: buildPrompt(template.template, variables), system: template.system };
}
