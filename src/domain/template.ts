/**
 * Message and tag name templates.
 *
 * Placeholders are `{name}`; `{{` and `}}` produce literal braces.
 *
 * Pure functions, no I/O.
 */

export const TEMPLATE_VARIABLES = ['version', 'previous', 'source', 'target'] as const;

export type TemplateVariable = (typeof TEMPLATE_VARIABLES)[number];

export type TemplateValues = Partial<Record<TemplateVariable, string>>;

const PLACEHOLDER = /\{\{|\}\}|\{([^{}]*)\}/g;

/**
 * Names of the placeholders used in a template.
 */
export function placeholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (match[1] !== undefined) names.push(match[1]);
  }
  return names;
}

/**
 * Placeholders that are not template variables.
 */
export function unknownPlaceholders(template: string): string[] {
  return placeholders(template).filter(
    (name) => !TEMPLATE_VARIABLES.some((variable) => variable === name),
  );
}

/**
 * Substitute values into a template. Missing values render as empty strings.
 */
export function render(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (token: string, name: string | undefined) => {
    if (name === undefined) return token[0];
    const variable = TEMPLATE_VARIABLES.find((v) => v === name);
    return variable ? values[variable] ?? '' : token;
  });
}

/**
 * Build a regular expression source matching the template, with `{version}`
 * captured. Other placeholders match lazily.
 */
export function toPattern(template: string): string {
  let source = '';
  let last = 0;
  for (const match of template.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    source += escapeRegExp(template.slice(last, index));
    if (match[1] === undefined) {
      source += escapeRegExp(match[0][0]);
    } else if (match[1] === 'version') {
      source += '(.*?)';
    } else {
      source += '.*?';
    }
    last = index + match[0].length;
  }
  source += escapeRegExp(template.slice(last));
  return source;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
