/**
 * Fill `{{NAME}}` placeholders in one pass.
 *
 * Substituted values are never rescanned, so document text that happens to
 * contain `{{...}}` or `$&` is inserted verbatim. Unknown placeholders are
 * left as they are.
 */
export function renderPrompt(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : placeholder
  );
}
