// src/utils/template-interpolator.ts

/**
 * Replace {{variable}} placeholders in a template string.
 * Unknown variables are left as-is.
 */
export function interpolateTemplate(
  template: string,
  context: Readonly<Record<string, unknown>>
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => {
    const value = context[key];
    if (value === undefined || value === null) {
      return match; // Keep placeholder if no value
    }
    if (value instanceof RegExp) {
      return value.source;
    }
    return String(value);
  });
}
