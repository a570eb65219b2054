/**
 * Renders a template string by replacing placeholders with provided values.
 *
 * @param template The template string containing placeholders in the format `{{key}}`.
 * @param variables An object where keys correspond to placeholder names and values are their replacements.
 * @returns The rendered string with placeholders replaced. Unknown placeholders are left untouched.
 *
 * @example
 * // Returns "## v1.2.0 (2024-02-01)"
 * renderTemplate("## {{version}} ({{date}})", { version: "v1.2.0", date: "2024-02-01" })
 */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, key: string) => {
    return key in variables ? variables[key] : placeholder;
  });
}

/**
 * Compiles a user supplied regular expression, returning `null` instead of throwing when the
 * source is not a valid expression.
 *
 * @param {string} source - Expression source without delimiters.
 * @param {string} [flags] - Optional RegExp flags.
 * @returns {RegExp | null}
 */
export function compilePattern(source: string, flags?: string): RegExp | null {
  try {
    return new RegExp(source, flags);
  } catch {
    return null;
  }
}

/**
 * Splits text into paragraphs separated by one or more blank lines. Lines inside a paragraph
 * are kept verbatim; empty paragraphs are dropped.
 *
 * @example
 * // Returns ["first line\nsecond line", "third"]
 * splitParagraphs("first line\nsecond line\n\n\nthird\n")
 */
export function splitParagraphs(text: string): string[] {
  const paragraphs: string[] = [];
  let current: string[] = [];

  for (const line of text.split('\n')) {
    if (line.trim() === '') {
      if (current.length > 0) {
        paragraphs.push(current.join('\n'));
        current = [];
      }
      continue;
    }
    current.push(line);
  }

  if (current.length > 0) {
    paragraphs.push(current.join('\n'));
  }

  return paragraphs;
}

/**
 * Formats a date as `YYYY-MM-DD` in UTC.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
