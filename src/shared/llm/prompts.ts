/**
 * Prompt Utilities
 */

/**
 * Fill {placeholder} slots in a prompt template.
 * Values are inserted once and never rescanned, so a job description may
 * contain braces or dollar signs. Unknown placeholders are left in place.
 */
export function fillPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

/**
 * Truncate text to a maximum length while preserving word boundaries
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  // Find the last space before maxLength
  const truncated = text.substring(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > 0) {
    return truncated.substring(0, lastSpace) + '...';
  }

  return truncated + '...';
}

/**
 * Format a list of items for inclusion in a prompt
 */
export function formatList(items: string[], marker: string = '•'): string {
  return items.map(item => `${marker} ${item}`).join('\n');
}
