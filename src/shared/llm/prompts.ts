/**
 * LLM Prompts
 *
 * Common prompt utilities and templates for LLM interactions.
 */

/**
 * Build a structured prompt with clear instructions
 */
export function buildStructuredPrompt(
  task: string,
  instructions: string[],
  sections: Array<{ title: string; body: string }> = [],
  outputFormat?: string
): string {
  let prompt = `${task}\n\n`;

  if (instructions.length > 0) {
    prompt += 'INSTRUCTIONS:\n';
    instructions.forEach((instruction, i) => {
      prompt += `${i + 1}. ${instruction}\n`;
    });
    prompt += '\n';
  }

  for (const section of sections) {
    prompt += `${section.title.toUpperCase()}:\n${section.body}\n\n`;
  }

  if (outputFormat) {
    prompt += `OUTPUT FORMAT:\n${outputFormat}\n\n`;
  }

  return prompt.trimEnd();
}

/**
 * Escape special characters in text for safe inclusion in prompts
 */
export function escapePromptText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')  // Normalize line endings
    .replace(/\r/g, '\n')
    .replace(/```/g, "'''")  // Keep caller text from closing a fence
    .trim();
}

/**
 * Truncate text to a maximum length while preserving word boundaries
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

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
export function formatList(items: readonly string[], numbered: boolean = false): string {
  if (numbered) {
    return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
  }
  return items.map(item => `- ${item}`).join('\n');
}
