/**
 * Helpers for reading tool results.
 */

import type { CallToolResult, ContentBlock, TextContent } from '../schema/index.js';

export function isTextContent(block: ContentBlock): block is TextContent {
  return block.type === 'text' && 'text' in block && typeof block.text === 'string';
}

/**
 * Join the text parts of a tool result with newlines.
 */
export function textContent(result: CallToolResult): string {
  return result.content
    .filter(isTextContent)
    .map((block) => block.text)
    .join('\n');
}

/**
 * Render every content part for display: text verbatim, other parts as a
 * `[type]` placeholder.
 */
export function renderContent(result: CallToolResult): string {
  return result.content
    .map((block) => (isTextContent(block) ? block.text : `[${block.type}]`))
    .join('\n');
}
