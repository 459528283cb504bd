/**
 * Prompt Construction
 *
 * Grounded prompts wrap the retrieved chunks in a <sources> block ahead of
 * the question:
 *
 * ```xml
 * <sources>
 * <source id="1" document="guide.md" chunk="guide.md#3">
 * Bedrock offers foundation models through one API.
 * </source>
 * </sources>
 *
 * Question: What does Bedrock offer?
 * ```
 */

import type { ScoredChunk } from '../search/types.js';

/**
 * Role instruction sent with grounded prompts.
 */
export const GROUNDED_ROLE_INSTRUCTION =
  'You are a helpful assistant that answers questions about the user\'s documents. ' +
  'Answer using only the information in the <sources> block. ' +
  'If the sources do not contain the answer, say that you do not know. ' +
  'Refer to sources by their id when it helps the reader.';

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"]/g, (char) => XML_ESCAPES[char] ?? char);
}

/**
 * Build the grounded prompt for a question and its retrieved chunks.
 * Sources keep retrieval order; ids start at 1.
 */
export function buildGroundedPrompt(question: string, hits: readonly ScoredChunk[]): string {
  const sources = hits.map(({ chunk }, i) =>
    [
      `<source id="${i + 1}" document="${escapeXml(chunk.documentId)}" chunk="${escapeXml(chunk.id)}">`,
      escapeXml(chunk.text),
      '</source>',
    ].join('\n')
  );

  return ['<sources>', ...sources, '</sources>', '', `Question: ${question}`].join('\n');
}
