/**
 * One-word answer normalisation
 *
 * Shared between all LLM adapters. Models asked for one word still add
 * trailing full stops, quotes, or a short explanation; this reduces the
 * reply to the first bare word.
 */

const EDGE_PUNCTUATION = /^[\s.,!?;:"'`\-]+|[\s.,!?;:"'`\-]+$/g;

/**
 * Prompt sent to every provider
 */
export function buildOneWordPrompt(question: string): string {
  return `Answer the following question with ONLY ONE WORD, no punctuation, no explanation: ${question}`;
}

/**
 * Reduce model output to a single word.
 *
 * @returns the word, or null when nothing usable remains
 */
export function extractSingleWord(text: string | null | undefined): string | null {
  if (!text) return null;

  const stripped = text.replace(EDGE_PUNCTUATION, "");
  const [first] = stripped.split(/\s+/);
  if (!first) return null;

  const word = first.replace(EDGE_PUNCTUATION, "");
  return word.length > 0 ? word : null;
}
