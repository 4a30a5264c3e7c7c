export type ReplyIntent = 'accept' | 'revise' | 'other';

const acceptWords = new Set(['accept', 'yes', 'ok', 'confirm']);
const reviseWords = new Set(['reject', 'no', 'revise', 'change']);

/** How a user answered a proposed refinement. */
export function classifyReply(message: string): ReplyIntent {
  const word = message.trim().toLowerCase();
  if (acceptWords.has(word)) return 'accept';
  if (reviseWords.has(word)) return 'revise';
  return 'other';
}
